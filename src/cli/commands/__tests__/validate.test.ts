/**
 * Unit tests for `src/cli/commands/validate.ts`
 *
 * Covers:
 *   - Valid plan → layers, critical path and priorities, exit 0
 *   - --output-format json → full summary object
 *   - Cycle / unknown dependency → exit 2 with the structural error
 *   - Unparseable plan or missing file → exit 2
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { writeFileSync, mkdirSync, rmSync } from 'node:fs'
import {
  runValidateAction,
  VALIDATE_EXIT_SUCCESS,
  VALIDATE_EXIT_USAGE_ERROR,
} from '../validate.js'

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const VALID_PLAN = `
version: '1'
name: demo
blocks:
  core:
    description: Core types
    estimated_effort_ms: 1000
  api:
    description: API layer
    estimated_effort_ms: 2000
    depends_on: [core]
  docs:
    description: Reference docs
    estimated_effort_ms: 500
    depends_on:
      - block: api
        kind: influences
`

const CYCLIC_PLAN = `
version: '1'
blocks:
  a:
    description: A
    depends_on: [b]
  b:
    description: B
    depends_on: [a]
`

const DANGLING_PLAN = `
version: '1'
blocks:
  a:
    description: A
    depends_on: [ghost]
`

let testDir: string

beforeEach(() => {
  testDir = join(tmpdir(), `validate-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
  mkdirSync(testDir, { recursive: true })
})

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

function writePlan(name: string, content: string): string {
  const p = join(testDir, name)
  writeFileSync(p, content, 'utf-8')
  return p
}

function captureOutput(): { stdout: () => string; stderr: () => string } {
  let stdout = ''
  let stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
  return { stdout: () => stdout, stderr: () => stderr }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('runValidateAction', () => {
  it('prints layers, critical path and priorities for a valid plan', async () => {
    const out = captureOutput()
    const code = await runValidateAction({ filePath: writePlan('plan.yaml', VALID_PLAN), outputFormat: 'human' })

    expect(code).toBe(VALIDATE_EXIT_SUCCESS)
    const lines = out.stdout().split('\n')
    expect(lines[0]).toBe('Plan "demo": 3 block(s), 2 dependency edge(s)')
    expect(lines).toContain('  0: core, docs')
    expect(lines).toContain('  1: api')
    expect(lines).toContain('Critical path: core -> api (3000 ms)')
    expect(lines).toContain('Block | Priority')
    expect(lines).toContain('core  |       12')
    expect(lines).toContain('api   |       11')
    expect(lines).toContain('docs  |        0')
    expect(out.stderr()).toBe('')
  })

  it('emits the summary as JSON', async () => {
    const out = captureOutput()
    const code = await runValidateAction({ filePath: writePlan('plan.yaml', VALID_PLAN), outputFormat: 'json' })

    expect(code).toBe(VALIDATE_EXIT_SUCCESS)
    expect(JSON.parse(out.stdout())).toEqual({
      name: 'demo',
      blockCount: 3,
      dependencyCount: 2,
      layers: [['core', 'docs'], ['api']],
      criticalPath: { path: ['core', 'api'], totalEffortMs: 3000 },
      priorities: { core: 12, docs: 0, api: 11 },
    })
  })

  it('reads JSON plans by extension', async () => {
    const out = captureOutput()
    const plan = { version: '1', name: 'tiny', blocks: { only: { description: 'Only block' } } }
    const code = await runValidateAction({
      filePath: writePlan('plan.json', JSON.stringify(plan)),
      outputFormat: 'json',
    })

    expect(code).toBe(VALIDATE_EXIT_SUCCESS)
    expect(JSON.parse(out.stdout())).toMatchObject({ name: 'tiny', layers: [['only']] })
  })

  it('exits 2 on a gating cycle', async () => {
    const out = captureOutput()
    const code = await runValidateAction({ filePath: writePlan('cycle.yaml', CYCLIC_PLAN), outputFormat: 'human' })

    expect(code).toBe(VALIDATE_EXIT_USAGE_ERROR)
    expect(out.stderr()).toContain('Circular dependency detected in block graph')
    expect(out.stdout()).toBe('')
  })

  it('exits 2 when a dependency names an unknown block', async () => {
    const out = captureOutput()
    const code = await runValidateAction({ filePath: writePlan('dangling.yaml', DANGLING_PLAN), outputFormat: 'human' })

    expect(code).toBe(VALIDATE_EXIT_USAGE_ERROR)
    expect(out.stderr()).toBe('Error: Dependency "a" -> "ghost" references unknown block "ghost"\n')
  })

  it('exits 2 when the plan cannot be parsed', async () => {
    const out = captureOutput()
    const filePath = writePlan('broken.yaml', 'blocks: [\n')
    const code = await runValidateAction({ filePath, outputFormat: 'human' })

    expect(code).toBe(VALIDATE_EXIT_USAGE_ERROR)
    expect(out.stderr()).toContain(`Error: Failed to parse plan file: ${filePath}`)
  })

  it('exits 2 when the file does not exist', async () => {
    const out = captureOutput()
    const filePath = join(testDir, 'missing.yaml')
    const code = await runValidateAction({ filePath, outputFormat: 'human' })

    expect(code).toBe(VALIDATE_EXIT_USAGE_ERROR)
    expect(out.stderr()).toBe(`Error: Plan file not found: ${filePath}\n`)
  })
})
