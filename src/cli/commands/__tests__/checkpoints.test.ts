/**
 * Unit tests for the `blocksmith checkpoints` command group
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { z } from 'zod'
import { createDatabaseService } from '../../../persistence/database.js'
import { createCheckpointStore } from '../../../modules/checkpoint/checkpoint-store.js'
import { runCheckpointsList, runCheckpointsShow } from '../checkpoints.js'
import { CLI_EXIT_INVALID, CLI_EXIT_SUCCESS } from '../../utils/config-loader.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

const CREATED_AT = '2026-01-01T00:00:00.000Z'

let projectRoot: string
let planCheckpointId: string

async function seed(): Promise<string> {
  const database = createDatabaseService(join(projectRoot, '.blocksmith', 'checkpoints.db'))
  await database.initialize()
  try {
    const options = { maxCheckpoints: 10, schema: z.unknown(), now: () => CREATED_AT }
    const plan = createCheckpointStore(database.db, { ...options, lineage: 'plan:demo' })
    const branch = createCheckpointStore(database.db, { ...options, lineage: 'branch:alpha' })

    const id = plan.create({ step: 1 }, 'before_block:A', {
      summary: 'first',
      artifacts: [{ path: 'src/A.ts', content: 'export {}', blockId: 'A', stepId: 'implement' }],
    })
    branch.create({ step: 2 }, 'run_complete')
    return id
  } finally {
    await database.shutdown()
  }
}

beforeEach(async () => {
  projectRoot = join(tmpdir(), `blocksmith-ckpt-cmd-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  await mkdir(projectRoot, { recursive: true })
})

afterEach(async () => {
  await rm(projectRoot, { recursive: true, force: true })
  vi.restoreAllMocks()
})

function sources(): { projectRoot: string; globalConfigDir: string; env: NodeJS.ProcessEnv } {
  return { projectRoot, globalConfigDir: join(projectRoot, 'global'), env: {} }
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
// checkpoints list
// ---------------------------------------------------------------------------

describe('checkpoints list', () => {
  it('reports an empty store', async () => {
    const out = captureOutput()
    const code = await runCheckpointsList(sources())

    expect(code).toBe(CLI_EXIT_SUCCESS)
    expect(out.stdout()).toBe('No checkpoints found.\n')
  })

  it('lists every lineage in a table', async () => {
    await seed()
    const out = captureOutput()
    const code = await runCheckpointsList(sources())

    expect(code).toBe(CLI_EXIT_SUCCESS)
    const lines = out.stdout().trimEnd().split('\n')
    expect(lines).toHaveLength(4)
    expect(lines[0]).toMatch(/^ID\s+\| Lineage\s+\| Seq \| Reason\s+\| Created/)
    // Ordered by lineage name, then sequence
    expect(lines[2]).toContain('branch:alpha')
    expect(lines[3]).toContain('plan:demo')
  })

  it('filters by lineage and prints JSON', async () => {
    planCheckpointId = await seed()
    const out = captureOutput()
    const code = await runCheckpointsList({ ...sources(), lineage: 'plan:demo', outputFormat: 'json' })

    expect(code).toBe(CLI_EXIT_SUCCESS)
    expect(JSON.parse(out.stdout())).toEqual([
      {
        id: planCheckpointId,
        lineage: 'plan:demo',
        sequence: 1,
        reason: 'before_block:A',
        summary: 'first',
        formatVersion: 1,
        createdAt: CREATED_AT,
      },
    ])
  })

  it('exits 2 when the configuration is invalid', async () => {
    await mkdir(join(projectRoot, '.blocksmith'), { recursive: true })
    await writeFile(join(projectRoot, '.blocksmith', 'config.yaml'), 'scheduler:\n  max_parallel: 0\n', 'utf-8')
    const out = captureOutput()
    const code = await runCheckpointsList(sources())

    expect(code).toBe(CLI_EXIT_INVALID)
    expect(out.stderr()).toMatch(/^Configuration error: /)
  })
})

// ---------------------------------------------------------------------------
// checkpoints show
// ---------------------------------------------------------------------------

describe('checkpoints show', () => {
  it('prints metadata and artifact list', async () => {
    planCheckpointId = await seed()
    const out = captureOutput()
    const code = await runCheckpointsShow(planCheckpointId, sources())

    expect(code).toBe(CLI_EXIT_SUCCESS)
    expect(out.stdout()).toBe(
      [
        `Checkpoint: ${planCheckpointId}`,
        'Lineage:    plan:demo (#1)',
        'Reason:     before_block:A',
        `Created:    ${CREATED_AT}`,
        'Summary:    first',
        'Artifacts:  1',
        '  src/A.ts (A/implement)',
        '',
      ].join('\n'),
    )
  })

  it('includes the stored state with --state', async () => {
    planCheckpointId = await seed()
    const out = captureOutput()
    const code = await runCheckpointsShow(planCheckpointId, { ...sources(), outputFormat: 'json', state: true })

    expect(code).toBe(CLI_EXIT_SUCCESS)
    const parsed: unknown = JSON.parse(out.stdout())
    expect(parsed).toMatchObject({
      metadata: { id: planCheckpointId, reason: 'before_block:A' },
      state: { step: 1 },
      artifacts: [{ path: 'src/A.ts', content: 'export {}', blockId: 'A', stepId: 'implement' }],
    })
  })

  it('exits 2 for an unknown id', async () => {
    await seed()
    const out = captureOutput()
    const code = await runCheckpointsShow('ckpt-missing', sources())

    expect(code).toBe(CLI_EXIT_INVALID)
    expect(out.stderr()).toBe('Error: Checkpoint not found: ckpt-missing\n')
  })
})
