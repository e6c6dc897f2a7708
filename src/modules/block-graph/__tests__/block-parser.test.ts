/**
 * Unit tests for plan parsing and conversion.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadPlanFile, parsePlanString, toBlockPlan } from '../block-parser.js'
import { PlanParseError } from '../../../core/errors.js'

const YAML_PLAN = `
version: "1"
name: auth
blocks:
  schema:
    description: Create user tables
    estimated_effort_ms: 2000
    steps:
      - id: migration
        description: Write the migration
  api:
    description: Login endpoint
    risk: 6
    security_critical: true
    depends_on:
      - schema
      - block: docs
        kind: influences
  docs:
    description: Document the endpoint
`

describe('parsePlanString()', () => {
  it('raises PlanParseError on YAML syntax errors', () => {
    expect(() => parsePlanString('blocks: [unclosed', 'yaml')).toThrow(PlanParseError)
  })

  it('raises PlanParseError on JSON syntax errors', () => {
    expect(() => parsePlanString('{"version":', 'json')).toThrow(/^JSON parse error/)
  })
})

describe('toBlockPlan()', () => {
  it('converts blocks and dependency references', () => {
    const plan = toBlockPlan(parsePlanString(YAML_PLAN, 'yaml'))

    expect(plan.name).toBe('auth')
    expect(plan.blocks.map((b) => b.id)).toEqual(['schema', 'api', 'docs'])
    expect(plan.dependencies).toEqual([
      { from: 'api', to: 'schema', kind: 'required_before' },
      { from: 'api', to: 'docs', kind: 'influences' },
    ])
  })

  it('applies defaults and a single implicit step', () => {
    const plan = toBlockPlan(parsePlanString(YAML_PLAN, 'yaml'))
    const api = plan.blocks[1]

    expect(api).toEqual({
      id: 'api',
      description: 'Login endpoint',
      priority: 0,
      riskFactor: 6,
      securityCritical: true,
      estimatedEffortMs: 60_000,
      validationCriteria: [],
      steps: [{ id: 'implement', description: 'Login endpoint', optional: false }],
    })
    expect(plan.blocks[0]?.steps).toEqual([{ id: 'migration', description: 'Write the migration', optional: false }])
  })

  it('rejects an unsupported version', () => {
    expect(() => toBlockPlan({ version: '2', blocks: {} })).toThrow(/Plan version '2' is not supported/)
  })

  it('lists schema issues with their location', () => {
    let caught: unknown
    try {
      toBlockPlan({ version: '1', blocks: { a: { description: 'x', risk: 11 } } })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(PlanParseError)
    if (!(caught instanceof PlanParseError)) return
    expect(caught.context['issues']).toEqual(['Number must be less than or equal to 10 (at blocks.a.risk)'])
  })

  it('rejects unknown block fields', () => {
    expect(() => toBlockPlan({ version: '1', blocks: { a: { description: 'x', owner: 'me' } } })).toThrow(
      PlanParseError,
    )
  })
})

describe('loadPlanFile()', () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('reads JSON plans by extension', () => {
    dir = mkdtempSync(join(tmpdir(), 'plan-'))
    const file = join(dir, 'plan.json')
    writeFileSync(file, JSON.stringify({ version: '1', blocks: { only: { description: 'One block' } } }))

    const plan = loadPlanFile(file)
    expect(plan.name).toBe('plan')
    expect(plan.blocks.map((b) => b.id)).toEqual(['only'])
  })

  it('adds the file path to read errors', () => {
    let caught: unknown
    try {
      loadPlanFile('/nonexistent/plan.yaml')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(PlanParseError)
    if (!(caught instanceof PlanParseError)) return
    expect(caught.context['filePath']).toBe('/nonexistent/plan.yaml')
  })
})
