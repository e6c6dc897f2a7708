/**
 * Unit tests for buildBlockGraph and the derived ordering data.
 */

import { describe, it, expect } from 'vitest'
import { buildBlockGraph } from '../block-graph.js'
import { CycleDetectedError, DuplicateBlockError, MissingDependencyError } from '../../../core/errors.js'
import type { BlockDependency, DependencyKind, ImplementationBlock } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function block(id: string, overrides: Partial<ImplementationBlock> = {}): ImplementationBlock {
  return {
    id,
    description: `block ${id}`,
    priority: 0,
    riskFactor: 0,
    securityCritical: false,
    steps: [{ id: 'implement', description: '', optional: false }],
    estimatedEffortMs: 1_000,
    validationCriteria: [],
    ...overrides,
  }
}

function dep(from: string, to: string, kind: DependencyKind = 'required_before'): BlockDependency {
  return { from, to, kind }
}

/** A, E independent; B and C need A; D needs B and C */
function diamond(): { blocks: ImplementationBlock[]; deps: BlockDependency[] } {
  return {
    blocks: ['A', 'B', 'C', 'D', 'E'].map((id) => block(id)),
    deps: [dep('B', 'A'), dep('C', 'A'), dep('D', 'B'), dep('D', 'C')],
  }
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('buildBlockGraph() validation', () => {
  it('rejects duplicate block ids', () => {
    expect(() => buildBlockGraph([block('A'), block('A')], [])).toThrow(DuplicateBlockError)
  })

  it('rejects dependencies on unknown blocks', () => {
    const build = () => buildBlockGraph([block('A')], [dep('A', 'ghost')])
    expect(build).toThrow(MissingDependencyError)
    expect(build).toThrow('Dependency "A" -> "ghost" references unknown block "ghost"')
  })

  it('names the unknown dependent when the edge starts at a missing block', () => {
    let caught: unknown
    try {
      buildBlockGraph([block('A')], [dep('ghost', 'A')])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(MissingDependencyError)
    if (!(caught instanceof MissingDependencyError)) return
    expect(caught.message).toBe('Dependency "ghost" -> "A" references unknown block "ghost"')
    expect(caught.context).toEqual({ missing: 'ghost', from: 'ghost', to: 'A' })
  })

  it('reports a gating cycle as a closed path of gating edges', () => {
    const deps = [dep('A', 'B'), dep('B', 'C', 'required_for_completion'), dep('C', 'A')]
    let caught: unknown
    try {
      buildBlockGraph([block('A'), block('B'), block('C')], deps)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(CycleDetectedError)
    if (!(caught instanceof CycleDetectedError)) return
    expect(caught.path).toEqual(['A', 'B', 'C', 'A'])
    for (let i = 0; i + 1 < caught.path.length; i++) {
      const from = caught.path[i]
      const to = caught.path[i + 1]
      expect(deps.some((d) => d.from === from && d.to === to)).toBe(true)
    }
  })

  it('reports a self-dependency as a cycle', () => {
    expect(() => buildBlockGraph([block('A')], [dep('A', 'A')])).toThrow(CycleDetectedError)
  })

  it('ignores cycles formed by non-gating edges', () => {
    const graph = buildBlockGraph(
      [block('A'), block('B')],
      [dep('A', 'B', 'influences'), dep('B', 'A', 'provides_information'), dep('A', 'B', 'alternative')],
    )
    expect(graph.layers()).toEqual([['A', 'B']])
  })
})

// ---------------------------------------------------------------------------
// Layers and critical path
// ---------------------------------------------------------------------------

describe('BlockGraph ordering', () => {
  it('layers the diamond into [{A, E}, {B, C}, {D}]', () => {
    const { blocks, deps } = diamond()
    expect(buildBlockGraph(blocks, deps).layers()).toEqual([['A', 'E'], ['B', 'C'], ['D']])
  })

  it('flattens layers into a topological order', () => {
    const { blocks, deps } = diamond()
    expect(buildBlockGraph(blocks, deps).topologicalOrder()).toEqual(['A', 'E', 'B', 'C', 'D'])
  })

  it('gates on required_for_completion edges as well', () => {
    const graph = buildBlockGraph([block('X'), block('Y')], [dep('Y', 'X', 'required_for_completion')])
    expect(graph.layers()).toEqual([['X'], ['Y']])
  })

  it('finds the longest effort-weighted chain', () => {
    const blocks = [
      block('A', { estimatedEffortMs: 100 }),
      block('B', { estimatedEffortMs: 500 }),
      block('C', { estimatedEffortMs: 200 }),
      block('D', { estimatedEffortMs: 100 }),
      block('E', { estimatedEffortMs: 650 }),
    ]
    const { deps } = diamond()
    const graph = buildBlockGraph(blocks, deps)

    expect(graph.criticalPath()).toEqual({ path: ['A', 'B', 'D'], totalEffortMs: 700 })
    expect(graph.isOnCriticalPath('B')).toBe(true)
    expect(graph.isOnCriticalPath('C')).toBe(false)
    expect(graph.isOnCriticalPath('E')).toBe(false)
  })

  it('returns an empty critical path for an empty graph', () => {
    const graph = buildBlockGraph([], [])
    expect(graph.criticalPath()).toEqual({ path: [], totalEffortMs: 0 })
    expect(graph.layers()).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// Priority
// ---------------------------------------------------------------------------

describe('BlockGraph.priority()', () => {
  it('combines base, critical path, dependents, risk and security', () => {
    const { deps } = diamond()
    const blocks = [
      block('A', { priority: 3 }),
      block('B', { riskFactor: 4 }),
      block('C', { securityCritical: true }),
      block('D'),
      block('E'),
    ]
    const graph = buildBlockGraph(blocks, [...deps, dep('E', 'C', 'influences')])

    // A: 3 base + 10 critical path + 2 × 2 gating dependents
    expect(graph.priority('A')).toBe(17)
    // B: 10 critical path + 2 × 1 dependent + 1 × 4 risk
    expect(graph.priority('B')).toBe(16)
    // C: 2 × 1 dependent + 1 soft dependent + 5 security
    expect(graph.priority('C')).toBe(8)
    // D: 10 critical path
    expect(graph.priority('D')).toBe(10)
    expect(graph.priority('E')).toBe(0)
  })

  it('honours custom weights', () => {
    const { blocks, deps } = diamond()
    const graph = buildBlockGraph(blocks, deps, {
      priorityWeights: { criticalPathBonus: 0, dependentBonus: 1 },
    })
    expect(graph.priority('A')).toBe(2)
    expect(graph.priority('D')).toBe(0)
  })

  it('orders a layer by priority, breaking ties by id', () => {
    const graph = buildBlockGraph([block('z'), block('m', { priority: 5 }), block('a')], [])
    expect(graph.layers()).toEqual([['m', 'a', 'z']])
    expect(graph.priority('a')).toBe(0)
  })

  it('gives no critical-path bonus when no block gates another', () => {
    const graph = buildBlockGraph([block('b'), block('a')], [])

    expect(graph.criticalPath().path).toEqual(['a'])
    expect(graph.isOnCriticalPath('a')).toBe(false)
    expect(graph.priority('a')).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// Neighbourhood queries
// ---------------------------------------------------------------------------

describe('BlockGraph neighbourhood', () => {
  it('separates gating, soft and alternative relations', () => {
    const graph = buildBlockGraph(
      [block('A'), block('B'), block('C'), block('D')],
      [dep('B', 'A'), dep('C', 'A', 'provides_information'), dep('D', 'A', 'alternative')],
    )
    expect(graph.gatingDependentsOf('A')).toEqual(['B'])
    expect(graph.gatingPrerequisitesOf('B')).toEqual(['A'])
    expect(graph.softDependentsOf('A')).toEqual(['C'])
    expect(graph.alternativesOf('A')).toEqual(['D'])
    expect(graph.alternativesOf('D')).toEqual(['A'])
  })
})
