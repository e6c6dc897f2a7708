/**
 * BlockGraph: validated, immutable dependency graph over implementation
 * blocks, with derived ordering data.
 *
 * Only gating edges (`required_before`, `required_for_completion`) shape
 * layers and the critical path. `influences` and `provides_information`
 * edges add to the prerequisite's priority; `alternative` edges are kept for
 * lookup only.
 */

import { CycleDetectedError } from '../../core/errors.js'
import {
  isGatingKind,
  type BlockDependency,
  type BlockId,
  type DependencyKind,
  type ImplementationBlock,
} from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { detectGatingCycle, validateReferences } from './dependency-resolver.js'

const logger = createLogger('block-graph')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PriorityWeights {
  /** Added once when the block lies on the critical path */
  criticalPathBonus: number
  /** Per block gated on this one */
  dependentBonus: number
  /** Per block with an influences/provides_information edge to this one */
  softDependentBonus: number
  /** Multiplied by the block's risk factor */
  riskWeight: number
  /** Added once for security-critical blocks */
  securityBonus: number
}

export const DEFAULT_PRIORITY_WEIGHTS: PriorityWeights = {
  criticalPathBonus: 10,
  dependentBonus: 2,
  softDependentBonus: 1,
  riskWeight: 1,
  securityBonus: 5,
}

export interface CriticalPath {
  path: BlockId[]
  totalEffortMs: number
}

export interface BuildBlockGraphOptions {
  priorityWeights?: Partial<PriorityWeights>
}

export interface BlockGraph {
  /** Block ids in input order */
  ids(): BlockId[]
  get(id: BlockId): ImplementationBlock | undefined
  has(id: BlockId): boolean
  dependencies(): readonly BlockDependency[]
  /** Blocks `id` is gated on */
  gatingPrerequisitesOf(id: BlockId): BlockId[]
  /** Blocks gated on `id` */
  gatingDependentsOf(id: BlockId): BlockId[]
  /** Blocks with a soft (non-gating, non-alternative) edge to `id` */
  softDependentsOf(id: BlockId): BlockId[]
  /** Blocks linked to `id` by an alternative edge, in either direction */
  alternativesOf(id: BlockId): BlockId[]
  priority(id: BlockId): number
  isOnCriticalPath(id: BlockId): boolean
  criticalPath(): CriticalPath
  /** Kahn rounds; each layer ordered by priority descending, then id */
  layers(): BlockId[][]
  topologicalOrder(): BlockId[]
}

// ---------------------------------------------------------------------------
// Ordering helper
// ---------------------------------------------------------------------------

/** Sort comparator: higher priority first, ties by id */
export function compareByPriority(graph: BlockGraph): (a: BlockId, b: BlockId) => number {
  return (a, b) => {
    const diff = graph.priority(b) - graph.priority(a)
    if (diff !== 0) return diff
    return a < b ? -1 : a > b ? 1 : 0
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// ---------------------------------------------------------------------------
// BlockGraphImpl
// ---------------------------------------------------------------------------

class BlockGraphImpl implements BlockGraph {
  private readonly _blocks = new Map<BlockId, ImplementationBlock>()
  private readonly _dependencies: readonly BlockDependency[]
  private readonly _prerequisites = new Map<BlockId, BlockId[]>()
  private readonly _dependents = new Map<BlockId, BlockId[]>()
  private readonly _softDependents = new Map<BlockId, BlockId[]>()
  private readonly _alternatives = new Map<BlockId, BlockId[]>()
  private readonly _priorities = new Map<BlockId, number>()
  private readonly _criticalPath: CriticalPath
  private readonly _onCriticalPath: Set<BlockId>
  private readonly _layers: BlockId[][]

  constructor(
    blocks: readonly ImplementationBlock[],
    dependencies: readonly BlockDependency[],
    weights: PriorityWeights,
  ) {
    for (const block of blocks) {
      this._blocks.set(block.id, block)
      this._prerequisites.set(block.id, [])
      this._dependents.set(block.id, [])
      this._softDependents.set(block.id, [])
      this._alternatives.set(block.id, [])
    }
    this._dependencies = dependencies.map((d) => ({ ...d }))

    for (const dep of dependencies) {
      this._addEdge(dep.from, dep.to, dep.kind)
    }

    const rounds = this._kahnRounds()
    this._criticalPath = this._computeCriticalPath(rounds.flat())
    // Single-block paths carry no bonus
    this._onCriticalPath = new Set(this._criticalPath.path.length > 1 ? this._criticalPath.path : [])

    for (const block of blocks) {
      const gating = this._dependents.get(block.id)?.length ?? 0
      const soft = this._softDependents.get(block.id)?.length ?? 0
      this._priorities.set(
        block.id,
        block.priority +
          (this._onCriticalPath.has(block.id) ? weights.criticalPathBonus : 0) +
          weights.dependentBonus * gating +
          weights.softDependentBonus * soft +
          weights.riskWeight * block.riskFactor +
          (block.securityCritical ? weights.securityBonus : 0),
      )
    }

    const byPriority = compareByPriority(this)
    this._layers = rounds.map((layer) => [...layer].sort(byPriority))
  }

  ids(): BlockId[] {
    return [...this._blocks.keys()]
  }

  get(id: BlockId): ImplementationBlock | undefined {
    return this._blocks.get(id)
  }

  has(id: BlockId): boolean {
    return this._blocks.has(id)
  }

  dependencies(): readonly BlockDependency[] {
    return this._dependencies
  }

  gatingPrerequisitesOf(id: BlockId): BlockId[] {
    return [...(this._prerequisites.get(id) ?? [])]
  }

  gatingDependentsOf(id: BlockId): BlockId[] {
    return [...(this._dependents.get(id) ?? [])]
  }

  softDependentsOf(id: BlockId): BlockId[] {
    return [...(this._softDependents.get(id) ?? [])]
  }

  alternativesOf(id: BlockId): BlockId[] {
    return [...(this._alternatives.get(id) ?? [])]
  }

  priority(id: BlockId): number {
    return this._priorities.get(id) ?? 0
  }

  isOnCriticalPath(id: BlockId): boolean {
    return this._onCriticalPath.has(id)
  }

  criticalPath(): CriticalPath {
    return { path: [...this._criticalPath.path], totalEffortMs: this._criticalPath.totalEffortMs }
  }

  layers(): BlockId[][] {
    return this._layers.map((layer) => [...layer])
  }

  topologicalOrder(): BlockId[] {
    return this._layers.flat()
  }

  // -------------------------------------------------------------------------
  // Construction helpers
  // -------------------------------------------------------------------------

  private _addEdge(from: BlockId, to: BlockId, kind: DependencyKind): void {
    if (kind === 'alternative') {
      pushUnique(this._alternatives, from, to)
      pushUnique(this._alternatives, to, from)
    } else if (isGatingKind(kind)) {
      pushUnique(this._prerequisites, from, to)
      pushUnique(this._dependents, to, from)
    } else {
      pushUnique(this._softDependents, to, from)
    }
  }

  /** Each round holds the blocks whose gating prerequisites all sit in earlier rounds */
  private _kahnRounds(): BlockId[][] {
    const remaining = new Map<BlockId, number>()
    for (const [id, prereqs] of this._prerequisites) remaining.set(id, prereqs.length)

    const rounds: BlockId[][] = []
    let current = [...remaining].filter(([, n]) => n === 0).map(([id]) => id)
    while (current.length > 0) {
      rounds.push(current)
      const next: BlockId[] = []
      for (const id of current) {
        for (const dependent of this._dependents.get(id) ?? []) {
          const left = (remaining.get(dependent) ?? 0) - 1
          remaining.set(dependent, left)
          if (left === 0) next.push(dependent)
        }
      }
      current = next
    }
    return rounds
  }

  /**
   * Longest effort-weighted chain. A block's distance is its own effort plus
   * the largest distance among its gating prerequisites.
   */
  private _computeCriticalPath(order: BlockId[]): CriticalPath {
    const distance = new Map<BlockId, number>()
    const predecessor = new Map<BlockId, BlockId>()
    let end: BlockId | null = null

    for (const id of order) {
      let best = 0
      let bestPrereq: BlockId | null = null
      const prereqs = [...(this._prerequisites.get(id) ?? [])].sort(compareIds)
      for (const prereq of prereqs) {
        const d = distance.get(prereq) ?? 0
        if (bestPrereq === null || d > best) {
          best = d
          bestPrereq = prereq
        }
      }
      distance.set(id, best + (this._blocks.get(id)?.estimatedEffortMs ?? 0))
      if (bestPrereq !== null) predecessor.set(id, bestPrereq)

      const total = distance.get(id) ?? 0
      if (end === null || total > (distance.get(end) ?? 0) || (total === (distance.get(end) ?? 0) && id < end)) {
        end = id
      }
    }

    if (end === null) return { path: [], totalEffortMs: 0 }
    const path: BlockId[] = []
    for (let cursor: BlockId | undefined = end; cursor !== undefined; cursor = predecessor.get(cursor)) {
      path.unshift(cursor)
    }
    return { path, totalEffortMs: distance.get(end) ?? 0 }
  }
}

function pushUnique(map: Map<BlockId, BlockId[]>, key: BlockId, value: BlockId): void {
  const list = map.get(key)
  if (list !== undefined && !list.includes(value)) list.push(value)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Validate blocks and dependencies and build the graph.
 *
 * @throws {DuplicateBlockError} on repeated block ids
 * @throws {MissingDependencyError} when an edge names an unknown block
 * @throws {CycleDetectedError} when gating edges form a cycle
 */
export function buildBlockGraph(
  blocks: readonly ImplementationBlock[],
  dependencies: readonly BlockDependency[],
  options: BuildBlockGraphOptions = {},
): BlockGraph {
  validateReferences(blocks, dependencies)

  const cycle = detectGatingCycle(blocks, dependencies)
  if (cycle !== null) {
    logger.warn({ cycle }, 'Gating dependency cycle detected')
    throw new CycleDetectedError(cycle)
  }

  const graph = new BlockGraphImpl(blocks, dependencies, { ...DEFAULT_PRIORITY_WEIGHTS, ...options.priorityWeights })
  logger.debug(
    { blocks: blocks.length, dependencies: dependencies.length, layers: graph.layers().length },
    'Block graph built',
  )
  return graph
}
