/**
 * Dependency resolver for block graphs.
 *
 * Provides:
 *  - Reference validation (unique block ids, resolvable dependency targets)
 *  - Cycle detection over the gating-edge subgraph using three-colour DFS
 */

import { DuplicateBlockError, MissingDependencyError } from '../../core/errors.js'
import { isGatingKind, type BlockDependency, type BlockId, type ImplementationBlock } from '../../core/types.js'

// ---------------------------------------------------------------------------
// validateReferences
// ---------------------------------------------------------------------------

/**
 * @throws {DuplicateBlockError} when two blocks share an id
 * @throws {MissingDependencyError} for the first edge naming an unknown block
 */
export function validateReferences(
  blocks: readonly ImplementationBlock[],
  dependencies: readonly BlockDependency[],
): void {
  const ids = new Set<BlockId>()
  for (const block of blocks) {
    if (ids.has(block.id)) throw new DuplicateBlockError(block.id)
    ids.add(block.id)
  }
  for (const dep of dependencies) {
    if (!ids.has(dep.from)) throw new MissingDependencyError(dep.from, dep)
    if (!ids.has(dep.to)) throw new MissingDependencyError(dep.to, dep)
  }
}

// ---------------------------------------------------------------------------
// detectGatingCycle
// ---------------------------------------------------------------------------

type Colour = 'white' | 'grey' | 'black'

/**
 * Find a cycle among gating edges.
 *
 * @returns the cycle as block ids in dependency direction, starting and
 *          ending with the same id (e.g. ['A', 'B', 'A'] when A depends on B
 *          and B on A), or null when the gating subgraph is acyclic
 */
export function detectGatingCycle(
  blocks: readonly ImplementationBlock[],
  dependencies: readonly BlockDependency[],
): BlockId[] | null {
  const prerequisites = new Map<BlockId, BlockId[]>()
  for (const block of blocks) prerequisites.set(block.id, [])
  for (const dep of dependencies) {
    if (isGatingKind(dep.kind)) prerequisites.get(dep.from)?.push(dep.to)
  }

  const colour = new Map<BlockId, Colour>()
  const stack: BlockId[] = []

  function visit(id: BlockId): BlockId[] | null {
    colour.set(id, 'grey')
    stack.push(id)

    for (const next of prerequisites.get(id) ?? []) {
      const c = colour.get(next) ?? 'white'
      if (c === 'grey') {
        return [...stack.slice(stack.indexOf(next)), next]
      }
      if (c === 'white') {
        const cycle = visit(next)
        if (cycle !== null) return cycle
      }
    }

    stack.pop()
    colour.set(id, 'black')
    return null
  }

  for (const block of blocks) {
    if ((colour.get(block.id) ?? 'white') === 'white') {
      const cycle = visit(block.id)
      if (cycle !== null) return cycle
    }
  }
  return null
}
