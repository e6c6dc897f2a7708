/**
 * Block lifecycle state machine.
 *
 *   not_started → ready → in_progress → completed | completed_with_issues | failed
 *   failed → in_progress (retry) | deferred
 *   not_started | ready → blocked → ready | deferred
 *
 * completed, completed_with_issues and deferred are terminal for the pass.
 */

import type { BlockStatus } from '../../core/types.js'

export const VALID_BLOCK_TRANSITIONS: Record<BlockStatus, readonly BlockStatus[]> = {
  not_started: ['ready', 'blocked', 'deferred'],
  blocked: ['ready', 'deferred'],
  ready: ['in_progress', 'blocked', 'deferred'],
  in_progress: ['completed', 'completed_with_issues', 'failed'],
  failed: ['in_progress', 'deferred'],
  completed: [],
  completed_with_issues: [],
  deferred: [],
}

export function canTransition(from: BlockStatus, to: BlockStatus): boolean {
  return VALID_BLOCK_TRANSITIONS[from].includes(to)
}

/** Mutable per-run record of one block's state */
export interface BlockState {
  status: BlockStatus
  /** Why the block is in its current status */
  reason: string
  attempts: number
}

/**
 * Move `state` to `to`. Throws if the transition is not allowed.
 * @returns the previous status
 */
export function transitionBlock(blockId: string, state: BlockState, to: BlockStatus, reason: string): BlockStatus {
  const from = state.status
  if (!canTransition(from, to)) {
    throw new Error(
      `Invalid block transition for "${blockId}": ${from} → ${to}. ` +
        `Allowed from ${from}: [${VALID_BLOCK_TRANSITIONS[from].join(', ')}]`,
    )
  }
  state.status = to
  state.reason = reason
  if (to === 'in_progress') state.attempts++
  return from
}
