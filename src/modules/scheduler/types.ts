/**
 * Scheduler types: collaborator boundaries, options, worker messages and the
 * run report.
 */

import type { ErrorKind } from '../../core/errors.js'
import type { Artifact, BlockId, BlockStatus, CheckpointId, ExecutionStep, ImplementationBlock } from '../../core/types.js'
import type { RetryInfo } from '../recovery/types.js'

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export type GenerationMode = 'full' | 'simplified'

export interface GenerationRequest {
  block: ImplementationBlock
  step: ExecutionStep
  mode: GenerationMode
  /** Aborted on timeout or cooperative cancellation */
  signal: AbortSignal
}

/** Produces the content of one execution step */
export interface GenerationCollaborator {
  generate(request: GenerationRequest): Promise<Artifact>
}

export interface ValidationResult {
  passed: boolean
  /** Non-fatal findings; a passed result with issues completes with issues */
  issues: string[]
  metrics: Record<string, number>
}

/** Decides whether a block's artifacts meet its validation criteria */
export interface ValidationCollaborator {
  validate(block: ImplementationBlock, artifacts: readonly Artifact[]): Promise<ValidationResult>
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SchedulerOptions {
  /** Worker pool size */
  maxParallel: number
  /** Attempt timeout = estimatedEffortMs × timeoutMultiplier */
  timeoutMultiplier: number
  /** Optional floor under the attempt timeout (default: 0, no floor) */
  minTimeoutMs: number
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  maxParallel: 4,
  timeoutMultiplier: 3,
  minTimeoutMs: 0,
}

// ---------------------------------------------------------------------------
// Worker → scheduler messages
// ---------------------------------------------------------------------------

/** Terminal outcome a worker reports for one block */
export type FinishedStatus = 'completed' | 'completed_with_issues' | 'failed' | 'deferred'

export type BlockMessage =
  | { type: 'started'; blockId: BlockId }
  | { type: 'retrying'; blockId: BlockId; info: RetryInfo }
  | { type: 'reverted'; blockId: BlockId; checkpointId: CheckpointId }
  | {
      type: 'finished'
      blockId: BlockId
      status: FinishedStatus
      reason: string
      artifacts: Artifact[]
      validation: ValidationResult | null
      errorKind: ErrorKind | null
      durationMs: number
    }

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface BlockReport {
  blockId: BlockId
  status: BlockStatus
  reason: string
  attempts: number
  durationMs: number
  estimatedEffortMs: number
  artifacts: Artifact[]
  validation: ValidationResult | null
  errorKind: ErrorKind | null
}

export interface RunReport {
  runId: string
  /** One entry per block, in topological order */
  blocks: BlockReport[]
  /** Blocks in the order they started */
  executionOrder: BlockId[]
  artifacts: Artifact[]
  checkpointWarnings: string[]
  durationMs: number
  counts: Record<FinishedStatus, number>
}
