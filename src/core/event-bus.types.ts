/**
 * OrchestratorEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "block:completed", "checkpoint:created")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { BlockId, BlockStatus, BranchId, CheckpointId } from './types.js'
import type { ErrorKind } from './errors.js'

// ---------------------------------------------------------------------------
// Shared payload subtypes
// ---------------------------------------------------------------------------

/** Error payload for a failed block or operation */
export interface EventError {
  message: string
  kind: ErrorKind
}

/** Per-resource level reported by the resource monitor */
export type ResourceLevel = 'normal' | 'warning' | 'exceeded'

// ---------------------------------------------------------------------------
// OrchestratorEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the orchestrator event bus.
 * Use `keyof OrchestratorEvents` to constrain event keys.
 */
export interface OrchestratorEvents {
  // -------------------------------------------------------------------------
  // Orchestrator lifecycle
  // -------------------------------------------------------------------------

  /** All services initialized */
  'orchestrator:ready': Record<string, never>

  /** Shutdown started */
  'orchestrator:shutdown': { reason: string }

  // -------------------------------------------------------------------------
  // Run lifecycle
  // -------------------------------------------------------------------------

  /** Scheduler began a pass over the graph */
  'run:started': { runId: string; blockCount: number; layerCount: number }

  /** Scheduler pass finished; every block is terminal */
  'run:complete': { runId: string; completed: number; failed: number; deferred: number }

  /** No new layers will be submitted until resumed */
  'run:paused': { runId: string }

  /** Layer submission resumed */
  'run:resumed': { runId: string }

  /** A topological layer was submitted to the worker pool */
  'layer:started': { runId: string; index: number; blockIds: BlockId[] }

  /** Every block of the layer reached a terminal state */
  'layer:completed': { runId: string; index: number }

  // -------------------------------------------------------------------------
  // Block lifecycle
  // -------------------------------------------------------------------------

  /** Any block state transition */
  'block:status': { blockId: BlockId; from: BlockStatus; to: BlockStatus; reason?: string }

  /** Block is about to be retried by the recovery manager */
  'block:retrying': { blockId: BlockId; attempt: number; maxRetries: number; delayMs: number }

  /** Block reached a terminal state */
  'block:finished': { blockId: BlockId; status: BlockStatus; reason: string }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  'checkpoint:created': { lineage: string; checkpointId: CheckpointId; reason: string }

  'checkpoint:evicted': { lineage: string; checkpointIds: CheckpointId[] }

  /** Checkpoint creation failed after recovery; execution continues without it */
  'checkpoint:skipped': { lineage: string; reason: string; error: EventError }

  'checkpoint:restored': { lineage: string; checkpointId: CheckpointId }

  // -------------------------------------------------------------------------
  // Resources
  // -------------------------------------------------------------------------

  'resource:warning': { resource: 'memory' | 'cpu' | 'disk'; percentage: number }

  'resource:exceeded': { resource: 'memory' | 'cpu' | 'disk'; percentage: number }

  // -------------------------------------------------------------------------
  // Recovery
  // -------------------------------------------------------------------------

  'recovery:retry': { operation: string; retry: number; delayMs: number; error: EventError }

  'recovery:fallback': { operation: string; action: string; error: EventError }

  // -------------------------------------------------------------------------
  // Branches
  // -------------------------------------------------------------------------

  'branch:status': { branchId: BranchId; status: string }

  'branch:merged': { mode: 'single' | 'selective'; branchIds: BranchId[]; conflicts: number }
}
