/**
 * Orchestrator interface: the public entry point that wires the monitor,
 * checkpoint store, recovery manager, scheduler and branch coordinator from
 * one configuration document.
 *
 * Create an instance via `createOrchestrator()` from orchestrator-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { CheckpointId } from './types.js'
import type { BlocksmithConfig } from '../modules/config/config-schema.js'
import type { BlockPlan } from '../modules/block-graph/block-parser.js'
import type { BranchApproach, ConflictResolver, ExplorationResult, MergeMode } from '../modules/branch-coordinator/types.js'
import type { AdaptiveChunker } from '../modules/chunker/adaptive-chunker.js'
import type { CheckpointMetadata, LoadedCheckpoint } from '../modules/checkpoint/checkpoint-store.js'
import type { ResourceMonitor, ResourceSampler } from '../modules/resource-monitor/resource-monitor.js'
import type { SchedulerSnapshot } from '../modules/scheduler/snapshot.js'
import type { GenerationCollaborator, RunReport, ValidationCollaborator } from '../modules/scheduler/types.js'

// ---------------------------------------------------------------------------
// OrchestratorConfig
// ---------------------------------------------------------------------------

export interface OrchestratorConfig {
  /** Fully merged configuration, usually from ConfigSystem.getConfig() */
  config: BlocksmithConfig

  /** Directory that `global.data_dir` is resolved against */
  projectRoot: string

  /** Produces step artifacts; supplied by the caller */
  generator: GenerationCollaborator

  /** Judges a block's artifacts; supplied by the caller */
  validator: ValidationCollaborator

  /**
   * Overrides the database location derived from the config.
   * Pass ':memory:' for a throwaway store.
   */
  databasePath?: string

  /** Resource reading source (default: the Node process) */
  sampler?: ResourceSampler

  /** Backoff sleep, injectable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>

  /**
   * Register SIGTERM/SIGINT handlers that shut the orchestrator down.
   * @default true
   */
  handleSignals?: boolean
}

export interface RunPlanOptions {
  /** Checkpoint lineage and run id (default: `plan:<plan name>`) */
  runId?: string
}

export interface ExploreOptions {
  mode?: MergeMode
  resolver?: ConflictResolver
  /** Files as they were before any branch ran */
  baseline?: Readonly<Record<string, string>>
  /** Prefix of the branch lineages (default: a fresh `explore-<uuid>`) */
  explorationId?: string
}

// ---------------------------------------------------------------------------
// Orchestrator interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *  1. Create via `createOrchestrator(config)`; the database opens and migrates
 *  2. `orchestrator:ready` is emitted once initialization completes
 *  3. Run plans or explore branches
 *  4. Call `shutdown()` (or send SIGTERM/SIGINT) to close the database
 */
export interface Orchestrator {
  readonly eventBus: TypedEventBus

  readonly isReady: boolean

  readonly monitor: ResourceMonitor

  /** Schedule every block of the plan, checkpointing into the run's lineage */
  runPlan(plan: BlockPlan, options?: RunPlanOptions): Promise<RunReport>

  /**
   * Restore a run from a checkpoint of its lineage and schedule whatever
   * had not completed.
   * @throws {CheckpointNotFoundError} when the id is unknown
   */
  resumePlan(plan: BlockPlan, checkpointId: CheckpointId, options?: RunPlanOptions): Promise<RunReport>

  /** Implement each approach as an isolated branch, evaluate, and merge */
  explore(approaches: readonly BranchApproach[], options?: ExploreOptions): Promise<ExplorationResult>

  /** New chunker sized from the configured bounds and this orchestrator's monitor */
  createChunker(): AdaptiveChunker

  /** Checkpoint metadata of one lineage, or of all lineages */
  listCheckpoints(lineage?: string): CheckpointMetadata[]

  /**
   * @throws {CheckpointNotFoundError} when the id is unknown
   */
  loadCheckpoint(id: CheckpointId): LoadedCheckpoint<SchedulerSnapshot>

  /**
   * Close the database. Safe to call multiple times: subsequent calls are no-ops.
   */
  shutdown(): Promise<void>
}
