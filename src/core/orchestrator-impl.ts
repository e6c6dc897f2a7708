/**
 * OrchestratorImpl: concrete implementation of the Orchestrator interface.
 *
 * The createOrchestrator() factory:
 *  1. Creates the TypedEventBus
 *  2. Creates the database service and registers it in the ServiceRegistry
 *  3. Builds the resource monitor and recovery manager from the config
 *  4. Initializes all services (opens and migrates the database)
 *  5. Sets up SIGTERM/SIGINT graceful shutdown handlers
 *  6. Emits orchestrator:ready
 *
 * Schedulers and branch coordinators are created per call.
 */

import { resolve } from 'node:path'
import { createLogger, setLogLevel } from '../utils/logger.js'
import { generateId } from '../utils/helpers.js'
import { createEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import { CheckpointNotFoundError } from './errors.js'
import type { TypedEventBus } from './event-bus.js'
import type { CheckpointId } from './types.js'
import type {
  ExploreOptions,
  Orchestrator,
  OrchestratorConfig,
  RunPlanOptions,
} from './orchestrator.js'
import { createDatabaseService, type DatabaseService } from '../persistence/database.js'
import { getCheckpoint, listCheckpoints } from '../persistence/queries/checkpoints.js'
import type { BlocksmithConfig } from '../modules/config/config-schema.js'
import {
  toBranchWeights,
  toChunkerOptions,
  toMergeMode,
  toPriorityWeights,
  toRecoveryPolicies,
  toResourceMonitorOptions,
  toSchedulerOptions,
} from '../modules/config/config-mapping.js'
import { buildBlockGraph } from '../modules/block-graph/block-graph.js'
import type { BlockPlan } from '../modules/block-graph/block-parser.js'
import { createBranchCoordinator } from '../modules/branch-coordinator/branch-coordinator.js'
import type { BranchApproach, ExplorationResult } from '../modules/branch-coordinator/types.js'
import { AdaptiveChunker } from '../modules/chunker/adaptive-chunker.js'
import {
  createCheckpointStore,
  toCheckpointMetadata,
  type CheckpointMetadata,
  type CheckpointStore,
  type LoadedCheckpoint,
} from '../modules/checkpoint/checkpoint-store.js'
import { createRecoveryManager, type RecoveryManager } from '../modules/recovery/recovery-manager.js'
import { createResourceMonitor } from '../modules/resource-monitor/resource-monitor-impl.js'
import { NodeResourceSampler } from '../modules/resource-monitor/node-sampler.js'
import type { ResourceMonitor } from '../modules/resource-monitor/resource-monitor.js'
import { createScheduler, type Scheduler } from '../modules/scheduler/scheduler-impl.js'
import { SchedulerSnapshotSchema, type SchedulerSnapshot } from '../modules/scheduler/snapshot.js'
import type { RunReport } from '../modules/scheduler/types.js'

const logger = createLogger('orchestrator')

/** Resolve where the checkpoint database lives */
export function resolveDatabasePath(config: BlocksmithConfig, projectRoot: string): string {
  return resolve(projectRoot, config.global.data_dir, config.checkpoints.database_file)
}

// ---------------------------------------------------------------------------
// OrchestratorImpl
// ---------------------------------------------------------------------------

/** Internal symbol used to expose lifecycle hooks to the factory only */
const INTERNAL = Symbol('OrchestratorImpl.internal')

type OrchestratorServices = { database: DatabaseService }

interface OrchestratorParts {
  eventBus: TypedEventBus
  registry: ServiceRegistry<OrchestratorServices>
  database: DatabaseService
  monitor: ResourceMonitor
  recovery: RecoveryManager
}

class OrchestratorImpl implements Orchestrator {
  readonly eventBus: TypedEventBus
  readonly monitor: ResourceMonitor
  private readonly _settings: OrchestratorConfig
  private readonly _registry: ServiceRegistry<OrchestratorServices>
  private readonly _database: DatabaseService
  private readonly _recovery: RecoveryManager
  private _ready = false
  private _shutdown = false
  private _sigtermHandler: (() => void) | null = null
  private _sigintHandler: (() => void) | null = null

  constructor(settings: OrchestratorConfig, parts: OrchestratorParts) {
    this._settings = settings
    this.eventBus = parts.eventBus
    this.monitor = parts.monitor
    this._registry = parts.registry
    this._database = parts.database
    this._recovery = parts.recovery
  }

  get isReady(): boolean {
    return this._ready && !this._shutdown
  }

  async runPlan(plan: BlockPlan, options: RunPlanOptions = {}): Promise<RunReport> {
    const scheduler = this._schedulerFor(plan, options.runId ?? `plan:${plan.name}`)
    return scheduler.run()
  }

  async resumePlan(plan: BlockPlan, checkpointId: CheckpointId, options: RunPlanOptions = {}): Promise<RunReport> {
    this._assertOpen()
    const row = getCheckpoint(this._database.db, checkpointId)
    if (row === undefined) throw new CheckpointNotFoundError(checkpointId)

    const scheduler = this._schedulerFor(plan, options.runId ?? row.lineage)
    await scheduler.restore(checkpointId)
    logger.info({ runId: scheduler.runId, checkpointId }, 'Resuming run from checkpoint')
    return scheduler.run()
  }

  async explore(approaches: readonly BranchApproach[], options: ExploreOptions = {}): Promise<ExplorationResult> {
    this._assertOpen()
    const { config } = this._settings
    const coordinator = createBranchCoordinator({
      generator: this._settings.generator,
      validator: this._settings.validator,
      recovery: this._recovery,
      monitor: this.monitor,
      eventBus: this.eventBus,
      checkpointStoreFor: (lineage) => this._storeFor(lineage),
      weights: toBranchWeights(config),
      maxParallelPaths: config.branches.max_parallel_paths,
      schedulerOptions: toSchedulerOptions(config),
      graphOptions: { priorityWeights: toPriorityWeights(config) },
      baseline: options.baseline,
      explorationId: options.explorationId ?? generateId('explore'),
    })
    return coordinator.explore(approaches, {
      mode: options.mode ?? toMergeMode(config),
      resolver: options.resolver,
    })
  }

  createChunker(): AdaptiveChunker {
    return new AdaptiveChunker(this.monitor, toChunkerOptions(this._settings.config))
  }

  listCheckpoints(lineage?: string): CheckpointMetadata[] {
    this._assertOpen()
    return listCheckpoints(this._database.db, lineage).map(toCheckpointMetadata)
  }

  loadCheckpoint(id: CheckpointId): LoadedCheckpoint<SchedulerSnapshot> {
    this._assertOpen()
    const row = getCheckpoint(this._database.db, id)
    if (row === undefined) throw new CheckpointNotFoundError(id)
    return this._storeFor(row.lineage).load(id)
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true

    logger.info('Orchestrator shutdown initiated')
    this.eventBus.emit('orchestrator:shutdown', { reason: 'shutdown() called' })
    this._removeShutdownHandlers()

    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during orchestrator shutdown')
    }

    logger.info('Orchestrator shutdown complete')
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private _schedulerFor(plan: BlockPlan, runId: string): Scheduler {
    this._assertOpen()
    const { config } = this._settings
    const graph = buildBlockGraph(plan.blocks, plan.dependencies, {
      priorityWeights: toPriorityWeights(config),
    })
    return createScheduler({
      graph,
      generator: this._settings.generator,
      validator: this._settings.validator,
      recovery: this._recovery,
      checkpoints: this._storeFor(runId),
      monitor: this.monitor,
      eventBus: this.eventBus,
      options: toSchedulerOptions(config),
      runId,
    })
  }

  private _storeFor(lineage: string): CheckpointStore<SchedulerSnapshot> {
    return createCheckpointStore(this._database.db, {
      lineage,
      maxCheckpoints: this._settings.config.checkpoints.max_checkpoints,
      schema: SchedulerSnapshotSchema,
      eventBus: this.eventBus,
    })
  }

  private _assertOpen(): void {
    if (this._shutdown) {
      throw new Error('Orchestrator has been shut down')
    }
  }

  private _registerShutdownHandlers(): void {
    if (this._sigtermHandler !== null) return

    const makeHandler = (signal: string) => () => {
      logger.info({ signal }, 'Received signal, initiating graceful shutdown')
      this.shutdown()
        .then(() => {
          process.exit(0)
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during signal-triggered shutdown')
          process.exit(1)
        })
    }

    this._sigtermHandler = makeHandler('SIGTERM')
    this._sigintHandler = makeHandler('SIGINT')

    process.once('SIGTERM', this._sigtermHandler)
    process.once('SIGINT', this._sigintHandler)
  }

  private _removeShutdownHandlers(): void {
    if (this._sigtermHandler !== null) {
      process.removeListener('SIGTERM', this._sigtermHandler)
      this._sigtermHandler = null
    }
    if (this._sigintHandler !== null) {
      process.removeListener('SIGINT', this._sigintHandler)
      this._sigintHandler = null
    }
  }

  /**
   * Internal accessor used exclusively by the createOrchestrator factory.
   * @internal
   */
  [INTERNAL](): {
    markReady: () => void
    registerShutdownHandlers: () => void
  } {
    return {
      markReady: () => {
        this._ready = true
      },
      registerShutdownHandlers: () => this._registerShutdownHandlers(),
    }
  }
}

// ---------------------------------------------------------------------------
// createOrchestrator factory
// ---------------------------------------------------------------------------

/**
 * Initialize the orchestrator from a merged configuration.
 *
 * @throws {PersistenceIOError} if the checkpoint database cannot be opened
 */
export async function createOrchestrator(settings: OrchestratorConfig): Promise<Orchestrator> {
  const { config } = settings
  if (process.env.LOG_LEVEL === undefined) {
    setLogLevel(config.global.log_level)
  }

  const databasePath = settings.databasePath ?? resolveDatabasePath(config, settings.projectRoot)
  logger.info({ databasePath }, 'Initializing orchestrator')

  const eventBus = createEventBus()
  const database = createDatabaseService(databasePath)

  const monitor = createResourceMonitor(
    {
      ...toResourceMonitorOptions(config),
      sampler: settings.sampler ?? new NodeResourceSampler(settings.projectRoot),
    },
    eventBus,
  )
  const recovery = createRecoveryManager({
    policies: toRecoveryPolicies(config),
    eventBus,
    sleep: settings.sleep,
  })

  const registry = new ServiceRegistry<OrchestratorServices>()
  registry.register('database', database)

  const orchestrator = new OrchestratorImpl(settings, { eventBus, registry, database, monitor, recovery })
  const internal = orchestrator[INTERNAL]()

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed, cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  if (settings.handleSignals ?? true) {
    internal.registerShutdownHandlers()
  }

  internal.markReady()
  eventBus.emit('orchestrator:ready', {})

  logger.info({ databasePath }, 'Orchestrator ready')
  return orchestrator
}
