/**
 * Scheduler: runs a BlockGraph layer by layer through a bounded worker pool.
 *
 * Scheduling state (block states, execution order, artifacts) is owned by the
 * scheduler and changed only while holding its mutex. Workers report through
 * a message channel; the scheduler drains it, applies each message, and
 * acknowledges the ones a worker waits on. A worker's `started` message is
 * acknowledged only after the `before_block` checkpoint is written.
 *
 * Checkpoints: `before_block:<id>`, `after_block:<id>`, `layer_complete:<n>`
 * and `run_complete`. A checkpoint that cannot be written after recovery is
 * logged and reported; it never stops the run.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  isSuccessfulStatus,
  type Artifact,
  type BlockId,
  type BlockStatus,
  type CheckpointId,
  type ImplementationBlock,
} from '../../core/types.js'
import { toOrchestrationError, type ErrorKind } from '../../core/errors.js'
import type { BlockGraph } from '../block-graph/block-graph.js'
import { transitionBlock, type BlockState } from '../block-graph/block-state.js'
import type { CheckpointStore, LoadedCheckpoint } from '../checkpoint/checkpoint-store.js'
import type { RecoveryManager } from '../recovery/recovery-manager.js'
import type { ResourceMonitor } from '../resource-monitor/resource-monitor.js'
import { runWithConcurrency } from '../worker-pool/promise-pool.js'
import { PauseGate } from '../worker-pool/pause-gate.js'
import { MessageChannel } from '../../utils/channel.js'
import { Mutex } from '../../utils/mutex.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { runBlock, type BlockRunContext, type BlockRunnerDeps } from './block-runner.js'
import type { SchedulerSnapshot } from './snapshot.js'
import {
  DEFAULT_SCHEDULER_OPTIONS,
  type BlockMessage,
  type BlockReport,
  type FinishedStatus,
  type GenerationCollaborator,
  type RunReport,
  type SchedulerOptions,
  type ValidationCollaborator,
  type ValidationResult,
} from './types.js'

const logger = createLogger('scheduler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchedulerDeps {
  graph: BlockGraph
  generator: GenerationCollaborator
  validator: ValidationCollaborator
  recovery: RecoveryManager
  /** null disables checkpointing */
  checkpoints: CheckpointStore<SchedulerSnapshot> | null
  monitor: ResourceMonitor | null
  eventBus?: TypedEventBus | null
  options?: Partial<SchedulerOptions>
  clock?: () => number
  runId?: string
}

export interface Scheduler {
  readonly runId: string
  /**
   * Run one pass over the graph. Blocks that already completed (for example
   * after restore()) are kept; every other block is scheduled afresh.
   * @throws {Error} if a pass is already running
   */
  run(): Promise<RunReport>
  /** Hold back new layers until resume(); running blocks continue */
  pause(): void
  resume(): void
  isPaused(): boolean
  /**
   * Replace scheduler state with a checkpoint's. Successful blocks keep their
   * status and artifacts; all others return to not_started.
   * @throws {CheckpointNotFoundError | SerializationError} when the checkpoint cannot be loaded
   */
  restore(checkpointId: CheckpointId): Promise<void>
  getBlockState(id: BlockId): Readonly<BlockState> | undefined
  report(): RunReport
}

interface BlockRecord extends BlockState {
  durationMs: number
  artifacts: Artifact[]
  validation: ValidationResult | null
  errorKind: ErrorKind | null
}

interface Envelope {
  message: BlockMessage
  ack: (() => void) | null
}

/** Owned by a worker of the running layer */
function isLive(status: BlockStatus): boolean {
  return status === 'ready' || status === 'in_progress'
}

function freshRecord(attempts = 0): BlockRecord {
  return {
    status: 'not_started',
    reason: '',
    attempts,
    durationMs: 0,
    artifacts: [],
    validation: null,
    errorKind: null,
  }
}

// ---------------------------------------------------------------------------
// SchedulerImpl
// ---------------------------------------------------------------------------

class SchedulerImpl implements Scheduler {
  readonly runId: string

  private readonly _graph: BlockGraph
  private readonly _store: CheckpointStore<SchedulerSnapshot> | null
  private readonly _recovery: RecoveryManager
  private readonly _eventBus: TypedEventBus | null
  private readonly _options: SchedulerOptions
  private readonly _clock: () => number
  private readonly _runnerDeps: BlockRunnerDeps

  private readonly _mutex = new Mutex()
  private readonly _gate = new PauseGate()
  private readonly _states = new Map<BlockId, BlockRecord>()
  private _executionOrder: BlockId[] = []
  private _checkpointWarnings: string[] = []
  private _durationMs = 0
  private _running = false

  constructor(deps: SchedulerDeps) {
    this.runId = deps.runId ?? generateId('run')
    this._graph = deps.graph
    this._store = deps.checkpoints
    this._recovery = deps.recovery
    this._eventBus = deps.eventBus ?? null
    this._options = { ...DEFAULT_SCHEDULER_OPTIONS, ...deps.options }
    this._clock = deps.clock ?? Date.now
    this._runnerDeps = {
      graph: deps.graph,
      generator: deps.generator,
      validator: deps.validator,
      recovery: deps.recovery,
      monitor: deps.monitor,
      checkpoints: deps.checkpoints,
      options: this._options,
      clock: this._clock,
    }
    for (const id of deps.graph.ids()) this._states.set(id, freshRecord())
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  async run(): Promise<RunReport> {
    if (this._running) throw new Error(`Scheduler ${this.runId} is already running`)
    this._running = true
    const startedAt = this._clock()
    this._checkpointWarnings = []

    try {
      this._beginPass()
      const layers = this._graph.layers()
      logger.info({ runId: this.runId, blocks: this._states.size, layers: layers.length }, 'Run started')
      this._eventBus?.emit('run:started', {
        runId: this.runId,
        blockCount: this._states.size,
        layerCount: layers.length,
      })

      for (const [index, layer] of layers.entries()) {
        await this._gate.wait()
        await this._runLayer(index, layer)
      }
      await this._checkpoint('run_complete')
    } finally {
      this._running = false
      this._durationMs = this._clock() - startedAt
    }

    const report = this.report()
    logger.info({ runId: this.runId, counts: report.counts, durationMs: report.durationMs }, 'Run complete')
    this._eventBus?.emit('run:complete', {
      runId: this.runId,
      completed: report.counts.completed + report.counts.completed_with_issues,
      failed: report.counts.failed,
      deferred: report.counts.deferred,
    })
    return report
  }

  pause(): void {
    if (this._gate.isClosed) return
    this._gate.close()
    logger.info({ runId: this.runId }, 'Run paused')
    this._eventBus?.emit('run:paused', { runId: this.runId })
  }

  resume(): void {
    if (!this._gate.isClosed) return
    this._gate.open()
    logger.info({ runId: this.runId }, 'Run resumed')
    this._eventBus?.emit('run:resumed', { runId: this.runId })
  }

  isPaused(): boolean {
    return this._gate.isClosed
  }

  async restore(checkpointId: CheckpointId): Promise<void> {
    if (this._running) throw new Error(`Cannot restore while scheduler ${this.runId} is running`)
    const store = this._store
    if (store === null) throw new Error('Checkpointing is disabled for this scheduler')

    await this._mutex.runExclusive(() => {
      const loaded = store.load(checkpointId)
      const { blocks, executionOrder } = loaded.state

      for (const id of Object.keys(blocks)) {
        if (!this._graph.has(id)) logger.warn({ checkpointId, blockId: id }, 'Checkpoint names a block not in the graph')
      }

      for (const id of this._graph.ids()) {
        const saved = blocks[id]
        if (saved !== undefined && isSuccessfulStatus(saved.status)) {
          this._states.set(id, {
            ...freshRecord(saved.attempts),
            status: saved.status,
            reason: saved.reason,
            durationMs: saved.durationMs,
            artifacts: loaded.artifacts.filter((a) => a.blockId === id),
          })
        } else {
          this._states.set(id, freshRecord(saved?.attempts ?? 0))
        }
      }
      this._executionOrder = executionOrder.filter((id) => this._isSuccessful(id))

      logger.info({ runId: this.runId, checkpointId }, 'Restored from checkpoint')
      this._eventBus?.emit('checkpoint:restored', { lineage: store.lineage, checkpointId })
    })
  }

  getBlockState(id: BlockId): Readonly<BlockState> | undefined {
    const record = this._states.get(id)
    if (record === undefined) return undefined
    return { status: record.status, reason: record.reason, attempts: record.attempts }
  }

  report(): RunReport {
    const counts: Record<FinishedStatus, number> = {
      completed: 0,
      completed_with_issues: 0,
      failed: 0,
      deferred: 0,
    }
    const blocks: BlockReport[] = []
    for (const id of this._graph.topologicalOrder()) {
      const record = this._states.get(id) ?? freshRecord()
      const status = record.status
      if (status === 'completed' || status === 'completed_with_issues' || status === 'failed' || status === 'deferred') {
        counts[status]++
      }
      blocks.push({
        blockId: id,
        status,
        reason: record.reason,
        attempts: record.attempts,
        durationMs: record.durationMs,
        estimatedEffortMs: this._graph.get(id)?.estimatedEffortMs ?? 0,
        artifacts: [...record.artifacts],
        validation: record.validation,
        errorKind: record.errorKind,
      })
    }
    return {
      runId: this.runId,
      blocks,
      executionOrder: [...this._executionOrder],
      artifacts: this._successfulArtifacts(),
      checkpointWarnings: [...this._checkpointWarnings],
      durationMs: this._durationMs,
      counts,
    }
  }

  // -------------------------------------------------------------------------
  // Pass and layer execution
  // -------------------------------------------------------------------------

  /** Completed blocks carry over; everything else starts the pass fresh */
  private _beginPass(): void {
    for (const [id, record] of this._states) {
      if (!isSuccessfulStatus(record.status)) this._states.set(id, freshRecord(record.attempts))
    }
  }

  private async _runLayer(index: number, layer: BlockId[]): Promise<void> {
    const runnable = await this._mutex.runExclusive(() => this._admit(layer))

    logger.debug({ runId: this.runId, layer: index, blocks: runnable.map((b) => b.id) }, 'Layer started')
    this._eventBus?.emit('layer:started', { runId: this.runId, index, blockIds: runnable.map((b) => b.id) })

    if (runnable.length > 0) {
      await this._executeLayer(runnable)
    }

    this._eventBus?.emit('layer:completed', { runId: this.runId, index })
    await this._checkpoint(`layer_complete:${String(index)}`)
  }

  /**
   * Move each pending block of the layer to ready, or defer it when a gating
   * prerequisite did not succeed.
   */
  private _admit(layer: BlockId[]): ImplementationBlock[] {
    const runnable: ImplementationBlock[] = []
    for (const id of layer) {
      const block = this._graph.get(id)
      const record = this._states.get(id)
      if (block === undefined || record === undefined || isSuccessfulStatus(record.status)) continue

      const unmet = this._graph.gatingPrerequisitesOf(id).filter((p) => !this._isSuccessful(p))
      if (unmet.length === 0) {
        this._transition(id, record, 'ready', 'all prerequisites satisfied')
        runnable.push(block)
        continue
      }
      if (record.status !== 'blocked') {
        this._transition(id, record, 'blocked', `waiting on ${unmet.join(', ')}`)
      }
      this._transition(id, record, 'deferred', `prerequisite ${unmet.join(', ')} did not complete`)
      this._eventBus?.emit('block:finished', { blockId: id, status: 'deferred', reason: record.reason })
    }
    return runnable
  }

  private async _executeLayer(blocks: ImplementationBlock[]): Promise<void> {
    const channel = new MessageChannel<Envelope>()
    const internalErrors: unknown[] = []
    const ctx: BlockRunContext = {
      layerTopPriority: Math.max(...blocks.map((b) => this._graph.priority(b.id))),
      post: (message) =>
        new Promise<void>((resolve) => {
          channel.send({ message, ack: resolve })
        }),
      notify: (message) => {
        channel.send({ message, ack: null })
      },
    }

    const pool = runWithConcurrency(blocks, this._options.maxParallel, (block) =>
      runBlock(this._runnerDeps, block, ctx),
    ).catch((err: unknown) => {
      internalErrors.push(err)
    })

    let pending = blocks.length
    while (pending > 0) {
      const { message, ack } = await channel.receive()
      try {
        await this._mutex.runExclusive(() => this._apply(message))
      } catch (err) {
        logger.error({ runId: this.runId, blockId: message.blockId, type: message.type, err }, 'Failed to apply block message')
        internalErrors.push(err)
      }
      if (message.type === 'finished') pending--
      ack?.()
    }

    await pool
    if (internalErrors.length > 0) throw internalErrors[0]
  }

  // -------------------------------------------------------------------------
  // Message handling (mutex held)
  // -------------------------------------------------------------------------

  private async _apply(message: BlockMessage): Promise<void> {
    const record = this._states.get(message.blockId)
    if (record === undefined) throw new Error(`Message for unknown block "${message.blockId}"`)
    const id = message.blockId

    switch (message.type) {
      case 'started':
        this._transition(id, record, 'in_progress', 'started')
        this._executionOrder.push(id)
        await this._checkpoint(`before_block:${id}`)
        return

      case 'retrying': {
        const { info } = message
        this._transition(id, record, 'failed', `${info.error.kind}: ${info.error.message}`)
        this._transition(id, record, 'in_progress', `retry ${String(info.retry + 1)} of ${String(info.maxRetries)}`)
        this._eventBus?.emit('block:retrying', {
          blockId: id,
          attempt: info.retry + 1,
          maxRetries: info.maxRetries,
          delayMs: info.delayMs,
        })
        return
      }

      case 'reverted':
        this._revertTo(id, message.checkpointId)
        return

      case 'finished': {
        if (message.status === 'deferred') {
          this._transition(id, record, 'failed', message.reason)
        }
        this._transition(id, record, message.status, message.reason)
        record.durationMs = message.durationMs
        record.artifacts = message.artifacts
        record.validation = message.validation
        record.errorKind = message.errorKind
        logger.info({ runId: this.runId, blockId: id, status: message.status, durationMs: message.durationMs }, 'Block finished')
        this._eventBus?.emit('block:finished', { blockId: id, status: message.status, reason: message.reason })

        if (!isSuccessfulStatus(message.status)) this._blockDependents(id)
        await this._checkpoint(`after_block:${id}`)
        return
      }
    }
  }

  /** Gating dependents of a failed block can no longer run this pass */
  private _blockDependents(id: BlockId): void {
    for (const dependent of this._graph.gatingDependentsOf(id)) {
      const record = this._states.get(dependent)
      if (record === undefined) continue
      if (record.status === 'not_started' || record.status === 'ready') {
        this._transition(dependent, record, 'blocked', `prerequisite ${id} did not complete`)
      }
    }
  }

  /**
   * Put the scheduler back to a checkpoint's state. Blocks a worker still
   * owns (ready or in progress) keep their status, and the reverting block's
   * recovery outcome still decides its final status. Every other block takes
   * the checkpoint's record and artifacts; a block that was live when the
   * checkpoint was written returns to not_started.
   */
  private _revertTo(id: BlockId, checkpointId: CheckpointId): void {
    const store = this._store
    if (store === null) return
    let loaded: LoadedCheckpoint<SchedulerSnapshot>
    try {
      loaded = store.load(checkpointId)
    } catch (err) {
      logger.warn({ runId: this.runId, blockId: id, checkpointId, err }, 'Revert checkpoint could not be loaded')
      return
    }
    const { blocks, executionOrder } = loaded.state

    for (const [blockId, record] of this._states) {
      const saved = blocks[blockId]
      const artifacts = loaded.artifacts.filter((a) => a.blockId === blockId)
      if (isLive(record.status)) {
        if (blockId === id) {
          record.artifacts = artifacts
          record.reason = `reverted to checkpoint ${checkpointId}`
        }
        continue
      }
      if (saved === undefined || isLive(saved.status)) {
        this._states.set(blockId, freshRecord(saved?.attempts ?? record.attempts))
        continue
      }
      this._states.set(blockId, {
        ...freshRecord(saved.attempts),
        status: saved.status,
        reason: saved.reason,
        durationMs: saved.durationMs,
        artifacts: isSuccessfulStatus(saved.status) ? artifacts : [],
      })
    }

    const restoredOrder = executionOrder.filter((blockId) => this._states.has(blockId))
    const started = this._executionOrder.filter(
      (blockId) => !restoredOrder.includes(blockId) && this._states.get(blockId)?.status === 'in_progress',
    )
    this._executionOrder = [...restoredOrder, ...started]

    logger.info({ runId: this.runId, blockId: id, checkpointId }, 'Reverted scheduler state to checkpoint')
    this._eventBus?.emit('checkpoint:restored', { lineage: store.lineage, checkpointId })
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _transition(id: BlockId, record: BlockRecord, to: BlockStatus, reason: string): void {
    const from = transitionBlock(id, record, to, reason)
    this._eventBus?.emit('block:status', { blockId: id, from, to, reason })
  }

  private _isSuccessful(id: BlockId): boolean {
    const record = this._states.get(id)
    return record !== undefined && isSuccessfulStatus(record.status)
  }

  private _successfulArtifacts(): Artifact[] {
    const artifacts: Artifact[] = []
    for (const id of this._graph.topologicalOrder()) {
      const record = this._states.get(id)
      if (record !== undefined && isSuccessfulStatus(record.status)) artifacts.push(...record.artifacts)
    }
    return artifacts
  }

  private _snapshot(): SchedulerSnapshot {
    const blocks: SchedulerSnapshot['blocks'] = {}
    for (const [id, record] of this._states) {
      blocks[id] = {
        status: record.status,
        reason: record.reason,
        attempts: record.attempts,
        durationMs: record.durationMs,
      }
    }
    return { runId: this.runId, blocks, executionOrder: [...this._executionOrder] }
  }

  /** Write a checkpoint through the recovery manager; failure only warns */
  private async _checkpoint(reason: string): Promise<void> {
    const store = this._store
    if (store === null) return

    const state = this._snapshot()
    const artifacts = this._successfulArtifacts()
    const done = Object.values(state.blocks).filter((b) => isSuccessfulStatus(b.status)).length
    const summary = `${String(done)}/${String(this._states.size)} blocks complete`

    try {
      const outcome = await this._recovery.execute(
        { name: `checkpoint:${reason}`, run: async () => store.create(state, reason, { summary, artifacts }) },
        { errorKind: 'io_error' },
      )
      if (outcome.kind === 'succeeded' || outcome.kind === 'recovered') return
      this._skipCheckpoint(store.lineage, reason, outcome.error.message, outcome.error.kind)
    } catch (err) {
      const error = toOrchestrationError(err, 'io_error')
      this._skipCheckpoint(store.lineage, reason, error.message, error.kind)
    }
  }

  private _skipCheckpoint(lineage: string, reason: string, message: string, kind: ErrorKind): void {
    logger.warn({ runId: this.runId, reason, kind, err: message }, 'Checkpoint skipped')
    this._checkpointWarnings.push(`${reason}: ${message}`)
    this._eventBus?.emit('checkpoint:skipped', { lineage, reason, error: { message, kind } })
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createScheduler(deps: SchedulerDeps): Scheduler {
  return new SchedulerImpl(deps)
}
