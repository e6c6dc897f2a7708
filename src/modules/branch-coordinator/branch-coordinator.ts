/**
 * BranchCoordinator: explores candidate approaches as isolated branches.
 *
 * Each branch owns its plan, its own block graph and scheduler, and its own
 * checkpoint lineage (`branch:<explorationId>:<id>`, or `branch:<id>`
 * without an exploration id); branches share nothing but the
 * collaborators. Evaluation and merging are explicit steps over the
 * branches' results. A successful merge releases every branch it did not
 * select.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  BranchNotFoundError,
  ConfigError,
  NoBranchesAvailableError,
  toOrchestrationError,
} from '../../core/errors.js'
import { isSuccessfulStatus, type BranchId } from '../../core/types.js'
import { buildBlockGraph, type BuildBlockGraphOptions } from '../block-graph/block-graph.js'
import type { CheckpointStore } from '../checkpoint/checkpoint-store.js'
import type { RecoveryManager } from '../recovery/recovery-manager.js'
import type { ResourceMonitor } from '../resource-monitor/resource-monitor.js'
import { createScheduler } from '../scheduler/scheduler-impl.js'
import type { SchedulerSnapshot } from '../scheduler/snapshot.js'
import type {
  GenerationCollaborator,
  SchedulerOptions,
  ValidationCollaborator,
} from '../scheduler/types.js'
import { runWithConcurrency } from '../worker-pool/promise-pool.js'
import { createLogger } from '../../utils/logger.js'
import { mergeSelective, mergeSingle, compareBranches, type MergeCandidate } from './merge.js'
import { DEFAULT_BRANCH_WEIGHTS, createHeuristicScorer, overallScore, rankEvaluations } from './scoring.js'
import {
  VALID_BRANCH_TRANSITIONS,
  type Baseline,
  type BranchApproach,
  type BranchComparison,
  type BranchEvaluation,
  type BranchScorer,
  type BranchStatus,
  type BranchWeights,
  type ExplorationResult,
  type ImplementationBranch,
  type MergeOptions,
  type MergeResult,
} from './types.js'

const logger = createLogger('branch-coordinator')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface BranchCoordinatorDeps {
  generator: GenerationCollaborator
  validator: ValidationCollaborator
  recovery: RecoveryManager
  monitor?: ResourceMonitor | null
  eventBus?: TypedEventBus | null
  /** Opens the checkpoint store of one lineage; omit to run branches without checkpoints */
  checkpointStoreFor?: (lineage: string) => CheckpointStore<SchedulerSnapshot>
  scorer?: BranchScorer
  weights?: BranchWeights
  /** Branches implemented at the same time */
  maxParallelPaths?: number
  schedulerOptions?: Partial<SchedulerOptions>
  graphOptions?: BuildBlockGraphOptions
  /** Files as they were before any branch ran */
  baseline?: Baseline
  /** Scopes branch lineages so separate explorations never share one */
  explorationId?: string
}

// ---------------------------------------------------------------------------
// BranchCoordinator
// ---------------------------------------------------------------------------

export class BranchCoordinator {
  private readonly _deps: BranchCoordinatorDeps
  private readonly _scorer: BranchScorer
  private readonly _weights: BranchWeights
  private readonly _baseline: Baseline
  private readonly _branches = new Map<BranchId, ImplementationBranch>()
  private _spawned = 0

  constructor(deps: BranchCoordinatorDeps) {
    this._deps = deps
    this._scorer = deps.scorer ?? createHeuristicScorer()
    this._weights = deps.weights ?? DEFAULT_BRANCH_WEIGHTS
    this._baseline = deps.baseline ?? {}
  }

  /** Create one isolated branch per approach, in `created` */
  spawn(approaches: readonly BranchApproach[]): ImplementationBranch[] {
    const spawned: ImplementationBranch[] = []
    for (const approach of approaches) {
      const id = approach.id ?? `branch-${String(++this._spawned)}`
      if (this._branches.has(id)) {
        throw new ConfigError(`Branch id "${id}" is already in use`, { branchId: id })
      }
      const branch: ImplementationBranch = {
        id,
        approach: approach.approach,
        plan: approach.plan,
        status: 'created',
        lineage: this._lineageOf(id),
        metrics: null,
        report: null,
        error: null,
      }
      this._branches.set(id, branch)
      logger.info({ branchId: id, approach: approach.approach }, 'Branch spawned')
      this._eventBus()?.emit('branch:status', { branchId: id, status: 'created' })
      spawned.push({ ...branch })
    }
    return spawned
  }

  /**
   * Run each branch's plan through its own scheduler. A branch is
   * `implemented` when every block completed, with or without issues.
   */
  async implement(branches: readonly ImplementationBranch[]): Promise<ImplementationBranch[]> {
    const owned = branches.map((b) => this._own(b.id))
    await runWithConcurrency(owned, this._deps.maxParallelPaths ?? 2, (branch) => this._implementOne(branch))
    return owned.map((b) => ({ ...b }))
  }

  /**
   * Score every `implemented` branch; others are skipped.
   * @returns evaluations, best first
   */
  evaluate(branches: readonly ImplementationBranch[]): BranchEvaluation[] {
    const evaluations: BranchEvaluation[] = []
    for (const { id } of branches) {
      const branch = this._own(id)
      if (branch.status !== 'implemented') {
        logger.debug({ branchId: id, status: branch.status }, 'Skipping branch that is not implemented')
        continue
      }
      const scores = this._scorer.score({ ...branch }, this._baseline)
      const metrics = {
        quality: scores.quality,
        functionality: scores.functionality,
        performance: scores.performance,
        maintainability: scores.maintainability,
        overallScore: overallScore(scores, this._weights),
      }
      branch.metrics = metrics
      this._setStatus(branch, 'evaluated')
      evaluations.push({ branchId: id, metrics, components: { ...scores.components } })
    }
    return rankEvaluations(evaluations)
  }

  /**
   * Pick the winner (`single`) or combine branches per file (`selective`).
   * Branch statuses change only when the merge succeeds; the coordinator
   * then drops every considered branch that was not selected.
   *
   * @throws {NoBranchesAvailableError} when no branch was evaluated
   * @throws {MergeConflictError} on unresolved selective-merge conflicts
   */
  selectAndMerge(
    branches: readonly ImplementationBranch[],
    evaluation: readonly BranchEvaluation[],
    options: MergeOptions = { mode: 'single' },
  ): MergeResult {
    const considered = branches.map((b) => this._own(b.id))
    const candidates: MergeCandidate[] = []
    for (const entry of rankEvaluations(evaluation)) {
      const branch = considered.find((b) => b.id === entry.branchId)
      if (branch !== undefined && branch.status === 'evaluated') candidates.push({ branch, evaluation: entry })
    }

    const [best] = candidates
    if (best === undefined) throw new NoBranchesAvailableError(branches.length)

    const result =
      options.mode === 'single'
        ? mergeSingle(best.branch)
        : mergeSelective(candidates, this._baseline, options.resolver)

    for (const { branch } of candidates) {
      this._setStatus(branch, result.selected.includes(branch.id) ? 'selected' : 'rejected')
    }
    const discarded = considered.filter((b) => !result.selected.includes(b.id)).map((b) => b.id)
    for (const id of discarded) this._branches.delete(id)
    logger.info(
      { mode: result.mode, selected: result.selected, discarded, files: result.files.length },
      'Branches merged',
    )
    this._eventBus()?.emit('branch:merged', {
      mode: result.mode,
      branchIds: result.selected,
      conflicts: result.resolvedConflicts.length,
    })
    return result
  }

  /** spawn → implement → evaluate → selectAndMerge */
  async explore(approaches: readonly BranchApproach[], options: MergeOptions = { mode: 'single' }): Promise<ExplorationResult> {
    const spawned = this.spawn(approaches)
    const implemented = await this.implement(spawned)
    const evaluation = this.evaluate(implemented)
    // Held before the merge releases the losers
    const owned = implemented.map((b) => this._own(b.id))
    const merge = this.selectAndMerge(implemented, evaluation, options)
    return { branches: owned.map((b) => ({ ...b })), evaluation, merge }
  }

  compare(a: BranchId, b: BranchId): BranchComparison {
    return compareBranches(this._own(a), this._own(b))
  }

  getBranch(id: BranchId): ImplementationBranch {
    return { ...this._own(id) }
  }

  listBranches(): ImplementationBranch[] {
    return [...this._branches.values()].map((b) => ({ ...b }))
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async _implementOne(branch: ImplementationBranch): Promise<void> {
    try {
      this._setStatus(branch, 'implementing')
      const graph = buildBlockGraph(branch.plan.blocks, branch.plan.dependencies, this._deps.graphOptions)
      const scheduler = createScheduler({
        graph,
        generator: this._deps.generator,
        validator: this._deps.validator,
        recovery: this._deps.recovery,
        checkpoints: this._deps.checkpointStoreFor?.(branch.lineage) ?? null,
        monitor: this._deps.monitor ?? null,
        eventBus: this._eventBus(),
        options: this._deps.schedulerOptions,
        runId: branch.lineage,
      })
      const report = await scheduler.run()
      branch.report = report

      const unsuccessful = report.blocks.filter((b) => !isSuccessfulStatus(b.status))
      if (unsuccessful.length === 0) {
        this._setStatus(branch, 'implemented')
        return
      }
      branch.error = `${String(unsuccessful.length)} block(s) did not complete: ${unsuccessful
        .map((b) => b.blockId)
        .join(', ')}`
      this._setStatus(branch, 'failed')
    } catch (err) {
      const error = toOrchestrationError(err)
      logger.warn({ branchId: branch.id, kind: error.kind, err: error.message }, 'Branch implementation failed')
      // A branch that never started implementing keeps its status
      if (branch.status !== 'implementing') return
      branch.error = `${error.kind}: ${error.message}`
      this._setStatus(branch, 'failed')
    }
  }

  private _lineageOf(id: BranchId): string {
    const { explorationId } = this._deps
    return explorationId === undefined ? `branch:${id}` : `branch:${explorationId}:${id}`
  }

  private _own(id: BranchId): ImplementationBranch {
    const branch = this._branches.get(id)
    if (branch === undefined) throw new BranchNotFoundError(id)
    return branch
  }

  private _setStatus(branch: ImplementationBranch, to: BranchStatus): void {
    const allowed = VALID_BRANCH_TRANSITIONS[branch.status]
    if (!allowed.includes(to)) {
      throw new Error(
        `Invalid branch transition for "${branch.id}": ${branch.status} → ${to}. ` +
          `Allowed from ${branch.status}: [${allowed.join(', ')}]`,
      )
    }
    logger.info({ branchId: branch.id, from: branch.status, to }, 'Branch status changed')
    branch.status = to
    this._eventBus()?.emit('branch:status', { branchId: branch.id, status: to })
  }

  private _eventBus(): TypedEventBus | null {
    return this._deps.eventBus ?? null
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createBranchCoordinator(deps: BranchCoordinatorDeps): BranchCoordinator {
  return new BranchCoordinator(deps)
}
