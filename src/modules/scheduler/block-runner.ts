/**
 * Worker-side execution of one block.
 *
 * A worker never touches scheduler state. It reports progress through the
 * context's post()/notify() and finishes with exactly one `finished`
 * message, whatever happens inside.
 *
 * Each attempt runs the block's steps through the generation collaborator,
 * then validates the artifacts. Attempts are bounded by a timeout and check
 * the resource monitor before every step; failures go to the recovery
 * manager, whose outcome decides the block's terminal status.
 */

import {
  BlockTimeoutError,
  CancelledError,
  OrchestrationError,
  ResourceLimitError,
  ValidationFailureError,
  toOrchestrationError,
  type ResourceName,
} from '../../core/errors.js'
import type { Artifact, ExecutionStep, ImplementationBlock } from '../../core/types.js'
import type { BlockGraph } from '../block-graph/block-graph.js'
import type { ResourceMonitor } from '../resource-monitor/resource-monitor.js'
import type { LatestCheckpointSource, RecoveryManager } from '../recovery/recovery-manager.js'
import type { RecoverableOperation, RecoveryOutcome } from '../recovery/types.js'
import { createLogger } from '../../utils/logger.js'
import type {
  BlockMessage,
  FinishedStatus,
  GenerationCollaborator,
  GenerationMode,
  SchedulerOptions,
  ValidationCollaborator,
  ValidationResult,
} from './types.js'

const logger = createLogger('scheduler:worker')

const RESOURCES: readonly ResourceName[] = ['memory', 'cpu', 'disk']

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BlockRunnerDeps {
  graph: BlockGraph
  generator: GenerationCollaborator
  validator: ValidationCollaborator
  recovery: RecoveryManager
  monitor: ResourceMonitor | null
  checkpoints: LatestCheckpointSource | null
  options: SchedulerOptions
  clock: () => number
}

export interface BlockRunContext {
  /** Highest priority among the blocks of the running layer */
  layerTopPriority: number
  /** Send a message and wait until the scheduler has applied it */
  post(message: BlockMessage): Promise<void>
  /** Send a message without waiting */
  notify(message: BlockMessage): void
}

interface AttemptResult {
  artifacts: Artifact[]
  validation: ValidationResult | null
  /** Optional steps that failed and were left out */
  skippedSteps: string[]
}

type Finished = Extract<BlockMessage, { type: 'finished' }>

// ---------------------------------------------------------------------------
// Abort helpers
// ---------------------------------------------------------------------------

function abortReason(signal: AbortSignal): OrchestrationError {
  const reason: unknown = signal.reason
  return reason instanceof OrchestrationError ? reason : new CancelledError('Block execution aborted')
}

/** Settle with `promise`, or reject as soon as `signal` aborts */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(abortReason(signal))
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal))
    }
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}

// ---------------------------------------------------------------------------
// runBlock
// ---------------------------------------------------------------------------

export async function runBlock(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  ctx: BlockRunContext,
): Promise<void> {
  await ctx.post({ type: 'started', blockId: block.id })
  const startedAt = deps.clock()

  let finished: Finished
  try {
    const outcome = await deps.recovery.execute(blockOperation(deps, block, ctx), {
      errorKind: 'generation_failure',
      checkpoints: deps.checkpoints ?? undefined,
      onRetry: (info) => {
        ctx.notify({ type: 'retrying', blockId: block.id, info })
      },
      onRevert: async (checkpoint) => {
        await ctx.post({ type: 'reverted', blockId: block.id, checkpointId: checkpoint.id })
      },
    })
    finished = await toFinished(deps, block, outcome, startedAt)
  } catch (err) {
    const error = toOrchestrationError(err)
    logger.warn({ blockId: block.id, kind: error.kind, err: error.message }, 'Block failed')
    finished = failed(deps, block, error, startedAt)
  }

  await ctx.post(finished)
}

// ---------------------------------------------------------------------------
// Attempts
// ---------------------------------------------------------------------------

function blockOperation(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  ctx: BlockRunContext,
): RecoverableOperation<AttemptResult> {
  return {
    name: `block:${block.id}`,
    run: () => attempt(deps, block, block.steps, 'full', ctx, true),
    simplify: () => attempt(deps, block, block.steps, 'simplified', ctx, true),
    alternate: async (alternateId) => {
      const alternative = deps.graph.get(alternateId)
      if (alternative === undefined) {
        throw new OrchestrationError(`Alternate block "${alternateId}" does not exist`, 'generation_failure', {
          blockId: block.id,
          alternateId,
        })
      }
      // Generate from the alternative's steps, validate against this block
      return attempt(deps, block, alternative.steps, 'full', ctx, true)
    },
    subdivide: () =>
      block.steps.map((step) => ({
        name: `block:${block.id}:${step.id}`,
        run: () => attempt(deps, block, [step], 'full', ctx, false),
      })),
  }
}

function timeoutFor(options: SchedulerOptions, block: ImplementationBlock): number {
  return Math.max(options.minTimeoutMs, block.estimatedEffortMs * options.timeoutMultiplier)
}

/** Run with a fresh AbortController that fires BlockTimeoutError on expiry */
async function withTimeout<T>(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const timeoutMs = timeoutFor(deps.options, block)
  const controller = new AbortController()
  const timer = setTimeout(() => {
    controller.abort(new BlockTimeoutError(block.id, timeoutMs))
  }, timeoutMs)
  try {
    return await untilAborted(fn(controller.signal), controller.signal)
  } finally {
    clearTimeout(timer)
  }
}

function checkResources(deps: BlockRunnerDeps, block: ImplementationBlock, ctx: BlockRunContext): void {
  if (deps.monitor === null) return
  const levels = deps.monitor.checkLimits()
  const resource = RESOURCES.find((r) => levels[r] === 'exceeded')
  if (resource === undefined) return

  if (deps.graph.priority(block.id) >= ctx.layerTopPriority) {
    logger.warn({ blockId: block.id, resource }, 'Resource limit exceeded; continuing highest-priority block')
    return
  }
  throw new ResourceLimitError(resource, { blockId: block.id })
}

async function attempt(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  steps: readonly ExecutionStep[],
  mode: GenerationMode,
  ctx: BlockRunContext,
  validate: boolean,
): Promise<AttemptResult> {
  return withTimeout(deps, block, async (signal) => {
    const artifacts: Artifact[] = []
    const skippedSteps: string[] = []

    for (const step of steps) {
      checkResources(deps, block, ctx)
      if (signal.aborted) throw abortReason(signal)
      try {
        artifacts.push(await untilAborted(deps.generator.generate({ block, step, mode, signal }), signal))
      } catch (err) {
        if (!step.optional || signal.aborted) throw toOrchestrationError(err, 'generation_failure', { blockId: block.id, stepId: step.id })
        logger.info({ blockId: block.id, stepId: step.id }, 'Optional step failed; skipping')
        skippedSteps.push(step.id)
      }
    }

    if (!validate) return { artifacts, validation: null, skippedSteps }
    const validation = await runValidation(deps, block, artifacts, signal)
    return { artifacts, validation, skippedSteps }
  })
}

async function runValidation(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  artifacts: readonly Artifact[],
  signal: AbortSignal,
): Promise<ValidationResult> {
  let validation: ValidationResult
  try {
    validation = await untilAborted(deps.validator.validate(block, artifacts), signal)
  } catch (err) {
    throw toOrchestrationError(err, 'build_error', { blockId: block.id })
  }
  if (!validation.passed) {
    throw new ValidationFailureError(block.id, validation.issues)
  }
  return validation
}

// ---------------------------------------------------------------------------
// Outcome → terminal status
// ---------------------------------------------------------------------------

async function toFinished(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  outcome: RecoveryOutcome<AttemptResult>,
  startedAt: number,
): Promise<Finished> {
  const base = { type: 'finished' as const, blockId: block.id }
  const durationMs = (): number => deps.clock() - startedAt

  switch (outcome.kind) {
    case 'succeeded': {
      const { artifacts, validation, skippedSteps } = outcome.value
      const issues = [...(validation?.issues ?? []), ...skippedSteps.map((s) => `optional step "${s}" skipped`)]
      const status: FinishedStatus = issues.length === 0 ? 'completed' : 'completed_with_issues'
      const retried = outcome.retries > 0 ? ` after ${String(outcome.retries)} retr${outcome.retries === 1 ? 'y' : 'ies'}` : ''
      return {
        ...base,
        status,
        reason: status === 'completed' ? `validation passed${retried}` : `passed with issues: ${issues.join('; ')}`,
        artifacts,
        validation,
        errorKind: null,
        durationMs: durationMs(),
      }
    }

    case 'recovered':
      return {
        ...base,
        status: 'completed_with_issues',
        reason: `recovered by ${outcome.action} after ${outcome.error.kind}: ${outcome.error.message}`,
        artifacts: outcome.value.artifacts,
        validation: outcome.value.validation,
        errorKind: outcome.error.kind,
        durationMs: durationMs(),
      }

    case 'subdivided': {
      const first = outcome.failures[0]
      if (first !== undefined) {
        return failed(deps, block, first, startedAt, `subdivided: ${String(outcome.failures.length)} part(s) failed`)
      }
      const artifacts = outcome.values.flatMap((v) => v.artifacts)
      try {
        const validation = await withTimeout(deps, block, (signal) => runValidation(deps, block, artifacts, signal))
        return {
          ...base,
          status: 'completed_with_issues',
          reason: `completed by subdividing after ${outcome.error.kind}: ${outcome.error.message}`,
          artifacts,
          validation,
          errorKind: outcome.error.kind,
          durationMs: durationMs(),
        }
      } catch (err) {
        return failed(deps, block, toOrchestrationError(err, 'build_error'), startedAt, 'subdivided')
      }
    }

    case 'skipped':
      return {
        ...base,
        status: 'deferred',
        reason: `skipped after ${outcome.error.kind}: ${outcome.error.message}`,
        artifacts: [],
        validation: null,
        errorKind: outcome.error.kind,
        durationMs: durationMs(),
      }

    case 'failed':
      return failed(
        deps,
        block,
        outcome.error,
        startedAt,
        outcome.reverted !== null ? `reverted to checkpoint ${outcome.reverted}` : undefined,
      )
  }
}

function failed(
  deps: BlockRunnerDeps,
  block: ImplementationBlock,
  error: OrchestrationError,
  startedAt: number,
  note?: string,
): Finished {
  const reason = `${error.kind}: ${error.message}`
  return {
    type: 'finished',
    blockId: block.id,
    status: 'failed',
    reason: note === undefined ? reason : `${reason} (${note})`,
    artifacts: [],
    validation: null,
    errorKind: error.kind,
    durationMs: deps.clock() - startedAt,
  }
}
