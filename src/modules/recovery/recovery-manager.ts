/**
 * RecoveryManager: policy-driven retry and fallback for classified failures.
 *
 * attempt(operation, error):
 *  1. non-recoverable errors (structural, merge, config, missing checkpoint,
 *     cancellation) are rethrown untouched;
 *  2. the operation is retried up to `maxRetries` times, sleeping the backoff
 *     delay before each retry;
 *  3. when every retry has failed, the policy's fallback runs exactly once.
 */

import {
  OrchestrationError,
  isRecoverable,
  toOrchestrationError,
  type ExecutionErrorKind,
  type PersistenceErrorKind,
} from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { CheckpointMetadata } from '../checkpoint/checkpoint-store.js'
import { sleep as defaultSleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { computeBackoffDelay } from './backoff.js'
import { CONSERVATIVE_POLICY, DEFAULT_RECOVERY_POLICIES } from './policies.js'
import type {
  RecoverableOperation,
  RecoveryHooks,
  RecoveryOutcome,
  RecoveryPolicy,
  RecoveryPolicyMap,
  RetryInfo,
} from './types.js'

const logger = createLogger('recovery')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Source of the most recent checkpoint for the `revert` fallback */
export interface LatestCheckpointSource {
  latest(): CheckpointMetadata | null
}

export interface RecoveryManagerOptions {
  policies?: RecoveryPolicyMap
  defaultPolicy?: RecoveryPolicy
  checkpoints?: LatestCheckpointSource | null
  eventBus?: TypedEventBus | null
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

/** Hooks for one recovery call; `checkpoints` overrides the manager's source */
export interface AttemptHooks extends RecoveryHooks {
  checkpoints?: LatestCheckpointSource
  /** Kind assigned to foreign (non-taxonomy) errors thrown by the operation */
  errorKind?: ExecutionErrorKind | PersistenceErrorKind
}

type RetryResult<T> = { ok: true; value: T; retries: number } | { ok: false; error: OrchestrationError }

// ---------------------------------------------------------------------------
// RecoveryManager
// ---------------------------------------------------------------------------

export class RecoveryManager {
  private readonly _policies: RecoveryPolicyMap
  private readonly _default: RecoveryPolicy
  private readonly _checkpoints: LatestCheckpointSource | null
  private readonly _eventBus: TypedEventBus | null
  private readonly _sleep: (ms: number, signal?: AbortSignal) => Promise<void>

  constructor(options: RecoveryManagerOptions = {}) {
    this._policies = options.policies ?? DEFAULT_RECOVERY_POLICIES
    this._default = options.defaultPolicy ?? CONSERVATIVE_POLICY
    this._checkpoints = options.checkpoints ?? null
    this._eventBus = options.eventBus ?? null
    this._sleep = options.sleep ?? defaultSleep
  }

  /** Policy for `error`: by kind, then by category, then the default */
  strategyFor(error: OrchestrationError): RecoveryPolicy {
    return this._policies[error.kind] ?? this._policies[error.category] ?? this._default
  }

  /** Run the operation once and hand its first failure to attempt() */
  async execute<T>(operation: RecoverableOperation<T>, hooks: AttemptHooks = {}): Promise<RecoveryOutcome<T>> {
    try {
      return { kind: 'succeeded', value: await operation.run(), retries: 0 }
    } catch (err) {
      return this.attempt(operation, toOrchestrationError(err, hooks.errorKind), hooks)
    }
  }

  /** Recover from `error`, already raised by one run of `operation` */
  async attempt<T>(
    operation: RecoverableOperation<T>,
    error: OrchestrationError,
    hooks: AttemptHooks = {},
  ): Promise<RecoveryOutcome<T>> {
    if (!isRecoverable(error)) throw error

    const policy = this.strategyFor(error)
    const retried = await this._retry(operation, error, policy, hooks)
    if (retried.ok) {
      return { kind: 'succeeded', value: retried.value, retries: retried.retries }
    }
    return this._fallback(operation, retried.error, policy, hooks)
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async _retry<T>(
    operation: RecoverableOperation<T>,
    error: OrchestrationError,
    policy: RecoveryPolicy,
    hooks: AttemptHooks,
  ): Promise<RetryResult<T>> {
    let last = error
    for (let retry = 0; retry < policy.maxRetries; retry++) {
      const delayMs = computeBackoffDelay(policy.backoff, retry)
      const info: RetryInfo = {
        operation: operation.name,
        retry,
        maxRetries: policy.maxRetries,
        delayMs,
        error: last,
      }
      logger.debug({ operation: operation.name, retry, delayMs, kind: last.kind }, 'Retrying operation')
      hooks.onRetry?.(info)
      this._eventBus?.emit('recovery:retry', {
        operation: operation.name,
        retry,
        delayMs,
        error: { message: last.message, kind: last.kind },
      })

      await this._sleep(delayMs, hooks.signal)
      try {
        return { ok: true, value: await operation.run(), retries: retry + 1 }
      } catch (err) {
        last = toOrchestrationError(err, hooks.errorKind)
        if (!isRecoverable(last)) throw last
      }
    }
    return { ok: false, error: last }
  }

  private async _fallback<T>(
    operation: RecoverableOperation<T>,
    error: OrchestrationError,
    policy: RecoveryPolicy,
    hooks: AttemptHooks,
  ): Promise<RecoveryOutcome<T>> {
    const action = policy.fallback
    logger.warn({ operation: operation.name, action: action.type, kind: error.kind }, 'Retries exhausted; applying fallback')
    this._eventBus?.emit('recovery:fallback', {
      operation: operation.name,
      action: action.type,
      error: { message: error.message, kind: error.kind },
    })

    switch (action.type) {
      case 'skip':
        return { kind: 'skipped', error }

      case 'abort':
        throw error

      case 'simplify': {
        const simplify = operation.simplify
        if (simplify === undefined) {
          logger.warn({ operation: operation.name }, 'Operation has no simplified variant')
          throw error
        }
        const value = await this._once(() => simplify.call(operation), operation.name, hooks)
        return { kind: 'recovered', action: 'simplify', value, error }
      }

      case 'use_alternate': {
        const alternate = operation.alternate
        if (alternate === undefined) {
          logger.warn({ operation: operation.name, alternateId: action.alternateId }, 'Operation has no alternate')
          throw error
        }
        const value = await this._once(() => alternate.call(operation, action.alternateId), operation.name, hooks)
        return { kind: 'recovered', action: 'use_alternate', value, error }
      }

      case 'revert': {
        const source = hooks.checkpoints ?? this._checkpoints
        const checkpoint = source?.latest() ?? null
        if (checkpoint === null || hooks.onRevert === undefined) {
          logger.warn({ operation: operation.name }, 'No checkpoint to revert to')
          return { kind: 'failed', error, reverted: null }
        }
        await hooks.onRevert(checkpoint)
        logger.info({ operation: operation.name, checkpointId: checkpoint.id }, 'Reverted to checkpoint')
        return { kind: 'failed', error, reverted: checkpoint.id }
      }

      case 'subdivide': {
        const parts = operation.subdivide?.() ?? []
        if (parts.length === 0) {
          logger.warn({ operation: operation.name }, 'Operation cannot be subdivided')
          throw error
        }
        const values: T[] = []
        const failures: OrchestrationError[] = []
        for (const part of parts) {
          const result = await this._runPart(part, policy, hooks)
          if (result.ok) values.push(result.value)
          else failures.push(result.error)
        }
        return { kind: 'subdivided', values, failures, error }
      }
    }
  }

  /** Each part gets one run plus the policy's retries, without a fallback */
  private async _runPart<T>(
    part: RecoverableOperation<T>,
    policy: RecoveryPolicy,
    hooks: AttemptHooks,
  ): Promise<RetryResult<T>> {
    try {
      return { ok: true, value: await part.run(), retries: 0 }
    } catch (err) {
      const error = toOrchestrationError(err, hooks.errorKind)
      if (!isRecoverable(error)) throw error
      return this._retry(part, error, policy, hooks)
    }
  }

  /** A fallback variant runs once; its failure is final */
  private async _once<T>(invoke: () => Promise<T>, name: string, hooks: AttemptHooks): Promise<T> {
    try {
      return await invoke()
    } catch (err) {
      throw toOrchestrationError(err, hooks.errorKind, { operation: name })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createRecoveryManager(options: RecoveryManagerOptions = {}): RecoveryManager {
  return new RecoveryManager(options)
}
