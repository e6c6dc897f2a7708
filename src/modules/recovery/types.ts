/**
 * Recovery policy types: how a classified failure is retried and what
 * happens once the retries run out.
 */

import type { ErrorCategory, ErrorKind, OrchestrationError } from '../../core/errors.js'
import type { CheckpointId } from '../../core/types.js'
import type { CheckpointMetadata } from '../checkpoint/checkpoint-store.js'

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export type BackoffSpec =
  | { type: 'fixed'; delayMs: number }
  | { type: 'exponential'; initialMs: number; factor: number; maxMs: number }
  | { type: 'linear'; initialMs: number; incrementMs: number; maxMs: number }

export type FallbackAction =
  | { type: 'skip' }
  | { type: 'simplify' }
  | { type: 'revert' }
  | { type: 'use_alternate'; alternateId: string }
  | { type: 'subdivide' }
  | { type: 'abort' }

export type FallbackType = FallbackAction['type']

export interface RecoveryPolicy {
  maxRetries: number
  backoff: BackoffSpec
  fallback: FallbackAction
}

/** Policies keyed by error kind, or by category as a broader match */
export type RecoveryPolicyMap = Partial<Record<ErrorKind | ErrorCategory, RecoveryPolicy>>

// ---------------------------------------------------------------------------
// Operations and outcomes
// ---------------------------------------------------------------------------

/**
 * A unit of work the recovery manager can re-run. The optional variants are
 * used only by the matching fallback action.
 */
export interface RecoverableOperation<T> {
  name: string
  run(): Promise<T>
  /** Reduced-scope variant invoked once by the `simplify` fallback */
  simplify?(): Promise<T>
  /** Named substitute invoked once by the `use_alternate` fallback */
  alternate?(alternateId: string): Promise<T>
  /** Smaller units attempted independently by the `subdivide` fallback */
  subdivide?(): RecoverableOperation<T>[]
}

export type RecoveryOutcome<T> =
  | { kind: 'succeeded'; value: T; retries: number }
  | { kind: 'recovered'; action: 'simplify' | 'use_alternate'; value: T; error: OrchestrationError }
  | {
      kind: 'subdivided'
      values: T[]
      failures: OrchestrationError[]
      error: OrchestrationError
    }
  | { kind: 'skipped'; error: OrchestrationError }
  | { kind: 'failed'; error: OrchestrationError; reverted: CheckpointId | null }

export interface RetryInfo {
  operation: string
  /** 0-based retry index */
  retry: number
  maxRetries: number
  delayMs: number
  error: OrchestrationError
}

export interface RecoveryHooks {
  /** Called before the backoff sleep of each retry */
  onRetry?(info: RetryInfo): void
  /** Restores orchestration state for the `revert` fallback */
  onRevert?(checkpoint: CheckpointMetadata): Promise<void>
  /** Aborts backoff sleeps */
  signal?: AbortSignal
}
