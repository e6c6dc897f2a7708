/**
 * Built-in recovery policies.
 */

import type { RecoveryPolicy, RecoveryPolicyMap } from './types.js'

/** Applied to any error no configured policy matches */
export const CONSERVATIVE_POLICY: RecoveryPolicy = {
  maxRetries: 1,
  backoff: { type: 'fixed', delayMs: 250 },
  fallback: { type: 'abort' },
}

export const DEFAULT_RECOVERY_POLICIES: RecoveryPolicyMap = {
  memory_limit_exceeded: {
    maxRetries: 1,
    backoff: { type: 'fixed', delayMs: 500 },
    fallback: { type: 'subdivide' },
  },
  cpu_limit_exceeded: {
    maxRetries: 1,
    backoff: { type: 'fixed', delayMs: 500 },
    fallback: { type: 'simplify' },
  },
  disk_limit_exceeded: {
    maxRetries: 0,
    backoff: { type: 'fixed', delayMs: 0 },
    fallback: { type: 'simplify' },
  },
  generation_failure: {
    maxRetries: 3,
    backoff: { type: 'exponential', initialMs: 1_000, factor: 2, maxMs: 30_000 },
    fallback: { type: 'simplify' },
  },
  validation_failure: {
    maxRetries: 2,
    backoff: { type: 'linear', initialMs: 500, incrementMs: 500, maxMs: 5_000 },
    fallback: { type: 'simplify' },
  },
  build_error: {
    maxRetries: 2,
    backoff: { type: 'fixed', delayMs: 1_000 },
    fallback: { type: 'revert' },
  },
  timeout: {
    maxRetries: 1,
    backoff: { type: 'fixed', delayMs: 0 },
    fallback: { type: 'subdivide' },
  },
  // Checkpoint writes: a few quick retries, then continue without the checkpoint
  persistence: {
    maxRetries: 3,
    backoff: { type: 'exponential', initialMs: 100, factor: 2, maxMs: 2_000 },
    fallback: { type: 'skip' },
  },
}
