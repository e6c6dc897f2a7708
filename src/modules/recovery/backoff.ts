/**
 * Backoff delay schedules.
 *
 * Deterministic (no jitter): the same spec and retry index always give the
 * same delay. Exponential and linear schedules are non-decreasing and never
 * exceed `maxMs`.
 */

import type { BackoffSpec } from './types.js'

/**
 * Delay before retry number `retry` (0-based: first retry = 0).
 */
export function computeBackoffDelay(backoff: BackoffSpec, retry: number): number {
  const n = Math.max(0, Math.floor(retry))
  switch (backoff.type) {
    case 'fixed':
      return backoff.delayMs
    case 'exponential':
      return Math.min(backoff.maxMs, backoff.initialMs * Math.pow(backoff.factor, n))
    case 'linear':
      return Math.min(backoff.maxMs, backoff.initialMs + backoff.incrementMs * n)
  }
}

/** The first `count` delays of a schedule */
export function backoffSchedule(backoff: BackoffSpec, count: number): number[] {
  return Array.from({ length: Math.max(0, count) }, (_, retry) => computeBackoffDelay(backoff, retry))
}
