/**
 * Translate the snake_case configuration document into the option objects
 * each module takes.
 */

import type { PriorityWeights } from '../block-graph/block-graph.js'
import type { BranchWeights, MergeMode } from '../branch-coordinator/types.js'
import type { ChunkerOptions } from '../chunker/adaptive-chunker.js'
import { DEFAULT_RECOVERY_POLICIES } from '../recovery/policies.js'
import type { BackoffSpec, FallbackAction, RecoveryPolicy, RecoveryPolicyMap } from '../recovery/types.js'
import type { ResourceMonitorOptions } from '../resource-monitor/resource-monitor.js'
import type { SchedulerOptions } from '../scheduler/types.js'
import {
  RecoveryPolicyKeySchema,
  type BackoffSettings,
  type BlocksmithConfig,
  type FallbackSettings,
  type RecoveryPolicySettings,
} from './config-schema.js'

const MB = 1024 * 1024

export function toSchedulerOptions(config: BlocksmithConfig): SchedulerOptions {
  return {
    maxParallel: config.scheduler.max_parallel,
    timeoutMultiplier: config.scheduler.timeout_multiplier,
    minTimeoutMs: config.scheduler.min_timeout_ms,
  }
}

export function toPriorityWeights(config: BlocksmithConfig): PriorityWeights {
  const w = config.scheduler.priority_weights
  return {
    criticalPathBonus: w.critical_path_bonus,
    dependentBonus: w.dependent_bonus,
    softDependentBonus: w.soft_dependent_bonus,
    riskWeight: w.risk_weight,
    securityBonus: w.security_bonus,
  }
}

export function toResourceMonitorOptions(config: BlocksmithConfig): ResourceMonitorOptions {
  const r = config.resources
  return {
    limits: {
      memoryBytes: r.memory_limit_mb * MB,
      cpuPercent: r.cpu_limit_percent,
      diskBytes: r.disk_limit_mb * MB,
    },
    warningThresholdPercent: r.warning_threshold_percent,
    sampleIntervalMs: r.sample_interval_ms,
  }
}

export function toChunkerOptions(config: BlocksmithConfig): ChunkerOptions {
  const c = config.chunking
  return {
    initialChunkSize: c.initial_chunk_size,
    minChunkSize: c.min_chunk_size,
    maxChunkSize: c.max_chunk_size,
    overlap: c.overlap,
    adjustmentFactor: c.adjustment_factor,
    targetMemoryPercent: c.target_memory_percent,
  }
}

function toBackoff(backoff: BackoffSettings): BackoffSpec {
  switch (backoff.type) {
    case 'fixed':
      return { type: 'fixed', delayMs: backoff.delay_ms }
    case 'exponential':
      return { type: 'exponential', initialMs: backoff.initial_ms, factor: backoff.factor, maxMs: backoff.max_ms }
    case 'linear':
      return {
        type: 'linear',
        initialMs: backoff.initial_ms,
        incrementMs: backoff.increment_ms,
        maxMs: backoff.max_ms,
      }
  }
}

function toFallback(fallback: FallbackSettings): FallbackAction {
  if (fallback.type === 'use_alternate') return { type: 'use_alternate', alternateId: fallback.alternate_id }
  return { type: fallback.type }
}

function toPolicy(settings: RecoveryPolicySettings): RecoveryPolicy {
  return {
    maxRetries: settings.max_retries,
    backoff: toBackoff(settings.backoff),
    fallback: toFallback(settings.fallback),
  }
}

/** Configured policies layered over the built-in table (unless disabled) */
export function toRecoveryPolicies(config: BlocksmithConfig): RecoveryPolicyMap {
  const policies: RecoveryPolicyMap = config.recovery.use_builtin_policies ? { ...DEFAULT_RECOVERY_POLICIES } : {}
  for (const key of RecoveryPolicyKeySchema.options) {
    const settings = config.recovery.policies[key]
    if (settings !== undefined) policies[key] = toPolicy(settings)
  }
  return policies
}

export function toBranchWeights(config: BlocksmithConfig): BranchWeights {
  return { ...config.branches.weights }
}

export function toMergeMode(config: BlocksmithConfig): MergeMode {
  return config.branches.merge_mode
}
