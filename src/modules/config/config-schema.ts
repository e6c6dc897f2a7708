/**
 * Zod validation schemas for the Blocksmith configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - scheduler (pool size, timeouts, priority weights)
 *  - checkpoints
 *  - resource limits
 *  - chunking
 *  - recovery policies
 *  - branch exploration
 */

import { z } from 'zod'
import { ERROR_KINDS } from '../../core/errors.js'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory holding the checkpoint database, relative to the project root */
    data_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export const PriorityWeightsSchema = z
  .object({
    critical_path_bonus: z.number().min(0),
    dependent_bonus: z.number().min(0),
    soft_dependent_bonus: z.number().min(0),
    risk_weight: z.number().min(0),
    security_bonus: z.number().min(0),
  })
  .strict()

export const SchedulerSettingsSchema = z
  .object({
    max_parallel: z.number().int().min(1).max(64),
    timeout_multiplier: z.number().min(0),
    min_timeout_ms: z.number().int().min(0),
    priority_weights: PriorityWeightsSchema,
  })
  .strict()

export type SchedulerSettings = z.infer<typeof SchedulerSettingsSchema>

// ---------------------------------------------------------------------------
// Checkpoints
// ---------------------------------------------------------------------------

export const CheckpointSettingsSchema = z
  .object({
    max_checkpoints: z.number().int().min(1),
    /** SQLite file name inside data_dir */
    database_file: z.string().min(1),
  })
  .strict()

export type CheckpointSettings = z.infer<typeof CheckpointSettingsSchema>

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

export const ResourceSettingsSchema = z
  .object({
    memory_limit_mb: z.number().positive(),
    cpu_limit_percent: z.number().positive().max(100),
    disk_limit_mb: z.number().positive(),
    warning_threshold_percent: z.number().min(0).max(100),
    sample_interval_ms: z.number().int().min(0),
  })
  .strict()

export type ResourceSettings = z.infer<typeof ResourceSettingsSchema>

// ---------------------------------------------------------------------------
// Chunking
// ---------------------------------------------------------------------------

export const ChunkingSettingsSchema = z
  .object({
    initial_chunk_size: z.number().int().min(1),
    min_chunk_size: z.number().int().min(1),
    max_chunk_size: z.number().int().min(1),
    overlap: z.number().int().min(0),
    adjustment_factor: z.number().gt(0).lt(1),
    target_memory_percent: z.number().gt(0).max(100),
  })
  .strict()

export type ChunkingSettings = z.infer<typeof ChunkingSettingsSchema>

// ---------------------------------------------------------------------------
// Recovery
// ---------------------------------------------------------------------------

export const BackoffSettingsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('fixed'), delay_ms: z.number().int().min(0) }).strict(),
  z
    .object({
      type: z.literal('exponential'),
      initial_ms: z.number().int().min(0),
      factor: z.number().min(1),
      max_ms: z.number().int().min(0),
    })
    .strict(),
  z
    .object({
      type: z.literal('linear'),
      initial_ms: z.number().int().min(0),
      increment_ms: z.number().int().min(0),
      max_ms: z.number().int().min(0),
    })
    .strict(),
])

export type BackoffSettings = z.infer<typeof BackoffSettingsSchema>

export const FallbackSettingsSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('skip') }).strict(),
  z.object({ type: z.literal('simplify') }).strict(),
  z.object({ type: z.literal('revert') }).strict(),
  z.object({ type: z.literal('use_alternate'), alternate_id: z.string().min(1) }).strict(),
  z.object({ type: z.literal('subdivide') }).strict(),
  z.object({ type: z.literal('abort') }).strict(),
])

export type FallbackSettings = z.infer<typeof FallbackSettingsSchema>

export const RecoveryPolicySettingsSchema = z
  .object({
    max_retries: z.number().int().min(0).max(20),
    backoff: BackoffSettingsSchema,
    fallback: FallbackSettingsSchema,
  })
  .strict()

export type RecoveryPolicySettings = z.infer<typeof RecoveryPolicySettingsSchema>

/** Policies may be keyed by an error kind or by a whole category */
export const RecoveryPolicyKeySchema = z.enum([
  ...ERROR_KINDS,
  'structural',
  'resource',
  'execution',
  'persistence',
  'merge',
  'config',
])

export type RecoveryPolicyKey = z.infer<typeof RecoveryPolicyKeySchema>

export const RecoverySettingsSchema = z
  .object({
    /** Start from the built-in policy table; false leaves only `policies` */
    use_builtin_policies: z.boolean(),
    policies: z.record(RecoveryPolicyKeySchema, RecoveryPolicySettingsSchema),
  })
  .strict()

export type RecoverySettings = z.infer<typeof RecoverySettingsSchema>

// ---------------------------------------------------------------------------
// Branches
// ---------------------------------------------------------------------------

export const BranchWeightsSchema = z
  .object({
    quality: z.number().min(0),
    functionality: z.number().min(0),
    performance: z.number().min(0),
    maintainability: z.number().min(0),
  })
  .strict()

export const BranchSettingsSchema = z
  .object({
    max_parallel_paths: z.number().int().min(1).max(32),
    merge_mode: z.enum(['single', 'selective']),
    weights: BranchWeightsSchema,
  })
  .strict()

export type BranchSettings = z.infer<typeof BranchSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

/** All config format versions this toolkit can read and validate */
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

export const BlocksmithConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    scheduler: SchedulerSettingsSchema,
    checkpoints: CheckpointSettingsSchema,
    resources: ResourceSettingsSchema,
    chunking: ChunkingSettingsSchema,
    recovery: RecoverySettingsSchema,
    branches: BranchSettingsSchema,
  })
  .strict()
  .superRefine((config, ctx) => {
    const { min_chunk_size, max_chunk_size, initial_chunk_size, overlap } = config.chunking
    if (min_chunk_size > max_chunk_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'min_chunk_size'],
        message: 'must not exceed max_chunk_size',
      })
    }
    if (initial_chunk_size < min_chunk_size || initial_chunk_size > max_chunk_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'initial_chunk_size'],
        message: 'must lie within [min_chunk_size, max_chunk_size]',
      })
    }
    if (overlap >= min_chunk_size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chunking', 'overlap'],
        message: 'must be below min_chunk_size',
      })
    }
  })

export type BlocksmithConfig = z.infer<typeof BlocksmithConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env overlays and CLI overrides)
// ---------------------------------------------------------------------------

export const PartialBlocksmithConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    scheduler: SchedulerSettingsSchema.extend({
      priority_weights: PriorityWeightsSchema.partial(),
    })
      .partial()
      .optional(),
    checkpoints: CheckpointSettingsSchema.partial().optional(),
    resources: ResourceSettingsSchema.partial().optional(),
    chunking: ChunkingSettingsSchema.partial().optional(),
    recovery: RecoverySettingsSchema.partial().optional(),
    branches: BranchSettingsSchema.extend({ weights: BranchWeightsSchema.partial() }).partial().optional(),
  })
  .strict()

export type PartialBlocksmithConfig = z.infer<typeof PartialBlocksmithConfigSchema>
