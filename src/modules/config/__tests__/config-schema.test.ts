/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  BlocksmithConfigSchema,
  PartialBlocksmithConfigSchema,
  RecoverySettingsSchema,
  type BlocksmithConfig,
} from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

function withChunking(overrides: Partial<BlocksmithConfig['chunking']>): BlocksmithConfig {
  return { ...DEFAULT_CONFIG, chunking: { ...DEFAULT_CONFIG.chunking, ...overrides } }
}

// ---------------------------------------------------------------------------
// BlocksmithConfigSchema
// ---------------------------------------------------------------------------

describe('BlocksmithConfigSchema', () => {
  it('accepts the built-in default config', () => {
    expect(BlocksmithConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('requires config_format_version', () => {
    const { config_format_version: _, ...rest } = DEFAULT_CONFIG
    expect(BlocksmithConfigSchema.safeParse(rest).success).toBe(false)
  })

  it('rejects unknown sections and unknown keys', () => {
    expect(BlocksmithConfigSchema.safeParse({ ...DEFAULT_CONFIG, extra: {} }).success).toBe(false)
    expect(
      BlocksmithConfigSchema.safeParse({
        ...DEFAULT_CONFIG,
        scheduler: { ...DEFAULT_CONFIG.scheduler, workers: 3 },
      }).success,
    ).toBe(false)
  })

  it('rejects a pool size of zero', () => {
    const result = BlocksmithConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      scheduler: { ...DEFAULT_CONFIG.scheduler, max_parallel: 0 },
    })
    expect(result.success).toBe(false)
  })

  it('checks chunk bounds against each other', () => {
    const inverted = BlocksmithConfigSchema.safeParse(withChunking({ min_chunk_size: 8_192, max_chunk_size: 1_024 }))
    expect(inverted.success).toBe(false)
    if (!inverted.success) {
      expect(inverted.error.issues.map((i) => i.path.join('.'))).toContain('chunking.min_chunk_size')
    }

    const overlap = BlocksmithConfigSchema.safeParse(withChunking({ overlap: 512 }))
    expect(overlap.success).toBe(false)
    if (!overlap.success) {
      expect(overlap.error.issues.map((i) => i.path.join('.'))).toEqual(['chunking.overlap'])
    }
  })

  it('requires adjustment_factor strictly between 0 and 1', () => {
    expect(BlocksmithConfigSchema.safeParse(withChunking({ adjustment_factor: 1 })).success).toBe(false)
    expect(BlocksmithConfigSchema.safeParse(withChunking({ adjustment_factor: 0.75 })).success).toBe(true)
  })
})

// ---------------------------------------------------------------------------
// Recovery settings
// ---------------------------------------------------------------------------

describe('RecoverySettingsSchema', () => {
  it('accepts policies keyed by error kind or category', () => {
    const result = RecoverySettingsSchema.safeParse({
      use_builtin_policies: true,
      policies: {
        timeout: { max_retries: 2, backoff: { type: 'fixed', delay_ms: 100 }, fallback: { type: 'abort' } },
        persistence: {
          max_retries: 1,
          backoff: { type: 'linear', initial_ms: 10, increment_ms: 10, max_ms: 50 },
          fallback: { type: 'skip' },
        },
      },
    })
    expect(result.success).toBe(true)
  })

  it('rejects an unknown policy key', () => {
    const result = RecoverySettingsSchema.safeParse({
      use_builtin_policies: true,
      policies: { flaky: { max_retries: 1, backoff: { type: 'fixed', delay_ms: 0 }, fallback: { type: 'skip' } } },
    })
    expect(result.success).toBe(false)
  })

  it('requires an alternate id for use_alternate', () => {
    const result = RecoverySettingsSchema.safeParse({
      use_builtin_policies: false,
      policies: {
        build_error: { max_retries: 0, backoff: { type: 'fixed', delay_ms: 0 }, fallback: { type: 'use_alternate' } },
      },
    })
    expect(result.success).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// PartialBlocksmithConfigSchema
// ---------------------------------------------------------------------------

describe('PartialBlocksmithConfigSchema', () => {
  it('accepts an empty document', () => {
    expect(PartialBlocksmithConfigSchema.safeParse({}).success).toBe(true)
  })

  it('accepts a single nested weight', () => {
    const result = PartialBlocksmithConfigSchema.safeParse({ branches: { weights: { quality: 0.5 } } })
    expect(result.success).toBe(true)
  })

  it('still rejects unknown keys', () => {
    expect(PartialBlocksmithConfigSchema.safeParse({ global: { colour: 'red' } }).success).toBe(false)
  })
})
