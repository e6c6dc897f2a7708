/**
 * Checkpointed scheduler state. Artifacts travel beside the state in the
 * checkpoint's artifact snapshot, not inside it.
 */

import { z } from 'zod'

export const BlockStatusSchema = z.enum([
  'not_started',
  'ready',
  'blocked',
  'in_progress',
  'completed',
  'completed_with_issues',
  'failed',
  'deferred',
])

export const BlockStateSnapshotSchema = z
  .object({
    status: BlockStatusSchema,
    reason: z.string(),
    attempts: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
  })
  .strict()

export const SchedulerSnapshotSchema = z
  .object({
    runId: z.string(),
    blocks: z.record(z.string(), BlockStateSnapshotSchema),
    executionOrder: z.array(z.string()),
  })
  .strict()

export type SchedulerSnapshot = z.infer<typeof SchedulerSnapshotSchema>
