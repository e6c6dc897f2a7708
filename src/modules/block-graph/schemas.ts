/**
 * Zod schemas for plan files (YAML or JSON).
 *
 * A plan file lists implementation blocks keyed by id. Each block names its
 * prerequisites under `depends_on`, either as a bare id (a
 * `required_before` edge) or as `{ block, kind }`.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Supported plan versions
// ---------------------------------------------------------------------------

export const SUPPORTED_PLAN_VERSIONS = ['1', '1.0'] as const

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

export const DependencyKindSchema = z.enum([
  'required_before',
  'required_for_completion',
  'influences',
  'provides_information',
  'alternative',
])

export const DependencyRefSchema = z.union([
  z.string().min(1),
  z
    .object({
      block: z.string().min(1),
      kind: DependencyKindSchema.default('required_before'),
    })
    .strict(),
])

export type DependencyRef = z.infer<typeof DependencyRefSchema>

export const ExecutionStepSchema = z
  .object({
    id: z.string().min(1, 'Step id is required'),
    description: z.string().default(''),
    optional: z.boolean().default(false),
  })
  .strict()

export const BlockDefinitionSchema = z
  .object({
    description: z.string().min(1, 'Block description is required'),
    priority: z.number().default(0),
    risk: z.number().min(0).max(10).default(0),
    security_critical: z.boolean().default(false),
    estimated_effort_ms: z.number().int().positive().default(60_000),
    steps: z.array(ExecutionStepSchema).default([]),
    validation_criteria: z.array(z.string()).default([]),
    depends_on: z.array(DependencyRefSchema).default([]),
  })
  .strict()

export type BlockDefinition = z.infer<typeof BlockDefinitionSchema>

// ---------------------------------------------------------------------------
// PlanFileSchema
// ---------------------------------------------------------------------------

export const PlanFileSchema = z.object({
  version: z.string().superRefine((v, ctx) => {
    if (!(SUPPORTED_PLAN_VERSIONS as readonly string[]).includes(v)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Plan version '${v}' is not supported. Supported versions: ${SUPPORTED_PLAN_VERSIONS.join(', ')}`,
      })
    }
  }),
  name: z.string().min(1).default('plan'),
  blocks: z.record(z.string().min(1), BlockDefinitionSchema),
})

export type PlanFile = z.infer<typeof PlanFileSchema>
