/**
 * Plan file and string parser.
 *
 * Reads YAML or JSON plan files, validates them against PlanFileSchema and
 * converts them into the block and dependency lists the graph builder takes.
 * Format is chosen by file extension for files, explicitly for strings.
 */

import { readFileSync } from 'node:fs'
import { extname } from 'node:path'
import { load as parseYaml } from 'js-yaml'
import { PlanParseError } from '../../core/errors.js'
import type { BlockDependency, ImplementationBlock } from '../../core/types.js'
import { PlanFileSchema, type PlanFile } from './schemas.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PlanFormat = 'yaml' | 'json'

export interface BlockPlan {
  name: string
  blocks: ImplementationBlock[]
  dependencies: BlockDependency[]
}

/** Step given to blocks whose plan entry lists no steps */
export const DEFAULT_STEP_ID = 'implement'

// ---------------------------------------------------------------------------
// Raw parsing
// ---------------------------------------------------------------------------

export function detectPlanFormat(filePath: string): PlanFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml'
}

/**
 * Parse plan text into an unvalidated object.
 * @throws {PlanParseError} on syntax errors
 */
export function parsePlanString(content: string, format: PlanFormat): unknown {
  try {
    return format === 'json' ? (JSON.parse(content) as unknown) : parseYaml(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new PlanParseError(`${format.toUpperCase()} parse error: ${message}`, { format }, err)
  }
}

/**
 * Read and parse a plan file.
 * @throws {PlanParseError} when the file cannot be read or parsed
 */
export function readPlanFile(filePath: string): unknown {
  let content: string
  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new PlanParseError(`Failed to read plan file: ${message}`, { filePath }, err)
  }

  try {
    return parsePlanString(content, detectPlanFormat(filePath))
  } catch (err) {
    if (err instanceof PlanParseError) {
      throw new PlanParseError(err.message, { ...err.context, filePath }, err.cause)
    }
    throw err
  }
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/**
 * Validate a raw plan object and convert it into blocks and dependencies.
 * Reference and cycle checks happen later, in buildBlockGraph().
 * @throws {PlanParseError} listing every schema issue
 */
export function toBlockPlan(raw: unknown): BlockPlan {
  const result = PlanFileSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const at = issue.path.length > 0 ? ` (at ${issue.path.join('.')})` : ''
      return `${issue.message}${at}`
    })
    throw new PlanParseError(`Invalid plan:\n${issues.join('\n')}`, { issues }, result.error)
  }
  return fromPlanFile(result.data)
}

function fromPlanFile(plan: PlanFile): BlockPlan {
  const blocks: ImplementationBlock[] = []
  const dependencies: BlockDependency[] = []

  for (const [id, def] of Object.entries(plan.blocks)) {
    blocks.push({
      id,
      description: def.description,
      priority: def.priority,
      riskFactor: def.risk,
      securityCritical: def.security_critical,
      estimatedEffortMs: def.estimated_effort_ms,
      validationCriteria: def.validation_criteria,
      steps:
        def.steps.length > 0
          ? def.steps
          : [{ id: DEFAULT_STEP_ID, description: def.description, optional: false }],
    })
    for (const ref of def.depends_on) {
      dependencies.push(
        typeof ref === 'string' ? { from: id, to: ref, kind: 'required_before' } : { from: id, to: ref.block, kind: ref.kind },
      )
    }
  }

  return { name: plan.name, blocks, dependencies }
}

/** readPlanFile() followed by toBlockPlan() */
export function loadPlanFile(filePath: string): BlockPlan {
  return toBlockPlan(readPlanFile(filePath))
}
