/**
 * `blocksmith validate` command
 *
 * Parses a plan file, builds its block graph and prints the execution layers,
 * the critical path and each block's effective priority.
 *
 * Usage:
 *   blocksmith validate plan.yaml                         Human-readable summary
 *   blocksmith validate plan.yaml --output-format json    Machine-readable summary
 *
 * Exit codes:
 *   0  plan is valid
 *   1  unexpected system error
 *   2  parse error or structural error (cycle, unknown or duplicate block)
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { OrchestrationError, PlanParseError } from '../../core/errors.js'
import { buildBlockGraph, type BlockGraph } from '../../modules/block-graph/block-graph.js'
import { loadPlanFile, type BlockPlan } from '../../modules/block-graph/block-parser.js'
import { formatTable } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const VALIDATE_EXIT_SUCCESS = 0
export const VALIDATE_EXIT_ERROR = 1
export const VALIDATE_EXIT_USAGE_ERROR = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OutputFormat = 'human' | 'json'

export interface ValidateActionOptions {
  filePath: string
  outputFormat: OutputFormat
}

export interface PlanSummary {
  name: string
  blockCount: number
  dependencyCount: number
  layers: string[][]
  criticalPath: { path: string[]; totalEffortMs: number }
  priorities: Record<string, number>
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function summarizePlan(plan: BlockPlan, graph: BlockGraph): PlanSummary {
  const priorities: Record<string, number> = {}
  for (const id of graph.topologicalOrder()) {
    priorities[id] = graph.priority(id)
  }
  return {
    name: plan.name,
    blockCount: plan.blocks.length,
    dependencyCount: plan.dependencies.length,
    layers: graph.layers(),
    criticalPath: graph.criticalPath(),
    priorities,
  }
}

export function renderHuman(summary: PlanSummary): string {
  const lines: string[] = []
  lines.push(`Plan "${summary.name}": ${String(summary.blockCount)} block(s), ${String(summary.dependencyCount)} dependency edge(s)`)
  lines.push('')
  lines.push('Layers:')
  summary.layers.forEach((layer, index) => {
    lines.push(`  ${String(index)}: ${layer.join(', ')}`)
  })
  lines.push('')
  const path = summary.criticalPath.path.length > 0 ? summary.criticalPath.path.join(' -> ') : '(empty)'
  lines.push(`Critical path: ${path} (${String(summary.criticalPath.totalEffortMs)} ms)`)
  lines.push('')

  const rows = Object.entries(summary.priorities).map(([block, priority]) => ({
    block,
    priority: String(priority),
  }))
  lines.push(
    formatTable(
      [
        { header: 'Block', key: 'block' },
        { header: 'Priority', key: 'priority', align: 'right' },
      ],
      rows,
    ),
  )
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// runValidateAction: testable core logic
// ---------------------------------------------------------------------------

export async function runValidateAction(options: ValidateActionOptions): Promise<number> {
  const { filePath, outputFormat } = options

  if (!existsSync(filePath)) {
    process.stderr.write(`Error: Plan file not found: ${filePath}\n`)
    return VALIDATE_EXIT_USAGE_ERROR
  }

  let summary: PlanSummary
  try {
    const plan = loadPlanFile(filePath)
    const graph = buildBlockGraph(plan.blocks, plan.dependencies)
    summary = summarizePlan(plan, graph)
  } catch (err) {
    if (err instanceof PlanParseError) {
      process.stderr.write(`Error: Failed to parse plan file: ${filePath}\n${err.message}\n`)
      return VALIDATE_EXIT_USAGE_ERROR
    }
    if (err instanceof OrchestrationError && err.category === 'structural') {
      process.stderr.write(`Error: ${err.message}\n`)
      return VALIDATE_EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    return VALIDATE_EXIT_ERROR
  }

  if (outputFormat === 'json') {
    process.stdout.write(JSON.stringify(summary, null, 2) + '\n')
  } else {
    process.stdout.write(renderHuman(summary) + '\n')
  }
  return VALIDATE_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <plan-file>')
    .description('Check a plan file and show its layers, critical path and priorities')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (filePath: string, opts: { outputFormat: string }) => {
      const exitCode = await runValidateAction({
        filePath,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
      })
      process.exitCode = exitCode
    })
}
