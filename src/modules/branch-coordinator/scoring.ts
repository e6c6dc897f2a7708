/**
 * Branch scoring: the weighted overall score and the default heuristic scorer.
 *
 * All subscores are in [0, 1]. overallScore() is a pure function of the four
 * subscores and the weights.
 */

import type { BlockStatus } from '../../core/types.js'
import type { Baseline, BranchEvaluation, BranchScorer, BranchScores, BranchWeights } from './types.js'

export const DEFAULT_BRANCH_WEIGHTS: BranchWeights = {
  quality: 0.3,
  functionality: 0.3,
  performance: 0.2,
  maintainability: 0.2,
}

export function overallScore(
  scores: Pick<BranchScores, 'quality' | 'functionality' | 'performance' | 'maintainability'>,
  weights: BranchWeights,
): number {
  return (
    weights.quality * scores.quality +
    weights.functionality * scores.functionality +
    weights.performance * scores.performance +
    weights.maintainability * scores.maintainability
  )
}

/** Highest overall score first, ties by branch id */
export function rankEvaluations(evaluations: readonly BranchEvaluation[]): BranchEvaluation[] {
  return [...evaluations].sort((a, b) => {
    const diff = b.metrics.overallScore - a.metrics.overallScore
    if (diff !== 0) return diff
    return a.branchId < b.branchId ? -1 : a.branchId > b.branchId ? 1 : 0
  })
}

// ---------------------------------------------------------------------------
// Heuristics
// ---------------------------------------------------------------------------

/**
 * Score one file change by its relative size, in [0, 1]: an unchanged file
 * scores 1, and the score falls linearly to 0 once the size change reaches
 * the original's length. Returns null for a file with no original.
 */
export function changeSizeScore(original: string, modified: string): number | null {
  if (original.length === 0) return null
  const ratio = Math.min(1, Math.abs(modified.length - original.length) / original.length)
  return 1 - ratio
}

function statusQuality(status: BlockStatus | undefined): number {
  if (status === 'completed') return 1
  if (status === 'completed_with_issues') return 0.5
  return 0
}

function mean(values: readonly number[], empty: number): number {
  if (values.length === 0) return empty
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/**
 * Default scorer:
 * - quality: mean per block (completed 1, completed with issues 0.5)
 * - functionality: produced artifacts over planned steps
 * - performance: estimated over actual effort, capped at 1
 * - maintainability: mean changeSizeScore() against the baseline
 * - component score of a file: its block's quality × its change-size score
 */
export function createHeuristicScorer(): BranchScorer {
  return {
    score(branch, baseline: Baseline): BranchScores {
      const report = branch.report
      if (report === null) {
        return { quality: 0, functionality: 0, performance: 0, maintainability: 0, components: {} }
      }

      const statusOf = new Map(report.blocks.map((b) => [b.blockId, b.status]))
      const quality = mean(
        report.blocks.map((b) => statusQuality(b.status)),
        0,
      )

      const plannedSteps = branch.plan.blocks.reduce((sum, b) => sum + b.steps.length, 0)
      const functionality = plannedSteps === 0 ? 1 : Math.min(1, report.artifacts.length / plannedSteps)

      const estimated = report.blocks.reduce((sum, b) => sum + b.estimatedEffortMs, 0)
      const actual = report.blocks.reduce((sum, b) => sum + b.durationMs, 0)
      const performance = actual <= estimated ? 1 : estimated / actual

      const changeScores: number[] = []
      const components: Record<string, number> = {}
      for (const artifact of report.artifacts) {
        const original = baseline[artifact.path]
        const change = original === undefined ? null : changeSizeScore(original, artifact.content)
        if (change !== null) changeScores.push(change)
        components[artifact.path] = statusQuality(statusOf.get(artifact.blockId)) * (change ?? 1)
      }

      return {
        quality,
        functionality,
        performance,
        maintainability: mean(changeScores, 1),
        components,
      }
    },
  }
}
