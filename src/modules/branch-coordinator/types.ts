/**
 * Branch coordinator types.
 */

import type { Artifact, BranchId } from '../../core/types.js'
import type { BlockPlan } from '../block-graph/block-parser.js'
import type { RunReport } from '../scheduler/types.js'

// ---------------------------------------------------------------------------
// Branch
// ---------------------------------------------------------------------------

export type BranchStatus =
  | 'created'
  | 'implementing'
  | 'implemented'
  | 'failed'
  | 'evaluated'
  | 'selected'
  | 'rejected'

export const VALID_BRANCH_TRANSITIONS: Record<BranchStatus, readonly BranchStatus[]> = {
  created: ['implementing'],
  implementing: ['implemented', 'failed'],
  implemented: ['evaluated'],
  evaluated: ['selected', 'rejected'],
  failed: [],
  selected: [],
  rejected: [],
}

/** A candidate approach handed to spawn() */
export interface BranchApproach {
  /** Defaults to `branch-<n>` in spawn order */
  id?: BranchId
  /** Human-readable description of the strategy */
  approach: string
  plan: BlockPlan
}

export interface BranchMetrics {
  quality: number
  functionality: number
  performance: number
  maintainability: number
  overallScore: number
}

export interface ImplementationBranch {
  id: BranchId
  approach: string
  plan: BlockPlan
  status: BranchStatus
  /** Checkpoint lineage of this branch's scheduler run */
  lineage: string
  metrics: BranchMetrics | null
  report: RunReport | null
  /** Why the branch failed, if it did */
  error: string | null
}

// ---------------------------------------------------------------------------
// Scoring
// ---------------------------------------------------------------------------

export interface BranchWeights {
  quality: number
  functionality: number
  performance: number
  maintainability: number
}

/** Baseline file contents, keyed by path */
export type Baseline = Readonly<Record<string, string>>

export interface BranchScores {
  quality: number
  functionality: number
  performance: number
  maintainability: number
  /** Per-file component score, used by selective merge */
  components: Record<string, number>
}

/** Computes the four subscores of an implemented branch, each in [0, 1] */
export interface BranchScorer {
  score(branch: ImplementationBranch, baseline: Baseline): BranchScores
}

export interface BranchEvaluation {
  branchId: BranchId
  metrics: BranchMetrics
  components: Record<string, number>
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export type MergeMode = 'single' | 'selective'

/** Two branches changed the same region of a file differently */
export interface FileConflict {
  path: string
  /** Baseline content, or null for a file the baseline does not have */
  base: string | null
  ours: { branchId: BranchId; content: string }
  theirs: { branchId: BranchId; content: string }
}

/** Returns the resolved file content, or null to leave the conflict unresolved */
export type ConflictResolver = (conflict: FileConflict) => string | null

export interface MergeOptions {
  mode: MergeMode
  resolver?: ConflictResolver
}

export interface MergedFile {
  path: string
  content: string
  /** Branch whose version of the file was adopted */
  source: BranchId
  /** Other branches whose edits were folded in or resolved into the file */
  contributors: BranchId[]
}

export interface MergeResult {
  mode: MergeMode
  /** Branches retained by the merge decision */
  selected: BranchId[]
  files: MergedFile[]
  /** Conflicts settled by the resolver */
  resolvedConflicts: FileConflict[]
}

export interface BranchComparison {
  branchA: BranchId
  branchB: BranchId
  common: Artifact[]
  uniqueToA: Artifact[]
  uniqueToB: Artifact[]
  conflicts: Array<{ path: string; a: Artifact; b: Artifact }>
}

export interface ExplorationResult {
  branches: ImplementationBranch[]
  evaluation: BranchEvaluation[]
  merge: MergeResult
}
