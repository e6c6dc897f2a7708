export { BranchCoordinator, createBranchCoordinator } from './branch-coordinator.js'
export type { BranchCoordinatorDeps } from './branch-coordinator.js'
export { applyRegions, compareBranches, diffRegion, mergeSelective, mergeSingle, regionsOverlap } from './merge.js'
export type { EditRegion, MergeCandidate } from './merge.js'
export {
  DEFAULT_BRANCH_WEIGHTS,
  changeSizeScore,
  createHeuristicScorer,
  overallScore,
  rankEvaluations,
} from './scoring.js'
export { VALID_BRANCH_TRANSITIONS } from './types.js'
export type {
  Baseline,
  BranchApproach,
  BranchComparison,
  BranchEvaluation,
  BranchMetrics,
  BranchScorer,
  BranchScores,
  BranchStatus,
  BranchWeights,
  ConflictResolver,
  ExplorationResult,
  FileConflict,
  ImplementationBranch,
  MergeMode,
  MergeOptions,
  MergeResult,
  MergedFile,
} from './types.js'
