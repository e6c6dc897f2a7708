export type { BlockGraph, BuildBlockGraphOptions, CriticalPath, PriorityWeights } from './block-graph.js'
export { buildBlockGraph, compareByPriority, DEFAULT_PRIORITY_WEIGHTS } from './block-graph.js'
export type { BlockState } from './block-state.js'
export { VALID_BLOCK_TRANSITIONS, canTransition, transitionBlock } from './block-state.js'
export { detectGatingCycle, validateReferences } from './dependency-resolver.js'
export type { BlockPlan, PlanFormat } from './block-parser.js'
export {
  DEFAULT_STEP_ID,
  detectPlanFormat,
  loadPlanFile,
  parsePlanString,
  readPlanFile,
  toBlockPlan,
} from './block-parser.js'
export type { BlockDefinition, DependencyRef, PlanFile } from './schemas.js'
export { PlanFileSchema, SUPPORTED_PLAN_VERSIONS } from './schemas.js'
