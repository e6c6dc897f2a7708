export { createScheduler } from './scheduler-impl.js'
export type { Scheduler, SchedulerDeps } from './scheduler-impl.js'
export { runBlock } from './block-runner.js'
export type { BlockRunContext, BlockRunnerDeps } from './block-runner.js'
export { SchedulerSnapshotSchema, BlockStateSnapshotSchema, BlockStatusSchema } from './snapshot.js'
export type { SchedulerSnapshot } from './snapshot.js'
export { DEFAULT_SCHEDULER_OPTIONS } from './types.js'
export type {
  BlockMessage,
  BlockReport,
  FinishedStatus,
  GenerationCollaborator,
  GenerationMode,
  GenerationRequest,
  RunReport,
  SchedulerOptions,
  ValidationCollaborator,
  ValidationResult,
} from './types.js'
