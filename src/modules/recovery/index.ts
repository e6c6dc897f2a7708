export type {
  BackoffSpec,
  FallbackAction,
  FallbackType,
  RecoverableOperation,
  RecoveryHooks,
  RecoveryOutcome,
  RecoveryPolicy,
  RecoveryPolicyMap,
  RetryInfo,
} from './types.js'
export { computeBackoffDelay, backoffSchedule } from './backoff.js'
export { CONSERVATIVE_POLICY, DEFAULT_RECOVERY_POLICIES } from './policies.js'
export type { AttemptHooks, LatestCheckpointSource, RecoveryManagerOptions } from './recovery-manager.js'
export { RecoveryManager, createRecoveryManager } from './recovery-manager.js'
