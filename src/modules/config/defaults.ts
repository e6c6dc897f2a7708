/**
 * Built-in default values for the Blocksmith configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type {
  BlocksmithConfig,
  BranchSettings,
  ChunkingSettings,
  CheckpointSettings,
  GlobalSettings,
  RecoverySettings,
  ResourceSettings,
  SchedulerSettings,
} from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'info',
  data_dir: '.blocksmith',
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  max_parallel: 4,
  timeout_multiplier: 3,
  min_timeout_ms: 0,
  priority_weights: {
    critical_path_bonus: 10,
    dependent_bonus: 2,
    soft_dependent_bonus: 1,
    risk_weight: 1,
    security_bonus: 5,
  },
}

export const DEFAULT_CHECKPOINT_SETTINGS: CheckpointSettings = {
  max_checkpoints: 50,
  database_file: 'checkpoints.db',
}

export const DEFAULT_RESOURCE_SETTINGS: ResourceSettings = {
  memory_limit_mb: 2_048,
  cpu_limit_percent: 90,
  disk_limit_mb: 1_048_576,
  warning_threshold_percent: 90,
  sample_interval_ms: 1_000,
}

export const DEFAULT_CHUNKING_SETTINGS: ChunkingSettings = {
  initial_chunk_size: 4_096,
  min_chunk_size: 512,
  max_chunk_size: 65_536,
  overlap: 64,
  adjustment_factor: 0.5,
  target_memory_percent: 80,
}

export const DEFAULT_RECOVERY_SETTINGS: RecoverySettings = {
  use_builtin_policies: true,
  policies: {},
}

export const DEFAULT_BRANCH_SETTINGS: BranchSettings = {
  max_parallel_paths: 2,
  merge_mode: 'single',
  weights: {
    quality: 0.3,
    functionality: 0.3,
    performance: 0.2,
    maintainability: 0.2,
  },
}

export const DEFAULT_CONFIG: BlocksmithConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  scheduler: DEFAULT_SCHEDULER_SETTINGS,
  checkpoints: DEFAULT_CHECKPOINT_SETTINGS,
  resources: DEFAULT_RESOURCE_SETTINGS,
  chunking: DEFAULT_CHUNKING_SETTINGS,
  recovery: DEFAULT_RECOVERY_SETTINGS,
  branches: DEFAULT_BRANCH_SETTINGS,
}
