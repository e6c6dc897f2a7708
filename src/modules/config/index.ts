/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  BlocksmithConfigSchema,
  PartialBlocksmithConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type { BlocksmithConfig, PartialBlocksmithConfig } from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export {
  toBranchWeights,
  toChunkerOptions,
  toMergeMode,
  toPriorityWeights,
  toRecoveryPolicies,
  toResourceMonitorOptions,
  toSchedulerOptions,
} from './config-mapping.js'
export { isVersionSupported, formatUnsupportedVersionError } from './version-utils.js'
