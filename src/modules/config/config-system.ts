/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { BlocksmithConfig, PartialBlocksmithConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .blocksmith/ directory (default: <cwd>/.blocksmith) */
  projectConfigDir?: string
  /** Path to the global user-level .blocksmith/ directory (default: ~/.blocksmith) */
  globalConfigDir?: string
  /** Highest-priority values, typically populated from CLI flags */
  cliOverrides?: PartialBlocksmithConfig
  /** Environment to read BLOCKSMITH_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * @throws {ConfigError} if any source or the merged result is invalid
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not completed
   */
  getConfig(): BlocksmithConfig

  /**
   * Return a single value by dot-notation key (e.g. "scheduler.max_parallel").
   * @returns the value, or undefined if the key does not exist.
   */
  get(key: string): unknown

  readonly isLoaded: boolean
}
