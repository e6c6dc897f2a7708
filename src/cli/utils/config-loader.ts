/**
 * Shared configuration loading for CLI commands.
 *
 * Errors are written to stderr and turned into an exit code so each command
 * only has to forward it.
 */

import { ConfigError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli:config')

export const CLI_EXIT_SUCCESS = 0
export const CLI_EXIT_ERROR = 1
export const CLI_EXIT_INVALID = 2

export interface ConfigSourceOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  /** Environment for BLOCKSMITH_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export type LoadedConfigResult =
  | { ok: true; system: ConfigSystem }
  | { ok: false; exitCode: number }

export async function loadCliConfig(opts: ConfigSourceOptions): Promise<LoadedConfigResult> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return { ok: false, exitCode: CLI_EXIT_INVALID }
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`Error loading configuration: ${message}\n`)
    return { ok: false, exitCode: CLI_EXIT_ERROR }
  }

  return { ok: true, system }
}
