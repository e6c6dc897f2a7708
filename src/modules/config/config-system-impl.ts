/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.blocksmith/config.yaml)
 *     → project config      (./.blocksmith/config.yaml)
 *     → environment vars    (BLOCKSMITH_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import {
  BlocksmithConfigSchema,
  PartialBlocksmithConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type BlocksmithConfig,
  type PartialBlocksmithConfig,
} from './config-schema.js'
import { isVersionSupported, formatUnsupportedVersionError } from './version-utils.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/** Objects merge key by key; anything else in `override` replaces the base value */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const existing = result[key]
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val
  }
  return result
}

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/** BLOCKSMITH_ variables and the config paths they set; scalars only */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  BLOCKSMITH_LOG_LEVEL: 'global.log_level',
  BLOCKSMITH_DATA_DIR: 'global.data_dir',
  BLOCKSMITH_MAX_PARALLEL: 'scheduler.max_parallel',
  BLOCKSMITH_TIMEOUT_MULTIPLIER: 'scheduler.timeout_multiplier',
  BLOCKSMITH_MAX_CHECKPOINTS: 'checkpoints.max_checkpoints',
  BLOCKSMITH_MEMORY_LIMIT_MB: 'resources.memory_limit_mb',
  BLOCKSMITH_MAX_PARALLEL_PATHS: 'branches.max_parallel_paths',
  BLOCKSMITH_MERGE_MODE: 'branches.merge_mode',
}

function coerce(raw: string): string | number | boolean {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

/**
 * Read BLOCKSMITH_* variables into a partial config overlay. Invalid values
 * are logged and the whole overlay is ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialBlocksmithConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue

    const [section, key] = configPath.split('.')
    if (section === undefined || key === undefined) continue
    const existing = overrides[section]
    const target: Record<string, unknown> = isPlainObject(existing) ? existing : {}
    target[key] = coerce(rawValue)
    overrides[section] = target
  }

  const parsed = PartialBlocksmithConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: BlocksmithConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialBlocksmithConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.blocksmith')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.blocksmith')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const layers: PartialBlocksmithConfig[] = []

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) layers.push(globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) layers.push(projectConfig)

    layers.push(readEnvOverrides(this._env))
    layers.push(this._cliOverrides)

    let merged: Record<string, unknown> = DEFAULT_CONFIG
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = BlocksmithConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug({ sources: layers.length }, 'Configuration loaded successfully')
  }

  getConfig(): BlocksmithConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialBlocksmithConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file loads as undefined
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (typeof version === 'string' && !isVersionSupported(version, SUPPORTED_CONFIG_FORMAT_VERSIONS)) {
        throw new ConfigError(formatUnsupportedVersionError(version, SUPPORTED_CONFIG_FORMAT_VERSIONS), {
          filePath,
          version,
        })
      }
    }

    const result = PartialBlocksmithConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
