/**
 * `blocksmith config` command group
 *
 * Subcommands:
 *   - `blocksmith config show`        display the merged configuration
 *   - `blocksmith config get <key>`   print one value by dot-notation key
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import {
  CLI_EXIT_INVALID,
  CLI_EXIT_SUCCESS,
  loadCliConfig,
  type ConfigSourceOptions,
} from '../utils/config-loader.js'

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigSourceOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const loaded = await loadCliConfig(opts)
  if (!loaded.ok) return loaded.exitCode

  const config = loaded.system.getConfig()
  if ((opts.format ?? 'yaml') === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    process.stdout.write(yaml.dump(config))
  }
  return CLI_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigSourceOptions = {}): Promise<number> {
  const loaded = await loadCliConfig(opts)
  if (!loaded.ok) return loaded.exitCode

  const value = loaded.system.get(key)
  if (value === undefined) {
    process.stderr.write(`Error: Unknown configuration key: ${key}\n`)
    return CLI_EXIT_INVALID
  }
  const rendered = typeof value === 'object' && value !== null ? yaml.dump(value) : `${String(value)}\n`
  process.stdout.write(rendered)
  return CLI_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface ConfigDirFlags {
  projectConfigDir?: string
  globalConfigDir?: string
}

function sourceOptions(opts: ConfigDirFlags): ConfigSourceOptions {
  return {
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  }
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Inspect the merged blocksmith configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to the project .blocksmith/ directory')
    .option('--global-config-dir <dir>', 'Path to the global .blocksmith/ directory')
    .action(async (opts: ConfigDirFlags & { format: string }) => {
      process.exitCode = await runConfigShow({
        ...sourceOptions(opts),
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value, e.g. scheduler.max_parallel')
    .option('--project-config-dir <dir>', 'Path to the project .blocksmith/ directory')
    .option('--global-config-dir <dir>', 'Path to the global .blocksmith/ directory')
    .action(async (key: string, opts: ConfigDirFlags) => {
      process.exitCode = await runConfigGet(key, sourceOptions(opts))
    })
}
