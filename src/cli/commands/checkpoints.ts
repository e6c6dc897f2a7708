/**
 * `blocksmith checkpoints` command group
 *
 * Subcommands:
 *   - `blocksmith checkpoints list [--lineage <name>]`   checkpoint metadata, oldest first
 *   - `blocksmith checkpoints show <id> [--state]`       one checkpoint with its artifacts
 *
 * The database is found through the merged configuration:
 * `<project-root>/<global.data_dir>/<checkpoints.database_file>`.
 */

import type { Command } from 'commander'
import { join } from 'node:path'
import { z } from 'zod'
import { OrchestrationError } from '../../core/errors.js'
import { resolveDatabasePath } from '../../core/orchestrator-impl.js'
import {
  createCheckpointStore,
  toCheckpointMetadata,
  type CheckpointMetadata,
  type LoadedCheckpoint,
} from '../../modules/checkpoint/checkpoint-store.js'
import { createDatabaseService, type DatabaseService } from '../../persistence/database.js'
import { getCheckpoint, listCheckpoints } from '../../persistence/queries/checkpoints.js'
import {
  CLI_EXIT_ERROR,
  CLI_EXIT_INVALID,
  CLI_EXIT_SUCCESS,
  loadCliConfig,
  type ConfigSourceOptions,
} from '../utils/config-loader.js'
import { formatTable } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CheckpointsCommandOptions extends ConfigSourceOptions {
  /** Directory the data directory is resolved against (default: cwd) */
  projectRoot?: string
  outputFormat?: 'human' | 'json'
}

export interface CheckpointsListOptions extends CheckpointsCommandOptions {
  lineage?: string
}

export interface CheckpointsShowOptions extends CheckpointsCommandOptions {
  /** Include the serialized run state in the output */
  state?: boolean
}

// ---------------------------------------------------------------------------
// Database access
// ---------------------------------------------------------------------------

async function withDatabase(
  opts: CheckpointsCommandOptions,
  fn: (database: DatabaseService, maxCheckpoints: number) => number,
): Promise<number> {
  const projectRoot = opts.projectRoot ?? process.cwd()
  const loaded = await loadCliConfig({
    projectConfigDir: opts.projectConfigDir ?? join(projectRoot, '.blocksmith'),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  if (!loaded.ok) return loaded.exitCode

  const config = loaded.system.getConfig()
  const database = createDatabaseService(resolveDatabasePath(config, projectRoot))
  try {
    await database.initialize()
    return fn(database, config.checkpoints.max_checkpoints)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Error: ${message}\n`)
    return err instanceof OrchestrationError && err.category === 'persistence' ? CLI_EXIT_INVALID : CLI_EXIT_ERROR
  } finally {
    await database.shutdown()
  }
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function renderCheckpointTable(checkpoints: readonly CheckpointMetadata[]): string {
  const rows = checkpoints.map((c) => ({
    id: c.id,
    lineage: c.lineage,
    sequence: String(c.sequence),
    reason: c.reason,
    createdAt: c.createdAt,
  }))
  return formatTable(
    [
      { header: 'ID', key: 'id' },
      { header: 'Lineage', key: 'lineage' },
      { header: 'Seq', key: 'sequence', align: 'right' },
      { header: 'Reason', key: 'reason' },
      { header: 'Created', key: 'createdAt' },
    ],
    rows,
  )
}

export function renderCheckpointDetail(checkpoint: LoadedCheckpoint<unknown>, includeState: boolean): string {
  const { metadata, artifacts } = checkpoint
  const lines = [
    `Checkpoint: ${metadata.id}`,
    `Lineage:    ${metadata.lineage} (#${String(metadata.sequence)})`,
    `Reason:     ${metadata.reason}`,
    `Created:    ${metadata.createdAt}`,
  ]
  if (metadata.summary !== null) lines.push(`Summary:    ${metadata.summary}`)
  lines.push(`Artifacts:  ${String(artifacts.length)}`)
  for (const artifact of artifacts) {
    lines.push(`  ${artifact.path} (${artifact.blockId}/${artifact.stepId})`)
  }
  if (includeState) {
    lines.push('', 'State:', JSON.stringify(checkpoint.state, null, 2))
  }
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export async function runCheckpointsList(opts: CheckpointsListOptions = {}): Promise<number> {
  return withDatabase(opts, (database) => {
    const checkpoints = listCheckpoints(database.db, opts.lineage).map(toCheckpointMetadata)

    if (opts.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(checkpoints, null, 2) + '\n')
    } else if (checkpoints.length === 0) {
      process.stdout.write('No checkpoints found.\n')
    } else {
      process.stdout.write(renderCheckpointTable(checkpoints) + '\n')
    }
    return CLI_EXIT_SUCCESS
  })
}

export async function runCheckpointsShow(id: string, opts: CheckpointsShowOptions = {}): Promise<number> {
  return withDatabase(opts, (database, maxCheckpoints) => {
    const row = getCheckpoint(database.db, id)
    if (row === undefined) {
      process.stderr.write(`Error: Checkpoint not found: ${id}\n`)
      return CLI_EXIT_INVALID
    }

    const store = createCheckpointStore(database.db, {
      lineage: row.lineage,
      maxCheckpoints,
      schema: z.unknown(),
    })
    const checkpoint = store.load(id)

    if (opts.outputFormat === 'json') {
      const payload = opts.state === true ? checkpoint : { metadata: checkpoint.metadata, artifacts: checkpoint.artifacts }
      process.stdout.write(JSON.stringify(payload, null, 2) + '\n')
    } else {
      process.stdout.write(renderCheckpointDetail(checkpoint, opts.state === true) + '\n')
    }
    return CLI_EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface SharedFlags {
  projectRoot?: string
  projectConfigDir?: string
  globalConfigDir?: string
  outputFormat: string
}

function sharedOptions(opts: SharedFlags): CheckpointsCommandOptions {
  return {
    ...(opts.projectRoot !== undefined && { projectRoot: opts.projectRoot }),
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
  }
}

export function registerCheckpointsCommand(program: Command): void {
  const checkpointsCmd = program.command('checkpoints').description('Inspect stored run checkpoints')

  checkpointsCmd
    .command('list')
    .description('List checkpoint metadata, oldest first')
    .option('--lineage <name>', 'Only checkpoints of this lineage (e.g. plan:demo)')
    .option('--project-root <dir>', 'Project directory (default: current directory)')
    .option('--project-config-dir <dir>', 'Path to the project .blocksmith/ directory')
    .option('--global-config-dir <dir>', 'Path to the global .blocksmith/ directory')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (opts: SharedFlags & { lineage?: string }) => {
      process.exitCode = await runCheckpointsList({
        ...sharedOptions(opts),
        ...(opts.lineage !== undefined && { lineage: opts.lineage }),
      })
    })

  checkpointsCmd
    .command('show <id>')
    .description('Show one checkpoint and its artifacts')
    .option('--state', 'Include the serialized run state', false)
    .option('--project-root <dir>', 'Project directory (default: current directory)')
    .option('--project-config-dir <dir>', 'Path to the project .blocksmith/ directory')
    .option('--global-config-dir <dir>', 'Path to the global .blocksmith/ directory')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .action(async (id: string, opts: SharedFlags & { state: boolean }) => {
      process.exitCode = await runCheckpointsShow(id, { ...sharedOptions(opts), state: opts.state })
    })
}
