#!/usr/bin/env node
/**
 * Blocksmith CLI - Main entry point
 * Provides the `blocksmith` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { realpathSync } from 'fs'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerValidateCommand } from './commands/validate.js'
import { registerCheckpointsCommand } from './commands/checkpoints.js'
import { registerConfigCommand } from './commands/config.js'

const logger = createLogger('cli')

/** Resolve the package version relative to this file (src/ or dist/src/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [resolve(here, '../../package.json'), resolve(here, '../../../package.json')]

  for (const pkgPath of candidates) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = JSON.parse(content) as { version?: string; name?: string }
    if (pkg.name === 'blocksmith' && pkg.version !== undefined) {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('blocksmith')
    .description('Blocksmith - dependency-aware implementation orchestration')
    .version(version, '-v, --version', 'Output the current version')

  registerValidateCommand(program)
  registerCheckpointsCommand(program)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Only run when executed directly, not when imported by tests
const entry = process.argv[1]
if (entry !== undefined && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  void main()
}
