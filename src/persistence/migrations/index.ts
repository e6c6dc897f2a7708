/**
 * Migration runner for the checkpoint database.
 *
 * Applied versions are recorded in `schema_migrations`; each pending
 * migration runs inside its own transaction together with that record, so a
 * failed migration leaves no trace and is retried on the next open.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { checkpointSchemaMigration } from './001-checkpoint-schema.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  /** Unique, increasing version number */
  version: number
  name: string
  /** Must be idempotent */
  up(db: BetterSqlite3Database): void
}

// Registered migrations, in version order
const MIGRATIONS: Migration[] = [checkpointSchemaMigration]

/** Versions recorded as applied, ascending */
export function appliedMigrationVersions(db: BetterSqlite3Database): number[] {
  const rows = db.prepare('SELECT version FROM schema_migrations ORDER BY version').all() as {
    version: number
  }[]
  return rows.map((row) => row.version)
}

/**
 * Create `schema_migrations` if needed and apply every pending migration.
 * Safe to call repeatedly.
 */
export function runMigrations(db: BetterSqlite3Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const applied = new Set(appliedMigrationVersions(db))
  const pending = MIGRATIONS.filter((m) => !applied.has(m.version)).sort((a, b) => a.version - b.version)
  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return
  }

  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, migration.name)
    })()
    logger.info({ version: migration.version, name: migration.name }, 'Migration applied')
  }
}
