/**
 * Tests for the migration runner.
 *
 * Validates:
 *  - schema_migrations table is created on first run
 *  - The checkpoint tables and index exist
 *  - Running migrations twice is idempotent
 *  - Deleting a checkpoint cascades to its artifacts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { appliedMigrationVersions, runMigrations } from '../../../src/persistence/migrations/index.js'

function sqliteObject(db: BetterSqlite3Database, type: string, name: string): string | undefined {
  const row = db.prepare('SELECT name FROM sqlite_master WHERE type = ? AND name = ?').get(type, name) as
    | { name: string }
    | undefined
  return row?.name
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
    db.pragma('foreign_keys = ON')
  })

  afterEach(() => {
    db.close()
  })

  it('records migration version 1 after first run', () => {
    runMigrations(db)
    const row = db.prepare('SELECT version, name FROM schema_migrations WHERE version = 1').get() as
      | { version: number; name: string }
      | undefined
    expect(row).toEqual({ version: 1, name: '001-checkpoint-schema' })
  })

  it('creates the checkpoint tables and index', () => {
    runMigrations(db)
    expect(sqliteObject(db, 'table', 'checkpoints')).toBe('checkpoints')
    expect(sqliteObject(db, 'table', 'checkpoint_artifacts')).toBe('checkpoint_artifacts')
    expect(sqliteObject(db, 'index', 'idx_checkpoints_lineage')).toBe('idx_checkpoints_lineage')
  })

  it('does not re-apply already-applied migrations', () => {
    runMigrations(db)
    expect(() => runMigrations(db)).not.toThrow()
    expect(appliedMigrationVersions(db)).toEqual([1])
  })

  it('cascades checkpoint deletion to its artifacts', () => {
    runMigrations(db)
    db.prepare(
      `INSERT INTO checkpoints (id, lineage, sequence, reason, summary, format_version, state_json, created_at)
       VALUES ('cp-1', 'main', 1, 'test', NULL, 1, '{}', '2024-01-01T00:00:00.000Z')`,
    ).run()
    db.prepare(
      `INSERT INTO checkpoint_artifacts (checkpoint_id, ordinal, path, block_id, step_id, content)
       VALUES ('cp-1', 0, 'a.ts', 'A', 's', 'x')`,
    ).run()

    db.prepare("DELETE FROM checkpoints WHERE id = 'cp-1'").run()

    const count = db.prepare('SELECT COUNT(*) AS n FROM checkpoint_artifacts').get() as { n: number }
    expect(count.n).toBe(0)
  })
})
