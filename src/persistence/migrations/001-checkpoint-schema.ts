/**
 * Migration 001: Checkpoint schema.
 *
 * Creates the checkpoints table (one row per snapshot, ordered within a
 * lineage by `sequence`) and the checkpoint_artifacts table holding the
 * artifact snapshot of each checkpoint.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const checkpointSchemaMigration: Migration = {
  version: 1,
  name: '001-checkpoint-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        id             TEXT    PRIMARY KEY,
        lineage        TEXT    NOT NULL,
        sequence       INTEGER NOT NULL,
        reason         TEXT    NOT NULL,
        summary        TEXT,
        format_version INTEGER NOT NULL,
        state_json     TEXT    NOT NULL,
        created_at     TEXT    NOT NULL,
        UNIQUE (lineage, sequence)
      );

      CREATE INDEX IF NOT EXISTS idx_checkpoints_lineage ON checkpoints(lineage, sequence);

      CREATE TABLE IF NOT EXISTS checkpoint_artifacts (
        checkpoint_id TEXT    NOT NULL REFERENCES checkpoints(id) ON DELETE CASCADE,
        ordinal       INTEGER NOT NULL,
        path          TEXT    NOT NULL,
        block_id      TEXT    NOT NULL,
        step_id       TEXT    NOT NULL,
        content       TEXT    NOT NULL,
        PRIMARY KEY (checkpoint_id, ordinal)
      );
    `)
  },
}
