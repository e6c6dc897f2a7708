/**
 * Checkpoint query functions for the SQLite persistence layer.
 *
 * Prepared statements only; callers own transaction boundaries.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export interface CheckpointRow {
  id: string
  lineage: string
  sequence: number
  reason: string
  summary: string | null
  format_version: number
  state_json: string
  created_at: string
}

export type CheckpointMetadataRow = Omit<CheckpointRow, 'state_json'>

export interface CheckpointArtifactRow {
  checkpoint_id: string
  ordinal: number
  path: string
  block_id: string
  step_id: string
  content: string
}

const METADATA_COLUMNS = 'id, lineage, sequence, reason, summary, format_version, created_at'

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

export function insertCheckpoint(db: BetterSqlite3Database, row: CheckpointRow): void {
  db.prepare(
    `INSERT INTO checkpoints (id, lineage, sequence, reason, summary, format_version, state_json, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    row.id,
    row.lineage,
    row.sequence,
    row.reason,
    row.summary,
    row.format_version,
    row.state_json,
    row.created_at,
  )
}

export function insertCheckpointArtifacts(
  db: BetterSqlite3Database,
  rows: readonly CheckpointArtifactRow[],
): void {
  const stmt = db.prepare(
    `INSERT INTO checkpoint_artifacts (checkpoint_id, ordinal, path, block_id, step_id, content)
     VALUES (?, ?, ?, ?, ?, ?)`,
  )
  for (const row of rows) {
    stmt.run(row.checkpoint_id, row.ordinal, row.path, row.block_id, row.step_id, row.content)
  }
}

/**
 * Delete the oldest checkpoints of a lineage until at most `keep` remain,
 * never deleting `protectedId`. Returns the deleted ids, oldest first.
 */
export function evictOldestCheckpoints(
  db: BetterSqlite3Database,
  lineage: string,
  keep: number,
  protectedId: string,
): string[] {
  const { total } = db
    .prepare('SELECT COUNT(*) AS total FROM checkpoints WHERE lineage = ?')
    .get(lineage) as { total: number }
  const excess = total - keep
  if (excess <= 0) return []

  const victims = (
    db
      .prepare('SELECT id FROM checkpoints WHERE lineage = ? AND id != ? ORDER BY sequence ASC LIMIT ?')
      .all(lineage, protectedId, excess) as { id: string }[]
  ).map((row) => row.id)

  const del = db.prepare('DELETE FROM checkpoints WHERE id = ?')
  for (const id of victims) del.run(id)
  return victims
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

/** Next sequence number for a lineage (1 for an empty lineage) */
export function nextCheckpointSequence(db: BetterSqlite3Database, lineage: string): number {
  const row = db
    .prepare('SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM checkpoints WHERE lineage = ?')
    .get(lineage) as { next: number }
  return row.next
}

export function getCheckpoint(db: BetterSqlite3Database, id: string): CheckpointRow | undefined {
  return db.prepare('SELECT * FROM checkpoints WHERE id = ?').get(id) as CheckpointRow | undefined
}

export function getCheckpointArtifacts(db: BetterSqlite3Database, id: string): CheckpointArtifactRow[] {
  return db
    .prepare('SELECT * FROM checkpoint_artifacts WHERE checkpoint_id = ? ORDER BY ordinal ASC')
    .all(id) as CheckpointArtifactRow[]
}

/** Metadata of one lineage (or of every lineage) ordered oldest first */
export function listCheckpoints(db: BetterSqlite3Database, lineage?: string): CheckpointMetadataRow[] {
  if (lineage === undefined) {
    return db
      .prepare(`SELECT ${METADATA_COLUMNS} FROM checkpoints ORDER BY lineage ASC, sequence ASC`)
      .all() as CheckpointMetadataRow[]
  }
  return db
    .prepare(`SELECT ${METADATA_COLUMNS} FROM checkpoints WHERE lineage = ? ORDER BY sequence ASC`)
    .all(lineage) as CheckpointMetadataRow[]
}

export function getLatestCheckpoint(
  db: BetterSqlite3Database,
  lineage: string,
): CheckpointMetadataRow | undefined {
  return db
    .prepare(`SELECT ${METADATA_COLUMNS} FROM checkpoints WHERE lineage = ? ORDER BY sequence DESC LIMIT 1`)
    .get(lineage) as CheckpointMetadataRow | undefined
}
