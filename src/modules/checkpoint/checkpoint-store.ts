/**
 * CheckpointStore: durable, bounded history of execution-state snapshots.
 *
 * One store instance owns one lineage. Snapshots are JSON envelopes
 * `{ format_version, state }`; the state is validated against the caller's
 * zod schema on load. After every create the lineage is trimmed back to
 * `maxCheckpoints` by deleting the oldest rows in the same transaction as
 * the insert. The row just written is never evicted.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ZodType, ZodTypeDef } from 'zod'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { Artifact, CheckpointId } from '../../core/types.js'
import {
  CheckpointNotFoundError,
  ConfigError,
  OrchestrationError,
  PersistenceIOError,
  SerializationError,
} from '../../core/errors.js'
import {
  evictOldestCheckpoints,
  getCheckpoint,
  getCheckpointArtifacts,
  getLatestCheckpoint,
  insertCheckpoint,
  insertCheckpointArtifacts,
  listCheckpoints,
  nextCheckpointSequence,
  type CheckpointMetadataRow,
} from '../../persistence/queries/checkpoints.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('checkpoint')

export const CHECKPOINT_FORMAT_VERSION = 1

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CheckpointMetadata {
  id: CheckpointId
  lineage: string
  sequence: number
  reason: string
  summary: string | null
  formatVersion: number
  createdAt: string
}

export interface LoadedCheckpoint<S> {
  metadata: CheckpointMetadata
  state: S
  artifacts: Artifact[]
}

export interface CreateCheckpointOptions {
  summary?: string
  artifacts?: readonly Artifact[]
}

export interface CheckpointStoreOptions<S> {
  lineage: string
  maxCheckpoints: number
  schema: ZodType<S, ZodTypeDef, unknown>
  eventBus?: TypedEventBus | null
  /** ISO timestamp source; defaults to the wall clock */
  now?: () => string
}

export interface CheckpointStore<S> {
  readonly lineage: string
  create(state: S, reason: string, options?: CreateCheckpointOptions): CheckpointId
  load(id: CheckpointId): LoadedCheckpoint<S>
  /** Metadata of this lineage, oldest first */
  list(): CheckpointMetadata[]
  latest(): CheckpointMetadata | null
}

interface Envelope {
  format_version: number
  state: unknown
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toCheckpointMetadata(row: CheckpointMetadataRow): CheckpointMetadata {
  return {
    id: row.id,
    lineage: row.lineage,
    sequence: row.sequence,
    reason: row.reason,
    summary: row.summary,
    formatVersion: row.format_version,
    createdAt: row.created_at,
  }
}

function isEnvelope(value: unknown): value is Envelope {
  return (
    typeof value === 'object' &&
    value !== null &&
    'format_version' in value &&
    typeof value.format_version === 'number' &&
    'state' in value
  )
}

function serialize(lineage: string, state: unknown): string {
  let json: string | undefined
  try {
    json = JSON.stringify({ format_version: CHECKPOINT_FORMAT_VERSION, state })
  } catch (err) {
    throw new SerializationError('Checkpoint state is not serializable', { lineage }, err)
  }
  if (json === undefined) {
    throw new SerializationError('Checkpoint state serialized to nothing', { lineage })
  }
  return json
}

// ---------------------------------------------------------------------------
// SqliteCheckpointStore
// ---------------------------------------------------------------------------

export class SqliteCheckpointStore<S> implements CheckpointStore<S> {
  readonly lineage: string
  private readonly _db: BetterSqlite3Database
  private readonly _max: number
  private readonly _schema: ZodType<S, ZodTypeDef, unknown>
  private readonly _eventBus: TypedEventBus | null
  private readonly _now: () => string

  constructor(db: BetterSqlite3Database, options: CheckpointStoreOptions<S>) {
    if (!Number.isInteger(options.maxCheckpoints) || options.maxCheckpoints < 1) {
      throw new ConfigError('maxCheckpoints must be a positive integer', {
        maxCheckpoints: options.maxCheckpoints,
      })
    }
    this._db = db
    this.lineage = options.lineage
    this._max = options.maxCheckpoints
    this._schema = options.schema
    this._eventBus = options.eventBus ?? null
    this._now = options.now ?? (() => new Date().toISOString())
  }

  create(state: S, reason: string, options: CreateCheckpointOptions = {}): CheckpointId {
    const id = generateId('ckpt')
    const stateJson = serialize(this.lineage, state)
    const artifacts = options.artifacts ?? []

    let evicted: string[]
    try {
      evicted = this._db.transaction(() => {
        insertCheckpoint(this._db, {
          id,
          lineage: this.lineage,
          sequence: nextCheckpointSequence(this._db, this.lineage),
          reason,
          summary: options.summary ?? null,
          format_version: CHECKPOINT_FORMAT_VERSION,
          state_json: stateJson,
          created_at: this._now(),
        })
        insertCheckpointArtifacts(
          this._db,
          artifacts.map((a, ordinal) => ({
            checkpoint_id: id,
            ordinal,
            path: a.path,
            block_id: a.blockId,
            step_id: a.stepId,
            content: a.content,
          })),
        )
        return evictOldestCheckpoints(this._db, this.lineage, this._max, id)
      })()
    } catch (err) {
      if (err instanceof OrchestrationError) throw err
      throw new PersistenceIOError('Failed to write checkpoint', { lineage: this.lineage, reason }, err)
    }

    logger.debug({ lineage: this.lineage, checkpointId: id, reason }, 'Checkpoint created')
    this._eventBus?.emit('checkpoint:created', { lineage: this.lineage, checkpointId: id, reason })
    if (evicted.length > 0) {
      logger.debug({ lineage: this.lineage, evicted }, 'Checkpoints evicted')
      this._eventBus?.emit('checkpoint:evicted', { lineage: this.lineage, checkpointIds: evicted })
    }
    return id
  }

  load(id: CheckpointId): LoadedCheckpoint<S> {
    const row = getCheckpoint(this._db, id)
    if (row === undefined || row.lineage !== this.lineage) {
      throw new CheckpointNotFoundError(id)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(row.state_json)
    } catch (err) {
      throw new SerializationError('Checkpoint payload is not valid JSON', { checkpointId: id }, err)
    }
    if (!isEnvelope(parsed)) {
      throw new SerializationError('Checkpoint payload has no envelope', { checkpointId: id })
    }
    if (parsed.format_version !== CHECKPOINT_FORMAT_VERSION) {
      throw new SerializationError(`Unsupported checkpoint format version ${String(parsed.format_version)}`, {
        checkpointId: id,
        formatVersion: parsed.format_version,
      })
    }

    const result = this._schema.safeParse(parsed.state)
    if (!result.success) {
      throw new SerializationError(
        'Checkpoint state does not match the expected shape',
        { checkpointId: id, issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
        result.error,
      )
    }

    const artifacts = getCheckpointArtifacts(this._db, id).map(
      (a): Artifact => ({ path: a.path, content: a.content, blockId: a.block_id, stepId: a.step_id }),
    )
    return { metadata: toCheckpointMetadata(row), state: result.data, artifacts }
  }

  list(): CheckpointMetadata[] {
    return listCheckpoints(this._db, this.lineage).map(toCheckpointMetadata)
  }

  latest(): CheckpointMetadata | null {
    const row = getLatestCheckpoint(this._db, this.lineage)
    return row === undefined ? null : toCheckpointMetadata(row)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCheckpointStore<S>(
  db: BetterSqlite3Database,
  options: CheckpointStoreOptions<S>,
): CheckpointStore<S> {
  return new SqliteCheckpointStore(db, options)
}
