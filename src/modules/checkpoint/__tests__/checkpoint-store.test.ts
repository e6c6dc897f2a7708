/**
 * Unit tests for the SQLite-backed checkpoint store.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z } from 'zod'
import { runMigrations } from '../../../persistence/migrations/index.js'
import { createCheckpointStore } from '../checkpoint-store.js'
import { createEventBus } from '../../../core/event-bus.js'
import { CheckpointNotFoundError, ConfigError, SerializationError } from '../../../core/errors.js'
import type { Artifact } from '../../../core/types.js'

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

const StateSchema = z.object({ counter: z.number(), done: z.array(z.string()) })
type State = z.infer<typeof StateSchema>

function openTestDb(): BetterSqlite3Database {
  const db = new BetterSqlite3(':memory:')
  db.pragma('foreign_keys = ON')
  runMigrations(db)
  return db
}

function state(counter: number): State {
  return { counter, done: [] }
}

let db: BetterSqlite3Database

beforeEach(() => {
  db = openTestDb()
})

afterEach(() => {
  db.close()
})

// ---------------------------------------------------------------------------
// create / load
// ---------------------------------------------------------------------------

describe('CheckpointStore.create() / load()', () => {
  it('round-trips state, metadata and artifacts', () => {
    const store = createCheckpointStore(db, {
      lineage: 'main',
      maxCheckpoints: 5,
      schema: StateSchema,
      now: () => '2026-01-01T00:00:00.000Z',
    })
    const artifacts: Artifact[] = [
      { path: 'src/a.ts', content: 'export const a = 1\n', blockId: 'A', stepId: 's1' },
      { path: 'src/b.ts', content: 'export const b = 2\n', blockId: 'B', stepId: 's1' },
    ]

    const id = store.create({ counter: 7, done: ['A', 'B'] }, 'after_block:B', {
      summary: 'two blocks done',
      artifacts,
    })
    const loaded = store.load(id)

    expect(loaded.state).toEqual({ counter: 7, done: ['A', 'B'] })
    expect(loaded.artifacts).toEqual(artifacts)
    expect(loaded.metadata).toEqual({
      id,
      lineage: 'main',
      sequence: 1,
      reason: 'after_block:B',
      summary: 'two blocks done',
      formatVersion: 1,
      createdAt: '2026-01-01T00:00:00.000Z',
    })
  })

  it('raises CheckpointNotFoundError for an unknown id', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    expect(() => store.load('ckpt-missing')).toThrow(CheckpointNotFoundError)
  })

  it('does not load checkpoints of another lineage', () => {
    const main = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    const branch = createCheckpointStore(db, { lineage: 'branch:b1', maxCheckpoints: 3, schema: StateSchema })
    const id = main.create(state(1), 'run_complete')
    expect(() => branch.load(id)).toThrow(CheckpointNotFoundError)
  })

  it('raises SerializationError for a corrupted payload', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    const id = store.create(state(1), 'run_complete')
    db.prepare('UPDATE checkpoints SET state_json = ? WHERE id = ?').run('{not json', id)
    expect(() => store.load(id)).toThrow(SerializationError)
  })

  it('raises SerializationError when the state no longer matches the schema', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    const id = store.create(state(1), 'run_complete')
    db.prepare('UPDATE checkpoints SET state_json = ? WHERE id = ?').run(
      JSON.stringify({ format_version: 1, state: { counter: 'one' } }),
      id,
    )
    expect(() => store.load(id)).toThrow(SerializationError)
  })

  it('raises SerializationError for an unsupported format version', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    const id = store.create(state(1), 'run_complete')
    db.prepare('UPDATE checkpoints SET state_json = ? WHERE id = ?').run(
      JSON.stringify({ format_version: 99, state: state(1) }),
      id,
    )
    expect(() => store.load(id)).toThrow(/Unsupported checkpoint format version 99/)
  })

  it('rejects state that cannot be serialized without writing a row', () => {
    const store = createCheckpointStore(db, {
      lineage: 'main',
      maxCheckpoints: 3,
      schema: z.object({ value: z.unknown() }),
    })
    expect(() => store.create({ value: 10n }, 'run_complete')).toThrow(SerializationError)
    expect(store.list()).toEqual([])
  })

  it('rejects a non-positive maxCheckpoints', () => {
    expect(() => createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 0, schema: StateSchema })).toThrow(
      ConfigError,
    )
  })
})

// ---------------------------------------------------------------------------
// Eviction
// ---------------------------------------------------------------------------

describe('CheckpointStore eviction', () => {
  it('evicts the oldest checkpoint once the limit is exceeded', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    const c1 = store.create(state(1), 'before_block:A', {
      artifacts: [{ path: 'a.ts', content: 'a', blockId: 'A', stepId: 's1' }],
    })
    const c2 = store.create(state(2), 'after_block:A')
    const c3 = store.create(state(3), 'before_block:B')
    const c4 = store.create(state(4), 'after_block:B')

    expect(store.list().map((m) => m.id)).toEqual([c2, c3, c4])
    expect(store.list().map((m) => m.sequence)).toEqual([2, 3, 4])
    expect(() => store.load(c1)).toThrow(CheckpointNotFoundError)
    expect(store.load(c4).state.counter).toBe(4)
  })

  it('removes artifact rows of evicted checkpoints', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 1, schema: StateSchema })
    const c1 = store.create(state(1), 'r1', {
      artifacts: [{ path: 'a.ts', content: 'a', blockId: 'A', stepId: 's1' }],
    })
    store.create(state(2), 'r2')

    const { n } = db
      .prepare('SELECT COUNT(*) AS n FROM checkpoint_artifacts WHERE checkpoint_id = ?')
      .get(c1) as { n: number }
    expect(n).toBe(0)
  })

  it('counts each lineage separately', () => {
    const main = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 2, schema: StateSchema })
    const other = createCheckpointStore(db, { lineage: 'branch:x', maxCheckpoints: 2, schema: StateSchema })
    main.create(state(1), 'r')
    main.create(state(2), 'r')
    const o1 = other.create(state(1), 'r')
    main.create(state(3), 'r')

    expect(main.list()).toHaveLength(2)
    expect(other.list().map((m) => m.id)).toEqual([o1])
  })

  it('emits created and evicted events', () => {
    const bus = createEventBus()
    const created = vi.fn()
    const evicted = vi.fn()
    bus.on('checkpoint:created', created)
    bus.on('checkpoint:evicted', evicted)

    const store = createCheckpointStore(db, {
      lineage: 'main',
      maxCheckpoints: 1,
      schema: StateSchema,
      eventBus: bus,
    })
    const c1 = store.create(state(1), 'r1')
    const c2 = store.create(state(2), 'r2')

    expect(created).toHaveBeenCalledTimes(2)
    expect(created).toHaveBeenLastCalledWith({ lineage: 'main', checkpointId: c2, reason: 'r2' })
    expect(evicted).toHaveBeenCalledOnce()
    expect(evicted).toHaveBeenCalledWith({ lineage: 'main', checkpointIds: [c1] })
  })
})

describe('CheckpointStore.latest()', () => {
  it('returns null for an empty lineage and the newest entry otherwise', () => {
    const store = createCheckpointStore(db, { lineage: 'main', maxCheckpoints: 3, schema: StateSchema })
    expect(store.latest()).toBeNull()
    store.create(state(1), 'r1')
    const c2 = store.create(state(2), 'r2')
    expect(store.latest()?.id).toBe(c2)
  })
})
