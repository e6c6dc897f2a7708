/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open the checkpoint database with WAL mode and foreign keys enforced
 *  - Expose the raw BetterSqlite3.Database instance for query modules
 *  - Implement the DatabaseService lifecycle (initialize / shutdown)
 */

import { mkdirSync } from 'fs'
import { dirname } from 'path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { PersistenceIOError } from '../core/errors.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

/** Path better-sqlite3 treats as a private in-memory database */
export const IN_MEMORY_DATABASE = ':memory:'

/** Applied to every connection after the journal mode */
const CONNECTION_PRAGMAS = ['busy_timeout = 5000', 'synchronous = NORMAL', 'foreign_keys = ON'] as const

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database, creating its directory if needed. Idempotent.
   * @throws {PersistenceIOError} if the file cannot be opened
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.info({ path: this._path }, 'Opening SQLite database')
    try {
      if (this._path !== IN_MEMORY_DATABASE) {
        mkdirSync(dirname(this._path), { recursive: true })
      }
      this._db = new BetterSqlite3(this._path)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new PersistenceIOError(`Cannot open checkpoint database at ${this._path}: ${message}`, { path: this._path }, err)
    }

    // In-memory databases report "memory" here
    const walResult = this._db.pragma('journal_mode = WAL') as { journal_mode: string }[]
    if (walResult[0]?.journal_mode !== 'wal') {
      logger.debug({ result: walResult[0]?.journal_mode }, 'WAL journal mode not available')
    }
    for (const pragma of CONNECTION_PRAGMAS) {
      this._db.pragma(pragma)
    }
  }

  /** Idempotent */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.info({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance; use for prepared statements */
  readonly db: BetterSqlite3Database
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  async initialize(): Promise<void> {
    this._wrapper.open()
    runMigrations(this._wrapper.db)
    logger.info('DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
    logger.info('DatabaseService shut down')
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
