/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 *
 * Several stepwarden processes (parallel runs, the stdio tool server each
 * agent spawns) write to the same file. WAL plus a busy timeout lets them
 * interleave without SQLITE_BUSY failures.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const IN_MEMORY_DATABASE = ':memory:'

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
   * Open the database at the configured path and apply all required PRAGMAs.
   * Idempotent: calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    if (this._path !== IN_MEMORY_DATABASE) {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    const db = new BetterSqlite3(this._path)

    const journalMode: unknown = db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal') {
      logger.warn(
        { result: journalMode },
        'WAL pragma did not return "wal"; journal_mode may be "memory" or unsupported',
      )
    }
    db.pragma('busy_timeout = 5000')
    db.pragma('synchronous = NORMAL')
    db.pragma('foreign_keys = ON')

    this._db = db
  }

  /**
   * Close the database. Idempotent: calling close() when already closed is a no-op.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * Return the raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  /** Whether the database is currently open */
  get isOpen(): boolean {
    return this._db !== null
  }

  get path(): string {
    return this._path
  }
}

// ---------------------------------------------------------------------------
// DatabaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle-managed database that exposes the raw BetterSqlite3 instance
 * for use by query modules.
 */
export interface DatabaseService extends BaseService {
  /** Whether the database connection is open and ready */
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance; use for prepared statements */
  readonly db: BetterSqlite3Database
}

// ---------------------------------------------------------------------------
// DatabaseServiceImpl
// ---------------------------------------------------------------------------

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
    logger.debug({ path: this._wrapper.path }, 'DatabaseService initialized')
  }

  async shutdown(): Promise<void> {
    this._wrapper.close()
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
