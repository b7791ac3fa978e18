/**
 * Migration runner for the SQLite persistence layer.
 *
 * Responsibilities:
 *  - Ensure the `schema_migrations` table exists
 *  - Track which migrations have already been applied
 *  - Apply pending migrations in version order (idempotent)
 *
 * Migrations are additive only (new tables, new nullable or defaulted
 * columns), so databases written by older releases stay resumable.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { taskLogMigration } from './001-task-log.js'
import { taskResultsMigration } from './002-task-results.js'
import { orchestratorMigration } from './003-orchestrator.js'
import { processRunsMigration } from './004-process-runs.js'
import { artifactsMigration } from './005-artifacts.js'
import { knowledgeMigration } from './006-knowledge.js'
import { resultSummariesMigration } from './007-result-summaries.js'

const logger = createLogger('persistence:migrations')

// ---------------------------------------------------------------------------
// Migration interface
// ---------------------------------------------------------------------------

export interface Migration {
  /** Unique version number (integer) */
  version: number
  /** Human-readable name for the migration */
  name: string
  /** Execute the migration; must be idempotent */
  up(db: BetterSqlite3Database): void
}

// ---------------------------------------------------------------------------
// Registered migrations: add new migrations here in version order
// ---------------------------------------------------------------------------

export const MIGRATIONS: readonly Migration[] = [
  taskLogMigration,
  taskResultsMigration,
  orchestratorMigration,
  processRunsMigration,
  artifactsMigration,
  knowledgeMigration,
  resultSummariesMigration,
]

// ---------------------------------------------------------------------------
// Migration runner
// ---------------------------------------------------------------------------

/**
 * Ensure `schema_migrations` table exists and run any pending migrations.
 * Safe to call multiple times; already-applied migrations are skipped.
 *
 * @returns the versions applied by this call
 */
export function runMigrations(
  db: BetterSqlite3Database,
  migrations: readonly Migration[] = MIGRATIONS,
): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version),
  )

  const pending = migrations
    .filter((m) => !appliedVersions.has(m.version))
    .sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return []
  }

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)',
  )

  for (const migration of pending) {
    logger.info({ version: migration.version, name: migration.name }, 'Applying migration')

    // Run the migration and record it atomically
    const applyMigration = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    applyMigration()
  }

  logger.info({ count: pending.length }, 'All pending migrations applied')
  return pending.map((m) => m.version)
}

/** Highest schema version recorded in `schema_migrations` (0 for a fresh database). */
export function getSchemaVersion(db: BetterSqlite3Database): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get()
  return row?.version ?? 0
}
