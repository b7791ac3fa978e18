/**
 * Migration 007: compressed result summaries.
 *
 * Adds `summary_text` and `has_summary` to task_result. A summary is cleared
 * whenever its result is rewritten.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'
import { hasColumn } from './table-info.js'

export const resultSummariesMigration: Migration = {
  version: 7,
  name: '007-result-summaries',
  up(db: BetterSqlite3Database): void {
    if (!hasColumn(db, 'task_result', 'summary_text')) {
      db.exec('ALTER TABLE task_result ADD COLUMN summary_text TEXT')
    }
    if (!hasColumn(db, 'task_result', 'has_summary')) {
      db.exec('ALTER TABLE task_result ADD COLUMN has_summary INTEGER NOT NULL DEFAULT 0')
    }
  },
}
