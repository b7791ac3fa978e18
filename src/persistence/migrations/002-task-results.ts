/**
 * Migration 002: task_result.
 *
 * Result artifacts written by agents through the write_result tool. Post-step
 * reviews are stored here as well.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const taskResultsMigration: Migration = {
  version: 2,
  name: '002-task-results',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS task_result (
        task_id     TEXT PRIMARY KEY REFERENCES task_log(task_id),
        result_text TEXT NOT NULL,
        key_files   TEXT NOT NULL DEFAULT '[]',
        tags        TEXT NOT NULL DEFAULT '[]',
        created_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at  TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `)
  },
}
