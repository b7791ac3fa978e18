/**
 * Migration 001: task_log.
 *
 * One row per worker or supervisor invocation. The table is append-only: rows
 * are inserted when an invocation starts and completed in place when it ends.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const taskLogMigration: Migration = {
  version: 1,
  name: '001-task-log',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS task_log (
        task_id        TEXT PRIMARY KEY,
        process_id     TEXT NOT NULL,
        created_at     TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        finished_at    TEXT,
        failed_at      TEXT,
        branch         TEXT,
        worktree       TEXT,
        main_repo      TEXT,
        engine         TEXT,
        model          TEXT,
        session_id     TEXT,
        task_name      TEXT NOT NULL,
        prompt         TEXT,
        prompt_hash    TEXT,
        total_cost     REAL,
        input_tokens   INTEGER,
        output_tokens  INTEGER,
        duration_ms    INTEGER,
        success        INTEGER,
        exit_code      INTEGER,
        error_message  TEXT,
        parent_id      TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_task_log_process_id ON task_log(process_id);
      CREATE INDEX IF NOT EXISTS idx_task_log_session_id ON task_log(session_id);
      CREATE INDEX IF NOT EXISTS idx_task_log_branch ON task_log(branch);
      CREATE INDEX IF NOT EXISTS idx_task_log_worktree ON task_log(worktree);
      CREATE INDEX IF NOT EXISTS idx_task_log_parent_id ON task_log(parent_id);
    `)
  },
}
