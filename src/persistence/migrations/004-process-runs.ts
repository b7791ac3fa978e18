/**
 * Migration 004: process_runs.
 *
 * Snapshot of each run's live step list and position, rewritten by the
 * driving loop after every mutation. The state-query tool and resumption
 * both read from here.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const processRunsMigration: Migration = {
  version: 4,
  name: '004-process-runs',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS process_runs (
        process_id        TEXT PRIMARY KEY,
        process_name      TEXT    NOT NULL,
        spec_json         TEXT    NOT NULL,
        steps_json        TEXT    NOT NULL,
        current_index     INTEGER NOT NULL DEFAULT 0,
        status            TEXT    NOT NULL DEFAULT 'running'
                          CHECK (status IN ('running', 'completed', 'aborted')),
        abort_reason      TEXT,
        parent_process_id TEXT,
        worktree          TEXT,
        branch            TEXT,
        main_repo         TEXT,
        base_commit       TEXT,
        injection_counts  TEXT    NOT NULL DEFAULT '{}',
        user_prompt       TEXT,
        created_at        TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        updated_at        TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_process_runs_parent ON process_runs(parent_process_id);
      CREATE INDEX IF NOT EXISTS idx_process_runs_branch ON process_runs(branch);
    `)
  },
}
