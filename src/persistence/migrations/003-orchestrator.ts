/**
 * Migration 003: orchestrator identity and decision log.
 *
 * Adds the identity flag the tool gate consults (plus the phase and step an
 * orchestrator invocation was launched for) to task_log, and creates the
 * append-only orchestrator_decision table.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'
import { hasColumn } from './table-info.js'

export const orchestratorMigration: Migration = {
  version: 3,
  name: '003-orchestrator',
  up(db: BetterSqlite3Database): void {
    if (!hasColumn(db, 'task_log', 'is_orchestrator')) {
      db.exec('ALTER TABLE task_log ADD COLUMN is_orchestrator INTEGER NOT NULL DEFAULT 0')
    }
    if (!hasColumn(db, 'task_log', 'orchestrator_phase')) {
      db.exec('ALTER TABLE task_log ADD COLUMN orchestrator_phase TEXT')
    }
    if (!hasColumn(db, 'task_log', 'step_index')) {
      db.exec('ALTER TABLE task_log ADD COLUMN step_index INTEGER')
    }

    db.exec(`
      CREATE TABLE IF NOT EXISTS orchestrator_decision (
        id             INTEGER PRIMARY KEY AUTOINCREMENT,
        process_id     TEXT    NOT NULL,
        task_id        TEXT    NOT NULL REFERENCES task_log(task_id),
        phase          TEXT    NOT NULL CHECK (phase IN ('pre_step', 'post_step', 'finalize')),
        step_index     INTEGER NOT NULL,
        decision       TEXT    NOT NULL CHECK (decision IN ('proceed', 'inject', 'abort')),
        reasoning      TEXT    NOT NULL DEFAULT '',
        injected_steps TEXT,
        created_at     TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_orchestrator_decision_process ON orchestrator_decision(process_id);
      CREATE INDEX IF NOT EXISTS idx_orchestrator_decision_task ON orchestrator_decision(task_id);
      CREATE INDEX IF NOT EXISTS idx_task_log_is_orchestrator ON task_log(process_id, is_orchestrator);
    `)
  },
}
