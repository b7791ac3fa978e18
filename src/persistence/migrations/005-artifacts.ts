/**
 * Migration 005: artifact.
 *
 * Documents agents publish for later steps (designs, checklists, contracts).
 * Unlike task_result, a task may write any number of artifacts.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const artifactsMigration: Migration = {
  version: 5,
  name: '005-artifacts',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS artifact (
        id            TEXT PRIMARY KEY,
        task_id       TEXT NOT NULL REFERENCES task_log(task_id),
        title         TEXT NOT NULL,
        content       TEXT NOT NULL,
        format        TEXT NOT NULL DEFAULT 'markdown'
                      CHECK (format IN ('json', 'markdown', 'xml', 'text')),
        template_name TEXT,
        tags          TEXT NOT NULL DEFAULT '[]',
        created_at    TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );

      CREATE INDEX IF NOT EXISTS idx_artifact_task_id ON artifact(task_id);
    `)
  },
}
