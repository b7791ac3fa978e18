/**
 * Migration 006: knowledge.
 *
 * Project knowledge shared across runs. Every write of a key adds a new
 * version; earlier versions are never rewritten.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const knowledgeMigration: Migration = {
  version: 6,
  name: '006-knowledge',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS knowledge (
        id         INTEGER PRIMARY KEY AUTOINCREMENT,
        key        TEXT    NOT NULL,
        version    INTEGER NOT NULL,
        content    TEXT    NOT NULL,
        reason     TEXT    NOT NULL,
        created_at TEXT    NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        UNIQUE (key, version)
      );

      CREATE INDEX IF NOT EXISTS idx_knowledge_key ON knowledge(key);
    `)
  },
}
