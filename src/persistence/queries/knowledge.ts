/**
 * knowledge query functions. Versions start at 1 and increase by one per
 * write of the same key.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  WriteKnowledgeInputSchema,
  type KnowledgeRow,
  type WriteKnowledgeInput,
} from '../schemas/history.js'
import { nowIso } from '../../utils/helpers.js'

export type { KnowledgeRow, WriteKnowledgeInput }

/** Append the next version of a key. The version is picked and written in one transaction. */
export function insertKnowledge(db: BetterSqlite3Database, input: WriteKnowledgeInput): KnowledgeRow {
  const v = WriteKnowledgeInputSchema.parse(input)

  const write = db.transaction((): KnowledgeRow => {
    const current = db
      .prepare<[string], { version: number | null }>('SELECT MAX(version) AS version FROM knowledge WHERE key = ?')
      .get(v.key)
    const version = (current?.version ?? 0) + 1
    db.prepare(`
      INSERT INTO knowledge (key, version, content, reason, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(v.key, version, v.content, v.reason, nowIso())

    const row = getKnowledgeVersion(db, v.key, version)
    if (row === undefined) {
      throw new Error(`knowledge row ${v.key}@${String(version)} missing after insert`)
    }
    return row
  })
  return write.immediate()
}

export function getLatestKnowledge(db: BetterSqlite3Database, key: string): KnowledgeRow | undefined {
  return db
    .prepare<[string], KnowledgeRow>('SELECT * FROM knowledge WHERE key = ? ORDER BY version DESC LIMIT 1')
    .get(key)
}

export function getKnowledgeVersion(
  db: BetterSqlite3Database,
  key: string,
  version: number,
): KnowledgeRow | undefined {
  return db
    .prepare<[string, number], KnowledgeRow>('SELECT * FROM knowledge WHERE key = ? AND version = ?')
    .get(key, version)
}

/** Every version of a key, oldest first. */
export function listKnowledgeHistory(db: BetterSqlite3Database, key: string): KnowledgeRow[] {
  return db
    .prepare<[string], KnowledgeRow>('SELECT * FROM knowledge WHERE key = ? ORDER BY version ASC')
    .all(key)
}
