/**
 * process_runs query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  SaveProcessRunInputSchema,
  type ProcessRunRow,
  type SaveProcessRunInput,
} from '../schemas/history.js'
import { nowIso } from '../../utils/helpers.js'

export type { ProcessRunRow, SaveProcessRunInput }

/** Insert the snapshot of a run, or overwrite the existing one. */
export function upsertProcessRun(
  db: BetterSqlite3Database,
  input: SaveProcessRunInput,
): ProcessRunRow {
  const v = SaveProcessRunInputSchema.parse(input)
  const now = nowIso()

  db.prepare(`
    INSERT INTO process_runs (
      process_id, process_name, spec_json, steps_json, current_index, status,
      abort_reason, parent_process_id, worktree, branch, main_repo, base_commit,
      injection_counts, user_prompt, created_at, updated_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(process_id) DO UPDATE SET
      steps_json       = excluded.steps_json,
      current_index    = excluded.current_index,
      status           = excluded.status,
      abort_reason     = excluded.abort_reason,
      base_commit      = excluded.base_commit,
      injection_counts = excluded.injection_counts,
      updated_at       = excluded.updated_at
  `).run(
    v.process_id,
    v.process_name,
    v.spec_json,
    JSON.stringify(v.steps),
    v.current_index,
    v.status,
    v.abort_reason ?? null,
    v.parent_process_id ?? null,
    v.worktree ?? null,
    v.branch ?? null,
    v.main_repo ?? null,
    v.base_commit ?? null,
    JSON.stringify(v.injection_counts),
    v.user_prompt ?? null,
    now,
    now,
  )

  const row = getProcessRun(db, v.process_id)
  if (row === undefined) {
    throw new Error(`process_runs row ${v.process_id} missing after upsert`)
  }
  return row
}

export function getProcessRun(
  db: BetterSqlite3Database,
  processId: string,
): ProcessRunRow | undefined {
  return db
    .prepare<[string], ProcessRunRow>('SELECT * FROM process_runs WHERE process_id = ?')
    .get(processId)
}

/** Most recently updated runs, newest first. */
export function listRecentProcessRuns(db: BetterSqlite3Database, limit = 20): ProcessRunRow[] {
  return db
    .prepare<[number], ProcessRunRow>(
      'SELECT * FROM process_runs ORDER BY updated_at DESC, rowid DESC LIMIT ?',
    )
    .all(limit)
}
