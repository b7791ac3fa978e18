/**
 * task_result query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  WriteResultInputSchema,
  type TaskResultRow,
  type WriteResultInput,
} from '../schemas/history.js'
import { nowIso } from '../../utils/helpers.js'

export type { TaskResultRow, WriteResultInput }

/** Insert or replace the result of a task. Replacing it drops its summary. */
export function upsertResult(db: BetterSqlite3Database, input: WriteResultInput): TaskResultRow {
  const v = WriteResultInputSchema.parse(input)
  const now = nowIso()

  db.prepare(`
    INSERT INTO task_result (task_id, result_text, key_files, tags, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(task_id) DO UPDATE SET
      result_text  = excluded.result_text,
      key_files    = excluded.key_files,
      tags         = excluded.tags,
      updated_at   = excluded.updated_at,
      summary_text = NULL,
      has_summary  = 0
  `).run(v.task_id, v.result_text, JSON.stringify(v.key_files), JSON.stringify(v.tags), now, now)

  const row = getResult(db, v.task_id)
  if (row === undefined) {
    throw new Error(`task_result row ${v.task_id} missing after upsert`)
  }
  return row
}

/** Attach a compressed summary to an existing result. */
export function updateResultSummary(
  db: BetterSqlite3Database,
  taskId: string,
  summary: string,
): TaskResultRow | undefined {
  db.prepare<[string, string]>(
    'UPDATE task_result SET summary_text = ?, has_summary = 1 WHERE task_id = ?',
  ).run(summary, taskId)
  return getResult(db, taskId)
}

export function getResult(db: BetterSqlite3Database, taskId: string): TaskResultRow | undefined {
  return db
    .prepare<[string], TaskResultRow>('SELECT * FROM task_result WHERE task_id = ?')
    .get(taskId)
}

/** Latest result written by a task with the given name inside a process. */
export function getLatestResultByTaskName(
  db: BetterSqlite3Database,
  processId: string,
  taskName: string,
): TaskResultRow | undefined {
  return db
    .prepare<[string, string], TaskResultRow>(`
      SELECT r.* FROM task_result r
      JOIN task_log t ON t.task_id = r.task_id
      WHERE t.process_id = ? AND t.task_name = ?
      ORDER BY t.created_at DESC, t.rowid DESC
      LIMIT 1
    `)
    .get(processId, taskName)
}

/** Result rows joined with their task, for every task of a process, oldest first. */
export function listResultsForProcess(
  db: BetterSqlite3Database,
  processId: string,
): (TaskResultRow & { task_name: string; is_orchestrator: number })[] {
  return db
    .prepare<[string], TaskResultRow & { task_name: string; is_orchestrator: number }>(`
      SELECT r.*, t.task_name, t.is_orchestrator FROM task_result r
      JOIN task_log t ON t.task_id = r.task_id
      WHERE t.process_id = ?
      ORDER BY t.created_at ASC, t.rowid ASC
    `)
    .all(processId)
}
