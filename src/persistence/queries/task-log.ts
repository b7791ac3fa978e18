/**
 * task_log query functions.
 *
 * All functions accept a raw BetterSqlite3 database instance and use
 * prepared statements; no string interpolation, no ORM.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  CreateTaskLogInputSchema,
  CompleteTaskLogInputSchema,
  type CreateTaskLogInput,
  type CompleteTaskLogInput,
  type TaskLogRow,
} from '../schemas/history.js'
import { nowIso, promptHash } from '../../utils/helpers.js'

export type { TaskLogRow, CreateTaskLogInput, CompleteTaskLogInput }

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

/**
 * Insert a task_log row for an invocation that is about to start.
 * `is_orchestrator` is written once here and never updated afterwards.
 */
export function insertTaskLog(db: BetterSqlite3Database, input: CreateTaskLogInput): TaskLogRow {
  const v = CreateTaskLogInputSchema.parse(input)

  db.prepare(`
    INSERT INTO task_log (
      task_id, process_id, created_at, branch, worktree, main_repo,
      engine, model, task_name, prompt, prompt_hash, parent_id,
      is_orchestrator, orchestrator_phase, step_index
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    v.task_id,
    v.process_id,
    nowIso(),
    v.branch ?? null,
    v.worktree ?? null,
    v.main_repo ?? null,
    v.engine ?? null,
    v.model ?? null,
    v.task_name,
    v.prompt ?? null,
    v.prompt != null ? promptHash(v.prompt) : null,
    v.parent_id ?? null,
    v.is_orchestrator ? 1 : 0,
    v.orchestrator_phase ?? null,
    v.step_index ?? null,
  )

  const row = getTaskLog(db, v.task_id)
  if (row === undefined) {
    throw new Error(`task_log row ${v.task_id} missing after insert`)
  }
  return row
}

/**
 * Record the outcome of an invocation. Sets finished_at on success and
 * failed_at on failure.
 */
export function completeTaskLog(
  db: BetterSqlite3Database,
  taskId: string,
  input: CompleteTaskLogInput,
): TaskLogRow | undefined {
  const v = CompleteTaskLogInputSchema.parse(input)
  const now = nowIso()

  db.prepare(`
    UPDATE task_log SET
      finished_at   = ?,
      failed_at     = ?,
      success       = ?,
      exit_code     = ?,
      duration_ms   = ?,
      session_id    = COALESCE(?, session_id),
      error_message = ?,
      total_cost    = COALESCE(?, total_cost),
      input_tokens  = COALESCE(?, input_tokens),
      output_tokens = COALESCE(?, output_tokens)
    WHERE task_id = ?
  `).run(
    v.success ? now : null,
    v.success ? null : now,
    v.success ? 1 : 0,
    v.exit_code,
    v.duration_ms,
    v.session_id ?? null,
    v.error_message ?? null,
    v.total_cost ?? null,
    v.input_tokens ?? null,
    v.output_tokens ?? null,
    taskId,
  )

  return getTaskLog(db, taskId)
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

export function getTaskLog(db: BetterSqlite3Database, taskId: string): TaskLogRow | undefined {
  return db.prepare<[string], TaskLogRow>('SELECT * FROM task_log WHERE task_id = ?').get(taskId)
}

export function getTaskLogBySession(
  db: BetterSqlite3Database,
  sessionId: string,
): TaskLogRow | undefined {
  return db
    .prepare<[string], TaskLogRow>(
      'SELECT * FROM task_log WHERE session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT 1',
    )
    .get(sessionId)
}

/** Most recent invocation that ran on the given branch. */
export function getLatestTaskLogByBranch(
  db: BetterSqlite3Database,
  branch: string,
): TaskLogRow | undefined {
  return db
    .prepare<[string], TaskLogRow>(
      'SELECT * FROM task_log WHERE branch = ? ORDER BY created_at DESC, rowid DESC LIMIT 1',
    )
    .get(branch)
}

/** Every invocation of a process, oldest first. */
export function listTaskLogsForProcess(
  db: BetterSqlite3Database,
  processId: string,
): TaskLogRow[] {
  return db
    .prepare<[string], TaskLogRow>(
      'SELECT * FROM task_log WHERE process_id = ? ORDER BY created_at ASC, rowid ASC',
    )
    .all(processId)
}

/**
 * Successful worker invocations of a process below `beforeIndex`, keeping
 * only the latest row per step index.
 */
export function listCompletedWorkerLogs(
  db: BetterSqlite3Database,
  processId: string,
  beforeIndex: number,
): TaskLogRow[] {
  return db
    .prepare<[string, number], TaskLogRow>(`
      SELECT t.* FROM task_log t
      WHERE t.process_id = ?
        AND t.is_orchestrator = 0
        AND t.success = 1
        AND t.step_index IS NOT NULL
        AND t.step_index < ?
        AND t.rowid = (
          SELECT MAX(t2.rowid) FROM task_log t2
          WHERE t2.process_id = t.process_id
            AND t2.is_orchestrator = 0
            AND t2.success = 1
            AND t2.step_index = t.step_index
        )
      ORDER BY t.step_index ASC
    `)
    .all(processId, beforeIndex)
}
