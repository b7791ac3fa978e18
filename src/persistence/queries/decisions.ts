/**
 * orchestrator_decision query functions.
 *
 * The table is append-only. Payloads are validated against
 * AppendDecisionInputSchema before the INSERT runs, so an invalid shape
 * never reaches the audit trail.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  AppendDecisionInputSchema,
  type AppendDecisionInput,
  type DecisionPhase,
  type DecisionRow,
} from '../schemas/history.js'
import { nowIso } from '../../utils/helpers.js'

export type { DecisionRow, AppendDecisionInput }

/**
 * Append a decision. Throws a ZodError for invalid payloads and a SQLite
 * constraint error when `task_id` does not reference a task_log row.
 */
export function insertDecision(
  db: BetterSqlite3Database,
  processId: string,
  input: AppendDecisionInput,
): DecisionRow {
  const v = AppendDecisionInputSchema.parse(input)

  const info = db
    .prepare(`
      INSERT INTO orchestrator_decision
        (process_id, task_id, phase, step_index, decision, reasoning, injected_steps, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `)
    .run(
      processId,
      v.task_id,
      v.phase,
      v.step_index,
      v.decision,
      v.reasoning,
      v.injected_steps.length > 0 ? JSON.stringify(v.injected_steps) : null,
      nowIso(),
    )

  const row = db
    .prepare<[number | bigint], DecisionRow>('SELECT * FROM orchestrator_decision WHERE id = ?')
    .get(info.lastInsertRowid)
  if (row === undefined) {
    throw new Error('orchestrator_decision row missing after insert')
  }
  return row
}

/** All decisions of a process in the order they were recorded. */
export function listDecisionsForProcess(
  db: BetterSqlite3Database,
  processId: string,
): DecisionRow[] {
  return db
    .prepare<[string], DecisionRow>(
      'SELECT * FROM orchestrator_decision WHERE process_id = ? ORDER BY id ASC',
    )
    .all(processId)
}

/** Decisions recorded by one supervisor invocation, oldest first. */
export function listDecisionsForTask(db: BetterSqlite3Database, taskId: string): DecisionRow[] {
  return db
    .prepare<[string], DecisionRow>(
      'SELECT * FROM orchestrator_decision WHERE task_id = ? ORDER BY id ASC',
    )
    .all(taskId)
}

/** Most recent decision a given invocation recorded for a phase and step. */
export function getLatestDecisionForTask(
  db: BetterSqlite3Database,
  taskId: string,
  phase: DecisionPhase,
  stepIndex: number,
): DecisionRow | undefined {
  return db
    .prepare<[string, string, number], DecisionRow>(`
      SELECT * FROM orchestrator_decision
      WHERE task_id = ? AND phase = ? AND step_index = ?
      ORDER BY id DESC LIMIT 1
    `)
    .get(taskId, phase, stepIndex)
}
