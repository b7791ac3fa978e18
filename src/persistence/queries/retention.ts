/**
 * Retention queries: find processes with no recent activity and delete
 * everything recorded for them.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

export interface ExpiredProcessRow {
  process_id: string
  last_activity: string
  task_count: number
}

/**
 * Processes whose latest activity (task start or end, snapshot update) is
 * older than `cutoff`, oldest first.
 */
export function listProcessesInactiveSince(db: BetterSqlite3Database, cutoff: string): ExpiredProcessRow[] {
  return db
    .prepare<[string], ExpiredProcessRow>(`
      SELECT process_id, MAX(ts) AS last_activity, COUNT(task_id) AS task_count FROM (
        SELECT process_id, task_id, COALESCE(finished_at, failed_at, created_at) AS ts FROM task_log
        UNION ALL
        SELECT process_id, NULL AS task_id, updated_at AS ts FROM process_runs
      )
      GROUP BY process_id
      HAVING MAX(ts) < ?
      ORDER BY last_activity ASC, process_id ASC
    `)
    .all(cutoff)
}

/**
 * Delete a process's artifacts, results, decisions, task logs and snapshot
 * in one transaction. Returns the number of task logs removed.
 */
export function deleteProcessHistory(db: BetterSqlite3Database, processId: string): number {
  const remove = db.transaction((): number => {
    const tasksOf = 'SELECT task_id FROM task_log WHERE process_id = ?'
    db.prepare<[string]>(`DELETE FROM artifact WHERE task_id IN (${tasksOf})`).run(processId)
    db.prepare<[string]>(`DELETE FROM task_result WHERE task_id IN (${tasksOf})`).run(processId)
    db.prepare<[string]>(`DELETE FROM orchestrator_decision WHERE task_id IN (${tasksOf})`).run(processId)
    const removed = db.prepare<[string]>('DELETE FROM task_log WHERE process_id = ?').run(processId).changes
    db.prepare<[string]>('DELETE FROM process_runs WHERE process_id = ?').run(processId)
    return removed
  })
  return remove()
}
