/**
 * ResumptionResolver: rebuilds a ProcessRun from the history store.
 *
 * `resolve` continues an interrupted run in place: the live step list
 * (injections included) and the injection counts come from the last run
 * snapshot, and results come from the successful worker logs below the
 * persisted index.
 *
 * `continueFrom` starts a child run in the parent's worktree with a fresh
 * step list and a new prompt.
 */

import { RecoveryError, TaskNotFoundError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { generateShortId } from '../../utils/helpers.js'
import type { HistoryStore, ProcessRunSnapshot, TaskLog } from '../history/history-store.js'
import {
  createProcessRun,
  type ProcessRun,
  type ProcessSpec,
  type StepResult,
  type WorktreeRef,
} from '../process/types.js'

const logger = createLogger('resumption')

export type ResumeKeyKind = 'task_id' | 'branch' | 'session_id'

export const RESUME_KEY_KINDS: readonly ResumeKeyKind[] = ['task_id', 'branch', 'session_id']

export interface ContinueOptions {
  /** Process definition for the child; defaults to the parent's */
  spec?: ProcessSpec
}

export class ResumptionResolver {
  constructor(private readonly _history: HistoryStore) {}

  /**
   * @throws {TaskNotFoundError} when no task matches the key
   * @throws {RecoveryError} when the run has no snapshot, already completed,
   *   or lacks a successful worker log for a step below its current index
   */
  resolve(key: string, kind: ResumeKeyKind): ProcessRun {
    const log = this._lookup(key, kind)
    const snapshot = this._snapshotFor(log)
    if (snapshot.status === 'completed') {
      throw new RecoveryError(`Process ${snapshot.processId} already completed; use continue to start a follow-up run`, {
        processId: snapshot.processId,
      })
    }

    const results: StepResult[] = this._history
      .listCompletedWorkerLogs(snapshot.processId, snapshot.currentIndex)
      .map((row) => {
        const result: StepResult = {
          stepIndex: row.step_index ?? 0,
          taskName: row.task_name,
          taskId: row.task_id,
          success: true,
          exitCode: row.exit_code ?? 0,
          durationMs: row.duration_ms ?? 0,
        }
        if (row.session_id !== null) result.sessionId = row.session_id
        return result
      })
    if (results.length !== snapshot.currentIndex) {
      throw new RecoveryError(
        `Process ${snapshot.processId} has successful worker logs for ${String(results.length)} of ${String(snapshot.currentIndex)} completed steps`,
        { processId: snapshot.processId, currentIndex: snapshot.currentIndex, found: results.length },
      )
    }

    const run: ProcessRun = {
      processId: snapshot.processId,
      spec: snapshot.spec,
      steps: snapshot.steps,
      results,
      currentIndex: snapshot.currentIndex,
      worktree: this._worktreeFor(snapshot, log),
      decisions: this._history.readDecisions(snapshot.processId),
      status: 'running',
      injectionCounts: { ...snapshot.injectionCounts },
    }
    if (snapshot.parentProcessId !== undefined) run.parentProcessId = snapshot.parentProcessId
    if (snapshot.userPrompt !== undefined) run.userPrompt = snapshot.userPrompt
    if (snapshot.baseCommit !== undefined) run.baseCommit = snapshot.baseCommit

    logger.info(
      { processId: run.processId, key, kind, currentIndex: run.currentIndex, totalSteps: run.steps.length },
      'Resolved run for resumption',
    )
    return run
  }

  /**
   * Start a child run of the process `parentTaskId` belongs to.
   * @throws {TaskNotFoundError} when the task is unknown
   * @throws {RecoveryError} when the parent process has no snapshot
   */
  continueFrom(parentTaskId: string, newPrompt: string, options: ContinueOptions = {}): ProcessRun {
    const log = this._lookup(parentTaskId, 'task_id')
    const parent = this._snapshotFor(log)

    const run = createProcessRun({
      processId: generateShortId(),
      spec: options.spec ?? parent.spec,
      worktree: this._worktreeFor(parent, log),
      userPrompt: newPrompt,
      parentProcessId: parent.processId,
    })
    logger.info(
      { processId: run.processId, parentProcessId: parent.processId, process: run.spec.name },
      'Created continuation run',
    )
    return run
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private _lookup(key: string, kind: ResumeKeyKind): TaskLog {
    let log: TaskLog | undefined
    switch (kind) {
      case 'task_id':
        log = this._history.getTaskLog(key)
        break
      case 'branch':
        log = this._history.findLatestTaskLogByBranch(key)
        break
      case 'session_id':
        log = this._history.findTaskLogBySession(key)
        break
    }
    if (log === undefined) throw new TaskNotFoundError(kind, key)
    return log
  }

  private _snapshotFor(log: TaskLog): ProcessRunSnapshot {
    const snapshot = this._history.loadProcessRun(log.process_id)
    if (snapshot === undefined) {
      throw new RecoveryError(`No saved state for process ${log.process_id}`, {
        processId: log.process_id,
        taskId: log.task_id,
      })
    }
    return snapshot
  }

  private _worktreeFor(snapshot: ProcessRunSnapshot, log: TaskLog): WorktreeRef {
    if (snapshot.worktree !== undefined) return snapshot.worktree
    if (log.worktree === null) {
      throw new RecoveryError(`No worktree recorded for process ${snapshot.processId}`, {
        processId: snapshot.processId,
      })
    }
    const worktree: WorktreeRef = { path: log.worktree }
    if (log.branch !== null) worktree.branch = log.branch
    if (log.main_repo !== null) worktree.mainRepo = log.main_repo
    return worktree
  }
}

export function createResumptionResolver(history: HistoryStore): ResumptionResolver {
  return new ResumptionResolver(history)
}
