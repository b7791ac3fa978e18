/**
 * SQLite-backed HistoryStore.
 *
 * better-sqlite3 is synchronous, so every write for a process happens in the
 * order the driving loop issues it. Separate OS processes sharing the file
 * (parallel runs, tool servers) are serialized by SQLite's WAL locking.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { z, ZodError } from 'zod'
import { ValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import {
  completeTaskLog,
  getLatestTaskLogByBranch,
  getTaskLog,
  getTaskLogBySession,
  insertTaskLog,
  listCompletedWorkerLogs,
  listTaskLogsForProcess,
} from '../../persistence/queries/task-log.js'
import {
  getLatestDecisionForTask,
  insertDecision,
  listDecisionsForProcess,
  listDecisionsForTask,
  type DecisionRow,
} from '../../persistence/queries/decisions.js'
import {
  getLatestResultByTaskName,
  getResult,
  listResultsForProcess,
  updateResultSummary,
  upsertResult,
  type TaskResultRow,
} from '../../persistence/queries/results.js'
import {
  getArtifact,
  insertArtifact,
  listArtifactsForProcess,
  listArtifactsForTask,
  type ArtifactWithTaskRow,
} from '../../persistence/queries/artifacts.js'
import {
  getKnowledgeVersion,
  getLatestKnowledge,
  insertKnowledge,
  listKnowledgeHistory,
  type KnowledgeRow,
} from '../../persistence/queries/knowledge.js'
import { deleteProcessHistory, listProcessesInactiveSince } from '../../persistence/queries/retention.js'
import {
  getProcessRun,
  listRecentProcessRuns,
  upsertProcessRun,
  type ProcessRunRow,
} from '../../persistence/queries/process-runs.js'
import type { DecisionPhase } from '../../persistence/schemas/history.js'
import { generateShortId } from '../../utils/helpers.js'
import type { OrchestratorDecision, ProcessRun } from '../process/types.js'
import {
  deserializeSpec,
  parseStepList,
  serializeSpec,
  toStepRecord,
} from '../process/serialization.js'
import type {
  Artifact,
  CompleteTaskLogInput,
  CreateArtifactParams,
  CreateTaskLogInput,
  HistoryStore,
  InactiveProcess,
  KnowledgeEntry,
  NamedTaskResult,
  NewDecision,
  ProcessRunSnapshot,
  ProcessState,
  TaskLog,
  TaskResult,
  WriteResultParams,
} from './history-store.js'

const logger = createLogger('history')

const StringListSchema = z.array(z.string())
const InjectionCountsSchema = z.record(z.string(), z.number().int().min(0))

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toDecision(row: DecisionRow): OrchestratorDecision {
  return {
    phase: row.phase,
    stepIndex: row.step_index,
    decision: row.decision,
    reasoning: row.reasoning,
    injectedSteps: parseStepList(row.injected_steps, 'orchestrator_decision.injected_steps'),
    taskId: row.task_id,
    createdAt: row.created_at,
  }
}

function parseStringList(json: string): string[] {
  const parsed = StringListSchema.safeParse(JSON.parse(json))
  return parsed.success ? parsed.data : []
}

function toResult(row: TaskResultRow): TaskResult {
  const result: TaskResult = {
    taskId: row.task_id,
    resultText: row.result_text,
    keyFiles: parseStringList(row.key_files),
    tags: parseStringList(row.tags),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
  if (row.has_summary === 1 && row.summary_text !== null) result.summary = row.summary_text
  return result
}

function toArtifact(row: ArtifactWithTaskRow): Artifact {
  const artifact: Artifact = {
    id: row.id,
    taskId: row.task_id,
    taskName: row.task_name,
    processId: row.process_id,
    isOrchestrator: row.is_orchestrator === 1,
    title: row.title,
    content: row.content,
    format: row.format,
    tags: parseStringList(row.tags),
    createdAt: row.created_at,
  }
  if (row.template_name !== null) artifact.templateName = row.template_name
  return artifact
}

function toKnowledge(row: KnowledgeRow): KnowledgeEntry {
  return {
    key: row.key,
    version: row.version,
    content: row.content,
    reason: row.reason,
    createdAt: row.created_at,
  }
}

function toSnapshot(row: ProcessRunRow): ProcessRunSnapshot {
  const counts: Record<number, number> = {}
  const parsedCounts = InjectionCountsSchema.safeParse(JSON.parse(row.injection_counts))
  if (parsedCounts.success) {
    for (const [key, count] of Object.entries(parsedCounts.data)) {
      counts[Number(key)] = count
    }
  }

  return {
    processId: row.process_id,
    spec: deserializeSpec(row.spec_json),
    steps: parseStepList(row.steps_json, 'process_runs.steps_json'),
    currentIndex: row.current_index,
    status: row.status,
    abortReason: row.abort_reason ?? undefined,
    parentProcessId: row.parent_process_id ?? undefined,
    worktree:
      row.worktree !== null
        ? {
            path: row.worktree,
            branch: row.branch ?? undefined,
            mainRepo: row.main_repo ?? undefined,
          }
        : undefined,
    baseCommit: row.base_commit ?? undefined,
    injectionCounts: counts,
    userPrompt: row.user_prompt ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function zodMessage(err: ZodError): string {
  return err.issues.map((issue) => issue.message).join('; ')
}

// ---------------------------------------------------------------------------
// SqliteHistoryStore
// ---------------------------------------------------------------------------

export class SqliteHistoryStore implements HistoryStore {
  constructor(private readonly _db: BetterSqlite3Database) {}

  // -- task log --------------------------------------------------------------

  appendTaskLog(input: CreateTaskLogInput): TaskLog {
    try {
      return insertTaskLog(this._db, input)
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ValidationError(`Invalid task log: ${zodMessage(err)}`, { issues: err.issues })
      }
      throw err
    }
  }

  completeTaskLog(taskId: string, input: CompleteTaskLogInput): TaskLog {
    const row = completeTaskLog(this._db, taskId, input)
    if (row === undefined) {
      throw new ValidationError(`Task ${taskId} not found in task_log`, { taskId })
    }
    return row
  }

  getTaskLog(taskId: string): TaskLog | undefined {
    return getTaskLog(this._db, taskId)
  }

  findTaskLogBySession(sessionId: string): TaskLog | undefined {
    return getTaskLogBySession(this._db, sessionId)
  }

  findLatestTaskLogByBranch(branch: string): TaskLog | undefined {
    return getLatestTaskLogByBranch(this._db, branch)
  }

  listTaskLogs(processId: string): TaskLog[] {
    return listTaskLogsForProcess(this._db, processId)
  }

  listCompletedWorkerLogs(processId: string, beforeIndex: number): TaskLog[] {
    return listCompletedWorkerLogs(this._db, processId, beforeIndex)
  }

  // -- decisions -------------------------------------------------------------

  appendDecision(processId: string, decision: NewDecision): OrchestratorDecision {
    const task = getTaskLog(this._db, decision.taskId)
    if (task === undefined) {
      throw new ValidationError(`Task ${decision.taskId} not found in task_log`, {
        taskId: decision.taskId,
      })
    }
    if (task.process_id !== processId) {
      throw new ValidationError(
        `Task ${decision.taskId} belongs to process ${task.process_id}, not ${processId}`,
        { taskId: decision.taskId, processId },
      )
    }

    let row: DecisionRow
    try {
      row = insertDecision(this._db, processId, {
        task_id: decision.taskId,
        phase: decision.phase,
        step_index: decision.stepIndex,
        decision: decision.decision,
        reasoning: decision.reasoning,
        injected_steps: decision.injectedSteps.map(toStepRecord),
      })
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ValidationError(`Invalid decision: ${zodMessage(err)}`, { issues: err.issues })
      }
      throw err
    }

    logger.debug(
      { processId, taskId: row.task_id, phase: row.phase, decision: row.decision },
      'Decision recorded',
    )
    return toDecision(row)
  }

  readDecisions(processId: string): OrchestratorDecision[] {
    return listDecisionsForProcess(this._db, processId).map(toDecision)
  }

  readDecisionsForTask(taskId: string): OrchestratorDecision[] {
    return listDecisionsForTask(this._db, taskId).map(toDecision)
  }

  readLatestDecision(
    taskId: string,
    phase: DecisionPhase,
    stepIndex: number,
  ): OrchestratorDecision | undefined {
    const row = getLatestDecisionForTask(this._db, taskId, phase, stepIndex)
    return row !== undefined ? toDecision(row) : undefined
  }

  readProcessState(processId: string): ProcessState | undefined {
    const runRow = getProcessRun(this._db, processId)
    if (runRow === undefined) return undefined
    const snapshot = toSnapshot(runRow)

    const completed = listCompletedWorkerLogs(this._db, processId, snapshot.currentIndex)
    const decisions = listDecisionsForProcess(this._db, processId)

    const state: ProcessState = {
      process_id: processId,
      process_name: snapshot.spec.name,
      status: snapshot.status,
      current_index: snapshot.currentIndex,
      total_steps: snapshot.steps.length,
      completed_steps: completed.map((log) => ({
        step_index: log.step_index ?? 0,
        task_name: log.task_name,
        task_id: log.task_id,
        success: log.success === 1,
        exit_code: log.exit_code,
        duration_ms: log.duration_ms,
      })),
      pending_steps: snapshot.steps
        .slice(snapshot.currentIndex)
        .map((step, offset) => ({
          step_index: snapshot.currentIndex + offset,
          ...toStepRecord(step),
        })),
      orchestrator_decisions: decisions.map((row) => {
        const decision = toDecision(row)
        return {
          phase: decision.phase,
          step_index: decision.stepIndex,
          decision: decision.decision,
          reasoning: decision.reasoning,
          injected_steps: decision.injectedSteps.map(toStepRecord),
          task_id: decision.taskId,
          created_at: decision.createdAt,
        }
      }),
    }
    if (snapshot.abortReason !== undefined) state.abort_reason = snapshot.abortReason
    return state
  }

  // -- run snapshots ---------------------------------------------------------

  saveProcessRun(run: ProcessRun): void {
    const counts: Record<string, number> = {}
    for (const [key, count] of Object.entries(run.injectionCounts)) {
      counts[key] = count
    }

    upsertProcessRun(this._db, {
      process_id: run.processId,
      process_name: run.spec.name,
      spec_json: serializeSpec(run.spec),
      steps: run.steps.map(toStepRecord),
      current_index: run.currentIndex,
      status: run.status,
      abort_reason: run.abortReason ?? null,
      parent_process_id: run.parentProcessId ?? null,
      worktree: run.worktree.path,
      branch: run.worktree.branch ?? null,
      main_repo: run.worktree.mainRepo ?? null,
      base_commit: run.baseCommit ?? null,
      injection_counts: counts,
      user_prompt: run.userPrompt ?? null,
    })
  }

  loadProcessRun(processId: string): ProcessRunSnapshot | undefined {
    const row = getProcessRun(this._db, processId)
    return row !== undefined ? toSnapshot(row) : undefined
  }

  listRecentRuns(limit?: number): ProcessRunSnapshot[] {
    return listRecentProcessRuns(this._db, limit).map(toSnapshot)
  }

  // -- results ---------------------------------------------------------------

  writeResult(params: WriteResultParams): TaskResult {
    if (getTaskLog(this._db, params.taskId) === undefined) {
      throw new ValidationError(`Task ${params.taskId} not found in task_log`, {
        taskId: params.taskId,
      })
    }
    return toResult(
      upsertResult(this._db, {
        task_id: params.taskId,
        result_text: params.resultText,
        key_files: params.keyFiles,
        tags: params.tags,
      }),
    )
  }

  updateResultSummary(taskId: string, summary: string): TaskResult {
    const row = updateResultSummary(this._db, taskId, summary)
    if (row === undefined) {
      throw new ValidationError(`Task ${taskId} has no result to summarize`, { taskId })
    }
    return toResult(row)
  }

  getResult(taskId: string): TaskResult | undefined {
    const row = getResult(this._db, taskId)
    return row !== undefined ? toResult(row) : undefined
  }

  getResultByTaskName(processId: string, taskName: string): TaskResult | undefined {
    const row = getLatestResultByTaskName(this._db, processId, taskName)
    return row !== undefined ? toResult(row) : undefined
  }

  listResults(processId: string): NamedTaskResult[] {
    return listResultsForProcess(this._db, processId).map((row) => ({
      ...toResult(row),
      taskName: row.task_name,
      isOrchestrator: row.is_orchestrator === 1,
    }))
  }

  // -- artifacts -------------------------------------------------------------

  createArtifact(params: CreateArtifactParams): Artifact {
    if (getTaskLog(this._db, params.taskId) === undefined) {
      throw new ValidationError(`Task ${params.taskId} not found in task_log`, { taskId: params.taskId })
    }
    try {
      return toArtifact(
        insertArtifact(this._db, {
          id: generateShortId(),
          task_id: params.taskId,
          title: params.title,
          content: params.content,
          format: params.format,
          template_name: params.templateName ?? null,
          tags: params.tags,
        }),
      )
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ValidationError(`Invalid artifact: ${zodMessage(err)}`, { issues: err.issues })
      }
      throw err
    }
  }

  getArtifact(id: string): Artifact | undefined {
    const row = getArtifact(this._db, id)
    return row !== undefined ? toArtifact(row) : undefined
  }

  listArtifactsForTask(taskId: string): Artifact[] {
    return listArtifactsForTask(this._db, taskId).map(toArtifact)
  }

  listArtifactsForProcess(processId: string): Artifact[] {
    return listArtifactsForProcess(this._db, processId).map(toArtifact)
  }

  // -- knowledge -------------------------------------------------------------

  writeKnowledge(key: string, content: string, reason: string): KnowledgeEntry {
    try {
      const row = insertKnowledge(this._db, { key, content, reason })
      logger.debug({ key, version: row.version }, 'Knowledge written')
      return toKnowledge(row)
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ValidationError(`Invalid knowledge entry: ${zodMessage(err)}`, { issues: err.issues })
      }
      throw err
    }
  }

  getKnowledge(key: string, version?: number): KnowledgeEntry | undefined {
    const row =
      version !== undefined ? getKnowledgeVersion(this._db, key, version) : getLatestKnowledge(this._db, key)
    return row !== undefined ? toKnowledge(row) : undefined
  }

  listKnowledgeHistory(key: string): KnowledgeEntry[] {
    return listKnowledgeHistory(this._db, key).map(toKnowledge)
  }

  // -- retention -------------------------------------------------------------

  listInactiveProcesses(cutoff: Date): InactiveProcess[] {
    return listProcessesInactiveSince(this._db, cutoff.toISOString()).map((row) => ({
      processId: row.process_id,
      lastActivity: row.last_activity,
      taskCount: row.task_count,
    }))
  }

  deleteProcessHistory(processId: string): number {
    const removed = deleteProcessHistory(this._db, processId)
    logger.info({ processId, removed }, 'Process history deleted')
    return removed
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createHistoryStore(db: BetterSqlite3Database): HistoryStore {
  return new SqliteHistoryStore(db)
}
