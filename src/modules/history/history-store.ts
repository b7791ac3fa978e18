/**
 * HistoryStore: durable record of invocations, decisions, results and run
 * snapshots, keyed by process id and task id.
 */

import type {
  ArtifactFormat,
  CompleteTaskLogInput,
  CreateTaskLogInput,
  StepRecord,
  TaskLogRow,
} from '../../persistence/schemas/history.js'
import type {
  DecisionKind,
  DecisionPhase,
  OrchestratorDecision,
  ProcessRun,
  ProcessRunStatus,
  ProcessSpec,
  ProcessStep,
  WorktreeRef,
} from '../process/types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One worker or supervisor invocation, as stored. */
export type TaskLog = TaskLogRow

export type { CreateTaskLogInput, CompleteTaskLogInput }

/** Decision payload before it is stamped with a creation time. */
export type NewDecision = Omit<OrchestratorDecision, 'createdAt'>

export interface TaskResult {
  taskId: string
  resultText: string
  keyFiles: string[]
  tags: string[]
  /** Compressed form of `resultText`, when one was produced */
  summary?: string
  createdAt: string
  updatedAt: string
}

export interface NamedTaskResult extends TaskResult {
  taskName: string
  isOrchestrator: boolean
}

export interface WriteResultParams {
  taskId: string
  resultText: string
  keyFiles?: string[]
  tags?: string[]
}

export type { ArtifactFormat }

export interface Artifact {
  id: string
  taskId: string
  taskName: string
  processId: string
  /** Written by a supervisor invocation */
  isOrchestrator: boolean
  title: string
  content: string
  format: ArtifactFormat
  templateName?: string
  tags: string[]
  createdAt: string
}

export interface CreateArtifactParams {
  taskId: string
  title: string
  content: string
  format?: ArtifactFormat
  templateName?: string
  tags?: string[]
}

export interface KnowledgeEntry {
  key: string
  version: number
  content: string
  reason: string
  createdAt: string
}

/** A process with no activity since a cutoff */
export interface InactiveProcess {
  processId: string
  lastActivity: string
  taskCount: number
}

/** What the store keeps of a run between invocations of the driving loop. */
export interface ProcessRunSnapshot {
  processId: string
  spec: ProcessSpec
  steps: ProcessStep[]
  currentIndex: number
  status: ProcessRunStatus
  abortReason?: string
  parentProcessId?: string
  worktree?: WorktreeRef
  baseCommit?: string
  injectionCounts: Record<number, number>
  userPrompt?: string
  createdAt: string
  updatedAt: string
}

/**
 * Read model behind the state-query tool. Keys are snake_case because the
 * structure is handed to agents as JSON.
 */
export interface ProcessState {
  process_id: string
  process_name: string
  status: ProcessRunStatus
  abort_reason?: string
  current_index: number
  total_steps: number
  completed_steps: {
    step_index: number
    task_name: string
    task_id: string
    success: boolean
    exit_code: number | null
    duration_ms: number | null
  }[]
  pending_steps: (StepRecord & { step_index: number })[]
  orchestrator_decisions: {
    phase: DecisionPhase
    step_index: number
    decision: DecisionKind
    reasoning: string
    injected_steps: StepRecord[]
    task_id: string
    created_at: string
  }[]
}

// ---------------------------------------------------------------------------
// HistoryStore interface
// ---------------------------------------------------------------------------

export interface HistoryStore {
  appendTaskLog(input: CreateTaskLogInput): TaskLog
  completeTaskLog(taskId: string, input: CompleteTaskLogInput): TaskLog
  getTaskLog(taskId: string): TaskLog | undefined
  findTaskLogBySession(sessionId: string): TaskLog | undefined
  findLatestTaskLogByBranch(branch: string): TaskLog | undefined
  listTaskLogs(processId: string): TaskLog[]
  /** Latest successful worker log per step index below `beforeIndex` */
  listCompletedWorkerLogs(processId: string, beforeIndex: number): TaskLog[]

  /**
   * Validate and append a decision.
   * @throws {ValidationError} for an invalid shape or an unknown task id;
   *   nothing is written in that case.
   */
  appendDecision(processId: string, decision: NewDecision): OrchestratorDecision
  readDecisions(processId: string): OrchestratorDecision[]
  /** Decisions one supervisor invocation recorded, oldest first */
  readDecisionsForTask(taskId: string): OrchestratorDecision[]
  /** Most recent decision a supervisor invocation recorded for a phase/step */
  readLatestDecision(
    taskId: string,
    phase: DecisionPhase,
    stepIndex: number,
  ): OrchestratorDecision | undefined
  readProcessState(processId: string): ProcessState | undefined

  saveProcessRun(run: ProcessRun): void
  loadProcessRun(processId: string): ProcessRunSnapshot | undefined
  listRecentRuns(limit?: number): ProcessRunSnapshot[]

  /** Store a result; rewriting one drops its summary */
  writeResult(params: WriteResultParams): TaskResult
  /** @throws {ValidationError} when the task has no result */
  updateResultSummary(taskId: string, summary: string): TaskResult
  getResult(taskId: string): TaskResult | undefined
  getResultByTaskName(processId: string, taskName: string): TaskResult | undefined
  listResults(processId: string): NamedTaskResult[]

  /** @throws {ValidationError} for an unknown task or an invalid payload */
  createArtifact(params: CreateArtifactParams): Artifact
  getArtifact(id: string): Artifact | undefined
  listArtifactsForTask(taskId: string): Artifact[]
  listArtifactsForProcess(processId: string): Artifact[]

  /** Append the next version of `key` */
  writeKnowledge(key: string, content: string, reason: string): KnowledgeEntry
  /** Latest version, or the given one */
  getKnowledge(key: string, version?: number): KnowledgeEntry | undefined
  /** Every version of `key`, oldest first */
  listKnowledgeHistory(key: string): KnowledgeEntry[]

  listInactiveProcesses(cutoff: Date): InactiveProcess[]
  /** Remove everything recorded for a process; returns the task logs removed */
  deleteProcessHistory(processId: string): number
}
