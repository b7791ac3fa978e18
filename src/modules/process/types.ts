/**
 * Domain types for supervised process runs.
 */

import type {
  DecisionKind,
  DecisionPhase,
  ProcessRunStatus,
} from '../../persistence/schemas/history.js'

export type { DecisionKind, DecisionPhase, ProcessRunStatus }

// ---------------------------------------------------------------------------
// Steps and process definitions
// ---------------------------------------------------------------------------

/** One unit of delegated work. */
export interface ProcessStep {
  /** Task name, resolved through the task registry */
  task: string
  engine?: string
  model?: string
  prompt?: string
  /** When true, no supervisor phase brackets this step */
  skipOrchestrator: boolean
  /**
   * Index that was current when the supervisor decided to inject this step.
   * Undefined for steps that came from the process definition.
   */
  originStepIndex?: number
}

/** Orchestrator settings after defaults and overlays are applied. */
export interface OrchestratorConfig {
  enabled: boolean
  engine?: string
  model: string
  maxInjections: number
  image?: string
}

/** A process-level overlay: any subset of the orchestrator settings. */
export type OrchestratorOverlay = {
  [K in keyof OrchestratorConfig]?: OrchestratorConfig[K] | null
}

export interface ProcessSpec {
  name: string
  description?: string
  steps: readonly ProcessStep[]
  orchestrator?: OrchestratorOverlay
  /** File the definition was loaded from, when it came from disk */
  source?: string
}

// ---------------------------------------------------------------------------
// Worktree reference
// ---------------------------------------------------------------------------

/**
 * Opaque handle on the filesystem/version-control context a run operates in.
 * Created and destroyed outside the orchestrator.
 */
export interface WorktreeRef {
  path: string
  branch?: string
  mainRepo?: string
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export interface StepResult {
  stepIndex: number
  taskName: string
  taskId: string
  success: boolean
  exitCode: number
  durationMs: number
  sessionId?: string
}

/** Immutable supervisor verdict, as stored in the audit trail. */
export interface OrchestratorDecision {
  phase: DecisionPhase
  stepIndex: number
  decision: DecisionKind
  reasoning: string
  /** Non-empty exactly when `decision` is `inject` */
  injectedSteps: ProcessStep[]
  taskId: string
  createdAt: string
}

// ---------------------------------------------------------------------------
// ProcessRun
// ---------------------------------------------------------------------------

/**
 * Live state of one pipeline execution. Mutated only by the state machine
 * that drives it.
 */
export interface ProcessRun {
  processId: string
  spec: ProcessSpec
  /** Live step list: the spec's steps plus any accepted injections */
  steps: ProcessStep[]
  results: StepResult[]
  currentIndex: number
  worktree: WorktreeRef
  decisions: OrchestratorDecision[]
  status: ProcessRunStatus
  abortReason?: string
  parentProcessId?: string
  /** Prompt supplied by the user for the whole run */
  userPrompt?: string
  /** Commit the worktree was at when the run started */
  baseCommit?: string
  /** Accepted injections per origin index, carried across resumption */
  injectionCounts: Record<number, number>
}

/** Create a fresh run for a process definition. */
export function createProcessRun(params: {
  processId: string
  spec: ProcessSpec
  worktree: WorktreeRef
  userPrompt?: string
  parentProcessId?: string
  baseCommit?: string
}): ProcessRun {
  return {
    processId: params.processId,
    spec: params.spec,
    steps: params.spec.steps.map((step) => ({ ...step })),
    results: [],
    currentIndex: 0,
    worktree: params.worktree,
    decisions: [],
    status: 'running',
    userPrompt: params.userPrompt,
    parentProcessId: params.parentProcessId,
    baseCommit: params.baseCommit,
    injectionCounts: {},
  }
}
