/**
 * ProcessEvents: every typed event emitted while driving a process run.
 *
 * Event naming convention: {module}:{action} (e.g. "process:step-started").
 */

import type { DecisionKind, DecisionPhase } from '../persistence/schemas/history.js'

export interface ProcessEvents {
  // -------------------------------------------------------------------------
  // Run lifecycle
  // -------------------------------------------------------------------------

  /** Driving loop started (fresh, resumed or continued) */
  'process:started': {
    processId: string
    processName: string
    totalSteps: number
    currentIndex: number
    parentProcessId?: string
  }

  /** All steps ran and finalize concluded */
  'process:completed': {
    processId: string
    totalSteps: number
    durationMs: number
    /** Finalize returned something other than proceed */
    finalizeWarning?: string
  }

  /** Run stopped by an abort decision or a worker failure */
  'process:aborted': {
    processId: string
    stepIndex: number
    reason: string
  }

  // -------------------------------------------------------------------------
  // Worker steps
  // -------------------------------------------------------------------------

  'process:step-started': {
    processId: string
    stepIndex: number
    totalSteps: number
    taskName: string
    taskId: string
  }

  'process:step-completed': {
    processId: string
    stepIndex: number
    taskName: string
    taskId: string
    durationMs: number
  }

  'process:step-failed': {
    processId: string
    stepIndex: number
    taskName: string
    taskId: string
    exitCode: number
    error?: string
  }

  /** Injected steps were inserted into the live list */
  'process:steps-injected': {
    processId: string
    originStepIndex: number
    tasks: string[]
  }

  // -------------------------------------------------------------------------
  // Supervisor phases
  // -------------------------------------------------------------------------

  'orchestrator:phase-started': {
    processId: string
    phase: DecisionPhase
    stepIndex: number
    taskId: string
  }

  /** Effective decision of a pre_step or finalize phase */
  'orchestrator:decision': {
    processId: string
    phase: DecisionPhase
    stepIndex: number
    decision: DecisionKind
    reasoning: string
    /** True when no usable decision was recorded and proceed was assumed */
    defaulted: boolean
  }

  /** A post_step review finished */
  'orchestrator:review': {
    processId: string
    stepIndex: number
    taskId: string
    hasReview: boolean
  }

  /** An inject decision was downgraded because the origin index hit its limit */
  'orchestrator:injection-rejected': {
    processId: string
    originStepIndex: number
    count: number
    maxInjections: number
  }
}
