/**
 * Human-readable progress lines for a process run, driven by the event bus.
 */

import type { ProcessEvents, TypedEventBus } from '../../core/event-bus.js'
import { formatDuration } from '../../utils/helpers.js'

type Write = (line: string) => void

export function formatStepStarted(e: ProcessEvents['process:step-started']): string {
  return `▶ [${String(e.stepIndex + 1)}/${String(e.totalSteps)}] ${e.taskName} (task ${e.taskId})`
}

export function formatStepCompleted(e: ProcessEvents['process:step-completed']): string {
  return `✓ [${String(e.stepIndex + 1)}] ${e.taskName} completed in ${formatDuration(e.durationMs)}`
}

export function formatStepFailed(e: ProcessEvents['process:step-failed']): string {
  const detail = e.error !== undefined ? `: ${e.error}` : ''
  return `✗ [${String(e.stepIndex + 1)}] ${e.taskName} failed with exit code ${String(e.exitCode)}${detail}`
}

export function formatDecision(e: ProcessEvents['orchestrator:decision']): string {
  const suffix = e.defaulted ? ' (default)' : ''
  return `  ↳ ${e.phase} @${String(e.stepIndex)}: ${e.decision}${suffix} - ${e.reasoning}`
}

export function formatInjected(e: ProcessEvents['process:steps-injected']): string {
  return `  + injected before step ${String(e.originStepIndex + 1)}: ${e.tasks.join(', ')}`
}

/**
 * Write one line per run event. Returns a function that detaches every
 * handler.
 */
export function attachProgressReporter(bus: TypedEventBus, write: Write): () => void {
  const handlers = {
    started: (e: ProcessEvents['process:started']) => {
      const from = e.currentIndex > 0 ? ` from step ${String(e.currentIndex + 1)}` : ''
      write(`Process ${e.processName} (${e.processId}): ${String(e.totalSteps)} step(s)${from}`)
    },
    stepStarted: (e: ProcessEvents['process:step-started']) => write(formatStepStarted(e)),
    stepCompleted: (e: ProcessEvents['process:step-completed']) => write(formatStepCompleted(e)),
    stepFailed: (e: ProcessEvents['process:step-failed']) => write(formatStepFailed(e)),
    decision: (e: ProcessEvents['orchestrator:decision']) => write(formatDecision(e)),
    injected: (e: ProcessEvents['process:steps-injected']) => write(formatInjected(e)),
    rejected: (e: ProcessEvents['orchestrator:injection-rejected']) =>
      write(`  ! injection limit reached at step ${String(e.originStepIndex + 1)} (${String(e.count)}/${String(e.maxInjections)})`),
    aborted: (e: ProcessEvents['process:aborted']) => write(`Aborted: ${e.reason}`),
    completed: (e: ProcessEvents['process:completed']) => {
      write(`Completed ${String(e.totalSteps)} step(s) in ${formatDuration(e.durationMs)}`)
      if (e.finalizeWarning !== undefined) write(`Warning: ${e.finalizeWarning}`)
    },
  }

  bus.on('process:started', handlers.started)
  bus.on('process:step-started', handlers.stepStarted)
  bus.on('process:step-completed', handlers.stepCompleted)
  bus.on('process:step-failed', handlers.stepFailed)
  bus.on('orchestrator:decision', handlers.decision)
  bus.on('process:steps-injected', handlers.injected)
  bus.on('orchestrator:injection-rejected', handlers.rejected)
  bus.on('process:aborted', handlers.aborted)
  bus.on('process:completed', handlers.completed)

  return () => {
    bus.off('process:started', handlers.started)
    bus.off('process:step-started', handlers.stepStarted)
    bus.off('process:step-completed', handlers.stepCompleted)
    bus.off('process:step-failed', handlers.stepFailed)
    bus.off('orchestrator:decision', handlers.decision)
    bus.off('process:steps-injected', handlers.injected)
    bus.off('orchestrator:injection-rejected', handlers.rejected)
    bus.off('process:aborted', handlers.aborted)
    bus.off('process:completed', handlers.completed)
  }
}
