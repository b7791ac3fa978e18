/**
 * Text rendering for `stepwarden history`.
 */

import type { ProcessRunSnapshot, ProcessState } from '../../modules/history/history-store.js'
import { formatDuration } from '../../utils/helpers.js'

export function renderRunList(runs: ProcessRunSnapshot[]): string {
  if (runs.length === 0) return 'No process runs recorded.'
  const lines = ['PROCESS ID  NAME                 STATUS     STEP     UPDATED']
  for (const run of runs) {
    const step = `${String(run.currentIndex)}/${String(run.steps.length)}`
    lines.push(
      `${run.processId.padEnd(10)}  ${run.spec.name.padEnd(20)} ${run.status.padEnd(10)} ${step.padEnd(8)} ${run.updatedAt}`,
    )
  }
  return lines.join('\n')
}

export function renderProcessState(state: ProcessState): string {
  const lines = [
    `Process ${state.process_name} (${state.process_id})`,
    `Status: ${state.status}${state.abort_reason !== undefined ? ` (${state.abort_reason})` : ''}`,
    `Progress: ${String(state.current_index)}/${String(state.total_steps)}`,
  ]

  if (state.completed_steps.length > 0) {
    lines.push('', 'Completed:')
    for (const step of state.completed_steps) {
      const took = step.duration_ms !== null ? ` in ${formatDuration(step.duration_ms)}` : ''
      lines.push(`  ${String(step.step_index + 1)}. ${step.task_name} [${step.task_id}]${took}`)
    }
  }

  if (state.pending_steps.length > 0) {
    lines.push('', 'Pending:')
    for (const step of state.pending_steps) {
      const injected = step.origin_step_index !== undefined ? ' [injected]' : ''
      lines.push(`  ${String(step.step_index + 1)}. ${step.task}${injected}`)
    }
  }

  if (state.orchestrator_decisions.length > 0) {
    lines.push('', 'Decisions:')
    for (const d of state.orchestrator_decisions) {
      const injected = d.injected_steps.length > 0 ? ` (${d.injected_steps.map((s) => s.task).join(', ')})` : ''
      lines.push(`  ${d.phase} @${String(d.step_index)}: ${d.decision}${injected} - ${d.reasoning}`)
    }
  }

  return lines.join('\n')
}
