/**
 * Text handed to agents alongside their task prompt.
 */

import type { DecisionPhase, ProcessRun, ProcessStep } from '../process/types.js'
import type { TaskDefinition } from '../tasks/types.js'

function describeStep(step: ProcessStep): string {
  return step.prompt ? `${step.task} (${step.prompt})` : step.task
}

/**
 * Orientation for a supervisor invocation. `stepIndex` equal to the step
 * count (finalize) omits the step line.
 */
export function buildOrchestratorContext(
  run: ProcessRun,
  phase: DecisionPhase,
  stepIndex: number,
): string {
  const total = run.steps.length
  const lines = [
    `Process: ${run.spec.name} (${run.processId})`,
    `Phase: ${phase} for step ${String(stepIndex + 1)} of ${String(total)}`,
  ]
  const step = stepIndex < total ? run.steps[stepIndex] : undefined
  if (step !== undefined) {
    lines.push(`Step: ${describeStep(step)}`)
  }
  lines.push(`Completed steps: ${String(run.results.length)}/${String(total)}`)
  if (run.userPrompt) {
    lines.push(`User request: ${run.userPrompt}`)
  }
  return lines.join('\n')
}

/** Where a worker step sits in the run, with every step's status. */
export function buildStatusPrompt(run: ProcessRun, stepIndex: number): string {
  const lines = [
    `You are running step ${String(stepIndex + 1)} of ${String(run.steps.length)} in process "${run.spec.name}".`,
    '',
    'Steps:',
  ]
  run.steps.forEach((step, i) => {
    const marker = i < stepIndex ? 'COMPLETED' : i === stepIndex ? 'CURRENT' : 'PENDING'
    const origin = step.originStepIndex !== undefined ? ' [injected]' : ''
    lines.push(`  ${String(i + 1)}. [${marker}] ${describeStep(step)}${origin}`)
  })
  return lines.join('\n')
}

/** Task prompt, then the step's own prompt, then the user's request. */
export function buildWorkerPrompt(
  task: TaskDefinition,
  step: ProcessStep,
  userPrompt: string | undefined,
): string {
  const parts = [task.prompt, step.prompt ?? '', userPrompt ? `User request:\n${userPrompt}` : '']
  return parts.filter((part) => part.trim() !== '').join('\n\n')
}
