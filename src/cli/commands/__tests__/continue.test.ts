/**
 * Unit tests for `stepwarden continue`
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { runContinueAction } from '../continue.js'
import { runRunAction } from '../run.js'
import { runHistoryAction } from '../history.js'
import { captureOutput, createWorkspace, type CapturedOutput, type Workspace } from '../../../../test/helpers/cli.js'

let ws: Workspace
let output: CapturedOutput

beforeEach(() => {
  ws = createWorkspace()
  output = captureOutput()
})

afterEach(() => {
  output.restore()
  ws.cleanup()
})

function resetOutput(): string {
  const stdout = output.getStdout()
  output.restore()
  output = captureOutput()
  return stdout
}

async function completedRun(): Promise<{ processId: string; implementTaskId: string }> {
  await runRunAction({ process: 'feature', parallel: 1, outputFormat: 'json', runtime: ws.runtime })
  const summaries: { process_id: string }[] = JSON.parse(resetOutput())
  const processId = summaries[0]?.process_id ?? ''
  await runHistoryAction({ processId, limit: 20, outputFormat: 'json', runtime: ws.runtime })
  const state: { completed_steps: { task_id: string }[] } = JSON.parse(resetOutput())
  ws.executor.requests.length = 0
  return { processId, implementTaskId: state.completed_steps[1]?.task_id ?? '' }
}

describe('runContinueAction', () => {
  it('starts a follow-up run linked to its parent', async () => {
    const { processId, implementTaskId } = await completedRun()

    const exitCode = await runContinueAction({
      taskId: implementTaskId,
      prompt: 'Address the review comments',
      outputFormat: 'json',
      runtime: ws.runtime,
    })

    expect(exitCode).toBe(0)
    const summaries: { process_id: string; status: string }[] = JSON.parse(resetOutput())
    const childId = summaries[0]?.process_id
    expect(childId).not.toBe(processId)
    expect(summaries[0]?.status).toBe('completed')

    const workers = ws.executor.requests.filter((r) => !r.isOrchestrator)
    expect(workers.map((r) => r.task.name)).toEqual(['plan', 'implement'])
    expect(workers[0]?.prompt).toContain('User request:\nAddress the review comments')

    await runHistoryAction({ limit: 20, outputFormat: 'json', runtime: ws.runtime })
    const rows: { process_id: string; parent_process_id: string | null }[] = JSON.parse(output.getStdout())
    expect(rows.find((r) => r.process_id === childId)?.parent_process_id).toBe(processId)
  })

  it('exits 2 for an empty prompt', async () => {
    const exitCode = await runContinueAction({ taskId: 'any', prompt: '  ', outputFormat: 'json', runtime: ws.runtime })

    expect(exitCode).toBe(2)
    expect(output.getStderr()).toBe('Error: --prompt must not be empty\n')
  })

  it('exits 2 for an unknown task id', async () => {
    const exitCode = await runContinueAction({
      taskId: 'missing',
      prompt: 'More work',
      outputFormat: 'json',
      runtime: ws.runtime,
    })

    expect(exitCode).toBe(2)
    expect(output.getStderr()).toBe('Error: No task found for task_id: missing\n')
  })
})
