/**
 * Unit tests for `stepwarden run`
 *
 * The agent CLI is replaced by a recording executor; the history database is
 * a file in a temporary workspace.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { runRunAction } from '../run.js'
import { captureOutput, createWorkspace, type CapturedOutput, type Workspace } from '../../../../test/helpers/cli.js'

interface RunSummary {
  process_id: string
  status: string
  abort_reason?: string
  completed_steps: number
}

let ws: Workspace
let output: CapturedOutput

beforeEach(() => {
  ws = createWorkspace()
  output = captureOutput()
})

afterEach(() => {
  output.restore()
  ws.cleanup()
  vi.restoreAllMocks()
})

describe('runRunAction', () => {
  it('runs every step under supervision and reports the outcome as JSON', async () => {
    const exitCode = await runRunAction({ process: 'feature', parallel: 1, outputFormat: 'json', runtime: ws.runtime })

    expect(exitCode).toBe(0)
    expect(ws.executor.taskNames).toEqual([
      'orchestrator-pre',
      'plan',
      'orchestrator-post',
      'orchestrator-pre',
      'implement',
      'orchestrator-post',
      'orchestrator-finalize',
    ])
    const summaries: RunSummary[] = JSON.parse(output.getStdout())
    expect(summaries).toHaveLength(1)
    expect(summaries[0]).toMatchObject({ status: 'completed', completed_steps: 2 })
    expect(summaries[0]?.process_id).toMatch(/^[0-9a-f]{8}$/)
  })

  it('hands the user prompt to every worker', async () => {
    await runRunAction({
      process: 'feature',
      prompt: 'Add a login form',
      parallel: 1,
      outputFormat: 'json',
      runtime: ws.runtime,
    })

    const workers = ws.executor.requests.filter((r) => !r.isOrchestrator)
    expect(workers).toHaveLength(2)
    for (const request of workers) {
      expect(request.prompt).toContain('Add a login form')
    }
  })

  it('starts independent runs with --parallel', async () => {
    const exitCode = await runRunAction({ process: 'feature', parallel: 2, outputFormat: 'json', runtime: ws.runtime })

    expect(exitCode).toBe(0)
    const summaries: RunSummary[] = JSON.parse(output.getStdout())
    expect(summaries.map((s) => s.status)).toEqual(['completed', 'completed'])
    expect(new Set(summaries.map((s) => s.process_id)).size).toBe(2)
    expect(ws.executor.taskNames.filter((name) => name === 'plan')).toHaveLength(2)
  })

  it('exits 1 when a step fails', async () => {
    ws.executor.script = (request) => (request.task.name === 'implement' ? { exitCode: 1 } : undefined)

    const exitCode = await runRunAction({ process: 'feature', parallel: 1, outputFormat: 'json', runtime: ws.runtime })

    expect(exitCode).toBe(1)
    const summaries: RunSummary[] = JSON.parse(output.getStdout())
    expect(summaries[0]).toMatchObject({
      status: 'aborted',
      abort_reason: 'Step 1 (implement) failed with exit code 1',
      completed_steps: 1,
    })
  })

  it('prints progress lines in human mode', async () => {
    const exitCode = await runRunAction({ process: 'feature', parallel: 1, outputFormat: 'human', runtime: ws.runtime })

    expect(exitCode).toBe(0)
    const lines = output.getStdout().split('\n')
    expect(lines[0]).toMatch(/^Process feature \([0-9a-f]{8}\): 2 step\(s\)$/)
    expect(lines.some((line) => line.startsWith('▶ [1/2] plan (task '))).toBe(true)
    expect(lines.some((line) => line.startsWith('Completed 2 step(s) in '))).toBe(true)
  })

  it('exits 2 for an unknown process', async () => {
    const exitCode = await runRunAction({ process: 'nope', parallel: 1, outputFormat: 'json', runtime: ws.runtime })

    expect(exitCode).toBe(2)
    expect(output.getStderr()).toBe('Error: Process not found: nope\n')
    expect(ws.executor.requests).toEqual([])
  })

  it('exits 2 for a non-positive --parallel', async () => {
    const exitCode = await runRunAction({ process: 'feature', parallel: 0, outputFormat: 'json', runtime: ws.runtime })

    expect(exitCode).toBe(2)
    expect(output.getStderr()).toBe('Error: --parallel must be a positive integer\n')
  })
})
