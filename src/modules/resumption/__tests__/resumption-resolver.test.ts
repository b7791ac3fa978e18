/**
 * Tests for ResumptionResolver
 *
 * Runs are interrupted for real (a failing worker aborts the loop) and then
 * rebuilt from the in-memory history, so the snapshot written by the state
 * machine is what the resolver reads back.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { RecoveryError, TaskNotFoundError } from '../../../core/errors.js'
import type { HistoryStore } from '../../history/history-store.js'
import type { OrchestratorSettings } from '../../config/config-schema.js'
import { createProcessRun, type ProcessRun } from '../../process/types.js'
import { createOrchestratorSupervisor } from '../../orchestrator/orchestrator-supervisor.js'
import { createProcessRunStateMachine } from '../../orchestrator/process-run-state-machine.js'
import { createResumptionResolver, type ResumptionResolver } from '../resumption-resolver.js'
import {
  ScriptedExecutor,
  openTestHistory,
  registryWith,
  spec,
  step,
  type AgentScript,
} from '../../../../test/helpers/fakes.js'

const SETTINGS: OrchestratorSettings = { enabled: true, model: 'opus', max_injections: 1 }
const FEATURE = spec('feature', [step('plan'), step('implement'), step('review')])

let history: HistoryStore
let resolver: ResumptionResolver

beforeEach(() => {
  history = openTestHistory().history
  resolver = createResumptionResolver(history)
})

function machineFor(run: ProcessRun, script: AgentScript, settings: OrchestratorSettings = SETTINGS) {
  const registry = registryWith('plan', 'implement', 'review', 'lint')
  const executor = new ScriptedExecutor(history, registry, script)
  const supervisor = createOrchestratorSupervisor({ history, executor, registry })
  return {
    executor,
    machine: createProcessRunStateMachine(run, {
      history,
      executor,
      registry,
      supervisor,
      orchestratorSettings: settings,
    }),
  }
}

/**
 * Injects `lint` before step 0, then fails on `implement`. Leaves proc-1
 * aborted at index 2 of [lint, plan, implement, review].
 */
async function interruptedRun(): Promise<void> {
  let injected = false
  const { machine } = machineFor(
    createProcessRun({
      processId: 'proc-1',
      spec: FEATURE,
      worktree: { path: '/work/repo', branch: 'feature/login' },
      userPrompt: 'Add a login form',
    }),
    async (request, gate) => {
      if (request.task.name === 'orchestrator-pre' && !injected) {
        injected = true
        await gate.callTool(request.taskId, 'inject_steps', { steps: [{ task_name: 'lint' }] })
        return undefined
      }
      if (request.task.name === 'implement') return { exitCode: 1, error: 'compile error' }
      if (!request.isOrchestrator) return { exitCode: 0, sessionId: `sess-${request.task.name}` }
      return undefined
    },
  )
  const outcome = await machine.execute()
  expect(outcome.status).toBe('aborted')
  expect(outcome.abortReason).toBe('Step 2 (implement) failed with exit code 1: compile error')
}

function workerTaskId(taskName: string): string {
  const log = history.listTaskLogs('proc-1').find((row) => row.task_name === taskName)
  if (log === undefined) throw new Error(`no task_log row for ${taskName}`)
  return log.task_id
}

describe('ResumptionResolver', () => {
  // -------------------------------------------------------------------------
  describe('resolve', () => {
    it('rebuilds the live step list, position and results by task id', async () => {
      await interruptedRun()

      const run = resolver.resolve(workerTaskId('plan'), 'task_id')

      expect(run.processId).toBe('proc-1')
      expect(run.status).toBe('running')
      expect(run.abortReason).toBeUndefined()
      expect(run.currentIndex).toBe(2)
      expect(run.steps.map((s) => s.task)).toEqual(['lint', 'plan', 'implement', 'review'])
      expect(run.steps[0]?.originStepIndex).toBe(0)
      expect(run.injectionCounts).toEqual({ 0: 1 })
      expect(run.userPrompt).toBe('Add a login form')
      expect(run.worktree).toEqual({ path: '/work/repo', branch: 'feature/login' })
      expect(run.results.map((r) => [r.stepIndex, r.taskName, r.sessionId])).toEqual([
        [0, 'lint', 'sess-lint'],
        [1, 'plan', 'sess-plan'],
      ])
      expect(run.decisions[0]?.decision).toBe('inject')
    })

    it('resolves the same run by branch and by session id', async () => {
      await interruptedRun()

      expect(resolver.resolve('feature/login', 'branch').processId).toBe('proc-1')
      expect(resolver.resolve('sess-plan', 'session_id').currentIndex).toBe(2)
    })

    it('continues with the remaining steps only', async () => {
      await interruptedRun()
      const run = resolver.resolve('sess-lint', 'session_id')

      const { machine, executor } = machineFor(run, () => undefined)
      const outcome = await machine.execute()

      expect(outcome.status).toBe('completed')
      expect(executor.taskNames).toEqual([
        'orchestrator-pre',
        'implement',
        'orchestrator-post',
        'orchestrator-pre',
        'review',
        'orchestrator-post',
        'orchestrator-finalize',
      ])
      expect(outcome.results.map((r) => r.taskName)).toEqual(['lint', 'plan', 'implement', 'review'])
      expect(history.loadProcessRun('proc-1')?.status).toBe('completed')
    })

    it('refuses a completed run', async () => {
      const { machine } = machineFor(
        createProcessRun({ processId: 'proc-1', spec: FEATURE, worktree: { path: '/work/repo' } }),
        () => undefined,
        { ...SETTINGS, enabled: false },
      )
      await machine.execute()

      expect(() => resolver.resolve(workerTaskId('review'), 'task_id')).toThrow(
        'Process proc-1 already completed; use continue to start a follow-up run',
      )
    })

    it('refuses a run whose completed steps lack worker logs', () => {
      const run = createProcessRun({
        processId: 'proc-2',
        spec: FEATURE,
        worktree: { path: '/work/repo' },
      })
      run.currentIndex = 2
      history.saveProcessRun(run)
      history.appendTaskLog({ task_id: 'w-plan', process_id: 'proc-2', task_name: 'plan', step_index: 0 })
      history.completeTaskLog('w-plan', { success: true, exit_code: 0, duration_ms: 10 })
      history.appendTaskLog({ task_id: 'w-impl', process_id: 'proc-2', task_name: 'implement', step_index: 1 })
      history.completeTaskLog('w-impl', { success: false, exit_code: 1, duration_ms: 10 })

      expect(() => resolver.resolve('w-plan', 'task_id')).toThrow(RecoveryError)
      expect(() => resolver.resolve('w-plan', 'task_id')).toThrow(
        'Process proc-2 has successful worker logs for 1 of 2 completed steps',
      )
    })

    it('throws TaskNotFoundError for an unknown key', () => {
      expect(() => resolver.resolve('nope', 'branch')).toThrow(TaskNotFoundError)
      expect(() => resolver.resolve('nope', 'branch')).toThrow('No task found for branch: nope')
    })

    it('throws RecoveryError when the process has no snapshot', () => {
      history.appendTaskLog({ task_id: 'orphan-task', process_id: 'orphan', task_name: 'plan' })

      expect(() => resolver.resolve('orphan-task', 'task_id')).toThrow(RecoveryError)
      expect(() => resolver.resolve('orphan-task', 'task_id')).toThrow('No saved state for process orphan')
    })
  })

  // -------------------------------------------------------------------------
  describe('continueFrom', () => {
    it('starts a child run in the parent worktree with a fresh step list', async () => {
      await interruptedRun()

      const child = resolver.continueFrom(workerTaskId('plan'), 'Now add a logout button')

      expect(child.processId).not.toBe('proc-1')
      expect(child.parentProcessId).toBe('proc-1')
      expect(child.userPrompt).toBe('Now add a logout button')
      expect(child.worktree).toEqual({ path: '/work/repo', branch: 'feature/login' })
      expect(child.steps.map((s) => s.task)).toEqual(['plan', 'implement', 'review'])
      expect(child.currentIndex).toBe(0)
      expect(child.injectionCounts).toEqual({})
      expect(child.baseCommit).toBeUndefined()
    })

    it('uses a different process definition when given one', async () => {
      await interruptedRun()

      const child = resolver.continueFrom(workerTaskId('plan'), 'Polish', {
        spec: spec('polish', [step('review')]),
      })

      expect(child.spec.name).toBe('polish')
      expect(child.steps.map((s) => s.task)).toEqual(['review'])
    })

    it('throws TaskNotFoundError for an unknown parent task', () => {
      expect(() => resolver.continueFrom('missing', 'x')).toThrow('No task found for task_id: missing')
    })
  })
})
