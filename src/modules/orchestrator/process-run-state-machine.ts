/**
 * ProcessRunStateMachine: drives one ProcessRun through its live step list.
 *
 * Per step, unless the step skips supervision:
 *   pre_step decision → (inject: splice and re-evaluate | abort: stop)
 *   → worker execution → post_step review
 * then a single finalize phase once every step has completed.
 *
 * Worker failures abort the run. Supervisor failures never do: the
 * supervisor turns them into a default `proceed` or a missing review.
 *
 * The loop is the only writer of the run. Agents request injections through
 * the history store; the loop applies them after the agent's process exits.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { GitError, RecoveryError } from '../../core/errors.js'
import { createLogger, runLogger } from '../../utils/logger.js'
import { errorMessage, generateShortId } from '../../utils/helpers.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { HistoryStore } from '../history/history-store.js'
import type { Executor, ExecutionResult } from '../executor/types.js'
import type { TaskRegistry } from '../tasks/types.js'
import type { OrchestratorSettings } from '../config/config-schema.js'
import type { RepositoryInspector } from '../git/repository-inspector.js'
import type {
  OrchestratorConfig,
  OrchestratorDecision,
  ProcessRun,
  ProcessRunStatus,
  ProcessStep,
  StepResult,
} from '../process/types.js'
import { InjectionGuard } from './injection-guard.js'
import { resolveOrchestratorConfig } from './orchestrator-config.js'
import { buildStatusPrompt, buildWorkerPrompt } from './orchestrator-context.js'
import type { OrchestratorSupervisor } from './orchestrator-supervisor.js'

const logger = createLogger('orchestrator:state-machine')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunState =
  | 'running'
  | 'pre_decision'
  | 'executing'
  | 'post_review'
  | 'finalizing'
  | 'completed'
  | 'aborted'

export interface ProcessRunStateMachineDeps {
  history: HistoryStore
  executor: Executor
  registry: TaskRegistry
  supervisor: OrchestratorSupervisor
  eventBus?: TypedEventBus
  /** Global orchestrator settings; the process overlay is applied on top */
  orchestratorSettings?: OrchestratorSettings
  /** Engine/model used when neither the step nor its task names one */
  defaults?: { engine?: string; model?: string }
  /** Used to record the commit a fresh run starts from */
  inspector?: RepositoryInspector
}

export interface ProcessRunOutcome {
  processId: string
  status: ProcessRunStatus
  abortReason?: string
  /** Warning raised by a finalize decision other than `proceed` */
  finalizeWarning?: string
  results: StepResult[]
  decisions: OrchestratorDecision[]
}

// ---------------------------------------------------------------------------
// ProcessRunStateMachine
// ---------------------------------------------------------------------------

export class ProcessRunStateMachine {
  private readonly _run: ProcessRun
  private readonly _deps: ProcessRunStateMachineDeps
  private readonly _config: OrchestratorConfig
  private readonly _guard: InjectionGuard
  private _state: RunState = 'running'
  private _finalizeWarning: string | undefined

  constructor(run: ProcessRun, deps: ProcessRunStateMachineDeps) {
    this._run = run
    this._deps = deps
    this._config = resolveOrchestratorConfig(deps.orchestratorSettings, run.spec.orchestrator)
    this._guard = new InjectionGuard(run.injectionCounts)
  }

  get state(): RunState {
    return this._state
  }

  get run(): ProcessRun {
    return this._run
  }

  get config(): OrchestratorConfig {
    return this._config
  }

  /**
   * Drive the run to a terminal state.
   * @throws {RecoveryError} when the run is not in the `running` status
   */
  async execute(): Promise<ProcessRunOutcome> {
    const run = this._run
    if (run.status !== 'running') {
      throw new RecoveryError(`Process ${run.processId} is ${run.status} and cannot be executed`, {
        processId: run.processId,
        status: run.status,
      })
    }

    const started = Date.now()
    const log = runLogger(logger, { processId: run.processId })

    try {
      await this._captureBaseCommit()
      this._persist()
      this._deps.eventBus?.emit('process:started', {
        processId: run.processId,
        processName: run.spec.name,
        totalSteps: run.steps.length,
        currentIndex: run.currentIndex,
        ...(run.parentProcessId !== undefined ? { parentProcessId: run.parentProcessId } : {}),
      })
      log.info(
        { processName: run.spec.name, steps: run.steps.length, currentIndex: run.currentIndex },
        'Process run started',
      )

      while (run.currentIndex < run.steps.length) {
        const keepGoing = await this._advance()
        if (!keepGoing) return this._outcome()
      }

      if (this._config.enabled) {
        await this._finalize()
      }

      run.status = 'completed'
      this._state = 'completed'
      this._persist()
      this._deps.eventBus?.emit('process:completed', {
        processId: run.processId,
        totalSteps: run.steps.length,
        durationMs: Date.now() - started,
        ...(this._finalizeWarning !== undefined ? { finalizeWarning: this._finalizeWarning } : {}),
      })
      log.info({ steps: run.steps.length, durationMs: Date.now() - started }, 'Process run completed')
      return this._outcome()
    } catch (err) {
      if (run.status === 'running') {
        run.status = 'aborted'
        run.abortReason = `Unexpected error: ${errorMessage(err)}`
        this._state = 'aborted'
        try {
          this._persist()
        } catch (persistErr) {
          log.error({ err: persistErr }, 'Failed to persist aborted run state')
        }
      }
      throw err
    }
  }

  // -------------------------------------------------------------------------
  // Step loop
  // -------------------------------------------------------------------------

  /**
   * Handle the step at the current index. Returns false once the run has
   * been aborted. An accepted injection returns without advancing, so the
   * next call re-evaluates the first injected step.
   */
  private async _advance(): Promise<boolean> {
    const run = this._run
    const index = run.currentIndex
    const step = run.steps[index]
    if (step === undefined) {
      throw new RecoveryError(`No step at index ${String(index)}`, { processId: run.processId, index })
    }
    const supervised = this._config.enabled && !step.skipOrchestrator

    if (supervised) {
      this._state = 'pre_decision'
      const pre = await this._deps.supervisor.invoke('pre_step', index, run, this._config)
      const decision = pre.decision
      run.decisions.push(decision)

      if (decision.decision === 'abort') {
        this._abort(index, decision.reasoning || `Aborted by orchestrator before step ${String(index)}`)
        return false
      }

      if (decision.decision === 'inject') {
        if (this._guard.admit(index, this._config)) {
          this._inject(index, decision.injectedSteps)
          return true
        }
        run.decisions.push(this._forceProceed(index, pre.taskId))
      }
    }

    this._state = 'executing'
    const result = await this._executeStep(index, step)
    if (!result.success) {
      const detail = result.error !== undefined ? `: ${result.error}` : ''
      this._abort(
        index,
        `Step ${String(index)} (${step.task}) failed with exit code ${String(result.exitCode)}${detail}`,
      )
      return false
    }

    run.results.push(result.stepResult)
    run.currentIndex = index + 1
    this._persist()

    if (supervised) {
      this._state = 'post_review'
      await this._deps.supervisor.invoke('post_step', index, run, this._config)
    }
    return true
  }

  private async _finalize(): Promise<void> {
    const run = this._run
    this._state = 'finalizing'
    const outcome = await this._deps.supervisor.invoke('finalize', run.steps.length, run, this._config)
    run.decisions.push(outcome.decision)

    if (outcome.decision.decision !== 'proceed') {
      this._finalizeWarning = `Finalize decided "${outcome.decision.decision}": ${outcome.decision.reasoning}`
      runLogger(logger, { processId: run.processId, taskId: outcome.taskId }).warn(
        { decision: outcome.decision.decision },
        'Finalize did not proceed; completing run anyway',
      )
    }
  }

  // -------------------------------------------------------------------------
  // Decision application
  // -------------------------------------------------------------------------

  private _inject(index: number, candidates: ProcessStep[]): void {
    const run = this._run
    const tagged = candidates.map((step) => ({ ...step, originStepIndex: index }))
    run.steps.splice(index, 0, ...tagged)
    run.injectionCounts = this._guard.snapshot()
    this._persist()

    this._deps.eventBus?.emit('process:steps-injected', {
      processId: run.processId,
      originStepIndex: index,
      tasks: tagged.map((step) => step.task),
    })
    runLogger(logger, { processId: run.processId, stepIndex: index }).info(
      { tasks: tagged.map((step) => step.task), injectionCount: this._guard.count(index) },
      'Steps injected',
    )
  }

  /** Guard exceeded: record a forced proceed under the deciding invocation. */
  private _forceProceed(index: number, taskId: string): OrchestratorDecision {
    const run = this._run
    const count = this._guard.count(index)
    const reasoning =
      `Injection limit reached at step ${String(index)} ` +
      `(${String(count)}/${String(this._config.maxInjections)}); forcing proceed`

    runLogger(logger, { processId: run.processId, taskId, stepIndex: index }).warn(
      { count, maxInjections: this._config.maxInjections },
      reasoning,
    )
    this._deps.eventBus?.emit('orchestrator:injection-rejected', {
      processId: run.processId,
      originStepIndex: index,
      count,
      maxInjections: this._config.maxInjections,
    })
    return this._deps.history.appendDecision(run.processId, {
      phase: 'pre_step',
      stepIndex: index,
      decision: 'proceed',
      reasoning,
      injectedSteps: [],
      taskId,
    })
  }

  private _abort(index: number, reason: string): void {
    const run = this._run
    run.status = 'aborted'
    run.abortReason = reason
    this._state = 'aborted'
    this._persist()
    this._deps.eventBus?.emit('process:aborted', {
      processId: run.processId,
      stepIndex: index,
      reason,
    })
    runLogger(logger, { processId: run.processId, stepIndex: index }).warn({ reason }, 'Process run aborted')
  }

  // -------------------------------------------------------------------------
  // Worker execution
  // -------------------------------------------------------------------------

  private async _executeStep(
    index: number,
    step: ProcessStep,
  ): Promise<{ success: boolean; exitCode: number; error?: string; stepResult: StepResult }> {
    const run = this._run
    const taskId = generateShortId()
    const task = this._deps.registry.getByName(step.task)
    const engine = step.engine ?? task?.engine ?? this._deps.defaults?.engine
    const model = step.model ?? task?.model ?? this._deps.defaults?.model
    const prompt = task !== undefined ? buildWorkerPrompt(task, step, run.userPrompt) : (step.prompt ?? '')

    this._deps.history.appendTaskLog({
      task_id: taskId,
      process_id: run.processId,
      task_name: step.task,
      is_orchestrator: false,
      step_index: index,
      engine: engine ?? null,
      model: model ?? null,
      branch: run.worktree.branch ?? null,
      worktree: run.worktree.path,
      main_repo: run.worktree.mainRepo ?? null,
      prompt,
    })
    this._deps.eventBus?.emit('process:step-started', {
      processId: run.processId,
      stepIndex: index,
      totalSteps: run.steps.length,
      taskName: step.task,
      taskId,
    })

    const started = Date.now()
    let result: ExecutionResult
    if (task === undefined) {
      result = { exitCode: -1, error: `Task definition "${step.task}" not found` }
    } else {
      try {
        result = await this._deps.executor.run({
          taskId,
          processId: run.processId,
          task,
          engine,
          model,
          worktree: run.worktree,
          prompt,
          context: buildStatusPrompt(run, index),
          isOrchestrator: false,
        })
      } catch (err) {
        result = { exitCode: -1, error: errorMessage(err) }
      }
    }

    const durationMs = Date.now() - started
    const success = result.exitCode === 0
    const error = result.error !== undefined ? maskSecrets(result.error) : undefined
    this._deps.history.completeTaskLog(taskId, {
      success,
      exit_code: result.exitCode,
      duration_ms: durationMs,
      session_id: result.sessionId ?? null,
      error_message: error ?? null,
      total_cost: result.usage?.costUsd ?? null,
      input_tokens: result.usage?.inputTokens ?? null,
      output_tokens: result.usage?.outputTokens ?? null,
    })

    const stepResult: StepResult = {
      stepIndex: index,
      taskName: step.task,
      taskId,
      success,
      exitCode: result.exitCode,
      durationMs,
    }
    if (result.sessionId !== undefined) stepResult.sessionId = result.sessionId

    if (success) {
      this._deps.eventBus?.emit('process:step-completed', {
        processId: run.processId,
        stepIndex: index,
        taskName: step.task,
        taskId,
        durationMs,
      })
    } else {
      this._deps.eventBus?.emit('process:step-failed', {
        processId: run.processId,
        stepIndex: index,
        taskName: step.task,
        taskId,
        exitCode: result.exitCode,
        ...(error !== undefined ? { error } : {}),
      })
    }

    return error !== undefined
      ? { success, exitCode: result.exitCode, error, stepResult }
      : { success, exitCode: result.exitCode, stepResult }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private async _captureBaseCommit(): Promise<void> {
    const run = this._run
    if (run.baseCommit !== undefined || this._deps.inspector === undefined) return
    try {
      run.baseCommit = await this._deps.inspector.headCommit(run.worktree.path)
    } catch (err) {
      if (!(err instanceof GitError)) throw err
      runLogger(logger, { processId: run.processId }).warn(
        { err: err.message },
        'Could not read base commit; diff tools will need an explicit reference',
      )
    }
  }

  private _persist(): void {
    this._deps.history.saveProcessRun(this._run)
  }

  private _outcome(): ProcessRunOutcome {
    const run = this._run
    const outcome: ProcessRunOutcome = {
      processId: run.processId,
      status: run.status,
      results: [...run.results],
      decisions: [...run.decisions],
    }
    if (run.abortReason !== undefined) outcome.abortReason = run.abortReason
    if (this._finalizeWarning !== undefined) outcome.finalizeWarning = this._finalizeWarning
    return outcome
  }
}

export function createProcessRunStateMachine(
  run: ProcessRun,
  deps: ProcessRunStateMachineDeps,
): ProcessRunStateMachine {
  return new ProcessRunStateMachine(run, deps)
}
