/**
 * OrchestratorSupervisor: runs the supervisory agent for one phase and
 * reports what it decided.
 *
 * The agent never touches the driving loop's memory. It records decisions
 * and reviews through the tool server, which writes them to the history
 * store; once the agent's process has exited the supervisor reads them back.
 *
 * Supervisor failures are advisory: a crashed or silent agent yields a
 * default `proceed` for pre_step and finalize, and no review for post_step.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { createLogger, runLogger } from '../../utils/logger.js'
import { errorMessage, generateShortId } from '../../utils/helpers.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { HistoryStore, TaskResult } from '../history/history-store.js'
import type { Executor, ExecutionResult } from '../executor/types.js'
import { ORCHESTRATOR_TASKS, type TaskRegistry } from '../tasks/types.js'
import type {
  DecisionPhase,
  OrchestratorConfig,
  OrchestratorDecision,
  ProcessRun,
} from '../process/types.js'
import { buildOrchestratorContext } from './orchestrator-context.js'

const logger = createLogger('orchestrator:supervisor')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DecisionPhaseName = Exclude<DecisionPhase, 'post_step'>

export interface DecisionOutcome {
  phase: DecisionPhaseName
  taskId: string
  decision: OrchestratorDecision
  /** True when the decision is the fallback `proceed` */
  defaulted: boolean
}

export interface ReviewOutcome {
  phase: 'post_step'
  taskId: string
  review: TaskResult | undefined
  /** Failure description when the agent run did not succeed */
  failure?: string
}

export type PhaseOutcome = DecisionOutcome | ReviewOutcome

export interface OrchestratorSupervisorDeps {
  history: HistoryStore
  executor: Executor
  registry: TaskRegistry
  eventBus?: TypedEventBus
}

// ---------------------------------------------------------------------------
// OrchestratorSupervisor
// ---------------------------------------------------------------------------

export class OrchestratorSupervisor {
  private readonly _history: HistoryStore
  private readonly _executor: Executor
  private readonly _registry: TaskRegistry
  private readonly _eventBus: TypedEventBus | undefined

  constructor(deps: OrchestratorSupervisorDeps) {
    this._history = deps.history
    this._executor = deps.executor
    this._registry = deps.registry
    this._eventBus = deps.eventBus
  }

  invoke(phase: 'post_step', stepIndex: number, run: ProcessRun, config: OrchestratorConfig): Promise<ReviewOutcome>
  invoke(phase: DecisionPhaseName, stepIndex: number, run: ProcessRun, config: OrchestratorConfig): Promise<DecisionOutcome>
  async invoke(
    phase: DecisionPhase,
    stepIndex: number,
    run: ProcessRun,
    config: OrchestratorConfig,
  ): Promise<PhaseOutcome> {
    const taskId = generateShortId()
    const log = runLogger(logger, { processId: run.processId, taskId, stepIndex })
    const taskName = ORCHESTRATOR_TASKS[phase]
    const context = buildOrchestratorContext(run, phase, stepIndex)

    // The identity row must exist before the agent starts calling tools.
    this._history.appendTaskLog({
      task_id: taskId,
      process_id: run.processId,
      task_name: taskName,
      is_orchestrator: true,
      orchestrator_phase: phase,
      step_index: stepIndex,
      engine: config.engine ?? null,
      model: config.model,
      branch: run.worktree.branch ?? null,
      worktree: run.worktree.path,
      main_repo: run.worktree.mainRepo ?? null,
      prompt: context,
    })
    this._eventBus?.emit('orchestrator:phase-started', {
      processId: run.processId,
      phase,
      stepIndex,
      taskId,
    })

    const failure = await this._runAgent(taskId, taskName, context, run, config)
    if (failure !== undefined) {
      log.warn({ phase, failure }, 'Orchestrator invocation failed')
    }

    if (phase === 'post_step') {
      return this._collectReview(taskId, stepIndex, run, failure)
    }
    return this._collectDecision(phase, taskId, stepIndex, run, failure)
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  /** Run the phase agent and complete its task log. Returns a failure description, if any. */
  private async _runAgent(
    taskId: string,
    taskName: string,
    context: string,
    run: ProcessRun,
    config: OrchestratorConfig,
  ): Promise<string | undefined> {
    const task = this._registry.getByName(taskName)
    if (task === undefined) {
      const message = `Task definition "${taskName}" not found`
      this._history.completeTaskLog(taskId, {
        success: false,
        exit_code: -1,
        duration_ms: 0,
        error_message: message,
      })
      return message
    }

    const started = Date.now()
    let result: ExecutionResult
    try {
      result = await this._executor.run({
        taskId,
        processId: run.processId,
        task,
        engine: config.engine ?? task.engine,
        model: config.model,
        image: config.image,
        worktree: run.worktree,
        prompt: task.prompt,
        context,
        isOrchestrator: true,
      })
    } catch (err) {
      result = { exitCode: -1, error: errorMessage(err) }
    }

    const success = result.exitCode === 0
    const error = result.error !== undefined ? maskSecrets(result.error) : undefined
    this._history.completeTaskLog(taskId, {
      success,
      exit_code: result.exitCode,
      duration_ms: Date.now() - started,
      session_id: result.sessionId ?? null,
      error_message: error ?? null,
      total_cost: result.usage?.costUsd ?? null,
      input_tokens: result.usage?.inputTokens ?? null,
      output_tokens: result.usage?.outputTokens ?? null,
    })

    if (success) return undefined
    return error ?? `exit code ${String(result.exitCode)}`
  }

  private _collectReview(
    taskId: string,
    stepIndex: number,
    run: ProcessRun,
    failure: string | undefined,
  ): ReviewOutcome {
    const review = this._history.getResult(taskId)
    if (review === undefined) {
      runLogger(logger, { processId: run.processId, taskId, stepIndex }).warn(
        'Post-step review produced no result; continuing',
      )
    }
    this._eventBus?.emit('orchestrator:review', {
      processId: run.processId,
      stepIndex,
      taskId,
      hasReview: review !== undefined,
    })
    const outcome: ReviewOutcome = { phase: 'post_step', taskId, review }
    if (failure !== undefined) outcome.failure = failure
    return outcome
  }

  private _collectDecision(
    phase: DecisionPhaseName,
    taskId: string,
    stepIndex: number,
    run: ProcessRun,
    failure: string | undefined,
  ): DecisionOutcome {
    const recorded =
      failure === undefined ? this._history.readLatestDecision(taskId, phase, stepIndex) : undefined

    let decision: OrchestratorDecision
    let defaulted = false
    if (recorded !== undefined) {
      decision = recorded
    } else {
      defaulted = true
      const reasoning =
        failure !== undefined
          ? `Orchestrator ${phase} failed (${failure}); defaulting to proceed`
          : `No decision recorded by orchestrator ${phase}; defaulting to proceed`
      runLogger(logger, { processId: run.processId, taskId, stepIndex }).warn({ phase }, reasoning)
      decision = this._history.appendDecision(run.processId, {
        phase,
        stepIndex,
        decision: 'proceed',
        reasoning,
        injectedSteps: [],
        taskId,
      })
    }

    this._eventBus?.emit('orchestrator:decision', {
      processId: run.processId,
      phase,
      stepIndex,
      decision: decision.decision,
      reasoning: decision.reasoning,
      defaulted,
    })
    return { phase, taskId, decision, defaulted }
  }
}

export function createOrchestratorSupervisor(deps: OrchestratorSupervisorDeps): OrchestratorSupervisor {
  return new OrchestratorSupervisor(deps)
}
