/**
 * Tools exposed to agents over the tool-call protocol.
 *
 * Every tool acts on behalf of the caller's identity record: results are
 * written for the caller's task, state is read for the caller's process, and
 * decisions are recorded for the caller's phase and step. Workers never see
 * what supervisor invocations wrote.
 */

import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import type { ProcessStep } from '../process/types.js'
import type { DecisionKind } from '../../persistence/schemas/history.js'
import type { TaskLog, TaskResult } from '../history/history-store.js'
import { defineTool } from './define-tool.js'
import { ARTIFACT_TOOLS } from './artifact-tools.js'
import { KNOWLEDGE_TOOLS } from './knowledge-tools.js'
import { canReadOutputOf, callerIsOrchestrator, requireCaller } from './tool-helpers.js'
import type { RegisteredTool, ToolContext } from './types.js'

const logger = createLogger('tool-scope:tools')

/** Diffs larger than this are cut off before they reach the agent. */
export const MAX_DIFF_BYTES = 50_000

/** Characters of a fresh summary echoed back by write_result */
export const SUMMARY_PREVIEW_CHARS = 200

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const InjectedStepSchema = z
  .object({
    task_name: z.string().min(1, 'task_name is required'),
    prompt: z.string().optional(),
    engine: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
  })
  .strict()

type InjectedStepInput = z.infer<typeof InjectedStepSchema>

const InjectedStepJsonSchema = {
  type: 'object',
  properties: {
    task_name: { type: 'string', description: 'Name of a registered task' },
    prompt: { type: 'string', description: 'Instructions for the injected step' },
    engine: { type: 'string' },
    model: { type: 'string' },
  },
  required: ['task_name'],
} as const

/** Resolve every task name before anything is written. */
function toProcessSteps(ctx: ToolContext, steps: InjectedStepInput[]): ProcessStep[] {
  const unknown = steps.map((s) => s.task_name).filter((name) => ctx.registry.getByName(name) === undefined)
  if (unknown.length > 0) {
    throw new ValidationError(`Unknown task name(s): ${unknown.join(', ')}`, { unknown })
  }
  return steps.map((s) => {
    const step: ProcessStep = { task: s.task_name, skipOrchestrator: false }
    if (s.prompt !== undefined) step.prompt = s.prompt
    if (s.engine !== undefined) step.engine = s.engine
    if (s.model !== undefined) step.model = s.model
    return step
  })
}

function recordDecision(
  ctx: ToolContext,
  caller: TaskLog,
  decision: DecisionKind,
  reasoning: string,
  injectedSteps: ProcessStep[],
): Record<string, unknown> {
  const phase = caller.orchestrator_phase
  if (phase === null || caller.step_index === null) {
    throw new ValidationError(`Task ${caller.task_id} is not a supervisor phase invocation`, {
      taskId: caller.task_id,
    })
  }
  if (phase === 'post_step') {
    throw new ValidationError('post_step reviews record results with write_result, not decisions', {
      taskId: caller.task_id,
    })
  }
  if (decision === 'inject' && phase !== 'pre_step') {
    throw new ValidationError(`Steps can only be injected from the pre_step phase, not ${phase}`, {
      taskId: caller.task_id,
      phase,
    })
  }

  const recorded = ctx.history.appendDecision(caller.process_id, {
    phase,
    stepIndex: caller.step_index,
    decision,
    reasoning,
    injectedSteps,
    taskId: caller.task_id,
  })
  return {
    recorded: true,
    phase: recorded.phase,
    step_index: recorded.stepIndex,
    decision: recorded.decision,
    injected_steps: recorded.injectedSteps.map((s) => s.task),
  }
}

function resolveSinceCommit(
  ctx: ToolContext,
  caller: TaskLog,
  sinceCommit: string | undefined,
): { worktree: string; since: string } {
  const snapshot = ctx.history.loadProcessRun(caller.process_id)
  const worktree = caller.worktree ?? snapshot?.worktree?.path
  if (worktree === undefined) {
    throw new ValidationError(`No worktree recorded for process ${caller.process_id}`, {
      processId: caller.process_id,
    })
  }
  const since = sinceCommit ?? snapshot?.baseCommit
  if (since === undefined) {
    throw new ValidationError('since_commit is required: the run has no recorded base commit', {
      processId: caller.process_id,
    })
  }
  return { worktree, since }
}

function requireInspector(ctx: ToolContext): NonNullable<ToolContext['inspector']> {
  if (ctx.inspector === undefined) {
    throw new ValidationError('Repository inspection is not available in this server', {})
  }
  return ctx.inspector
}

/**
 * Cut `text` to at most `maxBytes` of UTF-8, appending a note when it was cut.
 * The cut backs off to a character boundary.
 */
export function truncateDiff(text: string, maxBytes = MAX_DIFF_BYTES): { diff: string; truncated: boolean } {
  const buffer = Buffer.from(text, 'utf-8')
  if (buffer.length <= maxBytes) return { diff: text, truncated: false }
  let cut = maxBytes
  // 0b10xxxxxx marks a continuation byte
  while (cut > 0 && ((buffer[cut] ?? 0) & 0xc0) === 0x80) cut--
  const head = buffer.subarray(0, cut).toString('utf-8')
  return {
    diff: `${head}\n\n[diff truncated: showing ${String(cut)} of ${String(buffer.length)} bytes]`,
    truncated: true,
  }
}

// ---------------------------------------------------------------------------
// Shared tools
// ---------------------------------------------------------------------------

const ResultLookupInput = z
  .object({
    task_id: z.string().min(1).optional(),
    task_name: z.string().min(1).optional(),
  })
  .strict()
  .refine((v) => v.task_id !== undefined || v.task_name !== undefined, {
    message: 'either task_id or task_name is required',
  })

const ResultLookupProperties = {
  task_id: { type: 'string', description: 'Specific task id; wins over task_name' },
  task_name: { type: 'string', description: 'Latest result of this task in the current process' },
}

/** Find a result the caller may read; hidden results look missing. */
function lookupResult(
  ctx: ToolContext,
  tool: string,
  input: { task_id?: string | undefined; task_name?: string | undefined },
): TaskResult {
  let result: TaskResult | undefined
  if (input.task_id !== undefined) {
    result = ctx.history.getResult(input.task_id)
  } else {
    const caller = requireCaller(ctx, tool)
    result = ctx.history.getResultByTaskName(caller.process_id, input.task_name ?? '')
  }
  if (result === undefined || !canReadOutputOf(ctx, result.taskId)) {
    throw new ValidationError(`No result found for ${input.task_id ?? input.task_name ?? ''}`, {
      taskId: input.task_id,
      taskName: input.task_name,
    })
  }
  return result
}

const writeResult = defineTool({
  name: 'write_result',
  scope: 'shared',
  description:
    'Store the result of your task so later steps and the supervisor can read it. Calling it again replaces the stored result.',
  inputSchema: {
    type: 'object',
    properties: {
      result: { type: 'string', description: 'Summary of what was done and what remains' },
      key_files: { type: 'array', items: { type: 'string' }, description: 'Files that matter for review' },
      tags: { type: 'array', items: { type: 'string' } },
    },
    required: ['result'],
  },
  input: z
    .object({
      result: z.string(),
      key_files: z.array(z.string()).optional(),
      tags: z.array(z.string()).optional(),
    })
    .strict(),
  async handler(input, ctx) {
    const caller = requireCaller(ctx, 'write_result')
    const stored = ctx.history.writeResult({
      taskId: caller.task_id,
      resultText: input.result,
      keyFiles: input.key_files ?? [],
      tags: input.tags ?? [],
    })

    let summaryPreview = 'Compression skipped'
    if (ctx.summarizer !== undefined) {
      try {
        const summary = await ctx.summarizer.summarize(input.result)
        ctx.history.updateResultSummary(caller.task_id, summary)
        summaryPreview = summary.slice(0, SUMMARY_PREVIEW_CHARS)
      } catch (err) {
        logger.warn({ taskId: caller.task_id, error: errorMessage(err) }, 'Result summary failed')
      }
    }
    return { stored: true, task_id: stored.taskId, updated_at: stored.updatedAt, summary_preview: summaryPreview }
  },
})

const loadResult = defineTool({
  name: 'load_result',
  scope: 'shared',
  description:
    'Load a stored result by task_id, or by task_name (the latest result of that task in the current process).',
  inputSchema: { type: 'object', properties: ResultLookupProperties },
  input: ResultLookupInput,
  handler(input, ctx) {
    const result = lookupResult(ctx, 'load_result', input)
    return {
      task_id: result.taskId,
      result: result.resultText,
      key_files: result.keyFiles,
      tags: result.tags,
      updated_at: result.updatedAt,
    }
  },
})

const readResultSummary = defineTool({
  name: 'read_result_summary',
  scope: 'shared',
  description:
    'Read the compressed summary of one task result. Prefer it over load_result to keep your context short.',
  inputSchema: { type: 'object', properties: ResultLookupProperties },
  input: ResultLookupInput,
  handler(input, ctx) {
    const result = lookupResult(ctx, 'read_result_summary', input)
    if (result.summary === undefined) {
      throw new ValidationError(
        `No summary available for ${input.task_name ?? input.task_id ?? ''}; use load_result for the full text`,
        { taskId: result.taskId },
      )
    }
    return {
      task_id: result.taskId,
      summary: result.summary,
      key_files: result.keyFiles,
      created_at: result.createdAt,
    }
  },
})

const listResults = defineTool({
  name: 'list_results',
  scope: 'shared',
  description:
    'List the stored results of the current process, oldest first. Workers see the results of worker steps only.',
  inputSchema: { type: 'object', properties: {} },
  input: z.object({}).strict(),
  handler(_input, ctx) {
    const caller = requireCaller(ctx, 'list_results')
    const privileged = callerIsOrchestrator(ctx)
    return ctx.history
      .listResults(caller.process_id)
      .filter((r) => privileged || !r.isOrchestrator)
      .map((r) => ({
        ...(privileged ? { task_id: r.taskId, is_orchestrator: r.isOrchestrator } : {}),
        task_name: r.taskName,
        result: r.resultText,
        summary: r.summary ?? null,
        key_files: r.keyFiles,
        tags: r.tags,
      }))
  },
})

// ---------------------------------------------------------------------------
// Orchestrator-only tools
// ---------------------------------------------------------------------------

const getProcessState = defineTool({
  name: 'get_process_state',
  scope: 'orchestrator',
  description:
    'Current state of the process: completed steps, pending steps (including injected ones), current index and every decision so far.',
  inputSchema: { type: 'object', properties: {} },
  input: z.object({}).strict(),
  handler(_input, ctx) {
    const caller = requireCaller(ctx, 'get_process_state')
    const state = ctx.history.readProcessState(caller.process_id)
    if (state === undefined) {
      throw new ValidationError(`No state recorded for process ${caller.process_id}`, {
        processId: caller.process_id,
      })
    }
    return state
  },
})

const setProcessDecision = defineTool({
  name: 'set_process_decision',
  scope: 'orchestrator',
  description:
    'Record your decision for this phase: proceed, inject (with injected_steps) or abort. Only the last call counts.',
  inputSchema: {
    type: 'object',
    properties: {
      decision: { type: 'string', enum: ['proceed', 'inject', 'abort'] },
      reasoning: { type: 'string' },
      injected_steps: { type: 'array', items: InjectedStepJsonSchema },
    },
    required: ['decision', 'reasoning'],
  },
  input: z
    .object({
      decision: z.enum(['proceed', 'inject', 'abort']),
      reasoning: z.string(),
      injected_steps: z.array(InjectedStepSchema).optional(),
    })
    .strict(),
  handler(input, ctx) {
    const caller = requireCaller(ctx, 'set_process_decision')
    const steps = input.injected_steps ?? []
    if (input.decision === 'inject' && steps.length === 0) {
      throw new ValidationError('injected_steps is required when decision is "inject"', {})
    }
    if (input.decision !== 'inject' && steps.length > 0) {
      throw new ValidationError(`injected_steps must not be provided when decision is "${input.decision}"`, {})
    }
    return recordDecision(ctx, caller, input.decision, input.reasoning, toProcessSteps(ctx, steps))
  },
})

const injectSteps = defineTool({
  name: 'inject_steps',
  scope: 'orchestrator',
  description:
    'Insert steps before the current one. They run (with their own reviews) before the current step is reconsidered.',
  inputSchema: {
    type: 'object',
    properties: {
      steps: { type: 'array', items: InjectedStepJsonSchema, minItems: 1 },
      reasoning: { type: 'string' },
    },
    required: ['steps'],
  },
  input: z
    .object({
      steps: z.array(InjectedStepSchema).min(1, 'at least one step is required'),
      reasoning: z.string().optional(),
    })
    .strict(),
  handler(input, ctx) {
    const caller = requireCaller(ctx, 'inject_steps')
    const steps = toProcessSteps(ctx, input.steps)
    const reasoning = input.reasoning ?? `Injected ${String(steps.length)} step(s): ${steps.map((s) => s.task).join(', ')}`
    return recordDecision(ctx, caller, 'inject', reasoning, steps)
  },
})

const SinceCommitInput = z
  .object({
    since_commit: z
      .string()
      .regex(/^[^-\s]\S*$/, 'must be a commit reference, not an option')
      .optional(),
  })
  .strict()
const SinceCommitProperties = {
  since_commit: { type: 'string', description: 'Defaults to the commit the run started from' },
}

const getGitDiff = defineTool({
  name: 'get_git_diff',
  scope: 'orchestrator',
  description: `Diff of the worktree since a commit. Output above ${String(MAX_DIFF_BYTES)} bytes is truncated.`,
  inputSchema: { type: 'object', properties: SinceCommitProperties },
  input: SinceCommitInput,
  async handler(input, ctx) {
    const caller = requireCaller(ctx, 'get_git_diff')
    const inspector = requireInspector(ctx)
    const { worktree, since } = resolveSinceCommit(ctx, caller, input.since_commit)
    const { diff, truncated } = truncateDiff(await inspector.diff(worktree, since))
    return { since_commit: since, truncated, diff }
  },
})

const getCommitLog = defineTool({
  name: 'get_commit_log',
  scope: 'orchestrator',
  description: 'Commits made in the worktree since a commit, newest first.',
  inputSchema: { type: 'object', properties: SinceCommitProperties },
  input: SinceCommitInput,
  async handler(input, ctx) {
    const caller = requireCaller(ctx, 'get_commit_log')
    const inspector = requireInspector(ctx)
    const { worktree, since } = resolveSinceCommit(ctx, caller, input.since_commit)
    return { since_commit: since, commits: await inspector.commitLog(worktree, since) }
  },
})

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

export const TOOLS: readonly RegisteredTool[] = [
  writeResult,
  loadResult,
  readResultSummary,
  listResults,
  ...ARTIFACT_TOOLS,
  ...KNOWLEDGE_TOOLS,
  getProcessState,
  setProcessDecision,
  injectSteps,
  getGitDiff,
  getCommitLog,
]
