/**
 * CommandExecutor: runs the configured agent CLI as a child process in the
 * run's worktree.
 *
 * - Uses child_process.spawn, never exec; arguments are not shell-parsed.
 * - The agent learns its identity from STEPWARDEN_TASK_ID so that the tool
 *   server it launches can report it back to the gate.
 * - Session ids and the final usage report are picked out of JSON lines on
 *   stdout.
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import type { ExecutorSettings } from '../config/config-schema.js'
import type { TaskDefinition } from '../tasks/types.js'
import type { ExecutionRequest, ExecutionResult, ExecutionUsage, Executor } from './types.js'

const logger = createLogger('executor')

/** Maximum number of stderr characters kept for the error message */
const STDERR_TAIL_CHARS = 2_000

const PLACEHOLDER = /\{(prompt|context|model|engine|image|tools)\}/g

export type PlaceholderValues = Record<
  'prompt' | 'context' | 'model' | 'engine' | 'image' | 'tools',
  string | undefined
>

// ---------------------------------------------------------------------------
// Argument expansion
// ---------------------------------------------------------------------------

/**
 * Replace placeholders in an argument template. An argument whose
 * placeholders all resolve to nothing is dropped, together with the flag
 * immediately before it (`--model {model}` disappears when no model is set).
 */
export function expandArgs(template: readonly string[], values: PlaceholderValues): string[] {
  const out: string[] = []
  for (const arg of template) {
    if (arg.match(PLACEHOLDER) === null) {
      out.push(arg)
      continue
    }

    const resolved: string[] = []
    const expanded = arg.replace(PLACEHOLDER, (_match, name: keyof PlaceholderValues) => {
      const value = values[name] ?? ''
      if (value !== '') resolved.push(name)
      return value
    })

    if (resolved.length > 0) {
      out.push(expanded)
    } else if ((out[out.length - 1] ?? '').startsWith('-')) {
      out.pop()
    }
  }
  return out
}

/**
 * Comma-separated tool allowlist of a task, or undefined when the task does
 * not restrict its tools (no list, or a `*` entry).
 */
export function allowedTools(task: TaskDefinition): string | undefined {
  if (task.tools.length === 0 || task.tools.includes('*')) return undefined
  return task.tools.join(',')
}

/** Context with the task's tool allowlist appended, when it has one. */
export function withToolsLine(context: string, task: TaskDefinition): string {
  const tools = allowedTools(task)
  if (tools === undefined) return context
  const line = `Tools for this task: ${task.tools.join(', ')}`
  return context.trim() === '' ? line : `${context}\n${line}`
}

function parseJsonLine(line: string): Record<string, unknown> | undefined {
  const trimmed = line.trim()
  if (!trimmed.startsWith('{')) return undefined
  let parsed: unknown
  try {
    parsed = JSON.parse(trimmed)
  } catch {
    return undefined
  }
  return isPlainObject(parsed) ? parsed : undefined
}

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined
}

/** Session id from one line of JSON output, if the line carries one. */
export function extractSessionId(line: string): string | undefined {
  const parsed = parseJsonLine(line)
  if (parsed === undefined) return undefined
  const id = parsed['session_id'] ?? parsed['sessionId']
  return typeof id === 'string' && id !== '' ? id : undefined
}

/**
 * Cost and token counts from a `{"type":"result", ...}` line of stream-json
 * output. Other lines yield undefined.
 */
export function extractUsage(line: string): ExecutionUsage | undefined {
  const parsed = parseJsonLine(line)
  if (parsed === undefined || parsed['type'] !== 'result') return undefined

  const usage: ExecutionUsage = {}
  const cost = finiteNumber(parsed['total_cost_usd'])
  if (cost !== undefined) usage.costUsd = cost
  const tokens = parsed['usage']
  if (isPlainObject(tokens)) {
    const input = finiteNumber(tokens['input_tokens'])
    const output = finiteNumber(tokens['output_tokens'])
    if (input !== undefined) usage.inputTokens = Math.round(input)
    if (output !== undefined) usage.outputTokens = Math.round(output)
  }
  return Object.keys(usage).length > 0 ? usage : undefined
}

// ---------------------------------------------------------------------------
// CommandExecutor
// ---------------------------------------------------------------------------

export interface CommandExecutorOptions {
  settings: ExecutorSettings
  /** Database the agent's tool server should open */
  databasePath: string
}

export class CommandExecutor implements Executor {
  constructor(private readonly _options: CommandExecutorOptions) {}

  run(request: ExecutionRequest): Promise<ExecutionResult> {
    const { settings, databasePath } = this._options
    const args = expandArgs(settings.args, {
      prompt: request.prompt,
      context: withToolsLine(request.context, request.task),
      model: request.model,
      engine: request.engine,
      image: request.image,
      tools: allowedTools(request.task),
    })
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...settings.env,
      STEPWARDEN_TASK_ID: request.taskId,
      STEPWARDEN_PROCESS_ID: request.processId,
      STEPWARDEN_DB: databasePath,
    }

    logger.debug(
      {
        taskId: request.taskId,
        processId: request.processId,
        task: request.task.name,
        command: settings.command,
        isOrchestrator: request.isOrchestrator,
      },
      'Spawning agent',
    )

    return new Promise<ExecutionResult>((resolve) => {
      let settled = false
      let sessionId: string | undefined
      let usage: ExecutionUsage | undefined
      let pending = ''
      let stderr = ''

      const finish = (result: ExecutionResult): void => {
        if (settled) return
        settled = true
        resolve(result)
      }

      const scan = (text: string): void => {
        for (const line of text.split('\n')) {
          sessionId ??= extractSessionId(line)
          usage = extractUsage(line) ?? usage
        }
      }

      const proc = spawn(settings.command, args, {
        cwd: request.worktree.path,
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      proc.stdout.on('data', (chunk: Buffer) => {
        pending += chunk.toString('utf-8')
        const lastNewline = pending.lastIndexOf('\n')
        if (lastNewline === -1) return
        scan(pending.slice(0, lastNewline))
        pending = pending.slice(lastNewline + 1)
      })

      proc.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString('utf-8')).slice(-STDERR_TAIL_CHARS)
      })

      proc.on('error', (err: Error) => {
        logger.warn({ taskId: request.taskId, error: err.message }, 'Agent process failed to start')
        finish({ exitCode: -1, error: `Failed to spawn ${settings.command}: ${err.message}` })
      })

      proc.on('close', (code: number | null) => {
        scan(pending)
        const exitCode = code ?? 1
        const result: ExecutionResult = { exitCode }
        if (sessionId !== undefined) result.sessionId = sessionId
        if (usage !== undefined) result.usage = usage
        if (exitCode !== 0) {
          const tail = stderr.trim()
          result.error = maskSecrets(tail !== '' ? tail : `Process exited with code ${String(exitCode)}`)
        }
        logger.debug({ taskId: request.taskId, exitCode }, 'Agent exited')
        finish(result)
      })
    })
  }
}

export function createCommandExecutor(options: CommandExecutorOptions): Executor {
  return new CommandExecutor(options)
}
