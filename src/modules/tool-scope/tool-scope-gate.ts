/**
 * ToolScopeGate: filters tool listings and tool calls by caller identity.
 *
 * Both layers re-read the caller's task_log row on every request. A listing
 * handed out earlier grants nothing; an unknown caller is a worker.
 */

import { ScopeViolationError, ValidationError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { HistoryStore, TaskLog } from '../history/history-store.js'
import type { TaskRegistry } from '../tasks/types.js'
import type { RepositoryInspector } from '../git/repository-inspector.js'
import type { TemplateRegistry } from '../templates/types.js'
import type { ResultSummarizer } from '../summarizer/types.js'
import { TOOLS } from './tools.js'
import type { RegisteredTool, ToolDescriptor } from './types.js'

const logger = createLogger('tool-scope')

export interface ToolScopeGateDeps {
  history: HistoryStore
  registry: TaskRegistry
  inspector?: RepositoryInspector
  templates?: TemplateRegistry
  summarizer?: ResultSummarizer
  /** Defaults to the built-in catalogue */
  tools?: readonly RegisteredTool[]
}

function toDescriptor(tool: RegisteredTool): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    scope: tool.scope,
    inputSchema: tool.inputSchema,
  }
}

export class ToolScopeGate {
  private readonly _deps: ToolScopeGateDeps
  private readonly _tools: ReadonlyMap<string, RegisteredTool>

  constructor(deps: ToolScopeGateDeps) {
    this._deps = deps
    this._tools = new Map((deps.tools ?? TOOLS).map((tool) => [tool.name, tool]))
  }

  /** Whether `taskId` belongs to a supervisor invocation. Missing ids are not. */
  isOrchestrator(taskId: string | undefined): boolean {
    return this._resolveCaller(taskId)?.is_orchestrator === 1
  }

  /** Tools visible to `taskId`: everything for supervisors, shared tools otherwise. */
  listTools(taskId: string | undefined): ToolDescriptor[] {
    const privileged = this.isOrchestrator(taskId)
    return [...this._tools.values()]
      .filter((tool) => privileged || tool.scope === 'shared')
      .map(toDescriptor)
  }

  /**
   * Run a tool as `taskId`.
   * @throws {ScopeViolationError} when a worker calls an orchestrator tool
   * @throws {ValidationError} for unknown tools and rejected arguments
   */
  async callTool(taskId: string | undefined, name: string, args: unknown): Promise<unknown> {
    const tool = this._tools.get(name)
    if (tool === undefined) {
      throw new ValidationError(`Unknown tool: ${name}`, { tool: name })
    }

    const caller = this._resolveCaller(taskId)
    if (tool.scope === 'orchestrator' && caller?.is_orchestrator !== 1) {
      logger.warn({ tool: name, taskId: taskId ?? null }, 'Rejected orchestrator tool call from worker identity')
      throw new ScopeViolationError(name, taskId)
    }

    logger.debug({ tool: name, taskId: taskId ?? null }, 'Tool call')
    return tool.call(args, {
      caller,
      history: this._deps.history,
      registry: this._deps.registry,
      ...(this._deps.inspector !== undefined ? { inspector: this._deps.inspector } : {}),
      ...(this._deps.templates !== undefined ? { templates: this._deps.templates } : {}),
      ...(this._deps.summarizer !== undefined ? { summarizer: this._deps.summarizer } : {}),
    })
  }

  private _resolveCaller(taskId: string | undefined): TaskLog | undefined {
    if (taskId === undefined || taskId === '') return undefined
    return this._deps.history.getTaskLog(taskId)
  }
}

export function createToolScopeGate(deps: ToolScopeGateDeps): ToolScopeGate {
  return new ToolScopeGate(deps)
}
