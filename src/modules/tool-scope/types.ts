/**
 * Tool definitions shared by worker and supervisor agents.
 */

import type { z } from 'zod'
import type { HistoryStore, TaskLog } from '../history/history-store.js'
import type { TaskRegistry } from '../tasks/types.js'
import type { RepositoryInspector } from '../git/repository-inspector.js'
import type { TemplateRegistry } from '../templates/types.js'
import type { ResultSummarizer } from '../summarizer/types.js'

/** `shared` tools are visible to every caller; `orchestrator` tools only to supervisors. */
export type ToolScope = 'shared' | 'orchestrator'

/** JSON Schema advertised in tool listings */
export interface ToolInputSchema {
  type: 'object'
  properties: Record<string, unknown>
  required?: string[]
}

export interface ToolDescriptor {
  name: string
  description: string
  scope: ToolScope
  inputSchema: ToolInputSchema
}

/** Resolved per call; never reused between calls. */
export interface ToolContext {
  /** Caller's identity record, when the caller's task id is known */
  caller: TaskLog | undefined
  history: HistoryStore
  registry: TaskRegistry
  inspector?: RepositoryInspector
  templates?: TemplateRegistry
  /** When absent, write_result stores results without a summary */
  summarizer?: ResultSummarizer
}

export interface RegisteredTool extends ToolDescriptor {
  /** Validate `args` and run the tool. Resolves with a JSON-serialisable value. */
  call(args: unknown, ctx: ToolContext): Promise<unknown>
}

export interface ToolDefinition<S extends z.ZodTypeAny> extends ToolDescriptor {
  input: S
  handler(input: z.output<S>, ctx: ToolContext): unknown
}
