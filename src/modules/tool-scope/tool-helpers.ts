/**
 * Caller checks shared by the tool catalogues.
 */

import { ValidationError } from '../../core/errors.js'
import type { TaskLog } from '../history/history-store.js'
import type { ToolContext } from './types.js'

export function requireCaller(ctx: ToolContext, tool: string): TaskLog {
  if (ctx.caller === undefined) {
    throw new ValidationError(`${tool} requires a caller registered in task_log`, { tool })
  }
  return ctx.caller
}

export function callerIsOrchestrator(ctx: ToolContext): boolean {
  return ctx.caller?.is_orchestrator === 1
}

/**
 * Whether the caller may read what `taskId` wrote. Output of supervisor
 * invocations is hidden from workers and unknown callers, so supervisor
 * task ids never reach them.
 */
export function canReadOutputOf(ctx: ToolContext, taskId: string): boolean {
  if (callerIsOrchestrator(ctx)) return true
  const writer = ctx.history.getTaskLog(taskId)
  return writer !== undefined && writer.is_orchestrator === 0
}
