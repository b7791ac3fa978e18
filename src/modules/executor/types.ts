/**
 * Executor: the collaborator that actually runs an agent for a task and
 * reports how it ended. Used for worker steps and supervisor phases alike.
 */

import type { TaskDefinition } from '../tasks/types.js'
import type { WorktreeRef } from '../process/types.js'

export interface ExecutionRequest {
  /** task_log id; the agent's tool server identifies itself with it */
  taskId: string
  processId: string
  task: TaskDefinition
  engine?: string
  model?: string
  image?: string
  worktree: WorktreeRef
  /** Main instructions for the agent */
  prompt: string
  /** Orientation or status text appended to the agent's system prompt */
  context: string
  isOrchestrator: boolean
}

/** Spend reported by the agent CLI in its final result line */
export interface ExecutionUsage {
  costUsd?: number
  inputTokens?: number
  outputTokens?: number
}

export interface ExecutionResult {
  exitCode: number
  sessionId?: string
  error?: string
  usage?: ExecutionUsage
}

export interface Executor {
  /** Blocks until the agent exits. May reject; callers treat that as exit code -1. */
  run(request: ExecutionRequest): Promise<ExecutionResult>
}
