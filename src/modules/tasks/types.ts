/**
 * Task definitions and the registry that resolves them by name.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// task.yaml schema
// ---------------------------------------------------------------------------

export const TaskFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().default(''),
    /** Inline prompt; prompt.md next to task.yaml takes precedence */
    prompt: z.string().optional(),
    engine: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    /** Tool names the agent is told it may use */
    tools: z.array(z.string().min(1)).default([]),
  })
  .strict()

export type TaskFile = z.infer<typeof TaskFileSchema>

/** A resolved task: what an executor needs to launch an agent for it. */
export interface TaskDefinition {
  name: string
  description: string
  prompt: string
  engine?: string
  model?: string
  tools: string[]
  /** Directory the definition was loaded from */
  source: string
}

// ---------------------------------------------------------------------------
// TaskRegistry interface
// ---------------------------------------------------------------------------

export interface TaskRegistry {
  getByName(name: string): TaskDefinition | undefined
  list(): TaskDefinition[]
}

/** Task names of the supervisor phases. */
export const ORCHESTRATOR_TASKS = {
  pre_step: 'orchestrator-pre',
  post_step: 'orchestrator-post',
  finalize: 'orchestrator-finalize',
} as const
