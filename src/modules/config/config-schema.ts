/**
 * Zod validation schemas for the stepwarden configuration system.
 *
 * Sections:
 *  - global settings
 *  - executor (how agent CLIs are launched)
 *  - orchestrator (supervisor defaults)
 *  - summarizer (compression of stored results)
 *  - full config document
 */

import { z } from 'zod'

export const CURRENT_CONFIG_FORMAT_VERSION = '1'
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** SQLite history file; relative paths resolve against the project config dir */
    database_path: z.string().min(1).optional(),
    /** Default engine for worker steps */
    engine: z.string().min(1).optional(),
    /** Default model for worker steps */
    model: z.string().min(1).optional(),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Executor
// ---------------------------------------------------------------------------

export const ExecutorSettingsSchema = z
  .object({
    /** Agent CLI binary */
    command: z.string().min(1),
    /**
     * Argument template. `{prompt}`, `{context}`, `{model}`, `{engine}`,
     * `{image}` and `{tools}` (the task's comma-separated tool allowlist) are
     * replaced per invocation; an argument whose placeholder has no value is
     * dropped together with the flag right before it.
     */
    args: z.array(z.string()),
    /** Extra environment for the agent process */
    env: z.record(z.string(), z.string()),
  })
  .strict()

export type ExecutorSettings = z.infer<typeof ExecutorSettingsSchema>

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export const OrchestratorSettingsSchema = z
  .object({
    enabled: z.boolean(),
    engine: z.string().min(1).optional(),
    model: z.string().min(1),
    max_injections: z.number().int().min(0).max(100),
    image: z.string().min(1).optional(),
  })
  .strict()

export type OrchestratorSettings = z.infer<typeof OrchestratorSettingsSchema>

// ---------------------------------------------------------------------------
// Summarizer
// ---------------------------------------------------------------------------

export const SummarizerSettingsSchema = z
  .object({
    enabled: z.boolean(),
    /** Agent CLI used for compression; defaults to the executor command */
    command: z.string().min(1).optional(),
    model: z.string().min(1),
    timeout_ms: z.number().int().min(1_000).max(600_000),
  })
  .strict()

export type SummarizerSettings = z.infer<typeof SummarizerSettingsSchema>

// ---------------------------------------------------------------------------
// Full config document
// ---------------------------------------------------------------------------

export const StepwardenConfigSchema = z
  .object({
    config_format_version: z.enum(['1']),
    global: GlobalSettingsSchema,
    executor: ExecutorSettingsSchema,
    orchestrator: OrchestratorSettingsSchema,
    summarizer: SummarizerSettingsSchema,
  })
  .strict()

export type StepwardenConfig = z.infer<typeof StepwardenConfigSchema>

/** Any file or overlay: every section and field optional. */
export const PartialStepwardenConfigSchema = z
  .object({
    config_format_version: z.enum(['1']).optional(),
    global: GlobalSettingsSchema.partial().optional(),
    executor: ExecutorSettingsSchema.partial().optional(),
    orchestrator: OrchestratorSettingsSchema.partial().optional(),
    summarizer: SummarizerSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialStepwardenConfig = z.infer<typeof PartialStepwardenConfigSchema>
