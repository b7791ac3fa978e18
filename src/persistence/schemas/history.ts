/**
 * Zod schemas for the execution-history persistence layer.
 *
 * Inputs are validated here before any statement runs, so a rejected payload
 * never leaves a partial row behind.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const DecisionPhaseEnum = z.enum(['pre_step', 'post_step', 'finalize'])
export type DecisionPhase = z.infer<typeof DecisionPhaseEnum>

export const DecisionKindEnum = z.enum(['proceed', 'inject', 'abort'])
export type DecisionKind = z.infer<typeof DecisionKindEnum>

export const ProcessRunStatusEnum = z.enum(['running', 'completed', 'aborted'])
export type ProcessRunStatus = z.infer<typeof ProcessRunStatusEnum>

// ---------------------------------------------------------------------------
// Step records (persisted JSON shape of a process step)
// ---------------------------------------------------------------------------

export const StepRecordSchema = z.object({
  task: z.string().min(1),
  engine: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  prompt: z.string().optional(),
  skip_orchestrator: z.boolean().optional(),
  origin_step_index: z.number().int().min(0).optional(),
})
export type StepRecord = z.infer<typeof StepRecordSchema>

export const StepRecordListSchema = z.array(StepRecordSchema)

// ---------------------------------------------------------------------------
// Task log
// ---------------------------------------------------------------------------

export const CreateTaskLogInputSchema = z.object({
  task_id: z.string().min(1),
  process_id: z.string().min(1),
  task_name: z.string().min(1),
  is_orchestrator: z.boolean().default(false),
  orchestrator_phase: DecisionPhaseEnum.nullable().optional(),
  step_index: z.number().int().min(0).nullable().optional(),
  engine: z.string().nullable().optional(),
  model: z.string().nullable().optional(),
  branch: z.string().nullable().optional(),
  worktree: z.string().nullable().optional(),
  main_repo: z.string().nullable().optional(),
  prompt: z.string().nullable().optional(),
  parent_id: z.string().nullable().optional(),
})
export type CreateTaskLogInput = z.input<typeof CreateTaskLogInputSchema>

export const CompleteTaskLogInputSchema = z.object({
  success: z.boolean(),
  exit_code: z.number().int(),
  duration_ms: z.number().int().min(0),
  session_id: z.string().nullable().optional(),
  error_message: z.string().nullable().optional(),
  total_cost: z.number().min(0).nullable().optional(),
  input_tokens: z.number().int().min(0).nullable().optional(),
  output_tokens: z.number().int().min(0).nullable().optional(),
})
export type CompleteTaskLogInput = z.input<typeof CompleteTaskLogInputSchema>

/** Row shape of `task_log` */
export interface TaskLogRow {
  task_id: string
  process_id: string
  created_at: string
  finished_at: string | null
  failed_at: string | null
  branch: string | null
  worktree: string | null
  main_repo: string | null
  engine: string | null
  model: string | null
  session_id: string | null
  task_name: string
  prompt: string | null
  prompt_hash: string | null
  total_cost: number | null
  input_tokens: number | null
  output_tokens: number | null
  duration_ms: number | null
  success: number | null
  exit_code: number | null
  error_message: string | null
  parent_id: string | null
  is_orchestrator: number
  orchestrator_phase: DecisionPhase | null
  step_index: number | null
}

// ---------------------------------------------------------------------------
// Orchestrator decisions
// ---------------------------------------------------------------------------

/**
 * A decision payload. `injected_steps` must be non-empty exactly when the
 * decision is `inject`.
 */
export const AppendDecisionInputSchema = z
  .object({
    task_id: z.string().min(1),
    phase: DecisionPhaseEnum,
    step_index: z.number().int().min(0),
    decision: DecisionKindEnum,
    reasoning: z.string(),
    injected_steps: StepRecordListSchema.default([]),
  })
  .superRefine((value, ctx) => {
    if (value.decision === 'inject' && value.injected_steps.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['injected_steps'],
        message: 'injected_steps is required when decision is "inject"',
      })
    }
    if (value.decision !== 'inject' && value.injected_steps.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['injected_steps'],
        message: `injected_steps must not be provided when decision is "${value.decision}"`,
      })
    }
  })
export type AppendDecisionInput = z.input<typeof AppendDecisionInputSchema>

/** Row shape of `orchestrator_decision` */
export interface DecisionRow {
  id: number
  process_id: string
  task_id: string
  phase: DecisionPhase
  step_index: number
  decision: DecisionKind
  reasoning: string
  injected_steps: string | null
  created_at: string
}

// ---------------------------------------------------------------------------
// Task results
// ---------------------------------------------------------------------------

export const WriteResultInputSchema = z.object({
  task_id: z.string().min(1),
  result_text: z.string(),
  key_files: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
})
export type WriteResultInput = z.input<typeof WriteResultInputSchema>

/** Row shape of `task_result` */
export interface TaskResultRow {
  task_id: string
  result_text: string
  key_files: string
  tags: string
  created_at: string
  updated_at: string
  summary_text: string | null
  has_summary: number
}

// ---------------------------------------------------------------------------
// Artifacts
// ---------------------------------------------------------------------------

export const ArtifactFormatEnum = z.enum(['json', 'markdown', 'xml', 'text'])
export type ArtifactFormat = z.infer<typeof ArtifactFormatEnum>

export const CreateArtifactInputSchema = z
  .object({
    id: z.string().min(1),
    task_id: z.string().min(1),
    title: z.string().min(1, 'title is required'),
    content: z.string(),
    format: ArtifactFormatEnum.default('markdown'),
    template_name: z.string().min(1).nullable().optional(),
    tags: z.array(z.string()).default([]),
  })
  .superRefine((value, ctx) => {
    if (value.format !== 'json') return
    try {
      JSON.parse(value.content)
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['content'],
        message: 'content is not valid JSON',
      })
    }
  })
export type CreateArtifactInput = z.input<typeof CreateArtifactInputSchema>

/** Row shape of `artifact` */
export interface ArtifactRow {
  id: string
  task_id: string
  title: string
  content: string
  format: ArtifactFormat
  template_name: string | null
  tags: string
  created_at: string
}

// ---------------------------------------------------------------------------
// Knowledge
// ---------------------------------------------------------------------------

export const WriteKnowledgeInputSchema = z.object({
  key: z
    .string()
    .min(1, 'key is required')
    .max(200)
    .regex(/^[\w.\-/:]+$/, 'key may only contain letters, digits and . _ - / :'),
  content: z.string().min(1, 'content is required'),
  reason: z.string().min(1, 'reason is required'),
})
export type WriteKnowledgeInput = z.input<typeof WriteKnowledgeInputSchema>

/** Row shape of `knowledge` */
export interface KnowledgeRow {
  id: number
  key: string
  version: number
  content: string
  reason: string
  created_at: string
}

// ---------------------------------------------------------------------------
// Process runs (snapshot used for state queries and resumption)
// ---------------------------------------------------------------------------

export const SaveProcessRunInputSchema = z.object({
  process_id: z.string().min(1),
  process_name: z.string().min(1),
  spec_json: z.string(),
  steps: StepRecordListSchema,
  current_index: z.number().int().min(0),
  status: ProcessRunStatusEnum,
  abort_reason: z.string().nullable().optional(),
  parent_process_id: z.string().nullable().optional(),
  worktree: z.string().nullable().optional(),
  branch: z.string().nullable().optional(),
  main_repo: z.string().nullable().optional(),
  base_commit: z.string().nullable().optional(),
  injection_counts: z.record(z.string(), z.number().int().min(0)).default({}),
  user_prompt: z.string().nullable().optional(),
})
export type SaveProcessRunInput = z.input<typeof SaveProcessRunInputSchema>

/** Row shape of `process_runs` */
export interface ProcessRunRow {
  process_id: string
  process_name: string
  spec_json: string
  steps_json: string
  current_index: number
  status: ProcessRunStatus
  abort_reason: string | null
  parent_process_id: string | null
  worktree: string | null
  branch: string | null
  main_repo: string | null
  base_commit: string | null
  injection_counts: string
  user_prompt: string | null
  created_at: string
  updated_at: string
}
