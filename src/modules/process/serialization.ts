/**
 * Conversion between domain objects and their persisted JSON shapes.
 *
 * Persisted shapes use snake_case keys and omit unset fields so that rows
 * written by older releases still parse.
 */

import { z } from 'zod'
import { StepRecordListSchema, type StepRecord } from '../../persistence/schemas/history.js'
import { ValidationError } from '../../core/errors.js'
import type { OrchestratorOverlay, ProcessSpec, ProcessStep } from './types.js'

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export function toStepRecord(step: ProcessStep): StepRecord {
  const record: StepRecord = { task: step.task }
  if (step.engine !== undefined) record.engine = step.engine
  if (step.model !== undefined) record.model = step.model
  if (step.prompt !== undefined) record.prompt = step.prompt
  if (step.skipOrchestrator) record.skip_orchestrator = true
  if (step.originStepIndex !== undefined) record.origin_step_index = step.originStepIndex
  return record
}

export function fromStepRecord(record: StepRecord): ProcessStep {
  const step: ProcessStep = {
    task: record.task,
    skipOrchestrator: record.skip_orchestrator ?? false,
  }
  if (record.engine !== undefined) step.engine = record.engine
  if (record.model !== undefined) step.model = record.model
  if (record.prompt !== undefined) step.prompt = record.prompt
  if (record.origin_step_index !== undefined) step.originStepIndex = record.origin_step_index
  return step
}

/** Parse a JSON column holding a step list. */
export function parseStepList(json: string | null, column: string): ProcessStep[] {
  if (json === null || json === '') return []
  const parsed = StepRecordListSchema.safeParse(JSON.parse(json))
  if (!parsed.success) {
    throw new ValidationError(`Malformed step list in ${column}`, { issues: parsed.error.issues })
  }
  return parsed.data.map(fromStepRecord)
}

// ---------------------------------------------------------------------------
// Process spec
// ---------------------------------------------------------------------------

const OverlayRecordSchema = z.object({
  enabled: z.boolean().nullable().optional(),
  engine: z.string().nullable().optional(),
  model: z.string().nullable().optional(),
  max_injections: z.number().int().min(0).nullable().optional(),
  image: z.string().nullable().optional(),
})

const SpecRecordSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  steps: StepRecordListSchema,
  orchestrator: OverlayRecordSchema.optional(),
  source: z.string().optional(),
})

export function serializeSpec(spec: ProcessSpec): string {
  const record: z.infer<typeof SpecRecordSchema> = {
    name: spec.name,
    steps: spec.steps.map(toStepRecord),
  }
  if (spec.description !== undefined) record.description = spec.description
  if (spec.source !== undefined) record.source = spec.source
  if (spec.orchestrator !== undefined) {
    const o = spec.orchestrator
    record.orchestrator = {
      enabled: o.enabled,
      engine: o.engine,
      model: o.model,
      max_injections: o.maxInjections,
      image: o.image,
    }
  }
  return JSON.stringify(record)
}

export function deserializeSpec(json: string): ProcessSpec {
  const parsed = SpecRecordSchema.safeParse(JSON.parse(json))
  if (!parsed.success) {
    throw new ValidationError('Malformed process spec snapshot', { issues: parsed.error.issues })
  }
  const record = parsed.data
  const spec: ProcessSpec = {
    name: record.name,
    steps: record.steps.map(fromStepRecord),
  }
  if (record.description !== undefined) spec.description = record.description
  if (record.source !== undefined) spec.source = record.source
  if (record.orchestrator !== undefined) {
    const o = record.orchestrator
    const overlay: OrchestratorOverlay = {
      enabled: o.enabled,
      engine: o.engine,
      model: o.model,
      maxInjections: o.max_injections,
      image: o.image,
    }
    spec.orchestrator = overlay
  }
  return spec
}
