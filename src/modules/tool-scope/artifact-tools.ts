/**
 * Artifact tools: structured documents (designs, checklists, contracts)
 * attached to the task that wrote them, plus the templates to start from.
 */

import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import { ArtifactFormatEnum } from '../../persistence/schemas/history.js'
import type { Artifact } from '../history/history-store.js'
import type { TemplateRegistry } from '../templates/types.js'
import { defineTool } from './define-tool.js'
import { callerIsOrchestrator, canReadOutputOf, requireCaller } from './tool-helpers.js'
import type { RegisteredTool, ToolContext } from './types.js'

function requireTemplates(ctx: ToolContext): TemplateRegistry {
  if (ctx.templates === undefined) {
    throw new ValidationError('Artifact templates are not available in this server', {})
  }
  return ctx.templates
}

function describeArtifact(artifact: Artifact, privileged: boolean): Record<string, unknown> {
  return {
    artifact_id: artifact.id,
    title: artifact.title,
    format: artifact.format,
    template_name: artifact.templateName ?? null,
    tags: artifact.tags,
    task_name: artifact.taskName,
    ...(privileged ? { task_id: artifact.taskId, is_orchestrator: artifact.isOrchestrator } : {}),
    created_at: artifact.createdAt,
  }
}

const writeArtifact = defineTool({
  name: 'write_artifact',
  scope: 'shared',
  description:
    'Store a document (design, checklist, API contract, decision record) for your task. See list_artifact_templates for starting points.',
  inputSchema: {
    type: 'object',
    properties: {
      title: { type: 'string' },
      content: { type: 'string' },
      format: { type: 'string', enum: ['json', 'markdown', 'xml', 'text'] },
      template_name: { type: 'string', description: 'Template the document was based on' },
      tags: { type: 'array', items: { type: 'string' } },
    },
    required: ['title', 'content', 'format'],
  },
  input: z
    .object({
      title: z.string().min(1, 'title is required'),
      content: z.string(),
      format: ArtifactFormatEnum,
      template_name: z.string().min(1).optional(),
      tags: z.array(z.string()).optional(),
    })
    .strict(),
  handler(input, ctx) {
    const caller = requireCaller(ctx, 'write_artifact')
    const artifact = ctx.history.createArtifact({
      taskId: caller.task_id,
      title: input.title,
      content: input.content,
      format: input.format,
      ...(input.template_name !== undefined ? { templateName: input.template_name } : {}),
      tags: input.tags ?? [],
    })
    return { stored: true, artifact_id: artifact.id, title: artifact.title, format: artifact.format }
  },
})

const loadArtifact = defineTool({
  name: 'load_artifact',
  scope: 'shared',
  description: 'Load an artifact with its full content.',
  inputSchema: {
    type: 'object',
    properties: { artifact_id: { type: 'string' } },
    required: ['artifact_id'],
  },
  input: z.object({ artifact_id: z.string().min(1, 'artifact_id is required') }).strict(),
  handler(input, ctx) {
    const artifact = ctx.history.getArtifact(input.artifact_id)
    if (artifact === undefined || !canReadOutputOf(ctx, artifact.taskId)) {
      throw new ValidationError(`No artifact found for ${input.artifact_id}`, { artifactId: input.artifact_id })
    }
    return { ...describeArtifact(artifact, callerIsOrchestrator(ctx)), content: artifact.content }
  },
})

const listArtifacts = defineTool({
  name: 'list_artifacts',
  scope: 'shared',
  description:
    'List artifacts of the current process, or of one task, without their content. Use load_artifact to read one.',
  inputSchema: {
    type: 'object',
    properties: { task_id: { type: 'string', description: 'Only artifacts written by this task' } },
  },
  input: z.object({ task_id: z.string().min(1).optional() }).strict(),
  handler(input, ctx) {
    const caller = requireCaller(ctx, 'list_artifacts')
    const privileged = callerIsOrchestrator(ctx)
    const artifacts =
      input.task_id !== undefined
        ? ctx.history.listArtifactsForTask(input.task_id)
        : ctx.history.listArtifactsForProcess(caller.process_id)
    return artifacts.filter((a) => privileged || !a.isOrchestrator).map((a) => describeArtifact(a, privileged))
  },
})

const listArtifactTemplates = defineTool({
  name: 'list_artifact_templates',
  scope: 'shared',
  description: 'List the available artifact templates with their formats.',
  inputSchema: { type: 'object', properties: {} },
  input: z.object({}).strict(),
  handler(_input, ctx) {
    return requireTemplates(ctx)
      .list()
      .map((t) => ({ name: t.name, description: t.description, format: t.format, tags: t.tags }))
  },
})

const loadArtifactTemplate = defineTool({
  name: 'load_artifact_template',
  scope: 'shared',
  description: 'Load a template to fill in before calling write_artifact.',
  inputSchema: {
    type: 'object',
    properties: { template_name: { type: 'string' } },
    required: ['template_name'],
  },
  input: z.object({ template_name: z.string().min(1, 'template_name is required') }).strict(),
  handler(input, ctx) {
    const templates = requireTemplates(ctx)
    const template = templates.getByName(input.template_name)
    if (template === undefined) {
      throw new ValidationError(
        `Unknown template: ${input.template_name}. Available: ${templates.list().map((t) => t.name).join(', ')}`,
        { templateName: input.template_name },
      )
    }
    return {
      name: template.name,
      description: template.description,
      format: template.format,
      tags: template.tags,
      content: template.content,
    }
  },
})

export const ARTIFACT_TOOLS: readonly RegisteredTool[] = [
  writeArtifact,
  loadArtifact,
  listArtifacts,
  listArtifactTemplates,
  loadArtifactTemplate,
]
