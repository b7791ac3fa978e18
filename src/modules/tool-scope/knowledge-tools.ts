/**
 * Knowledge tools: a versioned store of notes that outlive a single process.
 * Every write appends a version; nothing is overwritten.
 */

import { z } from 'zod'
import { ValidationError } from '../../core/errors.js'
import { defineTool } from './define-tool.js'
import type { RegisteredTool } from './types.js'

/** Characters of content shown per version in the history listing */
export const KNOWLEDGE_PREVIEW_CHARS = 200

const KeyInput = z.string().min(1, 'key is required')

const writeKnowledge = defineTool({
  name: 'write_knowledge',
  scope: 'shared',
  description:
    'Write a new version of a knowledge entry that later tasks and processes can read. Use descriptive keys such as "api-design-decisions".',
  inputSchema: {
    type: 'object',
    properties: {
      key: { type: 'string' },
      content: { type: 'string' },
      reason: { type: 'string', description: 'Why this version was written' },
    },
    required: ['key', 'content', 'reason'],
  },
  input: z.object({ key: KeyInput, content: z.string(), reason: z.string() }).strict(),
  handler(input, ctx) {
    const entry = ctx.history.writeKnowledge(input.key, input.content, input.reason)
    return { stored: true, key: entry.key, version: entry.version, created_at: entry.createdAt }
  },
})

const getKnowledge = defineTool({
  name: 'get_knowledge',
  scope: 'shared',
  description: 'Read a knowledge entry: the latest version, or the one given.',
  inputSchema: {
    type: 'object',
    properties: {
      key: { type: 'string' },
      version: { type: 'integer', minimum: 1 },
    },
    required: ['key'],
  },
  input: z.object({ key: KeyInput, version: z.number().int().min(1).optional() }).strict(),
  handler(input, ctx) {
    const entry = ctx.history.getKnowledge(input.key, input.version)
    if (entry === undefined) {
      const which = input.version !== undefined ? ` version ${String(input.version)}` : ''
      throw new ValidationError(`No knowledge found for ${input.key}${which}`, {
        key: input.key,
        version: input.version,
      })
    }
    return {
      key: entry.key,
      version: entry.version,
      content: entry.content,
      reason: entry.reason,
      created_at: entry.createdAt,
    }
  },
})

const viewKnowledgeHistory = defineTool({
  name: 'view_knowledge_history',
  scope: 'shared',
  description: 'List every version of a knowledge entry with its reason and a content preview.',
  inputSchema: {
    type: 'object',
    properties: { key: { type: 'string' } },
    required: ['key'],
  },
  input: z.object({ key: KeyInput }).strict(),
  handler(input, ctx) {
    const versions = ctx.history.listKnowledgeHistory(input.key)
    if (versions.length === 0) {
      throw new ValidationError(`No knowledge found for ${input.key}`, { key: input.key })
    }
    return versions.map((v) => ({
      version: v.version,
      reason: v.reason,
      preview: v.content.slice(0, KNOWLEDGE_PREVIEW_CHARS),
      created_at: v.createdAt,
    }))
  },
})

export const KNOWLEDGE_TOOLS: readonly RegisteredTool[] = [writeKnowledge, getKnowledge, viewKnowledgeHistory]
