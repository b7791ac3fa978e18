/**
 * Artifact templates: skeleton documents agents fill in before publishing
 * them with write_artifact.
 */

import { z } from 'zod'
import { ArtifactFormatEnum, type ArtifactFormat } from '../../persistence/schemas/history.js'

export const TemplateFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().default(''),
    format: ArtifactFormatEnum.default('markdown'),
    tags: z.array(z.string()).default([]),
  })
  .strict()

export type TemplateFile = z.infer<typeof TemplateFileSchema>

export interface ArtifactTemplate {
  name: string
  description: string
  format: ArtifactFormat
  tags: string[]
  content: string
  /** Directory the template was loaded from */
  source: string
}

export interface TemplateRegistry {
  getByName(name: string): ArtifactTemplate | undefined
  list(): ArtifactTemplate[]
}

/** File holding a template's body, by format */
export const CONTENT_FILES: Record<ArtifactFormat, string> = {
  markdown: 'content.md',
  json: 'content.json',
  xml: 'content.xml',
  text: 'content.txt',
}
