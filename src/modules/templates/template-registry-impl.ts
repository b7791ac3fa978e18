/**
 * File-based TemplateRegistry.
 *
 * Each template is a directory with `template.yaml` and a content file named
 * after its format (`content.md`, `content.json`, `content.xml`,
 * `content.txt`). Project templates shadow user templates, which shadow the
 * built-ins shipped in the package's `templates/` directory.
 */

import { readdir, readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { CONTENT_FILES, TemplateFileSchema, type ArtifactTemplate, type TemplateRegistry } from './types.js'

const logger = createLogger('templates')

/** Built-in template directory: `<package root>/templates` from both src/ and dist/ */
export const BUILTIN_TEMPLATES_DIR = resolve(fileURLToPath(new URL('.', import.meta.url)), '../../../templates')

async function loadTemplateDir(dir: string, dirName: string): Promise<ArtifactTemplate | null> {
  const templateFile = join(dir, 'template.yaml')
  if (!existsSync(templateFile)) return null

  let raw: unknown
  try {
    raw = yaml.load(await readFile(templateFile, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${templateFile}: ${errorMessage(err)}`, { path: templateFile })
  }

  const parsed = TemplateFileSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Template definition ${templateFile} is invalid:\n${issues}`, {
      path: templateFile,
      issues: parsed.error.issues,
    })
  }

  const contentFile = join(dir, CONTENT_FILES[parsed.data.format])
  if (!existsSync(contentFile)) {
    throw new ConfigError(`Template ${dirName} has no ${CONTENT_FILES[parsed.data.format]}`, { path: dir })
  }

  return {
    name: parsed.data.name ?? dirName,
    description: parsed.data.description,
    format: parsed.data.format,
    tags: parsed.data.tags,
    content: await readFile(contentFile, 'utf-8'),
    source: dir,
  }
}

export class FileTemplateRegistry implements TemplateRegistry {
  private readonly _templates = new Map<string, ArtifactTemplate>()

  constructor(private readonly _searchDirs: readonly string[]) {}

  async load(): Promise<void> {
    this._templates.clear()
    for (const root of this._searchDirs) {
      if (!existsSync(root)) continue
      const entries = await readdir(root, { withFileTypes: true })
      for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        if (!entry.isDirectory()) continue
        const template = await loadTemplateDir(join(root, entry.name), entry.name)
        if (template === null || this._templates.has(template.name)) continue
        this._templates.set(template.name, template)
      }
    }
    logger.debug({ count: this._templates.size, dirs: this._searchDirs }, 'Artifact templates loaded')
  }

  getByName(name: string): ArtifactTemplate | undefined {
    return this._templates.get(name)
  }

  list(): ArtifactTemplate[] {
    return [...this._templates.values()].sort((a, b) => a.name.localeCompare(b.name))
  }
}

/**
 * Create and load a registry searching the project's `.stepwarden/templates`,
 * the user's `~/.stepwarden/templates`, then the built-ins.
 */
export async function createTemplateRegistry(options: {
  projectDir: string
  globalDir: string
  builtinDir?: string
}): Promise<FileTemplateRegistry> {
  const registry = new FileTemplateRegistry([
    join(options.projectDir, 'templates'),
    join(options.globalDir, 'templates'),
    options.builtinDir ?? BUILTIN_TEMPLATES_DIR,
  ])
  await registry.load()
  return registry
}
