/**
 * Loads process definitions from `process.yaml` files.
 *
 * Search order: an explicit path, the project's `.stepwarden/processes`, then
 * the user's `~/.stepwarden/processes`. A process is a directory holding a
 * `process.yaml`.
 */

import { readdir, readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { basename, dirname, extname, join, resolve } from 'node:path'
import yaml from 'js-yaml'
import { z } from 'zod'
import { ConfigError, ProcessNotFoundError } from '../../core/errors.js'
import type { OrchestratorOverlay, ProcessSpec, ProcessStep } from './types.js'

// ---------------------------------------------------------------------------
// process.yaml schema
// ---------------------------------------------------------------------------

const StepEntrySchema = z.union([
  z.string().min(1).transform((task) => ({ task })),
  z
    .object({
      task: z.string().min(1),
      engine: z.string().min(1).optional(),
      model: z.string().min(1).optional(),
      prompt: z.string().optional(),
      skip_orchestrator: z.boolean().optional(),
    })
    .strict(),
])

const OrchestratorOverlaySchema = z
  .object({
    enabled: z.boolean().nullable().optional(),
    engine: z.string().nullable().optional(),
    model: z.string().nullable().optional(),
    max_injections: z.number().int().min(0).nullable().optional(),
    image: z.string().nullable().optional(),
  })
  .strict()

export const ProcessFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    description: z.string().optional(),
    orchestrator: OrchestratorOverlaySchema.optional(),
    steps: z.array(StepEntrySchema).min(1, 'a process needs at least one step'),
  })
  .strict()

export type ProcessFile = z.input<typeof ProcessFileSchema>

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate a parsed YAML document as a process definition.
 * @param fallbackName - used when the document has no `name`
 */
export function parseProcessDefinition(raw: unknown, fallbackName: string, source?: string): ProcessSpec {
  const parsed = ProcessFileSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Process definition ${source ?? fallbackName} is invalid:\n${issues}`, {
      source,
      issues: parsed.error.issues,
    })
  }

  const steps: ProcessStep[] = parsed.data.steps.map((entry) => {
    const step: ProcessStep = { task: entry.task, skipOrchestrator: false }
    if ('engine' in entry && entry.engine !== undefined) step.engine = entry.engine
    if ('model' in entry && entry.model !== undefined) step.model = entry.model
    if ('prompt' in entry && entry.prompt !== undefined) step.prompt = entry.prompt
    if ('skip_orchestrator' in entry && entry.skip_orchestrator === true) step.skipOrchestrator = true
    return step
  })

  const spec: ProcessSpec = {
    name: parsed.data.name ?? fallbackName,
    steps,
  }
  if (parsed.data.description !== undefined) spec.description = parsed.data.description
  if (source !== undefined) spec.source = source

  const o = parsed.data.orchestrator
  if (o !== undefined) {
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

async function readProcessFile(path: string, fallbackName: string): Promise<ProcessSpec> {
  let raw: unknown
  try {
    raw = yaml.load(await readFile(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      path,
    })
  }
  return parseProcessDefinition(raw, fallbackName, path)
}

// ---------------------------------------------------------------------------
// ProcessLoader
// ---------------------------------------------------------------------------

export interface ProcessLoaderOptions {
  /** Project config directory, usually `<project>/.stepwarden` */
  projectDir: string
  /** User config directory, usually `~/.stepwarden` */
  globalDir: string
}

export class ProcessLoader {
  constructor(private readonly _options: ProcessLoaderOptions) {}

  private get _searchDirs(): string[] {
    return [join(this._options.projectDir, 'processes'), join(this._options.globalDir, 'processes')]
  }

  /**
   * Load a process by name, or by path to a `process.yaml` file.
   * @throws {ProcessNotFoundError} when nothing matches
   */
  async load(nameOrPath: string): Promise<ProcessSpec> {
    if (nameOrPath.endsWith('.yaml') || nameOrPath.endsWith('.yml')) {
      const path = resolve(nameOrPath)
      if (!existsSync(path)) throw new ProcessNotFoundError(nameOrPath, [path])
      const file = basename(path, extname(path))
      return readProcessFile(path, file === 'process' ? basename(dirname(path)) : file)
    }

    const searched: string[] = []
    for (const dir of this._searchDirs) {
      const candidate = join(dir, nameOrPath, 'process.yaml')
      searched.push(candidate)
      if (existsSync(candidate)) {
        return readProcessFile(candidate, nameOrPath)
      }
    }
    throw new ProcessNotFoundError(nameOrPath, searched)
  }

  /** Names of every discoverable process; project definitions shadow user ones. */
  async list(): Promise<string[]> {
    const names = new Set<string>()
    for (const dir of this._searchDirs) {
      if (!existsSync(dir)) continue
      for (const entry of await readdir(dir, { withFileTypes: true })) {
        if (entry.isDirectory() && existsSync(join(dir, entry.name, 'process.yaml'))) {
          names.add(entry.name)
        }
      }
    }
    return [...names].sort()
  }
}
