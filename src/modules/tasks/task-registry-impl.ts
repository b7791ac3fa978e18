/**
 * File-based TaskRegistry.
 *
 * Each task lives in its own directory containing `task.yaml` and an optional
 * `prompt.md`. Directories are searched in order and the first definition of
 * a name wins, so project tasks shadow user tasks, which shadow the built-ins
 * shipped in the package's `tasks/` directory.
 */

import { readdir, readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import yaml from 'js-yaml'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { TaskFileSchema, type TaskDefinition, type TaskRegistry } from './types.js'

const logger = createLogger('tasks')

/** Built-in task directory: `<package root>/tasks` from both src/ and dist/ */
export const BUILTIN_TASKS_DIR = resolve(fileURLToPath(new URL('.', import.meta.url)), '../../../tasks')

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

async function loadTaskDir(dir: string, dirName: string): Promise<TaskDefinition | null> {
  const taskFile = join(dir, 'task.yaml')
  if (!existsSync(taskFile)) return null

  let raw: unknown
  try {
    raw = yaml.load(await readFile(taskFile, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${taskFile}: ${err instanceof Error ? err.message : String(err)}`, {
      path: taskFile,
    })
  }

  const parsed = TaskFileSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`)
      .join('\n')
    throw new ConfigError(`Task definition ${taskFile} is invalid:\n${issues}`, {
      path: taskFile,
      issues: parsed.error.issues,
    })
  }

  const promptFile = join(dir, 'prompt.md')
  const prompt = existsSync(promptFile)
    ? await readFile(promptFile, 'utf-8')
    : (parsed.data.prompt ?? '')

  return {
    name: parsed.data.name ?? dirName,
    description: parsed.data.description,
    prompt: prompt.trim(),
    engine: parsed.data.engine,
    model: parsed.data.model,
    tools: parsed.data.tools,
    source: dir,
  }
}

// ---------------------------------------------------------------------------
// FileTaskRegistry
// ---------------------------------------------------------------------------

export class FileTaskRegistry implements TaskRegistry {
  private readonly _tasks = new Map<string, TaskDefinition>()

  constructor(private readonly _searchDirs: readonly string[]) {}

  /** Scan every search directory. Safe to call again to pick up edits. */
  async load(): Promise<void> {
    this._tasks.clear()
    for (const root of this._searchDirs) {
      if (!existsSync(root)) continue
      const entries = await readdir(root, { withFileTypes: true })
      for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
        if (!entry.isDirectory()) continue
        const definition = await loadTaskDir(join(root, entry.name), entry.name)
        if (definition === null || this._tasks.has(definition.name)) continue
        this._tasks.set(definition.name, definition)
      }
    }
    logger.debug({ count: this._tasks.size, dirs: this._searchDirs }, 'Task definitions loaded')
  }

  getByName(name: string): TaskDefinition | undefined {
    return this._tasks.get(name)
  }

  list(): TaskDefinition[] {
    return [...this._tasks.values()]
  }
}

/**
 * Create and load a registry searching, in order: the project's
 * `.stepwarden/tasks`, the user's `~/.stepwarden/tasks`, then the built-ins.
 */
export async function createTaskRegistry(options: {
  projectDir: string
  globalDir: string
  builtinDir?: string
}): Promise<FileTaskRegistry> {
  const registry = new FileTaskRegistry([
    join(options.projectDir, 'tasks'),
    join(options.globalDir, 'tasks'),
    options.builtinDir ?? BUILTIN_TASKS_DIR,
  ])
  await registry.load()
  return registry
}
