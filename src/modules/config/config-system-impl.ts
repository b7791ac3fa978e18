/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.stepwarden/config.yaml)
 *     → project config      (./.stepwarden/config.yaml)
 *     → environment vars    (STEPWARDEN_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, access } from 'node:fs/promises'
import { join, resolve, isAbsolute } from 'node:path'
import { homedir } from 'node:os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError, ConfigIncompatibleFormatError } from '../../core/errors.js'
import { deepMask } from '../../cli/utils/masking.js'
import {
  StepwardenConfigSchema,
  PartialStepwardenConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type StepwardenConfig,
  type PartialStepwardenConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

/** Default name of the history database inside the project config dir */
export const DEFAULT_DATABASE_FILE = 'history.db'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const existing = result[key]
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of STEPWARDEN_ environment variable names to config paths.
 * Only scalar values can be overridden this way.
 */
const ENV_VAR_MAP: Record<string, string> = {
  STEPWARDEN_LOG_LEVEL: 'global.log_level',
  STEPWARDEN_DB: 'global.database_path',
  STEPWARDEN_ENGINE: 'global.engine',
  STEPWARDEN_MODEL: 'global.model',
  STEPWARDEN_EXECUTOR_COMMAND: 'executor.command',
  STEPWARDEN_ORCHESTRATOR_ENABLED: 'orchestrator.enabled',
  STEPWARDEN_ORCHESTRATOR_ENGINE: 'orchestrator.engine',
  STEPWARDEN_ORCHESTRATOR_MODEL: 'orchestrator.model',
  STEPWARDEN_ORCHESTRATOR_IMAGE: 'orchestrator.image',
  STEPWARDEN_MAX_INJECTIONS: 'orchestrator.max_injections',
  STEPWARDEN_SUMMARIZER_ENABLED: 'summarizer.enabled',
  STEPWARDEN_SUMMARIZER_MODEL: 'summarizer.model',
}

function coerceEnvValue(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  return raw
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialStepwardenConfig {
  const overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    const [section, field] = configPath.split('.')
    if (section === undefined || field === undefined) continue

    const existing = overrides[section]
    const sectionObj: Record<string, unknown> = isPlainObject(existing) ? existing : {}
    sectionObj[field] = coerceEnvValue(rawValue)
    overrides[section] = sectionObj
  }

  const parsed = PartialStepwardenConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: StepwardenConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialStepwardenConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.stepwarden')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.stepwarden')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigDir(): string {
    return this._projectConfigDir
  }

  get globalConfigDir(): string {
    return this._globalConfigDir
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const layers: PartialStepwardenConfig[] = []
    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) layers.push(globalConfig)
    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) layers.push(projectConfig)
    layers.push(readEnvOverrides(this._env))
    layers.push(this._cliOverrides)

    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const result = StepwardenConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): StepwardenConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  /** Absolute path of the history database for this project. */
  getDatabasePath(): string {
    const configured = this.getConfig().global.database_path
    if (configured === undefined) return join(this._projectConfigDir, DEFAULT_DATABASE_FILE)
    if (configured === ':memory:' || isAbsolute(configured)) return configured
    return resolve(this._projectConfigDir, configured)
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialStepwardenConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      throw new ConfigError(
        `Failed to read config file at ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
        { filePath },
      )
    }
    if (parsed === undefined || parsed === null) return {}

    if (isPlainObject(parsed)) {
      const version = parsed['config_format_version']
      if (version !== undefined && !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(String(version))) {
        throw new ConfigIncompatibleFormatError(
          `Config file ${filePath} uses format version ${String(version)}; supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
          { filePath, version },
        )
      }
    }

    const result = PartialStepwardenConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystemImpl {
  return new ConfigSystemImpl(options)
}
