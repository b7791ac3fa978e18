/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { StepwardenConfig, PartialStepwardenConfig } from './config-schema.js'

export interface ConfigSystemOptions {
  /** Project-level config directory (default: <cwd>/.stepwarden) */
  projectConfigDir?: string
  /** User-level config directory (default: ~/.stepwarden) */
  globalConfigDir?: string
  /** Values that override every other layer; typically from CLI flags */
  cliOverrides?: PartialStepwardenConfig
  /** Environment to read STEPWARDEN_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

/**
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /** Load and validate configuration from all layers. Must precede getConfig(). */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): StepwardenConfig

  /** Single value by dot-notation key (e.g. "orchestrator.model"). */
  get(key: string): unknown

  /** Merged config with credential values masked, for display. */
  getMasked(): unknown

  readonly projectConfigDir: string
  readonly globalConfigDir: string
  readonly isLoaded: boolean
}
