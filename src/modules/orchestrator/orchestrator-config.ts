/**
 * Resolution of the effective orchestrator settings for one run.
 *
 * Order: global config → process overlay. Overlay fields only apply when set
 * to a non-null, non-empty value. Per-step `skipOrchestrator` is checked by
 * the driving loop independently of the result.
 */

import type { OrchestratorSettings } from '../config/config-schema.js'
import type { OrchestratorConfig, OrchestratorOverlay } from '../process/types.js'

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  enabled: true,
  model: 'opus',
  maxInjections: 3,
}

function isSet<T>(value: T | null | undefined): value is T {
  return value !== undefined && value !== null && value !== ''
}

export function fromSettings(settings: OrchestratorSettings): OrchestratorConfig {
  const config: OrchestratorConfig = {
    enabled: settings.enabled,
    model: settings.model,
    maxInjections: settings.max_injections,
  }
  if (isSet(settings.engine)) config.engine = settings.engine
  if (isSet(settings.image)) config.image = settings.image
  return config
}

/** Apply a process-level overlay on top of a resolved config. */
export function overlayOrchestratorConfig(
  base: OrchestratorConfig,
  overlay: OrchestratorOverlay | undefined,
): OrchestratorConfig {
  const result: OrchestratorConfig = { ...base }
  if (overlay === undefined) return result
  if (isSet(overlay.enabled)) result.enabled = overlay.enabled
  if (isSet(overlay.engine)) result.engine = overlay.engine
  if (isSet(overlay.model)) result.model = overlay.model
  if (isSet(overlay.maxInjections)) result.maxInjections = overlay.maxInjections
  if (isSet(overlay.image)) result.image = overlay.image
  return result
}

export function resolveOrchestratorConfig(
  settings: OrchestratorSettings | undefined,
  overlay: OrchestratorOverlay | undefined,
): OrchestratorConfig {
  const base = settings !== undefined ? fromSettings(settings) : { ...DEFAULT_ORCHESTRATOR_CONFIG }
  return overlayOrchestratorConfig(base, overlay)
}
