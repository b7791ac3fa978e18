/**
 * Built-in defaults: the lowest layer of the config hierarchy.
 */

import type { StepwardenConfig } from './config-schema.js'

export const DEFAULT_CONFIG: StepwardenConfig = {
  config_format_version: '1',
  global: {
    log_level: 'warn',
  },
  executor: {
    command: 'claude',
    args: [
      '--print',
      '--output-format',
      'stream-json',
      '--verbose',
      '--model',
      '{model}',
      '--append-system-prompt',
      '{context}',
      '{prompt}',
    ],
    env: {},
  },
  orchestrator: {
    enabled: true,
    model: 'opus',
    max_injections: 3,
  },
  summarizer: {
    enabled: true,
    model: 'haiku',
    timeout_ms: 60_000,
  },
}
