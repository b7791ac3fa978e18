/**
 * Credential masking utilities for CLI output and Pino logger redaction.
 *
 * Agent CLIs are launched with provider credentials in their environment and
 * their stderr ends up in task_log.error_message, so both paths are scrubbed.
 */

import { isPlainObject } from '../../utils/helpers.js'

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Regex patterns that identify API key values inside free text.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Google / Gemini: AIza...
  /AIza[A-Za-z0-9_-]{35,}/g,
  // GitHub tokens
  /gh[pousr]_[A-Za-z0-9]{30,}/g,
]

/**
 * Pino redaction paths for credential-bearing fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'env.ANTHROPIC_API_KEY',
  'env.OPENAI_API_KEY',
  'env.GOOGLE_API_KEY',
  'executor.env',
  '*.executor.env',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * Best-effort only; unknown secret formats pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Reset lastIndex in case the regex is reused (global flag)
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

/** Field names whose values are always masked in displayed output. */
const CREDENTIAL_FIELDS = new Set(['api_key', 'apiKey', 'token', 'secret', 'password'])

/** Environment variable names that look like they carry a credential. */
const CREDENTIAL_ENV_NAME = /(KEY|TOKEN|SECRET|PASSWORD)/i

/**
 * Deep-clone a plain-object tree and replace credential fields with `***`.
 *
 * Keys of an `env` map are masked when their name looks like a credential.
 */
export function deepMask(value: unknown, parentKey?: string): unknown {
  if (Array.isArray(value)) return value.map((item) => deepMask(item))
  if (!isPlainObject(value)) return value

  const masked: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(value)) {
    if (CREDENTIAL_FIELDS.has(k) || (parentKey === 'env' && CREDENTIAL_ENV_NAME.test(k))) {
      masked[k] = MASKED_VALUE
    } else {
      masked[k] = deepMask(v, k)
    }
  }
  return masked
}
