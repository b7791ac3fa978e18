/**
 * Exit codes and error reporting shared by every command.
 */

import {
  ConfigError,
  ProcessNotFoundError,
  RecoveryError,
  StepwardenError,
  TaskNotFoundError,
  ValidationError,
} from '../../core/errors.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
/** Unexpected failure, or a run that ended aborted */
export const EXIT_ERROR = 1
/** Bad input: unknown process, task or key, invalid configuration */
export const EXIT_USAGE = 2

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(raw: string | undefined): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}

/** Errors caused by what the user asked for rather than by the system. */
function isUsageError(err: unknown): boolean {
  return (
    err instanceof ConfigError ||
    err instanceof ProcessNotFoundError ||
    err instanceof TaskNotFoundError ||
    err instanceof RecoveryError ||
    err instanceof ValidationError
  )
}

/** Print `err` to stderr and pick the exit code for it. */
export function reportError(err: unknown, context: string): number {
  process.stderr.write(`Error: ${errorMessage(err)}\n`)
  if (isUsageError(err)) return EXIT_USAGE
  if (!(err instanceof StepwardenError)) {
    logger.error({ err }, `${context} failed`)
  }
  return EXIT_ERROR
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n')
}
