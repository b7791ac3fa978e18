/**
 * Logger utility for stepwarden
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Identifiers bound onto every line a run-scoped logger writes */
export interface RunBindings {
  processId: string
  taskId?: string
  stepIndex?: number
}

/** Every logger created so far, so that the configured level reaches all of them */
const createdLoggers = new Set<pino.Logger>()

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // CLI use without NODE_ENV: warnings and above only
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it out of plain CLI runs.
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  const instance = pretty
    ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
    : pino(baseOptions)
  createdLoggers.add(instance)
  return instance
}

/** Change the level of every logger created through createLogger. */
export function setLogLevel(level: string): void {
  for (const instance of createdLoggers) {
    instance.level = level
  }
}

/** Root application logger */
export const logger = createLogger('stepwarden')

/**
 * Bind process/task identifiers onto a module logger so that every line
 * written while driving one run can be filtered by process id.
 */
export function runLogger(parent: pino.Logger, bindings: RunBindings): pino.Logger {
  const { processId, taskId, stepIndex } = bindings
  return parent.child({
    processId,
    ...(taskId !== undefined ? { taskId } : {}),
    ...(stepIndex !== undefined ? { stepIndex } : {}),
  })
}
