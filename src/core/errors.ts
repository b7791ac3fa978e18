/**
 * Error definitions for stepwarden
 * Provides structured error hierarchy for all pipeline operations
 */

/** Base error class for all stepwarden errors */
export class StepwardenError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'StepwardenError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StepwardenError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when a boundary call receives a malformed payload */
export class ValidationError extends StepwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VALIDATION_ERROR', context)
    this.name = 'ValidationError'
  }
}

/** Error thrown when a caller invokes a tool outside its scope */
export class ScopeViolationError extends StepwardenError {
  constructor(toolName: string, taskId: string | undefined) {
    super(
      `Tool "${toolName}" is only available to orchestrator tasks`,
      'SCOPE_VIOLATION',
      { toolName, taskId: taskId ?? null },
    )
    this.name = 'ScopeViolationError'
  }
}

/** Error thrown when a task lookup by id, branch or session finds nothing */
export class TaskNotFoundError extends StepwardenError {
  public readonly lookupType: string
  public readonly value: string

  constructor(lookupType: string, value: string) {
    super(`No task found for ${lookupType}: ${value}`, 'TASK_NOT_FOUND', { lookupType, value })
    this.name = 'TaskNotFoundError'
    this.lookupType = lookupType
    this.value = value
  }
}

/** Error thrown when a process definition cannot be found */
export class ProcessNotFoundError extends StepwardenError {
  constructor(name: string, searched: string[] = []) {
    super(`Process not found: ${name}`, 'PROCESS_NOT_FOUND', { name, searched })
    this.name = 'ProcessNotFoundError'
  }
}

/** Error thrown when git operations fail */
export class GitError extends StepwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'GIT_ERROR', context)
    this.name = 'GitError'
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends StepwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a persisted run cannot be resumed or continued */
export class RecoveryError extends StepwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'RECOVERY_ERROR', context)
    this.name = 'RecoveryError'
  }
}

/** Error thrown when a config file uses an incompatible format version */
export class ConfigIncompatibleFormatError extends StepwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_INCOMPATIBLE_FORMAT', context)
    this.name = 'ConfigIncompatibleFormatError'
  }
}

/** Error thrown when the result summarizer fails or times out */
export class SummarizerError extends StepwardenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'SUMMARIZER_ERROR', context)
    this.name = 'SummarizerError'
  }
}
