/**
 * Machine-readable failure category of an executor error.
 */
export type ExecutorErrorCode =
  | 'validation_failed'
  | 'command_timeout'
  | 'unknown_orchestration'
  | 'duplicate_orchestration'

/**
 * Base class for errors raised by the executor itself.
 */
export class ExecutorError extends Error {
  public readonly code: ExecutorErrorCode
  public readonly context?: Readonly<Record<string, unknown>>

  public constructor(
    code: ExecutorErrorCode,
    message: string,
    context?: Readonly<Record<string, unknown>>
  ) {
    super(message)
    this.name = 'ExecutorError'
    this.code = code
    this.context = context
  }
}

/**
 * Raised when a step is requested in a context that cannot serve it.
 */
export class ValidationError extends ExecutorError {
  public constructor(message: string, context?: Readonly<Record<string, unknown>>) {
    super('validation_failed', message, context)
    this.name = 'ValidationError'
  }
}

/**
 * Raised when a captured command exceeds its timeout and is terminated.
 */
export class CommandTimeoutError extends ExecutorError {
  public readonly command: string
  public readonly timeoutMs: number

  public constructor(command: string, timeoutMs: number) {
    super('command_timeout', `Command timed out after ${timeoutMs}ms: ${command}`, {
      command,
      timeoutMs,
    })
    this.name = 'CommandTimeoutError'
    this.command = command
    this.timeoutMs = timeoutMs
  }
}
