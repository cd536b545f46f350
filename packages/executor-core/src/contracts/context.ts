/**
 * Host environment facts the executor consults before and while running steps.
 */
export interface ExecutionContext {
  /** True when a human-attended terminal is available. */
  readonly runningInConsole: boolean
  /** True while an automated test suite drives the executor. */
  readonly runningUnitTests: boolean
  /** Application root used as working directory for captured commands. */
  readonly basePath: string
}

/**
 * Reports whether step output should be echoed to the terminal.
 *
 * @param context Execution context.
 * @returns True in an interactive console outside automated tests.
 */
export const shouldEcho = (context: ExecutionContext): boolean => {
  return context.runningInConsole && !context.runningUnitTests
}
