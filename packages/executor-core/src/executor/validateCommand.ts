import type { ExecutionContext } from '../contracts/context.js'
import { ValidationError } from '../errors.js'

/**
 * Checks that a command may run in the current context.
 *
 * Interactive commands need a terminal, so they are rejected anywhere else
 * (for example inside an HTTP request handler).
 *
 * @param command Command line about to run.
 * @param interactive Whether terminal pass-through was requested.
 * @param context Execution context.
 * @returns True when the command may run.
 * @throws ValidationError when an interactive command is requested outside the console.
 */
export const validateCommand = (
  command: string,
  interactive: boolean,
  context: ExecutionContext
): boolean => {
  if (interactive && !context.runningInConsole) {
    throw new ValidationError('Interactive commands can only be run in the console.', { command })
  }

  return true
}
