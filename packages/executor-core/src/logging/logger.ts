import { destination, pino, type Logger } from 'pino'

export type { Logger } from 'pino'

/**
 * Creates a diagnostics logger writing to stderr.
 *
 * Level comes from `CHAINEXEC_LOG_LEVEL` and defaults to `warn`.
 *
 * @param name Logger name attached to every line.
 * @returns Pino logger.
 */
export const createLogger = (name: string): Logger => {
  return pino(
    {
      name,
      level: process.env.CHAINEXEC_LOG_LEVEL ?? 'warn',
    },
    destination(2)
  )
}

/** Shared logger for executors built without one. */
export const logger = createLogger('chainexec')
