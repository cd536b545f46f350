import {
  createExecutor,
  type DesktopNotifier,
  type Executor,
  type HttpClient,
  type Orchestration,
} from '@chainexec/executor-core'

/**
 * Runtime options for the smoke orchestration.
 */
export interface SmokeOrchestrationOptions {
  /** Absolute path to the smoke project root. */
  readonly cwd: string
  /** Pings this URL after the command steps when set. */
  readonly statusUrl?: string
  /** Adds a step that exceeds its timeout when true. */
  readonly includeTimeoutDemo?: boolean
  /** Suppresses live echo when true. */
  readonly runningUnitTests?: boolean
  /** HTTP collaborator override. */
  readonly httpClient?: HttpClient
  /** Notification collaborator override. */
  readonly notifier?: DesktopNotifier
  /** Shows the completion notification when true. */
  readonly notify?: boolean
}

/**
 * Creates the smoke step sequence against local stub scripts.
 *
 * @param options Runtime options.
 * @returns Orchestration function.
 */
export const createSmokeOrchestration = (options: SmokeOrchestrationOptions): Orchestration => {
  const node = process.execPath

  return async (executor: Executor): Promise<void> => {
    await executor.runConsole('cache:clear')
    await executor.runExternal(`${node} stubs/build-step.cjs`)
    await executor.runExternal(`${node} stubs/lint-fail-step.cjs`)
    await executor.runClosure(() => 'closure step\n')

    if (options.statusUrl) {
      await executor.ping(options.statusUrl, { 'X-Smoke': 'true' })
    }

    if (options.includeTimeoutDemo) {
      await executor.runExternal(`${node} stubs/slow-step.cjs 5000`, { timeoutMs: 100 })
    }

    if (options.notify) {
      await executor.simpleDesktopNotification()
    }
  }
}

/**
 * Runs the smoke orchestration with the Node command runner.
 *
 * @param options Runtime options.
 * @returns Executor holding the accumulated output.
 */
export const runSmokeOrchestration = async (
  options: SmokeOrchestrationOptions
): Promise<Executor> => {
  const executor = createExecutor({
    context: {
      runningInConsole: true,
      runningUnitTests: options.runningUnitTests ?? false,
      basePath: options.cwd,
    },
    consolePrefix: [process.execPath, 'stubs/console.cjs'],
    name: 'Smoke',
    httpClient: options.httpClient,
    notifier: options.notifier,
  })

  return await executor.run(createSmokeOrchestration(options))
}
