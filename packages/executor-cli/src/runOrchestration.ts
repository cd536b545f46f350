import { resolve } from 'node:path'

import {
  createExecutor,
  ExecutorError,
  formatOrchestrationResultAsJson,
  OrchestrationRegistry,
  type ExecutionContext,
  type ExecutorOptions,
  type OrchestrationRunResult,
} from '@chainexec/executor-core'

import { loadChainexecConfig } from './config/loadConfig.js'
import { mapConfigToOrchestrations } from './config/mapConfigToOrchestrations.js'
import type { CliOutputFormat } from './config/types.js'
import { PrettyReporter } from './reporters/prettyReporter.js'

/**
 * Runtime options for a CLI execution.
 */
export interface RunCliOrchestrationOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Optional explicit config path. */
  readonly configPath?: string
  /** Orchestration id to run. */
  readonly run?: string
  /** Prints configured orchestrations and exits when true. */
  readonly list: boolean
  /** Output format selection. */
  readonly format: CliOutputFormat
  /** Forces a completion notification when true. */
  readonly notify: boolean
}

/**
 * Collaborator overrides passed through to the executor.
 */
export type CliExecutorOverrides = Partial<
  Pick<ExecutorOptions, 'commandRunner' | 'notifier' | 'httpClient' | 'logger' | 'write'>
>

/**
 * Derives the execution context for a CLI process.
 *
 * @param basePath Application root.
 * @param env Process environment.
 * @returns Console execution context.
 */
export const createCliExecutionContext = (
  basePath: string,
  env: NodeJS.ProcessEnv
): ExecutionContext => {
  return {
    runningInConsole: true,
    runningUnitTests: env.NODE_ENV === 'test' || env.VITEST !== undefined,
    basePath,
  }
}

/**
 * Renders an error for the CLI's stderr line, with the code of executor errors.
 *
 * @param error Thrown value.
 * @returns One-line description.
 */
export const formatCliError = (error: unknown): string => {
  if (error instanceof ExecutorError) {
    return `${error.name} [${error.code}]: ${error.message}`
  }

  return error instanceof Error ? `${error.name}: ${error.message}` : String(error)
}

/**
 * Runs one configured orchestration according to CLI options.
 *
 * @param options CLI runtime options.
 * @param overrides Executor collaborator overrides.
 * @returns Final exit code.
 */
export const runCliOrchestration = async (
  options: RunCliOrchestrationOptions,
  overrides: CliExecutorOverrides = {}
): Promise<number> => {
  const loadedConfig = await loadChainexecConfig(options.cwd, options.configPath)
  const registry = new OrchestrationRegistry(mapConfigToOrchestrations(loadedConfig.config))
  const reporter = new PrettyReporter()

  if (options.list) {
    printOrchestrations(registry, options.format, reporter)
    return 0
  }

  const definition = registry.require(options.run ?? '')

  const basePath = loadedConfig.config.basePath
    ? resolve(options.cwd, loadedConfig.config.basePath)
    : options.cwd

  const executor = createExecutor({
    context: createCliExecutionContext(basePath, process.env),
    consolePrefix: loadedConfig.config.consolePrefix,
    name: definition.name,
    write:
      options.format === 'json'
        ? (chunk: string): void => {
            process.stderr.write(chunk)
          }
        : undefined,
    ...overrides,
  })

  if (options.format === 'pretty') {
    reporter.onRunStart(definition)
  }

  const startedAt = Date.now()
  await registry.run(definition.id, executor)
  if (options.notify && !definition.notify) {
    await executor.simpleDesktopNotification()
  }

  const result: OrchestrationRunResult = {
    id: definition.id,
    name: definition.name,
    output: executor.getOutput(),
    durationMs: Date.now() - startedAt,
  }

  if (options.format === 'json') {
    process.stdout.write(`${formatOrchestrationResultAsJson(result)}\n`)
  } else {
    reporter.onRunComplete(result)
  }

  return 0
}

const printOrchestrations = (
  registry: OrchestrationRegistry,
  format: CliOutputFormat,
  reporter: PrettyReporter
): void => {
  if (format === 'json') {
    const payload = {
      orchestrations: registry.list().map((definition) => ({
        id: definition.id,
        name: definition.name,
        description: definition.description,
      })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  reporter.printList(registry.list())
}
