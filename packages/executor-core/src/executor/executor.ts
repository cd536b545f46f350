import { createAxiosHttpClient } from '../collaborators/axiosHttpClient.js'
import { createNodeDesktopNotifier } from '../collaborators/nodeDesktopNotifier.js'
import type { DesktopNotifier, HttpClient } from '../contracts/collaborators.js'
import type { CommandRunner } from '../contracts/command.js'
import { shouldEcho, type ExecutionContext } from '../contracts/context.js'
import type { Orchestration } from '../contracts/orchestration.js'
import { CommandTimeoutError } from '../errors.js'
import { splitCommandLine } from '../execution/commandLine.js'
import { createNodeCommandRunner } from '../execution/nodeCommandRunner.js'
import { logger as defaultLogger, type Logger } from '../logging/logger.js'
import { validateCommand } from './validateCommand.js'

/**
 * Default timeout for captured commands in milliseconds.
 */
export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000

/**
 * Default interpreter and entry point prepended by `runConsole`.
 */
export const DEFAULT_CONSOLE_PREFIX: readonly [string, string] = ['node', 'console']

/**
 * Marker appended after an interactive command exits with status 0.
 */
export const INTERACTIVE_COMPLETED_MARKER = ' Interactive command completed'

/**
 * Marker appended after an interactive command exits with any other status.
 */
export const INTERACTIVE_FAILED_MARKER = ' Interactive command failed'

/**
 * Options for one command step.
 */
export interface CommandStepOptions {
  /** Attaches the command to the terminal instead of capturing output. */
  readonly interactive?: boolean
  /** Timeout in milliseconds for captured commands; null disables it. */
  readonly timeoutMs?: number | null
}

/**
 * Construction options for an executor.
 */
export interface ExecutorOptions {
  /** Host environment facts. */
  readonly context: ExecutionContext
  /** Notification capability; defaults to node-notifier. */
  readonly notifier?: DesktopNotifier
  /** HTTP capability; defaults to axios. */
  readonly httpClient?: HttpClient
  /** Process capability; defaults to `node:child_process`. */
  readonly commandRunner?: CommandRunner
  /** Interpreter and entry point prepended by `runConsole`. */
  readonly consolePrefix?: readonly [string, string]
  /** Label used by the simple completion notification. */
  readonly name?: string
  /** Diagnostics logger. */
  readonly logger?: Logger
  /** Sink for echoed output; defaults to process stdout. */
  readonly write?: (chunk: string) => void
}

/**
 * Sequential step engine with an append-only output buffer.
 *
 * Every step resolves to the same instance, so steps chain either through
 * consecutive `await`s or through `.then`.
 */
export class Executor {
  private output = ''
  private readonly context: ExecutionContext
  private readonly notifier: DesktopNotifier
  private readonly httpClient: HttpClient
  private readonly commandRunner: CommandRunner
  private readonly consolePrefix: readonly [string, string]
  private readonly name: string
  private readonly logger: Logger
  private readonly write: (chunk: string) => void

  /**
   * Creates an executor.
   *
   * @param options Construction options.
   */
  public constructor(options: ExecutorOptions) {
    this.context = options.context
    this.logger = options.logger ?? defaultLogger
    this.notifier = options.notifier ?? createNodeDesktopNotifier(this.logger)
    this.httpClient = options.httpClient ?? createAxiosHttpClient()
    this.commandRunner = options.commandRunner ?? createNodeCommandRunner()
    this.consolePrefix = options.consolePrefix ?? DEFAULT_CONSOLE_PREFIX
    this.name = options.name ?? 'Executor'
    this.write =
      options.write ??
      ((chunk: string): void => {
        process.stdout.write(chunk)
      })
  }

  /**
   * Runs a subcommand of the host console application.
   *
   * @param command Subcommand and arguments, without the console prefix.
   * @param options Step options.
   * @returns This executor.
   * @throws ValidationError when an interactive command is requested outside the console.
   * @throws CommandTimeoutError when a captured command exceeds its timeout.
   */
  public async runConsole(command: string, options: CommandStepOptions = {}): Promise<this> {
    const interactive = options.interactive ?? false
    validateCommand(command, interactive, this.context)

    await this.runCommand(`${this.consolePrefix.join(' ')} ${command}`, options)

    return this
  }

  /**
   * Runs a command line verbatim.
   *
   * @param command Executable and arguments separated by single spaces.
   * @param options Step options.
   * @returns This executor.
   * @throws ValidationError when an interactive command is requested outside the console.
   * @throws CommandTimeoutError when a captured command exceeds its timeout.
   */
  public async runExternal(command: string, options: CommandStepOptions = {}): Promise<this> {
    const interactive = options.interactive ?? false
    validateCommand(command, interactive, this.context)

    await this.runCommand(command, options)

    return this
  }

  /**
   * Runs an in-process function and appends its return value.
   *
   * Errors thrown by `closure` propagate unchanged.
   *
   * @param closure Function producing step output.
   * @returns This executor.
   */
  public async runClosure(closure: () => string | Promise<string>): Promise<this> {
    const output = await closure()

    this.echo(output)
    this.appendOutput(output)

    return this
  }

  /**
   * Issues a GET request; the response never reaches the output buffer.
   *
   * @param url Absolute request URL.
   * @param headers Request headers.
   * @returns This executor.
   */
  public async ping(url: string, headers: Readonly<Record<string, string>> = {}): Promise<this> {
    this.logger.debug({ url }, 'ping')
    await this.httpClient.get(url, headers)

    return this
  }

  /**
   * Shows a desktop notification without waiting for it.
   *
   * @param title Notification headline.
   * @param body Notification text.
   * @returns This executor.
   */
  public async desktopNotification(title: string, body: string): Promise<this> {
    this.notifier.notify({ title, body })

    return this
  }

  /**
   * Shows the standard completion notification for this executor.
   *
   * @returns This executor.
   */
  public async simpleDesktopNotification(): Promise<this> {
    return await this.desktopNotification('Executor complete!', `${this.name} has been run.`)
  }

  /**
   * Runs an orchestration against this executor.
   *
   * @param orchestration Step sequence.
   * @returns This executor.
   */
  public async run(orchestration: Orchestration): Promise<this> {
    await orchestration(this)

    return this
  }

  /**
   * Returns the output accumulated since construction or the last reset.
   *
   * @returns Output buffer.
   */
  public getOutput(): string {
    return this.output
  }

  /**
   * Clears the output buffer.
   *
   * @returns This executor.
   */
  public resetOutput(): this {
    this.output = ''

    return this
  }

  private async runCommand(command: string, options: CommandStepOptions): Promise<void> {
    if (options.interactive) {
      await this.runInteractiveCommand(command)
      return
    }

    const timeoutMs =
      options.timeoutMs === undefined ? DEFAULT_COMMAND_TIMEOUT_MS : options.timeoutMs

    this.logger.debug({ command, timeoutMs }, 'running command')
    const result = await this.commandRunner.runCaptured({
      argv: splitCommandLine(command),
      cwd: this.context.basePath,
      timeoutMs,
      onOutput: (chunk: string): void => {
        this.echo(chunk)
      },
    })

    if (result.timedOut && timeoutMs !== null) {
      this.logger.warn({ command, timeoutMs }, 'command timed out')
      throw new CommandTimeoutError(command, timeoutMs)
    }

    this.logger.debug(
      { command, exitCode: result.exitCode, durationMs: result.durationMs },
      'command finished'
    )
    this.appendOutput(result.successful ? result.stdout : result.stderr)
  }

  private async runInteractiveCommand(command: string): Promise<void> {
    this.logger.debug({ command }, 'running interactive command')
    const result = await this.commandRunner.runInteractive({ command })

    this.appendOutput(result.successful ? INTERACTIVE_COMPLETED_MARKER : INTERACTIVE_FAILED_MARKER)
  }

  private echo(chunk: string): void {
    if (shouldEcho(this.context)) {
      this.write(chunk)
    }
  }

  private appendOutput(text: string): void {
    this.output = `${this.output}${text}`
  }
}

/**
 * Creates an executor instance.
 *
 * @param options Construction options.
 * @returns Executor.
 */
export const createExecutor = (options: ExecutorOptions): Executor => {
  return new Executor(options)
}
