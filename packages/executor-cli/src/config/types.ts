import type { Orchestration } from '@chainexec/executor-core'

/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Command step running a console subcommand or an external command.
 */
export interface CommandStepConfig {
  /** `console` prepends the console prefix; `external` runs the command verbatim. */
  readonly type: 'console' | 'external'
  /** Command line split on single spaces. */
  readonly command: string
  /** Attaches the command to the terminal when true. */
  readonly interactive?: boolean
  /** Timeout in milliseconds; null disables it. */
  readonly timeoutMs?: number | null
}

/**
 * HTTP GET step.
 */
export interface PingStepConfig {
  readonly type: 'ping'
  /** Absolute request URL. */
  readonly url: string
  /** Request headers. */
  readonly headers?: Readonly<Record<string, string>>
}

/**
 * Desktop notification step.
 */
export interface NotificationStepConfig {
  readonly type: 'notification'
  /** Notification headline. */
  readonly title: string
  /** Notification text. */
  readonly body: string
}

/**
 * Declarative step loaded from config.
 */
export type StepConfig = CommandStepConfig | PingStepConfig | NotificationStepConfig

/**
 * User-facing orchestration definition loaded from config.
 *
 * Exactly one of `steps` and `run` is set; `run` is only available in
 * TypeScript config files.
 */
export interface OrchestrationConfig {
  /** Stable orchestration id used by `--run`. */
  readonly id: string
  /** Display name shown in output. */
  readonly name: string
  /** Optional short details for listings. */
  readonly description?: string
  /** Sends a completion notification after the run when true. */
  readonly notify?: boolean
  /** Ordered declarative steps. */
  readonly steps?: readonly StepConfig[]
  /** Step sequence written as code. */
  readonly run?: Orchestration
}

/**
 * Top-level CLI config model.
 */
export interface ChainexecConfig {
  /** Application root, relative to the CLI working directory. */
  readonly basePath?: string
  /** Interpreter and entry point prepended to console steps. */
  readonly consolePrefix?: readonly [string, string]
  /** Available orchestrations. */
  readonly orchestrations: readonly OrchestrationConfig[]
}
