export type { DesktopNotification, DesktopNotifier, HttpClient } from './contracts/collaborators.js'
export type {
  CapturedCommandRequest,
  CapturedCommandResult,
  CommandOutputListener,
  CommandRunner,
  InteractiveCommandRequest,
  InteractiveCommandResult,
} from './contracts/command.js'
export type { ExecutionContext } from './contracts/context.js'
export type { Orchestration, OrchestrationDefinition } from './contracts/orchestration.js'
export type { ExecutorErrorCode } from './errors.js'
export type { CommandStepOptions, ExecutorOptions } from './executor/executor.js'
export type { Logger } from './logging/logger.js'
export type { AxiosHttpClientOptions } from './collaborators/axiosHttpClient.js'
export type { OrchestrationRunResult } from './reporters/jsonFormatter.js'

export { createAxiosHttpClient } from './collaborators/axiosHttpClient.js'
export { createNodeDesktopNotifier } from './collaborators/nodeDesktopNotifier.js'
export { shouldEcho } from './contracts/context.js'
export { CommandTimeoutError, ExecutorError, ValidationError } from './errors.js'
export { escapeShellCommand, splitCommandLine } from './execution/commandLine.js'
export { createNodeCommandRunner } from './execution/nodeCommandRunner.js'
export {
  createExecutor,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONSOLE_PREFIX,
  Executor,
  INTERACTIVE_COMPLETED_MARKER,
  INTERACTIVE_FAILED_MARKER,
} from './executor/executor.js'
export { validateCommand } from './executor/validateCommand.js'
export { createLogger, logger } from './logging/logger.js'
export { OrchestrationRegistry } from './registry/orchestrationRegistry.js'
export { formatOrchestrationResultAsJson } from './reporters/jsonFormatter.js'
