export type { CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  ChainexecConfig,
  CliOutputFormat,
  CommandStepConfig,
  NotificationStepConfig,
  OrchestrationConfig,
  PingStepConfig,
  StepConfig,
} from './config/types.js'
export { loadChainexecConfig } from './config/loadConfig.js'
export { mapConfigToOrchestrations } from './config/mapConfigToOrchestrations.js'

export type { CliExecutorOverrides, RunCliOrchestrationOptions } from './runOrchestration.js'
export { createCliExecutionContext, formatCliError, runCliOrchestration } from './runOrchestration.js'
