import type {
  Executor,
  Orchestration,
  OrchestrationDefinition,
} from '@chainexec/executor-core'

import type { ChainexecConfig, OrchestrationConfig, StepConfig } from './types.js'

/**
 * Maps loaded config to registrable orchestration definitions.
 *
 * @param config Parsed CLI config.
 * @returns Orchestration definitions in config order.
 */
export const mapConfigToOrchestrations = (
  config: ChainexecConfig
): readonly OrchestrationDefinition[] => {
  return config.orchestrations.map((orchestration) => ({
    id: orchestration.id,
    name: orchestration.name,
    description: orchestration.description,
    notify: orchestration.notify,
    run: resolveOrchestration(orchestration),
  }))
}

const resolveOrchestration = (orchestration: OrchestrationConfig): Orchestration => {
  if (orchestration.run) {
    return orchestration.run
  }

  const steps = orchestration.steps ?? []

  return async (executor: Executor): Promise<void> => {
    for (const step of steps) {
      await runStep(executor, step)
    }
  }
}

const runStep = async (executor: Executor, step: StepConfig): Promise<void> => {
  switch (step.type) {
    case 'console':
      await executor.runConsole(step.command, {
        interactive: step.interactive,
        timeoutMs: step.timeoutMs,
      })
      return
    case 'external':
      await executor.runExternal(step.command, {
        interactive: step.interactive,
        timeoutMs: step.timeoutMs,
      })
      return
    case 'ping':
      await executor.ping(step.url, step.headers)
      return
    case 'notification':
      await executor.desktopNotification(step.title, step.body)
      return
  }
}
