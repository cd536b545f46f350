import type { OrchestrationDefinition, OrchestrationRunResult } from '@chainexec/executor-core'

/**
 * Console reporter for human-readable runs.
 */
export class PrettyReporter {
  /**
   * Handles orchestration start.
   *
   * @param definition Orchestration about to run.
   */
  public onRunStart(definition: OrchestrationDefinition): void {
    process.stdout.write(colorize(`chainexec: running ${definition.name}\n`, 'blue'))
  }

  /**
   * Handles orchestration completion.
   *
   * @param result Run result.
   */
  public onRunComplete(result: OrchestrationRunResult): void {
    if (result.output && !result.output.endsWith('\n')) {
      process.stdout.write('\n')
    }
    process.stdout.write(colorize(`Completed ${result.name} in ${result.durationMs}ms\n`, 'green'))
  }

  /**
   * Prints the configured orchestrations.
   *
   * @param definitions Registered orchestrations.
   */
  public printList(definitions: readonly OrchestrationDefinition[]): void {
    if (definitions.length === 0) {
      process.stdout.write('No orchestrations configured.\n')
      return
    }

    process.stdout.write('Configured orchestrations:\n')
    for (const definition of definitions) {
      const suffix = definition.description ? ` - ${definition.description}` : ''
      process.stdout.write(`- ${definition.id}: ${definition.name}${suffix}\n`)
    }
  }
}

const colorize = (text: string, color: 'green' | 'blue'): string => {
  const colors: Record<'green' | 'blue', string> = {
    green: '\x1b[32m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
