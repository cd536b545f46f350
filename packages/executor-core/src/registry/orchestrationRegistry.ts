import type { OrchestrationDefinition } from '../contracts/orchestration.js'
import { ExecutorError } from '../errors.js'
import type { Executor } from '../executor/executor.js'

/**
 * Id-addressed collection of orchestrations, kept in registration order.
 */
export class OrchestrationRegistry {
  private readonly definitions = new Map<string, OrchestrationDefinition>()

  /**
   * Creates a registry.
   *
   * @param definitions Initial orchestrations.
   * @throws ExecutorError when two definitions share an id.
   */
  public constructor(definitions: readonly OrchestrationDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition)
    }
  }

  /**
   * Adds an orchestration.
   *
   * @param definition Orchestration definition.
   * @returns This registry.
   * @throws ExecutorError when the id is already registered.
   */
  public register(definition: OrchestrationDefinition): this {
    if (this.definitions.has(definition.id)) {
      throw new ExecutorError(
        'duplicate_orchestration',
        `Orchestration already registered: ${definition.id}`,
        { id: definition.id }
      )
    }

    this.definitions.set(definition.id, definition)
    return this
  }

  public has(id: string): boolean {
    return this.definitions.has(id)
  }

  public get(id: string): OrchestrationDefinition | undefined {
    return this.definitions.get(id)
  }

  public list(): readonly OrchestrationDefinition[] {
    return [...this.definitions.values()]
  }

  /**
   * Looks up an orchestration that must exist.
   *
   * @param id Orchestration id.
   * @returns Orchestration definition.
   * @throws ExecutorError when the id is unknown.
   */
  public require(id: string): OrchestrationDefinition {
    const definition = this.definitions.get(id)
    if (!definition) {
      throw new ExecutorError('unknown_orchestration', `Unknown orchestration: ${id}`, { id })
    }

    return definition
  }

  /**
   * Runs a registered orchestration against an executor.
   *
   * @param id Orchestration id.
   * @param executor Executor receiving the steps.
   * @returns The executor after the last step.
   * @throws ExecutorError when the id is unknown.
   */
  public async run(id: string, executor: Executor): Promise<Executor> {
    const definition = this.require(id)

    await executor.run(definition.run)

    if (definition.notify) {
      await executor.simpleDesktopNotification()
    }

    return executor
  }
}
