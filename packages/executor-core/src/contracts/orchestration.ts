import type { Executor } from '../executor/executor.js'

/**
 * Ordered sequence of steps issued against one executor.
 */
export type Orchestration = (executor: Executor) => Promise<void> | void

/**
 * Named orchestration that can be registered and invoked by id.
 */
export interface OrchestrationDefinition {
  /** Stable machine identifier. */
  readonly id: string
  /** Human readable label. */
  readonly name: string
  /** Optional short details for listings. */
  readonly description?: string
  /** Sends a completion notification after a successful run when true. */
  readonly notify?: boolean
  /** Step sequence. */
  readonly run: Orchestration
}
