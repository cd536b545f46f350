/**
 * Final data of one orchestration run.
 */
export interface OrchestrationRunResult {
  /** Orchestration id. */
  readonly id: string
  /** Orchestration display name. */
  readonly name: string
  /** Executor output buffer after the last step. */
  readonly output: string
  /** Total runtime in milliseconds. */
  readonly durationMs: number
}

/**
 * Formats orchestration result data as JSON output.
 *
 * @param result Orchestration run result.
 * @param indentation Number of spaces used for indentation.
 * @returns JSON representation.
 */
export const formatOrchestrationResultAsJson = (
  result: OrchestrationRunResult,
  indentation = 2
): string => {
  return JSON.stringify(result, null, indentation)
}
