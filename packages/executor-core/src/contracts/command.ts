/**
 * Receives output chunks while a captured command runs.
 */
export type CommandOutputListener = (chunk: string, stream: 'stdout' | 'stderr') => void

/**
 * Input contract for a command whose output is captured.
 */
export interface CapturedCommandRequest {
  /** Executable followed by its arguments. */
  readonly argv: readonly string[]
  /** Working directory used for this process. */
  readonly cwd: string
  /** Timeout in milliseconds, or null to wait indefinitely. */
  readonly timeoutMs: number | null
  /** Optional listener for streamed output. */
  readonly onOutput?: CommandOutputListener
}

/**
 * Output contract from one captured command.
 */
export interface CapturedCommandResult {
  /** True when the process exited with status 0. */
  readonly successful: boolean
  /** True when the process was terminated by the timeout. */
  readonly timedOut: boolean
  /** Total command duration in milliseconds. */
  readonly durationMs: number
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * Input contract for a command attached to the caller's terminal.
 */
export interface InteractiveCommandRequest {
  /** Command line passed to the shell after escaping. */
  readonly command: string
}

/**
 * Output contract from one interactive command.
 */
export interface InteractiveCommandResult {
  /** True when the process exited with status 0. */
  readonly successful: boolean
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
}

/**
 * Process execution capability used by the executor.
 */
export interface CommandRunner {
  /**
   * Runs a command with piped output.
   *
   * @param request Execution input data.
   * @returns Captured result; never rejects for process failures.
   */
  runCaptured(request: CapturedCommandRequest): Promise<CapturedCommandResult>

  /**
   * Runs a command through the shell with inherited stdio.
   *
   * @param request Execution input data.
   * @returns Exit information.
   */
  runInteractive(request: InteractiveCommandRequest): Promise<InteractiveCommandResult>
}
