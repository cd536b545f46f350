import { spawn, type ChildProcess } from 'node:child_process'

import type {
  CapturedCommandRequest,
  CapturedCommandResult,
  CommandRunner,
  InteractiveCommandRequest,
  InteractiveCommandResult,
} from '../contracts/command.js'
import { escapeShellCommand } from './commandLine.js'

/**
 * Delay between SIGTERM and SIGKILL for a captured command past its timeout.
 */
const KILL_GRACE_PERIOD_MS = 2_000

/**
 * Creates a command runner backed by `node:child_process`.
 *
 * @returns Command runner implementation.
 */
export const createNodeCommandRunner = (): CommandRunner => {
  return {
    runCaptured,
    runInteractive,
  }
}

const runCaptured = async (request: CapturedCommandRequest): Promise<CapturedCommandResult> => {
  const startedAt = Date.now()
  const [file = '', ...args] = request.argv

  return await new Promise<CapturedCommandResult>((resolve) => {
    let child: ChildProcess
    try {
      child = spawn(file, args, {
        cwd: request.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      })
    } catch (spawnError: unknown) {
      resolve(createSpawnFailure(spawnError, Date.now() - startedAt))
      return
    }

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let error: unknown
    let settled = false
    let killHandle: NodeJS.Timeout | null = null

    const timeoutHandle =
      typeof request.timeoutMs === 'number' && request.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true
            child.kill('SIGTERM')
            killHandle = setTimeout(() => {
              child.kill('SIGKILL')
            }, KILL_GRACE_PERIOD_MS)
          }, request.timeoutMs)
        : null

    const settle = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) {
        return
      }

      settled = true
      if (timeoutHandle) {
        clearTimeout(timeoutHandle)
      }
      if (killHandle) {
        clearTimeout(killHandle)
      }

      resolve({
        successful: !timedOut && exitCode === 0 && error === undefined,
        timedOut,
        durationMs: Date.now() - startedAt,
        exitCode,
        signal,
        stdout,
        stderr,
        error,
      })
    }

    // Multibyte characters may straddle chunk boundaries.
    child.stdout?.setEncoding('utf8')
    child.stderr?.setEncoding('utf8')

    child.stdout?.on('data', (text: string) => {
      stdout += text
      request.onOutput?.(text, 'stdout')
    })

    child.stderr?.on('data', (text: string) => {
      stderr += text
      request.onOutput?.(text, 'stderr')
    })

    child.on('error', (spawnError: Error) => {
      error = spawnError
      if (child.pid === undefined) {
        stderr += `${spawnError.message}\n`
        settle(null, null)
      }
    })

    child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      settle(exitCode, signal)
    })
  })
}

const runInteractive = async (
  request: InteractiveCommandRequest
): Promise<InteractiveCommandResult> => {
  return await new Promise<InteractiveCommandResult>((resolve) => {
    let settled = false

    const settle = (exitCode: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) {
        return
      }

      settled = true
      resolve({
        successful: exitCode === 0,
        exitCode,
        signal,
      })
    }

    const child = spawn(escapeShellCommand(request.command), {
      shell: true,
      stdio: 'inherit',
    })

    child.on('error', () => {
      if (child.pid === undefined) {
        settle(null, null)
      }
    })

    child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      settle(exitCode, signal)
    })
  })
}

const createSpawnFailure = (spawnError: unknown, durationMs: number): CapturedCommandResult => {
  const message = spawnError instanceof Error ? spawnError.message : String(spawnError)

  return {
    successful: false,
    timedOut: false,
    durationMs,
    exitCode: null,
    signal: null,
    stdout: '',
    stderr: `${message}\n`,
    error: spawnError,
  }
}
