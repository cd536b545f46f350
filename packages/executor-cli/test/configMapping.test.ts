import {
  createExecutor,
  type CapturedCommandRequest,
  type DesktopNotification,
  type Executor,
} from '@chainexec/executor-core'
import { pino } from 'pino'
import { describe, expect, it } from 'vitest'

import { mapConfigToOrchestrations } from '../src/config/mapConfigToOrchestrations.js'
import type { ChainexecConfig } from '../src/config/types.js'

interface Recorder {
  readonly commands: CapturedCommandRequest[]
  readonly interactive: string[]
  readonly pings: string[]
  readonly notifications: DesktopNotification[]
}

const createRecordingExecutor = (recorder: Recorder): Executor => {
  return createExecutor({
    context: { runningInConsole: true, runningUnitTests: true, basePath: '/srv/app' },
    consolePrefix: ['node', 'ace'],
    commandRunner: {
      runCaptured: async (request) => {
        recorder.commands.push(request)
        return {
          successful: true,
          timedOut: false,
          durationMs: 0,
          exitCode: 0,
          signal: null,
          stdout: `${request.argv.join(' ')}\n`,
          stderr: '',
        }
      },
      runInteractive: async (request) => {
        recorder.interactive.push(request.command)
        return { successful: true, exitCode: 0, signal: null }
      },
    },
    httpClient: {
      get: async (url): Promise<void> => {
        recorder.pings.push(url)
      },
    },
    notifier: {
      notify: (notification): void => {
        recorder.notifications.push(notification)
      },
    },
    logger: pino({ level: 'silent' }),
  })
}

describe('mapConfigToOrchestrations', () => {
  it('runs declarative steps in order', async () => {
    const config: ChainexecConfig = {
      orchestrations: [
        {
          id: 'deploy',
          name: 'Deploy',
          description: 'Ship it',
          notify: true,
          steps: [
            { type: 'external', command: 'git pull', timeoutMs: null },
            { type: 'console', command: 'migrate --force' },
            { type: 'console', command: 'tinker', interactive: true },
            { type: 'ping', url: 'https://hooks.example.test/deployed' },
            { type: 'notification', title: 'Deploy', body: 'Finished' },
          ],
        },
      ],
    }
    const recorder: Recorder = { commands: [], interactive: [], pings: [], notifications: [] }
    const executor = createRecordingExecutor(recorder)

    const [definition] = mapConfigToOrchestrations(config)
    expect(definition).toMatchObject({
      id: 'deploy',
      name: 'Deploy',
      description: 'Ship it',
      notify: true,
    })

    await executor.run(definition?.run ?? (() => undefined))

    expect(recorder.commands.map((request) => request.argv.join(' '))).toEqual([
      'git pull',
      'node ace migrate --force',
    ])
    expect(recorder.commands.map((request) => request.timeoutMs)).toEqual([null, 60_000])
    expect(recorder.interactive).toEqual(['node ace tinker'])
    expect(recorder.pings).toEqual(['https://hooks.example.test/deployed'])
    expect(recorder.notifications).toEqual([{ title: 'Deploy', body: 'Finished' }])
    expect(executor.getOutput()).toBe(
      'git pull\nnode ace migrate --force\n Interactive command completed'
    )
  })

  it('keeps run functions from TypeScript config', async () => {
    const config: ChainexecConfig = {
      orchestrations: [
        {
          id: 'greet',
          name: 'Greet',
          run: async (executor) => {
            await executor.runClosure(() => 'hello')
          },
        },
      ],
    }
    const recorder: Recorder = { commands: [], interactive: [], pings: [], notifications: [] }
    const executor = createRecordingExecutor(recorder)

    const [definition] = mapConfigToOrchestrations(config)
    await executor.run(definition?.run ?? (() => undefined))

    expect(executor.getOutput()).toBe('hello')
    expect(recorder.commands).toHaveLength(0)
  })
})
