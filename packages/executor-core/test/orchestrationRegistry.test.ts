import { pino } from 'pino'
import { describe, expect, it } from 'vitest'

import type { DesktopNotification, Executor } from '../src/index.js'
import { createExecutor, ExecutorError, OrchestrationRegistry } from '../src/index.js'

const createTestExecutor = (sent: DesktopNotification[] = []): Executor => {
  return createExecutor({
    context: { runningInConsole: true, runningUnitTests: true, basePath: '/srv/app' },
    commandRunner: {
      runCaptured: async () => ({
        successful: true,
        timedOut: false,
        durationMs: 0,
        exitCode: 0,
        signal: null,
        stdout: 'cmd\n',
        stderr: '',
      }),
      runInteractive: async () => ({ successful: true, exitCode: 0, signal: null }),
    },
    notifier: {
      notify: (notification): void => {
        sent.push(notification)
      },
    },
    httpClient: { get: async (): Promise<void> => undefined },
    logger: pino({ level: 'silent' }),
    name: 'Release',
  })
}

describe('OrchestrationRegistry', () => {
  it('lists orchestrations in registration order', () => {
    const registry = new OrchestrationRegistry([
      { id: 'deploy', name: 'Deploy', run: () => undefined },
    ]).register({ id: 'fresh', name: 'Fresh Install', description: 'Reset', run: () => undefined })

    expect(registry.list().map((definition) => definition.id)).toEqual(['deploy', 'fresh'])
    expect(registry.has('fresh')).toBe(true)
    expect(registry.get('fresh')?.description).toBe('Reset')
    expect(registry.get('missing')).toBeUndefined()
  })

  it('rejects duplicate ids', () => {
    const registry = new OrchestrationRegistry([
      { id: 'deploy', name: 'Deploy', run: () => undefined },
    ])

    expect(() => registry.register({ id: 'deploy', name: 'Again', run: () => undefined })).toThrow(
      'Orchestration already registered: deploy'
    )
  })

  it('runs an orchestration and notifies when requested', async () => {
    const sent: DesktopNotification[] = []
    const executor = createTestExecutor(sent)
    const registry = new OrchestrationRegistry([
      {
        id: 'deploy',
        name: 'Deploy',
        notify: true,
        run: async (subject) => {
          await subject.runExternal('git pull')
          await subject.runClosure(() => 'done')
        },
      },
    ])

    const result = await registry.run('deploy', executor)

    expect(result.getOutput()).toBe('cmd\ndone')
    expect(sent).toEqual([{ title: 'Executor complete!', body: 'Release has been run.' }])
  })

  it('throws for unknown orchestrations', async () => {
    const registry = new OrchestrationRegistry()

    const failure = registry.run('missing', createTestExecutor())

    await expect(failure).rejects.toBeInstanceOf(ExecutorError)
    await expect(failure).rejects.toMatchObject({ code: 'unknown_orchestration' })
  })

  it('requires a registered id before running', () => {
    const registry = new OrchestrationRegistry([
      { id: 'deploy', name: 'Deploy', run: (): void => {} },
    ])

    expect(registry.require('deploy').name).toBe('Deploy')
    expect(() => registry.require('missing')).toThrow(ExecutorError)
    expect(() => registry.require('missing')).toThrow('Unknown orchestration: missing')
  })
})
