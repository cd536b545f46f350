import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import { CommandTimeoutError, type DesktopNotification } from '@chainexec/executor-core'
import { describe, expect, it } from 'vitest'

import { runSmokeOrchestration } from '../src/smokeOrchestration.js'

const projectRoot = resolve(fileURLToPath(new URL('.', import.meta.url)), '..')

describe('chainexec smoke project', () => {
  it('collects stdout of passing steps and stderr of failing ones', async () => {
    const pinged: { url: string; headers: Readonly<Record<string, string>> }[] = []
    const notifications: DesktopNotification[] = []

    const executor = await runSmokeOrchestration({
      cwd: projectRoot,
      runningUnitTests: true,
      statusUrl: 'https://status.example.test/smoke',
      notify: true,
      httpClient: {
        get: async (url, headers): Promise<void> => {
          pinged.push({ url, headers })
        },
      },
      notifier: {
        notify: (notification): void => {
          notifications.push(notification)
        },
      },
    })

    expect(executor.getOutput()).toBe(
      'console cache:clear\nbuild ok\nlint failed intentionally\nclosure step\n'
    )
    expect(pinged).toEqual([
      { url: 'https://status.example.test/smoke', headers: { 'X-Smoke': 'true' } },
    ])
    expect(notifications).toEqual([{ title: 'Executor complete!', body: 'Smoke has been run.' }])
  })

  it('aborts with a timeout error when the timeout demo is enabled', async () => {
    await expect(
      runSmokeOrchestration({
        cwd: projectRoot,
        runningUnitTests: true,
        includeTimeoutDemo: true,
        notifier: { notify: (): void => undefined },
      })
    ).rejects.toBeInstanceOf(CommandTimeoutError)
  })
})
