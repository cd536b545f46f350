import { fileURLToPath } from 'node:url'
import { resolve } from 'node:path'

import { runSmokeOrchestration } from './smokeOrchestration.js'

const writeLine = (line: string): void => {
  process.stdout.write(`${line}\n`)
}

const writeError = (line: string): void => {
  process.stderr.write(`${line}\n`)
}

const runCli = async (): Promise<void> => {
  const argv = new Set(process.argv.slice(2))
  const packageRoot = resolve(fileURLToPath(new URL('.', import.meta.url)), '..')
  const startedAt = Date.now()

  const executor = await runSmokeOrchestration({
    cwd: packageRoot,
    includeTimeoutDemo: argv.has('--timeout-demo'),
    notify: argv.has('--notify'),
  })

  const lineCount = executor.getOutput().split('\n').filter(Boolean).length
  writeLine(`Smoke orchestration finished in ${Date.now() - startedAt}ms (${lineCount} output lines)`)
}

void runCli().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  writeError(message)
  process.exitCode = 1
})
