#!/usr/bin/env node

import { getCliHelpText, parseCliOptions } from './cliOptions.js'
import { formatCliError, runCliOrchestration } from './runOrchestration.js'

const main = async (argv: readonly string[]): Promise<number> => {
  const options = parseCliOptions(argv, process.cwd())
  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    return 0
  }

  return await runCliOrchestration(options)
}

main(process.argv.slice(2)).then(
  (exitCode: number) => {
    process.exitCode = exitCode
  },
  (error: unknown) => {
    process.stderr.write(`${formatCliError(error)}\n`)
    process.exitCode = 1
  }
)
