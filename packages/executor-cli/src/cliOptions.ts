import { resolve } from 'node:path'

import type { CliOutputFormat } from './config/types.js'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute working directory for config and execution. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Orchestration id to run. */
  readonly run?: string
  /** Prints configured orchestrations and exits when true. */
  readonly list: boolean
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Sends a completion notification after the run when true. */
  readonly notify: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

/**
 * Parses process arguments for the chainexec CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let run: string | undefined
  let list = false
  let format: CliOutputFormat = 'pretty'
  let notify = false
  let help = false
  let cwd = baseCwd

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--list') {
      list = true
      continue
    }

    if (argument === '--notify') {
      notify = true
      continue
    }

    if (argument === '--format' || argument.startsWith('--format=')) {
      const value = readValue(argv, index, '--format')
      if (value.value !== 'pretty' && value.value !== 'json') {
        throw new Error('--format must be "pretty" or "json"')
      }
      format = value.value
      index = value.nextIndex
      continue
    }

    if (argument === '--config' || argument.startsWith('--config=')) {
      const value = readValue(argv, index, '--config')
      configPath = value.value
      index = value.nextIndex
      continue
    }

    if (argument === '--run' || argument.startsWith('--run=')) {
      const value = readValue(argv, index, '--run')
      run = value.value
      index = value.nextIndex
      continue
    }

    if (argument === '--cwd' || argument.startsWith('--cwd=')) {
      const value = readValue(argv, index, '--cwd')
      cwd = resolve(baseCwd, value.value)
      index = value.nextIndex
      continue
    }

    throw new Error(`Unknown argument: ${argument}`)
  }

  if (!help && !list && run === undefined) {
    throw new Error('Specify an orchestration with --run <id> or use --list')
  }

  return {
    cwd,
    configPath,
    run,
    list,
    format,
    notify,
    help,
  }
}

/**
 * Returns help text for the chainexec CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: chainexec [options]',
    '',
    'Options:',
    '  --run <id>          Run the orchestration with this id',
    '  --list              Print configured orchestrations and exit',
    '  --config <path>     Config file path (default: chainexec.config.ts or chainexec.config.json)',
    '  --format <type>     Output format: pretty | json (default: pretty)',
    '  --notify            Show a desktop notification when the run completes',
    '  --cwd <path>        Base working directory',
    '  -h, --help          Show this help',
  ].join('\n')
}

const readValue = (
  argv: readonly string[],
  index: number,
  flag: string
): { value: string; nextIndex: number } => {
  const argument = argv[index] ?? ''
  if (argument.startsWith(`${flag}=`)) {
    const value = argument.slice(flag.length + 1)
    if (!value) {
      throw new Error(`${flag} requires a value`)
    }
    return { value, nextIndex: index }
  }

  const nextValue = argv[index + 1]
  if (!nextValue) {
    throw new Error(`${flag} requires a value`)
  }

  return { value: nextValue, nextIndex: index + 1 }
}
