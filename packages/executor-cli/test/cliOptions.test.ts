import { resolve } from 'node:path'
import { describe, expect, it } from 'vitest'

import { getCliHelpText, parseCliOptions } from '../src/cliOptions.js'

describe('parseCliOptions', () => {
  const baseCwd = resolve('repo')

  it('parses explicit options', () => {
    const options = parseCliOptions(
      ['--config', 'chainexec.config.ts', '--run', 'deploy', '--format', 'json', '--notify'],
      baseCwd
    )

    expect(options).toEqual({
      cwd: baseCwd,
      configPath: 'chainexec.config.ts',
      run: 'deploy',
      list: false,
      format: 'json',
      notify: true,
      help: false,
    })
  })

  it('supports equals syntax for config, run, format and cwd', () => {
    const options = parseCliOptions(
      ['--config=chainexec.config.json', '--run=fresh', '--format=pretty', '--cwd=apps/api'],
      baseCwd
    )

    expect(options.cwd).toBe(resolve(baseCwd, 'apps/api'))
    expect(options.configPath).toBe('chainexec.config.json')
    expect(options.run).toBe('fresh')
    expect(options.format).toBe('pretty')
  })

  it('returns help mode without an orchestration', () => {
    const options = parseCliOptions(['-h'], baseCwd)

    expect(options.help).toBe(true)
    expect(options.run).toBeUndefined()
    expect(getCliHelpText()).toContain('Usage: chainexec')
  })

  it('enables listing mode', () => {
    expect(parseCliOptions(['--list'], baseCwd).list).toBe(true)
  })

  it('requires an orchestration or listing mode', () => {
    expect(() => parseCliOptions([], baseCwd)).toThrow(
      'Specify an orchestration with --run <id> or use --list'
    )
  })

  it('throws for unknown options', () => {
    expect(() => parseCliOptions(['--unknown'], baseCwd)).toThrow('Unknown argument: --unknown')
  })

  it('throws when a value is missing or invalid', () => {
    expect(() => parseCliOptions(['--run'], baseCwd)).toThrow('--run requires a value')
    expect(() => parseCliOptions(['--run='], baseCwd)).toThrow('--run requires a value')
    expect(() => parseCliOptions(['--list', '--format', 'xml'], baseCwd)).toThrow(
      '--format must be "pretty" or "json"'
    )
  })
})
