import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import type { Orchestration } from '@chainexec/executor-core'
import ts from 'typescript'

import type { ChainexecConfig, OrchestrationConfig, StepConfig } from './types.js'

const CONFIG_FILE_NAMES = ['chainexec.config.ts', 'chainexec.config.json'] as const

/**
 * Loads and validates a chainexec config file.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws Error when config cannot be loaded or is invalid.
 */
export const loadChainexecConfig = async (
  cwd: string,
  configPath?: string
): Promise<{ config: ChainexecConfig; configFilePath: string }> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    throw new Error(`No config file found. Expected ${CONFIG_FILE_NAMES.join(' or ')}`)
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseChainexecConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    return resolve(cwd, configPath)
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = resolve(cwd, fileName)
    try {
      await readFile(candidate, 'utf8')
      return candidate
    } catch {
      continue
    }
  }

  return null
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    return JSON.parse(content) as unknown
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new Error(`Unsupported config extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new Error(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'chainexec-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule: unknown = await import(moduleUrl)
    if (!isRecord(loadedModule)) {
      throw new Error(`Config module ${configFilePath} must export default or named "config"`)
    }

    if (loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new Error(`Config module ${configFilePath} must export default or named "config"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }

  if ('default' in value) {
    return value.default
  }

  return value
}

const parseChainexecConfig = (value: unknown): ChainexecConfig => {
  if (!isRecord(value)) {
    throw new Error('Config must be an object')
  }

  const orchestrationsValue = value.orchestrations
  if (!Array.isArray(orchestrationsValue)) {
    throw new Error('Config must provide an orchestrations array')
  }

  const orchestrations = orchestrationsValue.map(parseOrchestration)
  assertUniqueOrchestrationIds(orchestrations)

  const basePath = parseOptionalString(value.basePath, 'basePath')
  const consolePrefix = parseOptionalConsolePrefix(value.consolePrefix)

  return {
    basePath,
    consolePrefix,
    orchestrations,
  }
}

const parseOrchestration = (value: unknown, index: number): OrchestrationConfig => {
  const path = `orchestrations[${index}]`
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const id = parseRequiredString(value.id, `${path}.id`)
  const name = parseRequiredString(value.name, `${path}.name`)
  const description = parseOptionalString(value.description, `${path}.description`)
  const notify = parseOptionalBoolean(value.notify, `${path}.notify`)
  const steps = parseOptionalSteps(value.steps, `${path}.steps`)
  const run = parseOptionalOrchestration(value.run, `${path}.run`)

  if (steps === undefined && run === undefined) {
    throw new Error(`${path} must provide either steps or run`)
  }

  if (steps !== undefined && run !== undefined) {
    throw new Error(`${path} must not provide both steps and run`)
  }

  return {
    id,
    name,
    description,
    notify,
    steps,
    run,
  }
}

const parseOptionalSteps = (value: unknown, path: string): readonly StepConfig[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`)
  }

  return value.map((entry: unknown, index: number) => parseStep(entry, `${path}[${index}]`))
}

const parseStep = (value: unknown, path: string): StepConfig => {
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const type = value.type
  if (type === 'console' || type === 'external') {
    return {
      type,
      command: parseRequiredString(value.command, `${path}.command`),
      interactive: parseOptionalBoolean(value.interactive, `${path}.interactive`),
      timeoutMs: parseOptionalTimeout(value.timeoutMs, `${path}.timeoutMs`),
    }
  }

  if (type === 'ping') {
    return {
      type,
      url: parseRequiredString(value.url, `${path}.url`),
      headers: parseOptionalStringRecord(value.headers, `${path}.headers`),
    }
  }

  if (type === 'notification') {
    return {
      type,
      title: parseRequiredString(value.title, `${path}.title`),
      body: parseRequiredString(value.body, `${path}.body`),
    }
  }

  throw new Error(`${path}.type must be "console", "external", "ping" or "notification"`)
}

const assertUniqueOrchestrationIds = (orchestrations: readonly OrchestrationConfig[]): void => {
  const seenById = new Set<string>()

  for (const orchestration of orchestrations) {
    if (seenById.has(orchestration.id)) {
      throw new Error(`orchestrations must use unique ids (duplicate: ${orchestration.id})`)
    }

    seenById.add(orchestration.id)
  }
}

const parseOptionalConsolePrefix = (value: unknown): readonly [string, string] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value) || value.length !== 2) {
    throw new Error('consolePrefix must be an array of two strings')
  }

  const [interpreter, entryPoint]: unknown[] = value
  return [
    parseRequiredString(interpreter, 'consolePrefix[0]'),
    parseRequiredString(entryPoint, 'consolePrefix[1]'),
  ]
}

const parseOptionalOrchestration = (value: unknown, path: string): Orchestration | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isOrchestration(value)) {
    throw new Error(`${path} must be a function`)
  }

  return value
}

const parseOptionalTimeout = (value: unknown, path: string): number | null | undefined => {
  if (value === undefined || value === null) {
    return value
  }

  if (typeof value !== 'number' || Number.isNaN(value) || value < 0) {
    throw new Error(`${path} must be a non-negative number or null`)
  }

  return value
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string') {
    throw new Error(`${path} must be a string`)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new Error(`${path} must be a boolean`)
  }

  return value
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const parsed: Record<string, string> = {}

  for (const [key, entryValue] of Object.entries(value)) {
    if (typeof entryValue !== 'string') {
      throw new Error(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isOrchestration = (value: unknown): value is Orchestration => {
  return typeof value === 'function'
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
