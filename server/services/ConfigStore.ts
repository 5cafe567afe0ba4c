import { readFileSync } from 'fs'
import { load as loadYaml } from 'js-yaml'
import type { RestartPolicy } from './RestartBackoff'
import type { InterfaceConfig } from '../../src/types/traffic'

/** Application settings shape */
export interface AppSettings {
  // Server
  host: string
  port: number
  websocketPath: string

  // Sampler
  samplerCommand: string
  samplerArgs: string[]
  displayLimit: number
  requirePrivilege: boolean
  requireInterfacePresent: boolean
  stopTimeoutMs: number
  restart: RestartPolicy

  // Clients
  queueCapacity: number

  // Log
  logMaxEntries: number
  logDebugMode: boolean

  // Host names
  ethersFile: string
  leaseCommand: string

  interfaces: InterfaceConfig[]
}

export const DEFAULT_SETTINGS: AppSettings = {
  host: '0.0.0.0',
  port: 8766,
  websocketPath: '/ws',

  samplerCommand: 'iftop',
  samplerArgs: [],
  displayLimit: 10,
  requirePrivilege: true,
  requireInterfacePresent: true,
  stopTimeoutMs: 3000,
  restart: {
    initialDelay: 1,
    maxDelay: 30,
    backoffMultiplier: 2,
    maxConsecutiveFailures: 8,
    jitter: false
  },

  queueCapacity: 32,

  logMaxEntries: 5000,
  logDebugMode: false,

  ethersFile: '/usr/local/etc/ethers',
  leaseCommand: 'dhcp-lease-list',

  interfaces: []
}

/** Thrown when the configuration file cannot be used; lists every problem found */
export class ConfigError extends Error {
  constructor(readonly problems: string[], source: string) {
    super(`Invalid configuration in ${source}:\n  - ${problems.join('\n  - ')}`)
    this.name = 'ConfigError'
  }
}

type Raw = Record<string, unknown>

function isRecord(value: unknown): value is Raw {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Reads typed fields out of an untrusted object, collecting problems as it goes */
class FieldReader {
  constructor(
    private readonly raw: Raw,
    private readonly prefix: string,
    private readonly problems: string[]
  ) {}

  string(key: string, fallback: string): string {
    const value = this.raw[key]
    if (value === undefined) return fallback
    if (typeof value === 'string' && value.trim()) return value
    this.problems.push(`${this.prefix}${key} must be a non-empty string`)
    return fallback
  }

  optionalString(key: string): string | undefined {
    const value = this.raw[key]
    if (value === undefined || value === null) return undefined
    if (typeof value === 'string') return value
    this.problems.push(`${this.prefix}${key} must be a string`)
    return undefined
  }

  number(key: string, fallback: number, check: { min?: number; integer?: boolean; positive?: boolean } = {}): number {
    const value = this.raw[key]
    if (value === undefined) return fallback
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.problems.push(`${this.prefix}${key} must be a number`)
      return fallback
    }
    if (check.integer && !Number.isInteger(value)) {
      this.problems.push(`${this.prefix}${key} must be an integer`)
      return fallback
    }
    if (check.positive && value <= 0) {
      this.problems.push(`${this.prefix}${key} must be greater than 0`)
      return fallback
    }
    if (check.min !== undefined && value < check.min) {
      this.problems.push(`${this.prefix}${key} must be at least ${check.min}`)
      return fallback
    }
    return value
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.raw[key]
    if (value === undefined) return fallback
    if (typeof value === 'boolean') return value
    this.problems.push(`${this.prefix}${key} must be true or false`)
    return fallback
  }

  stringList(key: string, fallback: string[]): string[] {
    const value = this.raw[key]
    if (value === undefined) return fallback
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value
    this.problems.push(`${this.prefix}${key} must be a list of strings`)
    return fallback
  }
}

function parseRestart(value: unknown, problems: string[]): RestartPolicy {
  const defaults = DEFAULT_SETTINGS.restart
  if (value === undefined) return { ...defaults }
  if (!isRecord(value)) {
    problems.push('restart must be a mapping')
    return { ...defaults }
  }
  const r = new FieldReader(value, 'restart.', problems)
  const policy: RestartPolicy = {
    initialDelay: r.number('initialDelay', defaults.initialDelay, { positive: true }),
    maxDelay: r.number('maxDelay', defaults.maxDelay, { positive: true }),
    backoffMultiplier: r.number('backoffMultiplier', defaults.backoffMultiplier, { min: 1 }),
    maxConsecutiveFailures: r.number('maxConsecutiveFailures', defaults.maxConsecutiveFailures, { min: 0, integer: true }),
    jitter: r.boolean('jitter', defaults.jitter)
  }
  if (policy.maxDelay < policy.initialDelay) {
    problems.push('restart.maxDelay must not be smaller than restart.initialDelay')
  }
  return policy
}

function parseInterfaces(value: unknown, problems: string[]): InterfaceConfig[] {
  if (!Array.isArray(value) || value.length === 0) {
    problems.push('interfaces must be a non-empty list')
    return []
  }

  const seen = new Set<string>()
  const interfaces: InterfaceConfig[] = []

  value.forEach((item: unknown, index: number) => {
    if (!isRecord(item)) {
      problems.push(`interfaces[${index}] must be a mapping with id and capacityBitsPerSecond`)
      return
    }
    const before = problems.length
    const r = new FieldReader(item, `interfaces[${index}].`, problems)
    const id = r.string('id', '')
    if (item.id === undefined) problems.push(`interfaces[${index}].id is required`)
    if (item.capacityBitsPerSecond === undefined) problems.push(`interfaces[${index}].capacityBitsPerSecond is required`)
    const capacityBitsPerSecond = r.number('capacityBitsPerSecond', 0, { positive: true })
    const label = r.optionalString('label')

    if (id && seen.has(id)) problems.push(`interfaces[${index}].id "${id}" is listed more than once`)
    seen.add(id)

    if (problems.length === before) {
      interfaces.push(label ? { id, capacityBitsPerSecond, label } : { id, capacityBitsPerSecond })
    }
  })

  return interfaces
}

/** Validate a parsed configuration document and merge it over the defaults */
export function parseSettings(doc: unknown, source: string = 'configuration'): AppSettings {
  const problems: string[] = []
  if (!isRecord(doc)) {
    throw new ConfigError(['the document must be a mapping'], source)
  }

  const r = new FieldReader(doc, '', problems)
  const d = DEFAULT_SETTINGS
  const settings: AppSettings = {
    host: r.string('host', d.host),
    port: r.number('port', d.port, { min: 0, integer: true }),
    websocketPath: r.string('websocketPath', d.websocketPath),
    samplerCommand: r.string('samplerCommand', d.samplerCommand),
    samplerArgs: r.stringList('samplerArgs', d.samplerArgs),
    displayLimit: r.number('displayLimit', d.displayLimit, { integer: true, positive: true }),
    requirePrivilege: r.boolean('requirePrivilege', d.requirePrivilege),
    requireInterfacePresent: r.boolean('requireInterfacePresent', d.requireInterfacePresent),
    stopTimeoutMs: r.number('stopTimeoutMs', d.stopTimeoutMs, { min: 0 }),
    restart: parseRestart(doc.restart, problems),
    queueCapacity: r.number('queueCapacity', d.queueCapacity, { integer: true, positive: true }),
    logMaxEntries: r.number('logMaxEntries', d.logMaxEntries, { integer: true, positive: true }),
    logDebugMode: r.boolean('logDebugMode', d.logDebugMode),
    ethersFile: r.string('ethersFile', d.ethersFile),
    leaseCommand: r.string('leaseCommand', d.leaseCommand),
    interfaces: parseInterfaces(doc.interfaces, problems)
  }

  if (settings.port > 65535) problems.push('port must be at most 65535')
  if (!settings.websocketPath.startsWith('/')) problems.push('websocketPath must start with "/"')

  if (problems.length > 0) {
    throw new ConfigError(problems, source)
  }
  return settings
}

/**
 * Loads the YAML configuration once at startup.
 *
 * Lookup order for the file: `--config <path>` argument, IFLOW_CONFIG, ./iflow.yaml.
 */
export class ConfigStore {
  private settings: AppSettings

  constructor(readonly path: string) {
    let text: string
    try {
      text = readFileSync(path, 'utf-8')
    } catch (err: unknown) {
      throw new ConfigError([err instanceof Error ? err.message : String(err)], path)
    }

    let doc: unknown
    try {
      doc = loadYaml(text)
    } catch (err: unknown) {
      throw new ConfigError([`YAML syntax error: ${err instanceof Error ? err.message : String(err)}`], path)
    }

    this.settings = parseSettings(doc, path)
  }

  /** Get all settings */
  getAll(): AppSettings {
    return this.settings
  }
}

/** Resolve the configuration path from argv and the environment */
export function resolveConfigPath(argv: readonly string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): string {
  const flag = argv.indexOf('--config')
  if (flag >= 0 && argv[flag + 1]) return argv[flag + 1]
  const inline = argv.find((a) => a.startsWith('--config='))
  if (inline) return inline.slice('--config='.length)
  return env.IFLOW_CONFIG || './iflow.yaml'
}
