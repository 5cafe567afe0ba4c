import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigError, ConfigStore, DEFAULT_SETTINGS, parseSettings, resolveConfigPath } from '../ConfigStore'

function problemsOf(doc: unknown): string[] {
  try {
    parseSettings(doc)
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.problems
    throw err
  }
  throw new Error('expected a ConfigError')
}

describe('parseSettings', () => {
  it('fills everything but the interfaces from the defaults', () => {
    const settings = parseSettings({ interfaces: [{ id: 'eth0', capacityBitsPerSecond: 500000000 }] })

    expect(settings).toEqual({
      ...DEFAULT_SETTINGS,
      interfaces: [{ id: 'eth0', capacityBitsPerSecond: 500000000 }]
    })
  })

  it('takes overrides, including nested restart settings', () => {
    const settings = parseSettings({
      port: 9000,
      queueCapacity: 4,
      restart: { maxConsecutiveFailures: 2 },
      interfaces: [{ id: 'eth0', capacityBitsPerSecond: 1e9, label: 'WAN' }]
    })

    expect(settings.port).toBe(9000)
    expect(settings.queueCapacity).toBe(4)
    expect(settings.restart).toEqual({ ...DEFAULT_SETTINGS.restart, maxConsecutiveFailures: 2 })
    expect(settings.interfaces).toEqual([{ id: 'eth0', capacityBitsPerSecond: 1e9, label: 'WAN' }])
  })

  it('rejects an empty interface list', () => {
    expect(problemsOf({ interfaces: [] })).toEqual(['interfaces must be a non-empty list'])
    expect(problemsOf({})).toEqual(['interfaces must be a non-empty list'])
  })

  it('reports every interface problem at once', () => {
    expect(
      problemsOf({
        interfaces: [
          { id: 'eth0', capacityBitsPerSecond: 500000000 },
          { id: 'eth0', capacityBitsPerSecond: 100 },
          { id: 'eth1', capacityBitsPerSecond: 0 },
          { capacityBitsPerSecond: 10 }
        ]
      })
    ).toEqual([
      'interfaces[1].id "eth0" is listed more than once',
      'interfaces[2].capacityBitsPerSecond must be greater than 0',
      'interfaces[3].id is required'
    ])
  })

  it('rejects values of the wrong type', () => {
    expect(
      problemsOf({
        port: 'http',
        requirePrivilege: 'yes',
        samplerArgs: ['-B', 2],
        websocketPath: 'ws',
        interfaces: [{ id: 'eth0', capacityBitsPerSecond: 1 }]
      })
    ).toEqual([
      'port must be a number',
      'samplerArgs must be a list of strings',
      'requirePrivilege must be true or false',
      'websocketPath must start with "/"'
    ])
  })

  it('rejects a document that is not a mapping', () => {
    expect(problemsOf('just text')).toEqual(['the document must be a mapping'])
  })
})

describe('ConfigStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'iflow-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('loads a YAML file', async () => {
    const path = join(dir, 'iflow.yaml')
    await writeFile(
      path,
      ['port: 9100', 'interfaces:', '  - id: eth0', '    capacityBitsPerSecond: 500000000', ''].join('\n')
    )

    const config = new ConfigStore(path)
    expect(config.getAll().port).toBe(9100)
    expect(config.getAll().interfaces).toEqual([{ id: 'eth0', capacityBitsPerSecond: 500000000 }])
    expect(config.getAll().samplerCommand).toBe('iftop')
  })

  it('reports YAML syntax errors as configuration errors', async () => {
    const path = join(dir, 'broken.yaml')
    await writeFile(path, 'interfaces: [eth0\n')

    expect(() => new ConfigStore(path)).toThrow(ConfigError)
  })

  it('reports a missing file as a configuration error', () => {
    expect(() => new ConfigStore(join(dir, 'nope.yaml'))).toThrow(ConfigError)
  })
})

describe('resolveConfigPath', () => {
  it('prefers the --config argument', () => {
    expect(resolveConfigPath(['--config', '/etc/iflow.yaml'], { IFLOW_CONFIG: '/tmp/other.yaml' })).toBe('/etc/iflow.yaml')
    expect(resolveConfigPath(['--config=/etc/iflow.yaml'], {})).toBe('/etc/iflow.yaml')
  })

  it('falls back to the environment, then the working directory', () => {
    expect(resolveConfigPath([], { IFLOW_CONFIG: '/tmp/other.yaml' })).toBe('/tmp/other.yaml')
    expect(resolveConfigPath([], {})).toBe('./iflow.yaml')
  })
})
