import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { HostDirectory, parseEthers, parseLeases } from '../HostDirectory'

const ETHERS = [
  '# static names',
  'AA:BB:CC:00:00:01   nas',
  '',
  'aa:bb:cc:00:00:02 printer   # office',
  'garbage'
].join('\n')

const LEASES = [
  'MAC                IP              hostname       valid until         manufacturer',
  '===============================================================================================',
  'aa:bb:cc:00:00:01  192.168.1.5     storage-box    2026-10-20 08:00:00 -NA-',
  'aa:bb:cc:00:00:09  192.168.1.23    laptop         2026-10-20 09:30:00 -NA-'
].join('\n')

describe('parseEthers', () => {
  it('maps lowercased MAC addresses to names', () => {
    expect(parseEthers(ETHERS)).toEqual(
      new Map([
        ['aa:bb:cc:00:00:01', 'nas'],
        ['aa:bb:cc:00:00:02', 'printer']
      ])
    )
  })
})

describe('parseLeases', () => {
  it('maps lease addresses to names, preferring the ethers name', () => {
    expect(parseLeases(LEASES, parseEthers(ETHERS))).toEqual(
      new Map([
        ['192.168.1.5', 'nas'],
        ['192.168.1.23', 'laptop']
      ])
    )
  })
})

describe('HostDirectory', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'iflow-hosts-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('stays empty when the sources are missing', async () => {
    const hosts = new HostDirectory()
    const warnings = await hosts.load({
      ethersFile: join(dir, 'missing-ethers'),
      leaseCommand: 'iflow-test-no-such-command'
    })

    expect(warnings).toEqual([])
    expect(hosts.size).toBe(0)
  })

  it('reads the ethers file even without a lease command', async () => {
    const ethersFile = join(dir, 'ethers')
    await writeFile(ethersFile, ETHERS)
    const hosts = new HostDirectory()

    expect(await hosts.load({ ethersFile })).toEqual([])
    // Names are attached through leases, so no address is known yet
    expect(hosts.size).toBe(0)
  })

  it('labels addresses it knows', () => {
    const hosts = new HostDirectory([['192.168.1.5', 'nas']])
    expect(hosts.labelFor('192.168.1.5')).toBe('nas')
    expect(hosts.labelFor('192.168.1.6')).toBeUndefined()
  })

  it('names well-known services by either port', () => {
    const hosts = new HostDirectory()
    expect(hosts.serviceFor(['22', '51000'])).toBe('SSH')
    expect(hosts.serviceFor(['51000', '443'])).toBe('HTTPS')
    expect(hosts.serviceFor(['25565', '40000'])).toBe('Minecraft')
    expect(hosts.serviceFor(['8080', '40000'])).toBeUndefined()
    expect(hosts.serviceFor(['22', '443'])).toBe('HTTPS')
  })
})
