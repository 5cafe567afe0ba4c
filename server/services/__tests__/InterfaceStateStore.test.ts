import { describe, expect, it, vi } from 'vitest'
import { InterfaceStateStore } from '../InterfaceStateStore'
import { SnapshotParser } from '../SnapshotParser'
import type { InterfaceSample } from '../../../src/types/traffic'
import { sampleBlock } from './fixtures'

const INTERFACES = [
  { id: 'eth0', capacityBitsPerSecond: 500000000 },
  { id: 'eth1', capacityBitsPerSecond: 500000000, label: 'LAN' }
]

function parsedSample(lines: string[] = sampleBlock()): InterfaceSample {
  const parser = new SnapshotParser('eth0', { displayLimit: 10, now: () => 1000 })
  for (const line of lines) {
    const outcome = parser.push(line)
    if (outcome?.type === 'sample') return outcome.sample
  }
  throw new Error('block produced no sample')
}

describe('InterfaceStateStore', () => {
  it('starts every configured interface without data', () => {
    const store = new InterfaceStateStore(INTERFACES)

    expect(store.snapshot('eth0')).toBeNull()
    expect(store.snapshotAll()).toEqual([
      { interface: INTERFACES[0], status: 'starting', consecutiveFailures: 0, sample: null },
      { interface: INTERFACES[1], status: 'starting', consecutiveFailures: 0, sample: null }
    ])
  })

  it('replaces the sample and announces the change', () => {
    const store = new InterfaceStateStore(INTERFACES)
    const change = vi.fn()
    store.on('change', change)
    const sample = parsedSample()

    expect(store.update(sample)).toBe(true)
    expect(store.snapshot('eth0')).toBe(sample)
    expect(change).toHaveBeenCalledWith('eth0', sample)
  })

  it('ignores samples for interfaces that are not configured', () => {
    const store = new InterfaceStateStore(INTERFACES)
    const change = vi.fn()
    store.on('change', change)

    expect(store.update({ ...parsedSample(), interfaceId: 'wlan0' })).toBe(false)
    expect(change).not.toHaveBeenCalled()
  })

  it('keeps the previous sample when a later block is malformed', () => {
    const store = new InterfaceStateStore(INTERFACES)
    const parser = new SnapshotParser('eth0', { displayLimit: 10, now: () => 1000 })
    const broken = sampleBlock()
    broken.splice(3, 1)

    for (const line of [...sampleBlock(), ...broken]) {
      const outcome = parser.push(line)
      if (outcome?.type === 'sample') store.update(outcome.sample)
    }

    expect(store.snapshot('eth0')).toEqual(parsedSample())
  })

  it('only announces status changes', () => {
    const store = new InterfaceStateStore(INTERFACES)
    const status = vi.fn()
    store.on('status', status)

    store.setStatus('eth1', 'running', 0)
    store.setStatus('eth1', 'running', 0)
    store.setStatus('eth1', 'restarting', 1, 'exit code 1')

    expect(status).toHaveBeenCalledTimes(2)
    expect(status).toHaveBeenLastCalledWith('eth1', {
      interface: INTERFACES[1],
      status: 'restarting',
      consecutiveFailures: 1,
      sample: null,
      error: 'exit code 1'
    })
    expect(store.state('eth1')?.status).toBe('restarting')
  })

  it('lists interfaces in configuration order', () => {
    const store = new InterfaceStateStore(INTERFACES)
    expect(store.interfaces.map((i) => i.id)).toEqual(['eth0', 'eth1'])
    expect(store.has('eth1')).toBe(true)
    expect(store.has('wlan0')).toBe(false)
  })
})
