import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { TrafficMonitor, type TrafficMonitorOptions } from '../TrafficMonitor'
import { InterfaceStateStore } from '../InterfaceStateStore'
import { Broadcaster } from '../Broadcaster'
import { acceptClient } from '../ClientSession'
import { LogService } from '../LogService'
import { FakeSamplerHost, FakeTransport, settle } from './fakes'
import { END, RULE, quietBlock, sampleBlock } from './fixtures'

const INTERFACES = [
  { id: 'eth0', capacityBitsPerSecond: 500000000 },
  { id: 'eth1', capacityBitsPerSecond: 500000000 }
]

describe('TrafficMonitor', () => {
  let host: FakeSamplerHost
  let log: LogService
  let store: InterfaceStateStore
  let monitor: TrafficMonitor

  function createMonitor(overrides: Partial<TrafficMonitorOptions> = {}): TrafficMonitor {
    return new TrafficMonitor(
      store,
      {
        samplerCommand: 'iftop',
        samplerArgs: [],
        displayLimit: 10,
        requirePrivilege: false,
        requireInterfacePresent: true,
        stopTimeoutMs: 100,
        restart: { initialDelay: 0.01, maxDelay: 0.05, backoffMultiplier: 2, maxConsecutiveFailures: 3, jitter: false },
        samplerHost: host,
        now: () => 1000,
        ...overrides
      },
      log
    )
  }

  beforeEach(() => {
    host = new FakeSamplerHost()
    log = new LogService(100, false, false)
    store = new InterfaceStateStore(INTERFACES)
    monitor = createMonitor()
  })

  afterEach(async () => {
    await monitor.stop()
  })

  it('streams two eth0 blocks to a client and nothing for a silent eth1', async () => {
    const broadcaster = new Broadcaster(store, log)
    const transport = new FakeTransport()
    acceptClient(transport, { store, broadcaster, log, queueCapacity: 8 })

    monitor.start()
    expect(host.launches.map((l) => l.args.slice(0, 2))).toEqual([['-i', 'eth0'], ['-i', 'eth1']])

    host.childFor('eth0').print([...sampleBlock(), ...quietBlock()])

    const updatesFor = (id: string) =>
      transport.messages().filter((m) => m.type === 'interface_update' && m.interfaceId === id)

    await vi.waitFor(() => expect(updatesFor('eth0')).toHaveLength(2))
    await settle()

    expect(updatesFor('eth0')).toHaveLength(2)
    expect(updatesFor('eth1')).toHaveLength(0)
    expect(store.snapshot('eth1')).toBeNull()
    expect(store.snapshot('eth0')?.topConnections).toEqual([])
    expect(transport.messages()[0].type).toBe('full_state')
  })

  it('marks the interface running once a sample arrives', async () => {
    monitor.start()
    host.childFor('eth0').print(quietBlock())

    await vi.waitFor(() => expect(store.state('eth0')?.status).toBe('running'))
    expect(store.state('eth1')?.status).toBe('starting')
  })

  it('keeps the last good sample and counts a discarded block', async () => {
    monitor.start()
    const child = host.childFor('eth0')
    child.print(sampleBlock())
    await vi.waitFor(() => expect(store.snapshot('eth0')).not.toBeNull())
    const good = store.snapshot('eth0')

    child.print([RULE, '     10.0.0.9:51000   <=   500b   500b   500b   125B', END])
    await vi.waitFor(() => expect(monitor.stats()[0].discarded).toBe(1))

    expect(store.snapshot('eth0')).toBe(good)
    expect(log.getEntries('eth0').at(-1)?.message).toBe(
      'Snapshot discarded: receive line for 10.0.0.9:51000 without a send line'
    )
  })

  it('drops a partial block when the sampler restarts', async () => {
    monitor.start()
    const first = host.childFor('eth0')
    first.print(sampleBlock().slice(0, 5))
    await settle()
    first.exit(1)

    await vi.waitFor(() => expect(host.childFor('eth0')).not.toBe(first))
    host.childFor('eth0').print(quietBlock())

    await vi.waitFor(() => expect(store.snapshot('eth0')).not.toBeNull())
    expect(store.snapshot('eth0')?.topConnections).toEqual([])
    expect(monitor.stats()[0]).toMatchObject({ interfaceId: 'eth0', samples: 1, discarded: 0, status: 'running' })
  })

  it('marks a missing interface misconfigured and leaves the others running', () => {
    host.missing.add('eth1')
    monitor.start()

    expect(store.state('eth1')).toMatchObject({ status: 'misconfigured', error: 'no such network interface "eth1"' })
    expect(store.state('eth0')?.status).toBe('starting')
    expect(host.launches).toHaveLength(1)
  })

  it('ignores lines for interfaces it does not manage', () => {
    monitor.ingest('wlan0', RULE)
    expect(monitor.stats().map((s) => s.interfaceId)).toEqual(['eth0', 'eth1'])
  })
})
