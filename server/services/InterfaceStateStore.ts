import { EventEmitter } from 'events'
import type {
  InterfaceConfig,
  InterfaceSample,
  InterfaceState,
  SamplerStatus
} from '../../src/types/traffic'

interface Entry {
  config: InterfaceConfig
  sample: InterfaceSample | null
  status: SamplerStatus
  consecutiveFailures: number
  error?: string
}

/**
 * InterfaceStateStore: the single current sample per configured interface.
 *
 * Samples are replaced wholesale; readers only ever see a complete sample.
 * No history is kept.
 *
 * Events:
 *   'change' → (interfaceId, InterfaceSample)
 *   'status' → (interfaceId, InterfaceState)
 */
export class InterfaceStateStore extends EventEmitter {
  private entries = new Map<string, Entry>()

  constructor(interfaces: readonly InterfaceConfig[]) {
    super()
    for (const config of interfaces) {
      this.entries.set(config.id, {
        config: Object.freeze({ ...config }),
        sample: null,
        status: 'starting',
        consecutiveFailures: 0
      })
    }
  }

  /** Configured interfaces, in configuration order */
  get interfaces(): InterfaceConfig[] {
    return Array.from(this.entries.values(), (e) => e.config)
  }

  has(interfaceId: string): boolean {
    return this.entries.has(interfaceId)
  }

  /**
   * Replace the stored sample for `sample.interfaceId`.
   * Returns false (and stores nothing) for an interface that is not configured.
   */
  update(sample: InterfaceSample): boolean {
    const entry = this.entries.get(sample.interfaceId)
    if (!entry) return false

    entry.sample = sample
    this.emit('change', sample.interfaceId, sample)
    return true
  }

  /** Record the sampler lifecycle state for an interface; emits 'status' on change */
  setStatus(interfaceId: string, status: SamplerStatus, consecutiveFailures: number, error?: string): void {
    const entry = this.entries.get(interfaceId)
    if (!entry) return

    if (
      entry.status === status &&
      entry.consecutiveFailures === consecutiveFailures &&
      entry.error === error
    ) {
      return
    }

    entry.status = status
    entry.consecutiveFailures = consecutiveFailures
    entry.error = error
    this.emit('status', interfaceId, this.toState(entry))
  }

  /** Current sample, or null when the sampler has not produced a valid block yet */
  snapshot(interfaceId: string): InterfaceSample | null {
    return this.entries.get(interfaceId)?.sample ?? null
  }

  /** Full state of one interface, or undefined if it is not configured */
  state(interfaceId: string): InterfaceState | undefined {
    const entry = this.entries.get(interfaceId)
    return entry ? this.toState(entry) : undefined
  }

  /** One state per configured interface; interfaces without data are included with `sample: null` */
  snapshotAll(): InterfaceState[] {
    return Array.from(this.entries.values(), (e) => this.toState(e))
  }

  private toState(entry: Entry): InterfaceState {
    const state: InterfaceState = {
      interface: entry.config,
      status: entry.status,
      consecutiveFailures: entry.consecutiveFailures,
      sample: entry.sample
    }
    if (entry.error) state.error = entry.error
    return state
  }
}
