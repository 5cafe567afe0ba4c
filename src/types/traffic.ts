/** Rolling-average windows behind the iftop "last 2s / 10s / 40s" columns */
export type RateWindowName = 'short' | 'medium' | 'long'

/** Bit rates in both directions, bits per second */
export interface DirectionRates {
  inbound: number
  outbound: number
}

export type WindowRates = Record<RateWindowName, DirectionRates>

/** One configured interface (immutable after load) */
export interface InterfaceConfig {
  id: string                     // Host interface name, e.g. eth0
  capacityBitsPerSecond: number  // Display threshold only, never clamps data
  label?: string
}

export interface Endpoint {
  address: string   // As printed by the sampler, e.g. 192.168.1.5:443
  host: string
  port: string
  label?: string    // Locally known host name (ethers / DHCP leases)
}

/** One traffic flow at a sampling instant. No identity across samples. */
export interface ConnectionRecord {
  localEndpoint: Endpoint
  remoteEndpoint: Endpoint
  rates: WindowRates
  cumulativeBytes: DirectionRates
  service?: string  // Well-known port description (SSH, HTTPS, ...)
}

/** Sent / received / combined triple as printed on the peak and cumulative lines */
export interface TrafficTriple {
  sent: number
  received: number
  total: number
}

/** Authoritative state for one interface. Replaced wholesale, never mutated. */
export interface InterfaceSample {
  interfaceId: string
  totalRates: WindowRates
  topConnections: readonly ConnectionRecord[]
  peakRates: TrafficTriple       // bits/s
  cumulativeBytes: TrafficTriple // bytes
  sampledAt: number              // Unix ms
}

/** Lifecycle of the sampling subprocess behind an interface */
export type SamplerStatus =
  | 'starting'
  | 'running'
  | 'restarting'
  | 'failed'         // Gave up after too many consecutive failures
  | 'misconfigured'  // Preflight failed (privilege, unknown interface)
  | 'stopped'

/** Everything a client needs to render one interface. `sample: null` means no data yet. */
export interface InterfaceState {
  interface: InterfaceConfig
  status: SamplerStatus
  consecutiveFailures: number
  sample: InterfaceSample | null
  error?: string
}
