import type {
  ConnectionRecord,
  DirectionRates,
  Endpoint,
  InterfaceSample,
  TrafficTriple,
  WindowRates
} from '../../src/types/traffic'
import { parseBitRate, parseByteCount } from '../utils/rateUnits'

/** Short / medium / long column values, bits per second */
type ColumnRates = [number, number, number]

/**
 * Classification of one line of sampler output.
 *
 * `rates: null` on a connection half means the line had the right shape but a
 * value could not be read; that connection is dropped, the block survives.
 * `malformed` means the line looked like a known shape but is unusable, which
 * spoils the whole block.
 */
export type ClassifiedLine =
  | { kind: 'send'; rank: number | null; address: string; rates: ColumnRates | null; cumulative: number | null }
  | { kind: 'receive'; address: string; rates: ColumnRates | null; cumulative: number | null }
  | { kind: 'total-send'; rates: ColumnRates }
  | { kind: 'total-receive'; rates: ColumnRates }
  | { kind: 'total-combined'; rates: ColumnRates }
  | { kind: 'peak'; values: TrafficTriple }
  | { kind: 'cumulative'; values: TrafficTriple }
  | { kind: 'separator' }
  | { kind: 'terminator' }
  | { kind: 'ignorable' }
  | { kind: 'malformed'; reason: string }

/** Labelled summary lines, most specific first */
const SUMMARY_PATTERNS: Array<{ kind: 'total-combined' | 'total-send' | 'total-receive' | 'peak' | 'cumulative'; pattern: RegExp }> = [
  { kind: 'total-combined', pattern: /^total\s+send\s+and\s+receive\s+rate\s*:(.*)$/i },
  { kind: 'total-send', pattern: /^total\s+send\s+rate\s*:(.*)$/i },
  { kind: 'total-receive', pattern: /^total\s+receive\s+rate\s*:(.*)$/i },
  { kind: 'peak', pattern: /^peak\s+rate\s*(?:\([^)]*\))?\s*:(.*)$/i },
  { kind: 'cumulative', pattern: /^cumulative\s*(?:\([^)]*\))?\s*:(.*)$/i }
]

const SEPARATOR = /^-{5,}$/
const TERMINATOR = /^={5,}$/

function readColumns(text: string, parse: (token: string) => number | null): ColumnRates | null {
  const tokens = text.trim().split(/\s+/)
  if (tokens.length !== 3) return null
  const [a, b, c] = tokens.map(parse)
  if (a === null || b === null || c === null) return null
  return [a, b, c]
}

function classifyConnectionHalf(tokens: string[], arrowIndex: number): ClassifiedLine {
  const arrow = tokens[arrowIndex]
  const before = tokens.slice(0, arrowIndex)
  const after = tokens.slice(arrowIndex + 1)

  if (after.length !== 4) {
    return { kind: 'malformed', reason: `expected 4 values after ${arrow}, got ${after.length}` }
  }

  let rank: number | null = null
  let address: string | undefined
  if (before.length === 2 && /^\d+$/.test(before[0])) {
    rank = Number(before[0])
    address = before[1]
  } else if (before.length === 1) {
    address = before[0]
  }
  if (!address) {
    return { kind: 'malformed', reason: `unexpected host column "${before.join(' ')}"` }
  }

  const rates = readColumns(after.slice(0, 3).join(' '), parseBitRate)
  const cumulative = parseByteCount(after[3])
  const usable = rates !== null && cumulative !== null

  if (arrow === '=>') {
    return { kind: 'send', rank, address, rates: usable ? rates : null, cumulative: usable ? cumulative : null }
  }

  if (rank !== null) {
    return { kind: 'malformed', reason: 'receive line carries a rank' }
  }
  return { kind: 'receive', address, rates: usable ? rates : null, cumulative: usable ? cumulative : null }
}

/** Classify one line of iftop text-mode output */
export function classifyLine(line: string): ClassifiedLine {
  const text = line.trim()
  if (!text) return { kind: 'ignorable' }
  if (TERMINATOR.test(text)) return { kind: 'terminator' }
  if (SEPARATOR.test(text)) return { kind: 'separator' }

  for (const { kind, pattern } of SUMMARY_PATTERNS) {
    const match = pattern.exec(text)
    if (!match) continue

    const values = kind === 'cumulative'
      ? readColumns(match[1], parseByteCount)
      : readColumns(match[1], parseBitRate)
    if (!values) {
      return { kind: 'malformed', reason: `unreadable ${kind} line` }
    }
    if (kind === 'peak' || kind === 'cumulative') {
      return { kind, values: { sent: values[0], received: values[1], total: values[2] } }
    }
    return { kind, rates: values }
  }

  const tokens = text.split(/\s+/)
  const arrowIndex = tokens.findIndex((t) => t === '=>' || t === '<=')
  if (arrowIndex >= 0) {
    return classifyConnectionHalf(tokens, arrowIndex)
  }

  // Banners, column headers, "Listening on ..." and anything else unknown
  return { kind: 'ignorable' }
}

/** Split "host:port" at the last colon; a missing port stays empty */
export function splitAddress(address: string): { host: string; port: string } {
  const idx = address.lastIndexOf(':')
  if (idx <= 0 || idx === address.length - 1) return { host: address, port: '' }
  return { host: address.slice(0, idx), port: address.slice(idx + 1) }
}

/** Lookups used to decorate parsed connections */
export interface HostLookup {
  labelFor(host: string): string | undefined
  serviceFor(ports: string[]): string | undefined
}

export interface SnapshotParserOptions {
  /** Maximum number of connections kept per sample */
  displayLimit: number
  hosts?: HostLookup
  /** Clock for `sampledAt` */
  now?: () => number
}

/** Outcome of feeding one line to the parser */
export type ParseOutcome =
  | { type: 'sample'; sample: InterfaceSample; droppedConnections: number }
  | { type: 'discarded'; reason: string }
  | null

interface OpenHalf {
  address: string
  rates: ColumnRates | null
  cumulative: number | null
}

interface HalfReading {
  address: string
  rates: ColumnRates
  cumulative: number
}

interface PendingBlock {
  connections: ConnectionRecord[]
  open: OpenHalf | null
  totalSend: ColumnRates | null
  totalReceive: ColumnRates | null
  peak: TrafficTriple | null
  cumulative: TrafficTriple | null
  malformed: string | null
  droppedConnections: number
  lines: number
}

function emptyBlock(): PendingBlock {
  return {
    connections: [],
    open: null,
    totalSend: null,
    totalReceive: null,
    peak: null,
    cumulative: null,
    malformed: null,
    droppedConnections: 0,
    lines: 0
  }
}

function toWindowRates(outbound: ColumnRates, inbound: ColumnRates): WindowRates {
  return {
    short: { inbound: inbound[0], outbound: outbound[0] },
    medium: { inbound: inbound[1], outbound: outbound[1] },
    long: { inbound: inbound[2], outbound: outbound[2] }
  }
}

function combined(rates: DirectionRates): number {
  return rates.inbound + rates.outbound
}

function endpointKey(record: ConnectionRecord): string {
  return `${record.localEndpoint.address} ${record.remoteEndpoint.address}`
}

/** Descending short-window combined rate, ties by endpoint text */
export function compareConnections(a: ConnectionRecord, b: ConnectionRecord): number {
  const delta = combined(b.rates.short) - combined(a.rates.short)
  if (delta !== 0) return delta
  const ka = endpointKey(a)
  const kb = endpointKey(b)
  return ka < kb ? -1 : ka > kb ? 1 : 0
}

const ZERO_TRIPLE: TrafficTriple = Object.freeze({ sent: 0, received: 0, total: 0 })

/**
 * Turns the sampler's repeating text blocks into InterfaceSample values.
 *
 * Lines accumulate until the `====` terminator. A complete block becomes one
 * sample; a malformed or incomplete one is discarded whole, so the caller keeps
 * whatever it had before.
 */
export class SnapshotParser {
  private block: PendingBlock = emptyBlock()
  private readonly displayLimit: number
  private readonly hosts: HostLookup | undefined
  private readonly now: () => number

  constructor(
    private readonly interfaceId: string,
    options: SnapshotParserOptions
  ) {
    this.displayLimit = Math.max(0, Math.floor(options.displayLimit))
    this.hosts = options.hosts
    this.now = options.now ?? Date.now
  }

  /** Drop any partially accumulated block (sampler restart) */
  reset(): void {
    this.block = emptyBlock()
  }

  /** Feed one line; returns a sample or a discard notice when a block ends */
  push(line: string): ParseOutcome {
    const classified = classifyLine(line)
    const block = this.block

    switch (classified.kind) {
      case 'ignorable':
      case 'separator':
        return null

      case 'terminator':
        return this.finishBlock()

      case 'malformed':
        block.lines++
        block.malformed ??= classified.reason
        return null

      case 'send':
        block.lines++
        if (block.open) {
          block.malformed ??= `send line for ${classified.address} while ${block.open.address} awaits its receive line`
          return null
        }
        block.open = { address: classified.address, rates: classified.rates, cumulative: classified.cumulative }
        return null

      case 'receive': {
        block.lines++
        const open = block.open
        if (!open) {
          block.malformed ??= `receive line for ${classified.address} without a send line`
          return null
        }
        block.open = null
        if (!open.rates || open.cumulative === null || !classified.rates || classified.cumulative === null) {
          block.droppedConnections++
          return null
        }
        block.connections.push(this.buildConnection(
          { address: open.address, rates: open.rates, cumulative: open.cumulative },
          { address: classified.address, rates: classified.rates, cumulative: classified.cumulative }
        ))
        return null
      }

      case 'total-send':
        block.lines++
        block.totalSend = classified.rates
        return null

      case 'total-receive':
        block.lines++
        block.totalReceive = classified.rates
        return null

      case 'total-combined':
        block.lines++
        return null

      case 'peak':
        block.lines++
        block.peak = classified.values
        return null

      case 'cumulative':
        block.lines++
        block.cumulative = classified.values
        return null
    }
  }

  /** The `=>` half is the local side sending; the `<=` half is the remote side */
  private buildConnection(local: HalfReading, remote: HalfReading): ConnectionRecord {
    const localEndpoint = this.buildEndpoint(local.address)
    const remoteEndpoint = this.buildEndpoint(remote.address)

    const record: ConnectionRecord = {
      localEndpoint,
      remoteEndpoint,
      rates: toWindowRates(local.rates, remote.rates),
      cumulativeBytes: { inbound: remote.cumulative, outbound: local.cumulative }
    }
    const service = this.hosts?.serviceFor([localEndpoint.port, remoteEndpoint.port])
    if (service) record.service = service
    return record
  }

  private buildEndpoint(address: string): Endpoint {
    const { host, port } = splitAddress(address)
    const endpoint: Endpoint = { address, host, port }
    const label = this.hosts?.labelFor(host)
    if (label) endpoint.label = label
    return endpoint
  }

  private finishBlock(): ParseOutcome {
    const block = this.block
    this.block = emptyBlock()

    if (block.lines === 0) {
      return { type: 'discarded', reason: 'empty block' }
    }
    if (block.malformed) {
      return { type: 'discarded', reason: block.malformed }
    }
    if (block.open) {
      return { type: 'discarded', reason: `connection ${block.open.address} has no receive line` }
    }
    if (!block.totalSend || !block.totalReceive) {
      return { type: 'discarded', reason: 'block ended without send/receive totals' }
    }

    const topConnections = [...block.connections]
      .sort(compareConnections)
      .slice(0, this.displayLimit)

    const sample: InterfaceSample = {
      interfaceId: this.interfaceId,
      totalRates: toWindowRates(block.totalSend, block.totalReceive),
      topConnections: Object.freeze(topConnections),
      peakRates: block.peak ?? ZERO_TRIPLE,
      cumulativeBytes: block.cumulative ?? ZERO_TRIPLE,
      sampledAt: this.now()
    }
    return { type: 'sample', sample: Object.freeze(sample), droppedConnections: block.droppedConnections }
  }
}
