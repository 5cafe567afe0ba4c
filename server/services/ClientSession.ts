import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import { OutboundQueue, type PushOptions, type PushResult } from './OutboundQueue'
import { LogService } from './LogService'
import type { InterfaceStateStore } from './InterfaceStateStore'
import type { Broadcaster } from './Broadcaster'
import { parseClientMessage, serializeMessage } from '../utils/protocol'
import type { ServerMessage } from '../../src/types/protocol'

/** WebSocket close codes used by the server */
export const CLOSE_NORMAL = 1000
export const CLOSE_GOING_AWAY = 1001
export const CLOSE_INTERNAL_ERROR = 1011

/**
 * Message-oriented connection to one client.
 * `send` resolves once the frame has been handed to the network.
 */
export interface MessageTransport {
  readonly remoteAddress: string
  send(data: string): Promise<void>
  close(code: number, reason: string): void
  onMessage(listener: (data: string) => void): void
  onClose(listener: (reason: string) => void): void
}

export interface ClientSessionOptions {
  queueCapacity: number
  log: LogService
}

/**
 * One connected display client.
 *
 * Outbound messages go through a bounded queue drained by a single write loop,
 * so frames reach the client in enqueue order and a slow socket only delays
 * itself.
 *
 * Events:
 *   'close' → (session, reason)
 */
export class ClientSession extends EventEmitter {
  readonly id: string = randomUUID()
  readonly connectedAt: number = Date.now()
  readonly queue: OutboundQueue<string>
  readonly closed: Promise<void>

  private transport: MessageTransport
  private log: LogService
  private subscription: Set<string> | null = null
  private loop: Promise<void> | null = null
  private closing = false
  private resolveClosed: () => void = () => {}

  constructor(transport: MessageTransport, options: ClientSessionOptions) {
    super()
    this.transport = transport
    this.log = options.log
    this.queue = new OutboundQueue<string>(options.queueCapacity)
    this.closed = new Promise<void>((resolve) => {
      this.resolveClosed = resolve
    })

    transport.onMessage((data) => this.handleIncoming(data))
    transport.onClose((reason) => this.close(reason || 'client closed the connection'))
  }

  get remoteAddress(): string {
    return this.transport.remoteAddress
  }

  get isClosing(): boolean {
    return this.closing
  }

  /** Whether incremental messages for this interface should be delivered */
  wants(interfaceId: string): boolean {
    return this.subscription === null || this.subscription.has(interfaceId)
  }

  /** Queue an already-serialized frame */
  enqueue(frame: string, options: PushOptions = {}): PushResult {
    const result = this.queue.push(frame, options)
    if (result === 'replaced') {
      LogService.queueOverflow(this.log, this.id, this.queue.dropped)
    }
    return result
  }

  send(message: ServerMessage): PushResult {
    return this.enqueue(serializeMessage(message))
  }

  /** Start draining the queue to the transport */
  start(): void {
    if (this.loop || this.closing) return
    this.loop = this.writeLoop().catch((err: unknown) => {
      this.log.log(this.id, 'error', 'client', 'Write loop failed', describe(err))
      this.close('internal error', CLOSE_INTERNAL_ERROR)
    })
  }

  /** Tear the session down. Safe to call more than once; `closed` resolves when the write loop has stopped. */
  close(reason: string, code: number = CLOSE_NORMAL): void {
    if (this.closing) return
    this.closing = true

    this.queue.close()
    this.transport.close(code, reason)
    LogService.clientDisconnected(this.log, this.id, reason)
    this.emit('close', this, reason)
    this.log.clearEntries(this.id)

    const loop = this.loop ?? Promise.resolve()
    void loop.finally(() => this.resolveClosed())
  }

  private async writeLoop(): Promise<void> {
    for (;;) {
      const frame = await this.queue.next()
      if (frame === null) return

      try {
        await this.transport.send(frame)
      } catch (err: unknown) {
        this.close(`delivery failed: ${describe(err)}`, CLOSE_INTERNAL_ERROR)
        return
      }
    }
  }

  private handleIncoming(data: string): void {
    if (this.closing) return

    const parsed = parseClientMessage(data)
    if (!parsed.ok) {
      this.send({ type: 'error', message: parsed.error })
      return
    }

    const message = parsed.message
    switch (message.type) {
      case 'ping':
        this.send({ type: 'pong', serverTime: Date.now() })
        break
      case 'subscribe':
        this.subscription = new Set(message.interfaces)
        this.log.log(this.id, 'debug', 'client', `Subscribed to ${message.interfaces.join(', ') || 'nothing'}`)
        break
    }
  }
}

export interface AcceptClientDeps {
  store: InterfaceStateStore
  broadcaster: Broadcaster
  log: LogService
  queueCapacity: number
}

/**
 * Bring a freshly connected client up to date and into the broadcast.
 *
 * The full state is queued (pinned) and the session registered in the same
 * tick, so no update can be delivered before it and none can be missed.
 */
export function acceptClient(transport: MessageTransport, deps: AcceptClientDeps): ClientSession {
  const session = new ClientSession(transport, { queueCapacity: deps.queueCapacity, log: deps.log })
  LogService.clientConnected(deps.log, session.id, transport.remoteAddress)

  session.enqueue(
    serializeMessage({ type: 'full_state', interfaces: deps.store.snapshotAll(), serverTime: Date.now() }),
    { pinned: true }
  )
  deps.broadcaster.register(session)
  session.start()
  return session
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
