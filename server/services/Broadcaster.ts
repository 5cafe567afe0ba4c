import type { InterfaceStateStore } from './InterfaceStateStore'
import { CLOSE_GOING_AWAY, type ClientSession } from './ClientSession'
import type { LogService } from './LogService'
import { serializeMessage } from '../utils/protocol'
import type { InterfaceSample, InterfaceState } from '../../src/types/traffic'

/**
 * Broadcaster: registry of connected clients and fan-out of store changes.
 *
 * Each change is serialized once and offered to every session's own queue.
 * Offering never waits on a socket, so one slow client cannot hold back the
 * store or the other clients. Frames carry a `type:interface` key, so a
 * backed-up queue keeps the newest update and status of every interface.
 */
export class Broadcaster {
  private sessions = new Map<string, ClientSession>()
  private store: InterfaceStateStore
  private log: LogService

  private readonly onChange = (interfaceId: string, sample: InterfaceSample): void => {
    const frame = serializeMessage({ type: 'interface_update', interfaceId, sample })
    this.broadcast(interfaceId, frame, `interface_update:${interfaceId}`)
  }

  private readonly onStatus = (interfaceId: string, state: InterfaceState): void => {
    const frame = serializeMessage({
      type: 'interface_status',
      interfaceId,
      status: state.status,
      consecutiveFailures: state.consecutiveFailures,
      ...(state.error ? { error: state.error } : {})
    })
    this.broadcast(interfaceId, frame, `interface_status:${interfaceId}`)
  }

  constructor(store: InterfaceStateStore, log: LogService) {
    this.store = store
    this.log = log
    store.on('change', this.onChange)
    store.on('status', this.onStatus)
  }

  get size(): number {
    return this.sessions.size
  }

  /** Registered sessions (copy) */
  list(): ClientSession[] {
    return Array.from(this.sessions.values())
  }

  register(session: ClientSession): boolean {
    if (session.isClosing || this.sessions.has(session.id)) return false

    this.sessions.set(session.id, session)
    session.once('close', () => this.unregister(session.id))
    return true
  }

  unregister(sessionId: string): boolean {
    return this.sessions.delete(sessionId)
  }

  /**
   * Offer a serialized frame to every session interested in the interface.
   * Returns the number of sessions it was queued for.
   */
  broadcast(interfaceId: string, frame: string, key?: string): number {
    let delivered = 0
    for (const session of this.list()) {
      if (!session.wants(interfaceId)) continue
      try {
        if (session.enqueue(frame, { key }) === 'closed') {
          this.unregister(session.id)
          continue
        }
        delivered++
      } catch (err: unknown) {
        this.log.log(session.id, 'error', 'client', 'Dropping client after enqueue failure', String(err))
        this.unregister(session.id)
        session.close('enqueue failed')
      }
    }
    return delivered
  }

  /** Close every session and wait for their write loops to stop */
  async closeAll(reason: string = 'server shutting down'): Promise<void> {
    const sessions = this.list()
    for (const session of sessions) {
      session.close(reason, CLOSE_GOING_AWAY)
    }
    await Promise.all(sessions.map((s) => s.closed))
  }

  /** Stop listening to the store */
  dispose(): void {
    this.store.off('change', this.onChange)
    this.store.off('status', this.onStatus)
  }
}
