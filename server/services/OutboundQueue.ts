export type PushResult = 'queued' | 'replaced' | 'closed'

export interface PushOptions {
  /** Never evicted or coalesced */
  pinned?: boolean
  /** Items sharing a key carry the same state; only the newest is kept */
  key?: string
}

interface QueuedItem<T> {
  value: T
  pinned: boolean
  key?: string
}

/**
 * Bounded single-consumer queue with latest-state-wins coalescing.
 *
 * A keyed item supersedes any pending item with the same key, so at most one
 * item per key is waiting and the newest one is never dropped. When the queue
 * is full, the oldest unpinned item without a key is evicted to make room.
 * Pinned items are never evicted.
 */
export class OutboundQueue<T> {
  private items: QueuedItem<T>[] = []
  private waiter: ((value: T | null) => void) | null = null
  private _closed = false
  private _dropped = 0
  readonly capacity: number

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity))
  }

  get length(): number {
    return this.items.length
  }

  /** Items superseded or evicted so far */
  get dropped(): number {
    return this._dropped
  }

  get closed(): boolean {
    return this._closed
  }

  /** Enqueue without ever blocking the producer */
  push(value: T, options: PushOptions = {}): PushResult {
    if (this._closed) return 'closed'

    if (this.waiter) {
      const resolve = this.waiter
      this.waiter = null
      resolve(value)
      return 'queued'
    }

    const pinned = options.pinned ?? false
    const key = pinned ? undefined : options.key
    let result: PushResult = 'queued'

    if (key !== undefined) {
      const stale = this.items.findIndex((item) => item.key === key)
      if (stale >= 0) {
        this.items.splice(stale, 1)
        this._dropped++
        result = 'replaced'
      }
    }

    if (result === 'queued' && this.items.length >= this.capacity) {
      const victim = this.items.findIndex((item) => !item.pinned && item.key === undefined)
      if (victim >= 0) {
        this.items.splice(victim, 1)
        this._dropped++
        result = 'replaced'
      }
    }

    this.items.push(key === undefined ? { value, pinned } : { value, pinned, key })
    return result
  }

  /** Wait for the next item; resolves null once the queue is closed */
  next(): Promise<T | null> {
    const head = this.items.shift()
    if (head) return Promise.resolve(head.value)
    if (this._closed) return Promise.resolve(null)

    return new Promise<T | null>((resolve) => {
      this.waiter = resolve
    })
  }

  /** Close the queue, discarding pending items and releasing a waiting consumer */
  close(): void {
    if (this._closed) return
    this._closed = true
    this.items = []
    if (this.waiter) {
      const resolve = this.waiter
      this.waiter = null
      resolve(null)
    }
  }
}
