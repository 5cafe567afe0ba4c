import { EventEmitter } from 'events'

/** Restart policy for a supervised subprocess. Delays are in seconds. */
export interface RestartPolicy {
  initialDelay: number            // Delay after the first failure. Default: 1
  maxDelay: number                // Maximum delay cap. Default: 30
  backoffMultiplier: number       // Multiply delay by this each failure. Default: 2
  maxConsecutiveFailures: number  // Give up after this many in a row (0 = never). Default: 8
  jitter: boolean                 // ±20% randomness. Default: false
}

/** State of the restart backoff */
type RestartState = 'idle' | 'waiting' | 'exhausted'

/**
 * RestartBackoff: exponential backoff between subprocess restarts.
 *
 * Events:
 *   'waiting'   → (ownerId, delayMs, failureCount, nextAttemptAt)
 *   'attempt'   → (ownerId, failureCount)
 *   'exhausted' → (ownerId, failureCount)
 */
export class RestartBackoff extends EventEmitter {
  private readonly policy: RestartPolicy
  private failures: number = 0
  private timer: ReturnType<typeof setTimeout> | null = null
  private state: RestartState = 'idle'
  private _nextAttemptAt: number | null = null

  constructor(
    readonly ownerId: string,
    policy: RestartPolicy
  ) {
    super()
    this.policy = policy
  }

  /** Failures since the last success */
  get consecutiveFailures(): number {
    return this.failures
  }

  get nextAttemptAt(): number | null {
    return this._nextAttemptAt
  }

  /**
   * Delay (ms) before the restart that follows the given failure.
   * Failure n waits initialDelay * (multiplier ^ (n - 1)), capped at maxDelay.
   */
  delayFor(failureCount: number): number {
    const n = Math.max(1, failureCount)
    const baseDelay = this.policy.initialDelay * Math.pow(this.policy.backoffMultiplier, n - 1)
    const capped = Math.min(baseDelay, this.policy.maxDelay)

    if (this.policy.jitter) {
      const jitterRange = capped * 0.2
      return (capped + (Math.random() * jitterRange * 2 - jitterRange)) * 1000
    }
    return capped * 1000
  }

  /** Record a failure and schedule the next attempt, or give up */
  onFailure(): void {
    if (this.state === 'exhausted') return

    this.clearTimer()
    this.failures++

    const limit = this.policy.maxConsecutiveFailures
    if (limit > 0 && this.failures >= limit) {
      this.state = 'exhausted'
      this._nextAttemptAt = null
      this.emit('exhausted', this.ownerId, this.failures)
      return
    }

    const delayMs = this.delayFor(this.failures)
    this.state = 'waiting'
    this._nextAttemptAt = Date.now() + delayMs
    this.emit('waiting', this.ownerId, delayMs, this.failures, this._nextAttemptAt)

    this.timer = setTimeout(() => {
      this.timer = null
      this.state = 'idle'
      this._nextAttemptAt = null
      this.emit('attempt', this.ownerId, this.failures)
    }, delayMs)
  }

  /** The subprocess proved healthy, reset the failure streak */
  onSuccess(): void {
    if (this.state === 'exhausted') return
    this.failures = 0
  }

  /** Cancel any pending attempt (shutdown) */
  cancel(): void {
    this.clearTimer()
    if (this.state === 'waiting') this.state = 'idle'
    this._nextAttemptAt = null
  }

  /** Forget everything, including exhaustion (manual restart) */
  reset(): void {
    this.clearTimer()
    this.state = 'idle'
    this._nextAttemptAt = null
    this.failures = 0
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
  }
}
