import { EventEmitter } from 'events'
import { spawn } from 'child_process'
import { createInterface } from 'readline'
import type { Readable } from 'stream'
import { RestartBackoff, type RestartPolicy } from './RestartBackoff'
import { LogService } from './LogService'
import { hasNetworkInterface, isPrivileged } from '../utils/platform'
import type { SamplerStatus } from '../../src/types/traffic'

/** The parts of a child process the supervisor relies on */
export interface SamplerChild {
  readonly pid?: number
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals): boolean
  once(event: 'spawn', listener: () => void): this
  once(event: 'error', listener: (err: Error) => void): this
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this
}

/** Host facilities used by the supervisor; replaced in tests */
export interface SamplerHost {
  spawn(command: string, args: string[]): SamplerChild
  isPrivileged(): boolean
  interfaceExists(interfaceId: string): boolean
}

export const nodeSamplerHost: SamplerHost = {
  spawn: (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] }),
  isPrivileged,
  interfaceExists: hasNetworkInterface
}

export interface SamplerOptions {
  command: string
  args: string[]
  requirePrivilege: boolean
  requireInterfacePresent: boolean
  /** Grace period between SIGTERM and SIGKILL on stop */
  stopTimeoutMs: number
  restart: RestartPolicy
}

/**
 * Arguments for iftop text mode on one interface:
 * -t text output, -P show ports, -N numeric ports, -n no DNS lookups, -L lines per block.
 */
export function buildSamplerArgs(interfaceId: string, displayLimit: number, extra: readonly string[] = []): string[] {
  return ['-i', interfaceId, '-t', '-P', '-N', '-n', '-L', String(displayLimit), ...extra]
}

/**
 * SamplerProcess: keeps one sampling subprocess running for one interface.
 *
 * stdout is split into lines and re-emitted. When the child goes away it is
 * restarted with exponential backoff until too many consecutive failures,
 * after which the interface is marked failed for good.
 *
 * Events:
 *   'line'      → (line)                       one stdout line of the current child
 *   'reset'     → ()                           the child is gone; drop partial output
 *   'status'    → (status, failures, error?)   lifecycle change
 */
export class SamplerProcess extends EventEmitter {
  private child: SamplerChild | null = null
  private generation = 0
  private stopping = false
  private _status: SamplerStatus = 'stopped'
  private lastError: string | undefined
  private lastStderr = ''
  private exitWaiters: Array<() => void> = []
  private readonly backoff: RestartBackoff

  constructor(
    readonly interfaceId: string,
    private readonly options: SamplerOptions,
    private readonly log: LogService,
    private readonly host: SamplerHost = nodeSamplerHost
  ) {
    super()
    this.backoff = new RestartBackoff(interfaceId, options.restart)

    this.backoff.on('waiting', (_id: string, delayMs: number, failures: number) => {
      LogService.restartScheduled(this.log, this.interfaceId, delayMs, failures)
      this.setStatus('restarting', this.lastError)
    })
    this.backoff.on('attempt', () => {
      if (!this.stopping) this.launch()
    })
    this.backoff.on('exhausted', (_id: string, failures: number) => {
      LogService.restartsExhausted(this.log, this.interfaceId, failures)
      this.setStatus('failed', this.lastError)
    })
  }

  get status(): SamplerStatus {
    return this._status
  }

  get consecutiveFailures(): number {
    return this.backoff.consecutiveFailures
  }

  get pid(): number | undefined {
    return this.child?.pid
  }

  /** Epoch ms of the pending restart, null when none is scheduled */
  get nextRestartAt(): number | null {
    return this.backoff.nextAttemptAt
  }

  /**
   * Check preconditions and launch the subprocess.
   * Returns false when the interface cannot be sampled at all.
   */
  start(): boolean {
    if (this.child) return true

    const problem = this.preflight()
    if (problem) {
      this.lastError = problem
      LogService.samplerMisconfigured(this.log, this.interfaceId, problem)
      this.setStatus('misconfigured', problem)
      return false
    }

    this.stopping = false
    this.backoff.reset()
    this.lastError = undefined
    this.launch()
    return true
  }

  /** The child produced a valid snapshot: clear the failure streak */
  markHealthy(): void {
    if (this._status === 'running') return
    const recovered = this.backoff.consecutiveFailures > 0
    this.backoff.onSuccess()
    this.lastError = undefined
    this.setStatus('running')
    if (recovered) LogService.samplerRecovered(this.log, this.interfaceId)
  }

  /** Terminate the child (SIGTERM, then SIGKILL after the grace period) and wait for it */
  async stop(): Promise<void> {
    this.stopping = true
    this.backoff.cancel()

    const child = this.child
    if (!child) {
      if (this._status !== 'misconfigured' && this._status !== 'failed') this.setStatus('stopped')
      return
    }

    const exited = new Promise<void>((resolve) => this.exitWaiters.push(resolve))
    child.kill('SIGTERM')
    const killTimer = setTimeout(() => {
      this.log.log(this.interfaceId, 'warning', 'sampler', 'Sampler ignored SIGTERM, sending SIGKILL.')
      child.kill('SIGKILL')
    }, this.options.stopTimeoutMs)

    try {
      await exited
    } finally {
      clearTimeout(killTimer)
    }
  }

  // ── Private ──

  private preflight(): string | null {
    if (this.options.requirePrivilege && !this.host.isPrivileged()) {
      return 'raw socket access requires root privileges'
    }
    if (this.options.requireInterfacePresent && !this.host.interfaceExists(this.interfaceId)) {
      return `no such network interface "${this.interfaceId}"`
    }
    return null
  }

  private launch(): void {
    this.setStatus('starting', this.lastError)
    this.lastStderr = ''

    let child: SamplerChild
    try {
      child = this.host.spawn(this.options.command, this.options.args)
    } catch (err: unknown) {
      this.handleGone(`failed to start: ${describe(err)}`)
      return
    }

    const gen = ++this.generation
    this.child = child

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout, crlfDelay: Infinity })
      lines.on('line', (line) => {
        if (gen === this.generation) this.emit('line', line)
      })
    }

    if (child.stderr) {
      const errLines = createInterface({ input: child.stderr, crlfDelay: Infinity })
      errLines.on('line', (line) => {
        if (gen !== this.generation || !line.trim()) return
        this.lastStderr = line.trim()
        this.log.log(this.interfaceId, 'debug', 'sampler', line.trim())
      })
    }

    child.once('spawn', () => LogService.samplerStarted(this.log, this.interfaceId, child.pid))
    child.once('error', (err) => {
      if (gen === this.generation) this.handleGone(`failed to start: ${err.message}`)
    })
    child.once('close', (code, signal) => {
      if (gen === this.generation) this.handleGone(signal ? `killed by ${signal}` : `exit code ${code}`)
    })
  }

  /** The current child has exited or could not be started */
  private handleGone(reason: string): void {
    // Invalidate late output from the old child
    this.generation++
    this.child = null

    const waiters = this.exitWaiters
    this.exitWaiters = []
    for (const resolve of waiters) resolve()

    if (this.stopping) {
      this.setStatus('stopped')
      return
    }

    this.emit('reset')
    this.lastError = this.lastStderr ? `${reason}: ${this.lastStderr}` : reason
    LogService.samplerExited(this.log, this.interfaceId, reason, this.lastStderr || undefined)
    this.backoff.onFailure()
  }

  private setStatus(status: SamplerStatus, error?: string): void {
    this._status = status
    this.emit('status', status, this.backoff.consecutiveFailures, error)
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
