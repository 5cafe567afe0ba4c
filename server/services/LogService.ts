import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import type { LogEntry, LogLevel, LogSource } from '../../src/types/log'

const DEFAULT_MAX_ENTRIES = 5000

/** Scope used for entries that belong to no interface or client */
export const SYSTEM_SCOPE = 'system'

const SOURCE_TAGS: Record<LogSource, string> = {
  sampler: 'Sampler',
  parser: 'Parser',
  client: 'Client',
  server: 'Server',
  system: 'System'
}

/**
 * LogService: central event-based log aggregator for sampler and client activity.
 *
 * Stores log entries per scope in memory (FIFO with configurable max) and echoes
 * each stored entry to the console as `[Source] scope: message`.
 * Emits 'entry' events with (scope, LogEntry).
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private debugMode: boolean
  private readonly echo: boolean

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES, debugMode: boolean = false, echo: boolean = true) {
    super()
    this.maxEntries = maxEntries
    this.debugMode = debugMode
    this.echo = echo
  }

  /** Set the maximum number of log entries per scope */
  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  /** Enable or disable debug-level log entries */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  /** Add a log entry for a scope */
  log(
    scope: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = {
      id: randomUUID(),
      timestamp: Date.now(),
      level,
      source,
      message,
      details,
      scope
    }

    // Debug entries are returned to the caller but neither stored nor emitted
    if (level === 'debug' && !this.debugMode) {
      return entry
    }

    let scopeEntries = this.entries.get(scope)
    if (!scopeEntries) {
      scopeEntries = []
      this.entries.set(scope, scopeEntries)
    }

    scopeEntries.push(entry)

    while (scopeEntries.length > this.maxEntries) {
      scopeEntries.shift()
    }

    if (this.echo) this.writeConsole(entry)
    this.emit('entry', scope, entry)
    return entry
  }

  /** Get all log entries for a scope */
  getEntries(scope: string): LogEntry[] {
    return this.entries.get(scope) ?? []
  }

  /** Clear all log entries for a scope */
  clearEntries(scope: string): void {
    this.entries.delete(scope)
  }

  /** Export log entries as formatted text */
  exportLog(scope: string): string {
    const entries = this.getEntries(scope)
    return entries
      .map((e) => {
        const ts = new Date(e.timestamp).toISOString()
        const level = e.level.toUpperCase().padEnd(7)
        const src = e.source.toUpperCase().padEnd(7)
        const detail = e.details ? `\n  ${e.details}` : ''
        return `[${ts}] [${level}] [${src}] ${e.message}${detail}`
      })
      .join('\n')
  }

  private writeConsole(entry: LogEntry): void {
    const line = `[${SOURCE_TAGS[entry.source]}] ${entry.scope}: ${entry.message}`
    const args = entry.details ? [line, `\n  ${entry.details}`] : [line]
    switch (entry.level) {
      case 'error':
        console.error(...args)
        break
      case 'warning':
        console.warn(...args)
        break
      case 'debug':
        console.debug(...args)
        break
      default:
        console.log(...args)
    }
  }

  // ── Static helper methods for common log messages ──

  static samplerStarted(log: LogService, interfaceId: string, pid: number | undefined): void {
    log.log(interfaceId, 'info', 'sampler', `Sampler started (pid ${pid ?? 'unknown'}).`)
  }

  static samplerExited(log: LogService, interfaceId: string, reason: string, stderrTail?: string): void {
    log.log(interfaceId, 'error', 'sampler', `Sampler exited: ${reason}`, stderrTail)
  }

  static samplerMisconfigured(log: LogService, interfaceId: string, reason: string): void {
    log.log(interfaceId, 'error', 'sampler', `Interface cannot be sampled: ${reason}`)
  }

  static restartScheduled(log: LogService, interfaceId: string, delayMs: number, attempt: number): void {
    const seconds = (delayMs / 1000).toFixed(1)
    log.log(interfaceId, 'info', 'sampler', `Restart ${attempt} scheduled in ${seconds} second(s).`)
  }

  static restartsExhausted(log: LogService, interfaceId: string, failures: number): void {
    log.log(interfaceId, 'error', 'sampler', `Giving up after ${failures} consecutive failures.`)
  }

  static samplerRecovered(log: LogService, interfaceId: string): void {
    log.log(interfaceId, 'success', 'sampler', 'Sampler is producing data.')
  }

  static blockDiscarded(log: LogService, interfaceId: string, reason: string): void {
    log.log(interfaceId, 'warning', 'parser', `Snapshot discarded: ${reason}`)
  }

  static clientConnected(log: LogService, sessionId: string, remoteAddress: string): void {
    log.log(sessionId, 'info', 'client', `Client connected from ${remoteAddress}.`)
  }

  static clientDisconnected(log: LogService, sessionId: string, reason: string): void {
    log.log(sessionId, 'info', 'client', `Client disconnected: ${reason}`)
  }

  static queueOverflow(log: LogService, sessionId: string, dropped: number): void {
    log.log(sessionId, 'debug', 'client', `Client is behind, ${dropped} stale frame(s) dropped so far.`)
  }
}

/** Singleton LogService instance */
let logServiceInstance: LogService | null = null

/** Get (or create) the singleton LogService */
export function getLogService(): LogService {
  if (!logServiceInstance) {
    logServiceInstance = new LogService()
  }
  return logServiceInstance
}
