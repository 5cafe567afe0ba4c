/** Severity level for a log entry */
export type LogLevel = 'info' | 'warning' | 'error' | 'success' | 'debug'

/** Source subsystem that generated the log entry */
export type LogSource = 'sampler' | 'parser' | 'client' | 'server' | 'system'

/** A single activity log entry */
export interface LogEntry {
  id: string
  timestamp: number              // Unix ms
  level: LogLevel
  source: LogSource
  message: string
  details?: string               // Expandable details (e.g., stderr tail)
  scope: string                  // Interface id, client session id or 'system'
}
