import type { IncomingMessage, ServerResponse } from 'http'
import type { InterfaceStateStore } from '../services/InterfaceStateStore'
import type { Broadcaster } from '../services/Broadcaster'
import type { LogService } from '../services/LogService'
import type { TrafficMonitor } from '../services/TrafficMonitor'

export interface StatusRouteDeps {
  store: InterfaceStateStore
  broadcaster: Broadcaster
  monitor: TrafficMonitor
  log: LogService
}

function sendJson(res: ServerResponse, payload: unknown, status = 200): void {
  const body = JSON.stringify(payload)
  res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' })
  res.end(body)
}

function sendText(res: ServerResponse, body: string, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' })
  res.end(body)
}

/**
 * Plain HTTP routes served next to the WebSocket endpoint.
 *
 *   GET /status  → { interfaces: InterfaceState[], samplers: PipelineStats[], clients }
 *   GET /healthz → { ok: true }
 *   GET /logs/<scope> → exported log text for an interface, session or `system`
 */
export function createStatusHandler(deps: StatusRouteDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname

    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendJson(res, { error: 'Method not allowed' }, 405)
      return
    }

    switch (pathname) {
      case '/status':
        sendJson(res, {
          interfaces: deps.store.snapshotAll(),
          samplers: deps.monitor.stats(),
          clients: deps.broadcaster.size
        })
        return
      case '/healthz':
        sendJson(res, { ok: true })
        return
      default:
        if (pathname.startsWith('/logs/')) {
          let scope: string
          try {
            scope = decodeURIComponent(pathname.slice('/logs/'.length))
          } catch {
            sendJson(res, { error: 'Bad log scope' }, 400)
            return
          }
          sendText(res, deps.log.exportLog(scope))
          return
        }
        sendJson(res, { error: 'Not found' }, 404)
    }
  }
}
