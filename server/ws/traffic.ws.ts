import type { Server, IncomingMessage } from 'http'
import { WebSocketServer, type WebSocket } from 'ws'
import { acceptClient, type AcceptClientDeps } from '../services/ClientSession'
import { WebSocketTransport } from './WebSocketTransport'

export interface TrafficSocketOptions extends AcceptClientDeps {
  path: string
}

/**
 * Register the traffic WebSocket endpoint on an HTTP server.
 *
 * Server → client: full_state, interface_update, interface_status, pong, error
 * Client → server: subscribe, ping
 */
export function registerTrafficSocket(server: Server, options: TrafficSocketOptions): WebSocketServer {
  const { path, ...deps } = options
  const wss = new WebSocketServer({ server, path })

  wss.on('connection', (socket: WebSocket, req: IncomingMessage) => {
    const remote = req.socket.remoteAddress ?? 'unknown'
    acceptClient(new WebSocketTransport(socket, remote), deps)
  })

  wss.on('error', (err: Error) => {
    deps.log.log('system', 'error', 'server', 'WebSocket server error', err.message)
  })

  return wss
}

/** Close the WebSocket server; resolves once it has stopped accepting */
export function closeTrafficSocket(wss: WebSocketServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    wss.close((err?: Error) => {
      if (err) reject(err)
      else resolve()
    })
  })
}
