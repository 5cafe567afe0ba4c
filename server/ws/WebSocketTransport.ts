import { WebSocket, type RawData } from 'ws'
import type { MessageTransport } from '../services/ClientSession'

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  return Buffer.from(data).toString('utf-8')
}

/** Adapts a `ws` socket to the session transport */
export class WebSocketTransport implements MessageTransport {
  constructor(
    private readonly socket: WebSocket,
    readonly remoteAddress: string
  ) {}

  send(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new Error('socket is not open'))
        return
      }
      this.socket.send(data, (err?: Error) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  close(code: number, reason: string): void {
    if (this.socket.readyState === WebSocket.CLOSED || this.socket.readyState === WebSocket.CLOSING) return
    // Close reasons are limited to 123 bytes
    this.socket.close(code, reason.slice(0, 120))
  }

  onMessage(listener: (data: string) => void): void {
    this.socket.on('message', (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        listener('')
        return
      }
      listener(rawToString(data))
    })
  }

  onClose(listener: (reason: string) => void): void {
    this.socket.on('close', (code: number, reason: Buffer) => {
      listener(reason.length > 0 ? reason.toString('utf-8') : `closed with code ${code}`)
    })
    this.socket.on('error', (err: Error) => listener(`socket error: ${err.message}`))
  }
}
