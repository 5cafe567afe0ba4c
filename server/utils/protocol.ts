import type { ClientMessage, ServerMessage } from '../../src/types/protocol'

/** Serialize a server message for the wire */
export function serializeMessage(message: ServerMessage): string {
  return JSON.stringify(message)
}

export type ParsedClientMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; error: string }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Validate an incoming client frame */
export function parseClientMessage(raw: string): ParsedClientMessage {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch {
    return { ok: false, error: 'Message is not valid JSON' }
  }

  if (!isRecord(data) || typeof data.type !== 'string') {
    return { ok: false, error: 'Message must be an object with a "type" field' }
  }

  switch (data.type) {
    case 'ping':
      return { ok: true, message: { type: 'ping' } }

    case 'subscribe': {
      const interfaces = data.interfaces
      if (!Array.isArray(interfaces) || !interfaces.every((i): i is string => typeof i === 'string')) {
        return { ok: false, error: '"subscribe" needs an "interfaces" array of strings' }
      }
      return { ok: true, message: { type: 'subscribe', interfaces } }
    }

    default:
      return { ok: false, error: `Unknown message type "${data.type}"` }
  }
}
