import type { InterfaceSample, InterfaceState, SamplerStatus } from './traffic'

/** Sent once on connect, before any incremental message */
export interface FullStateMessage {
  type: 'full_state'
  interfaces: InterfaceState[]
  serverTime: number
}

/** Sent on every new valid sample */
export interface InterfaceUpdateMessage {
  type: 'interface_update'
  interfaceId: string
  sample: InterfaceSample
}

/** Sent when a sampler changes lifecycle state */
export interface InterfaceStatusMessage {
  type: 'interface_status'
  interfaceId: string
  status: SamplerStatus
  consecutiveFailures: number
  error?: string
}

export interface PongMessage {
  type: 'pong'
  serverTime: number
}

export interface ErrorMessage {
  type: 'error'
  message: string
}

export type ServerMessage =
  | FullStateMessage
  | InterfaceUpdateMessage
  | InterfaceStatusMessage
  | PongMessage
  | ErrorMessage

/** Narrow incremental updates to a set of interfaces */
export interface SubscribeMessage {
  type: 'subscribe'
  interfaces: string[]
}

export interface PingMessage {
  type: 'ping'
}

export type ClientMessage = SubscribeMessage | PingMessage
