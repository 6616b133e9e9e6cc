import { WebSocket } from 'ws'

export type Topic = `chat:${string}` | `call:${string}` | `user:${string}`

export const chatTopic = (chatId: string): Topic => `chat:${chatId}`
export const callTopic = (callId: string): Topic => `call:${callId}`
export const userTopic = (userId: string): Topic => `user:${userId}`

export function isChatTopic(topic: Topic): boolean {
  return topic.startsWith('chat:')
}

/**
 * The write side of a client socket. The broker only ever talks to this,
 * so tests can stand a fake in for a real WebSocket.
 */
export interface Transport {
  readonly isOpen: boolean
  // Bytes queued but not yet flushed to the network
  readonly bufferedAmount: number
  send(data: string, onError: (err: Error) => void): void
  close(code: number, reason: string): void
  terminate(): void
}

export type ConnectionKind = 'chat' | 'call' | 'notifications'

/**
 * A live client connection. Holds identifiers only; which topics it is
 * subscribed to is tracked by the broker.
 */
export interface Connection {
  readonly id: string
  readonly userId: string
  readonly kind: ConnectionKind
  readonly transport: Transport
}

/**
 * Per-connection protocol state machine driven by the WebSocket server.
 */
export interface ConnectionHandler {
  readonly connection: Connection
  open(): Promise<boolean>
  receive(raw: string): Promise<void>
  close(): void
}

export class WebSocketTransport implements Transport {
  constructor(private ws: WebSocket) {}

  get isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN
  }

  get bufferedAmount(): number {
    return this.ws.bufferedAmount
  }

  send(data: string, onError: (err: Error) => void): void {
    this.ws.send(data, (err) => {
      if (err) onError(err)
    })
  }

  close(code: number, reason: string): void {
    if (this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED) return
    this.ws.close(code, reason)
  }

  terminate(): void {
    this.ws.terminate()
  }
}
