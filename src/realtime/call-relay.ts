import { AppContext } from '../config'
import { logDebug, logError, logWarn } from '../logger'
import { captureRealtimeError, toReportable } from '../monitoring'
import { isCallParticipant } from './calls'
import { Connection, ConnectionHandler, Topic, callTopic } from './connection'
import { decodeSignalFrame, encodeSignal, encodeUserLeft } from './protocol'

/**
 * `/ws/call/:callId`: relays WebRTC signaling between the two parties.
 * Payloads are forwarded untouched to everyone on the call topic except the
 * sender. Relaying needs no store writes, so there is no per-frame queue.
 */
export class CallConnectionHandler implements ConnectionHandler {
  readonly topic: Topic
  private state: 'connecting' | 'active' | 'closed' = 'connecting'
  // Frames that arrive during the membership check wait for it
  private opening: Promise<boolean> = Promise.resolve(false)

  constructor(
    private ctx: AppContext,
    readonly connection: Connection,
    readonly callId: string
  ) {
    this.topic = callTopic(callId)
  }

  get currentState(): 'connecting' | 'active' | 'closed' {
    return this.state
  }

  open(): Promise<boolean> {
    this.opening = this.authorize()
    return this.opening
  }

  private async authorize(): Promise<boolean> {
    const { userId } = this.connection
    let allowed: boolean
    try {
      const call = await this.ctx.store.getCall(this.callId)
      allowed = call !== undefined && isCallParticipant(call, userId)
    } catch (error) {
      logError(`[Calls] Lookup of ${this.callId} failed for ${userId}`, error)
      captureRealtimeError(toReportable(error), { operation: 'connect', userId, callId: this.callId })
      this.reject(1011, 'Internal error')
      return false
    }

    if (this.state === 'closed') return false
    if (!allowed) {
      logWarn(`[Calls] ${userId} is not a party to ${this.callId}`)
      this.reject(4003, 'Forbidden')
      return false
    }

    this.ctx.broker.subscribe(this.topic, this.connection)
    this.ctx.sessions.register(this.connection)
    this.state = 'active'
    logDebug(`[Calls] ${userId} joined ${this.callId}`)
    return true
  }

  async receive(raw: string): Promise<void> {
    await this.opening
    if (this.state !== 'active') return
    const decoded = decodeSignalFrame(raw)
    switch (decoded.kind) {
      case 'frame':
        this.ctx.broker.publish(this.topic, encodeSignal(decoded.frame, this.connection.userId), {
          exclude: this.connection.id,
        })
        return
      case 'ignored':
        logDebug(`[Calls] Ignoring frame of type ${decoded.type ?? '(none)'} on ${this.callId}`)
        return
      case 'invalid':
        logWarn(`[Calls] Dropping invalid ${decoded.type} on ${this.callId}: ${decoded.issues}`)
        return
    }
  }

  close(): void {
    if (this.state === 'closed') return
    const wasActive = this.state === 'active'
    this.state = 'closed'
    if (!wasActive) {
      this.ctx.broker.detach(this.connection.id)
      return
    }
    this.ctx.sessions.unregister(this.connection)
    this.ctx.broker.detach(this.connection.id)
    this.ctx.broker.publish(this.topic, encodeUserLeft(this.connection.userId))
    logDebug(`[Calls] ${this.connection.userId} left ${this.callId}`)
  }

  private reject(code: number, reason: string): void {
    this.state = 'closed'
    this.connection.transport.close(code, reason)
  }
}
