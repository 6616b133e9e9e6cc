import { CallTransitionError } from '../errors'
import { logDebug } from '../logger'
import { CallRecord, CallStatus, CallType, ChatStore, UserRecord, displayName } from '../store'
import { TopicBroker } from './broker'
import { callTopic, userTopic } from './connection'
import { notifyUser } from './notifications'
import { encodeCallStatus } from './protocol'
import { Clock } from './session-registry'

const TRANSITIONS: Record<CallStatus, readonly CallStatus[]> = {
  initiated: ['ringing', 'ongoing', 'ended', 'missed', 'declined', 'failed'],
  ringing: ['ongoing', 'ended', 'missed', 'declined', 'failed'],
  ongoing: ['ended'],
  ended: [],
  missed: [],
  declined: [],
  failed: [],
}

export function canTransition(from: CallStatus, to: CallStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isTerminal(status: CallStatus): boolean {
  return TRANSITIONS[status].length === 0
}

/**
 * Applies a status change to a call. `ongoing` stamps answeredAt; terminal
 * states stamp endedAt, and `ended` works out the talk time in whole seconds
 * (0 when the call was never answered).
 */
export function transitionCall(call: CallRecord, target: CallStatus, now: Date): CallRecord {
  if (!canTransition(call.status, target)) {
    throw new CallTransitionError(call.status, target)
  }
  const at = now.toISOString()

  switch (target) {
    case 'ongoing':
      return { ...call, status: target, answeredAt: at }
    case 'ended': {
      const duration = call.answeredAt
        ? Math.max(0, Math.round((now.getTime() - Date.parse(call.answeredAt)) / 1000))
        : 0
      return { ...call, status: target, endedAt: at, duration }
    }
    case 'missed':
    case 'declined':
    case 'failed':
      return { ...call, status: target, endedAt: at, duration: 0 }
    default:
      return { ...call, status: target }
  }
}

export type CallUpdateResult =
  | { kind: 'updated'; call: CallRecord }
  | { kind: 'not_found' }
  | { kind: 'forbidden' }
  | { kind: 'conflict'; error: CallTransitionError }

export function isCallParticipant(call: CallRecord, userId: string): boolean {
  return call.callerId === userId || call.receiverId === userId
}

/**
 * Call lifecycle: creation, status changes and the events that go with them.
 * Signaling itself is relayed by CallConnectionHandler.
 */
export class CallService {
  constructor(
    private store: ChatStore,
    private broker: TopicBroker,
    private clock: Clock
  ) {}

  async initiate(caller: UserRecord, receiverId: string, callType: CallType): Promise<CallRecord> {
    const now = this.clock()
    const call = await this.store.createCall({ callerId: caller.id, receiverId, callType, startedAt: now })
    notifyUser(this.broker, receiverId, {
      type: 'call',
      title: displayName(caller),
      body: `Incoming ${callType} call`,
      call_id: call.id,
      created_at: now.toISOString(),
    })
    logDebug(`[Calls] ${call.id} initiated ${caller.id} -> ${receiverId}`)
    return call
  }

  async updateStatus(callId: string, userId: string, target: CallStatus): Promise<CallUpdateResult> {
    const call = await this.store.getCall(callId)
    if (!call) return { kind: 'not_found' }
    if (!isCallParticipant(call, userId)) return { kind: 'forbidden' }

    let next: CallRecord
    try {
      next = transitionCall(call, target, this.clock())
    } catch (error) {
      if (error instanceof CallTransitionError) return { kind: 'conflict', error }
      throw error
    }

    const { status, answeredAt, endedAt, duration } = next
    const applied = await this.store.updateCall(callId, call.status, { status, answeredAt, endedAt, duration })
    if (!applied) {
      // Someone else moved the call first
      const current = await this.store.getCall(callId)
      return { kind: 'conflict', error: new CallTransitionError(current?.status ?? call.status, target) }
    }

    const event = encodeCallStatus(next)
    this.broker.publish(callTopic(callId), event)
    this.broker.publish(userTopic(next.callerId), event)
    this.broker.publish(userTopic(next.receiverId), event)
    logDebug(`[Calls] ${callId} ${call.status} -> ${status}`)
    return { kind: 'updated', call: next }
  }

  listCalls(userId: string, limit: number): Promise<CallRecord[]> {
    return this.store.listCalls(userId, limit)
  }
}
