import { AppContext } from '../config'
import { StoreError } from '../errors'
import { logDebug, logError, logWarn } from '../logger'
import { captureRealtimeError, toReportable } from '../monitoring'
import { MessageRecord, UserRecord, displayName } from '../store'
import { Connection, ConnectionHandler, Topic, chatTopic } from './connection'
import { notifyUser } from './notifications'
import {
  ChatFrame,
  ChatFrameType,
  ReactionAction,
  decodeChatFrame,
  encodeChatMessage,
  encodeDeliveryReceipt,
  encodeError,
  encodeMessageDeleted,
  encodeReaction,
  encodeReadReceipt,
  encodeTyping,
  encodeUserStatus,
} from './protocol'

export type ChatConnectionState = 'connecting' | 'authorized' | 'active' | 'closed'

type FrameOf<T extends ChatFrameType> = Extract<ChatFrame, { type: T }>

const NOTIFICATION_PREVIEW_LENGTH = 100

export function withinDeleteWindow(createdAt: string, now: Date, windowMs: number): boolean {
  return now.getTime() - Date.parse(createdAt) <= windowMs
}

/**
 * One WebSocket connection to `/ws/chat/:chatId`.
 *
 *   connecting -> authorized -> active -> closed
 *
 * Frames are processed one at a time in arrival order; anything that
 * arrives before the membership check finishes waits for it. Once closed,
 * queued frames are skipped. Writes that already committed stay.
 */
export class ChatConnectionHandler implements ConnectionHandler {
  readonly topic: Topic
  private state: ChatConnectionState = 'connecting'
  private queue: Promise<void> = Promise.resolve()
  private user: UserRecord | null = null

  constructor(
    private ctx: AppContext,
    readonly connection: Connection,
    readonly chatId: string
  ) {
    this.topic = chatTopic(chatId)
  }

  get currentState(): ChatConnectionState {
    return this.state
  }

  open(): Promise<boolean> {
    const opening = this.authorize()
    this.queue = opening.then(() => undefined)
    return opening
  }

  receive(raw: string): Promise<void> {
    const next = this.queue
      .then(() => this.process(raw))
      .catch((error: unknown) => logError(`[Chat] Frame from ${this.connection.userId} not processed`, error))
    this.queue = next
    return next
  }

  close(): void {
    if (this.state === 'closed') return
    const wasActive = this.state === 'active'
    this.state = 'closed'
    // Registry first: the offline status must not go to this connection
    if (wasActive) this.ctx.sessions.unregister(this.connection)
    this.ctx.broker.detach(this.connection.id)
    logDebug(`[Chat] ${this.connection.userId} left ${this.chatId}`)
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  private async authorize(): Promise<boolean> {
    const { store } = this.ctx
    const { userId } = this.connection

    let user: UserRecord | undefined
    let participants: string[]
    try {
      const chat = await store.getChat(this.chatId)
      user = await store.getUser(userId)
      participants = chat ? await store.listParticipants(this.chatId) : []
    } catch (error) {
      logError(`[Chat] Membership check failed for ${userId} in ${this.chatId}`, error)
      captureRealtimeError(toReportable(error), { operation: 'connect', userId, chatId: this.chatId })
      this.reject(1011, 'Internal error')
      return false
    }

    // Transport went away while we were checking
    if (this.state === 'closed') return false

    if (!user || !participants.includes(userId)) {
      logWarn(`[Chat] ${userId} is not a participant of ${this.chatId}`)
      this.reject(4003, 'Forbidden')
      return false
    }

    this.user = user
    this.state = 'authorized'
    this.activate(participants)
    return true
  }

  private activate(participants: string[]): void {
    const { broker, sessions } = this.ctx
    broker.subscribe(this.topic, this.connection)
    sessions.register(this.connection)
    this.state = 'active'

    // Presence snapshot for this connection only
    for (const participantId of participants) {
      if (participantId === this.connection.userId || !sessions.isOnline(participantId)) continue
      broker.send(this.connection.id, encodeUserStatus(participantId, true))
    }
    logDebug(`[Chat] ${this.connection.userId} joined ${this.chatId}`)
  }

  private reject(code: number, reason: string): void {
    this.state = 'closed'
    this.ctx.broker.detach(this.connection.id)
    this.connection.transport.close(code, reason)
  }

  // ==========================================================================
  // INBOUND FRAMES
  // ==========================================================================

  private async process(raw: string): Promise<void> {
    if (this.state !== 'active') return

    const decoded = decodeChatFrame(raw)
    if (decoded.kind === 'ignored') {
      logDebug(`[Chat] Ignoring frame of type ${decoded.type ?? '(none)'} from ${this.connection.userId}`)
      return
    }
    if (decoded.kind === 'invalid') {
      logWarn(`[Chat] Dropping invalid ${decoded.type} from ${this.connection.userId}: ${decoded.issues}`)
      return
    }

    try {
      await this.dispatch(decoded.frame)
    } catch (error) {
      this.fail(decoded.frame.type, error)
    }
  }

  private async dispatch(frame: ChatFrame): Promise<void> {
    switch (frame.type) {
      case 'chat_message':
        return this.handleChatMessage(frame)
      case 'typing':
        return this.handleTyping(frame)
      case 'read_receipt':
        return this.handleReadReceipt(frame)
      case 'delivery_receipt':
        return this.handleDeliveryReceipt(frame)
      case 'delete_message':
        return this.handleDeleteMessage(frame)
      case 'reaction':
        return this.handleReaction(frame)
      default: {
        const unreachable: never = frame
        throw new Error(`Unhandled frame ${JSON.stringify(unreachable)}`)
      }
    }
  }

  private async handleChatMessage(frame: FrameOf<'chat_message'>): Promise<void> {
    const { store, broker } = this.ctx
    const sender = this.requireUser()
    const now = this.ctx.clock()

    let replyTo: string | null = null
    if (frame.reply_to) {
      const target = await store.getMessage(frame.reply_to)
      replyTo = target && target.chatId === this.chatId ? target.id : null
    }

    const { message, recipientIds } = await store.createMessage({
      chatId: this.chatId,
      senderId: sender.id,
      messageType: 'text',
      content: frame.content,
      replyTo,
      createdAt: now,
    })

    broker.publish(this.topic, encodeChatMessage(message, sender))
    for (const recipientId of recipientIds) {
      notifyUser(broker, recipientId, {
        type: 'message',
        title: displayName(sender),
        body: preview(frame.content),
        chat_id: this.chatId,
        message_id: message.id,
        created_at: message.createdAt,
      })
    }
  }

  private async handleTyping(frame: FrameOf<'typing'>): Promise<void> {
    const user = this.requireUser()
    this.ctx.broker.publish(this.topic, encodeTyping(user, frame.is_typing), { exclude: this.connection.id })
  }

  private async handleReadReceipt(frame: FrameOf<'read_receipt'>): Promise<void> {
    if (!(await this.findMessage(frame.message_id))) return
    const receipt = await this.ctx.delivery.markRead(frame.message_id, this.connection.userId, this.ctx.clock())
    const event = receipt && encodeReadReceipt(receipt)
    if (event) this.ctx.broker.publish(this.topic, event)
  }

  private async handleDeliveryReceipt(frame: FrameOf<'delivery_receipt'>): Promise<void> {
    if (!(await this.findMessage(frame.message_id))) return
    const receipt = await this.ctx.delivery.markDelivered(frame.message_id, this.connection.userId, this.ctx.clock())
    const event = receipt && encodeDeliveryReceipt(receipt)
    if (event) this.ctx.broker.publish(this.topic, event)
  }

  private async handleDeleteMessage(frame: FrameOf<'delete_message'>): Promise<void> {
    const { store, broker, cfg } = this.ctx
    const { userId } = this.connection
    const message = await this.findMessage(frame.message_id)
    if (!message) return
    if (message.senderId !== userId) {
      logDebug(`[Chat] ${userId} may not delete ${message.id}`)
      return
    }

    const now = this.ctx.clock()
    if (frame.delete_for_everyone) {
      if (!withinDeleteWindow(message.createdAt, now, cfg.deleteWindowMs)) {
        logDebug(`[Chat] Delete window passed for ${message.id}`)
        return
      }
      if (!(await store.tombstoneMessage(message.id))) return
    } else {
      await store.markDeletedForUser(message.id, userId, now)
    }
    broker.publish(this.topic, encodeMessageDeleted(message.id, frame.delete_for_everyone))
  }

  private async handleReaction(frame: FrameOf<'reaction'>): Promise<void> {
    const { store, broker } = this.ctx
    const { userId } = this.connection
    const message = await this.findMessage(frame.message_id)
    if (!message || message.deletedForEveryone) return

    const existing = await store.getReaction(message.id, userId)
    let action: ReactionAction
    if (!existing) {
      await store.upsertReaction(message.id, userId, frame.emoji, this.ctx.clock())
      action = 'added'
    } else if (existing.emoji === frame.emoji) {
      await store.deleteReaction(message.id, userId)
      action = 'removed'
    } else {
      await store.upsertReaction(message.id, userId, frame.emoji, this.ctx.clock())
      action = 'updated'
    }
    broker.publish(this.topic, encodeReaction({ messageId: message.id, userId, emoji: frame.emoji }, action))
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /** The message, if it exists and belongs to this chat. */
  private async findMessage(messageId: string): Promise<MessageRecord | null> {
    const message = await this.ctx.store.getMessage(messageId)
    if (!message || message.chatId !== this.chatId) {
      logDebug(`[Chat] No message ${messageId} in ${this.chatId}`)
      return null
    }
    return message
  }

  private requireUser(): UserRecord {
    if (!this.user) throw new Error(`Connection ${this.connection.id} has no authorized user`)
    return this.user
  }

  private fail(reference: ChatFrameType, error: unknown): void {
    const { userId } = this.connection
    logError(`[Chat] ${reference} from ${userId} in ${this.chatId} failed`, error)
    captureRealtimeError(toReportable(error), {
      operation: reference === 'typing' ? 'other' : reference,
      userId,
      chatId: this.chatId,
    })
    const message = error instanceof StoreError ? 'Temporarily unable to save, please retry' : 'Internal error'
    this.ctx.broker.send(this.connection.id, encodeError(reference, message))
  }
}

// Cut on code points so a surrogate pair is never split
export function preview(content: string): string {
  const chars = Array.from(content)
  return chars.length > NOTIFICATION_PREVIEW_LENGTH
    ? `${chars.slice(0, NOTIFICATION_PREVIEW_LENGTH).join('')}...`
    : content
}
