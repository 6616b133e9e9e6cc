import { z } from 'zod'
import {
  CallRecord,
  CallStatus,
  MessageRecord,
  ReactionRecord,
  ReceiptRecord,
  UserRecord,
  displayName,
} from '../store'

export const MAX_MESSAGE_LENGTH = 4096

// ============================================================================
// INBOUND FRAMES
// ============================================================================

const messageId = z.string().min(1)

const chatMessageFrame = z.object({
  type: z.literal('chat_message'),
  content: z
    .string()
    .max(MAX_MESSAGE_LENGTH)
    .refine((value) => value.trim().length > 0, 'content must not be blank'),
  reply_to: z.string().min(1).nullish(),
})

const typingFrame = z.object({
  type: z.literal('typing'),
  is_typing: z.boolean().default(false),
})

const readReceiptFrame = z.object({
  type: z.literal('read_receipt'),
  message_id: messageId,
})

const deliveryReceiptFrame = z.object({
  type: z.literal('delivery_receipt'),
  message_id: messageId,
})

const deleteMessageFrame = z.object({
  type: z.literal('delete_message'),
  message_id: messageId,
  delete_for_everyone: z.boolean().default(false),
})

const reactionFrame = z.object({
  type: z.literal('reaction'),
  message_id: messageId,
  emoji: z.string().min(1).max(16),
})

export const chatFrameSchema = z.discriminatedUnion('type', [
  chatMessageFrame,
  typingFrame,
  readReceiptFrame,
  deliveryReceiptFrame,
  deleteMessageFrame,
  reactionFrame,
])

export type ChatFrame = z.infer<typeof chatFrameSchema>
export type ChatFrameType = ChatFrame['type']

export const SIGNAL_TYPES = ['offer', 'answer', 'ice_candidate'] as const
export type SignalType = (typeof SIGNAL_TYPES)[number]

// SDP and ICE payloads are opaque to the relay
export const signalFrameSchema = z.object({
  type: z.enum(SIGNAL_TYPES),
  data: z.unknown(),
})

export type SignalFrame = z.infer<typeof signalFrameSchema>

export type DecodeResult<T> =
  | { kind: 'frame'; frame: T }
  | { kind: 'ignored'; type: string | null }
  | { kind: 'invalid'; type: string; issues: string }

/**
 * Frames that are not JSON, carry no string `type`, or carry a type this
 * endpoint does not handle are ignored. A known type with bad fields is
 * invalid. Neither closes the connection.
 */
function decodeFrame<T>(
  raw: string,
  knownTypes: readonly string[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): DecodeResult<T> {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return { kind: 'ignored', type: null }
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed) || typeof parsed.type !== 'string') {
    return { kind: 'ignored', type: null }
  }
  const type = parsed.type
  if (!knownTypes.includes(type)) {
    return { kind: 'ignored', type }
  }
  const result = schema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || type}: ${i.message}`).join('; ')
    return { kind: 'invalid', type, issues }
  }
  return { kind: 'frame', frame: result.data }
}

const CHAT_FRAME_TYPES: readonly string[] = chatFrameSchema.options.map((option) => option.shape.type.value)

export function decodeChatFrame(raw: string): DecodeResult<ChatFrame> {
  return decodeFrame(raw, CHAT_FRAME_TYPES, chatFrameSchema)
}

export function decodeSignalFrame(raw: string): DecodeResult<SignalFrame> {
  return decodeFrame(raw, SIGNAL_TYPES, signalFrameSchema)
}

// ============================================================================
// OUTBOUND EVENTS
// ============================================================================

export interface ChatMessageEvent {
  type: 'chat_message'
  message: {
    id: string
    chat_id: string
    sender_id: string
    sender_name: string
    content: string | null
    message_type: string
    reply_to: string | null
    rev: string
    created_at: string
  }
}

export interface TypingIndicatorEvent {
  type: 'typing_indicator'
  user_id: string
  user_name: string
  is_typing: boolean
}

export interface UserStatusEvent {
  type: 'user_status'
  user_id: string
  is_online: boolean
  last_seen?: string
}

export interface ReadReceiptEvent {
  type: 'read_receipt'
  message_id: string
  user_id: string
  read_at: string
}

export interface DeliveryReceiptEvent {
  type: 'delivery_receipt'
  message_id: string
  user_id: string
  delivered_at: string
}

export interface MessagesReadEvent {
  type: 'messages_read'
  chat_id: string
  user_id: string
  message_ids: string[]
  read_at: string
}

export interface MessageDeletedEvent {
  type: 'message_deleted'
  message_id: string
  delete_for_everyone: boolean
}

export type ReactionAction = 'added' | 'updated' | 'removed'

export interface MessageReactionEvent {
  type: 'message_reaction'
  message_id: string
  user_id: string
  emoji: string
  action: ReactionAction
}

export interface SignalEvent {
  type: SignalType
  user_id: string
  data: unknown
}

export interface UserLeftEvent {
  type: 'user_left'
  user_id: string
}

export interface CallStatusEvent {
  type: 'call_status'
  call_id: string
  status: CallStatus
  duration: number
  answered_at: string | null
  ended_at: string | null
}

export type NotificationKind = 'message' | 'call'

export interface NotificationEvent {
  type: 'notification'
  notification: {
    type: NotificationKind
    title: string
    body: string
    chat_id?: string
    message_id?: string
    call_id?: string
    created_at: string
  }
}

export interface ErrorEvent {
  type: 'error'
  // The inbound frame type that failed
  reference: string
  message: string
}

export type ServerEvent =
  | ChatMessageEvent
  | TypingIndicatorEvent
  | UserStatusEvent
  | ReadReceiptEvent
  | DeliveryReceiptEvent
  | MessagesReadEvent
  | MessageDeletedEvent
  | MessageReactionEvent
  | SignalEvent
  | UserLeftEvent
  | CallStatusEvent
  | NotificationEvent
  | ErrorEvent

// ============================================================================
// ENCODERS
// ============================================================================

export function encodeChatMessage(message: MessageRecord, sender: UserRecord): ChatMessageEvent {
  return {
    type: 'chat_message',
    message: {
      id: message.id,
      chat_id: message.chatId,
      sender_id: message.senderId,
      sender_name: displayName(sender),
      content: message.content,
      message_type: message.messageType,
      reply_to: message.replyTo,
      rev: message.rev,
      created_at: message.createdAt,
    },
  }
}

export function encodeTyping(user: UserRecord, isTyping: boolean): TypingIndicatorEvent {
  return { type: 'typing_indicator', user_id: user.id, user_name: displayName(user), is_typing: isTyping }
}

export function encodeUserStatus(userId: string, isOnline: boolean, lastSeen?: Date): UserStatusEvent {
  const event: UserStatusEvent = { type: 'user_status', user_id: userId, is_online: isOnline }
  if (lastSeen) event.last_seen = lastSeen.toISOString()
  return event
}

export function encodeReadReceipt(receipt: ReceiptRecord): ReadReceiptEvent | null {
  if (!receipt.readAt) return null
  return { type: 'read_receipt', message_id: receipt.messageId, user_id: receipt.userId, read_at: receipt.readAt }
}

export function encodeDeliveryReceipt(receipt: ReceiptRecord): DeliveryReceiptEvent | null {
  if (!receipt.deliveredAt) return null
  return {
    type: 'delivery_receipt',
    message_id: receipt.messageId,
    user_id: receipt.userId,
    delivered_at: receipt.deliveredAt,
  }
}

export function encodeMessagesRead(chatId: string, userId: string, messageIds: string[], at: Date): MessagesReadEvent {
  return { type: 'messages_read', chat_id: chatId, user_id: userId, message_ids: messageIds, read_at: at.toISOString() }
}

export function encodeMessageDeleted(messageId: string, deleteForEveryone: boolean): MessageDeletedEvent {
  return { type: 'message_deleted', message_id: messageId, delete_for_everyone: deleteForEveryone }
}

export function encodeReaction(reaction: Pick<ReactionRecord, 'messageId' | 'userId' | 'emoji'>, action: ReactionAction): MessageReactionEvent {
  return {
    type: 'message_reaction',
    message_id: reaction.messageId,
    user_id: reaction.userId,
    emoji: reaction.emoji,
    action,
  }
}

export function encodeSignal(frame: SignalFrame, userId: string): SignalEvent {
  return { type: frame.type, user_id: userId, data: frame.data }
}

export function encodeUserLeft(userId: string): UserLeftEvent {
  return { type: 'user_left', user_id: userId }
}

export function encodeCallStatus(call: CallRecord): CallStatusEvent {
  return {
    type: 'call_status',
    call_id: call.id,
    status: call.status,
    duration: call.duration,
    answered_at: call.answeredAt,
    ended_at: call.endedAt,
  }
}

export function encodeNotification(notification: NotificationEvent['notification']): NotificationEvent {
  return { type: 'notification', notification }
}

export function encodeError(reference: string, message: string): ErrorEvent {
  return { type: 'error', reference, message }
}
