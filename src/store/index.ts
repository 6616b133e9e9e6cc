/**
 * Durable store contract consumed by the realtime core.
 *
 * The relay never touches tables directly; everything it persists or reads
 * goes through ChatStore. KyselyChatStore (./sqlite) is the SQLite-backed
 * implementation.
 */

export const RECEIPT_STATUSES = ['sent', 'delivered', 'read'] as const
export type ReceiptStatus = (typeof RECEIPT_STATUSES)[number]

export const CALL_STATUSES = [
  'initiated',
  'ringing',
  'ongoing',
  'ended',
  'missed',
  'declined',
  'failed',
] as const
export type CallStatus = (typeof CALL_STATUSES)[number]

export const CALL_TYPES = ['voice', 'video'] as const
export type CallType = (typeof CALL_TYPES)[number]

export const TOMBSTONE_CONTENT = 'This message was deleted'

export interface UserRecord {
  id: string
  username: string
  firstName: string
  lastName: string
  isOnline: boolean
  lastSeenAt: string
}

export interface ChatRecord {
  id: string
  chatType: string
  name: string | null
  createdBy: string | null
  createdAt: string
  updatedAt: string
}

export interface MessageRecord {
  id: string
  chatId: string
  senderId: string
  messageType: string
  content: string | null
  replyTo: string | null
  rev: string
  isDeleted: boolean
  deletedForEveryone: boolean
  createdAt: string
}

export interface ReceiptRecord {
  messageId: string
  userId: string
  status: ReceiptStatus
  deliveredAt: string | null
  readAt: string | null
}

export interface ReactionRecord {
  messageId: string
  userId: string
  emoji: string
  createdAt: string
}

export interface CallRecord {
  id: string
  callerId: string
  receiverId: string
  callType: CallType
  status: CallStatus
  startedAt: string
  answeredAt: string | null
  endedAt: string | null
  duration: number
}

export interface NewMessage {
  chatId: string
  senderId: string
  messageType: string
  content: string
  replyTo: string | null
  createdAt: Date
}

export interface CreatedMessage {
  message: MessageRecord
  // Participants a `sent` receipt was created for
  recipientIds: string[]
}

export interface CallUpdate {
  status: CallStatus
  answeredAt: string | null
  endedAt: string | null
  duration: number
}

export interface StoreCounts {
  users: number
  chats: number
  messages: number
  calls: number
}

export interface ChatStore {
  getUser(userId: string): Promise<UserRecord | undefined>
  setUserOnline(userId: string, isOnline: boolean, at: Date): Promise<void>

  getChat(chatId: string): Promise<ChatRecord | undefined>
  isParticipant(chatId: string, userId: string): Promise<boolean>
  listParticipants(chatId: string): Promise<string[]>

  /** Message plus one `sent` receipt per other participant, atomically. */
  createMessage(input: NewMessage): Promise<CreatedMessage>
  getMessage(messageId: string): Promise<MessageRecord | undefined>
  listMessages(
    chatId: string,
    userId: string,
    opts: { beforeMessageId?: string; limit: number }
  ): Promise<MessageRecord[]>
  /** Sets content to the tombstone. False when already deleted for everyone. */
  tombstoneMessage(messageId: string): Promise<boolean>
  markDeletedForUser(messageId: string, userId: string, at: Date): Promise<void>

  getReceipt(messageId: string, userId: string): Promise<ReceiptRecord | undefined>
  /** Moves the receipt to `status` only if it is currently in one of `from`. */
  updateReceipt(
    messageId: string,
    userId: string,
    status: ReceiptStatus,
    at: Date,
    from: readonly ReceiptStatus[]
  ): Promise<boolean>
  /** Returns the ids of the messages whose receipts moved to `read`. */
  bulkMarkRead(chatId: string, userId: string, at: Date, beforeMessageId?: string): Promise<string[]>

  getReaction(messageId: string, userId: string): Promise<ReactionRecord | undefined>
  upsertReaction(messageId: string, userId: string, emoji: string, at: Date): Promise<void>
  deleteReaction(messageId: string, userId: string): Promise<void>

  createCall(input: { callerId: string; receiverId: string; callType: CallType; startedAt: Date }): Promise<CallRecord>
  getCall(callId: string): Promise<CallRecord | undefined>
  /** Compare-and-set on status; false when the call moved on meanwhile. */
  updateCall(callId: string, expected: CallStatus, update: CallUpdate): Promise<boolean>
  listCalls(userId: string, limit: number): Promise<CallRecord[]>

  counts(): Promise<StoreCounts>
}

export function isReceiptStatus(value: string): value is ReceiptStatus {
  return (RECEIPT_STATUSES as readonly string[]).includes(value)
}

export function isCallStatus(value: string): value is CallStatus {
  return (CALL_STATUSES as readonly string[]).includes(value)
}

export function isCallType(value: string): value is CallType {
  return (CALL_TYPES as readonly string[]).includes(value)
}

export function displayName(user: Pick<UserRecord, 'firstName' | 'lastName' | 'username'>): string {
  const full = `${user.firstName} ${user.lastName}`.trim()
  return full || user.username
}
