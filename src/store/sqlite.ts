import { Updateable } from 'kysely'
import { v4 as uuidv4 } from 'uuid'
import { Database } from '../db'
import {
  Call,
  Message,
  MessageReaction,
  MessageReceipt,
  User,
} from '../db/schema'
import { StoreError } from '../errors'
import { logWarn } from '../logger'
import {
  CallRecord,
  CallStatus,
  CallType,
  CallUpdate,
  ChatRecord,
  ChatStore,
  CreatedMessage,
  MessageRecord,
  NewMessage,
  ReactionRecord,
  ReceiptRecord,
  ReceiptStatus,
  StoreCounts,
  TOMBSTONE_CONTENT,
  UserRecord,
  isCallStatus,
  isCallType,
  isReceiptStatus,
} from './index'
import { generateRev } from './rev'

// SQLite reports these while another writer holds the lock
const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED'])

function isTransient(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    TRANSIENT_CODES.has(error.code)
  )
}

// Five bound values per receipt row
const RECEIPT_INSERT_BATCH = 1000

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size))
  }
  return batches
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function toUser(row: User): UserRecord {
  return {
    id: row.id,
    username: row.username,
    firstName: row.firstName,
    lastName: row.lastName,
    isOnline: row.isOnline === 1,
    lastSeenAt: row.lastSeenAt,
  }
}

function toMessage(row: Message): MessageRecord {
  return {
    id: row.id,
    chatId: row.chatId,
    senderId: row.senderId,
    messageType: row.messageType,
    content: row.content,
    replyTo: row.replyTo,
    rev: row.rev,
    isDeleted: row.isDeleted === 1,
    deletedForEveryone: row.deletedForEveryone === 1,
    createdAt: row.createdAt,
  }
}

function toReceipt(row: MessageReceipt): ReceiptRecord {
  const { status } = row
  if (!isReceiptStatus(status)) {
    throw new Error(`Unknown receipt status ${status}`)
  }
  return { ...row, status }
}

function toReaction(row: MessageReaction): ReactionRecord {
  return { ...row }
}

function toCall(row: Call): CallRecord {
  const { status, callType } = row
  if (!isCallStatus(status)) {
    throw new Error(`Unknown call status ${status}`)
  }
  if (!isCallType(callType)) {
    throw new Error(`Unknown call type ${callType}`)
  }
  return { ...row, status, callType }
}

export interface KyselyChatStoreOptions {
  retryAttempts?: number
  retryDelayMs?: number
}

export class KyselyChatStore implements ChatStore {
  private retryAttempts: number
  private retryDelayMs: number

  constructor(private db: Database, opts: KyselyChatStoreOptions = {}) {
    this.retryAttempts = Math.max(1, opts.retryAttempts ?? 3)
    this.retryDelayMs = opts.retryDelayMs ?? 25
  }

  /**
   * Runs a store operation, retrying lock contention with linear backoff.
   * Every failure leaves as a StoreError.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown
    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        return await fn()
      } catch (error) {
        if (!isTransient(error)) {
          throw new StoreError(operation, error)
        }
        lastError = error
        logWarn(`[Store] ${operation} busy (attempt ${attempt}/${this.retryAttempts})`)
        await sleep(this.retryDelayMs * attempt)
      }
    }
    throw new StoreError(operation, lastError)
  }

  // ============================================
  // USERS
  // ============================================

  async getUser(userId: string): Promise<UserRecord | undefined> {
    const row = await this.run('getUser', () =>
      this.db.selectFrom('user').selectAll().where('id', '=', userId).executeTakeFirst()
    )
    return row ? toUser(row) : undefined
  }

  async setUserOnline(userId: string, isOnline: boolean, at: Date): Promise<void> {
    await this.run('setUserOnline', () =>
      this.db
        .updateTable('user')
        .set({ isOnline: isOnline ? 1 : 0, lastSeenAt: at.toISOString() })
        .where('id', '=', userId)
        .execute()
    )
  }

  // ============================================
  // CHATS
  // ============================================

  async getChat(chatId: string): Promise<ChatRecord | undefined> {
    return this.run('getChat', () =>
      this.db.selectFrom('chat').selectAll().where('id', '=', chatId).executeTakeFirst()
    )
  }

  async isParticipant(chatId: string, userId: string): Promise<boolean> {
    const row = await this.run('isParticipant', () =>
      this.db
        .selectFrom('chat_participant')
        .select('userId')
        .where('chatId', '=', chatId)
        .where('userId', '=', userId)
        .executeTakeFirst()
    )
    return row !== undefined
  }

  async listParticipants(chatId: string): Promise<string[]> {
    const rows = await this.run('listParticipants', () =>
      this.db
        .selectFrom('chat_participant')
        .select('userId')
        .where('chatId', '=', chatId)
        .orderBy('joinedAt', 'asc')
        .execute()
    )
    return rows.map((r) => r.userId)
  }

  // ============================================
  // MESSAGES
  // ============================================

  async createMessage(input: NewMessage): Promise<CreatedMessage> {
    return this.run('createMessage', () =>
      this.db.transaction().execute(async (trx) => {
        const participants = await trx
          .selectFrom('chat_participant')
          .select('userId')
          .where('chatId', '=', input.chatId)
          .execute()
        const recipientIds = participants
          .map((p) => p.userId)
          .filter((userId) => userId !== input.senderId)

        const row: Message = {
          id: uuidv4(),
          chatId: input.chatId,
          senderId: input.senderId,
          messageType: input.messageType,
          content: input.content,
          replyTo: input.replyTo,
          rev: generateRev(input.createdAt.getTime()),
          isDeleted: 0,
          deletedForEveryone: 0,
          createdAt: input.createdAt.toISOString(),
        }
        await trx.insertInto('message').values(row).execute()

        // Multi-row inserts, chunked under SQLite's bound-variable limit
        for (const batch of chunk(recipientIds, RECEIPT_INSERT_BATCH)) {
          await trx
            .insertInto('message_receipt')
            .values(
              batch.map((userId) => ({
                messageId: row.id,
                userId,
                status: 'sent',
                deliveredAt: null,
                readAt: null,
              }))
            )
            .execute()
        }

        await trx
          .updateTable('chat')
          .set({ updatedAt: row.createdAt })
          .where('id', '=', input.chatId)
          .execute()

        return { message: toMessage(row), recipientIds }
      })
    )
  }

  async getMessage(messageId: string): Promise<MessageRecord | undefined> {
    const row = await this.run('getMessage', () =>
      this.db.selectFrom('message').selectAll().where('id', '=', messageId).executeTakeFirst()
    )
    return row ? toMessage(row) : undefined
  }

  async listMessages(
    chatId: string,
    userId: string,
    opts: { beforeMessageId?: string; limit: number }
  ): Promise<MessageRecord[]> {
    const rows = await this.run('listMessages', async () => {
      let query = this.db
        .selectFrom('message')
        .selectAll()
        .where('chatId', '=', chatId)
        .where('deletedForEveryone', '=', 0)
        .where(
          'id',
          'not in',
          this.db.selectFrom('deleted_message').select('messageId').where('userId', '=', userId)
        )

      if (opts.beforeMessageId) {
        const before = await this.db
          .selectFrom('message')
          .select('rev')
          .where('id', '=', opts.beforeMessageId)
          .executeTakeFirst()
        if (!before) return []
        query = query.where('rev', '<', before.rev)
      }

      return query.orderBy('rev', 'desc').limit(opts.limit).execute()
    })
    // Pages are fetched newest first, returned oldest first
    return rows.map(toMessage).reverse()
  }

  async tombstoneMessage(messageId: string): Promise<boolean> {
    const result = await this.run('tombstoneMessage', () =>
      this.db
        .updateTable('message')
        .set({ content: TOMBSTONE_CONTENT, isDeleted: 1, deletedForEveryone: 1 })
        .where('id', '=', messageId)
        .where('deletedForEveryone', '=', 0)
        .executeTakeFirst()
    )
    return Number(result.numUpdatedRows) > 0
  }

  async markDeletedForUser(messageId: string, userId: string, at: Date): Promise<void> {
    await this.run('markDeletedForUser', () =>
      this.db
        .insertInto('deleted_message')
        .values({ messageId, userId, deletedAt: at.toISOString() })
        .onConflict((oc) => oc.columns(['messageId', 'userId']).doNothing())
        .execute()
    )
  }

  // ============================================
  // RECEIPTS
  // ============================================

  async getReceipt(messageId: string, userId: string): Promise<ReceiptRecord | undefined> {
    const row = await this.run('getReceipt', () =>
      this.db
        .selectFrom('message_receipt')
        .selectAll()
        .where('messageId', '=', messageId)
        .where('userId', '=', userId)
        .executeTakeFirst()
    )
    return row ? toReceipt(row) : undefined
  }

  async updateReceipt(
    messageId: string,
    userId: string,
    status: ReceiptStatus,
    at: Date,
    from: readonly ReceiptStatus[]
  ): Promise<boolean> {
    if (from.length === 0) return false
    const ts = at.toISOString()
    const update: Updateable<MessageReceipt> = { status }
    if (status === 'delivered') update.deliveredAt = ts
    if (status === 'read') update.readAt = ts

    const result = await this.run('updateReceipt', () =>
      this.db
        .updateTable('message_receipt')
        .set(update)
        .where('messageId', '=', messageId)
        .where('userId', '=', userId)
        .where('status', 'in', [...from])
        .executeTakeFirst()
    )
    return Number(result.numUpdatedRows) > 0
  }

  async bulkMarkRead(
    chatId: string,
    userId: string,
    at: Date,
    beforeMessageId?: string
  ): Promise<string[]> {
    return this.run('bulkMarkRead', () =>
      this.db.transaction().execute(async (trx) => {
        let beforeRev: string | undefined
        if (beforeMessageId) {
          const before = await trx
            .selectFrom('message')
            .select('rev')
            .where('id', '=', beforeMessageId)
            .where('chatId', '=', chatId)
            .executeTakeFirst()
          if (!before) return []
          beforeRev = before.rev
        }

        // Candidate messages stay a subquery: a large backlog must not become bound parameters
        let candidates = trx
          .selectFrom('message')
          .select('message.id')
          .where('message.chatId', '=', chatId)
          .where('message.senderId', '!=', userId)
        if (beforeRev) {
          candidates = candidates.where('message.rev', '<=', beforeRev)
        }

        const rows = await trx
          .selectFrom('message_receipt')
          .innerJoin('message', 'message.id', 'message_receipt.messageId')
          .select('message_receipt.messageId')
          .where('message_receipt.userId', '=', userId)
          .where('message_receipt.status', 'in', ['sent', 'delivered'])
          .where('message_receipt.messageId', 'in', candidates)
          .orderBy('message.rev', 'asc')
          .execute()
        const messageIds = rows.map((r) => r.messageId)
        if (messageIds.length === 0) return messageIds

        await trx
          .updateTable('message_receipt')
          .set({ status: 'read', readAt: at.toISOString() })
          .where('userId', '=', userId)
          .where('status', 'in', ['sent', 'delivered'])
          .where('messageId', 'in', candidates)
          .execute()

        await trx
          .updateTable('chat_participant')
          .set({ lastReadMessageId: messageIds[messageIds.length - 1] })
          .where('chatId', '=', chatId)
          .where('userId', '=', userId)
          .execute()

        return messageIds
      })
    )
  }

  // ============================================
  // REACTIONS
  // ============================================

  async getReaction(messageId: string, userId: string): Promise<ReactionRecord | undefined> {
    const row = await this.run('getReaction', () =>
      this.db
        .selectFrom('message_reaction')
        .selectAll()
        .where('messageId', '=', messageId)
        .where('userId', '=', userId)
        .executeTakeFirst()
    )
    return row ? toReaction(row) : undefined
  }

  async upsertReaction(messageId: string, userId: string, emoji: string, at: Date): Promise<void> {
    const createdAt = at.toISOString()
    await this.run('upsertReaction', () =>
      this.db
        .insertInto('message_reaction')
        .values({ messageId, userId, emoji, createdAt })
        .onConflict((oc) => oc.columns(['messageId', 'userId']).doUpdateSet({ emoji, createdAt }))
        .execute()
    )
  }

  async deleteReaction(messageId: string, userId: string): Promise<void> {
    await this.run('deleteReaction', () =>
      this.db
        .deleteFrom('message_reaction')
        .where('messageId', '=', messageId)
        .where('userId', '=', userId)
        .execute()
    )
  }

  // ============================================
  // CALLS
  // ============================================

  async createCall(input: {
    callerId: string
    receiverId: string
    callType: CallType
    startedAt: Date
  }): Promise<CallRecord> {
    const row: Call = {
      id: uuidv4(),
      callerId: input.callerId,
      receiverId: input.receiverId,
      callType: input.callType,
      status: 'initiated',
      startedAt: input.startedAt.toISOString(),
      answeredAt: null,
      endedAt: null,
      duration: 0,
    }
    await this.run('createCall', () => this.db.insertInto('call').values(row).execute())
    return toCall(row)
  }

  async getCall(callId: string): Promise<CallRecord | undefined> {
    const row = await this.run('getCall', () =>
      this.db.selectFrom('call').selectAll().where('id', '=', callId).executeTakeFirst()
    )
    return row ? toCall(row) : undefined
  }

  async updateCall(callId: string, expected: CallStatus, update: CallUpdate): Promise<boolean> {
    const result = await this.run('updateCall', () =>
      this.db
        .updateTable('call')
        .set(update)
        .where('id', '=', callId)
        .where('status', '=', expected)
        .executeTakeFirst()
    )
    return Number(result.numUpdatedRows) > 0
  }

  async listCalls(userId: string, limit: number): Promise<CallRecord[]> {
    const rows = await this.run('listCalls', () =>
      this.db
        .selectFrom('call')
        .selectAll()
        .where((eb) => eb.or([eb('callerId', '=', userId), eb('receiverId', '=', userId)]))
        .orderBy('startedAt', 'desc')
        .limit(limit)
        .execute()
    )
    return rows.map(toCall)
  }

  // ============================================
  // METRICS
  // ============================================

  async counts(): Promise<StoreCounts> {
    const [users, chats, messages, calls] = await this.run('counts', () =>
      Promise.all([
        this.db.selectFrom('user').select(this.db.fn.countAll().as('count')).executeTakeFirst(),
        this.db.selectFrom('chat').select(this.db.fn.countAll().as('count')).executeTakeFirst(),
        this.db.selectFrom('message').select(this.db.fn.countAll().as('count')).executeTakeFirst(),
        this.db.selectFrom('call').select(this.db.fn.countAll().as('count')).executeTakeFirst(),
      ])
    )
    return {
      users: Number(users?.count ?? 0),
      chats: Number(chats?.count ?? 0),
      messages: Number(messages?.count ?? 0),
      calls: Number(calls?.count ?? 0),
    }
  }
}
