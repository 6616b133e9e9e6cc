import { describe, expect, it, jest, beforeEach, afterEach } from '@jest/globals'
import { AppContext } from '../config'
import { StoreError } from '../errors'
import { ChatConnectionHandler, preview, withinDeleteWindow } from '../realtime/chat-handler'
import { TOMBSTONE_CONTENT } from '../store'
import {
  OpenedChat,
  createTestContext,
  destroyTestContext,
  fakeConnection,
  frame,
  openChat,
  openNotifications,
  seedChat,
  seedUser,
  testClock,
  T0,
} from './helpers'

const HOUR = 60 * 60 * 1000

describe('withinDeleteWindow', () => {
  it('should include the boundary', () => {
    const created = T0.toISOString()
    expect(withinDeleteWindow(created, new Date(T0.getTime() + HOUR), HOUR)).toBe(true)
    expect(withinDeleteWindow(created, new Date(T0.getTime() + HOUR + 1), HOUR)).toBe(false)
  })
})

describe('preview', () => {
  it('should keep a hundred code points whole', () => {
    const exact = 'a'.repeat(99) + '\u{1F600}'
    expect(preview(exact)).toBe(exact)
  })

  it('should not split a surrogate pair when cutting', () => {
    expect(preview('a'.repeat(99) + '\u{1F600}bbb')).toBe('a'.repeat(99) + '\u{1F600}...')
  })
})

describe('ChatConnectionHandler', () => {
  let ctx: AppContext
  let clock: ReturnType<typeof testClock>

  beforeEach(async () => {
    clock = testClock()
    ctx = await createTestContext(clock.clock)
    await seedUser(ctx.db, 'alice', { firstName: 'Alice', lastName: 'Ames' })
    await seedUser(ctx.db, 'bob', { firstName: 'Bob' })
    await seedUser(ctx.db, 'carol')
    await seedChat(ctx.db, 'C1', ['alice', 'bob'])
    await seedChat(ctx.db, 'C2', ['alice', 'carol'])
  })

  afterEach(async () => {
    await destroyTestContext(ctx)
  })

  async function openPair(): Promise<{ a: OpenedChat; b: OpenedChat }> {
    const a = await openChat(ctx, 'alice', 'C1')
    const b = await openChat(ctx, 'bob', 'C1')
    a.transport.clear()
    b.transport.clear()
    return { a, b }
  }

  async function sendMessage(from: OpenedChat, content: string): Promise<string> {
    await from.handler.receive(frame({ type: 'chat_message', content }))
    const row = await ctx.db
      .selectFrom('message')
      .select('id')
      .where('content', '=', content)
      .executeTakeFirstOrThrow()
    return row.id
  }

  // ==========================================================================
  // OPENING
  // ==========================================================================

  describe('open', () => {
    it('should become active and announce presence', async () => {
      const a = await openChat(ctx, 'alice', 'C1')
      await ctx.sessions.settled()

      expect(a.opened).toBe(true)
      expect(a.handler.currentState).toBe('active')
      expect(a.transport.frames).toEqual([{ type: 'user_status', user_id: 'alice', is_online: true }])
      expect((await ctx.store.getUser('alice'))?.isOnline).toBe(true)
    })

    it('should send a presence snapshot of participants already online', async () => {
      await openChat(ctx, 'alice', 'C1')
      const b = await openChat(ctx, 'bob', 'C1')

      expect(b.transport.frames).toEqual([
        { type: 'user_status', user_id: 'bob', is_online: true },
        { type: 'user_status', user_id: 'alice', is_online: true },
      ])
    })

    it('should close non-participants with 4003 and persist nothing', async () => {
      const c = await openChat(ctx, 'carol', 'C1')
      await ctx.sessions.settled()

      expect(c.opened).toBe(false)
      expect(c.handler.currentState).toBe('closed')
      expect(c.transport.closedWith).toEqual({ code: 4003, reason: 'Forbidden' })
      expect(ctx.broker.subscribers('chat:C1')).toEqual([])
      expect(ctx.sessions.isOnline('carol')).toBe(false)
      expect((await ctx.store.getUser('carol'))?.isOnline).toBe(false)
    })

    it('should close connections to unknown chats', async () => {
      const a = await openChat(ctx, 'alice', 'no-such-chat')
      expect(a.transport.closedWith).toEqual({ code: 4003, reason: 'Forbidden' })
    })

    it('should stay closed if the socket went away during the membership check', async () => {
      const { connection, transport } = fakeConnection('alice')
      const handler = new ChatConnectionHandler(ctx, connection, 'C1')

      const opening = handler.open()
      handler.close()

      expect(await opening).toBe(false)
      expect(transport.closedWith).toBeNull()
      expect(ctx.broker.isAttached(connection.id)).toBe(false)
      expect(ctx.sessions.isOnline('alice')).toBe(false)
    })

    it('should hold frames sent before the membership check finished', async () => {
      const b = await openChat(ctx, 'bob', 'C1')
      b.transport.clear()
      const { connection } = fakeConnection('alice')
      const handler = new ChatConnectionHandler(ctx, connection, 'C1')

      const opening = handler.open()
      const sending = handler.receive(frame({ type: 'chat_message', content: 'early' }))
      await opening
      await sending

      expect(b.transport.types).toEqual(['user_status', 'chat_message'])
    })
  })

  // ==========================================================================
  // CHAT MESSAGES
  // ==========================================================================

  describe('chat_message', () => {
    it('should persist the message with one sent receipt per other participant and fan out to both', async () => {
      const { a, b } = await openPair()

      await a.handler.receive(frame({ type: 'chat_message', content: 'hi' }))

      const messages = await ctx.db.selectFrom('message').selectAll().execute()
      expect(messages).toHaveLength(1)
      expect(messages[0]).toMatchObject({ chatId: 'C1', senderId: 'alice', content: 'hi', messageType: 'text' })

      const receipts = await ctx.db.selectFrom('message_receipt').selectAll().execute()
      expect(receipts).toEqual([
        { messageId: messages[0].id, userId: 'bob', status: 'sent', deliveredAt: null, readAt: null },
      ])

      const expected = {
        type: 'chat_message',
        message: {
          id: messages[0].id,
          chat_id: 'C1',
          sender_id: 'alice',
          sender_name: 'Alice Ames',
          content: 'hi',
          message_type: 'text',
          reply_to: null,
          rev: messages[0].rev,
          created_at: T0.toISOString(),
        },
      }
      expect(a.transport.frames).toEqual([expected])
      expect(b.transport.frames).toEqual([expected])
    })

    it("should reach the sender's other connections", async () => {
      const { a } = await openPair()
      const second = await openChat(ctx, 'alice', 'C1')
      second.transport.clear()

      await a.handler.receive(frame({ type: 'chat_message', content: 'hi' }))

      expect(second.transport.types).toEqual(['chat_message'])
    })

    it('should notify recipients on their personal channel', async () => {
      const { a } = await openPair()
      const bobNotifications = await openNotifications(ctx, 'bob')

      const id = await sendMessage(a, 'see you at noon')

      expect(bobNotifications.transport.frames).toEqual([
        {
          type: 'notification',
          notification: {
            type: 'message',
            title: 'Alice Ames',
            body: 'see you at noon',
            chat_id: 'C1',
            message_id: id,
            created_at: T0.toISOString(),
          },
        },
      ])
    })

    it('should keep replies within the chat', async () => {
      const { a } = await openPair()
      const original = await sendMessage(a, 'original')
      const other = await openChat(ctx, 'alice', 'C2')
      const foreign = await sendMessage(other, 'elsewhere')

      await a.handler.receive(frame({ type: 'chat_message', content: 'reply', reply_to: original }))
      await a.handler.receive(frame({ type: 'chat_message', content: 'stray', reply_to: foreign }))

      const rows = await ctx.db.selectFrom('message').select(['content', 'replyTo']).where('chatId', '=', 'C1').execute()
      expect(rows.find((r) => r.content === 'reply')?.replyTo).toBe(original)
      expect(rows.find((r) => r.content === 'stray')?.replyTo).toBeNull()
    })

    it('should persist and publish in arrival order', async () => {
      const { a, b } = await openPair()

      await Promise.all(
        ['one', 'two', 'three'].map((content) => a.handler.receive(frame({ type: 'chat_message', content })))
      )

      const published = b.transport.framesOfType('chat_message').map((f) => {
        const message = f.message
        return typeof message === 'object' && message !== null && 'content' in message ? message.content : null
      })
      expect(published).toEqual(['one', 'two', 'three'])

      const stored = await ctx.db.selectFrom('message').select('content').orderBy('rev', 'asc').execute()
      expect(stored.map((r) => r.content)).toEqual(['one', 'two', 'three'])
    })

    it('should answer a store failure with an error frame to the sender only', async () => {
      const { a, b } = await openPair()
      jest
        .spyOn(ctx.store, 'createMessage')
        .mockRejectedValueOnce(new StoreError('createMessage', new Error('disk I/O error')))

      await a.handler.receive(frame({ type: 'chat_message', content: 'lost' }))

      expect(a.transport.frames).toEqual([
        { type: 'error', reference: 'chat_message', message: 'Temporarily unable to save, please retry' },
      ])
      expect(b.transport.sent).toHaveLength(0)
      expect(await ctx.db.selectFrom('message').selectAll().execute()).toEqual([])
    })
  })

  // ==========================================================================
  // TYPING
  // ==========================================================================

  describe('typing', () => {
    it('should never echo to the typing connection', async () => {
      const { a, b } = await openPair()
      const second = await openChat(ctx, 'alice', 'C1')
      second.transport.clear()

      await a.handler.receive(frame({ type: 'typing', is_typing: true }))

      const expected = { type: 'typing_indicator', user_id: 'alice', user_name: 'Alice Ames', is_typing: true }
      expect(a.transport.sent).toHaveLength(0)
      expect(b.transport.frames).toEqual([expected])
      expect(second.transport.frames).toEqual([expected])
    })
  })

  // ==========================================================================
  // RECEIPTS
  // ==========================================================================

  describe('read_receipt', () => {
    it('should mark the receipt read once and tell the sender', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'hi')
      a.transport.clear()
      clock.advance(5000)
      const readAt = new Date(T0.getTime() + 5000).toISOString()

      await b.handler.receive(frame({ type: 'read_receipt', message_id: id }))

      expect(await ctx.store.getReceipt(id, 'bob')).toEqual({
        messageId: id,
        userId: 'bob',
        status: 'read',
        deliveredAt: null,
        readAt,
      })
      expect(a.transport.frames).toEqual([{ type: 'read_receipt', message_id: id, user_id: 'bob', read_at: readAt }])

      clock.advance(5000)
      await b.handler.receive(frame({ type: 'read_receipt', message_id: id }))
      expect(a.transport.framesOfType('read_receipt')).toHaveLength(1)
      expect((await ctx.store.getReceipt(id, 'bob'))?.readAt).toBe(readAt)
    })

    it('should ignore receipts for own or unknown messages', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'hi')
      a.transport.clear()
      b.transport.clear()

      await a.handler.receive(frame({ type: 'read_receipt', message_id: id }))
      await b.handler.receive(frame({ type: 'read_receipt', message_id: 'missing' }))

      expect(a.transport.sent).toHaveLength(0)
      expect(b.transport.sent).toHaveLength(0)
    })
  })

  describe('delivery_receipt', () => {
    it('should mark delivered and publish to the chat', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'hi')
      a.transport.clear()

      await b.handler.receive(frame({ type: 'delivery_receipt', message_id: id }))
      await b.handler.receive(frame({ type: 'delivery_receipt', message_id: id }))

      expect(a.transport.frames).toEqual([
        { type: 'delivery_receipt', message_id: id, user_id: 'bob', delivered_at: T0.toISOString() },
      ])
    })
  })

  // ==========================================================================
  // DELETION
  // ==========================================================================

  describe('delete_message', () => {
    it('should tombstone a message deleted for everyone within the hour', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'oops')
      b.transport.clear()
      clock.advance(HOUR)

      await a.handler.receive(frame({ type: 'delete_message', message_id: id, delete_for_everyone: true }))

      const stored = await ctx.store.getMessage(id)
      expect(stored?.content).toBe(TOMBSTONE_CONTENT)
      expect(stored?.deletedForEveryone).toBe(true)
      expect(b.transport.frames).toEqual([{ type: 'message_deleted', message_id: id, delete_for_everyone: true }])
    })

    it('should refuse to delete for everyone after more than an hour', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'old news')
      a.transport.clear()
      b.transport.clear()
      clock.advance(2 * HOUR)

      await a.handler.receive(frame({ type: 'delete_message', message_id: id, delete_for_everyone: true }))

      const stored = await ctx.store.getMessage(id)
      expect(stored?.content).toBe('old news')
      expect(stored?.deletedForEveryone).toBe(false)
      expect(a.transport.sent).toHaveLength(0)
      expect(b.transport.sent).toHaveLength(0)
    })

    it('should only let the sender delete', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'mine')
      a.transport.clear()

      await b.handler.receive(frame({ type: 'delete_message', message_id: id, delete_for_everyone: true }))

      expect((await ctx.store.getMessage(id))?.content).toBe('mine')
      expect(a.transport.sent).toHaveLength(0)
    })

    it('should not tombstone twice', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'once')
      b.transport.clear()

      await a.handler.receive(frame({ type: 'delete_message', message_id: id, delete_for_everyone: true }))
      await a.handler.receive(frame({ type: 'delete_message', message_id: id, delete_for_everyone: true }))

      expect(b.transport.framesOfType('message_deleted')).toHaveLength(1)
    })

    it('should hide a message deleted for me from my history only', async () => {
      const { a, b } = await openPair()
      const kept = await sendMessage(a, 'kept')
      const hidden = await sendMessage(a, 'hidden')
      b.transport.clear()

      await a.handler.receive(frame({ type: 'delete_message', message_id: hidden }))

      expect(b.transport.frames).toEqual([{ type: 'message_deleted', message_id: hidden, delete_for_everyone: false }])
      const forAlice = await ctx.store.listMessages('C1', 'alice', { limit: 50 })
      const forBob = await ctx.store.listMessages('C1', 'bob', { limit: 50 })
      expect(forAlice.map((m) => m.id)).toEqual([kept])
      expect(forBob.map((m) => m.id)).toEqual([kept, hidden])
    })
  })

  // ==========================================================================
  // REACTIONS
  // ==========================================================================

  describe('reaction', () => {
    it('should toggle add, update and remove', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'nice')
      a.transport.clear()

      await b.handler.receive(frame({ type: 'reaction', message_id: id, emoji: '👍' }))
      await b.handler.receive(frame({ type: 'reaction', message_id: id, emoji: '🎉' }))
      await b.handler.receive(frame({ type: 'reaction', message_id: id, emoji: '🎉' }))

      expect(a.transport.frames).toEqual([
        { type: 'message_reaction', message_id: id, user_id: 'bob', emoji: '👍', action: 'added' },
        { type: 'message_reaction', message_id: id, user_id: 'bob', emoji: '🎉', action: 'updated' },
        { type: 'message_reaction', message_id: id, user_id: 'bob', emoji: '🎉', action: 'removed' },
      ])
      expect(await ctx.store.getReaction(id, 'bob')).toBeUndefined()
    })

    it('should not react to a message deleted for everyone', async () => {
      const { a, b } = await openPair()
      const id = await sendMessage(a, 'gone')
      await a.handler.receive(frame({ type: 'delete_message', message_id: id, delete_for_everyone: true }))
      a.transport.clear()

      await b.handler.receive(frame({ type: 'reaction', message_id: id, emoji: '👍' }))

      expect(a.transport.sent).toHaveLength(0)
    })
  })

  // ==========================================================================
  // UNKNOWN AND INVALID FRAMES
  // ==========================================================================

  describe('unrecognised input', () => {
    it('should produce no outbound frames', async () => {
      const { a, b } = await openPair()

      await a.handler.receive(frame({ type: 'sticker_pack', id: 3 }))
      await a.handler.receive('{not json')
      await a.handler.receive(frame({ type: 'chat_message', content: '' }))
      await a.handler.receive(frame({ content: 'no type' }))

      expect(a.transport.sent).toHaveLength(0)
      expect(b.transport.sent).toHaveLength(0)
      expect(a.handler.currentState).toBe('active')
    })
  })

  // ==========================================================================
  // DISCONNECT
  // ==========================================================================

  describe('close', () => {
    it('should report offline to the rest of the chat', async () => {
      const { a, b } = await openPair()
      clock.advance(60_000)

      b.handler.close()
      await ctx.sessions.settled()

      const lastSeen = new Date(T0.getTime() + 60_000).toISOString()
      expect(a.transport.frames).toEqual([
        { type: 'user_status', user_id: 'bob', is_online: false, last_seen: lastSeen },
      ])
      expect(b.transport.sent).toHaveLength(0)
      expect(await ctx.store.getUser('bob')).toMatchObject({ isOnline: false, lastSeenAt: lastSeen })
      expect(ctx.broker.subscribers('chat:C1').map((c) => c.userId)).toEqual(['alice'])
    })

    it('should stay online while another device is connected', async () => {
      const { a, b } = await openPair()
      const bobLaptop = await openChat(ctx, 'bob', 'C1')
      a.transport.clear()

      b.handler.close()

      expect(a.transport.sent).toHaveLength(0)
      expect(ctx.sessions.isOnline('bob')).toBe(true)

      bobLaptop.handler.close()
      expect(a.transport.framesOfType('user_status')).toHaveLength(1)
      expect(ctx.sessions.isOnline('bob')).toBe(false)
    })

    it('should skip frames still queued when the connection closes', async () => {
      const { a } = await openPair()

      const pending = a.handler.receive(frame({ type: 'chat_message', content: 'never' }))
      a.handler.close()
      await pending

      expect(await ctx.db.selectFrom('message').selectAll().execute()).toEqual([])
    })

    it('should run the disconnect path for a subscriber whose socket broke', async () => {
      const { a, b } = await openPair()
      b.transport.throwOnSend = new Error('connection reset')

      await a.handler.receive(frame({ type: 'chat_message', content: 'anyone there?' }))

      expect(b.handler.currentState).toBe('closed')
      expect(b.transport.terminated).toBe(true)
      expect(a.transport.types).toEqual(['chat_message', 'user_status'])
      expect(ctx.sessions.isOnline('bob')).toBe(false)
      // The write that triggered it still committed
      expect(await ctx.db.selectFrom('message').selectAll().execute()).toHaveLength(1)
    })

    it('should be idempotent', async () => {
      const { a, b } = await openPair()

      b.handler.close()
      b.handler.close()

      expect(a.transport.framesOfType('user_status')).toHaveLength(1)
    })
  })
})
