import { v4 as uuid } from 'uuid'
import { AppContext, Config, createAppContext, defaultConfig } from '../config'
import { createDb, Database, migrateToLatest } from '../db'
import { Connection, ConnectionKind, Transport } from '../realtime/connection'
import { ChatConnectionHandler } from '../realtime/chat-handler'
import { CallConnectionHandler } from '../realtime/call-relay'
import { NotificationConnectionHandler } from '../realtime/notifications'

export const T0 = new Date('2026-03-02T09:00:00.000Z')

export interface TestClock {
  clock: () => Date
  advance(ms: number): void
}

export function testClock(start: Date = T0): TestClock {
  let current = start.getTime()
  return {
    clock: () => new Date(current),
    advance(ms: number) {
      current += ms
    },
  }
}

export async function createTestDb(): Promise<Database> {
  const db = createDb(':memory:')
  await migrateToLatest(db)
  return db
}

export async function createTestContext(
  clock: () => Date = testClock().clock,
  overrides: Partial<Config> = {}
): Promise<AppContext> {
  const db = await createTestDb()
  // No waiting on lock retries in tests
  return createAppContext(db, { ...defaultConfig, storeRetryAttempts: 1, ...overrides }, clock)
}

export async function destroyTestContext(ctx: AppContext): Promise<void> {
  await ctx.sessions.settled()
  await ctx.db.destroy()
}

let phoneCounter = 0

export async function seedUser(
  db: Database,
  id: string,
  name: { firstName?: string; lastName?: string } = {}
): Promise<void> {
  phoneCounter++
  await db
    .insertInto('user')
    .values({
      id,
      username: id,
      firstName: name.firstName ?? '',
      lastName: name.lastName ?? '',
      phoneNumber: `+1555000${String(phoneCounter).padStart(4, '0')}`,
      isOnline: 0,
      lastSeenAt: T0.toISOString(),
      createdAt: T0.toISOString(),
    })
    .execute()
}

export async function seedChat(db: Database, id: string, participantIds: string[]): Promise<void> {
  await db
    .insertInto('chat')
    .values({
      id,
      chatType: participantIds.length > 2 ? 'group' : 'personal',
      name: null,
      createdBy: participantIds[0] ?? null,
      createdAt: T0.toISOString(),
      updatedAt: T0.toISOString(),
    })
    .execute()
  const rows = participantIds.map((userId, i) => ({
    chatId: id,
    userId,
    role: i === 0 ? 'admin' : 'member',
    // Distinct join times keep listParticipants ordering stable
    joinedAt: new Date(T0.getTime() + i).toISOString(),
    lastReadMessageId: null,
    isMuted: 0,
  }))
  // Batches stay under SQLite's bound-variable limit for large groups
  for (let start = 0; start < rows.length; start += 1000) {
    await db.insertInto('chat_participant').values(rows.slice(start, start + 1000)).execute()
  }
}

export type Frame = Record<string, unknown>

function parseFrame(raw: string): Frame {
  const value: unknown = JSON.parse(raw)
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Not a JSON object frame: ${raw}`)
  }
  return Object.fromEntries(Object.entries(value))
}

/**
 * In-process stand-in for a WebSocket. Records what was written and lets a
 * test make writes fail or the buffer back up.
 */
export class FakeTransport implements Transport {
  isOpen = true
  bufferedAmount = 0
  sent: string[] = []
  closedWith: { code: number; reason: string } | null = null
  terminated = false
  // Thrown synchronously from send()
  throwOnSend: Error | null = null
  // Reported through the send callback, as ws does for a failed write
  failOnSend: Error | null = null
  onTerminate: (() => void) | null = null

  send(data: string, onError: (err: Error) => void): void {
    if (this.throwOnSend) throw this.throwOnSend
    if (this.failOnSend) {
      onError(this.failOnSend)
      return
    }
    this.sent.push(data)
  }

  close(code: number, reason: string): void {
    this.closedWith = { code, reason }
    this.isOpen = false
  }

  terminate(): void {
    this.terminated = true
    this.isOpen = false
    this.onTerminate?.()
  }

  get frames(): Frame[] {
    return this.sent.map(parseFrame)
  }

  framesOfType(type: string): Frame[] {
    return this.frames.filter((frame) => frame.type === type)
  }

  get types(): unknown[] {
    return this.frames.map((frame) => frame.type)
  }

  clear(): void {
    this.sent = []
  }
}

export function fakeConnection(
  userId: string,
  kind: ConnectionKind = 'chat'
): { connection: Connection; transport: FakeTransport } {
  const transport = new FakeTransport()
  return { connection: { id: uuid(), userId, kind, transport }, transport }
}

export interface OpenedChat {
  handler: ChatConnectionHandler
  transport: FakeTransport
  connection: Connection
  opened: boolean
}

/** Opens a chat connection the way the WebSocket server does. */
export async function openChat(ctx: AppContext, userId: string, chatId: string): Promise<OpenedChat> {
  const { connection, transport } = fakeConnection(userId, 'chat')
  const handler = new ChatConnectionHandler(ctx, connection, chatId)
  transport.onTerminate = () => handler.close()
  const opened = await handler.open()
  return { handler, transport, connection, opened }
}

export async function openCall(
  ctx: AppContext,
  userId: string,
  callId: string
): Promise<{ handler: CallConnectionHandler; transport: FakeTransport; opened: boolean }> {
  const { connection, transport } = fakeConnection(userId, 'call')
  const handler = new CallConnectionHandler(ctx, connection, callId)
  transport.onTerminate = () => handler.close()
  const opened = await handler.open()
  return { handler, transport, opened }
}

export async function openNotifications(
  ctx: AppContext,
  userId: string
): Promise<{ handler: NotificationConnectionHandler; transport: FakeTransport }> {
  const { connection, transport } = fakeConnection(userId, 'notifications')
  const handler = new NotificationConnectionHandler(ctx, connection)
  transport.onTerminate = () => handler.close()
  await handler.open()
  return { handler, transport }
}

export function frame(value: Record<string, unknown>): string {
  return JSON.stringify(value)
}
