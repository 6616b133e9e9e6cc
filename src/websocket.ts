/**
 * WebSocket Server for the realtime relay
 *
 * Handles:
 * - Upgrade routing for /ws/chat/:chatId, /ws/call/:callId, /ws/notifications
 * - Identifying the user (trusted header or query param)
 * - Heartbeat to detect stale connections
 * - Handing each connection to its protocol handler
 */

import { WebSocketServer, WebSocket, RawData } from 'ws'
import http from 'http'
import { URL } from 'url'
import { Duplex } from 'stream'
import { v4 as uuid } from 'uuid'
import { AppContext } from './config'
import { log, logDebug, logError, logWarn } from './logger'
import { UserRecord } from './store'
import { Connection, ConnectionHandler, WebSocketTransport } from './realtime/connection'
import { ChatConnectionHandler } from './realtime/chat-handler'
import { CallConnectionHandler } from './realtime/call-relay'
import { NotificationConnectionHandler } from './realtime/notifications'

// Rate limiting for failed auth attempts
const authFailures = new Map<string, { count: number; lastAttempt: number }>()
const MAX_AUTH_FAILURES = 5
const AUTH_FAILURE_WINDOW = 60000 // 1 minute

// Connection metadata
interface ConnectionMeta {
  userId: string
  connectionId: string
  authenticatedAt: Date
  lastHeartbeat: Date
}
const connectionMeta = new WeakMap<WebSocket, ConnectionMeta>()

export type WebSocketRoute =
  | { kind: 'chat'; chatId: string }
  | { kind: 'call'; callId: string }
  | { kind: 'notifications' }

const CHAT_PATH = /^\/ws\/chat\/([^/]+)\/?$/
const CALL_PATH = /^\/ws\/call\/([^/]+)\/?$/
const NOTIFICATIONS_PATH = /^\/ws\/notifications\/?$/

export function matchRoute(pathname: string): WebSocketRoute | null {
  try {
    const chat = CHAT_PATH.exec(pathname)
    if (chat) return { kind: 'chat', chatId: decodeURIComponent(chat[1]) }
    const call = CALL_PATH.exec(pathname)
    if (call) return { kind: 'call', callId: decodeURIComponent(call[1]) }
    if (NOTIFICATIONS_PATH.test(pathname)) return { kind: 'notifications' }
  } catch {
    // Malformed percent-encoding
  }
  return null
}

/**
 * Identity comes from the fronting auth layer: the `x-user-id` header, or
 * `user_id` in the query string for clients that cannot set headers.
 * The user must exist.
 */
async function authenticateConnection(req: http.IncomingMessage, ctx: AppContext): Promise<UserRecord | null> {
  const ip = req.socket.remoteAddress || 'unknown'

  // Check rate limiting for failed auth attempts
  const failures = authFailures.get(ip)
  if (failures && failures.count >= MAX_AUTH_FAILURES) {
    const elapsed = Date.now() - failures.lastAttempt
    if (elapsed < AUTH_FAILURE_WINDOW) {
      log(`[WS] Rate limited: ${ip} has ${failures.count} failed attempts`)
      return null
    }
    // Reset after window expires
    authFailures.delete(ip)
  }

  const header = req.headers['x-user-id']
  const url = new URL(req.url || '', `http://${req.headers.host || 'localhost'}`)
  const userId = (typeof header === 'string' && header) || url.searchParams.get('user_id')
  if (!userId) {
    log('[WS] Missing user id in connection request')
    recordAuthFailure(ip)
    return null
  }

  try {
    const user = await ctx.store.getUser(userId)
    if (!user) {
      log(`[WS] Unknown user ${userId}`)
      recordAuthFailure(ip)
      return null
    }
    return user
  } catch (error) {
    logError('[WS] Auth lookup failed', error)
    return null
  }
}

function recordAuthFailure(ip: string) {
  const existing = authFailures.get(ip)
  if (existing) {
    existing.count++
    existing.lastAttempt = Date.now()
  } else {
    authFailures.set(ip, { count: 1, lastAttempt: Date.now() })
  }
}

// Frames held while the user lookup is in flight
export const MAX_PENDING_FRAMES = 32

export function bufferPending(pending: string[], raw: string): boolean {
  if (pending.length >= MAX_PENDING_FRAMES) return false
  pending.push(raw)
  return true
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8')
  return data.toString('utf8')
}

export function createHandler(ctx: AppContext, connection: Connection, route: WebSocketRoute): ConnectionHandler {
  switch (route.kind) {
    case 'chat':
      return new ChatConnectionHandler(ctx, connection, route.chatId)
    case 'call':
      return new CallConnectionHandler(ctx, connection, route.callId)
    case 'notifications':
      return new NotificationConnectionHandler(ctx, connection)
  }
}

/**
 * Set up WebSocket server on existing HTTP server
 */
export function setupWebSocket(server: http.Server, ctx: AppContext): WebSocketServer {
  const wss = new WebSocketServer({
    noServer: true, // Handle upgrade manually
  })

  log('[WS] WebSocket server initialized on /ws')

  // Handle upgrade requests manually
  server.on('upgrade', (request: http.IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(request.url || '', `http://${request.headers.host || 'localhost'}`).pathname
    const route = matchRoute(pathname)

    if (!route) {
      socket.destroy()
      return
    }

    // Add error handler for socket
    socket.on('error', (err: Error) => {
      log(`[WS] Socket error during upgrade: ${err}`)
    })

    wss.handleUpgrade(request, socket, head, (ws) => {
      handleConnection(ws, request, route, ctx).catch((error: unknown) => {
        logError('[WS] Connection setup failed', error)
        ws.terminate()
      })
    })
  })

  // Heartbeat check interval
  const heartbeatInterval = setInterval(() => {
    const now = Date.now()

    wss.clients.forEach((ws) => {
      const meta = connectionMeta.get(ws)
      if (!meta) {
        ws.terminate()
        return
      }

      if (now - meta.lastHeartbeat.getTime() > ctx.cfg.connectionTimeout) {
        log(`[WS] Terminating stale connection ${meta.connectionId} for ${meta.userId}`)
        ws.terminate()
        return
      }

      if (ws.readyState === WebSocket.OPEN) {
        ws.ping()
      }
    })
  }, ctx.cfg.heartbeatInterval)

  wss.on('close', () => {
    clearInterval(heartbeatInterval)
  })

  wss.on('error', (error) => {
    log(`[WS] WebSocket server error: ${error}`)
  })

  return wss
}

async function handleConnection(
  ws: WebSocket,
  req: http.IncomingMessage,
  route: WebSocketRoute,
  ctx: AppContext
): Promise<void> {
  // Listeners go on before auth so frames sent meanwhile are kept
  const pending: string[] = []
  let handler: ConnectionHandler | null = null
  let closed = false

  ws.on('message', (data) => {
    const meta = connectionMeta.get(ws)
    if (meta) meta.lastHeartbeat = new Date()
    const raw = rawToString(data)
    if (handler) {
      void handler.receive(raw)
    } else if (!bufferPending(pending, raw)) {
      logWarn(`[WS] Dropping frame from unauthenticated ${route.kind} client: ${MAX_PENDING_FRAMES} already queued`)
    }
  })

  ws.on('pong', () => {
    const meta = connectionMeta.get(ws)
    if (meta) meta.lastHeartbeat = new Date()
  })

  ws.on('close', (code) => {
    closed = true
    const meta = connectionMeta.get(ws)
    if (meta) {
      const seconds = Math.round((Date.now() - meta.authenticatedAt.getTime()) / 1000)
      log(`[WS] Connection ${meta.connectionId} closed (${code}) for ${meta.userId} after ${seconds}s`)
    } else {
      log(`[WS] Connection closed (${code}) for unauthenticated client`)
    }
    handler?.close()
  })

  ws.on('error', (error) => {
    log(`[WS] Error on ${route.kind} connection: ${error}`)
  })

  const user = await authenticateConnection(req, ctx)
  if (!user) {
    log('[WS] Authentication failed, closing connection')
    ws.close(4001, 'Unauthorized')
    return
  }
  if (closed) return

  const connection: Connection = {
    id: uuid(),
    userId: user.id,
    kind: route.kind,
    transport: new WebSocketTransport(ws),
  }
  connectionMeta.set(ws, {
    userId: user.id,
    connectionId: connection.id,
    authenticatedAt: new Date(),
    lastHeartbeat: new Date(),
  })

  const active = createHandler(ctx, connection, route)
  handler = active
  const opened = active.open()
  for (const raw of pending.splice(0)) {
    void active.receive(raw)
  }

  if (await opened) {
    log(`[WS] ${route.kind} connection ${connection.id} for ${user.id} (live: ${ctx.broker.connectionCount})`)
  } else {
    logDebug(`[WS] ${route.kind} connection ${connection.id} for ${user.id} refused`)
  }
}
