import http from 'http'
import events from 'events'
import express from 'express'
import { WebSocketServer } from 'ws'
import chat from './methods/chat'
import calls from './methods/calls'
import { createDb, Database, migrateToLatest } from './db'
import { AppContext, Config, createAppContext } from './config'
import { log } from './logger'
import { initSentry, sentryErrorHandler, captureError } from './monitoring'
import { setupWebSocket } from './websocket'

export class ChatServer {
  public app: express.Application
  public server?: http.Server
  public wss?: WebSocketServer
  public db: Database
  public ctx: AppContext
  public cfg: Config
  private startTime: Date

  constructor(app: express.Application, ctx: AppContext) {
    this.app = app
    this.ctx = ctx
    this.db = ctx.db
    this.cfg = ctx.cfg
    this.startTime = new Date()
  }

  static create(cfg: Config, db: Database = createDb(cfg.sqliteLocation)) {
    // Initialize Sentry for error tracking
    initSentry()

    const app = express()
    // Parse JSON bodies for POST requests
    app.use(express.json())

    const ctx = createAppContext(db, cfg)
    const startTime = new Date()

    // Health check endpoint for monitoring
    app.get('/health', async (_req, res) => {
      try {
        // Basic database connectivity check
        await db.selectFrom('user').select('id').limit(1).execute()

        res.json({
          status: 'healthy',
          timestamp: new Date().toISOString(),
          version: process.env.npm_package_version || '1.0.0',
          uptimeSeconds: Math.round((Date.now() - startTime.getTime()) / 1000),
          services: {
            database: 'connected',
            websocket: ctx.broker.connectionCount > 0 ? 'serving' : 'idle',
          },
        })
      } catch (error) {
        log(`Health check failed: ${error}`)
        res.status(503).json({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          error: 'Database connection failed',
        })
      }
    })

    // Readiness check for load balancers
    app.get('/ready', async (_req, res) => {
      try {
        await db.selectFrom('user').select('id').limit(1).execute()
        res.status(200).send('ready')
      } catch {
        res.status(503).send('not ready')
      }
    })

    // Liveness check for container orchestration
    app.get('/live', (_req, res) => {
      res.status(200).send('alive')
    })

    // Metrics endpoint for monitoring
    app.get('/metrics', async (_req, res) => {
      try {
        const counts = await ctx.store.counts()
        res.json({
          timestamp: new Date().toISOString(),
          database: counts,
          realtime: {
            connections: ctx.broker.connectionCount,
            topics: ctx.broker.topicCount,
            onlineUsers: ctx.sessions.onlineUsers().length,
          },
        })
      } catch (error) {
        log(`Metrics failed: ${error}`)
        res.status(500).json({ error: 'Failed to collect metrics' })
      }
    })

    chat(app, ctx)
    calls(app, ctx)

    // Add Sentry error handler (must be after all routes)
    app.use(sentryErrorHandler())

    // Global error handler
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      log(`Unhandled error: ${err.message}`)
      captureError(err)
      res.status(500).json({ error: 'Internal server error' })
    })

    return new ChatServer(app, ctx)
  }

  async start(): Promise<http.Server> {
    await migrateToLatest(this.db)
    this.server = this.app.listen(this.cfg.port, this.cfg.listenhost)
    await events.once(this.server, 'listening')

    // WebSocket upgrades share the HTTP server
    this.wss = setupWebSocket(this.server, this.ctx)
    log(`[Server] WebSocket server ready on ws://${this.cfg.listenhost}:${this.cfg.port}/ws`)
    log(`[Server] Started in ${Date.now() - this.startTime.getTime()}ms`)

    return this.server
  }

  async stop(): Promise<void> {
    if (this.wss) {
      for (const client of this.wss.clients) {
        client.close(1001, 'Server shutting down')
      }
      this.wss.close()
    }
    if (this.server) {
      this.server.close()
      await events.once(this.server, 'close')
    }
    await this.ctx.sessions.settled()
    await this.db.destroy()
  }
}

export default ChatServer
