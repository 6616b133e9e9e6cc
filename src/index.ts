import dotenv from 'dotenv'
import ChatServer from './server'
import { defaultConfig } from './config'
import { log, logError } from './logger'

const run = async () => {
  dotenv.config()

  log('Starting chat relay...')
  log('Environment: ' + JSON.stringify({
    CHAT_PORT: process.env.CHAT_PORT,
    CHAT_LISTENHOST: process.env.CHAT_LISTENHOST,
    CHAT_SQLITE_LOCATION: process.env.CHAT_SQLITE_LOCATION,
  }))

  const server = ChatServer.create({
    port: maybeInt(process.env.CHAT_PORT) ?? defaultConfig.port,
    listenhost: maybeStr(process.env.CHAT_LISTENHOST) ?? defaultConfig.listenhost,
    sqliteLocation: maybeStr(process.env.CHAT_SQLITE_LOCATION) ?? defaultConfig.sqliteLocation,
    heartbeatInterval:
      maybeInt(process.env.CHAT_HEARTBEAT_INTERVAL) ?? defaultConfig.heartbeatInterval,
    connectionTimeout:
      maybeInt(process.env.CHAT_CONNECTION_TIMEOUT) ?? defaultConfig.connectionTimeout,
    maxBufferedBytes:
      maybeInt(process.env.CHAT_MAX_BUFFERED_BYTES) ?? defaultConfig.maxBufferedBytes,
    storeRetryAttempts:
      maybeInt(process.env.CHAT_STORE_RETRY_ATTEMPTS) ?? defaultConfig.storeRetryAttempts,
    deleteWindowMs: maybeInt(process.env.CHAT_DELETE_WINDOW_MS) ?? defaultConfig.deleteWindowMs,
  })

  try {
    await server.start()
    log(`Chat relay started at http://${server.cfg.listenhost}:${server.cfg.port}`)
  } catch (error) {
    logError('Failed to start server', error)
    process.exit(1)
  }

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`)
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError('Shutdown failed', error)
        process.exit(1)
      })
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

const maybeStr = (val?: string) => {
  if (!val) return undefined
  return val
}

const maybeInt = (val?: string) => {
  if (!val) return undefined
  const int = parseInt(val, 10)
  if (isNaN(int)) return undefined
  return int
}

process.on('uncaughtException', (error: NodeJS.ErrnoException) => {
  logError('Uncaught Exception', error)
  // Don't exit on ERR_HTTP_HEADERS_SENT - it's not fatal
  if (error.code === 'ERR_HTTP_HEADERS_SENT') {
    log('Ignoring non-fatal headers-sent error')
    return
  }
  process.exit(1)
})

process.on('unhandledRejection', (reason) => {
  logError('Unhandled Rejection', reason)
  // Don't exit immediately, just log it
})

void run()
