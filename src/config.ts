import { Database } from './db'
import { ChatStore } from './store'
import { KyselyChatStore } from './store/sqlite'
import { TopicBroker } from './realtime/broker'
import { SessionRegistry, Clock } from './realtime/session-registry'
import { DeliveryTracker } from './realtime/delivery'
import { CallService } from './realtime/calls'

export type AppContext = {
  db: Database
  store: ChatStore
  broker: TopicBroker
  sessions: SessionRegistry
  delivery: DeliveryTracker
  calls: CallService
  clock: Clock
  cfg: Config
}

export type Config = {
  port: number
  listenhost: string
  sqliteLocation: string
  heartbeatInterval: number
  connectionTimeout: number
  maxBufferedBytes: number
  storeRetryAttempts: number
  deleteWindowMs: number
}

export const defaultConfig: Config = {
  port: 3000,
  listenhost: 'localhost',
  sqliteLocation: ':memory:',
  heartbeatInterval: 30000,
  connectionTimeout: 90000,
  maxBufferedBytes: 1024 * 1024,
  storeRetryAttempts: 3,
  deleteWindowMs: 60 * 60 * 1000,
}

export function createAppContext(
  db: Database,
  cfg: Config,
  clock: Clock = () => new Date()
): AppContext {
  const store = new KyselyChatStore(db, { retryAttempts: cfg.storeRetryAttempts })
  const broker = new TopicBroker({ maxBufferedBytes: cfg.maxBufferedBytes })
  const sessions = new SessionRegistry(broker, store, clock)
  const delivery = new DeliveryTracker(store)
  const calls = new CallService(store, broker, clock)
  return { db, store, broker, sessions, delivery, calls, clock, cfg }
}
