import { logDebug, logError } from '../logger'
import { ChatStore } from '../store'
import { TopicBroker } from './broker'
import { Connection, Topic, isChatTopic } from './connection'
import { encodeUserStatus } from './protocol'

export type Clock = () => Date

interface Presence {
  connections: Set<string>
  // Chat topics that saw this online period's `is_online: true`
  announced: Set<Topic>
}

/**
 * Who is online, reference counted over live connections of every kind.
 *
 * A user goes online with their first connection and offline when the last
 * one goes. Status events go to chat topics only: once per topic per online
 * period, however many devices are subscribed there.
 *
 * Call register() after the connection has subscribed to its topics and
 * unregister() before it is detached from them.
 */
export class SessionRegistry {
  private users = new Map<string, Presence>()
  private owners = new Map<string, string>()
  private writes = new Set<Promise<void>>()

  constructor(
    private broker: TopicBroker,
    private store: Pick<ChatStore, 'setUserOnline'>,
    private clock: Clock
  ) {}

  /** Returns true when this connection brought the user online. */
  register(connection: Connection): boolean {
    if (this.owners.has(connection.id)) return false
    this.owners.set(connection.id, connection.userId)

    let presence = this.users.get(connection.userId)
    const cameOnline = !presence
    if (!presence) {
      presence = { connections: new Set(), announced: new Set() }
      this.users.set(connection.userId, presence)
      this.persist(connection.userId, true)
    }
    presence.connections.add(connection.id)

    for (const topic of this.broker.topicsOf(connection.id)) {
      if (!isChatTopic(topic) || presence.announced.has(topic)) continue
      presence.announced.add(topic)
      this.broker.publish(topic, encodeUserStatus(connection.userId, true))
    }

    logDebug(`[Presence] ${connection.userId} +${connection.id} (${presence.connections.size} live)`)
    return cameOnline
  }

  /** Returns true when this was the user's last connection. */
  unregister(connection: Connection): boolean {
    const userId = this.owners.get(connection.id)
    if (userId === undefined) return false
    this.owners.delete(connection.id)

    const presence = this.users.get(userId)
    if (!presence) return false
    presence.connections.delete(connection.id)
    if (presence.connections.size > 0) {
      logDebug(`[Presence] ${userId} -${connection.id} (${presence.connections.size} live)`)
      return false
    }

    this.users.delete(userId)
    const lastSeen = this.clock()
    this.persist(userId, false, lastSeen)
    const offline = encodeUserStatus(userId, false, lastSeen)
    for (const topic of presence.announced) {
      this.broker.publish(topic, offline, { exclude: connection.id })
    }
    logDebug(`[Presence] ${userId} offline`)
    return true
  }

  isOnline(userId: string): boolean {
    return this.users.has(userId)
  }

  connectionsFor(userId: string): string[] {
    const presence = this.users.get(userId)
    return presence ? [...presence.connections] : []
  }

  onlineUsers(): string[] {
    return [...this.users.keys()]
  }

  /** Resolves once every presence write issued so far has finished. */
  async settled(): Promise<void> {
    await Promise.all([...this.writes])
  }

  private persist(userId: string, isOnline: boolean, at: Date = this.clock()): void {
    const write = this.store
      .setUserOnline(userId, isOnline, at)
      .catch((err: unknown) => {
        logError(`[Presence] Failed to persist ${isOnline ? 'online' : 'offline'} for ${userId}`, err)
      })
      .finally(() => this.writes.delete(write))
    this.writes.add(write)
  }
}
