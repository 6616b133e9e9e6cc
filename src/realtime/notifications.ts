import { AppContext } from '../config'
import { logDebug } from '../logger'
import { TopicBroker } from './broker'
import { Connection, ConnectionHandler, userTopic } from './connection'
import { NotificationEvent, encodeNotification } from './protocol'

/**
 * Publishes to the user's personal topic. Users with no notification
 * connection simply miss it; nothing is queued.
 */
export function notifyUser(
  broker: TopicBroker,
  userId: string,
  notification: NotificationEvent['notification']
): number {
  return broker.publish(userTopic(userId), encodeNotification(notification))
}

/**
 * `/ws/notifications`: a receive-only channel on `user:<id>`. The user was
 * already resolved at upgrade, so there is nothing to authorize here.
 */
export class NotificationConnectionHandler implements ConnectionHandler {
  private state: 'connecting' | 'active' | 'closed' = 'connecting'

  constructor(
    private ctx: AppContext,
    readonly connection: Connection
  ) {}

  async open(): Promise<boolean> {
    if (this.state !== 'connecting') return false
    this.ctx.broker.subscribe(userTopic(this.connection.userId), this.connection)
    this.ctx.sessions.register(this.connection)
    this.state = 'active'
    return true
  }

  async receive(raw: string): Promise<void> {
    logDebug(`[Notifications] Ignoring inbound frame from ${this.connection.userId} (${raw.length} bytes)`)
  }

  close(): void {
    if (this.state === 'closed') return
    const wasActive = this.state === 'active'
    this.state = 'closed'
    if (wasActive) this.ctx.sessions.unregister(this.connection)
    this.ctx.broker.detach(this.connection.id)
  }
}
