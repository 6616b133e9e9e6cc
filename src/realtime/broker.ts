import { logDebug, logWarn } from '../logger'
import { addBreadcrumb } from '../monitoring'
import { Connection, Topic } from './connection'
import { ServerEvent } from './protocol'

export interface PublishOptions {
  // Connection id that must not receive the event (the publisher itself)
  exclude?: string
}

export interface BrokerOptions {
  maxBufferedBytes: number
}

/**
 * In-process topic fan-out. Owns the topic -> subscriber mapping and the
 * arena of attached connections; handlers refer to connections by id.
 *
 * Everything here runs synchronously on the event loop, so a publish sees a
 * consistent subscriber set. A subscriber whose write fails or whose send
 * buffer is over the limit is detached and its transport terminated; the
 * socket's close event then runs the owning handler's teardown.
 */
export class TopicBroker {
  private topics = new Map<Topic, Set<string>>()
  private connections = new Map<string, Connection>()
  private memberships = new Map<string, Set<Topic>>()

  constructor(private opts: BrokerOptions) {}

  attach(connection: Connection): void {
    if (this.connections.has(connection.id)) return
    this.connections.set(connection.id, connection)
    this.memberships.set(connection.id, new Set())
  }

  /** Removes the connection from every topic. Returns the topics it left. */
  detach(connectionId: string): Topic[] {
    const joined = this.memberships.get(connectionId)
    if (!joined) return []
    for (const topic of joined) {
      this.removeFromTopic(topic, connectionId)
    }
    this.memberships.delete(connectionId)
    this.connections.delete(connectionId)
    return [...joined]
  }

  isAttached(connectionId: string): boolean {
    return this.connections.has(connectionId)
  }

  subscribe(topic: Topic, connection: Connection): void {
    this.attach(connection)
    let subscribers = this.topics.get(topic)
    if (!subscribers) {
      subscribers = new Set()
      this.topics.set(topic, subscribers)
    }
    subscribers.add(connection.id)
    this.memberships.get(connection.id)?.add(topic)
  }

  unsubscribe(topic: Topic, connectionId: string): void {
    this.removeFromTopic(topic, connectionId)
    this.memberships.get(connectionId)?.delete(topic)
  }

  /**
   * Delivers the event to every subscriber of the topic except `exclude`.
   * Returns how many subscribers it was written to.
   */
  publish(topic: Topic, event: ServerEvent, opts: PublishOptions = {}): number {
    const subscribers = this.topics.get(topic)
    if (!subscribers || subscribers.size === 0) return 0

    const data = JSON.stringify(event)
    let delivered = 0
    // Copy: a failed write detaches the subscriber mid-loop
    for (const connectionId of [...subscribers]) {
      if (connectionId === opts.exclude) continue
      const connection = this.connections.get(connectionId)
      if (!connection) {
        subscribers.delete(connectionId)
        continue
      }
      if (this.write(connection, data)) delivered++
    }
    logDebug(`[Broker] ${event.type} -> ${topic} (${delivered})`)
    return delivered
  }

  /** Direct write to one attached connection, outside any topic. */
  send(connectionId: string, event: ServerEvent): boolean {
    const connection = this.connections.get(connectionId)
    if (!connection) return false
    return this.write(connection, JSON.stringify(event))
  }

  subscribers(topic: Topic): Connection[] {
    const ids = this.topics.get(topic)
    if (!ids) return []
    const result: Connection[] = []
    for (const id of ids) {
      const connection = this.connections.get(id)
      if (connection) result.push(connection)
    }
    return result
  }

  topicsOf(connectionId: string): Topic[] {
    const joined = this.memberships.get(connectionId)
    return joined ? [...joined] : []
  }

  get topicCount(): number {
    return this.topics.size
  }

  get connectionCount(): number {
    return this.connections.size
  }

  private write(connection: Connection, data: string): boolean {
    const { transport } = connection
    if (!transport.isOpen) {
      this.drop(connection, 'transport closed')
      return false
    }
    if (transport.bufferedAmount > this.opts.maxBufferedBytes) {
      this.drop(connection, `send buffer over ${this.opts.maxBufferedBytes} bytes`)
      return false
    }
    try {
      transport.send(data, (err) => this.drop(connection, `send failed: ${err.message}`))
      return true
    } catch (err) {
      this.drop(connection, `send failed: ${err instanceof Error ? err.message : String(err)}`)
      return false
    }
  }

  private drop(connection: Connection, reason: string): void {
    if (!this.connections.has(connection.id)) return
    logWarn(`[Broker] Dropping ${connection.kind} subscriber ${connection.id} (user ${connection.userId}): ${reason}`)
    const topics = this.detach(connection.id)
    addBreadcrumb('Dropped broken subscriber', 'broker', {
      connectionId: connection.id,
      userId: connection.userId,
      kind: connection.kind,
      topics,
      reason,
    })
    connection.transport.terminate()
  }

  private removeFromTopic(topic: Topic, connectionId: string): void {
    const subscribers = this.topics.get(topic)
    if (!subscribers) return
    subscribers.delete(connectionId)
    if (subscribers.size === 0) this.topics.delete(topic)
  }
}
