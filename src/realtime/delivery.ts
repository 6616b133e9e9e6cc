import { ChatStore, RECEIPT_STATUSES, ReceiptRecord, ReceiptStatus } from '../store'

const RANK: Record<ReceiptStatus, number> = { sent: 0, delivered: 1, read: 2 }

/**
 * Next status for a receipt asked to move to `target`, or null when that
 * would stand still or go backwards.
 */
export function advanceReceipt(current: ReceiptStatus, target: ReceiptStatus): ReceiptStatus | null {
  return RANK[target] > RANK[current] ? target : null
}

/** Statuses from which `target` is a forward move. */
export function predecessorsOf(target: ReceiptStatus): ReceiptStatus[] {
  return RECEIPT_STATUSES.filter((status) => advanceReceipt(status, target) !== null)
}

/**
 * Receipt state machine over the store. Every write is conditional on the
 * current status, so racing updates for the same receipt cannot regress it
 * and only the first one reports a transition.
 */
export class DeliveryTracker {
  constructor(private store: ChatStore) {}

  markDelivered(messageId: string, userId: string, at: Date): Promise<ReceiptRecord | null> {
    return this.advance(messageId, userId, 'delivered', at)
  }

  markRead(messageId: string, userId: string, at: Date): Promise<ReceiptRecord | null> {
    return this.advance(messageId, userId, 'read', at)
  }

  /** Marks the user's unread receipts in the chat read. Returns the message ids moved. */
  openChat(chatId: string, userId: string, at: Date, beforeMessageId?: string): Promise<string[]> {
    return this.store.bulkMarkRead(chatId, userId, at, beforeMessageId)
  }

  private async advance(
    messageId: string,
    userId: string,
    target: ReceiptStatus,
    at: Date
  ): Promise<ReceiptRecord | null> {
    const moved = await this.store.updateReceipt(messageId, userId, target, at, predecessorsOf(target))
    if (!moved) return null
    return (await this.store.getReceipt(messageId, userId)) ?? null
  }
}
