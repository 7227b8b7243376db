/**
 * Order Event Queue
 *
 * Per-order FIFO of backend updates waiting to be applied. Updates are
 * consumed in arrival order; sequence checks happen when they are applied.
 */

import { BrokerOrderUpdate } from '../types/broker';

export class OrderEventQueue {
  private readonly queues = new Map<string, BrokerOrderUpdate[]>();

  enqueue(update: BrokerOrderUpdate): void {
    const queue = this.queues.get(update.orderId);
    if (queue) {
      queue.push(update);
    } else {
      this.queues.set(update.orderId, [update]);
    }
  }

  enqueueAll(updates: BrokerOrderUpdate[]): void {
    for (const update of updates) {
      this.enqueue(update);
    }
  }

  dequeue(orderId: string): BrokerOrderUpdate | undefined {
    const queue = this.queues.get(orderId);
    if (!queue) {
      return undefined;
    }
    const update = queue.shift();
    if (queue.length === 0) {
      this.queues.delete(orderId);
    }
    return update;
  }

  size(orderId: string): number {
    return this.queues.get(orderId)?.length ?? 0;
  }

  pendingOrderIds(): string[] {
    return [...this.queues.keys()];
  }

  /**
   * Drops everything queued for an order (used when it is quarantined)
   */
  discard(orderId: string): number {
    const dropped = this.size(orderId);
    this.queues.delete(orderId);
    return dropped;
  }
}
