import { BackendKind, Order, OrderModification, OrderRole } from '../types/order';
import {
  BrokerGateway,
  BrokerOrderEvent,
  BrokerOrderUpdate,
  CancelAck,
  ModificationResult,
  PlacementResult,
} from '../types/broker';

type CancelBehaviour = CancelAck['status'];

/**
 * In-process backend whose updates are pushed by the test.
 * Each pushed batch gets the order's next sequence number.
 */
export class ScriptedGateway implements BrokerGateway {
  readonly kind: BackendKind = 'LIVE';
  readonly placed: Order[] = [];
  readonly cancelled: string[] = [];
  readonly modified: { orderId: string; modification: OrderModification }[] = [];

  cancelBehaviour: CancelBehaviour = 'CANCELLED';
  rejectCodes = new Map<string, string>(); // symbol -> error code
  failPlacement = new Set<OrderRole>(); // roles whose placement throws
  quotes = new Map<string, number>();

  private readonly sequences = new Map<string, number>();
  private readonly updates = new Map<string, BrokerOrderUpdate[]>();
  private counter = 0;

  async placeOrder(order: Order): Promise<PlacementResult> {
    if (this.failPlacement.has(order.role)) {
      throw new Error(`Timed out placing the ${order.role} order`);
    }
    this.counter += 1;
    this.placed.push(order);
    this.sequences.set(order.orderId, 1);
    const brokerOrderId = `SCR${this.counter}`;
    const errorCode = this.rejectCodes.get(order.symbol);
    if (errorCode) {
      return { brokerOrderId, status: 'REJECTED', errorCode, sequence: 1 };
    }
    const isStop = order.orderType === 'SL-MARKET' || order.orderType === 'SL-LIMIT';
    return { brokerOrderId, status: isStop ? 'TRIGGER_PENDING' : 'OPEN', sequence: 1 };
  }

  async modifyOrder(order: Order, modification: OrderModification): Promise<ModificationResult> {
    this.modified.push({ orderId: order.orderId, modification });
    return { accepted: true, sequence: this.bump(order.orderId) };
  }

  async cancelOrder(order: Order): Promise<CancelAck> {
    this.cancelled.push(order.orderId);
    if (this.cancelBehaviour === 'CANCELLED') {
      return { status: 'CANCELLED', sequence: this.bump(order.orderId) };
    }
    if (this.cancelBehaviour === 'FAILED') {
      return { status: 'FAILED', reason: 'Cancel refused by the venue' };
    }
    return { status: 'PENDING_CANCEL' };
  }

  async fetchUpdates(order: Order): Promise<BrokerOrderUpdate[]> {
    return (this.updates.get(order.orderId) ?? []).filter((update) => update.sequence > order.lastSequence);
  }

  async getQuote(symbol: string): Promise<number | undefined> {
    return this.quotes.get(symbol);
  }

  /**
   * Queues a batch of events for an order under its next sequence
   */
  push(orderId: string, events: BrokerOrderEvent[]): BrokerOrderUpdate {
    const update: BrokerOrderUpdate = {
      orderId,
      sequence: this.bump(orderId),
      events,
      receivedAt: '2026-03-02T04:30:00.000Z',
    };
    this.updates.set(orderId, [...(this.updates.get(orderId) ?? []), update]);
    return update;
  }

  /**
   * Queues an update with an explicit sequence, for replay and staleness tests
   */
  pushRaw(update: BrokerOrderUpdate): void {
    this.updates.set(update.orderId, [...(this.updates.get(update.orderId) ?? []), update]);
  }

  fill(orderId: string, quantity: number, price: number, tradeId = `${orderId}-${quantity}@${price}`): BrokerOrderUpdate {
    return this.push(orderId, [
      {
        kind: 'FILL',
        fill: { tradeId, orderId, fillQuantity: quantity, fillPrice: price, filledAt: '2026-03-02T04:30:00.000Z' },
      },
    ]);
  }

  private bump(orderId: string): number {
    const next = (this.sequences.get(orderId) ?? 0) + 1;
    this.sequences.set(orderId, next);
    return next;
  }
}
