/**
 * Sandbox Broker
 *
 * Paper-trading backend. Keeps its own venue-side order book, evaluates
 * working orders against marked prices through the fill simulator and reports
 * the results as sequenced broker updates, exactly like a live gateway would.
 *
 * The book lives in memory. A new process rebuilds it from the persisted
 * orders and positions through restore(); an order this instance has never
 * seen is rebuilt from its record on first use.
 */

import { BackendKind, Order, OrderModification, OrderRole } from '../types/order';
import {
  BrokerGateway,
  BrokerOrderEvent,
  BrokerOrderStatus,
  BrokerOrderUpdate,
  CancelAck,
  ModificationResult,
  PlacementResult,
} from '../types/broker';
import { Position } from '../types/position';
import { MarginSnapshot, SandboxConfig, SandboxErrorCode } from '../types/sandbox';
import { TradeFill } from '../types/trade';
import { DEFAULT_SANDBOX_CONFIG, FillSimulator } from './fill-simulator';
import { InstrumentRegistry } from './instrument-registry';

// Venue-side view of an order
export interface VenueOrder {
  orderId: string;
  brokerOrderId: string;
  positionId: string;
  role: OrderRole;
  symbol: string;
  side: Order['side'];
  orderType: Order['orderType'];
  quantity: number;
  price?: number;
  triggerPrice?: number;
  filledQuantity: number;
  status: BrokerOrderStatus;
  triggered: boolean;
  sequence: number;
  tradeCount: number;
  updates: BrokerOrderUpdate[];
}

export interface SandboxBrokerOptions {
  accountId?: string;
  instanceId?: string; // Tags broker order ids so instances sharing the tables never collide
  registry?: InstrumentRegistry;
  clock?: () => Date;
}

function isWorking(status: BrokerOrderStatus): boolean {
  return status === 'OPEN' || status === 'TRIGGER_PENDING';
}

function isStopType(orderType: Order['orderType']): boolean {
  return orderType === 'SL-MARKET' || orderType === 'SL-LIMIT';
}

export class SandboxBroker implements BrokerGateway {
  readonly kind: BackendKind = 'SANDBOX';
  readonly accountId: string;
  readonly simulator: FillSimulator;
  private readonly instanceId?: string;

  private readonly registry: InstrumentRegistry;
  private readonly clock: () => Date;
  private readonly orders = new Map<string, VenueOrder>();
  private readonly lastPrices = new Map<string, number>();
  private brokerOrderCounter = 0;

  constructor(config: SandboxConfig = DEFAULT_SANDBOX_CONFIG, options: SandboxBrokerOptions = {}) {
    this.accountId = options.accountId ?? 'paper';
    this.instanceId = options.instanceId;
    this.registry = options.registry ?? new InstrumentRegistry();
    this.clock = options.clock ?? (() => new Date());
    this.simulator = new FillSimulator(config);
  }

  /**
   * Records the latest market price for a symbol
   */
  markPrice(symbol: string, price: number): void {
    this.lastPrices.set(symbol.toUpperCase(), price);
  }

  async getQuote(symbol: string): Promise<number | undefined> {
    return this.lastPrices.get(symbol.toUpperCase());
  }

  async placeOrder(order: Order): Promise<PlacementResult> {
    const brokerOrderId = this.nextBrokerOrderId();
    const isStop = isStopType(order.orderType);

    let errorCode: SandboxErrorCode | undefined = this.simulator.checkAcceptance({
      symbol: order.symbol,
      quantity: order.quantity,
      instrument: this.registry.get(order.symbol),
      now: this.clock(),
    });

    if (!errorCode && order.role === 'ENTRY') {
      errorCode = this.reserveEntryMargin(order);
    }

    const status: BrokerOrderStatus = errorCode ? 'REJECTED' : isStop ? 'TRIGGER_PENDING' : 'OPEN';
    this.orders.set(order.orderId, {
      orderId: order.orderId,
      brokerOrderId,
      positionId: order.positionId,
      role: order.role,
      symbol: order.symbol.toUpperCase(),
      side: order.side,
      orderType: order.orderType,
      quantity: order.quantity,
      price: order.price,
      triggerPrice: order.triggerPrice,
      filledQuantity: 0,
      status,
      triggered: false,
      sequence: 1,
      tradeCount: 0,
      updates: [],
    });

    if (errorCode) {
      console.log('[SandboxBroker] Order rejected', {
        accountId: this.accountId,
        orderId: order.orderId,
        errorCode,
      });
      return { brokerOrderId, status: 'REJECTED', errorCode, sequence: 1 };
    }

    return { brokerOrderId, status: isStop ? 'TRIGGER_PENDING' : 'OPEN', sequence: 1 };
  }

  async modifyOrder(order: Order, modification: OrderModification): Promise<ModificationResult> {
    const venue = this.venueFor(order);
    if (!venue || !isWorking(venue.status)) {
      return { accepted: false };
    }
    if (modification.newQuantity !== undefined && modification.newQuantity < venue.filledQuantity) {
      return { accepted: false };
    }

    if (modification.newPrice !== undefined) {
      venue.price = modification.newPrice;
    }
    if (modification.newTriggerPrice !== undefined) {
      venue.triggerPrice = modification.newTriggerPrice;
    }
    if (modification.newQuantity !== undefined) {
      venue.quantity = modification.newQuantity;
    }
    venue.sequence += 1;

    return { accepted: true, sequence: venue.sequence };
  }

  async cancelOrder(order: Order): Promise<CancelAck> {
    const venue = this.venueFor(order);
    if (!venue) {
      return { status: 'FAILED', reason: 'Order not found' };
    }
    if (venue.status === 'COMPLETE') {
      return { status: 'FAILED', reason: 'Order already complete' };
    }
    if (!isWorking(venue.status)) {
      return { status: 'FAILED', reason: `Order is ${venue.status.toLowerCase()}` };
    }

    venue.status = 'CANCELLED';
    venue.sequence += 1;
    this.simulator.margin.releaseReservation(venue.orderId);

    return { status: 'CANCELLED', sequence: venue.sequence };
  }

  /**
   * Evaluates the order against `price` (or the last marked price) and
   * returns every update newer than the order's last applied sequence
   */
  async fetchUpdates(order: Order, price?: number): Promise<BrokerOrderUpdate[]> {
    const venue = this.venueFor(order);
    if (!venue) {
      return [];
    }

    const sample = price ?? this.lastPrices.get(venue.symbol);
    if (isWorking(venue.status) && sample !== undefined) {
      const events = this.evaluate(venue, sample);
      if (events.length > 0) {
        venue.sequence += 1;
        venue.updates.push({
          orderId: venue.orderId,
          sequence: venue.sequence,
          events,
          receivedAt: this.clock().toISOString(),
        });
      }
    }

    return venue.updates.filter((update) => update.sequence > order.lastSequence);
  }

  /**
   * Rebuilds the book after a restart: margin blocked by open positions,
   * last marks, working orders and the margin their entries reserve
   */
  restore(orders: Order[], positions: Position[]): void {
    for (const position of positions) {
      const symbol = position.symbol.toUpperCase();
      if (position.lastPrice !== undefined && !this.lastPrices.has(symbol)) {
        this.lastPrices.set(symbol, position.lastPrice);
      }
      if (position.status === 'ACTIVE' && position.netQuantity !== 0) {
        this.simulator.margin.restoreBlock(position.positionId, Math.abs(position.netQuantity), position.avgPrice);
      }
    }

    let restored = 0;
    for (const order of orders) {
      if (this.orders.has(order.orderId)) {
        continue;
      }
      const venue = this.hydrate(order);
      if (!venue) {
        continue;
      }
      restored += 1;
      const remaining = venue.quantity - venue.filledQuantity;
      const reference = venue.price ?? venue.triggerPrice ?? this.lastPrices.get(venue.symbol);
      if (venue.role === 'ENTRY' && reference !== undefined && remaining > 0) {
        this.simulator.margin.reserve(venue.orderId, remaining * reference, remaining);
      }
    }

    console.log('[SandboxBroker] Book restored', {
      accountId: this.accountId,
      orders: restored,
      margin: this.simulator.margin.snapshot(),
    });
  }

  getVenueOrder(orderId: string): VenueOrder | undefined {
    const venue = this.orders.get(orderId);
    return venue ? structuredClone(venue) : undefined;
  }

  marginSnapshot(): MarginSnapshot {
    return this.simulator.margin.snapshot();
  }

  private venueFor(order: Order): VenueOrder | undefined {
    return this.orders.get(order.orderId) ?? this.hydrate(order);
  }

  // Venue view of a working order placed by another process, from its record
  private hydrate(order: Order): VenueOrder | undefined {
    if (order.backend !== 'SANDBOX' || !order.brokerOrderId?.startsWith('SBX')) {
      return undefined;
    }
    if (order.status !== 'OPEN' && order.status !== 'TRIGGER_PENDING') {
      return undefined;
    }

    const venue: VenueOrder = {
      orderId: order.orderId,
      brokerOrderId: order.brokerOrderId,
      positionId: order.positionId,
      role: order.role,
      symbol: order.symbol.toUpperCase(),
      side: order.side,
      orderType: order.orderType,
      quantity: order.quantity,
      price: order.price,
      triggerPrice: order.triggerPrice,
      filledQuantity: order.filledQuantity,
      status: order.status,
      triggered: isStopType(order.orderType) && order.status === 'OPEN',
      sequence: order.lastSequence,
      // Each earlier fill used up a sequence number, so trade ids stay unique
      tradeCount: order.lastSequence,
      updates: [],
    };
    this.orders.set(order.orderId, venue);
    return venue;
  }

  private evaluate(venue: VenueOrder, price: number): BrokerOrderEvent[] {
    const lotSize = this.registry.get(venue.symbol)?.lotSize ?? 1;
    const decisions = this.simulator.evaluate(venue, price, lotSize);
    const events: BrokerOrderEvent[] = [];

    for (const decision of decisions) {
      switch (decision.kind) {
        case 'TRIGGERED':
          venue.triggered = true;
          venue.status = 'OPEN';
          events.push({ kind: 'TRIGGERED' });
          break;
        case 'FILL': {
          const rejection = this.checkDeferredMargin(venue, decision.quantity, decision.price);
          if (rejection) {
            venue.status = 'REJECTED';
            events.push({ kind: 'REJECTED', errorCode: rejection });
            return events;
          }
          events.push({ kind: 'FILL', fill: this.recordFill(venue, decision.quantity, decision.price) });
          break;
        }
        case 'REJECT':
          venue.status = 'REJECTED';
          events.push({ kind: 'REJECTED', errorCode: decision.errorCode });
          return events;
        case 'TRIGGER_PENDING':
        case 'REST':
          break;
      }
    }

    return events;
  }

  private recordFill(venue: VenueOrder, quantity: number, price: number): TradeFill {
    venue.tradeCount += 1;
    venue.filledQuantity += quantity;
    if (venue.filledQuantity >= venue.quantity) {
      venue.status = 'COMPLETE';
    }

    if (venue.role === 'ENTRY') {
      this.simulator.margin.convert(venue.orderId, venue.positionId, quantity, price);
    } else {
      this.simulator.margin.releaseForExit(venue.positionId, quantity);
    }

    return {
      tradeId: `${venue.brokerOrderId}-T${venue.tradeCount}`,
      orderId: venue.orderId,
      fillQuantity: quantity,
      fillPrice: price,
      filledAt: this.clock().toISOString(),
    };
  }

  // Entries placed without any reference price are checked at their first fill
  private checkDeferredMargin(venue: VenueOrder, quantity: number, price: number): SandboxErrorCode | undefined {
    if (venue.role !== 'ENTRY' || venue.filledQuantity > 0 || this.simulator.margin.isReserved(venue.orderId)) {
      return undefined;
    }
    const notional = venue.quantity * price;
    if (!this.simulator.margin.canAfford(notional)) {
      return 'INSUFFICIENT_MARGIN';
    }
    this.simulator.margin.reserve(venue.orderId, notional, venue.quantity);
    return undefined;
  }

  private reserveEntryMargin(order: Order): SandboxErrorCode | undefined {
    const reference = order.price ?? order.triggerPrice ?? this.lastPrices.get(order.symbol.toUpperCase());
    if (reference === undefined) {
      return undefined;
    }
    const notional = order.quantity * reference;
    if (!this.simulator.margin.canAfford(notional)) {
      return 'INSUFFICIENT_MARGIN';
    }
    this.simulator.margin.reserve(order.orderId, notional, order.quantity);
    return undefined;
  }

  private nextBrokerOrderId(): string {
    this.brokerOrderCounter += 1;
    const counter = String(this.brokerOrderCounter).padStart(8, '0');
    return this.instanceId ? `SBX-${this.instanceId}-${counter}` : `SBX${counter}`;
  }
}
