/**
 * Signal Ingestor
 *
 * Turns an incoming signal into an entry order and a pending position,
 * exactly once per signal id. Validation happens at the boundary; a signal
 * that fails it never reaches the backend.
 */

import { v4 as uuidv4 } from 'uuid';
import { Order, OrderRequest, ProductType } from '../types/order';
import { BrokerGateway } from '../types/broker';
import { IngestResult } from '../types/engine';
import { IngestionStats, OrderIntent, Signal, SignalInput, SignalRecord } from '../types/signal';
import { SignalWire } from '../schemas/signal';
import { SignalRepository } from '../repositories/signal';
import { BrokerRejectionError, MalformedSignalError } from './errors';
import { OrderStateMachine } from './order-state-machine';
import { PositionAggregator } from './position-aggregator';
import { KeyedLock } from './position-lock';
import { orderLevels } from './protective-order-coordinator';
import { schemaValidator } from './schema-validator';

export interface SignalIngestorConfig {
  autoStopPercent: number;
  quantityMultiplier: number;
  defaultExchange: string;
  defaultProduct: ProductType;
}

export const DEFAULT_INGESTOR_CONFIG: SignalIngestorConfig = {
  autoStopPercent: 10,
  quantityMultiplier: 1,
  defaultExchange: 'NSE',
  defaultProduct: 'MIS',
};

export interface SignalIngestorDeps {
  signals: SignalRepository;
  orders: OrderStateMachine;
  positions: PositionAggregator;
  gateway: BrokerGateway;
  lock: KeyedLock;
  config?: SignalIngestorConfig;
  clock?: () => Date;
}

export function roundPrice(price: number): number {
  return Math.round(price * 100) / 100;
}

/**
 * Validates the wire shape and converts it to a signal variant
 *
 * @throws MalformedSignalError listing every problem found
 */
export function parseSignal(input: unknown): SignalInput {
  const result = schemaValidator.validateSignal(input);
  if (!result.valid) {
    const details = result.errors.map((error) => ({ field: error.path, message: error.message }));
    throw new MalformedSignalError(
      `Malformed signal: ${details.map((detail) => `${detail.field} ${detail.message}`).join('; ')}`,
      details
    );
  }

  const wire: SignalWire = result.value;
  if (Number.isNaN(Date.parse(wire.issued_at))) {
    throw new MalformedSignalError('Malformed signal: issued_at is not a valid timestamp', [
      { field: '/issued_at', message: 'must be an ISO-8601 timestamp' },
    ]);
  }

  const fields = {
    id: wire.id,
    symbol: wire.symbol.toUpperCase(),
    side: wire.side,
    quantity: wire.quantity,
    targetPrice: wire.target_price,
    targets: wire.targets,
    stopPrice: wire.stop_price,
    issuedAt: wire.issued_at,
    exchange: wire.exchange,
    product: wire.product,
  };

  switch (wire.signal_type) {
    case 'MARKET':
      return { ...fields, signalType: 'MARKET' };
    case 'LIMIT':
      return { ...fields, signalType: 'LIMIT', entryPrice: wire.entry_price };
    case 'BREAKOUT':
      return { ...fields, signalType: 'BREAKOUT', entryPrice: wire.entry_price };
  }
}

/**
 * The orders a signal turns into: the entry now, the protective pair once it fills
 */
export function planOrders(signal: Signal, positionId: string, exchange: string, product: ProductType): OrderIntent[] {
  const base = {
    parentSignalId: signal.id,
    positionId,
    symbol: signal.symbol,
    exchange,
    side: signal.side,
    product,
    quantity: signal.quantity,
    role: 'ENTRY' as const,
  };

  let request: OrderRequest;
  switch (signal.signalType) {
    case 'MARKET':
      request = { ...base, orderType: 'MARKET' };
      break;
    case 'LIMIT':
      request = { ...base, orderType: 'LIMIT', price: signal.entryPrice };
      break;
    case 'BREAKOUT':
      // Buy once price trades up through the level, sell once it trades down
      request = { ...base, orderType: 'SL-MARKET', triggerPrice: signal.entryPrice };
      break;
  }

  return [
    { role: 'ENTRY', request },
    { role: 'STOP_LOSS', triggerPrice: signal.stopPrice },
    { role: 'TARGET', price: signal.targetPrice },
  ];
}

export class SignalIngestor {
  private readonly signals: SignalRepository;
  private readonly orders: OrderStateMachine;
  private readonly positions: PositionAggregator;
  private readonly gateway: BrokerGateway;
  private readonly lock: KeyedLock;
  private readonly config: SignalIngestorConfig;
  private readonly clock: () => Date;
  private readonly stats: IngestionStats = { received: 0, accepted: 0, duplicates: 0, malformed: 0, rejected: 0 };

  constructor(deps: SignalIngestorDeps) {
    this.signals = deps.signals;
    this.orders = deps.orders;
    this.positions = deps.positions;
    this.gateway = deps.gateway;
    this.lock = deps.lock;
    this.config = deps.config ?? DEFAULT_INGESTOR_CONFIG;
    this.clock = deps.clock ?? (() => new Date());
  }

  getStats(): IngestionStats {
    return { ...this.stats };
  }

  /**
   * Consumes a signal. A repeated signal id is a no-op returning the ids
   * produced the first time.
   *
   * @throws MalformedSignalError if the signal is invalid
   * @throws BrokerRejectionError if the backend refuses the entry order
   */
  async ingest(input: unknown): Promise<IngestResult> {
    this.stats.received += 1;

    let parsed: SignalInput;
    try {
      parsed = parseSignal(input);
    } catch (error) {
      this.stats.malformed += 1;
      throw error;
    }

    return this.lock.runExclusive(`signal:${parsed.id}`, async () => {
      const existing = await this.signals.getRecord(parsed.id);
      if (existing) {
        return this.duplicate(existing);
      }

      let signal: Signal;
      try {
        signal = await this.resolve(parsed);
      } catch (error) {
        this.stats.malformed += 1;
        throw error;
      }

      const record: SignalRecord = {
        signalId: signal.id,
        positionId: uuidv4(),
        outcome: 'ACCEPTED',
        receivedAt: this.clock().toISOString(),
      };
      if (!(await this.signals.claim(record))) {
        const winner = await this.signals.getRecord(signal.id);
        if (winner) {
          return this.duplicate(winner);
        }
      }

      return this.lock.runExclusive(record.positionId, () => this.openPosition(signal, record));
    });
  }

  /**
   * Resolves the stop (deriving it when absent), scales the quantity and
   * checks the prices are on the right sides of the entry
   *
   * @throws MalformedSignalError if the prices are inconsistent
   */
  async resolve(input: SignalInput): Promise<Signal> {
    const exchange = input.exchange ?? this.config.defaultExchange;
    let reference: number | undefined = input.signalType === 'MARKET' ? undefined : input.entryPrice;
    if (reference === undefined) {
      reference = await this.gateway.getQuote(input.symbol, exchange);
    }

    let stopPrice = input.stopPrice;
    if (stopPrice === undefined) {
      if (reference === undefined) {
        throw new MalformedSignalError('Malformed signal: stop_price is required when no entry price or quote is available', [
          { field: '/stop_price', message: 'is required without a reference price' },
        ]);
      }
      const distance = this.config.autoStopPercent / 100;
      stopPrice = roundPrice(input.side === 'BUY' ? reference * (1 - distance) : reference * (1 + distance));
    }

    const isLong = input.side === 'BUY';
    const below = (a: number, b: number): boolean => (isLong ? a < b : a > b);
    if (!below(stopPrice, input.targetPrice)) {
      throw new MalformedSignalError(
        `Malformed signal: stop ${stopPrice} and target ${input.targetPrice} are on the wrong sides for a ${input.side}`,
        [{ field: '/stop_price', message: 'must be on the losing side of the target' }]
      );
    }
    if (reference !== undefined && !(below(stopPrice, reference) && below(reference, input.targetPrice))) {
      throw new MalformedSignalError(
        `Malformed signal: entry ${reference} must lie between stop ${stopPrice} and target ${input.targetPrice}`,
        [{ field: '/entry_price', message: 'must lie between the stop and the target' }]
      );
    }

    // A level equal to the final target is the target itself
    const targets = orderLevels(isLong ? 'LONG' : 'SHORT', input.targets ?? []).filter(
      (level) => level !== input.targetPrice
    );
    const floor = reference ?? stopPrice;
    for (const level of targets) {
      if (!(below(floor, level) && below(level, input.targetPrice))) {
        throw new MalformedSignalError(
          `Malformed signal: target level ${level} must lie between ${reference === undefined ? 'stop' : 'entry'} ${floor} and the final target ${input.targetPrice}`,
          [{ field: '/targets', message: 'must lie between the entry and the final target' }]
        );
      }
    }

    return { ...input, stopPrice, targets, quantity: input.quantity * this.config.quantityMultiplier };
  }

  private async openPosition(signal: Signal, record: SignalRecord): Promise<IngestResult> {
    const exchange = signal.exchange ?? this.config.defaultExchange;
    const product = signal.product ?? this.config.defaultProduct;
    const [entry] = planOrders(signal, record.positionId, exchange, product);
    if (entry.role !== 'ENTRY') {
      throw new Error('Order plan must start with the entry order');
    }

    let order: Order;
    try {
      order = await this.orders.submit(entry.request);
    } catch (error) {
      this.stats.rejected += 1;
      await this.signals.putRecord({ ...record, outcome: 'REJECTED' });
      throw error;
    }

    if (order.status === 'REJECTED') {
      this.stats.rejected += 1;
      await this.signals.putRecord({ ...record, entryOrderId: order.orderId, outcome: 'REJECTED' });
      throw new BrokerRejectionError(
        order.statusReason ?? 'The order was rejected by the broker',
        order.orderId,
        order.errorCode ?? 'UNKNOWN'
      );
    }

    await this.positions.openPending({
      positionId: record.positionId,
      signalId: signal.id,
      symbol: signal.symbol,
      exchange,
      product,
      direction: signal.side === 'BUY' ? 'LONG' : 'SHORT',
      entryOrderId: order.orderId,
      stopPrice: signal.stopPrice,
      targetPrice: signal.targetPrice,
      targets: signal.targets,
    });
    await this.signals.putRecord({ ...record, entryOrderId: order.orderId });
    this.stats.accepted += 1;

    console.log('[SignalIngestor] Signal accepted', {
      signalId: signal.id,
      positionId: record.positionId,
      entryOrderId: order.orderId,
      quantity: signal.quantity,
      stopPrice: signal.stopPrice,
      targetPrice: signal.targetPrice,
    });

    return {
      duplicate: false,
      signalId: signal.id,
      positionId: record.positionId,
      entryOrderId: order.orderId,
      orderStatus: order.status,
      message: 'Signal accepted',
    };
  }

  private duplicate(record: SignalRecord): IngestResult {
    this.stats.duplicates += 1;
    console.warn('[SignalIngestor] Duplicate signal ignored', { signalId: record.signalId });
    return {
      duplicate: true,
      signalId: record.signalId,
      positionId: record.positionId,
      entryOrderId: record.entryOrderId,
      message:
        record.outcome === 'REJECTED'
          ? 'Signal already processed; its entry order was rejected'
          : 'Signal already processed',
    };
  }
}
