/**
 * Live Broker Gateway
 *
 * Adapts a `LiveBrokerAdapter` to the engine's `BrokerGateway` contract.
 * Transient failures are retried with exponential backoff; once retries are
 * exhausted the failure is escalated as a sync inconsistency. Status polls are
 * diffed against the engine's own order record to produce ordered events.
 */

import { BackendKind, Order, OrderModification, OrderStatus } from '../types/order';
import {
  BrokerGateway,
  BrokerOrderEvent,
  BrokerOrderSnapshot,
  BrokerOrderUpdate,
  CancelAck,
  LiveBrokerAdapter,
  ModificationResult,
  PlacementResult,
} from '../types/broker';
import { BrokerErrorTable, createErrorTable } from './broker-error-table';
import { SyncInconsistencyError, TransientCommError } from './errors';

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
};

/**
 * Message patterns that indicate a transient failure
 */
const TRANSIENT_MESSAGE_PATTERNS: RegExp[] = [
  /timeout/i,
  /timed out/i,
  /network/i,
  /econnreset/i,
  /econnrefused/i,
  /socket hang up/i,
  /too many requests/i,
  /throttl/i,
];

export interface LiveBrokerGatewayOptions {
  errorTable?: BrokerErrorTable;
  retryConfig?: RetryConfig;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

/**
 * Calculate retry delay using exponential backoff
 *
 * Formula: delay = initialDelayMs * (multiplier ^ attemptNumber)
 * Capped at maxDelayMs
 */
export function getRetryDelay(attemptNumber: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.initialDelayMs * Math.pow(config.multiplier, attemptNumber);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Extract the broker error code from a thrown value, if it has one
 */
export function extractErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    return String(error.code);
  }
  if ('errorCode' in error && (typeof error.errorCode === 'string' || typeof error.errorCode === 'number')) {
    return String(error.errorCode);
  }
  return undefined;
}

/**
 * Whether a failure may succeed on retry
 */
export function isTransientFailure(error: unknown, table: BrokerErrorTable): boolean {
  if (error instanceof TransientCommError) {
    return true;
  }
  if (table.isTransient(extractErrorCode(error))) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message));
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class LiveBrokerGateway implements BrokerGateway {
  readonly kind: BackendKind = 'LIVE';

  private readonly errorTable: BrokerErrorTable;
  private readonly retryConfig: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;

  constructor(private readonly adapter: LiveBrokerAdapter, options: LiveBrokerGatewayOptions = {}) {
    this.errorTable = options.errorTable ?? createErrorTable('LIVE');
    this.retryConfig = options.retryConfig ?? DEFAULT_RETRY_CONFIG;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
  }

  async placeOrder(order: Order): Promise<PlacementResult> {
    let snapshot: BrokerOrderSnapshot;
    try {
      snapshot = await this.withRetry('placeOrder', order.orderId, () => this.adapter.placeOrder(order));
    } catch (error) {
      if (error instanceof SyncInconsistencyError) {
        throw error;
      }
      return { status: 'REJECTED', errorCode: extractErrorCode(error) ?? 'UNKNOWN', sequence: 0 };
    }

    if (snapshot.status === 'REJECTED') {
      return {
        brokerOrderId: snapshot.brokerOrderId,
        status: 'REJECTED',
        errorCode: snapshot.errorCode ?? 'UNKNOWN',
        sequence: 0,
      };
    }

    // Fills or a trigger already visible in the acknowledgement arrive through the first poll
    const isStop = order.orderType === 'SL-MARKET' || order.orderType === 'SL-LIMIT';
    return {
      brokerOrderId: snapshot.brokerOrderId,
      status: isStop ? 'TRIGGER_PENDING' : 'OPEN',
      sequence: 0,
    };
  }

  async modifyOrder(order: Order, modification: OrderModification): Promise<ModificationResult> {
    const brokerOrderId = order.brokerOrderId;
    if (!brokerOrderId) {
      return { accepted: false };
    }

    try {
      const snapshot = await this.withRetry('modifyOrder', order.orderId, () =>
        this.adapter.modifyOrder(brokerOrderId, modification)
      );
      if (snapshot.status === 'REJECTED') {
        return { accepted: false, errorCode: snapshot.errorCode };
      }
      return { accepted: true };
    } catch (error) {
      if (error instanceof SyncInconsistencyError) {
        throw error;
      }
      return { accepted: false, errorCode: extractErrorCode(error) };
    }
  }

  async cancelOrder(order: Order): Promise<CancelAck> {
    const brokerOrderId = order.brokerOrderId;
    if (!brokerOrderId) {
      return { status: 'FAILED', reason: 'Order has no broker id' };
    }

    let snapshot: BrokerOrderSnapshot;
    try {
      snapshot = await this.withRetry('cancelOrder', order.orderId, () => this.adapter.cancelOrder(brokerOrderId));
    } catch (error) {
      if (error instanceof SyncInconsistencyError) {
        throw error;
      }
      const errorCode = extractErrorCode(error);
      return { status: 'FAILED', errorCode, reason: this.errorTable.describe(errorCode) };
    }

    if (snapshot.status === 'COMPLETE') {
      return { status: 'FAILED', reason: 'Order already complete' };
    }
    // Unreported fills must be picked up by the next poll before the cancel lands
    if (snapshot.status === 'CANCELLED' && snapshot.filledQuantity === order.filledQuantity) {
      return { status: 'CANCELLED' };
    }
    return { status: 'PENDING_CANCEL' };
  }

  async fetchUpdates(order: Order): Promise<BrokerOrderUpdate[]> {
    const brokerOrderId = order.brokerOrderId;
    if (!brokerOrderId) {
      return [];
    }

    const snapshot = await this.withRetry('getOrderStatus', order.orderId, () =>
      this.adapter.getOrderStatus(brokerOrderId)
    );

    if (snapshot.sequence < order.lastSequence) {
      // Handed to the state machine, which reports it as stale
      return [this.toUpdate(order, snapshot.sequence, [])];
    }
    if (snapshot.sequence === order.lastSequence) {
      return [];
    }

    const events = diffSnapshot(order, snapshot, this.clock().toISOString());
    return events.length > 0 ? [this.toUpdate(order, snapshot.sequence, events)] : [];
  }

  async getQuote(symbol: string, exchange: string): Promise<number | undefined> {
    return this.withRetry('getQuote', undefined, () => this.adapter.getQuote(symbol, exchange));
  }

  private toUpdate(order: Order, sequence: number, events: BrokerOrderEvent[]): BrokerOrderUpdate {
    return { orderId: order.orderId, sequence, events, receivedAt: this.clock().toISOString() };
  }

  private async withRetry<T>(operation: string, orderId: string | undefined, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isTransientFailure(error, this.errorTable)) {
          throw error;
        }
        if (attempt >= this.retryConfig.maxRetries) {
          console.error('[LiveBrokerGateway] Retries exhausted', {
            operation,
            orderId,
            attempts: attempt + 1,
            message: error instanceof Error ? error.message : String(error),
          });
          throw new SyncInconsistencyError(
            `${operation} failed after ${attempt + 1} attempts`,
            'RETRIES_EXHAUSTED',
            orderId
          );
        }

        const delay = getRetryDelay(attempt, this.retryConfig);
        console.warn('[LiveBrokerGateway] Transient failure, retrying', {
          operation,
          orderId,
          attempt: attempt + 1,
          delayMs: delay,
        });
        await this.sleep(delay);
      }
    }
  }
}

/**
 * Events that take the engine's order record to the broker's snapshot
 */
export function diffSnapshot(order: Order, snapshot: BrokerOrderSnapshot, observedAt: string): BrokerOrderEvent[] {
  const events: BrokerOrderEvent[] = [];
  const previous: OrderStatus = order.status;

  if (previous === 'TRIGGER_PENDING' && snapshot.status !== 'TRIGGER_PENDING' && snapshot.status !== 'REJECTED') {
    if (snapshot.status !== 'CANCELLED' || snapshot.filledQuantity > order.filledQuantity) {
      events.push({ kind: 'TRIGGERED' });
    }
  } else if (previous === 'OPEN' && snapshot.status === 'TRIGGER_PENDING') {
    events.push({ kind: 'TRIGGER_PENDING' });
  }

  const delta = snapshot.filledQuantity - order.filledQuantity;
  if (delta > 0) {
    const fillPrice =
      (snapshot.avgPrice * snapshot.filledQuantity - order.avgFillPrice * order.filledQuantity) / delta;
    events.push({
      kind: 'FILL',
      fill: {
        tradeId: `${snapshot.brokerOrderId}-${snapshot.sequence}`,
        orderId: order.orderId,
        fillQuantity: delta,
        fillPrice,
        filledAt: observedAt,
      },
    });
  }

  // A repeated CANCELLED confirms a cancel that was committed on timeout
  if (snapshot.status === 'CANCELLED' && (previous !== 'CANCELLED' || order.cancelConfirmed === false)) {
    events.push({ kind: 'CANCELLED' });
  } else if (snapshot.status === 'REJECTED' && previous !== 'REJECTED') {
    events.push({ kind: 'REJECTED', errorCode: snapshot.errorCode ?? 'UNKNOWN' });
  }

  return events;
}
