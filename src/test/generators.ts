import * as fc from 'fast-check';
import { Order, OrderSide } from '../types/order';
import { Position } from '../types/position';
import { TradeFill } from '../types/trade';

/**
 * Builders and fast-check arbitraries shared by the engine tests
 */

export const FIXED_NOW = new Date('2026-03-02T04:30:00.000Z');

let orderCounter = 0;

/**
 * A working order with sensible defaults
 */
export function makeOrder(overrides: Partial<Order> = {}): Order {
  orderCounter += 1;
  return {
    orderId: `order-${orderCounter}`,
    parentSignalId: 'signal-1',
    positionId: 'position-1',
    symbol: 'RELIANCE',
    exchange: 'NSE',
    side: 'BUY',
    orderType: 'MARKET',
    product: 'MIS',
    quantity: 50,
    status: 'OPEN',
    filledQuantity: 0,
    avgFillPrice: 0,
    role: 'ENTRY',
    backend: 'SANDBOX',
    brokerOrderId: `BRK-${orderCounter}`,
    lastSequence: 1,
    quarantined: false,
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

/**
 * An open long of 50 @ 100 with its protective levels
 */
export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    positionId: 'position-1',
    signalId: 'signal-1',
    symbol: 'RELIANCE',
    exchange: 'NSE',
    product: 'MIS',
    direction: 'LONG',
    netQuantity: 50,
    avgPrice: 100,
    openLots: [{ tradeId: 'trade-1', quantity: 50, price: 100 }],
    realizedPnl: 0,
    unrealizedPnl: 0,
    lastPrice: 100,
    status: 'ACTIVE',
    entryOrderId: 'entry-1',
    stopPrice: 90,
    targetPrice: 120,
    targets: [],
    targetsHit: 0,
    highWaterMark: 100,
    quarantined: false,
    anomalies: [],
    createdAt: FIXED_NOW.toISOString(),
    updatedAt: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

export function makeFill(orderId: string, fillQuantity: number, fillPrice: number, tradeId?: string): TradeFill {
  return {
    tradeId: tradeId ?? `${orderId}-T${fillQuantity}-${fillPrice}`,
    orderId,
    fillQuantity,
    fillPrice,
    filledAt: FIXED_NOW.toISOString(),
  };
}

/**
 * Signal in its snake_case wire shape
 */
export function makeSignalWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'sig-001',
    symbol: 'RELIANCE',
    side: 'BUY',
    quantity: 50,
    signal_type: 'MARKET',
    target_price: 120,
    stop_price: 90,
    issued_at: '2026-03-02T04:29:00.000Z',
    ...overrides,
  };
}

/**
 * Generator for order sides
 */
export const orderSideArb = (): fc.Arbitrary<OrderSide> => fc.constantFrom<OrderSide>('BUY', 'SELL');

/**
 * Generator for prices with two decimals
 */
export const priceArb = (min = 1, max = 100000): fc.Arbitrary<number> =>
  fc.integer({ min: min * 100, max: max * 100 }).map((cents) => cents / 100);

/**
 * Generator for whole-number prices, which keep P&L arithmetic exact
 */
export const wholePriceArb = (min = 1, max = 5000): fc.Arbitrary<number> => fc.integer({ min, max });

/**
 * Generator for fill quantity sequences
 */
export const fillQuantitiesArb = (): fc.Arbitrary<number[]> =>
  fc.array(fc.integer({ min: 1, max: 40 }), { minLength: 1, maxLength: 10 });

/**
 * Generator for signal ids
 */
export const signalIdArb = (): fc.Arbitrary<string> =>
  fc.stringMatching(/^[a-z0-9]{4,16}$/).map((suffix) => `sig-${suffix}`);
