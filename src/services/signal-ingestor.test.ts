/**
 * Tests for signal intake
 *
 * Property: however many times a signal id is submitted, concurrently or
 * not, exactly one entry order is placed and every submission reports the
 * same position.
 */

import * as fc from 'fast-check';
import { InMemoryOrderRepository } from '../repositories/order';
import { InMemoryPositionRepository } from '../repositories/position';
import { InMemoryPositionHistoryRepository } from '../repositories/position-history';
import { InMemorySignalRepository } from '../repositories/signal';
import { ScriptedGateway } from '../test/scripted-gateway';
import { FIXED_NOW, makeSignalWire, signalIdArb } from '../test/generators';
import { createErrorTable } from './broker-error-table';
import { BrokerRejectionError, MalformedSignalError } from './errors';
import { InstrumentRegistry } from './instrument-registry';
import { OrderStateMachine } from './order-state-machine';
import { PositionAggregator } from './position-aggregator';
import { KeyedLock } from './position-lock';
import {
  DEFAULT_INGESTOR_CONFIG,
  parseSignal,
  planOrders,
  roundPrice,
  SignalIngestor,
  SignalIngestorConfig,
} from './signal-ingestor';

function setup(config: SignalIngestorConfig = DEFAULT_INGESTOR_CONFIG) {
  const clock = () => FIXED_NOW;
  const gateway = new ScriptedGateway();
  const positions = new PositionAggregator({
    repository: new InMemoryPositionRepository(),
    history: new InMemoryPositionHistoryRepository(),
    clock,
  });
  const ingestor = new SignalIngestor({
    signals: new InMemorySignalRepository(),
    orders: new OrderStateMachine({
      repository: new InMemoryOrderRepository(),
      gateway,
      registry: new InstrumentRegistry(),
      errorTable: createErrorTable('LIVE'),
      clock,
    }),
    positions,
    gateway,
    lock: new KeyedLock(),
    config,
    clock,
  });
  return { gateway, positions, ingestor };
}

describe('parseSignal', () => {
  it('converts the wire shape and upper-cases the symbol', () => {
    expect(parseSignal(makeSignalWire({ symbol: 'reliance' }))).toEqual({
      id: 'sig-001',
      symbol: 'RELIANCE',
      side: 'BUY',
      quantity: 50,
      signalType: 'MARKET',
      targetPrice: 120,
      stopPrice: 90,
      issuedAt: '2026-03-02T04:29:00.000Z',
      exchange: undefined,
      product: undefined,
    });
  });

  it('carries the entry price of a limit signal', () => {
    const signal = parseSignal(makeSignalWire({ signal_type: 'LIMIT', entry_price: 100 }));
    expect(signal.signalType).toBe('LIMIT');
    expect(signal.signalType === 'LIMIT' && signal.entryPrice).toBe(100);
  });

  it.each([
    ['a missing target', { target_price: undefined }],
    ['a zero quantity', { quantity: 0 }],
    ['a fractional quantity', { quantity: 1.5 }],
    ['an unknown side', { side: 'HOLD' }],
    ['an unknown signal type', { signal_type: 'ICEBERG' }],
    ['a limit without an entry price', { signal_type: 'LIMIT' }],
    ['a negative stop', { stop_price: -5 }],
    ['an unknown field', { leverage: 5 }],
  ])('rejects %s', (_label, overrides) => {
    expect(() => parseSignal(makeSignalWire(overrides))).toThrow(MalformedSignalError);
  });

  it('rejects a value that is not an object', () => {
    expect(() => parseSignal('BUY RELIANCE')).toThrow(MalformedSignalError);
  });

  it('rejects an unparseable timestamp', () => {
    expect(() => parseSignal(makeSignalWire({ issued_at: 'yesterday' }))).toThrow(
      'Malformed signal: issued_at is not a valid timestamp'
    );
  });
});

describe('planOrders', () => {
  it('turns a breakout into a stop-market entry at the level', () => {
    const [entry, stop, target] = planOrders(
      {
        id: 'sig-001',
        symbol: 'RELIANCE',
        side: 'SELL',
        quantity: 10,
        signalType: 'BREAKOUT',
        entryPrice: 95,
        targetPrice: 80,
        stopPrice: 100,
        targets: [],
        issuedAt: FIXED_NOW.toISOString(),
      },
      'position-1',
      'NSE',
      'MIS'
    );

    expect(entry).toEqual({
      role: 'ENTRY',
      request: {
        parentSignalId: 'sig-001',
        positionId: 'position-1',
        symbol: 'RELIANCE',
        exchange: 'NSE',
        side: 'SELL',
        product: 'MIS',
        quantity: 10,
        role: 'ENTRY',
        orderType: 'SL-MARKET',
        triggerPrice: 95,
      },
    });
    expect(stop).toEqual({ role: 'STOP_LOSS', triggerPrice: 100 });
    expect(target).toEqual({ role: 'TARGET', price: 80 });
  });
});

describe('roundPrice', () => {
  it('rounds to two decimals', () => {
    expect(roundPrice(2750.0000000000005)).toBe(2750);
    expect(roundPrice(101.236)).toBe(101.24);
  });
});

describe('SignalIngestor', () => {
  it('places the entry and opens a pending position', async () => {
    const { gateway, positions, ingestor } = setup();

    const result = await ingestor.ingest(makeSignalWire());

    expect(result).toMatchObject({ duplicate: false, signalId: 'sig-001', orderStatus: 'OPEN', message: 'Signal accepted' });
    expect(gateway.placed.map((order) => [order.orderType, order.side, order.quantity, order.role])).toEqual([
      ['MARKET', 'BUY', 50, 'ENTRY'],
    ]);
    const position = await positions.getPosition(result.positionId);
    expect(position).toMatchObject({
      status: 'PENDING_OPEN',
      direction: 'LONG',
      netQuantity: 0,
      stopPrice: 90,
      targetPrice: 120,
      entryOrderId: result.entryOrderId,
      exchange: 'NSE',
      product: 'MIS',
    });
  });

  it('leaves a breakout entry waiting for its trigger', async () => {
    const { ingestor } = setup();
    const result = await ingestor.ingest(makeSignalWire({ signal_type: 'BREAKOUT', entry_price: 105 }));
    expect(result.orderStatus).toBe('TRIGGER_PENDING');
  });

  it('derives a missing stop from the quote', async () => {
    const { gateway, positions, ingestor } = setup();
    gateway.quotes.set('RELIANCE', 100);

    const result = await ingestor.ingest(makeSignalWire({ stop_price: undefined }));

    expect((await positions.getPosition(result.positionId)).stopPrice).toBe(90);
  });

  it('derives a short stop above the entry price', async () => {
    const { positions, ingestor } = setup();

    const result = await ingestor.ingest(
      makeSignalWire({ side: 'SELL', signal_type: 'LIMIT', entry_price: 2500, target_price: 2300, stop_price: undefined })
    );

    const position = await positions.getPosition(result.positionId);
    expect(position.direction).toBe('SHORT');
    expect(position.stopPrice).toBe(2750);
  });

  it('refuses a signal with no stop and no reference price', async () => {
    const { gateway, ingestor } = setup();

    await expect(ingestor.ingest(makeSignalWire({ stop_price: undefined }))).rejects.toThrow(MalformedSignalError);
    expect(gateway.placed).toHaveLength(0);
    expect(ingestor.getStats()).toEqual({ received: 1, accepted: 0, duplicates: 0, malformed: 1, rejected: 0 });
  });

  it('refuses a stop on the wrong side of the target', async () => {
    const { gateway, ingestor } = setup();
    await expect(ingestor.ingest(makeSignalWire({ stop_price: 130 }))).rejects.toThrow(
      'Malformed signal: stop 130 and target 120 are on the wrong sides for a BUY'
    );
    expect(gateway.placed).toHaveLength(0);
  });

  it('refuses an entry outside the stop-target band', async () => {
    const { ingestor } = setup();
    await expect(
      ingestor.ingest(makeSignalWire({ signal_type: 'LIMIT', entry_price: 125 }))
    ).rejects.toThrow('Malformed signal: entry 125 must lie between stop 90 and target 120');
  });

  it('keeps intermediate target levels ordered and drops the final target from them', async () => {
    const { positions, ingestor } = setup();

    const result = await ingestor.ingest(makeSignalWire({ targets: [120, 110, 105, 110] }));

    expect(await positions.getPosition(result.positionId)).toMatchObject({
      targetPrice: 120,
      targets: [105, 110],
      targetsHit: 0,
    });
  });

  it('orders a short ladder downwards', async () => {
    const { positions, ingestor } = setup();

    const result = await ingestor.ingest(
      makeSignalWire({ side: 'SELL', target_price: 80, stop_price: 110, targets: [90, 95] })
    );

    expect((await positions.getPosition(result.positionId)).targets).toEqual([95, 90]);
  });

  it('refuses a target level outside the entry and final target', async () => {
    const { gateway, ingestor } = setup();
    gateway.quotes.set('RELIANCE', 100);

    await expect(ingestor.ingest(makeSignalWire({ targets: [98, 110] }))).rejects.toThrow(
      new MalformedSignalError('Malformed signal: target level 98 must lie between entry 100 and the final target 120', [])
    );
    await expect(ingestor.ingest(makeSignalWire({ id: 'sig-002', targets: [125] }))).rejects.toThrow(
      'Malformed signal: target level 125 must lie between entry 100 and the final target 120'
    );
    expect(gateway.placed).toHaveLength(0);
  });

  it('rejects an empty target list at the schema', () => {
    expect(() => parseSignal(makeSignalWire({ targets: [] }))).toThrow(MalformedSignalError);
  });

  it('scales the quantity by the configured multiplier', async () => {
    const { gateway, ingestor } = setup({ ...DEFAULT_INGESTOR_CONFIG, quantityMultiplier: 3 });
    await ingestor.ingest(makeSignalWire({ quantity: 10 }));
    expect(gateway.placed[0].quantity).toBe(30);
  });

  it('surfaces a broker rejection and remembers it', async () => {
    const { gateway, positions, ingestor } = setup();
    gateway.rejectCodes.set('RELIANCE', 'MarginException');

    await expect(ingestor.ingest(makeSignalWire())).rejects.toThrow(
      new BrokerRejectionError('Insufficient funds: the order value exceeds the available margin', 'ignored', 'MarginException')
    );
    expect(await positions.listPositions()).toEqual([]);

    const replay = await ingestor.ingest(makeSignalWire());
    expect(replay.duplicate).toBe(true);
    expect(replay.message).toBe('Signal already processed; its entry order was rejected');
    expect(gateway.placed).toHaveLength(1);
    expect(ingestor.getStats()).toEqual({ received: 2, accepted: 0, duplicates: 1, malformed: 0, rejected: 1 });
  });

  it('consumes each signal id exactly once', async () => {
    await fc.assert(
      fc.asyncProperty(signalIdArb(), fc.integer({ min: 2, max: 6 }), async (id, copies) => {
        const { gateway, ingestor } = setup();

        const results = await Promise.all(
          Array.from({ length: copies }, () => ingestor.ingest(makeSignalWire({ id })))
        );

        expect(gateway.placed).toHaveLength(1);
        expect(results.filter((result) => !result.duplicate)).toHaveLength(1);
        expect(new Set(results.map((result) => result.positionId)).size).toBe(1);
        expect(new Set(results.map((result) => result.entryOrderId)).size).toBe(1);
        expect(ingestor.getStats()).toEqual({
          received: copies,
          accepted: 1,
          duplicates: copies - 1,
          malformed: 0,
          rejected: 0,
        });
      }),
      { numRuns: 30 }
    );
  });
});
