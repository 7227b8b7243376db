/**
 * Tests for the fill simulator
 *
 * Property: the same seed and the same inputs always give the same draws.
 * Property: stochastic partial fills are whole lots and never exceed the
 * remaining quantity.
 */

import * as fc from 'fast-check';
import { SandboxConfig } from '../types/sandbox';
import {
  DEFAULT_SANDBOX_CONFIG,
  FillSimulator,
  isMarketable,
  isTriggerCrossed,
  isWithinMarketHours,
  MarginAccount,
  SimulatedOrder,
} from './fill-simulator';
import { DEFAULT_INSTRUMENTS } from './instrument-registry';

function order(overrides: Partial<SimulatedOrder> = {}): SimulatedOrder {
  return {
    orderType: 'MARKET',
    side: 'BUY',
    quantity: 50,
    filledQuantity: 0,
    triggered: false,
    ...overrides,
  };
}

const stochastic = (overrides: Partial<SandboxConfig> = {}): SandboxConfig => ({
  ...DEFAULT_SANDBOX_CONFIG,
  fillMode: 'stochastic',
  partialFillProbability: 1,
  partialFillRatio: 0.5,
  ...overrides,
});

describe('price predicates', () => {
  it('crosses a buy trigger at or above it and a sell trigger at or below it', () => {
    expect(isTriggerCrossed('BUY', 105, 105)).toBe(true);
    expect(isTriggerCrossed('BUY', 105, 104.95)).toBe(false);
    expect(isTriggerCrossed('SELL', 90, 90)).toBe(true);
    expect(isTriggerCrossed('SELL', 90, 90.05)).toBe(false);
  });

  it('treats a buy limit as marketable at or below the limit', () => {
    expect(isMarketable('BUY', 100, 100)).toBe(true);
    expect(isMarketable('BUY', 100, 100.5)).toBe(false);
    expect(isMarketable('SELL', 120, 120)).toBe(true);
    expect(isMarketable('SELL', 120, 119.5)).toBe(false);
  });

  it('checks the session in the exchange time zone', () => {
    const hours = { openMinute: 9 * 60 + 15, closeMinute: 15 * 60 + 30, utcOffsetMinutes: 330 };

    expect(isWithinMarketHours(hours, new Date('2026-03-02T04:00:00.000Z'))).toBe(true);
    expect(isWithinMarketHours(hours, new Date('2026-03-02T03:44:00.000Z'))).toBe(false);
    expect(isWithinMarketHours(hours, new Date('2026-03-02T10:00:00.000Z'))).toBe(false);
  });
});

describe('FillSimulator.evaluate', () => {
  it('fills a market order in full at the sample price', () => {
    const simulator = new FillSimulator();
    expect(simulator.evaluate(order(), 101.5)).toEqual([{ kind: 'FILL', quantity: 50, price: 101.5 }]);
  });

  it('leaves an untriggered stop waiting', () => {
    const simulator = new FillSimulator();
    const stop = order({ orderType: 'SL-MARKET', side: 'SELL', triggerPrice: 90 });

    expect(simulator.evaluate(stop, 95)).toEqual([{ kind: 'TRIGGER_PENDING' }]);
  });

  it('triggers a stop and fills it at the gapped price', () => {
    const simulator = new FillSimulator();
    const stop = order({ orderType: 'SL-MARKET', side: 'SELL', triggerPrice: 90 });

    expect(simulator.evaluate(stop, 80)).toEqual([
      { kind: 'TRIGGERED' },
      { kind: 'FILL', quantity: 50, price: 80 },
    ]);
  });

  it('lets a triggered stop-limit rest when the market is through its limit', () => {
    const simulator = new FillSimulator();
    const stop = order({ orderType: 'SL-LIMIT', side: 'SELL', triggerPrice: 90, price: 89 });

    expect(simulator.evaluate(stop, 85)).toEqual([{ kind: 'TRIGGERED' }, { kind: 'REST' }]);
  });

  it('rests a limit that is not marketable', () => {
    const simulator = new FillSimulator();
    expect(simulator.evaluate(order({ orderType: 'LIMIT', price: 100 }), 101)).toEqual([{ kind: 'REST' }]);
  });

  it('returns nothing for a fully filled order', () => {
    const simulator = new FillSimulator();
    expect(simulator.evaluate(order({ filledQuantity: 50 }), 100)).toEqual([]);
  });

  it('splits fills by the configured ratio when a partial fill is drawn', () => {
    const simulator = new FillSimulator(stochastic());

    expect(simulator.evaluate(order({ quantity: 50 }), 100)).toEqual([{ kind: 'FILL', quantity: 25, price: 100 }]);
    expect(simulator.evaluate(order({ quantity: 50, filledQuantity: 25 }), 100)).toEqual([
      { kind: 'FILL', quantity: 12, price: 100 },
    ]);
  });

  it('rounds partial fills down to whole lots', () => {
    const simulator = new FillSimulator(stochastic());

    expect(simulator.evaluate(order({ quantity: 75 }), 22000, 25)).toEqual([
      { kind: 'FILL', quantity: 25, price: 22000 },
    ]);
    // A single remaining lot always fills in full
    expect(simulator.evaluate(order({ quantity: 75, filledQuantity: 50 }), 22000, 25)).toEqual([
      { kind: 'FILL', quantity: 25, price: 22000 },
    ]);
  });

  it('never partially fills with zero probability', () => {
    const simulator = new FillSimulator(stochastic({ partialFillProbability: 0 }));
    expect(simulator.evaluate(order({ quantity: 50 }), 100)).toEqual([{ kind: 'FILL', quantity: 50, price: 100 }]);
  });

  it('produces whole-lot partial fills within the remaining quantity', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 50 }),
        fc.integer({ min: 1, max: 40 }),
        fc.double({ min: 0.05, max: 0.95, noNaN: true }),
        fc.integer(),
        (lotSize, lots, ratio, seed) => {
          const simulator = new FillSimulator(stochastic({ partialFillRatio: ratio, seed }));
          const quantity = lotSize * lots;
          const [decision] = simulator.evaluate(order({ quantity }), 100, lotSize);

          expect(decision.kind).toBe('FILL');
          if (decision.kind === 'FILL') {
            expect(decision.quantity % lotSize).toBe(0);
            expect(decision.quantity).toBeGreaterThan(0);
            expect(decision.quantity).toBeLessThanOrEqual(quantity);
          }
        }
      ),
      { numRuns: 100 }
    );
  });

  it('draws the same numbers for the same seed', () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const first = new FillSimulator(stochastic({ seed }));
        const second = new FillSimulator(stochastic({ seed }));
        const draws = (simulator: FillSimulator): number[] => Array.from({ length: 8 }, () => simulator.nextRandom());

        const drawn = draws(first);
        expect(draws(second)).toEqual(drawn);
        for (const value of drawn) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThan(1);
        }
      }),
      { numRuns: 50 }
    );
  });
});

describe('FillSimulator.checkAcceptance', () => {
  const now = new Date('2026-03-02T04:30:00.000Z');
  const reliance = DEFAULT_INSTRUMENTS.find((instrument) => instrument.symbol === 'RELIANCE');
  const suspended = DEFAULT_INSTRUMENTS.find((instrument) => instrument.symbol === 'SUSPENDEDCO');

  it('accepts a tradable instrument within its freeze quantity', () => {
    const simulator = new FillSimulator();
    expect(simulator.checkAcceptance({ symbol: 'RELIANCE', quantity: 50, instrument: reliance, now })).toBeUndefined();
  });

  it('rejects unknown and suspended instruments', () => {
    const simulator = new FillSimulator();
    expect(simulator.checkAcceptance({ symbol: 'NOPE', quantity: 1, now })).toBe('INVALID_SYMBOL');
    expect(simulator.checkAcceptance({ symbol: 'SUSPENDEDCO', quantity: 1, instrument: suspended, now })).toBe(
      'INVALID_SYMBOL'
    );
  });

  it('rejects quantities above the freeze limit', () => {
    const simulator = new FillSimulator();
    expect(simulator.checkAcceptance({ symbol: 'RELIANCE', quantity: 10001, instrument: reliance, now })).toBe(
      'QUANTITY_LIMIT_EXCEEDED'
    );
  });

  it('rejects orders outside market hours', () => {
    const simulator = new FillSimulator({
      ...DEFAULT_SANDBOX_CONFIG,
      marketHours: { openMinute: 555, closeMinute: 930, utcOffsetMinutes: 330 },
    });
    const evening = new Date('2026-03-02T12:00:00.000Z');

    expect(simulator.checkAcceptance({ symbol: 'RELIANCE', quantity: 1, instrument: reliance, now: evening })).toBe(
      'MARKET_CLOSED'
    );
  });
});

describe('MarginAccount', () => {
  it('moves reservations into blocks and releases them on exit', () => {
    const account = new MarginAccount({ type: 'fixed', amount: 10000 });

    account.reserve('order-1', 5000, 50);
    expect(account.available()).toBe(5000);
    expect(account.canAfford(5001)).toBe(false);

    account.convert('order-1', 'position-1', 50, 100);
    expect(account.isReserved('order-1')).toBe(false);
    expect(account.snapshot()).toEqual({
      policy: 'fixed',
      configured: 10000,
      reserved: 0,
      blocked: 5000,
      available: 5000,
    });

    account.releaseForExit('position-1', 25);
    expect(account.available()).toBe(7500);
    account.releaseForExit('position-1', 25);
    expect(account.available()).toBe(10000);
  });

  it('releases a cancelled reservation', () => {
    const account = new MarginAccount({ type: 'fixed', amount: 10000 });
    account.reserve('order-1', 4000, 40);
    account.releaseReservation('order-1');

    expect(account.available()).toBe(10000);
  });

  it('never limits an infinite account', () => {
    const account = new MarginAccount({ type: 'infinite' });
    account.reserve('order-1', 1e12, 1);

    expect(account.available()).toBeNull();
    expect(account.canAfford(1e15)).toBe(true);
  });
});
