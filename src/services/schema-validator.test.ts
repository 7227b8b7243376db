/**
 * Property-based tests for the schema validator
 *
 * Property: every signal built from valid field values passes validation
 * and comes back unchanged; removing any required field makes it fail with
 * an error on that field.
 */

import * as fc from 'fast-check';
import { SchemaValidator } from './schema-validator';
import { SignalWire } from '../schemas/signal';

const validator = new SchemaValidator();

const REQUIRED_FIELDS = ['id', 'symbol', 'side', 'quantity', 'signal_type', 'target_price', 'issued_at'] as const;

const positivePriceArb = (): fc.Arbitrary<number> =>
  fc.integer({ min: 1, max: 10_000_000 }).map((cents) => cents / 100);

const validSignalArb = (): fc.Arbitrary<SignalWire> =>
  fc
    .record({
      id: fc.string({ minLength: 1, maxLength: 64 }),
      symbol: fc.constantFrom('RELIANCE', 'INFY', 'NIFTYFUT'),
      side: fc.constantFrom<'BUY' | 'SELL'>('BUY', 'SELL'),
      quantity: fc.integer({ min: 1, max: 100_000 }),
      target_price: positivePriceArb(),
      stop_price: fc.option(positivePriceArb(), { nil: undefined }),
      issued_at: fc.constant('2026-03-02T04:29:00.000Z'),
      entry_price: positivePriceArb(),
      kind: fc.constantFrom<'MARKET' | 'LIMIT' | 'BREAKOUT'>('MARKET', 'LIMIT', 'BREAKOUT'),
    })
    .map(({ kind, entry_price, stop_price, ...fields }): SignalWire => {
      const base = stop_price === undefined ? fields : { ...fields, stop_price };
      switch (kind) {
        case 'MARKET':
          return { ...base, signal_type: 'MARKET' };
        case 'LIMIT':
          return { ...base, signal_type: 'LIMIT', entry_price };
        case 'BREAKOUT':
          return { ...base, signal_type: 'BREAKOUT', entry_price };
      }
    });

describe('SchemaValidator', () => {
  describe('validateSignal', () => {
    it('accepts every well-formed signal', () => {
      fc.assert(
        fc.property(validSignalArb(), (signal) => {
          const result = validator.validateSignal(signal);
          expect(result.valid).toBe(true);
          expect(result.valid && result.value).toEqual(signal);
        }),
        { numRuns: 100 }
      );
    });

    it('names the missing required field', () => {
      fc.assert(
        fc.property(validSignalArb(), fc.constantFrom(...REQUIRED_FIELDS), (signal, field) => {
          const input: Record<string, unknown> = { ...signal };
          delete input[field];

          const result = validator.validateSignal(input);

          expect(result.valid).toBe(false);
          const missing = result.valid ? [] : result.errors.map((error) => error.params.missingProperty);
          expect(missing).toContain(field);
        }),
        { numRuns: 100 }
      );
    });

    it('requires an entry price for limit and breakout signals', () => {
      const result = validator.validateSignal({
        id: 'sig-001',
        symbol: 'RELIANCE',
        side: 'BUY',
        quantity: 10,
        signal_type: 'LIMIT',
        target_price: 120,
        issued_at: '2026-03-02T04:29:00.000Z',
      });

      expect(result.valid).toBe(false);
      expect(!result.valid && result.errors.map((error) => error.params.missingProperty)).toContain('entry_price');
    });

    it('reports every problem at once', () => {
      const result = validator.validateSignal({
        id: '',
        symbol: 'RELIANCE',
        side: 'HOLD',
        quantity: -1,
        signal_type: 'MARKET',
        target_price: 120,
        issued_at: '2026-03-02T04:29:00.000Z',
      });

      expect(result.valid).toBe(false);
      const paths = result.valid ? [] : result.errors.map((error) => error.path);
      expect(paths).toEqual(expect.arrayContaining(['/id', '/side', '/quantity']));
    });
  });

  describe('validateSandboxConfig', () => {
    const base = { fill_mode: 'immediate', partial_fill_probability: 0, margin_policy: 'infinite', seed: 42 };

    it.each([
      ['infinite margin', base],
      ['fixed margin as text', { ...base, margin_policy: 'fixed(250000)' }],
      ['fixed margin as an object', { ...base, margin_policy: { fixed: 250000 } }],
      ['market hours', { ...base, market_hours: { open: '09:15', close: '15:30', utc_offset_minutes: 330 } }],
      ['a stochastic fill mode', { ...base, fill_mode: 'stochastic', partial_fill_probability: 0.3, partial_fill_ratio: 0.5 }],
    ])('accepts %s', (_label, input) => {
      expect(validator.validateSandboxConfig(input).valid).toBe(true);
    });

    it.each([
      ['an unknown fill mode', { ...base, fill_mode: 'random' }],
      ['a probability above one', { ...base, partial_fill_probability: 1.5 }],
      ['a ratio of one', { ...base, partial_fill_ratio: 1 }],
      ['an unknown margin policy', { ...base, margin_policy: 'generous' }],
      ['a fractional seed', { ...base, seed: 4.2 }],
      ['a malformed market time', { ...base, market_hours: { open: '9:15', close: '15:30' } }],
      ['an unknown field', { ...base, latency_ms: 5 }],
    ])('rejects %s', (_label, input) => {
      expect(validator.validateSandboxConfig(input).valid).toBe(false);
    });
  });
});
