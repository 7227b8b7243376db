import { loadEngineConfig, parseSandboxConfig } from './index';
import { ValidationError } from '../services/errors';

describe('loadEngineConfig', () => {
  it('defaults to an immediate sandbox with infinite margin', () => {
    const config = loadEngineConfig({});

    expect(config).toEqual({
      mode: 'SANDBOX',
      sandbox: {
        fillMode: 'immediate',
        partialFillProbability: 0,
        partialFillRatio: 0.5,
        marginPolicy: { type: 'infinite' },
        seed: 42,
        marketHours: undefined,
      },
      cancelTimeoutMs: 5000,
      retry: { maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 60000, multiplier: 2 },
      trailing: { enabled: false, distance: 0 },
      stopOrderType: 'SL-MARKET',
      stopLimitOffset: 0,
      autoStopPercent: 10,
      quantityMultiplier: 1,
      defaultExchange: 'NSE',
      defaultProduct: 'MIS',
    });
  });

  it('reads sandbox settings from individual variables', () => {
    const config = loadEngineConfig({
      SANDBOX_FILL_MODE: 'stochastic',
      SANDBOX_PARTIAL_FILL_PROBABILITY: '0.25',
      SANDBOX_PARTIAL_FILL_RATIO: '0.4',
      SANDBOX_MARGIN_POLICY: 'fixed(500000)',
      SANDBOX_SEED: '7',
      SANDBOX_MARKET_OPEN: '09:15',
      SANDBOX_MARKET_CLOSE: '15:30',
      SANDBOX_UTC_OFFSET_MINUTES: '330',
    });

    expect(config.sandbox).toEqual({
      fillMode: 'stochastic',
      partialFillProbability: 0.25,
      partialFillRatio: 0.4,
      marginPolicy: { type: 'fixed', amount: 500000 },
      seed: 7,
      marketHours: { openMinute: 555, closeMinute: 930, utcOffsetMinutes: 330 },
    });
  });

  it('prefers a SANDBOX_CONFIG document', () => {
    const config = loadEngineConfig({
      SANDBOX_FILL_MODE: 'stochastic',
      SANDBOX_CONFIG: JSON.stringify({
        fill_mode: 'immediate',
        partial_fill_probability: 0,
        margin_policy: { fixed: 1000 },
        seed: 1,
      }),
    });

    expect(config.sandbox.fillMode).toBe('immediate');
    expect(config.sandbox.marginPolicy).toEqual({ type: 'fixed', amount: 1000 });
  });

  it('reads engine settings', () => {
    const config = loadEngineConfig({
      ENGINE_MODE: 'live',
      CANCEL_TIMEOUT_MS: '2500',
      TRAILING_ENABLED: 'true',
      TRAIL_DISTANCE: '4',
      STOP_ORDER_TYPE: 'SL-LIMIT',
      STOP_LIMIT_OFFSET: '0.5',
      QUANTITY_MULTIPLIER: '2',
      DEFAULT_PRODUCT: 'NRML',
    });

    expect(config).toMatchObject({
      mode: 'LIVE',
      cancelTimeoutMs: 2500,
      trailing: { enabled: true, distance: 4 },
      stopOrderType: 'SL-LIMIT',
      stopLimitOffset: 0.5,
      quantityMultiplier: 2,
      defaultProduct: 'NRML',
    });
  });

  it.each([
    [{ ENGINE_MODE: 'paper' }, "ENGINE_MODE must be LIVE or SANDBOX, got 'PAPER'"],
    [{ CANCEL_TIMEOUT_MS: 'soon' }, "CANCEL_TIMEOUT_MS must be a number, got 'soon'"],
    [{ QUANTITY_MULTIPLIER: '0' }, 'QUANTITY_MULTIPLIER must be a positive integer'],
    [{ STOP_ORDER_TYPE: 'MARKET' }, 'STOP_ORDER_TYPE must be SL-MARKET or SL-LIMIT'],
    [{ DEFAULT_PRODUCT: 'CO' }, 'DEFAULT_PRODUCT must be MIS, NRML or CNC'],
  ])('rejects %j', (env, message) => {
    expect(() => loadEngineConfig(env)).toThrow(new ValidationError(message));
  });

  it('rejects an unparseable SANDBOX_CONFIG', () => {
    expect(() => loadEngineConfig({ SANDBOX_CONFIG: '{fill_mode' })).toThrow(ValidationError);
  });
});

describe('parseSandboxConfig', () => {
  it('rejects a session that closes before it opens', () => {
    expect(() =>
      parseSandboxConfig({
        fill_mode: 'immediate',
        partial_fill_probability: 0,
        margin_policy: 'infinite',
        seed: 1,
        market_hours: { open: '15:30', close: '09:15' },
      })
    ).toThrow(new ValidationError('market_hours.open must be before market_hours.close'));
  });

  it('lists schema violations', () => {
    expect(() => parseSandboxConfig({ fill_mode: 'immediate' })).toThrow(/^Invalid sandbox configuration: /);
  });
});
