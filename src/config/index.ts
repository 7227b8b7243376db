/**
 * Engine configuration
 *
 * Everything is read from environment variables with defaults. Sandbox
 * settings may be given as one JSON document (SANDBOX_CONFIG) in the
 * snake_case shape of schemas/sandbox-config.ts, or as individual variables;
 * both go through the same validation.
 */

import { BackendKind, ProductType } from '../types/order';
import { MarketHours, SandboxConfig } from '../types/sandbox';
import { SandboxConfigWire } from '../schemas/sandbox-config';
import { ValidationError } from '../services/errors';
import { DEFAULT_RETRY_CONFIG, RetryConfig } from '../services/live-broker-gateway';
import { StopOrderType } from '../services/protective-order-coordinator';
import { schemaValidator } from '../services/schema-validator';
import { DEFAULT_CANCEL_TIMEOUT_MS } from '../services/order-state-machine';

export interface EngineConfig {
  mode: BackendKind;
  sandbox: SandboxConfig;
  cancelTimeoutMs: number;
  retry: RetryConfig;
  trailing: {
    enabled: boolean;
    distance: number;
  };
  stopOrderType: StopOrderType;
  stopLimitOffset: number;
  autoStopPercent: number; // Stop distance used when a signal omits its stop
  quantityMultiplier: number;
  defaultExchange: string;
  defaultProduct: ProductType;
}

function parseClockTime(value: string): number {
  const [hours, minutes] = value.split(':').map(Number);
  return hours * 60 + minutes;
}

function parseMarginAmount(policy: string): number {
  const match = /^fixed\(\s*(\d+(?:\.\d+)?)\s*\)$/.exec(policy);
  if (!match) {
    throw new ValidationError(`Invalid margin policy '${policy}'`, 'margin_policy');
  }
  return Number(match[1]);
}

/**
 * Validates and converts sandbox configuration from its snake_case shape
 *
 * @throws ValidationError listing every schema violation
 */
export function parseSandboxConfig(input: unknown): SandboxConfig {
  const result = schemaValidator.validateSandboxConfig(input);
  if (!result.valid) {
    const details = result.errors.map((error) => `${error.path} ${error.message}`).join('; ');
    throw new ValidationError(`Invalid sandbox configuration: ${details}`, 'sandbox');
  }

  const wire: SandboxConfigWire = result.value;
  const policy = wire.margin_policy;
  const marginPolicy: SandboxConfig['marginPolicy'] =
    typeof policy === 'object'
      ? { type: 'fixed', amount: policy.fixed }
      : policy === 'infinite'
        ? { type: 'infinite' }
        : { type: 'fixed', amount: parseMarginAmount(policy) };

  let marketHours: MarketHours | undefined;
  if (wire.market_hours) {
    marketHours = {
      openMinute: parseClockTime(wire.market_hours.open),
      closeMinute: parseClockTime(wire.market_hours.close),
      utcOffsetMinutes: wire.market_hours.utc_offset_minutes ?? 0,
    };
    if (marketHours.openMinute >= marketHours.closeMinute) {
      throw new ValidationError('market_hours.open must be before market_hours.close', 'market_hours');
    }
  }

  return {
    fillMode: wire.fill_mode,
    partialFillProbability: wire.partial_fill_probability,
    partialFillRatio: wire.partial_fill_ratio ?? 0.5,
    marginPolicy,
    seed: wire.seed,
    marketHours,
  };
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got '${raw}'`, name);
  }
  return value;
}

function readJson(env: NodeJS.ProcessEnv, name: string): unknown {
  const raw = env[name];
  if (!raw) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `${name} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      name
    );
  }
}

function sandboxWireFromEnv(env: NodeJS.ProcessEnv): unknown {
  const document = readJson(env, 'SANDBOX_CONFIG');
  if (document !== undefined) {
    return document;
  }

  const wire: Record<string, unknown> = {
    fill_mode: env.SANDBOX_FILL_MODE || 'immediate',
    partial_fill_probability: readNumber(env, 'SANDBOX_PARTIAL_FILL_PROBABILITY', 0),
    margin_policy: env.SANDBOX_MARGIN_POLICY || 'infinite',
    seed: readNumber(env, 'SANDBOX_SEED', 42),
  };
  if (env.SANDBOX_PARTIAL_FILL_RATIO) {
    wire.partial_fill_ratio = readNumber(env, 'SANDBOX_PARTIAL_FILL_RATIO', 0.5);
  }
  if (env.SANDBOX_MARKET_OPEN && env.SANDBOX_MARKET_CLOSE) {
    wire.market_hours = {
      open: env.SANDBOX_MARKET_OPEN,
      close: env.SANDBOX_MARKET_CLOSE,
      utc_offset_minutes: readNumber(env, 'SANDBOX_UTC_OFFSET_MINUTES', 0),
    };
  }
  return wire;
}

/**
 * Loads engine configuration from the environment
 *
 * @throws ValidationError on an unparseable value
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const mode = (env.ENGINE_MODE || 'SANDBOX').toUpperCase();
  if (mode !== 'LIVE' && mode !== 'SANDBOX') {
    throw new ValidationError(`ENGINE_MODE must be LIVE or SANDBOX, got '${mode}'`, 'ENGINE_MODE');
  }

  const stopOrderType = env.STOP_ORDER_TYPE || 'SL-MARKET';
  if (stopOrderType !== 'SL-MARKET' && stopOrderType !== 'SL-LIMIT') {
    throw new ValidationError(`STOP_ORDER_TYPE must be SL-MARKET or SL-LIMIT`, 'STOP_ORDER_TYPE');
  }

  const defaultProduct = env.DEFAULT_PRODUCT || 'MIS';
  if (defaultProduct !== 'MIS' && defaultProduct !== 'NRML' && defaultProduct !== 'CNC') {
    throw new ValidationError(`DEFAULT_PRODUCT must be MIS, NRML or CNC`, 'DEFAULT_PRODUCT');
  }

  const quantityMultiplier = readNumber(env, 'QUANTITY_MULTIPLIER', 1);
  if (!Number.isInteger(quantityMultiplier) || quantityMultiplier < 1) {
    throw new ValidationError('QUANTITY_MULTIPLIER must be a positive integer', 'QUANTITY_MULTIPLIER');
  }

  return {
    mode,
    sandbox: parseSandboxConfig(sandboxWireFromEnv(env)),
    cancelTimeoutMs: readNumber(env, 'CANCEL_TIMEOUT_MS', DEFAULT_CANCEL_TIMEOUT_MS),
    retry: {
      maxRetries: readNumber(env, 'RETRY_MAX_RETRIES', DEFAULT_RETRY_CONFIG.maxRetries),
      initialDelayMs: readNumber(env, 'RETRY_INITIAL_DELAY_MS', DEFAULT_RETRY_CONFIG.initialDelayMs),
      maxDelayMs: readNumber(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_CONFIG.maxDelayMs),
      multiplier: readNumber(env, 'RETRY_MULTIPLIER', DEFAULT_RETRY_CONFIG.multiplier),
    },
    trailing: {
      enabled: env.TRAILING_ENABLED === 'true',
      distance: readNumber(env, 'TRAIL_DISTANCE', 0),
    },
    stopOrderType,
    stopLimitOffset: readNumber(env, 'STOP_LIMIT_OFFSET', 0),
    autoStopPercent: readNumber(env, 'AUTO_STOP_PERCENT', 10),
    quantityMultiplier,
    defaultExchange: env.DEFAULT_EXCHANGE || 'NSE',
    defaultProduct,
  };
}
