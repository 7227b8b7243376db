/**
 * Sandbox (paper trading) Type Definitions
 */

export type FillMode = 'immediate' | 'stochastic';

export type MarginPolicy = { type: 'infinite' } | { type: 'fixed'; amount: number };

// Trading session, in minutes after local midnight
export interface MarketHours {
  openMinute: number;
  closeMinute: number;
  utcOffsetMinutes: number;
}

export interface SandboxConfig {
  fillMode: FillMode;
  partialFillProbability: number; // [0, 1]
  partialFillRatio: number; // (0, 1)
  marginPolicy: MarginPolicy;
  seed: number;
  marketHours?: MarketHours;
}

// Broker-equivalent rejection codes the simulator produces
export type SandboxErrorCode =
  | 'INSUFFICIENT_MARGIN'
  | 'INVALID_SYMBOL'
  | 'MARKET_CLOSED'
  | 'QUANTITY_LIMIT_EXCEEDED';

// Outcome of evaluating one order against one price sample
export type FillDecision =
  | { kind: 'REJECT'; errorCode: SandboxErrorCode }
  | { kind: 'TRIGGER_PENDING' }
  | { kind: 'TRIGGERED' }
  | { kind: 'FILL'; quantity: number; price: number }
  | { kind: 'REST' };

// Snapshot of margin usage for an account
export interface MarginSnapshot {
  policy: MarginPolicy['type'];
  configured: number | null;
  reserved: number;
  blocked: number;
  available: number | null; // null when infinite
}
