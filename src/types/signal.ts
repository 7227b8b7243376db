/**
 * Trade Signal Type Definitions
 *
 * Signals arrive as a closed set of variants discriminated by `signalType`.
 * The intake shape is validated at the boundary (see schemas/signal.ts) and
 * converted into one of these variants.
 */

import { OrderRequest, OrderSide, ProductType } from './order';

export type SignalType = 'MARKET' | 'LIMIT' | 'BREAKOUT';

interface SignalFields {
  id: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  targetPrice: number; // Final target
  targets?: number[]; // Intermediate target levels
  stopPrice?: number; // Derived from the entry reference when absent
  issuedAt: string;
  exchange?: string;
  product?: ProductType;
}

// Enter at market
export interface MarketSignal extends SignalFields {
  signalType: 'MARKET';
}

// Enter with a resting limit at entryPrice
export interface LimitSignal extends SignalFields {
  signalType: 'LIMIT';
  entryPrice: number;
}

// Enter once price trades through entryPrice (buy above / sell below)
export interface BreakoutSignal extends SignalFields {
  signalType: 'BREAKOUT';
  entryPrice: number;
}

export type SignalInput = MarketSignal | LimitSignal | BreakoutSignal;

// Accepted signal: stop resolved, intermediate levels ordered, quantity scaled
export type Signal = SignalInput & { stopPrice: number; targets: number[] };

// Orders a signal turns into. Protective intents are placed once the entry fills.
export type OrderIntent =
  | { role: 'ENTRY'; request: OrderRequest }
  | { role: 'STOP_LOSS'; triggerPrice: number }
  | { role: 'TARGET'; price: number };

// Dedup record retained after a signal has been consumed
export interface SignalRecord {
  signalId: string;
  positionId: string;
  entryOrderId?: string;
  outcome: 'ACCEPTED' | 'REJECTED';
  receivedAt: string;
}

export interface IngestionStats {
  received: number;
  accepted: number;
  duplicates: number;
  malformed: number;
  rejected: number;
}
