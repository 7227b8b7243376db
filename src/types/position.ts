/**
 * Position Type Definitions
 */

import { OrderRole, ProductType } from './order';

export type PositionDirection = 'LONG' | 'SHORT';

export type PositionStatus = 'PENDING_OPEN' | 'ACTIVE' | 'CLOSED';

export type ClosedReason = 'SL_HIT' | 'TARGET_HIT' | 'MANUAL_EXIT';

// Open quantity bought (or sold short) at one price
export interface PositionLot {
  tradeId: string;
  quantity: number;
  price: number;
}

// Recorded irregularity that was not applied to the position
export interface PositionAnomaly {
  kind: 'SIBLING_FILL' | 'EXCESS_EXIT_FILL' | 'LATE_ENTRY_FILL' | 'CANCEL_OVERRIDDEN';
  orderId: string;
  tradeId?: string;
  detail: string;
  timestamp: string;
}

export interface Position {
  positionId: string;
  signalId: string;
  symbol: string;
  exchange: string;
  product: ProductType;
  direction: PositionDirection;
  netQuantity: number; // Signed: buys minus sells
  avgPrice: number; // Weighted over open lots only
  openLots: PositionLot[];
  realizedPnl: number;
  unrealizedPnl: number; // Display cache, recomputed from lastPrice
  lastPrice?: number;
  status: PositionStatus;
  entryOrderId: string;
  stopLossOrderId?: string;
  targetOrderId?: string;
  stopPrice: number;
  targetPrice: number; // Final target, where the target order rests
  targets: number[]; // Intermediate levels, nearest first; the stop ratchets as each is reached
  targetsHit: number;
  highWaterMark?: number; // Best price seen in the position's favour
  closingOrderId?: string; // Order whose fill is honoured as the closure
  closedReason?: ClosedReason;
  quarantined: boolean;
  anomalies: PositionAnomaly[];
  createdAt: string;
  updatedAt: string;
  closedAt?: string;
  archivedAt?: string;
}

// Position change event types
export type PositionEventType = 'OPEN' | 'INCREASE' | 'DECREASE' | 'CLOSE' | 'DISCARD';

// Historical record of position changes
export interface PositionHistory {
  historyId: string;
  positionId: string;
  eventType: PositionEventType;
  previousQuantity: number;
  newQuantity: number;
  previousAvgPrice: number;
  newAvgPrice: number;
  realizedPnl: number;
  tradeId?: string;
  role?: OrderRole;
  timestamp: string;
}
