/**
 * Engine-level Type Definitions (commands, ticks and emitted events)
 */

import { OrderStatus } from './order';

// Market price sample
export interface PriceTick {
  symbol: string;
  price: number;
  timestamp: string;
}

// Result of a command on the command surface
export interface CommandResult {
  success: boolean;
  orderId?: string;
  message: string;
}

// Result of signal ingestion
export interface IngestResult {
  duplicate: boolean;
  signalId: string;
  positionId: string;
  entryOrderId?: string;
  orderStatus?: OrderStatus;
  message: string;
}

// Error surfaced asynchronously from the sync loop
export interface SyncErrorEvent {
  errorName: string;
  category: string;
  message: string;
  orderId?: string;
  positionId?: string;
  timestamp: string;
}

// Irregular but tolerated condition (e.g. sibling fill after closure)
export interface AnomalyEvent {
  kind: string;
  positionId: string;
  orderId: string;
  detail: string;
  timestamp: string;
}

