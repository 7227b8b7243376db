/**
 * Order Type Definitions
 */

// Order execution types
export type OrderType = 'MARKET' | 'LIMIT' | 'SL-LIMIT' | 'SL-MARKET';

// Order direction
export type OrderSide = 'BUY' | 'SELL';

// Product (margin) types
export type ProductType = 'MIS' | 'NRML' | 'CNC' | 'CO';

// Order lifecycle status
export type OrderStatus =
  | 'CREATED'
  | 'OPEN'
  | 'TRIGGER_PENDING'
  | 'COMPLETE'
  | 'CANCELLED'
  | 'REJECTED';

// What the order does for its position
export type OrderRole = 'ENTRY' | 'STOP_LOSS' | 'TARGET' | 'EXIT';

// Which backend the order was routed to
export type BackendKind = 'LIVE' | 'SANDBOX';

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = ['COMPLETE', 'CANCELLED', 'REJECTED'];

export const WORKING_ORDER_STATUSES: readonly OrderStatus[] = ['OPEN', 'TRIGGER_PENDING'];

// Order placement request
export interface OrderRequest {
  parentSignalId: string;
  positionId: string;
  symbol: string;
  exchange: string;
  side: OrderSide;
  orderType: OrderType;
  product: ProductType;
  quantity: number;
  price?: number; // Required for LIMIT and SL-LIMIT
  triggerPrice?: number; // Required for SL-LIMIT and SL-MARKET
  role: OrderRole;
}

// Complete order record
export interface Order {
  orderId: string;
  parentSignalId: string;
  positionId: string;
  symbol: string;
  exchange: string;
  side: OrderSide;
  orderType: OrderType;
  product: ProductType;
  quantity: number;
  price?: number;
  triggerPrice?: number;
  status: OrderStatus;
  filledQuantity: number;
  avgFillPrice: number;
  role: OrderRole;
  backend: BackendKind;
  brokerOrderId?: string;
  lastSequence: number;
  statusReason?: string;
  errorCode?: string;
  cancelRequestedAt?: string;
  cancelConfirmed?: boolean;
  quarantined: boolean;
  createdAt: string;
  updatedAt: string;
}

// Order modification request
export interface OrderModification {
  newPrice?: number;
  newTriggerPrice?: number;
  newQuantity?: number;
}

/**
 * Position context used to validate protective and exit orders.
 * `direction` is the owning position's direction; `lastPrice` the latest
 * known market price for the symbol, when there is one.
 */
export interface OrderContext {
  direction?: 'LONG' | 'SHORT';
  lastPrice?: number;
}

// Result of a cancel request
export type CancelOutcome =
  | 'CANCELLED' // committed locally
  | 'PENDING_CANCEL' // sent, waiting for confirmation or timeout
  | 'ALREADY_COMPLETE'
  | 'ALREADY_CANCELLED'
  | 'CANCEL_FAILED';

export interface CancelResult {
  order: Order;
  outcome: CancelOutcome;
  reason?: string;
}
