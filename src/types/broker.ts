/**
 * Broker Backend Type Definitions
 *
 * The core talks to a backend (live broker or sandbox) only through
 * `BrokerGateway`. A live broker plugs in through `LiveBrokerAdapter`, which
 * returns normalized snapshots and hides the wire protocol.
 */

import { BackendKind, Order, OrderModification } from './order';
import { TradeFill } from './trade';

// Order status as a backend reports it
export type BrokerOrderStatus = 'OPEN' | 'TRIGGER_PENDING' | 'COMPLETE' | 'CANCELLED' | 'REJECTED';

// Normalized order snapshot returned by a live adapter
export interface BrokerOrderSnapshot {
  brokerOrderId: string;
  status: BrokerOrderStatus;
  filledQuantity: number;
  avgPrice: number;
  errorCode?: string;
  sequence: number; // Monotonically increasing per order
}

// Live broker adapter (wire client lives outside this package)
export interface LiveBrokerAdapter {
  placeOrder(order: Order): Promise<BrokerOrderSnapshot>;
  modifyOrder(brokerOrderId: string, modification: OrderModification): Promise<BrokerOrderSnapshot>;
  cancelOrder(brokerOrderId: string): Promise<BrokerOrderSnapshot>;
  getOrderStatus(brokerOrderId: string): Promise<BrokerOrderSnapshot>;
  getQuote(symbol: string, exchange: string): Promise<number>;
}

// Result of placing an order with a backend
export interface PlacementResult {
  brokerOrderId?: string;
  status: 'OPEN' | 'TRIGGER_PENDING' | 'REJECTED';
  errorCode?: string;
  sequence: number;
}

// Result of a modification request
export interface ModificationResult {
  accepted: boolean;
  errorCode?: string;
  sequence?: number;
}

// Acknowledgement of a cancel request
export interface CancelAck {
  status: 'CANCELLED' | 'PENDING_CANCEL' | 'FAILED';
  errorCode?: string;
  reason?: string;
  sequence?: number;
}

// One state change inside an update
export type BrokerOrderEvent =
  | { kind: 'TRIGGER_PENDING' }
  | { kind: 'TRIGGERED' }
  | { kind: 'FILL'; fill: TradeFill }
  | { kind: 'CANCELLED' }
  | { kind: 'REJECTED'; errorCode: string };

// Ordered batch of events for one order, stamped with the backend sequence
export interface BrokerOrderUpdate {
  orderId: string;
  sequence: number;
  events: BrokerOrderEvent[];
  receivedAt: string;
}

export interface BrokerGateway {
  readonly kind: BackendKind;
  placeOrder(order: Order): Promise<PlacementResult>;
  modifyOrder(order: Order, modification: OrderModification): Promise<ModificationResult>;
  cancelOrder(order: Order): Promise<CancelAck>;
  /**
   * Status deltas for an order since its last applied sequence. The sandbox
   * evaluates the order against `price` (or the last marked price); a live
   * gateway polls the adapter and ignores `price`.
   */
  fetchUpdates(order: Order, price?: number): Promise<BrokerOrderUpdate[]>;
  getQuote(symbol: string, exchange: string): Promise<number | undefined>;
  // Backends that simulate fills take the market price from the tick stream
  markPrice?(symbol: string, price: number): void;
}
