/**
 * Order State Machine
 *
 * Owns every order status change. Orders move
 * CREATED -> OPEN (<-> TRIGGER_PENDING) -> COMPLETE | CANCELLED | REJECTED
 * and never leave a terminal status for a working one. Backend updates are
 * applied strictly in sequence order.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CancelResult,
  Order,
  OrderContext,
  OrderModification,
  OrderRequest,
  OrderStatus,
  TERMINAL_ORDER_STATUSES,
  WORKING_ORDER_STATUSES,
} from '../types/order';
import { BrokerGateway, BrokerOrderUpdate, PlacementResult } from '../types/broker';
import { TradeFill } from '../types/trade';
import { OrderRepository } from '../repositories/order';
import { BrokerErrorTable } from './broker-error-table';
import { InstrumentRegistry } from './instrument-registry';
import {
  BrokerRejectionError,
  InvalidTransitionError,
  OrderNotFoundError,
  OverfillError,
  QuarantinedError,
  SyncInconsistencyError,
  ValidationError,
} from './errors';

/**
 * Legal status transitions
 */
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  CREATED: ['OPEN', 'REJECTED'],
  OPEN: ['TRIGGER_PENDING', 'COMPLETE', 'CANCELLED', 'REJECTED'],
  TRIGGER_PENDING: ['OPEN', 'CANCELLED', 'REJECTED'],
  COMPLETE: [],
  CANCELLED: [],
  REJECTED: [],
};

export const DEFAULT_CANCEL_TIMEOUT_MS = 5000;

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.includes(status);
}

export function isWorking(status: OrderStatus): boolean {
  return WORKING_ORDER_STATUSES.includes(status);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export type UpdateDisposition = 'APPLIED' | 'RETRANSMISSION';

export interface UpdateOutcome {
  order: Order;
  disposition: UpdateDisposition;
  fills: TradeFill[]; // Fills applied, in event order
  triggered: boolean; // A stop left TRIGGER_PENDING toward a fill
  becameTerminal?: OrderStatus;
  cancelOverridden: boolean; // An optimistic cancel was contradicted by a fill
}

export interface OrderStateMachineDeps {
  repository: OrderRepository;
  gateway: BrokerGateway;
  registry: InstrumentRegistry;
  errorTable: BrokerErrorTable;
  cancelTimeoutMs?: number;
  clock?: () => Date;
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Validates an order request against the instrument registry and, for
 * protective and exit orders, the owning position's side and the market
 *
 * @throws ValidationError if validation fails
 */
export function validateOrderRequest(
  request: OrderRequest,
  registry: InstrumentRegistry,
  context: OrderContext = {}
): void {
  if (!Number.isInteger(request.quantity) || request.quantity <= 0) {
    throw new ValidationError('quantity must be a positive integer', 'quantity');
  }

  const instrument = registry.get(request.symbol);
  if (!instrument) {
    throw new ValidationError(`Unknown symbol '${request.symbol}'`, 'symbol');
  }
  if (request.quantity % instrument.lotSize !== 0) {
    throw new ValidationError(
      `quantity ${request.quantity} is not a multiple of the lot size ${instrument.lotSize}`,
      'quantity'
    );
  }

  if (request.product === 'CO' && request.orderType !== 'MARKET' && request.orderType !== 'LIMIT') {
    throw new ValidationError('CO orders accept only MARKET or LIMIT order types', 'orderType');
  }

  switch (request.orderType) {
    case 'MARKET':
      break;
    case 'LIMIT':
      if (!isPositive(request.price)) {
        throw new ValidationError('LIMIT orders require a positive price', 'price');
      }
      break;
    case 'SL-LIMIT':
      if (!isPositive(request.price)) {
        throw new ValidationError('SL-LIMIT orders require a positive price', 'price');
      }
      if (!isPositive(request.triggerPrice)) {
        throw new ValidationError('SL-LIMIT orders require a positive triggerPrice', 'triggerPrice');
      }
      if (request.side === 'BUY' && request.price < request.triggerPrice) {
        throw new ValidationError('BUY SL-LIMIT price must be at or above the trigger', 'price');
      }
      if (request.side === 'SELL' && request.price > request.triggerPrice) {
        throw new ValidationError('SELL SL-LIMIT price must be at or below the trigger', 'price');
      }
      break;
    case 'SL-MARKET':
      if (!isPositive(request.triggerPrice)) {
        throw new ValidationError('SL-MARKET orders require a positive triggerPrice', 'triggerPrice');
      }
      break;
  }

  if (request.role === 'ENTRY') {
    return;
  }

  // Protective and exit orders close the position, so they trade against it
  if (!context.direction) {
    throw new ValidationError(`${request.role} orders require the owning position's direction`, 'role');
  }
  const closingSide = context.direction === 'LONG' ? 'SELL' : 'BUY';
  if (request.side !== closingSide) {
    throw new ValidationError(
      `${request.role} order for a ${context.direction} position must be a ${closingSide}`,
      'side'
    );
  }

  const market = context.lastPrice;
  if (market === undefined) {
    return;
  }
  if (request.role === 'STOP_LOSS' && request.triggerPrice !== undefined) {
    const valid = context.direction === 'LONG' ? request.triggerPrice < market : request.triggerPrice > market;
    if (!valid) {
      throw new ValidationError(
        `Stop ${request.triggerPrice} must be ${context.direction === 'LONG' ? 'below' : 'above'} the market price ${market}`,
        'triggerPrice'
      );
    }
  }
  if (request.role === 'TARGET' && request.price !== undefined) {
    const valid = context.direction === 'LONG' ? request.price > market : request.price < market;
    if (!valid) {
      throw new ValidationError(
        `Target ${request.price} must be ${context.direction === 'LONG' ? 'above' : 'below'} the market price ${market}`,
        'price'
      );
    }
  }
}

export class OrderStateMachine {
  private readonly repository: OrderRepository;
  private readonly gateway: BrokerGateway;
  private readonly registry: InstrumentRegistry;
  private readonly errorTable: BrokerErrorTable;
  private readonly cancelTimeoutMs: number;
  private readonly clock: () => Date;

  constructor(deps: OrderStateMachineDeps) {
    this.repository = deps.repository;
    this.gateway = deps.gateway;
    this.registry = deps.registry;
    this.errorTable = deps.errorTable;
    this.cancelTimeoutMs = deps.cancelTimeoutMs ?? DEFAULT_CANCEL_TIMEOUT_MS;
    this.clock = deps.clock ?? (() => new Date());
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.repository.getOrder(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return order;
  }

  /**
   * Validates and places an order.
   *
   * A backend refusal is not thrown: the order is returned REJECTED with the
   * friendly reason in `statusReason`.
   *
   * @throws ValidationError before any backend call
   * @throws SyncInconsistencyError if the backend could not be reached;
   *   the order is left CREATED and quarantined since its fate is unknown
   */
  async submit(request: OrderRequest, context: OrderContext = {}): Promise<Order> {
    validateOrderRequest(request, this.registry, context);

    const now = this.now();
    let order: Order = {
      ...request,
      symbol: request.symbol.toUpperCase(),
      orderId: uuidv4(),
      status: 'CREATED',
      filledQuantity: 0,
      avgFillPrice: 0,
      backend: this.gateway.kind,
      lastSequence: 0,
      quarantined: false,
      createdAt: now,
      updatedAt: now,
    };
    await this.repository.putOrder(order);

    let placement: PlacementResult;
    try {
      placement = await this.gateway.placeOrder(order);
    } catch (error) {
      await this.repository.putOrder({ ...order, quarantined: true, updatedAt: this.now() });
      throw error;
    }

    order = { ...order, brokerOrderId: placement.brokerOrderId, lastSequence: placement.sequence };

    if (placement.status === 'REJECTED') {
      order = this.transition(order, 'REJECTED');
      order.errorCode = placement.errorCode;
      order.statusReason = this.errorTable.describe(placement.errorCode);
      await this.repository.putOrder(order);
      console.log('[OrderStateMachine] Order rejected', {
        orderId: order.orderId,
        role: order.role,
        errorCode: order.errorCode,
        reason: order.statusReason,
      });
      return order;
    }

    order = this.transition(order, 'OPEN');
    if (placement.status === 'TRIGGER_PENDING') {
      order = this.transition(order, 'TRIGGER_PENDING');
    }
    await this.repository.putOrder(order);

    console.log('[OrderStateMachine] Order placed', {
      orderId: order.orderId,
      role: order.role,
      status: order.status,
      brokerOrderId: order.brokerOrderId,
    });
    return order;
  }

  /**
   * Applies one fill to an order record. Pure: the caller persists.
   *
   * A fill on a TRIGGER_PENDING order first moves it to OPEN. A fill that
   * contradicts an optimistic (unconfirmed) cancel is honoured.
   *
   * @throws OverfillError if cumulative fills would exceed the order quantity
   * @throws SyncInconsistencyError if the order cannot receive fills
   */
  applyFill(order: Order, fill: TradeFill): Order {
    let current = order;
    const overridesCancel = current.status === 'CANCELLED' && current.cancelConfirmed === false;

    const filled = current.filledQuantity + fill.fillQuantity;
    if (filled > current.quantity) {
      throw new OverfillError(order.orderId, current.quantity, filled);
    }

    if (current.status === 'TRIGGER_PENDING') {
      current = this.transition(current, 'OPEN');
    }
    if (current.status !== 'OPEN' && !overridesCancel) {
      throw new SyncInconsistencyError(
        `Fill ${fill.tradeId} received for order '${order.orderId}' in status '${order.status}'`,
        'UNEXPECTED_FILL',
        order.orderId,
        order.positionId
      );
    }

    const avgFillPrice = (current.avgFillPrice * current.filledQuantity + fill.fillPrice * fill.fillQuantity) / filled;
    current = { ...current, filledQuantity: filled, avgFillPrice, updatedAt: this.now() };

    if (filled === current.quantity) {
      current = overridesCancel
        ? { ...current, status: 'COMPLETE', statusReason: 'Filled after cancel request', cancelConfirmed: undefined }
        : this.transition(current, 'COMPLETE');
    }
    return current;
  }

  /**
   * Applies a sequenced backend update and persists the result
   *
   * @throws SyncInconsistencyError for stale sequences, duplicate terminal
   *   events, overfills and unexpected fills
   */
  async applyUpdate(order: Order, update: BrokerOrderUpdate): Promise<UpdateOutcome> {
    if (order.quarantined) {
      throw new QuarantinedError('order', order.orderId);
    }

    if (update.sequence === order.lastSequence) {
      console.warn('[OrderStateMachine] Retransmitted update discarded', {
        orderId: order.orderId,
        sequence: update.sequence,
      });
      return { order, disposition: 'RETRANSMISSION', fills: [], triggered: false, cancelOverridden: false };
    }
    if (update.sequence < order.lastSequence) {
      throw new SyncInconsistencyError(
        `Stale update ${update.sequence} for order '${order.orderId}' (last applied ${order.lastSequence})`,
        'STALE_SEQUENCE',
        order.orderId,
        order.positionId
      );
    }

    const startStatus = order.status;
    const wasOptimisticCancel = order.status === 'CANCELLED' && order.cancelConfirmed === false;
    let current = order;
    const fills: TradeFill[] = [];
    let triggered = false;
    let cancelOverridden = false;

    for (const event of update.events) {
      switch (event.kind) {
        case 'TRIGGER_PENDING':
          if (current.status === 'OPEN') {
            current = this.transition(current, 'TRIGGER_PENDING');
          }
          break;
        case 'TRIGGERED':
          if (current.status === 'TRIGGER_PENDING') {
            current = this.transition(current, 'OPEN');
            triggered = true;
          }
          break;
        case 'FILL':
          if (current.status === 'TRIGGER_PENDING') {
            triggered = true;
          }
          if (wasOptimisticCancel && current.status === 'CANCELLED') {
            cancelOverridden = true;
          }
          current = this.applyFill(current, event.fill);
          fills.push(event.fill);
          break;
        case 'CANCELLED':
          current = this.applyTerminalEvent(current, 'CANCELLED');
          break;
        case 'REJECTED':
          current = this.applyTerminalEvent(current, 'REJECTED', event.errorCode);
          break;
      }
    }

    current = { ...current, lastSequence: update.sequence, updatedAt: this.now() };
    await this.repository.putOrder(current);

    const becameTerminal =
      current.status !== startStatus && isTerminal(current.status) ? current.status : undefined;
    return { order: current, disposition: 'APPLIED', fills, triggered, becameTerminal, cancelOverridden };
  }

  /**
   * Requests cancellation. Commits CANCELLED when the backend confirms;
   * otherwise the request stays pending until confirmed or timed out.
   *
   * @throws InvalidTransitionError from CREATED or REJECTED
   */
  async cancel(order: Order): Promise<CancelResult> {
    if (order.status === 'COMPLETE') {
      return { order, outcome: 'ALREADY_COMPLETE', reason: 'Order is already complete' };
    }
    if (order.status === 'CANCELLED') {
      return { order, outcome: 'ALREADY_CANCELLED', reason: 'Order is already cancelled' };
    }
    if (!isWorking(order.status)) {
      throw new InvalidTransitionError(order.orderId, order.status, 'cancel');
    }

    const ack = await this.gateway.cancelOrder(order);
    const now = this.now();

    if (ack.status === 'CANCELLED') {
      const cancelled: Order = {
        ...this.transition(order, 'CANCELLED'),
        cancelRequestedAt: order.cancelRequestedAt ?? now,
        cancelConfirmed: true,
        statusReason: 'Cancelled',
        lastSequence: Math.max(order.lastSequence, ack.sequence ?? order.lastSequence),
      };
      await this.repository.putOrder(cancelled);
      return { order: cancelled, outcome: 'CANCELLED' };
    }

    if (ack.status === 'PENDING_CANCEL') {
      const pending: Order = { ...order, cancelRequestedAt: order.cancelRequestedAt ?? now, updatedAt: now };
      await this.repository.putOrder(pending);
      return { order: pending, outcome: 'PENDING_CANCEL' };
    }

    const reason = ack.reason ?? this.errorTable.describe(ack.errorCode);
    console.warn('[OrderStateMachine] Cancel failed', { orderId: order.orderId, errorCode: ack.errorCode, reason });
    return { order, outcome: 'CANCEL_FAILED', reason };
  }

  /**
   * Commits an unconfirmed cancel once the timeout has elapsed.
   * Returns the updated order, or null when nothing changed.
   */
  async sweepCancel(order: Order, now: Date = this.clock()): Promise<Order | null> {
    if (!isWorking(order.status) || !order.cancelRequestedAt || order.quarantined) {
      return null;
    }
    if (now.getTime() - Date.parse(order.cancelRequestedAt) < this.cancelTimeoutMs) {
      return null;
    }

    const cancelled: Order = {
      ...this.transition(order, 'CANCELLED'),
      cancelConfirmed: false,
      statusReason: 'Cancel not confirmed by the broker in time; treated as cancelled',
    };
    await this.repository.putOrder(cancelled);
    console.warn('[OrderStateMachine] Cancel committed without confirmation', {
      orderId: order.orderId,
      cancelRequestedAt: order.cancelRequestedAt,
    });
    return cancelled;
  }

  /**
   * Modifies a working order. The record changes only after the backend accepts.
   *
   * @throws InvalidTransitionError unless OPEN or TRIGGER_PENDING
   * @throws ValidationError if the modified order would be invalid
   * @throws BrokerRejectionError if the backend refuses the modification
   */
  async modify(order: Order, modification: OrderModification, context: OrderContext = {}): Promise<Order> {
    if (order.quarantined) {
      throw new QuarantinedError('order', order.orderId);
    }
    if (!isWorking(order.status)) {
      throw new InvalidTransitionError(order.orderId, order.status, 'modify');
    }

    const candidate: OrderRequest = {
      parentSignalId: order.parentSignalId,
      positionId: order.positionId,
      symbol: order.symbol,
      exchange: order.exchange,
      side: order.side,
      orderType: order.orderType,
      product: order.product,
      quantity: modification.newQuantity ?? order.quantity,
      price: modification.newPrice ?? order.price,
      triggerPrice: modification.newTriggerPrice ?? order.triggerPrice,
      role: order.role,
    };
    validateOrderRequest(candidate, this.registry, context);
    if (candidate.quantity < order.filledQuantity) {
      throw new ValidationError(
        `quantity ${candidate.quantity} is below the filled quantity ${order.filledQuantity}`,
        'quantity'
      );
    }

    if (
      candidate.quantity === order.quantity &&
      candidate.price === order.price &&
      candidate.triggerPrice === order.triggerPrice
    ) {
      return order;
    }

    const result = await this.gateway.modifyOrder(order, modification);
    if (!result.accepted) {
      throw new BrokerRejectionError(
        this.errorTable.describe(result.errorCode),
        order.orderId,
        result.errorCode ?? 'MODIFY_REJECTED'
      );
    }

    const modified: Order = {
      ...order,
      quantity: candidate.quantity,
      price: candidate.price,
      triggerPrice: candidate.triggerPrice,
      lastSequence: Math.max(order.lastSequence, result.sequence ?? order.lastSequence),
      updatedAt: this.now(),
    };
    await this.repository.putOrder(modified);
    return modified;
  }

  async quarantine(orderId: string, reason: string): Promise<void> {
    const order = await this.repository.getOrder(orderId);
    if (!order || order.quarantined) {
      return;
    }
    await this.repository.putOrder({ ...order, quarantined: true, updatedAt: this.now() });
    console.error('[OrderStateMachine] Order quarantined', { orderId, reason });
  }

  async release(orderId: string): Promise<void> {
    const order = await this.getOrder(orderId);
    if (order.quarantined) {
      await this.repository.putOrder({ ...order, quarantined: false, updatedAt: this.now() });
    }
  }

  /**
   * Returns the order in status `to`
   *
   * @throws InvalidTransitionError if the transition is not legal
   */
  transition(order: Order, to: OrderStatus): Order {
    if (!canTransition(order.status, to)) {
      throw new InvalidTransitionError(order.orderId, order.status, `move to ${to}`);
    }
    return { ...order, status: to, updatedAt: this.now() };
  }

  private applyTerminalEvent(order: Order, status: 'CANCELLED' | 'REJECTED', errorCode?: string): Order {
    if (order.status === status) {
      // Confirms an optimistic cancel, or repeats a terminal event
      return status === 'CANCELLED' ? { ...order, cancelConfirmed: true } : order;
    }
    if (isTerminal(order.status)) {
      throw new SyncInconsistencyError(
        `Order '${order.orderId}' reported ${status} after reaching ${order.status}`,
        'DUPLICATE_TERMINAL',
        order.orderId,
        order.positionId
      );
    }

    const next = this.transition(order, status);
    if (status === 'REJECTED') {
      return { ...next, errorCode, statusReason: this.errorTable.describe(errorCode) };
    }
    return { ...next, cancelConfirmed: true, statusReason: next.statusReason ?? 'Cancelled' };
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
