/**
 * Protective Order Coordinator
 *
 * Keeps each position's stop-loss and target orders paired: arms them when
 * the position opens, resizes them as the entry fills, cancels the sibling
 * the moment either one heads for a fill, and handles trailing, manual
 * edits and manual exits. Every method must run under the position's lock.
 */

import { CancelResult, Order, OrderContext, OrderRequest, OrderType } from '../types/order';
import { Position } from '../types/position';
import { InvalidTrailDirectionError, InvalidTransitionError, ValidationError } from './errors';
import { isWorking, OrderStateMachine } from './order-state-machine';
import { PositionAggregator } from './position-aggregator';
import { KeyedLock } from './position-lock';

export type StopOrderType = Extract<OrderType, 'SL-MARKET' | 'SL-LIMIT'>;

export interface CoordinatorConfig {
  stopOrderType: StopOrderType;
  stopLimitOffset: number; // Distance between trigger and limit for SL-LIMIT stops
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  stopOrderType: 'SL-MARKET',
  stopLimitOffset: 0,
};

export interface ArmResult {
  position: Position;
  failures: string[];
}

export interface ExitResult {
  exitOrder?: Order;
  cancels: CancelResult[];
  blockedReason?: string;
}

/**
 * Whether moving a stop from `current` to `next` reduces risk
 */
export function isTighter(direction: Position['direction'], current: number, next: number): boolean {
  return direction === 'LONG' ? next > current : next < current;
}

/**
 * Distinct levels ordered from the nearest to the furthest in the position's favour
 */
export function orderLevels(direction: Position['direction'], levels: number[]): number[] {
  const distinct = [...new Set(levels)];
  return distinct.sort((a, b) => (direction === 'LONG' ? a - b : b - a));
}

function closingSide(position: Position): 'BUY' | 'SELL' {
  return position.direction === 'LONG' ? 'SELL' : 'BUY';
}

function contextOf(position: Position): OrderContext {
  return { direction: position.direction, lastPrice: position.lastPrice };
}

export class ProtectiveOrderCoordinator {
  constructor(
    private readonly orders: OrderStateMachine,
    private readonly positions: PositionAggregator,
    private readonly lock: KeyedLock,
    private readonly config: CoordinatorConfig = DEFAULT_COORDINATOR_CONFIG
  ) {}

  /**
   * Places the stop first, then the target, for the open quantity.
   *
   * Both are checked for side only: an entry that filled through the stop
   * leaves a stop that triggers on its first evaluation. The target is placed
   * even when the stop could not be, and every order that failed is listed in
   * `failures`.
   */
  async arm(position: Position, stopPrice: number, targetPrice: number): Promise<ArmResult> {
    this.assertLocked(position.positionId);
    const quantity = Math.abs(position.netQuantity);
    const context: OrderContext = { direction: position.direction };
    const failures: string[] = [];

    const stop = await this.place(position, this.stopRequest(position, stopPrice, quantity), context, failures);
    const target = await this.place(
      position,
      { ...this.baseRequest(position, quantity), orderType: 'LIMIT', price: targetPrice, role: 'TARGET' },
      context,
      failures
    );

    const updated = await this.positions.update(position.positionId, {
      stopLossOrderId: stop?.orderId,
      targetOrderId: target?.orderId,
      stopPrice,
      targetPrice,
    });
    return { position: updated, failures };
  }

  /**
   * Resizes working protective orders to the open quantity
   */
  async resize(position: Position): Promise<void> {
    this.assertLocked(position.positionId);
    const quantity = Math.abs(position.netQuantity);

    for (const orderId of [position.stopLossOrderId, position.targetOrderId]) {
      if (!orderId) {
        continue;
      }
      const order = await this.orders.getOrder(orderId);
      if (isWorking(order.status) && order.quantity !== quantity && order.filledQuantity === 0) {
        await this.orders.modify(order, { newQuantity: quantity }, { direction: position.direction });
      }
    }
  }

  /**
   * Cancels the sibling of a protective order that is heading for a fill
   */
  async onTrigger(position: Position, orderId: string): Promise<CancelResult | null> {
    this.assertLocked(position.positionId);

    const siblingId =
      orderId === position.stopLossOrderId
        ? position.targetOrderId
        : orderId === position.targetOrderId
          ? position.stopLossOrderId
          : undefined;
    if (!siblingId) {
      return null;
    }

    const sibling = await this.orders.getOrder(siblingId);
    if (!isWorking(sibling.status) || sibling.cancelRequestedAt) {
      return null;
    }

    const result = await this.orders.cancel(sibling);
    console.log('[ProtectiveOrderCoordinator] Sibling cancel requested', {
      positionId: position.positionId,
      triggeredOrderId: orderId,
      siblingOrderId: siblingId,
      outcome: result.outcome,
    });
    return result;
  }

  /**
   * Cancels every working order left on a closed position
   */
  async onClosed(position: Position): Promise<CancelResult[]> {
    this.assertLocked(position.positionId);
    const results: CancelResult[] = [];

    for (const orderId of [position.stopLossOrderId, position.targetOrderId, position.entryOrderId]) {
      if (!orderId || orderId === position.closingOrderId) {
        continue;
      }
      const order = await this.orders.getOrder(orderId);
      if (isWorking(order.status) && !order.cancelRequestedAt) {
        results.push(await this.orders.cancel(order));
      }
    }
    return results;
  }

  /**
   * Moves the stop toward the market. Only tighter moves are allowed.
   *
   * @throws InvalidTrailDirectionError if the move would widen risk
   * @throws InvalidTransitionError unless the stop is still waiting for its trigger
   */
  async trail(position: Position, newStopPrice: number): Promise<Order> {
    this.assertLocked(position.positionId);
    const stop = await this.workingStop(position, 'trail');
    const current = stop.triggerPrice ?? position.stopPrice;

    if (newStopPrice === current) {
      return stop;
    }
    if (!isTighter(position.direction, current, newStopPrice)) {
      throw new InvalidTrailDirectionError(position.positionId, current, newStopPrice);
    }

    return this.moveStop(position, stop, newStopPrice);
  }

  /**
   * Manual stop edit in either direction, still validated against the market
   */
  async modifyStop(position: Position, newStopPrice: number): Promise<Order> {
    this.assertLocked(position.positionId);
    const stop = await this.workingStop(position, 'modify');
    return this.moveStop(position, stop, newStopPrice);
  }

  async modifyTarget(position: Position, newTargetPrice: number): Promise<Order> {
    this.assertLocked(position.positionId);
    if (!position.targetOrderId) {
      throw new ValidationError(`Position '${position.positionId}' has no target order`, 'targetOrderId');
    }
    const target = await this.orders.getOrder(position.targetOrderId);
    if (!isWorking(target.status)) {
      throw new InvalidTransitionError(target.orderId, target.status, 'modify');
    }

    const modified = await this.orders.modify(target, { newPrice: newTargetPrice }, contextOf(position));
    await this.positions.update(position.positionId, { targetPrice: newTargetPrice });
    return modified;
  }

  /**
   * Trails the stop to `highWaterMark ∓ trailDistance` when that is tighter.
   * Returns the modified stop, or null when nothing moved.
   */
  async autoTrail(position: Position, trailDistance: number): Promise<Order | null> {
    this.assertLocked(position.positionId);
    if (position.status !== 'ACTIVE' || position.highWaterMark === undefined || !position.stopLossOrderId) {
      return null;
    }

    const stop = await this.orders.getOrder(position.stopLossOrderId);
    if (stop.status !== 'TRIGGER_PENDING' || stop.triggerPrice === undefined) {
      return null;
    }

    const candidate =
      position.direction === 'LONG' ? position.highWaterMark - trailDistance : position.highWaterMark + trailDistance;
    if (!isTighter(position.direction, stop.triggerPrice, candidate)) {
      return null;
    }
    // A stop on the wrong side of the market would trigger at once
    if (position.lastPrice !== undefined && !isTighter(position.direction, candidate, position.lastPrice)) {
      return null;
    }

    return this.moveStop(position, stop, candidate);
  }

  /**
   * Ratchets the stop as the best price reaches intermediate target levels:
   * to the entry price at the first level, to level n-1 at level n. The
   * working target order stays at the final target.
   */
  async advanceTargets(position: Position): Promise<Order | null> {
    this.assertLocked(position.positionId);
    if (position.status !== 'ACTIVE' || position.highWaterMark === undefined || position.targets.length === 0) {
      return null;
    }

    const best = position.highWaterMark;
    const reached = position.targets.filter((level) => !isTighter(position.direction, best, level)).length;
    if (reached <= position.targetsHit) {
      return null;
    }

    const updated = await this.positions.update(position.positionId, { targetsHit: reached });
    const candidate = reached === 1 ? position.avgPrice : position.targets[reached - 2];
    console.log('[ProtectiveOrderCoordinator] Target level reached', {
      positionId: position.positionId,
      level: position.targets[reached - 1],
      targetsHit: reached,
      stopCandidate: candidate,
    });

    if (!position.stopLossOrderId) {
      return null;
    }
    const stop = await this.orders.getOrder(position.stopLossOrderId);
    if (stop.status !== 'TRIGGER_PENDING' || stop.triggerPrice === undefined) {
      return null;
    }
    if (!isTighter(position.direction, stop.triggerPrice, candidate)) {
      return null;
    }
    if (position.lastPrice !== undefined && !isTighter(position.direction, candidate, position.lastPrice)) {
      return null;
    }

    return this.moveStop(updated, stop, candidate);
  }

  /**
   * Replaces the target ladder. The furthest level becomes the final target
   * (moving the working target order when it changed); the others are the
   * intermediate levels the stop ratchets through.
   *
   * @throws ValidationError if a level is not beyond the stop
   */
  async modifyTargets(position: Position, levels: number[]): Promise<Position> {
    this.assertLocked(position.positionId);
    if (levels.length === 0) {
      throw new ValidationError('At least one target level is required', 'targets');
    }

    const ordered = orderLevels(position.direction, levels);
    for (const level of ordered) {
      if (!isTighter(position.direction, position.stopPrice, level)) {
        throw new ValidationError(
          `Target level ${level} must be ${position.direction === 'LONG' ? 'above' : 'below'} the stop ${position.stopPrice}`,
          'targets'
        );
      }
    }

    const finalTarget = ordered[ordered.length - 1];
    if (finalTarget !== position.targetPrice) {
      await this.modifyTarget(position, finalTarget);
    }

    const targets = ordered.slice(0, -1);
    const best = position.highWaterMark;
    const targetsHit =
      best === undefined ? 0 : targets.filter((level) => !isTighter(position.direction, best, level)).length;
    return this.positions.update(position.positionId, { targets, targetsHit });
  }

  /**
   * Cancels both protective orders, then closes the open quantity at market.
   * The exit order is placed only when neither protective order can still fill.
   */
  async beginExit(position: Position): Promise<ExitResult> {
    this.assertLocked(position.positionId);
    const cancels: CancelResult[] = [];

    for (const orderId of [position.stopLossOrderId, position.targetOrderId]) {
      if (!orderId) {
        continue;
      }
      const order = await this.orders.getOrder(orderId);
      if (!isWorking(order.status)) {
        if (order.status === 'COMPLETE') {
          return { cancels, blockedReason: `${order.role} order ${order.orderId} has already filled` };
        }
        continue;
      }
      const result = await this.orders.cancel(order);
      cancels.push(result);
      if (result.outcome !== 'CANCELLED' && result.outcome !== 'ALREADY_CANCELLED') {
        return {
          cancels,
          blockedReason: `Could not cancel ${order.role} order ${order.orderId}: ${result.reason ?? result.outcome}`,
        };
      }
    }

    const exitOrder = await this.orders.submit(
      { ...this.baseRequest(position, Math.abs(position.netQuantity)), orderType: 'MARKET', role: 'EXIT' },
      contextOf(position)
    );
    if (exitOrder.status !== 'REJECTED') {
      // Neither protective order can fill any more, so the exit owns the rest of the closure
      await this.positions.update(position.positionId, { closingOrderId: exitOrder.orderId });
    }
    return { exitOrder, cancels };
  }

  private async place(
    position: Position,
    request: OrderRequest,
    context: OrderContext,
    failures: string[]
  ): Promise<Order | undefined> {
    try {
      const order = await this.orders.submit(request, context);
      if (order.status === 'REJECTED') {
        console.error('[ProtectiveOrderCoordinator] Protective order rejected', {
          positionId: position.positionId,
          orderId: order.orderId,
          role: order.role,
          reason: order.statusReason,
        });
        failures.push(`${order.role} order ${order.orderId} rejected: ${order.statusReason ?? order.errorCode ?? 'unknown'}`);
      }
      return order;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[ProtectiveOrderCoordinator] Protective order not placed', {
        positionId: position.positionId,
        role: request.role,
        message,
      });
      failures.push(`${request.role} order not placed: ${message}`);
      return undefined;
    }
  }

  private async workingStop(position: Position, operation: string): Promise<Order> {
    if (!position.stopLossOrderId) {
      throw new ValidationError(`Position '${position.positionId}' has no stop-loss order`, 'stopLossOrderId');
    }
    const stop = await this.orders.getOrder(position.stopLossOrderId);
    // A stop reported OPEN has already been triggered
    if (stop.status !== 'TRIGGER_PENDING') {
      throw new InvalidTransitionError(stop.orderId, stop.status, operation);
    }
    return stop;
  }

  private async moveStop(position: Position, stop: Order, newStopPrice: number): Promise<Order> {
    const modification =
      stop.orderType === 'SL-LIMIT'
        ? { newTriggerPrice: newStopPrice, newPrice: this.stopLimitPrice(position, newStopPrice) }
        : { newTriggerPrice: newStopPrice };

    const modified = await this.orders.modify(stop, modification, contextOf(position));
    await this.positions.update(position.positionId, { stopPrice: newStopPrice });
    return modified;
  }

  private stopRequest(position: Position, stopPrice: number, quantity: number): OrderRequest {
    const base = { ...this.baseRequest(position, quantity), role: 'STOP_LOSS' as const, triggerPrice: stopPrice };
    if (this.config.stopOrderType === 'SL-LIMIT') {
      return { ...base, orderType: 'SL-LIMIT', price: this.stopLimitPrice(position, stopPrice) };
    }
    return { ...base, orderType: 'SL-MARKET' };
  }

  private stopLimitPrice(position: Position, stopPrice: number): number {
    return position.direction === 'LONG'
      ? stopPrice - this.config.stopLimitOffset
      : stopPrice + this.config.stopLimitOffset;
  }

  private baseRequest(position: Position, quantity: number): Omit<OrderRequest, 'orderType' | 'role'> {
    return {
      parentSignalId: position.signalId,
      positionId: position.positionId,
      symbol: position.symbol,
      exchange: position.exchange,
      side: closingSide(position),
      product: position.product,
      quantity,
    };
  }

  private assertLocked(positionId: string): void {
    if (!this.lock.isHeld(positionId)) {
      throw new Error(`Position lock for '${positionId}' must be held by the caller`);
    }
  }
}
