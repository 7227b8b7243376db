/**
 * Position Aggregator
 *
 * The only writer of position records. Entry fills add open lots; closing
 * fills remove lots first-in-first-out and realize P&L on each removed lot.
 * Callers hold the position lock around every mutating call.
 */

import { v4 as uuidv4 } from 'uuid';
import { Order, OrderRole, ProductType } from '../types/order';
import { Trade } from '../types/trade';
import {
  ClosedReason,
  Position,
  PositionAnomaly,
  PositionDirection,
  PositionEventType,
  PositionHistory,
  PositionLot,
} from '../types/position';
import { PositionRepository } from '../repositories/position';
import { PositionHistoryRepository } from '../repositories/position-history';
import { PositionNotFoundError, SyncInconsistencyError } from './errors';
import { isTerminal } from './order-state-machine';

// What a position is opened with, before any fill
export interface PositionPlan {
  positionId: string;
  signalId: string;
  symbol: string;
  exchange: string;
  product: ProductType;
  direction: PositionDirection;
  entryOrderId: string;
  stopPrice: number;
  targetPrice: number;
  targets: number[];
}

// Fields written outside the fill path
export type PositionPatch = Partial<
  Pick<
    Position,
    'stopLossOrderId' | 'targetOrderId' | 'stopPrice' | 'targetPrice' | 'closingOrderId' | 'targets' | 'targetsHit'
  >
>;

export interface EntryFillResult {
  position: Position;
  activated: boolean; // Became ACTIVE with this fill
  applied: boolean;
}

export interface ClosingFillResult {
  position: Position;
  applied: boolean; // false for a sibling fill after another order won
  closed: boolean; // Closed by this fill
}

export function directionSign(direction: PositionDirection): 1 | -1 {
  return direction === 'LONG' ? 1 : -1;
}

/**
 * Unrealized P&L at `currentPrice`. Pure; the stored value is a display cache.
 */
export function unrealizedPnl(position: Position, currentPrice: number): number {
  if (position.netQuantity === 0) {
    return 0;
  }
  return (currentPrice - position.avgPrice) * Math.abs(position.netQuantity) * directionSign(position.direction);
}

/**
 * Quantity-weighted average price of the open lots
 */
export function averageLotPrice(lots: PositionLot[]): number {
  const quantity = lots.reduce((sum, lot) => sum + lot.quantity, 0);
  if (quantity === 0) {
    return 0;
  }
  return lots.reduce((sum, lot) => sum + lot.quantity * lot.price, 0) / quantity;
}

/**
 * Removes `quantity` from the lots first-in-first-out at `exitPrice`
 */
export function closeLots(
  lots: PositionLot[],
  quantity: number,
  exitPrice: number,
  direction: PositionDirection
): { lots: PositionLot[]; realized: number; closed: number } {
  const remaining = lots.map((lot) => ({ ...lot }));
  const sign = directionSign(direction);
  let toClose = quantity;
  let realized = 0;

  while (toClose > 0 && remaining.length > 0) {
    const lot = remaining[0];
    const closed = Math.min(lot.quantity, toClose);
    realized += (exitPrice - lot.price) * closed * sign;
    lot.quantity -= closed;
    toClose -= closed;
    if (lot.quantity === 0) {
      remaining.shift();
    }
  }

  return { lots: remaining, realized, closed: quantity - toClose };
}

const CLOSED_REASONS: Partial<Record<OrderRole, ClosedReason>> = {
  STOP_LOSS: 'SL_HIT',
  TARGET: 'TARGET_HIT',
  EXIT: 'MANUAL_EXIT',
};

export interface PositionAggregatorDeps {
  repository: PositionRepository;
  history: PositionHistoryRepository;
  clock?: () => Date;
}

export class PositionAggregator {
  private readonly repository: PositionRepository;
  private readonly historyRepository: PositionHistoryRepository;
  private readonly clock: () => Date;

  constructor(deps: PositionAggregatorDeps) {
    this.repository = deps.repository;
    this.historyRepository = deps.history;
    this.clock = deps.clock ?? (() => new Date());
  }

  async findPosition(positionId: string): Promise<Position | null> {
    return this.repository.getPosition(positionId);
  }

  async getPosition(positionId: string): Promise<Position> {
    const position = await this.repository.getPosition(positionId);
    if (!position) {
      throw new PositionNotFoundError(positionId);
    }
    return position;
  }

  async listPositions(): Promise<Position[]> {
    return this.repository.listLivePositions();
  }

  async history(positionId: string): Promise<PositionHistory[]> {
    return this.historyRepository.listHistory(positionId);
  }

  /**
   * Creates the position in PENDING_OPEN with no quantity
   */
  async openPending(plan: PositionPlan): Promise<Position> {
    const now = this.now();
    const position: Position = {
      ...plan,
      netQuantity: 0,
      avgPrice: 0,
      openLots: [],
      realizedPnl: 0,
      unrealizedPnl: 0,
      status: 'PENDING_OPEN',
      targetsHit: 0,
      quarantined: false,
      anomalies: [],
      createdAt: now,
      updatedAt: now,
    };
    await this.repository.putPosition(position);
    return position;
  }

  /**
   * Adds an entry fill as a new open lot. The first fill activates the position.
   */
  async onEntryFill(trade: Trade, order: Order): Promise<EntryFillResult> {
    const position = await this.getPosition(order.positionId);
    if (position.entryOrderId !== order.orderId) {
      throw new SyncInconsistencyError(
        `Order '${order.orderId}' is not the entry order of position '${position.positionId}'`,
        'UNEXPECTED_FILL',
        order.orderId,
        position.positionId
      );
    }

    if (position.status === 'CLOSED') {
      const updated = await this.addAnomaly(position, {
        kind: 'LATE_ENTRY_FILL',
        orderId: order.orderId,
        tradeId: trade.tradeId,
        detail: `Entry fill of ${trade.fillQuantity} @ ${trade.fillPrice} arrived after the position closed`,
        timestamp: this.now(),
      });
      return { position: updated, activated: false, applied: false };
    }

    const sign = directionSign(position.direction);
    const openLots = [...position.openLots];
    const last = openLots[openLots.length - 1];
    // Same-price fills share a lot so the average stays exact
    if (last && last.price === trade.fillPrice) {
      openLots[openLots.length - 1] = { ...last, quantity: last.quantity + trade.fillQuantity };
    } else {
      openLots.push({ tradeId: trade.tradeId, quantity: trade.fillQuantity, price: trade.fillPrice });
    }

    const activated = position.status === 'PENDING_OPEN';
    const netQuantity = position.netQuantity + sign * trade.fillQuantity;
    const avgPrice = averageLotPrice(openLots);
    const lastPrice = position.lastPrice ?? trade.fillPrice;

    const updated: Position = {
      ...position,
      openLots,
      netQuantity,
      avgPrice,
      lastPrice,
      highWaterMark: position.highWaterMark ?? trade.fillPrice,
      status: netQuantity !== 0 ? 'ACTIVE' : position.status,
      updatedAt: this.now(),
    };
    updated.unrealizedPnl = unrealizedPnl(updated, lastPrice);

    await this.repository.putPosition(updated);
    await this.recordHistory(position, updated, activated ? 'OPEN' : 'INCREASE', trade, order.role);

    return { position: updated, activated: activated && updated.status === 'ACTIVE', applied: true };
  }

  /**
   * Applies a fill of a stop-loss, target or exit order.
   *
   * The first closing order to fill owns the closure; fills of any other
   * closing order are kept out of the position and reported as anomalies.
   */
  async onProtectiveFill(trade: Trade, order: Order): Promise<ClosingFillResult> {
    const position = await this.getPosition(order.positionId);

    if (position.closingOrderId && position.closingOrderId !== order.orderId) {
      const updated = await this.addAnomaly(position, {
        kind: 'SIBLING_FILL',
        orderId: order.orderId,
        tradeId: trade.tradeId,
        detail: `${order.role} fill of ${trade.fillQuantity} @ ${trade.fillPrice} after ${position.closingOrderId} won the closure`,
        timestamp: this.now(),
      });
      return { position: updated, applied: false, closed: false };
    }

    const openQuantity = Math.abs(position.netQuantity);
    if (openQuantity === 0) {
      const updated = await this.addAnomaly(position, {
        kind: 'EXCESS_EXIT_FILL',
        orderId: order.orderId,
        tradeId: trade.tradeId,
        detail: `${order.role} fill of ${trade.fillQuantity} with no open quantity`,
        timestamp: this.now(),
      });
      return { position: updated, applied: false, closed: false };
    }

    const { lots, realized, closed } = closeLots(position.openLots, trade.fillQuantity, trade.fillPrice, position.direction);
    const sign = directionSign(position.direction);
    const netQuantity = position.netQuantity - sign * closed;
    const now = this.now();

    const anomalies = [...position.anomalies];
    if (closed < trade.fillQuantity) {
      anomalies.push({
        kind: 'EXCESS_EXIT_FILL',
        orderId: order.orderId,
        tradeId: trade.tradeId,
        detail: `${trade.fillQuantity - closed} of ${trade.fillQuantity} exceeded the open quantity`,
        timestamp: now,
      });
    }

    const updated: Position = {
      ...position,
      openLots: lots,
      netQuantity,
      avgPrice: averageLotPrice(lots),
      realizedPnl: position.realizedPnl + realized,
      closingOrderId: order.orderId,
      anomalies,
      updatedAt: now,
    };

    const isClosed = netQuantity === 0;
    if (isClosed) {
      updated.status = 'CLOSED';
      updated.closedReason = CLOSED_REASONS[order.role] ?? 'MANUAL_EXIT';
      updated.closedAt = now;
      updated.unrealizedPnl = 0;
    } else {
      updated.unrealizedPnl = unrealizedPnl(updated, position.lastPrice ?? trade.fillPrice);
    }

    await this.repository.putPosition(updated);
    await this.recordHistory(position, updated, isClosed ? 'CLOSE' : 'DECREASE', trade, order.role);

    if (isClosed) {
      console.log('[PositionAggregator] Position closed', {
        positionId: updated.positionId,
        closedReason: updated.closedReason,
        realizedPnl: updated.realizedPnl,
      });
    }
    return { position: updated, applied: true, closed: isClosed };
  }

  /**
   * Discards a position whose entry was rejected before any fill.
   * Returns true when the position was discarded.
   */
  async onEntryRejected(order: Order): Promise<boolean> {
    const position = await this.repository.getPosition(order.positionId);
    if (!position || position.status !== 'PENDING_OPEN' || position.netQuantity !== 0) {
      return false;
    }
    await this.repository.deletePosition(position.positionId);
    await this.recordHistory(position, position, 'DISCARD', undefined, order.role);
    return true;
  }

  /**
   * Updates the mark, the cached unrealized P&L and the high-water mark
   */
  async markToMarket(positionId: string, price: number): Promise<Position> {
    const position = await this.getPosition(positionId);
    if (position.status !== 'ACTIVE') {
      return position;
    }

    const best = position.highWaterMark ?? position.avgPrice;
    const highWaterMark = position.direction === 'LONG' ? Math.max(best, price) : Math.min(best, price);
    const updated: Position = {
      ...position,
      lastPrice: price,
      highWaterMark,
      unrealizedPnl: unrealizedPnl(position, price),
      updatedAt: this.now(),
    };
    await this.repository.putPosition(updated);
    return updated;
  }

  /**
   * Applies a non-P&L change (protective order ids, stop/target levels)
   */
  async update(positionId: string, patch: PositionPatch): Promise<Position> {
    const position = await this.getPosition(positionId);
    const updated: Position = { ...position, ...patch, updatedAt: this.now() };
    await this.repository.putPosition(updated);
    return updated;
  }

  /**
   * Archives a closed position once its protective orders are all terminal.
   * Returns the archived position, or null when it is not yet settled.
   */
  async archiveIfSettled(position: Position, orders: Order[]): Promise<Position | null> {
    if (position.status !== 'CLOSED' || position.archivedAt) {
      return null;
    }
    const protective = orders.filter(
      (order) => order.orderId === position.stopLossOrderId || order.orderId === position.targetOrderId
    );
    if (protective.some((order) => !isTerminal(order.status))) {
      return null;
    }

    const archived: Position = { ...position, archivedAt: this.now(), updatedAt: this.now() };
    await this.repository.putPosition(archived);
    return archived;
  }

  async recordAnomaly(positionId: string, anomaly: PositionAnomaly): Promise<Position> {
    return this.addAnomaly(await this.getPosition(positionId), anomaly);
  }

  async quarantine(positionId: string, reason: string): Promise<void> {
    const position = await this.repository.getPosition(positionId);
    if (!position || position.quarantined) {
      return;
    }
    await this.repository.putPosition({ ...position, quarantined: true, updatedAt: this.now() });
    console.error('[PositionAggregator] Position quarantined', { positionId, reason });
  }

  async release(positionId: string): Promise<Position> {
    const position = await this.getPosition(positionId);
    const released: Position = { ...position, quarantined: false, updatedAt: this.now() };
    await this.repository.putPosition(released);
    return released;
  }

  private async addAnomaly(position: Position, anomaly: PositionAnomaly): Promise<Position> {
    const updated: Position = { ...position, anomalies: [...position.anomalies, anomaly], updatedAt: this.now() };
    await this.repository.putPosition(updated);
    console.warn('[PositionAggregator] Anomaly recorded', { positionId: position.positionId, ...anomaly });
    return updated;
  }

  private async recordHistory(
    before: Position,
    after: Position,
    eventType: PositionEventType,
    trade: Trade | undefined,
    role: OrderRole
  ): Promise<void> {
    await this.historyRepository.appendHistory({
      historyId: uuidv4(),
      positionId: after.positionId,
      eventType,
      previousQuantity: before.netQuantity,
      newQuantity: after.netQuantity,
      previousAvgPrice: before.avgPrice,
      newAvgPrice: after.avgPrice,
      realizedPnl: after.realizedPnl - before.realizedPnl,
      tradeId: trade?.tradeId,
      role,
      timestamp: this.now(),
    });
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
