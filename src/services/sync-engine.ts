/**
 * Price/Order Sync Engine
 *
 * Drives the engine from price ticks and broker polls. For every affected
 * position, under that position's lock, it fetches backend updates for each
 * order in creation order and applies them in a fixed order: order state,
 * ledger, position, protective coordination. A sibling cancel issued while
 * handling one order is therefore settled before the next order is looked at,
 * and protective orders armed by an entry fill are synced in the same pass.
 *
 * Emits:
 * - 'sync-error' (SyncErrorEvent) for failures found while syncing
 * - 'anomaly' (AnomalyEvent) for tolerated irregularities
 */

import { EventEmitter } from 'events';
import { Order } from '../types/order';
import { BrokerGateway, BrokerOrderUpdate } from '../types/broker';
import { Trade } from '../types/trade';
import { Position, PositionAnomaly } from '../types/position';
import { AnomalyEvent, PriceTick, SyncErrorEvent } from '../types/engine';
import { OrderRepository } from '../repositories/order';
import { EngineError, SyncInconsistencyError } from './errors';
import { isWorking, OrderStateMachine } from './order-state-machine';
import { OrderEventQueue } from './order-event-queue';
import { PositionAggregator } from './position-aggregator';
import { KeyedLock } from './position-lock';
import { ProtectiveOrderCoordinator } from './protective-order-coordinator';
import { TradeLedger } from './trade-ledger';

export interface SyncEngineConfig {
  trailingEnabled: boolean;
  trailDistance: number;
}

export const DEFAULT_SYNC_CONFIG: SyncEngineConfig = {
  trailingEnabled: false,
  trailDistance: 0,
};

export interface SyncEngineDeps {
  orders: OrderStateMachine;
  orderRepository: OrderRepository;
  ledger: TradeLedger;
  positions: PositionAggregator;
  coordinator: ProtectiveOrderCoordinator;
  gateway: BrokerGateway;
  lock: KeyedLock;
  queue?: OrderEventQueue;
  config?: SyncEngineConfig;
  clock?: () => Date;
}

// Orders still able to change at the backend
function needsSync(order: Order): boolean {
  if (order.quarantined) {
    return false;
  }
  return isWorking(order.status) || (order.status === 'CANCELLED' && order.cancelConfirmed === false);
}

export class SyncEngine extends EventEmitter {
  private readonly orders: OrderStateMachine;
  private readonly orderRepository: OrderRepository;
  private readonly ledger: TradeLedger;
  private readonly positions: PositionAggregator;
  private readonly coordinator: ProtectiveOrderCoordinator;
  private readonly gateway: BrokerGateway;
  private readonly lock: KeyedLock;
  private readonly queue: OrderEventQueue;
  private readonly config: SyncEngineConfig;
  private readonly clock: () => Date;

  constructor(deps: SyncEngineDeps) {
    super();
    this.orders = deps.orders;
    this.orderRepository = deps.orderRepository;
    this.ledger = deps.ledger;
    this.positions = deps.positions;
    this.coordinator = deps.coordinator;
    this.gateway = deps.gateway;
    this.lock = deps.lock;
    this.queue = deps.queue ?? new OrderEventQueue();
    this.config = deps.config ?? DEFAULT_SYNC_CONFIG;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Processes one market price sample for a symbol
   */
  async onTick(tick: PriceTick): Promise<void> {
    const symbol = tick.symbol.toUpperCase();
    this.gateway.markPrice?.(symbol, tick.price);

    const positionIds = new Set<string>();
    for (const order of await this.orderRepository.listWorkingOrders()) {
      if (order.symbol === symbol) {
        positionIds.add(order.positionId);
      }
    }
    for (const position of await this.positions.listPositions()) {
      if (position.symbol === symbol) {
        positionIds.add(position.positionId);
      }
    }

    await Promise.all([...positionIds].map((positionId) => this.syncPosition(positionId, tick.price)));
  }

  /**
   * Polls the backend for every position with working orders
   */
  async poll(): Promise<void> {
    const positionIds = new Set<string>();
    for (const order of await this.orderRepository.listWorkingOrders()) {
      positionIds.add(order.positionId);
    }
    for (const position of await this.positions.listPositions()) {
      positionIds.add(position.positionId);
    }

    await Promise.all([...positionIds].map((positionId) => this.syncPosition(positionId)));
  }

  /**
   * Syncs one position under its lock. Failures are reported on the event
   * stream, never thrown.
   */
  async syncPosition(positionId: string, price?: number): Promise<void> {
    await this.lock.runExclusive(positionId, async () => {
      try {
        await this.syncPositionLocked(positionId, price);
      } catch (error) {
        await this.handleSyncError(error, positionId);
      }
    });
  }

  private async syncPositionLocked(positionId: string, price?: number): Promise<void> {
    const position = await this.positions.findPosition(positionId);
    if (position?.quarantined) {
      return;
    }

    // Orders armed during the pass are synced in the same pass, so a stop
    // placed through the market triggers at once
    const visited = new Set<string>();
    let pending = await this.unvisited(positionId, visited);
    while (pending.length > 0) {
      for (const listed of pending) {
        visited.add(listed.orderId);
        // Earlier orders in this pass may have cancelled this one
        const order = await this.orders.getOrder(listed.orderId);
        if (!needsSync(order)) {
          continue;
        }
        this.queue.enqueueAll(await this.gateway.fetchUpdates(order, price));
        await this.drain(order.orderId);
      }
      pending = await this.unvisited(positionId, visited);
    }

    await this.housekeep(positionId, price);
  }

  private async unvisited(positionId: string, visited: Set<string>): Promise<Order[]> {
    const orders = await this.orderRepository.listOrdersByPosition(positionId);
    return orders.filter((order) => !visited.has(order.orderId));
  }

  private async drain(orderId: string): Promise<void> {
    let update = this.queue.dequeue(orderId);
    while (update) {
      try {
        await this.applyUpdate(update);
      } catch (error) {
        this.queue.discard(orderId);
        throw error;
      }
      update = this.queue.dequeue(orderId);
    }
  }

  private async applyUpdate(update: BrokerOrderUpdate): Promise<void> {
    const order = await this.orders.getOrder(update.orderId);

    // Fills already in the ledger are not applied twice
    const events: BrokerOrderUpdate['events'] = [];
    for (const event of update.events) {
      if (event.kind === 'FILL' && (await this.ledger.has(event.fill.tradeId))) {
        console.warn('[SyncEngine] Duplicate fill skipped', { orderId: order.orderId, tradeId: event.fill.tradeId });
        continue;
      }
      events.push(event);
    }

    const outcome = await this.orders.applyUpdate(order, { ...update, events });
    if (outcome.disposition === 'RETRANSMISSION') {
      return;
    }

    // Every fill reaches the ledger before any of them moves the position
    const trades: Trade[] = [];
    for (const fill of outcome.fills) {
      const { trade, recorded } = await this.ledger.record(fill, outcome.order);
      if (recorded) {
        trades.push(trade);
      }
    }
    const armFailures: string[] = [];
    for (const trade of trades) {
      armFailures.push(...(await this.applyTrade(trade, outcome.order)));
    }

    if (outcome.cancelOverridden) {
      const position = await this.positions.recordAnomaly(order.positionId, {
        kind: 'CANCEL_OVERRIDDEN',
        orderId: order.orderId,
        detail: `Order reported filled after a cancel was committed without confirmation`,
        timestamp: this.now(),
      });
      this.emitAnomaly(position, position.anomalies[position.anomalies.length - 1]);
    }

    if (outcome.triggered && (order.role === 'STOP_LOSS' || order.role === 'TARGET')) {
      const position = await this.positions.getPosition(order.positionId);
      await this.coordinator.onTrigger(position, order.orderId);
    }

    // An entry that ends without fills leaves no position
    if ((outcome.becameTerminal === 'REJECTED' || outcome.becameTerminal === 'CANCELLED') && order.role === 'ENTRY') {
      await this.positions.onEntryRejected(outcome.order);
    }
    if (outcome.becameTerminal === 'REJECTED' && order.role !== 'ENTRY') {
      console.error('[SyncEngine] Protective order rejected', {
        orderId: order.orderId,
        positionId: order.positionId,
        role: order.role,
        reason: outcome.order.statusReason,
      });
    }

    if (armFailures.length > 0) {
      throw new SyncInconsistencyError(
        `Protective orders for position '${order.positionId}' could not be armed: ${armFailures.join('; ')}`,
        'ARM_FAILED',
        undefined,
        order.positionId
      );
    }
  }

  // Returns the protective orders that could not be armed
  private async applyTrade(trade: Trade, order: Order): Promise<string[]> {
    if (order.role === 'ENTRY') {
      const result = await this.positions.onEntryFill(trade, order);
      if (!result.applied) {
        this.emitAnomaly(result.position, result.position.anomalies[result.position.anomalies.length - 1]);
        return [];
      }
      if (result.activated) {
        const armed = await this.coordinator.arm(result.position, result.position.stopPrice, result.position.targetPrice);
        return armed.failures;
      }
      await this.coordinator.resize(result.position);
      return [];
    }

    const result = await this.positions.onProtectiveFill(trade, order);
    if (!result.applied) {
      this.emitAnomaly(result.position, result.position.anomalies[result.position.anomalies.length - 1]);
      return [];
    }
    await this.coordinator.onTrigger(result.position, order.orderId);
    if (result.closed) {
      await this.coordinator.onClosed(result.position);
    }
    return [];
  }

  // Pending-cancel timeouts, mark-to-market, target ratchet, auto-trailing, archiving
  private async housekeep(positionId: string, price?: number): Promise<void> {
    const now = this.clock();
    for (const order of await this.orderRepository.listOrdersByPosition(positionId)) {
      const swept = await this.orders.sweepCancel(order, now);
      if (swept?.role === 'ENTRY') {
        await this.positions.onEntryRejected(swept);
      }
    }

    let position = await this.positions.findPosition(positionId);
    if (!position) {
      return;
    }

    if (price !== undefined && position.status === 'ACTIVE') {
      position = await this.positions.markToMarket(positionId, price);
      await this.coordinator.advanceTargets(position);
      if (this.config.trailingEnabled && this.config.trailDistance > 0) {
        await this.coordinator.autoTrail(position, this.config.trailDistance);
      }
    }

    if (position.status === 'CLOSED') {
      const archived = await this.positions.archiveIfSettled(
        position,
        await this.orderRepository.listOrdersByPosition(positionId)
      );
      if (archived) {
        console.log('[SyncEngine] Position archived', { positionId });
      }
    }
  }

  private async handleSyncError(error: unknown, positionId: string): Promise<void> {
    const orderId = error instanceof SyncInconsistencyError ? error.orderId : undefined;

    if (error instanceof SyncInconsistencyError) {
      if (orderId) {
        await this.orders.quarantine(orderId, error.reason);
      }
      await this.positions.quarantine(error.positionId ?? positionId, error.reason);
    }

    const event: SyncErrorEvent = {
      errorName: error instanceof Error ? error.name : 'Error',
      category: error instanceof EngineError ? error.category : 'UNKNOWN',
      message: error instanceof Error ? error.message : String(error),
      orderId,
      positionId,
      timestamp: this.now(),
    };
    console.error('[SyncEngine] Sync error', event);
    this.emit('sync-error', event);
  }

  private emitAnomaly(position: Position, anomaly: PositionAnomaly | undefined): void {
    if (!anomaly) {
      return;
    }
    const event: AnomalyEvent = {
      kind: anomaly.kind,
      positionId: position.positionId,
      orderId: anomaly.orderId,
      detail: anomaly.detail,
      timestamp: anomaly.timestamp,
    };
    this.emit('anomaly', event);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
