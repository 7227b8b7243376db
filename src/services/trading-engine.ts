/**
 * Trading Engine
 *
 * Wires the core together over one backend and exposes the command surface.
 * Commands run under the position lock, the same lock the sync loop takes,
 * so a command never interleaves with fill processing for that position.
 */

import { EventEmitter } from 'events';
import { Order } from '../types/order';
import { BrokerGateway, LiveBrokerAdapter } from '../types/broker';
import { Position, PositionHistory } from '../types/position';
import { Trade } from '../types/trade';
import { IngestionStats } from '../types/signal';
import { CommandResult, IngestResult, PriceTick } from '../types/engine';
import { EngineConfig, loadEngineConfig } from '../config';
import { InMemoryOrderRepository, OrderRepository } from '../repositories/order';
import { InMemoryTradeRepository, TradeRepository } from '../repositories/trade';
import { InMemoryPositionRepository, PositionRepository } from '../repositories/position';
import { InMemorySignalRepository, SignalRepository } from '../repositories/signal';
import { InMemoryPositionHistoryRepository, PositionHistoryRepository } from '../repositories/position-history';
import { BrokerErrorTable, createErrorTable } from './broker-error-table';
import { BrokerRejectionError, QuarantinedError, ValidationError } from './errors';
import { InstrumentRegistry } from './instrument-registry';
import { LiveBrokerGateway } from './live-broker-gateway';
import { isWorking, OrderStateMachine } from './order-state-machine';
import { PositionAggregator, unrealizedPnl } from './position-aggregator';
import { KeyedLock } from './position-lock';
import { ProtectiveOrderCoordinator } from './protective-order-coordinator';
import { SandboxBroker } from './sandbox-broker';
import { SignalIngestor } from './signal-ingestor';
import { SyncEngine } from './sync-engine';
import { TradeLedger } from './trade-ledger';

export interface EngineRepositories {
  orders: OrderRepository;
  trades: TradeRepository;
  positions: PositionRepository;
  signals: SignalRepository;
  history: PositionHistoryRepository;
}

export interface TradingEngineOptions {
  config?: EngineConfig;
  repositories?: EngineRepositories;
  gateway?: BrokerGateway; // Overrides the backend chosen by config.mode
  adapter?: LiveBrokerAdapter; // Required in LIVE mode unless a gateway is given
  registry?: InstrumentRegistry;
  errorTable?: BrokerErrorTable;
  instanceId?: string; // Tags sandbox broker order ids
  clock?: () => Date;
}

export function createInMemoryRepositories(): EngineRepositories {
  return {
    orders: new InMemoryOrderRepository(),
    trades: new InMemoryTradeRepository(),
    positions: new InMemoryPositionRepository(),
    signals: new InMemorySignalRepository(),
    history: new InMemoryPositionHistoryRepository(),
  };
}

export class TradingEngine {
  readonly config: EngineConfig;
  readonly gateway: BrokerGateway;
  readonly events: EventEmitter;

  private readonly repositories: EngineRepositories;
  private readonly lock = new KeyedLock();
  private readonly orders: OrderStateMachine;
  private readonly ledger: TradeLedger;
  private readonly positions: PositionAggregator;
  private readonly coordinator: ProtectiveOrderCoordinator;
  private readonly ingestor: SignalIngestor;
  private readonly sync: SyncEngine;
  private restored?: Promise<void>;

  constructor(options: TradingEngineOptions = {}) {
    this.config = options.config ?? loadEngineConfig();
    this.repositories = options.repositories ?? createInMemoryRepositories();
    const clock = options.clock ?? (() => new Date());
    const registry = options.registry ?? new InstrumentRegistry();
    const errorTable = options.errorTable ?? createErrorTable(this.config.mode);

    this.gateway = options.gateway ?? this.createGateway(options, registry, errorTable, clock);
    this.orders = new OrderStateMachine({
      repository: this.repositories.orders,
      gateway: this.gateway,
      registry,
      errorTable,
      cancelTimeoutMs: this.config.cancelTimeoutMs,
      clock,
    });
    this.ledger = new TradeLedger(this.repositories.trades);
    this.positions = new PositionAggregator({
      repository: this.repositories.positions,
      history: this.repositories.history,
      clock,
    });
    this.coordinator = new ProtectiveOrderCoordinator(this.orders, this.positions, this.lock, {
      stopOrderType: this.config.stopOrderType,
      stopLimitOffset: this.config.stopLimitOffset,
    });
    this.ingestor = new SignalIngestor({
      signals: this.repositories.signals,
      orders: this.orders,
      positions: this.positions,
      gateway: this.gateway,
      lock: this.lock,
      config: {
        autoStopPercent: this.config.autoStopPercent,
        quantityMultiplier: this.config.quantityMultiplier,
        defaultExchange: this.config.defaultExchange,
        defaultProduct: this.config.defaultProduct,
      },
      clock,
    });
    this.sync = new SyncEngine({
      orders: this.orders,
      orderRepository: this.repositories.orders,
      ledger: this.ledger,
      positions: this.positions,
      coordinator: this.coordinator,
      gateway: this.gateway,
      lock: this.lock,
      config: { trailingEnabled: this.config.trailing.enabled, trailDistance: this.config.trailing.distance },
      clock,
    });
    this.events = this.sync;
  }

  /**
   * @throws MalformedSignalError if the signal is invalid
   * @throws BrokerRejectionError if the entry order is refused
   */
  async ingestSignal(input: unknown): Promise<IngestResult> {
    await this.ready();
    return this.ingestor.ingest(input);
  }

  async onTick(tick: PriceTick): Promise<void> {
    await this.ready();
    await this.sync.onTick(tick);
  }

  async poll(): Promise<void> {
    await this.ready();
    await this.sync.poll();
  }

  /**
   * Closes a position at market. A position still waiting for its entry has
   * the entry cancelled instead.
   */
  async exit(positionId: string): Promise<CommandResult> {
    return this.command(positionId, async (position) => {
      if (position.status === 'CLOSED') {
        return { success: false, message: `Position is already closed (${position.closedReason ?? 'unknown'})` };
      }

      const entry = await this.orders.getOrder(position.entryOrderId);
      if (isWorking(entry.status)) {
        const cancel = await this.orders.cancel(entry);
        if (position.status === 'PENDING_OPEN') {
          if (cancel.outcome === 'CANCELLED') {
            await this.positions.onEntryRejected(cancel.order);
            return { success: true, orderId: entry.orderId, message: 'Entry order cancelled; no position was opened' };
          }
          return {
            success: cancel.outcome === 'PENDING_CANCEL',
            orderId: entry.orderId,
            message:
              cancel.outcome === 'PENDING_CANCEL'
                ? 'Entry cancel requested'
                : `Could not cancel entry order: ${cancel.reason ?? cancel.outcome}`,
          };
        }
        if (cancel.outcome !== 'CANCELLED') {
          return {
            success: false,
            orderId: entry.orderId,
            message: `Could not cancel remaining entry quantity: ${cancel.reason ?? cancel.outcome}`,
          };
        }
      }

      const result = await this.coordinator.beginExit(await this.positions.getPosition(positionId));
      if (result.blockedReason || !result.exitOrder) {
        return { success: false, message: result.blockedReason ?? 'Exit order was not placed' };
      }
      if (result.exitOrder.status === 'REJECTED') {
        return {
          success: false,
          orderId: result.exitOrder.orderId,
          message: result.exitOrder.statusReason ?? 'Exit order rejected',
        };
      }
      return { success: true, orderId: result.exitOrder.orderId, message: 'Exit order placed' };
    });
  }

  async modifyStop(positionId: string, price: number): Promise<CommandResult> {
    return this.command(positionId, async (position) => {
      const stop = await this.coordinator.modifyStop(position, price);
      return { success: true, orderId: stop.orderId, message: `Stop moved to ${price}` };
    });
  }

  async modifyTarget(positionId: string, price: number): Promise<CommandResult> {
    return this.command(positionId, async (position) => {
      const target = await this.coordinator.modifyTarget(position, price);
      return { success: true, orderId: target.orderId, message: `Target moved to ${price}` };
    });
  }

  /**
   * Replaces the target ladder; the furthest level becomes the final target
   */
  async modifyTargets(positionId: string, levels: number[]): Promise<CommandResult> {
    return this.command(positionId, async (position) => {
      const updated = await this.coordinator.modifyTargets(position, levels);
      return {
        success: true,
        orderId: updated.targetOrderId,
        message: `Targets set to ${[...updated.targets, updated.targetPrice].join(', ')}`,
      };
    });
  }

  /**
   * @throws InvalidTrailDirectionError if the new stop would widen risk
   */
  async trail(positionId: string, price: number): Promise<CommandResult> {
    return this.command(positionId, async (position) => {
      const stop = await this.coordinator.trail(position, price);
      return { success: true, orderId: stop.orderId, message: `Stop trailed to ${price}` };
    });
  }

  /**
   * Clears the quarantine flag on a position and every order it owns
   */
  async releaseQuarantine(positionId: string): Promise<CommandResult> {
    await this.ready();
    return this.lock.runExclusive(positionId, async () => {
      await this.positions.release(positionId);
      for (const order of await this.repositories.orders.listOrdersByPosition(positionId)) {
        if (order.quarantined) {
          await this.orders.release(order.orderId);
        }
      }
      console.log('[TradingEngine] Quarantine released', { positionId });
      return { success: true, message: 'Quarantine released' };
    });
  }

  async getPosition(positionId: string): Promise<Position> {
    return this.positions.getPosition(positionId);
  }

  async listPositions(): Promise<Position[]> {
    return this.positions.listPositions();
  }

  async positionHistory(positionId: string): Promise<PositionHistory[]> {
    return this.positions.history(positionId);
  }

  async ordersFor(positionId: string): Promise<Order[]> {
    return this.repositories.orders.listOrdersByPosition(positionId);
  }

  async tradesFor(orderId: string): Promise<Trade[]> {
    return this.ledger.tradesFor(orderId);
  }

  /**
   * Unrealized P&L at `price`, or at the last mark when no price is given
   */
  async unrealizedPnl(positionId: string, price?: number): Promise<number> {
    const position = await this.positions.getPosition(positionId);
    const mark = price ?? position.lastPrice;
    return mark === undefined ? 0 : unrealizedPnl(position, mark);
  }

  stats(): IngestionStats {
    return this.ingestor.getStats();
  }

  private async command(
    positionId: string,
    run: (position: Position) => Promise<CommandResult>
  ): Promise<CommandResult> {
    await this.ready();
    return this.lock.runExclusive(positionId, async () => {
      const position = await this.positions.getPosition(positionId);
      if (position.quarantined) {
        throw new QuarantinedError('position', positionId);
      }
      try {
        return await run(position);
      } catch (error) {
        if (error instanceof BrokerRejectionError) {
          return { success: false, orderId: error.orderId, message: error.message };
        }
        throw error;
      }
    });
  }

  // The sandbox book is rebuilt once per engine from what the repositories hold
  private async ready(): Promise<void> {
    const gateway = this.gateway;
    if (!(gateway instanceof SandboxBroker)) {
      return;
    }
    if (!this.restored) {
      this.restored = Promise.all([this.repositories.orders.listWorkingOrders(), this.positions.listPositions()]).then(
        ([orders, positions]) => gateway.restore(orders, positions),
        (error: unknown) => {
          this.restored = undefined;
          throw error;
        }
      );
    }
    await this.restored;
  }

  private createGateway(
    options: TradingEngineOptions,
    registry: InstrumentRegistry,
    errorTable: BrokerErrorTable,
    clock: () => Date
  ): BrokerGateway {
    if (this.config.mode === 'SANDBOX') {
      return new SandboxBroker(this.config.sandbox, { registry, clock, instanceId: options.instanceId });
    }
    if (!options.adapter) {
      throw new ValidationError('LIVE mode requires a broker adapter', 'adapter');
    }
    return new LiveBrokerGateway(options.adapter, { errorTable, retryConfig: this.config.retry, clock });
  }
}
