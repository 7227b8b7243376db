/**
 * Trade Ledger
 *
 * Append-only record of executions keyed by order. Appends for one order are
 * serialized; appends for different orders run independently. Every trade
 * gets a global ledger sequence, which is the tie-break for fills that race.
 */

import { Order } from '../types/order';
import { Trade, TradeFill } from '../types/trade';
import { TradeRepository } from '../repositories/trade';
import { OverfillError } from './errors';
import { KeyedLock } from './position-lock';

export interface RecordResult {
  trade: Trade;
  recorded: boolean; // false when the trade id was already in the ledger
}

export class TradeLedger {
  private readonly orderLocks = new KeyedLock();
  private sequence = 0;
  private sequenceLoaded?: Promise<void>;

  constructor(private readonly repository: TradeRepository) {}

  /**
   * Appends a fill for `order`. Recording a trade id twice is a no-op.
   *
   * @throws OverfillError when cumulative fills would exceed the order quantity
   */
  async record(fill: TradeFill, order: Order): Promise<RecordResult> {
    return this.orderLocks.runExclusive(order.orderId, async () => {
      const existing = await this.repository.getTrade(fill.tradeId);
      if (existing) {
        return { trade: existing, recorded: false };
      }

      const trades = await this.repository.listTradesByOrder(order.orderId);
      const cumulative = trades.reduce((sum, trade) => sum + trade.fillQuantity, 0) + fill.fillQuantity;
      if (cumulative > order.quantity) {
        throw new OverfillError(order.orderId, order.quantity, cumulative);
      }

      const trade: Trade = { ...fill, orderId: order.orderId, ledgerSequence: await this.nextSequence() };
      const appended = await this.repository.appendTrade(trade);
      if (!appended) {
        const winner = await this.repository.getTrade(fill.tradeId);
        return { trade: winner ?? trade, recorded: false };
      }
      return { trade, recorded: true };
    });
  }

  async has(tradeId: string): Promise<boolean> {
    return (await this.repository.getTrade(tradeId)) !== null;
  }

  async tradesFor(orderId: string): Promise<Trade[]> {
    return this.repository.listTradesByOrder(orderId);
  }

  async filledQuantity(orderId: string): Promise<number> {
    const trades = await this.repository.listTradesByOrder(orderId);
    return trades.reduce((sum, trade) => sum + trade.fillQuantity, 0);
  }

  private async nextSequence(): Promise<number> {
    if (!this.sequenceLoaded) {
      this.sequenceLoaded = this.repository.latestSequence().then((latest) => {
        this.sequence = Math.max(this.sequence, latest);
      });
    }
    await this.sequenceLoaded;
    this.sequence += 1;
    return this.sequence;
  }
}
