/**
 * Fill Simulator
 *
 * Decides, for one working order and one market price sample, what a real
 * venue would do: reject it, leave a stop waiting for its trigger, trigger it,
 * fill it fully or partially, or let it rest. Randomness comes from a seeded
 * generator so the same order, price sequence and seed always produce the
 * same fills.
 *
 * Margin accounting lives here too: one simulator instance stands for one
 * paper-trading account.
 */

import { xoroshiro128plus, unsafeUniformIntDistribution, RandomGenerator } from 'pure-rand';
import { OrderSide, OrderType } from '../types/order';
import {
  FillDecision,
  MarginPolicy,
  MarginSnapshot,
  MarketHours,
  SandboxConfig,
  SandboxErrorCode,
} from '../types/sandbox';
import { Instrument } from './instrument-registry';

/**
 * Default sandbox configuration
 */
export const DEFAULT_SANDBOX_CONFIG: SandboxConfig = {
  fillMode: 'immediate',
  partialFillProbability: 0,
  partialFillRatio: 0.5,
  marginPolicy: { type: 'infinite' },
  seed: 42,
};

const RANDOM_RESOLUTION = 1_000_000;

// The order fields the simulator reads
export interface SimulatedOrder {
  orderType: OrderType;
  side: OrderSide;
  quantity: number;
  filledQuantity: number;
  price?: number;
  triggerPrice?: number;
  triggered: boolean;
}

export interface AcceptanceRequest {
  symbol: string;
  quantity: number;
  instrument?: Instrument;
  now: Date;
}

/**
 * Whether a stop order's trigger has been crossed by `price`
 */
export function isTriggerCrossed(side: OrderSide, triggerPrice: number, price: number): boolean {
  return side === 'BUY' ? price >= triggerPrice : price <= triggerPrice;
}

/**
 * Whether a limit order is marketable at `price`
 */
export function isMarketable(side: OrderSide, limitPrice: number, price: number): boolean {
  return side === 'BUY' ? price <= limitPrice : price >= limitPrice;
}

/**
 * Whether `now` falls inside the trading session
 */
export function isWithinMarketHours(hours: MarketHours, now: Date): boolean {
  const utcMinute = now.getUTCHours() * 60 + now.getUTCMinutes();
  const localMinute = (((utcMinute + hours.utcOffsetMinutes) % 1440) + 1440) % 1440;
  return localMinute >= hours.openMinute && localMinute < hours.closeMinute;
}

/**
 * Margin book for one account.
 *
 * Entry orders reserve margin when accepted. Fills move the filled share of
 * the reservation into a block held by the position; exit fills release the
 * block pro rata. Cancelled or rejected orders release what they reserved.
 */
export class MarginAccount {
  private readonly reservations = new Map<string, { amount: number; quantity: number }>();
  private readonly blocks = new Map<string, { amount: number; quantity: number }>();

  constructor(private readonly policy: MarginPolicy) {}

  available(): number | null {
    if (this.policy.type === 'infinite') {
      return null;
    }
    return this.policy.amount - this.totalReserved() - this.totalBlocked();
  }

  canAfford(notional: number): boolean {
    const available = this.available();
    return available === null || notional <= available;
  }

  isReserved(orderId: string): boolean {
    return this.reservations.has(orderId);
  }

  reserve(orderId: string, notional: number, quantity: number): void {
    this.reservations.set(orderId, { amount: notional, quantity });
  }

  /**
   * Moves the filled share of an entry reservation into the position's block
   */
  convert(orderId: string, positionId: string, fillQuantity: number, fillPrice: number): void {
    const reservation = this.reservations.get(orderId);
    if (reservation) {
      const released = (reservation.amount / reservation.quantity) * Math.min(fillQuantity, reservation.quantity);
      reservation.amount -= released;
      reservation.quantity -= fillQuantity;
      if (reservation.quantity <= 0) {
        this.reservations.delete(orderId);
      }
    }

    const block = this.blocks.get(positionId) ?? { amount: 0, quantity: 0 };
    block.amount += fillQuantity * fillPrice;
    block.quantity += fillQuantity;
    this.blocks.set(positionId, block);
  }

  /**
   * Releases the block for quantity that left the position
   */
  releaseForExit(positionId: string, exitQuantity: number): void {
    const block = this.blocks.get(positionId);
    if (!block) {
      return;
    }
    if (exitQuantity >= block.quantity) {
      this.blocks.delete(positionId);
      return;
    }
    block.amount -= (block.amount / block.quantity) * exitQuantity;
    block.quantity -= exitQuantity;
  }

  /**
   * Re-creates the block of a position opened before a restart
   */
  restoreBlock(positionId: string, quantity: number, avgPrice: number): void {
    if (!this.blocks.has(positionId)) {
      this.blocks.set(positionId, { amount: quantity * avgPrice, quantity });
    }
  }

  releaseReservation(orderId: string): void {
    this.reservations.delete(orderId);
  }

  snapshot(): MarginSnapshot {
    return {
      policy: this.policy.type,
      configured: this.policy.type === 'fixed' ? this.policy.amount : null,
      reserved: this.totalReserved(),
      blocked: this.totalBlocked(),
      available: this.available(),
    };
  }

  private totalReserved(): number {
    let total = 0;
    for (const reservation of this.reservations.values()) {
      total += reservation.amount;
    }
    return total;
  }

  private totalBlocked(): number {
    let total = 0;
    for (const block of this.blocks.values()) {
      total += block.amount;
    }
    return total;
  }
}

export class FillSimulator {
  private rng: RandomGenerator;
  readonly margin: MarginAccount;

  constructor(private readonly config: SandboxConfig = DEFAULT_SANDBOX_CONFIG) {
    this.rng = xoroshiro128plus(config.seed);
    this.margin = new MarginAccount(config.marginPolicy);
  }

  /**
   * Venue-side acceptance checks for a new order. Margin is checked
   * separately because it needs a reference price.
   */
  checkAcceptance(request: AcceptanceRequest): SandboxErrorCode | undefined {
    if (!request.instrument || !request.instrument.tradable) {
      return 'INVALID_SYMBOL';
    }
    if (this.config.marketHours && !isWithinMarketHours(this.config.marketHours, request.now)) {
      return 'MARKET_CLOSED';
    }
    if (request.quantity > request.instrument.freezeQuantity) {
      return 'QUANTITY_LIMIT_EXCEEDED';
    }
    return undefined;
  }

  /**
   * Evaluates a working order against one price sample.
   *
   * Returns the decisions in the order they happen: a stop that is crossed
   * yields TRIGGERED followed by the fill decision for its converted order.
   */
  evaluate(order: SimulatedOrder, price: number, lotSize = 1): FillDecision[] {
    const remaining = order.quantity - order.filledQuantity;
    if (remaining <= 0) {
      return [];
    }

    const decisions: FillDecision[] = [];
    const isStop = order.orderType === 'SL-MARKET' || order.orderType === 'SL-LIMIT';

    if (isStop && !order.triggered) {
      if (order.triggerPrice === undefined || !isTriggerCrossed(order.side, order.triggerPrice, price)) {
        return [{ kind: 'TRIGGER_PENDING' }];
      }
      decisions.push({ kind: 'TRIGGERED' });
    }

    // A triggered SL-LIMIT behaves as a limit, a triggered SL-MARKET as a market order
    const limitPrice = order.orderType === 'LIMIT' || order.orderType === 'SL-LIMIT' ? order.price : undefined;
    if (limitPrice !== undefined && !isMarketable(order.side, limitPrice, price)) {
      decisions.push({ kind: 'REST' });
      return decisions;
    }

    decisions.push({ kind: 'FILL', quantity: this.fillQuantity(remaining, lotSize), price });
    return decisions;
  }

  /**
   * Draws a uniform number in [0, 1)
   */
  nextRandom(): number {
    return unsafeUniformIntDistribution(0, RANDOM_RESOLUTION - 1, this.rng) / RANDOM_RESOLUTION;
  }

  private fillQuantity(remaining: number, lotSize: number): number {
    if (this.config.fillMode !== 'stochastic' || remaining <= lotSize) {
      return remaining;
    }
    if (this.nextRandom() >= this.config.partialFillProbability) {
      return remaining;
    }
    const lots = Math.floor((remaining * this.config.partialFillRatio) / lotSize);
    return Math.min(remaining, Math.max(1, lots) * lotSize);
  }
}
