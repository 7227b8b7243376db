/**
 * Broker Error Table
 *
 * Maps backend error codes to a disposition and the friendly reason shown to
 * users. One table is injected per backend so a different broker only needs
 * a different table, not different core logic.
 */

import { BackendKind } from '../types/order';
import { SandboxErrorCode } from '../types/sandbox';

export type ErrorDisposition = 'REJECTION' | 'TRANSIENT';

export interface ErrorTableEntry {
  disposition: ErrorDisposition;
  reason: string;
}

/**
 * Codes produced by the fill simulator
 */
export const SANDBOX_ERROR_CODES: Record<SandboxErrorCode, ErrorTableEntry> = {
  INSUFFICIENT_MARGIN: {
    disposition: 'REJECTION',
    reason: 'Insufficient funds: the order value exceeds the available margin',
  },
  INVALID_SYMBOL: {
    disposition: 'REJECTION',
    reason: 'This instrument is not available for trading',
  },
  MARKET_CLOSED: {
    disposition: 'REJECTION',
    reason: 'The market is closed; orders are accepted during trading hours only',
  },
  QUANTITY_LIMIT_EXCEEDED: {
    disposition: 'REJECTION',
    reason: 'Order quantity exceeds the per-order freeze limit for this instrument',
  },
};

/**
 * Exception classes returned by the live broker API
 */
export const LIVE_ERROR_CODES: Record<string, ErrorTableEntry> = {
  MarginException: {
    disposition: 'REJECTION',
    reason: 'Insufficient funds: the order value exceeds the available margin',
  },
  InputException: {
    disposition: 'REJECTION',
    reason: 'The broker rejected the order parameters',
  },
  OrderException: {
    disposition: 'REJECTION',
    reason: 'The broker could not place or find this order',
  },
  TokenException: {
    disposition: 'REJECTION',
    reason: 'The broker session has expired; log in again to trade',
  },
  PermissionException: {
    disposition: 'REJECTION',
    reason: 'The account is not permitted to place this order',
  },
  RMS_QTY_FREEZE: {
    disposition: 'REJECTION',
    reason: 'Order quantity exceeds the per-order freeze limit for this instrument',
  },
  RMS_MKT_CLOSED: {
    disposition: 'REJECTION',
    reason: 'The market is closed; orders are accepted during trading hours only',
  },
  NetworkException: {
    disposition: 'TRANSIENT',
    reason: 'The broker could not be reached',
  },
  DataException: {
    disposition: 'TRANSIENT',
    reason: 'The broker returned an unreadable response',
  },
};

const FALLBACK_REASON = 'The order was rejected by the broker';

export class BrokerErrorTable {
  constructor(
    private readonly entries: Record<string, ErrorTableEntry>,
    private readonly fallbackReason: string = FALLBACK_REASON
  ) {}

  /**
   * Friendly reason for a code. Unknown and missing codes get the fallback.
   */
  describe(code?: string): string {
    if (!code) {
      return this.fallbackReason;
    }
    return this.entries[code]?.reason ?? this.fallbackReason;
  }

  isTransient(code?: string): boolean {
    return code !== undefined && this.entries[code]?.disposition === 'TRANSIENT';
  }

  has(code: string): boolean {
    return code in this.entries;
  }

  withOverrides(overrides: Record<string, ErrorTableEntry>): BrokerErrorTable {
    return new BrokerErrorTable({ ...this.entries, ...overrides }, this.fallbackReason);
  }
}

/**
 * Default table for a backend kind
 */
export function createErrorTable(
  kind: BackendKind,
  overrides: Record<string, ErrorTableEntry> = {}
): BrokerErrorTable {
  const base = kind === 'SANDBOX' ? SANDBOX_ERROR_CODES : LIVE_ERROR_CODES;
  return new BrokerErrorTable({ ...base, ...overrides });
}
