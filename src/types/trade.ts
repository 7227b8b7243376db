/**
 * Trade (execution) Type Definitions
 */

// A single execution against an order
export interface Trade {
  tradeId: string;
  orderId: string;
  fillQuantity: number;
  fillPrice: number;
  filledAt: string;
  ledgerSequence: number; // Global insertion index, assigned by the ledger
}

// Fill as reported by a backend, before the ledger assigns a sequence
export type TradeFill = Omit<Trade, 'ledgerSequence'>;
