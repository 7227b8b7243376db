/**
 * Instrument Registry
 *
 * Known tradable symbols with their lot size and per-order freeze quantity.
 * Orders for unknown symbols fail validation; instruments marked
 * non-tradable are still known but the sandbox rejects them as the venue would.
 */

export interface Instrument {
  symbol: string;
  exchange: string;
  lotSize: number;
  tickSize: number;
  freezeQuantity: number; // Largest quantity accepted in a single order
  tradable: boolean;
}

export const DEFAULT_INSTRUMENTS: Instrument[] = [
  { symbol: 'RELIANCE', exchange: 'NSE', lotSize: 1, tickSize: 0.05, freezeQuantity: 10000, tradable: true },
  { symbol: 'INFY', exchange: 'NSE', lotSize: 1, tickSize: 0.05, freezeQuantity: 10000, tradable: true },
  { symbol: 'TCS', exchange: 'NSE', lotSize: 1, tickSize: 0.05, freezeQuantity: 10000, tradable: true },
  { symbol: 'SBIN', exchange: 'NSE', lotSize: 1, tickSize: 0.05, freezeQuantity: 20000, tradable: true },
  { symbol: 'HDFCBANK', exchange: 'NSE', lotSize: 1, tickSize: 0.05, freezeQuantity: 10000, tradable: true },
  { symbol: 'NIFTYFUT', exchange: 'NFO', lotSize: 25, tickSize: 0.05, freezeQuantity: 1800, tradable: true },
  { symbol: 'BANKNIFTYFUT', exchange: 'NFO', lotSize: 15, tickSize: 0.05, freezeQuantity: 900, tradable: true },
  { symbol: 'CRUDEOILFUT', exchange: 'MCX', lotSize: 100, tickSize: 1, freezeQuantity: 10000, tradable: true },
  { symbol: 'SUSPENDEDCO', exchange: 'NSE', lotSize: 1, tickSize: 0.05, freezeQuantity: 10000, tradable: false },
];

export class InstrumentRegistry {
  private readonly bySymbol = new Map<string, Instrument>();

  constructor(instruments: Instrument[] = DEFAULT_INSTRUMENTS) {
    for (const instrument of instruments) {
      this.bySymbol.set(instrument.symbol.toUpperCase(), instrument);
    }
  }

  get(symbol: string): Instrument | undefined {
    return this.bySymbol.get(symbol.toUpperCase());
  }

  isKnown(symbol: string): boolean {
    return this.bySymbol.has(symbol.toUpperCase());
  }

  list(): Instrument[] {
    return [...this.bySymbol.values()];
  }
}
