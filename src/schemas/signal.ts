/**
 * JSON Schema for incoming trading signals.
 * Signals arrive in snake_case and are discriminated by `signal_type`.
 */

interface SignalWireFields {
  id: string;
  symbol: string;
  side: 'BUY' | 'SELL';
  quantity: number;
  target_price: number;
  stop_price?: number;
  targets?: number[];
  issued_at: string;
  exchange?: string;
  product?: 'MIS' | 'NRML' | 'CNC';
}

export type SignalWire =
  | (SignalWireFields & { signal_type: 'MARKET'; entry_price?: number })
  | (SignalWireFields & { signal_type: 'LIMIT'; entry_price: number })
  | (SignalWireFields & { signal_type: 'BREAKOUT'; entry_price: number });

const positivePrice = { type: 'number', exclusiveMinimum: 0 } as const;

export const SignalSchema = {
  type: 'object',
  discriminator: { propertyName: 'signal_type' },
  required: ['id', 'symbol', 'side', 'quantity', 'signal_type', 'target_price', 'issued_at'],
  oneOf: [
    {
      type: 'object',
      properties: { signal_type: { const: 'MARKET' } }
    },
    {
      type: 'object',
      properties: { signal_type: { const: 'LIMIT' } },
      required: ['entry_price']
    },
    {
      type: 'object',
      properties: { signal_type: { const: 'BREAKOUT' } },
      required: ['entry_price']
    }
  ],
  properties: {
    id: { type: 'string', minLength: 1, maxLength: 128 },
    symbol: { type: 'string', minLength: 1, maxLength: 64 },
    side: { type: 'string', enum: ['BUY', 'SELL'] },
    quantity: { type: 'integer', minimum: 1 },
    signal_type: { type: 'string', enum: ['MARKET', 'LIMIT', 'BREAKOUT'] },
    target_price: positivePrice,
    stop_price: positivePrice,
    targets: { type: 'array', items: positivePrice, minItems: 1, maxItems: 5 },
    entry_price: positivePrice,
    issued_at: { type: 'string', minLength: 1 },
    exchange: { type: 'string', minLength: 1 },
    product: { type: 'string', enum: ['MIS', 'NRML', 'CNC'] }
  },
  additionalProperties: false
} as const;
