/**
 * JSON Schema for sandbox (paper trading) configuration.
 *
 * `margin_policy` accepts `"infinite"`, `"fixed(<amount>)"` or `{ "fixed": <amount> }`.
 * Market hours are local "HH:MM" times with an offset from UTC in minutes.
 */

export interface SandboxConfigWire {
  fill_mode: 'immediate' | 'stochastic';
  partial_fill_probability: number;
  partial_fill_ratio?: number;
  margin_policy: string | { fixed: number };
  seed: number;
  market_hours?: {
    open: string;
    close: string;
    utc_offset_minutes?: number;
  };
}

const clockTime = { type: 'string', pattern: '^([01]\\d|2[0-3]):[0-5]\\d$' } as const;

export const SandboxConfigSchema = {
  type: 'object',
  required: ['fill_mode', 'partial_fill_probability', 'margin_policy', 'seed'],
  properties: {
    fill_mode: { type: 'string', enum: ['immediate', 'stochastic'] },
    partial_fill_probability: { type: 'number', minimum: 0, maximum: 1 },
    partial_fill_ratio: { type: 'number', exclusiveMinimum: 0, exclusiveMaximum: 1 },
    margin_policy: {
      oneOf: [
        { type: 'string', const: 'infinite' },
        { type: 'string', pattern: '^fixed\\(\\s*\\d+(\\.\\d+)?\\s*\\)$' },
        {
          type: 'object',
          required: ['fixed'],
          properties: { fixed: { type: 'number', minimum: 0 } },
          additionalProperties: false
        }
      ]
    },
    seed: { type: 'integer' },
    market_hours: {
      type: 'object',
      required: ['open', 'close'],
      properties: {
        open: clockTime,
        close: clockTime,
        utc_offset_minutes: { type: 'integer', minimum: -720, maximum: 840 }
      },
      additionalProperties: false
    }
  },
  additionalProperties: false
} as const;
