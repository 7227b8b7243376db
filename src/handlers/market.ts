import { APIGatewayProxyResult } from 'aws-lambda';
import { PriceTick } from '../types/engine';
import { EngineProvider } from '../services/engine-provider';
import { ApiEvent, errorResponse, handleError, parseBody, successResponse } from './responses';

/**
 * Market Data Handlers
 *
 * Price ticks drive the sync loop (and, in sandbox mode, the fill
 * simulator). A scheduled poll picks up broker-side changes between ticks.
 */

function readTick(body: unknown, now: Date): PriceTick | null {
  if (typeof body !== 'object' || body === null || !('symbol' in body) || !('price' in body)) {
    return null;
  }
  const { symbol, price } = body;
  if (typeof symbol !== 'string' || symbol.length === 0) {
    return null;
  }
  if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
    return null;
  }
  const timestamp = 'timestamp' in body && typeof body.timestamp === 'string' ? body.timestamp : now.toISOString();
  return { symbol, price, timestamp };
}

/**
 * POST /ticks
 * Body: { symbol, price, timestamp? }
 */
export async function postTick(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const tick = readTick(parseBody(event), new Date());
    if (!tick) {
      return errorResponse(400, 'A tick needs a symbol and a positive price', 'VALIDATION_ERROR');
    }
    await EngineProvider.getEngine().onTick(tick);
    return successResponse({ accepted: true, symbol: tick.symbol.toUpperCase(), price: tick.price });
  } catch (error) {
    return handleError(error, 'processing tick');
  }
}

/**
 * Scheduled broker poll
 */
export async function pollBroker(): Promise<void> {
  await EngineProvider.getEngine().poll();
}
