import { APIGatewayProxyResult } from 'aws-lambda';
import { CommandResult } from '../types/engine';
import { EngineProvider } from '../services/engine-provider';
import { TradingEngine } from '../services/trading-engine';
import { ApiEvent, errorResponse, handleError, parseBody, successResponse } from './responses';

/**
 * Position API Handlers
 *
 * Queries over live positions and the manual command surface.
 */

function readPrice(body: unknown): number | null {
  if (typeof body !== 'object' || body === null || !('price' in body)) {
    return null;
  }
  const price = body.price;
  return typeof price === 'number' && Number.isFinite(price) && price > 0 ? price : null;
}

function readLevels(body: unknown): number[] | null {
  if (typeof body !== 'object' || body === null || !('targets' in body) || !Array.isArray(body.targets)) {
    return null;
  }
  const levels: number[] = [];
  for (const level of body.targets) {
    if (typeof level !== 'number' || !Number.isFinite(level) || level <= 0) {
      return null;
    }
    levels.push(level);
  }
  return levels.length > 0 ? levels : null;
}

function commandResponse(result: CommandResult): APIGatewayProxyResult {
  return successResponse(result, result.success ? 200 : 409);
}

/**
 * GET /positions
 */
export async function listPositions(): Promise<APIGatewayProxyResult> {
  try {
    const positions = await EngineProvider.getEngine().listPositions();
    return successResponse({ positions });
  } catch (error) {
    return handleError(error, 'listing positions');
  }
}

/**
 * GET /positions/{positionId}
 * The position with its orders
 */
export async function getPosition(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const positionId = event.pathParameters?.positionId;
    if (!positionId) {
      return errorResponse(400, 'Missing position ID', 'MISSING_PARAMETER');
    }

    const engine = EngineProvider.getEngine();
    const position = await engine.getPosition(positionId);
    const orders = await engine.ordersFor(positionId);
    return successResponse({ position, orders });
  } catch (error) {
    return handleError(error, 'getting position');
  }
}

/**
 * GET /positions/{positionId}/history
 */
export async function getPositionHistory(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const positionId = event.pathParameters?.positionId;
    if (!positionId) {
      return errorResponse(400, 'Missing position ID', 'MISSING_PARAMETER');
    }

    const engine = EngineProvider.getEngine();
    await engine.getPosition(positionId);
    const history = await engine.positionHistory(positionId);
    return successResponse({ history });
  } catch (error) {
    return handleError(error, 'getting position history');
  }
}

/**
 * POST /positions/{positionId}/exit
 */
export async function exitPosition(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const positionId = event.pathParameters?.positionId;
    if (!positionId) {
      return errorResponse(400, 'Missing position ID', 'MISSING_PARAMETER');
    }
    return commandResponse(await EngineProvider.getEngine().exit(positionId));
  } catch (error) {
    return handleError(error, 'exiting position');
  }
}

type PriceCommand = (engine: TradingEngine, positionId: string, price: number) => Promise<CommandResult>;

function priceCommandHandler(run: PriceCommand, context: string) {
  return async (event: ApiEvent): Promise<APIGatewayProxyResult> => {
    try {
      const positionId = event.pathParameters?.positionId;
      if (!positionId) {
        return errorResponse(400, 'Missing position ID', 'MISSING_PARAMETER');
      }
      const price = readPrice(parseBody(event));
      if (price === null) {
        return errorResponse(400, 'price must be a positive number', 'VALIDATION_ERROR', [
          { field: 'price', message: 'must be a positive number' },
        ]);
      }
      return commandResponse(await run(EngineProvider.getEngine(), positionId, price));
    } catch (error) {
      return handleError(error, context);
    }
  };
}

/**
 * POST /positions/{positionId}/stop
 * Body: { price }
 */
export const modifyStop = priceCommandHandler(
  (engine, positionId, price) => engine.modifyStop(positionId, price),
  'modifying stop'
);

/**
 * POST /positions/{positionId}/target
 * Body: { price }
 */
export const modifyTarget = priceCommandHandler(
  (engine, positionId, price) => engine.modifyTarget(positionId, price),
  'modifying target'
);

/**
 * POST /positions/{positionId}/targets
 * Body: { targets: number[] }. The furthest level is the final target.
 */
export async function modifyTargets(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const positionId = event.pathParameters?.positionId;
    if (!positionId) {
      return errorResponse(400, 'Missing position ID', 'MISSING_PARAMETER');
    }
    const levels = readLevels(parseBody(event));
    if (levels === null) {
      return errorResponse(400, 'targets must be a non-empty list of positive numbers', 'VALIDATION_ERROR', [
        { field: 'targets', message: 'must be a non-empty list of positive numbers' },
      ]);
    }
    return commandResponse(await EngineProvider.getEngine().modifyTargets(positionId, levels));
  } catch (error) {
    return handleError(error, 'modifying targets');
  }
}

/**
 * POST /positions/{positionId}/trail
 * Body: { price }. Only moves that tighten the stop are accepted.
 */
export const trailStop = priceCommandHandler(
  (engine, positionId, price) => engine.trail(positionId, price),
  'trailing stop'
);

/**
 * POST /positions/{positionId}/release
 * Clears a quarantine after manual reconciliation
 */
export async function releaseQuarantine(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const positionId = event.pathParameters?.positionId;
    if (!positionId) {
      return errorResponse(400, 'Missing position ID', 'MISSING_PARAMETER');
    }
    return commandResponse(await EngineProvider.getEngine().releaseQuarantine(positionId));
  } catch (error) {
    return handleError(error, 'releasing quarantine');
  }
}
