import { APIGatewayProxyResult } from 'aws-lambda';
import { EngineProvider } from '../services/engine-provider';
import { ApiEvent, handleError, parseBody, successResponse } from './responses';

/**
 * Signal Intake API Handlers
 */

/**
 * POST /signals
 * Ingest a trade signal. A repeated signal id returns the ids from the
 * first submission with 200 instead of 201.
 */
export async function ingestSignal(event: ApiEvent): Promise<APIGatewayProxyResult> {
  try {
    const result = await EngineProvider.getEngine().ingestSignal(parseBody(event));
    return successResponse(result, result.duplicate ? 200 : 201);
  } catch (error) {
    return handleError(error, 'ingesting signal');
  }
}

/**
 * GET /signals/stats
 * Ingestion counters since the engine started
 */
export async function getIngestionStats(): Promise<APIGatewayProxyResult> {
  try {
    return successResponse(EngineProvider.getEngine().stats());
  } catch (error) {
    return handleError(error, 'getting ingestion stats');
  }
}
