import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { EngineError, ErrorCategory, MalformedSignalError, ValidationError } from '../services/errors';

// The parts of an API Gateway event the handlers read
export type ApiEvent = Pick<APIGatewayProxyEvent, 'body' | 'pathParameters'>;

export const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,POST,OPTIONS',
};

interface ErrorResponseBody {
  error: string;
  code: string;
  details?: { field: string; message: string }[];
}

export function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data),
  };
}

export function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  details?: { field: string; message: string }[]
): APIGatewayProxyResult {
  const body: ErrorResponseBody = { error: message, code };
  if (details) body.details = details;
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body),
  };
}

export class InvalidJsonError extends Error {
  constructor() {
    super('Request body is not valid JSON');
    this.name = 'InvalidJsonError';
  }
}

export function parseBody(event: ApiEvent): unknown {
  if (!event.body) {
    return {};
  }
  try {
    return JSON.parse(event.body);
  } catch {
    throw new InvalidJsonError();
  }
}

const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  VALIDATION: 400,
  BROKER_REJECTION: 422,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  SYNC_INCONSISTENCY: 409,
  TRANSIENT_COMM: 503,
};

/**
 * Maps an engine error to its HTTP response; anything else is a 500
 */
export function handleError(error: unknown, context: string): APIGatewayProxyResult {
  if (error instanceof InvalidJsonError) {
    return errorResponse(400, error.message, 'INVALID_JSON');
  }
  if (error instanceof MalformedSignalError) {
    return errorResponse(400, error.message, 'MALFORMED_SIGNAL', error.details);
  }
  if (error instanceof ValidationError) {
    return errorResponse(
      400,
      error.message,
      'VALIDATION_ERROR',
      error.field ? [{ field: error.field, message: error.message }] : undefined
    );
  }
  if (error instanceof EngineError) {
    const statusCode = STATUS_BY_CATEGORY[error.category];
    if (statusCode >= 500) {
      console.error(`Error ${context}:`, error);
    }
    return errorResponse(statusCode, error.message, error.category);
  }
  console.error(`Error ${context}:`, error);
  return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
}
