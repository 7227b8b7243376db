/**
 * Engine error taxonomy
 *
 * Every error thrown by the core carries a category so callers can decide
 * between surfacing it (validation, rejection), retrying it (transient), or
 * quarantining the affected records (sync inconsistency).
 */

import { OrderStatus } from '../types/order';

export type ErrorCategory =
  | 'VALIDATION'
  | 'BROKER_REJECTION'
  | 'SYNC_INCONSISTENCY'
  | 'TRANSIENT_COMM'
  | 'INVALID_STATE'
  | 'NOT_FOUND';

export type InconsistencyReason =
  | 'OVERFILL'
  | 'DUPLICATE_TERMINAL'
  | 'STALE_SEQUENCE'
  | 'UNEXPECTED_FILL'
  | 'RETRIES_EXHAUSTED'
  | 'ARM_FAILED'
  | 'QUARANTINED';

/**
 * Base class for all engine errors
 */
export abstract class EngineError extends Error {
  abstract readonly category: ErrorCategory;
}

/**
 * Error thrown when an order, signal or command fails validation.
 * Raised before any backend call; never retried.
 */
export class ValidationError extends EngineError {
  readonly category = 'VALIDATION' as const;

  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when an incoming signal is missing fields or has mistyped ones
 */
export class MalformedSignalError extends ValidationError {
  constructor(
    message: string,
    public readonly details: { field: string; message: string }[] = []
  ) {
    super(message, details[0]?.field);
    this.name = 'MalformedSignalError';
  }
}

/**
 * Error thrown when a trail request would loosen the stop
 */
export class InvalidTrailDirectionError extends ValidationError {
  constructor(
    public readonly positionId: string,
    public readonly currentStop: number,
    public readonly requestedStop: number
  ) {
    super(
      `Trailing stop for position '${positionId}' can only tighten: ${currentStop} -> ${requestedStop} widens risk`,
      'stopPrice'
    );
    this.name = 'InvalidTrailDirectionError';
  }
}

/**
 * Error thrown when the broker or sandbox refuses an order.
 * The message is the friendly reason, never the raw code.
 */
export class BrokerRejectionError extends EngineError {
  readonly category = 'BROKER_REJECTION' as const;

  constructor(
    message: string,
    public readonly orderId: string,
    public readonly errorCode: string
  ) {
    super(message);
    this.name = 'BrokerRejectionError';
  }
}

/**
 * Error raised when local state and backend state disagree in a way that must
 * not be repaired automatically. The affected order/position is quarantined.
 */
export class SyncInconsistencyError extends EngineError {
  readonly category = 'SYNC_INCONSISTENCY' as const;

  constructor(
    message: string,
    public readonly reason: InconsistencyReason,
    public readonly orderId?: string,
    public readonly positionId?: string
  ) {
    super(message);
    this.name = 'SyncInconsistencyError';
  }
}

/**
 * Error thrown when fills for an order would exceed its quantity
 */
export class OverfillError extends SyncInconsistencyError {
  constructor(
    orderId: string,
    public readonly orderQuantity: number,
    public readonly attemptedQuantity: number
  ) {
    super(
      `Fills for order '${orderId}' would reach ${attemptedQuantity}, above order quantity ${orderQuantity}`,
      'OVERFILL',
      orderId
    );
    this.name = 'OverfillError';
  }
}

/**
 * Error thrown when an automated mutation targets a quarantined record
 */
export class QuarantinedError extends SyncInconsistencyError {
  constructor(kind: 'order' | 'position', id: string) {
    super(
      `The ${kind} '${id}' is quarantined pending manual reconciliation`,
      'QUARANTINED',
      kind === 'order' ? id : undefined,
      kind === 'position' ? id : undefined
    );
    this.name = 'QuarantinedError';
  }
}

/**
 * Error thrown when talking to the live adapter fails in a way that may
 * succeed on retry (network, timeout, throttling)
 */
export class TransientCommError extends EngineError {
  readonly category = 'TRANSIENT_COMM' as const;

  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'TransientCommError';
  }
}

/**
 * Error thrown when an order operation is illegal in its current status
 */
export class InvalidTransitionError extends EngineError {
  readonly category = 'INVALID_STATE' as const;

  constructor(
    public readonly orderId: string,
    public readonly from: OrderStatus,
    public readonly operation: string
  ) {
    super(`Cannot ${operation} order '${orderId}' in status '${from}'`);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Error thrown when an order is not found
 */
export class OrderNotFoundError extends EngineError {
  readonly category = 'NOT_FOUND' as const;

  constructor(orderId: string) {
    super(`Order '${orderId}' not found`);
    this.name = 'OrderNotFoundError';
  }
}

/**
 * Error thrown when a position is not found
 */
export class PositionNotFoundError extends EngineError {
  readonly category = 'NOT_FOUND' as const;

  constructor(positionId: string) {
    super(`Position '${positionId}' not found`);
    this.name = 'PositionNotFoundError';
  }
}
