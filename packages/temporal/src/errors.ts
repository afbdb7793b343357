/**
 * Temporal Errors
 *
 * Every error raised by the engine carries a stable code plus the
 * scope, fact and owner it concerns so a failing call can be replayed.
 *
 * @module errors
 */

import type { OwnerRef } from './types/temporal.js';

export type TemporalErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_INTERVAL'
  | 'INVALID_REGION'
  | 'INVALID_RELATION_TYPE'
  | 'VALIDATION_ERROR';

/**
 * Identifiers attached to an error
 */
export interface TemporalErrorContext {
  scopeId?: string | undefined;
  factId?: string | undefined;
  ownerRef?: OwnerRef | undefined;
}

/**
 * Base class for all engine errors
 */
export class TemporalError extends Error {
  public readonly scopeId: string | undefined;
  public readonly factId: string | undefined;
  public readonly ownerRef: OwnerRef | undefined;

  constructor(
    public readonly code: TemporalErrorCode,
    message: string,
    context: TemporalErrorContext = {},
  ) {
    super(message);
    this.name = 'TemporalError';
    this.scopeId = context.scopeId;
    this.factId = context.factId;
    this.ownerRef = context.ownerRef;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      scopeId: this.scopeId,
      factId: this.factId,
      ownerRef: this.ownerRef,
    };
  }
}

/**
 * A scope, fact or owner does not exist
 */
export class NotFoundError extends TemporalError {
  constructor(message: string, context: TemporalErrorContext = {}) {
    super('NOT_FOUND', message, context);
    this.name = 'NotFoundError';
  }
}

/**
 * End before start, or an unusable timestamp
 */
export class InvalidIntervalError extends TemporalError {
  constructor(message: string, context: TemporalErrorContext = {}) {
    super('INVALID_INTERVAL', message, context);
    this.name = 'InvalidIntervalError';
  }
}

/**
 * An instant was given an end
 */
export class InvalidRegionError extends TemporalError {
  constructor(message: string, context: TemporalErrorContext = {}) {
    super('INVALID_REGION', message, context);
    this.name = 'InvalidRegionError';
  }
}

/**
 * Relation type outside the allowed set
 */
export class InvalidRelationTypeError extends TemporalError {
  constructor(
    public readonly relationType: string,
    context: TemporalErrorContext = {},
  ) {
    super('INVALID_RELATION_TYPE', `Invalid relation type: ${relationType}`, context);
    this.name = 'InvalidRelationTypeError';
  }
}

/**
 * Any other rejected input
 */
export class ValidationError extends TemporalError {
  constructor(message: string, context: TemporalErrorContext = {}) {
    super('VALIDATION_ERROR', message, context);
    this.name = 'ValidationError';
  }
}

export function isTemporalError(error: unknown): error is TemporalError {
  return error instanceof TemporalError;
}

/**
 * Format an owner reference for messages
 */
export function formatOwnerRef(ownerRef: OwnerRef): string {
  return `${ownerRef.kind}:${ownerRef.id}`;
}
