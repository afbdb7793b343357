/**
 * Error Mapping
 *
 * Maps error codes to response statuses. Codes without an entry fall
 * back to UNKNOWN.
 */

import { ZodError } from 'zod';

import { isTemporalError, type TemporalErrorCode } from '../errors.js';
import type { ErrorBody, ToolResponse } from './types.js';

const STATUS_BY_CODE: Record<TemporalErrorCode | 'INVALID_INPUT' | 'UNKNOWN', number> = {
  NOT_FOUND: 404,
  INVALID_INTERVAL: 400,
  INVALID_REGION: 400,
  INVALID_RELATION_TYPE: 400,
  VALIDATION_ERROR: 400,
  INVALID_INPUT: 400,
  UNKNOWN: 500,
};

export type MappedErrorCode = keyof typeof STATUS_BY_CODE;

export function extractCode(error: unknown): MappedErrorCode {
  if (isTemporalError(error)) return error.code;
  if (error instanceof ZodError) return 'INVALID_INPUT';
  return 'UNKNOWN';
}

/** Extract a human-readable message from any error type. */
export function extractMessage(error: unknown): string {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    if (!issue) return 'Invalid input';
    return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
  }
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error === null) return 'null error';
  if (error === undefined) return 'undefined error';
  return String(error);
}

export function statusFor(error: unknown): number {
  return STATUS_BY_CODE[extractCode(error)];
}

/**
 * Build the failure response for an error
 */
export function toErrorResponse(error: unknown): ToolResponse {
  const body: ErrorBody = { error: extractMessage(error) };
  return { status: statusFor(error), body };
}
