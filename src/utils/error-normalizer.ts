import type { DelegationError, DelegationErrorCode } from '../types.js';
import createError from 'http-errors';
import { StatusCodes, ReasonPhrases } from 'http-status-codes';

/**
 * HTTP status for each broker error code
 */
const STATUS_BY_CODE: Record<DelegationErrorCode, number> = {
  not_found: StatusCodes.NOT_FOUND,
  already_exists: StatusCodes.CONFLICT,
  service_unsupported: StatusCodes.BAD_REQUEST,
  invalid_status: StatusCodes.UNPROCESSABLE_ENTITY,
  invalid_request: StatusCodes.UNPROCESSABLE_ENTITY,
  internal_error: StatusCodes.INTERNAL_SERVER_ERROR,
};

const ERROR_CODES = new Set<string>(Object.keys(STATUS_BY_CODE));

export type ErrorContext = {
  service?: string;
  stage?: string;
};

/**
 * Build a DelegationError through http-errors so status and message stay consistent
 */
export function createDelegationError(
  code: DelegationErrorCode,
  description?: string,
  context: ErrorContext = {}
): DelegationError {
  const httpError = createError(STATUS_BY_CODE[code], description ?? code);

  const result: DelegationError = {
    statusCode: httpError.statusCode,
    error: code,
  };

  if (description !== undefined) {
    result.error_description = httpError.message;
  }
  if (context.service !== undefined) {
    result.service = context.service;
  }
  if (context.stage !== undefined) {
    result.stage = context.stage;
  }

  return result;
}

/**
 * Type guard for errors that already carry a broker error code
 */
export function isDelegationError(e: unknown): e is DelegationError {
  if (e === null || typeof e !== 'object') return false;
  if (!('error' in e) || !('statusCode' in e)) return false;
  return (
    typeof e.error === 'string' &&
    ERROR_CODES.has(e.error) &&
    typeof e.statusCode === 'number'
  );
}

/**
 * Collapses arbitrary thrown values into the broker taxonomy.
 * Known DelegationErrors pass through; everything else becomes a generic
 * internal_error so driver and provider detail never reach the caller.
 */
export class ErrorNormalizer {
  static normalizeError(e: unknown, context: ErrorContext = {}): DelegationError {
    if (isDelegationError(e)) {
      const merged: DelegationError = { ...e };
      if (merged.service === undefined && context.service !== undefined) {
        merged.service = context.service;
      }
      if (merged.stage === undefined && context.stage !== undefined) {
        merged.stage = context.stage;
      }
      return merged;
    }

    return createDelegationError(
      'internal_error',
      ReasonPhrases.INTERNAL_SERVER_ERROR,
      context
    );
  }

  /**
   * Extract a loggable message from an unknown thrown value
   */
  static describe(e: unknown): string {
    if (e instanceof Error) return e.message;
    if (isDelegationError(e)) return e.error_description ?? e.error;
    return String(e);
  }
}
