/**
 * @fileoverview Shared helper utilities and dependency contracts for ledger API route modules.
 *
 * Centralizes the error-to-status mapping and request validation so route modules only
 * call services and shape payloads.
 */

import type { Response } from 'express';
import type { LedgerServices } from '../../services/createLedgerServices';
import { AppError, ErrorCode, createErrorResult, toAppError } from '../../utils/error.utils';
import { logError } from '../../utils/logging';

/**
 * Services every route module receives
 */
export type RouteDependencies = LedgerServices;

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.SCHEMA_INVALID]: 400,
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.CONFIG_INVALID]: 400,
  [ErrorCode.UNKNOWN_SPOOL]: 404,
  [ErrorCode.IMPORT_IN_PROGRESS]: 409,
  [ErrorCode.NETWORK]: 502,
  [ErrorCode.TIMEOUT]: 504
};

export function statusForError(error: AppError): number {
  return STATUS_BY_CODE[error.code] ?? 500;
}

/**
 * Send the standard error payload with the status that matches the error code
 */
export function sendErrorResponse(res: Response, error: unknown): Response {
  const appError = toAppError(error);
  const status = statusForError(appError);
  if (status >= 500) {
    logError('HTTP', appError.message, appError.originalError ?? appError);
  }
  return res.status(status).json(createErrorResult(appError));
}
