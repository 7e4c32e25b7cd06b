/**
 * @fileoverview Express middleware for the ledger API: request logging and the final error
 * handler.
 *
 * Body-parser failures (malformed JSON, oversized bodies) carry their own 4xx status and
 * are answered as INVALID_INPUT; anything else goes through the ErrorCode status mapping.
 */

import type { NextFunction, Request, Response } from 'express';
import { ErrorCode, createErrorResult, invalidInputError } from '../utils/error.utils';
import { logInfo } from '../utils/logging';
import { sendErrorResponse } from './routes/route-helpers';

const NAMESPACE = 'HTTP';

function clientErrorStatus(err: Error): number | null {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

export function createErrorMiddleware() {
  return (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    const status = clientErrorStatus(err);
    if (status !== null) {
      const reason = status === 413 ? 'Request body is too large' : `Malformed request body: ${err.message}`;
      res.status(status).json(createErrorResult(invalidInputError(reason, { status })));
      return;
    }
    sendErrorResponse(res, err);
  };
}

/**
 * Request logging middleware
 */
export function createRequestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logInfo(NAMESPACE, `${req.method} ${req.path} - ${res.statusCode} (${duration}ms)`);
    });

    next();
  };
}

/**
 * JSON 404 for API paths no route claims
 */
export function createNotFoundHandler() {
  return (req: Request, res: Response): void => {
    res.status(404).json({
      success: false,
      error: `No API route for ${req.method} ${req.originalUrl}`,
      code: ErrorCode.UNKNOWN
    });
  };
}
