/**
 * @fileoverview Map typed application errors to HTTP responses.
 */

import type { Response } from 'express';
import { AppError, AlreadyDecidedError, errorMessage } from '../utils/errors.js';
import type { AppLogger } from '../utils/observability/index.js';

const STATUS_BY_CODE: Record<string, number> = {
  APPROVAL_NOT_FOUND: 404,
  ALREADY_DECIDED: 409,
  UNAUTHORIZED_APPROVER: 403,
  CREDENTIAL_UNAVAILABLE: 503,
  REFRESH_TOKEN_EXPIRED: 503,
  REFRESH_TRANSIENT_ERROR: 503,
  REFRESH_REJECTED: 502,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof AppError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  return 500;
}

/**
 * Send a JSON error body. Unexpected errors are logged and their message
 * withheld from the client.
 */
export function sendError(res: Response, error: unknown, logger: AppLogger): void {
  const status = httpStatusFor(error);
  if (!(error instanceof AppError) || status === 500) {
    logger.error('request_failed', { error: errorMessage(error) });
    res.status(500).json({ error: 'internal error' });
    return;
  }

  res.status(status).json({
    error: error.message,
    code: error.code,
    ...(error instanceof AlreadyDecidedError ? { status: error.currentStatus } : {}),
  });
}
