/**
 * @fileoverview Retry wrapper for outbound HTTP calls (notification webhooks).
 *
 * Handles transient network failures and retryable HTTP statuses.
 */

import { createLogger } from './observability/index.js';

const logger = createLogger({ domain: 'http' });

/** Retryable network error codes commonly surfaced by undici/fetch. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/** Retryable HTTP statuses for transient upstream issues. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Extract network error code from a fetch error's cause when available.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const cause: unknown = error.cause;
  if (!cause || typeof cause !== 'object' || !('code' in cause)) {
    return undefined;
  }

  return typeof cause.code === 'string' ? cause.code : undefined;
}

/**
 * Detect transient fetch errors that are worth retrying.
 */
export function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof TypeError)) {
    return false;
  }

  const code = getErrorCode(error);
  if (code && RETRYABLE_ERROR_CODES.has(code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes('fetch failed') || message.includes('network');
}

export function delayFor(attempt: number, retryDelaysMs: readonly number[]): number {
  return retryDelaysMs[Math.min(attempt - 1, retryDelaysMs.length - 1)] ?? 0;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch with retries for transient failures.
 *
 * @param operation Human-readable operation label for logs
 * @param retryDelaysMs Delays between retries in milliseconds (attempts = delays + 1)
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  operation: string,
  retryDelaysMs: readonly number[] = [250, 750]
): Promise<Response> {
  const totalAttempts = retryDelaysMs.length + 1;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    try {
      const response = await fetch(url, init);
      if (response.ok) {
        return response;
      }

      const canRetry = attempt < totalAttempts && isRetryableStatus(response.status);
      if (!canRetry) {
        return response;
      }

      const waitMs = delayFor(attempt, retryDelaysMs);
      logger.warn('http_retryable_status', {
        operation,
        status: response.status,
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    } catch (error) {
      const canRetry = attempt < totalAttempts && isRetryableFetchError(error);
      if (!canRetry) {
        throw error;
      }

      const waitMs = delayFor(attempt, retryDelaysMs);
      logger.warn('http_transient_error', {
        operation,
        error: error instanceof Error ? error.message : String(error),
        errorCode: getErrorCode(error),
        attempt,
        totalAttempts,
        retryInMs: waitMs,
      });
      await sleep(waitMs);
    }
  }

  throw new Error(`${operation} failed after retries`);
}
