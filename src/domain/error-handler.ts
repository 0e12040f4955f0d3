/**
 * Error mapping for upstream HTTP responses and network failures
 */

import { RequestError, TransportError } from './errors.js';
import { logger } from './logger.js';

/**
 * Extract the server-supplied reason from a decoded error body
 *
 * @param body - Decoded JSON error body (or undefined if it was not JSON)
 * @returns The `reason` string, if the body carries one
 */
export function extractReason(body: unknown): string | undefined {
  if (typeof body === 'object' && body !== null && 'reason' in body) {
    const { reason } = body;
    if (typeof reason === 'string') {
      return reason;
    }
    if (reason !== undefined && reason !== null) {
      return String(reason);
    }
  }
  return undefined;
}

/**
 * Handle a non-2xx response and create the matching RequestError
 *
 * @param status - HTTP status code
 * @param statusText - HTTP status text, used when the body has no reason
 * @param body - Decoded JSON error body, if any
 * @param requestId - Optional request ID for tracking
 */
export function handleHttpError(
  status: number,
  statusText: string,
  body?: unknown,
  requestId?: string
): RequestError {
  const reason = extractReason(body) ?? (statusText || undefined);

  logger.warn('HTTP error from endpoint', {
    status,
    reason,
    requestId,
  });

  return new RequestError(status, reason, {
    upstreamStatus: status,
    ...(requestId ? { requestId } : {}),
  });
}

/**
 * Handle network errors (connection refused, DNS, timeout, etc.)
 *
 * @param error - Error raised by fetch
 * @param timeoutMs - Timeout that was in force, for the timeout message
 * @param requestId - Optional request ID for tracking
 */
export function handleNetworkError(
  error: Error,
  timeoutMs: number | null,
  requestId?: string
): TransportError {
  const timedOut = error.name === 'AbortError' || error.name === 'TimeoutError';
  const message = timedOut
    ? `Request timed out after ${timeoutMs}ms.`
    : `Unable to reach endpoint: ${error.message}`;

  logger.error('Network error calling endpoint', {
    error: error.message,
    timedOut,
    requestId,
  });

  return new TransportError(message, {
    timedOut,
    networkError: error.message,
    ...(requestId ? { requestId } : {}),
  });
}
