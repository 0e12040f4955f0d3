/**
 * HTTP client for the weather data endpoints
 *
 * One GET per call, JSON in and out. Connection reuse is left to the
 * runtime's fetch dispatcher; this object only owns the in-flight requests
 * it started, so that `close()` can abort them.
 */

import { randomUUID } from 'node:crypto';
import { DEFAULT_TIMEOUT_MS } from './constants.js';
import { handleHttpError, handleNetworkError } from './error-handler.js';
import { InvalidResponseError, TransportError } from './errors.js';
import { logger } from './logger.js';
import type { QueryParameters } from './types.js';
import { validateTimeout } from './validators.js';

/**
 * Options for a single request
 */
export interface FetchOptions {
  /** Timeout in milliseconds; null disables it. Defaults to the client's. */
  timeoutMs?: number | null;
  /** Request ID for tracking (auto-generated if not provided) */
  requestId?: string;
}

export interface HttpClientOptions {
  /** Default timeout in milliseconds; null disables it (default: 30000) */
  timeoutMs?: number | null;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

/**
 * Append query parameters to an absolute URL
 */
export function buildUrl(url: string, params: QueryParameters = {}): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

function parseJson(text: string): unknown {
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class HttpClient {
  private readonly defaultTimeout: number | null;
  private readonly headers: Record<string, string>;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: HttpClientOptions = {}) {
    this.defaultTimeout =
      options.timeoutMs === undefined ? DEFAULT_TIMEOUT_MS : validateTimeout(options.timeoutMs);
    this.headers = {
      Accept: 'application/json',
      ...options.headers,
    };

    logger.debug('HttpClient initialized', {
      defaultTimeout: this.defaultTimeout,
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Perform one GET and return the decoded JSON body
   *
   * @param url - Absolute endpoint URL
   * @param params - Query parameters, already validated and merged
   * @throws RequestError on a non-2xx status
   * @throws TransportError on timeout, network failure or a closed client
   * @throws InvalidResponseError when a 2xx body is not JSON
   */
  async getJson(
    url: string,
    params: QueryParameters = {},
    options: FetchOptions = {}
  ): Promise<unknown> {
    if (this.closed) {
      throw new TransportError('HTTP client has been closed.');
    }

    const requestId = options.requestId ?? randomUUID();
    const timeout =
      options.timeoutMs === undefined ? this.defaultTimeout : validateTimeout(options.timeoutMs);
    const target = buildUrl(url, params);
    const startTime = Date.now();

    logger.debug('HTTP request starting', { requestId, url: target });

    const controller = new AbortController();
    this.inFlight.add(controller);
    const timeoutId =
      timeout === null ? undefined : setTimeout(() => controller.abort(), timeout);

    let status: number;
    let statusText: string;
    let ok: boolean;
    let text: string;

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
      });
      status = response.status;
      statusText = response.statusText;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      const latency = Date.now() - startTime;
      logger.error('HTTP request failed', {
        requestId,
        url: target,
        error: error instanceof Error ? error.message : String(error),
        latency,
      });

      if (this.closed) {
        throw new TransportError('HTTP client was closed while the request was in flight.', {
          requestId,
        });
      }

      throw handleNetworkError(
        error instanceof Error ? error : new Error(String(error)),
        timeout,
        requestId
      );
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }

    logger.logUpstreamCall({
      url: target,
      status,
      latencyMs: Date.now() - startTime,
      requestId,
    });

    const body = parseJson(text);

    if (!ok) {
      throw handleHttpError(status, statusText, body, requestId);
    }

    if (body === undefined) {
      throw new InvalidResponseError('Response body is not valid JSON.', {
        requestId,
        upstreamStatus: status,
      });
    }

    return body;
  }

  /**
   * Release the client; in-flight requests are aborted. Safe to call twice.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
    logger.debug('HttpClient closed');
  }
}
