/**
 * Unit tests for error-handler
 * Tests mapping of upstream failures to error classes
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { extractReason, handleHttpError, handleNetworkError } from './error-handler.js';
import { MeteoError, RequestError, TransportError, isMeteoError } from './errors.js';

// Mock logger
vi.mock('./logger.js', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { logger } from './logger.js';

describe('extractReason', () => {
  it('should read the reason field', () => {
    expect(extractReason({ error: true, reason: 'Latitude must be in range' })).toBe(
      'Latitude must be in range'
    );
  });

  it('should stringify a non-string reason', () => {
    expect(extractReason({ reason: 42 })).toBe('42');
  });

  it('should return undefined without a reason', () => {
    expect(extractReason({ error: true })).toBeUndefined();
    expect(extractReason(undefined)).toBeUndefined();
    expect(extractReason('plain text')).toBeUndefined();
  });
});

describe('handleHttpError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should create a RequestError with status and reason', () => {
    const error = handleHttpError(400, 'Bad Request', { reason: 'bad coordinates' });

    expect(error).toBeInstanceOf(RequestError);
    expect(error.code).toBe('REQUEST_ERROR');
    expect(error.statusCode).toBe(400);
    expect(error.reason).toBe('bad coordinates');
    expect(error.message).toBe('Server responded with status code 400. bad coordinates');
    expect(error.details).toEqual({ upstreamStatus: 400 });
  });

  it('should fall back to the status text', () => {
    const error = handleHttpError(503, 'Service Unavailable');

    expect(error.reason).toBe('Service Unavailable');
  });

  it('should omit the reason when nothing describes the failure', () => {
    const error = handleHttpError(500, '');

    expect(error.reason).toBeUndefined();
    expect(error.message).toBe('Server responded with status code 500.');
  });

  it('should include the request ID in details', () => {
    const error = handleHttpError(429, 'Too Many Requests', undefined, 'req-123');

    expect(error.details).toEqual({ upstreamStatus: 429, requestId: 'req-123' });
  });

  it('should log a warning', () => {
    handleHttpError(404, 'Not Found', { reason: 'no such endpoint' }, 'req-456');

    expect(logger.warn).toHaveBeenCalledWith('HTTP error from endpoint', {
      status: 404,
      reason: 'no such endpoint',
      requestId: 'req-456',
    });
  });
});

describe('handleNetworkError', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should report a timeout for an aborted request', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';

    const error = handleNetworkError(abort, 5000);

    expect(error).toBeInstanceOf(TransportError);
    expect(error.code).toBe('TRANSPORT_ERROR');
    expect(error.message).toBe('Request timed out after 5000ms.');
    expect(error.details).toEqual({
      timedOut: true,
      networkError: 'This operation was aborted',
    });
  });

  it('should report a connection failure', () => {
    const error = handleNetworkError(new Error('ECONNREFUSED'), 5000, 'req-789');

    expect(error.message).toBe('Unable to reach endpoint: ECONNREFUSED');
    expect(error.details).toEqual({
      timedOut: false,
      networkError: 'ECONNREFUSED',
      requestId: 'req-789',
    });
  });

  it('should log the failure', () => {
    handleNetworkError(new Error('getaddrinfo ENOTFOUND'), null);

    expect(logger.error).toHaveBeenCalledWith('Network error calling endpoint', {
      error: 'getaddrinfo ENOTFOUND',
      timedOut: false,
      requestId: undefined,
    });
  });
});

describe('error classes', () => {
  it('should name each error after its class', () => {
    const error = new RequestError(400, 'bad');

    expect(error.name).toBe('RequestError');
    expect(error).toBeInstanceOf(MeteoError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should narrow unknown values', () => {
    expect(isMeteoError(new TransportError('down'))).toBe(true);
    expect(isMeteoError(new Error('other'))).toBe(false);
  });
});
