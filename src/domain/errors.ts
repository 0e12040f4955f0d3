/**
 * Error classes raised by the client
 *
 * Every failure is a MeteoError with a stable `code`. Nothing is retried:
 * errors propagate to the immediate caller.
 */

import type { ErrorCode, ErrorDetails, Scalar } from './types.js';

export class MeteoError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * A caller-supplied value is outside its documented domain
 */
export class InvalidArgumentError extends MeteoError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVALID_ARGUMENT', message, details);
  }
}

/**
 * The endpoint answered with a non-2xx status
 */
export class RequestError extends MeteoError {
  readonly statusCode: number;
  readonly reason?: string;

  constructor(statusCode: number, reason?: string, details?: ErrorDetails) {
    super(
      'REQUEST_ERROR',
      `Server responded with status code ${statusCode}. ${reason ?? ''}`.trimEnd(),
      details
    );
    this.statusCode = statusCode;
    this.reason = reason;
  }
}

/**
 * The request never produced a response (timeout, DNS, refused connection)
 */
export class TransportError extends MeteoError {
  constructor(message: string, details?: ErrorDetails) {
    super('TRANSPORT_ERROR', message, details);
  }
}

/**
 * A request was built without a required key, or a response lacks a field
 */
export class MissingFieldError extends MeteoError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('MISSING_FIELD', message, { parameter: field });
    this.field = field;
  }
}

/**
 * A periodic request names neither (or both) of `hourly` / `daily`
 */
export class MissingFrequencyError extends MeteoError {
  constructor(message = 'frequency parameter not found in the request parameters.') {
    super('MISSING_FREQUENCY', message);
  }
}

/**
 * The response body does not have the shape the reshaper needs
 */
export class InvalidResponseError extends MeteoError {
  constructor(message: string, details?: ErrorDetails) {
    super('INVALID_RESPONSE', message, details);
  }
}

export class UnknownWeatherCodeError extends MeteoError {
  readonly weatherCode: Scalar;

  constructor(weatherCode: Scalar) {
    super(
      'UNKNOWN_WEATHER_CODE',
      `No description found for weather code ${String(weatherCode)}.`,
      { received: weatherCode }
    );
    this.weatherCode = weatherCode;
  }
}

/**
 * Narrow an unknown thrown value to a MeteoError
 */
export function isMeteoError(error: unknown): error is MeteoError {
  return error instanceof MeteoError;
}
