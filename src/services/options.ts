/**
 * Options shared by the service classes
 */

import { DEFAULT_FORECAST_DAYS, DEFAULT_PAST_DAYS, type TimeFormat } from '../domain/constants.js';
import { EndpointClient } from '../domain/endpoint-client.js';
import type { HttpClient } from '../domain/http-client.js';
import { mergeParams } from '../domain/params.js';
import type { QueryParameters } from '../domain/types.js';
import {
  type UnitSelection,
  validateCoordinates,
  validateForecastDays,
  validatePastDays,
  validateTimeFormat,
} from '../domain/validators.js';

export interface ServiceOptions {
  /** Shared transport; when omitted the service creates and owns one */
  http?: HttpClient;
  /** Request timeout in milliseconds; null disables it */
  timeoutMs?: number | null;
  /** Endpoint URL override */
  url?: string;
  /** Format of time labels (default: iso8601) */
  timeFormat?: TimeFormat;
}

export interface ForecastOptions extends ServiceOptions {
  /** Forecast horizon in days */
  forecastDays?: number;
  /** Days of past data to prepend (0..92) */
  pastDays?: number;
}

/**
 * Validated coordinates and time format as base query parameters
 */
export function locationParams(
  latitude: number,
  longitude: number,
  options: ServiceOptions
): QueryParameters {
  const coordinate = validateCoordinates(latitude, longitude);
  return mergeParams(
    { latitude: coordinate.latitude, longitude: coordinate.longitude },
    { timeformat: validateTimeFormat(options.timeFormat ?? 'iso8601') }
  );
}

/**
 * Forecast horizon settings validated against an endpoint's maximum
 */
export function forecastParams(
  options: ForecastOptions,
  maxForecastDays: number
): { forecast_days: number; past_days: number } {
  return {
    forecast_days: validateForecastDays(options.forecastDays ?? DEFAULT_FORECAST_DAYS, maxForecastDays),
    past_days: validatePastDays(options.pastDays ?? DEFAULT_PAST_DAYS),
  };
}

/**
 * Endpoint client for a service, honouring the shared options
 */
export function createEndpoint(
  url: string,
  baseParams: QueryParameters,
  options: ServiceOptions
): EndpointClient {
  return new EndpointClient({
    url: options.url ?? url,
    baseParams,
    http: options.http,
    timeoutMs: options.timeoutMs,
  });
}

/**
 * Unit selectors as query parameters
 */
export function unitParams(units: UnitSelection): Record<string, string> {
  return {
    temperature_unit: units.temperatureUnit,
    precipitation_unit: units.precipitationUnit,
    wind_speed_unit: units.windSpeedUnit,
  };
}
