/**
 * Location lookups: terrain elevation and city geocoding
 */

import type { z } from 'zod';
import { getConfig } from '../config/env.js';
import { InvalidArgumentError, InvalidResponseError } from '../domain/errors.js';
import { HttpClient } from '../domain/http-client.js';
import { logger } from '../domain/logger.js';
import {
  ElevationResponseSchema,
  GeocodingResponseSchema,
  type CityDetails,
} from '../domain/schemas/common.js';
import type { QueryParameters } from '../domain/types.js';
import { validateCityCount, validateCoordinates, validateTimeout } from '../domain/validators.js';

export interface LookupOptions {
  /** Shared transport; when omitted one is created for the call and closed after it */
  http?: HttpClient;
  /** Request timeout in milliseconds; null disables it */
  timeoutMs?: number | null;
  /** Endpoint URL override */
  url?: string;
}

async function lookup<T>(
  url: string,
  params: QueryParameters,
  schema: z.ZodType<T>,
  options: LookupOptions
): Promise<T> {
  const timeoutMs =
    options.timeoutMs === undefined ? getConfig().timeoutMs : validateTimeout(options.timeoutMs);
  const http = options.http ?? new HttpClient({ timeoutMs });

  try {
    const body = await http.getJson(url, params, { timeoutMs });
    const result = schema.safeParse(body);
    if (!result.success) {
      logger.warn('Unexpected lookup response', { url, issues: result.error.issues.length });
      throw new InvalidResponseError(
        `Unexpected response shape from ${url}: ${result.error.issues[0]?.message ?? 'unknown'}`
      );
    }
    return result.data;
  } finally {
    if (options.http === undefined) {
      http.close();
    }
  }
}

/**
 * Terrain elevation in meters above sea level
 */
export async function getElevation(
  latitude: number,
  longitude: number,
  options: LookupOptions = {}
): Promise<number> {
  const coordinate = validateCoordinates(latitude, longitude);
  const response = await lookup(
    options.url ?? getConfig().endpoints.elevation,
    { latitude: coordinate.latitude, longitude: coordinate.longitude },
    ElevationResponseSchema,
    options
  );
  return response.elevation[0];
}

/**
 * Cities matching a name, best match first
 *
 * @param count - Maximum number of results (1..20)
 * @returns undefined when nothing matches
 */
export async function getCityDetails(
  name: string,
  count = 5,
  options: LookupOptions = {}
): Promise<CityDetails[] | undefined> {
  const query = typeof name === 'string' ? name.trim() : '';
  if (query.length === 0) {
    throw new InvalidArgumentError("'name' must be a non-empty string.", {
      parameter: 'name',
      received: name,
    });
  }

  const response = await lookup(
    options.url ?? getConfig().endpoints.geocoding,
    { name: query, count: validateCityCount(count), language: 'en', format: 'json' },
    GeocodingResponseSchema,
    options
  );
  return response.results;
}
