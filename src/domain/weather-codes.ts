/**
 * WMO weather interpretation codes
 *
 * Loaded once from data/weather-codes.json at the package root.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { WeatherCodeTable } from './reshaper.js';

const WEATHER_CODES_PATH = new URL('../../data/weather-codes.json', import.meta.url);

const WeatherCodeTableSchema = z.record(z.string().regex(/^\d+$/), z.string().min(1));

/**
 * Read and validate a weather-code table file
 */
export function loadWeatherCodes(path: URL | string = WEATHER_CODES_PATH): WeatherCodeTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return Object.freeze(WeatherCodeTableSchema.parse(raw));
}

export const WEATHER_CODES: WeatherCodeTable = loadWeatherCodes();
