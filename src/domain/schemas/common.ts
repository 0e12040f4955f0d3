/**
 * Common Zod schemas for call arguments and response bodies
 */

import { z } from 'zod';
import {
  CLOUD_COVER_LEVELS,
  FREQUENCIES,
  MAX_TIMEOUT_MS,
  PRECIPITATION_UNITS,
  PRESSURE_LEVELS,
  TEMPERATURE_UNITS,
  TIME_FORMATS,
  WIND_SPEED_UNITS,
} from '../constants.js';

export const LatitudeSchema = z
  .number()
  .min(-90, 'latitude must be >= -90')
  .max(90, 'latitude must be <= 90')
  .describe('Latitude in decimal degrees');

export const LongitudeSchema = z
  .number()
  .min(-180, 'longitude must be >= -180')
  .max(180, 'longitude must be <= 180')
  .describe('Longitude in decimal degrees');

/**
 * Coordinate schema for location input
 */
export const CoordinateSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
});

export type Coordinate = z.infer<typeof CoordinateSchema>;

export const TemperatureUnitSchema = z.enum(TEMPERATURE_UNITS);
export const PrecipitationUnitSchema = z.enum(PRECIPITATION_UNITS);
export const WindSpeedUnitSchema = z.enum(WIND_SPEED_UNITS);
export const CloudCoverLevelSchema = z.enum(CLOUD_COVER_LEVELS);
export const PressureLevelSchema = z.enum(PRESSURE_LEVELS);
export const FrequencySchema = z.enum(FREQUENCIES);
export const TimeFormatSchema = z.enum(TIME_FORMATS);

/**
 * ISO-8601 calendar date (YYYY-MM-DD)
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');

/**
 * Timeout in milliseconds, or null for none
 */
export const TimeoutSchema = z
  .number()
  .positive('timeout must be greater than 0')
  .max(MAX_TIMEOUT_MS, `timeout must be at most ${MAX_TIMEOUT_MS}`)
  .nullable();

// Response bodies

export const ScalarSchema = z.union([z.number(), z.string(), z.null()]);

export const TimestampSchema = z.union([z.string(), z.number()]);

/**
 * `current` branch: one scalar per requested metric, plus time/interval metadata
 */
export const CurrentBranchSchema = z.record(z.string(), ScalarSchema);

export type CurrentBranch = z.infer<typeof CurrentBranchSchema>;

/**
 * `hourly` / `daily` branch: a time array plus one same-length array per metric
 */
export const PeriodicBranchSchema = z
  .object({
    time: z.array(TimestampSchema),
  })
  .catchall(z.array(ScalarSchema));

export type PeriodicBranch = z.infer<typeof PeriodicBranchSchema>;

export const ElevationResponseSchema = z.object({
  elevation: z.tuple([z.number()]),
});

export const CityDetailsSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    latitude: z.number(),
    longitude: z.number(),
    elevation: z.number().optional(),
    country: z.string().optional(),
    country_code: z.string().optional(),
    timezone: z.string().optional(),
    admin1: z.string().optional(),
    population: z.number().optional(),
  })
  .passthrough();

export type CityDetails = z.infer<typeof CityDetailsSchema>;

export const GeocodingResponseSchema = z
  .object({
    results: z.array(CityDetailsSchema).optional(),
  })
  .passthrough();
