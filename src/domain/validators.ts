/**
 * Argument validation
 *
 * Every check runs before a request is built and throws InvalidArgumentError
 * naming the parameter and its valid domain. No I/O happens here.
 */

import { z } from 'zod';
import {
  AQI_LEVELS,
  MAX_CITY_RESULTS,
  MAX_PAST_DAYS,
  type CloudCoverLevel,
  type DepthBucket,
  type PrecipitationUnit,
  type PressureLevel,
  type TemperatureUnit,
  type TimeFormat,
  type WindSpeedUnit,
} from './constants.js';
import { InvalidArgumentError } from './errors.js';
import {
  CloudCoverLevelSchema,
  FrequencySchema,
  IsoDateSchema,
  LatitudeSchema,
  LongitudeSchema,
  PrecipitationUnitSchema,
  PressureLevelSchema,
  TemperatureUnitSchema,
  TimeFormatSchema,
  TimeoutSchema,
  WindSpeedUnitSchema,
  type Coordinate,
} from './schemas/common.js';
import type { PeriodicFrequency } from './types.js';

function describeValue(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value);
}

/**
 * Parse a value against a schema, converting failures to InvalidArgumentError
 */
function parseArgument<T extends z.ZodTypeAny>(
  schema: T,
  parameter: string,
  value: unknown
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidArgumentError(
      `Invalid ${parameter}: ${describeValue(value)}. ${issue?.message ?? 'Invalid value'}`,
      { parameter, received: value }
    );
  }
  return result.data;
}

/**
 * Parse a value against an enumeration, listing the allowed set on failure
 */
function parseEnum<T extends [string, ...string[]]>(
  schema: z.ZodEnum<T>,
  parameter: string,
  value: unknown
): T[number] {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid ${parameter} specified: ${describeValue(value)}. Expected one of: ${schema.options.join(', ')}.`,
      { parameter, received: value, allowed: schema.options }
    );
  }
  return result.data;
}

/**
 * Check that a value belongs to a fixed set and return it with the set's type
 */
export function validateChoice<T extends string | number>(
  parameter: string,
  value: unknown,
  allowed: readonly T[]
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new InvalidArgumentError(
      `Invalid ${parameter} specified: ${describeValue(value)}. Expected one of: ${allowed.join(', ')}.`,
      { parameter, received: value, allowed }
    );
  }
  return match;
}

function boundedInteger(parameter: string, min: number, max: number) {
  const message = `'${parameter}' must be an integer between ${min} and ${max}.`;
  return z
    .number({ invalid_type_error: message })
    .int(message)
    .min(min, message)
    .max(max, message);
}

export function validateCoordinates(latitude: unknown, longitude: unknown): Coordinate {
  return {
    latitude: parseArgument(LatitudeSchema, 'latitude', latitude),
    longitude: parseArgument(LongitudeSchema, 'longitude', longitude),
  };
}

export function validateTemperatureUnit(unit: unknown): TemperatureUnit {
  return parseEnum(TemperatureUnitSchema, 'temperature_unit', unit);
}

export function validatePrecipitationUnit(unit: unknown): PrecipitationUnit {
  return parseEnum(PrecipitationUnitSchema, 'precipitation_unit', unit);
}

export function validateWindSpeedUnit(unit: unknown): WindSpeedUnit {
  return parseEnum(WindSpeedUnitSchema, 'wind_speed_unit', unit);
}

export function validateCloudCoverLevel(level: unknown): CloudCoverLevel {
  return parseEnum(CloudCoverLevelSchema, 'cloud cover level', level);
}

export function validatePressureLevel(level: unknown): PressureLevel {
  return parseEnum(PressureLevelSchema, 'pressure level', level);
}

export function validateFrequency(frequency: unknown): PeriodicFrequency {
  return parseEnum(FrequencySchema, 'frequency', frequency);
}

export function validateTimeFormat(format: unknown): TimeFormat {
  return parseEnum(TimeFormatSchema, 'timeformat', format);
}

export interface UnitSelection {
  temperatureUnit: TemperatureUnit;
  precipitationUnit: PrecipitationUnit;
  windSpeedUnit: WindSpeedUnit;
}

/**
 * Validate the three unit selectors used by summary requests
 */
export function validateUnits(
  temperatureUnit: unknown,
  precipitationUnit: unknown,
  windSpeedUnit: unknown
): UnitSelection {
  return {
    temperatureUnit: validateTemperatureUnit(temperatureUnit),
    precipitationUnit: validatePrecipitationUnit(precipitationUnit),
    windSpeedUnit: validateWindSpeedUnit(windSpeedUnit),
  };
}

/**
 * @param max - Longest horizon the endpoint serves
 */
export function validateForecastDays(days: unknown, max: number): number {
  return parseArgument(boundedInteger('forecast_days', 1, max), 'forecast_days', days);
}

export function validatePastDays(days: unknown): number {
  return parseArgument(boundedInteger('past_days', 0, MAX_PAST_DAYS), 'past_days', days);
}

export function validateCityCount(count: unknown): number {
  return parseArgument(boundedInteger('count', 1, MAX_CITY_RESULTS), 'count', count);
}

export function validateTimeout(timeoutMs: unknown): number | null {
  return parseArgument(TimeoutSchema, 'timeout', timeoutMs);
}

/**
 * Resolve a depth in centimeters to the wire label of its enclosing bucket
 *
 * Buckets are half-open: a depth equal to a bucket's upper bound belongs
 * to the next bucket.
 */
export function resolveDepthRange(depth: unknown, buckets: readonly DepthBucket[]): string {
  const centimeters = typeof depth === 'number' ? depth : NaN;
  const bucket = buckets.find(({ from, to }) => centimeters >= from && centimeters < to);

  if (!bucket) {
    const lowest = buckets[0]?.from ?? 0;
    const highest = buckets[buckets.length - 1]?.to ?? 0;
    throw new InvalidArgumentError(
      `'depth' must be a number in the range [${lowest}, ${highest}); got ${describeValue(depth)}.`,
      { parameter: 'depth', received: depth, allowed: buckets.map((b) => b.label) }
    );
  }

  return bucket.label;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a resolved date (UTC midnight) as YYYY-MM-DD
 */
export function formatIsoDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Today's calendar date in local time, as YYYY-MM-DD
 */
export function localToday(now: Date = new Date()): string {
  return `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/**
 * Resolve a Date or YYYY-MM-DD string to a calendar date at UTC midnight
 *
 * Date objects contribute their local calendar date. Dates after `today`
 * are rejected.
 *
 * @param parameter - Name reported in errors (e.g. start_date)
 * @param now - Reference instant for the future-date check
 */
export function resolveDate(
  target: unknown,
  parameter = 'date',
  now: Date = new Date()
): Date {
  let resolved: Date;

  if (target instanceof Date) {
    if (Number.isNaN(target.getTime())) {
      throw new InvalidArgumentError(`Invalid ${parameter}: not a valid date.`, {
        parameter,
        received: target,
      });
    }
    resolved = new Date(Date.UTC(target.getFullYear(), target.getMonth(), target.getDate()));
  } else {
    const text = parseArgument(IsoDateSchema, parameter, target);
    const [year, month, day] = text.split('-').map(Number);
    resolved = new Date(Date.UTC(year ?? NaN, (month ?? NaN) - 1, day ?? NaN));

    // Date.UTC rolls 2021-02-30 over to March; reject instead
    if (Number.isNaN(resolved.getTime()) || formatIsoDate(resolved) !== text) {
      throw new InvalidArgumentError(`${describeValue(target)} is not a valid date format.`, {
        parameter,
        received: target,
      });
    }
  }

  const today = Date.UTC(now.getFullYear(), now.getMonth(), now.getDate());
  if (resolved.getTime() > today) {
    throw new InvalidArgumentError(`'${formatIsoDate(resolved)}' is a date in the future.`, {
      parameter,
      received: target,
    });
  }

  return resolved;
}

export interface DateRange {
  startDate: Date;
  endDate: Date;
}

/**
 * Resolve both ends of an archive range, rejecting start > end
 */
export function resolveDateRange(
  start: unknown,
  end: unknown,
  now: Date = new Date()
): DateRange {
  const startDate = resolveDate(start, 'start_date', now);
  const endDate = resolveDate(end, 'end_date', now);

  if (startDate.getTime() > endDate.getTime()) {
    throw new InvalidArgumentError("'start_date' must be lower or equal to 'end_date'.", {
      parameter: 'start_date',
      received: formatIsoDate(startDate),
    });
  }

  return { startDate, endDate };
}

/**
 * Describe an AQI reading with its level name
 */
export function describeAqi(value: unknown): string {
  const reading = typeof value === 'number' ? value : NaN;
  const level = reading >= 0 ? AQI_LEVELS.find(({ max }) => reading <= max) : undefined;

  if (!level) {
    throw new InvalidArgumentError(
      `AQI value must be a number between 0 and 500; got ${describeValue(value)}.`,
      { parameter: 'aqi', received: value }
    );
  }

  return level.description;
}
