/**
 * Request parameter composition
 *
 * Base configuration is an immutable mapping owned by a service; each call
 * overlays its metric selection on top of it and gets a new mapping back.
 */

import { MissingFieldError, MissingFrequencyError } from './errors.js';
import type {
  DataRequest,
  Frequency,
  PeriodicFrequency,
  QueryParameters,
  QueryValue,
} from './types.js';

/**
 * Metric selection for one call
 */
export interface MetricSelection {
  frequency: Frequency;
  metrics: readonly string[];
}

/**
 * Merge an overlay onto a base mapping without touching either
 *
 * Overlay keys win. Undefined overlay values are skipped.
 */
export function mergeParams(
  base: QueryParameters,
  overlay: Readonly<Record<string, QueryValue | undefined>> = {}
): QueryParameters {
  const merged: Record<string, QueryValue> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return Object.freeze(merged);
}

/**
 * Build a tagged data request
 *
 * The frequency key of the result holds the comma-joined metric list. Any
 * other frequency key inherited from `base` or `extra` is dropped so that a
 * request never names two branches.
 */
export function buildDataRequest(
  base: QueryParameters,
  selection: MetricSelection,
  extra: Readonly<Record<string, QueryValue | undefined>> = {}
): DataRequest {
  if (selection.metrics.length === 0) {
    throw new MissingFieldError(selection.frequency, 'At least one metric must be requested.');
  }

  const merged: Record<string, QueryValue> = { ...mergeParams(base, extra) };
  delete merged.current;
  delete merged.hourly;
  delete merged.daily;
  merged[selection.frequency] = selection.metrics.join(',');

  return {
    frequency: selection.frequency,
    metrics: [...selection.metrics],
    params: Object.freeze(merged),
  };
}

/**
 * Look up the periodic frequency named by raw request parameters
 *
 * @throws MissingFrequencyError if neither or both of hourly/daily are present
 */
export function detectFrequency(params: QueryParameters): PeriodicFrequency {
  const hourly = 'hourly' in params;
  const daily = 'daily' in params;

  if (hourly && daily) {
    throw new MissingFrequencyError(
      "Request parameters name both 'hourly' and 'daily'; a request targets one frequency."
    );
  }
  if (hourly) {
    return 'hourly';
  }
  if (daily) {
    return 'daily';
  }
  throw new MissingFrequencyError();
}

/**
 * Throw MissingFieldError for the first key absent from `params`
 */
export function verifyKeys(params: QueryParameters, keys: readonly string[]): void {
  for (const key of keys) {
    if (!(key in params)) {
      throw new MissingFieldError(
        key,
        `Required parameter '${key}' not found in the request parameters.`
      );
    }
  }
}

function splitMetrics(value: QueryValue): string[] {
  return String(value)
    .split(',')
    .map((metric) => metric.trim())
    .filter((metric) => metric.length > 0);
}

/**
 * Derive a tagged request from a raw parameter mapping
 *
 * `current` wins when present; otherwise the periodic frequency is detected
 * by key scan.
 */
export function requestFromParameters(params: QueryParameters): DataRequest {
  verifyKeys(params, ['latitude', 'longitude']);

  const frequency: Frequency = 'current' in params ? 'current' : detectFrequency(params);
  const selected = params[frequency];
  const metrics = selected === undefined ? [] : splitMetrics(selected);

  if (metrics.length === 0) {
    throw new MissingFieldError(frequency, `No metric named under '${frequency}'.`);
  }

  return { frequency, metrics, params };
}
