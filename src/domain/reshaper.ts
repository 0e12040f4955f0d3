/**
 * Response reshaping
 *
 * Turns a decoded response body plus the request that produced it into one
 * of four normalized shapes: a scalar, a labeled bundle, a time-indexed
 * series or a time-indexed table. The branch to read comes from the
 * request's frequency tag, never from the body.
 */

import { z } from 'zod';
import {
  InvalidResponseError,
  MissingFieldError,
  UnknownWeatherCodeError,
} from './errors.js';
import {
  CurrentBranchSchema,
  PeriodicBranchSchema,
  type CurrentBranch,
  type PeriodicBranch,
} from './schemas/common.js';
import type {
  DataRequest,
  DType,
  DTypeArrayMap,
  IndexName,
  LabeledBundle,
  PeriodicFrequency,
  Scalar,
  Series,
  Table,
  TableColumn,
  Timestamp,
} from './types.js';

/**
 * Weather code (as a string key) to human-readable description
 */
export type WeatherCodeTable = Readonly<Record<string, string>>;

/** Metadata keys of the `current` branch that are not readings */
const CURRENT_METADATA_KEYS: ReadonlySet<string> = new Set(['time', 'interval']);

const BodySchema = z.record(z.string(), z.unknown());

/** Table column storage for discrete metrics; every other column is float32 */
export const TABLE_METRIC_DTYPES: Readonly<Record<string, DType>> = {
  weather_code: 'uint8',
};

const INTEGER_RANGES = {
  int32: { min: -2_147_483_648, max: 2_147_483_647 },
  uint8: { min: 0, max: 255 },
} as const;

function parseBody(body: unknown): Record<string, unknown> {
  const result = BodySchema.safeParse(body);
  if (!result.success) {
    throw new InvalidResponseError('Response body is not a JSON object.');
  }
  return result.data;
}

function locateBranch(body: unknown, frequency: string): unknown {
  const data = parseBody(body);
  if (!(frequency in data)) {
    throw new MissingFieldError(
      frequency,
      `Response does not contain the '${frequency}' branch.`
    );
  }
  return data[frequency];
}

function currentBranch(body: unknown, request: DataRequest): CurrentBranch {
  if (request.frequency !== 'current') {
    throw new MissingFieldError(
      'current',
      `Required parameter 'current' not found in the request parameters.`
    );
  }

  const result = CurrentBranchSchema.safeParse(locateBranch(body, 'current'));
  if (!result.success) {
    throw new InvalidResponseError("The 'current' branch is not a mapping of readings.", {
      issues: result.error.issues,
    });
  }
  return result.data;
}

function periodicBranch(
  body: unknown,
  request: DataRequest
): { frequency: PeriodicFrequency; branch: PeriodicBranch } {
  const { frequency } = request;
  if (frequency === 'current') {
    throw new MissingFieldError(
      'hourly',
      'A periodic extraction needs an hourly or daily request, not a current one.'
    );
  }

  const result = PeriodicBranchSchema.safeParse(locateBranch(body, frequency));
  if (!result.success) {
    throw new InvalidResponseError(
      `The '${frequency}' branch is not a time array with metric arrays.`,
      { issues: result.error.issues }
    );
  }
  return { frequency, branch: result.data };
}

function indexNameFor(frequency: PeriodicFrequency): IndexName {
  return frequency === 'daily' ? 'Date' : 'Datetime';
}

function missingMetric(metric: string, frequency: string): MissingFieldError {
  return new MissingFieldError(
    metric,
    `Metric '${metric}' not found in the '${frequency}' response branch.`
  );
}

function checkLabelCount(request: DataRequest, labels: readonly string[], fieldCount: number): void {
  if (request.metrics.length !== labels.length || fieldCount !== labels.length) {
    throw new MissingFieldError(
      request.frequency,
      `Expected ${labels.length} fields in the '${request.frequency}' branch to match the labels; ` +
        `requested ${request.metrics.length}, received ${fieldCount}.`
    );
  }
}

function columnOf(
  branch: PeriodicBranch,
  metric: string,
  frequency: PeriodicFrequency
): Scalar[] {
  const column = metric === 'time' ? undefined : branch[metric];
  if (column === undefined) {
    throw missingMetric(metric, frequency);
  }
  if (column.length !== branch.time.length) {
    throw new InvalidResponseError(
      `Metric '${metric}' has ${column.length} values for ${branch.time.length} timestamps.`,
      { metric }
    );
  }
  return column;
}

function toFloat(value: Scalar, metric: string): number {
  if (value === null) {
    return NaN;
  }
  if (typeof value !== 'number') {
    throw new InvalidResponseError(`Metric '${metric}' holds a non-numeric value: ${value}.`, {
      metric,
    });
  }
  return value;
}

function toInteger(value: Scalar, metric: string, dtype: keyof typeof INTEGER_RANGES): number {
  const { min, max } = INTEGER_RANGES[dtype];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new InvalidResponseError(
      `Metric '${metric}' value ${String(value)} cannot be stored as ${dtype}.`,
      { metric, dtype }
    );
  }
  return value;
}

/**
 * Store raw readings in the requested representation
 */
export function toDTypeArray<D extends DType>(
  values: readonly Scalar[],
  dtype: D,
  metric: string
): DTypeArrayMap[D];
export function toDTypeArray(
  values: readonly Scalar[],
  dtype: DType,
  metric: string
): DTypeArrayMap[DType] {
  switch (dtype) {
    case 'float32':
      return Float32Array.from(values, (value) => toFloat(value, metric));
    case 'float64':
      return Float64Array.from(values, (value) => toFloat(value, metric));
    case 'int32':
      return Int32Array.from(values, (value) => toInteger(value, metric, 'int32'));
    case 'uint8':
      return Uint8Array.from(values, (value) => toInteger(value, metric, 'uint8'));
    case 'object':
      return [...values];
  }
}

/**
 * Read one reading from the `current` branch
 */
export function extractScalar(body: unknown, request: DataRequest): Scalar {
  const branch = currentBranch(body, request);
  const [metric] = request.metrics;

  if (metric === undefined || request.metrics.length !== 1) {
    throw new MissingFieldError(
      'current',
      `A scalar extraction needs exactly one metric; got ${request.metrics.length}.`
    );
  }

  const value = CURRENT_METADATA_KEYS.has(metric) ? undefined : branch[metric];
  if (value === undefined) {
    throw missingMetric(metric, 'current');
  }
  return value;
}

/**
 * Read several readings from the `current` branch under display labels
 *
 * `labels[i]` names `request.metrics[i]`. The branch's `time` and
 * `interval` entries are metadata and are left out.
 */
export function extractScalarBundle<L extends string>(
  body: unknown,
  request: DataRequest,
  labels: readonly L[]
): LabeledBundle<L> {
  const branch = currentBranch(body, request);
  const fields = Object.keys(branch).filter((key) => !CURRENT_METADATA_KEYS.has(key));
  checkLabelCount(request, labels, fields.length);

  const bundle: LabeledBundle<L> = new Map();
  labels.forEach((label, position) => {
    const metric = request.metrics[position] ?? label;
    const value = branch[metric];
    if (value === undefined) {
      throw missingMetric(metric, 'current');
    }
    bundle.set(label, value);
  });

  return bundle;
}

/**
 * Read one metric of the hourly or daily branch as a time-indexed series
 *
 * Values are stored as 32-bit floats unless another representation is asked for.
 */
export function extractSeries(body: unknown, request: DataRequest): Series<'float32'>;
export function extractSeries<D extends DType>(
  body: unknown,
  request: DataRequest,
  dtype: D
): Series<D>;
export function extractSeries(
  body: unknown,
  request: DataRequest,
  dtype: DType = 'float32'
): Series<DType> {
  const { frequency, branch } = periodicBranch(body, request);
  const [metric] = request.metrics;

  if (metric === undefined || request.metrics.length !== 1) {
    throw new MissingFieldError(
      frequency,
      `A series extraction needs exactly one metric; got ${request.metrics.length}.`
    );
  }

  return {
    name: metric,
    indexName: indexNameFor(frequency),
    index: [...branch.time],
    dtype,
    values: toDTypeArray(columnOf(branch, metric, frequency), dtype, metric),
  };
}

/**
 * Read several metrics of the hourly or daily branch as a table
 *
 * The `time` array becomes the row index; `labels[i]` names the column of
 * `request.metrics[i]`. Columns are stored as 32-bit floats, except metrics
 * listed in TABLE_METRIC_DTYPES; `dtypes` overrides either per label.
 */
export function extractTable<L extends string>(
  body: unknown,
  request: DataRequest,
  labels: readonly L[],
  dtypes: Partial<Record<L, DType>> = {}
): Table<L> {
  const { frequency, branch } = periodicBranch(body, request);
  const fields = Object.keys(branch).filter((key) => key !== 'time');
  checkLabelCount(request, labels, fields.length);

  const data = new Map<L, TableColumn>();
  labels.forEach((label, position) => {
    const metric = request.metrics[position] ?? label;
    const dtype = dtypes[label] ?? TABLE_METRIC_DTYPES[metric] ?? 'float32';
    data.set(label, toDTypeArray(columnOf(branch, metric, frequency), dtype, metric));
  });

  return {
    indexName: indexNameFor(frequency),
    index: [...branch.time],
    columns: [...labels],
    data,
  };
}

/**
 * Look up the description of one weather code
 *
 * @throws UnknownWeatherCodeError when the table has no entry for the code
 */
export function describeWeatherCode(code: Scalar, codeTable: WeatherCodeTable): string {
  const description =
    typeof code === 'number' && Number.isInteger(code)
      ? codeTable[String(code)]
      : undefined;
  if (description === undefined) {
    throw new UnknownWeatherCodeError(code);
  }
  return description;
}

/**
 * Pair each weather code of a series with its description
 */
export function deriveWeatherCodeDescription(
  series: Series<DType>,
  codeTable: WeatherCodeTable
): Table<'code' | 'description'> {
  const codes = seriesValues(series);

  return {
    indexName: series.indexName,
    index: [...series.index],
    columns: ['code', 'description'],
    data: new Map<'code' | 'description', TableColumn>([
      ['code', toDTypeArray(codes, 'uint8', series.name)],
      ['description', codes.map((code) => describeWeatherCode(code, codeTable))],
    ]),
  };
}

/**
 * Values of a series as a plain array
 */
export function seriesValues(series: Series<DType>): Scalar[] {
  const values: Scalar[] = [];
  for (let position = 0; position < series.values.length; position++) {
    values.push(series.values[position] ?? null);
  }
  return values;
}

/**
 * Flatten a series back to (timestamp, value) pairs in index order
 */
export function seriesToPairs(series: Series<DType>): Array<[Timestamp, Scalar]> {
  const values = seriesValues(series);
  if (values.length !== series.index.length) {
    throw new InvalidResponseError(
      `Series '${series.name}' has ${values.length} values for ${series.index.length} timestamps.`
    );
  }
  return series.index.map((timestamp, position): [Timestamp, Scalar] => [
    timestamp,
    values[position] ?? null,
  ]);
}

/**
 * Narrow a `current` reading to a number, keeping null for readings the
 * endpoint does not provide at a location
 */
export function toNumericReading(value: Scalar, metric: string): number | null {
  if (value !== null && typeof value !== 'number') {
    throw new InvalidResponseError(`Metric '${metric}' holds a non-numeric value: ${value}.`, {
      metric,
    });
  }
  return value;
}
