/**
 * Common types for the meteotab client
 */

/**
 * Machine-readable error codes carried by every MeteoError
 */
export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'REQUEST_ERROR'
  | 'TRANSPORT_ERROR'
  | 'MISSING_FIELD'
  | 'MISSING_FREQUENCY'
  | 'INVALID_RESPONSE'
  | 'UNKNOWN_WEATHER_CODE';

/**
 * Additional structured information attached to an error
 */
export interface ErrorDetails {
  parameter?: string;
  received?: unknown;
  allowed?: readonly unknown[];
  requestId?: string;
  [key: string]: unknown;
}

/**
 * Response branch read by a single call
 */
export type Frequency = 'current' | 'hourly' | 'daily';

export type PeriodicFrequency = Exclude<Frequency, 'current'>;

/**
 * Primitive value accepted in a query string
 */
export type QueryValue = string | number | boolean;

/**
 * Flat query parameters for one GET request
 */
export type QueryParameters = Readonly<Record<string, QueryValue>>;

/**
 * A request against a data endpoint, tagged with the branch it targets
 */
export interface DataRequest {
  frequency: Frequency;
  /** Metric names in the order they were requested */
  metrics: readonly string[];
  params: QueryParameters;
}

/**
 * A single reading as it appears on the wire
 */
export type Scalar = number | string | null;

/**
 * Timestamp label: ISO-8601 string, or epoch seconds under `timeformat=unixtime`
 */
export type Timestamp = string | number;

/**
 * Storage representation for series values
 */
export type DType = 'float32' | 'float64' | 'int32' | 'uint8' | 'object';

export interface DTypeArrayMap {
  float32: Float32Array;
  float64: Float64Array;
  int32: Int32Array;
  uint8: Uint8Array;
  object: Scalar[];
}

export type IndexName = 'Date' | 'Datetime';

/**
 * Time-indexed values of one metric
 */
export interface Series<D extends DType = 'float32'> {
  /** Wire metric name */
  name: string;
  indexName: IndexName;
  index: Timestamp[];
  dtype: D;
  values: DTypeArrayMap[D];
}

/**
 * Time-indexed table with display-labeled columns
 */
export interface Table<L extends string = string> {
  indexName: IndexName;
  index: Timestamp[];
  /** Column labels in display order */
  columns: L[];
  /** Column values keyed by label, in display order */
  data: Map<L, TableColumn>;
}

/** One table column in any storage representation */
export type TableColumn = DTypeArrayMap[DType];

/**
 * Scalar readings keyed by display label, in requested order
 */
export type LabeledBundle<L extends string = string> = Map<L, Scalar>;
