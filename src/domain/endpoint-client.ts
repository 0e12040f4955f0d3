/**
 * Endpoint client
 *
 * Binds one data endpoint to an immutable base configuration and a
 * transport handle. Services hold one of these and delegate every
 * accessor to it: each call overlays a metric selection on the base
 * parameters, performs one GET and reshapes the body.
 */

import { getConfig } from '../config/env.js';
import { HttpClient } from './http-client.js';
import { logger, type Logger } from './logger.js';
import { buildDataRequest, mergeParams, verifyKeys } from './params.js';
import {
  extractScalar,
  extractScalarBundle,
  extractSeries,
  extractTable,
} from './reshaper.js';
import type {
  DataRequest,
  DType,
  LabeledBundle,
  PeriodicFrequency,
  QueryParameters,
  QueryValue,
  Scalar,
  Series,
  Table,
} from './types.js';
import { validateTimeout } from './validators.js';

export type ParameterOverlay = Readonly<Record<string, QueryValue | undefined>>;

export interface EndpointClientOptions {
  /** Absolute endpoint URL */
  url: string;
  /** Standing parameters: coordinates, horizon, date range, ... */
  baseParams: QueryParameters;
  /** Shared transport; when omitted the client creates and owns one */
  http?: HttpClient;
  /** Per-call timeout in milliseconds; null disables it */
  timeoutMs?: number | null;
}

export class EndpointClient {
  readonly url: string;
  readonly baseParams: QueryParameters;
  readonly timeoutMs: number | null;
  private readonly http: HttpClient;
  private readonly ownsHttp: boolean;
  private readonly log: Logger;

  constructor(options: EndpointClientOptions) {
    this.url = options.url;
    this.baseParams = mergeParams(options.baseParams);
    this.timeoutMs =
      options.timeoutMs === undefined ? getConfig().timeoutMs : validateTimeout(options.timeoutMs);
    this.ownsHttp = options.http === undefined;
    this.http = options.http ?? new HttpClient({ timeoutMs: this.timeoutMs });
    this.log = logger.child({ endpoint: this.url });
  }

  /**
   * Build the tagged request for one call without sending it
   */
  request(
    frequency: DataRequest['frequency'],
    metrics: readonly string[],
    extra: ParameterOverlay = {}
  ): DataRequest {
    return buildDataRequest(this.baseParams, { frequency, metrics }, extra);
  }

  /**
   * Send a request and return the decoded body
   */
  async fetch(request: DataRequest): Promise<unknown> {
    verifyKeys(request.params, ['latitude', 'longitude', request.frequency]);

    this.log.debug('Endpoint request', {
      frequency: request.frequency,
      metrics: request.metrics,
    });

    return this.http.getJson(this.url, request.params, { timeoutMs: this.timeoutMs });
  }

  async current(metric: string, extra?: ParameterOverlay): Promise<Scalar> {
    const request = this.request('current', [metric], extra);
    return extractScalar(await this.fetch(request), request);
  }

  async currentSummary<L extends string>(
    metrics: readonly string[],
    labels: readonly L[],
    extra?: ParameterOverlay
  ): Promise<LabeledBundle<L>> {
    const request = this.request('current', metrics, extra);
    return extractScalarBundle(await this.fetch(request), request, labels);
  }

  periodical(
    frequency: PeriodicFrequency,
    metric: string,
    extra?: ParameterOverlay
  ): Promise<Series<'float32'>>;
  periodical<D extends DType>(
    frequency: PeriodicFrequency,
    metric: string,
    extra: ParameterOverlay | undefined,
    dtype: D
  ): Promise<Series<D>>;
  async periodical(
    frequency: PeriodicFrequency,
    metric: string,
    extra?: ParameterOverlay,
    dtype: DType = 'float32'
  ): Promise<Series<DType>> {
    const request = this.request(frequency, [metric], extra);
    return extractSeries(await this.fetch(request), request, dtype);
  }

  async periodicalSummary<L extends string>(
    frequency: PeriodicFrequency,
    metrics: readonly string[],
    labels: readonly L[],
    extra?: ParameterOverlay
  ): Promise<Table<L>> {
    const request = this.request(frequency, metrics, extra);
    return extractTable(await this.fetch(request), request, labels);
  }

  /**
   * Release the transport if this client created it. Safe to call twice.
   */
  close(): void {
    if (this.ownsHttp) {
      this.http.close();
    }
  }
}
