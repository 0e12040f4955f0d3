/**
 * Marine weather service
 * Wave height, direction and period from the marine endpoint
 */

import { getConfig } from '../config/env.js';
import {
  DAILY_MARINE_SUMMARY_METRICS,
  MARINE_SUMMARY_LABELS,
  MARINE_SUMMARY_METRICS,
  MAX_FORECAST_DAYS,
  WAVE_TYPE_PREFIXES,
  WAVE_TYPES,
  type WaveType,
} from '../domain/constants.js';
import type { EndpointClient } from '../domain/endpoint-client.js';
import { mergeParams } from '../domain/params.js';
import { toNumericReading } from '../domain/reshaper.js';
import type { LabeledBundle, Series, Table } from '../domain/types.js';
import { validateChoice } from '../domain/validators.js';
import {
  createEndpoint,
  forecastParams,
  locationParams,
  type ForecastOptions,
} from './options.js';

export type MarineLabel = (typeof MARINE_SUMMARY_LABELS)[number];

export interface MarineWeatherOptions extends ForecastOptions {
  /** composite (all waves), wind (wind waves) or swell (default: composite) */
  waveType?: WaveType;
}

export class MarineWeather {
  readonly latitude: number;
  readonly longitude: number;
  readonly forecastDays: number;
  readonly waveType: WaveType;
  private readonly prefix: string;
  private readonly endpoint: EndpointClient;

  /**
   * @param options - forecastDays must be 1..8 (default 7)
   */
  constructor(latitude: number, longitude: number, options: MarineWeatherOptions = {}) {
    const location = locationParams(latitude, longitude, options);
    const horizon = forecastParams(options, MAX_FORECAST_DAYS.marine);

    this.latitude = latitude;
    this.longitude = longitude;
    this.forecastDays = horizon.forecast_days;
    this.waveType = validateChoice('wave_type', options.waveType ?? 'composite', WAVE_TYPES);
    this.prefix = WAVE_TYPE_PREFIXES[this.waveType];
    this.endpoint = createEndpoint(
      getConfig().endpoints.marine,
      mergeParams(location, horizon),
      options
    );
  }

  toString(): string {
    return `MarineWeather(latitude=${this.latitude}, longitude=${this.longitude}, waveType='${this.waveType}', forecastDays=${this.forecastDays})`;
  }

  close(): void {
    this.endpoint.close();
  }

  private metric(name: string): string {
    return `${this.prefix}${name}`;
  }

  private metrics(names: readonly string[]): string[] {
    return names.map((name) => this.metric(name));
  }

  async getCurrentSummary(): Promise<LabeledBundle<MarineLabel>> {
    return this.endpoint.currentSummary(this.metrics(MARINE_SUMMARY_METRICS), MARINE_SUMMARY_LABELS);
  }

  async getHourlySummary(): Promise<Table<MarineLabel>> {
    return this.endpoint.periodicalSummary(
      'hourly',
      this.metrics(MARINE_SUMMARY_METRICS),
      MARINE_SUMMARY_LABELS
    );
  }

  async getDailySummary(): Promise<Table<MarineLabel>> {
    return this.endpoint.periodicalSummary(
      'daily',
      this.metrics(DAILY_MARINE_SUMMARY_METRICS),
      MARINE_SUMMARY_LABELS
    );
  }

  /** Wave height in meters */
  async getCurrentWaveHeight(): Promise<number | null> {
    const metric = this.metric('wave_height');
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  /** Wave direction in degrees */
  async getCurrentWaveDirection(): Promise<number | null> {
    const metric = this.metric('wave_direction');
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  /** Wave period in seconds */
  async getCurrentWavePeriod(): Promise<number | null> {
    const metric = this.metric('wave_period');
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  async getHourlyWaveHeight(): Promise<Series> {
    return this.endpoint.periodical('hourly', this.metric('wave_height'));
  }

  async getHourlyWaveDirection(): Promise<Series> {
    return this.endpoint.periodical('hourly', this.metric('wave_direction'));
  }

  async getHourlyWavePeriod(): Promise<Series> {
    return this.endpoint.periodical('hourly', this.metric('wave_period'));
  }

  async getDailyMaxWaveHeight(): Promise<Series> {
    return this.endpoint.periodical('daily', this.metric('wave_height_max'));
  }

  async getDailyDominantWaveDirection(): Promise<Series> {
    return this.endpoint.periodical('daily', this.metric('wave_direction_dominant'));
  }

  async getDailyMaxWavePeriod(): Promise<Series> {
    return this.endpoint.periodical('daily', this.metric('wave_period_max'));
  }
}
