/**
 * Air quality service
 * AQI, pollutant and pollen readings from the air-quality endpoint
 */

import { getConfig } from '../config/env.js';
import {
  AQI_SOURCES,
  CURRENT_AIR_QUALITY_SUMMARY_METRICS,
  GASES,
  HOURLY_AIR_QUALITY_SUMMARY_METRICS,
  MAX_FORECAST_DAYS,
  PLANTS,
  type AqiSource,
  type Gas,
  type Plant,
} from '../domain/constants.js';
import type { EndpointClient } from '../domain/endpoint-client.js';
import { mergeParams } from '../domain/params.js';
import { toNumericReading } from '../domain/reshaper.js';
import type { LabeledBundle, Series, Table } from '../domain/types.js';
import { describeAqi, validateChoice } from '../domain/validators.js';
import {
  createEndpoint,
  forecastParams,
  locationParams,
  type ForecastOptions,
} from './options.js';

export type CurrentAirQualityLabel = (typeof CURRENT_AIR_QUALITY_SUMMARY_METRICS)[number];
export type HourlyAirQualityLabel = (typeof HOURLY_AIR_QUALITY_SUMMARY_METRICS)[number];

export interface AqiReading {
  value: number;
  level: string;
}

export class AirQuality {
  readonly latitude: number;
  readonly longitude: number;
  readonly forecastDays: number;
  private readonly endpoint: EndpointClient;

  /**
   * @param options - forecastDays must be 1..7 (default 7)
   */
  constructor(latitude: number, longitude: number, options: ForecastOptions = {}) {
    const location = locationParams(latitude, longitude, options);
    const horizon = forecastParams(options, MAX_FORECAST_DAYS.airQuality);

    this.latitude = latitude;
    this.longitude = longitude;
    this.forecastDays = horizon.forecast_days;
    this.endpoint = createEndpoint(
      getConfig().endpoints.airQuality,
      mergeParams(location, horizon),
      options
    );
  }

  toString(): string {
    return `AirQuality(latitude=${this.latitude}, longitude=${this.longitude}, forecastDays=${this.forecastDays})`;
  }

  close(): void {
    this.endpoint.close();
  }

  async getCurrentSummary(): Promise<LabeledBundle<CurrentAirQualityLabel>> {
    return this.endpoint.currentSummary(
      CURRENT_AIR_QUALITY_SUMMARY_METRICS,
      CURRENT_AIR_QUALITY_SUMMARY_METRICS
    );
  }

  async getHourlySummary(): Promise<Table<HourlyAirQualityLabel>> {
    return this.endpoint.periodicalSummary(
      'hourly',
      HOURLY_AIR_QUALITY_SUMMARY_METRICS,
      HOURLY_AIR_QUALITY_SUMMARY_METRICS
    );
  }

  private async currentReading(metric: string): Promise<number | null> {
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  /**
   * @param source - european (EAQI) or us (US AQI)
   */
  async getCurrentAqi(source: AqiSource = 'european'): Promise<number | null> {
    return this.currentReading(`${validateChoice('source', source, AQI_SOURCES)}_aqi`);
  }

  /**
   * US AQI with its health level, or null when the endpoint has no reading
   */
  async getCurrentAqiLevel(): Promise<AqiReading | null> {
    const value = await this.getCurrentAqi('us');
    if (value === null) {
      return null;
    }
    return { value, level: describeAqi(value) };
  }

  /** Gas concentration in μg/m³ */
  async getCurrentGasConcentration(gas: Gas = 'ozone'): Promise<number | null> {
    return this.currentReading(validateChoice('gas', gas, GASES));
  }

  /** Pollen concentration in grains/m³ */
  async getCurrentPollenConcentration(plant: Plant = 'grass'): Promise<number | null> {
    return this.currentReading(`${validateChoice('plant', plant, PLANTS)}_pollen`);
  }

  /** Ammonia concentration in μg/m³; Europe only */
  async getCurrentAmmonia(): Promise<number | null> {
    return this.currentReading('ammonia');
  }

  async getCurrentAerosolOpticalDepth(): Promise<number | null> {
    return this.currentReading('aerosol_optical_depth');
  }

  async getCurrentPm2p5(): Promise<number | null> {
    return this.currentReading('pm2_5');
  }

  async getCurrentPm10(): Promise<number | null> {
    return this.currentReading('pm10');
  }

  async getCurrentDust(): Promise<number | null> {
    return this.currentReading('dust');
  }

  async getCurrentUvIndex(): Promise<number | null> {
    return this.currentReading('uv_index');
  }

  async getHourlyGasConcentration(gas: Gas = 'ozone'): Promise<Series> {
    return this.endpoint.periodical('hourly', validateChoice('gas', gas, GASES));
  }

  async getHourlyPollenConcentration(plant: Plant = 'grass'): Promise<Series> {
    return this.endpoint.periodical('hourly', `${validateChoice('plant', plant, PLANTS)}_pollen`);
  }

  async getHourlyAmmonia(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'ammonia');
  }

  async getHourlyAerosolOpticalDepth(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'aerosol_optical_depth');
  }

  async getHourlyPm2p5(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'pm2_5');
  }

  async getHourlyPm10(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'pm10');
  }

  async getHourlyDust(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'dust');
  }

  async getHourlyUvIndex(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'uv_index');
  }
}
