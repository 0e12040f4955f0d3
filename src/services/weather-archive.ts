/**
 * Historical weather service
 * Reanalysis data for a fixed date range from the archive endpoint
 */

import { getConfig } from '../config/env.js';
import {
  ARCHIVE_SOIL_DEPTH_BUCKETS,
  ARCHIVE_WIND_ALTITUDES,
  DAILY_ARCHIVE_SUMMARY_LABELS,
  DAILY_ARCHIVE_SUMMARY_METRICS,
  DAILY_STATISTICS,
  HOURLY_ARCHIVE_SUMMARY_LABELS,
  HOURLY_ARCHIVE_SUMMARY_METRICS,
  type ArchiveWindAltitude,
  type DailyStatistic,
  type PrecipitationUnit,
  type TemperatureUnit,
  type WindSpeedUnit,
} from '../domain/constants.js';
import type { EndpointClient } from '../domain/endpoint-client.js';
import { mergeParams } from '../domain/params.js';
import { deriveWeatherCodeDescription } from '../domain/reshaper.js';
import type { Series, Table } from '../domain/types.js';
import {
  formatIsoDate,
  resolveDateRange,
  resolveDepthRange,
  validateChoice,
  validateTemperatureUnit,
  validateUnits,
  validateWindSpeedUnit,
} from '../domain/validators.js';
import { WEATHER_CODES } from '../domain/weather-codes.js';
import { createEndpoint, locationParams, unitParams, type ServiceOptions } from './options.js';

export type HourlyArchiveLabel = (typeof HOURLY_ARCHIVE_SUMMARY_LABELS)[number];
export type DailyArchiveLabel = (typeof DAILY_ARCHIVE_SUMMARY_LABELS)[number];

/** A calendar date as YYYY-MM-DD or a Date (its local calendar date is used) */
export type DateInput = string | Date;

export class WeatherArchive {
  readonly latitude: number;
  readonly longitude: number;
  /** YYYY-MM-DD */
  readonly startDate: string;
  /** YYYY-MM-DD */
  readonly endDate: string;
  private readonly endpoint: EndpointClient;

  /**
   * @param startDate - First day of the range; not in the future
   * @param endDate - Last day of the range; not before startDate
   */
  constructor(
    latitude: number,
    longitude: number,
    startDate: DateInput,
    endDate: DateInput,
    options: ServiceOptions = {}
  ) {
    const location = locationParams(latitude, longitude, options);
    const range = resolveDateRange(startDate, endDate);

    this.latitude = latitude;
    this.longitude = longitude;
    this.startDate = formatIsoDate(range.startDate);
    this.endDate = formatIsoDate(range.endDate);
    this.endpoint = createEndpoint(
      getConfig().endpoints.archive,
      mergeParams(location, { start_date: this.startDate, end_date: this.endDate }),
      options
    );
  }

  toString(): string {
    return `WeatherArchive(latitude=${this.latitude}, longitude=${this.longitude}, startDate='${this.startDate}', endDate='${this.endDate}')`;
  }

  close(): void {
    this.endpoint.close();
  }

  async getHourlySummary(
    temperatureUnit: TemperatureUnit = 'celsius',
    precipitationUnit: PrecipitationUnit = 'mm',
    windSpeedUnit: WindSpeedUnit = 'kmh'
  ): Promise<Table<HourlyArchiveLabel>> {
    const units = validateUnits(temperatureUnit, precipitationUnit, windSpeedUnit);
    return this.endpoint.periodicalSummary(
      'hourly',
      HOURLY_ARCHIVE_SUMMARY_METRICS,
      HOURLY_ARCHIVE_SUMMARY_LABELS,
      unitParams(units)
    );
  }

  async getDailySummary(
    temperatureUnit: TemperatureUnit = 'celsius',
    precipitationUnit: PrecipitationUnit = 'mm',
    windSpeedUnit: WindSpeedUnit = 'kmh'
  ): Promise<Table<DailyArchiveLabel>> {
    const units = validateUnits(temperatureUnit, precipitationUnit, windSpeedUnit);
    return this.endpoint.periodicalSummary(
      'daily',
      DAILY_ARCHIVE_SUMMARY_METRICS,
      DAILY_ARCHIVE_SUMMARY_LABELS,
      unitParams(units)
    );
  }

  async getHourlyTemperature(unit: TemperatureUnit = 'celsius'): Promise<Series> {
    return this.endpoint.periodical('hourly', 'temperature_2m', {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  async getHourlyWindSpeed(
    altitude: ArchiveWindAltitude = 10,
    unit: WindSpeedUnit = 'kmh'
  ): Promise<Series> {
    validateChoice('altitude', altitude, ARCHIVE_WIND_ALTITUDES);
    return this.endpoint.periodical('hourly', `wind_speed_${altitude}m`, {
      wind_speed_unit: validateWindSpeedUnit(unit),
    });
  }

  async getHourlyWindDirection(altitude: ArchiveWindAltitude = 10): Promise<Series> {
    validateChoice('altitude', altitude, ARCHIVE_WIND_ALTITUDES);
    return this.endpoint.periodical('hourly', `wind_direction_${altitude}m`);
  }

  /**
   * Soil temperature of the layer containing `depth` (centimeters, 0..255)
   */
  async getHourlySoilTemperature(
    depth = 0,
    unit: TemperatureUnit = 'celsius'
  ): Promise<Series> {
    const range = resolveDepthRange(depth, ARCHIVE_SOIL_DEPTH_BUCKETS);
    return this.endpoint.periodical('hourly', `soil_temperature_${range}cm`, {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  /**
   * Soil moisture of the layer containing `depth` (centimeters, 0..255)
   */
  async getHourlySoilMoisture(depth = 0): Promise<Series> {
    const range = resolveDepthRange(depth, ARCHIVE_SOIL_DEPTH_BUCKETS);
    return this.endpoint.periodical('hourly', `soil_moisture_${range}cm`);
  }

  async getDailyTemperature(
    statistic: DailyStatistic = 'mean',
    unit: TemperatureUnit = 'celsius'
  ): Promise<Series> {
    const metric = `temperature_2m_${validateChoice('statistic', statistic, DAILY_STATISTICS)}`;
    return this.endpoint.periodical('daily', metric, {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  async getDailyWeatherCode(): Promise<Table<'code' | 'description'>> {
    const series = await this.endpoint.periodical('daily', 'weather_code', undefined, 'uint8');
    return deriveWeatherCodeDescription(series, WEATHER_CODES);
  }
}
