/**
 * Weather forecast service
 * Current, hourly and daily conditions from the forecast endpoint
 */

import { getConfig } from '../config/env.js';
import {
  CURRENT_WEATHER_SUMMARY_LABELS,
  CURRENT_WEATHER_SUMMARY_METRICS,
  DAILY_STATISTICS,
  DAILY_WEATHER_SUMMARY_LABELS,
  DAILY_WEATHER_SUMMARY_METRICS,
  HOURLY_WEATHER_SUMMARY_LABELS,
  HOURLY_WEATHER_SUMMARY_METRICS,
  MAX_FORECAST_DAYS,
  PRESSURE_LEVEL_METRICS,
  SOIL_MOISTURE_DEPTH_BUCKETS,
  SOIL_TEMPERATURE_DEPTHS,
  TEMPERATURE_ALTITUDES,
  WIND_ALTITUDES,
  type CloudCoverLevel,
  type DailyStatistic,
  type PrecipitationUnit,
  type PressureLevel,
  type SoilTemperatureDepth,
  type TemperatureAltitude,
  type TemperatureUnit,
  type WindAltitude,
  type WindSpeedUnit,
} from '../domain/constants.js';
import type { EndpointClient } from '../domain/endpoint-client.js';
import { UnknownWeatherCodeError } from '../domain/errors.js';
import { mergeParams } from '../domain/params.js';
import {
  deriveWeatherCodeDescription,
  describeWeatherCode,
  toNumericReading,
} from '../domain/reshaper.js';
import type { LabeledBundle, PeriodicFrequency, Series, Table } from '../domain/types.js';
import {
  resolveDepthRange,
  validateChoice,
  validateCloudCoverLevel,
  validateFrequency,
  validatePrecipitationUnit,
  validatePressureLevel,
  validateTemperatureUnit,
  validateUnits,
  validateWindSpeedUnit,
} from '../domain/validators.js';
import { WEATHER_CODES } from '../domain/weather-codes.js';
import {
  createEndpoint,
  forecastParams,
  locationParams,
  unitParams,
  type ForecastOptions,
} from './options.js';

export type CurrentWeatherLabel = (typeof CURRENT_WEATHER_SUMMARY_LABELS)[number];
export type HourlyWeatherLabel = (typeof HOURLY_WEATHER_SUMMARY_LABELS)[number];
export type DailyWeatherLabel = (typeof DAILY_WEATHER_SUMMARY_LABELS)[number];

export interface WeatherCodeReading {
  code: number;
  description: string;
}

export class Weather {
  readonly latitude: number;
  readonly longitude: number;
  readonly forecastDays: number;
  readonly pastDays: number;
  private readonly endpoint: EndpointClient;

  /**
   * @param options - forecastDays must be 1..16 (default 7)
   */
  constructor(latitude: number, longitude: number, options: ForecastOptions = {}) {
    const location = locationParams(latitude, longitude, options);
    const horizon = forecastParams(options, MAX_FORECAST_DAYS.forecast);

    this.latitude = latitude;
    this.longitude = longitude;
    this.forecastDays = horizon.forecast_days;
    this.pastDays = horizon.past_days;
    this.endpoint = createEndpoint(
      getConfig().endpoints.forecast,
      mergeParams(location, horizon),
      options
    );
  }

  toString(): string {
    return `Weather(latitude=${this.latitude}, longitude=${this.longitude}, forecastDays=${this.forecastDays})`;
  }

  close(): void {
    this.endpoint.close();
  }

  async getCurrentSummary(
    temperatureUnit: TemperatureUnit = 'celsius',
    precipitationUnit: PrecipitationUnit = 'mm',
    windSpeedUnit: WindSpeedUnit = 'kmh'
  ): Promise<LabeledBundle<CurrentWeatherLabel>> {
    const units = validateUnits(temperatureUnit, precipitationUnit, windSpeedUnit);
    return this.endpoint.currentSummary(
      CURRENT_WEATHER_SUMMARY_METRICS,
      CURRENT_WEATHER_SUMMARY_LABELS,
      unitParams(units)
    );
  }

  async getHourlySummary(
    temperatureUnit: TemperatureUnit = 'celsius',
    precipitationUnit: PrecipitationUnit = 'mm',
    windSpeedUnit: WindSpeedUnit = 'kmh'
  ): Promise<Table<HourlyWeatherLabel>> {
    const units = validateUnits(temperatureUnit, precipitationUnit, windSpeedUnit);
    return this.endpoint.periodicalSummary(
      'hourly',
      HOURLY_WEATHER_SUMMARY_METRICS,
      HOURLY_WEATHER_SUMMARY_LABELS,
      unitParams(units)
    );
  }

  async getDailySummary(
    temperatureUnit: TemperatureUnit = 'celsius',
    precipitationUnit: PrecipitationUnit = 'mm',
    windSpeedUnit: WindSpeedUnit = 'kmh'
  ): Promise<Table<DailyWeatherLabel>> {
    const units = validateUnits(temperatureUnit, precipitationUnit, windSpeedUnit);
    return this.endpoint.periodicalSummary(
      'daily',
      DAILY_WEATHER_SUMMARY_METRICS,
      DAILY_WEATHER_SUMMARY_LABELS,
      unitParams(units)
    );
  }

  // Current conditions

  async getCurrentTemperature(
    altitude: TemperatureAltitude = 2,
    unit: TemperatureUnit = 'celsius'
  ): Promise<number | null> {
    validateChoice('altitude', altitude, TEMPERATURE_ALTITUDES);
    const metric = `temperature_${altitude}m`;
    const value = await this.endpoint.current(metric, {
      temperature_unit: validateTemperatureUnit(unit),
    });
    return toNumericReading(value, metric);
  }

  async getCurrentApparentTemperature(unit: TemperatureUnit = 'celsius'): Promise<number | null> {
    const value = await this.endpoint.current('apparent_temperature', {
      temperature_unit: validateTemperatureUnit(unit),
    });
    return toNumericReading(value, 'apparent_temperature');
  }

  /**
   * Current weather code with its description
   */
  async getCurrentWeatherCode(): Promise<WeatherCodeReading> {
    const code = toNumericReading(await this.endpoint.current('weather_code'), 'weather_code');
    if (code === null) {
      throw new UnknownWeatherCodeError(code);
    }
    return { code, description: describeWeatherCode(code, WEATHER_CODES) };
  }

  async getCurrentWindSpeed(
    altitude: WindAltitude = 10,
    unit: WindSpeedUnit = 'kmh'
  ): Promise<number | null> {
    validateChoice('altitude', altitude, WIND_ALTITUDES);
    const metric = `wind_speed_${altitude}m`;
    const value = await this.endpoint.current(metric, {
      wind_speed_unit: validateWindSpeedUnit(unit),
    });
    return toNumericReading(value, metric);
  }

  async getCurrentWindDirection(altitude: WindAltitude = 10): Promise<number | null> {
    validateChoice('altitude', altitude, WIND_ALTITUDES);
    const metric = `wind_direction_${altitude}m`;
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  /** Wind gusts at 10 m */
  async getCurrentWindGusts(unit: WindSpeedUnit = 'kmh'): Promise<number | null> {
    const value = await this.endpoint.current('wind_gusts_10m', {
      wind_speed_unit: validateWindSpeedUnit(unit),
    });
    return toNumericReading(value, 'wind_gusts_10m');
  }

  async getCurrentRelativeHumidity(): Promise<number | null> {
    const metric = 'relative_humidity_2m';
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  async getCurrentPrecipitation(unit: PrecipitationUnit = 'mm'): Promise<number | null> {
    const value = await this.endpoint.current('precipitation', {
      precipitation_unit: validatePrecipitationUnit(unit),
    });
    return toNumericReading(value, 'precipitation');
  }

  /** Rain from large-scale systems, excluding showers */
  async getCurrentRainfall(unit: PrecipitationUnit = 'mm'): Promise<number | null> {
    const value = await this.endpoint.current('rain', {
      precipitation_unit: validatePrecipitationUnit(unit),
    });
    return toNumericReading(value, 'rain');
  }

  /** Snowfall in centimeters */
  async getCurrentSnowfall(): Promise<number | null> {
    return toNumericReading(await this.endpoint.current('snowfall'), 'snowfall');
  }

  async getCurrentPressure(level: PressureLevel = 'surface'): Promise<number | null> {
    const metric = PRESSURE_LEVEL_METRICS[validatePressureLevel(level)];
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  async getCurrentTotalCloudCover(): Promise<number | null> {
    return toNumericReading(await this.endpoint.current('cloud_cover'), 'cloud_cover');
  }

  async getCurrentCloudCover(level: CloudCoverLevel = 'low'): Promise<number | null> {
    const metric = `cloud_cover_${validateCloudCoverLevel(level)}`;
    return toNumericReading(await this.endpoint.current(metric), metric);
  }

  async getCurrentVisibility(): Promise<number | null> {
    return toNumericReading(await this.endpoint.current('visibility'), 'visibility');
  }

  /**
   * Whether the sun is up at the location right now; null when the
   * endpoint has no reading
   */
  async isDay(): Promise<boolean | null> {
    const reading = toNumericReading(await this.endpoint.current('is_day'), 'is_day');
    return reading === null ? null : reading === 1;
  }

  // Hourly series

  async getHourlyTemperature(
    altitude: TemperatureAltitude = 2,
    unit: TemperatureUnit = 'celsius'
  ): Promise<Series> {
    validateChoice('altitude', altitude, TEMPERATURE_ALTITUDES);
    return this.endpoint.periodical('hourly', `temperature_${altitude}m`, {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  async getHourlyRelativeHumidity(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'relative_humidity_2m');
  }

  async getHourlyDewPoint(unit: TemperatureUnit = 'celsius'): Promise<Series> {
    return this.endpoint.periodical('hourly', 'dew_point_2m', {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  async getHourlyPrecipitationProbability(): Promise<Series> {
    return this.endpoint.periodical('hourly', 'precipitation_probability');
  }

  async getHourlyPrecipitation(unit: PrecipitationUnit = 'mm'): Promise<Series> {
    return this.endpoint.periodical('hourly', 'precipitation', {
      precipitation_unit: validatePrecipitationUnit(unit),
    });
  }

  async getHourlyPressure(level: PressureLevel = 'surface'): Promise<Series> {
    return this.endpoint.periodical('hourly', PRESSURE_LEVEL_METRICS[validatePressureLevel(level)]);
  }

  async getHourlyCloudCover(level: CloudCoverLevel = 'low'): Promise<Series> {
    return this.endpoint.periodical(
      'hourly',
      `cloud_cover_${validateCloudCoverLevel(level)}`
    );
  }

  async getHourlyWindSpeed(
    altitude: WindAltitude = 10,
    unit: WindSpeedUnit = 'kmh'
  ): Promise<Series> {
    validateChoice('altitude', altitude, WIND_ALTITUDES);
    return this.endpoint.periodical('hourly', `wind_speed_${altitude}m`, {
      wind_speed_unit: validateWindSpeedUnit(unit),
    });
  }

  async getHourlyWindGusts(unit: WindSpeedUnit = 'kmh'): Promise<Series> {
    return this.endpoint.periodical('hourly', 'wind_gusts_10m', {
      wind_speed_unit: validateWindSpeedUnit(unit),
    });
  }

  async getHourlyWindDirection(altitude: WindAltitude = 10): Promise<Series> {
    validateChoice('altitude', altitude, WIND_ALTITUDES);
    return this.endpoint.periodical('hourly', `wind_direction_${altitude}m`);
  }

  /**
   * Visibility in meters, stored as 32-bit integers
   */
  async getHourlyVisibility(): Promise<Series<'int32'>> {
    return this.endpoint.periodical('hourly', 'visibility', undefined, 'int32');
  }

  /**
   * @param depth - Centimeters below ground: 0, 6, 18 or 54
   */
  async getHourlySoilTemperature(
    depth: SoilTemperatureDepth = 0,
    unit: TemperatureUnit = 'celsius'
  ): Promise<Series> {
    validateChoice('depth', depth, SOIL_TEMPERATURE_DEPTHS);
    return this.endpoint.periodical('hourly', `soil_temperature_${depth}cm`, {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  /**
   * Soil moisture of the layer containing `depth` (centimeters, 0..81)
   */
  async getHourlySoilMoisture(depth = 7): Promise<Series> {
    const range = resolveDepthRange(depth, SOIL_MOISTURE_DEPTH_BUCKETS);
    return this.endpoint.periodical('hourly', `soil_moisture_${range}cm`);
  }

  /**
   * Weather codes at the given frequency, with their descriptions
   */
  async getPeriodicalWeatherCode(
    frequency: PeriodicFrequency = 'daily'
  ): Promise<Table<'code' | 'description'>> {
    const series = await this.endpoint.periodical(
      validateFrequency(frequency),
      'weather_code',
      undefined,
      'uint8'
    );
    return deriveWeatherCodeDescription(series, WEATHER_CODES);
  }

  // Daily series

  async getDailyTemperature(
    statistic: DailyStatistic = 'mean',
    unit: TemperatureUnit = 'celsius'
  ): Promise<Series> {
    const metric = `temperature_2m_${validateChoice('statistic', statistic, DAILY_STATISTICS)}`;
    return this.endpoint.periodical('daily', metric, {
      temperature_unit: validateTemperatureUnit(unit),
    });
  }

  async getDailyMaxWindSpeed(unit: WindSpeedUnit = 'kmh'): Promise<Series> {
    return this.endpoint.periodical('daily', 'wind_speed_10m_max', {
      wind_speed_unit: validateWindSpeedUnit(unit),
    });
  }

  async getDailyTotalPrecipitation(unit: PrecipitationUnit = 'mm'): Promise<Series> {
    return this.endpoint.periodical('daily', 'precipitation_sum', {
      precipitation_unit: validatePrecipitationUnit(unit),
    });
  }

  /**
   * Sunrise times as ISO-8601 strings (or epoch seconds under unixtime)
   */
  async getDailySunriseTime(): Promise<Series<'object'>> {
    return this.endpoint.periodical('daily', 'sunrise', undefined, 'object');
  }

  async getDailySunsetTime(): Promise<Series<'object'>> {
    return this.endpoint.periodical('daily', 'sunset', undefined, 'object');
  }

  /** Daylight duration in seconds */
  async getDailyDaylightDuration(): Promise<Series> {
    return this.endpoint.periodical('daily', 'daylight_duration');
  }

  async getDailyMaxUvIndex(): Promise<Series> {
    return this.endpoint.periodical('daily', 'uv_index_max');
  }

  async getDailyMaxPrecipitationProbability(): Promise<Series> {
    return this.endpoint.periodical('daily', 'precipitation_probability_max');
  }

  /** Sunshine duration in seconds */
  async getDailySunshineDuration(): Promise<Series> {
    return this.endpoint.periodical('daily', 'sunshine_duration');
  }

  /** Shortwave radiation sum in MJ/m² */
  async getDailyShortwaveRadiationSum(): Promise<Series> {
    return this.endpoint.periodical('daily', 'shortwave_radiation_sum');
  }
}
