/**
 * Static tables shared by validators and services
 */

export const FORECAST_API = 'https://api.open-meteo.com/v1/forecast';
export const ARCHIVE_API = 'https://archive-api.open-meteo.com/v1/archive';
export const MARINE_API = 'https://marine-api.open-meteo.com/v1/marine';
export const AIR_QUALITY_API = 'https://air-quality-api.open-meteo.com/v1/air-quality';
export const GEOCODING_API = 'https://geocoding-api.open-meteo.com/v1/search';
export const ELEVATION_API = 'https://api.open-meteo.com/v1/elevation';

export const DEFAULT_TIMEOUT_MS = 30_000;

/** Longest delay a timer accepts; larger ones fire at once */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const MAX_PAST_DAYS = 92;
export const DEFAULT_PAST_DAYS = 0;
export const DEFAULT_FORECAST_DAYS = 7;

export const MAX_FORECAST_DAYS = {
  forecast: 16,
  marine: 8,
  airQuality: 7,
} as const;

export const MAX_CITY_RESULTS = 20;

export const TIME_FORMATS = ['iso8601', 'unixtime'] as const;
export type TimeFormat = (typeof TIME_FORMATS)[number];

export const FREQUENCIES = ['hourly', 'daily'] as const;

export const TEMPERATURE_UNITS = ['celsius', 'fahrenheit'] as const;
export type TemperatureUnit = (typeof TEMPERATURE_UNITS)[number];

export const PRECIPITATION_UNITS = ['mm', 'inch'] as const;
export type PrecipitationUnit = (typeof PRECIPITATION_UNITS)[number];

export const WIND_SPEED_UNITS = ['kmh', 'mph', 'ms', 'kn'] as const;
export type WindSpeedUnit = (typeof WIND_SPEED_UNITS)[number];

export const CLOUD_COVER_LEVELS = ['low', 'mid', 'high'] as const;
export type CloudCoverLevel = (typeof CLOUD_COVER_LEVELS)[number];

export const PRESSURE_LEVELS = ['surface', 'sealevel'] as const;
export type PressureLevel = (typeof PRESSURE_LEVELS)[number];

export const PRESSURE_LEVEL_METRICS: Record<PressureLevel, string> = {
  surface: 'surface_pressure',
  sealevel: 'pressure_msl',
};

export const TEMPERATURE_ALTITUDES = [2, 80, 120, 180] as const;
export type TemperatureAltitude = (typeof TEMPERATURE_ALTITUDES)[number];

export const WIND_ALTITUDES = [10, 80, 120, 180] as const;
export type WindAltitude = (typeof WIND_ALTITUDES)[number];

export const ARCHIVE_WIND_ALTITUDES = [10, 100] as const;
export type ArchiveWindAltitude = (typeof ARCHIVE_WIND_ALTITUDES)[number];

export const SOIL_TEMPERATURE_DEPTHS = [0, 6, 18, 54] as const;
export type SoilTemperatureDepth = (typeof SOIL_TEMPERATURE_DEPTHS)[number];

export const DAILY_STATISTICS = ['max', 'min', 'mean'] as const;
export type DailyStatistic = (typeof DAILY_STATISTICS)[number];

export const AQI_SOURCES = ['european', 'us'] as const;
export type AqiSource = (typeof AQI_SOURCES)[number];

export const GASES = ['ozone', 'carbon_monoxide', 'nitrogen_dioxide', 'sulphur_dioxide'] as const;
export type Gas = (typeof GASES)[number];

export const PLANTS = ['alder', 'birch', 'grass', 'mugwort', 'olive', 'ragweed'] as const;
export type Plant = (typeof PLANTS)[number];

export const WAVE_TYPES = ['composite', 'wind', 'swell'] as const;
export type WaveType = (typeof WAVE_TYPES)[number];

/** Metric name prefix per wave type */
export const WAVE_TYPE_PREFIXES: Record<WaveType, string> = {
  composite: '',
  wind: 'wind_',
  swell: 'swell_',
};

/**
 * A half-open centimeter range [from, to) and its wire label
 */
export interface DepthBucket {
  from: number;
  to: number;
  label: string;
}

export const ARCHIVE_SOIL_DEPTH_BUCKETS: readonly DepthBucket[] = [
  { from: 0, to: 7, label: '0_to_7' },
  { from: 7, to: 28, label: '7_to_28' },
  { from: 28, to: 100, label: '28_to_100' },
  { from: 100, to: 256, label: '100_to_255' },
];

export const SOIL_MOISTURE_DEPTH_BUCKETS: readonly DepthBucket[] = [
  { from: 0, to: 1, label: '0_to_1' },
  { from: 1, to: 3, label: '1_to_3' },
  { from: 3, to: 9, label: '3_to_9' },
  { from: 9, to: 27, label: '9_to_27' },
  { from: 27, to: 82, label: '27_to_81' },
];

export interface AqiLevel {
  max: number;
  description: string;
}

/** Upper bounds are inclusive */
export const AQI_LEVELS: readonly AqiLevel[] = [
  { max: 50, description: 'Good' },
  { max: 100, description: 'Moderate' },
  { max: 150, description: 'Slight Unhealthy' },
  { max: 200, description: 'Unhealthy' },
  { max: 300, description: 'Very Unhealthy' },
  { max: 500, description: 'Hazardous' },
];

// Summary requests: wire metric names and their display labels, index-aligned.

export const CURRENT_WEATHER_SUMMARY_METRICS = [
  'temperature_2m',
  'relative_humidity_2m',
  'precipitation',
  'weather_code',
  'cloud_cover',
  'surface_pressure',
  'wind_speed_10m',
  'wind_direction_10m',
] as const;

export const CURRENT_WEATHER_SUMMARY_LABELS = [
  'temperature',
  'relative_humidity',
  'precipitation',
  'weather_code',
  'cloud_cover',
  'surface_pressure',
  'wind_speed',
  'wind_direction',
] as const;

export const HOURLY_WEATHER_SUMMARY_METRICS = [
  'temperature_2m',
  'relative_humidity_2m',
  'dew_point_2m',
  'precipitation',
  'weather_code',
  'surface_pressure',
  'cloud_cover',
  'visibility',
  'wind_speed_10m',
  'soil_temperature_0cm',
] as const;

export const HOURLY_WEATHER_SUMMARY_LABELS = [
  'temperature',
  'relative_humidity',
  'dew_point',
  'precipitation',
  'weather_code',
  'surface_pressure',
  'cloud_cover',
  'visibility',
  'wind_speed',
  'soil_temperature',
] as const;

export const DAILY_WEATHER_SUMMARY_METRICS = [
  'weather_code',
  'temperature_2m_mean',
  'daylight_duration',
  'uv_index_max',
  'precipitation_sum',
  'wind_speed_10m_mean',
  'wind_direction_10m_dominant',
] as const;

export const DAILY_WEATHER_SUMMARY_LABELS = [
  'weather_code',
  'temperature',
  'daylight_duration',
  'uv_index',
  'precipitation',
  'wind_speed',
  'wind_direction',
] as const;

export const MARINE_SUMMARY_METRICS = ['wave_height', 'wave_direction', 'wave_period'] as const;

export const DAILY_MARINE_SUMMARY_METRICS = [
  'wave_height_max',
  'wave_direction_dominant',
  'wave_period_max',
] as const;

export const MARINE_SUMMARY_LABELS = ['wave_height', 'wave_direction', 'wave_period'] as const;

export const CURRENT_AIR_QUALITY_SUMMARY_METRICS = [
  'european_aqi',
  'us_aqi',
  'pm10',
  'pm2_5',
  'carbon_monoxide',
  'nitrogen_dioxide',
  'sulphur_dioxide',
  'ozone',
  'dust',
  'uv_index',
  'ammonia',
] as const;

export const HOURLY_AIR_QUALITY_SUMMARY_METRICS = [
  'pm10',
  'pm2_5',
  'carbon_monoxide',
  'nitrogen_dioxide',
  'sulphur_dioxide',
  'ozone',
  'dust',
  'uv_index',
  'ammonia',
] as const;

export const HOURLY_ARCHIVE_SUMMARY_METRICS = [
  'temperature_2m',
  'relative_humidity_2m',
  'dew_point_2m',
  'precipitation',
  'weather_code',
  'surface_pressure',
  'wind_speed_10m',
  'soil_temperature_0_to_7cm',
] as const;

export const HOURLY_ARCHIVE_SUMMARY_LABELS = [
  'temperature',
  'relative_humidity',
  'dew_point',
  'precipitation',
  'weather_code',
  'surface_pressure',
  'wind_speed',
  'soil_temperature',
] as const;

export const DAILY_ARCHIVE_SUMMARY_METRICS = [
  'weather_code',
  'temperature_2m_mean',
  'daylight_duration',
  'precipitation_sum',
  'wind_speed_10m_mean',
  'wind_direction_10m_dominant',
] as const;

export const DAILY_ARCHIVE_SUMMARY_LABELS = [
  'weather_code',
  'temperature',
  'daylight_duration',
  'precipitation',
  'wind_speed',
  'wind_direction',
] as const;
