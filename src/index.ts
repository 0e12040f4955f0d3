/**
 * meteotab
 * Typed client for Open-Meteo style weather endpoints
 */

export { Weather } from './services/weather.js';
export type {
  CurrentWeatherLabel,
  DailyWeatherLabel,
  HourlyWeatherLabel,
  WeatherCodeReading,
} from './services/weather.js';
export { MarineWeather } from './services/marine-weather.js';
export type { MarineLabel, MarineWeatherOptions } from './services/marine-weather.js';
export { AirQuality } from './services/air-quality.js';
export type {
  AqiReading,
  CurrentAirQualityLabel,
  HourlyAirQualityLabel,
} from './services/air-quality.js';
export { WeatherArchive } from './services/weather-archive.js';
export type {
  DailyArchiveLabel,
  DateInput,
  HourlyArchiveLabel,
} from './services/weather-archive.js';
export { getCityDetails, getElevation } from './services/locations.js';
export type { LookupOptions } from './services/locations.js';
export type { ForecastOptions, ServiceOptions } from './services/options.js';

export { EndpointClient } from './domain/endpoint-client.js';
export type { EndpointClientOptions, ParameterOverlay } from './domain/endpoint-client.js';
export { HttpClient, buildUrl } from './domain/http-client.js';
export type { FetchOptions, HttpClientOptions } from './domain/http-client.js';
export {
  buildDataRequest,
  detectFrequency,
  mergeParams,
  requestFromParameters,
  verifyKeys,
} from './domain/params.js';
export {
  TABLE_METRIC_DTYPES,
  deriveWeatherCodeDescription,
  describeWeatherCode,
  extractScalar,
  extractScalarBundle,
  extractSeries,
  extractTable,
  seriesToPairs,
  seriesValues,
  toDTypeArray,
} from './domain/reshaper.js';
export type { WeatherCodeTable } from './domain/reshaper.js';
export { WEATHER_CODES, loadWeatherCodes } from './domain/weather-codes.js';
export {
  describeAqi,
  formatIsoDate,
  resolveDate,
  resolveDateRange,
  resolveDepthRange,
  validateCoordinates,
  validateFrequency,
  validateTemperatureUnit,
  validatePrecipitationUnit,
  validateWindSpeedUnit,
} from './domain/validators.js';
export {
  InvalidArgumentError,
  InvalidResponseError,
  MeteoError,
  MissingFieldError,
  MissingFrequencyError,
  RequestError,
  TransportError,
  UnknownWeatherCodeError,
  isMeteoError,
} from './domain/errors.js';
export { Logger, logger } from './domain/logger.js';
export type { LogLevel } from './domain/logger.js';
export { getConfig, loadConfig, resetConfig } from './config/env.js';
export type { ClientConfig, EndpointUrls } from './config/env.js';
export type { CityDetails } from './domain/schemas/common.js';
export type {
  DataRequest,
  DType,
  Frequency,
  IndexName,
  LabeledBundle,
  PeriodicFrequency,
  QueryParameters,
  Scalar,
  Series,
  Table,
  TableColumn,
  Timestamp,
} from './domain/types.js';
