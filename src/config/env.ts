/**
 * Configuration management
 * Loads and validates environment variables
 */

import {
  AIR_QUALITY_API,
  ARCHIVE_API,
  DEFAULT_TIMEOUT_MS,
  ELEVATION_API,
  MAX_TIMEOUT_MS,
  FORECAST_API,
  GEOCODING_API,
  MARINE_API,
} from '../domain/constants.js';
import { LOG_LEVELS, logger, type LogLevel } from '../domain/logger.js';

export interface EndpointUrls {
  forecast: string;
  archive: string;
  marine: string;
  airQuality: string;
  geocoding: string;
  elevation: string;
}

export interface ClientConfig {
  logLevel: LogLevel;
  /** Request timeout in milliseconds; null disables it */
  timeoutMs: number | null;
  endpoints: EndpointUrls;
}

type Env = Record<string, string | undefined>;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readUrl(env: Env, name: string, fallback: string): string {
  const value = env[name];
  if (!value) {
    return fallback;
  }

  try {
    new URL(value);
  } catch {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return value;
}

function readTimeout(env: Env): number | null {
  const value = env.METEOTAB_TIMEOUT_MS;
  if (!value) {
    return DEFAULT_TIMEOUT_MS;
  }
  if (value.toLowerCase() === 'none') {
    return null;
  }

  const timeoutMs = Number(value);
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new Error(
      `Invalid METEOTAB_TIMEOUT_MS: ${value}. ` +
        `Use a positive number of milliseconds up to ${MAX_TIMEOUT_MS} or 'none'.`
    );
  }
  return timeoutMs;
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ClientConfig {
  const logLevel = env.METEOTAB_LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid METEOTAB_LOG_LEVEL: ${logLevel}`);
  }

  return {
    logLevel,
    timeoutMs: readTimeout(env),
    endpoints: {
      forecast: readUrl(env, 'METEOTAB_FORECAST_URL', FORECAST_API),
      archive: readUrl(env, 'METEOTAB_ARCHIVE_URL', ARCHIVE_API),
      marine: readUrl(env, 'METEOTAB_MARINE_URL', MARINE_API),
      airQuality: readUrl(env, 'METEOTAB_AIR_QUALITY_URL', AIR_QUALITY_API),
      geocoding: readUrl(env, 'METEOTAB_GEOCODING_URL', GEOCODING_API),
      elevation: readUrl(env, 'METEOTAB_ELEVATION_URL', ELEVATION_API),
    },
  };
}

// Singleton config instance
let configInstance: ClientConfig | null = null;

/**
 * Get the current configuration (loads on first call and applies its log level)
 */
export function getConfig(): ClientConfig {
  if (!configInstance) {
    configInstance = loadConfig();
    logger.setLevel(configInstance.logLevel);
  }
  return configInstance;
}

/**
 * Drop the loaded configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  configInstance = null;
}
