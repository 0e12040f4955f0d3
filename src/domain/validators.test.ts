/**
 * Unit tests for argument validation
 */

import { describe, it, expect } from 'vitest';
import { ARCHIVE_SOIL_DEPTH_BUCKETS, SOIL_MOISTURE_DEPTH_BUCKETS } from './constants.js';
import { InvalidArgumentError } from './errors.js';
import {
  describeAqi,
  formatIsoDate,
  localToday,
  resolveDate,
  resolveDateRange,
  resolveDepthRange,
  validateChoice,
  validateCityCount,
  validateCoordinates,
  validateForecastDays,
  validateFrequency,
  validatePastDays,
  validateTemperatureUnit,
  validateTimeout,
  validateUnits,
  validateWindSpeedUnit,
} from './validators.js';

function captureError(fn: () => unknown): InvalidArgumentError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an InvalidArgumentError');
}

// Local noon on 2024-06-15
const NOW = new Date(2024, 5, 15, 12, 0, 0);

describe('validateCoordinates', () => {
  it('should accept coordinates on the boundaries', () => {
    expect(validateCoordinates(-90, 180)).toEqual({ latitude: -90, longitude: 180 });
  });

  it('should reject latitude above 90', () => {
    const error = captureError(() => validateCoordinates(91, 0));
    expect(error.message).toBe('Invalid latitude: 91. latitude must be <= 90');
    expect(error.details).toEqual({ parameter: 'latitude', received: 91 });
  });

  it('should reject longitude below -180', () => {
    expect(() => validateCoordinates(0, -181)).toThrow('longitude must be >= -180');
  });

  it('should reject non-numeric coordinates', () => {
    expect(() => validateCoordinates('59.9', 10.7)).toThrow(InvalidArgumentError);
  });
});

describe('unit selectors', () => {
  it('should accept every documented unit', () => {
    expect(validateUnits('fahrenheit', 'inch', 'kn')).toEqual({
      temperatureUnit: 'fahrenheit',
      precipitationUnit: 'inch',
      windSpeedUnit: 'kn',
    });
  });

  it('should list the allowed temperature units on failure', () => {
    const error = captureError(() => validateTemperatureUnit('kelvin'));
    expect(error.message).toBe(
      "Invalid temperature_unit specified: 'kelvin'. Expected one of: celsius, fahrenheit."
    );
    expect(error.code).toBe('INVALID_ARGUMENT');
  });

  it('should reject an unknown wind speed unit', () => {
    expect(() => validateWindSpeedUnit('knots')).toThrow(
      "Invalid wind_speed_unit specified: 'knots'. Expected one of: kmh, mph, ms, kn."
    );
  });

  it('should reject an unknown frequency', () => {
    expect(() => validateFrequency('weekly')).toThrow(InvalidArgumentError);
    expect(validateFrequency('hourly')).toBe('hourly');
  });
});

describe('validateChoice', () => {
  it('should return the matching member', () => {
    expect(validateChoice('altitude', 80, [2, 80, 120, 180])).toBe(80);
  });

  it('should reject a value outside the set', () => {
    expect(() => validateChoice('altitude', 50, [2, 80, 120, 180])).toThrow(
      'Invalid altitude specified: 50. Expected one of: 2, 80, 120, 180.'
    );
  });
});

describe('bounded integers', () => {
  it('should accept forecast days within the endpoint maximum', () => {
    expect(validateForecastDays(16, 16)).toBe(16);
  });

  it('should reject zero forecast days', () => {
    expect(() => validateForecastDays(0, 16)).toThrow(
      "'forecast_days' must be an integer between 1 and 16."
    );
  });

  it('should reject fractional forecast days', () => {
    expect(() => validateForecastDays(1.5, 8)).toThrow(
      "'forecast_days' must be an integer between 1 and 8."
    );
  });

  it('should reject more past days than the endpoint keeps', () => {
    expect(validatePastDays(92)).toBe(92);
    expect(() => validatePastDays(93)).toThrow("'past_days' must be an integer between 0 and 92.");
  });

  it('should cap the number of city results', () => {
    expect(validateCityCount(20)).toBe(20);
    expect(() => validateCityCount(21)).toThrow("'count' must be an integer between 1 and 20.");
  });
});

describe('validateTimeout', () => {
  it('should accept null as no timeout', () => {
    expect(validateTimeout(null)).toBeNull();
  });

  it('should reject a non-positive timeout', () => {
    expect(() => validateTimeout(0)).toThrow('timeout must be greater than 0');
  });
});

describe('resolveDepthRange', () => {
  it('should place a depth in its half-open archive bucket', () => {
    expect(resolveDepthRange(0, ARCHIVE_SOIL_DEPTH_BUCKETS)).toBe('0_to_7');
    expect(resolveDepthRange(6, ARCHIVE_SOIL_DEPTH_BUCKETS)).toBe('0_to_7');
    expect(resolveDepthRange(7, ARCHIVE_SOIL_DEPTH_BUCKETS)).toBe('7_to_28');
    expect(resolveDepthRange(28, ARCHIVE_SOIL_DEPTH_BUCKETS)).toBe('28_to_100');
  });

  it('should map the deepest archive layer to its wire label', () => {
    expect(resolveDepthRange(100, ARCHIVE_SOIL_DEPTH_BUCKETS)).toBe('100_to_255');
    expect(resolveDepthRange(255, ARCHIVE_SOIL_DEPTH_BUCKETS)).toBe('100_to_255');
  });

  it('should reject depths outside the buckets', () => {
    expect(() => resolveDepthRange(256, ARCHIVE_SOIL_DEPTH_BUCKETS)).toThrow(
      "'depth' must be a number in the range [0, 256); got 256."
    );
    expect(() => resolveDepthRange(-1, ARCHIVE_SOIL_DEPTH_BUCKETS)).toThrow(InvalidArgumentError);
  });

  it('should resolve soil moisture layers', () => {
    expect(resolveDepthRange(2, SOIL_MOISTURE_DEPTH_BUCKETS)).toBe('1_to_3');
    expect(resolveDepthRange(81, SOIL_MOISTURE_DEPTH_BUCKETS)).toBe('27_to_81');
    expect(() => resolveDepthRange(82, SOIL_MOISTURE_DEPTH_BUCKETS)).toThrow(InvalidArgumentError);
  });

  it('should reject a non-numeric depth', () => {
    expect(() => resolveDepthRange('7', ARCHIVE_SOIL_DEPTH_BUCKETS)).toThrow(
      "'depth' must be a number in the range [0, 256); got '7'."
    );
  });
});

describe('dates', () => {
  it('should format today in local time', () => {
    expect(localToday(NOW)).toBe('2024-06-15');
  });

  it('should resolve an ISO string to UTC midnight', () => {
    const date = resolveDate('2020-01-10', 'date', NOW);
    expect(date.getTime()).toBe(Date.UTC(2020, 0, 10));
    expect(formatIsoDate(date)).toBe('2020-01-10');
  });

  it('should take the local calendar date of a Date object', () => {
    const date = resolveDate(new Date(2024, 0, 5, 23, 30), 'date', NOW);
    expect(formatIsoDate(date)).toBe('2024-01-05');
  });

  it('should accept today', () => {
    expect(formatIsoDate(resolveDate('2024-06-15', 'date', NOW))).toBe('2024-06-15');
  });

  it('should reject a date in the future', () => {
    expect(() => resolveDate('2024-06-16', 'end_date', NOW)).toThrow(
      "'2024-06-16' is a date in the future."
    );
  });

  it('should reject a Date beyond year 9999', () => {
    expect(() => resolveDate(new Date(10000, 0, 1), 'date', NOW)).toThrow(
      "'10000-01-01' is a date in the future."
    );
  });

  it('should reject the day after today given as a Date', () => {
    expect(() => resolveDate(new Date(2024, 5, 16, 0, 5), 'date', NOW)).toThrow(
      "'2024-06-16' is a date in the future."
    );
  });

  it('should reject a malformed string', () => {
    expect(() => resolveDate('not-a-date', 'date', NOW)).toThrow(
      "Invalid date: 'not-a-date'. expected a YYYY-MM-DD date"
    );
  });

  it('should reject a calendar date that does not exist', () => {
    expect(() => resolveDate('2021-02-30', 'date', NOW)).toThrow(
      "'2021-02-30' is not a valid date format."
    );
  });

  it('should resolve a date range', () => {
    const range = resolveDateRange('2024-02-01', '2024-02-10', NOW);
    expect(formatIsoDate(range.startDate)).toBe('2024-02-01');
    expect(formatIsoDate(range.endDate)).toBe('2024-02-10');
  });

  it('should accept a single-day range', () => {
    const range = resolveDateRange('2024-02-01', '2024-02-01', NOW);
    expect(range.startDate.getTime()).toBe(range.endDate.getTime());
  });

  it('should reject a start after the end', () => {
    const error = captureError(() => resolveDateRange('2024-02-10', '2024-02-01', NOW));
    expect(error.message).toBe("'start_date' must be lower or equal to 'end_date'.");
    expect(error.details).toEqual({ parameter: 'start_date', received: '2024-02-10' });
  });

  it('should name the offending end of the range', () => {
    const error = captureError(() => resolveDateRange('2024-02-01', 'tomorrow', NOW));
    expect(error.details).toEqual({ parameter: 'end_date', received: 'tomorrow' });
  });
});

describe('describeAqi', () => {
  it('should use inclusive upper bounds', () => {
    expect(describeAqi(0)).toBe('Good');
    expect(describeAqi(50)).toBe('Good');
    expect(describeAqi(51)).toBe('Moderate');
    expect(describeAqi(150)).toBe('Slight Unhealthy');
    expect(describeAqi(201)).toBe('Very Unhealthy');
    expect(describeAqi(500)).toBe('Hazardous');
  });

  it('should reject readings outside 0..500', () => {
    expect(() => describeAqi(501)).toThrow(
      'AQI value must be a number between 0 and 500; got 501.'
    );
    expect(() => describeAqi(-1)).toThrow(InvalidArgumentError);
  });
});
