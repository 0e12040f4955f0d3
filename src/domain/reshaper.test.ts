/**
 * Unit tests for response reshaping
 */

import { describe, it, expect } from 'vitest';
import {
  InvalidResponseError,
  MissingFieldError,
  UnknownWeatherCodeError,
} from './errors.js';
import { buildDataRequest } from './params.js';
import {
  deriveWeatherCodeDescription,
  describeWeatherCode,
  extractScalar,
  extractScalarBundle,
  extractSeries,
  extractTable,
  seriesToPairs,
  seriesValues,
  toDTypeArray,
  toNumericReading,
} from './reshaper.js';
import type { Frequency } from './types.js';

const BASE = { latitude: 52.52, longitude: 13.41 };
const CODES = { '0': 'Clear sky', '3': 'Overcast', '61': 'Slight rain' };

function request(frequency: Frequency, ...metrics: string[]) {
  return buildDataRequest(BASE, { frequency, metrics });
}

const HOURLY_BODY = {
  latitude: 52.52,
  longitude: 13.41,
  hourly: {
    time: ['2020-01-01T00:00', '2020-01-01T01:00'],
    temperature_2m: [10.0, 10.5],
    relative_humidity_2m: [80, 82],
  },
};

describe('extractScalar', () => {
  const body = {
    current: { time: '2024-06-15T12:00', interval: 900, temperature_2m: 21.5 },
  };

  it('should return the requested reading', () => {
    expect(extractScalar(body, request('current', 'temperature_2m'))).toBe(21.5);
  });

  it('should keep null readings', () => {
    const withNull = { current: { time: 't', interval: 900, visibility: null } };
    expect(extractScalar(withNull, request('current', 'visibility'))).toBeNull();
  });

  it('should fail when the metric is absent from the branch', () => {
    expect(() => extractScalar(body, request('current', 'precipitation'))).toThrow(
      "Metric 'precipitation' not found in the 'current' response branch."
    );
  });

  it('should fail when the body has no current branch', () => {
    expect(() => extractScalar(HOURLY_BODY, request('current', 'temperature_2m'))).toThrow(
      "Response does not contain the 'current' branch."
    );
  });

  it('should fail for a request that is not tagged current', () => {
    expect(() => extractScalar(body, request('hourly', 'temperature_2m'))).toThrow(
      MissingFieldError
    );
  });

  it('should not treat metadata as a reading', () => {
    expect(() => extractScalar(body, request('current', 'interval'))).toThrow(MissingFieldError);
  });

  it('should reject a body that is not an object', () => {
    expect(() => extractScalar([1, 2], request('current', 'temperature_2m'))).toThrow(
      InvalidResponseError
    );
  });
});

describe('extractScalarBundle', () => {
  const body = {
    current: {
      time: '2024-06-15T12:00',
      interval: 900,
      temperature_2m: 21.5,
      wind_speed_10m: 12.1,
    },
  };

  it('should label readings in request order', () => {
    const bundle = extractScalarBundle(
      body,
      request('current', 'temperature_2m', 'wind_speed_10m'),
      ['temperature', 'wind_speed']
    );

    expect([...bundle.entries()]).toEqual([
      ['temperature', 21.5],
      ['wind_speed', 12.1],
    ]);
  });

  it('should fail when labels and fields differ in count', () => {
    expect(() =>
      extractScalarBundle(body, request('current', 'temperature_2m', 'wind_speed_10m'), [
        'temperature',
      ])
    ).toThrow(MissingFieldError);
  });

  it('should fail when the server returns fewer fields than requested', () => {
    const partial = { current: { time: 't', interval: 900, temperature_2m: 21.5 } };
    expect(() =>
      extractScalarBundle(partial, request('current', 'temperature_2m', 'wind_speed_10m'), [
        'temperature',
        'wind_speed',
      ])
    ).toThrow(
      "Expected 2 fields in the 'current' branch to match the labels; requested 2, received 1."
    );
  });
});

describe('extractSeries', () => {
  it('should index an hourly metric by Datetime', () => {
    const series = extractSeries(HOURLY_BODY, request('hourly', 'temperature_2m'));

    expect(series.name).toBe('temperature_2m');
    expect(series.indexName).toBe('Datetime');
    expect(series.index).toEqual(['2020-01-01T00:00', '2020-01-01T01:00']);
    expect(series.dtype).toBe('float32');
    expect(series.values).toBeInstanceOf(Float32Array);
    expect(Array.from(series.values)).toEqual([10.0, 10.5]);
  });

  it('should index a daily metric by Date', () => {
    const body = { daily: { time: ['2024-06-15'], uv_index_max: [6.5] } };
    const series = extractSeries(body, request('daily', 'uv_index_max'));

    expect(series.indexName).toBe('Date');
    expect(series.index).toEqual(['2024-06-15']);
  });

  it('should store missing readings as NaN', () => {
    const body = { hourly: { time: ['a', 'b'], visibility: [24140, null] } };
    const series = extractSeries(body, request('hourly', 'visibility'), 'float64');

    expect(series.values[0]).toBe(24140);
    expect(Number.isNaN(series.values[1])).toBe(true);
  });

  it('should pass text values through the object representation', () => {
    const body = { daily: { time: ['2024-06-15'], sunrise: ['2024-06-15T04:43'] } };
    const series = extractSeries(body, request('daily', 'sunrise'), 'object');

    expect(series.values).toEqual(['2024-06-15T04:43']);
  });

  it('should keep unix timestamps as the index', () => {
    const body = { hourly: { time: [1718409600, 1718413200], temperature_2m: [14, 15] } };
    const series = extractSeries(body, request('hourly', 'temperature_2m'));

    expect(series.index).toEqual([1718409600, 1718413200]);
  });

  it('should fail when the metric is absent', () => {
    expect(() => extractSeries(HOURLY_BODY, request('hourly', 'dew_point_2m'))).toThrow(
      "Metric 'dew_point_2m' not found in the 'hourly' response branch."
    );
  });

  it('should fail when the body lacks the requested branch', () => {
    expect(() => extractSeries(HOURLY_BODY, request('daily', 'temperature_2m'))).toThrow(
      "Response does not contain the 'daily' branch."
    );
  });

  it('should fail for a current request', () => {
    expect(() => extractSeries(HOURLY_BODY, request('current', 'temperature_2m'))).toThrow(
      MissingFieldError
    );
  });

  it('should fail when a column is shorter than the index', () => {
    const body = { hourly: { time: ['a', 'b'], temperature_2m: [1] } };
    expect(() => extractSeries(body, request('hourly', 'temperature_2m'))).toThrow(
      "Metric 'temperature_2m' has 1 values for 2 timestamps."
    );
  });

  it('should flatten back to the original pairs', () => {
    const series = extractSeries(HOURLY_BODY, request('hourly', 'temperature_2m'));

    expect(seriesToPairs(series)).toEqual([
      ['2020-01-01T00:00', 10.0],
      ['2020-01-01T01:00', 10.5],
    ]);
  });
});

describe('toDTypeArray', () => {
  it('should narrow small codes to uint8', () => {
    const values = toDTypeArray([0, 3, 61], 'uint8', 'weather_code');
    expect(values).toBeInstanceOf(Uint8Array);
    expect(Array.from(values)).toEqual([0, 3, 61]);
  });

  it('should reject values that do not fit the integer representation', () => {
    expect(() => toDTypeArray([256], 'uint8', 'weather_code')).toThrow(
      "Metric 'weather_code' value 256 cannot be stored as uint8."
    );
    expect(() => toDTypeArray([null], 'int32', 'visibility')).toThrow(InvalidResponseError);
    expect(() => toDTypeArray([1.5], 'int32', 'visibility')).toThrow(InvalidResponseError);
  });

  it('should reject text in a float representation', () => {
    expect(() => toDTypeArray(['12'], 'float32', 'temperature_2m')).toThrow(
      "Metric 'temperature_2m' holds a non-numeric value: 12."
    );
  });
});

describe('extractTable', () => {
  it('should rename columns to labels in order and index by time', () => {
    const table = extractTable(
      HOURLY_BODY,
      request('hourly', 'temperature_2m', 'relative_humidity_2m'),
      ['temperature', 'humidity']
    );

    expect(table.indexName).toBe('Datetime');
    expect(table.index).toEqual(['2020-01-01T00:00', '2020-01-01T01:00']);
    expect(table.columns).toEqual(['temperature', 'humidity']);
    expect(table.data.get('temperature')).toEqual(new Float32Array([10.0, 10.5]));
    expect(table.data.get('humidity')).toEqual(new Float32Array([80, 82]));
  });

  it('should store weather codes as uint8 and continuous columns as float32', () => {
    const body = {
      daily: {
        time: ['2024-06-15', '2024-06-16'],
        weather_code: [3, 61],
        temperature_2m_mean: [1.5, null],
      },
    };
    const table = extractTable(body, request('daily', 'weather_code', 'temperature_2m_mean'), [
      'code',
      'temperature',
    ]);

    expect(table.data.get('code')).toEqual(new Uint8Array([3, 61]));
    expect(table.data.get('temperature')).toEqual(new Float32Array([1.5, NaN]));
  });

  it('should reject a fractional weather code in a table', () => {
    const body = {
      daily: { time: ['2024-06-15'], weather_code: [3.7], temperature_2m_mean: [1.1] },
    };

    expect(() =>
      extractTable(body, request('daily', 'weather_code', 'temperature_2m_mean'), [
        'code',
        'temperature',
      ])
    ).toThrow("Metric 'weather_code' value 3.7 cannot be stored as uint8.");
  });

  it('should apply a per-label representation override', () => {
    const table = extractTable(
      HOURLY_BODY,
      request('hourly', 'temperature_2m', 'relative_humidity_2m'),
      ['temperature', 'humidity'],
      { humidity: 'int32', temperature: 'float64' }
    );

    expect(table.data.get('temperature')).toEqual(new Float64Array([10.0, 10.5]));
    expect(table.data.get('humidity')).toEqual(new Int32Array([80, 82]));
  });

  it('should fail on a label count mismatch', () => {
    expect(() =>
      extractTable(HOURLY_BODY, request('hourly', 'temperature_2m', 'relative_humidity_2m'), [
        'temperature',
        'humidity',
        'wind',
      ])
    ).toThrow(MissingFieldError);
  });

  it('should fail when a requested column is missing', () => {
    expect(() =>
      extractTable(HOURLY_BODY, request('hourly', 'temperature_2m', 'precipitation'), [
        'temperature',
        'precipitation',
      ])
    ).toThrow("Metric 'precipitation' not found in the 'hourly' response branch.");
  });
});

describe('weather codes', () => {
  it('should describe a known code', () => {
    expect(describeWeatherCode(0, CODES)).toBe('Clear sky');
  });

  it('should fail on an unknown code', () => {
    expect(() => describeWeatherCode(9999, CODES)).toThrow(UnknownWeatherCodeError);
    expect(() => describeWeatherCode(9999, CODES)).toThrow(
      'No description found for weather code 9999.'
    );
  });

  it('should fail on a missing code', () => {
    expect(() => describeWeatherCode(null, CODES)).toThrow(UnknownWeatherCodeError);
  });

  it('should pair each code with its description', () => {
    const body = { daily: { time: ['2024-06-15', '2024-06-16'], weather_code: [3, 61] } };
    const series = extractSeries(body, request('daily', 'weather_code'), 'uint8');
    const table = deriveWeatherCodeDescription(series, CODES);

    expect(table.indexName).toBe('Date');
    expect(table.index).toEqual(['2024-06-15', '2024-06-16']);
    expect(table.columns).toEqual(['code', 'description']);
    expect(table.data.get('code')).toEqual(new Uint8Array([3, 61]));
    expect(table.data.get('description')).toEqual(['Overcast', 'Slight rain']);
  });
});

describe('seriesValues', () => {
  it('should copy typed values into a plain array', () => {
    const series = extractSeries(HOURLY_BODY, request('hourly', 'relative_humidity_2m'), 'int32');
    expect(seriesValues(series)).toEqual([80, 82]);
  });
});

describe('toNumericReading', () => {
  it('should pass numbers and null through', () => {
    expect(toNumericReading(4.2, 'pm10')).toBe(4.2);
    expect(toNumericReading(null, 'pm10')).toBeNull();
  });

  it('should reject text', () => {
    expect(() => toNumericReading('4.2', 'pm10')).toThrow(InvalidResponseError);
  });
});
