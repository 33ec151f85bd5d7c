import { z } from 'zod';
import type {
  CurrentWeatherResponse,
  DailyForecast,
  GeoLocation,
  WeatherSummary,
} from '../../ports/WeatherPort.js';
import { DecodeError } from '../../utils/errors.js';

const summarySchema = z.object({
  description: z.string(),
});

const summariesSchema = z.array(summarySchema).default([]);

const currentSchema = z.object({
  weather: summariesSchema,
  main: z.object({
    temp: z.number(),
    humidity: z.number().int(),
  }),
});

const locationSchema = z.object({
  name: z.string(),
  country: z.string(),
  state: z.string().optional(),
  lat: z.number(),
  lon: z.number(),
});

const dailySchema = z.object({
  dt: z.number().int().nonnegative(),
  temp: z.object({
    min: z.number(),
    max: z.number(),
  }),
  humidity: z.number().int(),
  weather: summariesSchema,
});

const oneCallSchema = z.object({
  daily: z.array(dailySchema).default([]),
});

function parseJson(data: string, what: string): unknown {
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new DecodeError(`got error unmarshaling ${what} json`, { cause: error });
  }
}

function decodeWith<T extends z.ZodTypeAny>(schema: T, data: string, what: string): z.output<T> {
  const result = schema.safeParse(parseJson(data, what));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new DecodeError(`unexpected ${what} response:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

function toSummaries(weather: Array<{ description: string }>): WeatherSummary[] {
  return weather.map(({ description }) => ({ description }));
}

/** Decodes a body from the current weather endpoint. */
export function decodeCurrent(data: string): CurrentWeatherResponse {
  const resp = decodeWith(currentSchema, data, 'current weather');
  return {
    summaries: toSummaries(resp.weather),
    metrics: {
      temp: resp.main.temp,
      humidity: resp.main.humidity,
    },
  };
}

/**
 * Decodes a body from the geocoding endpoint and returns the first location.
 * Fails when the service found no match.
 */
export function decodeGeoData(data: string): GeoLocation {
  const locations = decodeWith(z.array(locationSchema), data, 'geocode');
  const [first] = locations;
  if (!first) {
    throw new DecodeError('response from Geocoding API must contain at least one location');
  }
  return first;
}

export function decodeForecast(data: string): DailyForecast[] {
  if (data.length === 0) {
    throw new DecodeError('data must be a non-empty response from the OneCall API');
  }

  const resp = decodeWith(oneCallSchema, data, 'onecall');
  return resp.daily.map((day) => ({
    date: day.dt,
    temp: {
      low: day.temp.min,
      high: day.temp.max,
    },
    humidity: day.humidity,
    summaries: toSummaries(day.weather),
  }));
}
