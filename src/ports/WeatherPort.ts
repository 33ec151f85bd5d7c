export const UNITS = ['standard', 'metric', 'imperial'] as const;

export type Units = (typeof UNITS)[number];

export function isUnits(value: string): value is Units {
  return UNITS.some((units) => units === value);
}

// Sections of the one-call response that can be left out of a forecast request
export const TIMEFRAMES = ['current', 'minutely', 'hourly', 'daily', 'alerts'] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export function isTimeframe(value: string): value is Timeframe {
  return TIMEFRAMES.some((timeframe) => timeframe === value);
}

export interface WeatherSummary {
  description: string;
}

export interface Metrics {
  temp: number;
  humidity: number; // percent
}

export interface CurrentWeatherResponse {
  summaries: WeatherSummary[];
  metrics: Metrics;
}

export interface GeoLocation {
  name: string;
  country: string; // ISO 3166 country code
  state?: string;
  lat: number;
  lon: number;
}

export interface DailyForecast {
  date: number; // unix seconds
  temp: {
    low: number;
    high: number;
  };
  humidity: number;
  summaries: WeatherSummary[];
}

/**
 * Raw access to the weather service. Each method performs one request and
 * resolves with the unparsed response body.
 */
export interface WeatherPort {
  current(location: string, units: string): Promise<string>;
  geocode(location: string): Promise<string>;
  forecast(lat: number, lon: number, units: string, exclude?: readonly string[]): Promise<string>;
}
