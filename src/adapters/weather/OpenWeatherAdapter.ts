import type { Logger } from 'pino';
import { z } from 'zod';
import { isTimeframe, isUnits, UNITS } from '../../ports/WeatherPort.js';
import type { WeatherPort } from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { toFixed2 } from '../../utils/numbers.js';
import { ConfigError, TransportError, ValidationError, WeatherApiError } from '../../utils/errors.js';

export const DEFAULT_BASE_URL = 'https://api.openweathermap.org';
export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ClientOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

// Commas are legal in a query and the API expects them literally in
// `q=city,country` and `exclude=a,b`.
function encodeQueryValue(value: string): string {
  return encodeURIComponent(value).replace(/%2C/gi, ',');
}

function buildQuery(params: Array<[string, string]>): string {
  return params.map(([key, value]) => `${key}=${encodeQueryValue(value)}`).join('&');
}

export class OpenWeatherAdapter implements WeatherPort {
  private readonly logger: Logger = createLogger({ adapter: 'OpenWeatherAdapter' });
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(apiKey: string, options: ClientOptions = {}) {
    if (!apiKey) {
      throw new ConfigError('apiKey argument must not be empty');
    }
    const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    try {
      new URL(baseUrl);
    } catch (error) {
      throw new ConfigError(`baseUrl is not a valid URL: ${baseUrl}`, { cause: error });
    }
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async current(location: string, units: string): Promise<string> {
    requireLocation(location);
    requireUnits(units);

    return this.get('/data/2.5/weather', [
      ['q', location],
      ['units', units],
    ]);
  }

  async geocode(location: string): Promise<string> {
    requireLocation(location);

    return this.get('/geo/1.0/direct', [
      ['q', location],
      ['limit', '1'],
    ]);
  }

  async forecast(
    lat: number,
    lon: number,
    units: string,
    exclude: readonly string[] = []
  ): Promise<string> {
    requireUnits(units);

    const timeframes = exclude.map((tf) => tf.toLowerCase()).filter(isTimeframe);
    const params: Array<[string, string]> = [
      ['lat', toFixed2(lat)],
      ['lon', toFixed2(lon)],
      ['units', units],
    ];

    return this.get(
      '/data/2.5/onecall',
      params,
      timeframes.length > 0 ? [['exclude', timeframes.join(',')]] : []
    );
  }

  private async get(
    path: string,
    params: Array<[string, string]>,
    trailing: Array<[string, string]> = []
  ): Promise<string> {
    const logger = this.logger.child({ method: 'get', path });
    const url = `${this.baseUrl}${path}?${buildQuery([...params, ['appid', this.apiKey], ...trailing])}`;

    logger.debug('Requesting weather data');

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const cause = this.maskApiKey(error);
      logger.debug({ err: cause }, 'OpenWeather request failed');
      throw new TransportError(`error getting data from ${path}`, { cause });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const cause = this.maskApiKey(error);
      logger.debug({ err: cause, status: response.status }, 'Failed to read OpenWeather response');
      throw new TransportError('error reading response body', { cause });
    }

    if (!response.ok) {
      logger.debug({ status: response.status }, 'OpenWeather API request failed');
      throw new WeatherApiError(response.status, body, serviceMessage(body));
    }

    logger.debug({ status: response.status, bytes: body.length }, 'Weather data fetched');
    return body;
  }

  // Transport errors can quote the request URL, which carries the key.
  private maskApiKey(error: unknown): unknown {
    if (!(error instanceof Error) || !error.message.includes(this.apiKey)) {
      return error;
    }
    const masked = new Error(error.message.replaceAll(this.apiKey, '***'));
    masked.name = error.name;
    return masked;
  }
}

const serviceErrorSchema = z.object({ message: z.string().min(1) });

function serviceMessage(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  const result = serviceErrorSchema.safeParse(parsed);
  return result.success ? result.data.message : undefined;
}

function requireLocation(location: string): void {
  if (location === '') {
    throw new ValidationError('location argument must not be empty');
  }
}

function requireUnits(units: string): void {
  if (!isUnits(units)) {
    throw new ValidationError(`units must be one of: ${UNITS.join(', ')}`);
  }
}
