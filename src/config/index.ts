import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '../adapters/weather/OpenWeatherAdapter.js';
import { ConfigError } from '../utils/errors.js';

const API_KEY_MESSAGE = 'environment variable OPENWEATHER_API_KEY must be set';

const configSchema = z.object({
  // OpenWeatherMap
  openWeatherApiKey: z.string({ required_error: API_KEY_MESSAGE }).min(1, API_KEY_MESSAGE),
  openWeatherBaseUrl: z.string().url().default(DEFAULT_BASE_URL),
  requestTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('warn'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    openWeatherApiKey: env('OPENWEATHER_API_KEY'),
    openWeatherBaseUrl: env('OPENWEATHER_BASE_URL'),
    requestTimeoutMs: env('OPENWEATHER_TIMEOUT_MS'),
    logLevel: env('LOG_LEVEL'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
