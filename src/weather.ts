export { OpenWeatherAdapter, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './adapters/weather/OpenWeatherAdapter.js';
export type { ClientOptions, FetchLike } from './adapters/weather/OpenWeatherAdapter.js';
export { decodeCurrent, decodeGeoData, decodeForecast } from './adapters/weather/decoders.js';
export {
  ConditionsFormatter,
  conditions,
  formatConditions,
  temperatureInitial,
} from './core/conditions/ConditionsFormatter.js';
export { UNITS, TIMEFRAMES, isUnits, isTimeframe } from './ports/WeatherPort.js';
export type {
  Units,
  Timeframe,
  WeatherPort,
  WeatherSummary,
  Metrics,
  CurrentWeatherResponse,
  GeoLocation,
  DailyForecast,
} from './ports/WeatherPort.js';
export {
  WeatherError,
  ConfigError,
  ValidationError,
  UsageError,
  TransportError,
  WeatherApiError,
  DecodeError,
} from './utils/errors.js';
