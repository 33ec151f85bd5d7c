import type { Logger } from 'pino';
import { OpenWeatherAdapter } from '../../adapters/weather/OpenWeatherAdapter.js';
import type { ClientOptions } from '../../adapters/weather/OpenWeatherAdapter.js';
import { decodeCurrent } from '../../adapters/weather/decoders.js';
import { isUnits } from '../../ports/WeatherPort.js';
import type { CurrentWeatherResponse, Units, WeatherPort } from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { toFixed2 } from '../../utils/numbers.js';

const TEMPERATURE_INITIALS: Readonly<Record<Units, string>> = {
  standard: 'K',
  metric: 'C',
  imperial: 'F',
};

export function temperatureInitial(units: string): string {
  return isUnits(units) ? TEMPERATURE_INITIALS[units] : '';
}

/**
 * Renders a decoded current weather response as
 * `"{description}, {temp} {K|C|F}, humidity {humidity}%"`.
 */
export function formatConditions(resp: CurrentWeatherResponse, units: string): string {
  const desc = resp.summaries[0]?.description.trim() ?? '';
  const temp = toFixed2(resp.metrics.temp);
  return `${desc}, ${temp} ${temperatureInitial(units)}, humidity ${resp.metrics.humidity}%`;
}

export class ConditionsFormatter {
  private readonly logger: Logger = createLogger({ service: 'ConditionsFormatter' });

  constructor(private readonly weather: WeatherPort) {}

  async describe(location: string, units: string): Promise<string> {
    const data = await this.weather.current(location, units);
    const resp = decodeCurrent(data);
    this.logger.debug({ location, units, summaries: resp.summaries.length }, 'Decoded current weather');
    return formatConditions(resp, units);
  }
}

/**
 * Fetches the current weather for `location` and summarizes it on one line.
 * Errors from the client and the decoder propagate unchanged.
 */
export async function conditions(
  location: string,
  units: string,
  apiKey: string,
  options?: ClientOptions
): Promise<string> {
  const client = new OpenWeatherAdapter(apiKey, options);
  return new ConditionsFormatter(client).describe(location, units);
}
