import { parseArgs } from 'node:util';
import { loadConfig } from '../config/index.js';
import { conditions as fetchConditions } from '../core/conditions/ConditionsFormatter.js';
import { isUnits, UNITS } from '../ports/WeatherPort.js';
import type { Units } from '../ports/WeatherPort.js';
import { UsageError } from '../utils/errors.js';
import { createLogger, setLogLevel } from '../utils/logger.js';

export const USAGE = 'USAGE: weathercli [--units={standard|metric|imperial}] <location>';

export interface CliArgs {
  units: Units;
  location: string;
}

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  stdout: { write(chunk: string): unknown };
  conditions?: typeof fetchConditions;
}

export function parseCliArgs(args: string[]): CliArgs {
  let parsed: ReturnType<typeof parseCliTokens>;
  try {
    parsed = parseCliTokens(args);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new UsageError(reason, { cause: error });
  }

  const units = parsed.values.units ?? 'imperial';
  if (!isUnits(units)) {
    throw new UsageError(`units flag must be set to one of: ${UNITS.join(', ')}`);
  }

  const location = parsed.positionals[0];
  if (!location) {
    throw new UsageError(
      "positional argument for location must be given (e.g. 'london', 'tampa,us', etc.)"
    );
  }

  return { units, location };
}

function parseCliTokens(args: string[]) {
  return parseArgs({
    args,
    options: {
      units: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });
}

/**
 * Prints the current conditions for the location named in `args`.
 * `args` excludes the node binary and script path.
 */
export async function runCurrentWeatherCli(args: string[], deps: CliDeps): Promise<void> {
  const config = loadConfig(deps.env);
  setLogLevel(config.logLevel);

  const { units, location } = parseCliArgs(args);
  const logger = createLogger({ component: 'cli' });
  logger.info({ location, units }, 'Fetching current conditions');

  const conditions = deps.conditions ?? fetchConditions;
  const summary = await conditions(location, units, config.openWeatherApiKey, {
    baseUrl: config.openWeatherBaseUrl,
    timeoutMs: config.requestTimeoutMs,
  });

  deps.stdout.write(`${summary}\n`);
}
