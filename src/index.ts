#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { runCurrentWeatherCli, USAGE } from './cli/currentWeatherCli.js';
import { UsageError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  try {
    await runCurrentWeatherCli(process.argv.slice(2), {
      env: process.env,
      stdout: process.stdout,
    });
  } catch (error) {
    logger.debug({ err: error }, 'weathercli failed');
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`weathercli: ${message}\n`);
    if (error instanceof UsageError) {
      process.stderr.write(`${USAGE}\n`);
    }
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
