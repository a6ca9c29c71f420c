// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { NominatimAdapter } from './adapters/geocoding/NominatimAdapter.js';
import { NwsAdapter } from './adapters/weather/NwsAdapter.js';
import { ForecastResolver } from './core/forecast/ForecastResolver.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting forecast server');

  try {
    const config = loadConfig();

    const resolver = new ForecastResolver({
      geocoder: new NominatimAdapter(config),
      weather: new NwsAdapter(config),
      periodLimit: config.forecastPeriodLimit,
    });

    await startServer(resolver, config.port, config.host);

    logger.info({ url: `http://${config.host}:${config.port}` }, 'Type a US city or state name to get the weather forecast');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
