/**
 * Walks the geocode, grid point and forecast hops for a few locations and
 * prints what each upstream returned.
 * Run with: npx tsx scripts/debug-forecast.ts ["City, ST" ...]
 */
import 'dotenv/config';
import { loadConfig } from '../src/config/index.js';
import { NominatimAdapter } from '../src/adapters/geocoding/NominatimAdapter.js';
import { NwsAdapter } from '../src/adapters/weather/NwsAdapter.js';
import { ForecastResolver } from '../src/core/forecast/ForecastResolver.js';

const DEFAULT_LOCATIONS = ['New York', 'Chicago, IL', 'Texas'];

const config = { ...loadConfig(), geocoderUserAgent: 'WeatherApp/1.0 (weather-debug)' };
const geocoder = new NominatimAdapter(config);
const weather = new NwsAdapter(config);
const resolver = new ForecastResolver({ geocoder, weather, periodLimit: config.forecastPeriodLimit });

async function debugLocation(location: string): Promise<void> {
  console.log('\n' + '='.repeat(60));
  console.log(`Testing: ${location}`);
  console.log('='.repeat(60) + '\n');

  console.log(`1. Geocoding '${location}'...`);
  const coordinates = await geocoder.geocode(location);
  if (!coordinates) {
    console.log('[FAIL] Geocoding failed - no results found');
    return;
  }
  console.log(`[OK] Coordinates: ${coordinates.latitude}, ${coordinates.longitude}\n`);

  console.log('2. Fetching NWS points data...');
  const gridPoint = await weather.locateGridPoint(coordinates);
  console.log(`[OK] ${gridPoint.city}, ${gridPoint.state}`);
  console.log(`   Forecast URL: ${gridPoint.forecastUrl}\n`);

  console.log('3. Fetching forecast data...');
  const periods = await weather.fetchForecast(gridPoint.forecastUrl, config.forecastPeriodLimit);
  console.log(`[OK] ${periods.length} periods`);
  for (const period of periods) {
    console.log(`   ${period.name}: ${period.temperature}, wind ${period.windSpeed} ${period.windDirection}`);
  }

  console.log('\n4. Resolver result:');
  console.log(JSON.stringify(await resolver.resolve(location), null, 2));
}

async function main(): Promise<void> {
  const locations = process.argv.length > 2 ? process.argv.slice(2) : DEFAULT_LOCATIONS;
  for (const location of locations) {
    try {
      await debugLocation(location);
    } catch (error) {
      console.log(`[FAIL] ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
