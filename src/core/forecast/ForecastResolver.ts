import type { Coordinates, GeocoderPort } from '../../ports/GeocoderPort.js';
import type { ForecastPeriod, WeatherPort } from '../../ports/WeatherPort.js';
import { createLogger } from '../../utils/logger.js';
import { ForecastLookupError, LocationNotFoundError } from '../../utils/errors.js';

export interface ForecastSuccess {
  success: true;
  location: string;
  coordinates: Coordinates;
  forecast: ForecastPeriod[];
}

export interface ForecastFailure {
  success: false;
  error: string;
}

export type ForecastResult = ForecastSuccess | ForecastFailure;

export interface ForecastResolverDeps {
  geocoder: GeocoderPort;
  weather: WeatherPort;
  periodLimit: number;
}

/**
 * Turns a place name into a short forecast: geocode, find the grid point, then
 * fetch its forecast. Each hop runs after the previous one and the first
 * failure ends the lookup.
 */
export class ForecastResolver {
  private readonly logger = createLogger({ service: 'ForecastResolver' });

  constructor(private readonly deps: ForecastResolverDeps) {}

  /** Never rejects; every failure becomes `{ success: false, error }`. */
  async resolve(location: string): Promise<ForecastResult> {
    const logger = this.logger.child({ location });

    try {
      const coordinates = await this.deps.geocoder.geocode(location);
      if (!coordinates) {
        throw new LocationNotFoundError(location);
      }

      const gridPoint = await this.deps.weather.locateGridPoint(coordinates);
      const forecast = await this.deps.weather.fetchForecast(gridPoint.forecastUrl, this.deps.periodLimit);

      logger.info({ periodCount: forecast.length }, 'Forecast resolved');
      return {
        success: true,
        location: `${gridPoint.city}, ${gridPoint.state}`,
        coordinates: { latitude: coordinates.latitude, longitude: coordinates.longitude },
        forecast,
      };
    } catch (error) {
      if (error instanceof ForecastLookupError) {
        logger.warn({ code: error.code }, error.message);
        return { success: false, error: error.message };
      }

      logger.error({ error }, 'Unexpected error while resolving forecast');
      const details = error instanceof Error ? error.message : String(error);
      return { success: false, error: `Error fetching forecast: ${details}` };
    }
  }
}
