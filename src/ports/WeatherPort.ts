import type { Coordinates } from './GeocoderPort.js';

export interface GridPoint {
  forecastUrl: string;
  city: string;
  state: string;
}

export interface ForecastPeriod {
  readonly name: string;
  /** Display string such as "72°F" */
  readonly temperature: string;
  readonly windSpeed: string;
  readonly windDirection: string;
  readonly detailedForecast: string;
  readonly icon: string;
}

export interface WeatherPort {
  /**
   * Throws OutOfCoverageAreaError when the points lookup fails and
   * ForecastUnavailableError when it has no forecast link.
   */
  locateGridPoint(coordinates: Coordinates): Promise<GridPoint>;
  /** Throws FetchFailedError when the forecast cannot be fetched. */
  fetchForecast(forecastUrl: string, limit: number): Promise<ForecastPeriod[]>;
}
