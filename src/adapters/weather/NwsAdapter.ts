import { z } from 'zod';
import type { Coordinates } from '../../ports/GeocoderPort.js';
import type { ForecastPeriod, GridPoint, WeatherPort } from '../../ports/WeatherPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { fetchJson } from '../../utils/http.js';
import {
  FetchFailedError,
  ForecastUnavailableError,
  OutOfCoverageAreaError,
  UpstreamResponseError,
} from '../../utils/errors.js';

const pointsResponseSchema = z.object({
  properties: z
    .object({
      forecast: z.string().optional(),
      relativeLocation: z
        .object({
          properties: z
            .object({
              city: z.string().optional(),
              state: z.string().optional(),
            })
            .optional(),
        })
        .optional(),
    })
    .optional(),
});

const forecastResponseSchema = z.object({
  properties: z.object({
    periods: z.array(z.unknown()),
  }),
});

const periodSchema = z.object({
  name: z.string(),
  temperature: z.number(),
  temperatureUnit: z.string(),
  windSpeed: z.string(),
  windDirection: z.string(),
  detailedForecast: z.string(),
  icon: z.string().nullish(),
});

type NwsPeriod = z.infer<typeof periodSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function formatTemperature(value: number, unit: string): string {
  return `${value}°${unit}`;
}

export class NwsAdapter implements WeatherPort {
  private readonly logger = createLogger({ adapter: 'NwsAdapter' });
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(private readonly config: Config) {
    this.baseUrl = config.nwsApiBase.replace(/\/+$/, '');
    this.headers = {
      'User-Agent': config.userAgent,
      Accept: 'application/geo+json',
    };
  }

  async locateGridPoint(coordinates: Coordinates): Promise<GridPoint> {
    const { latitude, longitude } = coordinates;
    const logger = this.logger.child({ method: 'locateGridPoint', latitude, longitude });

    const result = await fetchJson(`${this.baseUrl}/points/${latitude},${longitude}`, {
      headers: this.headers,
      timeoutMs: this.config.requestTimeoutMs,
      logger,
    });
    if (!result.ok) {
      throw new OutOfCoverageAreaError({ cause: result.error });
    }

    const parsed = pointsResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new UpstreamResponseError('nws', `Unexpected points response: ${describeIssues(parsed.error)}`);
    }

    const properties = parsed.data.properties;
    const forecastUrl = properties?.forecast;
    if (forecastUrl === undefined) {
      logger.warn('Points response has no forecast link');
      throw new ForecastUnavailableError();
    }

    const place = properties?.relativeLocation?.properties;
    const gridPoint: GridPoint = {
      forecastUrl,
      city: place?.city ?? 'Unknown',
      state: place?.state ?? 'Unknown',
    };
    logger.info({ city: gridPoint.city, state: gridPoint.state }, 'Grid point located');
    return gridPoint;
  }

  async fetchForecast(forecastUrl: string, limit: number): Promise<ForecastPeriod[]> {
    const logger = this.logger.child({ method: 'fetchForecast', forecastUrl });

    const result = await fetchJson(forecastUrl, {
      headers: this.headers,
      timeoutMs: this.config.requestTimeoutMs,
      logger,
    });
    if (!result.ok) {
      throw new FetchFailedError({ cause: result.error });
    }

    const parsed = forecastResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      throw new UpstreamResponseError('nws', `Unexpected forecast response: ${describeIssues(parsed.error)}`);
    }

    // Periods arrive in chronological order; keep the nearest ones
    const periods = parsed.data.properties.periods.slice(0, limit).map((raw, index) => {
      const period = periodSchema.safeParse(raw);
      if (!period.success) {
        throw new UpstreamResponseError(
          'nws',
          `Unexpected forecast period ${index}: ${describeIssues(period.error)}`
        );
      }
      return this.toForecastPeriod(period.data);
    });

    logger.info({ periodCount: periods.length }, 'Forecast fetched');
    return periods;
  }

  private toForecastPeriod(period: NwsPeriod): ForecastPeriod {
    return Object.freeze({
      name: period.name,
      temperature: formatTemperature(period.temperature, period.temperatureUnit),
      windSpeed: period.windSpeed,
      windDirection: period.windDirection,
      detailedForecast: period.detailedForecast,
      icon: period.icon ?? '',
    });
  }
}
