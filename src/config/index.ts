import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // Upstream services
  nwsApiBase: z.string().url().default('https://api.weather.gov'),
  nominatimApiBase: z.string().url().default('https://nominatim.openstreetmap.org'),
  userAgent: z.string().min(1).default('weather-app/1.0'),
  // Nominatim asks every client to identify itself distinctly
  geocoderUserAgent: z.string().min(1).default('WeatherApp/1.0 (weather-server)'),
  requestTimeoutMs: z.coerce.number().int().positive().default(30000),
  forecastPeriodLimit: z.coerce.number().int().positive().default(5),

  // App
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  host: z.string().default('localhost'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    nwsApiBase: env('NWS_API_BASE'),
    nominatimApiBase: env('NOMINATIM_API_BASE'),
    userAgent: env('USER_AGENT'),
    geocoderUserAgent: env('GEOCODER_USER_AGENT'),
    requestTimeoutMs: env('REQUEST_TIMEOUT_MS'),
    forecastPeriodLimit: env('FORECAST_PERIOD_LIMIT'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}
