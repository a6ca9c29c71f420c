import { vi } from 'vitest';
import type { Config } from '../config/index.js';

export const testConfig: Config = {
  nwsApiBase: 'https://api.weather.gov',
  nominatimApiBase: 'https://nominatim.openstreetmap.org',
  userAgent: 'weather-app/1.0',
  geocoderUserAgent: 'WeatherApp/1.0 (weather-server)',
  requestTimeoutMs: 30000,
  forecastPeriodLimit: 5,
  logLevel: 'info',
  host: 'localhost',
  port: 5000,
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Builds a fetch stand-in that answers by URL prefix. Handlers run per request
 * so a body is never read twice.
 */
export function routedFetch(routes: Array<[prefix: string, handler: () => Response]>) {
  return vi.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const url = urlOf(input);
    const route = routes.find(([prefix]) => url.startsWith(prefix));
    if (!route) {
      throw new Error(`Unexpected request to ${url}`);
    }
    return route[1]();
  });
}
