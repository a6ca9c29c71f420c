import { z } from 'zod';
import type { Coordinates, GeocoderPort } from '../../ports/GeocoderPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { fetchJson } from '../../utils/http.js';
import { UpstreamResponseError } from '../../utils/errors.js';

const searchResultSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string().optional(),
});

export class NominatimAdapter implements GeocoderPort {
  private readonly logger = createLogger({ adapter: 'NominatimAdapter' });
  private readonly baseUrl: string;

  constructor(private readonly config: Config) {
    this.baseUrl = config.nominatimApiBase.replace(/\/+$/, '');
  }

  async geocode(location: string): Promise<Coordinates | null> {
    const logger = this.logger.child({ method: 'geocode', location });

    const params = new URLSearchParams({
      q: location,
      format: 'json',
      limit: '1',
      countrycodes: 'us',
    });
    const result = await fetchJson(`${this.baseUrl}/search?${params.toString()}`, {
      headers: { 'User-Agent': this.config.geocoderUserAgent },
      timeoutMs: this.config.requestTimeoutMs,
      logger,
    });

    if (!result.ok || !Array.isArray(result.data) || result.data.length === 0) {
      logger.info('No geocoding match');
      return null;
    }

    const parsed = searchResultSchema.safeParse(result.data[0]);
    if (!parsed.success) {
      throw new UpstreamResponseError(
        'nominatim',
        `Unexpected geocoding response: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }

    const { lat, lon, display_name: displayName } = parsed.data;
    logger.debug({ displayName, latitude: lat, longitude: lon }, 'Location geocoded');
    return { latitude: lat, longitude: lon };
  }
}
