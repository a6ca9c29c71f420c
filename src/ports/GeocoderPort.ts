export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface GeocoderPort {
  /** Resolves a free-text US place name; null when nothing matched or the lookup failed. */
  geocode(location: string): Promise<Coordinates | null>;
}
