export class ForecastServiceError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ForecastServiceError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type FetchErrorKind = 'http' | 'timeout' | 'network' | 'parse';

/** Describes why an upstream GET produced no data. Returned by fetchJson, not thrown. */
export class FetchError extends ForecastServiceError {
  public readonly kind: FetchErrorKind;
  public readonly url: string;
  public readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    details: { status?: number; cause?: unknown } = {}
  ) {
    super(message, `FETCH_${kind.toUpperCase()}`, { cause: details.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = details.status;
  }
}

/**
 * An expected failure of one hop of a forecast lookup. The message is shown to
 * the caller as-is.
 */
export class ForecastLookupError extends ForecastServiceError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'ForecastLookupError';
  }
}

export class LocationNotFoundError extends ForecastLookupError {
  constructor(location: string, options?: ErrorOptions) {
    super(
      `Could not find location '${location}'. Please try a valid US city or state name.`,
      'LOCATION_NOT_FOUND',
      options
    );
    this.name = 'LocationNotFoundError';
  }
}

export class OutOfCoverageAreaError extends ForecastLookupError {
  constructor(options?: ErrorOptions) {
    super('This location is not in a US forecast area.', 'OUT_OF_COVERAGE_AREA', options);
    this.name = 'OutOfCoverageAreaError';
  }
}

export class ForecastUnavailableError extends ForecastLookupError {
  constructor(options?: ErrorOptions) {
    super('Forecast data not available for this location.', 'FORECAST_UNAVAILABLE', options);
    this.name = 'ForecastUnavailableError';
  }
}

export class FetchFailedError extends ForecastLookupError {
  constructor(options?: ErrorOptions) {
    super('Unable to fetch forecast data.', 'FETCH_FAILED', options);
    this.name = 'FetchFailedError';
  }
}

export class UpstreamResponseError extends ForecastServiceError {
  constructor(service: string, message: string, options?: ErrorOptions) {
    super(message, `UPSTREAM_${service.toUpperCase()}`, options);
    this.name = 'UpstreamResponseError';
  }
}

export class ConfigError extends ForecastServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
