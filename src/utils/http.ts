import type { Logger } from 'pino';
import { FetchError } from './errors.js';

export interface FetchJsonOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  logger: Logger;
}

export type FetchJsonResult = { ok: true; data: unknown } | { ok: false; error: FetchError };

/**
 * GETs a URL and parses the body as JSON. Only a 200 counts as data; every
 * other outcome comes back as a FetchError and is logged, never thrown.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<FetchJsonResult> {
  const logger = options.logger.child({ url });
  const fail = (error: FetchError): FetchJsonResult => {
    logger.warn({ kind: error.kind, status: error.status, error: error.message }, 'Upstream request failed');
    return { ok: false, error };
  };

  let response: Response;
  try {
    response = await fetch(url, {
      headers: options.headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      return fail(new FetchError('timeout', url, `Request timed out after ${options.timeoutMs}ms`, { cause: error }));
    }
    const message = error instanceof Error ? error.message : String(error);
    return fail(new FetchError('network', url, `Request failed: ${message}`, { cause: error }));
  }

  if (response.status !== 200) {
    return fail(new FetchError('http', url, `HTTP ${response.status}`, { status: response.status }));
  }

  try {
    const data: unknown = await response.json();
    logger.debug({ status: response.status }, 'Upstream request succeeded');
    return { ok: true, data };
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      return fail(new FetchError('timeout', url, `Request timed out after ${options.timeoutMs}ms`, { cause: error }));
    }
    const message = error instanceof Error ? error.message : String(error);
    return fail(new FetchError('parse', url, `Invalid JSON body: ${message}`, { cause: error }));
  }
}
