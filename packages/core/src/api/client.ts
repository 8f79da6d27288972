/**
 * MediaWiki API Client
 *
 * Single-shot HTTP client for the MediaWiki Action API. Uses native fetch()
 * and complies with the Wikimedia User-Agent policy.
 */

import { NetworkError, ProtocolError } from '../errors.js';
import type { ApiParams } from './types.js';

/** Client configuration */
export interface ClientConfig {
  /** Wiki API URL (e.g., https://en.wikipedia.org/w/api.php) */
  apiUrl: string;
  /** User agent string */
  userAgent: string;
  /** Request timeout (ms) */
  timeoutMs: number;
  /** Called with the full request URL before it is sent */
  onRequest?: (url: string) => void;
}

/**
 * MediaWiki API Client
 */
export class MediaWikiClient {
  private config: ClientConfig;

  constructor(config: ClientConfig) {
    this.config = { ...config };
  }

  /**
   * Build the GET URL for a set of parameters
   */
  buildUrl(params: ApiParams): string {
    const url = new URL(this.config.apiUrl);
    url.searchParams.set('format', 'json');
    url.searchParams.set('formatversion', '2');

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    return url.toString();
  }

  /**
   * Make a GET request to the API. Issued once; failures are not retried.
   */
  async get(params: ApiParams): Promise<unknown> {
    const url = this.buildUrl(params);
    this.config.onRequest?.(url);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          'Accept': 'application/json',
        },
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeout);
      throw new NetworkError(describeTransportError(error, this.config.timeoutMs), { cause: error });
    }

    try {
      if (!response.ok) {
        throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`);
      }

      const body = await response.text();
      try {
        return JSON.parse(body) as unknown;
      } catch (error) {
        throw new ProtocolError('Invalid response from Wikipedia API (not JSON)', undefined, { cause: error });
      }
    } catch (error) {
      if (error instanceof NetworkError || error instanceof ProtocolError) throw error;
      throw new NetworkError(describeTransportError(error, this.config.timeoutMs), { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Describe a fetch() rejection. undici wraps the system error (ENOTFOUND,
 * ECONNREFUSED, ...) in `cause`.
 */
function describeTransportError(error: unknown, timeoutMs: number): string {
  if (error instanceof Error && error.name === 'AbortError') {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}
