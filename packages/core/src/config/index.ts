/**
 * History configuration
 *
 * Endpoint, request size and client settings are resolved once from the
 * environment and passed to each fetch.
 */

import { VERSION } from '../version.js';
import { ConfigError } from '../errors.js';

export interface HistoryConfig {
  /** MediaWiki API endpoint (e.g., https://en.wikipedia.org/w/api.php) */
  apiUrl: string;
  /** Number of revisions to request, newest first */
  limit: number;
  /** User agent string */
  userAgent: string;
  /** Request timeout (ms) */
  timeoutMs: number;
}

/** Largest delay setTimeout accepts */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Upper bound on revisions per request */
export const MAX_REVISIONS = 30;

/** Build the API endpoint for a Wikipedia language edition */
export function wikipediaApiUrl(lang = 'en'): string {
  return `https://${lang}.wikipedia.org/w/api.php`;
}

export const DEFAULT_CONFIG: HistoryConfig = {
  apiUrl: wikipediaApiUrl('en'),
  limit: MAX_REVISIONS,
  userAgent: `revtrack/${VERSION} (command-line revision history viewer)`,
  timeoutMs: 10000,
};

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, key: string, min: number, max: number): number | undefined {
  const raw = readString(env, key);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(key, `expected an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new ConfigError(key, `must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function readApiUrl(env: Env): string | undefined {
  const raw = readString(env, 'REVTRACK_API_URL');
  if (raw !== undefined) {
    let url: URL;
    try {
      url = new URL(raw);
    } catch {
      throw new ConfigError('REVTRACK_API_URL', `not a valid URL: "${raw}"`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigError('REVTRACK_API_URL', `unsupported protocol ${url.protocol}`);
    }
    return url.toString();
  }

  const lang = readString(env, 'REVTRACK_LANG');
  if (lang !== undefined) {
    if (!/^[a-z][a-z0-9-]*$/.test(lang)) {
      throw new ConfigError('REVTRACK_LANG', `not a language code: "${lang}"`);
    }
    return wikipediaApiUrl(lang);
  }

  return undefined;
}

/**
 * Resolve configuration from environment variables over the defaults
 */
export function resolveHistoryConfig(env: Env = process.env): HistoryConfig {
  return {
    apiUrl: readApiUrl(env) ?? DEFAULT_CONFIG.apiUrl,
    limit: readInteger(env, 'REVTRACK_LIMIT', 1, MAX_REVISIONS) ?? DEFAULT_CONFIG.limit,
    userAgent: readString(env, 'REVTRACK_USER_AGENT') ?? DEFAULT_CONFIG.userAgent,
    timeoutMs: readInteger(env, 'REVTRACK_TIMEOUT_MS', 1, MAX_TIMEOUT_MS) ?? DEFAULT_CONFIG.timeoutMs,
  };
}

/** Whether request URLs should be echoed to stderr */
export function isDebugEnabled(env: Env = process.env): boolean {
  const value = readString(env, 'REVTRACK_DEBUG');
  return value === '1' || value === 'true';
}
