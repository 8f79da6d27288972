/**
 * Page revision history
 *
 * Builds the prop=revisions query for a single title and turns the raw API
 * payload into a PageHistory, decided once at parse time.
 */

import { MediaWikiClient } from '../api/client.js';
import type { ApiParams, PageInfo, RevisionsQueryResponse, TitleMapping } from '../api/types.js';
import type { HistoryConfig } from '../config/index.js';
import { PageNotFoundError, ProtocolError } from '../errors.js';

/** A single saved edit */
export interface RevisionRecord {
  /** ISO 8601 timestamp as returned by the API */
  timestamp: string;
  /** Username, or IP address for anonymous edits */
  editor: string;
}

/** Editor shown when the username is hidden or absent */
export const UNKNOWN_EDITOR = 'Unknown';

export type PageHistory =
  | { kind: 'missing'; title: string; reason: 'missing' | 'invalid' }
  | { kind: 'redirected'; requestedTitle: string; resolvedTo: string; revisions: RevisionRecord[] }
  | { kind: 'found'; title: string; revisions: RevisionRecord[] };

/** Flat view of a PageHistory */
export interface PageQueryResult {
  exists: boolean;
  /** Title the requested page redirects to, when a redirect was followed */
  resolvedTo?: string;
  revisions: RevisionRecord[];
}

/**
 * Build request parameters for the newest `limit` revisions of a title
 */
export function buildRevisionQuery(title: string, config: Pick<HistoryConfig, 'limit'>): ApiParams {
  return {
    action: 'query',
    prop: 'revisions',
    titles: title,
    rvprop: 'timestamp|user',
    rvlimit: config.limit,
    rvdir: 'older',
    redirects: 1,
  };
}

/** formatversion=1 sends flags as empty strings, formatversion=2 as booleans */
function isFlagSet(flag: unknown): boolean {
  return flag === true || flag === '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPageInfo(value: unknown): value is PageInfo {
  return isRecord(value) && typeof value.title === 'string';
}

function isTitleMapping(value: unknown): value is TitleMapping {
  return isRecord(value) && typeof value.from === 'string' && typeof value.to === 'string';
}

function firstPage(pages: unknown): PageInfo {
  const candidates: unknown[] = Array.isArray(pages)
    ? pages
    : isRecord(pages) ? Object.values(pages) : [];
  const page = candidates[0];
  if (candidates.length === 0) {
    throw new ProtocolError('No page data found in API response');
  }
  if (!isPageInfo(page)) {
    throw new ProtocolError('Malformed page entry in API response');
  }
  return page;
}

function toRevisionRecord(revision: unknown, index: number): RevisionRecord {
  const entry: Record<string, unknown> = isRecord(revision) ? revision : {};
  const { timestamp, user } = entry;
  if (typeof timestamp !== 'string') {
    throw new ProtocolError(`Malformed revision at position ${index} in API response`);
  }
  const hidden = isFlagSet(entry.userhidden);
  return {
    timestamp,
    editor: !hidden && typeof user === 'string' && user ? user : UNKNOWN_EDITOR,
  };
}

/**
 * Interpret a prop=revisions response for one requested title
 *
 * @throws ProtocolError when the payload carries an API error or lacks page data
 */
export function interpretRevisionResponse(raw: unknown, requestedTitle: string): PageHistory {
  if (!isRecord(raw)) {
    throw new ProtocolError('Invalid response from Wikipedia API');
  }

  const data = raw as RevisionsQueryResponse;

  if (data.error) {
    const code = data.error.code ?? 'unknown';
    const info = data.error.info ?? 'Unknown error';
    throw new ProtocolError(`API error (${code}): ${info}`, code);
  }

  if (!isRecord(data.query)) {
    throw new ProtocolError('No page data found in API response');
  }

  const page = firstPage(data.query.pages);

  if (isFlagSet(page.invalid)) {
    return { kind: 'missing', title: requestedTitle, reason: 'invalid' };
  }
  if (isFlagSet(page.missing)) {
    return { kind: 'missing', title: page.title, reason: 'missing' };
  }

  const rawRevisions: unknown = page.revisions ?? [];
  if (!Array.isArray(rawRevisions)) {
    throw new ProtocolError('Malformed revision list in API response');
  }
  const revisions = rawRevisions.map(toRevisionRecord);

  const redirects = Array.isArray(data.query.redirects)
    ? data.query.redirects.filter(isTitleMapping)
    : [];

  if (redirects.length > 0) {
    // Chains are listed in order; the last hop is the page we got history for.
    const resolvedTo = redirects[redirects.length - 1].to;
    return { kind: 'redirected', requestedTitle, resolvedTo, revisions };
  }

  return { kind: 'found', title: page.title, revisions };
}

/**
 * Flatten a PageHistory
 */
export function toPageQueryResult(history: PageHistory): PageQueryResult {
  switch (history.kind) {
    case 'missing':
      return { exists: false, revisions: [] };
    case 'redirected':
      return { exists: true, resolvedTo: history.resolvedTo, revisions: history.revisions };
    case 'found':
      return { exists: true, revisions: history.revisions };
  }
}

/**
 * Fetch and interpret the recent history of one page
 */
export async function fetchPageHistory(
  title: string,
  config: HistoryConfig,
  options: { onRequest?: (url: string) => void } = {}
): Promise<PageHistory> {
  const client = new MediaWikiClient({
    apiUrl: config.apiUrl,
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    onRequest: options.onRequest,
  });

  const raw = await client.get(buildRevisionQuery(title, config));
  return interpretRevisionResponse(raw, title);
}

/**
 * Fetch a page's history, failing with PageNotFoundError when it does not exist
 */
export async function requirePageHistory(
  title: string,
  config: HistoryConfig,
  options: { onRequest?: (url: string) => void } = {}
): Promise<Exclude<PageHistory, { kind: 'missing' }>> {
  const history = await fetchPageHistory(title, config, options);
  if (history.kind === 'missing') {
    throw new PageNotFoundError(history.title, history.reason);
  }
  return history;
}
