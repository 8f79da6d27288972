/**
 * MediaWiki API type definitions
 *
 * Shapes are as sent with formatversion=2; legacy (formatversion=1) payloads
 * use keyed page objects and empty-string flags, which the interpreter
 * also accepts.
 */

/** API error */
export interface ApiError {
  code: string;
  info: string;
  docref?: string;
}

/** API response wrapper */
export interface ApiResponse {
  error?: ApiError;
  warnings?: Record<string, unknown>;
  batchcomplete?: boolean | string;
}

/** Title rewrite reported by the API (redirect or normalization) */
export interface TitleMapping {
  from: string;
  to: string;
  tofragment?: string;
}

/** Revision data (rvprop=timestamp|user) */
export interface Revision {
  timestamp: string;
  user?: string;
  userhidden?: boolean | string;
  anon?: boolean | string;
}

/** Page info from query */
export interface PageInfo {
  pageid?: number;
  ns?: number;
  title: string;
  missing?: boolean | string;
  invalid?: boolean | string;
  invalidreason?: string;
  revisions?: Revision[];
}

/** prop=revisions query response */
export interface RevisionsQueryResponse extends ApiResponse {
  query?: {
    normalized?: TitleMapping[];
    redirects?: TitleMapping[];
    pages?: PageInfo[] | Record<string, PageInfo>;
  };
  continue?: Record<string, string>;
}

/** Request parameters; undefined values are omitted */
export type ApiParams = Record<string, string | number | undefined>;
