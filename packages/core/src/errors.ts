/**
 * Error types
 *
 * Every failure the tool reports carries the process exit code it maps to.
 */

export type ErrorKind =
  | 'MissingArgument'
  | 'ConfigError'
  | 'PageNotFound'
  | 'NetworkError'
  | 'ProtocolError';

/** Process exit codes */
export const EXIT_CODES = {
  success: 0,
  usage: 1,
  pageNotFound: 2,
  network: 3,
} as const;

export abstract class RevtrackError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No page title was given on the command line */
export class MissingArgumentError extends RevtrackError {
  readonly kind = 'MissingArgument';
  readonly exitCode = EXIT_CODES.usage;

  constructor(message = 'Article name is required') {
    super(message);
  }
}

/** An environment setting could not be used */
export class ConfigError extends RevtrackError {
  readonly kind = 'ConfigError';
  readonly exitCode = EXIT_CODES.usage;

  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
  }
}

export class PageNotFoundError extends RevtrackError {
  readonly kind = 'PageNotFound';
  readonly exitCode = EXIT_CODES.pageNotFound;

  constructor(readonly title: string, readonly reason: 'missing' | 'invalid' = 'missing') {
    super(
      reason === 'invalid'
        ? `"${title}" is not a valid Wikipedia page title`
        : `No Wikipedia page found for "${title}"`
    );
  }
}

/** The request never produced a usable HTTP response */
export class NetworkError extends RevtrackError {
  readonly kind = 'NetworkError';
  readonly exitCode = EXIT_CODES.network;
}

/**
 * The API answered, but not with something we can read: a non-JSON body,
 * an `error` object, or a payload missing the fields we asked for.
 */
export class ProtocolError extends RevtrackError {
  readonly kind = 'ProtocolError';
  readonly exitCode = EXIT_CODES.network;

  constructor(message: string, readonly apiCode?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Map any thrown value to a process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof RevtrackError) return error.exitCode;
  return EXIT_CODES.network;
}
