/**
 * Error types raised across the crawl and digest runs
 */

/**
 * Network failure or non-success status while fetching the source page
 */
export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
  }
}

export type TimestampErrorKind = 'missing' | 'invalid';

/**
 * A timestamp that is absent or cannot be read as an instant
 */
export class TimestampParseError extends Error {
  readonly kind: TimestampErrorKind;
  readonly raw: string | undefined;

  constructor(kind: TimestampErrorKind, raw: string | undefined) {
    super(kind === 'missing' ? 'Timestamp is missing' : `Invalid timestamp: ${raw ?? ''}`);
    this.name = 'TimestampParseError';
    this.kind = kind;
    this.raw = raw;
  }
}

/**
 * Reading or appending the article store failed
 */
export class StoreIOError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreIOError';
    this.path = path;
  }
}

/**
 * A configuration document exists but cannot be used
 */
export class ConfigError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * Nothing to render: no articles, or no topics to group them by
 */
export class EmptyDigestError extends Error {
  readonly reason: 'no-articles' | 'no-topics';

  constructor(reason: 'no-articles' | 'no-topics') {
    super(reason === 'no-articles' ? 'No articles to process' : 'No topics to process');
    this.name = 'EmptyDigestError';
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
