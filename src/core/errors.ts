/**
 * Custom error types for archive access and startup configuration.
 * Enables callers to handle different failure modes appropriately.
 */

export class SecApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'SecApiError';
  }
}

export class NotFoundError extends SecApiError {
  constructor(url: string, detail: string = '') {
    super(
      `Not found: ${detail || url}`,
      404,
      url
    );
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends SecApiError {
  constructor(url: string) {
    super(
      'SEC archive rate limit exceeded. Raise SEC_MIN_INTERVAL_MS to slow the crawl down.',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

/** Raised only while loading configuration, before any crawl starts */
export class ConfigError extends Error {
  constructor(message: string, public readonly key: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class UnknownTickerError extends Error {
  constructor(
    public readonly ticker: string,
    public readonly tracked: string[] = []
  ) {
    const msg = tracked.length > 0
      ? `Ticker "${ticker}" is not in the roster. Tracked tickers: ${tracked.join(', ')}`
      : `Ticker "${ticker}" is not in the roster.`;
    super(msg);
    this.name = 'UnknownTickerError';
  }
}
