/**
 * Error types for registry API interactions and the search/export pipeline.
 * Callers branch on the class (or on `SearchErrorType` at the engine boundary).
 */

export class RegistryApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'RegistryApiError';
  }
}

export class AuthError extends RegistryApiError {
  constructor(url: string, statusCode: number = 401) {
    super(
      `Companies House rejected the API key (${statusCode}). Check COMPANIES_HOUSE_API_KEY.`,
      statusCode,
      url
    );
    this.name = 'AuthError';
  }
}

export class RateLimitError extends RegistryApiError {
  constructor(url: string, public readonly retryAfterMs: number | null = null) {
    super(
      'Companies House rate limit exceeded (600 requests per 5 minutes).',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

export class UpstreamUnavailableError extends RegistryApiError {
  constructor(
    message: string,
    statusCode: number,
    url: string,
    public readonly lastError: Error | null = null
  ) {
    super(message, statusCode, url);
    this.name = 'UpstreamUnavailableError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EmptyExportError extends Error {
  constructor() {
    super('No companies to export');
    this.name = 'EmptyExportError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly variable: string, detail: string) {
    super(`Invalid configuration for ${variable}: ${detail}`);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when an upstream failure aborts a search part-way through.
 * Partial results are dropped; only the progress counts survive.
 */
export class AggregationError extends Error {
  constructor(
    public readonly upstreamError: Error,
    public readonly pagesFetched: number,
    public readonly recordsCollected: number
  ) {
    super(
      `${upstreamError.message} (aborted after ${pagesFetched} page${pagesFetched === 1 ? '' : 's'}, ` +
      `${recordsCollected} record${recordsCollected === 1 ? '' : 's'} collected)`
    );
    this.name = 'AggregationError';
  }
}
