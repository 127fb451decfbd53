export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code: string = 'VALIDATION_ERROR') {
    super(message, 400, code);
    this.name = 'ValidationError';
  }
}

/** Raised by providers. `transient` marks throttling and server-side faults. */
export class ProviderError extends AppError {
  readonly transient: boolean;

  constructor(provider: string, message: string, options: { transient?: boolean } = {}) {
    super(`Provider '${provider}' error: ${message}`, 502, 'PROVIDER_ERROR');
    this.name = 'ProviderError';
    this.transient = options.transient ?? false;
  }
}

export class RateLimitError extends AppError {
  constructor(provider: string) {
    super(`Rate limit exceeded for provider '${provider}'`, 429, 'RATE_LIMITED');
    this.name = 'RateLimitError';
  }
}

export class InvalidFilterError extends ValidationError {
  constructor(
    message: string,
    public readonly criterionIndex?: number,
  ) {
    super(
      criterionIndex === undefined ? message : `Criterion ${criterionIndex}: ${message}`,
      'INVALID_FILTER',
    );
    this.name = 'InvalidFilterError';
  }
}

export type UnsupportedFilterReason = 'operator' | 'mixed-operators' | 'filter-limit';

export class UnsupportedFilterError extends AppError {
  constructor(
    public readonly attribute: string,
    public readonly reason: UnsupportedFilterReason,
    detail: string,
  ) {
    super(`Filter on '${attribute}' cannot be sent to the search API: ${detail}`, 422, 'UNSUPPORTED_FILTER');
    this.name = 'UnsupportedFilterError';
  }
}

export interface FetchErrorContext {
  provider: string;
  requestIndex: number;
  attempts: number;
  retryable: boolean;
  /** Last continuation token whose page was consumed; resume from here. */
  lastToken?: string;
  lastError: unknown;
}

export class FetchError extends AppError {
  readonly provider: string;
  readonly requestIndex: number;
  readonly attempts: number;
  readonly retryable: boolean;
  readonly lastToken?: string;
  readonly lastError: unknown;

  constructor(message: string, context: FetchErrorContext, code: string = 'FETCH_FAILED') {
    super(message, 502, code);
    this.name = 'FetchError';
    this.provider = context.provider;
    this.requestIndex = context.requestIndex;
    this.attempts = context.attempts;
    this.retryable = context.retryable;
    this.lastToken = context.lastToken;
    this.lastError = context.lastError;
  }
}

/**
 * The credential handed to a provider was rejected. Never retried; refreshing
 * credentials belongs to whoever built the client.
 */
export class AuthError extends FetchError {
  constructor(
    provider: string,
    public readonly detail: string,
    context?: Partial<Omit<FetchErrorContext, 'provider'>>,
  ) {
    super(
      `Provider '${provider}' rejected credentials: ${detail}`,
      {
        provider,
        requestIndex: context?.requestIndex ?? -1,
        attempts: context?.attempts ?? 1,
        retryable: false,
        lastToken: context?.lastToken,
        lastError: context?.lastError,
      },
      'UPSTREAM_AUTH_FAILED',
    );
    this.name = 'AuthError';
  }
}

export class AggregationError extends AppError {
  constructor(
    message: string,
    public readonly requestIndex: number,
    public readonly pageNumber: number,
  ) {
    super(message, 502, 'MALFORMED_UPSTREAM_RECORD');
    this.name = 'AggregationError';
  }
}

export class SearchTimeoutError extends AppError {
  constructor(public readonly deadlineMs: number) {
    super(`Search exceeded its deadline of ${deadlineMs}ms`, 504, 'SEARCH_TIMEOUT');
    this.name = 'SearchTimeoutError';
  }
}

export interface TruncatedRequest {
  requestIndex: number;
  /** Continuation token to resume the request from. */
  nextToken: string;
}

/** One or more requests stopped at the page or result cap with results left. */
export class ResultsTruncatedError extends AppError {
  constructor(
    public readonly truncated: readonly TruncatedRequest[],
    limits: { maxPages: number; maxResults: number },
  ) {
    super(
      `${truncated.length} sub-quer${truncated.length === 1 ? 'y' : 'ies'} stopped at the cap ` +
        `(${limits.maxPages} pages or ${limits.maxResults} records) with more results available`,
      206,
      'RESULTS_TRUNCATED',
    );
    this.name = 'ResultsTruncatedError';
  }
}

export function isTransientError(error: unknown): boolean {
  if (error instanceof RateLimitError) return true;
  return error instanceof ProviderError && error.transient;
}
