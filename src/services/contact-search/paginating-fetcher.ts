import type { ContactSearchProvider, RawSearchPage } from '../../providers/types.js';
import { AuthError, FetchError, isTransientError } from '../../lib/errors.js';
import { RetryExhaustedError, withRetry } from '../../lib/retry.js';
import { logger as rootLogger, type Logger } from '../../lib/logger.js';
import { withContinuation } from './query-translator.js';
import type { QueryRequest, ResultPage } from './types.js';

export interface FetchOptions {
  maxPages?: number;
  maxResults?: number;
  /** Total calls per page, the first one included. */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  signal?: AbortSignal;
  log?: Logger;
}

export const DEFAULT_FETCH_OPTIONS = {
  maxPages: 50,
  maxResults: 1000,
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
} as const;

/**
 * Lazily walks the continuation tokens of one request. Each page is yielded as
 * soon as it arrives; nothing is requested until the consumer asks for the
 * next page, so abandoning the iteration stops all calls. Pass a request that
 * carries a continuation token to resume an earlier run.
 */
export async function* fetchPages(
  provider: ContactSearchProvider,
  request: QueryRequest,
  options: FetchOptions = {},
): AsyncGenerator<ResultPage, void, undefined> {
  const maxPages = options.maxPages ?? DEFAULT_FETCH_OPTIONS.maxPages;
  const maxResults = options.maxResults ?? DEFAULT_FETCH_OPTIONS.maxResults;
  const { signal } = options;
  const log = (options.log ?? rootLogger).child({ requestIndex: request.index });

  let token = request.continuationToken;
  let pageNumber = 0;
  let yielded = 0;

  while (pageNumber < maxPages && yielded < maxResults) {
    const call: QueryRequest = Object.freeze({
      ...withContinuation(request, token),
      pageSize: Math.max(1, Math.min(request.pageSize, maxResults - yielded)),
    });

    let attempts = 0;
    let raw: RawSearchPage;
    try {
      raw = await withRetry(
        attempt => {
          attempts = attempt;
          return provider.searchContacts(call, signal);
        },
        {
          maxAttempts: options.maxAttempts ?? DEFAULT_FETCH_OPTIONS.maxAttempts,
          baseDelayMs: options.baseDelayMs ?? DEFAULT_FETCH_OPTIONS.baseDelayMs,
          maxDelayMs: options.maxDelayMs ?? DEFAULT_FETCH_OPTIONS.maxDelayMs,
          shouldRetry: isTransientError,
          signal,
          log,
        },
      );
    } catch (error) {
      if (signal?.aborted) throw error;
      throw toFetchError(error, provider.name, request.index, attempts, token);
    }

    pageNumber++;
    yielded += raw.contacts.length;
    log.debug({ pageNumber, records: raw.contacts.length, hasMore: Boolean(raw.nextToken) }, 'Page fetched');

    const truncated = Boolean(raw.nextToken) && (pageNumber >= maxPages || yielded >= maxResults);
    if (truncated) {
      log.info({ pages: pageNumber, records: yielded, maxPages, maxResults }, 'Pagination cap reached');
    }

    yield Object.freeze({
      requestIndex: request.index,
      pageNumber,
      records: Object.freeze(raw.contacts),
      ...(token ? { token } : {}),
      ...(raw.nextToken ? { nextToken: raw.nextToken } : {}),
      ...(truncated ? { truncated: true as const } : {}),
    });

    if (!raw.nextToken) return;
    token = raw.nextToken;
  }
}

function toFetchError(
  error: unknown,
  provider: string,
  requestIndex: number,
  attempts: number,
  lastToken: string | undefined,
): FetchError {
  if (error instanceof RetryExhaustedError) {
    return new FetchError(
      `Request ${requestIndex} failed after ${error.attempts} attempts: ${describe(error.lastError)}`,
      { provider, requestIndex, attempts: error.attempts, retryable: true, lastToken, lastError: error.lastError },
    );
  }
  if (error instanceof AuthError) {
    return new AuthError(provider, error.detail, {
      requestIndex,
      attempts,
      lastToken,
      lastError: error.lastError ?? error,
    });
  }
  return new FetchError(
    `Request ${requestIndex} failed: ${describe(error)}`,
    { provider, requestIndex, attempts, retryable: false, lastToken, lastError: error },
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
