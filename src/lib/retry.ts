import { logger as rootLogger, type Logger } from './logger.js';

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting stops any pending backoff and rejects with the signal's reason. */
  signal?: AbortSignal;
  log?: Logger;
  onRetry?: (attempt: number, error: unknown) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    super(`Gave up after ${attempts} attempts: ${String(lastError)}`);
    this.name = 'RetryExhaustedError';
  }
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldRetry = () => true,
    signal,
    log = rootLogger,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempt === maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
      const jitter = delay * (0.5 + Math.random() * 0.5);

      log.warn(
        { attempt, maxAttempts, delayMs: Math.round(jitter), error: String(error) },
        'Retrying after error',
      );
      onRetry?.(attempt, error);

      await sleep(jitter, signal);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
