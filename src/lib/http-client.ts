import ky, { type KyInstance, type Options } from 'ky';
import { logger } from './logger.js';

export interface JsonClientOptions {
  baseUrl: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * A ky instance bound to one upstream. ky's own retries are off: callers
 * decide what to retry. Rejected responses are logged at debug level and
 * rethrown as ky's `HTTPError`.
 */
export function createJsonClient(options: JsonClientOptions): KyInstance {
  const log = logger.child({ upstream: options.baseUrl });
  const kyOptions: Options = {
    prefixUrl: options.baseUrl,
    headers: options.headers,
    timeout: options.timeoutMs ?? 30000,
    retry: { limit: 0 },
    hooks: {
      beforeError: [
        error => {
          log.debug(
            { method: error.request.method, url: error.request.url, status: error.response.status },
            'HTTP request failed',
          );
          return error;
        },
      ],
    },
  };
  if (options.fetch) kyOptions.fetch = options.fetch;
  return ky.create(kyOptions);
}
