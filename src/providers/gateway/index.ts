import { HTTPError, TimeoutError, type KyInstance } from 'ky';
import { BaseProvider, type RateLimit } from '../base.js';
import type { ContactSearchProvider, RawSearchPage, SearchCapabilities } from '../types.js';
import type { QueryRequest } from '../../services/contact-search/types.js';
import { createJsonClient } from '../../lib/http-client.js';
import { AuthError, ProviderError, RateLimitError } from '../../lib/errors.js';
import { mapGatewayContact, toGatewayRequest } from './mappers.js';
import type { GatewaySearchResponse } from './types.js';

export interface GatewayProviderOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  rateLimit?: RateLimit;
  fetch?: typeof fetch;
}

/**
 * Contact search behind a JSON gateway: `POST /contacts/search` answering
 * `{ contacts, next_token }`. Used when the contact center is fronted by an
 * internal search service instead of being queried directly.
 */
export class GatewayProvider extends BaseProvider implements ContactSearchProvider {
  readonly name = 'gateway';
  readonly displayName = 'Contact Search Gateway';
  readonly capabilities: SearchCapabilities = {
    fields: {
      queue: { operators: ['equals', 'contains'], maxValuesPerRequest: 50 },
      agent: { operators: ['equals', 'contains'], maxValuesPerRequest: 50 },
      channel: { operators: ['equals'], maxValuesPerRequest: 10 },
    },
    customAttributes: { operators: ['equals', 'contains', 'in-range'], maxValuesPerRequest: 25 },
    maxFiltersPerRequest: 10,
    requiresTimeRange: false,
    maxPageSize: 200,
  };

  private readonly http: KyInstance;

  constructor(options: GatewayProviderOptions) {
    super({ rateLimit: options.rateLimit ?? { perSecond: 10, perMinute: 300 } });
    this.http = createJsonClient({
      baseUrl: options.baseUrl.replace(/\/+$/, ''),
      headers: { Authorization: `Bearer ${options.apiKey}` },
      timeoutMs: options.timeoutMs ?? 15000,
      fetch: options.fetch,
    });
    this.log = this.log.child({ provider: this.name });
  }

  async searchContacts(request: QueryRequest, signal?: AbortSignal): Promise<RawSearchPage> {
    await this.acquireSlot(signal);

    try {
      const raw = await this.http
        .post('contacts/search', { json: toGatewayRequest(request), signal })
        .json<GatewaySearchResponse>();
      return {
        contacts: (raw.contacts ?? []).map(mapGatewayContact),
        nextToken: raw.next_token || undefined,
      };
    } catch (error) {
      if (signal?.aborted) throw error;
      throw this.classifyError(error);
    }
  }

  private classifyError(error: unknown): Error {
    if (error instanceof HTTPError) {
      const status = error.response.status;
      if (status === 429) return new RateLimitError(this.name);
      if (status === 401 || status === 403) {
        return new AuthError(this.name, `HTTP ${status}`, { lastError: error });
      }
      if (status >= 500) {
        return new ProviderError(this.name, `HTTP ${status}`, { transient: true });
      }
      this.log.error({ status }, 'Gateway rejected the search request');
      return new ProviderError(this.name, `HTTP ${status}`);
    }
    if (error instanceof TimeoutError) {
      return new ProviderError(this.name, 'request timed out', { transient: true });
    }
    // fetch rejects with TypeError on network failures (connection reset, DNS)
    if (error instanceof TypeError) {
      return new ProviderError(this.name, error.message, { transient: true });
    }
    return new ProviderError(this.name, error instanceof Error ? error.message : String(error));
  }
}
