import { describe, it, expect } from 'vitest';
import { fetchPages } from '../../src/services/contact-search/paginating-fetcher.js';
import { AuthError, FetchError, ProviderError, RateLimitError } from '../../src/lib/errors.js';
import type { QueryRequest, ResultPage } from '../../src/services/contact-search/types.js';
import { FakeProvider, T0, contact } from '../helpers/fake-provider.js';

const baseRequest: QueryRequest = {
  index: 3,
  filters: [{ attribute: 'queue', operator: 'equals', values: ['Sales'] }],
  timeRange: { start: T0, end: T0 + 1000 },
  pageSize: 10,
};

const fast = { baseDelayMs: 1, maxDelayMs: 2 };

async function collect(pages: AsyncIterable<ResultPage>): Promise<ResultPage[]> {
  const collected: ResultPage[] = [];
  for await (const page of pages) collected.push(page);
  return collected;
}

async function collectUntilError(pages: AsyncIterable<ResultPage>): Promise<{ pages: ResultPage[]; error: unknown }> {
  const collected: ResultPage[] = [];
  try {
    for await (const page of pages) collected.push(page);
  } catch (error) {
    return { pages: collected, error };
  }
  throw new Error('expected the iteration to fail');
}

describe('fetchPages', () => {
  it('follows continuation tokens until the provider returns none', async () => {
    const next: Record<string, string | undefined> = { t1: 't2', t2: 't3', t3: undefined };
    const provider = new FakeProvider(request => {
      const token = request.continuationToken ?? '';
      return { contacts: [contact(`c-${token}`, T0)], nextToken: next[token] };
    });

    const pages = await collect(fetchPages(provider, { ...baseRequest, continuationToken: 't1' }, fast));

    expect(pages).toHaveLength(3);
    expect(provider.calls.map(c => c.continuationToken)).toEqual(['t1', 't2', 't3']);
    expect(pages.map(p => [p.pageNumber, p.token, p.nextToken])).toEqual([
      [1, 't1', 't2'],
      [2, 't2', 't3'],
      [3, 't3', undefined],
    ]);
    expect(pages.every(p => p.requestIndex === 3)).toBe(true);
  });

  it('starts a fresh request without a token', async () => {
    const provider = new FakeProvider(() => ({ contacts: [contact('c-1', T0)] }));

    const pages = await collect(fetchPages(provider, baseRequest, fast));

    expect(pages).toHaveLength(1);
    expect(provider.calls[0].continuationToken).toBeUndefined();
    expect('token' in pages[0]).toBe(false);
    expect(Object.isFrozen(pages[0])).toBe(true);
  });

  it('does not call the provider before the first page is requested', () => {
    const provider = new FakeProvider(() => ({ contacts: [] }));

    fetchPages(provider, baseRequest, fast);

    expect(provider.calls).toHaveLength(0);
  });

  it('stops calling the provider when the consumer stops early', async () => {
    const provider = new FakeProvider(() => ({ contacts: [contact('c-1', T0)], nextToken: 'more' }));

    for await (const page of fetchPages(provider, baseRequest, fast)) {
      expect(page.pageNumber).toBe(1);
      break;
    }

    expect(provider.calls).toHaveLength(1);
  });

  it('stops at the page cap', async () => {
    let n = 0;
    const provider = new FakeProvider(() => ({ contacts: [contact(`c-${n++}`, T0)], nextToken: `t${n}` }));

    const pages = await collect(fetchPages(provider, baseRequest, { ...fast, maxPages: 2 }));

    expect(pages).toHaveLength(2);
    expect(provider.calls).toHaveLength(2);
    expect(pages.map(p => p.truncated)).toEqual([undefined, true]);
    expect(pages[1].nextToken).toBe('t2');
  });

  it('does not flag a request whose last page lands exactly on the cap', async () => {
    const provider = new FakeProvider(request =>
      request.continuationToken ? { contacts: [contact('c-1', T0)] } : { contacts: [contact('c-0', T0)], nextToken: 't1' },
    );

    const pages = await collect(fetchPages(provider, baseRequest, { ...fast, maxPages: 2 }));

    expect(pages).toHaveLength(2);
    expect(pages.some(p => p.truncated)).toBe(false);
  });

  it('shrinks the last page to stay within the result cap', async () => {
    let n = 0;
    const provider = new FakeProvider(request => ({
      contacts: Array.from({ length: request.pageSize }, () => contact(`c-${n++}`, T0)),
      nextToken: 'more',
    }));

    const pages = await collect(fetchPages(provider, baseRequest, { ...fast, maxResults: 15 }));

    expect(provider.calls.map(c => c.pageSize)).toEqual([10, 5]);
    expect(pages.map(p => p.records.length)).toEqual([10, 5]);
    expect(pages[1].truncated).toBe(true);
  });

  it('retries transient failures and succeeds within the attempt budget', async () => {
    let calls = 0;
    const provider = new FakeProvider(() => {
      calls++;
      if (calls <= 2) throw new RateLimitError('fake');
      return { contacts: [contact('c-1', T0)] };
    });

    const pages = await collect(fetchPages(provider, baseRequest, { ...fast, maxAttempts: 3 }));

    expect(pages).toHaveLength(1);
    expect(provider.calls).toHaveLength(3);
  });

  it('raises a retryable FetchError once attempts run out, keeping the last token', async () => {
    const provider = new FakeProvider(request => {
      if (!request.continuationToken) return { contacts: [contact('c-1', T0)], nextToken: 'n1' };
      throw new ProviderError('fake', 'upstream unavailable', { transient: true });
    });

    const { pages, error } = await collectUntilError(fetchPages(provider, baseRequest, { ...fast, maxAttempts: 3 }));

    expect(pages).toHaveLength(1);
    expect(provider.calls).toHaveLength(4);
    expect(error).toBeInstanceOf(FetchError);
    if (!(error instanceof FetchError)) return;
    expect(error.retryable).toBe(true);
    expect(error.attempts).toBe(3);
    expect(error.requestIndex).toBe(3);
    expect(error.lastToken).toBe('n1');
    expect(error.provider).toBe('fake');
    expect(error.lastError).toBeInstanceOf(ProviderError);
  });

  it('does not retry a terminal provider error', async () => {
    const provider = new FakeProvider(() => {
      throw new ProviderError('fake', 'bad request');
    });

    const { error } = await collectUntilError(fetchPages(provider, baseRequest, fast));

    expect(provider.calls).toHaveLength(1);
    expect(error).toBeInstanceOf(FetchError);
    if (!(error instanceof FetchError)) return;
    expect(error.retryable).toBe(false);
    expect(error.attempts).toBe(1);
    expect(error.message).toBe("Request 3 failed: Provider 'fake' error: bad request");
  });

  it('surfaces rejected credentials as AuthError without retrying', async () => {
    const provider = new FakeProvider(() => {
      throw new AuthError('fake', 'HTTP 401');
    });

    const { error } = await collectUntilError(fetchPages(provider, baseRequest, fast));

    expect(provider.calls).toHaveLength(1);
    expect(error).toBeInstanceOf(AuthError);
    if (!(error instanceof AuthError)) return;
    expect(error.requestIndex).toBe(3);
    expect(error.retryable).toBe(false);
    expect(error.code).toBe('UPSTREAM_AUTH_FAILED');
  });

  it('rethrows the abort reason instead of wrapping it', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    const provider = new FakeProvider(() => {
      controller.abort(reason);
      throw new RateLimitError('fake');
    });

    const { error } = await collectUntilError(fetchPages(provider, baseRequest, { ...fast, signal: controller.signal }));

    expect(error).toBe(reason);
    expect(provider.calls).toHaveLength(1);
  });
});
