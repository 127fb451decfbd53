import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/api/index.js';
import { ContactSearchService } from '../../src/services/contact-search/index.js';
import { DirectoryService } from '../../src/services/directory/index.js';
import type { DirectoryProvider, RawSearchPage } from '../../src/providers/types.js';
import type { QueryRequest } from '../../src/services/contact-search/types.js';
import { ProviderError } from '../../src/lib/errors.js';
import { DAY, FakeProvider, HOUR, T0, contact } from '../helpers/fake-provider.js';

const API_KEY = 'test-secret';
const auth = { authorization: `Bearer ${API_KEY}` };
const timeRange = { start: T0, end: T0 + DAY };

const directoryProvider: DirectoryProvider = {
  describeInstance: async () => ({ id: 'inst-1', arn: 'arn:inst-1' }),
  listQueues: async () => [{ id: 'q-1', arn: 'arn:q-1', name: 'Sales' }],
  listUsers: async () => [{ id: 'u-1', arn: 'arn:u-1', username: 'ann' }],
  getCurrentUserData: async () => [{ userId: 'u-1', statusName: 'Available' }],
};

let respond: (request: QueryRequest) => RawSearchPage;
let app: FastifyInstance;

beforeEach(async () => {
  respond = () => ({
    contacts: [
      contact('c-1', T0 + HOUR, { queue: 'Sales', attributes: { tier: 'gold' } }),
      contact('c-2', T0 + 2 * HOUR, { queue: 'Sales', agent: 'ann', attributes: {} }),
    ],
  });
  const provider = new FakeProvider(request => respond(request));
  app = await buildApp(API_KEY, {
    searchService: new ContactSearchService(provider, { baseDelayMs: 1 }),
    directory: new DirectoryService(directoryProvider),
  });
});

afterEach(async () => {
  await app.close();
});

describe('API', () => {
  it('serves health checks without a key', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', provider: 'fake' });
  });

  it('rejects requests without a valid key', async () => {
    const missing = await app.inject({ method: 'POST', url: '/api/contacts/search', payload: { queues: ['Sales'] } });
    const wrong = await app.inject({
      method: 'POST',
      url: '/api/contacts/search',
      headers: { authorization: 'Bearer wrong' },
      payload: { queues: ['Sales'] },
    });

    expect(missing.statusCode).toBe(401);
    expect(missing.json()).toEqual({ error: 'UNAUTHORIZED', message: 'Missing or invalid API key' });
    expect(wrong.statusCode).toBe(401);
  });

  it('returns search results with stats', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/contacts/search',
      headers: auth,
      payload: { queues: ['Sales'], timeRange },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      data: [
        { contactId: 'c-2', initiatedAt: T0 + 2 * HOUR, queue: 'Sales', agent: 'ann', attributes: {} },
        { contactId: 'c-1', initiatedAt: T0 + HOUR, queue: 'Sales', attributes: { tier: 'gold' } },
      ],
      meta: {
        partial: false,
        total: 2,
        stats: { requests: 1, pages: 1, fetched: 2, duplicates: 0, discarded: 0 },
      },
    });
  });

  it('flags results cut short by the page cap and returns the resume token', async () => {
    respond = () => ({ contacts: [contact('c-1', T0 + HOUR)], nextToken: 'more' });

    const res = await app.inject({
      method: 'POST',
      url: '/api/contacts/search',
      headers: auth,
      payload: { queues: ['Sales'], timeRange },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data).toHaveLength(1);
    expect(body.meta.partial).toBe(true);
    expect(body.meta.stats).toEqual({ requests: 1, pages: 50, fetched: 50, duplicates: 49, discarded: 0 });
    expect(body.meta.error).toEqual({
      code: 'RESULTS_TRUNCATED',
      message: '1 sub-query stopped at the cap (50 pages or 1000 records) with more results available',
      truncated: [{ requestIndex: 0, nextToken: 'more' }],
    });
  });

  it('maps invalid filters to 400 with the criterion index', async () => {
    const empty = await app.inject({ method: 'POST', url: '/api/contacts/search', headers: auth, payload: {} });
    const badOperator = await app.inject({
      method: 'POST',
      url: '/api/contacts/search',
      headers: auth,
      payload: { criteria: [{ attribute: 'queue', operator: 'like', value: 'S' }] },
    });

    expect(empty.statusCode).toBe(400);
    expect(empty.json()).toEqual({ error: 'INVALID_FILTER', message: 'At least one search criterion is required' });
    expect(badOperator.statusCode).toBe(400);
    expect(badOperator.json()).toMatchObject({ error: 'INVALID_FILTER', details: { criterionIndex: 0 } });
  });

  it('maps a failed sub-query to 502 with fetch details', async () => {
    respond = () => {
      throw new ProviderError('fake', 'query rejected');
    };

    const res = await app.inject({
      method: 'POST',
      url: '/api/contacts/search',
      headers: auth,
      payload: { queues: ['Sales'], timeRange },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toEqual({
      error: 'FETCH_FAILED',
      message: "Request 0 failed: Provider 'fake' error: query rejected",
      details: { provider: 'fake', requestIndex: 0, attempts: 1, retryable: false, lastToken: null },
    });
  });

  it('describes the plan without searching', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/contacts/search/plan',
      headers: auth,
      payload: {
        criteria: [{ attribute: 'agent', operator: 'contains', value: 'an' }],
        queues: ['Sales'],
        timeRange: { start: T0, end: T0 + 2 * DAY },
      },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data.requests).toHaveLength(2);
    expect(body.data.timeRange).toEqual({ start: T0, end: T0 + 2 * DAY });
    expect(body.data.deferred).toEqual([
      { attribute: 'agent', criteria: [{ attribute: 'agent', operator: 'contains', value: 'an' }], reason: 'operator' },
    ]);
  });

  it('exports results as CSV', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/contacts/search/export',
      headers: auth,
      payload: { queues: ['Sales'], timeRange },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="contacts.csv"');
    expect(res.headers['x-search-partial']).toBe('false');
    expect(res.body.replace(/^\uFEFF/, '').split(/\r?\n/)[0]).toBe('Contact Id,Initiated At,Queue,Agent,tier');
  });

  it('lists directory queues and current user statuses', async () => {
    const queues = await app.inject({ method: 'GET', url: '/api/directory/queues', headers: auth });
    const statuses = await app.inject({
      method: 'POST',
      url: '/api/directory/current-user-data',
      headers: auth,
      payload: { queues: ['Sales'] },
    });

    expect(queues.json()).toEqual({ data: [{ id: 'q-1', arn: 'arn:q-1', name: 'Sales' }] });
    expect(statuses.json()).toEqual({ data: [{ userName: 'ann', statusName: 'Available' }] });
  });

  it('validates the current user data request', async () => {
    const empty = await app.inject({
      method: 'POST',
      url: '/api/directory/current-user-data',
      headers: auth,
      payload: { queues: [] },
    });
    const unknown = await app.inject({
      method: 'POST',
      url: '/api/directory/current-user-data',
      headers: auth,
      payload: { queues: ['Billing'] },
    });

    expect(empty.statusCode).toBe(400);
    expect(empty.json()).toMatchObject({ error: 'VALIDATION_ERROR' });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({ error: 'NOT_FOUND', message: "Queue 'Billing' not found" });
  });
});
