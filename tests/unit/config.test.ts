import { describe, it, expect } from 'vitest';
import { envSchema, toConfig } from '../../src/config/schema.js';

describe('envSchema', () => {
  it('applies defaults for a Connect deployment', () => {
    const parsed = envSchema.parse({ API_KEY: 'test-secret', CONNECT_INSTANCE_ID: 'inst-1' });
    const config = toConfig(parsed);

    expect(config.provider).toBe('connect');
    expect(config.apiPort).toBe(3000);
    expect(config.connect).toEqual({ region: undefined, instanceId: 'inst-1', hydrateAttributes: false });
    expect(config.search).toEqual({
      concurrency: 4,
      deadlineMs: 30_000,
      maxPages: 50,
      maxResults: 1000,
      pageSize: 100,
      maxAttempts: 3,
      baseDelayMs: 250,
      defaultLookbackMs: 24 * 60 * 60 * 1000,
    });
  });

  it('coerces numeric and boolean settings', () => {
    const config = toConfig(
      envSchema.parse({
        API_KEY: 'test-secret',
        CONNECT_INSTANCE_ID: 'inst-1',
        CONNECT_HYDRATE_ATTRIBUTES: '1',
        SEARCH_CONCURRENCY: '8',
        SEARCH_LOOKBACK_HOURS: '2',
      }),
    );

    expect(config.connect.hydrateAttributes).toBe(true);
    expect(config.search.concurrency).toBe(8);
    expect(config.search.defaultLookbackMs).toBe(2 * 60 * 60 * 1000);
  });

  it('requires the instance id for Connect', () => {
    const result = envSchema.safeParse({ API_KEY: 'test-secret' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.flatten().fieldErrors.CONNECT_INSTANCE_ID).toEqual(['Required when SEARCH_PROVIDER is connect']);
  });

  it('requires the gateway URL and key for the gateway provider', () => {
    const result = envSchema.safeParse({ API_KEY: 'test-secret', SEARCH_PROVIDER: 'gateway' });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(Object.keys(result.error.flatten().fieldErrors).sort()).toEqual(['GATEWAY_API_KEY', 'GATEWAY_URL']);
  });

  it('rejects an out-of-range concurrency', () => {
    expect(
      envSchema.safeParse({ API_KEY: 'test-secret', CONNECT_INSTANCE_ID: 'inst-1', SEARCH_CONCURRENCY: '0' }).success,
    ).toBe(false);
  });
});
