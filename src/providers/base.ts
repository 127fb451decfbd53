import type { ContactSearchProvider, RawSearchPage, SearchCapabilities } from './types.js';
import type { QueryRequest } from '../services/contact-search/types.js';
import { sleep } from '../lib/retry.js';
import { logger, type Logger } from '../lib/logger.js';

export interface RateLimit {
  perSecond?: number;
  perMinute?: number;
}

export abstract class BaseProvider implements ContactSearchProvider {
  abstract readonly name: string;
  abstract readonly displayName: string;
  abstract readonly capabilities: SearchCapabilities;

  protected log: Logger = logger;

  private limits: { perSecond: number; perMinute: number };
  private sentAt: number[] = [];

  constructor(config: { rateLimit?: RateLimit } = {}) {
    this.limits = {
      perSecond: config.rateLimit?.perSecond ?? Infinity,
      perMinute: config.rateLimit?.perMinute ?? Infinity,
    };
  }

  abstract searchContacts(request: QueryRequest, signal?: AbortSignal): Promise<RawSearchPage>;

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Waits until a request slot is free in both the one-second and one-minute windows. */
  protected async acquireSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const now = Date.now();
      this.sentAt = this.sentAt.filter(t => now - t < 60_000);
      const waitMs = this.waitTime(now);
      if (waitMs <= 0) {
        this.sentAt.push(now);
        return;
      }
      this.log.debug({ waitMs }, 'Rate limit reached, waiting for a slot');
      await sleep(waitMs, signal);
    }
  }

  private waitTime(now: number): number {
    const lastSecond = this.sentAt.filter(t => now - t < 1000);
    if (lastSecond.length >= this.limits.perSecond) {
      return lastSecond[lastSecond.length - this.limits.perSecond] + 1000 - now;
    }
    if (this.sentAt.length >= this.limits.perMinute) {
      return this.sentAt[this.sentAt.length - this.limits.perMinute] + 60_000 - now;
    }
    return 0;
  }
}
