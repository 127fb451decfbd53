import { nanoid } from 'nanoid';
import type { ContactSearchProvider } from '../../providers/types.js';
import { ResultsTruncatedError, SearchTimeoutError } from '../../lib/errors.js';
import { mapWithConcurrency } from '../../lib/concurrency.js';
import { logger, type Logger } from '../../lib/logger.js';
import { buildFilterSpec } from './filter-builder.js';
import { translate } from './query-translator.js';
import { DEFAULT_FETCH_OPTIONS, fetchPages } from './paginating-fetcher.js';
import { ResultAggregator } from './result-aggregator.js';
import type { FetchedContact, FilterSpec, ResultPage, ResultSet, TranslationPlan } from './types.js';

export * from './types.js';
export { buildFilterSpec, searchInputSchema, type SearchInput } from './filter-builder.js';
export { translate, withContinuation } from './query-translator.js';
export { fetchPages, type FetchOptions } from './paginating-fetcher.js';
export { aggregate, ResultAggregator } from './result-aggregator.js';

export interface SearchSettings {
  concurrency: number;
  deadlineMs: number;
  maxPages: number;
  maxResults: number;
  pageSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  defaultLookbackMs: number;
  maxRequests: number;
}

export const DEFAULT_SEARCH_SETTINGS: SearchSettings = {
  concurrency: 4,
  deadlineMs: 30_000,
  maxPages: DEFAULT_FETCH_OPTIONS.maxPages,
  maxResults: DEFAULT_FETCH_OPTIONS.maxResults,
  pageSize: 100,
  maxAttempts: DEFAULT_FETCH_OPTIONS.maxAttempts,
  baseDelayMs: DEFAULT_FETCH_OPTIONS.baseDelayMs,
  defaultLookbackMs: 24 * 60 * 60 * 1000,
  maxRequests: 64,
};

export type SearchOutcome =
  | { status: 'complete'; resultSet: ResultSet }
  | { status: 'partial'; resultSet: ResultSet; error: SearchTimeoutError | ResultsTruncatedError };

/** Rewrites display names in a FilterSpec into the ids the provider filters on. */
export interface FilterResolver {
  resolveFilterSpec(spec: FilterSpec): Promise<FilterSpec>;
  /** Adds display names to a contact whose queue and agent are ids. */
  describeContact?(contact: FetchedContact): FetchedContact;
}

export interface SearchPlan {
  spec: FilterSpec;
  plan: TranslationPlan;
}

export class ContactSearchService {
  private readonly settings: SearchSettings;

  constructor(
    private readonly provider: ContactSearchProvider,
    settings: Partial<SearchSettings> = {},
    private readonly resolver?: FilterResolver,
  ) {
    this.settings = { ...DEFAULT_SEARCH_SETTINGS, ...settings };
  }

  get providerName(): string {
    return this.provider.name;
  }

  async plan(rawInputs: unknown, overrides: Partial<SearchSettings> = {}): Promise<SearchPlan> {
    const settings = { ...this.settings, ...overrides };
    return this.resolve(this.prepare(rawInputs, settings), settings);
  }

  /**
   * Runs one logical search. Invalid or untranslatable input throws before any
   * network call. Terminal fetch and aggregation errors throw. A missed deadline
   * or a pagination cap resolves with the records gathered so far, flagged
   * partial.
   */
  async search(rawInputs: unknown, overrides: Partial<SearchSettings> = {}): Promise<SearchOutcome> {
    const settings = { ...this.settings, ...overrides };
    const log = logger.child({ searchId: nanoid(10), provider: this.provider.name });
    const prepared = this.prepare(rawInputs, settings);

    const startTime = Date.now();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), settings.deadlineMs);
    });

    try {
      const resolving = this.resolve(prepared, settings);
      const resolved = await Promise.race([resolving, deadline]);
      if (resolved === 'timeout') {
        resolving.catch(abandoned => {
          log.debug({ error: String(abandoned) }, 'Abandoned name resolution settled after the deadline');
        });
        return this.timedOut(new ResultAggregator(prepared.spec, prepared.plan.deferred), settings, controller, log);
      }

      return await this.execute(resolved, settings, controller, deadline, log, startTime);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Builds and translates without touching the network, so bad input fails fast. */
  private prepare(rawInputs: unknown, settings: SearchSettings): SearchPlan {
    const spec = buildFilterSpec(rawInputs);
    return { spec, plan: this.translate(spec, settings) };
  }

  private async resolve(prepared: SearchPlan, settings: SearchSettings): Promise<SearchPlan> {
    if (!this.resolver) return prepared;
    const spec = await this.resolver.resolveFilterSpec(prepared.spec);
    if (spec === prepared.spec) return prepared;
    return { spec, plan: this.translate(spec, settings) };
  }

  private translate(spec: FilterSpec, settings: SearchSettings): TranslationPlan {
    return translate(spec, this.provider.capabilities, {
      pageSize: settings.pageSize,
      defaultLookbackMs: settings.defaultLookbackMs,
      maxRequests: settings.maxRequests,
    });
  }

  private async execute(
    { spec, plan }: SearchPlan,
    settings: SearchSettings,
    controller: AbortController,
    deadline: Promise<'timeout'>,
    log: Logger,
    startTime: number,
  ): Promise<SearchOutcome> {
    log.info(
      {
        criteria: spec.criteria.length,
        requests: plan.requests.length,
        deferred: plan.deferred.map(d => ({ attribute: d.attribute, reason: d.reason })),
      },
      'Search planned',
    );

    const aggregator = new ResultAggregator(spec, plan.deferred);
    const failures: unknown[] = [];

    const work = mapWithConcurrency(
      plan.requests,
      settings.concurrency,
      async request => {
        try {
          const pages = fetchPages(this.provider, request, {
            maxPages: settings.maxPages,
            maxResults: settings.maxResults,
            maxAttempts: settings.maxAttempts,
            baseDelayMs: settings.baseDelayMs,
            signal: controller.signal,
            log,
          });
          for await (const page of pages) {
            if (controller.signal.aborted) break;
            aggregator.add(this.describe(page));
          }
        } catch (error) {
          if (!controller.signal.aborted) {
            failures.push(error);
            controller.abort(error);
          }
          throw error;
        }
      },
      controller.signal,
    );

    try {
      const result = await Promise.race([work.then(() => 'done' as const), deadline]);

      if (result === 'timeout') {
        work.catch(abandoned => {
          log.debug({ error: String(abandoned) }, 'Abandoned fetch settled after the deadline');
        });
        return this.timedOut(aggregator, settings, controller, log);
      }

      const resultSet = aggregator.snapshot();
      const truncated = aggregator.truncated;
      if (truncated.length > 0) {
        const error = new ResultsTruncatedError(truncated, settings);
        log.warn({ truncated, records: resultSet.records.length, stats: resultSet.stats }, 'Search stopped at a pagination cap');
        return { status: 'partial', resultSet, error };
      }

      log.info(
        { records: resultSet.records.length, stats: resultSet.stats, durationMs: Date.now() - startTime },
        'Search complete',
      );
      return { status: 'complete', resultSet };
    } catch (error) {
      controller.abort(error);
      const cause = failures.length > 0 ? failures[0] : error;
      log.error({ error: String(cause) }, 'Search failed');
      throw cause;
    }
  }

  private timedOut(
    aggregator: ResultAggregator,
    settings: SearchSettings,
    controller: AbortController,
    log: Logger,
  ): SearchOutcome {
    const error = new SearchTimeoutError(settings.deadlineMs);
    controller.abort(error);
    const resultSet = aggregator.snapshot({ partial: true });
    log.warn(
      { deadlineMs: settings.deadlineMs, records: resultSet.records.length, stats: resultSet.stats },
      'Search deadline exceeded, returning partial results',
    );
    return { status: 'partial', resultSet, error };
  }

  private describe(page: ResultPage): ResultPage {
    const describeContact = this.resolver?.describeContact?.bind(this.resolver);
    if (!describeContact) return page;
    return Object.freeze({ ...page, records: Object.freeze(page.records.map(describeContact)) });
  }
}
