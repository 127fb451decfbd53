import { AggregationError, type TruncatedRequest } from '../../lib/errors.js';
import { toTimestamp } from './filter-builder.js';
import type {
  ContactRecord,
  Criterion,
  DeferredCriterion,
  FetchedContact,
  FilterSpec,
  ResultPage,
  ResultSet,
  ResultStats,
} from './types.js';

interface MergedRecord {
  contactId: string;
  initiatedAt?: number;
  queue?: string;
  agent?: string;
  queueName?: string;
  agentName?: string;
  attributes: Record<string, string>;
}

/**
 * Accumulates pages from every request of one search, keyed by contact id.
 * `add` is synchronous, so pages submitted by concurrent fetches are merged
 * one at a time in arrival order; a later record overwrites conflicting
 * attribute values of an earlier one. A page that stopped at a pagination
 * cap marks every later snapshot partial.
 */
export class ResultAggregator {
  private readonly merged = new Map<string, MergedRecord>();
  private readonly requestsSeen = new Set<number>();
  private readonly truncatedRequests = new Map<number, string>();
  private pages = 0;
  private fetched = 0;
  private duplicates = 0;

  constructor(
    private readonly spec: FilterSpec,
    private readonly clientSideCriteria: readonly DeferredCriterion[] = [],
  ) {}

  add(page: ResultPage): void {
    this.pages++;
    this.requestsSeen.add(page.requestIndex);
    if (page.truncated && page.nextToken) this.truncatedRequests.set(page.requestIndex, page.nextToken);

    page.records.forEach((record, position) => {
      const contactId = record.contactId?.trim();
      if (!contactId) {
        throw new AggregationError(
          `Record ${position} on page ${page.pageNumber} of request ${page.requestIndex} has no contact id`,
          page.requestIndex,
          page.pageNumber,
        );
      }
      this.fetched++;
      this.merge(contactId, record);
    });
  }

  get size(): number {
    return this.merged.size;
  }

  /** Requests cut short by a cap, with the token to resume each from. */
  get truncated(): TruncatedRequest[] {
    return Array.from(this.truncatedRequests, ([requestIndex, nextToken]) => ({ requestIndex, nextToken }))
      .sort((a, b) => a.requestIndex - b.requestIndex);
  }

  snapshot(options: { partial?: boolean } = {}): ResultSet {
    const kept: ContactRecord[] = [];
    for (const record of this.merged.values()) {
      if (!this.inTimeRange(record) || !matchesCriteria(record, this.clientSideCriteria)) continue;
      kept.push(Object.freeze({ ...record, attributes: Object.freeze({ ...record.attributes }) }));
    }
    kept.sort(compareRecords);

    const stats: ResultStats = {
      requests: this.requestsSeen.size,
      pages: this.pages,
      fetched: this.fetched,
      duplicates: this.duplicates,
      discarded: this.merged.size - kept.length,
    };

    return Object.freeze({
      records: Object.freeze(kept),
      partial: (options.partial ?? false) || this.truncatedRequests.size > 0,
      stats: Object.freeze(stats),
    });
  }

  private merge(contactId: string, record: FetchedContact): void {
    let target = this.merged.get(contactId);
    if (target) {
      this.duplicates++;
      target.attributes = { ...target.attributes, ...record.attributes };
    } else {
      target = { contactId, attributes: { ...record.attributes } };
      this.merged.set(contactId, target);
    }
    if (record.initiatedAt !== undefined) target.initiatedAt = record.initiatedAt;
    if (record.queue !== undefined) target.queue = record.queue;
    if (record.agent !== undefined) target.agent = record.agent;
    if (record.queueName !== undefined) target.queueName = record.queueName;
    if (record.agentName !== undefined) target.agentName = record.agentName;
  }

  private inTimeRange(record: MergedRecord): boolean {
    const range = this.spec.timeRange;
    if (!range || record.initiatedAt === undefined) return true;
    if (range.start !== undefined && record.initiatedAt < range.start) return false;
    if (range.end !== undefined && record.initiatedAt > range.end) return false;
    return true;
  }
}

export async function aggregate(
  pages: AsyncIterable<ResultPage> | Iterable<ResultPage>,
  spec: FilterSpec,
  clientSideCriteria: readonly DeferredCriterion[] = [],
): Promise<ResultSet> {
  const aggregator = new ResultAggregator(spec, clientSideCriteria);
  for await (const page of pages) aggregator.add(page);
  return aggregator.snapshot();
}

/** Newest first; contacts without a timestamp go last; ties by id. */
export function compareRecords(a: ContactRecord, b: ContactRecord): number {
  const ta = a.initiatedAt ?? -Infinity;
  const tb = b.initiatedAt ?? -Infinity;
  if (ta !== tb) return tb - ta;
  if (a.contactId === b.contactId) return 0;
  return a.contactId < b.contactId ? -1 : 1;
}

/** Every group must match; within a group any criterion may. */
export function matchesCriteria(record: ContactRecord, groups: readonly DeferredCriterion[]): boolean {
  return groups.every(group => group.criteria.some(criterion => matchesCriterion(record, criterion)));
}

/** `queue` and `agent` match on either the id or the display name. */
export function matchesCriterion(record: ContactRecord, criterion: Criterion): boolean {
  return fieldValues(record, criterion.attribute).some(actual => matchesValue(actual, criterion));
}

function matchesValue(actual: string | number, criterion: Criterion): boolean {
  switch (criterion.operator) {
    case 'equals':
      return String(actual) === criterion.value;
    case 'contains':
      return String(actual).toLowerCase().includes(criterion.value.toLowerCase());
    case 'in-range': {
      const n = toComparableNumber(actual);
      return n !== undefined && n >= criterion.value.from && n <= criterion.value.to;
    }
  }
}

function fieldValues(record: ContactRecord, attribute: string): Array<string | number> {
  let candidates: Array<string | number | undefined>;
  switch (attribute) {
    case 'contactId':
      candidates = [record.contactId];
      break;
    case 'initiatedAt':
      candidates = [record.initiatedAt];
      break;
    case 'queue':
      candidates = [record.queue, record.queueName];
      break;
    case 'agent':
      candidates = [record.agent, record.agentName];
      break;
    default:
      candidates = [Object.hasOwn(record.attributes, attribute) ? record.attributes[attribute] : undefined];
  }
  return candidates.filter((value): value is string | number => value !== undefined);
}

function toComparableNumber(value: string | number): number | undefined {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (trimmed && Number.isFinite(Number(trimmed))) return Number(trimmed);
  return toTimestamp(trimmed) ?? undefined;
}
