import type { FieldCapability, SearchCapabilities } from '../../providers/types.js';
import { InvalidFilterError, UnsupportedFilterError } from '../../lib/errors.js';
import type {
  Criterion,
  DeferredCriterion,
  FilterSpec,
  NumericRange,
  QueryRequest,
  ServerFilter,
  TranslationPlan,
} from './types.js';

export interface TranslateOptions {
  pageSize?: number;
  /** Window searched when the provider needs a time range and the search gives none. */
  defaultLookbackMs?: number;
  maxRequests?: number;
  now?: () => number;
}

export interface CriterionGroup {
  attribute: string;
  criteria: Criterion[];
}

const DEFAULT_LOOKBACK_MS = 24 * 60 * 60 * 1000;
const DEFAULT_MAX_REQUESTS = 64;

/**
 * Maps a FilterSpec onto the provider's request shape. Criteria on one
 * attribute are OR-ed and become a single server filter; a group the provider
 * cannot express is deferred for in-memory evaluation. Oversized value lists
 * and time ranges fan out into several requests whose results are unioned.
 */
export function translate(
  spec: FilterSpec,
  capabilities: SearchCapabilities,
  options: TranslateOptions = {},
): TranslationPlan {
  const pageSize = Math.min(options.pageSize ?? capabilities.maxPageSize, capabilities.maxPageSize);
  const maxRequests = options.maxRequests ?? DEFAULT_MAX_REQUESTS;

  spec.criteria.forEach((criterion, index) => checkAllowedValue(criterion, index, capabilities));

  const serverFilters: ServerFilter[] = [];
  const deferred: DeferredCriterion[] = [];

  for (const group of groupByAttribute(spec.criteria)) {
    try {
      if (serverFilters.length >= capabilities.maxFiltersPerRequest) {
        throw new UnsupportedFilterError(
          group.attribute,
          'filter-limit',
          `at most ${capabilities.maxFiltersPerRequest} filters per request`,
        );
      }
      serverFilters.push(translateGroup(group, capabilities));
    } catch (error) {
      if (!(error instanceof UnsupportedFilterError)) throw error;
      deferred.push(Object.freeze({
        attribute: group.attribute,
        criteria: Object.freeze([...group.criteria]),
        reason: error.reason,
      }));
    }
  }

  const windows = splitTimeRange(spec, capabilities, options);
  const chunkedFilters = serverFilters.map(f => chunkFilter(f, maxValuesFor(f.attribute, capabilities)));
  const combinations = cartesian(chunkedFilters);

  const total = windows.length * combinations.length;
  if (total > maxRequests) {
    throw new InvalidFilterError(
      `Search would need ${total} sub-queries, more than the limit of ${maxRequests}; narrow the time range or value lists`,
    );
  }

  const requests: QueryRequest[] = [];
  for (const window of windows) {
    for (const filters of combinations) {
      requests.push(Object.freeze({
        index: requests.length,
        filters: Object.freeze(filters),
        ...(window ? { timeRange: Object.freeze(window) } : {}),
        pageSize,
      }));
    }
  }

  return Object.freeze({ requests: Object.freeze(requests), deferred: Object.freeze(deferred) });
}

/** Throws UnsupportedFilterError when the provider has no way to express the group. */
export function translateGroup(group: CriterionGroup, capabilities: SearchCapabilities): ServerFilter {
  const { attribute, criteria } = group;
  const operator = criteria[0].operator;

  if (criteria.some(c => c.operator !== operator)) {
    throw new UnsupportedFilterError(attribute, 'mixed-operators', 'criteria on one attribute must share an operator');
  }

  const capability = capabilityFor(attribute, capabilities);
  if (!capability?.operators.includes(operator)) {
    throw new UnsupportedFilterError(attribute, 'operator', `'${operator}' is not supported on this field`);
  }

  if (operator === 'in-range') {
    const values: NumericRange[] = [];
    for (const c of criteria) if (c.operator === 'in-range') values.push(c.value);
    return Object.freeze({ attribute, operator, values: Object.freeze(values) });
  }

  const values: string[] = [];
  for (const c of criteria) {
    if (c.operator !== 'in-range' && !values.includes(c.value)) values.push(c.value);
  }
  return Object.freeze({ attribute, operator, values: Object.freeze(values) });
}

/** Rejects an `equals` value outside a field's closed set of values. */
function checkAllowedValue(criterion: Criterion, index: number, capabilities: SearchCapabilities): void {
  if (criterion.operator !== 'equals') return;
  const allowed = capabilityFor(criterion.attribute, capabilities)?.allowedValues;
  if (!allowed) return;
  const value = criterion.value.toLowerCase();
  if (allowed.some(candidate => candidate.toLowerCase() === value)) return;
  throw new InvalidFilterError(
    `'${criterion.value}' is not a valid ${criterion.attribute}; expected one of ${allowed.join(', ')}`,
    index,
  );
}

export function groupByAttribute(criteria: readonly Criterion[]): CriterionGroup[] {
  const groups = new Map<string, CriterionGroup>();
  for (const criterion of criteria) {
    const group = groups.get(criterion.attribute);
    if (group) group.criteria.push(criterion);
    else groups.set(criterion.attribute, { attribute: criterion.attribute, criteria: [criterion] });
  }
  return Array.from(groups.values());
}

export function withContinuation(request: QueryRequest, continuationToken: string | undefined): QueryRequest {
  const { continuationToken: _previous, ...rest } = request;
  return Object.freeze({ ...rest, ...(continuationToken ? { continuationToken } : {}) });
}

function capabilityFor(attribute: string, capabilities: SearchCapabilities): FieldCapability | undefined {
  return Object.hasOwn(capabilities.fields, attribute)
    ? capabilities.fields[attribute]
    : capabilities.customAttributes;
}

function maxValuesFor(attribute: string, capabilities: SearchCapabilities): number {
  return Math.max(1, capabilityFor(attribute, capabilities)?.maxValuesPerRequest ?? 1);
}

function chunkFilter(filter: ServerFilter, size: number): ServerFilter[] {
  if (filter.values.length <= size) return [filter];
  if (filter.operator === 'in-range') {
    const { attribute, operator } = filter;
    return chunk(filter.values, size).map(values => Object.freeze({ attribute, operator, values }));
  }
  const { attribute, operator } = filter;
  return chunk(filter.values, size).map(values => Object.freeze({ attribute, operator, values }));
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

function cartesian(chunked: ServerFilter[][]): ServerFilter[][] {
  let combinations: ServerFilter[][] = [[]];
  for (const chunks of chunked) {
    const next: ServerFilter[][] = [];
    for (const prefix of combinations) {
      for (const part of chunks) next.push([...prefix, part]);
    }
    combinations = next;
  }
  return combinations;
}

type Window = { start: number; end: number } | undefined;

function splitTimeRange(spec: FilterSpec, capabilities: SearchCapabilities, options: TranslateOptions): Window[] {
  const now = (options.now ?? Date.now)();
  let start = spec.timeRange?.start;
  let end = spec.timeRange?.end;

  if (start === undefined && end === undefined && !capabilities.requiresTimeRange) {
    return [undefined];
  }

  end ??= Math.max(now, start ?? now);
  start ??= end - (options.defaultLookbackMs ?? DEFAULT_LOOKBACK_MS);

  const max = capabilities.maxTimeRangeMs;
  if (!max || end - start <= max) return [{ start, end }];

  const windows: Window[] = [];
  for (let from = start; from < end; from += max) {
    windows.push({ start: from, end: Math.min(from + max, end) });
  }
  return windows;
}
