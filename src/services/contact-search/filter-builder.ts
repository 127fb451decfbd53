import { z } from 'zod';
import { InvalidFilterError } from '../../lib/errors.js';
import { FILTER_OPERATORS, type Criterion, type FilterOperator, type FilterSpec, type TimeRange } from './types.js';

const timestampInput = z.union([z.number(), z.string(), z.date()]);
const scalarInput = z.union([z.string(), z.number(), z.boolean()]);
const rangeBound = z.union([z.number(), z.string(), z.date()]);

const rawCriterionSchema = z.object({
  attribute: z.string(),
  operator: z.string(),
  value: z.union([
    scalarInput,
    z.tuple([rangeBound, rangeBound]),
    z.object({ from: rangeBound, to: rangeBound }),
  ]),
});

export const searchInputSchema = z.object({
  criteria: z.array(rawCriterionSchema).optional(),
  queues: z.array(z.string()).optional(),
  agents: z.array(z.string()).optional(),
  channels: z.array(z.string()).optional(),
  attributes: z.record(scalarInput).optional(),
  timeRange: z
    .object({
      start: timestampInput.optional(),
      end: timestampInput.optional(),
    })
    .optional(),
});

export type SearchInput = z.infer<typeof searchInputSchema>;
type RawCriterion = z.infer<typeof rawCriterionSchema>;

/**
 * Validates raw form input into a frozen FilterSpec. Shorthand lists (queues,
 * agents, channels, attributes) become `equals` criteria appended after the
 * explicit ones.
 */
export function buildFilterSpec(rawInputs: unknown): FilterSpec {
  const parsed = searchInputSchema.safeParse(rawInputs);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue.path.join('.');
    const index = issue.path[0] === 'criteria' && typeof issue.path[1] === 'number' ? issue.path[1] : undefined;
    throw new InvalidFilterError(path ? `${path}: ${issue.message}` : issue.message, index);
  }

  const input = parsed.data;
  const raw: RawCriterion[] = [
    ...(input.criteria ?? []),
    ...(input.queues ?? []).map(value => ({ attribute: 'queue', operator: 'equals', value })),
    ...(input.agents ?? []).map(value => ({ attribute: 'agent', operator: 'equals', value })),
    ...(input.channels ?? []).map(value => ({ attribute: 'channel', operator: 'equals', value })),
    ...Object.entries(input.attributes ?? {}).map(([attribute, value]) => ({ attribute, operator: 'equals', value })),
  ];

  if (raw.length === 0) {
    throw new InvalidFilterError('At least one search criterion is required');
  }

  const criteria = raw.map((c, index) => Object.freeze(normalizeCriterion(c, index)));
  const timeRange = input.timeRange ? normalizeTimeRange(input.timeRange) : undefined;

  return Object.freeze({
    criteria: Object.freeze(criteria),
    ...(timeRange ? { timeRange } : {}),
  });
}

function normalizeCriterion(raw: RawCriterion, index: number): Criterion {
  const attribute = raw.attribute.trim();
  if (!attribute) throw new InvalidFilterError('attribute name must not be blank', index);

  const operator = normalizeOperator(raw.operator);
  if (!operator) {
    throw new InvalidFilterError(
      `unknown operator '${raw.operator}', expected one of ${FILTER_OPERATORS.join(', ')}`,
      index,
    );
  }

  if (operator === 'in-range') {
    const { value } = raw;
    let bounds: [unknown, unknown];
    if (Array.isArray(value)) bounds = [value[0], value[1]];
    else if (typeof value === 'object') bounds = [value.from, value.to];
    else throw new InvalidFilterError('in-range expects [from, to] or { from, to }', index);

    const from = toRangeNumber(bounds[0]);
    const to = toRangeNumber(bounds[1]);
    if (from === undefined || to === undefined) {
      throw new InvalidFilterError('in-range bounds must be numbers or dates', index);
    }
    if (from > to) throw new InvalidFilterError(`range start ${from} is after end ${to}`, index);
    return { attribute, operator, value: Object.freeze({ from, to }) };
  }

  if (typeof raw.value === 'object') {
    throw new InvalidFilterError(`${operator} expects a single value`, index);
  }
  const value = String(raw.value).trim();
  if (!value) throw new InvalidFilterError('value must not be blank', index);
  return { attribute, operator, value };
}

export function normalizeOperator(token: string): FilterOperator | undefined {
  const normalized = token.trim().toLowerCase().replace(/[\s_]+/g, '-');
  return FILTER_OPERATORS.find(op => op === normalized);
}

function normalizeTimeRange(raw: { start?: string | number | Date; end?: string | number | Date }): TimeRange {
  const start = raw.start === undefined ? undefined : toTimestamp(raw.start);
  const end = raw.end === undefined ? undefined : toTimestamp(raw.end);

  if (start === null) throw new InvalidFilterError(`timeRange.start '${String(raw.start)}' is not a valid time`);
  if (end === null) throw new InvalidFilterError(`timeRange.end '${String(raw.end)}' is not a valid time`);
  if (start !== undefined && end !== undefined && start > end) {
    throw new InvalidFilterError('timeRange.start must not be after timeRange.end');
  }

  return Object.freeze({
    ...(start !== undefined ? { start } : {}),
    ...(end !== undefined ? { end } : {}),
  });
}

const ISO_WITHOUT_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Epoch milliseconds UTC, or null when the input is not a time. */
export function toTimestamp(value: string | number | Date): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) ? null : ms;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  const ms = Date.parse(ISO_WITHOUT_OFFSET.test(trimmed) ? `${trimmed}Z` : trimmed);
  return Number.isNaN(ms) ? null : ms;
}

function toRangeNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed && Number.isFinite(Number(trimmed))) return Number(trimmed);
    return toTimestamp(trimmed) ?? undefined;
  }
  if (value instanceof Date) return toTimestamp(value) ?? undefined;
  return undefined;
}
