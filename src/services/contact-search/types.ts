// ============================================================
// Search criteria
// ============================================================

export const FILTER_OPERATORS = ['equals', 'contains', 'in-range'] as const;
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export interface NumericRange {
  readonly from: number;
  readonly to: number;
}

export type Criterion =
  | { readonly attribute: string; readonly operator: 'equals' | 'contains'; readonly value: string }
  | { readonly attribute: string; readonly operator: 'in-range'; readonly value: NumericRange };

/** Inclusive, epoch milliseconds UTC. Either bound may be open. */
export interface TimeRange {
  readonly start?: number;
  readonly end?: number;
}

export interface FilterSpec {
  readonly criteria: readonly Criterion[];
  readonly timeRange?: TimeRange;
}

// ============================================================
// Vendor-facing requests
// ============================================================

export type ServerFilter =
  | { readonly attribute: string; readonly operator: 'equals' | 'contains'; readonly values: readonly string[] }
  | { readonly attribute: string; readonly operator: 'in-range'; readonly values: readonly NumericRange[] };

export interface QueryRequest {
  readonly index: number;
  readonly filters: readonly ServerFilter[];
  readonly timeRange?: { readonly start: number; readonly end: number };
  readonly pageSize: number;
  readonly continuationToken?: string;
}

export interface DeferredCriterion {
  readonly attribute: string;
  readonly criteria: readonly Criterion[];
  readonly reason: string;
}

export interface TranslationPlan {
  readonly requests: readonly QueryRequest[];
  readonly deferred: readonly DeferredCriterion[];
}

// ============================================================
// Results
// ============================================================

/** A contact as the provider mapped it; the id is checked during aggregation. */
export interface FetchedContact {
  contactId?: string;
  initiatedAt?: number;
  queue?: string;
  agent?: string;
  /** Display names, where the provider reports `queue` and `agent` as ids. */
  queueName?: string;
  agentName?: string;
  attributes: Record<string, string>;
}

export interface ContactRecord {
  readonly contactId: string;
  readonly initiatedAt?: number;
  readonly queue?: string;
  readonly agent?: string;
  readonly queueName?: string;
  readonly agentName?: string;
  readonly attributes: Readonly<Record<string, string>>;
}

export interface ResultPage {
  readonly requestIndex: number;
  readonly pageNumber: number;
  readonly records: readonly FetchedContact[];
  /** Token that produced this page; absent for the first page of a fresh request. */
  readonly token?: string;
  readonly nextToken?: string;
  /** Set on the last page when a cap stopped the request while `nextToken` was still live. */
  readonly truncated?: true;
}

export interface ResultStats {
  requests: number;
  pages: number;
  fetched: number;
  duplicates: number;
  discarded: number;
}

export interface ResultSet {
  readonly records: readonly ContactRecord[];
  readonly partial: boolean;
  readonly stats: Readonly<ResultStats>;
}
