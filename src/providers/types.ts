import type { FetchedContact, FilterOperator, QueryRequest } from '../services/contact-search/types.js';

// ============================================================
// Provider capability types
// ============================================================

export interface FieldCapability {
  operators: readonly FilterOperator[];
  maxValuesPerRequest: number;
  /** Closed set of values the field takes, compared case-insensitively. */
  allowedValues?: readonly string[];
}

export interface SearchCapabilities {
  /** Well-known fields such as queue, agent and channel. */
  fields: Readonly<Record<string, FieldCapability>>;
  /** Applies to any attribute not listed in `fields`; absent means none are searchable. */
  customAttributes?: FieldCapability;
  maxFiltersPerRequest: number;
  requiresTimeRange: boolean;
  maxTimeRangeMs?: number;
  maxPageSize: number;
}

// ============================================================
// Provider response wrappers
// ============================================================

export interface RawSearchPage {
  contacts: FetchedContact[];
  nextToken?: string;
}

// ============================================================
// Provider interface
// ============================================================

export interface ContactSearchProvider {
  readonly name: string;
  readonly displayName: string;
  readonly capabilities: SearchCapabilities;

  searchContacts(request: QueryRequest, signal?: AbortSignal): Promise<RawSearchPage>;

  healthCheck(): Promise<boolean>;
}

// ============================================================
// Directory: queue and user lookups backing the search form
// ============================================================

export interface InstanceSummary {
  id: string;
  arn: string;
}

export interface QueueSummary {
  id: string;
  arn: string;
  name: string;
}

export interface UserSummary {
  id: string;
  arn: string;
  username: string;
}

export interface CurrentUserStatus {
  userId: string;
  statusName: string;
}

export interface DirectoryProvider {
  describeInstance(): Promise<InstanceSummary>;
  listQueues(): Promise<QueueSummary[]>;
  listUsers(): Promise<UserSummary[]>;
  getCurrentUserData(queueIds: string[]): Promise<CurrentUserStatus[]>;
}
