import {
  Channel,
  ContactInitiationMethod,
  type SearchContactsCommandInput,
  type SearchCriteria,
} from '@aws-sdk/client-connect';
import { BaseProvider } from '../base.js';
import type {
  ContactSearchProvider,
  CurrentUserStatus,
  DirectoryProvider,
  InstanceSummary,
  QueueSummary,
  RawSearchPage,
  SearchCapabilities,
  UserSummary,
} from '../types.js';
import type { FetchedContact, QueryRequest } from '../../services/contact-search/types.js';
import { AuthError, ProviderError, RateLimitError } from '../../lib/errors.js';
import { mapConnectContact } from './mappers.js';
import type { ConnectApi, ConnectContactSummary } from './types.js';

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

const CHANNELS: readonly string[] = Object.values(Channel);
const INITIATION_METHODS: readonly string[] = Object.values(ContactInitiationMethod);

const THROTTLING_ERRORS = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'LimitExceededException',
]);
const AUTH_ERRORS = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'ExpiredTokenException',
  'InvalidSignatureException',
  'CredentialsProviderError',
]);

export interface ConnectProviderOptions {
  instanceId: string;
  /** Fetch custom contact attributes for every result (one extra call per contact). */
  hydrateAttributes?: boolean;
}

export class ConnectProvider extends BaseProvider implements ContactSearchProvider, DirectoryProvider {
  readonly name = 'connect';
  readonly displayName = 'Amazon Connect';
  readonly capabilities: SearchCapabilities = {
    fields: {
      queue: { operators: ['equals'], maxValuesPerRequest: 100 },
      agent: { operators: ['equals'], maxValuesPerRequest: 100 },
      channel: { operators: ['equals'], maxValuesPerRequest: CHANNELS.length, allowedValues: CHANNELS },
      initiationMethod: {
        operators: ['equals'],
        maxValuesPerRequest: INITIATION_METHODS.length,
        allowedValues: INITIATION_METHODS,
      },
    },
    customAttributes: { operators: ['equals'], maxValuesPerRequest: 20 },
    maxFiltersPerRequest: 15,
    requiresTimeRange: true,
    maxTimeRangeMs: WEEK_MS,
    maxPageSize: 100,
  };

  private readonly instanceId: string;
  private readonly hydrateAttributes: boolean;

  constructor(
    private readonly api: ConnectApi,
    options: ConnectProviderOptions,
  ) {
    super({ rateLimit: { perSecond: 2 } });
    this.instanceId = options.instanceId;
    this.hydrateAttributes = options.hydrateAttributes ?? false;
    this.log = this.log.child({ provider: this.name, instanceId: this.instanceId });
  }

  async searchContacts(request: QueryRequest, signal?: AbortSignal): Promise<RawSearchPage> {
    const input = this.buildSearchInput(request);
    await this.acquireSlot(signal);

    try {
      const raw = await this.api.searchContacts(input, signal);
      const summaries = raw.Contacts ?? [];
      const contacts: FetchedContact[] = [];
      for (const summary of summaries) {
        const attributes = this.hydrateAttributes ? await this.fetchAttributes(summary, signal) : {};
        contacts.push(mapConnectContact(summary, attributes));
      }
      return { contacts, nextToken: raw.NextToken || undefined };
    } catch (error) {
      throw this.classifyError(error, signal);
    }
  }

  buildSearchInput(request: QueryRequest): SearchContactsCommandInput {
    if (!request.timeRange) {
      throw new ProviderError(this.name, 'SearchContacts requires a time range');
    }

    const criteria: SearchCriteria = {};
    const attributeCriteria: Array<{ Key: string; Values: string[] }> = [];

    for (const filter of request.filters) {
      if (filter.operator !== 'equals') {
        throw new ProviderError(this.name, `operator '${filter.operator}' is not supported on '${filter.attribute}'`);
      }
      const values = [...filter.values];
      switch (filter.attribute) {
        case 'queue':
          criteria.QueueIds = values;
          break;
        case 'agent':
          criteria.AgentIds = values;
          break;
        case 'channel':
          criteria.Channels = values.map(v => this.toChannel(v));
          break;
        case 'initiationMethod':
          criteria.InitiationMethods = values.map(v => this.toInitiationMethod(v));
          break;
        default:
          attributeCriteria.push({ Key: filter.attribute, Values: values });
      }
    }

    if (attributeCriteria.length > 0) {
      criteria.SearchableContactAttributes = { Criteria: attributeCriteria, MatchType: 'MATCH_ALL' };
    }

    return {
      InstanceId: this.instanceId,
      TimeRange: {
        Type: 'INITIATION_TIMESTAMP',
        StartTime: new Date(request.timeRange.start),
        EndTime: new Date(request.timeRange.end),
      },
      SearchCriteria: criteria,
      MaxResults: Math.min(request.pageSize, this.capabilities.maxPageSize),
      NextToken: request.continuationToken,
      Sort: { FieldName: 'INITIATION_TIMESTAMP', Order: 'DESCENDING' },
    };
  }

  // ============================================================
  // Directory
  // ============================================================

  async describeInstance(): Promise<InstanceSummary> {
    try {
      const raw = await this.api.describeInstance({ InstanceId: this.instanceId });
      const id = raw.Instance?.Id;
      const arn = raw.Instance?.Arn;
      if (!id || !arn) throw new ProviderError(this.name, `instance '${this.instanceId}' returned no id`);
      return { id, arn };
    } catch (error) {
      throw this.classifyError(error);
    }
  }

  async listQueues(): Promise<QueueSummary[]> {
    const queues: QueueSummary[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const raw = await this.api.listQueues({
          InstanceId: this.instanceId,
          QueueTypes: ['STANDARD'],
          NextToken: nextToken,
        });
        for (const q of raw.QueueSummaryList ?? []) {
          if (q.Id && q.Arn && q.Name) queues.push({ id: q.Id, arn: q.Arn, name: q.Name });
        }
        nextToken = raw.NextToken || undefined;
      } while (nextToken);
    } catch (error) {
      throw this.classifyError(error);
    }
    return queues;
  }

  async listUsers(): Promise<UserSummary[]> {
    const users: UserSummary[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const raw = await this.api.listUsers({ InstanceId: this.instanceId, NextToken: nextToken });
        for (const u of raw.UserSummaryList ?? []) {
          if (u.Id && u.Arn && u.Username) users.push({ id: u.Id, arn: u.Arn, username: u.Username });
        }
        nextToken = raw.NextToken || undefined;
      } while (nextToken);
    } catch (error) {
      throw this.classifyError(error);
    }
    return users;
  }

  async getCurrentUserData(queueIds: string[]): Promise<CurrentUserStatus[]> {
    const statuses: CurrentUserStatus[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const raw = await this.api.getCurrentUserData({
          InstanceId: this.instanceId,
          Filters: { Queues: queueIds },
          NextToken: nextToken,
        });
        for (const entry of raw.UserDataList ?? []) {
          const userId = entry.User?.Id;
          if (!userId) continue;
          statuses.push({ userId, statusName: entry.Status?.StatusName ?? 'Unknown' });
        }
        nextToken = raw.NextToken || undefined;
      } while (nextToken);
    } catch (error) {
      throw this.classifyError(error);
    }
    return statuses;
  }

  private async fetchAttributes(
    summary: ConnectContactSummary,
    signal?: AbortSignal,
  ): Promise<Record<string, string>> {
    const initialContactId = summary.InitialContactId ?? summary.Id;
    if (!initialContactId) return {};
    await this.acquireSlot(signal);
    const raw = await this.api.getContactAttributes(
      { InstanceId: this.instanceId, InitialContactId: initialContactId },
      signal,
    );
    return raw.Attributes ?? {};
  }

  private toChannel(value: string): Channel {
    const upper = value.toUpperCase();
    if (!isChannel(upper)) throw new ProviderError(this.name, `unknown channel '${value}'`);
    return upper;
  }

  private toInitiationMethod(value: string): ContactInitiationMethod {
    const upper = value.toUpperCase();
    if (!isInitiationMethod(upper)) throw new ProviderError(this.name, `unknown initiation method '${value}'`);
    return upper;
  }

  private classifyError(error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted) return error;
    if (error instanceof ProviderError || error instanceof RateLimitError || error instanceof AuthError) {
      return error;
    }
    if (!(error instanceof Error)) {
      return new ProviderError(this.name, String(error));
    }

    if (THROTTLING_ERRORS.has(error.name)) {
      this.log.warn({ error: error.name }, 'Connect throttled the request');
      return new RateLimitError(this.name);
    }
    if (AUTH_ERRORS.has(error.name)) {
      return new AuthError(this.name, `${error.name}: ${error.message}`, { lastError: error });
    }

    const serverFault = '$fault' in error && error.$fault === 'server';
    if (serverFault || error.name === 'InternalServiceException' || error.name === 'ServiceUnavailableException') {
      return new ProviderError(this.name, `${error.name}: ${error.message}`, { transient: true });
    }

    this.log.error({ error: error.name, message: error.message }, 'Connect request failed');
    return new ProviderError(this.name, `${error.name}: ${error.message}`);
  }
}

function isChannel(value: string): value is Channel {
  return CHANNELS.includes(value);
}

function isInitiationMethod(value: string): value is ContactInitiationMethod {
  return INITIATION_METHODS.includes(value);
}
