import type { FetchedContact, QueryRequest } from '../../services/contact-search/types.js';
import type { GatewayContact, GatewaySearchRequest } from './types.js';

export function toGatewayRequest(request: QueryRequest): GatewaySearchRequest {
  return {
    filters: request.filters.map(f => ({ attribute: f.attribute, operator: f.operator, values: [...f.values] })),
    timeRange: request.timeRange && {
      start: new Date(request.timeRange.start).toISOString(),
      end: new Date(request.timeRange.end).toISOString(),
    },
    pageSize: request.pageSize,
    nextToken: request.continuationToken,
  };
}

export function mapGatewayContact(raw: GatewayContact): FetchedContact {
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw.attributes ?? {})) {
    if (value != null) attributes[key] = String(value);
  }

  const initiatedAt = raw.initiated_at ? Date.parse(raw.initiated_at) : NaN;

  return {
    contactId: raw.id,
    initiatedAt: Number.isNaN(initiatedAt) ? undefined : initiatedAt,
    queue: raw.queue?.name ?? raw.queue?.id,
    agent: raw.agent?.username ?? raw.agent?.id,
    attributes,
  };
}
