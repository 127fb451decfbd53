export interface GatewayFilter {
  attribute: string;
  operator: 'equals' | 'contains' | 'in-range';
  values: Array<string | { from: number; to: number }>;
}

export interface GatewaySearchRequest {
  filters: GatewayFilter[];
  timeRange?: { start: string; end: string };
  pageSize: number;
  nextToken?: string;
}

export interface GatewayContact {
  id?: string;
  initiated_at?: string;
  queue?: { id?: string; name?: string } | null;
  agent?: { id?: string; username?: string } | null;
  attributes?: Record<string, string | number | boolean | null>;
}

export interface GatewaySearchResponse {
  contacts: GatewayContact[];
  next_token?: string | null;
}
