/**
 * Microsoft Graph API Utility Functions
 * Request building, response parsing and error description shared by the audit services
 */

/**
 * The slice of the Graph client's fluent request API the audit relies on.
 * `Client` and `GraphRequest` from @microsoft/microsoft-graph-client satisfy it structurally.
 */
export interface GraphRequestLike {
  filter(filterStr: string): GraphRequestLike;
  select(properties: string | string[]): GraphRequestLike;
  top(n: number): GraphRequestLike;
  count(isCount?: boolean): GraphRequestLike;
  header(headerKey: string, headerValue: string): GraphRequestLike;
  get(): Promise<unknown>;
}

export interface GraphClientLike {
  api(path: string): GraphRequestLike;
}

export interface GraphQueryOptions {
  filter?: string;
  select?: readonly string[] | string;
  top?: number;
  count?: boolean;
}

export interface GraphPage {
  data: unknown[];
  nextLink?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build a Graph API request with common query parameters
 */
export function buildGraphRequest(
  request: GraphRequestLike,
  options: GraphQueryOptions
): GraphRequestLike {
  if (options.filter) {
    request = request.filter(options.filter);
  }

  if (options.select) {
    const selectStr = typeof options.select === 'string'
      ? options.select
      : options.select.join(',');
    request = request.select(selectStr);
  }

  if (options.top) {
    request = request.top(options.top);
  }

  if (options.count) {
    request = request.count(true);
    // Advanced queries ($count, endswith) need eventual consistency
    request = request.header('ConsistencyLevel', 'eventual');
  }

  return request;
}

/**
 * Build an OData `endswith` filter on a string property
 */
export function buildEndsWithFilter(field: string, suffix: string): string {
  return `endswith(${field},${formatFilterValue(suffix)})`;
}

/**
 * Quote a string for OData, doubling single quotes
 */
export function formatFilterValue(value: string): string {
  const escaped = value.replace(/'/g, "''");
  return `'${escaped}'`;
}

/**
 * Normalise a domain filter to the `@domain` suffix form.
 * Blank input means no filter.
 */
export function normalizeDomainSuffix(domainFilter: string | undefined): string | undefined {
  const trimmed = domainFilter?.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed.startsWith('@') ? trimmed : `@${trimmed}`;
}

/**
 * Parse Graph API response to extract data array
 */
export function parseGraphResponse(response: unknown): GraphPage {
  if (response === null || response === undefined) {
    return { data: [] };
  }

  if (Array.isArray(response)) {
    return { data: response };
  }

  if (!isRecord(response)) {
    return { data: [response] };
  }

  // Collection responses carry their items under `value`
  if (response.value !== undefined) {
    const nextLink = response['@odata.nextLink'];
    return {
      data: Array.isArray(response.value) ? response.value : [],
      nextLink: typeof nextLink === 'string' && nextLink ? nextLink : undefined
    };
  }

  return { data: [response] };
}

/**
 * Run a collection request and follow `@odata.nextLink` until every page is read.
 * Headers are re-sent on follow-up pages since the next link only carries the query string.
 */
export async function fetchAllPages(
  client: GraphClientLike,
  request: GraphRequestLike,
  headers: Record<string, string> = {}
): Promise<unknown[]> {
  const items: unknown[] = [];
  let page = parseGraphResponse(await request.get());
  items.push(...page.data);

  while (page.nextLink) {
    let next = client.api(page.nextLink);
    for (const [key, value] of Object.entries(headers)) {
      next = next.header(key, value);
    }
    page = parseGraphResponse(await next.get());
    items.push(...page.data);
  }

  return items;
}

const GRAPH_ERROR_MESSAGES: Record<string, string> = {
  Request_ResourceNotFound: 'Resource not found',
  Authorization_RequestDenied: 'Insufficient permissions to perform this operation',
  Request_UnsupportedQuery: 'The query is not supported',
  InvalidAuthenticationToken: 'Authentication token is invalid or expired',
  Request_Timeout: 'Request timed out',
  accessDenied: 'Access denied',
  itemNotFound: 'Item not found'
};

/**
 * Describe a Graph API failure as text that keeps Graph's own message, error code and HTTP status
 */
export function describeGraphError(error: unknown): string {
  if (!isRecord(error)) {
    return `Graph API error: ${String(error)}`;
  }

  const code = typeof error.code === 'string' ? error.code : undefined;
  const statusCode = typeof error.statusCode === 'number' ? error.statusCode : undefined;
  const rawMessage = typeof error.message === 'string' && error.message && error.message !== '[object Object]'
    ? error.message
    : undefined;

  const readable = code ? GRAPH_ERROR_MESSAGES[code] : undefined;
  let message = readable ?? rawMessage ?? 'Unknown Graph API error';
  if (readable && rawMessage && rawMessage !== readable) {
    message = `${readable}: ${rawMessage}`;
  }
  const details = [code, statusCode !== undefined ? `HTTP ${statusCode}` : undefined]
    .filter((part): part is string => Boolean(part));

  return details.length > 0 ? `${message} (${details.join(', ')})` : message;
}

/**
 * Graph API endpoints used by the audit
 */
export const GRAPH_ENDPOINTS = {
  USERS: '/users',
  USER_AUTH_METHODS: (id: string) => `/users/${encodeURIComponent(id)}/authentication/methods`
} as const;

export const GRAPH_SELECT_FIELDS = {
  USER: ['id', 'displayName', 'userPrincipalName']
} as const;

export const GRAPH_MAX_PAGE_SIZE = 999;
