/**
 * NetBox API Client
 *
 * Provides a typed interface to the NetBox REST API with:
 * - Retry with exponential backoff
 * - Rate limit handling (429 status)
 * - JSON logging with secret redaction
 * - Transparent pagination for list endpoints
 */

import type {
  CableParams,
  HttpMethod,
  InterfaceParams,
  IpAddressParams,
  ListFilter,
  NetboxClientConfig,
  PaginatedList,
  PrefixParams,
  RemoteCable,
  RemoteDevice,
  RemoteInterface,
  RemoteIpAddress,
  RemotePrefix,
  RemoteSite,
  RemoteVlan,
  VlanParams,
} from './types.js';
import {
  withRetry,
  ApiRequestError,
  parseRetryAfter,
  DEFAULT_RETRY_CONFIG,
  type RetryOptions,
} from './retry.js';
import { logger, ApiLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * CRUD sub-client for one NetBox resource type
 *
 * @typeParam T - object returned by NetBox
 * @typeParam C - create payload
 * @typeParam U - update (PATCH) payload
 */
export interface ResourceClient<T, C, U = Partial<C>> {
  list(filter?: ListFilter): Promise<T[]>;
  get(id: number): Promise<T>;
  create(params: C): Promise<T>;
  update(id: number, data: U): Promise<T>;
  delete(id: number): Promise<boolean>;
}

/**
 * Main NetBox client interface
 */
export interface NetboxClient {
  readonly sites: ResourceClient<RemoteSite, { name: string; slug: string }>;
  readonly devices: ResourceClient<RemoteDevice, Record<string, unknown>>;
  readonly interfaces: ResourceClient<RemoteInterface, InterfaceParams, InterfaceParams>;
  readonly ipAddresses: ResourceClient<RemoteIpAddress, IpAddressParams>;
  readonly prefixes: ResourceClient<RemotePrefix, PrefixParams>;
  readonly vlans: ResourceClient<RemoteVlan, VlanParams>;
  readonly cables: ResourceClient<RemoteCable, CableParams>;

  /** Get current configuration (with redacted secrets) */
  getConfig(): { baseUrl: string; hasToken: boolean };
}

/**
 * REST paths per resource, relative to /api
 */
export const RESOURCE_PATHS = {
  sites: '/dcim/sites/',
  devices: '/dcim/devices/',
  interfaces: '/dcim/interfaces/',
  ipAddresses: '/ipam/ip-addresses/',
  prefixes: '/ipam/prefixes/',
  vlans: '/ipam/vlans/',
  cables: '/dcim/cables/',
} as const;

// =============================================================================
// Client Implementation
// =============================================================================

/**
 * Create a NetBox API client with retry and logging
 */
export function createClient(config: NetboxClientConfig): NetboxClient {
  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const timeout = config.timeout ?? 30000;
  const pageSize = config.pageSize ?? 250;
  const log = config.debug ? logger : new ApiLogger({ level: 'warn' });
  const retry = { ...DEFAULT_RETRY_CONFIG, ...config.retry };

  if (!baseUrl) {
    throw new Error(
      'Missing NetBox address. Configure it using:\n' +
        '  1. Set NETBOX_ADDRESS environment variable\n' +
        '  2. Add netbox.address to netbox-sync.yml\n' +
        '  3. Or pass --netbox-address'
    );
  }

  const defaultHeaders: Record<string, string> = {
    Accept: 'application/json',
    'Content-Type': 'application/json',
  };

  if (config.token) {
    defaultHeaders['Authorization'] = `Token ${config.token}`;
  }

  /**
   * Make an API request with retry logic. `target` is either a path
   * relative to /api or an absolute URL (pagination `next` links).
   */
  async function request<T>(
    method: HttpMethod,
    target: string,
    options: {
      params?: ListFilter;
      body?: unknown;
    } = {}
  ): Promise<T> {
    const url = target.startsWith('http')
      ? new URL(target)
      : new URL(`${baseUrl}/api${target}`);

    if (options.params) {
      for (const [key, value] of Object.entries(options.params)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
          for (const v of value) {
            url.searchParams.append(key, String(v));
          }
        } else {
          url.searchParams.set(key, String(value));
        }
      }
    }

    log.request(method, url.toString(), { headers: defaultHeaders, body: options.body });

    const makeRequest = async (): Promise<T> => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const startTime = Date.now();
        const response = await fetch(url.toString(), {
          method,
          headers: defaultHeaders,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });

        const durationMs = Date.now() - startTime;
        log.response(response.status, url.toString(), { durationMs });

        if (!response.ok) {
          let errorMessage = `NetBox API error (${response.status})`;
          let errorDetails: Record<string, unknown> | undefined;

          const errorBody = await response.text().catch(() => '');
          if (errorBody) {
            try {
              const parsed: unknown = JSON.parse(errorBody);
              if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
                errorDetails = Object.fromEntries(Object.entries(parsed));
                const detail = errorDetails.detail;
                errorMessage =
                  typeof detail === 'string'
                    ? detail
                    : `${errorMessage}: ${errorBody.substring(0, 200)}`;
              } else {
                errorMessage = `${errorMessage}: ${errorBody.substring(0, 200)}`;
              }
            } catch {
              errorMessage = errorBody.substring(0, 200);
            }
          }

          throw new ApiRequestError(errorMessage, response.status, {
            details: errorDetails,
            retryAfter: parseRetryAfter(response.headers.get('Retry-After')),
          });
        }

        if (response.status === 204) {
          return undefined as T;
        }

        return (await response.json()) as T;
      } finally {
        clearTimeout(timeoutId);
      }
    };

    const retryOptions: RetryOptions<T> = {
      ...retry,
      logger: log,
      onRetry: (attempt, error, delayMs) => {
        log.info(`Retrying request to ${url.pathname}`, {
          attempt,
          error: error.message,
          delayMs,
        });
      },
    };

    const result = await withRetry(makeRequest, retryOptions);

    if (!result.success) {
      throw result.error;
    }

    return result.data;
  }

  /**
   * Build the CRUD sub-client for one resource path
   */
  function resource<T, C, U = Partial<C>>(path: string): ResourceClient<T, C, U> {
    return {
      async list(filter: ListFilter = {}): Promise<T[]> {
        const items: T[] = [];
        let page = await request<PaginatedList<T>>('GET', path, {
          params: { limit: pageSize, ...filter },
        });
        items.push(...page.results);
        while (page.next) {
          page = await request<PaginatedList<T>>('GET', page.next);
          items.push(...page.results);
        }
        return items;
      },

      async get(id: number): Promise<T> {
        return request<T>('GET', `${path}${id}/`);
      },

      async create(params: C): Promise<T> {
        return request<T>('POST', path, { body: params });
      },

      async update(id: number, data: U): Promise<T> {
        return request<T>('PATCH', `${path}${id}/`, { body: data });
      },

      async delete(id: number): Promise<boolean> {
        await request<void>('DELETE', `${path}${id}/`);
        return true;
      },
    };
  }

  return {
    sites: resource<RemoteSite, { name: string; slug: string }>(RESOURCE_PATHS.sites),
    devices: resource<RemoteDevice, Record<string, unknown>>(RESOURCE_PATHS.devices),
    interfaces: resource<RemoteInterface, InterfaceParams, InterfaceParams>(RESOURCE_PATHS.interfaces),
    ipAddresses: resource<RemoteIpAddress, IpAddressParams>(RESOURCE_PATHS.ipAddresses),
    prefixes: resource<RemotePrefix, PrefixParams>(RESOURCE_PATHS.prefixes),
    vlans: resource<RemoteVlan, VlanParams>(RESOURCE_PATHS.vlans),
    cables: resource<RemoteCable, CableParams>(RESOURCE_PATHS.cables),

    getConfig() {
      return {
        baseUrl,
        hasToken: Boolean(config.token),
      };
    },
  };
}
