/**
 * API types for the NetBox REST client
 *
 * Only the fields the reconciler reads or writes are modelled. NetBox
 * returns nested "brief" objects for foreign keys; those are typed as
 * `Nested*` below.
 */

// =============================================================================
// Common Types
// =============================================================================

/**
 * Paginated list envelope returned by every NetBox list endpoint
 */
export interface PaginatedList<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

/**
 * Query filters accepted by list endpoints
 */
export type ListFilter = Record<string, string | number | boolean | Array<string | number> | undefined>;

/**
 * HTTP methods supported by the API
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A choice field as NetBox serializes it
 */
export interface ChoiceValue<T extends string = string> {
  value: T;
  label: string;
}

// =============================================================================
// Nested (brief) representations
// =============================================================================

export interface NestedSite {
  id: number;
  name: string;
  slug: string;
}

export interface NestedDevice {
  id: number;
  name: string | null;
}

export interface NestedInterface {
  id: number;
  name: string;
  device: NestedDevice;
}

export interface NestedIpAddress {
  id: number;
  address: string;
}

export interface NestedVlan {
  id: number;
  vid: number;
  name: string;
}

// =============================================================================
// Entity Types
// =============================================================================

export interface RemoteSite {
  id: number;
  name: string;
  slug: string;
}

export interface RemoteDevice {
  id: number;
  name: string | null;
  site: NestedSite;
  primary_ip: NestedIpAddress | null;
  primary_ip4?: NestedIpAddress | null;
}

export type InterfaceTypeValue = 'lag' | 'virtual' | 'other' | (string & {});

export type InterfaceModeValue = 'access' | 'tagged' | 'tagged-all';

export interface RemoteInterface {
  id: number;
  name: string;
  device: NestedDevice;
  type: ChoiceValue<InterfaceTypeValue>;
  enabled: boolean;
  mtu: number | null;
  description: string;
  mode: ChoiceValue<InterfaceModeValue> | null;
  untagged_vlan: NestedVlan | null;
  tagged_vlans: NestedVlan[];
  lag: { id: number; name: string } | null;
  connected_endpoint_type?: string | null;
}

/**
 * Parameters sent when creating or updating an interface
 */
export interface InterfaceParams {
  device?: number;
  name?: string;
  type?: 'lag' | 'virtual' | 'other';
  mtu?: number | null;
  description?: string;
  enabled?: boolean;
  mode?: 'access';
  switchport_mode?: 'tagged';
  untagged_vlan?: number | null;
  tagged_vlans?: Array<number | null>;
  lag?: number | null;
}

export interface RemoteIpAddress {
  id: number;
  address: string;
  assigned_object_type: string | null;
  assigned_object_id: number | null;
  assigned_object?: NestedInterface | null;
}

export interface IpAddressParams {
  address: string;
  assigned_object_type?: 'dcim.interface';
  assigned_object_id?: number;
}

export type PrefixStatus = 'active' | 'reserved' | 'deprecated' | 'container';

export interface RemotePrefix {
  id: number;
  prefix: string;
  site: NestedSite | null;
  status: ChoiceValue<PrefixStatus>;
}

export interface PrefixParams {
  prefix: string;
  site: number;
  status: PrefixStatus;
}

export interface RemoteVlan {
  id: number;
  vid: number;
  name: string;
  site: NestedSite | null;
}

export interface VlanParams {
  vid?: number;
  name: string;
  site?: number;
}

export interface RemoteCable {
  id: number;
  termination_a_type: string;
  termination_a_id: number;
  termination_b_type: string;
  termination_b_id: number;
}

export interface CableParams {
  termination_a_type: 'dcim.interface';
  termination_a_id: number;
  termination_b_type: 'dcim.interface';
  termination_b_id: number;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor 0-1 (default: 0.1) */
  jitterFactor?: number;
  /** HTTP status codes to retry on */
  retryableStatuses?: number[];
}

/**
 * Result of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

/**
 * NetBox client configuration
 */
export interface NetboxClientConfig {
  /** Base URL of the NetBox instance, e.g. https://netbox.example.com */
  baseUrl: string;
  /** API token */
  token?: string;
  /** Request timeout in ms (default: 30000) */
  timeout?: number;
  /** Retry settings */
  retry?: RetryConfig;
  /** Page size used by list endpoints (default: 250) */
  pageSize?: number;
  /** Enable debug request/response logging */
  debug?: boolean;
}
