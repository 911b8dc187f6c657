/**
 * Entity model for the inventory reconciler
 *
 * Entities reference each other by identity (device name, site name,
 * interface name), never by object pointer: the desired snapshot and
 * the remote state are separate stores and a reference must resolve
 * in whichever store it is looked up in.
 */

import type { PrefixStatus } from '../api/types.js';

// =============================================================================
// Remote identity
// =============================================================================

/**
 * Whether an entity exists on the remote system of record yet
 */
export type RemoteState =
  | { state: 'unmaterialized' }
  | { state: 'materialized'; id: number };

export const UNMATERIALIZED: RemoteState = Object.freeze({ state: 'unmaterialized' });

// =============================================================================
// Entity kinds
// =============================================================================

export type EntityKind =
  | 'site'
  | 'device'
  | 'interface'
  | 'ipAddress'
  | 'prefix'
  | 'vlan'
  | 'cable';

export const ENTITY_KINDS: readonly EntityKind[] = [
  'site',
  'device',
  'interface',
  'ipAddress',
  'prefix',
  'vlan',
  'cable',
];

/**
 * Fields shared by every entity
 */
interface EntityBase<K extends EntityKind, I, A> {
  readonly kind: K;
  readonly ids: Readonly<I>;
  attrs: A;
  remote: RemoteState;
}

// =============================================================================
// Site / Device
// =============================================================================

export interface SiteIds {
  name: string;
}

export type SiteAttrs = Record<string, never>;

export type Site = EntityBase<'site', SiteIds, SiteAttrs>;

export interface DeviceIds {
  name: string;
}

export interface DeviceAttrs {
  siteName: string;
}

export interface Device extends EntityBase<'device', DeviceIds, DeviceAttrs> {
  /** Management address (CIDR) as recorded on the remote, compared by value */
  primaryIp: string | null;
}

// =============================================================================
// Interface
// =============================================================================

export type SwitchportMode = 'ACCESS' | 'TRUNK' | 'L3_SUB_VLAN' | 'NONE';

export interface InterfaceIds {
  deviceName: string;
  name: string;
}

/**
 * Mutable interface attributes. A key that is absent means
 * "do not touch", not "clear".
 */
export interface InterfaceAttrs {
  description?: string | null;
  mtu?: number | null;
  active?: boolean;
  isVirtual?: boolean;
  isLag?: boolean;
  isLagMember?: boolean;
  /** Name of the LAG interface on the same device */
  parent?: string | null;
  switchportMode?: SwitchportMode;
  /** VLAN id (within the device's site) of the untagged VLAN */
  accessVlan?: string | null;
  /** VLAN ids (within the device's site) carried tagged */
  allowedVlans?: string[];
}

export interface Interface extends EntityBase<'interface', InterfaceIds, InterfaceAttrs> {
  /** Addresses (CIDR) configured on this interface */
  ips: string[];
  /** Set when something is cabled to the interface, null otherwise */
  connectedEndpointType: string | null;
}

// =============================================================================
// IP address / Prefix / VLAN / Cable
// =============================================================================

export interface IpAddressIds {
  address: string;
}

export interface IpAddressAttrs {
  deviceName?: string;
  interfaceName?: string;
}

export type IpAddress = EntityBase<'ipAddress', IpAddressIds, IpAddressAttrs>;

export interface PrefixIds {
  siteName: string;
  prefix: string;
}

export interface PrefixAttrs {
  status?: PrefixStatus;
}

export type Prefix = EntityBase<'prefix', PrefixIds, PrefixAttrs>;

export interface VlanIds {
  siteName: string;
  vid: number;
}

export interface VlanAttrs {
  name?: string | null;
}

export type Vlan = EntityBase<'vlan', VlanIds, VlanAttrs>;

export interface CableIds {
  deviceAName: string;
  interfaceAName: string;
  deviceZName: string;
  interfaceZName: string;
}

export type CableAttrs = Record<string, never>;

export type Cable = EntityBase<'cable', CableIds, CableAttrs>;

// =============================================================================
// Lookup tables
// =============================================================================

/**
 * Entity type per kind
 */
export interface EntityByKind {
  site: Site;
  device: Device;
  interface: Interface;
  ipAddress: IpAddress;
  prefix: Prefix;
  vlan: Vlan;
  cable: Cable;
}

export type Entity = EntityByKind[EntityKind];

export type IdsOf<K extends EntityKind> = EntityByKind[K]['ids'];

export type AttrsOf<K extends EntityKind> = EntityByKind[K]['attrs'];
