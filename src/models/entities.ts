/**
 * Entity constructors and helpers
 */

import type {
  Cable,
  CableIds,
  Device,
  Entity,
  Interface,
  InterfaceAttrs,
  InterfaceIds,
  IpAddress,
  IpAddressAttrs,
  Prefix,
  PrefixAttrs,
  PrefixIds,
  RemoteState,
  Site,
  Vlan,
  VlanAttrs,
  VlanIds,
} from './types.js';
import { UNMATERIALIZED } from './types.js';

/** Separator between identity fields in a unique id */
export const UID_SEPARATOR = '__';

// =============================================================================
// Unique ids
// =============================================================================

export function interfaceUid(deviceName: string, name: string): string {
  return [deviceName, name].join(UID_SEPARATOR);
}

export function vlanUid(siteName: string, vid: number): string {
  return [siteName, String(vid)].join(UID_SEPARATOR);
}

export function prefixUid(siteName: string, prefix: string): string {
  return [siteName, prefix].join(UID_SEPARATOR);
}

/**
 * Both endpoints are sorted so a cable has one identity whichever end
 * is called A.
 */
export function cableUid(ids: CableIds): string {
  const ends = [
    interfaceUid(ids.deviceAName, ids.interfaceAName),
    interfaceUid(ids.deviceZName, ids.interfaceZName),
  ].sort();
  return ends.join(UID_SEPARATOR);
}

/**
 * Deterministic unique id of an entity within one reconciliation run
 */
export function uniqueId(entity: Entity): string {
  switch (entity.kind) {
    case 'site':
    case 'device':
      return entity.ids.name;
    case 'interface':
      return interfaceUid(entity.ids.deviceName, entity.ids.name);
    case 'ipAddress':
      return entity.ids.address;
    case 'prefix':
      return prefixUid(entity.ids.siteName, entity.ids.prefix);
    case 'vlan':
      return vlanUid(entity.ids.siteName, entity.ids.vid);
    case 'cable':
      return cableUid(entity.ids);
  }
}

/**
 * Short human label used in log lines
 */
export function describeEntity(entity: Entity): string {
  switch (entity.kind) {
    case 'site':
      return `site ${entity.ids.name}`;
    case 'device':
      return `device ${entity.ids.name}`;
    case 'interface':
      return `interface ${entity.ids.deviceName} ${entity.ids.name}`;
    case 'ipAddress':
      return `IP address ${entity.ids.address}`;
    case 'prefix':
      return `prefix ${entity.ids.prefix} in ${entity.ids.siteName}`;
    case 'vlan':
      return `vlan ${entity.ids.vid} in ${entity.ids.siteName}`;
    case 'cable':
      return `cable ${entity.ids.deviceAName} ${entity.ids.interfaceAName} <-> ${entity.ids.deviceZName} ${entity.ids.interfaceZName}`;
  }
}

// =============================================================================
// Remote state
// =============================================================================

export function remoteIdOf(entity: { remote: RemoteState }): number | undefined {
  return entity.remote.state === 'materialized' ? entity.remote.id : undefined;
}

export function isMaterialized(entity: { remote: RemoteState }): boolean {
  return entity.remote.state === 'materialized';
}

/**
 * Record the remote identifier once the remote object exists
 */
export function materialize<T extends { remote: RemoteState }>(entity: T, id: number): T {
  entity.remote = { state: 'materialized', id };
  return entity;
}

function initialRemote(remoteId?: number): RemoteState {
  return remoteId === undefined ? UNMATERIALIZED : { state: 'materialized', id: remoteId };
}

// =============================================================================
// Constructors
// =============================================================================

export function makeSite(name: string, remoteId?: number): Site {
  return { kind: 'site', ids: { name }, attrs: {}, remote: initialRemote(remoteId) };
}

export function makeDevice(
  name: string,
  siteName: string,
  options: { primaryIp?: string | null; remoteId?: number } = {}
): Device {
  return {
    kind: 'device',
    ids: { name },
    attrs: { siteName },
    remote: initialRemote(options.remoteId),
    primaryIp: options.primaryIp ?? null,
  };
}

export function makeInterface(
  ids: InterfaceIds,
  attrs: InterfaceAttrs = {},
  options: { ips?: string[]; connectedEndpointType?: string | null; remoteId?: number } = {}
): Interface {
  return {
    kind: 'interface',
    ids: { ...ids },
    attrs: { ...attrs },
    remote: initialRemote(options.remoteId),
    ips: [...(options.ips ?? [])],
    connectedEndpointType: options.connectedEndpointType ?? null,
  };
}

export function makeIpAddress(
  address: string,
  attrs: IpAddressAttrs = {},
  remoteId?: number
): IpAddress {
  return { kind: 'ipAddress', ids: { address }, attrs: { ...attrs }, remote: initialRemote(remoteId) };
}

export function makePrefix(ids: PrefixIds, attrs: PrefixAttrs = {}, remoteId?: number): Prefix {
  return { kind: 'prefix', ids: { ...ids }, attrs: { ...attrs }, remote: initialRemote(remoteId) };
}

export function makeVlan(ids: VlanIds, attrs: VlanAttrs = {}, remoteId?: number): Vlan {
  return { kind: 'vlan', ids: { ...ids }, attrs: { ...attrs }, remote: initialRemote(remoteId) };
}

export function makeCable(ids: CableIds, remoteId?: number): Cable {
  return { kind: 'cable', ids: { ...ids }, attrs: {}, remote: initialRemote(remoteId) };
}

// =============================================================================
// Attribute comparison
// =============================================================================

/**
 * JSON serialization with object keys sorted, so that two attribute
 * sets built in a different key order compare equal
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'undefined';
}

/**
 * Field-by-field equality of two attribute sets. A key set to
 * `undefined` is the same as an absent key.
 */
export function attrsEqual(a: object, b: object): boolean {
  return stableStringify(a) === stableStringify(b);
}

/**
 * Keys whose values differ between two attribute sets
 */
export function changedKeys(current: object, candidate: object): string[] {
  const currentValues = new Map<string, unknown>(Object.entries(current));
  const candidateValues = new Map<string, unknown>(Object.entries(candidate));
  const keys = new Set<string>([...currentValues.keys(), ...candidateValues.keys()]);
  return [...keys].filter(
    (key) => stableStringify(currentValues.get(key)) !== stableStringify(candidateValues.get(key))
  );
}
