/**
 * Map NetBox objects back onto entities
 *
 * Used when remote state is loaded into a context, and by the cable
 * fallback lookup for interfaces the context never saw.
 */

import type {
  RemoteCable,
  RemoteDevice,
  RemoteInterface,
  RemoteIpAddress,
  RemotePrefix,
  RemoteVlan,
} from '../api/types.js';
import type {
  Device,
  Interface,
  InterfaceAttrs,
  IpAddress,
  Prefix,
  SwitchportMode,
  Vlan,
} from '../models/types.js';
import {
  makeDevice,
  makeInterface,
  makeIpAddress,
  makePrefix,
  makeVlan,
} from '../models/entities.js';

export function deviceFromRemote(remote: RemoteDevice, name: string): Device {
  const primary = remote.primary_ip ?? remote.primary_ip4 ?? null;
  return makeDevice(name, remote.site.name, {
    primaryIp: primary ? primary.address : null,
    remoteId: remote.id,
  });
}

function switchportModeFromRemote(remote: RemoteInterface): SwitchportMode {
  switch (remote.mode?.value) {
    case 'access':
      return 'ACCESS';
    case 'tagged':
    case 'tagged-all':
      return remote.type.value === 'virtual' && remote.name.includes('.') ? 'L3_SUB_VLAN' : 'TRUNK';
    default:
      return 'NONE';
  }
}

/**
 * Attributes recorded for an interface loaded from NetBox
 */
export function interfaceAttrsFromRemote(remote: RemoteInterface): InterfaceAttrs {
  const attrs: InterfaceAttrs = {
    description: remote.description,
    mtu: remote.mtu,
    active: remote.enabled,
    isLag: remote.type.value === 'lag',
    isVirtual: remote.type.value === 'virtual',
    isLagMember: remote.lag !== null,
    parent: remote.lag ? remote.lag.name : null,
    switchportMode: switchportModeFromRemote(remote),
  };

  if (attrs.switchportMode === 'ACCESS' || attrs.switchportMode === 'TRUNK') {
    attrs.accessVlan = remote.untagged_vlan ? String(remote.untagged_vlan.vid) : null;
  }
  if (attrs.switchportMode === 'TRUNK' || attrs.switchportMode === 'L3_SUB_VLAN') {
    attrs.allowedVlans = remote.tagged_vlans.map((vlan) => String(vlan.vid));
  }

  return attrs;
}

export function interfaceFromRemote(remote: RemoteInterface, deviceName: string): Interface {
  return makeInterface({ deviceName, name: remote.name }, interfaceAttrsFromRemote(remote), {
    connectedEndpointType: remote.connected_endpoint_type ?? null,
    remoteId: remote.id,
  });
}

export function ipAddressFromRemote(remote: RemoteIpAddress): IpAddress {
  const assigned = remote.assigned_object_type === 'dcim.interface' ? remote.assigned_object : null;
  const attrs =
    assigned && assigned.device.name
      ? { deviceName: assigned.device.name, interfaceName: assigned.name }
      : {};
  return makeIpAddress(remote.address, attrs, remote.id);
}

export function prefixFromRemote(remote: RemotePrefix, siteName: string): Prefix {
  return makePrefix({ siteName, prefix: remote.prefix }, { status: remote.status.value }, remote.id);
}

export function vlanFromRemote(remote: RemoteVlan, siteName: string): Vlan {
  return makeVlan({ siteName, vid: remote.vid }, { name: remote.name }, remote.id);
}

/**
 * Interface ids at both ends of a remote cable, when both ends are interfaces
 */
export function cableEndpoints(remote: RemoteCable): { aId: number; zId: number } | undefined {
  if (remote.termination_a_type !== 'dcim.interface' || remote.termination_b_type !== 'dcim.interface') {
    return undefined;
  }
  return { aId: remote.termination_a_id, zId: remote.termination_b_id };
}
