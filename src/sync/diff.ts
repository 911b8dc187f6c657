/**
 * Diff engine
 *
 * Compares a desired inventory with the state loaded into a
 * reconciliation context and produces the intents that would make
 * NetBox match. Intents come out in dependency order:
 *
 * 1. Deletes: cables, IP addresses, member interfaces, LAG interfaces
 * 2. Creates/updates: VLANs, LAG interfaces, other interfaces, IP
 *    addresses, prefixes, cables
 *
 * Deletes go first so that a cable moved to another port frees the
 * connected marker on its old ends before the new cable is created.
 */

import type { ReconciliationContext } from '../context/context.js';
import type { InventorySnapshot } from '../inventory/types.js';
import type { CableIds, Entity, Interface, InterfaceAttrs } from '../models/types.js';
import {
  attrsEqual,
  cableUid,
  changedKeys,
  describeEntity,
  interfaceUid,
  isMaterialized,
  uniqueId,
} from '../models/entities.js';
import { defaultVlanName } from '../reconcilers/vlans/apply.js';
import type { DiffOptions, IntentAction, MissingEntry, SyncIntent, SyncPlan } from './types.js';

export function intentId(action: IntentAction, entity: Entity): string {
  return `${action}:${entity.kind}:${uniqueId(entity)}`;
}

function cableEnds(ids: CableIds): [string, string] {
  return [
    interfaceUid(ids.deviceAName, ids.interfaceAName),
    interfaceUid(ids.deviceZName, ids.interfaceZName),
  ];
}

/**
 * Build the plan that brings NetBox in line with the desired inventory
 */
export function diffInventories(
  desired: InventorySnapshot,
  ctx: ReconciliationContext,
  options: DiffOptions = {}
): SyncPlan {
  const prune = options.prune ?? true;
  const missing: MissingEntry[] = [];
  const desiredStore = desired.store;

  // Sites and devices are never created: find which ones are usable
  const liveSites = new Set<string>();
  for (const site of desiredStore.getAll('site')) {
    const remote = ctx.getSite(site.ids.name);
    if (remote && isMaterialized(remote)) {
      liveSites.add(site.ids.name);
    } else {
      missing.push({
        kind: 'site',
        name: site.ids.name,
        message: `Site ${site.ids.name} does not exist in NetBox; nothing in it is synced`,
      });
    }
  }

  const liveDevices = new Set<string>();
  for (const device of desiredStore.getAll('device')) {
    if (!liveSites.has(device.attrs.siteName)) continue;
    const remote = ctx.getDevice(device.ids.name);
    if (remote && isMaterialized(remote)) {
      liveDevices.add(device.ids.name);
    } else {
      missing.push({
        kind: 'device',
        name: device.ids.name,
        message: `Device ${device.ids.name} does not exist in NetBox; its interfaces are not synced`,
      });
    }
  }

  const deletes: SyncIntent[] = [];
  const vlanIntents: SyncIntent[] = [];
  const lagIntents: SyncIntent[] = [];
  const interfaceIntents: SyncIntent[] = [];
  const ipIntents: SyncIntent[] = [];
  const prefixIntents: SyncIntent[] = [];
  const cableIntents: SyncIntent[] = [];

  /** Interface uid -> id of the intent creating it */
  const interfaceCreates = new Map<string, string>();

  // VLANs
  for (const vlan of desiredStore.getAll('vlan')) {
    if (!liveSites.has(vlan.ids.siteName)) continue;
    const name = vlan.attrs.name || defaultVlanName(vlan.ids.vid);
    const current = ctx.getVlan(vlan.ids.siteName, vlan.ids.vid);

    if (!current) {
      vlanIntents.push({
        id: intentId('create', vlan),
        action: 'create',
        kind: 'vlan',
        ids: vlan.ids,
        attrs: { ...vlan.attrs },
        dependsOn: [],
        description: describeEntity(vlan),
      });
    } else if (current.attrs.name !== name) {
      const candidate = { name };
      vlanIntents.push({
        id: intentId('update', current),
        action: 'update',
        kind: 'vlan',
        ids: current.ids,
        attrs: candidate,
        dependsOn: [],
        changes: changedKeys(current.attrs, candidate),
        description: describeEntity(current),
      });
    }
  }

  // Interfaces. Creates are registered first so that members can
  // depend on the LAG that is being created with them.
  const desiredInterfaces = desiredStore
    .getAll('interface')
    .filter((intf) => liveDevices.has(intf.ids.deviceName));

  for (const intf of desiredInterfaces) {
    if (!ctx.getInterface(intf.ids.deviceName, intf.ids.name)) {
      interfaceCreates.set(uniqueId(intf), intentId('create', intf));
    }
  }

  const lagDependency = (intf: Interface, attrs: InterfaceAttrs): string[] => {
    if (attrs.isLagMember !== true || !attrs.parent) return [];
    const dependency = interfaceCreates.get(interfaceUid(intf.ids.deviceName, attrs.parent));
    return dependency ? [dependency] : [];
  };

  for (const intf of desiredInterfaces) {
    const bucket = intf.attrs.isLag ? lagIntents : interfaceIntents;
    const current = ctx.getInterface(intf.ids.deviceName, intf.ids.name);

    if (!current) {
      bucket.push({
        id: intentId('create', intf),
        action: 'create',
        kind: 'interface',
        ids: intf.ids,
        attrs: { ...intf.attrs },
        dependsOn: lagDependency(intf, intf.attrs),
        description: describeEntity(intf),
      });
      continue;
    }

    // Only the keys the inventory states are compared
    const candidate: InterfaceAttrs = { ...current.attrs, ...intf.attrs };
    if (!attrsEqual(current.attrs, candidate)) {
      bucket.push({
        id: intentId('update', current),
        action: 'update',
        kind: 'interface',
        ids: current.ids,
        attrs: candidate,
        dependsOn: lagDependency(current, candidate),
        changes: changedKeys(current.attrs, candidate),
        description: describeEntity(current),
      });
    }
  }

  // IP addresses
  for (const ip of desiredStore.getAll('ipAddress')) {
    const { deviceName, interfaceName } = ip.attrs;
    if (!deviceName || !liveDevices.has(deviceName)) continue;
    if (ctx.getIpAddress(ip.ids.address)) continue;

    const dependency = interfaceName
      ? interfaceCreates.get(interfaceUid(deviceName, interfaceName))
      : undefined;
    ipIntents.push({
      id: intentId('create', ip),
      action: 'create',
      kind: 'ipAddress',
      ids: ip.ids,
      attrs: { ...ip.attrs },
      dependsOn: dependency ? [dependency] : [],
      description: describeEntity(ip),
    });
  }

  // Prefixes
  for (const prefix of desiredStore.getAll('prefix')) {
    if (!liveSites.has(prefix.ids.siteName)) continue;
    if (ctx.getPrefix(prefix.ids.siteName, prefix.ids.prefix)) continue;
    prefixIntents.push({
      id: intentId('create', prefix),
      action: 'create',
      kind: 'prefix',
      ids: prefix.ids,
      attrs: { ...prefix.attrs },
      dependsOn: [],
      description: describeEntity(prefix),
    });
  }

  // Cables
  for (const cable of desiredStore.getAll('cable')) {
    if (!liveDevices.has(cable.ids.deviceAName) || !liveDevices.has(cable.ids.deviceZName)) continue;
    if (ctx.getCable(cable.ids)) continue;
    const dependsOn = cableEnds(cable.ids).flatMap((uid) => {
      const dependency = interfaceCreates.get(uid);
      return dependency ? [dependency] : [];
    });
    cableIntents.push({
      id: intentId('create', cable),
      action: 'create',
      kind: 'cable',
      ids: cable.ids,
      attrs: {},
      dependsOn,
      description: describeEntity(cable),
    });
  }

  if (prune) {
    deletes.push(...pruneIntents(desired, ctx, liveDevices));
  }

  return {
    intents: [
      ...deletes,
      ...vlanIntents,
      ...lagIntents,
      ...interfaceIntents,
      ...ipIntents,
      ...prefixIntents,
      ...cableIntents,
    ],
    missing,
  };
}

/**
 * Deletes for what NetBox holds on the listed devices but the
 * inventory does not. VLANs and prefixes are never deleted.
 */
function pruneIntents(
  desired: InventorySnapshot,
  ctx: ReconciliationContext,
  liveDevices: Set<string>
): SyncIntent[] {
  const cables: SyncIntent[] = [];
  const ips: SyncIntent[] = [];
  const members: SyncIntent[] = [];
  const lags: SyncIntent[] = [];
  const desiredStore = desired.store;

  for (const cable of ctx.getAll('cable')) {
    const touchesListed =
      liveDevices.has(cable.ids.deviceAName) || liveDevices.has(cable.ids.deviceZName);
    if (!touchesListed || desiredStore.has('cable', cableUid(cable.ids))) continue;
    cables.push({
      id: intentId('delete', cable),
      action: 'delete',
      kind: 'cable',
      ids: cable.ids,
      attrs: {},
      dependsOn: [],
      description: describeEntity(cable),
    });
  }

  for (const ip of ctx.getAll('ipAddress')) {
    const deviceName = ip.attrs.deviceName;
    if (!deviceName || !liveDevices.has(deviceName)) continue;
    if (desiredStore.has('ipAddress', ip.ids.address)) continue;
    ips.push({
      id: intentId('delete', ip),
      action: 'delete',
      kind: 'ipAddress',
      ids: ip.ids,
      attrs: { ...ip.attrs },
      dependsOn: [],
      description: describeEntity(ip),
    });
  }

  for (const intf of ctx.getAll('interface')) {
    if (!liveDevices.has(intf.ids.deviceName)) continue;
    if (desiredStore.has('interface', uniqueId(intf))) continue;
    (intf.attrs.isLag ? lags : members).push({
      id: intentId('delete', intf),
      action: 'delete',
      kind: 'interface',
      ids: intf.ids,
      attrs: { ...intf.attrs },
      dependsOn: [],
      description: describeEntity(intf),
    });
  }

  return [...cables, ...ips, ...members, ...lags];
}
