/**
 * Interface attribute translation
 *
 * Turns a local interface attribute set into NetBox interface params.
 * Performs read-only context lookups and no I/O. A key absent from the
 * attribute set is left out of the params: absence means "do not
 * touch", never "clear".
 */

import type { InterfaceParams } from '../../api/types.js';
import type { ReconciliationContext } from '../../context/context.js';
import type { InterfaceAttrs, InterfaceIds } from '../../models/types.js';
import { interfaceUid, remoteIdOf } from '../../models/entities.js';
import { DependencyError } from '../../errors/index.js';

/**
 * Remote id of a VLAN referenced by vid within a site. A reference that
 * does not resolve translates to null rather than failing: NetBox
 * decides whether it accepts the object without that VLAN.
 */
export function resolveVlanRemoteId(
  ctx: ReconciliationContext,
  siteName: string,
  vlanRef: string
): number | null {
  const vid = Number(vlanRef);
  const vlan = Number.isInteger(vid) ? ctx.getVlan(siteName, vid) : undefined;
  const remoteId = vlan ? remoteIdOf(vlan) : undefined;
  if (remoteId === undefined) {
    ctx.logger.debug('VLAN not resolvable, sending null', { site: siteName, vlan: vlanRef });
    return null;
  }
  return remoteId;
}

function interfaceType(attrs: InterfaceAttrs): NonNullable<InterfaceParams['type']> {
  if (attrs.isLag) return 'lag';
  if (attrs.isVirtual) return 'virtual';
  return 'other';
}

/**
 * Translate interface attributes into NetBox params
 *
 * @throws DependencyError when the device (or, for a LAG member, the
 *   parent LAG) has no remote identifier yet
 */
export function translateInterfaceAttrs(
  ctx: ReconciliationContext,
  ids: InterfaceIds,
  attrs: InterfaceAttrs
): InterfaceParams {
  const { entity: device, remoteId: deviceId } = ctx.requireDevice(ids.deviceName);

  const params: InterfaceParams = {
    device: deviceId,
    name: ids.name,
    type: interfaceType(attrs),
  };

  if (attrs.mtu !== undefined) {
    params.mtu = attrs.mtu;
  }

  if (attrs.description !== undefined) {
    params.description = attrs.description || '';
  }

  if (attrs.active !== undefined) {
    params.enabled = attrs.active;
  }

  // Access and trunk land on two different NetBox fields
  if (attrs.switchportMode === 'ACCESS') {
    params.mode = 'access';
  } else if (attrs.switchportMode === 'TRUNK') {
    params.switchport_mode = 'tagged';
  }

  if (ctx.settings.main.importVlans !== 'no') {
    const siteName = device.attrs.siteName;
    const mode = attrs.switchportMode;

    if (mode === 'ACCESS' || mode === 'TRUNK') {
      params.untagged_vlan = attrs.accessVlan
        ? resolveVlanRemoteId(ctx, siteName, attrs.accessVlan)
        : null;
    }

    if (mode === 'TRUNK' || mode === 'L3_SUB_VLAN') {
      params.tagged_vlans =
        attrs.allowedVlans && attrs.allowedVlans.length > 0
          ? attrs.allowedVlans.map((vlan) => resolveVlanRemoteId(ctx, siteName, vlan))
          : [];
    }
  }

  if (attrs.isLagMember === true) {
    params.lag = resolveLagParent(ctx, ids, attrs.parent);
  } else if (attrs.isLagMember === false) {
    params.lag = null;
  }

  return params;
}

function resolveLagParent(
  ctx: ReconciliationContext,
  ids: InterfaceIds,
  parentName: string | null | undefined
): number {
  if (!parentName) {
    throw new DependencyError(
      `Interface ${ids.deviceName} ${ids.name} is a LAG member without a parent`,
      { kind: 'interface', uid: interfaceUid(ids.deviceName, ids.name) }
    );
  }
  const parent = ctx.getInterface(ids.deviceName, parentName);
  const parentId = parent ? remoteIdOf(parent) : undefined;
  if (parentId === undefined) {
    throw new DependencyError(
      `Parent LAG ${ids.deviceName} ${parentName} of ${ids.name} has no remote identifier`,
      { kind: 'interface', uid: interfaceUid(ids.deviceName, parentName) }
    );
  }
  return parentId;
}
