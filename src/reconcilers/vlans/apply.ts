/**
 * VLAN create/update
 *
 * A vid already taken in the site is an expected condition: NetBox
 * answers 400, and the create comes back skipped instead of throwing.
 */

import type { ReconciliationContext } from '../../context/context.js';
import type { Vlan, VlanAttrs, VlanIds } from '../../models/types.js';
import { attrsEqual, makeVlan, materialize, remoteIdOf } from '../../models/entities.js';
import { isValidationError } from '../../api/retry.js';
import { applied, skipped, unchanged, type ApplyOutcome } from '../types.js';

/**
 * Name given to a VLAN that has none
 */
export function defaultVlanName(vid: number): string {
  return `vlan-${vid}`;
}

function vlanName(ids: VlanIds, attrs: VlanAttrs): string {
  return attrs.name || defaultVlanName(ids.vid);
}

export async function createVlan(
  ctx: ReconciliationContext,
  ids: VlanIds,
  attrs: VlanAttrs
): Promise<ApplyOutcome<Vlan>> {
  const existing = ctx.getVlan(ids.siteName, ids.vid);
  if (existing && remoteIdOf(existing) !== undefined) {
    return skipped(
      'already-exists',
      `VLAN ${ids.vid} already exists in site ${ids.siteName}`,
      existing
    );
  }

  const { remoteId: siteId } = ctx.requireSite(ids.siteName);
  const name = vlanName(ids, attrs);

  let remoteId: number;
  try {
    const remote = await ctx.client.vlans.create({ vid: ids.vid, name, site: siteId });
    remoteId = remote.id;
  } catch (error) {
    if (!isValidationError(error)) throw error;
    const message = `Unable to create VLAN ${ids.vid} (${name}) in site ${ids.siteName}: ${error.message}`;
    ctx.logger.warn(message, { site: ids.siteName, vlan: ids.vid, status: error.status });
    return skipped('vlan-conflict', message);
  }

  const entity = existing ?? ctx.add(makeVlan(ids));
  entity.attrs = { ...attrs, name };
  materialize(entity, remoteId);

  ctx.logger.info('Created VLAN', { site: ids.siteName, vlan: ids.vid, id: remoteId });
  return applied(entity);
}

/**
 * Push a VLAN's name. Nothing else about a VLAN changes after creation.
 */
export async function updateVlan(
  ctx: ReconciliationContext,
  entity: Vlan,
  candidate: VlanAttrs
): Promise<ApplyOutcome<Vlan>> {
  const merged: VlanAttrs = { ...entity.attrs, ...candidate };
  if (attrsEqual(entity.attrs, merged)) {
    return unchanged(entity);
  }

  const remoteId = ctx.requireRemoteId(entity);
  const name = vlanName(entity.ids, merged);
  await ctx.client.vlans.update(remoteId, { name });

  Object.assign(entity.attrs, candidate);
  ctx.logger.info('Updated VLAN', {
    site: entity.ids.siteName,
    vlan: entity.ids.vid,
    id: remoteId,
    name,
  });
  return applied(entity);
}
