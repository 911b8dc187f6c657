/**
 * Interface create/update/delete
 *
 * 1. Create translates the attributes and records the new remote id
 * 2. Update is a no-op when the candidate attributes equal the recorded
 *    ones; otherwise only the params that changed are PATCHed
 * 3. Delete refuses the interface carrying the device's management address
 */

import type { InterfaceParams } from '../../api/types.js';
import type { ReconciliationContext } from '../../context/context.js';
import type { Interface, InterfaceAttrs, InterfaceIds } from '../../models/types.js';
import {
  attrsEqual,
  makeInterface,
  materialize,
  remoteIdOf,
  stableStringify,
} from '../../models/entities.js';
import { DependencyError } from '../../errors/index.js';
import { applied, skipped, unchanged, type ApplyOutcome } from '../types.js';
import { translateInterfaceAttrs } from './translate.js';

/**
 * Create an interface in NetBox and register it in the context
 */
export async function createInterface(
  ctx: ReconciliationContext,
  ids: InterfaceIds,
  attrs: InterfaceAttrs
): Promise<ApplyOutcome<Interface>> {
  const existing = ctx.getInterface(ids.deviceName, ids.name);
  if (existing && remoteIdOf(existing) !== undefined) {
    return skipped(
      'already-exists',
      `Interface ${ids.deviceName} ${ids.name} already exists in NetBox`,
      existing
    );
  }

  const params = translateInterfaceAttrs(ctx, ids, attrs);
  const remote = await ctx.client.interfaces.create(params);

  const entity = existing ?? ctx.add(makeInterface(ids));
  entity.attrs = { ...attrs };
  materialize(entity, remote.id);

  ctx.logger.info('Created interface', {
    device: ids.deviceName,
    interface: ids.name,
    id: remote.id,
  });
  return applied(entity);
}

/**
 * Params whose translated value differs between the recorded and the
 * candidate attribute sets. When the recorded attributes cannot be
 * translated any more (their LAG parent is gone) every candidate param
 * is pushed.
 */
function changedParams(
  ctx: ReconciliationContext,
  entity: Interface,
  candidate: InterfaceAttrs
): InterfaceParams {
  const next = translateInterfaceAttrs(ctx, entity.ids, candidate);

  let current: InterfaceParams;
  try {
    current = translateInterfaceAttrs(ctx, entity.ids, entity.attrs);
  } catch (error) {
    if (!(error instanceof DependencyError)) throw error;
    ctx.logger.debug('Recorded interface attributes not translatable, pushing all params', {
      device: entity.ids.deviceName,
      interface: entity.ids.name,
      reason: error.message,
    });
    return next;
  }

  const currentValues = new Map<string, unknown>(Object.entries(current));
  const changed = Object.fromEntries(
    Object.entries(next).filter(
      ([key, value]) => stableStringify(value) !== stableStringify(currentValues.get(key))
    )
  );
  return changed;
}

/**
 * Push candidate attributes for an interface
 *
 * Keys absent from the candidate keep their recorded value. The
 * recorded attributes object is updated in place.
 *
 * @throws DependencyError if the interface was never created remotely
 */
export async function updateInterface(
  ctx: ReconciliationContext,
  entity: Interface,
  candidate: InterfaceAttrs
): Promise<ApplyOutcome<Interface>> {
  const merged: InterfaceAttrs = { ...entity.attrs, ...candidate };
  if (attrsEqual(entity.attrs, merged)) {
    return unchanged(entity);
  }

  const remoteId = ctx.requireRemoteId(entity);
  const patch = changedParams(ctx, entity, merged);

  if (Object.keys(patch).length > 0) {
    await ctx.client.interfaces.update(remoteId, patch);
    ctx.logger.info('Updated interface', {
      device: entity.ids.deviceName,
      interface: entity.ids.name,
      id: remoteId,
      fields: Object.keys(patch),
    });
  } else {
    ctx.logger.debug('Interface attributes changed without a NetBox-visible difference', {
      device: entity.ids.deviceName,
      interface: entity.ids.name,
    });
  }

  Object.assign(entity.attrs, candidate);
  return Object.keys(patch).length > 0 ? applied(entity) : unchanged(entity);
}

/**
 * Delete an interface from NetBox
 *
 * Refused, with the entity left as it is, when the interface carries
 * its device's management address.
 */
export async function deleteInterface(
  ctx: ReconciliationContext,
  entity: Interface
): Promise<ApplyOutcome<Interface>> {
  const device = ctx.getDevice(entity.ids.deviceName);
  const primaryIp = device?.primaryIp ?? null;

  if (primaryIp !== null && entity.ips.includes(primaryIp)) {
    const message = `Unable to delete interface ${entity.ids.name} on ${entity.ids.deviceName}, as it's the management interface`;
    ctx.logger.warn(message, {
      device: entity.ids.deviceName,
      interface: entity.ids.name,
      address: primaryIp,
    });
    return skipped('protected-management-interface', message, entity);
  }

  const remoteId = ctx.requireRemoteId(entity);
  await ctx.client.interfaces.delete(remoteId);
  ctx.remove(entity);

  ctx.logger.info('Deleted interface', {
    device: entity.ids.deviceName,
    interface: entity.ids.name,
    id: remoteId,
  });
  return applied(entity);
}
