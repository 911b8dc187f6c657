/**
 * Cable create/delete
 *
 * The connected-endpoint marker on each interface is the guard against
 * double cabling: it is checked before anything is sent to NetBox and
 * set on both ends as soon as a cable is created, so a later create in
 * the same run refuses without a round trip.
 */

import type { ReconciliationContext } from '../../context/context.js';
import type { Cable, CableIds, Interface } from '../../models/types.js';
import { interfaceUid, makeCable, materialize, remoteIdOf } from '../../models/entities.js';
import { isValidationError } from '../../api/retry.js';
import { applied, INTERFACE_TERMINATION, skipped, type ApplyOutcome } from '../types.js';

interface Endpoint {
  deviceName: string;
  interfaceName: string;
}

function endpointsOf(ids: CableIds): [Endpoint, Endpoint] {
  return [
    { deviceName: ids.deviceAName, interfaceName: ids.interfaceAName },
    { deviceName: ids.deviceZName, interfaceName: ids.interfaceZName },
  ];
}

/**
 * Resolve one end from the context, falling back to NetBox
 */
async function resolveEndpoint(
  ctx: ReconciliationContext,
  end: Endpoint
): Promise<{ intf: Interface; remoteId: number } | undefined> {
  const cached = ctx.getInterface(end.deviceName, end.interfaceName);
  const intf =
    cached && remoteIdOf(cached) !== undefined
      ? cached
      : await ctx.getInterfaceFromRemote(end.deviceName, end.interfaceName);
  const remoteId = intf ? remoteIdOf(intf) : undefined;
  return intf && remoteId !== undefined ? { intf, remoteId } : undefined;
}

/**
 * Create a cable between two interfaces
 *
 * Runs under a lock on both endpoint interfaces, so two creates for the
 * same ports are applied one after the other and the second sees the
 * markers the first one set.
 */
export function createCable(
  ctx: ReconciliationContext,
  ids: CableIds
): Promise<ApplyOutcome<Cable>> {
  const [a, z] = endpointsOf(ids);
  const lockKeys = [
    interfaceUid(a.deviceName, a.interfaceName),
    interfaceUid(z.deviceName, z.interfaceName),
  ];
  return ctx.withLock(lockKeys, () => createCableLocked(ctx, ids, a, z));
}

async function createCableLocked(
  ctx: ReconciliationContext,
  ids: CableIds,
  a: Endpoint,
  z: Endpoint
): Promise<ApplyOutcome<Cable>> {
  const existing = ctx.getCable(ids);
  if (existing && remoteIdOf(existing) !== undefined) {
    return skipped('already-exists', 'Cable already exists in NetBox', existing);
  }

  // Both ends are looked up even when the first one is missing
  const [endA, endZ] = await Promise.all([resolveEndpoint(ctx, a), resolveEndpoint(ctx, z)]);

  const missing = [endA ? null : a, endZ ? null : z].filter((end): end is Endpoint => end !== null);
  if (!endA || !endZ) {
    const labels = missing.map((end) => `${end.deviceName} ${end.interfaceName}`);
    const message = `Unable to create Cable in netbox, interface ${labels.join(' and ')} not found`;
    ctx.logger.warn(message, {
      devices: missing.map((end) => end.deviceName),
      interfaces: missing.map((end) => end.interfaceName),
    });
    return skipped('endpoint-unresolved', message);
  }

  for (const [end, resolved] of [[a, endA], [z, endZ]] as const) {
    if (resolved.intf.connectedEndpointType) {
      const message = `Unable to create Cable in netbox, port ${end.deviceName} ${end.interfaceName} is already connected`;
      ctx.logger.info(message, {
        device: end.deviceName,
        interface: end.interfaceName,
        connected: resolved.intf.connectedEndpointType,
      });
      return skipped('already-connected', message);
    }
  }

  let remoteId: number;
  try {
    const remote = await ctx.client.cables.create({
      termination_a_type: INTERFACE_TERMINATION,
      termination_a_id: endA.remoteId,
      termination_b_type: INTERFACE_TERMINATION,
      termination_b_id: endZ.remoteId,
    });
    remoteId = remote.id;
  } catch (error) {
    if (!isValidationError(error)) throw error;
    const message = `Unable to create Cable in netbox between ${a.deviceName} ${a.interfaceName} and ${z.deviceName} ${z.interfaceName}: ${error.message}`;
    ctx.logger.warn(message, { status: error.status });
    return skipped('cable-conflict', message);
  }

  endA.intf.connectedEndpointType = INTERFACE_TERMINATION;
  endZ.intf.connectedEndpointType = INTERFACE_TERMINATION;

  const entity = existing ?? ctx.add(makeCable(ids));
  materialize(entity, remoteId);

  ctx.logger.info('Created cable', {
    a: `${a.deviceName} ${a.interfaceName}`,
    z: `${z.deviceName} ${z.interfaceName}`,
    id: remoteId,
  });
  return applied(entity);
}

/**
 * Delete a cable. Cables carry no management path, so there is no guard.
 */
export async function deleteCable(
  ctx: ReconciliationContext,
  entity: Cable
): Promise<ApplyOutcome<Cable>> {
  const remoteId = ctx.requireRemoteId(entity);
  await ctx.client.cables.delete(remoteId);

  for (const end of endpointsOf(entity.ids)) {
    const intf = ctx.getInterface(end.deviceName, end.interfaceName);
    if (intf) {
      intf.connectedEndpointType = null;
    }
  }
  ctx.remove(entity);

  ctx.logger.info('Deleted cable', { id: remoteId });
  return applied(entity);
}
