/**
 * IP address create/delete
 *
 * An address is attached to its interface at creation time when the
 * interface resolves; otherwise it is created unattached.
 */

import type { IpAddressParams } from '../../api/types.js';
import type { ReconciliationContext } from '../../context/context.js';
import type { Interface, IpAddress, IpAddressAttrs } from '../../models/types.js';
import { makeIpAddress, materialize, remoteIdOf } from '../../models/entities.js';
import { applied, skipped, type ApplyOutcome } from '../types.js';

function attachmentTarget(
  ctx: ReconciliationContext,
  attrs: IpAddressAttrs
): { intf: Interface; remoteId: number } | undefined {
  if (!attrs.deviceName || !attrs.interfaceName) {
    return undefined;
  }
  const intf = ctx.getInterface(attrs.deviceName, attrs.interfaceName);
  const remoteId = intf ? remoteIdOf(intf) : undefined;
  if (!intf || remoteId === undefined) {
    return undefined;
  }
  return { intf, remoteId };
}

export async function createIpAddress(
  ctx: ReconciliationContext,
  address: string,
  attrs: IpAddressAttrs
): Promise<ApplyOutcome<IpAddress>> {
  const existing = ctx.getIpAddress(address);
  if (existing && remoteIdOf(existing) !== undefined) {
    return skipped('already-exists', `IP address ${address} already exists in NetBox`, existing);
  }

  const params: IpAddressParams = { address };
  const target = attachmentTarget(ctx, attrs);
  if (target) {
    params.assigned_object_type = 'dcim.interface';
    params.assigned_object_id = target.remoteId;
  } else if (attrs.deviceName && attrs.interfaceName) {
    ctx.logger.debug('Interface not resolvable, creating IP address unattached', {
      address,
      device: attrs.deviceName,
      interface: attrs.interfaceName,
    });
  }

  const remote = await ctx.client.ipAddresses.create(params);

  const entity = existing ?? ctx.add(makeIpAddress(address));
  entity.attrs = { ...attrs };
  materialize(entity, remote.id);

  if (target && !target.intf.ips.includes(address)) {
    target.intf.ips.push(address);
  }

  ctx.logger.info('Created IP address', {
    address,
    id: remote.id,
    interface: target ? target.intf.ids.name : null,
  });
  return applied(entity);
}

/**
 * Delete an IP address from NetBox
 *
 * Refused when the address is its device's management address.
 */
export async function deleteIpAddress(
  ctx: ReconciliationContext,
  entity: IpAddress
): Promise<ApplyOutcome<IpAddress>> {
  const { deviceName, interfaceName } = entity.attrs;
  const device = deviceName ? ctx.getDevice(deviceName) : undefined;

  if (device && device.primaryIp === entity.ids.address) {
    const message = `Unable to delete IP address ${entity.ids.address} on ${device.ids.name}, as it's the management address`;
    ctx.logger.warn(message, {
      device: device.ids.name,
      interface: interfaceName ?? null,
      address: entity.ids.address,
    });
    return skipped('protected-management-ip', message, entity);
  }

  const remoteId = ctx.requireRemoteId(entity);
  await ctx.client.ipAddresses.delete(remoteId);
  ctx.remove(entity);

  const intf = deviceName && interfaceName ? ctx.getInterface(deviceName, interfaceName) : undefined;
  if (intf) {
    intf.ips = intf.ips.filter((ip) => ip !== entity.ids.address);
  }

  ctx.logger.info('Deleted IP address', { address: entity.ids.address, id: remoteId });
  return applied(entity);
}
