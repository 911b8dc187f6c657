/**
 * Load what NetBox currently holds for a set of sites into a context
 */

import type { ReconciliationContext } from '../context/context.js';
import type { Interface } from '../models/types.js';
import { makeCable, makeSite } from '../models/entities.js';
import {
  cableEndpoints,
  deviceFromRemote,
  interfaceFromRemote,
  ipAddressFromRemote,
  prefixFromRemote,
  vlanFromRemote,
} from '../context/mapping.js';

export interface RemoteLoadResult {
  /** Sites found in NetBox */
  sites: string[];
  /** Requested sites NetBox does not have */
  missingSites: string[];
}

/**
 * Register the sites, devices, VLANs, prefixes, interfaces, IP
 * addresses and cables of each site. Everything registered is
 * materialized.
 */
export async function loadRemoteInventory(
  ctx: ReconciliationContext,
  siteNames: string[]
): Promise<RemoteLoadResult> {
  const result: RemoteLoadResult = { sites: [], missingSites: [] };

  for (const siteName of siteNames) {
    const [site] = await ctx.client.sites.list({ name: siteName });
    if (!site) {
      result.missingSites.push(siteName);
      ctx.logger.warn('Site not found in NetBox', { site: siteName });
      continue;
    }
    if (!ctx.getSite(siteName)) {
      ctx.add(makeSite(siteName, site.id));
    }
    result.sites.push(siteName);
    await loadSite(ctx, siteName, site.id);
  }

  ctx.logger.debug('Loaded remote inventory', {
    sites: result.sites.length,
    devices: ctx.count('device'),
    interfaces: ctx.count('interface'),
    ipAddresses: ctx.count('ipAddress'),
    cables: ctx.count('cable'),
  });
  return result;
}

async function loadSite(ctx: ReconciliationContext, siteName: string, siteId: number): Promise<void> {
  const [devices, vlans, prefixes] = await Promise.all([
    ctx.client.devices.list({ site_id: siteId }),
    ctx.client.vlans.list({ site_id: siteId }),
    ctx.client.prefixes.list({ site_id: siteId }),
  ]);

  const deviceIds: number[] = [];
  for (const device of devices) {
    if (!device.name) continue;
    if (!ctx.getDevice(device.name)) {
      ctx.add(deviceFromRemote(device, device.name));
    }
    deviceIds.push(device.id);
  }

  for (const vlan of vlans) {
    if (!ctx.getVlan(siteName, vlan.vid)) {
      ctx.add(vlanFromRemote(vlan, siteName));
    }
  }

  for (const prefix of prefixes) {
    if (!ctx.getPrefix(siteName, prefix.prefix)) {
      ctx.add(prefixFromRemote(prefix, siteName));
    }
  }

  if (deviceIds.length === 0) {
    return;
  }

  const interfacesById = new Map<number, Interface>();
  for (const remote of await ctx.client.interfaces.list({ device_id: deviceIds })) {
    const deviceName = remote.device.name;
    if (!deviceName || ctx.getInterface(deviceName, remote.name)) continue;
    interfacesById.set(remote.id, ctx.add(interfaceFromRemote(remote, deviceName)));
  }

  for (const remote of await ctx.client.ipAddresses.list({ device_id: deviceIds })) {
    if (ctx.getIpAddress(remote.address)) {
      ctx.logger.debug('Skipping duplicate IP address', { address: remote.address, id: remote.id });
      continue;
    }
    ctx.add(ipAddressFromRemote(remote));
    const intf =
      remote.assigned_object_type === 'dcim.interface' && remote.assigned_object_id !== null
        ? interfacesById.get(remote.assigned_object_id)
        : undefined;
    if (intf && !intf.ips.includes(remote.address)) {
      intf.ips.push(remote.address);
    }
  }

  for (const remote of await ctx.client.cables.list({ site_id: siteId })) {
    const endpoints = cableEndpoints(remote);
    const a = endpoints ? interfacesById.get(endpoints.aId) : undefined;
    const z = endpoints ? interfacesById.get(endpoints.zId) : undefined;
    if (!a || !z) continue;

    const ids = {
      deviceAName: a.ids.deviceName,
      interfaceAName: a.ids.name,
      deviceZName: z.ids.deviceName,
      interfaceZName: z.ids.name,
    };
    if (!ctx.getCable(ids)) {
      ctx.add(makeCable(ids, remote.id));
    }
  }
}
