/**
 * In-process NetBox stand-in
 *
 * Implements NetboxClient over in-memory tables. Every resource method
 * is a vi.fn spy, so tests assert on calls and can queue failures with
 * mockRejectedValueOnce.
 */

import { vi, type Mock } from 'vitest';
import type { NetboxClient } from '../../src/api/client.js';
import { ApiRequestError } from '../../src/api/retry.js';
import { createLogger } from '../../src/api/logger.js';
import type {
  CableParams,
  InterfaceParams,
  IpAddressParams,
  ListFilter,
  NestedDevice,
  NestedSite,
  NestedVlan,
  PrefixParams,
  RemoteCable,
  RemoteDevice,
  RemoteInterface,
  RemoteIpAddress,
  RemotePrefix,
  RemoteSite,
  RemoteVlan,
  VlanParams,
} from '../../src/api/types.js';
import { DEFAULT_SETTINGS, type ImportVlansMode, type Settings } from '../../src/config/settings.js';
import { ReconciliationContext } from '../../src/context/context.js';

// =============================================================================
// Resource fake
// =============================================================================

export interface FakeResource<T, C, U> {
  items: T[];
  list: Mock<(filter?: ListFilter) => Promise<T[]>>;
  get: Mock<(id: number) => Promise<T>>;
  create: Mock<(params: C) => Promise<T>>;
  update: Mock<(id: number, data: U) => Promise<T>>;
  delete: Mock<(id: number) => Promise<boolean>>;
}

interface ResourceBehaviour<T, C, U> {
  build: (params: C, id: number) => T;
  patch: (item: T, data: U) => void;
  matches: (item: T, key: string, value: string) => boolean;
  afterCreate?: (item: T) => void;
  afterDelete?: (item: T) => void;
}

function notFound(id: number): ApiRequestError {
  return new ApiRequestError(`No object with id ${id}`, 404, { details: { detail: 'Not found.' } });
}

function fakeResource<T extends { id: number }, C, U>(
  nextId: () => number,
  behaviour: ResourceBehaviour<T, C, U>
): FakeResource<T, C, U> {
  const items: T[] = [];

  const find = (id: number): T => {
    const item = items.find((candidate) => candidate.id === id);
    if (!item) throw notFound(id);
    return item;
  };

  return {
    items,
    list: vi.fn(async (filter: ListFilter = {}) =>
      items.filter((item) =>
        Object.entries(filter).every(([key, value]) => {
          if (value === undefined || key === 'limit') return true;
          const wanted = Array.isArray(value) ? value.map(String) : [String(value)];
          return wanted.some((candidate) => behaviour.matches(item, key, candidate));
        })
      )
    ),
    get: vi.fn(async (id: number) => find(id)),
    create: vi.fn(async (params: C) => {
      const item = behaviour.build(params, nextId());
      items.push(item);
      behaviour.afterCreate?.(item);
      return item;
    }),
    update: vi.fn(async (id: number, data: U) => {
      const item = find(id);
      behaviour.patch(item, data);
      return item;
    }),
    delete: vi.fn(async (id: number) => {
      const item = find(id);
      items.splice(items.indexOf(item), 1);
      behaviour.afterDelete?.(item);
      return true;
    }),
  };
}

// =============================================================================
// NetBox fake
// =============================================================================

type SiteParams = { name: string; slug: string };
type DeviceParams = Record<string, unknown>;

type FakeSites = FakeResource<RemoteSite, SiteParams, Partial<SiteParams>>;
type FakeDevices = FakeResource<RemoteDevice, DeviceParams, Partial<DeviceParams>>;
type FakeInterfaces = FakeResource<RemoteInterface, InterfaceParams, InterfaceParams>;
type FakeIpAddresses = FakeResource<RemoteIpAddress, IpAddressParams, Partial<IpAddressParams>>;
type FakePrefixes = FakeResource<RemotePrefix, PrefixParams, Partial<PrefixParams>>;
type FakeVlans = FakeResource<RemoteVlan, VlanParams, Partial<VlanParams>>;
type FakeCables = FakeResource<RemoteCable, CableParams, Partial<CableParams>>;

export interface FakeNetbox {
  client: NetboxClient;
  sites: FakeSites;
  devices: FakeDevices;
  interfaces: FakeInterfaces;
  ipAddresses: FakeIpAddresses;
  prefixes: FakePrefixes;
  vlans: FakeVlans;
  cables: FakeCables;

  addSite(name: string): RemoteSite;
  addDevice(name: string, siteName: string, primaryIp?: string): RemoteDevice;
  addInterface(deviceName: string, name: string, params?: InterfaceParams): RemoteInterface;
  addVlan(siteName: string, vid: number, name?: string): RemoteVlan;
  addPrefix(siteName: string, prefix: string): RemotePrefix;
  addIpAddress(address: string, deviceName?: string, interfaceName?: string): RemoteIpAddress;
  addCable(deviceA: string, interfaceA: string, deviceZ: string, interfaceZ: string): RemoteCable;
}

const choice = <V extends string>(value: V) => ({ value, label: value });

/**
 * Build an empty fake NetBox
 */
export function createFakeNetbox(): FakeNetbox {
  let counter = 0;
  const nextId = () => ++counter;

  const nestedSite = (id: number | undefined): NestedSite | null => {
    const site = sites.items.find((candidate) => candidate.id === id);
    return site ? { id: site.id, name: site.name, slug: site.slug } : null;
  };

  const nestedDevice = (id: number | undefined): NestedDevice => {
    const device = devices.items.find((candidate) => candidate.id === id);
    return device ? { id: device.id, name: device.name } : { id: id ?? 0, name: null };
  };

  const nestedVlan = (id: number | null | undefined): NestedVlan | null => {
    const vlan = vlans.items.find((candidate) => candidate.id === id);
    return vlan ? { id: vlan.id, vid: vlan.vid, name: vlan.name } : null;
  };

  const nestedLag = (id: number | null | undefined): { id: number; name: string } | null => {
    const lag = interfaces.items.find((candidate) => candidate.id === id);
    return lag ? { id: lag.id, name: lag.name } : null;
  };

  const siteOfDevice = (deviceId: number | undefined): number | undefined =>
    devices.items.find((device) => device.id === deviceId)?.site.id;

  const siteOfInterface = (interfaceId: number): number | undefined =>
    siteOfDevice(interfaces.items.find((intf) => intf.id === interfaceId)?.device.id);

  const setConnected = (cable: RemoteCable, value: string | null): void => {
    for (const id of [cable.termination_a_id, cable.termination_b_id]) {
      const intf = interfaces.items.find((candidate) => candidate.id === id);
      if (intf) intf.connected_endpoint_type = value;
    }
  };

  const sites: FakeSites = fakeResource(nextId, {
    build: (params, id) => ({ id, name: params.name, slug: params.slug }),
    patch: (item, data) => Object.assign(item, data),
    matches: (item, key, value) => key === 'name' && item.name === value,
  });

  const devices: FakeDevices = fakeResource(nextId, {
    build: (params, id) => {
      const siteId = typeof params.site === 'number' ? params.site : undefined;
      const site = nestedSite(siteId);
      if (!site) throw new ApiRequestError('site: This field is required.', 400);
      return {
        id,
        name: typeof params.name === 'string' ? params.name : null,
        site,
        primary_ip: null,
      };
    },
    patch: () => undefined,
    matches: (item, key, value) =>
      (key === 'name' && item.name === value) || (key === 'site_id' && String(item.site.id) === value),
  });

  const interfaces: FakeInterfaces = fakeResource(nextId, {
    build: (params, id) => ({
      id,
      name: params.name ?? '',
      device: nestedDevice(params.device),
      type: choice(params.type ?? 'other'),
      enabled: params.enabled ?? true,
      mtu: params.mtu ?? null,
      description: params.description ?? '',
      mode:
        params.mode === 'access'
          ? choice('access')
          : params.switchport_mode === 'tagged'
            ? choice('tagged')
            : null,
      untagged_vlan: nestedVlan(params.untagged_vlan),
      tagged_vlans: (params.tagged_vlans ?? []).flatMap((vlanId) => {
        const vlan = nestedVlan(vlanId);
        return vlan ? [vlan] : [];
      }),
      lag: nestedLag(params.lag),
      connected_endpoint_type: null,
    }),
    patch: (item, data) => {
      if (data.lag !== undefined) item.lag = nestedLag(data.lag);
      if (data.mtu !== undefined) item.mtu = data.mtu;
      if (data.description !== undefined) item.description = data.description;
      if (data.enabled !== undefined) item.enabled = data.enabled;
      if (data.type !== undefined) item.type = choice(data.type);
    },
    matches: (item, key, value) =>
      (key === 'name' && item.name === value) ||
      (key === 'device_id' && String(item.device.id) === value) ||
      (key === 'site_id' && String(siteOfDevice(item.device.id)) === value),
  });

  const ipAddresses: FakeIpAddresses = fakeResource(nextId, {
    build: (params, id) => {
      const intf = interfaces.items.find((candidate) => candidate.id === params.assigned_object_id);
      return {
        id,
        address: params.address,
        assigned_object_type: intf ? 'dcim.interface' : null,
        assigned_object_id: intf ? intf.id : null,
        assigned_object: intf ? { id: intf.id, name: intf.name, device: intf.device } : null,
      };
    },
    patch: () => undefined,
    matches: (item, key, value) =>
      (key === 'address' && item.address === value) ||
      (key === 'device_id' && String(item.assigned_object?.device.id) === value),
  });

  const prefixes: FakePrefixes = fakeResource(nextId, {
    build: (params, id) => ({
      id,
      prefix: params.prefix,
      site: nestedSite(params.site),
      status: choice(params.status),
    }),
    patch: () => undefined,
    matches: (item, key, value) => key === 'site_id' && String(item.site?.id) === value,
  });

  const vlans: FakeVlans = fakeResource(nextId, {
    build: (params, id) => {
      const site = nestedSite(params.site);
      const taken = vlans.items.some((vlan) => vlan.vid === params.vid && vlan.site?.id === site?.id);
      if (taken) {
        throw new ApiRequestError('VLAN with this Site and VID already exists.', 400, {
          details: { __all__: ['VLAN with this Site and VID already exists.'] },
        });
      }
      return { id, vid: params.vid ?? 0, name: params.name, site };
    },
    patch: (item, data) => {
      if (data.name !== undefined) item.name = data.name;
    },
    matches: (item, key, value) =>
      (key === 'site_id' && String(item.site?.id) === value) ||
      (key === 'vid' && String(item.vid) === value),
  });

  const cables: FakeCables = fakeResource(nextId, {
    build: (params, id) => ({ id, ...params }),
    patch: () => undefined,
    matches: (item, key, value) =>
      key === 'site_id' && String(siteOfInterface(item.termination_a_id)) === value,
    afterCreate: (cable) => setConnected(cable, 'dcim.interface'),
    afterDelete: (cable) => setConnected(cable, null),
  });

  const requireItem = <T>(item: T | undefined, what: string): T => {
    if (item === undefined) throw new Error(`fake NetBox: unknown ${what}`);
    return item;
  };

  const findDevice = (name: string) =>
    requireItem(devices.items.find((device) => device.name === name), `device ${name}`);

  const findInterface = (deviceName: string, name: string) => {
    const device = findDevice(deviceName);
    return requireItem(
      interfaces.items.find((intf) => intf.device.id === device.id && intf.name === name),
      `interface ${deviceName} ${name}`
    );
  };

  const findSite = (name: string) =>
    requireItem(sites.items.find((site) => site.name === name), `site ${name}`);

  // Seeding helpers write to the tables directly so they do not count as calls
  const seed = <T>(items: T[], build: (id: number) => T): T => {
    const item = build(nextId());
    items.push(item);
    return item;
  };

  const fake: FakeNetbox = {
    client: {
      sites,
      devices,
      interfaces,
      ipAddresses,
      prefixes,
      vlans,
      cables,
      getConfig: () => ({ baseUrl: 'http://netbox.test', hasToken: true }),
    },
    sites,
    devices,
    interfaces,
    ipAddresses,
    prefixes,
    vlans,
    cables,

    addSite(name) {
      return seed(sites.items, (id) => ({ id, name, slug: name }));
    },

    addDevice(name, siteName, primaryIp) {
      const site = findSite(siteName);
      return seed(devices.items, (id) => ({
        id,
        name,
        site: { id: site.id, name: site.name, slug: site.slug },
        primary_ip: primaryIp ? { id: id + 10000, address: primaryIp } : null,
      }));
    },

    addInterface(deviceName, name, params = {}) {
      const device = findDevice(deviceName);
      return seed(interfaces.items, (id) => ({
        id,
        name,
        device: { id: device.id, name: device.name },
        type: choice(params.type ?? 'other'),
        enabled: params.enabled ?? true,
        mtu: params.mtu ?? null,
        description: params.description ?? '',
        mode: params.mode === 'access' ? choice('access') : params.switchport_mode === 'tagged' ? choice('tagged') : null,
        untagged_vlan: nestedVlan(params.untagged_vlan),
        tagged_vlans: [],
        lag: null,
        connected_endpoint_type: null,
      }));
    },

    addVlan(siteName, vid, name) {
      const site = findSite(siteName);
      return seed(vlans.items, (id) => ({
        id,
        vid,
        name: name ?? `vlan-${vid}`,
        site: { id: site.id, name: site.name, slug: site.slug },
      }));
    },

    addPrefix(siteName, prefix) {
      const site = findSite(siteName);
      return seed(prefixes.items, (id) => ({
        id,
        prefix,
        site: { id: site.id, name: site.name, slug: site.slug },
        status: choice('active'),
      }));
    },

    addIpAddress(address, deviceName, interfaceName) {
      const intf = deviceName && interfaceName ? findInterface(deviceName, interfaceName) : undefined;
      return seed(ipAddresses.items, (id) => ({
        id,
        address,
        assigned_object_type: intf ? 'dcim.interface' : null,
        assigned_object_id: intf ? intf.id : null,
        assigned_object: intf ? { id: intf.id, name: intf.name, device: intf.device } : null,
      }));
    },

    addCable(deviceA, interfaceA, deviceZ, interfaceZ) {
      const a = findInterface(deviceA, interfaceA);
      const z = findInterface(deviceZ, interfaceZ);
      const cable = seed(cables.items, (id) => ({
        id,
        termination_a_type: 'dcim.interface',
        termination_a_id: a.id,
        termination_b_type: 'dcim.interface',
        termination_b_id: z.id,
      }));
      setConnected(cable, 'dcim.interface');
      return cable;
    },
  };

  return fake;
}

// =============================================================================
// Context helpers
// =============================================================================

export function testSettings(importVlans: ImportVlansMode = 'config'): Settings {
  return {
    netbox: { ...DEFAULT_SETTINGS.netbox, address: 'http://netbox.test', token: 'test-token' },
    main: { importVlans },
    logs: { level: 'error', json: false },
  };
}

/**
 * A context over the fake, with logging silenced
 */
export function createTestContext(
  fake: FakeNetbox,
  importVlans: ImportVlansMode = 'config'
): ReconciliationContext {
  return new ReconciliationContext({
    client: fake.client,
    settings: testSettings(importVlans),
    logger: createLogger({ level: 'error' }),
  });
}

/**
 * Narrow a lookup result in a test, failing it when the value is missing
 */
export function required<T>(value: T | undefined, what = 'value'): T {
  if (value === undefined) {
    throw new Error(`Expected ${what} to be present`);
  }
  return value;
}
