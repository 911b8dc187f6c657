/**
 * Inventory YAML loading
 *
 * File layout:
 *
 * ```yaml
 * apiVersion: netbox-sync/v1
 * sites:
 *   - name: dc1
 *     vlans:
 *       - { vid: 10, name: users }
 *     prefixes:
 *       - { prefix: 10.0.10.0/24, status: active }
 *     devices:
 *       - name: spine1
 *         interfaces:
 *           - { name: ae0, lag: true, mtu: 9000 }
 *           - { name: et-0/0/0, parent: ae0, mode: trunk, allowed_vlans: [10] }
 *           - { name: lo0, virtual: true, ips: [10.255.0.1/32] }
 * cables:
 *   - a: { device: spine1, interface: et-0/0/1 }
 *     z: { device: leaf1, interface: et-0/0/49 }
 * ```
 *
 * Sites and devices must already exist in NetBox; they are listed so
 * that interfaces, VLANs and prefixes have an owner.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { PrefixStatus } from '../api/types.js';
import { EntityStore } from '../context/store.js';
import type { CableIds, InterfaceAttrs, SwitchportMode } from '../models/types.js';
import {
  cableUid,
  interfaceUid,
  makeCable,
  makeDevice,
  makeInterface,
  makeIpAddress,
  makePrefix,
  makeSite,
  makeVlan,
  prefixUid,
  vlanUid,
} from '../models/entities.js';
import {
  InventoryError,
  duplicateIdentity,
  invalidField,
  invalidVlanId,
  missingRequiredField,
  type ValidationIssue,
} from './errors.js';
import {
  SUPPORTED_API_VERSION,
  type InventoryLoadOptions,
  type InventorySnapshot,
} from './types.js';

type RawMap = Record<string, unknown>;

const PREFIX_STATUSES: readonly PrefixStatus[] = ['active', 'reserved', 'deprecated', 'container'];

const MODE_NAMES: ReadonlyMap<string, SwitchportMode> = new Map<string, SwitchportMode>([
  ['access', 'ACCESS'],
  ['trunk', 'TRUNK'],
  ['l3-sub-vlan', 'L3_SUB_VLAN'],
  ['none', 'NONE'],
]);

function isRecord(value: unknown): value is RawMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVlanId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 4094;
}

/**
 * Collects issues while walking the document
 */
class InventoryParser {
  readonly issues: ValidationIssue[] = [];
  readonly store = new EntityStore();
  /** Declared VLAN ids per site, for reference warnings */
  private readonly vlansBySite = new Map<string, Set<number>>();
  /** LAG parents referenced by members, checked once every interface is known */
  private readonly lagRefs: Array<{ path: string; deviceName: string; parent: string }> = [];

  list(map: RawMap, key: string, path: string): unknown[] {
    const value = map[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      this.issues.push(invalidField(`${path}.${key}`, 'a list'));
      return [];
    }
    return value;
  }

  requiredString(map: RawMap, key: string, path: string): string | undefined {
    const value = map[key];
    if (value === undefined || value === null || value === '') {
      this.issues.push(missingRequiredField(path, key));
      return undefined;
    }
    if (typeof value !== 'string') {
      this.issues.push(invalidField(`${path}.${key}`, 'a string'));
      return undefined;
    }
    return value;
  }

  optionalBoolean(map: RawMap, key: string, path: string): boolean | undefined {
    const value = map[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') {
      this.issues.push(invalidField(`${path}.${key}`, 'a boolean'));
      return undefined;
    }
    return value;
  }

  record(value: unknown, path: string): RawMap | undefined {
    if (!isRecord(value)) {
      this.issues.push(invalidField(path, 'a mapping'));
      return undefined;
    }
    return value;
  }

  parseDocument(raw: unknown): void {
    const doc = this.record(raw, '$');
    if (!doc) return;

    if (doc.apiVersion === undefined) {
      this.issues.push(missingRequiredField('$', 'apiVersion'));
    } else if (doc.apiVersion !== SUPPORTED_API_VERSION) {
      this.issues.push({
        code: 'UNSUPPORTED_API_VERSION',
        severity: 'error',
        message: `Unsupported API version ${JSON.stringify(doc.apiVersion)}, expected ${SUPPORTED_API_VERSION}`,
        path: '$.apiVersion',
      });
    }

    this.list(doc, 'sites', '$').forEach((site, i) => this.parseSite(site, `sites[${i}]`));
    this.checkLagParents();
    this.list(doc, 'cables', '$').forEach((cable, i) => this.parseCable(cable, `cables[${i}]`));
  }

  parseSite(raw: unknown, path: string): void {
    const site = this.record(raw, path);
    if (!site) return;
    const name = this.requiredString(site, 'name', path);
    if (name === undefined) return;

    if (this.store.has('site', name)) {
      this.issues.push(duplicateIdentity(path, 'Site', name));
      return;
    }
    this.store.add(makeSite(name));

    const vids = new Set<number>();
    this.vlansBySite.set(name, vids);
    this.list(site, 'vlans', path).forEach((vlan, i) =>
      this.parseVlan(vlan, `${path}.vlans[${i}]`, name, vids)
    );
    this.list(site, 'prefixes', path).forEach((prefix, i) =>
      this.parsePrefix(prefix, `${path}.prefixes[${i}]`, name)
    );
    this.list(site, 'devices', path).forEach((device, i) =>
      this.parseDevice(device, `${path}.devices[${i}]`, name)
    );
  }

  parseVlan(raw: unknown, path: string, siteName: string, vids: Set<number>): void {
    const vlan = this.record(raw, path);
    if (!vlan) return;
    if (vlan.vid === undefined) {
      this.issues.push(missingRequiredField(path, 'vid'));
      return;
    }
    if (!isVlanId(vlan.vid)) {
      this.issues.push(invalidVlanId(`${path}.vid`, vlan.vid));
      return;
    }
    const vid = vlan.vid;
    if (this.store.has('vlan', vlanUid(siteName, vid))) {
      this.issues.push(duplicateIdentity(path, 'VLAN', `${siteName}/${vid}`));
      return;
    }

    let name: string | undefined;
    if (vlan.name !== undefined && vlan.name !== null) {
      if (typeof vlan.name === 'string') name = vlan.name;
      else this.issues.push(invalidField(`${path}.name`, 'a string'));
    }

    vids.add(vid);
    this.store.add(makeVlan({ siteName, vid }, name === undefined ? {} : { name }));
  }

  parsePrefix(raw: unknown, path: string, siteName: string): void {
    const prefix = this.record(raw, path);
    if (!prefix) return;
    const value = this.requiredString(prefix, 'prefix', path);
    if (value === undefined) return;
    if (this.store.has('prefix', prefixUid(siteName, value))) {
      this.issues.push(duplicateIdentity(path, 'Prefix', `${siteName}/${value}`));
      return;
    }

    let status: PrefixStatus | undefined;
    if (prefix.status !== undefined) {
      status = PREFIX_STATUSES.find((candidate) => candidate === prefix.status);
      if (!status) {
        this.issues.push(invalidField(`${path}.status`, `one of ${PREFIX_STATUSES.join(', ')}`));
      }
    }

    this.store.add(makePrefix({ siteName, prefix: value }, status ? { status } : {}));
  }

  parseDevice(raw: unknown, path: string, siteName: string): void {
    const device = this.record(raw, path);
    if (!device) return;
    const name = this.requiredString(device, 'name', path);
    if (name === undefined) return;
    if (this.store.has('device', name)) {
      this.issues.push(duplicateIdentity(path, 'Device', name));
      return;
    }
    this.store.add(makeDevice(name, siteName));

    this.list(device, 'interfaces', path).forEach((intf, i) =>
      this.parseInterface(intf, `${path}.interfaces[${i}]`, name, siteName)
    );
  }

  private vlanRef(value: unknown, path: string, siteName: string): string | undefined {
    if (!isVlanId(value)) {
      this.issues.push(invalidVlanId(path, value));
      return undefined;
    }
    if (!this.vlansBySite.get(siteName)?.has(value)) {
      this.issues.push({
        code: 'UNKNOWN_VLAN',
        severity: 'warning',
        message: `VLAN ${value} is not declared in site ${siteName}; it must already exist in NetBox`,
        path,
      });
    }
    return String(value);
  }

  parseInterface(raw: unknown, path: string, deviceName: string, siteName: string): void {
    const intf = this.record(raw, path);
    if (!intf) return;
    const name = this.requiredString(intf, 'name', path);
    if (name === undefined) return;
    if (this.store.has('interface', interfaceUid(deviceName, name))) {
      this.issues.push(duplicateIdentity(path, 'Interface', `${deviceName} ${name}`));
      return;
    }

    const attrs: InterfaceAttrs = {};

    if (intf.description !== undefined) {
      if (intf.description === null || typeof intf.description === 'string') {
        attrs.description = intf.description;
      } else {
        this.issues.push(invalidField(`${path}.description`, 'a string'));
      }
    }

    if (intf.mtu !== undefined) {
      if (intf.mtu === null || (typeof intf.mtu === 'number' && Number.isInteger(intf.mtu) && intf.mtu > 0)) {
        attrs.mtu = intf.mtu;
      } else {
        this.issues.push(invalidField(`${path}.mtu`, 'a positive integer'));
      }
    }

    const enabled = this.optionalBoolean(intf, 'enabled', path);
    if (enabled !== undefined) attrs.active = enabled;
    const isVirtual = this.optionalBoolean(intf, 'virtual', path);
    if (isVirtual !== undefined) attrs.isVirtual = isVirtual;
    const isLag = this.optionalBoolean(intf, 'lag', path);
    if (isLag !== undefined) attrs.isLag = isLag;

    if (intf.parent !== undefined) {
      if (intf.parent === null) {
        attrs.isLagMember = false;
        attrs.parent = null;
      } else if (typeof intf.parent === 'string') {
        attrs.isLagMember = true;
        attrs.parent = intf.parent;
        this.lagRefs.push({ path: `${path}.parent`, deviceName, parent: intf.parent });
      } else {
        this.issues.push(invalidField(`${path}.parent`, 'an interface name'));
      }
    }

    if (intf.mode !== undefined) {
      const mode = typeof intf.mode === 'string' ? MODE_NAMES.get(intf.mode.toLowerCase()) : undefined;
      if (mode) attrs.switchportMode = mode;
      else this.issues.push(invalidField(`${path}.mode`, `one of ${[...MODE_NAMES.keys()].join(', ')}`));
    }

    if (intf.access_vlan !== undefined) {
      if (intf.access_vlan === null) {
        attrs.accessVlan = null;
      } else {
        const ref = this.vlanRef(intf.access_vlan, `${path}.access_vlan`, siteName);
        if (ref !== undefined) attrs.accessVlan = ref;
      }
    }

    if (intf.allowed_vlans !== undefined) {
      attrs.allowedVlans = this.list(intf, 'allowed_vlans', path).flatMap((vid, i) => {
        const ref = this.vlanRef(vid, `${path}.allowed_vlans[${i}]`, siteName);
        return ref === undefined ? [] : [ref];
      });
    }

    const ips: string[] = [];
    this.list(intf, 'ips', path).forEach((address, i) => {
      const ipPath = `${path}.ips[${i}]`;
      if (typeof address !== 'string' || !address.includes('/')) {
        this.issues.push(invalidField(ipPath, 'an address in CIDR notation'));
        return;
      }
      if (this.store.has('ipAddress', address)) {
        this.issues.push(duplicateIdentity(ipPath, 'IP address', address));
        return;
      }
      this.store.add(makeIpAddress(address, { deviceName, interfaceName: name }));
      ips.push(address);
    });

    this.store.add(makeInterface({ deviceName, name }, attrs, { ips }));
  }

  private checkLagParents(): void {
    for (const ref of this.lagRefs) {
      const parent = this.store.getInterface(ref.deviceName, ref.parent);
      if (!parent || parent.attrs.isLag !== true) {
        this.issues.push({
          code: 'UNKNOWN_LAG_PARENT',
          severity: 'error',
          message: `LAG parent "${ref.parent}" is not a LAG interface of device ${ref.deviceName}`,
          path: ref.path,
        });
      }
    }
  }

  private endpoint(map: RawMap, key: 'a' | 'z', path: string): { device: string; intf: string } | undefined {
    const end = this.record(map[key], `${path}.${key}`);
    if (!end) return undefined;
    const device = this.requiredString(end, 'device', `${path}.${key}`);
    const intf = this.requiredString(end, 'interface', `${path}.${key}`);
    if (device === undefined || intf === undefined) return undefined;

    if (!this.store.has('device', device)) {
      this.issues.push({
        code: 'UNKNOWN_DEVICE',
        severity: 'error',
        message: `Device "${device}" is not defined in any site`,
        path: `${path}.${key}.device`,
      });
      return undefined;
    }
    if (!this.store.has('interface', interfaceUid(device, intf))) {
      this.issues.push({
        code: 'UNKNOWN_INTERFACE',
        severity: 'warning',
        message: `Interface ${device} ${intf} is not declared; it must already exist in NetBox`,
        path: `${path}.${key}.interface`,
      });
    }
    return { device, intf };
  }

  parseCable(raw: unknown, path: string): void {
    const cable = this.record(raw, path);
    if (!cable) return;
    const a = this.endpoint(cable, 'a', path);
    const z = this.endpoint(cable, 'z', path);
    if (!a || !z) return;

    const ids: CableIds = {
      deviceAName: a.device,
      interfaceAName: a.intf,
      deviceZName: z.device,
      interfaceZName: z.intf,
    };
    if (this.store.has('cable', cableUid(ids))) {
      this.issues.push(duplicateIdentity(path, 'Cable', `${a.device} ${a.intf} <-> ${z.device} ${z.intf}`));
      return;
    }
    this.store.add(makeCable(ids));
  }
}

/**
 * Build a snapshot from an already parsed inventory document
 *
 * @throws InventoryError listing every error-level issue
 */
export function parseInventory(raw: unknown, source: string): InventorySnapshot {
  const parser = new InventoryParser();
  parser.parseDocument(raw);

  const errors = parser.issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    throw new InventoryError(
      `Inventory ${source} has ${errors.length} error${errors.length === 1 ? '' : 's'}`,
      source,
      parser.issues
    );
  }

  return {
    source,
    store: parser.store,
    warnings: parser.issues.filter((issue) => issue.severity === 'warning'),
  };
}

/**
 * Load and validate an inventory YAML file
 *
 * @throws InventoryError if the file is missing, not YAML, or invalid
 */
export async function loadInventory(
  inventoryPath: string,
  options: InventoryLoadOptions = {}
): Promise<InventorySnapshot> {
  const absolutePath = isAbsolute(inventoryPath)
    ? inventoryPath
    : resolve(options.basePath ?? process.cwd(), inventoryPath);

  if (!existsSync(absolutePath)) {
    throw new InventoryError(`Inventory file not found: ${absolutePath}`, absolutePath);
  }

  const content = await readFile(absolutePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new InventoryError(
      `Failed to parse inventory YAML: ${err instanceof Error ? err.message : String(err)}`,
      absolutePath
    );
  }

  return parseInventory(raw, absolutePath);
}
