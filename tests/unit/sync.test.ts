/**
 * Unit Tests: Diff, Plan Runner and Sync Commands
 *
 * Runs whole reconciliations against the in-memory NetBox:
 * - Intent ordering and dependencies
 * - Apply outcomes and summaries
 * - A second run converges
 * - Dry run and dependency skips
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { diffInventories } from '../../src/sync/diff.js';
import { applyIntent, applyPlan } from '../../src/sync/runner.js';
import { loadRemoteInventory } from '../../src/sync/remote.js';
import type { SyncIntent, SyncPlan } from '../../src/sync/types.js';
import { parseInventory } from '../../src/inventory/loader.js';
import { SUPPORTED_API_VERSION, type InventorySnapshot } from '../../src/inventory/types.js';
import { ApiRequestError } from '../../src/api/retry.js';
import { createLogger } from '../../src/api/logger.js';
import { diffCommand } from '../../src/commands/diff.js';
import { syncCommand } from '../../src/commands/sync.js';
import type { CommandContext } from '../../src/types.js';
import type { ReconciliationContext } from '../../src/context/context.js';
import {
  createFakeNetbox,
  createTestContext,
  required,
  testSettings,
  type FakeNetbox,
} from '../fixtures/fake-netbox.js';

// =============================================================================
// Fixtures
// =============================================================================

const inventoryDoc = {
  apiVersion: SUPPORTED_API_VERSION,
  sites: [
    {
      name: 'dc1',
      vlans: [{ vid: 10, name: 'users' }],
      prefixes: [{ prefix: '10.0.10.0/24' }],
      devices: [
        {
          name: 'leaf1',
          interfaces: [
            { name: 'eth1', mtu: 9000 },
            { name: 'ae0', lag: true },
            { name: 'eth2', parent: 'ae0', mode: 'access', access_vlan: 10, ips: ['10.0.10.2/24'] },
          ],
        },
        { name: 'leaf2', interfaces: [{ name: 'eth1' }] },
      ],
    },
  ],
  cables: [{ a: { device: 'leaf1', interface: 'eth2' }, z: { device: 'leaf2', interface: 'eth1' } }],
};

const inventoryYaml = [
  `apiVersion: ${SUPPORTED_API_VERSION}`,
  'sites:',
  '  - name: dc1',
  '    vlans:',
  '      - { vid: 10, name: users }',
  '    prefixes:',
  '      - { prefix: 10.0.10.0/24 }',
  '    devices:',
  '      - name: leaf1',
  '        interfaces:',
  '          - { name: eth1, mtu: 9000 }',
  '          - { name: ae0, lag: true }',
  '          - { name: eth2, parent: ae0, mode: access, access_vlan: 10, ips: [10.0.10.2/24] }',
  '      - name: leaf2',
  '        interfaces:',
  '          - { name: eth1 }',
  'cables:',
  '  - a: { device: leaf1, interface: eth2 }',
  '    z: { device: leaf2, interface: eth1 }',
  '',
].join('\n');

/**
 * leaf1 has a management interface, an interface to be updated and
 * one the inventory no longer lists; leaf2 is empty
 */
function seedNetbox(): FakeNetbox {
  const fake = createFakeNetbox();
  fake.addSite('dc1');
  fake.addDevice('leaf1', 'dc1', '10.0.0.1/24');
  fake.addDevice('leaf2', 'dc1');
  fake.addInterface('leaf1', 'mgmt0');
  fake.addInterface('leaf1', 'eth1', { mtu: 1500 });
  fake.addInterface('leaf1', 'old0');
  fake.addIpAddress('10.0.0.1/24', 'leaf1', 'mgmt0');
  return fake;
}

async function loadContext(fake: FakeNetbox): Promise<ReconciliationContext> {
  const ctx = createTestContext(fake);
  await loadRemoteInventory(ctx, ['dc1']);
  return ctx;
}

function desired(raw: unknown = inventoryDoc): InventorySnapshot {
  return parseInventory(raw, 'inventory.yml');
}

const ids = (plan: SyncPlan) => plan.intents.map((intent) => intent.id);

// =============================================================================
// Remote loading
// =============================================================================

describe('loadRemoteInventory', () => {
  it('should register what NetBox holds for the site', async () => {
    const fake = seedNetbox();
    const ctx = createTestContext(fake);

    const result = await loadRemoteInventory(ctx, ['dc1', 'dc9']);

    expect(result).toEqual({ sites: ['dc1'], missingSites: ['dc9'] });
    expect(ctx.count('device')).toBe(2);
    expect(ctx.interfacesOf('leaf1').map((intf) => intf.ids.name)).toEqual(['mgmt0', 'eth1', 'old0']);
    expect(required(ctx.getInterface('leaf1', 'mgmt0')).ips).toEqual(['10.0.0.1/24']);
    expect(required(ctx.getDevice('leaf1')).primaryIp).toBe('10.0.0.1/24');
    expect(fake.interfaces.list).toHaveBeenCalledWith({ device_id: [2, 3] });
  });

  it('should register cables between loaded interfaces', async () => {
    const fake = seedNetbox();
    fake.addInterface('leaf2', 'eth1');
    fake.addCable('leaf1', 'eth1', 'leaf2', 'eth1');
    const ctx = await loadContext(fake);

    expect(ctx.count('cable')).toBe(1);
    expect(required(ctx.getInterface('leaf2', 'eth1')).connectedEndpointType).toBe('dcim.interface');
  });
});

// =============================================================================
// Diff
// =============================================================================

describe('diffInventories', () => {
  it('should order deletes first, then creates in dependency order', async () => {
    const ctx = await loadContext(seedNetbox());

    const plan = diffInventories(desired(), ctx);

    expect(ids(plan)).toEqual([
      'delete:ipAddress:10.0.0.1/24',
      'delete:interface:leaf1__mgmt0',
      'delete:interface:leaf1__old0',
      'create:vlan:dc1__10',
      'create:interface:leaf1__ae0',
      'update:interface:leaf1__eth1',
      'create:interface:leaf1__eth2',
      'create:interface:leaf2__eth1',
      'create:ipAddress:10.0.10.2/24',
      'create:prefix:dc1__10.0.10.0/24',
      'create:cable:leaf1__eth2__leaf2__eth1',
    ]);
    expect(plan.missing).toEqual([]);
  });

  it('should record dependencies on the intents that create them', async () => {
    const ctx = await loadContext(seedNetbox());
    const plan = diffInventories(desired(), ctx);
    const byId = new Map(plan.intents.map((intent) => [intent.id, intent]));

    expect(byId.get('create:interface:leaf1__eth2')?.dependsOn).toEqual(['create:interface:leaf1__ae0']);
    expect(byId.get('create:ipAddress:10.0.10.2/24')?.dependsOn).toEqual(['create:interface:leaf1__eth2']);
    expect(byId.get('create:cable:leaf1__eth2__leaf2__eth1')?.dependsOn).toEqual([
      'create:interface:leaf1__eth2',
      'create:interface:leaf2__eth1',
    ]);
  });

  it('should only compare the attributes the inventory states', async () => {
    const ctx = await loadContext(seedNetbox());
    const plan = diffInventories(desired(), ctx);
    const update = required(plan.intents.find((intent) => intent.id === 'update:interface:leaf1__eth1'));

    expect(update.changes).toEqual(['mtu']);
    expect(update.attrs).toMatchObject({ mtu: 9000, description: '', active: true });
  });

  it('should leave deletes out without pruning', async () => {
    const ctx = await loadContext(seedNetbox());
    const plan = diffInventories(desired(), ctx, { prune: false });

    expect(plan.intents.filter((intent) => intent.action === 'delete')).toEqual([]);
    expect(plan.intents).toHaveLength(8);
  });

  it('should report sites and devices NetBox does not have', async () => {
    const ctx = await loadContext(seedNetbox());
    const plan = diffInventories(
      desired({
        apiVersion: SUPPORTED_API_VERSION,
        sites: [
          { name: 'dc1', devices: [{ name: 'leaf9', interfaces: [{ name: 'eth1' }] }] },
          { name: 'dc9', vlans: [{ vid: 10 }] },
        ],
      }),
      ctx,
      { prune: false }
    );

    expect(plan.intents).toEqual([]);
    expect(plan.missing.map((entry) => [entry.kind, entry.name])).toEqual([
      ['site', 'dc9'],
      ['device', 'leaf9'],
    ]);
  });

  it('should plan a VLAN rename', async () => {
    const fake = seedNetbox();
    fake.addVlan('dc1', 10, 'old-users');
    const ctx = await loadContext(fake);

    const plan = diffInventories(desired(), ctx, { prune: false });
    const rename = required(plan.intents.find((intent) => intent.kind === 'vlan'));

    expect(rename).toMatchObject({ id: 'update:vlan:dc1__10', action: 'update', attrs: { name: 'users' } });
  });
});

// =============================================================================
// Runner
// =============================================================================

describe('applyPlan', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should apply the plan and converge on the second run', async () => {
    const fake = seedNetbox();
    const ctx = await loadContext(fake);

    const result = await applyPlan(ctx, diffInventories(desired(), ctx));

    expect(result.summary).toEqual({
      created: 7,
      updated: 1,
      deleted: 1,
      unchanged: 0,
      skipped: 2,
      failed: 0,
      planned: 0,
    });
    expect(
      result.records.filter((record) => record.status === 'skipped').map((record) => record.reason)
    ).toEqual(['protected-management-ip', 'protected-management-interface']);

    const eth2 = required(fake.interfaces.items.find((intf) => intf.name === 'eth2'));
    const ae0 = required(fake.interfaces.items.find((intf) => intf.name === 'ae0'));
    expect(eth2.lag).toEqual({ id: ae0.id, name: 'ae0' });
    expect(eth2.mode?.value).toBe('access');
    expect(eth2.untagged_vlan?.vid).toBe(10);
    expect(eth2.connected_endpoint_type).toBe('dcim.interface');

    const again = diffInventories(desired(), await loadContext(fake));
    expect(ids(again)).toEqual(['delete:ipAddress:10.0.0.1/24', 'delete:interface:leaf1__mgmt0']);
    expect(diffInventories(desired(), await loadContext(fake), { prune: false }).intents).toEqual([]);
  });

  it('should only plan in dry run mode', async () => {
    const fake = seedNetbox();
    const ctx = await loadContext(fake);
    const plan = diffInventories(desired(), ctx);

    const result = await applyPlan(ctx, plan, { dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.summary.planned).toBe(plan.intents.length);
    expect(result.records.every((record) => record.status === 'planned')).toBe(true);
    expect(fake.interfaces.create).not.toHaveBeenCalled();
    expect(fake.interfaces.delete).not.toHaveBeenCalled();
  });

  it('should skip intents whose dependency failed and keep going', async () => {
    const fake = seedNetbox();
    const ctx = await loadContext(fake);
    fake.interfaces.create.mockRejectedValueOnce(new ApiRequestError('Server Error', 500));

    const plan = diffInventories(
      desired({
        apiVersion: SUPPORTED_API_VERSION,
        sites: [
          {
            name: 'dc1',
            prefixes: [{ prefix: '10.0.10.0/24' }],
            devices: [{ name: 'leaf1', interfaces: [{ name: 'eth2', ips: ['10.0.10.2/24'] }] }],
          },
        ],
      }),
      ctx,
      { prune: false }
    );
    const result = await applyPlan(ctx, plan);

    expect(result.records.map((record) => [record.intent.id, record.status])).toEqual([
      ['create:interface:leaf1__eth2', 'failed'],
      ['create:ipAddress:10.0.10.2/24', 'skipped'],
      ['create:prefix:dc1__10.0.10.0/24', 'applied'],
    ]);
    expect(result.records[0]?.message).toBe('Server Error');
    expect(result.records[1]).toMatchObject({
      reason: 'dependency-not-applied',
      message: 'Not attempted: create:interface:leaf1__eth2 did not apply',
    });
    expect(fake.ipAddresses.create).not.toHaveBeenCalled();
  });

  it('should treat an entity that already exists as a met dependency', async () => {
    const fake = seedNetbox();
    const ctx = await loadContext(fake);
    const eth1 = required(ctx.getInterface('leaf1', 'eth1'));

    const intents: SyncIntent[] = [
      {
        id: 'create:interface:leaf1__eth1',
        action: 'create',
        kind: 'interface',
        ids: eth1.ids,
        attrs: {},
        dependsOn: [],
        description: 'interface leaf1 eth1',
      },
      {
        id: 'create:ipAddress:10.0.1.1/31',
        action: 'create',
        kind: 'ipAddress',
        ids: { address: '10.0.1.1/31' },
        attrs: { deviceName: 'leaf1', interfaceName: 'eth1' },
        dependsOn: ['create:interface:leaf1__eth1'],
        description: 'IP address 10.0.1.1/31',
      },
    ];

    const result = await applyPlan(ctx, { intents, missing: [] });

    expect(result.records.map((record) => record.status)).toEqual(['skipped', 'applied']);
    expect(result.records[0]?.reason).toBe('already-exists');
  });

  it('should fail an update for an entity missing from the context', async () => {
    const ctx = createTestContext(createFakeNetbox());

    await expect(
      applyIntent(ctx, {
        id: 'update:interface:leaf1__eth1',
        action: 'update',
        kind: 'interface',
        ids: { deviceName: 'leaf1', name: 'eth1' },
        attrs: { mtu: 9000 },
        dependsOn: [],
        description: 'interface leaf1 eth1',
      })
    ).rejects.toThrow('Unable to update interface leaf1 eth1: not present in context');
  });

  it('should refuse intents for kinds that are never changed', async () => {
    const ctx = createTestContext(createFakeNetbox());

    await expect(
      applyIntent(ctx, {
        id: 'delete:prefix:dc1__10.0.0.0/24',
        action: 'delete',
        kind: 'prefix',
        ids: { siteName: 'dc1', prefix: '10.0.0.0/24' },
        attrs: {},
        dependsOn: [],
        description: 'prefix 10.0.0.0/24 in dc1',
      })
    ).rejects.toThrow('Unsupported intent: delete prefix');
  });
});

// =============================================================================
// Commands
// =============================================================================

describe('diff and sync commands', () => {
  let dir: string;
  let inventoryPath: string;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'netbox-sync-commands-'));
    inventoryPath = path.join(dir, 'inventory.yml');
    fs.writeFileSync(inventoryPath, inventoryYaml);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function commandContext(fake: FakeNetbox): CommandContext {
    return {
      options: { json: true, verbose: false },
      outputFormat: 'json',
      settings: testSettings(),
      logger: createLogger({ level: 'error' }),
      createClient: () => fake.client,
    };
  }

  it('should report the differences', async () => {
    const result = await diffCommand(commandContext(seedNetbox()), { inventory: inventoryPath });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Found 11 difference(s)');
    expect(result.data?.intents[0]).toEqual({
      id: 'delete:ipAddress:10.0.0.1/24',
      action: 'delete',
      kind: 'ipAddress',
      description: 'IP address 10.0.0.1/24',
      changes: undefined,
      dependsOn: [],
    });
  });

  it('should sync and summarize', async () => {
    const fake = seedNetbox();

    const result = await syncCommand(commandContext(fake), { inventory: inventoryPath });

    expect(result.success).toBe(true);
    expect(result.message).toBe('Sync complete: 7 created, 1 updated, 1 deleted, 2 skipped');
    expect(fake.cables.items).toHaveLength(1);
  });

  it('should not touch NetBox on a dry run', async () => {
    const fake = seedNetbox();

    const result = await syncCommand(commandContext(fake), { inventory: inventoryPath, dryRun: true });

    expect(result.message).toBe('Dry run: 11 change(s) planned');
    expect(fake.interfaces.create).not.toHaveBeenCalled();
  });

  it('should fail without a NetBox address', async () => {
    const ctx = commandContext(seedNetbox());
    ctx.settings.netbox.address = '';

    await expect(diffCommand(ctx, { inventory: inventoryPath })).rejects.toThrow(
      /^NetBox address is not configured/
    );
  });
});
