/**
 * Unit Tests: Interface Apply Operations
 *
 * Tests create/update/delete of interfaces against the in-memory NetBox:
 * - Create records the remote id in the context
 * - Update is idempotent and only PATCHes changed params
 * - Delete refuses the management interface
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  createInterface,
  deleteInterface,
  updateInterface,
} from '../../src/reconcilers/interfaces/apply.js';
import { loadRemoteInventory } from '../../src/sync/remote.js';
import { makeInterface } from '../../src/models/entities.js';
import { DependencyError } from '../../src/errors/index.js';
import type { ReconciliationContext } from '../../src/context/context.js';
import type { RemoteDevice, RemoteInterface } from '../../src/api/types.js';
import {
  createFakeNetbox,
  createTestContext,
  required,
  type FakeNetbox,
} from '../fixtures/fake-netbox.js';

// =============================================================================
// Fixtures
// =============================================================================

describe('interface apply', () => {
  let fake: FakeNetbox;
  let ctx: ReconciliationContext;
  let device: RemoteDevice;
  let eth1: RemoteInterface;

  beforeEach(async () => {
    fake = createFakeNetbox();
    fake.addSite('dc1');
    device = fake.addDevice('leaf1', 'dc1', '10.0.0.1/24');
    fake.addInterface('leaf1', 'mgmt0');
    eth1 = fake.addInterface('leaf1', 'eth1', { mtu: 1500 });
    fake.addIpAddress('10.0.0.1/24', 'leaf1', 'mgmt0');

    ctx = createTestContext(fake);
    await loadRemoteInventory(ctx, ['dc1']);
  });

  // ===========================================================================
  // Create
  // ===========================================================================

  describe('createInterface', () => {
    it('should create the interface and materialize it in the context', async () => {
      const outcome = await createInterface(
        ctx,
        { deviceName: 'leaf1', name: 'eth2' },
        { mtu: 9000, description: 'to spine1' }
      );

      expect(fake.interfaces.create).toHaveBeenCalledTimes(1);
      expect(fake.interfaces.create).toHaveBeenCalledWith({
        device: device.id,
        name: 'eth2',
        type: 'other',
        mtu: 9000,
        description: 'to spine1',
      });

      const created = required(fake.interfaces.items.find((intf) => intf.name === 'eth2'));
      expect(outcome.status).toBe('applied');
      expect(required(ctx.getInterface('leaf1', 'eth2')).remote).toEqual({
        state: 'materialized',
        id: created.id,
      });
      expect(required(ctx.getInterface('leaf1', 'eth2')).attrs).toEqual({
        mtu: 9000,
        description: 'to spine1',
      });
    });

    it('should skip an interface the context already holds', async () => {
      const outcome = await createInterface(ctx, { deviceName: 'leaf1', name: 'eth1' }, { mtu: 9000 });

      expect(outcome.status).toBe('skipped');
      expect(outcome).toMatchObject({ reason: 'already-exists' });
      expect(fake.interfaces.create).not.toHaveBeenCalled();
    });

    it('should not call NetBox when the parent LAG is missing', async () => {
      await expect(
        createInterface(ctx, { deviceName: 'leaf1', name: 'eth2' }, { isLagMember: true, parent: 'ae0' })
      ).rejects.toThrow(DependencyError);
      expect(fake.interfaces.create).not.toHaveBeenCalled();
    });

    it('should create a LAG member after its LAG', async () => {
      const lag = await createInterface(ctx, { deviceName: 'leaf1', name: 'ae0' }, { isLag: true });
      await createInterface(ctx, { deviceName: 'leaf1', name: 'eth2' }, { isLagMember: true, parent: 'ae0' });

      const ae0 = required(fake.interfaces.items.find((intf) => intf.name === 'ae0'));
      expect(lag.status).toBe('applied');
      expect(fake.interfaces.create).toHaveBeenLastCalledWith({
        device: device.id,
        name: 'eth2',
        type: 'other',
        lag: ae0.id,
      });
    });
  });

  // ===========================================================================
  // Update
  // ===========================================================================

  describe('updateInterface', () => {
    it('should PATCH only the changed params', async () => {
      const entity = required(ctx.getInterface('leaf1', 'eth1'));
      const outcome = await updateInterface(ctx, entity, { ...entity.attrs, mtu: 9000 });

      expect(outcome.status).toBe('applied');
      expect(fake.interfaces.update).toHaveBeenCalledWith(eth1.id, { mtu: 9000 });
      expect(eth1.mtu).toBe(9000);
      expect(entity.attrs.mtu).toBe(9000);
    });

    it('should be idempotent for the same candidate', async () => {
      const entity = required(ctx.getInterface('leaf1', 'eth1'));
      const candidate = { ...entity.attrs, mtu: 9000 };

      await updateInterface(ctx, entity, candidate);
      const second = await updateInterface(ctx, entity, candidate);

      expect(second.status).toBe('unchanged');
      expect(fake.interfaces.update).toHaveBeenCalledTimes(1);
    });

    it('should not call NetBox when the attributes are equal', async () => {
      const entity = required(ctx.getInterface('leaf1', 'eth1'));
      const outcome = await updateInterface(ctx, entity, { ...entity.attrs });

      expect(outcome.status).toBe('unchanged');
      expect(fake.interfaces.update).not.toHaveBeenCalled();
    });

    it('should record a change that NetBox cannot see without a PATCH', async () => {
      const entity = required(ctx.getInterface('leaf1', 'eth1'));
      // null and '' both translate to an empty description
      const outcome = await updateInterface(ctx, entity, { ...entity.attrs, description: null });

      expect(outcome.status).toBe('unchanged');
      expect(fake.interfaces.update).not.toHaveBeenCalled();
      expect(entity.attrs.description).toBeNull();
    });

    it('should keep recorded attributes the candidate leaves out', async () => {
      const eth3 = fake.addInterface('leaf1', 'eth3', { mtu: 1500, description: 'uplink' });
      const entity = required(await ctx.getInterfaceFromRemote('leaf1', 'eth3'));
      const recorded = entity.attrs;

      const outcome = await updateInterface(ctx, entity, { mtu: 9000 });

      expect(outcome.status).toBe('applied');
      expect(fake.interfaces.update).toHaveBeenCalledWith(eth3.id, { mtu: 9000 });
      expect(entity.attrs).toBe(recorded);
      expect(entity.attrs).toMatchObject({ mtu: 9000, description: 'uplink', switchportMode: 'NONE' });

      const second = await updateInterface(ctx, entity, { mtu: 9000 });
      expect(second.status).toBe('unchanged');
      expect(fake.interfaces.update).toHaveBeenCalledTimes(1);
    });

    it('should throw DependencyError for an interface never created', async () => {
      const entity = ctx.add(makeInterface({ deviceName: 'leaf1', name: 'eth5' }, { mtu: 1500 }));

      await expect(updateInterface(ctx, entity, { mtu: 9000 })).rejects.toThrow(DependencyError);
      expect(fake.interfaces.update).not.toHaveBeenCalled();
    });
  });

  // ===========================================================================
  // Delete
  // ===========================================================================

  describe('deleteInterface', () => {
    it('should refuse to delete the management interface', async () => {
      const mgmt = required(ctx.getInterface('leaf1', 'mgmt0'));
      const outcome = await deleteInterface(ctx, mgmt);

      expect(outcome).toEqual({
        status: 'skipped',
        reason: 'protected-management-interface',
        message: "Unable to delete interface mgmt0 on leaf1, as it's the management interface",
        entity: mgmt,
      });
      expect(fake.interfaces.delete).not.toHaveBeenCalled();
      expect(ctx.getInterface('leaf1', 'mgmt0')).toBe(mgmt);
    });

    it('should delete other interfaces and drop them from the context', async () => {
      const entity = required(ctx.getInterface('leaf1', 'eth1'));
      const outcome = await deleteInterface(ctx, entity);

      expect(outcome.status).toBe('applied');
      expect(fake.interfaces.delete).toHaveBeenCalledWith(eth1.id);
      expect(ctx.getInterface('leaf1', 'eth1')).toBeUndefined();
      expect(fake.interfaces.items.map((intf) => intf.name)).toEqual(['mgmt0']);
    });
  });
});
