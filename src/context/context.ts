/**
 * Reconciliation context
 *
 * The shared registry for one reconciliation run, plus the run's
 * collaborators (NetBox client, settings, logger). Every apply
 * operation takes the context, resolves its dependencies through it and
 * writes remote identifiers and cable markers back into it, so later
 * operations in the same run see those writes without a round trip.
 */

import type { NetboxClient } from '../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import type { Settings } from '../config/settings.js';
import type { Device, Entity, EntityKind, Interface, Site } from '../models/types.js';
import { materialize, remoteIdOf, uniqueId } from '../models/entities.js';
import { DependencyError } from '../errors/index.js';
import { EntityStore } from './store.js';
import { KeyedLock } from './locks.js';
import { deviceFromRemote, interfaceFromRemote } from './mapping.js';

export interface ContextOptions {
  client: NetboxClient;
  settings: Settings;
  logger?: ApiLogger;
  /** Label for log lines (default: "netbox") */
  name?: string;
}

/**
 * An entity together with its resolved remote identifier
 */
export interface Resolved<T> {
  entity: T;
  remoteId: number;
}

export class ReconciliationContext extends EntityStore {
  readonly client: NetboxClient;
  readonly settings: Settings;
  readonly logger: ApiLogger;
  readonly name: string;
  private readonly locks = new KeyedLock();

  constructor(options: ContextOptions) {
    super();
    this.client = options.client;
    this.settings = options.settings;
    this.name = options.name ?? 'netbox';
    this.logger = (options.logger ?? defaultLogger).child({ store: this.name });
  }

  /**
   * Serialize operations that touch the same context entities. The
   * sequential runner never contends; callers that fan out rely on it.
   */
  withLock<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    return this.locks.run(keys, fn);
  }

  private unresolved(kind: EntityKind, uid: string, reason: string): DependencyError {
    return new DependencyError(`Unable to resolve ${kind} ${uid}: ${reason}`, { kind, uid });
  }

  /**
   * Resolve a device and its remote id
   *
   * @throws DependencyError when the device is unknown or not yet created
   */
  requireDevice(name: string): Resolved<Device> {
    const device = this.getDevice(name);
    if (!device) {
      throw this.unresolved('device', name, 'not present in context');
    }
    const remoteId = remoteIdOf(device);
    if (remoteId === undefined) {
      throw this.unresolved('device', name, 'no remote identifier');
    }
    return { entity: device, remoteId };
  }

  /**
   * Resolve a site and its remote id
   *
   * @throws DependencyError when the site is unknown or not yet created
   */
  requireSite(name: string): Resolved<Site> {
    const site = this.getSite(name);
    if (!site) {
      throw this.unresolved('site', name, 'not present in context');
    }
    const remoteId = remoteIdOf(site);
    if (remoteId === undefined) {
      throw this.unresolved('site', name, 'no remote identifier');
    }
    return { entity: site, remoteId };
  }

  /**
   * Remote id of an entity the caller is about to update or delete
   *
   * @throws DependencyError when the entity was never created remotely
   */
  requireRemoteId(entity: Entity): number {
    const remoteId = remoteIdOf(entity);
    if (remoteId === undefined) {
      throw this.unresolved(entity.kind, uniqueId(entity), 'no remote identifier');
    }
    return remoteId;
  }

  /**
   * Find the remote id of a device, asking NetBox when the context
   * does not know it. A device found remotely is registered.
   */
  private async resolveDeviceRemoteId(deviceName: string): Promise<number | undefined> {
    const known = this.getDevice(deviceName);
    const knownId = known ? remoteIdOf(known) : undefined;
    if (knownId !== undefined) {
      return knownId;
    }

    const [remote] = await this.client.devices.list({ name: deviceName });
    if (!remote) {
      return undefined;
    }

    // Re-read: a parallel lookup may have registered the device meanwhile
    const current = this.getDevice(deviceName);
    if (!current) {
      this.add(deviceFromRemote(remote, deviceName));
    } else if (remoteIdOf(current) === undefined) {
      materialize(current, remote.id);
    }
    return remote.id;
  }

  /**
   * Fetch an interface straight from NetBox by device + interface name
   *
   * Covers interfaces created by an earlier run (or out of band) that
   * this run never loaded. The interface found is registered, with the
   * cable marker NetBox reports for it.
   */
  async getInterfaceFromRemote(deviceName: string, interfaceName: string): Promise<Interface | undefined> {
    const cached = this.getInterface(deviceName, interfaceName);
    if (cached && remoteIdOf(cached) !== undefined) {
      return cached;
    }

    const deviceId = await this.resolveDeviceRemoteId(deviceName);
    if (deviceId === undefined) {
      this.logger.debug('Device not found in NetBox', { device: deviceName });
      return undefined;
    }

    const [remote] = await this.client.interfaces.list({ device_id: deviceId, name: interfaceName });
    if (!remote) {
      this.logger.debug('Interface not found in NetBox', {
        device: deviceName,
        interface: interfaceName,
      });
      return undefined;
    }

    const current = this.getInterface(deviceName, interfaceName);
    if (current) {
      if (remoteIdOf(current) === undefined) {
        materialize(current, remote.id);
        current.connectedEndpointType = remote.connected_endpoint_type ?? null;
      }
      return current;
    }

    return this.add(interfaceFromRemote(remote, deviceName));
  }
}
