/**
 * Entity store
 *
 * Arena-style registry keyed by (kind, unique id). Every cross-entity
 * reference is resolved through here, so this is also the one place
 * that refuses a second entity with an identity already registered.
 */

import type {
  CableIds,
  Cable,
  Device,
  Entity,
  EntityByKind,
  EntityKind,
  Interface,
  IpAddress,
  Prefix,
  Site,
  Vlan,
} from '../models/types.js';
import { ENTITY_KINDS } from '../models/types.js';
import {
  cableUid,
  interfaceUid,
  prefixUid,
  uniqueId,
  vlanUid,
} from '../models/entities.js';
import { DuplicateEntityError } from '../errors/index.js';

function isOfKind<K extends EntityKind>(entity: Entity, kind: K): entity is EntityByKind[K] {
  return entity.kind === kind;
}

export class EntityStore {
  private readonly buckets = new Map<EntityKind, Map<string, Entity>>(
    ENTITY_KINDS.map((kind) => [kind, new Map<string, Entity>()])
  );

  private bucket(kind: EntityKind): Map<string, Entity> {
    let bucket = this.buckets.get(kind);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(kind, bucket);
    }
    return bucket;
  }

  /**
   * Register an entity
   *
   * @throws DuplicateEntityError if an entity with the same identity exists
   */
  add<T extends Entity>(entity: T): T {
    const uid = uniqueId(entity);
    const bucket = this.bucket(entity.kind);
    if (bucket.has(uid)) {
      throw new DuplicateEntityError(entity.kind, uid);
    }
    bucket.set(uid, entity);
    return entity;
  }

  get<K extends EntityKind>(kind: K, uid: string): EntityByKind[K] | undefined {
    const entity = this.bucket(kind).get(uid);
    return entity && isOfKind(entity, kind) ? entity : undefined;
  }

  has(kind: EntityKind, uid: string): boolean {
    return this.bucket(kind).has(uid);
  }

  getAll<K extends EntityKind>(kind: K): Array<EntityByKind[K]> {
    const result: Array<EntityByKind[K]> = [];
    for (const entity of this.bucket(kind).values()) {
      if (isOfKind(entity, kind)) result.push(entity);
    }
    return result;
  }

  /**
   * Drop an entity from bookkeeping. Callers may keep using the object.
   *
   * @returns true if the entity was registered
   */
  remove(entity: Entity): boolean {
    const bucket = this.bucket(entity.kind);
    const uid = uniqueId(entity);
    if (bucket.get(uid) !== entity) {
      return false;
    }
    return bucket.delete(uid);
  }

  count(kind?: EntityKind): number {
    if (kind) return this.bucket(kind).size;
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.size;
    return total;
  }

  // ---------------------------------------------------------------------------
  // Named accessors
  // ---------------------------------------------------------------------------

  getSite(name: string): Site | undefined {
    return this.get('site', name);
  }

  getDevice(name: string): Device | undefined {
    return this.get('device', name);
  }

  getInterface(deviceName: string, name: string): Interface | undefined {
    return this.get('interface', interfaceUid(deviceName, name));
  }

  getVlan(siteName: string, vid: number): Vlan | undefined {
    return this.get('vlan', vlanUid(siteName, vid));
  }

  getPrefix(siteName: string, prefix: string): Prefix | undefined {
    return this.get('prefix', prefixUid(siteName, prefix));
  }

  getIpAddress(address: string): IpAddress | undefined {
    return this.get('ipAddress', address);
  }

  getCable(ids: CableIds): Cable | undefined {
    return this.get('cable', cableUid(ids));
  }

  /**
   * Interfaces that belong to one device
   */
  interfacesOf(deviceName: string): Interface[] {
    return this.getAll('interface').filter((intf) => intf.ids.deviceName === deviceName);
  }
}
