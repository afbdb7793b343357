/**
 * Static Entity Resolver
 *
 * In-memory resolver backed by a map of owner references. Used by the
 * CLI for case files and by tests.
 *
 * @module resolvers/static
 */

import type { EntityDescriptor, EntityResolver } from '../types/entity.js';
import type { OwnerRef } from '../types/temporal.js';
import { formatOwnerRef } from '../errors.js';

export class StaticEntityResolver implements EntityResolver {
  private entities = new Map<string, EntityDescriptor>();

  constructor(entries: Iterable<[OwnerRef, EntityDescriptor]> = []) {
    for (const [ownerRef, descriptor] of entries) {
      this.register(ownerRef, descriptor);
    }
  }

  register(ownerRef: OwnerRef, descriptor: EntityDescriptor): this {
    this.entities.set(formatOwnerRef(ownerRef), descriptor);
    return this;
  }

  unregister(ownerRef: OwnerRef): boolean {
    return this.entities.delete(formatOwnerRef(ownerRef));
  }

  async resolve(ownerRef: OwnerRef): Promise<EntityDescriptor | null> {
    return this.entities.get(formatOwnerRef(ownerRef)) ?? null;
  }

  get size(): number {
    return this.entities.size;
  }
}
