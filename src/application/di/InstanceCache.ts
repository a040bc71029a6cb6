/**
 * @eagerwire/core - Instance Cache
 *
 * One instance per capability. Entries are written once by the resolver
 * and never replaced; the public surface (`IInstanceCache`) is read-only.
 */

import { CapabilityKey, capabilityName } from '../../domain/capability';
import {
  ContainerStateError,
  UnresolvedCapabilityError,
} from '../../domain/exceptions';
import { IWritableInstanceCache } from './IDependencyInjection';

export class InstanceCache implements IWritableInstanceCache {
  private readonly instances: Map<CapabilityKey, unknown> = new Map();

  get<T>(capability: CapabilityKey<T>): T {
    if (!this.instances.has(capability)) {
      throw new UnresolvedCapabilityError(capabilityName(capability));
    }
    // put() stores each instance under the capability it was built for
    return this.instances.get(capability) as T;
  }

  has(capability: CapabilityKey): boolean {
    return this.instances.has(capability);
  }

  get size(): number {
    return this.instances.size;
  }

  put(capability: CapabilityKey, instance: unknown): void {
    if (this.instances.has(capability)) {
      throw new ContainerStateError(
        `Capability '${capabilityName(capability)}' already has an instance`,
      );
    }
    this.instances.set(capability, instance);
  }

  clear(): void {
    this.instances.clear();
  }

  /**
   * Snapshot of every (capability, instance) pair
   */
  entries(): Array<[CapabilityKey, unknown]> {
    return [...this.instances.entries()];
  }
}
