/**
 * @eagerwire/core - Registry
 *
 * Capability → descriptor mapping. Written during the scan phase, sealed
 * when initialization starts, read-only afterwards.
 */

import {
  CapabilityKey,
  capabilityName,
  isCapabilityKey,
} from '../../domain/capability';
import {
  ComponentDescriptor,
  assertComponentDescriptor,
} from '../../domain/component';
import {
  ContainerStateError,
  DuplicateRegistrationError,
  InvalidInputError,
} from '../../domain/exceptions';
import {
  DuplicatePolicy,
  IRegistry,
  RegistrationOutcome,
} from './IDependencyInjection';

/**
 * Registry - one descriptor per capability
 *
 * @example
 * ```typescript
 * const registry = new Registry('reject');
 * registry.register(UserRepository, repositoryDescriptor); // 'added'
 * registry.register(UserRepository, repositoryDescriptor); // 'unchanged'
 * registry.register(UserRepository, otherDescriptor);      // throws
 * ```
 */
export class Registry implements IRegistry {
  private readonly mappings: Map<CapabilityKey, ComponentDescriptor> =
    new Map();
  private sealed = false;

  constructor(private readonly duplicatePolicy: DuplicatePolicy = 'overwrite') {}

  register(
    capability: CapabilityKey,
    descriptor: ComponentDescriptor,
  ): RegistrationOutcome {
    if (this.sealed) {
      throw new ContainerStateError(
        `Cannot register '${describeKey(capability)}': registration phase is over`,
      );
    }
    if (!isCapabilityKey(capability)) {
      throw new InvalidInputError('Capability cannot be null');
    }
    assertComponentDescriptor(descriptor);

    const existing = this.mappings.get(capability);
    if (existing === descriptor) {
      return 'unchanged';
    }

    if (existing && this.duplicatePolicy === 'reject') {
      throw new DuplicateRegistrationError(
        capabilityName(capability),
        existing.implementation,
        descriptor.implementation,
      );
    }

    // Map.set keeps the original insertion position on overwrite
    this.mappings.set(capability, descriptor);
    return existing ? 'replaced' : 'added';
  }

  lookup(capability: CapabilityKey): ComponentDescriptor | undefined {
    return this.mappings.get(capability);
  }

  has(capability: CapabilityKey): boolean {
    return this.mappings.has(capability);
  }

  capabilities(): ReadonlySet<CapabilityKey> {
    return new Set(this.mappings.keys());
  }

  get size(): number {
    return this.mappings.size;
  }

  /**
   * Capabilities currently mapped to `descriptor`
   */
  capabilitiesOf(descriptor: ComponentDescriptor): CapabilityKey[] {
    return descriptor.provides.filter(
      (capability) => this.mappings.get(capability) === descriptor,
    );
  }

  /**
   * Close the registration phase.
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }
}

function describeKey(value: unknown): string {
  return isCapabilityKey(value) ? capabilityName(value) : String(value);
}
