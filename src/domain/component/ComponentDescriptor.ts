/**
 * @fileoverview Component descriptors
 *
 * @packageDocumentation
 * @module @eagerwire/core/domain/component
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A descriptor is the static metadata the container needs about one
 * concrete component:
 *
 * 1. **provides**: the capabilities the component implements
 * 2. **dependencies**: the capabilities its single constructor takes, in order
 * 3. **factory**: builds an instance from already-resolved dependencies
 *
 * Descriptors come from a discovery source (see `IComponentSource`); the
 * container never inspects classes itself.
 *
 * Dependencies are not checked when a descriptor is built or registered.
 * A dependency nothing provides surfaces at resolution time.
 */

import {
  CapabilityKey,
  Constructor,
  InstancesOf,
  capabilityName,
  isCapabilityKey,
} from '../capability';
import { InvalidInputError } from '../exceptions';

/**
 * Builds a component instance. Receives the resolved dependency instances
 * in declared order and must return synchronously.
 */
export type ComponentFactory<T = unknown> = (...dependencies: never) => T;

/**
 * Static metadata of one concrete component.
 *
 * @template T - Instance type
 */
export interface ComponentDescriptor<T = unknown> {
  /**
   * Display name of the implementation (class name for decorated classes).
   */
  readonly implementation: string;

  /**
   * Capabilities implemented by this component. Never empty.
   */
  readonly provides: readonly CapabilityKey[];

  /**
   * Capabilities the constructor requires, in parameter order.
   */
  readonly dependencies: readonly CapabilityKey[];

  /**
   * Instance factory.
   */
  readonly factory: ComponentFactory<T>;

  /**
   * Backing class, when the descriptor was derived from one.
   */
  readonly type?: Constructor<T>;
}

/**
 * Input accepted by `defineComponent`.
 *
 * @template T - Instance type
 * @template D - Ordered dependency tuple
 */
export interface ComponentDefinition<T, D extends readonly CapabilityKey[]> {
  name: string;
  provides: readonly CapabilityKey[];
  dependencies?: D;
  factory: (...dependencies: InstancesOf<D>) => T;
}

/**
 * Build a descriptor from an explicit definition.
 *
 * The factory's parameters are typed from the dependency tuple.
 *
 * @example
 * ```typescript
 * const userService = defineComponent({
 *   name: 'DefaultUserService',
 *   provides: [UserService],
 *   dependencies: [UserRepository, Emailer],
 *   factory: (repository, emailer) => new DefaultUserService(repository, emailer),
 * });
 * ```
 *
 * @throws InvalidInputError if the definition is malformed
 */
export function defineComponent<
  T,
  D extends readonly CapabilityKey[] | [] = [],
>(
  definition: ComponentDefinition<T, D>,
): ComponentDescriptor<T> {
  const descriptor: ComponentDescriptor<T> = {
    implementation: definition.name,
    provides: [...definition.provides],
    dependencies: [...(definition.dependencies ?? [])],
    factory: definition.factory,
  };
  assertComponentDescriptor(descriptor);
  return Object.freeze(descriptor);
}

/**
 * Build a descriptor for a class whose constructor dependencies are known.
 *
 * @throws InvalidInputError if the descriptor is malformed
 */
export function describeClass<T>(
  type: Constructor<T>,
  provides: readonly CapabilityKey[],
  dependencies: readonly CapabilityKey[],
): ComponentDescriptor<T> {
  const descriptor: ComponentDescriptor<T> = {
    implementation: type.name,
    provides: [...provides],
    dependencies: [...dependencies],
    factory: (...instances: unknown[]) => Reflect.construct(type, instances),
    type,
  };
  assertComponentDescriptor(descriptor);
  return Object.freeze(descriptor);
}

/**
 * Validate a value received across the discovery boundary.
 *
 * @throws InvalidInputError describing the first problem found
 */
export function assertComponentDescriptor(
  value: unknown,
): asserts value is ComponentDescriptor {
  if (typeof value !== 'object' || value === null) {
    throw new InvalidInputError('Component descriptor cannot be null');
  }

  const implementation: unknown = Reflect.get(value, 'implementation');
  if (typeof implementation !== 'string' || implementation.trim() === '') {
    throw new InvalidInputError(
      'Component descriptor must name its implementation',
    );
  }

  if (typeof Reflect.get(value, 'factory') !== 'function') {
    throw new InvalidInputError(
      `Component '${implementation}' has no factory`,
    );
  }

  const provides: unknown = Reflect.get(value, 'provides');
  if (!Array.isArray(provides) || provides.length === 0) {
    throw new InvalidInputError(
      `Component '${implementation}' must provide at least one capability`,
    );
  }
  provides.forEach((capability: unknown, index) => {
    if (!isCapabilityKey(capability)) {
      throw new InvalidInputError(
        `Component '${implementation}' provides an invalid capability at index ${index}`,
      );
    }
  });

  const dependencies: unknown = Reflect.get(value, 'dependencies');
  if (!Array.isArray(dependencies)) {
    throw new InvalidInputError(
      `Component '${implementation}' must list its dependencies`,
    );
  }
  dependencies.forEach((dependency: unknown, index) => {
    if (!isCapabilityKey(dependency)) {
      throw new InvalidInputError(
        `Component '${implementation}' has an invalid dependency at parameter ${index}`,
      );
    }
  });
}

/**
 * One-line summary, e.g. `DefaultUserService(UserRepository, Emailer) => UserService`
 */
export function describeComponent(descriptor: ComponentDescriptor): string {
  const dependencies = descriptor.dependencies.map(capabilityName).join(', ');
  const provides = descriptor.provides.map(capabilityName).join(', ');
  return `${descriptor.implementation}(${dependencies}) => ${provides}`;
}
