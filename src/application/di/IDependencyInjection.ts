/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module @eagerwire/core/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Architectural Responsibility
 *
 * The container turns a flat set of component descriptors into one fully
 * constructed instance per capability:
 *
 * ```
 * discovery ──► Registry.register(capability, descriptor)   (scan phase)
 *                         │
 *                         ▼
 *              DependencyResolver.initializeAll()           (eager pass)
 *                         │   depth-first over constructor dependencies
 *                         ▼
 *              InstanceCache  ──► getInstance(capability)   (read-only)
 * ```
 *
 * ## Lifecycle
 *
 * 1. **Scanning**: descriptors are registered. Nothing is constructed.
 * 2. **Initializing**: every registered capability is resolved, each
 *    component is constructed exactly once, dependencies first.
 * 3. **Ready**: the instance cache is frozen; lookups are reads only.
 *
 * A failure in step 2 aborts the whole pass. Instances built before the
 * failure are dropped and the container moves to **Failed**; it is never
 * handed back half-initialized.
 *
 * ## Singleton per Capability
 *
 * There are no scopes and no lazy resolution. A component providing two
 * capabilities is constructed once and both capabilities map to the same
 * instance.
 *
 * ## Cycle Detection
 *
 * The resolver marks components (descriptors), not capabilities, as
 * "in progress" while their dependencies resolve. Reaching a marked
 * component again is a back edge in the dependency graph:
 *
 * ```
 * UserService ──► Emailer ──► UserService   (CIRCULAR!)
 * ```
 */

import { CapabilityKey } from '../../domain/capability';
import { ComponentDescriptor } from '../../domain/component';
import { IComponentSource } from '../discovery';
import { ILogger } from '../logging';

/**
 * What happens when a capability is registered a second time with a
 * different descriptor.
 *
 * - `overwrite`: the later registration wins (a warning is logged)
 * - `reject`: `DuplicateRegistrationError` is thrown
 */
export type DuplicatePolicy = 'overwrite' | 'reject';

/**
 * Result of a single `register` call
 */
export type RegistrationOutcome = 'added' | 'replaced' | 'unchanged';

/**
 * Container phase
 */
export type ContainerStatus = 'scanning' | 'initializing' | 'ready' | 'failed';

/**
 * Container configuration options
 */
export interface ContainerOptions {
  /** Container name, used as the log prefix */
  name?: string;

  /** Custom logger */
  logger?: ILogger;

  /** Duplicate registration policy */
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Capability → descriptor mapping, populated during the scan phase.
 */
export interface IRegistry {
  /**
   * Store the descriptor chosen to implement `capability`.
   *
   * @throws InvalidInputError for a missing capability or descriptor
   * @throws DuplicateRegistrationError under the `reject` policy
   * @throws ContainerStateError once the registry is sealed
   */
  register(
    capability: CapabilityKey,
    descriptor: ComponentDescriptor,
  ): RegistrationOutcome;

  /**
   * Descriptor registered for `capability`, if any.
   */
  lookup(capability: CapabilityKey): ComponentDescriptor | undefined;

  has(capability: CapabilityKey): boolean;

  /**
   * Every registered capability, in first-registration order.
   */
  capabilities(): ReadonlySet<CapabilityKey>;

  readonly size: number;
}

/**
 * Read-only view of constructed instances.
 */
export interface IInstanceCache {
  /**
   * @throws UnresolvedCapabilityError if no instance exists
   */
  get<T>(capability: CapabilityKey<T>): T;

  has(capability: CapabilityKey): boolean;

  readonly size: number;
}

/**
 * Instance cache as seen by the resolver.
 */
export interface IWritableInstanceCache extends IInstanceCache {
  /**
   * @throws ContainerStateError if `capability` already has an instance
   */
  put(capability: CapabilityKey, instance: unknown): void;

  /**
   * Drop every instance.
   */
  clear(): void;
}

/**
 * Public container surface.
 *
 * @example
 * ```typescript
 * const container = createContainer({ name: 'app' });
 *
 * container.bootstrap(new DecoratorSource([
 *   InMemoryUserRepository,
 *   ConsoleEmailer,
 *   DefaultUserService,
 * ]));
 *
 * const users = container.getInstance(UserService);
 * ```
 */
export interface IContainer {
  readonly name: string;

  readonly status: ContainerStatus;

  /**
   * Map one capability to a descriptor. Scan phase only.
   */
  register(capability: CapabilityKey, descriptor: ComponentDescriptor): this;

  /**
   * Register every capability a descriptor provides. Scan phase only.
   */
  registerComponent(descriptor: ComponentDescriptor): this;

  /**
   * Discover descriptors from each source and register them.
   */
  scan(...sources: IComponentSource[]): this;

  /**
   * Eagerly construct every registered capability. No-op once ready.
   */
  initializeAll(): this;

  /**
   * `scan(...sources)` followed by `initializeAll()`.
   */
  bootstrap(...sources: IComponentSource[]): this;

  /**
   * Instance constructed for `capability`.
   *
   * @throws InvalidInputError for a missing argument
   * @throws UnregisteredCapabilityError if nothing provides `capability`
   * @throws UnresolvedCapabilityError if initialization has not completed
   */
  getInstance<T>(capability: CapabilityKey<T>): T;

  /**
   * Every registered capability
   */
  capabilities(): ReadonlySet<CapabilityKey>;
}
