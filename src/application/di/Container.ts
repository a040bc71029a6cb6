/**
 * @eagerwire/core - Container
 *
 * Explicit, constructible container object. Holds its own registry,
 * instance cache and resolver; nothing is process-wide, so independent
 * containers coexist.
 */

import {
  CapabilityKey,
  capabilityName,
  isCapabilityKey,
} from '../../domain/capability';
import {
  ComponentDescriptor,
  assertComponentDescriptor,
  describeComponent,
} from '../../domain/component';
import {
  ContainerStateError,
  DependencyResolutionError,
  InvalidInputError,
  UnregisteredCapabilityError,
  describeError,
} from '../../domain/exceptions';
import { IComponentSource } from '../discovery';
import { ILogger, consoleLogger, createScopedLogger } from '../logging';
import { DependencyResolver } from './DependencyResolver';
import {
  ContainerOptions,
  ContainerStatus,
  IContainer,
  IInstanceCache,
} from './IDependencyInjection';
import { InstanceCache } from './InstanceCache';
import { Registry } from './Registry';

/**
 * Container - eager, singleton-per-capability DI container
 *
 * @example
 * ```typescript
 * const container = new Container({ name: 'users', duplicatePolicy: 'reject' });
 *
 * container
 *   .registerComponent(repositoryDescriptor)
 *   .registerComponent(emailerDescriptor)
 *   .registerComponent(userServiceDescriptor)
 *   .initializeAll();
 *
 * container.getInstance(UserService).createUser('ada', 'ada@example.com');
 * ```
 */
export class Container implements IContainer {
  readonly name: string;
  private _status: ContainerStatus = 'scanning';
  private readonly logger: ILogger;
  private readonly registry: Registry;
  private readonly cache: InstanceCache;
  private readonly resolver: DependencyResolver;

  constructor(private readonly options: ContainerOptions = {}) {
    this.name = options.name ?? 'container';
    this.logger = createScopedLogger(
      this.name.toUpperCase(),
      options.logger ?? consoleLogger,
    );
    this.registry = new Registry(options.duplicatePolicy ?? 'overwrite');
    this.cache = new InstanceCache();
    this.resolver = new DependencyResolver(
      this.registry,
      this.cache,
      this.logger,
    );
  }

  get status(): ContainerStatus {
    return this._status;
  }

  get isInitialized(): boolean {
    return this._status === 'ready';
  }

  getOptions(): ContainerOptions {
    return { ...this.options };
  }

  register(capability: CapabilityKey, descriptor: ComponentDescriptor): this {
    this.assertScanning('register');

    const outcome = this.registry.register(capability, descriptor);
    const name = capabilityName(capability);

    if (outcome === 'added') {
      this.logger.debug(`Registered: ${name} -> ${descriptor.implementation}`);
    } else if (outcome === 'replaced') {
      this.logger.warn(
        `Replaced registration: ${name} -> ${descriptor.implementation}`,
      );
    }
    return this;
  }

  registerComponent(descriptor: ComponentDescriptor): this {
    this.assertScanning('registerComponent');
    assertComponentDescriptor(descriptor);

    for (const capability of descriptor.provides) {
      this.register(capability, descriptor);
    }
    return this;
  }

  scan(...sources: IComponentSource[]): this {
    this.assertScanning('scan');

    for (const source of sources) {
      this.logger.info(`Starting component scan: ${source.name}`);
      const descriptors = source.discover();
      for (const descriptor of descriptors) {
        this.registerComponent(descriptor);
      }
      this.logger.info(
        `Component scan completed: ${source.name} (${descriptors.length} components)`,
      );
    }
    return this;
  }

  initializeAll(): this {
    if (this._status === 'ready') {
      this.logger.debug('Already initialized');
      return this;
    }
    if (this._status !== 'scanning') {
      throw new ContainerStateError(
        `Cannot initialize container '${this.name}' in ${this._status} state`,
      );
    }

    this._status = 'initializing';
    this.registry.seal();
    this.logger.info(
      `Initializing ${this.registry.size} capabilities`,
    );

    try {
      this.resolver.initializeAll();
    } catch (error) {
      this._status = 'failed';
      this.logger.error(`Initialization failed: ${describeError(error)}`);
      if (error instanceof DependencyResolutionError && error.dependencyGraph) {
        this.logger.error(`Dependency graph:\n${error.dependencyGraph}`);
      }
      throw error;
    }

    this._status = 'ready';
    this.logger.info(
      `Initialization completed: ${this.resolver.constructionOrder().length} components constructed`,
    );
    return this;
  }

  bootstrap(...sources: IComponentSource[]): this {
    return this.scan(...sources).initializeAll();
  }

  getInstance<T>(capability: CapabilityKey<T>): T {
    if (!isCapabilityKey(capability)) {
      throw new InvalidInputError('Type cannot be null');
    }
    if (!this.registry.has(capability)) {
      throw new UnregisteredCapabilityError(capabilityName(capability));
    }
    return this.cache.get(capability);
  }

  capabilities(): ReadonlySet<CapabilityKey> {
    return this.registry.capabilities();
  }

  /**
   * Read-only view of the constructed instances
   */
  get instances(): IInstanceCache {
    return this.cache;
  }

  /**
   * Summary lines of the constructed components, dependencies first
   */
  describe(): string[] {
    return this.resolver.constructionOrder().map(describeComponent);
  }

  private assertScanning(operation: string): void {
    if (this._status !== 'scanning') {
      throw new ContainerStateError(
        `Cannot call ${operation}() on container '${this.name}' in ${this._status} state`,
      );
    }
  }
}

/**
 * Create a container
 */
export function createContainer(options?: ContainerOptions): Container {
  return new Container(options);
}
