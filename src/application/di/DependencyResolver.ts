/**
 * @eagerwire/core - Dependency Resolver
 *
 * Depth-first construction of every registered capability.
 *
 * @remarks
 * **Algorithm** (for a target capability `C`):
 *
 * 1. `C` already has an instance → done.
 * 2. No descriptor for `C` → `UnregisteredCapabilityError`.
 * 3. `C`'s descriptor is in progress → `CircularDependencyError`.
 * 4. Mark the descriptor in progress.
 * 5. Resolve every dependency in declared order.
 * 6. Call the factory with the dependency instances (container errors it
 *    throws pass through, anything else becomes `InstanceCreationError`),
 *    cache the result under `C` and under every other capability still
 *    mapped to the same descriptor, clear the mark.
 *
 * The in-progress set is the DFS "gray" marker and is keyed by descriptor:
 * two capabilities backed by the same implementation are one node of the
 * graph. Every call either hits the cache, fails, or descends into a node
 * that is not gray, so the walk terminates.
 */

import { CapabilityKey, capabilityName } from '../../domain/capability';
import { ComponentDescriptor } from '../../domain/component';
import {
  CircularDependencyError,
  DependencyResolutionError,
  InstanceCreationError,
  UnregisteredCapabilityError,
  describeError,
} from '../../domain/exceptions';
import { ILogger, silentLogger } from '../logging';
import { IWritableInstanceCache } from './IDependencyInjection';
import { Registry } from './Registry';

/**
 * One node on the current resolution path
 */
interface ResolutionFrame {
  capability: CapabilityKey;
  descriptor: ComponentDescriptor;
}

/**
 * Render a resolution path as a tree, ending in `leaf`.
 *
 * @example
 * ```typescript
 * renderDependencyGraph(['UserService', 'Emailer'], 'UserService (CIRCULAR!)');
 * // ├─ UserService
 * //   └─ Emailer
 * //     └─ UserService (CIRCULAR!)
 * ```
 */
export function renderDependencyGraph(
  path: readonly string[],
  leaf: string,
): string {
  let graph = '';
  for (let i = 0; i < path.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === path.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${path[i]}\n`;
  }
  const indent = '  '.repeat(path.length);
  graph += `${indent}└─ ${leaf}\n`;
  return graph;
}

export class DependencyResolver {
  private readonly inProgress: Set<ComponentDescriptor> = new Set();
  private readonly stack: ResolutionFrame[] = [];
  private order: ComponentDescriptor[] = [];

  constructor(
    private readonly registry: Registry,
    private readonly cache: IWritableInstanceCache,
    private readonly logger: ILogger = silentLogger,
  ) {}

  /**
   * Resolve every registered capability.
   *
   * Atomic: on failure the cache is emptied before the error propagates.
   */
  initializeAll(): void {
    this.order = [];
    try {
      for (const capability of this.registry.capabilities()) {
        this.resolve(capability);
      }
    } catch (error) {
      this.cache.clear();
      this.order = [];
      throw error;
    } finally {
      this.inProgress.clear();
      this.stack.length = 0;
    }
  }

  /**
   * Resolve one capability and, first, everything it depends on.
   */
  resolve(capability: CapabilityKey): void {
    if (this.cache.has(capability)) {
      return;
    }

    const name = capabilityName(capability);
    const descriptor = this.registry.lookup(capability);

    if (!descriptor) {
      const requiredBy = this.stack[this.stack.length - 1];
      throw new UnregisteredCapabilityError(
        name,
        requiredBy?.descriptor.implementation,
        renderDependencyGraph(this.pathNames(), `${name} (UNREGISTERED)`),
      );
    }

    if (this.inProgress.has(descriptor)) {
      const start = this.stack.findIndex(
        (frame) => frame.descriptor === descriptor,
      );
      const cycle = [
        ...this.stack.slice(start).map((frame) => capabilityName(frame.capability)),
        name,
      ];
      throw new CircularDependencyError(
        name,
        cycle,
        renderDependencyGraph(this.pathNames(), `${name} (CIRCULAR!)`),
      );
    }

    this.inProgress.add(descriptor);
    this.stack.push({ capability, descriptor });

    try {
      const dependencies = descriptor.dependencies.map((dependency) => {
        this.resolve(dependency);
        return this.cache.get(dependency);
      });

      const instance = this.construct(descriptor, dependencies);

      this.cache.put(capability, instance);
      for (const sibling of this.registry.capabilitiesOf(descriptor)) {
        if (!this.cache.has(sibling)) {
          this.cache.put(sibling, instance);
        }
      }

      this.order.push(descriptor);
      this.logger.debug(`Created: ${name} -> ${descriptor.implementation}`);
    } finally {
      this.stack.pop();
      this.inProgress.delete(descriptor);
    }
  }

  /**
   * Descriptors in the order they were constructed by the last successful
   * pass. Every descriptor appears after all of its dependencies.
   */
  constructionOrder(): readonly ComponentDescriptor[] {
    return [...this.order];
  }

  private construct(
    descriptor: ComponentDescriptor,
    dependencies: unknown[],
  ): unknown {
    const failed = () =>
      renderDependencyGraph(
        this.pathNames().slice(0, -1),
        `${descriptor.implementation} (FAILED)`,
      );

    let instance: unknown;
    try {
      instance = Reflect.apply(descriptor.factory, undefined, dependencies);
    } catch (error) {
      if (error instanceof DependencyResolutionError) {
        throw error;
      }
      throw new InstanceCreationError(
        descriptor.implementation,
        describeError(error),
        failed(),
        error,
      );
    }

    if (instance === undefined || instance === null) {
      throw new InstanceCreationError(
        descriptor.implementation,
        'factory returned no instance',
        failed(),
      );
    }
    if (isPromiseLike(instance)) {
      void Promise.resolve(instance).catch((error: unknown) =>
        this.logger.error(
          `Discarded async factory of ${descriptor.implementation} rejected: ${describeError(error)}`,
        ),
      );
      throw new InstanceCreationError(
        descriptor.implementation,
        'factory returned a Promise; factories must be synchronous',
        failed(),
      );
    }

    return instance;
  }

  private pathNames(): string[] {
    return this.stack.map((frame) => capabilityName(frame.capability));
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}
