/**
 * @fileoverview Unit tests for DI Container Dependency Resolution
 *
 * Tests construction order, singleton-per-capability caching, circular
 * dependency detection, atomic failure and dependency graph rendering.
 */

import {
  CapabilityKey,
  CircularDependencyError,
  ComponentDescriptor,
  DependencyResolver,
  InstanceCache,
  InstanceCreationError,
  InvalidInputError,
  Registry,
  UnregisteredCapabilityError,
  capabilityName,
  createCapability,
  defineComponent,
  renderDependencyGraph,
} from '../../../src';
import { captureError } from '../../helpers/errors';

// ============================================================================
// Test Components
// ============================================================================

interface TestService {
  readonly name: string;
  readonly dependencies: unknown[];
}

const Logger = createCapability<TestService>('Logger');
const Config = createCapability<TestService>('Config');
const Database = createCapability<TestService>('Database');
const CommandHandler = createCapability<TestService>('CommandHandler');

const ServiceA = createCapability<TestService>('ServiceA');
const ServiceB = createCapability<TestService>('ServiceB');
const ServiceX = createCapability<TestService>('ServiceX');
const ServiceY = createCapability<TestService>('ServiceY');
const ServiceZ = createCapability<TestService>('ServiceZ');

let created: Map<string, number>;

/**
 * Descriptor named `${capability}Impl` that counts its constructions
 */
function service(
  capability: CapabilityKey<TestService>,
  dependencies: CapabilityKey[] = [],
  provides: CapabilityKey[] = [capability],
): ComponentDescriptor<TestService> {
  const name = `${capabilityName(capability)}Impl`;
  return defineComponent({
    name,
    provides,
    dependencies,
    factory: (...instances: unknown[]) => {
      created.set(name, (created.get(name) ?? 0) + 1);
      return { name, dependencies: instances };
    },
  });
}

function registerAll(
  registry: Registry,
  ...descriptors: ComponentDescriptor[]
): void {
  for (const descriptor of descriptors) {
    for (const capability of descriptor.provides) {
      registry.register(capability, descriptor);
    }
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('DependencyResolver', () => {
  let registry: Registry;
  let cache: InstanceCache;
  let resolver: DependencyResolver;

  beforeEach(() => {
    created = new Map();
    registry = new Registry();
    cache = new InstanceCache();
    resolver = new DependencyResolver(registry, cache);
  });

  describe('Valid Dependencies', () => {
    it('should construct dependencies before their dependents', () => {
      registerAll(
        registry,
        service(CommandHandler, [Database, Logger]),
        service(Database, [Logger]),
        service(Logger),
      );

      resolver.initializeAll();

      expect(
        resolver.constructionOrder().map((descriptor) => descriptor.implementation),
      ).toEqual(['LoggerImpl', 'DatabaseImpl', 'CommandHandlerImpl']);
    });

    it('should inject dependencies in declared order', () => {
      registerAll(
        registry,
        service(CommandHandler, [Database, Logger]),
        service(Database, [Logger]),
        service(Logger),
      );

      resolver.initializeAll();

      const handler = cache.get(CommandHandler);
      expect(handler.dependencies).toEqual([
        cache.get(Database),
        cache.get(Logger),
      ]);
      expect(handler.dependencies[0]).toBe(cache.get(Database));
      expect(handler.dependencies[1]).toBe(cache.get(Logger));
    });

    it('should construct each component exactly once across paths', () => {
      registerAll(
        registry,
        service(CommandHandler, [Database, Logger, Config]),
        service(Database, [Logger, Config]),
        service(Logger, [Config]),
        service(Config),
      );

      resolver.initializeAll();

      expect([...created.entries()]).toEqual([
        ['ConfigImpl', 1],
        ['LoggerImpl', 1],
        ['DatabaseImpl', 1],
        ['CommandHandlerImpl', 1],
      ]);
      expect(cache.size).toBe(4);
    });

    it('should share one instance in a diamond', () => {
      // ServiceA and ServiceB both need Database; ServiceX needs both
      registerAll(
        registry,
        service(ServiceX, [ServiceA, ServiceB]),
        service(ServiceA, [Database]),
        service(ServiceB, [Database]),
        service(Database),
      );

      resolver.initializeAll();

      expect(created.get('DatabaseImpl')).toBe(1);
      const a = cache.get(ServiceA);
      const b = cache.get(ServiceB);
      expect(a.dependencies[0]).toBe(b.dependencies[0]);
      expect(a.dependencies[0]).toBe(cache.get(Database));
    });

    it('should be a no-op when run again', () => {
      registerAll(registry, service(Database, [Logger]), service(Logger));

      resolver.initializeAll();
      const database = cache.get(Database);
      resolver.initializeAll();

      expect(created.get('DatabaseImpl')).toBe(1);
      expect(created.get('LoggerImpl')).toBe(1);
      expect(cache.get(Database)).toBe(database);
    });

    it('should map every capability of a component to one instance', () => {
      const both = service(Database, [Logger], [Database, Config]);
      registerAll(registry, both, service(Logger));

      resolver.initializeAll();

      expect(created.get('DatabaseImpl')).toBe(1);
      expect(cache.get(Config)).toBe(cache.get(Database));
    });

    it('should use the last registration of a capability', () => {
      const first = defineComponent({
        name: 'FirstLogger',
        provides: [Logger],
        factory: () => ({ name: 'FirstLogger', dependencies: [] }),
      });
      const second = defineComponent({
        name: 'SecondLogger',
        provides: [Logger],
        factory: () => ({ name: 'SecondLogger', dependencies: [] }),
      });
      registerAll(registry, first, second);

      resolver.initializeAll();

      expect(cache.get(Logger).name).toBe('SecondLogger');
    });
  });

  describe('Circular Dependency Detection', () => {
    it('should detect a self-dependency', () => {
      registerAll(registry, service(ServiceA, [ServiceA]));

      const error = captureError(() => resolver.initializeAll());

      expect(error).toBeInstanceOf(CircularDependencyError);
      expect(error).toMatchObject({
        code: 'CIRCULAR_DEPENDENCY',
        capability: 'ServiceA',
        path: ['ServiceA', 'ServiceA'],
        message: 'Circular dependency detected for ServiceA: ServiceA → ServiceA',
      });
    });

    it('should detect simple circular dependency (A → B → A)', () => {
      registerAll(
        registry,
        service(ServiceA, [ServiceB]),
        service(ServiceB, [ServiceA]),
      );

      const error = captureError(() => resolver.initializeAll());

      expect(error).toBeInstanceOf(CircularDependencyError);
      expect(error).toMatchObject({
        message:
          'Circular dependency detected for ServiceA: ServiceA → ServiceB → ServiceA',
        dependencyGraph:
          '├─ ServiceA\n  └─ ServiceB\n    └─ ServiceA (CIRCULAR!)\n',
      });
    });

    it('should detect complex circular dependency (X → Y → Z → X)', () => {
      registerAll(
        registry,
        service(ServiceX, [ServiceY]),
        service(ServiceY, [ServiceZ]),
        service(ServiceZ, [ServiceX]),
      );

      expect(() => resolver.initializeAll()).toThrowErrorType(
        CircularDependencyError,
      );
      expect(() => resolver.initializeAll()).toThrow(
        'ServiceX → ServiceY → ServiceZ → ServiceX',
      );
    });

    it('should report only the cycle when entered from outside it', () => {
      registerAll(
        registry,
        service(CommandHandler, [ServiceX]),
        service(ServiceX, [ServiceY]),
        service(ServiceY, [ServiceX]),
      );

      const error = captureError(() => resolver.initializeAll());

      expect(error).toMatchObject({
        capability: 'ServiceX',
        path: ['ServiceX', 'ServiceY', 'ServiceX'],
      });
    });

    it('should leave no instances behind after a cycle', () => {
      registerAll(
        registry,
        service(Logger),
        service(ServiceX, [ServiceY, Logger]),
        service(ServiceY, [ServiceZ]),
        service(ServiceZ, [ServiceX]),
      );

      expect(() => resolver.initializeAll()).toThrowErrorType(
        CircularDependencyError,
      );

      expect(created.get('LoggerImpl')).toBe(1);
      expect(cache.size).toBe(0);
      expect(cache.has(ServiceX)).toBe(false);
      expect(cache.has(ServiceY)).toBe(false);
      expect(cache.has(ServiceZ)).toBe(false);
      expect(resolver.constructionOrder()).toEqual([]);
    });

    it('should treat two capabilities of one component as one node', () => {
      // One implementation provides ServiceA and ServiceB and needs ServiceB
      registerAll(registry, service(ServiceA, [ServiceB], [ServiceA, ServiceB]));

      const error = captureError(() => resolver.initializeAll());

      expect(error).toBeInstanceOf(CircularDependencyError);
      expect(error).toMatchObject({
        capability: 'ServiceB',
        path: ['ServiceA', 'ServiceB'],
      });
    });
  });

  describe('Unregistered Services', () => {
    it('should name the component that needs the missing capability', () => {
      registerAll(registry, service(Database, [Logger]));

      const error = captureError(() => resolver.initializeAll());

      expect(error).toBeInstanceOf(UnregisteredCapabilityError);
      expect(error).toMatchObject({
        code: 'UNREGISTERED_CAPABILITY',
        capability: 'Logger',
        requiredBy: 'DatabaseImpl',
        message: "Capability 'Logger' required by 'DatabaseImpl' is not registered",
        dependencyGraph: '└─ Database\n  └─ Logger (UNREGISTERED)\n',
      });
      expect(cache.size).toBe(0);
    });

    it('should fail a direct resolve of an unknown capability', () => {
      expect(() => resolver.resolve(Logger)).toThrow(
        "Capability 'Logger' is not registered",
      );
    });
  });

  describe('Instance Creation Failures', () => {
    it('should wrap an error thrown by the factory', () => {
      const cause = new Error('connection refused');
      registerAll(
        registry,
        defineComponent({
          name: 'BrokenDatabase',
          provides: [Database],
          factory: (): TestService => {
            throw cause;
          },
        }),
      );

      const error = captureError(() => resolver.initializeAll());

      expect(error).toBeInstanceOf(InstanceCreationError);
      expect(error).toMatchObject({
        code: 'INSTANCE_CREATION_FAILED',
        implementation: 'BrokenDatabase',
        message: 'Failed to create instance of BrokenDatabase: connection refused',
        dependencyGraph: '└─ BrokenDatabase (FAILED)\n',
        cause,
      });
    });

    it('should pass container errors thrown by the factory through', () => {
      const failure = new InvalidInputError('Database url cannot be empty');
      registerAll(
        registry,
        defineComponent({
          name: 'UnconfiguredDatabase',
          provides: [Database],
          factory: (): TestService => {
            throw failure;
          },
        }),
      );

      const error = captureError(() => resolver.initializeAll());

      expect(error).toBe(failure);
      expect(error).not.toBeInstanceOf(InstanceCreationError);
      expect(cache.size).toBe(0);
    });

    it('should reject a factory that returns nothing', () => {
      registerAll(
        registry,
        defineComponent({
          name: 'EmptyDatabase',
          provides: [Database],
          factory: () => undefined,
        }),
      );

      expect(() => resolver.initializeAll()).toThrow(
        'Failed to create instance of EmptyDatabase: factory returned no instance',
      );
    });

    it('should reject an asynchronous factory', () => {
      registerAll(
        registry,
        defineComponent({
          name: 'AsyncDatabase',
          provides: [Database],
          factory: async () => ({ name: 'AsyncDatabase', dependencies: [] }),
        }),
      );

      expect(() => resolver.initializeAll()).toThrow(
        'Failed to create instance of AsyncDatabase: factory returned a Promise; factories must be synchronous',
      );
    });

    it('should drop instances built before the failure', () => {
      registerAll(
        registry,
        service(Logger),
        defineComponent({
          name: 'BrokenDatabase',
          provides: [Database],
          dependencies: [Logger],
          factory: (): TestService => {
            throw new Error('boom');
          },
        }),
      );

      expect(() => resolver.initializeAll()).toThrowErrorType(
        InstanceCreationError,
      );
      expect(created.get('LoggerImpl')).toBe(1);
      expect(cache.has(Logger)).toBe(false);
    });
  });
});

describe('renderDependencyGraph()', () => {
  it('should render the path as a tree', () => {
    expect(
      renderDependencyGraph(
        ['UserController', 'UserService', 'Logger'],
        'Config (UNREGISTERED)',
      ),
    ).toBe(
      '├─ UserController\n' +
        '  ├─ UserService\n' +
        '    └─ Logger\n' +
        '      └─ Config (UNREGISTERED)\n',
    );
  });

  it('should render a lone leaf', () => {
    expect(renderDependencyGraph([], 'Logger (FAILED)')).toBe(
      '└─ Logger (FAILED)\n',
    );
  });
});
