/**
 * @eagerwire/core - Decorator Source
 *
 * Builds descriptors from classes marked with `@Component`.
 *
 * Constructor dependencies, per parameter:
 * 1. the capability given to `@Inject`, otherwise
 * 2. the parameter's class type from `design:paramtypes`.
 *
 * A parameter with neither (an interface or primitive type without
 * `@Inject`) cannot be resolved and is rejected during discovery.
 *
 * A subclass without a constructor of its own is described by the
 * constructor it inherits.
 */

import { Constructor, CapabilityKey } from '../../domain/capability';
import { ComponentDescriptor, describeClass } from '../../domain/component';
import { InvalidInputError } from '../../domain/exceptions';
import { IComponentSource } from '../../application/discovery';
import {
  getComponentMetadata,
  getConstructorOwner,
  getDesignParamTypes,
  getInjections,
} from './decorators';

/**
 * Types the compiler emits for interfaces, primitives and unions; none of
 * them identify a component.
 */
const NON_INJECTABLE_TYPES: ReadonlySet<unknown> = new Set<unknown>([
  Object,
  Function,
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
  Array,
  Promise,
  undefined,
]);

/**
 * DecoratorSource - explicit list of decorated classes
 *
 * @example
 * ```typescript
 * container.scan(
 *   new DecoratorSource([InMemoryUserRepository, ConsoleEmailer, DefaultUserService], 'users'),
 * );
 * ```
 */
export class DecoratorSource implements IComponentSource {
  constructor(
    private readonly classes: readonly Constructor[],
    readonly name: string = 'decorated classes',
  ) {}

  discover(): ComponentDescriptor[] {
    const seen = new Set<Constructor>();

    return this.classes.map((type, index) => {
      if (typeof type !== 'function') {
        throw new InvalidInputError(
          `Component class at index ${index} of '${this.name}' cannot be null`,
        );
      }
      if (seen.has(type)) {
        throw new InvalidInputError(
          `Component '${type.name}' is listed more than once in '${this.name}'`,
        );
      }
      seen.add(type);
      return describeDecoratedClass(type);
    });
  }
}

/**
 * Descriptor of one `@Component` class.
 *
 * @throws InvalidInputError if the class is not decorated or a constructor
 * parameter cannot be mapped to a capability
 */
export function describeDecoratedClass<T>(
  type: Constructor<T>,
): ComponentDescriptor<T> {
  const metadata = getComponentMetadata(type);
  if (!metadata) {
    throw new InvalidInputError(
      `${type.name} is not annotated with @Component`,
    );
  }

  const owner = getConstructorOwner(type);
  const paramTypes = getDesignParamTypes(owner) ?? [];
  const injections = getInjections(owner);
  const arity = Math.max(
    owner.length,
    paramTypes.length,
    ...[...injections.keys()].map((index) => index + 1),
  );

  const dependencies: CapabilityKey[] = [];
  for (let index = 0; index < arity; index++) {
    const injected = injections.get(index);
    if (injected) {
      dependencies.push(injected);
      continue;
    }

    const designType = paramTypes[index];
    if (isInjectableClass(designType)) {
      dependencies.push(designType);
      continue;
    }

    throw new InvalidInputError(
      `Cannot resolve parameter ${index} of ${type.name}: add @Inject(capability)`,
    );
  }

  return describeClass(type, metadata.provides, dependencies);
}

function isInjectableClass(value: unknown): value is Constructor {
  return typeof value === 'function' && !NON_INJECTABLE_TYPES.has(value);
}
