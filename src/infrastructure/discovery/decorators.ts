/**
 * @fileoverview Component decorators
 *
 * @packageDocumentation
 * @module @eagerwire/core/infrastructure/discovery
 *
 * `@Component` marks a class as a container component and lists the
 * capabilities it implements. `@Inject` names the capability for a
 * constructor parameter whose declared type is an interface (interfaces
 * are emitted as `Object` in `design:paramtypes`, so the container cannot
 * tell them apart).
 *
 * ```typescript
 * @Component({ provides: [UserService] })
 * class DefaultUserService implements UserService {
 *   constructor(
 *     @Inject(UserRepository) private readonly repository: UserRepository,
 *     @Inject(Emailer) private readonly emailer: Emailer,
 *     private readonly clock: SystemClock, // class type: no @Inject needed
 *   ) {}
 * }
 * ```
 *
 * Requires `experimentalDecorators` and `emitDecoratorMetadata`.
 */

import 'reflect-metadata';

import { CapabilityKey, isCapabilityKey } from '../../domain/capability';
import { InvalidInputError } from '../../domain/exceptions';

export const COMPONENT_METADATA = 'eagerwire:component';
export const INJECT_METADATA = 'eagerwire:inject';
export const DESIGN_PARAM_TYPES = 'design:paramtypes';

/**
 * `@Component` options
 */
export interface ComponentOptions {
  /** Capabilities this class implements */
  provides: readonly CapabilityKey[];
}

/**
 * Metadata stored on a decorated class
 */
export interface ComponentMetadata {
  provides: readonly CapabilityKey[];
}

/**
 * Mark a class as a component.
 */
export function Component(options: ComponentOptions): ClassDecorator {
  const metadata: ComponentMetadata = { provides: [...options.provides] };
  return (target) => {
    Reflect.defineMetadata(COMPONENT_METADATA, metadata, target);
  };
}

/**
 * Name the capability injected into a constructor parameter.
 *
 * Only constructor parameters are supported; there is no field or setter
 * injection.
 */
export function Inject(capability: CapabilityKey): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    if (propertyKey !== undefined || typeof target !== 'function') {
      throw new InvalidInputError(
        `@Inject() on '${String(propertyKey)}': only constructor parameters can be injected`,
      );
    }
    if (!isCapabilityKey(capability)) {
      throw new InvalidInputError(
        `@Inject() on parameter ${parameterIndex} needs a capability`,
      );
    }
    const injections = getInjections(target);
    injections.set(parameterIndex, capability);
    Reflect.defineMetadata(INJECT_METADATA, injections, target);
  };
}

/**
 * `@Component` metadata of a class, if it has any
 */
export function getComponentMetadata(
  target: object,
): ComponentMetadata | undefined {
  const raw: unknown = Reflect.getOwnMetadata(COMPONENT_METADATA, target);
  if (typeof raw !== 'object' || raw === null) {
    return undefined;
  }
  const provides: unknown = Reflect.get(raw, 'provides');
  if (!Array.isArray(provides) || !provides.every(isCapabilityKey)) {
    return undefined;
  }
  return { provides };
}

/**
 * Capabilities named with `@Inject`, keyed by parameter index
 */
export function getInjections(target: object): Map<number, CapabilityKey> {
  const injections = new Map<number, CapabilityKey>();
  const raw: unknown = Reflect.getOwnMetadata(INJECT_METADATA, target);
  if (raw instanceof Map) {
    for (const [index, capability] of raw) {
      if (typeof index === 'number' && isCapabilityKey(capability)) {
        injections.set(index, capability);
      }
    }
  }
  return injections;
}

/**
 * Constructor parameter types emitted by the compiler, if any
 */
export function getDesignParamTypes(target: object): unknown[] | undefined {
  const raw: unknown = Reflect.getOwnMetadata(DESIGN_PARAM_TYPES, target);
  return Array.isArray(raw) ? raw : undefined;
}

/**
 * Class whose constructor runs when `type` is constructed: `type` itself
 * when it declares constructor metadata, otherwise the nearest base class
 * that does, or the root of the chain.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export function getConstructorOwner(type: Function): Function {
  let owner = type;
  while (!declaresConstructorMetadata(owner)) {
    const parent: unknown = Object.getPrototypeOf(owner);
    if (typeof parent !== 'function' || parent === Function.prototype) {
      break;
    }
    owner = parent;
  }
  return owner;
}

function declaresConstructorMetadata(target: object): boolean {
  return (
    Reflect.hasOwnMetadata(DESIGN_PARAM_TYPES, target) ||
    Reflect.hasOwnMetadata(INJECT_METADATA, target)
  );
}

export function isComponent(target: object): boolean {
  return getComponentMetadata(target) !== undefined;
}
