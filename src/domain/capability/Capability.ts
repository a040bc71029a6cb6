/**
 * @fileoverview Capability tokens
 *
 * @packageDocumentation
 * @module @eagerwire/core/domain/capability
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A capability is the run-time stand-in for an abstract service type.
 * TypeScript interfaces are erased at compile time, so the container
 * needs a value to key registrations and lookups by:
 *
 * ```typescript
 * interface UserRepository {
 *   findById(id: number): string;
 * }
 *
 * // Same name as the interface, lives in the value namespace
 * const UserRepository = createCapability<UserRepository>('UserRepository');
 *
 * const repo = container.getInstance(UserRepository); // typed as UserRepository
 * ```
 *
 * Identity is by token, never by display name: two capabilities created
 * with the same name are different keys.
 *
 * An (abstract) class can also serve as a capability, in which case its
 * constructor is the key.
 */

import { InvalidInputError } from '../exceptions';

/**
 * Constructor of a concrete component class.
 *
 * @template T - Instance type
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Constructor usable as a capability key. Abstract classes qualify.
 *
 * @template T - Instance type
 */
export type AbstractConstructor<T = unknown> = abstract new (
  ...args: never[]
) => T;

/**
 * Token identifying an abstract service type.
 *
 * @template T - The service type resolved for this capability
 */
export class Capability<T = unknown> {
  /**
   * Phantom marker carrying `T`; never assigned.
   */
  declare readonly __type?: T;

  /**
   * Unique identity of this token.
   */
  public readonly id: symbol;

  /**
   * @throws InvalidInputError if the name is empty
   */
  constructor(
    public readonly name: string,
    public readonly description?: string,
  ) {
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new InvalidInputError('Capability name cannot be empty');
    }
    this.id = Symbol(name);
    Object.freeze(this);
  }

  toString(): string {
    return `Capability(${this.name})`;
  }
}

/**
 * Anything the registry accepts as a key.
 */
export type CapabilityKey<T = unknown> = Capability<T> | AbstractConstructor<T>;

/**
 * Resolved instance type for a capability key.
 */
export type InstanceOf<K> = K extends Capability<infer T>
  ? T
  : K extends AbstractConstructor<infer U>
    ? U
    : never;

/**
 * Maps an ordered tuple of capability keys to the tuple of their instances.
 *
 * @example
 * ```typescript
 * type Deps = InstancesOf<[typeof UserRepository, typeof Emailer]>;
 * // [UserRepository, Emailer]
 * ```
 */
export type InstancesOf<K extends readonly CapabilityKey[]> = {
  -readonly [I in keyof K]: InstanceOf<K[I]>;
};

/**
 * Create a new capability token.
 *
 * @throws InvalidInputError if the name is empty
 */
export function createCapability<T>(
  name: string,
  description?: string,
): Capability<T> {
  return new Capability<T>(name, description);
}

/**
 * Narrow an arbitrary value to a capability key.
 */
export function isCapabilityKey(value: unknown): value is CapabilityKey {
  return value instanceof Capability || typeof value === 'function';
}

/**
 * Display name used in logs and error messages.
 */
export function capabilityName(key: CapabilityKey): string {
  if (key instanceof Capability) {
    return key.name;
  }
  return key.name || '<anonymous class>';
}
