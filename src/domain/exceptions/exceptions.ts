/**
 * @eagerwire/core - Container Exceptions
 *
 * Every failure raised by the container is a `DependencyResolutionError`.
 * Subclasses narrow the cause and carry a stable `code` so callers can
 * branch without matching on messages.
 *
 * Failures are deterministic configuration or construction errors and are
 * never retried.
 */

/**
 * Stable error codes
 */
export enum ContainerErrorCode {
  INVALID_INPUT = 'INVALID_INPUT',
  UNREGISTERED_CAPABILITY = 'UNREGISTERED_CAPABILITY',
  UNRESOLVED_CAPABILITY = 'UNRESOLVED_CAPABILITY',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  INSTANCE_CREATION_FAILED = 'INSTANCE_CREATION_FAILED',
  DUPLICATE_REGISTRATION = 'DUPLICATE_REGISTRATION',
  INVALID_STATE = 'INVALID_STATE',
}

/**
 * Base class for dependency resolution failures.
 *
 * @remarks
 * `dependencyGraph` is a tree rendering of the resolution path that led to
 * the failure, with the failing node marked:
 *
 * ```
 * ├─ UserService
 *   ├─ Emailer
 *     └─ UserService (CIRCULAR!)
 * ```
 *
 * It is empty for failures that happen outside a resolution pass
 * (bad input, duplicate registration).
 *
 * @example
 * ```typescript
 * try {
 *   container.initializeAll();
 * } catch (error) {
 *   if (error instanceof DependencyResolutionError) {
 *     logger.error(error.message);
 *     logger.error(error.dependencyGraph);
 *   }
 *   throw error;
 * }
 * ```
 */
export class DependencyResolutionError extends Error {
  public readonly code: ContainerErrorCode;
  public readonly dependencyGraph: string;

  constructor(
    message: string,
    code: ContainerErrorCode,
    dependencyGraph: string = '',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DependencyResolutionError';
    this.code = code;
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or malformed argument (empty capability, descriptor without a
 * factory, undecorated component class).
 */
export class InvalidInputError extends DependencyResolutionError {
  constructor(message: string) {
    super(message, ContainerErrorCode.INVALID_INPUT);
    this.name = 'InvalidInputError';
  }
}

/**
 * A dependency or a direct lookup names a capability nothing provides.
 */
export class UnregisteredCapabilityError extends DependencyResolutionError {
  constructor(
    public readonly capability: string,
    public readonly requiredBy?: string,
    dependencyGraph?: string,
  ) {
    super(
      requiredBy
        ? `Capability '${capability}' required by '${requiredBy}' is not registered`
        : `Capability '${capability}' is not registered`,
      ContainerErrorCode.UNREGISTERED_CAPABILITY,
      dependencyGraph,
    );
    this.name = 'UnregisteredCapabilityError';
  }
}

/**
 * A capability is registered but has no instance yet.
 */
export class UnresolvedCapabilityError extends DependencyResolutionError {
  constructor(public readonly capability: string) {
    super(
      `Capability '${capability}' has no instance; the container has not been initialized`,
      ContainerErrorCode.UNRESOLVED_CAPABILITY,
    );
    this.name = 'UnresolvedCapabilityError';
  }
}

/**
 * A component was reached again while still under construction.
 *
 * `path` lists the capabilities from the first visit of the repeated
 * component to the repeated visit, both ends included.
 */
export class CircularDependencyError extends DependencyResolutionError {
  constructor(
    public readonly capability: string,
    public readonly path: readonly string[],
    dependencyGraph?: string,
  ) {
    super(
      `Circular dependency detected for ${capability}: ${path.join(' → ')}`,
      ContainerErrorCode.CIRCULAR_DEPENDENCY,
      dependencyGraph,
    );
    this.name = 'CircularDependencyError';
  }
}

/**
 * The component factory threw, or produced no usable instance.
 */
export class InstanceCreationError extends DependencyResolutionError {
  constructor(
    public readonly implementation: string,
    reason: string,
    dependencyGraph?: string,
    cause?: unknown,
  ) {
    super(
      `Failed to create instance of ${implementation}: ${reason}`,
      ContainerErrorCode.INSTANCE_CREATION_FAILED,
      dependencyGraph,
      cause === undefined ? undefined : { cause },
    );
    this.name = 'InstanceCreationError';
  }
}

/**
 * A second, different descriptor was registered for a capability under the
 * `reject` duplicate policy.
 */
export class DuplicateRegistrationError extends DependencyResolutionError {
  constructor(
    public readonly capability: string,
    public readonly existing: string,
    public readonly incoming: string,
  ) {
    super(
      `Capability '${capability}' is already provided by '${existing}'; refusing '${incoming}'`,
      ContainerErrorCode.DUPLICATE_REGISTRATION,
    );
    this.name = 'DuplicateRegistrationError';
  }
}

/**
 * An operation was called in the wrong container phase.
 */
export class ContainerStateError extends DependencyResolutionError {
  constructor(message: string) {
    super(message, ContainerErrorCode.INVALID_STATE);
    this.name = 'ContainerStateError';
  }
}

/**
 * Human-readable message of any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
