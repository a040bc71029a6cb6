/**
 * @eagerwire/core - Exceptions Module
 *
 * Container error hierarchy
 */

export {
  ContainerErrorCode,
  DependencyResolutionError,
  InvalidInputError,
  UnregisteredCapabilityError,
  UnresolvedCapabilityError,
  CircularDependencyError,
  InstanceCreationError,
  DuplicateRegistrationError,
  ContainerStateError,
  describeError,
} from './exceptions';
