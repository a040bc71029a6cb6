/**
 * @fileoverview @eagerwire/core - Eager Dependency Injection Container
 * @description
 * Capability-keyed, constructor-injection container. Components declare
 * which capabilities they implement; the container discovers them,
 * builds the dependency graph from their constructor dependencies and
 * eagerly constructs every component exactly once.
 *
 * ## Architecture Layers
 *
 * - **domain**: capabilities, component descriptors, errors
 * - **application**: registry, resolver, instance cache, container, ports
 * - **infrastructure**: discovery sources (decorators, manifests)
 *
 * @packageDocumentation
 * @module @eagerwire/core
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export {
  Capability,
  createCapability,
  isCapabilityKey,
  capabilityName,
  defineComponent,
  describeClass,
  assertComponentDescriptor,
  describeComponent,
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
} from './domain';

export type {
  Constructor,
  AbstractConstructor,
  CapabilityKey,
  InstanceOf,
  InstancesOf,
  ComponentFactory,
  ComponentDescriptor,
  ComponentDefinition,
} from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export {
  Container,
  createContainer,
  Registry,
  InstanceCache,
  DependencyResolver,
  renderDependencyGraph,
  consoleLogger,
  silentLogger,
  createScopedLogger,
} from './application';

export type {
  IContainer,
  IRegistry,
  IInstanceCache,
  IWritableInstanceCache,
  ContainerOptions,
  ContainerStatus,
  DuplicatePolicy,
  RegistrationOutcome,
  IComponentSource,
  ILogger,
} from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export {
  Component,
  Inject,
  getComponentMetadata,
  getInjections,
  getDesignParamTypes,
  getConstructorOwner,
  isComponent,
  COMPONENT_METADATA,
  INJECT_METADATA,
  DecoratorSource,
  describeDecoratedClass,
  ManifestSource,
  CompositeSource,
} from './infrastructure';

export type { ComponentOptions, ComponentMetadata } from './infrastructure';
