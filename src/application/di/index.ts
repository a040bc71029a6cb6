/**
 * @module @eagerwire/core/application/di
 * @description Dependency Injection container exports
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IRegistry,
  IInstanceCache,
  IWritableInstanceCache,
  IContainer,
  ContainerOptions,
  ContainerStatus,
  DuplicatePolicy,
  RegistrationOutcome,
} from './IDependencyInjection';

// ============================================================================
// Implementations
// ============================================================================

export { Registry } from './Registry';
export { InstanceCache } from './InstanceCache';
export { DependencyResolver, renderDependencyGraph } from './DependencyResolver';
export { Container, createContainer } from './Container';
