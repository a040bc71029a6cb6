/**
 * @module @eagerwire/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Capabilities
// ============================================================================

export * from './capability';

// ============================================================================
// Component Descriptors
// ============================================================================

export * from './component';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
