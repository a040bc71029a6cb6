/**
 * @module @eagerwire/core/application
 * @description Application layer exports
 */

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Discovery Port
// ============================================================================

export * from './discovery';

// ============================================================================
// Logging
// ============================================================================

export * from './logging';
