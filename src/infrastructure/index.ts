/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Concrete discovery sources for the container:
 *
 * - **DecoratorSource**: classes marked with `@Component` / `@Inject`
 *   (reads `reflect-metadata`)
 * - **ManifestSource**: explicit descriptor lists
 * - **CompositeSource**: several sources in order
 *
 * @packageDocumentation
 * @module @eagerwire/core/infrastructure
 */

// Component discovery
export * from './discovery';
