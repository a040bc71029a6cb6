/**
 * @fileoverview Discovery boundary
 *
 * @packageDocumentation
 * @module @eagerwire/core/application/discovery
 *
 * ## Hexagonal Architecture Layer: APPLICATION (port)
 *
 * The container does not walk the file system or inspect modules. It asks
 * one or more component sources for descriptors, then registers every
 * capability each descriptor provides:
 *
 * ```
 * IComponentSource.discover()  →  ComponentDescriptor[]
 *        for each descriptor, for each provided capability:
 *            Registry.register(capability, descriptor)
 * ```
 *
 * Implementations live in the infrastructure layer:
 *
 * - `ManifestSource`: an explicit list built with `defineComponent`
 * - `DecoratorSource`: classes marked with `@Component`
 * - `CompositeSource`: several sources in order
 *
 * A source must finish discovery before `initializeAll()` starts;
 * registrations after that point are rejected.
 */

import { ComponentDescriptor } from '../../domain/component';

/**
 * Source of component descriptors.
 */
export interface IComponentSource {
  /**
   * Label used in logs.
   */
  readonly name: string;

  /**
   * Produce the descriptors of every component this source knows about.
   *
   * @throws InvalidInputError if a component definition is malformed
   */
  discover(): readonly ComponentDescriptor[];
}
