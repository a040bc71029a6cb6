/**
 * @eagerwire/core - Discovery Module
 *
 * Component sources for the container's discovery port
 */

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
} from './decorators';

export type { ComponentOptions, ComponentMetadata } from './decorators';

export { DecoratorSource, describeDecoratedClass } from './DecoratorSource';
export { ManifestSource } from './ManifestSource';
export { CompositeSource } from './CompositeSource';
