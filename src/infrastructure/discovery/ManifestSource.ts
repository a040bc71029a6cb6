/**
 * @eagerwire/core - Manifest Source
 *
 * Explicit list of descriptors, typically built with `defineComponent`.
 * Useful where decorators are unavailable or a build step emits the list.
 */

import {
  ComponentDescriptor,
  assertComponentDescriptor,
} from '../../domain/component';
import { InvalidInputError } from '../../domain/exceptions';
import { IComponentSource } from '../../application/discovery';

export class ManifestSource implements IComponentSource {
  constructor(
    private readonly descriptors: readonly ComponentDescriptor[],
    readonly name: string = 'manifest',
  ) {}

  discover(): ComponentDescriptor[] {
    const seen = new Set<ComponentDescriptor>();

    for (const descriptor of this.descriptors) {
      assertComponentDescriptor(descriptor);
      if (seen.has(descriptor)) {
        throw new InvalidInputError(
          `Component '${descriptor.implementation}' is listed more than once in '${this.name}'`,
        );
      }
      seen.add(descriptor);
    }

    return [...this.descriptors];
  }
}
