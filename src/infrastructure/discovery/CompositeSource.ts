/**
 * @eagerwire/core - Composite Source
 *
 * Concatenates the descriptors of several sources, in order. Later
 * sources win under the `overwrite` duplicate policy.
 */

import { ComponentDescriptor } from '../../domain/component';
import { IComponentSource } from '../../application/discovery';

export class CompositeSource implements IComponentSource {
  readonly name: string;
  private readonly sources: readonly IComponentSource[];

  constructor(...sources: IComponentSource[]) {
    this.sources = sources;
    this.name = `composite(${sources.map((source) => source.name).join(', ')})`;
  }

  discover(): ComponentDescriptor[] {
    return this.sources.flatMap((source) => [...source.discover()]);
  }
}
