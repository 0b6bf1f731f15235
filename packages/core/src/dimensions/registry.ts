import { UnknownDimensionError } from '../shared/errors.js';
import type { DimensionDefinition } from './types.js';

export class DimensionRegistry {
  private readonly definitions = new Map<string, DimensionDefinition>();

  constructor(definitions: DimensionDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: DimensionDefinition): void {
    this.definitions.set(definition.dimension_id, definition);
  }

  has(dimensionId: string): boolean {
    return this.definitions.has(dimensionId);
  }

  get(dimensionId: string): DimensionDefinition {
    const definition = this.definitions.get(dimensionId);
    if (!definition) {
      throw new UnknownDimensionError(dimensionId);
    }
    return definition;
  }

  list(): DimensionDefinition[] {
    return [...this.definitions.values()];
  }
}
