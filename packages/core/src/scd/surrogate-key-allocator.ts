import type { DimensionDefinition } from '../dimensions/types.js';

export interface SurrogateKeyAllocator {
  /** Next unused surrogate key for the dimension; strictly increasing, never reissued. */
  next(definition: DimensionDefinition): Promise<number>;

  /** Make sure every later `next` returns a key above `highWater`. Never lowers the counter. */
  advancePast(definition: DimensionDefinition, highWater: number): Promise<void>;
}

/**
 * Process-local counters, one per dimension, starting at 1.
 */
export class InMemorySurrogateKeyAllocator implements SurrogateKeyAllocator {
  private readonly lastIssued = new Map<string, number>();

  async next(definition: DimensionDefinition): Promise<number> {
    const key = (this.lastIssued.get(definition.dimension_id) ?? 0) + 1;
    this.lastIssued.set(definition.dimension_id, key);
    return key;
  }

  async advancePast(definition: DimensionDefinition, highWater: number): Promise<void> {
    const last = this.lastIssued.get(definition.dimension_id) ?? 0;
    if (highWater > last) {
      this.lastIssued.set(definition.dimension_id, highWater);
    }
  }

  peek(definition: DimensionDefinition): number {
    return this.lastIssued.get(definition.dimension_id) ?? 0;
  }
}
