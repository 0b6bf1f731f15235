import { DimensionStoreError } from '../shared/errors.js';
import type { SqlPool } from '../shared/database.js';
import { getLogger } from '../observability/logger.js';
import type { DimensionDefinition } from '../dimensions/types.js';
import type { SurrogateKeyAllocator } from '../scd/surrogate-key-allocator.js';
import { queriesFor } from './pg-dimension-store.queries.js';

const log = getLogger('pg-sequence-allocator');

/**
 * Surrogate keys from each dimension table's serial sequence. nextval is
 * non-transactional, so keys burned by a rolled-back write are never reissued.
 */
export class PgSequenceAllocator implements SurrogateKeyAllocator {
  constructor(private readonly pool: SqlPool) {}

  async next(definition: DimensionDefinition): Promise<number> {
    const { rows } = await this.pool.query(queriesFor(definition).NEXT_SURROGATE_KEY);
    const key = Number(rows[0]?.surrogate_key);
    if (!Number.isSafeInteger(key) || key < 1) {
      throw new DimensionStoreError(
        `Sequence for ${definition.table}.${definition.surrogate_key_column} returned ${String(rows[0]?.surrogate_key)}`,
      );
    }
    return key;
  }

  async advancePast(definition: DimensionDefinition, highWater: number): Promise<void> {
    await this.reset(definition, highWater);
  }

  /** Move the sequence past max(highWater, MAX(sk)); returns the next value it will issue. */
  async reset(definition: DimensionDefinition, highWater = 0): Promise<number> {
    const { rows } = await this.pool.query(queriesFor(definition).RESET_SEQUENCE, [highWater]);
    return Number(rows[0]?.next_value);
  }
}

/**
 * Advance every dimension sequence past the keys already stored, as needed
 * after a bulk load that wrote surrogate keys explicitly.
 */
export async function resetSequences(
  pool: SqlPool,
  definitions: DimensionDefinition[],
): Promise<Record<string, number>> {
  const allocator = new PgSequenceAllocator(pool);
  const result: Record<string, number> = {};

  for (const definition of definitions) {
    const nextValue = await allocator.reset(definition);
    result[definition.dimension_id] = nextValue;
    log.info({ dimension: definition.dimension_id, nextValue }, 'sequence reset');
  }

  return result;
}
