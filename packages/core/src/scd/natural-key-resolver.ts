import { AmbiguousCurrentVersionError, ValidationError } from '../shared/errors.js';
import type { DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import type { DimensionStore } from '../store/types.js';

export function normalizeNaturalKey(naturalKey: unknown, maxLength?: number): string {
  if (typeof naturalKey !== 'string' && typeof naturalKey !== 'number') {
    throw new ValidationError('natural_key must be a string', 'natural_key');
  }
  const trimmed = String(naturalKey).trim();
  if (trimmed === '') {
    throw new ValidationError('natural_key must not be empty', 'natural_key');
  }
  if (maxLength !== undefined && [...trimmed].length > maxLength) {
    throw new ValidationError(`natural_key must be at most ${maxLength} characters`, 'natural_key');
  }
  return trimmed;
}

/**
 * Read-only lookup of the current version of a natural key.
 */
export class NaturalKeyResolver {
  constructor(private readonly store: DimensionStore) {}

  /** The current version, or null when the natural key has never been loaded. */
  async resolveCurrent(
    definition: DimensionDefinition,
    naturalKey: string,
  ): Promise<DimensionVersion | null> {
    const rows = await this.store.findCurrent(definition, naturalKey);
    const current = rows.filter((v) => v.is_current);

    if (current.length > 1) {
      throw new AmbiguousCurrentVersionError(
        definition.dimension_id,
        naturalKey,
        current.map((v) => v.surrogate_key),
      );
    }

    return current.length === 1 ? current[0] : null;
  }
}
