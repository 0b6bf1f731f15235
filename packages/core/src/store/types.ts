import type { Attributes, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';

/** Keyset position in a version chain ordered by (effective_from, surrogate_key). */
export interface VersionCursor {
  effective_from: string;
  surrogate_key: number;
}

export interface ListVersionsParams {
  after?: VersionCursor;
  limit?: number;
}

export interface VersionPage {
  versions: DimensionVersion[];
  has_more: boolean;
  next_cursor?: VersionCursor;
}

/**
 * Writes inside one store transaction. Every write is conditional on the
 * state the caller read; a lost condition raises ConcurrentModificationError
 * and the whole transaction rolls back.
 */
export interface DimensionStoreTransaction {
  /** Close `surrogateKey` as of `effectiveTo`, provided it is still current. */
  closeVersion(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
    effectiveTo: string,
  ): Promise<DimensionVersion>;

  /** Insert an open version, provided the natural key has no current version. */
  insertVersion(definition: DimensionDefinition, version: DimensionVersion): Promise<DimensionVersion>;

  /** Overwrite attributes of `surrogateKey` in place, provided it is still current. */
  updateAttributes(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
    attributes: Attributes,
  ): Promise<DimensionVersion>;
}

export interface DimensionStore {
  /** Every version flagged current for the natural key (more than one is an integrity violation). */
  findCurrent(definition: DimensionDefinition, naturalKey: string): Promise<DimensionVersion[]>;

  /** The version whose [effective_from, effective_to) contains `date`. */
  findAsOf(definition: DimensionDefinition, naturalKey: string, date: string): Promise<DimensionVersion | null>;

  listVersions(
    definition: DimensionDefinition,
    naturalKey: string,
    params?: ListVersionsParams,
  ): Promise<VersionPage>;

  /** Highest surrogate key ever stored for the dimension, 0 when empty. */
  maxSurrogateKey(definition: DimensionDefinition): Promise<number>;

  transaction<T>(fn: (tx: DimensionStoreTransaction) => Promise<T>): Promise<T>;

  ping(): Promise<void>;
}

export const DEFAULT_PAGE_SIZE = 100;
