export { InMemoryDimensionStore } from './in-memory-dimension-store.js';
export { PgDimensionStore, rowToVersion } from './pg-dimension-store.js';
export { PgSequenceAllocator, resetSequences } from './pg-sequence-allocator.js';
export { queriesFor, updateAttributesQuery } from './pg-dimension-store.queries.js';
export { DEFAULT_PAGE_SIZE } from './types.js';
export type {
  DimensionStore,
  DimensionStoreTransaction,
  ListVersionsParams,
  VersionCursor,
  VersionPage,
} from './types.js';
