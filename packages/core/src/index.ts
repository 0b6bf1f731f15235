// Shared
export { generateId } from './shared/types.js';
export {
  DimensionStoreError,
  ValidationError,
  UnknownDimensionError,
  NaturalKeyNotFoundError,
  InvalidAsOfDateError,
  AmbiguousCurrentVersionError,
  ConcurrentModificationError,
  isDimensionError,
} from './shared/errors.js';
export type { DimensionError, DimensionErrorCode } from './shared/errors.js';
export { createPool, runMigrations, withTransaction } from './shared/database.js';
export type { DatabaseConfig, SqlClient, SqlPool, SqlPoolClient } from './shared/database.js';
export { loadConfig } from './shared/config.js';
export type { AppConfig } from './shared/config.js';
export { isIsoDate, compareIsoDates } from './shared/dates.js';

// Dimensions
export {
  DimensionRegistry,
  loadDimensionDefinitions,
  parseDimensionDefinitions,
  DEFAULT_DIMENSIONS_FILE,
  SCD_COLUMNS,
  parseAsOfRecord,
  readAsOfRecords,
  recordBodySchema,
} from './dimensions/index.js';
export type {
  TrackingPolicy,
  AttributeType,
  AttributeValue,
  Attributes,
  AttributeDefinition,
  IntegerBits,
  DimensionDefinition,
  DimensionVersion,
  AsOfRecord,
  MalformedLine,
} from './dimensions/index.js';

// SCD
export {
  canonicalDecimal,
  decodeStoredValue,
  roundDecimal,
  normalizeAttributes,
  normalizeValue,
  CHANGE_VERDICTS,
  detectChange,
  NaturalKeyResolver,
  normalizeNaturalKey,
  InMemorySurrogateKeyAllocator,
  applyPlan,
  planWrite,
  auditChain,
  compareVersions,
  VersionHistory,
  DimensionVersionManager,
  DEFAULT_MAX_ATTEMPTS,
} from './scd/index.js';
export type {
  ChangeDetection,
  ChangeVerdict,
  SurrogateKeyAllocator,
  WriteOutcome,
  WritePlan,
  ChainViolation,
  ChainViolationKind,
  ApplyResult,
  ChainAuditReport,
  DimensionVersionManagerOptions,
  LoadFailure,
  LoadFailureCode,
  LoadSummary,
} from './scd/index.js';

// Stores
export {
  InMemoryDimensionStore,
  PgDimensionStore,
  PgSequenceAllocator,
  resetSequences,
  DEFAULT_PAGE_SIZE,
} from './store/index.js';
export type {
  DimensionStore,
  DimensionStoreTransaction,
  ListVersionsParams,
  VersionCursor,
  VersionPage,
} from './store/index.js';

// Observability
export { getLogger, loggerOptions } from './observability/logger.js';
export type { Logger } from './observability/logger.js';
export { getTracer, startSpan, endSpan, traced, SpanStatusCode } from './observability/tracing.js';
