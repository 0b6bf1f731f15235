export {
  canonicalDecimal,
  decodeStoredValue,
  normalizeAttributes,
  normalizeValue,
  roundDecimal,
} from './attribute-normalizer.js';
export { CHANGE_VERDICTS, detectChange } from './change-detector.js';
export type { ChangeDetection, ChangeVerdict } from './change-detector.js';
export { NaturalKeyResolver, normalizeNaturalKey } from './natural-key-resolver.js';
export { InMemorySurrogateKeyAllocator } from './surrogate-key-allocator.js';
export type { SurrogateKeyAllocator } from './surrogate-key-allocator.js';
export { applyPlan, planWrite } from './version-writer.js';
export type { WriteOutcome, WritePlan } from './version-writer.js';
export { auditChain, compareVersions } from './chain-audit.js';
export type { ChainViolation, ChainViolationKind } from './chain-audit.js';
export { VersionHistory } from './version-history.js';
export { DimensionVersionManager, DEFAULT_MAX_ATTEMPTS } from './dimension-version-manager.js';
export type {
  ApplyResult,
  ChainAuditReport,
  DimensionVersionManagerOptions,
  LoadFailure,
  LoadFailureCode,
  LoadSummary,
} from './dimension-version-manager.js';
