import { compareIsoDates } from '../shared/dates.js';
import type { DimensionVersion } from '../dimensions/types.js';

export type ChainViolationKind =
  | 'NO_CURRENT'
  | 'MULTIPLE_CURRENT'
  | 'CURRENT_FLAG_MISMATCH'
  | 'INVERTED_INTERVAL'
  | 'OPEN_VERSION_NOT_LAST'
  | 'GAP'
  | 'OVERLAP'
  | 'DUPLICATE_SURROGATE_KEY';

export interface ChainViolation {
  kind: ChainViolationKind;
  surrogate_keys: number[];
  message: string;
}

export function compareVersions(a: DimensionVersion, b: DimensionVersion): number {
  return compareIsoDates(a.effective_from, b.effective_from) || a.surrogate_key - b.surrogate_key;
}

/**
 * Check one natural key's version chain for the SCD-2 invariants: a single
 * current version, is_current agreeing with effective_to, and contiguous,
 * non-overlapping intervals.
 */
export function auditChain(versions: DimensionVersion[]): ChainViolation[] {
  const violations: ChainViolation[] = [];
  if (versions.length === 0) return violations;

  const chain = [...versions].sort(compareVersions);

  const seen = new Map<number, number>();
  for (const v of chain) {
    seen.set(v.surrogate_key, (seen.get(v.surrogate_key) ?? 0) + 1);
  }
  for (const [key, count] of seen) {
    if (count > 1) {
      violations.push({
        kind: 'DUPLICATE_SURROGATE_KEY',
        surrogate_keys: [key],
        message: `surrogate key ${key} is used by ${count} versions`,
      });
    }
  }

  const current = chain.filter((v) => v.is_current);
  if (current.length === 0) {
    violations.push({ kind: 'NO_CURRENT', surrogate_keys: [], message: 'no version is current' });
  } else if (current.length > 1) {
    violations.push({
      kind: 'MULTIPLE_CURRENT',
      surrogate_keys: current.map((v) => v.surrogate_key),
      message: `${current.length} versions are flagged current`,
    });
  }

  for (const v of chain) {
    if (v.is_current !== (v.effective_to === null)) {
      violations.push({
        kind: 'CURRENT_FLAG_MISMATCH',
        surrogate_keys: [v.surrogate_key],
        message: `version ${v.surrogate_key} has is_current=${v.is_current} but effective_to=${v.effective_to ?? 'null'}`,
      });
    }
    if (v.effective_to !== null && compareIsoDates(v.effective_to, v.effective_from) < 0) {
      violations.push({
        kind: 'INVERTED_INTERVAL',
        surrogate_keys: [v.surrogate_key],
        message: `version ${v.surrogate_key} ends (${v.effective_to}) before it starts (${v.effective_from})`,
      });
    }
  }

  for (let i = 1; i < chain.length; i++) {
    const prev = chain[i - 1];
    const next = chain[i];
    const pair = [prev.surrogate_key, next.surrogate_key];

    if (prev.effective_to === null) {
      violations.push({
        kind: 'OPEN_VERSION_NOT_LAST',
        surrogate_keys: pair,
        message: `open version ${prev.surrogate_key} is followed by version ${next.surrogate_key}`,
      });
      continue;
    }

    const order = compareIsoDates(prev.effective_to, next.effective_from);
    if (order < 0) {
      violations.push({
        kind: 'GAP',
        surrogate_keys: pair,
        message: `gap between ${prev.effective_to} and ${next.effective_from}`,
      });
    } else if (order > 0) {
      violations.push({
        kind: 'OVERLAP',
        surrogate_keys: pair,
        message: `version ${prev.surrogate_key} runs to ${prev.effective_to}, past the start of ${next.surrogate_key} (${next.effective_from})`,
      });
    }
  }

  return violations;
}
