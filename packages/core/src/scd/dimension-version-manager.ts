import {
  AmbiguousCurrentVersionError,
  ConcurrentModificationError,
  DimensionStoreError,
  NaturalKeyNotFoundError,
  ValidationError,
  isDimensionError,
  type DimensionErrorCode,
} from '../shared/errors.js';
import { isIsoDate } from '../shared/dates.js';
import { generateId } from '../shared/types.js';
import { getLogger, type Logger } from '../observability/logger.js';
import { traced } from '../observability/tracing.js';
import type { DimensionRegistry } from '../dimensions/registry.js';
import type { AsOfRecord, Attributes, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import type { DimensionStore } from '../store/types.js';
import { normalizeAttributes } from './attribute-normalizer.js';
import { auditChain, type ChainViolation } from './chain-audit.js';
import { detectChange, type ChangeVerdict } from './change-detector.js';
import { NaturalKeyResolver, normalizeNaturalKey } from './natural-key-resolver.js';
import type { SurrogateKeyAllocator } from './surrogate-key-allocator.js';
import { VersionHistory } from './version-history.js';
import { applyPlan, planWrite } from './version-writer.js';

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface ApplyResult {
  dimension_id: string;
  natural_key: string;
  as_of_date: string;
  verdict: ChangeVerdict;
  attempts: number;
  changed: { type1: string[]; type2: string[] };
  current: DimensionVersion;
  closed?: DimensionVersion;
}

export type LoadFailureCode = DimensionErrorCode | 'NATURAL_KEY_HALTED';

export interface LoadFailure {
  index: number;
  dimension_id: string;
  natural_key: string;
  error_code: LoadFailureCode;
  message: string;
}

export interface LoadSummary {
  batch_id: string;
  processed: number;
  applied: Record<ChangeVerdict, number>;
  failed: number;
  failures: LoadFailure[];
}

export interface ChainAuditReport {
  dimension_id: string;
  natural_key: string;
  version_count: number;
  violations: ChainViolation[];
}

export interface DimensionVersionManagerOptions {
  /** Total read-detect-write attempts per record when a concurrent writer wins. */
  maxAttempts?: number;
  logger?: Logger;
}

interface ValidatedRecord {
  definition: DimensionDefinition;
  naturalKey: string;
  asOfDate: string;
  attributes: Attributes;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function haltKey(record: AsOfRecord): string {
  return `${record.dimension_id}\u0000${String(record.natural_key).trim()}`;
}

function emptyCounts(): Record<ChangeVerdict, number> {
  return { NO_CHANGE: 0, TYPE1_UPDATE: 0, TYPE2_VERSION: 0, NEW_ENTITY: 0 };
}

/**
 * Applies as-of records to the SCD dimensions and answers point-in-time
 * queries over their history.
 */
export class DimensionVersionManager {
  private readonly resolver: NaturalKeyResolver;
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(
    private readonly store: DimensionStore,
    private readonly allocator: SurrogateKeyAllocator,
    private readonly registry: DimensionRegistry,
    options: DimensionVersionManagerOptions = {},
  ) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ValidationError(`maxAttempts must be a positive integer, got ${maxAttempts}`, 'maxAttempts');
    }
    this.maxAttempts = maxAttempts;
    this.resolver = new NaturalKeyResolver(store);
    this.log = options.logger ?? getLogger('dimension-version-manager');
  }

  /**
   * Advance each dimension's allocator past the highest surrogate key already
   * stored. Call once before taking live traffic.
   */
  async prepare(): Promise<Record<string, number>> {
    const highWater: Record<string, number> = {};
    for (const definition of this.registry.list()) {
      const max = await this.store.maxSurrogateKey(definition);
      await this.allocator.advancePast(definition, max);
      highWater[definition.dimension_id] = max;
    }
    this.log.info({ highWater }, 'surrogate key allocators prepared');
    return highWater;
  }

  async apply(record: AsOfRecord): Promise<ApplyResult> {
    const validated = this.validate(record);
    const { definition, naturalKey, asOfDate, attributes } = validated;

    return traced(
      'scd.apply',
      { 'scd.dimension': definition.dimension_id, 'scd.natural_key': naturalKey, 'scd.as_of_date': asOfDate },
      async (span) => {
        for (let attempt = 1; ; attempt++) {
          try {
            const current = await this.resolver.resolveCurrent(definition, naturalKey);
            const detection = detectChange(definition, current, attributes);
            const plan = planWrite(definition, detection, current, naturalKey, attributes, asOfDate);
            const outcome = await applyPlan(this.store, this.allocator, definition, plan);

            span.setAttribute('scd.verdict', outcome.verdict);
            span.setAttribute('scd.attempts', attempt);
            this.log.debug(
              {
                dimension: definition.dimension_id,
                naturalKey,
                asOfDate,
                verdict: outcome.verdict,
                surrogateKey: outcome.current.surrogate_key,
                attempt,
              },
              'record applied',
            );

            return {
              dimension_id: definition.dimension_id,
              natural_key: naturalKey,
              as_of_date: asOfDate,
              verdict: outcome.verdict,
              attempts: attempt,
              changed: detection.changed,
              current: outcome.current,
              closed: outcome.closed,
            };
          } catch (error) {
            if (error instanceof ConcurrentModificationError && attempt < this.maxAttempts) {
              this.log.warn(
                { dimension: definition.dimension_id, naturalKey, attempt },
                'concurrent modification, retrying',
              );
              continue;
            }
            throw error;
          }
        }
      },
    );
  }

  /**
   * Apply records in order. Domain failures are collected per record; a store
   * failure aborts the load. After an ambiguous current version the natural
   * key is halted for the rest of the load.
   */
  async applyAll(records: Iterable<AsOfRecord> | AsyncIterable<AsOfRecord>): Promise<LoadSummary> {
    const summary: LoadSummary = {
      batch_id: generateId(),
      processed: 0,
      applied: emptyCounts(),
      failed: 0,
      failures: [],
    };
    const halted = new Set<string>();

    let index = 0;
    for await (const record of records) {
      const position = index++;
      summary.processed++;

      const key = haltKey(record);
      if (halted.has(key)) {
        summary.failed++;
        summary.failures.push({
          index: position,
          dimension_id: record.dimension_id,
          natural_key: String(record.natural_key),
          error_code: 'NATURAL_KEY_HALTED',
          message: `Natural key ${record.dimension_id}/${String(record.natural_key).trim()} is halted after an ambiguous current version`,
        });
        continue;
      }

      try {
        const result = await this.apply(record);
        summary.applied[result.verdict]++;
      } catch (error) {
        if (!isDimensionError(error) || error instanceof DimensionStoreError) {
          this.log.error(
            { err: error, batchId: summary.batch_id, index: position },
            'load aborted',
          );
          throw error;
        }
        if (error instanceof AmbiguousCurrentVersionError) {
          halted.add(key);
        }
        summary.failed++;
        summary.failures.push({
          index: position,
          dimension_id: record.dimension_id,
          natural_key: String(record.natural_key),
          error_code: error.code,
          message: error.message,
        });
        this.log.warn(
          { batchId: summary.batch_id, index: position, code: error.code },
          error.message,
        );
      }
    }

    this.log.info(
      {
        batchId: summary.batch_id,
        processed: summary.processed,
        applied: summary.applied,
        failed: summary.failed,
      },
      'load complete',
    );
    return summary;
  }

  /** The current version, or null when the natural key has never been loaded. */
  async currentVersion(dimensionId: string, naturalKey: string): Promise<DimensionVersion | null> {
    const definition = this.registry.get(dimensionId);
    return this.resolver.resolveCurrent(definition, normalizeNaturalKey(naturalKey));
  }

  /** The version effective on `date`: effective_from <= date < effective_to. */
  async versionAsOf(
    dimensionId: string,
    naturalKey: string,
    date: string,
  ): Promise<DimensionVersion | null> {
    const definition = this.registry.get(dimensionId);
    if (!isIsoDate(date)) {
      throw new ValidationError(`as_of_date must be a YYYY-MM-DD calendar date, got ${date}`, 'as_of_date');
    }
    const nk = normalizeNaturalKey(naturalKey);
    return traced(
      'scd.version_as_of',
      { 'scd.dimension': dimensionId, 'scd.natural_key': nk, 'scd.as_of_date': date },
      () => this.store.findAsOf(definition, nk, date),
    );
  }

  allVersions(dimensionId: string, naturalKey: string, pageSize?: number): VersionHistory {
    const definition = this.registry.get(dimensionId);
    return new VersionHistory(this.store, definition, normalizeNaturalKey(naturalKey), pageSize);
  }

  /** Integrity check of one natural key's chain, for the manual repair path. */
  async auditNaturalKey(dimensionId: string, naturalKey: string): Promise<ChainAuditReport> {
    const nk = normalizeNaturalKey(naturalKey);
    const versions = await this.allVersions(dimensionId, nk).toArray();
    if (versions.length === 0) {
      throw new NaturalKeyNotFoundError(dimensionId, nk);
    }
    return {
      dimension_id: dimensionId,
      natural_key: nk,
      version_count: versions.length,
      violations: auditChain(versions),
    };
  }

  private validate(record: AsOfRecord): ValidatedRecord {
    const definition = this.registry.get(record.dimension_id);
    const naturalKey = normalizeNaturalKey(record.natural_key, definition.natural_key_max_length);
    if (typeof record.as_of_date !== 'string' || !isIsoDate(record.as_of_date)) {
      throw new ValidationError(
        `as_of_date must be a YYYY-MM-DD calendar date, got ${String(record.as_of_date)}`,
        'as_of_date',
      );
    }
    if (!isPlainObject(record.attributes)) {
      throw new ValidationError('attributes must be an object', 'attributes');
    }
    return {
      definition,
      naturalKey,
      asOfDate: record.as_of_date,
      attributes: normalizeAttributes(definition, record.attributes),
    };
  }
}
