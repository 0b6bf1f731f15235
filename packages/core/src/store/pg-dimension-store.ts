import {
  ConcurrentModificationError,
  DimensionStoreError,
  ValidationError,
  isDimensionError,
} from '../shared/errors.js';
import { toIsoDate } from '../shared/dates.js';
import { withTransaction, type SqlClient, type SqlPool } from '../shared/database.js';
import { decodeStoredValue } from '../scd/attribute-normalizer.js';
import type { Attributes, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import { columnOf, queriesFor, updateAttributesQuery } from './pg-dimension-store.queries.js';
import {
  DEFAULT_PAGE_SIZE,
  type DimensionStore,
  type DimensionStoreTransaction,
  type ListVersionsParams,
  type VersionPage,
} from './types.js';

const UNIQUE_VIOLATION = '23505';
const CHECK_VIOLATION = '23514';
// SQLSTATE class 22: value too long, numeric out of range, invalid datetime...
const DATA_EXCEPTION_CLASS = '22';

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function pgErrorColumn(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'column' in error && typeof error.column === 'string') {
    return error.column;
  }
  return undefined;
}

function pgErrorConstraint(error: unknown): string | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'constraint' in error &&
    typeof error.constraint === 'string'
  ) {
    return error.constraint;
  }
  return undefined;
}

/** Rejected input (CHECK violation or data exception) rather than a store failure. */
export function isRejectedValue(code: string | undefined): boolean {
  return code === CHECK_VIOLATION || (code !== undefined && code.startsWith(DATA_EXCEPTION_CLASS));
}

function dateColumn(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return toIsoDate(value);
  return String(value);
}

export function rowToVersion(definition: DimensionDefinition, row: Record<string, unknown>): DimensionVersion {
  const attributes: Attributes = {};
  for (const attribute of definition.attributes) {
    attributes[attribute.name] = decodeStoredValue(attribute, row[columnOf(attribute)]);
  }
  const effectiveFrom = dateColumn(row.effective_from_date);
  if (effectiveFrom === null) {
    throw new DimensionStoreError(
      `Row ${String(row[definition.surrogate_key_column])} of ${definition.table} has no effective_from_date`,
    );
  }

  return {
    surrogate_key: Number(row[definition.surrogate_key_column]),
    natural_key: String(row[definition.natural_key_column]).trimEnd(),
    attributes,
    effective_from: effectiveFrom,
    effective_to: dateColumn(row.effective_to_date),
    is_current: row.is_current_record === true,
  };
}

function versionParams(definition: DimensionDefinition, version: DimensionVersion): unknown[] {
  return [
    version.surrogate_key,
    version.natural_key,
    ...definition.attributes.map((a) => version.attributes[a.name] ?? null),
    version.effective_from,
    version.effective_to,
    version.is_current,
  ];
}

function wrap(error: unknown, action: string): Error {
  if (isDimensionError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  const code = pgErrorCode(error);
  if (isRejectedValue(code)) {
    const column = pgErrorColumn(error);
    const constraint = pgErrorConstraint(error);
    return new ValidationError(`Cannot ${action}: ${message}`, column ?? constraint, {
      sqlstate: code,
      ...(column ? { column } : {}),
      ...(constraint ? { constraint } : {}),
    });
  }
  return new DimensionStoreError(`Failed to ${action}: ${message}`, error);
}

class PgTransaction implements DimensionStoreTransaction {
  constructor(private readonly client: SqlClient) {}

  async closeVersion(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
    effectiveTo: string,
  ): Promise<DimensionVersion> {
    const { rows } = await this.client.query(queriesFor(definition).CLOSE_VERSION, [
      surrogateKey,
      naturalKey,
      effectiveTo,
    ]);
    if (rows.length === 0) {
      throw new ConcurrentModificationError(definition.dimension_id, naturalKey, surrogateKey);
    }
    return rowToVersion(definition, rows[0]);
  }

  async insertVersion(definition: DimensionDefinition, version: DimensionVersion): Promise<DimensionVersion> {
    try {
      const { rows } = await this.client.query(
        queriesFor(definition).INSERT_VERSION,
        versionParams(definition, version),
      );
      return rowToVersion(definition, rows[0]);
    } catch (error) {
      // uq_<table>_current: another writer opened a version for this key first
      if (pgErrorCode(error) === UNIQUE_VIOLATION) {
        throw new ConcurrentModificationError(definition.dimension_id, version.natural_key, null);
      }
      throw wrap(error, `insert ${definition.dimension_id} version`);
    }
  }

  async updateAttributes(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
    attributes: Attributes,
  ): Promise<DimensionVersion> {
    const names = Object.keys(attributes);
    const { rows } = await this.client.query(updateAttributesQuery(definition, names), [
      surrogateKey,
      naturalKey,
      ...names.map((name) => attributes[name]),
    ]);
    if (rows.length === 0) {
      throw new ConcurrentModificationError(definition.dimension_id, naturalKey, surrogateKey);
    }
    return rowToVersion(definition, rows[0]);
  }
}

/**
 * Dimension store over the banking_dw tables. One table per dimension; column
 * names come from the dimension definition.
 */
export class PgDimensionStore implements DimensionStore {
  constructor(private readonly pool: SqlPool) {}

  async findCurrent(definition: DimensionDefinition, naturalKey: string): Promise<DimensionVersion[]> {
    try {
      const { rows } = await this.pool.query(queriesFor(definition).FIND_CURRENT, [naturalKey]);
      return rows.map((row) => rowToVersion(definition, row));
    } catch (error) {
      throw wrap(error, `read current ${definition.dimension_id} version`);
    }
  }

  async findAsOf(
    definition: DimensionDefinition,
    naturalKey: string,
    date: string,
  ): Promise<DimensionVersion | null> {
    try {
      const { rows } = await this.pool.query(queriesFor(definition).FIND_AS_OF, [naturalKey, date]);
      return rows.length > 0 ? rowToVersion(definition, rows[0]) : null;
    } catch (error) {
      throw wrap(error, `read ${definition.dimension_id} version as of ${date}`);
    }
  }

  async listVersions(
    definition: DimensionDefinition,
    naturalKey: string,
    params: ListVersionsParams = {},
  ): Promise<VersionPage> {
    const limit = params.limit ?? DEFAULT_PAGE_SIZE;
    const queries = queriesFor(definition);

    let rows: Record<string, unknown>[];
    try {
      const result = params.after
        ? await this.pool.query(queries.LIST_VERSIONS_AFTER, [
            naturalKey,
            limit + 1,
            params.after.effective_from,
            params.after.surrogate_key,
          ])
        : await this.pool.query(queries.LIST_VERSIONS, [naturalKey, limit + 1]);
      rows = result.rows;
    } catch (error) {
      throw wrap(error, `list ${definition.dimension_id} versions`);
    }

    const hasMore = rows.length > limit;
    const versions = rows.slice(0, limit).map((row) => rowToVersion(definition, row));
    const last = versions[versions.length - 1];
    return {
      versions,
      has_more: hasMore,
      next_cursor:
        hasMore && last
          ? { effective_from: last.effective_from, surrogate_key: last.surrogate_key }
          : undefined,
    };
  }

  async maxSurrogateKey(definition: DimensionDefinition): Promise<number> {
    try {
      const { rows } = await this.pool.query(queriesFor(definition).MAX_SURROGATE_KEY);
      return Number(rows[0]?.max_sk ?? 0);
    } catch (error) {
      throw wrap(error, `read ${definition.dimension_id} high-water mark`);
    }
  }

  async transaction<T>(fn: (tx: DimensionStoreTransaction) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.pool, (client) => fn(new PgTransaction(client)));
    } catch (error) {
      throw wrap(error, 'complete dimension transaction');
    }
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }
}
