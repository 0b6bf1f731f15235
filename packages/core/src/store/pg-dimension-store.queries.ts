import type { AttributeDefinition, DimensionDefinition } from '../dimensions/types.js';

export interface DimensionQueries {
  FIND_CURRENT: string;
  FIND_AS_OF: string;
  LIST_VERSIONS: string;
  LIST_VERSIONS_AFTER: string;
  MAX_SURROGATE_KEY: string;
  CLOSE_VERSION: string;
  INSERT_VERSION: string;
  RESET_SEQUENCE: string;
  NEXT_SURROGATE_KEY: string;
}

/** Identifiers are validated against ^[a-z_][a-z0-9_]*$ when definitions load; quoting keeps them literal. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function columnOf(attribute: AttributeDefinition): string {
  return attribute.column ?? attribute.name;
}

export function qualifiedTable(definition: DimensionDefinition): string {
  return `${quoteIdent(definition.schema)}.${quoteIdent(definition.table)}`;
}

/** Table name as pg_get_serial_sequence expects it. */
function sequenceTableArg(definition: DimensionDefinition): string {
  return `'${definition.schema}.${definition.table}'`;
}

export function selectColumns(definition: DimensionDefinition): string {
  return [
    quoteIdent(definition.surrogate_key_column),
    quoteIdent(definition.natural_key_column),
    ...definition.attributes.map((a) => quoteIdent(columnOf(a))),
    'effective_from_date',
    'effective_to_date',
    'is_current_record',
  ].join(', ');
}

const cache = new Map<DimensionDefinition, DimensionQueries>();

export function queriesFor(definition: DimensionDefinition): DimensionQueries {
  const cached = cache.get(definition);
  if (cached) return cached;

  const table = qualifiedTable(definition);
  const sk = quoteIdent(definition.surrogate_key_column);
  const nk = quoteIdent(definition.natural_key_column);
  const columns = selectColumns(definition);
  const insertPlaceholders = Array.from(
    { length: definition.attributes.length + 5 },
    (_, i) => `$${i + 1}`,
  ).join(', ');
  const sequence = `pg_get_serial_sequence(${sequenceTableArg(definition)}, '${definition.surrogate_key_column}')`;

  const queries: DimensionQueries = {
    FIND_CURRENT: `
      SELECT ${columns} FROM ${table}
      WHERE ${nk} = $1 AND is_current_record = TRUE
      ORDER BY ${sk}
    `,

    FIND_AS_OF: `
      SELECT ${columns} FROM ${table}
      WHERE ${nk} = $1
        AND effective_from_date <= $2::date
        AND (effective_to_date IS NULL OR effective_to_date > $2::date)
      ORDER BY effective_from_date DESC, ${sk} DESC
      LIMIT 1
    `,

    LIST_VERSIONS: `
      SELECT ${columns} FROM ${table}
      WHERE ${nk} = $1
      ORDER BY effective_from_date, ${sk}
      LIMIT $2
    `,

    LIST_VERSIONS_AFTER: `
      SELECT ${columns} FROM ${table}
      WHERE ${nk} = $1
        AND (effective_from_date, ${sk}) > ($3::date, $4::bigint)
      ORDER BY effective_from_date, ${sk}
      LIMIT $2
    `,

    MAX_SURROGATE_KEY: `
      SELECT COALESCE(MAX(${sk}), 0) AS max_sk FROM ${table}
    `,

    CLOSE_VERSION: `
      UPDATE ${table}
      SET effective_to_date = $3::date, is_current_record = FALSE
      WHERE ${sk} = $1 AND ${nk} = $2 AND is_current_record = TRUE
      RETURNING ${columns}
    `,

    INSERT_VERSION: `
      INSERT INTO ${table} (${columns})
      VALUES (${insertPlaceholders})
      RETURNING ${columns}
    `,

    RESET_SEQUENCE: `
      SELECT setval(
        ${sequence},
        GREATEST(
          COALESCE((SELECT MAX(${sk}) FROM ${table}), 0),
          COALESCE(pg_sequence_last_value(${sequence}::regclass), 0),
          $1::bigint
        ) + 1,
        false
      ) AS next_value
    `,

    NEXT_SURROGATE_KEY: `
      SELECT nextval(${sequence}) AS surrogate_key
    `,
  };

  cache.set(definition, queries);
  return queries;
}

/**
 * In-place overwrite of the given attributes, guarded on the version still being current.
 */
export function updateAttributesQuery(definition: DimensionDefinition, names: string[]): string {
  if (names.length === 0) {
    throw new Error('updateAttributesQuery needs at least one attribute');
  }
  const byName = new Map(definition.attributes.map((a) => [a.name, a]));
  const assignments = names.map((name, i) => {
    const attribute = byName.get(name);
    if (!attribute) {
      throw new Error(`Attribute ${name} is not declared for dimension ${definition.dimension_id}`);
    }
    return `${quoteIdent(columnOf(attribute))} = $${i + 3}`;
  });

  return `
      UPDATE ${qualifiedTable(definition)}
      SET ${assignments.join(', ')}
      WHERE ${quoteIdent(definition.surrogate_key_column)} = $1
        AND ${quoteIdent(definition.natural_key_column)} = $2
        AND is_current_record = TRUE
      RETURNING ${selectColumns(definition)}
    `;
}
