export type TrackingPolicy = 'TYPE1' | 'TYPE2';

export type AttributeType = 'string' | 'code' | 'decimal' | 'integer' | 'boolean' | 'date';

/** Normalized attribute value. Dates are ISO strings, decimals canonical strings. */
export type AttributeValue = string | number | boolean | null;

export type Attributes = Record<string, AttributeValue>;

/** Integer column width in bits: SMALLINT, INTEGER or BIGINT. */
export type IntegerBits = 16 | 32 | 64;

export interface AttributeDefinition {
  name: string;
  /** Physical column; defaults to `name`. */
  column?: string;
  tracked_as: TrackingPolicy;
  type: AttributeType;
  /** Total significant digits of a decimal column, as in NUMERIC(precision, scale). */
  precision?: number;
  /** Fractional digits of a decimal column; values are rounded half away from zero. */
  scale?: number;
  /** Maximum characters of a string or code column. */
  max_length?: number;
  /** Allowed values of a code column, upper-case. */
  values?: string[];
  bits?: IntegerBits;
}

export interface DimensionDefinition {
  dimension_id: string;
  schema: string;
  table: string;
  surrogate_key_column: string;
  natural_key_column: string;
  /** Maximum characters of a natural key. */
  natural_key_max_length?: number;
  description?: string;
  attributes: AttributeDefinition[];
}

export interface DimensionVersion {
  surrogate_key: number;
  natural_key: string;
  attributes: Attributes;
  effective_from: string;
  effective_to: string | null;
  is_current: boolean;
}

/** One "current truth" record for an entity, as extracted from a source system. */
export interface AsOfRecord {
  dimension_id: string;
  natural_key: string;
  as_of_date: string;
  attributes: Record<string, unknown>;
}
