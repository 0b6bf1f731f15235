import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { extname } from 'node:path';
import yaml from 'js-yaml';
import AjvModule from 'ajv';
import { ValidationError } from '../shared/errors.js';
import type { AttributeDefinition, DimensionDefinition } from './types.js';

export const DEFAULT_DIMENSIONS_FILE = fileURLToPath(
  new URL('../../../../config/dimensions.yaml', import.meta.url),
);

/** Columns every SCD table carries; attributes may not reuse them. */
export const SCD_COLUMNS = ['effective_from_date', 'effective_to_date', 'is_current_record'] as const;

const IDENTIFIER = '^[a-z_][a-z0-9_]*$';

interface DefinitionsFile {
  schema?: string;
  dimensions: Array<Omit<DimensionDefinition, 'schema'> & { schema?: string }>;
}

const definitionsFileSchema = {
  type: 'object',
  required: ['dimensions'],
  additionalProperties: false,
  properties: {
    schema: { type: 'string', pattern: IDENTIFIER },
    dimensions: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['dimension_id', 'table', 'surrogate_key_column', 'natural_key_column', 'attributes'],
        additionalProperties: false,
        properties: {
          dimension_id: { type: 'string', pattern: '^[a-z][a-z0-9_]*$' },
          schema: { type: 'string', pattern: IDENTIFIER },
          table: { type: 'string', pattern: IDENTIFIER },
          surrogate_key_column: { type: 'string', pattern: IDENTIFIER },
          natural_key_column: { type: 'string', pattern: IDENTIFIER },
          natural_key_max_length: { type: 'integer', minimum: 1 },
          description: { type: 'string' },
          attributes: {
            type: 'array',
            minItems: 1,
            items: {
              type: 'object',
              required: ['name', 'type', 'tracked_as'],
              additionalProperties: false,
              properties: {
                name: { type: 'string', pattern: IDENTIFIER },
                column: { type: 'string', pattern: IDENTIFIER },
                type: { enum: ['string', 'code', 'decimal', 'integer', 'boolean', 'date'] },
                tracked_as: { enum: ['TYPE1', 'TYPE2'] },
                precision: { type: 'integer', minimum: 1, maximum: 1000 },
                scale: { type: 'integer', minimum: 0, maximum: 1000 },
                max_length: { type: 'integer', minimum: 1 },
                values: {
                  type: 'array',
                  minItems: 1,
                  uniqueItems: true,
                  items: { type: 'string', minLength: 1 },
                },
                bits: { enum: [16, 32, 64] },
              },
            },
          },
        },
      },
    },
  },
};

const ajv = new AjvModule.default({ allErrors: true });
const validateDefinitionsFile = ajv.compile<DefinitionsFile>(definitionsFileSchema);

function columnOf(attribute: AttributeDefinition): string {
  return attribute.column ?? attribute.name;
}

const FACETS_BY_TYPE: Record<AttributeDefinition['type'], ReadonlyArray<keyof AttributeDefinition>> = {
  string: ['max_length'],
  code: ['max_length', 'values'],
  decimal: ['precision', 'scale'],
  integer: ['bits'],
  boolean: [],
  date: [],
};

const FACETS = ['precision', 'scale', 'max_length', 'values', 'bits'] as const;

function checkFacets(definition: DimensionDefinition, attribute: AttributeDefinition, source: string): void {
  const where = `${source}: attribute "${attribute.name}" of dimension ${definition.dimension_id}`;
  const allowed = FACETS_BY_TYPE[attribute.type];
  for (const facet of FACETS) {
    if (attribute[facet] !== undefined && !allowed.includes(facet)) {
      throw new ValidationError(`${where}: ${facet} does not apply to ${attribute.type}`, attribute.name);
    }
  }

  const { precision, scale, max_length: maxLength, values } = attribute;
  if (precision !== undefined && scale !== undefined && scale > precision) {
    throw new ValidationError(`${where}: scale ${scale} exceeds precision ${precision}`, attribute.name);
  }
  for (const value of values ?? []) {
    if (value !== value.trim().toUpperCase()) {
      throw new ValidationError(`${where}: code value "${value}" must be trimmed upper-case`, attribute.name);
    }
    if (maxLength !== undefined && [...value].length > maxLength) {
      throw new ValidationError(`${where}: code value "${value}" is longer than ${maxLength}`, attribute.name);
    }
  }
}

function checkDimension(definition: DimensionDefinition, source: string): void {
  const reserved = new Set<string>([
    ...SCD_COLUMNS,
    definition.surrogate_key_column,
    definition.natural_key_column,
  ]);
  const names = new Set<string>();
  const columns = new Set<string>();

  for (const attribute of definition.attributes) {
    if (names.has(attribute.name)) {
      throw new ValidationError(
        `${source}: duplicate attribute "${attribute.name}" in dimension ${definition.dimension_id}`,
        attribute.name,
      );
    }
    const column = columnOf(attribute);
    if (reserved.has(column) || columns.has(column)) {
      throw new ValidationError(
        `${source}: column "${column}" of dimension ${definition.dimension_id} is reserved or already mapped`,
        attribute.name,
      );
    }
    checkFacets(definition, attribute, source);
    names.add(attribute.name);
    columns.add(column);
  }
}

/**
 * Parse and validate a dimensions file (YAML or JSON; JSON is valid YAML).
 */
export function parseDimensionDefinitions(content: string, source = 'dimensions'): DimensionDefinition[] {
  const parsed: unknown = yaml.load(content);

  if (!validateDefinitionsFile(parsed)) {
    const problems = (validateDefinitionsFile.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new ValidationError(`Invalid dimensions file ${source}: ${problems}`, undefined, {
      errors: validateDefinitionsFile.errors ?? [],
    });
  }

  const defaultSchema = parsed.schema ?? 'public';
  const seen = new Set<string>();

  return parsed.dimensions.map((raw) => {
    if (seen.has(raw.dimension_id)) {
      throw new ValidationError(`${source}: duplicate dimension "${raw.dimension_id}"`, 'dimension_id');
    }
    seen.add(raw.dimension_id);

    const definition: DimensionDefinition = { ...raw, schema: raw.schema ?? defaultSchema };
    checkDimension(definition, source);
    return definition;
  });
}

export function loadDimensionDefinitions(filePath: string = DEFAULT_DIMENSIONS_FILE): DimensionDefinition[] {
  const ext = extname(filePath).toLowerCase();
  if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
    throw new ValidationError(`Unsupported dimensions file format: ${ext} (expected .yaml, .yml, or .json)`);
  }
  return parseDimensionDefinitions(readFileSync(filePath, 'utf-8'), filePath);
}
