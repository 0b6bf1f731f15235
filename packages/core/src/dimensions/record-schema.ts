import AjvModule from 'ajv';
import { ValidationError } from '../shared/errors.js';
import type { AsOfRecord } from './types.js';

/** Body of a single as-of record posted for a dimension named elsewhere (e.g. in the URL). */
export const recordBodySchema = {
  type: 'object',
  required: ['natural_key', 'as_of_date', 'attributes'],
  additionalProperties: false,
  properties: {
    natural_key: { type: 'string', minLength: 1, maxLength: 36 },
    as_of_date: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$' },
    attributes: { type: 'object' },
  },
};

export const asOfRecordSchema = {
  ...recordBodySchema,
  required: ['dimension_id', ...recordBodySchema.required],
  properties: {
    dimension_id: { type: 'string', minLength: 1 },
    ...recordBodySchema.properties,
  },
};

const ajv = new AjvModule.default({ allErrors: true });
const validateAsOfRecord = ajv.compile<AsOfRecord>(asOfRecordSchema);

/**
 * Validate the shape of an externally supplied record (one NDJSON line, say).
 */
export function parseAsOfRecord(value: unknown): AsOfRecord {
  if (!validateAsOfRecord(value)) {
    const problems = (validateAsOfRecord.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new ValidationError(`Invalid as-of record: ${problems}`);
  }
  return value;
}
