export { DimensionRegistry } from './registry.js';
export {
  loadDimensionDefinitions,
  parseDimensionDefinitions,
  DEFAULT_DIMENSIONS_FILE,
  SCD_COLUMNS,
} from './definition-loader.js';
export { parseAsOfRecord, recordBodySchema, asOfRecordSchema } from './record-schema.js';
export { readAsOfRecords } from './record-reader.js';
export type { MalformedLine } from './record-reader.js';
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
} from './types.js';
