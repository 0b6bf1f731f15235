import { ValidationError } from '../shared/errors.js';
import { isIsoDate, toIsoDate } from '../shared/dates.js';
import type {
  AttributeDefinition,
  Attributes,
  AttributeValue,
  DimensionDefinition,
  IntegerBits,
} from '../dimensions/types.js';

const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const INTEGER = /^[+-]?\d+$/;
const TRUE_WORDS = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_WORDS = new Set(['false', 'f', 'no', 'n', '0']);

const INTEGER_RANGE: Record<IntegerBits, [number, number]> = {
  16: [-32768, 32767],
  32: [-2147483648, 2147483647],
  64: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
};

function invalid(attribute: AttributeDefinition, raw: unknown): ValidationError {
  return new ValidationError(
    `Attribute "${attribute.name}" expects a ${attribute.type} value, got ${JSON.stringify(raw) ?? String(raw)}`,
    attribute.name,
  );
}

function outOfDomain(attribute: AttributeDefinition, raw: unknown, reason: string): ValidationError {
  return new ValidationError(
    `Attribute "${attribute.name}" ${reason}, got ${JSON.stringify(raw) ?? String(raw)}`,
    attribute.name,
  );
}

function textOf(attribute: AttributeDefinition, raw: unknown): string {
  if (typeof raw === 'string') return raw.trim();
  if (typeof raw === 'number' || typeof raw === 'bigint') return String(raw);
  throw invalid(attribute, raw);
}

/**
 * Canonical decimal text: no leading zeros in the integer part, no trailing
 * fractional zeros, no sign on zero. "0012.500" and 12.5 both become "12.5".
 */
export function canonicalDecimal(text: string): string | null {
  const match = DECIMAL.exec(text);
  if (!match) return null;
  const [, sign, intDigits = '', fracDigits = ''] = match;
  if (intDigits === '' && fracDigits === '') return null;

  const intPart = intDigits.replace(/^0+/, '') || '0';
  const fracPart = fracDigits.replace(/0+$/, '');
  const body = fracPart ? `${intPart}.${fracPart}` : intPart;
  const isZero = intPart === '0' && fracPart === '';
  return sign === '-' && !isZero ? `-${body}` : body;
}

/**
 * Round decimal text to `scale` fractional digits, half away from zero, the
 * way PostgreSQL stores a NUMERIC(p, scale) value. Returns null for non-decimal text.
 */
export function roundDecimal(text: string, scale: number): string | null {
  const match = DECIMAL.exec(text);
  if (!match) return null;
  const [, sign, intDigits = '', fracDigits = ''] = match;
  if (intDigits === '' && fracDigits === '') return null;
  if (fracDigits.length <= scale) return canonicalDecimal(text);

  const kept = `${intDigits}${fracDigits.slice(0, scale)}` || '0';
  const roundUp = fracDigits.charCodeAt(scale) >= '5'.charCodeAt(0);
  const digits = (BigInt(kept) + (roundUp ? 1n : 0n)).toString().padStart(scale + 1, '0');
  const intPart = digits.slice(0, digits.length - scale);
  const fracPart = digits.slice(digits.length - scale);
  return canonicalDecimal(`${sign}${intPart}${scale > 0 ? `.${fracPart}` : ''}`);
}

function integerDigits(canonical: string): number {
  const [intPart] = canonical.replace(/^-/, '').split('.');
  return intPart === '0' ? 0 : intPart.length;
}

function checkLength(attribute: AttributeDefinition, raw: unknown, text: string): string {
  if (attribute.max_length !== undefined && [...text].length > attribute.max_length) {
    throw outOfDomain(attribute, raw, `is longer than ${attribute.max_length} characters`);
  }
  return text;
}

export function normalizeValue(attribute: AttributeDefinition, raw: unknown): AttributeValue {
  if (raw === null || raw === undefined) return null;

  switch (attribute.type) {
    case 'string':
      return checkLength(attribute, raw, textOf(attribute, raw));

    case 'code': {
      const code = checkLength(attribute, raw, textOf(attribute, raw).toUpperCase());
      if (attribute.values && !attribute.values.includes(code)) {
        throw outOfDomain(attribute, raw, `must be one of ${attribute.values.join(', ')}`);
      }
      return code;
    }

    case 'decimal': {
      if (typeof raw === 'number' && !Number.isFinite(raw)) throw invalid(attribute, raw);
      const text = textOf(attribute, raw);
      const canonical =
        attribute.scale === undefined ? canonicalDecimal(text) : roundDecimal(text, attribute.scale);
      if (canonical === null) throw invalid(attribute, raw);
      if (attribute.precision !== undefined) {
        const limit = attribute.precision - (attribute.scale ?? 0);
        if (integerDigits(canonical) > limit) {
          throw outOfDomain(attribute, raw, `exceeds ${limit} integer digits`);
        }
      }
      return canonical;
    }

    case 'integer': {
      let value: number;
      if (typeof raw === 'number') {
        value = raw;
      } else {
        const text = textOf(attribute, raw);
        if (!INTEGER.test(text)) throw invalid(attribute, raw);
        value = Number(text);
      }
      if (!Number.isSafeInteger(value)) throw invalid(attribute, raw);
      if (attribute.bits !== undefined) {
        const [min, max] = INTEGER_RANGE[attribute.bits];
        if (value < min || value > max) {
          throw outOfDomain(attribute, raw, `is outside the ${attribute.bits}-bit integer range`);
        }
      }
      return value;
    }

    case 'boolean': {
      if (typeof raw === 'boolean') return raw;
      if (typeof raw === 'number' && (raw === 0 || raw === 1)) return raw === 1;
      if (typeof raw === 'string') {
        const word = raw.trim().toLowerCase();
        if (TRUE_WORDS.has(word)) return true;
        if (FALSE_WORDS.has(word)) return false;
      }
      throw invalid(attribute, raw);
    }

    case 'date': {
      if (raw instanceof Date) {
        if (Number.isNaN(raw.getTime())) throw invalid(attribute, raw);
        return toIsoDate(raw);
      }
      if (typeof raw === 'string' && isIsoDate(raw.trim())) return raw.trim();
      throw invalid(attribute, raw);
    }
  }
}

/**
 * Canonical form of a value read back from a store. Column facets are the
 * store's to enforce, so only the type applies.
 */
export function decodeStoredValue(attribute: AttributeDefinition, raw: unknown): AttributeValue {
  return normalizeValue({ name: attribute.name, type: attribute.type, tracked_as: attribute.tracked_as }, raw);
}

/**
 * Normalize an incoming attribute set against the dimension's definition.
 * Undeclared attributes are rejected; declared attributes that are absent become null.
 */
export function normalizeAttributes(
  definition: DimensionDefinition,
  raw: Record<string, unknown>,
): Attributes {
  const declared = new Set(definition.attributes.map((a) => a.name));
  const unknown = Object.keys(raw).filter((name) => !declared.has(name));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown attribute(s) for dimension ${definition.dimension_id}: ${unknown.join(', ')}`,
      unknown[0],
      { unknown },
    );
  }

  const normalized: Attributes = {};
  for (const attribute of definition.attributes) {
    normalized[attribute.name] = normalizeValue(attribute, raw[attribute.name]);
  }
  return normalized;
}
