import { describe, it, expect } from 'vitest';
import { NaturalKeyResolver, normalizeNaturalKey } from './natural-key-resolver.js';
import { InMemoryDimensionStore } from '../store/in-memory-dimension-store.js';
import { AmbiguousCurrentVersionError, ValidationError } from '../shared/errors.js';
import { customerDefinition, customerVersion } from '../testing/fixtures.js';

describe('NaturalKeyResolver', () => {
  it('should return null for a natural key never loaded', async () => {
    const resolver = new NaturalKeyResolver(new InMemoryDimensionStore());

    expect(await resolver.resolveCurrent(customerDefinition, 'C404')).toBeNull();
  });

  it('should return the single current version and never a closed one', async () => {
    const store = new InMemoryDimensionStore();
    store.importVersions(customerDefinition, [
      customerVersion({ surrogate_key: 1, effective_to: '2024-06-01', is_current: false }),
      customerVersion({ surrogate_key: 2, effective_from: '2024-06-01' }),
    ]);
    const resolver = new NaturalKeyResolver(store);

    const current = await resolver.resolveCurrent(customerDefinition, 'C001');

    expect(current?.surrogate_key).toBe(2);
  });

  it('should raise AmbiguousCurrentVersionError naming every current surrogate key', async () => {
    const store = new InMemoryDimensionStore();
    store.importVersions(customerDefinition, [
      customerVersion({ surrogate_key: 1 }),
      customerVersion({ surrogate_key: 7, effective_from: '2024-06-01' }),
    ]);
    const resolver = new NaturalKeyResolver(store);

    await expect(resolver.resolveCurrent(customerDefinition, 'C001')).rejects.toMatchObject({
      name: 'AmbiguousCurrentVersionError',
      surrogateKeys: [1, 7],
    });
    await expect(resolver.resolveCurrent(customerDefinition, 'C001')).rejects.toBeInstanceOf(
      AmbiguousCurrentVersionError,
    );
  });

  describe('normalizeNaturalKey', () => {
    it('should trim surrounding whitespace', () => {
      expect(normalizeNaturalKey('  C001 ')).toBe('C001');
    });

    it('should reject empty keys', () => {
      expect(() => normalizeNaturalKey('   ')).toThrow(ValidationError);
      expect(() => normalizeNaturalKey(undefined)).toThrow(ValidationError);
    });

    it('should reject keys longer than the column after trimming', () => {
      expect(normalizeNaturalKey(' PRT ', 3)).toBe('PRT');
      expect(() => normalizeNaturalKey('PRTX', 3)).toThrow('natural_key must be at most 3 characters');
    });
  });
});
