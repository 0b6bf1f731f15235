import { describe, it, expect } from 'vitest';
import { DimensionVersionManager, type DimensionVersionManagerOptions } from './dimension-version-manager.js';
import { InMemorySurrogateKeyAllocator } from './surrogate-key-allocator.js';
import { auditChain } from './chain-audit.js';
import { InMemoryDimensionStore } from '../store/in-memory-dimension-store.js';
import type { DimensionStoreTransaction } from '../store/types.js';
import { DimensionRegistry } from '../dimensions/registry.js';
import type { AsOfRecord, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import {
  ConcurrentModificationError,
  DimensionStoreError,
  InvalidAsOfDateError,
  UnknownDimensionError,
  ValidationError,
} from '../shared/errors.js';
import {
  collateralDefinition,
  customerDefinition,
  customerVersion,
  geographyDefinition,
} from '../testing/fixtures.js';

function setup(store = new InMemoryDimensionStore(), options: DimensionVersionManagerOptions = {}) {
  const allocator = new InMemorySurrogateKeyAllocator();
  const registry = new DimensionRegistry([customerDefinition, geographyDefinition, collateralDefinition]);
  const manager = new DimensionVersionManager(store, allocator, registry, options);
  return { store, allocator, registry, manager };
}

function customer(
  asOfDate: string,
  attributes: Record<string, unknown>,
  naturalKey = 'C001',
): AsOfRecord {
  return { dimension_id: 'customer', natural_key: naturalKey, as_of_date: asOfDate, attributes };
}

const ANA = { full_name: 'Ana Silva', risk_rating: 'LOW', branch_sk: 10 };

/** Holds the first `parties` current-version reads until all of them have happened. */
class GatedStore extends InMemoryDimensionStore {
  private reads = 0;
  private open?: () => void;
  private readonly gate: Promise<void>;

  constructor(private readonly parties: number) {
    super();
    this.gate = new Promise((resolve) => {
      this.open = resolve;
    });
  }

  async findCurrent(definition: DimensionDefinition, naturalKey: string): Promise<DimensionVersion[]> {
    const rows = await super.findCurrent(definition, naturalKey);
    this.reads++;
    if (this.reads <= this.parties) {
      if (this.reads === this.parties) this.open?.();
      await this.gate;
    }
    return rows;
  }
}

/** Every write loses to a concurrent writer. */
class ConflictingStore extends InMemoryDimensionStore {
  transactions = 0;

  async transaction<T>(_fn: (tx: DimensionStoreTransaction) => Promise<T>): Promise<T> {
    this.transactions++;
    throw new ConcurrentModificationError('customer', 'C001', null);
  }
}

class FailingStore extends InMemoryDimensionStore {
  async findCurrent(): Promise<DimensionVersion[]> {
    throw new DimensionStoreError('Failed to read current customer version: connection refused');
  }
}

describe('DimensionVersionManager', () => {
  describe('apply', () => {
    it('should walk a customer through new entity, correction and new version', async () => {
      const { manager } = setup();

      const created = await manager.apply(customer('2024-01-01', { ...ANA, risk_rating: 'low' }));
      expect(created.verdict).toBe('NEW_ENTITY');
      expect(created.attempts).toBe(1);
      expect(created.current).toEqual({
        surrogate_key: 1,
        natural_key: 'C001',
        attributes: {
          full_name: 'Ana Silva',
          risk_rating: 'LOW',
          branch_sk: 10,
          relationship_tenure_yrs: null,
          pep_flag: null,
          kyc_expiry_date: null,
        },
        effective_from: '2024-01-01',
        effective_to: null,
        is_current: true,
      });

      const corrected = await manager.apply(customer('2024-03-15', { ...ANA, full_name: 'Ana M. Silva' }));
      expect(corrected.verdict).toBe('TYPE1_UPDATE');
      expect(corrected.changed).toEqual({ type1: ['full_name'], type2: [] });
      expect(corrected.current.surrogate_key).toBe(1);
      expect(corrected.current.effective_from).toBe('2024-01-01');
      expect(corrected.current.attributes.full_name).toBe('Ana M. Silva');

      const versioned = await manager.apply(
        customer('2024-06-01', { ...ANA, full_name: 'Ana M. Silva', risk_rating: 'HIGH' }),
      );
      expect(versioned.verdict).toBe('TYPE2_VERSION');
      expect(versioned.current.surrogate_key).toBe(2);
      expect(versioned.current.effective_from).toBe('2024-06-01');
      expect(versioned.closed?.surrogate_key).toBe(1);
      expect(versioned.closed?.effective_to).toBe('2024-06-01');
      expect(versioned.closed?.is_current).toBe(false);

      const before = await manager.versionAsOf('customer', 'C001', '2024-05-31');
      expect(before?.surrogate_key).toBe(1);
      expect(before?.attributes.risk_rating).toBe('LOW');
      expect(before?.attributes.full_name).toBe('Ana M. Silva');
      expect((await manager.versionAsOf('customer', 'C001', '2024-06-01'))?.surrogate_key).toBe(2);
      expect(await manager.versionAsOf('customer', 'C001', '2023-12-31')).toBeNull();

      const history = await manager.allVersions('customer', 'C001').toArray();
      expect(history.map((v) => [v.surrogate_key, v.effective_from, v.effective_to])).toEqual([
        [1, '2024-01-01', '2024-06-01'],
        [2, '2024-06-01', null],
      ]);
    });

    it('should be idempotent for a repeated record', async () => {
      const { manager, allocator } = setup();
      await manager.apply(customer('2024-01-01', ANA));

      const repeat = await manager.apply(customer('2024-01-01', { ...ANA, risk_rating: ' low ' }));
      const later = await manager.apply(customer('2024-02-01', ANA));

      expect(repeat.verdict).toBe('NO_CHANGE');
      expect(later.verdict).toBe('NO_CHANGE');
      expect(later.current.effective_from).toBe('2024-01-01');
      expect(await manager.allVersions('customer', 'C001').toArray()).toHaveLength(1);
      expect(allocator.peek(customerDefinition)).toBe(1);
    });

    it('should reject an out-of-order record without touching the store', async () => {
      const { manager, allocator } = setup();
      await manager.apply(customer('2024-06-01', ANA));

      await expect(
        manager.apply(customer('2024-05-01', { ...ANA, risk_rating: 'HIGH' })),
      ).rejects.toBeInstanceOf(InvalidAsOfDateError);
      await expect(manager.apply(customer('2024-05-01', ANA))).rejects.toBeInstanceOf(InvalidAsOfDateError);

      const history = await manager.allVersions('customer', 'C001').toArray();
      expect(history).toHaveLength(1);
      expect(history[0].attributes.risk_rating).toBe('LOW');
      expect(allocator.peek(customerDefinition)).toBe(1);
    });

    it('should close a same-day version with an empty interval', async () => {
      const { manager } = setup();
      await manager.apply(customer('2024-06-01', ANA));

      const result = await manager.apply(customer('2024-06-01', { ...ANA, risk_rating: 'HIGH' }));

      expect(result.verdict).toBe('TYPE2_VERSION');
      expect(result.closed?.effective_from).toBe('2024-06-01');
      expect(result.closed?.effective_to).toBe('2024-06-01');
      expect((await manager.versionAsOf('customer', 'C001', '2024-06-01'))?.surrogate_key).toBe(2);
      expect(await manager.allVersions('customer', 'C001').toArray()).toHaveLength(2);
      expect((await manager.auditNaturalKey('customer', 'C001')).violations).toEqual([]);
    });

    it('should fold TYPE1 changes into the new version on a TYPE2 change', async () => {
      const { manager } = setup();
      await manager.apply(customer('2024-01-01', ANA));

      const result = await manager.apply(
        customer('2024-02-01', { ...ANA, full_name: 'Ana M. Silva', branch_sk: '11' }),
      );

      expect(result.verdict).toBe('TYPE2_VERSION');
      expect(result.current.attributes.full_name).toBe('Ana M. Silva');
      expect(result.current.attributes.branch_sk).toBe(11);
      expect(result.closed?.attributes.full_name).toBe('Ana Silva');
    });

    it('should trim the natural key', async () => {
      const { manager } = setup();

      const result = await manager.apply(customer('2024-01-01', ANA, '  C001  '));

      expect(result.natural_key).toBe('C001');
      expect((await manager.currentVersion('customer', 'C001'))?.surrogate_key).toBe(1);
    });

    it('should validate records before reading the store', async () => {
      const { manager } = setup();

      await expect(
        manager.apply({ dimension_id: 'product', natural_key: 'P1', as_of_date: '2024-01-01', attributes: {} }),
      ).rejects.toBeInstanceOf(UnknownDimensionError);
      await expect(manager.apply(customer('2024-13-01', ANA))).rejects.toBeInstanceOf(ValidationError);
      await expect(manager.apply(customer('2024-01-01', ANA, ' '))).rejects.toBeInstanceOf(ValidationError);
      await expect(
        manager.apply(customer('2024-01-01', { ...ANA, nickname: 'Ana' })),
      ).rejects.toMatchObject({ code: 'VALIDATION_FAILED', field: 'nickname' });
    });
  });

  describe('concurrency', () => {
    it('should let one of two concurrent writers version the key and the other observe it', async () => {
      const store = new GatedStore(2);
      store.importVersions(customerDefinition, [customerVersion()]);
      const { manager } = setup(store);
      await manager.prepare();

      const change = { ...customerVersion().attributes, risk_rating: 'HIGH' };
      const results = await Promise.all([
        manager.apply(customer('2024-06-01', change)),
        manager.apply(customer('2024-06-01', change)),
      ]);

      const outcomes = results.map((r) => [r.verdict, r.attempts]).sort();
      expect(outcomes).toEqual([
        ['NO_CHANGE', 2],
        ['TYPE2_VERSION', 1],
      ]);

      const history = await manager.allVersions('customer', 'C001').toArray();
      expect(history).toHaveLength(2);
      expect(history.filter((v) => v.is_current)).toHaveLength(1);
      expect(auditChain(history)).toEqual([]);
    });

    it('should surface the conflict after maxAttempts attempts', async () => {
      const store = new ConflictingStore();
      const { manager, allocator } = setup(store, { maxAttempts: 3 });

      await expect(manager.apply(customer('2024-01-01', ANA))).rejects.toBeInstanceOf(
        ConcurrentModificationError,
      );
      expect(store.transactions).toBe(3);
      // keys allocated for the lost attempts are burned, never reissued
      expect(allocator.peek(customerDefinition)).toBe(3);
    });

    it('should refuse a non-positive attempt budget', () => {
      expect(() => setup(new InMemoryDimensionStore(), { maxAttempts: 0 })).toThrow(ValidationError);
    });
  });

  describe('applyAll', () => {
    it('should apply records in order and count each verdict', async () => {
      const { manager } = setup();

      const summary = await manager.applyAll([
        customer('2024-01-01', ANA),
        customer('2024-01-01', { full_name: 'Rui Costa', risk_rating: 'MEDIUM' }, 'C002'),
        customer('2024-02-01', { ...ANA, risk_rating: 'HIGH' }),
        customer('2024-02-01', { ...ANA, risk_rating: 'HIGH' }),
        customer('2024-03-01', { full_name: 'Rui A. Costa', risk_rating: 'MEDIUM' }, 'C002'),
        customer('2024-01-15', ANA),
        customer('2024-04-01', { ...ANA, segment: 'RETAIL' }),
      ]);

      expect(summary.processed).toBe(7);
      expect(summary.applied).toEqual({
        NO_CHANGE: 1,
        TYPE1_UPDATE: 1,
        TYPE2_VERSION: 1,
        NEW_ENTITY: 2,
      });
      expect(summary.failed).toBe(2);
      expect(summary.failures.map((f) => [f.index, f.natural_key, f.error_code])).toEqual([
        [5, 'C001', 'INVALID_AS_OF_DATE'],
        [6, 'C001', 'VALIDATION_FAILED'],
      ]);
      expect(summary.batch_id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should halt a natural key after an ambiguous current version', async () => {
      const store = new InMemoryDimensionStore();
      store.importVersions(customerDefinition, [
        customerVersion({ surrogate_key: 1, natural_key: 'C009' }),
        customerVersion({ surrogate_key: 2, natural_key: 'C009', effective_from: '2024-02-01' }),
      ]);
      const { manager } = setup(store);
      await manager.prepare();

      async function* records(): AsyncGenerator<AsOfRecord> {
        yield customer('2024-06-01', ANA, 'C009');
        yield customer('2024-07-01', ANA, 'C009');
        yield customer('2024-06-01', ANA, 'C010');
      }
      const summary = await manager.applyAll(records());

      expect(summary.applied.NEW_ENTITY).toBe(1);
      expect(summary.failures.map((f) => [f.index, f.error_code])).toEqual([
        [0, 'AMBIGUOUS_CURRENT_VERSION'],
        [1, 'NATURAL_KEY_HALTED'],
      ]);
      expect((await manager.currentVersion('customer', 'C010'))?.surrogate_key).toBe(3);
    });

    it('should fail out-of-domain values per record and keep loading', async () => {
      const { manager } = setup();
      const collateral = (naturalKey: string, attributes: Record<string, unknown>): AsOfRecord => ({
        dimension_id: 'collateral',
        natural_key: naturalKey,
        as_of_date: '2024-01-01',
        attributes,
      });

      const summary = await manager.applyAll([
        collateral('COL-1', { status: 'UNKNOWN' }),
        collateral('COL-2', { location_country_sk: 3000000000 }),
        collateral('COL-3', { collateral_description: 'x'.repeat(21) }),
        collateral('COLLATERAL-0004', { status: 'ACTIVE' }),
        collateral('COL-5', { status: 'active', market_value: '250000.125' }),
      ]);

      expect(summary.applied.NEW_ENTITY).toBe(1);
      expect(summary.failures.map((f) => [f.index, f.error_code])).toEqual([
        [0, 'VALIDATION_FAILED'],
        [1, 'VALIDATION_FAILED'],
        [2, 'VALIDATION_FAILED'],
        [3, 'VALIDATION_FAILED'],
      ]);
      const loaded = await manager.currentVersion('collateral', 'COL-5');
      expect(loaded?.attributes.market_value).toBe('250000.13');
    });

    it('should abort the load on a store failure', async () => {
      const { manager } = setup(new FailingStore());

      await expect(manager.applyAll([customer('2024-01-01', ANA)])).rejects.toBeInstanceOf(
        DimensionStoreError,
      );
    });
  });

  describe('queries', () => {
    it('should advance allocators past stored keys on prepare', async () => {
      const store = new InMemoryDimensionStore();
      store.importVersions(customerDefinition, [customerVersion({ surrogate_key: 41 })]);
      const { manager } = setup(store);

      expect(await manager.prepare()).toEqual({ customer: 41, geography: 0, collateral: 0 });

      const created = await manager.apply(customer('2024-01-01', ANA, 'C002'));
      expect(created.current.surrogate_key).toBe(42);
    });

    it('should return null for a natural key never loaded', async () => {
      const { manager } = setup();

      expect(await manager.currentVersion('customer', 'C404')).toBeNull();
      expect(await manager.versionAsOf('customer', 'C404', '2024-01-01')).toBeNull();
    });

    it('should reject an invalid query date', async () => {
      const { manager } = setup();

      await expect(manager.versionAsOf('customer', 'C001', '01/06/2024')).rejects.toBeInstanceOf(
        ValidationError,
      );
    });

    it('should restart history iteration from the first version', async () => {
      const { manager } = setup();
      await manager.apply(customer('2024-01-01', ANA));
      await manager.apply(customer('2024-02-01', { ...ANA, risk_rating: 'MEDIUM' }));
      await manager.apply(customer('2024-03-01', { ...ANA, risk_rating: 'HIGH' }));

      const history = manager.allVersions('customer', 'C001', 1);
      const passes: number[][] = [];
      for (let pass = 0; pass < 2; pass++) {
        const keys: number[] = [];
        for await (const version of history) keys.push(version.surrogate_key);
        passes.push(keys);
      }

      expect(passes).toEqual([
        [1, 2, 3],
        [1, 2, 3],
      ]);
    });

    it('should report a consistent chain and raise for unknown keys on audit', async () => {
      const { manager } = setup();
      await manager.apply(customer('2024-01-01', ANA));
      await manager.apply(customer('2024-02-01', { ...ANA, risk_rating: 'HIGH' }));

      expect(await manager.auditNaturalKey('customer', 'C001')).toEqual({
        dimension_id: 'customer',
        natural_key: 'C001',
        version_count: 2,
        violations: [],
      });
      await expect(manager.auditNaturalKey('customer', 'C404')).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  describe('chain invariants', () => {
    it('should keep every chain contiguous with exactly one current version', async () => {
      const { manager } = setup();
      const ratings = ['LOW', 'LOW', 'MEDIUM', 'MEDIUM', 'HIGH', 'LOW', 'VERY_HIGH', 'VERY_HIGH'];
      const names = ['Ana Silva', 'Ana Silva', 'Ana Silva', 'Ana M. Silva', 'Ana M. Silva', 'Ana M. Silva', 'A. Silva', 'A. Silva'];
      const dates = ['2024-01-01', '2024-01-10', '2024-01-10', '2024-02-01', '2024-03-01', '2024-03-01', '2024-04-15', '2024-05-01'];

      for (const key of ['C001', 'C002', 'C003']) {
        for (let i = 0; i < dates.length; i++) {
          await manager.apply(
            customer(dates[i], { full_name: names[i], risk_rating: ratings[i], branch_sk: 10 }, key),
          );

          const history = await manager.allVersions('customer', key).toArray();
          expect(auditChain(history)).toEqual([]);
          expect(history.filter((v) => v.is_current)).toHaveLength(1);
        }
      }

      const history = await manager.allVersions('customer', 'C002').toArray();
      expect(history.map((v) => v.attributes.risk_rating)).toEqual([
        'LOW',
        'MEDIUM',
        'HIGH',
        'LOW',
        'VERY_HIGH',
      ]);
      const keys = history.map((v) => v.surrogate_key);
      expect([...keys].sort((a, b) => a - b)).toEqual(keys);
    });
  });
});
