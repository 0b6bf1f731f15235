import { ConcurrentModificationError } from '../shared/errors.js';
import { compareIsoDates } from '../shared/dates.js';
import { compareVersions } from '../scd/chain-audit.js';
import type { Attributes, DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import {
  DEFAULT_PAGE_SIZE,
  type DimensionStore,
  type DimensionStoreTransaction,
  type ListVersionsParams,
  type VersionPage,
} from './types.js';

type Chains = Map<string, DimensionVersion[]>;

function chainKey(dimensionId: string, naturalKey: string): string {
  return `${dimensionId}\u0000${naturalKey}`;
}

function copy(version: DimensionVersion): DimensionVersion {
  return { ...version, attributes: { ...version.attributes } };
}

/**
 * Transaction over a committed snapshot: writes go to a private copy of each
 * touched chain and are published only on commit.
 */
class InMemoryTransaction implements DimensionStoreTransaction {
  readonly staged: Chains = new Map();

  constructor(private readonly committed: Chains) {}

  private chain(dimensionId: string, naturalKey: string): DimensionVersion[] {
    const key = chainKey(dimensionId, naturalKey);
    let chain = this.staged.get(key);
    if (!chain) {
      chain = (this.committed.get(key) ?? []).map(copy);
      this.staged.set(key, chain);
    }
    return chain;
  }

  private currentOrConflict(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
  ): DimensionVersion {
    const version = this.chain(definition.dimension_id, naturalKey).find(
      (v) => v.surrogate_key === surrogateKey && v.is_current,
    );
    if (!version) {
      throw new ConcurrentModificationError(definition.dimension_id, naturalKey, surrogateKey);
    }
    return version;
  }

  async closeVersion(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
    effectiveTo: string,
  ): Promise<DimensionVersion> {
    const version = this.currentOrConflict(definition, naturalKey, surrogateKey);
    version.effective_to = effectiveTo;
    version.is_current = false;
    return copy(version);
  }

  async insertVersion(
    definition: DimensionDefinition,
    version: DimensionVersion,
  ): Promise<DimensionVersion> {
    const chain = this.chain(definition.dimension_id, version.natural_key);
    if (version.is_current && chain.some((v) => v.is_current)) {
      throw new ConcurrentModificationError(definition.dimension_id, version.natural_key, null);
    }
    const stored = copy(version);
    chain.push(stored);
    return copy(stored);
  }

  async updateAttributes(
    definition: DimensionDefinition,
    naturalKey: string,
    surrogateKey: number,
    attributes: Attributes,
  ): Promise<DimensionVersion> {
    const version = this.currentOrConflict(definition, naturalKey, surrogateKey);
    version.attributes = { ...version.attributes, ...attributes };
    return copy(version);
  }
}

/**
 * Process-local dimension store. Transactions run one at a time, so each sees
 * the effects of every transaction committed before it.
 */
export class InMemoryDimensionStore implements DimensionStore {
  private readonly chains: Chains = new Map();
  private readonly highWater = new Map<string, number>();
  private queue: Promise<void> = Promise.resolve();

  async findCurrent(definition: DimensionDefinition, naturalKey: string): Promise<DimensionVersion[]> {
    return this.chainOf(definition, naturalKey)
      .filter((v) => v.is_current)
      .map(copy);
  }

  async findAsOf(
    definition: DimensionDefinition,
    naturalKey: string,
    date: string,
  ): Promise<DimensionVersion | null> {
    const matches = this.chainOf(definition, naturalKey)
      .filter(
        (v) =>
          compareIsoDates(v.effective_from, date) <= 0 &&
          (v.effective_to === null || compareIsoDates(v.effective_to, date) > 0),
      )
      .sort(compareVersions);
    const match = matches[matches.length - 1];
    return match ? copy(match) : null;
  }

  async listVersions(
    definition: DimensionDefinition,
    naturalKey: string,
    params: ListVersionsParams = {},
  ): Promise<VersionPage> {
    const limit = params.limit ?? DEFAULT_PAGE_SIZE;
    const after = params.after;
    const ordered = [...this.chainOf(definition, naturalKey)].sort(compareVersions);
    const remaining = after
      ? ordered.filter(
          (v) =>
            compareIsoDates(v.effective_from, after.effective_from) > 0 ||
            (v.effective_from === after.effective_from && v.surrogate_key > after.surrogate_key),
        )
      : ordered;

    const versions = remaining.slice(0, limit).map(copy);
    const hasMore = remaining.length > limit;
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
    return this.highWater.get(definition.dimension_id) ?? 0;
  }

  async transaction<T>(fn: (tx: DimensionStoreTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(fn));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async ping(): Promise<void> {}

  /**
   * Load versions verbatim, bypassing every SCD check (bulk history import).
   */
  importVersions(definition: DimensionDefinition, versions: DimensionVersion[]): void {
    for (const version of versions) {
      const key = chainKey(definition.dimension_id, version.natural_key);
      const chain = this.chains.get(key) ?? [];
      chain.push(copy(version));
      this.chains.set(key, chain);
      this.bumpHighWater(definition.dimension_id, version.surrogate_key);
    }
  }

  private chainOf(definition: DimensionDefinition, naturalKey: string): DimensionVersion[] {
    return this.chains.get(chainKey(definition.dimension_id, naturalKey)) ?? [];
  }

  private bumpHighWater(dimensionId: string, surrogateKey: number): void {
    if (surrogateKey > (this.highWater.get(dimensionId) ?? 0)) {
      this.highWater.set(dimensionId, surrogateKey);
    }
  }

  private async runTransaction<T>(fn: (tx: DimensionStoreTransaction) => Promise<T>): Promise<T> {
    const tx = new InMemoryTransaction(this.chains);
    const result = await fn(tx);
    for (const [key, chain] of tx.staged) {
      this.chains.set(key, chain);
      const dimensionId = key.slice(0, key.indexOf('\u0000'));
      for (const version of chain) {
        this.bumpHighWater(dimensionId, version.surrogate_key);
      }
    }
    return result;
  }
}
