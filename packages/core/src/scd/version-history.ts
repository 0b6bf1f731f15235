import type { DimensionDefinition, DimensionVersion } from '../dimensions/types.js';
import type { DimensionStore, VersionCursor } from '../store/types.js';

/**
 * Every version of a natural key, ordered by (effective_from, surrogate_key).
 * Pages are read lazily; each `for await` starts again from the first version.
 */
export class VersionHistory implements AsyncIterable<DimensionVersion> {
  constructor(
    private readonly store: DimensionStore,
    private readonly definition: DimensionDefinition,
    private readonly naturalKey: string,
    private readonly pageSize?: number,
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<DimensionVersion> {
    let after: VersionCursor | undefined;
    for (;;) {
      const page = await this.store.listVersions(this.definition, this.naturalKey, {
        after,
        limit: this.pageSize,
      });
      yield* page.versions;
      if (!page.has_more || !page.next_cursor) return;
      after = page.next_cursor;
    }
  }

  async toArray(): Promise<DimensionVersion[]> {
    const versions: DimensionVersion[] = [];
    for await (const version of this) {
      versions.push(version);
    }
    return versions;
  }
}
