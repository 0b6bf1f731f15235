#!/usr/bin/env tsx
/**
 * Advance every dimension's surrogate key sequence past the keys already
 * stored. Run after a bulk load that wrote surrogate keys explicitly.
 *
 * Usage:
 *   npm run reset-sequences
 */

import {
  createPool,
  loadConfig,
  loadDimensionDefinitions,
  resetSequences,
} from '@bankdw/core';

async function main() {
  const config = loadConfig();
  const definitions = loadDimensionDefinitions(config.dimensionsFile);
  const pool = createPool(config.database);

  try {
    const next = await resetSequences(pool, definitions);
    for (const definition of definitions) {
      console.log(
        `  ${definition.schema}.${definition.table}`.padEnd(36) +
          `next ${definition.surrogate_key_column} = ${next[definition.dimension_id]}`,
      );
    }
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error('Sequence reset failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
