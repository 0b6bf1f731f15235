#!/usr/bin/env tsx
/**
 * Load an NDJSON file of as-of records into the dimension tables.
 *
 * Usage:
 *   npm run load -- records.ndjson
 *   npm run load -- records.ndjson --dry-run   # apply against an empty in-memory store
 *
 * One record per line: {"dimension_id","natural_key","as_of_date","attributes"}.
 * Records are applied in file order. Lines that are not JSON or not a record are
 * listed as malformed and skipped; the rest of the file still loads.
 */

import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import {
  createPool,
  loadConfig,
  loadDimensionDefinitions,
  readAsOfRecords,
  DimensionRegistry,
  DimensionVersionManager,
  InMemoryDimensionStore,
  InMemorySurrogateKeyAllocator,
  PgDimensionStore,
  PgSequenceAllocator,
} from '@bankdw/core';
import type { LoadSummary, MalformedLine } from '@bankdw/core';

const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';

function green(s: string): string { return `${GREEN}${s}${RESET}`; }
function red(s: string): string { return `${RED}${s}${RESET}`; }
function dim(s: string): string { return `${DIM}${s}${RESET}`; }

function lines(filePath: string) {
  return createInterface({ input: createReadStream(filePath), crlfDelay: Infinity });
}

function printSummary(filePath: string, summary: LoadSummary, malformed: MalformedLine[]): void {
  console.log(`\n${BOLD}Load ${summary.batch_id}${RESET}`);
  console.log(`  processed      ${summary.processed}`);
  for (const [verdict, count] of Object.entries(summary.applied)) {
    console.log(`  ${verdict.toLowerCase().padEnd(14)} ${count}`);
  }
  console.log(`  failed         ${summary.failed > 0 ? red(String(summary.failed)) : green('0')}`);
  for (const failure of summary.failures) {
    console.log(
      dim(`    #${failure.index} ${failure.dimension_id}/${failure.natural_key} ${failure.error_code}: `) +
        failure.message,
    );
  }
  console.log(`  malformed      ${malformed.length > 0 ? red(String(malformed.length)) : green('0')}`);
  for (const entry of malformed) {
    console.log(dim(`    ${filePath}:${entry.line}: `) + entry.message);
  }
}

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const filePath = args.find((a) => !a.startsWith('--'));
  if (!filePath) {
    console.error('Usage: load-records <file.ndjson> [--dry-run]');
    process.exit(2);
  }

  const config = loadConfig();
  const registry = new DimensionRegistry(loadDimensionDefinitions(config.dimensionsFile));

  if (dryRun) {
    const manager = new DimensionVersionManager(
      new InMemoryDimensionStore(),
      new InMemorySurrogateKeyAllocator(),
      registry,
      { maxAttempts: config.maxAttempts },
    );
    const malformed: MalformedLine[] = [];
    const summary = await manager.applyAll(readAsOfRecords(lines(filePath), malformed));
    printSummary(filePath, summary, malformed);
    process.exit(summary.failed > 0 || malformed.length > 0 ? 1 : 0);
  }

  const pool = createPool(config.database);
  try {
    const manager = new DimensionVersionManager(
      new PgDimensionStore(pool),
      new PgSequenceAllocator(pool),
      registry,
      { maxAttempts: config.maxAttempts },
    );
    await manager.prepare();
    const malformed: MalformedLine[] = [];
    const summary = await manager.applyAll(readAsOfRecords(lines(filePath), malformed));
    printSummary(filePath, summary, malformed);
    process.exitCode = summary.failed > 0 || malformed.length > 0 ? 1 : 0;
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error(red('Load failed:'), err instanceof Error ? err.message : err);
  process.exit(1);
});
