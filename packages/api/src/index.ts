import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
  createPool,
  runMigrations,
  loadConfig,
  loadDimensionDefinitions,
  getLogger,
  loggerOptions,
  DimensionRegistry,
  DimensionVersionManager,
  PgDimensionStore,
  PgSequenceAllocator,
} from '@bankdw/core';
import { createServer } from './server.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const log = getLogger('api');

async function main() {
  const config = loadConfig();
  const pool = createPool(config.database);

  if (config.runMigrations) {
    const migrationsDir = join(__dirname, '../../../migrations');
    await runMigrations(pool, migrationsDir);
  }

  // Wire services
  const registry = new DimensionRegistry(loadDimensionDefinitions(config.dimensionsFile));
  const store = new PgDimensionStore(pool);
  const allocator = new PgSequenceAllocator(pool);
  const manager = new DimensionVersionManager(store, allocator, registry, {
    maxAttempts: config.maxAttempts,
  });
  await manager.prepare();

  const server = createServer({
    store,
    manager,
    registry,
    logger: { ...loggerOptions, level: config.logLevel },
  });

  await server.listen({ port: config.port, host: '0.0.0.0' });
  log.info({ port: config.port, dimensions: registry.list().length }, 'dimension API listening');

  // Graceful shutdown
  const shutdown = async () => {
    await server.close();
    await pool.end();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((err) => {
  log.fatal({ err }, 'failed to start server');
  process.exit(1);
});
