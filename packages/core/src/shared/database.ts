import pg from 'pg';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getLogger } from '../observability/logger.js';

// DATE (OID 1082) stays a raw YYYY-MM-DD string; a JS Date would shift it by the local offset
pg.types.setTypeParser(1082, (val: string) => val);

const log = getLogger('database');

/** The slice of a pg client the stores use. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

/** The slice of pg.Pool the stores use; pg.Pool satisfies it. */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max?: number;
}

export function createPool(config: DatabaseConfig): pg.Pool {
  const pool = new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max ?? 10,
  });
  pool.on('error', (error) => {
    log.error({ err: error }, 'idle client error');
  });
  return pool;
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated pooled client, rolling back on any error.
 */
export async function withTransaction<T>(
  pool: SqlPool,
  fn: (client: SqlClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function runMigrations(pool: SqlPool, migrationsDir: string): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((f) => f.endsWith('.sql')).sort();
  const applied: string[] = [];

  for (const file of sqlFiles) {
    const version = file.replace('.sql', '');

    const { rows } = await pool.query(
      'SELECT version FROM schema_migrations WHERE version = $1',
      [version],
    );

    if (rows.length > 0) continue;

    const sql = await readFile(join(migrationsDir, file), 'utf-8');
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    });
    log.info({ version }, 'migration applied');
    applied.push(version);
  }

  return applied;
}
