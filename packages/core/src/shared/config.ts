import type { DatabaseConfig } from './database.js';
import { getBoolean, getNumber, getOptionalString, getString } from './env.js';

export interface AppConfig {
  database: DatabaseConfig;
  port: number;
  logLevel: string;
  maxAttempts: number;
  /** Overrides the bundled config/dimensions.yaml. */
  dimensionsFile?: string;
  runMigrations: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const maxAttempts = getNumber('SCD_MAX_ATTEMPTS', 3, env);
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`SCD_MAX_ATTEMPTS must be a positive integer, got ${maxAttempts}`);
  }

  return {
    database: {
      host: getString('DB_HOST', 'localhost', env),
      port: getNumber('DB_PORT', 5432, env),
      database: getString('DB_NAME', 'banking_dw', env),
      user: getString('DB_USER', 'banking_dw', env),
      password: getString('DB_PASSWORD', 'banking_dw', env),
      max: getNumber('DB_POOL_MAX', 10, env),
    },
    port: getNumber('PORT', 3000, env),
    logLevel: getString('LOG_LEVEL', 'info', env),
    maxAttempts,
    dimensionsFile: getOptionalString('DIMENSIONS_FILE', env),
    runMigrations: getBoolean('RUN_MIGRATIONS', true, env),
  };
}
