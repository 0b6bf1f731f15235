/**
 * Typed environment variable access.
 */

type Env = Record<string, string | undefined>;

function readRaw(name: string, env: Env): string | undefined {
  const raw = env[name];
  return raw != null && raw !== '' ? raw : undefined;
}

export function getString(name: string, defaultValue: string, env: Env = process.env): string {
  return readRaw(name, env) ?? defaultValue;
}

export function getOptionalString(name: string, env: Env = process.env): string | undefined {
  return readRaw(name, env);
}

export function getNumber(name: string, defaultValue: number, env: Env = process.env): number {
  const raw = readRaw(name, env);
  if (raw === undefined) return defaultValue;
  const n = Number(raw);
  if (Number.isNaN(n)) {
    throw new Error(`Env var ${name} is not a number: ${raw}`);
  }
  return n;
}

export function getBoolean(name: string, defaultValue: boolean, env: Env = process.env): boolean {
  const raw = readRaw(name, env);
  if (raw === undefined) return defaultValue;
  const lowered = raw.toLowerCase();
  if (['1', 'true', 'yes', 'y'].includes(lowered)) return true;
  if (['0', 'false', 'no', 'n'].includes(lowered)) return false;
  throw new Error(`Env var ${name} is not a boolean: ${raw}`);
}
