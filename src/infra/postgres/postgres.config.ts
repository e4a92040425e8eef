import type { PoolConfig } from 'pg';

/**
 * Environment variable names for Postgres access.
 * The PG* names match what libpq and node-postgres already understand.
 */
export const ENV_DATABASE_URL = 'DATABASE_URL';
export const ENV_PG_HOST = 'PGHOST';
export const ENV_PG_PORT = 'PGPORT';
export const ENV_PG_USER = 'PGUSER';
export const ENV_PG_PASSWORD = 'PGPASSWORD';
export const ENV_PG_DATABASE = 'PGDATABASE';
export const ENV_PG_POOL_MAX = 'PG_POOL_MAX';
export const ENV_PG_SSL = 'PG_SSL';

export interface PostgresConfig {
  /** Full connection string; wins over the discrete fields when set. */
  readonly connectionString?: string;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  /** Upper bound on pooled connections. */
  readonly poolMax: number;
  /** Close idle pooled clients after this long. */
  readonly idleTimeoutMs: number;
  readonly ssl: boolean;
}

export const POSTGRES_DEFAULTS: Readonly<PostgresConfig> = {
  host: '127.0.0.1',
  port: 5432,
  user: 'assistant',
  password: 'assistant',
  database: 'assistant',
  poolMax: 10,
  idleTimeoutMs: 30_000,
  ssl: false,
};

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const v = value.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return fallback;
}

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  max: number,
): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= max ? n : fallback;
}

function trimmed(value: string | undefined): string | undefined {
  const t = value?.trim();
  return t ? t : undefined;
}

/**
 * Load Postgres settings from the environment.
 * Never throws; missing or malformed values fall back to defaults.
 */
export function loadPostgresConfig(
  env: NodeJS.ProcessEnv = process.env,
): PostgresConfig {
  return {
    connectionString: trimmed(env[ENV_DATABASE_URL]),
    host: trimmed(env[ENV_PG_HOST]) ?? POSTGRES_DEFAULTS.host,
    port: parsePositiveInt(env[ENV_PG_PORT], POSTGRES_DEFAULTS.port, 65535),
    user: trimmed(env[ENV_PG_USER]) ?? POSTGRES_DEFAULTS.user,
    password: env[ENV_PG_PASSWORD] ?? POSTGRES_DEFAULTS.password,
    database: trimmed(env[ENV_PG_DATABASE]) ?? POSTGRES_DEFAULTS.database,
    poolMax: parsePositiveInt(env[ENV_PG_POOL_MAX], POSTGRES_DEFAULTS.poolMax, 1000),
    idleTimeoutMs: POSTGRES_DEFAULTS.idleTimeoutMs,
    ssl: parseBool(env[ENV_PG_SSL], POSTGRES_DEFAULTS.ssl),
  };
}

/** Translate our config into node-postgres pool options. */
export function toPoolConfig(cfg: PostgresConfig): PoolConfig {
  const common: PoolConfig = {
    max: cfg.poolMax,
    idleTimeoutMillis: cfg.idleTimeoutMs,
    ssl: cfg.ssl ? { rejectUnauthorized: false } : undefined,
  };
  if (cfg.connectionString) {
    return { ...common, connectionString: cfg.connectionString };
  }
  return {
    ...common,
    host: cfg.host,
    port: cfg.port,
    user: cfg.user,
    password: cfg.password,
    database: cfg.database,
  };
}

/** Connection target without credentials, for log lines. */
export function describeTarget(cfg: PostgresConfig): string {
  if (cfg.connectionString) {
    try {
      const url = new URL(cfg.connectionString);
      return `${url.hostname}:${url.port || '5432'}${url.pathname}`;
    } catch {
      return '(unparsable DATABASE_URL)';
    }
  }
  return `${cfg.host}:${cfg.port}/${cfg.database}`;
}
