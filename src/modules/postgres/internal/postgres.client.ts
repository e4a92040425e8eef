import { Pool } from 'pg';
import {
  loadPostgresConfig,
  toPoolConfig,
  type PostgresConfig,
} from '../../../infra/postgres/postgres.config';

/**
 * Lazy singleton around a node-postgres Pool.
 * Config is read and the pool created on first use, after ConfigModule
 * has loaded `.env`; connections are opened by pg on demand.
 */
class LazyPgPool {
  private config?: PostgresConfig;
  private pool?: Pool;

  public getConfig(): PostgresConfig {
    if (!this.config) this.config = loadPostgresConfig();
    return this.config;
  }

  public getPool(): Pool {
    const existing = this.pool;
    if (existing) return existing;
    const created = new Pool(toPoolConfig(this.getConfig()));
    this.pool = created;
    return created;
  }

  /** End the pool if it was ever created (idempotent). */
  public async close(): Promise<void> {
    const current = this.pool;
    if (!current) return;
    this.pool = undefined;
    await current.end();
  }
}

const lazyPool = new LazyPgPool();

export function getPool(): Pool {
  return lazyPool.getPool();
}

export function getPostgresConfig(): PostgresConfig {
  return lazyPool.getConfig();
}

export async function closePool(): Promise<void> {
  await lazyPool.close();
}
