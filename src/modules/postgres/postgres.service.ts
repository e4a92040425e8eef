import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import type { QueryResultRow } from 'pg';
import { closePool, getPool, getPostgresConfig } from './internal/postgres.client';
import { describeTarget } from '../../infra/postgres/postgres.config';
import {
  PostgresActionError,
  type PostgresOperation,
} from '../../lib/errors/PostgresActionError';
import type { BuiltQuery } from './internal/sql.builders';

export interface QueryContext {
  readonly operation: PostgresOperation;
  readonly table?: string;
}

/**
 * Thin bridge to the shared pg Pool. Every failure is rethrown as a
 * PostgresActionError carrying the operation and table.
 */
@Injectable()
export class PostgresService implements OnModuleDestroy {
  private readonly logger = new Logger(PostgresService.name);

  public async query<R extends QueryResultRow>(
    built: BuiltQuery,
    ctx: QueryContext,
  ): Promise<R[]> {
    try {
      const res = await getPool().query<R>(built.text, built.values);
      return res.rows;
    } catch (err) {
      const wrapped = PostgresActionError.wrap(err, ctx);
      this.logger.warn(wrapped.summary());
      throw wrapped;
    }
  }

  /** Run `SELECT 1`; false when the database cannot be reached. */
  public async ping(): Promise<boolean> {
    try {
      await this.query({ text: 'SELECT 1', values: [] }, { operation: 'ping' });
      return true;
    } catch (err) {
      this.logger.debug(
        `Ping to ${describeTarget(getPostgresConfig())} failed: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
      return false;
    }
  }

  public async onModuleDestroy(): Promise<void> {
    await closePool();
  }
}
