import type { QueryResultRow } from 'pg';
import { PostgresService } from './postgres.service';
import {
  buildDeleteQuery,
  buildInsertQuery,
  buildListQuery,
  buildSelectByKeyQuery,
  buildUpdateQuery,
  type ColumnValues,
} from './internal/sql.builders';
import { RecordNotFoundError } from '../../lib/errors/RecordsError';
import { PostgresActionError } from '../../lib/errors/PostgresActionError';
import type { ListOptions } from '../../lib/query/types';

export interface TableDef {
  readonly table: string;
  /** Columns allowed in ORDER BY for this table. */
  readonly sortFields: ReadonlySet<string>;
}

/**
 * Shared CRUD plumbing for one table. Subclasses decide how their key
 * maps onto columns and which columns an input may write.
 */
export abstract class TableRepository<Row extends QueryResultRow, Key> {
  protected constructor(
    protected readonly pg: PostgresService,
    protected readonly def: TableDef,
  ) {}

  protected abstract keyColumns(key: Key): ColumnValues;

  protected abstract describeKey(key: Key): string;

  public async get(key: Key): Promise<Row> {
    const rows = await this.pg.query<Row>(
      buildSelectByKeyQuery(this.def.table, this.keyColumns(key)),
      { operation: 'select', table: this.def.table },
    );
    return this.firstOrNotFound(rows, key);
  }

  public async list(options: ListOptions): Promise<Row[]> {
    return this.pg.query<Row>(
      buildListQuery(this.def.table, options, this.def.sortFields),
      { operation: 'list', table: this.def.table },
    );
  }

  public async delete(key: Key): Promise<void> {
    const rows = await this.pg.query<Row>(
      buildDeleteQuery(this.def.table, this.keyColumns(key)),
      { operation: 'delete', table: this.def.table },
    );
    this.firstOrNotFound(rows, key);
  }

  protected async insertRow(values: ColumnValues): Promise<Row> {
    const rows = await this.pg.query<Row>(
      buildInsertQuery(this.def.table, values),
      { operation: 'insert', table: this.def.table },
    );
    const row = rows[0];
    if (!row) {
      throw new PostgresActionError('Insert returned no row', {
        operation: 'insert',
        table: this.def.table,
      });
    }
    return row;
  }

  /** Write the defined patch columns; an empty patch just reads the row. */
  protected async updateRow(key: Key, patch: ColumnValues): Promise<Row> {
    const built = buildUpdateQuery(this.def.table, this.keyColumns(key), patch);
    if (!built) return this.get(key);
    const rows = await this.pg.query<Row>(built, {
      operation: 'update',
      table: this.def.table,
    });
    return this.firstOrNotFound(rows, key);
  }

  private firstOrNotFound(rows: Row[], key: Key): Row {
    const row = rows[0];
    if (!row) {
      throw new RecordNotFoundError(this.def.table, this.describeKey(key));
    }
    return row;
  }
}
