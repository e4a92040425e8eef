import { UnsafeIdentifierError } from '../../../lib/errors/RecordsError';
import type { ListOptions } from '../../../lib/query/types';

/**
 * Pure SQL text builders. Values are always bound as $n parameters;
 * identifiers come from code or from an allow-list and are re-checked here.
 */

export interface BuiltQuery {
  text: string;
  values: unknown[];
}

/** Column/key → value, in the order the statement should list them. */
export type ColumnValues = Readonly<Record<string, unknown>>;

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function assertIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new UnsafeIdentifierError('column', name);
  }
  return name;
}

function definedEntries(row: ColumnValues): [string, unknown][] {
  return Object.entries(row).filter(([, v]) => v !== undefined);
}

function keyPredicate(
  key: ColumnValues,
  firstIndex: number,
): { sql: string; values: unknown[] } {
  const entries = Object.entries(key);
  return {
    sql: entries
      .map(([col], i) => `${assertIdentifier(col)} = $${firstIndex + i}`)
      .join(' AND '),
    values: entries.map(([, v]) => v),
  };
}

/** INSERT of every defined column, returning the stored row. */
export function buildInsertQuery(table: string, row: ColumnValues): BuiltQuery {
  const entries = definedEntries(row);
  const columns = entries.map(([col]) => assertIdentifier(col));
  const placeholders = entries.map((_, i) => `$${i + 1}`);
  return {
    text: `INSERT INTO ${assertIdentifier(table)} (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
    values: entries.map(([, v]) => v),
  };
}

export function buildSelectByKeyQuery(
  table: string,
  key: ColumnValues,
): BuiltQuery {
  const where = keyPredicate(key, 1);
  return {
    text: `SELECT * FROM ${assertIdentifier(table)} WHERE ${where.sql}`,
    values: where.values,
  };
}

/**
 * UPDATE of the defined patch columns plus `updated_at = NOW()`.
 * Returns undefined when the patch carries nothing to write.
 */
export function buildUpdateQuery(
  table: string,
  key: ColumnValues,
  patch: ColumnValues,
): BuiltQuery | undefined {
  const entries = definedEntries(patch);
  if (entries.length === 0) return undefined;

  const sets = entries.map(
    ([col], i) => `${assertIdentifier(col)} = $${i + 1}`,
  );
  sets.push('updated_at = NOW()');
  const where = keyPredicate(key, entries.length + 1);
  return {
    text: `UPDATE ${assertIdentifier(table)} SET ${sets.join(', ')} WHERE ${where.sql} RETURNING *`,
    values: [...entries.map(([, v]) => v), ...where.values],
  };
}

/** DELETE returning the removed row, so a miss is detectable. */
export function buildDeleteQuery(table: string, key: ColumnValues): BuiltQuery {
  const where = keyPredicate(key, 1);
  return {
    text: `DELETE FROM ${assertIdentifier(table)} WHERE ${where.sql} RETURNING *`,
    values: where.values,
  };
}

/**
 * SELECT with the compiled WHERE clause, ORDER BY and paging.
 * LIMIT/OFFSET placeholders continue after the WHERE arguments.
 */
export function buildListQuery(
  table: string,
  options: ListOptions,
  sortFields: ReadonlySet<string>,
): BuiltQuery {
  if (!sortFields.has(options.sortBy)) {
    throw new UnsafeIdentifierError('sort column', options.sortBy);
  }
  if (options.sortDir !== 'ASC' && options.sortDir !== 'DESC') {
    throw new UnsafeIdentifierError('sort direction', String(options.sortDir));
  }

  const parts = [`SELECT * FROM ${assertIdentifier(table)}`];
  if (options.whereClause !== '') parts.push(options.whereClause);
  parts.push(`ORDER BY ${options.sortBy} ${options.sortDir}`);
  const n = options.whereArgs.length;
  parts.push(`LIMIT $${n + 1} OFFSET $${n + 2}`);

  return {
    text: parts.join(' '),
    values: [...options.whereArgs, options.limit, options.offset],
  };
}
