import { buildWhereClause } from './where-clause';
import type { FilterCondition, ListOptions, ListParams } from './types';

/**
 * Compile parsed list parameters into repository list options.
 * `extra` conditions are appended after the captured filters.
 */
export function toListOptions(
  params: ListParams,
  allowedFilters: ReadonlySet<string>,
  extra: readonly FilterCondition[] = [],
): ListOptions {
  const { whereClause, args } = buildWhereClause(
    [...params.filters, ...extra],
    allowedFilters,
  );
  return {
    limit: params.limit,
    offset: params.offset,
    sortBy: params.sortBy,
    sortDir: params.sortDir,
    whereClause,
    whereArgs: args,
  };
}
