import type { CompiledFilter, FilterCondition } from './types';

const TAGS_FIELD = 'tags';

const COMPARATORS = {
  eq: '=',
  gte: '>=',
  lte: '<=',
} as const;

/**
 * Compile filter conditions into a parameterized WHERE clause.
 *
 * Only fields in `allowedFilters` are emitted; anything else is dropped
 * because field names are written into the SQL text as identifiers.
 * Placeholders are numbered in emission order, so `args[i - 1]` is `$i`.
 * The `tags` column is always matched by array containment.
 */
export function buildWhereClause(
  filters: readonly FilterCondition[],
  allowedFilters: ReadonlySet<string>,
): CompiledFilter {
  const predicates: string[] = [];
  const args: unknown[] = [];

  const bind = (value: unknown): string => {
    args.push(value);
    return `$${args.length}`;
  };

  for (const condition of filters) {
    const { field } = condition;
    if (!allowedFilters.has(field)) continue;

    switch (condition.op) {
      case 'isNull':
        predicates.push(`${field} IS NULL`);
        break;
      case 'isNotNull':
        predicates.push(`${field} IS NOT NULL`);
        break;
      case 'contains':
        predicates.push(`${field} @> ${bind([condition.value])}`);
        break;
      case 'eq':
      case 'gte':
      case 'lte':
        if (field === TAGS_FIELD) {
          predicates.push(`${field} @> ${bind([condition.value])}`);
        } else {
          predicates.push(
            `${field} ${COMPARATORS[condition.op]} ${bind(condition.value)}`,
          );
        }
        break;
    }
  }

  if (predicates.length === 0) {
    return { whereClause: '', args: [] };
  }
  return { whereClause: `WHERE ${predicates.join(' AND ')}`, args };
}
