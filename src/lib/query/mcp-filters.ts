import type { FilterCondition } from './types';

/** Column the synthetic completion flags act on. */
export const COMPLETION_FIELD = 'completed_by';

function normalize(value: unknown): string | undefined {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  if (typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Replace the condition on the same field in place, or append.
 * Keeps one condition per field and the original position.
 */
export function upsertCondition(
  filters: FilterCondition[],
  condition: FilterCondition,
): FilterCondition[] {
  const at = filters.findIndex((f) => f.field === condition.field);
  if (at === -1) {
    filters.push(condition);
  } else {
    filters[at] = condition;
  }
  return filters;
}

/**
 * Turn loosely typed tool arguments into filter conditions.
 *
 * Allow-listed keys with a non-empty value become equality filters, in
 * allow-list order. `completed_only` and `pending_only` act on
 * `completed_by`; pending is applied last and wins when both are set.
 */
export function buildFiltersFromMCP(
  args: Readonly<Record<string, unknown>>,
  supportedFilters: ReadonlySet<string>,
): FilterCondition[] {
  const filters: FilterCondition[] = [];

  for (const field of supportedFilters) {
    const value = normalize(args[field]);
    if (value === undefined) continue;
    filters.push({ field, op: 'eq', value });
  }

  if (args['completed_only'] === true) {
    upsertCondition(filters, { field: COMPLETION_FIELD, op: 'isNotNull' });
  }
  if (args['pending_only'] === true) {
    upsertCondition(filters, { field: COMPLETION_FIELD, op: 'isNull' });
  }

  return filters;
}
