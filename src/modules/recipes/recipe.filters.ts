import { upsertCondition } from '../../lib/query/mcp-filters';
import type { FilterCondition } from '../../lib/query/types';

const NUMERIC = /^\s*-?\d+(\.\d+)?\s*$/;

/** Integer text for a numeric argument or query value, truncated toward zero. */
function wholeNumber(raw: unknown): string | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? String(Math.trunc(raw)) : undefined;
  }
  if (typeof raw === 'string' && NUMERIC.test(raw)) {
    return String(Math.trunc(Number(raw)));
  }
  return undefined;
}

export interface RecipeRangeArgs {
  min_rating?: unknown;
  max_cook_time?: unknown;
}

/**
 * `min_rating` becomes `rating >= n` and `max_cook_time` becomes
 * `cook_time <= n`; each replaces any equality filter on the same column.
 * Non-numeric values are ignored.
 */
export function applyRecipeRanges(
  filters: FilterCondition[],
  args: RecipeRangeArgs,
): FilterCondition[] {
  const minRating = wholeNumber(args.min_rating);
  if (minRating !== undefined) {
    upsertCondition(filters, { field: 'rating', op: 'gte', value: minRating });
  }
  const maxCookTime = wholeNumber(args.max_cook_time);
  if (maxCookTime !== undefined) {
    upsertCondition(filters, {
      field: 'cook_time',
      op: 'lte',
      value: maxCookTime,
    });
  }
  return filters;
}
