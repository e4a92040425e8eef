import type { FilterCondition, ListParams, RawQuery, SortDirection } from './types';

export const DEFAULT_LIMIT = 100;
export const MAX_LIMIT = 1000;
export const DEFAULT_SORT_BY = 'created_at';
export const DEFAULT_SORT_DIR: SortDirection = 'DESC';

const RESERVED_KEYS: ReadonlySet<string> = new Set([
  'limit',
  'offset',
  'sort_by',
  'sort_dir',
]);

const INTEGER = /^[+-]?\d+$/;

/** First string value for a query key (Express gives string | string[] | object). */
export function firstValue(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw)) {
    const head: unknown = raw[0];
    return typeof head === 'string' ? head : undefined;
  }
  return undefined;
}

function parseInteger(raw: unknown): number | undefined {
  const s = firstValue(raw);
  if (s === undefined || !INTEGER.test(s)) return undefined;
  return Number.parseInt(s, 10);
}

/**
 * Normalize a query-string multimap into ListParams.
 * Out-of-range or unparsable values fall back to their defaults; every
 * non-reserved key becomes an equality filter in input order.
 */
export function parseListParams(
  rawParams: RawQuery,
  allowedSortFields: ReadonlySet<string>,
): ListParams {
  const limit = parseInteger(rawParams['limit']);
  const offset = parseInteger(rawParams['offset']);
  const sortBy = firstValue(rawParams['sort_by']);
  const sortDir = firstValue(rawParams['sort_dir'])?.toUpperCase();

  const filters: FilterCondition[] = [];
  for (const [key, raw] of Object.entries(rawParams)) {
    if (RESERVED_KEYS.has(key)) continue;
    const value = firstValue(raw);
    if (value === undefined) continue;
    filters.push({ field: key, op: 'eq', value });
  }

  return {
    limit:
      limit !== undefined && limit >= 1 && limit <= MAX_LIMIT
        ? limit
        : DEFAULT_LIMIT,
    offset: offset !== undefined && offset >= 0 ? offset : 0,
    sortBy:
      sortBy !== undefined && allowedSortFields.has(sortBy)
        ? sortBy
        : DEFAULT_SORT_BY,
    sortDir: sortDir === 'ASC' || sortDir === 'DESC' ? sortDir : DEFAULT_SORT_DIR,
    filters,
  };
}
