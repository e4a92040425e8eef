/**
 * Shared shapes for list queries: parsed list parameters, filter
 * conditions, per-entity allow-lists and compiled WHERE fragments.
 */

export type SortDirection = 'ASC' | 'DESC';

/** Operators that compare a column against a bound value. */
export type ValueOperator = 'eq' | 'gte' | 'lte' | 'contains';

/** Operators that test the column itself and bind nothing. */
export type NullOperator = 'isNull' | 'isNotNull';

export type ValueCondition = {
  readonly field: string;
  readonly op: ValueOperator;
  readonly value: string;
};

export type NullCondition = {
  readonly field: string;
  readonly op: NullOperator;
};

export type FilterCondition = ValueCondition | NullCondition;

export interface ListParams {
  limit: number;
  offset: number;
  sortBy: string;
  sortDir: SortDirection;
  /** Kept in capture order so the compiled SQL is reproducible. */
  filters: FilterCondition[];
}

export interface EntityFilterConfig {
  readonly sortFields: ReadonlySet<string>;
  readonly filters: ReadonlySet<string>;
}

export interface CompiledFilter {
  /** Either "" or a clause starting with "WHERE ". */
  whereClause: string;
  /** `args[i - 1]` binds to placeholder `$i`. */
  args: unknown[];
}

/** What a repository needs to run a list query. */
export interface ListOptions {
  limit: number;
  offset: number;
  sortBy: string;
  sortDir: SortDirection;
  whereClause: string;
  whereArgs: unknown[];
}

/** Query-string multimap as Express hands it over. */
export type RawQuery = Record<string, unknown>;

export function isValueCondition(c: FilterCondition): c is ValueCondition {
  return c.op !== 'isNull' && c.op !== 'isNotNull';
}
