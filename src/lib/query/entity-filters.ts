import type { EntityFilterConfig } from './types';

export type EntityName = 'todo' | 'notes' | 'preferences' | 'recipes';

// The sets are only read-only through the ReadonlySet type.
function config(sortFields: string[], filters: string[]): EntityFilterConfig {
  return Object.freeze({
    sortFields: new Set(sortFields),
    filters: new Set(filters),
  });
}

/**
 * Sortable and filterable columns per entity. REST list endpoints and
 * the MCP list tools both read from here; a column that is not listed
 * can never reach SQL as an identifier.
 */
export const ENTITY_FILTERS: Readonly<Record<EntityName, EntityFilterConfig>> =
  Object.freeze({
    todo: config(
      [
        'uid',
        'title',
        'priority',
        'due_date',
        'created_at',
        'updated_at',
        'user_uid',
        'household_uid',
        'completed_by',
      ],
      ['title', 'priority', 'user_uid', 'household_uid', 'completed_by', 'tags'],
    ),
    notes: config(
      ['id', 'key', 'user_uid', 'household_uid', 'created_at', 'updated_at'],
      ['key', 'user_uid', 'household_uid', 'tags'],
    ),
    preferences: config(
      ['key', 'specifier', 'created_at', 'updated_at'],
      ['key', 'specifier', 'tags'],
    ),
    recipes: config(
      [
        'id',
        'title',
        'genre',
        'rating',
        'prep_time',
        'cook_time',
        'total_time',
        'servings',
        'difficulty',
        'user_uid',
        'household_uid',
        'created_at',
        'updated_at',
      ],
      [
        'title',
        'genre',
        'rating',
        'cook_time',
        'difficulty',
        'user_uid',
        'household_uid',
        'tags',
      ],
    ),
  });
