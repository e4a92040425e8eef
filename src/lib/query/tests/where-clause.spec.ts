import { buildWhereClause } from '../where-clause';
import type { FilterCondition } from '../types';

function countPlaceholders(sql: string): number {
  return (sql.match(/\$\d+/g) ?? []).length;
}

describe('buildWhereClause', () => {
  it('returns an empty clause and no args without filters', () => {
    expect(buildWhereClause([], new Set(['status']))).toEqual({
      whereClause: '',
      args: [],
    });
  });

  it('compiles a single equality filter', () => {
    const res = buildWhereClause(
      [{ field: 'status', op: 'eq', value: 'active' }],
      new Set(['status', 'name']),
    );
    expect(res.whereClause).toBe('WHERE status = $1');
    expect(res.args).toEqual(['active']);
  });

  it('drops fields that are not allow-listed', () => {
    const res = buildWhereClause(
      [
        { field: '1=1; --', op: 'eq', value: 'x' },
        { field: 'name', op: 'eq', value: 'Ada' },
      ],
      new Set(['name']),
    );
    expect(res.whereClause).toBe('WHERE name = $1');
    expect(res.args).toEqual(['Ada']);
  });

  it('compiles tags as containment with a single-element array', () => {
    const res = buildWhereClause(
      [{ field: 'tags', op: 'eq', value: 'urgent' }],
      new Set(['tags']),
    );
    expect(res.whereClause).toBe('WHERE tags @> $1');
    expect(res.args).toEqual([['urgent']]);
  });

  it('compiles every operator and keeps placeholders dense', () => {
    const filters: FilterCondition[] = [
      { field: 'completed_by', op: 'isNull' },
      { field: 'rating', op: 'gte', value: '4' },
      { field: 'tags', op: 'eq', value: 'dinner' },
      { field: 'user_uid', op: 'isNotNull' },
      { field: 'cook_time', op: 'lte', value: '30' },
      { field: 'labels', op: 'contains', value: 'x' },
    ];
    const res = buildWhereClause(
      filters,
      new Set(['completed_by', 'rating', 'tags', 'user_uid', 'cook_time', 'labels']),
    );

    expect(res.whereClause).toBe(
      'WHERE completed_by IS NULL AND rating >= $1 AND tags @> $2 AND user_uid IS NOT NULL AND cook_time <= $3 AND labels @> $4',
    );
    expect(res.args).toEqual(['4', ['dinner'], '30', ['x']]);
    expect(countPlaceholders(res.whereClause)).toBe(res.args.length);
  });

  it('maps placeholder $i to args[i-1] for every emitted condition', () => {
    const fields = ['a', 'b', 'c', 'd', 'e'];
    const filters: FilterCondition[] = fields.map((field, i) => ({
      field,
      op: 'eq' as const,
      value: `v${i}`,
    }));
    const res = buildWhereClause(filters, new Set(['a', 'c', 'e']));

    expect(countPlaceholders(res.whereClause)).toBe(res.args.length);
    for (const [i, field] of ['a', 'c', 'e'].entries()) {
      expect(res.whereClause).toContain(`${field} = $${i + 1}`);
    }
    expect(res.args).toEqual(['v0', 'v2', 'v4']);
  });
});
