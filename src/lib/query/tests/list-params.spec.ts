import { parseListParams } from '../list-params';
import { ENTITY_FILTERS } from '../entity-filters';

const SORT = ENTITY_FILTERS.todo.sortFields;

describe('parseListParams', () => {
  it('returns defaults for an empty query', () => {
    expect(parseListParams({}, SORT)).toEqual({
      limit: 100,
      offset: 0,
      sortBy: 'created_at',
      sortDir: 'DESC',
      filters: [],
    });
  });

  it.each(['0', '-5', '1001', 'abc', '10abc', ''])(
    'resets limit=%p to 100',
    (limit) => {
      expect(parseListParams({ limit }, SORT).limit).toBe(100);
    },
  );

  it.each([
    ['1', 1],
    ['50', 50],
    ['1000', 1000],
  ])('accepts limit=%p', (limit, expected) => {
    expect(parseListParams({ limit }, SORT).limit).toBe(expected);
  });

  it('accepts a non-negative offset and rejects a negative one', () => {
    expect(parseListParams({ offset: '40' }, SORT).offset).toBe(40);
    expect(parseListParams({ offset: '-1' }, SORT).offset).toBe(0);
  });

  it('keeps an allow-listed sort_by and resets anything else', () => {
    expect(parseListParams({ sort_by: 'due_date' }, SORT).sortBy).toBe(
      'due_date',
    );
    expect(
      parseListParams({ sort_by: 'title; DROP TABLE todos' }, SORT).sortBy,
    ).toBe('created_at');
  });

  it('uppercases sort_dir and falls back to DESC', () => {
    expect(parseListParams({ sort_dir: 'asc' }, SORT).sortDir).toBe('ASC');
    expect(parseListParams({ sort_dir: 'Desc' }, SORT).sortDir).toBe('DESC');
    expect(parseListParams({ sort_dir: 'sideways' }, SORT).sortDir).toBe(
      'DESC',
    );
  });

  it('turns non-reserved keys into eq filters in input order, first value wins', () => {
    const params = parseListParams(
      {
        limit: '5',
        user_uid: 'u-1',
        tags: ['urgent', 'home'],
        sort_by: 'title',
        title: 'Groceries',
      },
      SORT,
    );

    expect(params.filters).toEqual([
      { field: 'user_uid', op: 'eq', value: 'u-1' },
      { field: 'tags', op: 'eq', value: 'urgent' },
      { field: 'title', op: 'eq', value: 'Groceries' },
    ]);
  });

  it('reads the first value of repeated reserved keys', () => {
    const params = parseListParams({ limit: ['7', '9'] }, SORT);
    expect(params.limit).toBe(7);
  });

  it('skips keys without a string value', () => {
    const params = parseListParams({ nested: { a: 'b' }, empty: [] }, SORT);
    expect(params.filters).toEqual([]);
  });
});
