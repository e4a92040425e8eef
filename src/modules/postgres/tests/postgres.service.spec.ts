import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { PostgresService } from '../postgres.service';
import { PostgresActionError } from '../../../lib/errors/PostgresActionError';

const mockQuery = jest.fn();
const mockEnd = jest.fn();

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => ({
    query: mockQuery,
    end: mockEnd,
  })),
}));

describe('PostgresService', () => {
  let moduleRef: TestingModule;
  let service: PostgresService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    mockQuery.mockReset();
    mockEnd.mockReset();
    mockEnd.mockResolvedValue(undefined);

    moduleRef = await Test.createTestingModule({
      providers: [PostgresService],
    }).compile();
    service = moduleRef.get(PostgresService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('returns the rows of a query', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ uid: 't-1' }] });

    const rows = await service.query<{ uid: string }>(
      { text: 'SELECT * FROM todos WHERE uid = $1', values: ['t-1'] },
      { operation: 'select', table: 'todos' },
    );

    expect(rows).toEqual([{ uid: 't-1' }]);
    expect(mockQuery).toHaveBeenCalledWith(
      'SELECT * FROM todos WHERE uid = $1',
      ['t-1'],
    );
  });

  it('wraps driver errors with operation, table and SQLSTATE', async () => {
    const driverError = Object.assign(
      new Error('duplicate key value violates unique constraint'),
      { code: '23505', constraint: 'preferences_pkey' },
    );
    mockQuery.mockRejectedValueOnce(driverError);

    const err: unknown = await service
      .query({ text: 'INSERT ...', values: [] }, { operation: 'insert', table: 'preferences' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PostgresActionError);
    if (!(err instanceof PostgresActionError)) return;
    expect(err.message).toBe('duplicate key value violates unique constraint');
    expect(err.context).toEqual({
      operation: 'insert',
      table: 'preferences',
      driverCode: '23505',
      constraint: 'preferences_pkey',
    });
    expect(err.summary()).toBe(
      'Postgres action failed: op=insert table=preferences sqlstate=23505 constraint=preferences_pkey',
    );
  });

  it('ping() reports reachability', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ '?column?': 1 }] });
    await expect(service.ping()).resolves.toBe(true);

    mockQuery.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    await expect(service.ping()).resolves.toBe(false);
  });

  it('ends the pool on module destroy', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [] });
    await service.query({ text: 'SELECT 1', values: [] }, { operation: 'ping' });

    await service.onModuleDestroy();

    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});
