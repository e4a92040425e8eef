import { Test, TestingModule } from '@nestjs/testing';
import { PreferencesRepository } from '../preferences.repository';
import { PostgresService } from '../../postgres/postgres.service';

describe('PreferencesRepository', () => {
  let repo: PreferencesRepository;
  let pg: { query: jest.Mock };

  beforeEach(async () => {
    pg = { query: jest.fn() };
    const moduleRef: TestingModule = await Test.createTestingModule({
      providers: [
        PreferencesRepository,
        { provide: PostgresService, useValue: pg },
      ],
    }).compile();
    repo = moduleRef.get(PreferencesRepository);
  });

  it('addresses rows by key and specifier', async () => {
    pg.query.mockResolvedValueOnce([{ key: 'diet', specifier: 'ann' }]);

    await repo.get({ key: 'diet', specifier: 'ann' });

    expect(pg.query.mock.calls[0][0]).toEqual({
      text: 'SELECT * FROM preferences WHERE key = $1 AND specifier = $2',
      values: ['diet', 'ann'],
    });
  });

  it('reports a miss with the composite key', async () => {
    pg.query.mockResolvedValueOnce([]);
    await expect(repo.get({ key: 'diet', specifier: 'bob' })).rejects.toThrow(
      'preferences record not found: diet/bob',
    );
  });

  it('update() with an empty patch reads the current row', async () => {
    pg.query.mockResolvedValueOnce([{ key: 'diet', specifier: 'ann' }]);

    const row = await repo.update({ key: 'diet', specifier: 'ann' }, {});

    expect(row).toEqual({ key: 'diet', specifier: 'ann' });
    expect(pg.query.mock.calls[0][0].text).toBe(
      'SELECT * FROM preferences WHERE key = $1 AND specifier = $2',
    );
  });

  it('create() writes data and tags', async () => {
    pg.query.mockResolvedValueOnce([{ key: 'diet' }]);

    await repo.create({
      key: 'diet',
      specifier: 'ann',
      data: '{"vegetarian":true}',
      tags: ['food'],
    });

    expect(pg.query.mock.calls[0][0]).toEqual({
      text: 'INSERT INTO preferences (key, specifier, data, tags) VALUES ($1, $2, $3, $4) RETURNING *',
      values: ['diet', 'ann', '{"vegetarian":true}', ['food']],
    });
  });
});
