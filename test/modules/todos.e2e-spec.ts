import request from 'supertest';
import type { INestApplication } from '@nestjs/common';
import type { Server } from 'http';
import { createTestApp, statement, type PgStub } from '../helpers/app';
import { PostgresActionError } from '../../src/lib/errors/PostgresActionError';

describe('Todos REST (e2e)', () => {
  let app: INestApplication;
  let http: Server;
  let pg: PgStub;

  beforeAll(async () => {
    ({ app, http, pg } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    pg.query.mockReset();
    pg.query.mockResolvedValue([]);
  });

  it('POST /api/todos stores a validated todo', async () => {
    pg.query.mockResolvedValueOnce([{ uid: 'todo-1', title: 'Buy milk' }]);

    const res = await request(http)
      .post('/api/todos')
      .send({
        title: 'Buy milk',
        priority: 2,
        due_date: '2025-01-15T10:00:00Z',
        tags: ['home'],
        unexpected: 'stripped',
      })
      .expect(201);

    expect(res.body).toEqual({ uid: 'todo-1', title: 'Buy milk' });
    const { text, values } = statement(pg);
    expect(text).toBe(
      'INSERT INTO todos (uid, title, data, priority, due_date, tags) VALUES ($1, $2, $3, $4, $5, $6) RETURNING *',
    );
    expect(values.slice(1)).toEqual([
      'Buy milk',
      '{}',
      2,
      new Date('2025-01-15T10:00:00Z'),
      ['home'],
    ]);
  });

  it('POST /api/todos rejects an out-of-range priority', async () => {
    const res = await request(http)
      .post('/api/todos')
      .send({ title: 'Buy milk', priority: 9 })
      .expect(400);

    expect(res.body.error).toBe('ValidationError');
    expect(res.body.details).toEqual([
      {
        path: 'priority',
        constraint: 'max',
        message: 'priority must not be greater than 5',
      },
    ]);
    expect(pg.query).not.toHaveBeenCalled();
  });

  it('POST /api/todos requires a title', async () => {
    const res = await request(http).post('/api/todos').send({}).expect(400);
    expect(res.body.details).toEqual(
      expect.arrayContaining([
        {
          path: 'title',
          constraint: 'isNotEmpty',
          message: 'title should not be empty',
        },
      ]),
    );
  });

  it('GET /api/todos compiles allow-listed filters and clamps paging', async () => {
    await request(http)
      .get('/api/todos')
      .query(
        'sort_by=priority&sort_dir=asc&limit=5000&priority=2&tags=home&foo=bar',
      )
      .expect(200)
      .expect([]);

    expect(statement(pg)).toEqual({
      text: 'SELECT * FROM todos WHERE priority = $1 AND tags @> $2 ORDER BY priority ASC LIMIT $3 OFFSET $4',
      values: ['2', ['home'], 100, 0],
    });
  });

  it('GET /api/todos falls back to created_at DESC for an unknown sort column', async () => {
    await request(http)
      .get('/api/todos?sort_by=password&sort_dir=sideways&offset=10')
      .expect(200);

    expect(statement(pg)).toEqual({
      text: 'SELECT * FROM todos ORDER BY created_at DESC LIMIT $1 OFFSET $2',
      values: [100, 10],
    });
  });

  it('GET /api/todos/:uid is a 404 when the row is missing', async () => {
    const res = await request(http).get('/api/todos/nope').expect(404);
    expect(res.body.message).toBe('todos record not found: nope');
  });

  it('PUT /api/todos/:uid with an empty body reads the row back', async () => {
    pg.query.mockResolvedValueOnce([{ uid: 't-1' }]);

    await request(http).put('/api/todos/t-1').send({}).expect(200).expect({
      uid: 't-1',
    });
    expect(statement(pg)).toEqual({
      text: 'SELECT * FROM todos WHERE uid = $1',
      values: ['t-1'],
    });
  });

  it('DELETE /api/todos/:uid answers 204', async () => {
    pg.query.mockResolvedValueOnce([{ uid: 't-1' }]);
    await request(http).delete('/api/todos/t-1').expect(204);
    expect(statement(pg).text).toBe(
      'DELETE FROM todos WHERE uid = $1 RETURNING *',
    );
  });

  it('a storage failure is a 500', async () => {
    pg.query.mockRejectedValueOnce(
      new PostgresActionError('connection refused', {
        operation: 'select',
        table: 'todos',
      }),
    );
    await request(http).get('/api/todos/t-1').expect(500);
  });
});
