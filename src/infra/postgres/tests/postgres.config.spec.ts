import {
  loadPostgresConfig,
  toPoolConfig,
  describeTarget,
  POSTGRES_DEFAULTS,
} from '../postgres.config';

describe('loadPostgresConfig', () => {
  it('fills every field with defaults for an empty environment', () => {
    expect(loadPostgresConfig({})).toEqual({
      connectionString: undefined,
      ...POSTGRES_DEFAULTS,
    });
  });

  it('reads discrete PG* variables', () => {
    const cfg = loadPostgresConfig({
      PGHOST: ' db.internal ',
      PGPORT: '6543',
      PGUSER: 'svc',
      PGPASSWORD: 'test-secret',
      PGDATABASE: 'assistant_test',
      PG_POOL_MAX: '4',
      PG_SSL: 'yes',
    });
    expect(cfg.host).toBe('db.internal');
    expect(cfg.port).toBe(6543);
    expect(cfg.user).toBe('svc');
    expect(cfg.password).toBe('test-secret');
    expect(cfg.database).toBe('assistant_test');
    expect(cfg.poolMax).toBe(4);
    expect(cfg.ssl).toBe(true);
  });

  it('falls back on malformed numbers', () => {
    const cfg = loadPostgresConfig({ PGPORT: '99999', PG_POOL_MAX: '-2' });
    expect(cfg.port).toBe(5432);
    expect(cfg.poolMax).toBe(10);
  });
});

describe('toPoolConfig', () => {
  it('prefers the connection string', () => {
    const pool = toPoolConfig(
      loadPostgresConfig({
        DATABASE_URL: 'postgres://svc:test-secret@db:5433/app',
        PGHOST: 'ignored',
      }),
    );
    expect(pool.connectionString).toBe('postgres://svc:test-secret@db:5433/app');
    expect(pool.host).toBeUndefined();
    expect(pool.max).toBe(10);
  });

  it('uses discrete fields without a connection string', () => {
    const pool = toPoolConfig(loadPostgresConfig({}));
    expect(pool.host).toBe('127.0.0.1');
    expect(pool.port).toBe(5432);
    expect(pool.ssl).toBeUndefined();
  });
});

describe('describeTarget', () => {
  it('omits credentials', () => {
    const cfg = loadPostgresConfig({
      DATABASE_URL: 'postgres://svc:test-secret@db:5433/app',
    });
    expect(describeTarget(cfg)).toBe('db:5433/app');
  });

  it('formats discrete settings', () => {
    expect(describeTarget(loadPostgresConfig({}))).toBe(
      '127.0.0.1:5432/assistant',
    );
  });
});
