import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const pgMock = vi.hoisted(() => {
  const queries: string[] = [];
  const state = { failConnect: false, failQuery: false, ended: 0, created: 0 };

  class FakeClient {
    readonly options: Record<string, unknown>;

    constructor(options: Record<string, unknown>) {
      this.options = options;
      state.created += 1;
    }

    async connect() {
      if (state.failConnect) throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }

    escapeIdentifier(value: string) {
      return `"${value.replace(/"/g, '""')}"`;
    }

    async query(sql: string) {
      queries.push(sql);
      if (state.failQuery) throw new Error('relation "users" does not exist');
      return {
        // int8 (20) and numeric (1700) arrive as text, as node-postgres returns them
        fields: [
          { name: 'id', dataTypeID: 20 },
          { name: 'email', dataTypeID: 25 },
          { name: 'created_at', dataTypeID: 1184 },
          { name: 'amount', dataTypeID: 1700 }
        ],
        rows: [
          { id: '9223372036854775806', email: 'a@example.org', created_at: new Date('2024-01-01T00:00:00Z'), amount: '10.50' },
          { id: '2', email: null, created_at: new Date('2024-01-02T00:00:00Z'), amount: null }
        ]
      };
    }

    async end() {
      state.ended += 1;
    }
  }

  return { FakeClient, queries, state };
});

vi.mock('pg', () => ({ Client: pgMock.FakeClient }));

import { profileSource } from '../ingest';
import { testConnection } from '../ingest/db';

const tableSource = (config: Record<string, unknown>) => ({
  id: 'users',
  name: 'users',
  type: 'postgresql' as const,
  config
});

const connection = {
  host: 'db.local',
  database: 'shop',
  username: 'reader',
  password: 'test-secret'
};

describe('postgres profiling', () => {
  beforeEach(() => {
    pgMock.queries.length = 0;
    Object.assign(pgMock.state, { failConnect: false, failQuery: false, ended: 0, created: 0 });
  });

  it('samples the table with a bounded query and releases the client', async () => {
    const result = await profileSource(tableSource({ ...connection, table: 'public.users' }));

    expect(pgMock.queries).toEqual(['SELECT * FROM "public"."users" LIMIT 1000']);
    expect(result.ok).toBe(true);
    expect(result.schema.columns).toEqual(['id', 'email', 'created_at', 'amount']);
    expect(result.schema.nullCounts).toEqual({ id: 0, email: 1, created_at: 0, amount: 1 });
    expect(result.schema.sampleData[1].email).toBe('');
    expect(pgMock.state.ended).toBe(1);
  });

  it('labels int8 and numeric columns as numbers', async () => {
    const result = await profileSource(tableSource({ ...connection, table: 'users' }));

    expect(result.schema.dtypes).toEqual({ id: 'integer', email: 'object', created_at: 'datetime', amount: 'float' });
    expect(result.schema.uniqueCounts.id).toBe(2);
    expect(result.schema.sampleData.map(row => row.id)).toEqual(['9223372036854775806', 2]);
    expect(result.schema.sampleData[0].amount).toBe(10.5);
  });

  it('releases the client when the query fails', async () => {
    pgMock.state.failQuery = true;
    const result = await profileSource(tableSource({ ...connection, table: 'users' }));

    expect(result.ok ? '' : result.reason).toBe('relation "users" does not exist');
    expect(result.schema.columns).toEqual([]);
    expect(pgMock.state.ended).toBe(1);
  });

  it('releases the client when connecting fails', async () => {
    pgMock.state.failConnect = true;
    const result = await profileSource(tableSource({ ...connection, table: 'users' }));

    expect(result.ok).toBe(false);
    expect(pgMock.queries).toEqual([]);
    expect(pgMock.state.ended).toBe(1);
  });

  it('degrades without connecting when the table is not configured', async () => {
    const result = await profileSource(tableSource(connection));

    expect(result.ok).toBe(false);
    expect(pgMock.state.created).toBe(0);
  });
});

describe('testConnection', () => {
  beforeEach(() => {
    pgMock.queries.length = 0;
    Object.assign(pgMock.state, { failConnect: false, failQuery: false, ended: 0, created: 0 });
  });

  it('runs a trivial query against postgres', async () => {
    const result = await testConnection({ type: 'postgresql', port: 5432, ...connection });

    expect(result).toEqual({ status: 'success', message: 'Connection successful' });
    expect(pgMock.queries).toEqual(['SELECT 1']);
    expect(pgMock.state.ended).toBe(1);
  });

  it('reports connection errors instead of throwing', async () => {
    pgMock.state.failConnect = true;
    const result = await testConnection({ type: 'postgresql', port: 5432, ...connection });

    expect(result).toEqual({ status: 'error', message: 'connect ECONNREFUSED 127.0.0.1:5432' });
    expect(pgMock.state.ended).toBe(1);
  });
});

describe('testConnection against ClickHouse', () => {
  const clickhouse = { type: 'clickhouse' as const, host: 'ch.local', port: 8123, database: 'default', username: 'default', password: 'test-secret' };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('queries the HTTP interface with credentials in headers', async () => {
    const fetchMock = vi.fn(async (_url: URL, _init?: RequestInit) => new Response('1\n', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const result = await testConnection(clickhouse);

    expect(result).toEqual({ status: 'success', message: 'Connection successful' });
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('http://ch.local:8123/?query=SELECT+1&database=default');
    expect(init?.headers).toEqual({ 'X-ClickHouse-User': 'default', 'X-ClickHouse-Key': 'test-secret' });
  });

  it('reports a non-2xx reply with its body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Code: 516. Authentication failed\n', { status: 401 })));

    const result = await testConnection(clickhouse);

    expect(result).toEqual({ status: 'error', message: 'ClickHouse responded 401: Code: 516. Authentication failed' });
  });

  it('reports a timed-out request as an error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new Error('The operation was aborted due to timeout');
    }));

    const result = await testConnection(clickhouse);

    expect(result).toEqual({ status: 'error', message: 'The operation was aborted due to timeout' });
  });
});
