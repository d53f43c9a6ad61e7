import { Client } from 'pg';
import { z } from 'zod';
import { errorMessage } from '../errors';
import { parseInteger, SAMPLE_LIMIT, type SampledRows } from '../utils/profile';

const CONNECT_TIMEOUT_MS = 10_000;

// pg hands int8 and numeric back as text; keyed by type OID
const NUMERIC_TYPE_PARSERS: Partial<Record<number, (text: string) => number | bigint>> = {
  20: parseInteger,
  1700: Number
};

export const postgresConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive().default(5432),
  database: z.string().min(1),
  username: z.string().min(1),
  password: z.string().default('')
});

export const postgresSourceSchema = postgresConfigSchema.extend({
  table: z.string().min(1)
});

export const clickhouseConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive().default(8123),
  database: z.string().default('default'),
  username: z.string().default('default'),
  password: z.string().default('')
});

export const connectionTestSchema = z.discriminatedUnion('type', [
  postgresConfigSchema.extend({ type: z.literal('postgresql') }),
  clickhouseConfigSchema.extend({ type: z.literal('clickhouse') })
]);

export type PostgresConfig = z.infer<typeof postgresConfigSchema>;
export type PostgresSourceConfig = z.infer<typeof postgresSourceSchema>;
export type ClickHouseConfig = z.infer<typeof clickhouseConfigSchema>;
export type ConnectionTestRequest = z.infer<typeof connectionTestSchema>;

export type ConnectionTestResult = {
  status: 'success' | 'error';
  message: string;
};

const createClient = (config: PostgresConfig) =>
  new Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.username,
    password: config.password,
    connectionTimeoutMillis: CONNECT_TIMEOUT_MS
  });

const quoteTable = (client: Client, table: string) =>
  table
    .split('.')
    .map(part => client.escapeIdentifier(part))
    .join('.');

const release = async (client: Client) => {
  try {
    await client.end();
  } catch (err) {
    console.warn(`[Profiler] Failed to close connection: ${errorMessage(err)}`);
  }
};

type ColumnParser = { name: string; parse: (text: string) => number | bigint };

const parseNumericColumns = (row: Record<string, unknown>, parsers: ColumnParser[]) => {
  if (!parsers.length) return row;
  const parsed = { ...row };
  for (const { name, parse } of parsers) {
    const value = row[name];
    if (typeof value === 'string') parsed[name] = parse(value);
  }
  return parsed;
};

export const samplePostgresTable = async (config: PostgresSourceConfig): Promise<SampledRows> => {
  const client = createClient(config);
  try {
    await client.connect();
    const result = await client.query<Record<string, unknown>>(
      `SELECT * FROM ${quoteTable(client, config.table)} LIMIT ${SAMPLE_LIMIT}`
    );
    const parsers = result.fields.flatMap(field => {
      const parse = NUMERIC_TYPE_PARSERS[field.dataTypeID];
      return parse ? [{ name: field.name, parse }] : [];
    });
    return {
      columns: result.fields.map(field => field.name),
      rows: result.rows.map(row => parseNumericColumns(row, parsers))
    };
  } finally {
    await release(client);
  }
};

const testPostgres = async (config: PostgresConfig): Promise<ConnectionTestResult> => {
  const client = createClient(config);
  try {
    await client.connect();
    await client.query('SELECT 1');
    return { status: 'success', message: 'Connection successful' };
  } finally {
    await release(client);
  }
};

// ClickHouse answers plain queries over its HTTP interface.
const testClickHouse = async (config: ClickHouseConfig): Promise<ConnectionTestResult> => {
  const url = new URL(`http://${config.host}:${config.port}/`);
  url.searchParams.set('query', 'SELECT 1');
  url.searchParams.set('database', config.database);

  const res = await fetch(url, {
    headers: {
      'X-ClickHouse-User': config.username,
      'X-ClickHouse-Key': config.password
    },
    signal: AbortSignal.timeout(CONNECT_TIMEOUT_MS)
  });
  if (!res.ok) {
    return { status: 'error', message: `ClickHouse responded ${res.status}: ${(await res.text()).trim()}` };
  }
  return { status: 'success', message: 'Connection successful' };
};

export const testConnection = async (request: ConnectionTestRequest): Promise<ConnectionTestResult> => {
  try {
    return request.type === 'postgresql' ? await testPostgres(request) : await testClickHouse(request);
  } catch (err) {
    return { status: 'error', message: errorMessage(err, 'Connection failed') };
  }
};
