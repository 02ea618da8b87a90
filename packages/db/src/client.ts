import { loadRuntimeConfig } from '@fxconvert/config';
import postgres from 'postgres';
import { loadDbConfig } from './pool-config.js';

type QueryRow = Record<string, unknown>;
type PostgresSql = ReturnType<typeof postgres>;

let singletonSql: PostgresSql | undefined;

export interface QueryResult<Row extends QueryRow = QueryRow> {
  rows: Row[];
  rowCount: number;
}

export interface Queryable {
  query: <Row extends QueryRow = QueryRow>(sql: string, params?: unknown[]) => Promise<QueryResult<Row>>;
}

type ParameterValue = NonNullable<Parameters<PostgresSql['unsafe']>[1]>[number];

function normalizeParam(param: unknown): ParameterValue {
  if (param === undefined || param === null) {
    return null;
  }

  if (param instanceof Date) {
    return param.toISOString();
  }

  if (typeof param === 'string' || typeof param === 'number' || typeof param === 'boolean') {
    return param;
  }

  if (typeof param === 'bigint') {
    return param.toString();
  }

  return JSON.stringify(param);
}

export function normalizeQueryParams(params: unknown[] = []): ParameterValue[] {
  return params.map((param) => normalizeParam(param));
}

export function withStatementTimeout(connectionString: string, statementTimeoutMs: number): string {
  try {
    const url = new URL(connectionString);
    if (!url.searchParams.has('statement_timeout')) {
      url.searchParams.set('statement_timeout', String(statementTimeoutMs));
    }
    return url.toString();
  } catch {
    return connectionString;
  }
}

function toRowCount(rows: { length: number; count?: unknown }): number {
  const resultCount = rows.count;
  if (typeof resultCount === 'number') {
    return resultCount;
  }
  if (typeof resultCount === 'bigint') {
    return Number(resultCount);
  }
  return rows.length;
}

export function createQueryAdapter(sql: PostgresSql): Queryable {
  return {
    query: async <Row extends QueryRow = QueryRow>(queryText: string, params: unknown[] = []): Promise<QueryResult<Row>> => {
      const rows = await sql.unsafe<Row[]>(queryText, normalizeQueryParams(params));
      return {
        rows: [...rows],
        rowCount: toRowCount(rows)
      };
    }
  };
}

export function getSql(): PostgresSql {
  if (singletonSql) {
    return singletonSql;
  }

  const runtime = loadRuntimeConfig();
  const config = loadDbConfig();
  const connectionString = withStatementTimeout(runtime.DATABASE_URL, config.statementTimeoutMs);

  singletonSql = postgres(connectionString, {
    max: config.maxConnections,
    idle_timeout: config.idleTimeoutSeconds,
    connect_timeout: config.connectTimeoutSeconds,
    max_lifetime: config.maxLifetimeSeconds,
    prepare: config.prepareStatements,
    onnotice: () => undefined
  });

  return singletonSql;
}

/** Lazily connected pool-backed query adapter; nothing connects until the first query. */
export const db: Queryable = {
  query: <Row extends QueryRow = QueryRow>(queryText: string, params: unknown[] = []) =>
    createQueryAdapter(getSql()).query<Row>(queryText, params)
};

export async function query<Row extends QueryRow = QueryRow>(
  queryText: string,
  params: unknown[] = []
): Promise<QueryResult<Row>> {
  return db.query<Row>(queryText, params);
}

export async function dbHealthcheck(): Promise<boolean> {
  const result = await query<{ ok: number }>('select 1 as ok');
  return result.rows[0]?.ok === 1;
}

export async function closeDb(): Promise<void> {
  if (singletonSql) {
    await singletonSql.end({ timeout: 5 });
    singletonSql = undefined;
  }
}
