import { Pool, type PoolClient } from 'pg';
import type { ServiceConfig } from '../config/serviceConfig';
import type { Logger } from '../logger';
import { runMigrations } from './migrations';

export type Row = Record<string, unknown>;

export interface QueryOutput {
  rows: Row[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: readonly unknown[]): Promise<QueryOutput>;
}

export interface Database {
  withConnection<T>(fn: (client: Queryable) => Promise<T>): Promise<T>;
  withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T>;
  ensureSchemaReady(): Promise<void>;
  close(): Promise<void>;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export function quoteLiteral(input: string): string {
  return `'${input.replace(/'/g, "''")}'`;
}

function toQueryable(client: PoolClient): Queryable {
  return {
    query: async (text, values) => {
      const result = await client.query(text, values ? [...values] : undefined);
      return { rows: result.rows, rowCount: result.rowCount };
    }
  };
}

/** Runs `fn` inside BEGIN/COMMIT on the given client, rolling back when it throws. */
export async function runInTransaction<T>(
  client: Queryable,
  logger: Logger,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  await client.query('BEGIN');
  try {
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      logger.error({ err: rollbackErr }, 'failed to rollback transaction');
    }
    throw err;
  }
}

export function createDatabase(config: Pick<ServiceConfig, 'database'>, logger: Logger): Database {
  const settings = config.database;
  const log = logger.child({ component: 'postgres' });
  const pool = new Pool({
    connectionString: settings.url,
    max: settings.maxConnections,
    idleTimeoutMillis: settings.idleTimeoutMs,
    connectionTimeoutMillis: settings.connectionTimeoutMs
  });

  pool.on('error', (err: Error) => {
    log.error({ err }, 'unexpected error on idle postgres client');
  });

  async function acquire(setSearchPath: boolean): Promise<PoolClient> {
    const client = await pool.connect();
    if (!setSearchPath) {
      return client;
    }
    try {
      await client.query(`SET search_path TO ${quoteIdentifier(settings.schema)}, public`);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await acquire(true);
    try {
      return await fn(toQueryable(client));
    } finally {
      client.release();
    }
  }

  async function withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    return withConnection((client) => runInTransaction(client, log, fn));
  }

  let schemaReadyPromise: Promise<void> | null = null;

  async function prepareSchema(): Promise<void> {
    const rawClient = await acquire(false);
    try {
      await rawClient.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(settings.schema)}`);
    } finally {
      rawClient.release();
    }
    await withConnection((client) => runMigrations(client, log));
  }

  async function ensureSchemaReady(): Promise<void> {
    if (!schemaReadyPromise) {
      schemaReadyPromise = prepareSchema().catch((err: unknown) => {
        schemaReadyPromise = null;
        throw err;
      });
    }
    await schemaReadyPromise;
  }

  async function close(): Promise<void> {
    await pool.end();
  }

  return { withConnection, withTransaction, ensureSchemaReady, close };
}
