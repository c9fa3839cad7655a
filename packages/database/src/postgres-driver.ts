import pg from 'pg';

import { ConnectivityError, createLogger, toError } from '@tidemark/core';
import { redactUrl } from '@tidemark/dialects';

import { ConnectionGuard } from './connection-guard.js';
import { measure, runInTransaction } from './transaction.js';
import type { DatabaseDriver, DriverOptions, Row } from './types.js';

/** The parts of a connected `pg.Client` the driver uses */
export interface PostgresConnection {
  query(sql: string, params: unknown[]): Promise<{ rows: Row[]; rowCount: number | null }>;
  end(): Promise<void>;
  onError(listener: (error: Error) => void): void;
}

/**
 * Split a `schema` query parameter off a PostgreSQL URL; the server would
 * reject it as an unknown startup parameter.
 */
export function splitSchemaParam(url: string): { connectionString: string; schema?: string } {
  const parsed = new URL(url);
  const schema = parsed.searchParams.get('schema') ?? undefined;
  parsed.searchParams.delete('schema');
  return { connectionString: parsed.toString(), ...(schema ? { schema } : {}) };
}

/**
 * Connect a `pg` client. The namespace comes from `options.schema`, then the
 * URL's `schema` parameter, and becomes the session's `search_path`.
 *
 * @throws ConnectivityError when the server cannot be reached
 */
export async function createPostgresDriver(url: string, options: DriverOptions = {}): Promise<DatabaseDriver> {
  const { connectionString, schema: urlSchema } = splitSchemaParam(url);

  const client = new pg.Client({ connectionString });
  try {
    await client.connect();
  } catch (error) {
    const cause = toError(error);
    throw new ConnectivityError('postgresql', cause, `Cannot reach ${redactUrl(url)}: ${cause.message}`);
  }

  const connection: PostgresConnection = {
    query: (sql, params) => client.query<Row>(sql, params),
    end: () => client.end(),
    onError: (listener) => {
      client.on('error', listener);
    },
  };
  const schema = options.schema ?? urlSchema;
  return postgresDriver(connection, { ...options, ...(schema ? { schema } : {}) });
}

/**
 * Driver over an open connection. A dropped connection is reported on the
 * next statement; a `search_path` that cannot be set closes the connection.
 *
 * @throws ConnectivityError when `options.schema` cannot be selected
 */
export async function postgresDriver(connection: PostgresConnection, options: DriverOptions = {}): Promise<DatabaseDriver> {
  const logger = options.logger ?? createLogger({ level: 'warn' });
  const guard = new ConnectionGuard('postgresql', logger);
  connection.onError(guard.onError);

  const run = async (sql: string, params: readonly unknown[]) => {
    guard.assertUsable();
    logger.debug('statement', { sql });
    return connection.query(sql, [...params]);
  };

  const driver: DatabaseDriver = {
    provider: 'postgresql',

    query: async (sql, params = []) => (await run(sql, params)).rows,

    execute: async (sql, params = []) => (await run(sql, params)).rowCount ?? 0,

    transaction: (fn) => runInTransaction(driver, 'BEGIN', fn, logger),

    ping: () => measure(() => driver.query(options.pingStatement ?? 'SELECT 1')),

    close: () => connection.end(),
  };

  const { schema } = options;
  if (schema) {
    try {
      await driver.execute(`SET search_path TO "${schema.replace(/"/g, '""')}"`);
    } catch (error) {
      const cause = toError(error);
      await connection.end().catch((closeError: unknown) => {
        logger.warn('Closing the connection failed', { error: toError(closeError).message });
      });
      throw new ConnectivityError('postgresql', cause, `Cannot select schema "${schema}": ${cause.message}`);
    }
  }
  return driver;
}
