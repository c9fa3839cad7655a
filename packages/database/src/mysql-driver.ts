import mysql from 'mysql2/promise';
import type { Connection } from 'mysql2/promise';

import { ConnectivityError, createLogger, toError } from '@tidemark/core';
import { redactUrl } from '@tidemark/dialects';

import { ConnectionGuard } from './connection-guard.js';
import { measure, runInTransaction } from './transaction.js';
import { type DatabaseDriver, type DriverOptions, isRow } from './types.js';

async function open(url: string): Promise<Connection> {
  try {
    return await mysql.createConnection({ uri: url });
  } catch (error) {
    const cause = toError(error);
    throw new ConnectivityError('mysql', cause, `Cannot reach ${redactUrl(url)}: ${cause.message}`);
  }
}

/**
 * Connect with `mysql2/promise`. The database named in the URL path is the
 * one introspected and migrated. A connection dropped between statements
 * fails the next statement with ConnectivityError.
 *
 * @throws ConnectivityError when the server cannot be reached
 */
export async function createMysqlDriver(url: string, options: DriverOptions = {}): Promise<DatabaseDriver> {
  const logger = options.logger ?? createLogger({ level: 'warn' });

  const connection = await open(url);
  const guard = new ConnectionGuard('mysql', logger);
  connection.on('error', guard.onError);

  const run = async (sql: string, params: readonly unknown[]) => {
    guard.assertUsable();
    logger.debug('statement', { sql });
    const [result] = await connection.query(sql, [...params]);
    return result;
  };

  const driver: DatabaseDriver = {
    provider: 'mysql',

    query: async (sql, params = []) => {
      const result = await run(sql, params);
      if (!Array.isArray(result)) return [];
      const rows: unknown[] = result;
      return rows.filter(isRow);
    },

    execute: async (sql, params = []) => {
      const result = await run(sql, params);
      return !Array.isArray(result) && 'affectedRows' in result ? result.affectedRows : 0;
    },

    transaction: (fn) => runInTransaction(driver, 'START TRANSACTION', fn, logger),

    ping: () => measure(() => driver.query(options.pingStatement ?? 'SELECT 1')),

    close: () => connection.end(),
  };

  return driver;
}
