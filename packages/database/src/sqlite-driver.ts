import Database from 'better-sqlite3';

import { ConnectivityError, createLogger, toError } from '@tidemark/core';

import { measure, runInTransaction } from './transaction.js';
import { type DatabaseDriver, type DriverOptions, isRow } from './types.js';

const MEMORY = ':memory:';

/**
 * File path of a `file:` or `sqlite:` URL. Query parameters are ignored,
 * relative paths resolve against the working directory and an empty path
 * opens an in-memory database.
 */
export function sqlitePath(url: string): string {
  const path = url
    .trim()
    .replace(/^(file|sqlite):/i, '')
    .replace(/^\/\/(?=[./]|[A-Za-z]:)/, '')
    .replace(/\?.*$/, '');
  return path === '' ? MEMORY : path;
}

/** better-sqlite3 rejects booleans and undefined */
function bindable(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  return value;
}

function open(path: string): Database.Database {
  try {
    const db = new Database(path);
    db.pragma('foreign_keys = ON');
    return db;
  } catch (error) {
    const cause = toError(error);
    throw new ConnectivityError('sqlite', cause, `Cannot open SQLite database \`${path}\`: ${cause.message}`);
  }
}

/**
 * Create a better-sqlite3 driver. Foreign key enforcement is switched on.
 *
 * @throws ConnectivityError when the database file cannot be opened
 */
export function createSqliteDriver(url: string, options: DriverOptions = {}): DatabaseDriver {
  const logger = options.logger ?? createLogger({ level: 'warn' });
  const path = sqlitePath(url);
  const db = open(path);

  const prepare = (sql: string) => {
    logger.debug('statement', { sql });
    return db.prepare(sql);
  };

  const driver: DatabaseDriver = {
    provider: 'sqlite',

    query: async (sql, params = []) => {
      const statement = prepare(sql);
      const args = params.map(bindable);
      if (!statement.reader) {
        statement.run(...args);
        return [];
      }
      return statement.all(...args).filter(isRow);
    },

    execute: async (sql, params = []) => {
      const statement = prepare(sql);
      const args = params.map(bindable);
      if (statement.reader) {
        statement.all(...args);
        return 0;
      }
      return statement.run(...args).changes;
    },

    transaction: (fn) => runInTransaction(driver, 'BEGIN', fn, logger),

    ping: () => measure(() => driver.query(options.pingStatement ?? 'SELECT 1')),

    close: async () => {
      if (db.open) db.close();
    },
  };

  return driver;
}
