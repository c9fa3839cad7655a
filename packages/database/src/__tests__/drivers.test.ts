import { EventEmitter } from 'node:events';

import { ConnectivityError, TidemarkError, createLogger, type LogEntry } from '@tidemark/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { connect } from '../connect.js';
import { type PostgresConnection, postgresDriver, splitSchemaParam } from '../postgres-driver.js';
import { createSqliteDriver, sqlitePath } from '../sqlite-driver.js';
import type { DatabaseDriver } from '../types.js';

describe('sqlitePath', () => {
  it('should strip the scheme and query parameters', () => {
    expect(sqlitePath('file:./dev.db')).toBe('./dev.db');
    expect(sqlitePath('file:dev.db?connection_limit=1')).toBe('dev.db');
    expect(sqlitePath('file:///var/data/app.db')).toBe('/var/data/app.db');
  });

  it('should open an in-memory database for an empty path', () => {
    expect(sqlitePath('sqlite:')).toBe(':memory:');
    expect(sqlitePath('file::memory:')).toBe(':memory:');
  });
});

describe('splitSchemaParam', () => {
  it('should move the schema parameter out of the URL', () => {
    expect(splitSchemaParam('postgresql://localhost:5432/app?schema=tenant&sslmode=disable')).toEqual({
      connectionString: 'postgresql://localhost:5432/app?sslmode=disable',
      schema: 'tenant',
    });
    expect(splitSchemaParam('postgres://localhost/app')).toEqual({ connectionString: 'postgres://localhost/app' });
  });
});

describe('SQLite driver', () => {
  let driver: DatabaseDriver;

  beforeEach(async () => {
    driver = createSqliteDriver('sqlite::memory:');
    await driver.execute('CREATE TABLE flags (id INTEGER PRIMARY KEY, enabled BOOLEAN NOT NULL)');
  });

  afterEach(async () => {
    await driver.close();
  });

  it('should bind booleans as integers', async () => {
    expect(await driver.execute('INSERT INTO flags (id, enabled) VALUES (?, ?)', [1, true])).toBe(1);
    expect(await driver.query('SELECT id, enabled FROM flags')).toEqual([{ id: 1, enabled: 1 }]);
  });

  it('should return no rows for statements that read nothing', async () => {
    expect(await driver.query('DELETE FROM flags')).toEqual([]);
  });

  it('should roll back a failed transaction', async () => {
    await expect(
      driver.transaction(async (tx) => {
        await tx.execute('INSERT INTO flags (id, enabled) VALUES (?, ?)', [1, false]);
        throw new Error('stop');
      }),
    ).rejects.toThrow('stop');
    expect(await driver.query('SELECT COUNT(*) AS n FROM flags')).toEqual([{ n: 0 }]);
  });

  it('should commit a successful transaction and return its result', async () => {
    const result = await driver.transaction(async (tx) => tx.execute('INSERT INTO flags (id, enabled) VALUES (?, ?)', [2, true]));
    expect(result).toBe(1);
    expect(await driver.query('SELECT COUNT(*) AS n FROM flags')).toEqual([{ n: 1 }]);
  });

  it('should report ping latency', async () => {
    expect(await driver.ping()).toBeGreaterThanOrEqual(0);
  });

  it('should fail with a connectivity error when the file cannot be opened', () => {
    expect(() => createSqliteDriver('file:/tidemark-missing-dir/nested/dev.db')).toThrow(ConnectivityError);
  });
});

describe('connect', () => {
  it('should detect SQLite from the URL scheme and log the connection', async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ level: 'debug', handler: (entry) => entries.push(entry) });

    const driver = await connect('file::memory:', { logger });
    expect(driver.provider).toBe('sqlite');
    await driver.close();

    expect(entries.find((e) => e.message === 'connect completed')?.module).toBe('tidemark:driver:sqlite');
  });

  it('should reject URLs without a known scheme', async () => {
    await expect(connect('redis://localhost:6379')).rejects.toBeInstanceOf(TidemarkError);
    await expect(connect('redis://localhost:6379')).rejects.toMatchObject({ code: 'TIDEMARK_C301' });
  });
});

/** In-process stand-in for a connected pg client; `fail` rejects matching statements */
function fakePostgres(fail?: RegExp) {
  const events = new EventEmitter();
  const state: { statements: string[]; ended: boolean } = { statements: [], ended: false };
  const connection: PostgresConnection = {
    query: async (sql) => {
      state.statements.push(sql);
      if (fail?.test(sql)) throw new Error(`schema "tenant" does not exist`);
      return { rows: [{ value: 1 }], rowCount: 1 };
    },
    end: async () => {
      state.ended = true;
    },
    onError: (listener) => {
      events.on('error', listener);
    },
  };
  return { connection, events, state };
}

describe('PostgreSQL driver', () => {
  it('should set the search path for a schema', async () => {
    const fake = fakePostgres();
    const driver = await postgresDriver(fake.connection, { schema: 'tenant' });
    expect(await driver.query('SELECT 1 AS value')).toEqual([{ value: 1 }]);
    expect(fake.state.statements).toEqual(['SET search_path TO "tenant"', 'SELECT 1 AS value']);
  });

  it('should fail later statements once the connection is lost', async () => {
    const entries: LogEntry[] = [];
    const fake = fakePostgres();
    const driver = await postgresDriver(fake.connection, {
      logger: createLogger({ level: 'warn', handler: (entry) => entries.push(entry) }),
    });

    fake.events.emit('error', new Error('Connection terminated unexpectedly'));

    const error = await driver.execute('CREATE TABLE a (id INT)').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error).toMatchObject({
      code: 'TIDEMARK_C300',
      message: 'The postgresql connection was lost: Connection terminated unexpectedly',
    });
    expect(fake.state.statements).toEqual([]);
    expect(entries.map((e) => [e.level, e.message])).toEqual([['error', 'Connection lost']]);
  });

  it('should close the connection when the schema cannot be selected', async () => {
    const fake = fakePostgres(/search_path/);
    const error = await postgresDriver(fake.connection, { schema: 'tenant' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error).toMatchObject({ message: 'Cannot select schema "tenant": schema "tenant" does not exist' });
    expect(fake.state.ended).toBe(true);
  });
});
