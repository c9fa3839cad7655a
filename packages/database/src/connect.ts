import { type ProviderName, createLogger } from '@tidemark/core';
import { detectProvider, getProvider, redactUrl } from '@tidemark/dialects';

import { createMysqlDriver } from './mysql-driver.js';
import { createPostgresDriver } from './postgres-driver.js';
import { createSqliteDriver } from './sqlite-driver.js';
import type { ConnectOptions, DatabaseDriver, DriverOptions } from './types.js';

/**
 * Open a driver for a connection URL. The provider is detected from the
 * scheme: `postgresql://`, `postgres://`, `mysql://`, `file:` or `sqlite:`.
 *
 * @example
 * ```typescript
 * const driver = await connect('file:./dev.db');
 * const latency = await driver.ping();
 * await driver.close();
 * ```
 *
 * @throws TidemarkError (TIDEMARK_C301) for an unrecognized scheme
 * @throws ConnectivityError when the database cannot be reached
 */
export async function connect(url: string, options: ConnectOptions = {}): Promise<DatabaseDriver> {
  const name = detectProvider(url);
  const logger = (options.logger ?? createLogger({ level: 'warn' })).child(`driver:${name}`);
  const driverOptions = { ...options, logger, pingStatement: getProvider(name).pingStatement };

  const done = logger.time('connect');
  const driver = await open(name, url, driverOptions);
  done({ url: redactUrl(url) });
  return driver;
}

async function open(name: ProviderName, url: string, options: DriverOptions): Promise<DatabaseDriver> {
  switch (name) {
    case 'postgresql':
      return createPostgresDriver(url, options);
    case 'mysql':
      return createMysqlDriver(url, options);
    case 'sqlite':
      return createSqliteDriver(url, options);
  }
}
