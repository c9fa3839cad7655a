/**
 * @tidemark/database — Database drivers and catalog introspection.
 *
 * @example
 * ```typescript
 * import { connect, introspect } from '@tidemark/database';
 * import { getProvider } from '@tidemark/dialects';
 *
 * const driver = await connect('postgresql://localhost/app');
 * const actual = await introspect(driver, getProvider(driver.provider), { schema: 'public' });
 * ```
 *
 * @module @tidemark/database
 */

export { connect } from './connect.js';
export { ConnectionGuard } from './connection-guard.js';
export { introspect, toBool, type IntrospectOptions } from './introspector.js';
export { createMysqlDriver } from './mysql-driver.js';
export { createPostgresDriver, postgresDriver, splitSchemaParam, type PostgresConnection } from './postgres-driver.js';
export { createSqliteDriver, sqlitePath } from './sqlite-driver.js';
export { measure, runInTransaction } from './transaction.js';
export { isRow, type ConnectOptions, type DatabaseDriver, type DriverOptions, type Row } from './types.js';
