/**
 * @tidemark/dialects — PostgreSQL, MySQL and SQLite providers.
 *
 * @example
 * ```typescript
 * import { detectProvider, getProvider } from '@tidemark/dialects';
 *
 * const provider = getProvider(detectProvider('postgresql://localhost/app'));
 * provider.mapType('DateTime'); // 'TIMESTAMP(3)'
 * ```
 *
 * @module @tidemark/dialects
 */

export { BaseProvider, type LedgerColumnTypes } from './base-provider.js';
export { MysqlProvider } from './mysql.js';
export { PostgresProvider } from './postgresql.js';
export { SqliteProvider } from './sqlite.js';
export { detectProvider, getProvider, redactUrl } from './registry.js';
export { quoteLiteral, unquoteLiteral } from './literals.js';
