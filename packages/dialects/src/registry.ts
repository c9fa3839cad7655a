/**
 * Provider lookup by name or connection URL.
 */

import { type ProviderName, TidemarkError, isProviderName } from '@tidemark/core';
import type { Provider } from '@tidemark/schema-model';

import { MysqlProvider } from './mysql.js';
import { PostgresProvider } from './postgresql.js';
import { SqliteProvider } from './sqlite.js';

const PROVIDERS: Record<ProviderName, Provider> = {
  postgresql: new PostgresProvider(),
  mysql: new MysqlProvider(),
  sqlite: new SqliteProvider(),
};

const URL_SCHEMES: ReadonlyArray<[string, ProviderName]> = [
  ['postgresql://', 'postgresql'],
  ['postgres://', 'postgresql'],
  ['mysql://', 'mysql'],
  ['file:', 'sqlite'],
  ['sqlite:', 'sqlite'],
];

/**
 * Get the provider for a datasource `provider` value.
 *
 * @throws TidemarkError (TIDEMARK_V202) for unknown names
 */
export function getProvider(name: string): Provider {
  if (!isProviderName(name)) {
    throw new TidemarkError({
      code: 'TIDEMARK_V202',
      message: `Unsupported provider \`${name}\``,
      context: { provider: name },
    });
  }
  return PROVIDERS[name];
}

/**
 * Detect the provider from a connection URL scheme.
 *
 * @throws TidemarkError (TIDEMARK_C301) when the scheme is not recognized
 */
export function detectProvider(url: string): ProviderName {
  const lower = url.trim().toLowerCase();
  for (const [scheme, provider] of URL_SCHEMES) {
    if (lower.startsWith(scheme)) return provider;
  }
  throw new TidemarkError({
    code: 'TIDEMARK_C301',
    message: `Cannot detect a provider from connection URL \`${redactUrl(url)}\``,
  });
}

/** Hide the password part of a connection URL */
export function redactUrl(url: string): string {
  return url.replace(/(\/\/[^:/@]+:)[^@]*@/, '$1***@');
}
