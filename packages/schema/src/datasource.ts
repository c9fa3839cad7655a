/**
 * Datasource resolution.
 */

import { type ProviderName, isProviderName } from '@tidemark/core';

import { type AttributeValue, type Schema, getArgument, getProperty, valueAsString } from './ast.js';

/** Where the connection URL comes from */
export type DatasourceUrl = { kind: 'literal'; value: string } | { kind: 'env'; variable: string };

export interface DatasourceConfig {
  name: string;
  /** Absent when the block names no supported provider */
  provider?: ProviderName;
  url?: DatasourceUrl;
  shadowDatabaseUrl?: DatasourceUrl;
}

/**
 * Read the first datasource block. Environment variables are not resolved
 * here; see {@link resolveDatasourceUrl}.
 */
export function getDatasource(schema: Schema): DatasourceConfig | undefined {
  const datasource = schema.datasources[0];
  if (!datasource) return undefined;

  const provider = valueAsString(getProperty(datasource, 'provider'));
  return {
    name: datasource.name,
    provider: provider !== undefined && isProviderName(provider) ? provider : undefined,
    url: readUrl(getProperty(datasource, 'url')),
    shadowDatabaseUrl: readUrl(getProperty(datasource, 'shadowDatabaseUrl')),
  };
}

function readUrl(value: AttributeValue | undefined): DatasourceUrl | undefined {
  if (!value) return undefined;
  if (value.kind === 'string') return { kind: 'literal', value: value.value };
  if (value.kind === 'call' && value.name === 'env') {
    const variable = valueAsString(getArgument(value, 'name', 0));
    return variable === undefined ? undefined : { kind: 'env', variable };
  }
  return undefined;
}

/**
 * Resolve a datasource URL against an environment map supplied by the caller.
 */
export function resolveDatasourceUrl(
  url: DatasourceUrl,
  env: Readonly<Record<string, string | undefined>>,
): string | undefined {
  return url.kind === 'literal' ? url.value : env[url.variable];
}
