/**
 * Catalog introspection.
 *
 * Reads tables, columns, keys, indexes and foreign keys through the
 * provider's catalog queries and builds the same canonical model the diff
 * engine builds from a declaration.
 *
 * @module introspector
 */

import {
  DEFAULT_LEDGER_TABLE,
  IntrospectionError,
  TidemarkError,
  type TidemarkLogger,
  createLogger,
  toError,
} from '@tidemark/core';
import {
  type CanonicalSchema,
  type ColumnInfo,
  type ForeignKeyInfo,
  type IndexInfo,
  type Provider,
  type TableInfo,
  createColumn,
  createTable,
} from '@tidemark/schema-model';

import type { DatabaseDriver, Row } from './types.js';

export interface IntrospectOptions {
  /** PostgreSQL namespace (default `public`); ignored by MySQL and SQLite */
  schema?: string;
  /** Ledger table, left out of the result */
  ledgerTable?: string;
  logger?: TidemarkLogger;
}

/**
 * Read the live schema.
 *
 * Tables whose catalog queries fail are collected and reported together;
 * a partially read catalog is never returned.
 *
 * @throws IntrospectionError when any catalog query fails
 */
export async function introspect(
  driver: DatabaseDriver,
  provider: Provider,
  options: IntrospectOptions = {},
): Promise<CanonicalSchema> {
  const introspector = new Introspector(driver, provider, options);
  return introspector.run();
}

class Introspector {
  private readonly schema: string;
  private readonly ledgerTable: string;
  private readonly logger: TidemarkLogger;

  constructor(
    private readonly driver: DatabaseDriver,
    private readonly provider: Provider,
    options: IntrospectOptions,
  ) {
    this.schema = options.schema ?? 'public';
    this.ledgerTable = options.ledgerTable ?? DEFAULT_LEDGER_TABLE;
    this.logger = (options.logger ?? createLogger({ level: 'warn' })).child('introspect');
  }

  async run(): Promise<CanonicalSchema> {
    const done = this.logger.time('introspect');
    const names = await this.tableNames();

    const tables = new Map<string, TableInfo>();
    const failed: string[] = [];
    let firstFailure: Error | undefined;

    for (const name of names) {
      try {
        tables.set(this.provider.normalizeIdentifier(name), await this.readTable(name));
      } catch (error) {
        const cause = toError(error);
        this.logger.warn('Could not read table', { table: name, error: cause.message });
        failed.push(name);
        firstFailure ??= cause;
      }
    }

    if (failed.length > 0) {
      throw new IntrospectionError({ failedTables: failed, partial: tables.size > 0, cause: firstFailure });
    }

    done({ tables: tables.size });
    return { tables };
  }

  private async tableNames(): Promise<string[]> {
    const ledger = this.provider.normalizeIdentifier(this.ledgerTable);
    let rows: Row[];
    try {
      rows = await this.catalog(this.provider.introspection.tables(this.schema));
    } catch (error) {
      throw new IntrospectionError({ failedTables: [], partial: false, cause: toError(error) });
    }
    return rows
      .map((row) => text(row, 'table_name'))
      .filter((name) => this.provider.normalizeIdentifier(name) !== ledger && !name.startsWith('sqlite_'));
  }

  private async readTable(name: string): Promise<TableInfo> {
    const queries = this.provider.introspection;
    const table = createTable(name);

    for (const row of await this.catalog(queries.columns(this.schema, name))) {
      const column = this.readColumn(row);
      table.columns.set(this.provider.normalizeIdentifier(column.name), column);
    }

    const primaryKey = await this.catalog(queries.primaryKey(this.schema, name));
    table.primaryKey = byPosition(primaryKey).map((row) => text(row, 'column_name'));
    for (const columnName of table.primaryKey) {
      const column = table.columns.get(this.provider.normalizeIdentifier(columnName));
      if (column) column.primaryKey = true;
    }

    table.foreignKeys = this.readForeignKeys(await this.catalog(queries.foreignKeys(this.schema, name)));
    table.indexes = this.readIndexes(await this.catalog(queries.indexes(this.schema, name)), table.foreignKeys);

    for (const index of table.indexes) {
      const only = index.columns[0];
      if (!index.unique || index.columns.length !== 1 || !only) continue;
      const column = table.columns.get(this.provider.normalizeIdentifier(only.name));
      if (column) column.unique = true;
    }

    return table;
  }

  private readColumn(row: Row): ColumnInfo {
    const type = this.provider.normalizeType(text(row, 'data_type'));
    const rawDefault = row['column_default'];
    const parsed = this.provider.parseDefault({
      type,
      rawDefault: rawDefault === null || rawDefault === undefined ? null : String(rawDefault),
      extra: optionalText(row, 'extra') ?? '',
    });

    return createColumn(text(row, 'column_name'), type, {
      nullable: toBool(row['is_nullable']),
      autoIncrement: parsed.autoIncrement,
      ...(parsed.default ? { default: parsed.default } : {}),
    });
  }

  /**
   * Group index rows by name. Engines that create an index for every
   * foreign key report it as a plain index named after the constraint;
   * those are left out.
   */
  private readIndexes(rows: Row[], foreignKeys: readonly ForeignKeyInfo[]): IndexInfo[] {
    const fkNames = new Set(foreignKeys.map((fk) => fk.name));
    const indexes: IndexInfo[] = [];

    for (const [name, group] of groupBy(rows, 'index_name')) {
      const first = group[0];
      if (!first) continue;
      const unique = toBool(first['is_unique']);
      if (this.provider.implicitForeignKeyIndexes && !unique && fkNames.has(name)) continue;

      indexes.push({
        name,
        columns: byPosition(group).map((row) => ({
          name: text(row, 'column_name'),
          ...(toBool(row['is_descending']) ? { sort: 'desc' as const } : {}),
        })),
        unique,
        ...(toBool(first['is_constraint']) ? { constraint: true } : {}),
      });
    }
    return indexes;
  }

  private readForeignKeys(rows: Row[]): ForeignKeyInfo[] {
    const foreignKeys: ForeignKeyInfo[] = [];
    for (const [name, group] of groupBy(rows, 'constraint_name')) {
      const ordered = byPosition(group);
      const first = ordered[0];
      if (!first) continue;
      foreignKeys.push({
        name,
        columns: ordered.map((row) => text(row, 'column_name')),
        referencedTable: text(first, 'referenced_table'),
        referencedColumns: ordered.map((row) => text(row, 'referenced_column')),
        onDelete: this.provider.parseReferentialAction(optionalText(first, 'on_delete') ?? 'NO ACTION'),
        onUpdate: this.provider.parseReferentialAction(optionalText(first, 'on_update') ?? 'NO ACTION'),
      });
    }
    return foreignKeys;
  }

  private catalog(query: { sql: string; params: unknown[] }): Promise<Row[]> {
    return this.driver.query(query.sql, query.params);
  }
}

// ─── Row helpers ─────────────────────────────────────────────────────────────

/** Catalog booleans arrive as booleans, 0/1 or `YES`/`NO` depending on the engine */
export function toBool(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value) !== 0;
  if (typeof value === 'string') return ['yes', 'true', 't', '1'].includes(value.trim().toLowerCase());
  return false;
}

function optionalText(row: Row, key: string): string | undefined {
  const value = row[key];
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return undefined;
}

function text(row: Row, key: string): string {
  const value = optionalText(row, key);
  if (value === undefined) {
    throw new TidemarkError({
      code: 'TIDEMARK_X900',
      message: `Catalog row has no \`${key}\` value`,
      context: { key, row },
    });
  }
  return value;
}

function position(row: Row): number {
  const value = row['position'];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint' || typeof value === 'string') return Number(value);
  return 0;
}

function byPosition(rows: readonly Row[]): Row[] {
  return [...rows].sort((a, b) => position(a) - position(b));
}

/** Rows grouped by a key column, in first-seen order */
function groupBy(rows: readonly Row[], key: string): Map<string, Row[]> {
  const groups = new Map<string, Row[]>();
  for (const row of rows) {
    const name = text(row, key);
    const group = groups.get(name);
    if (group) group.push(row);
    else groups.set(name, [row]);
  }
  return groups;
}
