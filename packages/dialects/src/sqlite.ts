/**
 * SQLite provider.
 *
 * SQLite cannot alter a column or constraint in place; such changes rebuild
 * the table (see the SQL generator). Identifiers are matched
 * case-insensitively, as SQLite itself does.
 *
 * @module sqlite
 */

import { TidemarkError } from '@tidemark/core';
import type { ScalarType } from '@tidemark/schema';
import type {
  CatalogColumn,
  ColumnChangePolicy,
  IntrospectionQueries,
  ParsedDefault,
} from '@tidemark/schema-model';

import { BaseProvider, type LedgerColumnTypes } from './base-provider.js';
import { NUMERIC_LITERAL, booleanValue, callValue, dbGenerated, numberValue, unquoteLiteral } from './literals.js';

const SCALAR_TYPES: Record<ScalarType, string> = {
  String: 'TEXT',
  Int: 'INTEGER',
  BigInt: 'BIGINT',
  Float: 'REAL',
  Decimal: 'DECIMAL',
  Boolean: 'BOOLEAN',
  DateTime: 'DATETIME',
  Json: 'TEXT',
  Bytes: 'BLOB',
};

export class SqliteProvider extends BaseProvider {
  readonly name = 'sqlite' as const;
  readonly transactionalDdl = true;
  readonly supportsAddForeignKey = false;
  override readonly alterStrategy = 'redefine' as const;
  override readonly primaryKeyStyle = 'inline' as const;

  protected readonly ledgerColumnTypes: LedgerColumnTypes = {
    id: 'TEXT',
    checksum: 'TEXT',
    name: 'TEXT',
    text: 'TEXT',
    timestamp: 'DATETIME',
    count: 'INTEGER',
  };

  override normalizeIdentifier(name: string): string {
    return name.toLowerCase();
  }

  // ─── Types ───────────────────────────────────────────────────────────────────

  /** AUTOINCREMENT is only accepted on an INTEGER primary key */
  mapType(scalar: ScalarType, options?: { autoIncrement?: boolean }): string {
    return options?.autoIncrement ? 'INTEGER' : SCALAR_TYPES[scalar];
  }

  readonly nativeTypeNames: readonly string[] = [];

  mapNativeType(): undefined {
    return undefined;
  }

  mapEnumType(): string {
    return 'TEXT';
  }

  mapListType(): undefined {
    return undefined;
  }

  normalizeType(nativeType: string): string {
    return nativeType.trim().replace(/\s+/g, ' ').toUpperCase();
  }

  // ─── Defaults ────────────────────────────────────────────────────────────────

  parseDefault(column: CatalogColumn): ParsedDefault {
    const autoIncrement = column.extra === 'auto_increment';
    if (column.rawDefault === null) return { autoIncrement };
    const raw = column.rawDefault.trim();

    const literal = unquoteLiteral(raw);
    if (literal !== undefined) return { default: this.literalDefault(literal, column.type), autoIncrement };
    if (NUMERIC_LITERAL.test(raw)) return { default: numberValue(raw), autoIncrement };
    if (/^(true|false)$/i.test(raw)) return { default: booleanValue(raw.toLowerCase() === 'true'), autoIncrement };
    if (/^CURRENT_TIMESTAMP$/i.test(raw)) return { default: callValue('now'), autoIncrement };
    return { default: dbGenerated(raw), autoIncrement };
  }

  // ─── DDL ─────────────────────────────────────────────────────────────────────

  override columnChangePolicy(): ColumnChangePolicy {
    return 'redefine-table';
  }

  protected override autoIncrementClause(): string {
    return 'AUTOINCREMENT';
  }

  alterColumnStatements(table: string): string[] {
    throw new TidemarkError({
      code: 'TIDEMARK_X900',
      message: `SQLite cannot alter columns in place; table \`${table}\` must be redefined`,
      context: { table },
    });
  }

  protected override foreignKeyChecks(enabled: boolean): string[] {
    return [`PRAGMA foreign_keys = ${enabled ? 'ON' : 'OFF'}`];
  }

  // ─── Catalog ─────────────────────────────────────────────────────────────────

  // The pragma table-valued functions take the table name; `?` is bound once per use.
  readonly introspection: IntrospectionQueries = {
    tables: () => ({
      sql: `SELECT name AS table_name
FROM sqlite_master
WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
ORDER BY name`,
      params: [],
    }),

    columns: (_schema, table) => ({
      sql: `SELECT name AS column_name,
       type AS data_type,
       "notnull" = 0 AS is_nullable,
       dflt_value AS column_default,
       CASE
         WHEN pk = 1
          AND (SELECT COUNT(*) FROM pragma_table_info(?) WHERE pk > 0) = 1
          AND (SELECT sql FROM sqlite_master WHERE type = 'table' AND name = ?) LIKE '%AUTOINCREMENT%'
         THEN 'auto_increment'
         ELSE ''
       END AS extra
FROM pragma_table_info(?)
ORDER BY cid`,
      params: [table, table, table],
    }),

    primaryKey: (_schema, table) => ({
      sql: `SELECT name AS column_name, pk AS position
FROM pragma_table_info(?)
WHERE pk > 0
ORDER BY pk`,
      params: [table],
    }),

    indexes: (_schema, table) => ({
      sql: `SELECT il.name AS index_name,
       ii.name AS column_name,
       ii.seqno AS position,
       il."unique" AS is_unique,
       ii."desc" AS is_descending,
       il.origin = 'u' AS is_constraint
FROM pragma_index_list(?) AS il
JOIN pragma_index_xinfo(il.name) AS ii
WHERE il.origin <> 'pk' AND ii.key = 1
ORDER BY il.name, ii.seqno`,
      params: [table],
    }),

    foreignKeys: (_schema, table) => ({
      sql: `SELECT 'fk_' || id AS constraint_name,
       "from" AS column_name,
       "table" AS referenced_table,
       "to" AS referenced_column,
       seq AS position,
       on_delete,
       on_update
FROM pragma_foreign_key_list(?)
ORDER BY id, seq`,
      params: [table],
    }),
  };
}
