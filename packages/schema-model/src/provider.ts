/**
 * Provider capability contract.
 *
 * Everything that differs between database engines sits behind this
 * interface: type mapping, quoting, default rendering, catalog queries and
 * the DDL fragments that have no portable spelling. The diff engine and SQL
 * generator only talk to a `Provider`; adding an engine means adding one
 * implementation.
 *
 * @module @tidemark/schema-model
 */

import type { IndexColumnOrder, ProviderName } from '@tidemark/core';
import type { AttributeValue, ScalarType } from '@tidemark/schema';

import type { ColumnInfo, ColumnModification, IndexInfo, ReferentialAction } from './types.js';

/** How a provider applies a column modification */
export type ColumnChangePolicy = 'in-place' | 'drop-and-add' | 'redefine-table';

/** A catalog query with its bound parameters */
export interface CatalogQuery {
  sql: string;
  params: unknown[];
}

/**
 * Catalog queries. Every provider returns the same column aliases so the
 * introspector reads all engines the same way:
 *
 * - `tables`: `table_name`
 * - `columns`: `column_name`, `data_type`, `is_nullable`, `column_default`, `extra`
 * - `primaryKey`: `column_name`, `position`
 * - `indexes`: `index_name`, `column_name`, `position`, `is_unique`, `is_descending`, `is_constraint`
 * - `foreignKeys`: `constraint_name`, `column_name`, `referenced_table`,
 *   `referenced_column`, `position`, `on_delete`, `on_update`
 */
export interface IntrospectionQueries {
  tables(schema: string): CatalogQuery;
  columns(schema: string, table: string): CatalogQuery;
  primaryKey(schema: string, table: string): CatalogQuery;
  indexes(schema: string, table: string): CatalogQuery;
  foreignKeys(schema: string, table: string): CatalogQuery;
}

/** Default and autoincrement state recovered from a catalog default */
export interface ParsedDefault {
  default?: AttributeValue;
  autoIncrement: boolean;
}

/** Catalog column data handed to {@link Provider.parseDefault} */
export interface CatalogColumn {
  /** Already normalized type */
  type: string;
  /** Raw default expression, or null */
  rawDefault: string | null;
  /** Provider-specific extra info (`auto_increment`, `DEFAULT_GENERATED`) */
  extra: string;
}

export interface Provider {
  readonly name: ProviderName;
  /** DDL runs inside transactions and rolls back with them */
  readonly transactionalDdl: boolean;
  /** Foreign keys can be added to an existing table */
  readonly supportsAddForeignKey: boolean;
  /** Creating a foreign key implicitly creates an index with the constraint's name */
  readonly implicitForeignKeyIndexes: boolean;
  /** Whether index column order affects index identity */
  readonly indexColumnOrder: IndexColumnOrder;
  /** `alter` changes tables in place; `redefine` rebuilds them to change columns or constraints */
  readonly alterStrategy: 'alter' | 'redefine';
  /** `inline` puts a single-column primary key on the column itself */
  readonly primaryKeyStyle: 'constraint' | 'inline';
  /** Appended to every CREATE TABLE, e.g. a character set clause */
  readonly createTableSuffix: string;
  /** A backslash inside a string literal escapes the next character */
  readonly backslashEscapes: boolean;

  // ── Identifiers ──

  quoteIdentifier(name: string): string;
  /** Key used to match identifiers between desired and actual schemas */
  normalizeIdentifier(name: string): string;
  /** Bound-parameter placeholder for the 1-based `index` */
  placeholder(index: number): string;
  /** Single-quoted string literal, escaped the way the engine reads it */
  quoteLiteral(text: string): string;

  // ── Types ──

  mapType(scalar: ScalarType, options?: { autoIncrement?: boolean }): string;
  /** Type for `@db.<name>(args)`, or undefined when the provider has no such type */
  mapNativeType(name: string, args: readonly string[]): string | undefined;
  /** Every `name` {@link mapNativeType} accepts */
  readonly nativeTypeNames: readonly string[];
  mapEnumType(enumName: string, values: readonly string[]): string;
  /** Type of a scalar list column, or undefined when lists are unsupported */
  mapListType(elementType: string): string | undefined;
  /** Bring a catalog type name into the canonical spelling `mapType` produces */
  normalizeType(nativeType: string): string;

  // ── Defaults ──

  /** SQL for a default expression; undefined when the value is generated client-side */
  renderDefault(value: AttributeValue, column: Pick<ColumnInfo, 'type'>): string | undefined;
  parseDefault(column: CatalogColumn): ParsedDefault;
  parseReferentialAction(raw: string): ReferentialAction;

  // ── DDL fragments ──

  columnChangePolicy(change: ColumnModification): ColumnChangePolicy;
  /** Full column definition used in CREATE TABLE and ADD COLUMN */
  columnDefinition(column: ColumnInfo, options: { inlinePrimaryKey: boolean; inlineUnique: boolean }): string;
  /** In-place modification statements for one column */
  alterColumnStatements(table: string, change: ColumnModification): string[];
  /** Table-level primary key clause for CREATE TABLE */
  primaryKeyClause(table: string, columns: readonly string[]): string;
  addPrimaryKeyStatement(table: string, columns: readonly string[]): string;
  dropPrimaryKeyStatement(table: string): string;
  dropIndexStatement(table: string, index: IndexInfo): string;
  dropForeignKeyStatement(table: string, name: string): string;
  renameTableStatement(from: string, to: string): string;
  /** Statements that must precede the given DDL (extensions) */
  preamble(ddl: string): string[];

  // ── Catalog and bookkeeping ──

  readonly introspection: IntrospectionQueries;
  ledgerTableDdl(table: string): string;
  /** Statements that drop everything in the target schema */
  resetStatements(schema: string, tables: readonly string[]): string[];
  /** Timestamp value bound into ledger columns */
  formatTimestamp(date: Date): string;
  /** A trivial statement used by health checks */
  readonly pingStatement: string;
}
