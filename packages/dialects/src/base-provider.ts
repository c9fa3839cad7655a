/**
 * BaseProvider - shared behaviour of the built-in providers.
 *
 * Subclasses supply the type tables, catalog queries and the handful of DDL
 * spellings that differ per engine; quoting, default rendering, column
 * definitions and the ledger table are shared.
 *
 * @module base-provider
 */

import type { IndexColumnOrder, ProviderName } from '@tidemark/core';
import type { AttributeValue, FunctionCallValue, ScalarType } from '@tidemark/schema';
import {
  type CatalogColumn,
  type ColumnChangePolicy,
  type ColumnInfo,
  type ColumnModification,
  type IndexInfo,
  type IntrospectionQueries,
  type ParsedDefault,
  type Provider,
  type ReferentialAction,
  areCastCompatible,
  typeFamily,
} from '@tidemark/schema-model';

import {
  NUMERIC_LITERAL,
  booleanValue,
  firstStringArgument,
  numberValue,
  quoteLiteral,
  stringValue,
} from './literals.js';

const REFERENTIAL_ACTIONS: readonly ReferentialAction[] = [
  'CASCADE',
  'RESTRICT',
  'NO ACTION',
  'SET NULL',
  'SET DEFAULT',
];

/** Column types of the migration ledger table */
export interface LedgerColumnTypes {
  id: string;
  checksum: string;
  name: string;
  text: string;
  timestamp: string;
  count: string;
}

/**
 * Abstract base class for database providers.
 *
 * @example Implementing a provider
 * ```typescript
 * class CockroachProvider extends PostgresProvider {
 *   override readonly transactionalDdl = false;
 * }
 * ```
 */
export abstract class BaseProvider implements Provider {
  abstract readonly name: ProviderName;
  abstract readonly transactionalDdl: boolean;
  abstract readonly supportsAddForeignKey: boolean;
  abstract readonly introspection: IntrospectionQueries;

  readonly implicitForeignKeyIndexes: boolean = false;
  readonly indexColumnOrder: IndexColumnOrder = 'insignificant';
  readonly alterStrategy: 'alter' | 'redefine' = 'alter';
  readonly primaryKeyStyle: 'constraint' | 'inline' = 'constraint';
  readonly createTableSuffix: string = '';
  readonly pingStatement: string = 'SELECT 1';
  readonly backslashEscapes: boolean = false;

  /** Column types of the migration ledger */
  protected abstract readonly ledgerColumnTypes: LedgerColumnTypes;

  abstract mapType(scalar: ScalarType, options?: { autoIncrement?: boolean }): string;
  abstract mapNativeType(name: string, args: readonly string[]): string | undefined;
  abstract readonly nativeTypeNames: readonly string[];
  abstract mapEnumType(enumName: string, values: readonly string[]): string;
  abstract mapListType(elementType: string): string | undefined;
  abstract normalizeType(nativeType: string): string;
  abstract parseDefault(column: CatalogColumn): ParsedDefault;
  abstract alterColumnStatements(table: string, change: ColumnModification): string[];

  // ─── Identifiers ─────────────────────────────────────────────────────────────

  quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
  }

  normalizeIdentifier(name: string): string {
    return name;
  }

  placeholder(_index: number): string {
    return '?';
  }

  quoteLiteral(text: string): string {
    return quoteLiteral(text, this.backslashEscapes);
  }

  // ─── Defaults ────────────────────────────────────────────────────────────────

  renderDefault(value: AttributeValue, column: Pick<ColumnInfo, 'type'>): string | undefined {
    switch (value.kind) {
      case 'string':
      case 'identifier':
        return this.quoteLiteral(value.value);
      case 'number':
        return value.raw;
      case 'boolean':
        return value.value ? 'true' : 'false';
      case 'list':
        return this.renderListDefault(value.items, column);
      case 'call':
        return this.renderCallDefault(value, column);
    }
  }

  parseReferentialAction(raw: string): ReferentialAction {
    const normalized = raw.trim().toUpperCase().replace(/_/g, ' ');
    return REFERENTIAL_ACTIONS.find((action) => action === normalized) ?? 'NO ACTION';
  }

  protected renderListDefault(_items: AttributeValue[], _column: Pick<ColumnInfo, 'type'>): string | undefined {
    return undefined;
  }

  protected renderCallDefault(call: FunctionCallValue, column: Pick<ColumnInfo, 'type'>): string | undefined {
    switch (call.name) {
      case 'now':
        return this.currentTimestamp(column.type);
      case 'dbgenerated':
        return firstStringArgument(call);
      case 'uuid':
        return this.uuidExpression();
      default:
        // autoincrement() lives on the column; cuid() and friends are client-side.
        return undefined;
    }
  }

  protected currentTimestamp(_type: string): string {
    return 'CURRENT_TIMESTAMP';
  }

  /** Database-side UUID generator, when the engine has one */
  protected uuidExpression(): string | undefined {
    return undefined;
  }

  /** Interpret the text of a literal default according to the column type */
  protected literalDefault(text: string, type: string): AttributeValue {
    const family = typeFamily(type);
    if ((family === 'integer' || family === 'decimal' || family === 'float') && NUMERIC_LITERAL.test(text)) {
      return numberValue(text);
    }
    if (family === 'boolean') {
      const lower = text.toLowerCase();
      if (lower === 'true' || lower === 't' || lower === '1') return booleanValue(true);
      if (lower === 'false' || lower === 'f' || lower === '0') return booleanValue(false);
    }
    return stringValue(text);
  }

  // ─── DDL ─────────────────────────────────────────────────────────────────────

  columnChangePolicy(change: ColumnModification): ColumnChangePolicy {
    if (!change.changes.includes('type')) return 'in-place';
    return areCastCompatible(change.from.type, change.to.type) ? 'in-place' : 'drop-and-add';
  }

  columnDefinition(column: ColumnInfo, options: { inlinePrimaryKey: boolean; inlineUnique: boolean }): string {
    const parts = [this.quoteIdentifier(column.name), this.columnType(column)];
    if (!column.nullable) parts.push('NOT NULL');
    const rendered = column.default === undefined ? undefined : this.renderDefault(column.default, column);
    if (rendered !== undefined) parts.push(`DEFAULT ${rendered}`);
    if (options.inlinePrimaryKey) parts.push('PRIMARY KEY');
    const autoIncrement = column.autoIncrement ? this.autoIncrementClause() : undefined;
    if (autoIncrement) parts.push(autoIncrement);
    if (options.inlineUnique) parts.push('UNIQUE');
    return parts.join(' ');
  }

  /** Type written in a column definition; autoincrement may change it */
  protected columnType(column: ColumnInfo): string {
    return column.type;
  }

  protected autoIncrementClause(): string | undefined {
    return undefined;
  }

  primaryKeyClause(table: string, columns: readonly string[]): string {
    return `CONSTRAINT ${this.quoteIdentifier(`${table}_pkey`)} PRIMARY KEY (${this.columnList(columns)})`;
  }

  addPrimaryKeyStatement(table: string, columns: readonly string[]): string {
    return `ALTER TABLE ${this.quoteIdentifier(table)} ADD ${this.primaryKeyClause(table, columns)}`;
  }

  dropPrimaryKeyStatement(table: string): string {
    return `ALTER TABLE ${this.quoteIdentifier(table)} DROP CONSTRAINT ${this.quoteIdentifier(`${table}_pkey`)}`;
  }

  protected columnList(columns: readonly string[]): string {
    return columns.map((c) => this.quoteIdentifier(c)).join(', ');
  }

  dropIndexStatement(_table: string, index: IndexInfo): string {
    return `DROP INDEX ${this.quoteIdentifier(index.name)}`;
  }

  dropForeignKeyStatement(table: string, name: string): string {
    return `ALTER TABLE ${this.quoteIdentifier(table)} DROP CONSTRAINT ${this.quoteIdentifier(name)}`;
  }

  renameTableStatement(from: string, to: string): string {
    return `ALTER TABLE ${this.quoteIdentifier(from)} RENAME TO ${this.quoteIdentifier(to)}`;
  }

  preamble(_ddl: string): string[] {
    return [];
  }

  // ─── Bookkeeping ─────────────────────────────────────────────────────────────

  ledgerTableDdl(table: string): string {
    const q = (name: string) => this.quoteIdentifier(name);
    const t = this.ledgerColumnTypes;
    return [
      `CREATE TABLE IF NOT EXISTS ${q(table)} (`,
      `    ${q('id')} ${t.id} NOT NULL,`,
      `    ${q('checksum')} ${t.checksum} NOT NULL,`,
      `    ${q('finished_at')} ${t.timestamp},`,
      `    ${q('migration_name')} ${t.name} NOT NULL,`,
      `    ${q('logs')} ${t.text},`,
      `    ${q('rolled_back_at')} ${t.timestamp},`,
      `    ${q('started_at')} ${t.timestamp} NOT NULL DEFAULT ${this.currentTimestamp(t.timestamp)},`,
      `    ${q('applied_steps_count')} ${t.count} NOT NULL DEFAULT 0,`,
      `    PRIMARY KEY (${q('id')})`,
      `)${this.createTableSuffix}`,
    ].join('\n');
  }

  resetStatements(_schema: string, tables: readonly string[]): string[] {
    return [
      ...this.foreignKeyChecks(false),
      ...tables.map((table) => `DROP TABLE IF EXISTS ${this.quoteIdentifier(table)}`),
      ...this.foreignKeyChecks(true),
    ];
  }

  protected foreignKeyChecks(_enabled: boolean): string[] {
    return [];
  }

  formatTimestamp(date: Date): string {
    return date.toISOString();
  }
}
