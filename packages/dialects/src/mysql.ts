/**
 * MySQL provider.
 *
 * MySQL commits DDL implicitly, so migrations are not atomic here; the ledger
 * is only written once every statement of a migration succeeded.
 *
 * @module mysql
 */

import type { ScalarType } from '@tidemark/schema';
import type {
  CatalogColumn,
  ColumnModification,
  IndexInfo,
  IntrospectionQueries,
  ParsedDefault,
} from '@tidemark/schema-model';

import { BaseProvider, type LedgerColumnTypes } from './base-provider.js';
import { callValue, dbGenerated, unquoteLiteral } from './literals.js';

const SCALAR_TYPES: Record<ScalarType, string> = {
  String: 'VARCHAR(191)',
  Int: 'INT',
  BigInt: 'BIGINT',
  Float: 'DOUBLE',
  Decimal: 'DECIMAL(65,30)',
  Boolean: 'BOOLEAN',
  DateTime: 'DATETIME(3)',
  Json: 'JSON',
  Bytes: 'LONGBLOB',
};

/** `@db.<name>` attributes; unsigned integers take no arguments */
const NATIVE_TYPES: Record<string, string> = {
  VarChar: 'VARCHAR',
  Char: 'CHAR',
  Text: 'TEXT',
  TinyText: 'TINYTEXT',
  MediumText: 'MEDIUMTEXT',
  LongText: 'LONGTEXT',
  TinyInt: 'TINYINT',
  SmallInt: 'SMALLINT',
  MediumInt: 'MEDIUMINT',
  Int: 'INT',
  BigInt: 'BIGINT',
  UnsignedTinyInt: 'TINYINT UNSIGNED',
  UnsignedSmallInt: 'SMALLINT UNSIGNED',
  UnsignedMediumInt: 'MEDIUMINT UNSIGNED',
  UnsignedInt: 'INT UNSIGNED',
  UnsignedBigInt: 'BIGINT UNSIGNED',
  Decimal: 'DECIMAL',
  Double: 'DOUBLE',
  Float: 'FLOAT',
  Bit: 'BIT',
  Date: 'DATE',
  DateTime: 'DATETIME',
  Timestamp: 'TIMESTAMP',
  Time: 'TIME',
  Year: 'YEAR',
  Json: 'JSON',
  Binary: 'BINARY',
  VarBinary: 'VARBINARY',
  TinyBlob: 'TINYBLOB',
  Blob: 'BLOB',
  MediumBlob: 'MEDIUMBLOB',
  LongBlob: 'LONGBLOB',
};

const INTEGER_TYPE = /^(tinyint|smallint|mediumint|int|integer|bigint)(?:\(\d+\))?( unsigned)?(?: zerofill)?$/;

export class MysqlProvider extends BaseProvider {
  readonly name = 'mysql' as const;
  readonly transactionalDdl = false;
  override readonly backslashEscapes = true;
  readonly supportsAddForeignKey = true;
  override readonly implicitForeignKeyIndexes = true;
  override readonly createTableSuffix = ' DEFAULT CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci';

  protected readonly ledgerColumnTypes: LedgerColumnTypes = {
    id: 'VARCHAR(36)',
    checksum: 'VARCHAR(64)',
    name: 'VARCHAR(255)',
    text: 'TEXT',
    timestamp: 'DATETIME(3)',
    count: 'INT UNSIGNED',
  };

  override quoteIdentifier(name: string): string {
    return `\`${name.replace(/`/g, '``')}\``;
  }

  // ─── Types ───────────────────────────────────────────────────────────────────

  mapType(scalar: ScalarType): string {
    return SCALAR_TYPES[scalar];
  }

  readonly nativeTypeNames = Object.keys(NATIVE_TYPES);

  mapNativeType(name: string, args: readonly string[]): string | undefined {
    const base = NATIVE_TYPES[name];
    if (base === undefined) return undefined;
    if (args.length === 0 || base.endsWith(' UNSIGNED')) return base;
    return `${base}(${args.join(',')})`;
  }

  mapEnumType(_enumName: string, values: readonly string[]): string {
    return `ENUM(${values.map((value) => this.quoteLiteral(value)).join(',')})`;
  }

  mapListType(): undefined {
    return undefined;
  }

  normalizeType(nativeType: string): string {
    const type = nativeType.trim().replace(/\s+/g, ' ');
    const lower = type.toLowerCase();
    if (lower === 'tinyint(1)' || lower === 'boolean' || lower === 'bool') return 'BOOLEAN';

    // Keep enum members as written.
    if (lower.startsWith('enum(') || lower.startsWith('set(')) {
      const open = type.indexOf('(');
      return type.slice(0, open).toUpperCase() + type.slice(open);
    }

    const integer = INTEGER_TYPE.exec(lower);
    if (integer) {
      const base = integer[1] === 'integer' ? 'INT' : (integer[1] ?? 'int').toUpperCase();
      return integer[2] ? `${base} UNSIGNED` : base;
    }
    return type.toUpperCase().replace(/,\s+/g, ',');
  }

  // ─── Defaults ────────────────────────────────────────────────────────────────

  protected override currentTimestamp(type: string): string {
    const precision = /^(?:DATETIME|TIMESTAMP)\((\d)\)$/i.exec(type)?.[1];
    return precision === undefined ? 'CURRENT_TIMESTAMP' : `CURRENT_TIMESTAMP(${precision})`;
  }

  protected override uuidExpression(): string {
    return '(UUID())';
  }

  parseDefault(column: CatalogColumn): ParsedDefault {
    const autoIncrement = /auto_increment/i.test(column.extra);
    if (column.rawDefault === null) return { autoIncrement };
    const raw = column.rawDefault.trim();

    if (/^(CURRENT_TIMESTAMP|now\(\))(\(\d*\))?$/i.test(raw)) return { default: callValue('now'), autoIncrement };
    if (/DEFAULT_GENERATED/i.test(column.extra)) {
      if (/^\(?uuid\(\)\)?$/i.test(raw)) return { default: callValue('uuid'), autoIncrement };
      return { default: dbGenerated(raw), autoIncrement };
    }
    // MariaDB reports literal defaults quoted, MySQL does not.
    const text = unquoteLiteral(raw, true) ?? raw;
    return { default: this.literalDefault(text, column.type), autoIncrement };
  }

  // ─── DDL ─────────────────────────────────────────────────────────────────────

  protected override autoIncrementClause(): string {
    return 'AUTO_INCREMENT';
  }

  alterColumnStatements(table: string, change: ColumnModification): string[] {
    const definition = this.columnDefinition(change.to, { inlinePrimaryKey: false, inlineUnique: false });
    return [`ALTER TABLE ${this.quoteIdentifier(table)} MODIFY ${definition}`];
  }

  /** MySQL names every primary key `PRIMARY` */
  override primaryKeyClause(_table: string, columns: readonly string[]): string {
    return `PRIMARY KEY (${this.columnList(columns)})`;
  }

  override dropPrimaryKeyStatement(table: string): string {
    return `ALTER TABLE ${this.quoteIdentifier(table)} DROP PRIMARY KEY`;
  }

  override dropIndexStatement(table: string, index: IndexInfo): string {
    return `DROP INDEX ${this.quoteIdentifier(index.name)} ON ${this.quoteIdentifier(table)}`;
  }

  override dropForeignKeyStatement(table: string, name: string): string {
    return `ALTER TABLE ${this.quoteIdentifier(table)} DROP FOREIGN KEY ${this.quoteIdentifier(name)}`;
  }

  protected override foreignKeyChecks(enabled: boolean): string[] {
    return [`SET FOREIGN_KEY_CHECKS = ${enabled ? 1 : 0}`];
  }

  /** `YYYY-MM-DD HH:MM:SS.mmm` in UTC, the literal DATETIME(3) accepts */
  override formatTimestamp(date: Date): string {
    return date.toISOString().replace('T', ' ').replace('Z', '');
  }

  // ─── Catalog ─────────────────────────────────────────────────────────────────

  // The connection's database is the schema; the schema argument is unused.
  readonly introspection: IntrospectionQueries = {
    tables: () => ({
      sql: `SELECT TABLE_NAME AS table_name
FROM information_schema.TABLES
WHERE TABLE_SCHEMA = DATABASE() AND TABLE_TYPE = 'BASE TABLE'
ORDER BY TABLE_NAME`,
      params: [],
    }),

    columns: (_schema, table) => ({
      sql: `SELECT COLUMN_NAME AS column_name,
       COLUMN_TYPE AS data_type,
       IS_NULLABLE AS is_nullable,
       COLUMN_DEFAULT AS column_default,
       EXTRA AS extra
FROM information_schema.COLUMNS
WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ?
ORDER BY ORDINAL_POSITION`,
      params: [table],
    }),

    primaryKey: (_schema, table) => ({
      sql: `SELECT COLUMN_NAME AS column_name, SEQ_IN_INDEX AS position
FROM information_schema.STATISTICS
WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ? AND INDEX_NAME = 'PRIMARY'
ORDER BY SEQ_IN_INDEX`,
      params: [table],
    }),

    indexes: (_schema, table) => ({
      sql: `SELECT INDEX_NAME AS index_name,
       COLUMN_NAME AS column_name,
       SEQ_IN_INDEX AS position,
       NON_UNIQUE = 0 AS is_unique,
       COLLATION = 'D' AS is_descending,
       0 AS is_constraint
FROM information_schema.STATISTICS
WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ? AND INDEX_NAME <> 'PRIMARY'
ORDER BY INDEX_NAME, SEQ_IN_INDEX`,
      params: [table],
    }),

    foreignKeys: (_schema, table) => ({
      sql: `SELECT kcu.CONSTRAINT_NAME AS constraint_name,
       kcu.COLUMN_NAME AS column_name,
       kcu.REFERENCED_TABLE_NAME AS referenced_table,
       kcu.REFERENCED_COLUMN_NAME AS referenced_column,
       kcu.ORDINAL_POSITION AS position,
       rc.DELETE_RULE AS on_delete,
       rc.UPDATE_RULE AS on_update
FROM information_schema.KEY_COLUMN_USAGE kcu
JOIN information_schema.REFERENTIAL_CONSTRAINTS rc
  ON rc.CONSTRAINT_SCHEMA = kcu.CONSTRAINT_SCHEMA AND rc.CONSTRAINT_NAME = kcu.CONSTRAINT_NAME
WHERE kcu.TABLE_SCHEMA = DATABASE() AND kcu.TABLE_NAME = ? AND kcu.REFERENCED_TABLE_NAME IS NOT NULL
ORDER BY kcu.CONSTRAINT_NAME, kcu.ORDINAL_POSITION`,
      params: [table],
    }),
  };
}
