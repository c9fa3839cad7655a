/**
 * PostgreSQL provider.
 *
 * @module postgresql
 */

import type { AttributeValue, ScalarType } from '@tidemark/schema';
import type {
  CatalogColumn,
  ColumnInfo,
  ColumnModification,
  IndexInfo,
  IntrospectionQueries,
  ParsedDefault,
} from '@tidemark/schema-model';

import { BaseProvider, type LedgerColumnTypes } from './base-provider.js';
import { NUMERIC_LITERAL, callValue, dbGenerated, numberValue, unquoteLiteral } from './literals.js';

const SCALAR_TYPES: Record<ScalarType, string> = {
  String: 'TEXT',
  Int: 'INTEGER',
  BigInt: 'BIGINT',
  Float: 'DOUBLE PRECISION',
  Decimal: 'DECIMAL(65,30)',
  Boolean: 'BOOLEAN',
  DateTime: 'TIMESTAMP(3)',
  Json: 'JSONB',
  Bytes: 'BYTEA',
};

/** `@db.<name>` attributes */
const NATIVE_TYPES: Record<string, string> = {
  Text: 'TEXT',
  VarChar: 'VARCHAR',
  Char: 'CHAR',
  Citext: 'CITEXT',
  Uuid: 'UUID',
  Inet: 'INET',
  Xml: 'XML',
  SmallInt: 'SMALLINT',
  Integer: 'INTEGER',
  BigInt: 'BIGINT',
  Oid: 'OID',
  Real: 'REAL',
  DoublePrecision: 'DOUBLE PRECISION',
  Decimal: 'DECIMAL',
  Money: 'MONEY',
  Boolean: 'BOOLEAN',
  Timestamp: 'TIMESTAMP',
  Timestamptz: 'TIMESTAMPTZ',
  Date: 'DATE',
  Time: 'TIME',
  Timetz: 'TIMETZ',
  Json: 'JSON',
  JsonB: 'JSONB',
  ByteA: 'BYTEA',
  Bit: 'BIT',
  VarBit: 'VARBIT',
};

/** `format_type()` spellings that carry an optional `(n)` modifier */
const MODIFIED_TYPES: ReadonlyArray<[RegExp, string]> = [
  [/^(?:character varying|varchar)(\(\d+\))?$/, 'VARCHAR'],
  [/^(?:character|bpchar|char)(\(\d+\))?$/, 'CHAR'],
  [/^(?:numeric|decimal)(\(\d+,\d+\))?$/, 'DECIMAL'],
  [/^timestamp(\(\d+\))?(?: without time zone)?$/, 'TIMESTAMP'],
  [/^(?:timestamp(\(\d+\))? with time zone|timestamptz(\(\d+\))?)$/, 'TIMESTAMPTZ'],
  [/^time(\(\d+\))?(?: without time zone)?$/, 'TIME'],
  [/^(?:time(\(\d+\))? with time zone|timetz(\(\d+\))?)$/, 'TIMETZ'],
  [/^(?:bit varying|varbit)(\(\d+\))?$/, 'VARBIT'],
  [/^bit(\(\d+\))?$/, 'BIT'],
];

const TYPE_ALIASES: Record<string, string> = {
  int: 'INTEGER',
  int4: 'INTEGER',
  int8: 'BIGINT',
  int2: 'SMALLINT',
  float8: 'DOUBLE PRECISION',
  float4: 'REAL',
  bool: 'BOOLEAN',
};

const SERIAL_TYPES: Record<string, string> = {
  SMALLINT: 'SMALLSERIAL',
  INTEGER: 'SERIAL',
  BIGINT: 'BIGSERIAL',
};

const TRAILING_CAST = /::[a-z_ ]+(?:\(\d+(?:,\d+)?\))?(?:\[\])?$/i;

export class PostgresProvider extends BaseProvider {
  readonly name = 'postgresql' as const;
  readonly transactionalDdl = true;
  readonly supportsAddForeignKey = true;

  protected readonly ledgerColumnTypes: LedgerColumnTypes = {
    id: 'VARCHAR(36)',
    checksum: 'VARCHAR(64)',
    name: 'VARCHAR(255)',
    text: 'TEXT',
    timestamp: 'TIMESTAMPTZ',
    count: 'INTEGER',
  };

  override placeholder(index: number): string {
    return `$${index}`;
  }

  // ─── Types ───────────────────────────────────────────────────────────────────

  mapType(scalar: ScalarType): string {
    return SCALAR_TYPES[scalar];
  }

  readonly nativeTypeNames = Object.keys(NATIVE_TYPES);

  mapNativeType(name: string, args: readonly string[]): string | undefined {
    const base = NATIVE_TYPES[name];
    if (base === undefined) return undefined;
    return args.length > 0 ? `${base}(${args.join(',')})` : base;
  }

  mapEnumType(): string {
    return 'TEXT';
  }

  mapListType(elementType: string): string {
    return `${elementType}[]`;
  }

  normalizeType(nativeType: string): string {
    const type = nativeType.trim().toLowerCase().replace(/\s+/g, ' ').replace(/,\s+/g, ',');
    if (type.endsWith('[]')) return `${this.normalizeType(type.slice(0, -2))}[]`;

    for (const [pattern, canonical] of MODIFIED_TYPES) {
      const match = pattern.exec(type);
      if (match) return canonical + (match[1] ?? match[2] ?? '');
    }
    return TYPE_ALIASES[type] ?? type.toUpperCase();
  }

  // ─── Defaults ────────────────────────────────────────────────────────────────

  protected override renderListDefault(items: AttributeValue[]): string | undefined {
    const elements: string[] = [];
    for (const item of items) {
      switch (item.kind) {
        case 'string':
        case 'identifier':
          elements.push(arrayElement(item.value));
          break;
        case 'number':
          elements.push(item.raw);
          break;
        case 'boolean':
          elements.push(item.value ? 'true' : 'false');
          break;
        default:
          return undefined;
      }
    }
    return this.quoteLiteral(`{${elements.join(',')}}`);
  }

  protected override uuidExpression(): string {
    return 'gen_random_uuid()';
  }

  parseDefault(column: CatalogColumn): ParsedDefault {
    if (column.rawDefault === null) return { autoIncrement: false };
    const raw = column.rawDefault.trim();
    if (/^nextval\(/i.test(raw)) return { autoIncrement: true };

    let expression = raw;
    while (TRAILING_CAST.test(expression)) expression = expression.replace(TRAILING_CAST, '');
    const negative = /^\((-\d+(?:\.\d+)?)\)$/.exec(expression);
    if (negative?.[1]) expression = negative[1];

    const literal = unquoteLiteral(expression);
    if (literal !== undefined) return { default: this.literalDefault(literal, column.type), autoIncrement: false };
    if (NUMERIC_LITERAL.test(expression)) return { default: numberValue(expression), autoIncrement: false };
    if (/^(true|false)$/i.test(expression)) return { default: this.literalDefault(expression, 'BOOLEAN'), autoIncrement: false };
    if (/^(CURRENT_TIMESTAMP(\(\d+\))?|now\(\))$/i.test(expression)) return { default: callValue('now'), autoIncrement: false };
    if (/^gen_random_uuid\(\)$/i.test(expression)) return { default: callValue('uuid'), autoIncrement: false };
    return { default: dbGenerated(raw), autoIncrement: false };
  }

  // ─── DDL ─────────────────────────────────────────────────────────────────────

  protected override columnType(column: ColumnInfo): string {
    return column.autoIncrement ? (SERIAL_TYPES[column.type] ?? column.type) : column.type;
  }

  alterColumnStatements(table: string, change: ColumnModification): string[] {
    const alter = `ALTER TABLE ${this.quoteIdentifier(table)} ALTER COLUMN ${this.quoteIdentifier(change.to.name)}`;
    const { from, to } = change;
    const statements: string[] = [];

    if (change.changes.includes('type')) {
      statements.push(`${alter} SET DATA TYPE ${to.type} USING ${this.quoteIdentifier(to.name)}::${to.type}`);
    }
    if (change.changes.includes('nullable')) {
      statements.push(`${alter} ${to.nullable ? 'DROP NOT NULL' : 'SET NOT NULL'}`);
    }
    if (change.changes.includes('autoIncrement')) {
      const sequence = this.quoteIdentifier(`${table}_${to.name}_seq`);
      if (to.autoIncrement) {
        statements.push(
          `CREATE SEQUENCE IF NOT EXISTS ${sequence}`,
          `${alter} SET DEFAULT nextval(${this.quoteLiteral(sequence)})`,
          `ALTER SEQUENCE ${sequence} OWNED BY ${this.quoteIdentifier(table)}.${this.quoteIdentifier(to.name)}`,
        );
      } else if (from.autoIncrement) {
        statements.push(`${alter} DROP DEFAULT`, `DROP SEQUENCE IF EXISTS ${sequence}`);
      }
    }
    if (change.changes.includes('default') && !to.autoIncrement) {
      const rendered = to.default === undefined ? undefined : this.renderDefault(to.default, to);
      statements.push(rendered === undefined ? `${alter} DROP DEFAULT` : `${alter} SET DEFAULT ${rendered}`);
    }
    return statements;
  }

  override dropIndexStatement(table: string, index: IndexInfo): string {
    if (index.constraint) {
      return `ALTER TABLE ${this.quoteIdentifier(table)} DROP CONSTRAINT ${this.quoteIdentifier(index.name)}`;
    }
    return super.dropIndexStatement(table, index);
  }

  override preamble(ddl: string): string[] {
    return ddl.includes('gen_random_uuid()') ? ['CREATE EXTENSION IF NOT EXISTS "pgcrypto"'] : [];
  }

  override resetStatements(schema: string, _tables: readonly string[]): string[] {
    return [
      `DROP SCHEMA IF EXISTS ${this.quoteIdentifier(schema)} CASCADE`,
      `CREATE SCHEMA ${this.quoteIdentifier(schema)}`,
    ];
  }

  // ─── Catalog ─────────────────────────────────────────────────────────────────

  readonly introspection: IntrospectionQueries = {
    tables: (schema) => ({
      sql: `SELECT table_name
FROM information_schema.tables
WHERE table_schema = $1 AND table_type = 'BASE TABLE'
ORDER BY table_name`,
      params: [schema],
    }),

    columns: (schema, table) => ({
      sql: `SELECT a.attname AS column_name,
       format_type(a.atttypid, a.atttypmod) AS data_type,
       NOT a.attnotnull AS is_nullable,
       pg_get_expr(d.adbin, d.adrelid) AS column_default,
       '' AS extra
FROM pg_attribute a
JOIN pg_class c ON c.oid = a.attrelid
JOIN pg_namespace n ON n.oid = c.relnamespace
LEFT JOIN pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
WHERE n.nspname = $1 AND c.relname = $2 AND a.attnum > 0 AND NOT a.attisdropped
ORDER BY a.attnum`,
      params: [schema, table],
    }),

    primaryKey: (schema, table) => ({
      sql: `SELECT a.attname AS column_name, k.ord AS position
FROM pg_index ix
JOIN pg_class t ON t.oid = ix.indrelid
JOIN pg_namespace n ON n.oid = t.relnamespace
CROSS JOIN LATERAL unnest(ix.indkey) WITH ORDINALITY AS k(attnum, ord)
JOIN pg_attribute a ON a.attrelid = t.oid AND a.attnum = k.attnum
WHERE ix.indisprimary AND n.nspname = $1 AND t.relname = $2
ORDER BY k.ord`,
      params: [schema, table],
    }),

    indexes: (schema, table) => ({
      sql: `SELECT i.relname AS index_name,
       a.attname AS column_name,
       k.ord AS position,
       ix.indisunique AS is_unique,
       (ix.indoption[k.ord - 1] & 1) = 1 AS is_descending,
       EXISTS (
         SELECT 1 FROM pg_constraint con WHERE con.conindid = ix.indexrelid AND con.contype = 'u'
       ) AS is_constraint
FROM pg_index ix
JOIN pg_class t ON t.oid = ix.indrelid
JOIN pg_class i ON i.oid = ix.indexrelid
JOIN pg_namespace n ON n.oid = t.relnamespace
CROSS JOIN LATERAL unnest(ix.indkey) WITH ORDINALITY AS k(attnum, ord)
JOIN pg_attribute a ON a.attrelid = t.oid AND a.attnum = k.attnum
WHERE NOT ix.indisprimary AND n.nspname = $1 AND t.relname = $2
ORDER BY i.relname, k.ord`,
      params: [schema, table],
    }),

    foreignKeys: (schema, table) => ({
      sql: `SELECT con.conname AS constraint_name,
       att.attname AS column_name,
       ref.relname AS referenced_table,
       ref_att.attname AS referenced_column,
       k.ord AS position,
       ${actionCase('con.confdeltype')} AS on_delete,
       ${actionCase('con.confupdtype')} AS on_update
FROM pg_constraint con
JOIN pg_class cls ON cls.oid = con.conrelid
JOIN pg_namespace n ON n.oid = cls.relnamespace
JOIN pg_class ref ON ref.oid = con.confrelid
CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, ref_attnum, ord)
JOIN pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = k.attnum
JOIN pg_attribute ref_att ON ref_att.attrelid = con.confrelid AND ref_att.attnum = k.ref_attnum
WHERE con.contype = 'f' AND n.nspname = $1 AND cls.relname = $2
ORDER BY con.conname, k.ord`,
      params: [schema, table],
    }),
  };
}

/** Array literal element, quoted only where PostgreSQL itself would quote it */
function arrayElement(text: string): string {
  if (text !== '' && !/[\s,{}"\\]/.test(text) && text.toUpperCase() !== 'NULL') return text;
  return `"${text.replace(/["\\]/g, (c) => `\\${c}`)}"`;
}

function actionCase(column: string): string {
  return `CASE ${column} WHEN 'a' THEN 'NO ACTION' WHEN 'r' THEN 'RESTRICT' WHEN 'c' THEN 'CASCADE' WHEN 'n' THEN 'SET NULL' WHEN 'd' THEN 'SET DEFAULT' END`;
}
