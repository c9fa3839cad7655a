/**
 * @tidemark/diff — Canonical model to declaration.
 *
 * The inverse of {@link buildModel}: an introspected schema becomes a
 * declaration AST that builds back into the same tables. Relations get a
 * field on both sides, types the provider spells differently from the
 * scalar default get a `@db.*` attribute, and types with no declaration
 * spelling become `Unsupported("…")`.
 *
 * @module @tidemark/diff
 */

import {
  type Argument,
  type Attribute,
  type AttributeValue,
  type Datasource,
  type Enum,
  type EnumValue,
  type Field,
  type FieldType,
  type Model,
  type Position,
  type ScalarType,
  type Schema,
  SCALAR_TYPES,
} from '@tidemark/schema';
import {
  type CanonicalSchema,
  type ColumnInfo,
  type ForeignKeyInfo,
  type IndexInfo,
  type Provider,
  type ReferentialAction,
  type TableInfo,
  constraintName,
  isSingleColumnUnique,
  typeFamily,
} from '@tidemark/schema-model';

export interface PullOptions {
  /** Environment variable the datasource `url` reads (default: `DATABASE_URL`) */
  urlEnv?: string;
}

/** Pulled nodes have no source text; line 0 marks them */
const NO_POSITION: Position = { line: 0, column: 0 };

const ACTION_NAMES: Record<ReferentialAction, string> = {
  CASCADE: 'Cascade',
  RESTRICT: 'Restrict',
  'NO ACTION': 'NoAction',
  'SET NULL': 'SetNull',
  'SET DEFAULT': 'SetDefault',
};

const ENUM_TYPE = /^ENUM\((.+)\)$/is;
const ENUM_MEMBER = /'(?:[^'\\]|''|\\.)*'/gs;

/** Names SQLite gives the indexes behind inline UNIQUE constraints */
const GENERATED_INDEX_NAME = /^sqlite_autoindex_/;

/**
 * Declaration for a canonical schema, usually one read from a live database.
 * Models and enums are ordered by name; fields keep the column order.
 */
export function toDeclaration(schema: CanonicalSchema, provider: Provider, options: PullOptions = {}): Schema {
  return new DeclarationBuilder(schema, provider).build(options);
}

interface Relation {
  /** Table that holds the foreign key */
  owner: TableInfo;
  target: TableInfo;
  fk: ForeignKeyInfo;
  /** Present when the owner has more than one relation to the target, or references itself */
  name?: string;
}

interface ModelNames {
  model: string;
  /** Field name per normalized column name */
  fields: Map<string, string>;
  /** Every field name in use, relation fields included */
  taken: Set<string>;
}

class DeclarationBuilder {
  private readonly tables: TableInfo[];
  private readonly names = new Map<string, ModelNames>();
  /** Model and enum names in use; scalar type names are never free */
  private readonly typeNames = new Set<string>([...SCALAR_TYPES, 'Unsupported']);
  private readonly enums: Enum[] = [];
  private readonly relations: Relation[] = [];

  constructor(
    schema: CanonicalSchema,
    private readonly provider: Provider,
  ) {
    this.tables = [...schema.tables.values()].sort((a, b) => compareText(a.name, b.name));

    for (const table of this.tables) {
      const taken = new Set<string>();
      const fields = new Map<string, string>();
      for (const column of table.columns.values()) {
        fields.set(this.key(column.name), uniqueName(identifier(column.name), taken));
      }
      this.names.set(this.key(table.name), { model: uniqueName(identifier(table.name), this.typeNames), fields, taken });
    }

    for (const owner of this.tables) {
      for (const fk of owner.foreignKeys) {
        const target = schema.tables.get(this.key(fk.referencedTable));
        if (!target) continue;
        const siblings = owner.foreignKeys.filter((other) => this.key(other.referencedTable) === this.key(target.name));
        const named = siblings.length > 1 || owner === target;
        this.relations.push({ owner, target, fk, ...(named ? { name: this.relationName(owner, fk, target) } : {}) });
      }
    }
  }

  build(options: PullOptions): Schema {
    const models = this.tables.map((table) => this.model(table));
    return {
      datasources: [this.datasource(options)],
      generators: [],
      models,
      enums: [...this.enums].sort((a, b) => compareText(a.name, b.name)),
    };
  }

  private datasource(options: PullOptions): Datasource {
    const url: AttributeValue = { kind: 'call', name: 'env', args: [{ value: text(options.urlEnv ?? 'DATABASE_URL') }] };
    return {
      name: 'db',
      properties: [
        { name: 'provider', value: text(this.provider.name), position: NO_POSITION },
        { name: 'url', value: url, position: NO_POSITION },
      ],
      position: NO_POSITION,
    };
  }

  private model(table: TableInfo): Model {
    const names = this.namesOf(table);
    const fields = [...table.columns.values()].map((column) => this.scalarField(table, column));

    for (const relation of this.relations) {
      if (relation.owner === table) fields.push(this.relationField(relation, names));
    }
    for (const relation of this.relations) {
      if (relation.target === table) fields.push(this.backRelationField(relation, names));
    }

    const attributes: Attribute[] = [];
    if (table.primaryKey.length > 1) {
      attributes.push(attribute('id', [{ value: this.fieldList(table, table.primaryKey) }]));
    }
    const inline = this.inlineUniqueIndexes(table);
    for (const index of table.indexes) {
      if (inline.has(index)) continue;
      const kind = index.unique ? 'unique' : 'index';
      const args: Argument[] = [{ value: this.indexFields(table, index) }];
      const map = this.explicitIndexName(table, index);
      if (map !== undefined) args.push({ name: 'map', value: text(map) });
      attributes.push(attribute(kind, args));
    }
    if (names.model !== table.name) attributes.push(attribute('map', [{ value: text(table.name) }]));

    return { name: names.model, fields, attributes, position: NO_POSITION };
  }

  // ─── Scalar fields ───────────────────────────────────────────────────────

  private scalarField(table: TableInfo, column: ColumnInfo): Field {
    const name = this.fieldName(table, column.name);
    const attributes: Attribute[] = [];

    const { type, native, enumDef } = this.resolveType(table, column, name);

    if (table.primaryKey.length === 1 && this.key(table.primaryKey[0] ?? '') === this.key(column.name)) {
      attributes.push(attribute('id'));
    }
    if (column.autoIncrement) {
      attributes.push(attribute('default', [{ value: { kind: 'call', name: 'autoincrement', args: [] } }]));
    } else if (column.default !== undefined) {
      attributes.push(attribute('default', [{ value: enumDef ? enumDefault(enumDef, column.default) : column.default }]));
    }

    const unique = this.inlineUniqueIndexes(table);
    for (const index of unique) {
      if (this.key(index.columns[0]?.name ?? '') !== this.key(column.name)) continue;
      const map = this.explicitIndexName(table, index);
      attributes.push(attribute('unique', map === undefined ? [] : [{ name: 'map', value: text(map) }]));
    }

    if (name !== column.name) attributes.push(attribute('map', [{ value: text(column.name) }]));
    if (native) attributes.push(native);

    return { name, type, attributes, position: NO_POSITION };
  }

  private resolveType(
    table: TableInfo,
    column: ColumnInfo,
    fieldName: string,
  ): { type: FieldType; native?: Attribute; enumDef?: Enum } {
    const optional = column.nullable;

    const members = enumMembers(column.type, this.provider);
    if (members) {
      const enumDef = this.enumFor(table, fieldName, members);
      return { type: { name: enumDef.name, isArray: false, isOptional: optional }, enumDef };
    }

    let type = column.type;
    let isArray = false;
    if (type.endsWith('[]') && this.provider.mapListType(type.slice(0, -2)) === type) {
      type = type.slice(0, -2);
      isArray = true;
    }

    const scalar = scalarFor(type);
    if (this.provider.mapType(scalar, { autoIncrement: column.autoIncrement }) === type) {
      return { type: { name: scalar, isArray, isOptional: optional } };
    }

    const args = typeArguments(type);
    for (const name of this.provider.nativeTypeNames) {
      const withArgs = this.provider.mapNativeType(name, args) === type;
      if (!withArgs && this.provider.mapNativeType(name, []) !== type) continue;
      const nativeArgs = withArgs ? args.map((raw): Argument => ({ value: { kind: 'number', value: Number(raw), raw } })) : [];
      return {
        type: { name: scalar, isArray, isOptional: optional },
        native: attribute(`db.${name}`, nativeArgs),
      };
    }

    return { type: { name: 'Unsupported', isArray, isOptional: optional, unsupported: type } };
  }

  private enumFor(table: TableInfo, fieldName: string, values: readonly string[]): Enum {
    const taken = new Set<string>();
    const members = values.map((value): EnumValue => {
      const name = uniqueName(identifier(value), taken);
      return {
        name,
        attributes: name === value ? [] : [attribute('map', [{ value: text(value) }])],
        position: NO_POSITION,
      };
    });
    const enumDef: Enum = {
      name: uniqueName(identifier(`${this.namesOf(table).model}_${fieldName}`), this.typeNames),
      values: members,
      attributes: [],
      position: NO_POSITION,
    };
    this.enums.push(enumDef);
    return enumDef;
  }

  // ─── Relations ───────────────────────────────────────────────────────────

  private relationField(relation: Relation, names: ModelNames): Field {
    const { owner, target, fk } = relation;
    const targetModel = this.namesOf(target).model;
    const fkFields = fk.columns.map((column) => this.fieldName(owner, column));
    const base = relation.name === undefined ? lowerFirst(targetModel) : `${lowerFirst(targetModel)}_${fkFields.join('_')}`;

    const args: Argument[] = [];
    if (relation.name !== undefined) args.push({ value: text(relation.name) });
    args.push(
      { name: 'fields', value: identifierList(fkFields) },
      { name: 'references', value: identifierList(fk.referencedColumns.map((column) => this.fieldName(target, column))) },
      { name: 'onDelete', value: { kind: 'identifier', value: ACTION_NAMES[fk.onDelete] } },
    );
    if (fk.onUpdate !== 'CASCADE') {
      args.push({ name: 'onUpdate', value: { kind: 'identifier', value: ACTION_NAMES[fk.onUpdate] } });
    }

    const optional = fk.columns.some((column) => owner.columns.get(this.key(column))?.nullable === true);
    return {
      name: uniqueName(identifier(base), names.taken),
      type: { name: targetModel, isArray: false, isOptional: optional },
      attributes: [attribute('relation', args)],
      position: NO_POSITION,
    };
  }

  /** The referencing side: a list, or an optional field when the foreign key columns are unique */
  private backRelationField(relation: Relation, names: ModelNames): Field {
    const { owner, fk } = relation;
    const ownerModel = this.namesOf(owner).model;
    const fkFields = fk.columns.map((column) => this.fieldName(owner, column));
    const base = relation.name === undefined ? lowerFirst(ownerModel) : `${lowerFirst(ownerModel)}_${fkFields.join('_')}`;
    const single = this.isUniqueKey(owner, fk.columns);

    return {
      name: uniqueName(identifier(base), names.taken),
      type: { name: ownerModel, isArray: !single, isOptional: single },
      attributes: relation.name === undefined ? [] : [attribute('relation', [{ value: text(relation.name) }])],
      position: NO_POSITION,
    };
  }

  private relationName(owner: TableInfo, fk: ForeignKeyInfo, target: TableInfo): string {
    const fields = fk.columns.map((column) => this.fieldName(owner, column));
    return `${this.namesOf(owner).model}_${fields.join('_')}To${this.namesOf(target).model}`;
  }

  private isUniqueKey(table: TableInfo, columns: readonly string[]): boolean {
    const wanted = columns.map((c) => this.key(c)).sort().join(',');
    const keyOf = (names: readonly string[]) => names.map((n) => this.key(n)).sort().join(',');
    if (keyOf(table.primaryKey) === wanted) return true;
    return table.indexes.some((index) => index.unique && keyOf(index.columns.map((c) => c.name)) === wanted);
  }

  // ─── Indexes ─────────────────────────────────────────────────────────────

  /** First single-column unique index of each column other than the primary key; these print as `@unique` */
  private inlineUniqueIndexes(table: TableInfo): Set<IndexInfo> {
    const primary = table.primaryKey.length === 1 ? this.key(table.primaryKey[0] ?? '') : undefined;
    const seen = new Set<string>();
    const result = new Set<IndexInfo>();
    for (const index of table.indexes) {
      if (!isSingleColumnUnique(index)) continue;
      const column = this.key(index.columns[0]?.name ?? '');
      if (column === primary || seen.has(column)) continue;
      seen.add(column);
      result.add(index);
    }
    return result;
  }

  /** The index name, unless it is the conventional or an engine-generated one */
  private explicitIndexName(table: TableInfo, index: IndexInfo): string | undefined {
    if (GENERATED_INDEX_NAME.test(index.name)) return undefined;
    const conventional = constraintName(
      table.name,
      index.columns.map((c) => c.name),
      index.unique ? 'key' : 'idx',
    );
    return index.name === conventional ? undefined : index.name;
  }

  private indexFields(table: TableInfo, index: IndexInfo): AttributeValue {
    return {
      kind: 'list',
      items: index.columns.map((column): AttributeValue => {
        const name = this.fieldName(table, column.name);
        if (column.sort !== 'desc') return { kind: 'identifier', value: name };
        return { kind: 'call', name, args: [{ name: 'sort', value: { kind: 'identifier', value: 'Desc' } }] };
      }),
    };
  }

  private fieldList(table: TableInfo, columns: readonly string[]): AttributeValue {
    return identifierList(columns.map((column) => this.fieldName(table, column)));
  }

  // ─── Names ───────────────────────────────────────────────────────────────

  private key(name: string): string {
    return this.provider.normalizeIdentifier(name);
  }

  private namesOf(table: TableInfo): ModelNames {
    const names = this.names.get(this.key(table.name));
    if (names) return names;
    const created: ModelNames = { model: table.name, fields: new Map(), taken: new Set() };
    this.names.set(this.key(table.name), created);
    return created;
  }

  private fieldName(table: TableInfo, column: string): string {
    return this.namesOf(table).fields.get(this.key(column)) ?? column;
  }
}

// ─── Helpers ───────────────────────────────────────────────────────────────

function attribute(name: string, args: Argument[] = []): Attribute {
  return { name, args, position: NO_POSITION };
}

function text(value: string): AttributeValue {
  return { kind: 'string', value };
}

function identifierList(names: readonly string[]): AttributeValue {
  return { kind: 'list', items: names.map((value): AttributeValue => ({ kind: 'identifier', value })) };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function lowerFirst(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

/** A declaration identifier: letters, digits and `_`, not starting with a digit */
function identifier(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, '_');
  if (cleaned === '') return '_';
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/** `name`, or `name2`, `name3`… when taken; the result is added to `taken` */
function uniqueName(name: string, taken: Set<string>): string {
  let candidate = name;
  for (let n = 2; taken.has(candidate); n++) candidate = `${name}${n}`;
  taken.add(candidate);
  return candidate;
}

/** Scalar the column's type family stands for */
function scalarFor(type: string): ScalarType {
  switch (typeFamily(type)) {
    case 'integer':
      return /^BIG/i.test(type) ? 'BigInt' : 'Int';
    case 'decimal':
      return 'Decimal';
    case 'float':
      return 'Float';
    case 'boolean':
      return 'Boolean';
    case 'temporal':
      return 'DateTime';
    case 'json':
      return 'Json';
    case 'binary':
      return 'Bytes';
    case 'text':
    case 'uuid':
    case 'other':
      return 'String';
  }
}

function typeArguments(type: string): string[] {
  const inner = /\(([^)]*)\)/.exec(type)?.[1];
  return inner === undefined ? [] : inner.split(',').map((part) => part.trim());
}

/** Members of an inline `ENUM('a','b')` column type */
function enumMembers(type: string, provider: Provider): string[] | undefined {
  const inner = ENUM_TYPE.exec(type)?.[1];
  if (inner === undefined) return undefined;
  const literals = inner.match(ENUM_MEMBER) ?? [];
  const values = literals.map((literal) => unquote(literal, provider.backslashEscapes));
  return values.length > 0 ? values : undefined;
}

function unquote(literal: string, backslashEscapes: boolean): string {
  const body = literal.slice(1, -1);
  const escapes = backslashEscapes ? /''|\\(.)/gs : /''/g;
  return body.replace(escapes, (_match: string, escaped: string | undefined) => escaped ?? "'");
}

/** Enum defaults name the member whose value the column stores */
function enumDefault(enumDef: Enum, value: AttributeValue): AttributeValue {
  if (value.kind !== 'string' && value.kind !== 'identifier') return value;
  const member = enumDef.values.find((v) => memberValue(v) === value.value);
  return member ? { kind: 'identifier', value: member.name } : value;
}

function memberValue(member: EnumValue): string {
  const map = member.attributes.find((a) => a.name === 'map')?.args[0]?.value;
  return map?.kind === 'string' ? map.value : member.name;
}
