/**
 * @tidemark/diff — Declaration to canonical model.
 *
 * @module @tidemark/diff
 */

import { ValidationError, type ValidationIssue } from '@tidemark/core';
import {
  type Attribute,
  type AttributeValue,
  type Enum,
  type Field,
  type Model,
  type Schema,
  findAttribute,
  findAttributes,
  getArgument,
  isScalarType,
  valueAsNameList,
  valueAsString,
} from '@tidemark/schema';
import {
  type CanonicalSchema,
  type ColumnInfo,
  type ForeignKeyInfo,
  type IndexColumn,
  type IndexInfo,
  type Provider,
  type ReferentialAction,
  type TableInfo,
  constraintName,
  createTable,
} from '@tidemark/schema-model';

const ACTIONS: Record<string, ReferentialAction> = {
  Cascade: 'CASCADE',
  Restrict: 'RESTRICT',
  NoAction: 'NO ACTION',
  SetNull: 'SET NULL',
  SetDefault: 'SET DEFAULT',
};

const NATIVE_PREFIX = 'db.';

/** Database name of a model: `@@map("…")` or the model name */
export function tableNameOf(model: Model): string {
  return mappedName(model.attributes, model.name);
}

/** Database name of a field: `@map("…")` or the field name */
export function columnNameOf(field: Field): string {
  return mappedName(field.attributes, field.name);
}

function mappedName(attributes: readonly Attribute[], fallback: string): string {
  const map = findAttribute(attributes, 'map');
  return (map && valueAsString(getArgument(map, 'name', 0))) ?? fallback;
}

/**
 * Build the desired canonical schema from a validated declaration.
 *
 * @throws ValidationError when the declaration uses something the provider cannot express
 */
export function buildModel(schema: Schema, provider: Provider): CanonicalSchema {
  const builder = new ModelBuilder(schema, provider);
  return builder.build();
}

class ModelBuilder {
  private readonly models: Map<string, Model>;
  private readonly enums: Map<string, Enum>;
  private readonly issues: ValidationIssue[] = [];

  constructor(
    private readonly schema: Schema,
    private readonly provider: Provider,
  ) {
    this.models = new Map(schema.models.map((m) => [m.name, m]));
    this.enums = new Map(schema.enums.map((e) => [e.name, e]));
  }

  build(): CanonicalSchema {
    const tables = new Map<string, TableInfo>();
    for (const model of this.schema.models) {
      const table = this.buildTable(model);
      tables.set(this.provider.normalizeIdentifier(table.name), table);
    }
    if (this.issues.length > 0) {
      throw new ValidationError(this.issues);
    }
    return { tables };
  }

  private buildTable(model: Model): TableInfo {
    const table = createTable(tableNameOf(model));

    for (const field of model.fields) {
      if (this.models.has(field.type.name)) {
        const fk = this.buildForeignKey(model, table, field);
        if (fk) table.foreignKeys.push(fk);
        continue;
      }

      const column = this.buildColumn(model, field);
      if (!column) continue;
      table.columns.set(this.provider.normalizeIdentifier(column.name), column);

      if (findAttribute(field.attributes, 'id')) {
        table.primaryKey = [column.name];
      }
      const unique = findAttribute(field.attributes, 'unique');
      if (unique) {
        table.indexes.push({
          name: this.explicitName(unique) ?? constraintName(table.name, [column.name], 'key'),
          columns: [{ name: column.name }],
          unique: true,
        });
      }
    }

    this.applyModelAttributes(model, table);
    return table;
  }

  private buildColumn(model: Model, field: Field): ColumnInfo | undefined {
    const path = `${model.name}.${field.name}`;
    const defaultAttr = findAttribute(field.attributes, 'default');
    const defaultValue = defaultAttr ? getArgument(defaultAttr, 'value', 0) : undefined;
    const autoIncrement = defaultValue?.kind === 'call' && defaultValue.name === 'autoincrement';

    let type = this.columnType(field, autoIncrement, path);
    if (type === undefined) return undefined;

    if (field.type.isArray) {
      const listType = this.provider.mapListType(type);
      if (listType === undefined) {
        this.issue(path, `Scalar lists are not supported by ${this.provider.name}`, field);
        return undefined;
      }
      type = listType;
    }

    return {
      name: columnNameOf(field),
      type,
      nullable: field.type.isOptional,
      primaryKey: findAttribute(field.attributes, 'id') !== undefined,
      unique: findAttribute(field.attributes, 'unique') !== undefined,
      default: autoIncrement || defaultValue === undefined ? undefined : this.defaultFor(field, defaultValue),
      autoIncrement,
    };
  }

  private columnType(field: Field, autoIncrement: boolean, path: string): string | undefined {
    if (field.type.unsupported !== undefined) {
      return this.provider.normalizeType(field.type.unsupported);
    }

    const enumDef = this.enums.get(field.type.name);
    if (enumDef) {
      return this.provider.mapEnumType(
        enumDef.name,
        enumDef.values.map((v) => mappedName(v.attributes, v.name)),
      );
    }

    const typeName = field.type.name;
    if (!isScalarType(typeName)) {
      this.issue(path, `Unknown type \`${typeName}\``, field);
      return undefined;
    }

    const native = field.attributes.find((a) => a.name.startsWith(NATIVE_PREFIX));
    if (!native) return this.provider.mapType(typeName, { autoIncrement });

    const nativeName = native.name.slice(NATIVE_PREFIX.length);
    const args = native.args.map((a) => valueAsString(a.value) ?? '');
    const mapped = this.provider.mapNativeType(nativeName, args);
    if (mapped === undefined) {
      this.issue(path, `Native type \`@${native.name}\` is not supported by ${this.provider.name}`, field);
    }
    return mapped;
  }

  /** Enum defaults name a member; the database stores the member's mapped value */
  private defaultFor(field: Field, value: AttributeValue): AttributeValue {
    const enumDef = this.enums.get(field.type.name);
    if (!enumDef || value.kind !== 'identifier') return value;
    const member = enumDef.values.find((v) => v.name === value.value);
    return member ? { kind: 'identifier', value: mappedName(member.attributes, member.name) } : value;
  }

  private buildForeignKey(model: Model, table: TableInfo, field: Field): ForeignKeyInfo | undefined {
    const relation = findAttribute(field.attributes, 'relation');
    if (!relation) return undefined;
    const fields = valueAsNameList(getArgument(relation, 'fields'));
    const references = valueAsNameList(getArgument(relation, 'references'));
    const target = this.models.get(field.type.name);
    if (!fields || !references || !target) return undefined;

    const columns = fields.map((name) => this.fieldColumn(model, name));
    return {
      name: this.explicitName(relation) ?? constraintName(table.name, columns, 'fkey'),
      columns,
      referencedTable: tableNameOf(target),
      referencedColumns: references.map((name) => this.fieldColumn(target, name)),
      onDelete: this.action(relation, 'onDelete') ?? (field.type.isOptional ? 'SET NULL' : 'RESTRICT'),
      onUpdate: this.action(relation, 'onUpdate') ?? 'CASCADE',
    };
  }

  private applyModelAttributes(model: Model, table: TableInfo): void {
    const id = findAttribute(model.attributes, 'id');
    if (id) {
      const columns = this.indexColumns(model, id).map((c) => c.name);
      table.primaryKey = columns;
      for (const name of columns) {
        const column = table.columns.get(this.provider.normalizeIdentifier(name));
        if (column) column.primaryKey = true;
      }
    }

    for (const attribute of findAttributes(model.attributes, 'unique')) {
      const columns = this.indexColumns(model, attribute);
      table.indexes.push({
        name: this.explicitName(attribute) ?? constraintName(table.name, columns.map((c) => c.name), 'key'),
        columns,
        unique: true,
      });
    }

    for (const attribute of findAttributes(model.attributes, 'index')) {
      const columns = this.indexColumns(model, attribute);
      table.indexes.push({
        name: this.explicitName(attribute) ?? constraintName(table.name, columns.map((c) => c.name), 'idx'),
        columns,
        unique: false,
      });
    }

    for (const index of table.indexes) {
      markUniqueColumn(table, index, this.provider);
    }
  }

  private indexColumns(model: Model, attribute: Attribute): IndexColumn[] {
    const list = getArgument(attribute, 'fields', 0);
    const items = list?.kind === 'list' ? list.items : list ? [list] : [];
    const columns: IndexColumn[] = [];
    for (const item of items) {
      if (item.kind === 'identifier') {
        columns.push({ name: this.fieldColumn(model, item.value) });
      } else if (item.kind === 'call') {
        const sort = valueAsString(getArgument(item, 'sort'));
        columns.push({
          name: this.fieldColumn(model, item.name),
          ...(sort === 'Desc' ? { sort: 'desc' as const } : {}),
        });
      }
    }
    return columns;
  }

  private fieldColumn(model: Model, fieldName: string): string {
    const field = model.fields.find((f) => f.name === fieldName);
    return field ? columnNameOf(field) : fieldName;
  }

  /** Database name from `map:`; `@@index` also takes `name:` */
  private explicitName(attribute: Attribute): string | undefined {
    const map = valueAsString(getArgument(attribute, 'map'));
    if (map !== undefined || attribute.name !== 'index') return map;
    return valueAsString(getArgument(attribute, 'name'));
  }

  private action(relation: Attribute, name: 'onDelete' | 'onUpdate'): ReferentialAction | undefined {
    const value = valueAsString(getArgument(relation, name));
    return value === undefined ? undefined : ACTIONS[value];
  }

  private issue(path: string, message: string, field: Field): void {
    this.issues.push({ path, message, line: field.position.line });
  }
}

function markUniqueColumn(table: TableInfo, index: IndexInfo, provider: Provider): void {
  const only = index.columns[0];
  if (!index.unique || index.columns.length !== 1 || !only) return;
  const column = table.columns.get(provider.normalizeIdentifier(only.name));
  if (column) column.unique = true;
}
