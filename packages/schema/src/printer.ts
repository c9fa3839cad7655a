/**
 * @tidemark/schema — Declaration printer.
 *
 * Renders an AST back into declaration text that `parseSchema` reads into
 * the same nodes. Field names, types and attributes are aligned in columns.
 *
 * @module @tidemark/schema
 */

import {
  type Attribute,
  type Datasource,
  type Enum,
  type FieldType,
  type Generator,
  type Model,
  type Schema,
  formatArgument,
  formatValue,
  quoteString,
} from './ast.js';

const INDENT = '  ';

/** Declaration text for a schema, blocks separated by blank lines */
export function printSchema(schema: Schema): string {
  const blocks = [
    ...schema.datasources.map((block) => printConfigBlock('datasource', block)),
    ...schema.generators.map((block) => printConfigBlock('generator', block)),
    ...schema.enums.map(printEnum),
    ...schema.models.map(printModel),
  ];
  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
}

/** `@name(args)`, or `@@name(args)` for block attributes */
export function formatAttribute(attribute: Attribute, prefix: '@' | '@@' = '@'): string {
  const args = attribute.args.length > 0 ? `(${attribute.args.map(formatArgument).join(', ')})` : '';
  return `${prefix}${attribute.name}${args}`;
}

export function formatFieldType(type: FieldType): string {
  const name = type.unsupported === undefined ? type.name : `Unsupported(${quoteString(type.unsupported)})`;
  return `${name}${type.isArray ? '[]' : ''}${type.isOptional ? '?' : ''}`;
}

function printConfigBlock(keyword: 'datasource' | 'generator', block: Datasource | Generator): string {
  const width = Math.max(0, ...block.properties.map((p) => p.name.length));
  const lines = block.properties.map((p) => `${INDENT}${p.name.padEnd(width)} = ${formatValue(p.value)}`);
  return [`${keyword} ${block.name} {`, ...lines, '}'].join('\n');
}

function printEnum(enumDef: Enum): string {
  const rows = enumDef.values.map((value) => [value.name, attributeList(value.attributes)]);
  return [`enum ${enumDef.name} {`, ...alignRows(rows), ...blockAttributes(enumDef.attributes), '}'].join('\n');
}

function printModel(model: Model): string {
  const rows = model.fields.map((field) => [field.name, formatFieldType(field.type), attributeList(field.attributes)]);
  return [`model ${model.name} {`, ...alignRows(rows), ...blockAttributes(model.attributes), '}'].join('\n');
}

function attributeList(attributes: readonly Attribute[]): string {
  return attributes.map((a) => formatAttribute(a)).join(' ');
}

function blockAttributes(attributes: readonly Attribute[]): string[] {
  if (attributes.length === 0) return [];
  return ['', ...attributes.map((a) => `${INDENT}${formatAttribute(a, '@@')}`)];
}

/** Pad every column but the last to its widest cell */
function alignRows(rows: readonly string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) => {
    const cells = row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)));
    return `${INDENT}${cells.join(' ')}`.trimEnd();
  });
}
