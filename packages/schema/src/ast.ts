/**
 * @tidemark/schema — Declaration AST.
 *
 * The AST is produced once per parse and never mutated afterwards; consumers
 * (validator, model builder) only read it.
 *
 * @module @tidemark/schema
 */

/** 1-based source location */
export interface Position {
  line: number;
  column: number;
}

// ─── Attribute values ────────────────────────────────────────────────────────

export interface StringValue {
  kind: 'string';
  value: string;
}

export interface NumberValue {
  kind: 'number';
  value: number;
  /** Source spelling, e.g. `1.50` */
  raw: string;
}

export interface BooleanValue {
  kind: 'boolean';
  value: boolean;
}

/** Bare identifier or dotted path: `Cascade`, `Desc`, `ACTIVE`, `db.Text` */
export interface IdentifierValue {
  kind: 'identifier';
  value: string;
}

export type ScalarValue = StringValue | NumberValue | BooleanValue | IdentifierValue;

export interface ListValue {
  kind: 'list';
  items: AttributeValue[];
}

/** Function-call-like value: `now()`, `dbgenerated("x")`, `createdAt(sort: Desc)` */
export interface FunctionCallValue {
  kind: 'call';
  name: string;
  args: Argument[];
}

/** Closed set of attribute argument values */
export type AttributeValue = ScalarValue | ListValue | FunctionCallValue;

// ─── Nodes ───────────────────────────────────────────────────────────────────

export interface Argument {
  /** Present for named arguments (`fields: [...]`) */
  name?: string;
  value: AttributeValue;
}

export interface Attribute {
  /** Attribute name without `@`; may be dotted (`db.VarChar`) */
  name: string;
  args: Argument[];
  position: Position;
}

export interface FieldType {
  name: string;
  isArray: boolean;
  isOptional: boolean;
  /** Native type text of `Unsupported("...")` */
  unsupported?: string;
}

export interface Field {
  name: string;
  type: FieldType;
  attributes: Attribute[];
  position: Position;
}

export interface Model {
  name: string;
  fields: Field[];
  /** Model-level (`@@`) attributes */
  attributes: Attribute[];
  position: Position;
}

export interface EnumValue {
  name: string;
  attributes: Attribute[];
  position: Position;
}

export interface Enum {
  name: string;
  values: EnumValue[];
  attributes: Attribute[];
  position: Position;
}

/** `name = value` line of a datasource or generator block */
export interface Property {
  name: string;
  value: AttributeValue;
  position: Position;
}

export interface Datasource {
  name: string;
  properties: Property[];
  position: Position;
}

export interface Generator {
  name: string;
  properties: Property[];
  position: Position;
}

/** Root of a parsed declaration */
export interface Schema {
  datasources: Datasource[];
  generators: Generator[];
  models: Model[];
  enums: Enum[];
}

// ─── Scalar types ────────────────────────────────────────────────────────────

export const SCALAR_TYPES = [
  'String',
  'Int',
  'BigInt',
  'Float',
  'Decimal',
  'Boolean',
  'DateTime',
  'Json',
  'Bytes',
] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];

export function isScalarType(name: string): name is ScalarType {
  return SCALAR_TYPES.some((t) => t === name);
}

// ─── Lookup helpers ──────────────────────────────────────────────────────────

export function findAttribute(attributes: readonly Attribute[], name: string): Attribute | undefined {
  return attributes.find((a) => a.name === name);
}

export function findAttributes(attributes: readonly Attribute[], name: string): Attribute[] {
  return attributes.filter((a) => a.name === name);
}

/**
 * Get an argument by name, falling back to the `positional`-th unnamed argument.
 */
export function getArgument(
  attribute: Attribute | FunctionCallValue,
  name: string,
  positional?: number,
): AttributeValue | undefined {
  const named = attribute.args.find((a) => a.name === name);
  if (named) return named.value;
  if (positional === undefined) return undefined;
  return attribute.args.filter((a) => a.name === undefined)[positional]?.value;
}

export function getProperty(block: Datasource | Generator, name: string): AttributeValue | undefined {
  return block.properties.find((p) => p.name === name)?.value;
}

/** String content of a string value, or the name of an identifier */
export function valueAsString(value: AttributeValue | undefined): string | undefined {
  if (!value) return undefined;
  switch (value.kind) {
    case 'string':
    case 'identifier':
      return value.value;
    case 'number':
      return value.raw;
    case 'boolean':
      return String(value.value);
    case 'list':
    case 'call':
      return undefined;
  }
}

/**
 * Names listed in a field-reference list: `[a, b]`, `[a(sort: Desc)]`.
 */
export function valueAsNameList(value: AttributeValue | undefined): string[] | undefined {
  if (!value) return undefined;
  if (value.kind !== 'list') {
    const single = value.kind === 'call' ? value.name : valueAsString(value);
    return single === undefined ? undefined : [single];
  }
  const names: string[] = [];
  for (const item of value.items) {
    if (item.kind === 'identifier' || item.kind === 'string') names.push(item.value);
    else if (item.kind === 'call') names.push(item.name);
    else return undefined;
  }
  return names;
}

/**
 * Render a value back into declaration syntax.
 *
 * Canonical default expressions use this spelling: `"draft"`, `0`, `true`,
 * `now()`, `dbgenerated("gen_random_uuid()")`.
 */
export function formatValue(value: AttributeValue): string {
  switch (value.kind) {
    case 'string':
      return quoteString(value.value);
    case 'number':
      return value.raw;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'identifier':
      return value.value;
    case 'list':
      return `[${value.items.map(formatValue).join(', ')}]`;
    case 'call':
      return `${value.name}(${value.args.map(formatArgument).join(', ')})`;
  }
}

export function formatArgument(arg: Argument): string {
  return arg.name ? `${arg.name}: ${formatValue(arg.value)}` : formatValue(arg.value);
}

export function quoteString(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}
