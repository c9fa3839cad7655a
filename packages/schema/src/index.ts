/**
 * @tidemark/schema — Schema declaration parsing.
 *
 * @example
 * ```ts
 * import { parseSchema, validateSchema } from '@tidemark/schema';
 *
 * const { success, schema, errors } = parseSchema(`
 *   datasource db {
 *     provider = "postgresql"
 *     url      = env("DATABASE_URL")
 *   }
 *
 *   model User {
 *     id    Int    @id @default(autoincrement())
 *     email String @unique
 *   }
 * `);
 *
 * const issues = success ? validateSchema(schema) : [];
 * ```
 *
 * @module @tidemark/schema
 */

// AST
export type {
  Argument,
  Attribute,
  AttributeValue,
  BooleanValue,
  Datasource,
  Enum,
  EnumValue,
  Field,
  FieldType,
  FunctionCallValue,
  Generator,
  IdentifierValue,
  ListValue,
  Model,
  NumberValue,
  Position,
  Property,
  ScalarType,
  ScalarValue,
  Schema,
  StringValue,
} from './ast.js';
export {
  SCALAR_TYPES,
  findAttribute,
  findAttributes,
  formatArgument,
  formatValue,
  getArgument,
  getProperty,
  isScalarType,
  quoteString,
  valueAsNameList,
  valueAsString,
} from './ast.js';

// Printer
export { formatAttribute, formatFieldType, printSchema } from './printer.js';

// Lexer & parser
export { Lexer, tokenize } from './lexer.js';
export type { LexResult, Token, TokenType } from './lexer.js';
export { parseSchema } from './parser.js';
export type { ParseResult } from './parser.js';

// Validation
export { assertValidSchema, loadSchema, validateSchema } from './validator.js';

// Datasource
export { getDatasource, resolveDatasourceUrl } from './datasource.js';
export type { DatasourceConfig, DatasourceUrl } from './datasource.js';
