/**
 * @tidemark/schema-model — canonical model, change sets and the provider contract.
 *
 * @module @tidemark/schema-model
 */

export type {
  AlterTable,
  CanonicalSchema,
  ChangeSet,
  ColumnAttributeChange,
  ColumnInfo,
  ColumnModification,
  DropTable,
  ForeignKeyInfo,
  IndexChange,
  IndexColumn,
  IndexInfo,
  ReferentialAction,
  SortOrder,
  TableInfo,
} from './types.js';

export type {
  CatalogColumn,
  CatalogQuery,
  ColumnChangePolicy,
  IntrospectionQueries,
  ParsedDefault,
  Provider,
} from './provider.js';

export {
  constraintName,
  createColumn,
  createTable,
  emptyChangeSet,
  foreignKeyKey,
  indexKey,
  isEmptyChangeSet,
  isSingleColumnUnique,
  referencedTables,
} from './model.js';

export { areCastCompatible, isWideningChange, typeFamily, type TypeFamily } from './type-families.js';
