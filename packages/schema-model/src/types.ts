/**
 * @tidemark/schema-model — Canonical schema model and change sets.
 *
 * The same structures describe the desired schema (built from a declaration)
 * and the actual schema (read from a database), so the diff engine can
 * compare them type for type.
 *
 * @module @tidemark/schema-model
 */

import type { AttributeValue } from '@tidemark/schema';

// ── Canonical model ───────────────────────────────────────

export type SortOrder = 'asc' | 'desc';

export type ReferentialAction = 'CASCADE' | 'RESTRICT' | 'NO ACTION' | 'SET NULL' | 'SET DEFAULT';

export interface ColumnInfo {
  name: string;
  /** Canonical SQL type, e.g. `TEXT`, `VARCHAR(191)`, `TIMESTAMP(3)` */
  type: string;
  nullable: boolean;
  primaryKey: boolean;
  unique: boolean;
  /** Default in declaration vocabulary: `now()`, `"draft"`, `dbgenerated("…")` */
  default?: AttributeValue;
  autoIncrement: boolean;
}

export interface IndexColumn {
  name: string;
  sort?: SortOrder;
}

export interface IndexInfo {
  name: string;
  columns: IndexColumn[];
  unique: boolean;
  /** The index backs a UNIQUE constraint rather than being a plain index */
  constraint?: boolean;
}

export interface ForeignKeyInfo {
  name: string;
  columns: string[];
  referencedTable: string;
  referencedColumns: string[];
  onDelete: ReferentialAction;
  onUpdate: ReferentialAction;
}

export interface TableInfo {
  name: string;
  /** Keyed by provider-normalized column name, in declaration order */
  columns: Map<string, ColumnInfo>;
  indexes: IndexInfo[];
  /** Ordered primary key column names */
  primaryKey: string[];
  foreignKeys: ForeignKeyInfo[];
}

/** Tables keyed by provider-normalized name */
export interface CanonicalSchema {
  tables: Map<string, TableInfo>;
}

// ── Change sets ───────────────────────────────────────────

export type ColumnAttributeChange = 'type' | 'nullable' | 'default' | 'autoIncrement';

export interface ColumnModification {
  from: ColumnInfo;
  to: ColumnInfo;
  changes: ColumnAttributeChange[];
}

export interface AlterTable {
  name: string;
  addedColumns: ColumnInfo[];
  droppedColumns: ColumnInfo[];
  modifiedColumns: ColumnModification[];
  addedIndexes: IndexInfo[];
  droppedIndexes: IndexInfo[];
  addedForeignKeys: ForeignKeyInfo[];
  droppedForeignKeys: ForeignKeyInfo[];
  primaryKey?: { from: string[]; to: string[] };
  /** Desired end state, used when a provider has to rebuild the table */
  desired: TableInfo;
  /** Current state, used to carry data over during a rebuild */
  actual: TableInfo;
}

export interface DropTable {
  name: string;
  /** Snapshot of the dropped table, used to order drops */
  table: TableInfo;
}

/** Index-only change on a table that is otherwise unchanged */
export interface IndexChange {
  table: string;
  added: IndexInfo[];
  dropped: IndexInfo[];
}

export interface ChangeSet {
  createTables: TableInfo[];
  alterTables: AlterTable[];
  dropTables: DropTable[];
  indexChanges: IndexChange[];
}
