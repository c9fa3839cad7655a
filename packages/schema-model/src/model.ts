/**
 * Construction and identity helpers for the canonical model.
 */

import type { IndexColumnOrder } from '@tidemark/core';

import type { ChangeSet, ColumnInfo, ForeignKeyInfo, IndexInfo, TableInfo } from './types.js';

export function createTable(name: string): TableInfo {
  return { name, columns: new Map(), indexes: [], primaryKey: [], foreignKeys: [] };
}

export function createColumn(name: string, type: string, overrides: Partial<ColumnInfo> = {}): ColumnInfo {
  return { name, type, nullable: false, primaryKey: false, unique: false, autoIncrement: false, ...overrides };
}

export function emptyChangeSet(): ChangeSet {
  return { createTables: [], alterTables: [], dropTables: [], indexChanges: [] };
}

/** Conventional constraint name: `<table>_<col1>_<col2>_<suffix>` */
export function constraintName(table: string, columns: readonly string[], suffix: 'pkey' | 'key' | 'idx' | 'fkey'): string {
  return [table, ...columns, suffix].join('_');
}

/**
 * Identity of an index by content. Names never take part, so a renamed
 * index with the same columns is the same index.
 */
export function indexKey(
  index: IndexInfo,
  order: IndexColumnOrder,
  normalize: (name: string) => string = (name) => name,
): string {
  const parts = index.columns.map((c) => `${normalize(c.name)}:${c.sort ?? 'asc'}`);
  if (order === 'insignificant') parts.sort();
  return `${index.unique ? 'unique' : 'index'}(${parts.join(',')})`;
}

export function foreignKeyKey(fk: ForeignKeyInfo, normalize: (name: string) => string = (name) => name): string {
  return [
    fk.columns.map(normalize).join(','),
    normalize(fk.referencedTable),
    fk.referencedColumns.map(normalize).join(','),
    fk.onDelete,
    fk.onUpdate,
  ].join('|');
}

/** Unique index over exactly one column, which renders as an inline `UNIQUE` */
export function isSingleColumnUnique(index: IndexInfo): boolean {
  return index.unique && index.columns.length === 1 && (index.columns[0]?.sort ?? 'asc') === 'asc';
}

/** Names of the other tables a table's foreign keys point at */
export function referencedTables(table: TableInfo, normalize: (name: string) => string = (name) => name): Set<string> {
  const self = normalize(table.name);
  const result = new Set<string>();
  for (const fk of table.foreignKeys) {
    const target = normalize(fk.referencedTable);
    if (target !== self) result.add(target);
  }
  return result;
}

export function isEmptyChangeSet(changeSet: ChangeSet): boolean {
  return (
    changeSet.createTables.length === 0 &&
    changeSet.alterTables.length === 0 &&
    changeSet.dropTables.length === 0 &&
    changeSet.indexChanges.length === 0
  );
}
