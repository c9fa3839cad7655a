/**
 * @tidemark/diff — Diff engine.
 *
 * Compares a desired canonical schema with an actual one and produces the
 * change set that turns the actual schema into the desired one.
 *
 * @module @tidemark/diff
 */

import type { IndexColumnOrder } from '@tidemark/core';
import type { AttributeValue } from '@tidemark/schema';
import {
  type AlterTable,
  type CanonicalSchema,
  type ChangeSet,
  type ColumnAttributeChange,
  type ColumnInfo,
  type ColumnModification,
  type ForeignKeyInfo,
  type IndexInfo,
  type Provider,
  type TableInfo,
  emptyChangeSet,
  foreignKeyKey,
  indexKey,
} from '@tidemark/schema-model';

export interface CompareOptions {
  /** Overrides the provider's index column order policy */
  indexColumnOrder?: IndexColumnOrder;
}

/**
 * Compare two canonical schemas.
 *
 * Tables and columns match by provider-normalized name; there is no rename
 * detection, so a renamed table is a drop plus a create.
 */
export function compare(
  desired: CanonicalSchema,
  actual: CanonicalSchema,
  provider: Provider,
  options: CompareOptions = {},
): ChangeSet {
  const differ = new SchemaDiffer(provider, options.indexColumnOrder ?? provider.indexColumnOrder);
  return differ.diff(desired, actual);
}

/**
 * Defaults are equal when they render to the same SQL. Numbers compare by
 * value so `1.0` and `1` match; client-generated values render as nothing.
 */
export function defaultsEqual(
  desired: ColumnInfo,
  actual: ColumnInfo,
  provider: Pick<Provider, 'renderDefault'>,
): boolean {
  const a = desired.default;
  const b = actual.default;
  if (a?.kind === 'number' && b?.kind === 'number') return a.value === b.value;
  return renderOrNull(a, desired, provider) === renderOrNull(b, actual, provider);
}

function renderOrNull(
  value: AttributeValue | undefined,
  column: ColumnInfo,
  provider: Pick<Provider, 'renderDefault'>,
): string | null {
  if (value === undefined) return null;
  return provider.renderDefault(value, column) ?? null;
}

class SchemaDiffer {
  private readonly normalize: (name: string) => string;

  constructor(
    private readonly provider: Provider,
    private readonly indexOrder: IndexColumnOrder,
  ) {
    this.normalize = (name) => provider.normalizeIdentifier(name);
  }

  diff(desired: CanonicalSchema, actual: CanonicalSchema): ChangeSet {
    const changeSet = emptyChangeSet();
    const desiredTables = this.byName(desired);
    const actualTables = this.byName(actual);

    for (const [key, table] of desiredTables) {
      if (!actualTables.has(key)) changeSet.createTables.push(table);
    }

    for (const [key, table] of actualTables) {
      if (!desiredTables.has(key)) changeSet.dropTables.push({ name: table.name, table });
    }

    for (const [key, desiredTable] of desiredTables) {
      const actualTable = actualTables.get(key);
      if (!actualTable) continue;

      const alter = this.diffTable(desiredTable, actualTable);
      if (!alter) continue;

      if (this.isIndexOnly(alter)) {
        changeSet.indexChanges.push({
          table: alter.name,
          added: alter.addedIndexes,
          dropped: alter.droppedIndexes,
        });
      } else {
        changeSet.alterTables.push(alter);
      }
    }

    return changeSet;
  }

  private byName(schema: CanonicalSchema): Map<string, TableInfo> {
    return new Map([...schema.tables.values()].map((t) => [this.normalize(t.name), t]));
  }

  private diffTable(desired: TableInfo, actual: TableInfo): AlterTable | undefined {
    const alter: AlterTable = {
      name: desired.name,
      addedColumns: [],
      droppedColumns: [],
      modifiedColumns: [],
      addedIndexes: [],
      droppedIndexes: [],
      addedForeignKeys: [],
      droppedForeignKeys: [],
      desired,
      actual,
    };

    const desiredColumns = this.columnsByName(desired);
    const actualColumns = this.columnsByName(actual);

    for (const [key, column] of desiredColumns) {
      const existing = actualColumns.get(key);
      if (!existing) {
        alter.addedColumns.push(column);
        continue;
      }
      const modification = this.diffColumn(column, existing);
      if (modification) alter.modifiedColumns.push(modification);
    }

    for (const [key, column] of actualColumns) {
      if (!desiredColumns.has(key)) alter.droppedColumns.push(column);
    }

    const indexKeyOf = (index: IndexInfo) => indexKey(index, this.indexOrder, this.normalize);
    alter.addedIndexes = missingFrom(desired.indexes, actual.indexes, indexKeyOf);
    alter.droppedIndexes = missingFrom(actual.indexes, desired.indexes, indexKeyOf);

    const fkKeyOf = (fk: ForeignKeyInfo) => foreignKeyKey(fk, this.normalize);
    alter.addedForeignKeys = missingFrom(desired.foreignKeys, actual.foreignKeys, fkKeyOf);
    alter.droppedForeignKeys = missingFrom(actual.foreignKeys, desired.foreignKeys, fkKeyOf);

    const from = actual.primaryKey.map(this.normalize);
    const to = desired.primaryKey.map(this.normalize);
    if (from.join(',') !== to.join(',')) {
      alter.primaryKey = { from: actual.primaryKey, to: desired.primaryKey };
    }

    const changed =
      alter.addedColumns.length > 0 ||
      alter.droppedColumns.length > 0 ||
      alter.modifiedColumns.length > 0 ||
      alter.addedIndexes.length > 0 ||
      alter.droppedIndexes.length > 0 ||
      alter.addedForeignKeys.length > 0 ||
      alter.droppedForeignKeys.length > 0 ||
      alter.primaryKey !== undefined;

    return changed ? alter : undefined;
  }

  private columnsByName(table: TableInfo): Map<string, ColumnInfo> {
    return new Map([...table.columns.values()].map((c) => [this.normalize(c.name), c]));
  }

  private diffColumn(desired: ColumnInfo, actual: ColumnInfo): ColumnModification | undefined {
    const changes: ColumnAttributeChange[] = [];
    if (this.provider.normalizeType(desired.type) !== this.provider.normalizeType(actual.type)) {
      changes.push('type');
    }
    if (desired.nullable !== actual.nullable) changes.push('nullable');
    if (!defaultsEqual(desired, actual, this.provider)) changes.push('default');
    if (desired.autoIncrement !== actual.autoIncrement) changes.push('autoIncrement');

    return changes.length > 0 ? { from: actual, to: desired, changes } : undefined;
  }

  /**
   * Index-only differences go to `indexChanges`, unless the provider has to
   * rebuild the table to drop a constraint-backed index.
   */
  private isIndexOnly(alter: AlterTable): boolean {
    const structural =
      alter.addedColumns.length > 0 ||
      alter.droppedColumns.length > 0 ||
      alter.modifiedColumns.length > 0 ||
      alter.addedForeignKeys.length > 0 ||
      alter.droppedForeignKeys.length > 0 ||
      alter.primaryKey !== undefined;
    if (structural) return false;
    if (this.provider.alterStrategy === 'redefine' && alter.droppedIndexes.some((i) => i.constraint)) {
      return false;
    }
    return true;
  }
}

function missingFrom<T>(items: readonly T[], other: readonly T[], keyOf: (item: T) => string): T[] {
  const keys = new Set(other.map(keyOf));
  return items.filter((item) => !keys.has(keyOf(item)));
}
