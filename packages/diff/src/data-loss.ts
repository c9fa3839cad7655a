/**
 * @tidemark/diff — Data-loss analysis.
 *
 * @module @tidemark/diff
 */

import { type DataLossWarning, DestructiveChangeError } from '@tidemark/core';
import {
  type AlterTable,
  type ChangeSet,
  type ColumnModification,
  type IndexInfo,
  type Provider,
  isWideningChange,
} from '@tidemark/schema-model';

/**
 * List the changes in a change set that may discard data or fail on a
 * populated table.
 */
export function analyzeDataLoss(changeSet: ChangeSet, provider: Provider): DataLossWarning[] {
  const warnings: DataLossWarning[] = [];

  for (const drop of changeSet.dropTables) {
    warnings.push({
      kind: 'drop_table',
      table: drop.name,
      message: `Table \`${drop.name}\` will be dropped along with all of its rows`,
    });
  }

  for (const alter of changeSet.alterTables) {
    warnings.push(...alterWarnings(alter, provider));
  }

  for (const change of changeSet.indexChanges) {
    warnings.push(...uniqueWarnings(change.table, change.added));
  }

  return warnings;
}

/**
 * @throws DestructiveChangeError when the change set may lose data and the
 * caller did not accept it
 */
export function assertNoDataLoss(changeSet: ChangeSet, provider: Provider, acceptDataLoss: boolean): DataLossWarning[] {
  const warnings = analyzeDataLoss(changeSet, provider);
  if (warnings.length > 0 && !acceptDataLoss) {
    throw new DestructiveChangeError(warnings);
  }
  return warnings;
}

function alterWarnings(alter: AlterTable, provider: Provider): DataLossWarning[] {
  const warnings: DataLossWarning[] = [];
  const table = alter.name;

  for (const column of alter.droppedColumns) {
    warnings.push({
      kind: 'drop_column',
      table,
      column: column.name,
      message: `Column \`${table}\`.\`${column.name}\` will be dropped along with its values`,
    });
  }

  for (const column of alter.addedColumns) {
    if (column.nullable || column.autoIncrement || column.default !== undefined) continue;
    warnings.push({
      kind: 'required_column_without_default',
      table,
      column: column.name,
      message: `Required column \`${table}\`.\`${column.name}\` has no default; adding it fails if the table has rows`,
    });
  }

  for (const change of alter.modifiedColumns) {
    const warning = modificationWarning(table, change, provider);
    if (warning) warnings.push(warning);
  }

  warnings.push(...uniqueWarnings(table, alter.addedIndexes));
  return warnings;
}

function modificationWarning(
  table: string,
  change: ColumnModification,
  provider: Provider,
): DataLossWarning | undefined {
  const column = change.to.name;
  const { from, to } = change;

  if (change.changes.includes('type')) {
    if (provider.columnChangePolicy(change) === 'drop-and-add') {
      return {
        kind: 'recreate_column',
        table,
        column,
        message: `Column \`${table}\`.\`${column}\` changes from ${from.type} to ${to.type} and will be recreated; its values are lost`,
      };
    }
    if (!isWideningChange(from.type, to.type)) {
      return {
        kind: 'type_change',
        table,
        column,
        message: `Column \`${table}\`.\`${column}\` changes from ${from.type} to ${to.type}; existing values may not convert`,
      };
    }
  }

  if (change.changes.includes('nullable') && from.nullable && !to.nullable) {
    return {
      kind: 'make_required',
      table,
      column,
      message: `Column \`${table}\`.\`${column}\` becomes required; the change fails if it holds NULL values`,
    };
  }

  return undefined;
}

function uniqueWarnings(table: string, added: readonly IndexInfo[]): DataLossWarning[] {
  return added
    .filter((index) => index.unique)
    .map((index) => {
      const columns = index.columns.map((c) => c.name).join(', ');
      return {
        kind: 'add_unique' as const,
        table,
        column: index.columns.length === 1 ? index.columns[0]?.name : undefined,
        message: `A unique constraint on \`${table}\` (${columns}) fails if duplicate values exist`,
      };
    });
}
