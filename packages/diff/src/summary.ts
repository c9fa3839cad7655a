/**
 * @tidemark/diff — Human-readable change set report.
 *
 * @module @tidemark/diff
 */

import {
  type ChangeSet,
  type ColumnAttributeChange,
  type ForeignKeyInfo,
  type IndexInfo,
  isEmptyChangeSet,
} from '@tidemark/schema-model';

const CHANGE_LABELS: Record<ColumnAttributeChange, string> = {
  type: 'type',
  nullable: 'nullability',
  default: 'default',
  autoIncrement: 'autoincrement',
};

/**
 * Render a drift-style summary.
 *
 * @example
 * ```
 * [+] Added tables
 *   - Post
 *
 * [*] Changed the `User` table
 *   [+] Added column `age`
 *   [*] Altered column `name` (changed nullability)
 * ```
 */
export function summarizeChangeSet(changeSet: ChangeSet): string {
  if (isEmptyChangeSet(changeSet)) return 'No difference detected.';

  const sections: string[][] = [];

  if (changeSet.createTables.length > 0) {
    sections.push(['[+] Added tables', ...changeSet.createTables.map((t) => `  - ${t.name}`)]);
  }

  if (changeSet.dropTables.length > 0) {
    sections.push(['[-] Removed tables', ...changeSet.dropTables.map((t) => `  - ${t.name}`)]);
  }

  for (const alter of changeSet.alterTables) {
    const lines = [`[*] Changed the \`${alter.name}\` table`];
    for (const column of alter.addedColumns) lines.push(`  [+] Added column \`${column.name}\``);
    for (const column of alter.droppedColumns) lines.push(`  [-] Removed column \`${column.name}\``);
    for (const change of alter.modifiedColumns) {
      const labels = change.changes.map((c) => CHANGE_LABELS[c]).join(', ');
      lines.push(`  [*] Altered column \`${change.to.name}\` (changed ${labels})`);
    }
    if (alter.primaryKey) {
      lines.push(`  [*] Changed primary key (${alter.primaryKey.from.join(', ')}) -> (${alter.primaryKey.to.join(', ')})`);
    }
    lines.push(...indexLines(alter.addedIndexes, alter.droppedIndexes));
    for (const fk of alter.addedForeignKeys) lines.push(`  [+] Added foreign key ${describeForeignKey(fk)}`);
    for (const fk of alter.droppedForeignKeys) lines.push(`  [-] Removed foreign key ${describeForeignKey(fk)}`);
    sections.push(lines);
  }

  for (const change of changeSet.indexChanges) {
    sections.push([`[*] Changed the \`${change.table}\` table`, ...indexLines(change.added, change.dropped)]);
  }

  return sections.map((lines) => lines.join('\n')).join('\n\n');
}

function indexLines(added: readonly IndexInfo[], dropped: readonly IndexInfo[]): string[] {
  return [
    ...added.map((index) => `  [+] Added ${describeIndex(index)}`),
    ...dropped.map((index) => `  [-] Removed ${describeIndex(index)}`),
  ];
}

function describeIndex(index: IndexInfo): string {
  const columns = index.columns.map((c) => (c.sort === 'desc' ? `${c.name} DESC` : c.name)).join(', ');
  return `${index.unique ? 'unique index' : 'index'} on columns (${columns})`;
}

function describeForeignKey(fk: ForeignKeyInfo): string {
  return `on columns (${fk.columns.join(', ')}) -> ${fk.referencedTable}(${fk.referencedColumns.join(', ')})`;
}
