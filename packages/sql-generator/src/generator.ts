/**
 * @tidemark/sql-generator — Change set to DDL.
 *
 * Statements are emitted in phases so that every object exists before
 * something refers to it and is unreferenced before it is dropped:
 *
 * 1. drop foreign keys
 * 2. drop indexes
 * 3. create tables
 * 4. alter (or rebuild) tables
 * 5. drop tables
 * 6. create indexes
 * 7. add foreign keys
 *
 * @module @tidemark/sql-generator
 */

import {
  type AlterTable,
  type ChangeSet,
  type ColumnInfo,
  type ColumnModification,
  type ForeignKeyInfo,
  type IndexInfo,
  type Provider,
  type TableInfo,
  isEmptyChangeSet,
  isSingleColumnUnique,
} from '@tidemark/schema-model';

import { orderForCreate, orderForDrop } from './ordering.js';

/** Prefix of the temporary table used while rebuilding a table */
export const REDEFINE_PREFIX = 'new_';

/**
 * Render a change set as a migration script: statements terminated by `;`
 * and separated by blank lines. An empty change set renders as `''`.
 */
export function generate(changeSet: ChangeSet, provider: Provider): string {
  const statements = generateStatements(changeSet, provider);
  if (statements.length === 0) return '';
  return `${statements.map((s) => `${s};`).join('\n\n')}\n`;
}

/**
 * Ordered DDL statements, without terminators.
 */
export function generateStatements(changeSet: ChangeSet, provider: Provider): string[] {
  if (isEmptyChangeSet(changeSet)) return [];
  const generator = new SqlGenerator(provider);
  return generator.run(changeSet);
}

class SqlGenerator {
  private readonly dropForeignKeys: string[] = [];
  private readonly dropIndexes: string[] = [];
  private readonly createTables: string[] = [];
  private readonly alterTables: string[] = [];
  private readonly dropTables: string[] = [];
  private readonly createIndexes: string[] = [];
  private readonly addForeignKeys: string[] = [];

  private readonly normalize: (name: string) => string;

  constructor(private readonly provider: Provider) {
    this.normalize = (name) => provider.normalizeIdentifier(name);
  }

  run(changeSet: ChangeSet): string[] {
    this.planCreates(changeSet.createTables);

    const redefined: AlterTable[] = [];
    for (const alter of changeSet.alterTables) {
      if (this.provider.alterStrategy === 'redefine') redefined.push(alter);
      else this.planAlter(alter);
    }
    if (redefined.length > 0) this.planRedefines(redefined);

    for (const change of changeSet.indexChanges) {
      for (const index of change.dropped) this.dropIndexes.push(this.provider.dropIndexStatement(change.table, index));
      for (const index of change.added) this.createIndexes.push(this.createIndex(change.table, index));
    }

    this.planDrops(changeSet.dropTables.map((d) => d.table));

    const body = [
      ...this.dropForeignKeys,
      ...this.dropIndexes,
      ...this.createTables,
      ...this.alterTables,
      ...this.dropTables,
      ...this.createIndexes,
      ...this.addForeignKeys,
    ];
    return [...this.provider.preamble(body.join('\n')), ...body];
  }

  // ─── Create ──────────────────────────────────────────────────────────────────

  private planCreates(tables: readonly TableInfo[]): void {
    const order = orderForCreate(tables, this.normalize, this.provider.supportsAddForeignKey);

    for (const table of order.tables) {
      const deferred = order.deferred.get(table.name) ?? [];
      const inline = table.foreignKeys.filter((fk) => !deferred.includes(fk));
      this.createTables.push(this.createTable(table.name, table, inline));

      for (const index of table.indexes) {
        if (!this.isInlineUnique(table, index)) this.createIndexes.push(this.createIndex(table.name, index));
      }
      for (const fk of deferred) this.addForeignKeys.push(this.addForeignKey(table.name, fk));
    }
  }

  private createTable(name: string, table: TableInfo, foreignKeys: readonly ForeignKeyInfo[]): string {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    const inlinePk = this.provider.primaryKeyStyle === 'inline' && table.primaryKey.length === 1;
    const pkColumn = inlinePk ? this.normalize(table.primaryKey[0] ?? '') : undefined;

    const entries = [...table.columns.values()].map((column) =>
      this.provider.columnDefinition(column, {
        inlinePrimaryKey: this.normalize(column.name) === pkColumn,
        inlineUnique: table.indexes.some((index) => this.isInlineUnique(table, index) && this.indexCovers(index, column)),
      }),
    );

    if (table.primaryKey.length > 0 && !inlinePk) {
      entries.push(this.provider.primaryKeyClause(table.name, table.primaryKey));
    }
    for (const fk of foreignKeys) entries.push(this.foreignKeyClause(fk));

    return [`CREATE TABLE ${q(name)} (`, entries.map((e) => `    ${e}`).join(',\n'), `)${this.provider.createTableSuffix}`].join(
      '\n',
    );
  }

  /** Single-column unique indexes of a new table render as `UNIQUE` on the column */
  private isInlineUnique(table: TableInfo, index: IndexInfo): boolean {
    if (!isSingleColumnUnique(index)) return false;
    const column = index.columns[0];
    return column !== undefined && table.columns.has(this.normalize(column.name));
  }

  private indexCovers(index: IndexInfo, column: ColumnInfo): boolean {
    return index.columns.length === 1 && this.normalize(index.columns[0]?.name ?? '') === this.normalize(column.name);
  }

  private createIndex(table: string, index: IndexInfo): string {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    const columns = index.columns.map((c) => (c.sort === 'desc' ? `${q(c.name)} DESC` : q(c.name))).join(', ');
    return `CREATE ${index.unique ? 'UNIQUE ' : ''}INDEX ${q(index.name)} ON ${q(table)}(${columns})`;
  }

  private foreignKeyClause(fk: ForeignKeyInfo): string {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    const list = (names: readonly string[]) => names.map(q).join(', ');
    return (
      `CONSTRAINT ${q(fk.name)} FOREIGN KEY (${list(fk.columns)}) ` +
      `REFERENCES ${q(fk.referencedTable)}(${list(fk.referencedColumns)}) ` +
      `ON DELETE ${fk.onDelete} ON UPDATE ${fk.onUpdate}`
    );
  }

  private addForeignKey(table: string, fk: ForeignKeyInfo): string {
    return `ALTER TABLE ${this.provider.quoteIdentifier(table)} ADD ${this.foreignKeyClause(fk)}`;
  }

  // ─── Alter ───────────────────────────────────────────────────────────────────

  private planAlter(alter: AlterTable): void {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    const table = alter.name;

    for (const fk of alter.droppedForeignKeys) {
      this.dropForeignKeys.push(this.provider.dropForeignKeyStatement(table, fk.name));
    }
    for (const index of alter.droppedIndexes) {
      this.dropIndexes.push(this.provider.dropIndexStatement(table, index));
    }

    if (alter.primaryKey && alter.primaryKey.from.length > 0) {
      this.alterTables.push(this.provider.dropPrimaryKeyStatement(table));
    }
    for (const column of alter.droppedColumns) {
      this.alterTables.push(`ALTER TABLE ${q(table)} DROP COLUMN ${q(column.name)}`);
    }
    for (const column of alter.addedColumns) {
      this.alterTables.push(this.addColumn(table, column));
    }
    for (const change of alter.modifiedColumns) {
      this.alterTables.push(...this.modifyColumn(table, change));
    }
    if (alter.primaryKey && alter.primaryKey.to.length > 0) {
      this.alterTables.push(this.provider.addPrimaryKeyStatement(table, alter.primaryKey.to));
    }

    for (const index of alter.addedIndexes) this.createIndexes.push(this.createIndex(table, index));
    for (const fk of alter.addedForeignKeys) this.addForeignKeys.push(this.addForeignKey(table, fk));
  }

  private addColumn(table: string, column: ColumnInfo): string {
    const definition = this.provider.columnDefinition(column, { inlinePrimaryKey: false, inlineUnique: false });
    return `ALTER TABLE ${this.provider.quoteIdentifier(table)} ADD COLUMN ${definition}`;
  }

  private modifyColumn(table: string, change: ColumnModification): string[] {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    switch (this.provider.columnChangePolicy(change)) {
      case 'in-place':
        return this.provider.alterColumnStatements(table, change);
      case 'drop-and-add':
        return [`ALTER TABLE ${q(table)} DROP COLUMN ${q(change.from.name)}`, this.addColumn(table, change.to)];
      case 'redefine-table':
        // Rebuilding providers go through planRedefines and never get here.
        return this.provider.alterColumnStatements(table, change);
    }
  }

  // ─── Redefine ────────────────────────────────────────────────────────────────

  /**
   * Rebuild tables the provider cannot alter: create the new shape under a
   * temporary name, copy the shared columns, swap the tables and recreate
   * the indexes.
   */
  private planRedefines(alters: readonly AlterTable[]): void {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    this.alterTables.push('PRAGMA defer_foreign_keys=ON', 'PRAGMA foreign_keys=OFF');

    for (const alter of alters) {
      const { desired, actual } = alter;
      const temporary = `${REDEFINE_PREFIX}${desired.name}`;
      this.alterTables.push(this.createTable(temporary, desired, desired.foreignKeys));

      const shared = [...desired.columns.values()].filter((column) =>
        [...actual.columns.values()].some((old) => this.normalize(old.name) === this.normalize(column.name)),
      );
      if (shared.length > 0) {
        const columns = shared.map((c) => q(c.name)).join(', ');
        this.alterTables.push(`INSERT INTO ${q(temporary)} (${columns}) SELECT ${columns} FROM ${q(actual.name)}`);
      }

      this.alterTables.push(`DROP TABLE ${q(actual.name)}`);
      this.alterTables.push(this.provider.renameTableStatement(temporary, desired.name));

      for (const index of desired.indexes) {
        if (!this.isInlineUnique(desired, index)) this.alterTables.push(this.createIndex(desired.name, index));
      }
    }

    this.alterTables.push('PRAGMA foreign_keys=ON', 'PRAGMA defer_foreign_keys=OFF');
  }

  // ─── Drop ────────────────────────────────────────────────────────────────────

  private planDrops(tables: readonly TableInfo[]): void {
    const order = orderForDrop(tables, this.normalize, this.provider.supportsAddForeignKey);
    for (const fk of order.foreignKeys) {
      this.dropForeignKeys.push(this.provider.dropForeignKeyStatement(fk.table, fk.name));
    }
    for (const table of order.tables) {
      this.dropTables.push(`DROP TABLE ${this.provider.quoteIdentifier(table.name)}`);
    }
  }
}
