import { MysqlProvider, PostgresProvider, SqliteProvider } from '@tidemark/dialects';
import {
  type AlterTable,
  type ChangeSet,
  type ColumnInfo,
  type ForeignKeyInfo,
  type TableInfo,
  createColumn,
  createTable,
  emptyChangeSet,
} from '@tidemark/schema-model';
import { describe, expect, it } from 'vitest';

import { generate, generateStatements } from '../generator.js';
import { splitStatements } from '../split.js';

const postgres = new PostgresProvider();
const mysql = new MysqlProvider();
const sqlite = new SqliteProvider();

function table(name: string, columns: ColumnInfo[], extra: Partial<Omit<TableInfo, 'name' | 'columns'>> = {}): TableInfo {
  const result = createTable(name);
  for (const column of columns) result.columns.set(column.name, column);
  return { ...result, ...extra };
}

function fk(from: string, column: string, to: string): ForeignKeyInfo {
  return {
    name: `${from}_${column}_fkey`,
    columns: [column],
    referencedTable: to,
    referencedColumns: ['id'],
    onDelete: 'RESTRICT',
    onUpdate: 'CASCADE',
  };
}

function creating(...tables: TableInfo[]): ChangeSet {
  return { ...emptyChangeSet(), createTables: tables };
}

function alterOf(desired: TableInfo, actual: TableInfo, changes: Partial<AlterTable>): AlterTable {
  return {
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
    ...changes,
  };
}

const id = (overrides: Partial<ColumnInfo> = {}) => createColumn('id', 'INTEGER', { primaryKey: true, ...overrides });

describe('generate', () => {
  it('should render nothing for an empty change set', () => {
    expect(generate(emptyChangeSet(), postgres)).toBe('');
  });

  it('should create a users table', () => {
    const users = table('users', [id({ autoIncrement: true }), createColumn('email', 'TEXT'), createColumn('name', 'TEXT', { nullable: true })], {
      primaryKey: ['id'],
      indexes: [{ name: 'users_email_key', columns: [{ name: 'email' }], unique: true }],
    });

    expect(generate(creating(users), postgres)).toBe(
      [
        'CREATE TABLE "users" (',
        '    "id" SERIAL NOT NULL,',
        '    "email" TEXT NOT NULL UNIQUE,',
        '    "name" TEXT,',
        '    CONSTRAINT "users_pkey" PRIMARY KEY ("id")',
        ');',
        '',
      ].join('\n'),
    );
  });

  it('should create non-inline indexes after the table', () => {
    const post = table('Post', [id(), createColumn('title', 'TEXT'), createColumn('slug', 'TEXT')], {
      primaryKey: ['id'],
      indexes: [
        { name: 'Post_title_slug_key', columns: [{ name: 'title' }, { name: 'slug' }], unique: true },
        { name: 'Post_title_idx', columns: [{ name: 'title', sort: 'desc' }], unique: false },
      ],
    });
    const statements = generateStatements(creating(post), postgres);
    expect(statements.slice(1)).toEqual([
      'CREATE UNIQUE INDEX "Post_title_slug_key" ON "Post"("title", "slug")',
      'CREATE INDEX "Post_title_idx" ON "Post"("title" DESC)',
    ]);
  });

  it('should install pgcrypto before tables that generate UUIDs', () => {
    const token = table('Token', [createColumn('id', 'UUID', { primaryKey: true, default: { kind: 'call', name: 'uuid', args: [] } })], {
      primaryKey: ['id'],
    });
    const statements = generateStatements(creating(token), postgres);
    expect(statements[0]).toBe('CREATE EXTENSION IF NOT EXISTS "pgcrypto"');
    expect(statements[1]).toContain('"id" UUID NOT NULL DEFAULT gen_random_uuid()');
  });

  describe('table ordering', () => {
    it('should create referenced tables first', () => {
      const post = table('Post', [id(), createColumn('authorId', 'INTEGER')], { foreignKeys: [fk('Post', 'authorId', 'User')] });
      const user = table('User', [id()]);
      const statements = generateStatements(creating(post, user), postgres);
      expect(statements.map((s) => s.split('\n')[0])).toEqual(['CREATE TABLE "User" (', 'CREATE TABLE "Post" (']);
      expect(statements[1]).toContain(
        'CONSTRAINT "Post_authorId_fkey" FOREIGN KEY ("authorId") REFERENCES "User"("id") ON DELETE RESTRICT ON UPDATE CASCADE',
      );
    });

    it('should defer foreign keys that close a cycle', () => {
      const a = table('A', [id(), createColumn('bId', 'INTEGER')], { foreignKeys: [fk('A', 'bId', 'B')] });
      const b = table('B', [id(), createColumn('aId', 'INTEGER')], { foreignKeys: [fk('B', 'aId', 'A')] });

      const statements = generateStatements(creating(b, a), postgres);
      expect(statements).toHaveLength(3);
      expect(statements[0]).toBe('CREATE TABLE "A" (\n    "id" INTEGER NOT NULL,\n    "bId" INTEGER NOT NULL\n)');
      expect(statements[1]?.split('\n')[0]).toBe('CREATE TABLE "B" (');
      expect(statements[2]).toBe(
        'ALTER TABLE "A" ADD CONSTRAINT "A_bId_fkey" FOREIGN KEY ("bId") REFERENCES "B"("id") ON DELETE RESTRICT ON UPDATE CASCADE',
      );
    });

    it('should keep cyclic foreign keys inline where they cannot be added later', () => {
      const a = table('A', [id(), createColumn('bId', 'INTEGER')], { foreignKeys: [fk('A', 'bId', 'B')] });
      const b = table('B', [id(), createColumn('aId', 'INTEGER')], { foreignKeys: [fk('B', 'aId', 'A')] });

      const statements = generateStatements(creating(a, b), sqlite);
      expect(statements).toHaveLength(2);
      expect(statements[0]).toContain('REFERENCES "B"("id")');
    });

    it('should drop referencing tables first and break drop cycles', () => {
      const a = table('A', [id(), createColumn('bId', 'INTEGER')], { foreignKeys: [fk('A', 'bId', 'B')] });
      const b = table('B', [id(), createColumn('aId', 'INTEGER')], { foreignKeys: [fk('B', 'aId', 'A')] });
      const post = table('Post', [id(), createColumn('authorId', 'INTEGER')], { foreignKeys: [fk('Post', 'authorId', 'User')] });
      const user = table('User', [id()]);

      const changeSet = emptyChangeSet();
      changeSet.dropTables = [user, post, a, b].map((t) => ({ name: t.name, table: t }));
      expect(generateStatements(changeSet, postgres)).toEqual([
        'ALTER TABLE "B" DROP CONSTRAINT "B_aId_fkey"',
        'DROP TABLE "Post"',
        'DROP TABLE "User"',
        'DROP TABLE "A"',
        'DROP TABLE "B"',
      ]);
    });
  });

  describe('alterations', () => {
    const actual = table('User', [id(), createColumn('name', 'TEXT', { nullable: true }), createColumn('legacy', 'TEXT')], {
      primaryKey: ['id'],
      indexes: [{ name: 'User_legacy_idx', columns: [{ name: 'legacy' }], unique: false }],
    });
    const desired = table('User', [id(), createColumn('name', 'TEXT'), createColumn('age', 'INTEGER', { nullable: true })], {
      primaryKey: ['id'],
      indexes: [{ name: 'User_name_idx', columns: [{ name: 'name' }], unique: false }],
    });
    const name = (t: TableInfo) => t.columns.get('name') ?? createColumn('name', 'TEXT');
    const change = alterOf(desired, actual, {
      addedColumns: [createColumn('age', 'INTEGER', { nullable: true })],
      droppedColumns: [createColumn('legacy', 'TEXT')],
      modifiedColumns: [{ from: name(actual), to: name(desired), changes: ['nullable'] }],
      addedIndexes: desired.indexes,
      droppedIndexes: actual.indexes,
    });
    const changeSet = { ...emptyChangeSet(), alterTables: [change] };

    it('should alter tables in place', () => {
      expect(generateStatements(changeSet, postgres)).toEqual([
        'DROP INDEX "User_legacy_idx"',
        'ALTER TABLE "User" DROP COLUMN "legacy"',
        'ALTER TABLE "User" ADD COLUMN "age" INTEGER',
        'ALTER TABLE "User" ALTER COLUMN "name" SET NOT NULL',
        'CREATE INDEX "User_name_idx" ON "User"("name")',
      ]);
    });

    it('should rebuild tables on SQLite', () => {
      expect(generateStatements(changeSet, sqlite)).toEqual([
        'PRAGMA defer_foreign_keys=ON',
        'PRAGMA foreign_keys=OFF',
        'CREATE TABLE "new_User" (\n    "id" INTEGER NOT NULL PRIMARY KEY,\n    "name" TEXT NOT NULL,\n    "age" INTEGER\n)',
        'INSERT INTO "new_User" ("id", "name") SELECT "id", "name" FROM "User"',
        'DROP TABLE "User"',
        'ALTER TABLE "new_User" RENAME TO "User"',
        'CREATE INDEX "User_name_idx" ON "User"("name")',
        'PRAGMA foreign_keys=ON',
        'PRAGMA defer_foreign_keys=OFF',
      ]);
    });

    it('should drop and re-add columns whose type cannot be cast', () => {
      const from = createColumn('views', 'VARCHAR(191)');
      const to = createColumn('views', 'INT', { default: { kind: 'number', value: 0, raw: '0' } });
      const post = table('Post', [to]);
      const alter = alterOf(post, table('Post', [from]), { modifiedColumns: [{ from, to, changes: ['type', 'default'] }] });
      expect(generateStatements({ ...emptyChangeSet(), alterTables: [alter] }, mysql)).toEqual([
        'ALTER TABLE `Post` DROP COLUMN `views`',
        'ALTER TABLE `Post` ADD COLUMN `views` INT NOT NULL DEFAULT 0',
      ]);
    });

    it('should swap primary keys and add foreign keys last', () => {
      const member = table('Member', [id(), createColumn('teamId', 'INTEGER')], { primaryKey: ['id', 'teamId'] });
      const alter = alterOf(member, table('Member', [id(), createColumn('teamId', 'INTEGER')], { primaryKey: ['id'] }), {
        primaryKey: { from: ['id'], to: ['id', 'teamId'] },
        addedForeignKeys: [fk('Member', 'teamId', 'Team')],
      });
      expect(generateStatements({ ...emptyChangeSet(), alterTables: [alter] }, mysql)).toEqual([
        'ALTER TABLE `Member` DROP PRIMARY KEY',
        'ALTER TABLE `Member` ADD PRIMARY KEY (`id`, `teamId`)',
        'ALTER TABLE `Member` ADD CONSTRAINT `Member_teamId_fkey` FOREIGN KEY (`teamId`) REFERENCES `Team`(`id`) ON DELETE RESTRICT ON UPDATE CASCADE',
      ]);
    });
  });

  it('should append the table suffix on MySQL', () => {
    const tag = table('Tag', [id({ type: 'INT', autoIncrement: true })], { primaryKey: ['id'] });
    expect(generateStatements(creating(tag), mysql)).toEqual([
      'CREATE TABLE `Tag` (\n    `id` INT NOT NULL AUTO_INCREMENT,\n    PRIMARY KEY (`id`)\n) DEFAULT CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci',
    ]);
  });

  it('should produce a script that splits back into its statements', () => {
    const users = table('users', [id(), createColumn('bio', 'TEXT', { default: { kind: 'string', value: 'a; b' } })], {
      primaryKey: ['id'],
    });
    const changeSet = creating(users);
    expect(splitStatements(generate(changeSet, postgres))).toEqual(generateStatements(changeSet, postgres));
  });

  it('should keep statements apart when a default ends in a backslash', () => {
    const files = table('files', [id(), createColumn('path', 'TEXT', { default: { kind: 'string', value: 'C:\\' } })], {
      primaryKey: ['id'],
    });
    const tags = table('tags', [id()], { primaryKey: ['id'] });
    const changeSet = creating(files, tags);

    for (const provider of [postgres, mysql, sqlite]) {
      const statements = generateStatements(changeSet, provider);
      expect(statements).toHaveLength(2);
      expect(splitStatements(generate(changeSet, provider), { backslashEscapes: provider.backslashEscapes })).toEqual(
        statements,
      );
    }
  });

  it('should double backslashes in MySQL string defaults only', () => {
    const column = createColumn('path', 'TEXT', { default: { kind: 'string', value: 'C:\\' } });
    expect(mysql.columnDefinition(column, { inlinePrimaryKey: false, inlineUnique: false })).toBe(
      "`path` TEXT NOT NULL DEFAULT 'C:\\\\'",
    );
    expect(postgres.columnDefinition(column, { inlinePrimaryKey: false, inlineUnique: false })).toBe(
      `"path" TEXT NOT NULL DEFAULT 'C:\\'`,
    );
  });
});
