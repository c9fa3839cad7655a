import { describe, expect, it } from 'vitest';

import {
  constraintName,
  createColumn,
  createTable,
  emptyChangeSet,
  foreignKeyKey,
  indexKey,
  isEmptyChangeSet,
  isSingleColumnUnique,
  referencedTables,
  type ForeignKeyInfo,
} from '../index.js';

describe('canonical model helpers', () => {
  it('creates non-null, non-key columns by default', () => {
    expect(createColumn('email', 'TEXT')).toEqual({
      name: 'email',
      type: 'TEXT',
      nullable: false,
      primaryKey: false,
      unique: false,
      autoIncrement: false,
    });
    expect(createColumn('bio', 'TEXT', { nullable: true }).nullable).toBe(true);
  });

  it('builds conventional constraint names', () => {
    expect(constraintName('Post', ['authorId'], 'fkey')).toBe('Post_authorId_fkey');
    expect(constraintName('Member', ['teamId', 'userId'], 'key')).toBe('Member_teamId_userId_key');
  });

  describe('indexKey', () => {
    const ab = { name: 'a_b_idx', columns: [{ name: 'b' }, { name: 'a' }], unique: false };
    const ba = { name: 'other_name', columns: [{ name: 'a' }, { name: 'b' }], unique: false };

    it('ignores index names', () => {
      expect(indexKey(ab, 'significant')).toBe(indexKey({ ...ab, name: 'renamed' }, 'significant'));
    });

    it('treats column order according to the policy', () => {
      expect(indexKey(ab, 'insignificant')).toBe(indexKey(ba, 'insignificant'));
      expect(indexKey(ab, 'significant')).not.toBe(indexKey(ba, 'significant'));
      expect(indexKey(ab, 'significant')).toBe('index(b:asc,a:asc)');
    });

    it('distinguishes uniqueness and sort direction', () => {
      expect(indexKey({ ...ba, unique: true }, 'insignificant')).toBe('unique(a:asc,b:asc)');
      expect(indexKey({ name: 'x', columns: [{ name: 'a', sort: 'desc' }], unique: false }, 'insignificant')).toBe(
        'index(a:desc)',
      );
    });

    it('applies identifier normalization', () => {
      const upper = { name: 'x', columns: [{ name: 'Email' }], unique: true };
      expect(indexKey(upper, 'insignificant', (n) => n.toLowerCase())).toBe('unique(email:asc)');
    });
  });

  it('keys foreign keys by content', () => {
    const fk: ForeignKeyInfo = {
      name: 'Post_authorId_fkey',
      columns: ['authorId'],
      referencedTable: 'User',
      referencedColumns: ['id'],
      onDelete: 'CASCADE',
      onUpdate: 'CASCADE',
    };
    expect(foreignKeyKey(fk)).toBe('authorId|User|id|CASCADE|CASCADE');
    expect(foreignKeyKey({ ...fk, name: 'fk_0' })).toBe(foreignKeyKey(fk));
  });

  it('recognizes single-column unique indexes', () => {
    expect(isSingleColumnUnique({ name: 'u', columns: [{ name: 'email' }], unique: true })).toBe(true);
    expect(isSingleColumnUnique({ name: 'u', columns: [{ name: 'a' }, { name: 'b' }], unique: true })).toBe(false);
    expect(isSingleColumnUnique({ name: 'i', columns: [{ name: 'email' }], unique: false })).toBe(false);
  });

  it('lists referenced tables without self references', () => {
    const table = createTable('Category');
    table.foreignKeys.push(
      {
        name: 'Category_parentId_fkey',
        columns: ['parentId'],
        referencedTable: 'Category',
        referencedColumns: ['id'],
        onDelete: 'SET NULL',
        onUpdate: 'CASCADE',
      },
      {
        name: 'Category_ownerId_fkey',
        columns: ['ownerId'],
        referencedTable: 'User',
        referencedColumns: ['id'],
        onDelete: 'RESTRICT',
        onUpdate: 'CASCADE',
      },
    );
    expect([...referencedTables(table)]).toEqual(['User']);
  });

  it('detects empty change sets', () => {
    const changeSet = emptyChangeSet();
    expect(isEmptyChangeSet(changeSet)).toBe(true);
    changeSet.createTables.push(createTable('User'));
    expect(isEmptyChangeSet(changeSet)).toBe(false);
  });
});
