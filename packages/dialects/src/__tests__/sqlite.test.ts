import { TidemarkError } from '@tidemark/core';
import { createColumn } from '@tidemark/schema-model';
import { describe, expect, it } from 'vitest';

import { SqliteProvider } from '../index.js';

const provider = new SqliteProvider();

describe('SqliteProvider', () => {
  it('matches identifiers case-insensitively', () => {
    expect(provider.normalizeIdentifier('User')).toBe('user');
  });

  it('forces INTEGER for autoincrement columns', () => {
    expect(provider.mapType('BigInt', { autoIncrement: true })).toBe('INTEGER');
    expect(provider.mapType('BigInt')).toBe('BIGINT');
    expect(provider.mapType('Json')).toBe('TEXT');
    expect(provider.mapNativeType()).toBeUndefined();
  });

  it('renders an inline autoincrement primary key', () => {
    const id = createColumn('id', 'INTEGER', { autoIncrement: true, primaryKey: true });
    expect(provider.columnDefinition(id, { inlinePrimaryKey: true, inlineUnique: false })).toBe(
      '"id" INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT',
    );
  });

  it('parses catalog defaults', () => {
    expect(provider.parseDefault({ type: 'TEXT', rawDefault: "'draft'", extra: '' })).toEqual({
      default: { kind: 'string', value: 'draft' },
      autoIncrement: false,
    });
    expect(provider.parseDefault({ type: 'INTEGER', rawDefault: '0', extra: '' })).toEqual({
      default: { kind: 'number', value: 0, raw: '0' },
      autoIncrement: false,
    });
    expect(provider.parseDefault({ type: 'BOOLEAN', rawDefault: 'true', extra: '' })).toEqual({
      default: { kind: 'boolean', value: true },
      autoIncrement: false,
    });
    expect(provider.parseDefault({ type: 'DATETIME', rawDefault: 'CURRENT_TIMESTAMP', extra: '' })).toEqual({
      default: { kind: 'call', name: 'now', args: [] },
      autoIncrement: false,
    });
    expect(
      provider.parseDefault({ type: 'TEXT', rawDefault: '(lower(hex(randomblob(16))))', extra: '' }),
    ).toEqual({
      default: {
        kind: 'call',
        name: 'dbgenerated',
        args: [{ value: { kind: 'string', value: '(lower(hex(randomblob(16))))' } }],
      },
      autoIncrement: false,
    });
    expect(provider.parseDefault({ type: 'INTEGER', rawDefault: null, extra: 'auto_increment' })).toEqual({
      autoIncrement: true,
    });
  });

  it('rebuilds tables instead of altering columns', () => {
    expect(provider.columnChangePolicy()).toBe('redefine-table');
    expect(provider.alterStrategy).toBe('redefine');
    expect(() => provider.alterColumnStatements('User')).toThrow(TidemarkError);
  });

  it('resets by dropping tables with foreign keys off', () => {
    expect(provider.resetStatements('main', ['User'])).toEqual([
      'PRAGMA foreign_keys = OFF',
      'DROP TABLE IF EXISTS "User"',
      'PRAGMA foreign_keys = ON',
    ]);
  });

  it('renames tables', () => {
    expect(provider.renameTableStatement('new_User', 'User')).toBe('ALTER TABLE "new_User" RENAME TO "User"');
  });

  it('binds the table name once per pragma call', () => {
    expect(provider.introspection.columns('main', 'User').params).toEqual(['User', 'User', 'User']);
  });
});
