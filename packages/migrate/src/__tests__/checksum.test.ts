import { describe, expect, it } from 'vitest';

import { checksum, migrationTimestamp, normalizeMigrationName, normalizeSql } from '../checksum.js';

describe('normalizeMigrationName', () => {
  it('should lower-case and join words with underscores', () => {
    expect(normalizeMigrationName(' Add user-roles! ')).toBe('add_user_roles');
  });

  it('should collapse and trim underscores', () => {
    expect(normalizeMigrationName('__init__ -- v2')).toBe('init_v2');
  });

  it('should fall back to a default name', () => {
    expect(normalizeMigrationName('   ')).toBe('migration');
    expect(normalizeMigrationName('!!!')).toBe('migration');
  });
});

describe('migrationTimestamp', () => {
  it('should format UTC time as 14 digits', () => {
    expect(migrationTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('20240102030405');
    expect(migrationTimestamp(new Date(Date.UTC(2031, 11, 31, 23, 59, 59)))).toBe('20311231235959');
  });
});

describe('checksum', () => {
  it('should hash the SQL with SHA-256', () => {
    expect(checksum('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('should ignore line endings and trailing whitespace', () => {
    expect(normalizeSql('a \t\r\nb\rc')).toBe('a\nb\nc');
    expect(checksum('CREATE TABLE a (id INT);  \r\n')).toBe(checksum('CREATE TABLE a (id INT);\n'));
  });

  it('should change when the statements change', () => {
    expect(checksum('CREATE TABLE a (id INT);')).not.toBe(checksum('CREATE TABLE b (id INT);'));
  });
});
