import * as fs from 'node:fs';
import * as path from 'node:path';

import { MigrationFileError, ValidationError } from '@tidemark/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { checksum } from '../checksum.js';
import { LOCKFILE, ensureLockfile, readLocalMigrations, readLockfile, writeMigration } from '../migration-files.js';
import { INIT, INIT_SQL, POSTS, POSTS_SQL, makeTmpDir, writeMigrationDir } from './fixtures.js';

describe('migration files', () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('readLocalMigrations', () => {
    it('should return nothing when the directory does not exist', async () => {
      expect(await readLocalMigrations(path.join(root, 'missing'))).toEqual([]);
    });

    it('should list migration directories in timestamp order', async () => {
      writeMigrationDir(root, POSTS, POSTS_SQL);
      writeMigrationDir(root, INIT, INIT_SQL);
      fs.mkdirSync(path.join(root, 'notes'));
      fs.mkdirSync(path.join(root, '20240103000000_empty'));
      fs.writeFileSync(path.join(root, '20240104000000_file.sql'), 'SELECT 1;');

      const migrations = await readLocalMigrations(root);
      expect(migrations.map((m) => m.name)).toEqual([INIT, POSTS]);
      expect(migrations[0]).toEqual({
        name: INIT,
        timestamp: '20240101000000',
        path: path.join(root, INIT),
        sqlPath: path.join(root, INIT, 'migration.sql'),
        sql: INIT_SQL,
        checksum: checksum(INIT_SQL),
      });
    });

    it('should fail when the root cannot be read', async () => {
      const file = path.join(root, 'not-a-directory');
      fs.writeFileSync(file, '');
      const error = await readLocalMigrations(file).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(MigrationFileError);
      expect(error).toMatchObject({ code: 'TIDEMARK_M800', path: file });
    });
  });

  describe('writeMigration', () => {
    const now = new Date(Date.UTC(2024, 4, 6, 7, 8, 9));

    it('should write a timestamped directory', async () => {
      const migration = await writeMigration(path.join(root, 'migrations'), 'Add posts', POSTS_SQL, now);
      expect(migration.name).toBe('20240506070809_add_posts');
      expect(fs.readFileSync(path.join(root, 'migrations', migration.name, 'migration.sql'), 'utf8')).toBe(POSTS_SQL);
      expect(await readLocalMigrations(path.join(root, 'migrations'))).toEqual([migration]);
    });

    it('should refuse to overwrite an existing migration', async () => {
      await writeMigration(root, 'Add posts', POSTS_SQL, now);
      await expect(writeMigration(root, 'add posts', 'SELECT 1;', now)).rejects.toMatchObject({
        code: 'TIDEMARK_M802',
      });
    });
  });

  describe('lockfile', () => {
    it('should record the provider', async () => {
      await ensureLockfile(root, 'sqlite');
      expect(fs.readFileSync(path.join(root, LOCKFILE), 'utf8')).toContain('provider = "sqlite"\n');
      expect(await readLockfile(root)).toBe('sqlite');
      await expect(ensureLockfile(root, 'sqlite')).resolves.toBeUndefined();
    });

    it('should reject a history written for another provider', async () => {
      await ensureLockfile(root, 'sqlite');
      const error = await ensureLockfile(root, 'postgresql').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ code: 'TIDEMARK_V203' });
    });

    it('should report no provider before the lockfile exists', async () => {
      expect(await readLockfile(root)).toBeUndefined();
    });
  });
});
