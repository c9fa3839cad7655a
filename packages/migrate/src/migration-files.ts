/**
 * @tidemark/migrate — Migration directory on disk.
 *
 * One subdirectory per migration, named `<timestamp>_<name>` and holding a
 * single `migration.sql`, plus a `migration_lock.toml` that pins the
 * provider the history was written for.
 *
 * @module @tidemark/migrate
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { MigrationFileError, type ProviderName, ValidationError, toError } from '@tidemark/core';

import { MIGRATION_NAME_PATTERN, checksum, migrationTimestamp, normalizeMigrationName } from './checksum.js';
import type { LocalMigration } from './types.js';

export const MIGRATION_FILE = 'migration.sql';
export const LOCKFILE = 'migration_lock.toml';

/**
 * List migrations in ascending name (and so timestamp) order.
 *
 * A missing root means no migrations yet. Entries that are not
 * `<timestamp>_<name>` directories with a `migration.sql` are skipped.
 *
 * @throws MigrationFileError (TIDEMARK_M800) when the root or a migration file cannot be read
 */
export async function readLocalMigrations(root: string): Promise<LocalMigration[]> {
  let entries: Array<{ name: string; isDirectory(): boolean }>;
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return [];
    throw new MigrationFileError(root, 'TIDEMARK_M800', toError(error));
  }

  const migrations: LocalMigration[] = [];
  for (const entry of entries) {
    const match = MIGRATION_NAME_PATTERN.exec(entry.name);
    if (!entry.isDirectory() || !match?.[1]) continue;

    const dir = path.join(root, entry.name);
    const sql = await readMigrationSql(dir);
    if (sql === undefined) continue;

    migrations.push({
      name: entry.name,
      timestamp: match[1],
      path: dir,
      sqlPath: path.join(dir, MIGRATION_FILE),
      sql,
      checksum: checksum(sql),
    });
  }

  return migrations.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function readMigrationSql(dir: string): Promise<string | undefined> {
  const file = path.join(dir, MIGRATION_FILE);
  try {
    return await fs.readFile(file, 'utf8');
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return undefined;
    throw new MigrationFileError(file, 'TIDEMARK_M800', toError(error));
  }
}

/**
 * Write `<timestamp>_<normalized description>/migration.sql`.
 *
 * @throws MigrationFileError (TIDEMARK_M802) when the directory exists or cannot be written
 */
export async function writeMigration(
  root: string,
  description: string,
  sql: string,
  now: Date = new Date(),
): Promise<LocalMigration> {
  const timestamp = migrationTimestamp(now);
  const name = `${timestamp}_${normalizeMigrationName(description)}`;
  const dir = path.join(root, name);
  const sqlPath = path.join(dir, MIGRATION_FILE);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(sqlPath, sql, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    throw new MigrationFileError(sqlPath, 'TIDEMARK_M802', toError(error));
  }

  return { name, timestamp, path: dir, sqlPath, sql, checksum: checksum(sql) };
}

// ── Lockfile ──────────────────────────────────────────────

/** Provider recorded in the lockfile, or undefined when there is none */
export async function readLockfile(root: string): Promise<string | undefined> {
  const file = path.join(root, LOCKFILE);
  let text: string;
  try {
    text = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (hasCode(error, 'ENOENT')) return undefined;
    throw new MigrationFileError(file, 'TIDEMARK_M800', toError(error));
  }
  return /^\s*provider\s*=\s*"([^"]*)"/m.exec(text)?.[1];
}

/**
 * Create the lockfile, or check the provider it records.
 *
 * @throws ValidationError (TIDEMARK_V203) when the history belongs to another provider
 */
export async function ensureLockfile(root: string, provider: ProviderName): Promise<void> {
  const recorded = await readLockfile(root);
  if (recorded === provider) return;

  if (recorded !== undefined) {
    throw new ValidationError(
      [
        {
          path: LOCKFILE,
          message: `migrations were written for \`${recorded}\`, not \`${provider}\``,
        },
      ],
      'TIDEMARK_V203',
      { recorded, provider },
    );
  }

  const file = path.join(root, LOCKFILE);
  try {
    await fs.mkdir(root, { recursive: true });
    await fs.writeFile(
      file,
      `# Written by tidemark. Keep it in version control; do not edit it.\nprovider = "${provider}"\n`,
      'utf8',
    );
  } catch (error) {
    throw new MigrationFileError(file, 'TIDEMARK_M802', toError(error));
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
