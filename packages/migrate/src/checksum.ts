/**
 * @tidemark/migrate — Migration naming and checksums.
 *
 * @module @tidemark/migrate
 */

import { createHash } from 'node:crypto';

/** `<14-digit timestamp>_<name>` */
export const MIGRATION_NAME_PATTERN = /^(\d{14})_(.+)$/;

/**
 * Line endings become LF and trailing spaces or tabs are trimmed, so a file
 * checked out on another platform keeps its checksum.
 */
export function normalizeSql(sql: string): string {
  return sql
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''))
    .join('\n');
}

/** SHA-256 hex digest of the normalized SQL */
export function checksum(sql: string): string {
  return createHash('sha256').update(normalizeSql(sql), 'utf8').digest('hex');
}

/**
 * Turn an operator's description into the name part of a migration
 * directory: `Add user roles` → `add_user_roles`.
 */
export function normalizeMigrationName(description: string): string {
  const name = description
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, '_')
    .replace(/[^a-z0-9_]/g, '')
    .replace(/_{2,}/g, '_')
    .replace(/^_+|_+$/g, '');
  return name || 'migration';
}

/** UTC `YYYYMMDDHHMMSS` */
export function migrationTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    String(date.getUTCFullYear()).padStart(4, '0') +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}
