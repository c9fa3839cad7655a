/**
 * @tidemark/migrate — Applied-migrations ledger.
 *
 * The ledger is a table inside the target database. Every read goes back to
 * the table; nothing is cached.
 *
 * @module @tidemark/migrate
 */

import { randomUUID } from 'node:crypto';

import { TidemarkError } from '@tidemark/core';
import type { DatabaseDriver, Row } from '@tidemark/database';
import type { Provider } from '@tidemark/schema-model';

import type { LedgerEntry } from './types.js';

export class Ledger {
  constructor(
    private readonly driver: DatabaseDriver,
    private readonly provider: Provider,
    private readonly table: string,
  ) {}

  /** Create the ledger table when it does not exist */
  async ensure(db: DatabaseDriver = this.driver): Promise<void> {
    await db.execute(this.provider.ledgerTableDdl(this.table));
  }

  /** Every row, oldest first */
  async entries(): Promise<LedgerEntry[]> {
    await this.ensure();
    const q = (name: string) => this.provider.quoteIdentifier(name);
    const rows = await this.driver.query(
      `SELECT ${['id', 'checksum', 'migration_name', 'started_at', 'finished_at', 'rolled_back_at', 'applied_steps_count', 'logs']
        .map(q)
        .join(', ')} FROM ${q(this.table)} ORDER BY ${q('started_at')}, ${q('migration_name')}`,
    );
    return rows.map(toEntry);
  }

  /** Record a finished migration */
  async recordApplied(
    name: string,
    migrationChecksum: string,
    steps: number,
    startedAt: Date,
    db: DatabaseDriver = this.driver,
  ): Promise<void> {
    const p = (index: number) => this.provider.placeholder(index);
    const columns = ['id', 'checksum', 'migration_name', 'started_at', 'finished_at', 'applied_steps_count'];
    await db.execute(
      `INSERT INTO ${this.quotedTable()} (${columns.map((c) => this.provider.quoteIdentifier(c)).join(', ')}) VALUES (${columns
        .map((_, i) => p(i + 1))
        .join(', ')})`,
      [
        randomUUID(),
        migrationChecksum,
        name,
        this.provider.formatTimestamp(startedAt),
        this.provider.formatTimestamp(new Date()),
        steps,
      ],
    );
  }

  /** Finish the failed rows of a migration; returns the number of rows changed */
  async finishFailed(name: string): Promise<number> {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    const p = (index: number) => this.provider.placeholder(index);
    return this.driver.execute(
      `UPDATE ${this.quotedTable()} SET ${q('finished_at')} = ${p(1)} WHERE ${q('migration_name')} = ${p(2)} AND ${q(
        'finished_at',
      )} IS NULL AND ${q('rolled_back_at')} IS NULL`,
      [this.provider.formatTimestamp(new Date()), name],
    );
  }

  /** Mark the live rows of a migration as rolled back; returns the number of rows changed */
  async markRolledBack(name: string): Promise<number> {
    const q = (id: string) => this.provider.quoteIdentifier(id);
    const p = (index: number) => this.provider.placeholder(index);
    return this.driver.execute(
      `UPDATE ${this.quotedTable()} SET ${q('rolled_back_at')} = ${p(1)} WHERE ${q('migration_name')} = ${p(
        2,
      )} AND ${q('rolled_back_at')} IS NULL`,
      [this.provider.formatTimestamp(new Date()), name],
    );
  }

  private quotedTable(): string {
    return this.provider.quoteIdentifier(this.table);
  }
}

/** Finished and not rolled back */
export function isApplied(entry: LedgerEntry): boolean {
  return entry.finishedAt !== undefined && entry.rolledBackAt === undefined;
}

/** Started, never finished, and not rolled back */
export function isFailed(entry: LedgerEntry): boolean {
  return entry.finishedAt === undefined && entry.rolledBackAt === undefined;
}

function toEntry(row: Row): LedgerEntry {
  const entry: LedgerEntry = {
    id: requiredText(row, 'id'),
    name: requiredText(row, 'migration_name'),
    checksum: requiredText(row, 'checksum'),
    startedAt: toDate(row['started_at']) ?? new Date(0),
    appliedStepsCount: Number(row['applied_steps_count'] ?? 0),
  };

  const finishedAt = toDate(row['finished_at']);
  if (finishedAt) entry.finishedAt = finishedAt;
  const rolledBackAt = toDate(row['rolled_back_at']);
  if (rolledBackAt) entry.rolledBackAt = rolledBackAt;
  if (typeof row['logs'] === 'string') entry.logs = row['logs'];
  return entry;
}

function requiredText(row: Row, key: string): string {
  const value = row[key];
  if (typeof value === 'string') return value;
  throw new TidemarkError({
    code: 'TIDEMARK_X900',
    message: `Ledger row has no \`${key}\` value`,
    context: { key, row },
  });
}

// pg and mysql2 return Date objects; SQLite stores the formatted text
function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}
