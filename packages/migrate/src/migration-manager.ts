/**
 * @tidemark/migrate — Migration manager.
 *
 * Owns the migration history on disk, the ledger inside the target database
 * and the development diagnostic that decides between applying, creating
 * and resetting.
 *
 * @module @tidemark/migrate
 */

import * as path from 'node:path';

import {
  DriftError,
  type EngineOptions,
  MigrationFileError,
  type TidemarkLogger,
  ValidationError,
  parseEngineOptions,
  toError,
} from '@tidemark/core';
import { type DatabaseDriver, connect, introspect, measure } from '@tidemark/database';
import { compare } from '@tidemark/diff';
import type { CanonicalSchema, ChangeSet, Provider } from '@tidemark/schema-model';
import { splitStatements } from '@tidemark/sql-generator';
import { Subject } from 'rxjs';

import { diagnose } from './diagnose.js';
import { executeStatements } from './executor.js';
import { Ledger, isApplied, isFailed } from './ledger.js';
import { ensureLockfile, readLocalMigrations, writeMigration } from './migration-files.js';
import type {
  AppliedMigration,
  DevAction,
  LedgerEntry,
  LocalMigration,
  MigrationEvent,
  MigrationManagerConfig,
  MigrationState,
  MigrationStatus,
  ResetResult,
} from './types.js';
import { compareOptions } from './workflows.js';

/**
 * Migration history, ledger and development workflow.
 *
 * @example
 * ```typescript
 * const manager = new MigrationManager({
 *   driver: await connect('file:./dev.db'),
 *   provider: new SqliteProvider(),
 *   options: { migrationsDir: './db/migrations' },
 * });
 *
 * manager.events$.subscribe((event) => console.log(event.type));
 * await manager.applyPending();
 * ```
 */
export class MigrationManager {
  private readonly driver: DatabaseDriver;
  private readonly provider: Provider;
  private readonly options: EngineOptions;
  private readonly logger: TidemarkLogger;
  private readonly ledger: Ledger;
  private readonly events$$ = new Subject<MigrationEvent>();

  readonly events$ = this.events$$.asObservable();

  constructor(config: MigrationManagerConfig) {
    this.driver = config.driver;
    this.provider = config.provider;
    this.options = parseEngineOptions(config.options);
    this.logger = this.options.logger.child('migrate');
    this.ledger = new Ledger(this.driver, this.provider, this.options.ledgerTable);
  }

  get migrationsDir(): string {
    return this.options.migrationsDir;
  }

  // ── History ─────────────────────────────────────────────

  /** Migration directories in ascending timestamp order */
  async getLocalMigrations(): Promise<LocalMigration[]> {
    return readLocalMigrations(this.options.migrationsDir);
  }

  /** Ledger rows of applied migrations; creates the ledger when absent */
  async getAppliedMigrations(): Promise<LedgerEntry[]> {
    return (await this.ledger.entries()).filter(isApplied);
  }

  /** Local migrations not yet applied, in ascending timestamp order */
  async getPendingMigrations(): Promise<LocalMigration[]> {
    return (await this.status()).pending;
  }

  async getMissingMigrations(): Promise<string[]> {
    return (await this.status()).missing;
  }

  async getModifiedMigrations(): Promise<string[]> {
    return (await this.status()).modified;
  }

  async getFailedMigrations(): Promise<string[]> {
    return (await this.status()).failed;
  }

  /** Local history compared against a fresh read of the ledger */
  async status(): Promise<MigrationStatus> {
    const local = await this.getLocalMigrations();
    const entries = await this.ledger.entries();
    return computeStatus(local, entries);
  }

  // ── Apply ───────────────────────────────────────────────

  /**
   * Execute a migration and record it in the ledger.
   *
   * The ledger row is written with the last statement, inside the same
   * transaction where the provider has transactional DDL, so a failed
   * migration leaves no row behind.
   *
   * @throws ApplyError with the failing statement and its index
   */
  async applyMigration(migration: LocalMigration): Promise<AppliedMigration> {
    const { name } = migration;
    const statements = this.statementsOf(migration);
    const startedAt = new Date();

    this.events$$.next({ type: 'migration_start', name, statements: statements.length });
    this.logger.info('Applying migration', { migration: name, statements: statements.length });
    await this.ledger.ensure();

    let durationMs: number;
    try {
      durationMs = await measure(() =>
        executeStatements(this.driver, this.provider, statements, {
          migration: name,
          logger: this.logger,
          onStatement: (index, sql) => this.events$$.next({ type: 'statement_execute', name, index, sql }),
          finalize: (db) => this.ledger.recordApplied(name, migration.checksum, statements.length, startedAt, db),
        }),
      );
    } catch (error) {
      const cause = toError(error);
      this.events$$.next({ type: 'migration_error', name, error: cause.message });
      this.logger.error('Migration failed', cause, { migration: name });
      throw error;
    }

    this.events$$.next({ type: 'migration_complete', name, durationMs });
    return { name, statements: statements.length, durationMs };
  }

  /**
   * Apply every pending migration in order, stopping at the first failure.
   *
   * @throws DriftError when a failed migration has not been resolved
   */
  async applyPending(): Promise<AppliedMigration[]> {
    const { pending, failed } = await this.status();
    if (failed.length > 0) {
      throw new DriftError('failed', failed);
    }

    const applied: AppliedMigration[] = [];
    for (const migration of pending) {
      applied.push(await this.applyMigration(migration));
    }
    if (applied.length === 0) this.logger.info('No pending migrations');
    return applied;
  }

  // ── Resolve ─────────────────────────────────────────────

  /**
   * Record a migration as applied without running it, for changes that were
   * made to the database by hand.
   *
   * @throws MigrationFileError (TIDEMARK_M801) when the migration is not on disk
   */
  async markApplied(name: string): Promise<void> {
    const migration = (await this.getLocalMigrations()).find((m) => m.name === name);
    if (!migration) {
      throw new MigrationFileError(path.join(this.options.migrationsDir, name), 'TIDEMARK_M801');
    }

    const entries = await this.ledger.entries();
    if (entries.some((entry) => entry.name === name && isApplied(entry))) {
      this.logger.info('Migration is already applied', { migration: name });
      return;
    }

    if ((await this.ledger.finishFailed(name)) === 0) {
      await this.ledger.recordApplied(name, migration.checksum, 0, new Date());
    }
    this.events$$.next({ type: 'migration_resolved', name, state: 'applied' });
  }

  /**
   * Record that a migration was reverted by hand. Its ledger rows stay for
   * the record, and the migration counts as pending again.
   *
   * @throws MigrationFileError (TIDEMARK_M801) when the ledger has no live row for it
   */
  async markRolledBack(name: string): Promise<void> {
    await this.ledger.ensure();
    if ((await this.ledger.markRolledBack(name)) === 0) {
      throw new MigrationFileError(
        name,
        'TIDEMARK_M801',
        undefined,
        `Migration \`${name}\` has no ledger entry to roll back`,
      );
    }
    this.events$$.next({ type: 'migration_resolved', name, state: 'rolled_back' });
  }

  // ── Files ───────────────────────────────────────────────

  /**
   * Write a new migration directory. The lockfile is created or checked
   * first.
   */
  async createMigration(description: string, sql: string, now: Date = new Date()): Promise<LocalMigration> {
    await this.ensureLockfile();
    const migration = await writeMigration(this.options.migrationsDir, description, sql, now);
    this.logger.info('Created migration', { migration: migration.name });
    this.events$$.next({ type: 'migration_created', name: migration.name, path: migration.path });
    return migration;
  }

  /**
   * @throws ValidationError (TIDEMARK_V203) when the history belongs to another provider
   */
  async ensureLockfile(): Promise<void> {
    await ensureLockfile(this.options.migrationsDir, this.provider.name);
  }

  // ── Development ─────────────────────────────────────────

  /**
   * Drop everything in the database and replay the local history.
   */
  async reset(): Promise<ResetResult> {
    const dropped = await this.dropAll(this.driver);
    this.logger.warn('Dropped all tables', { tables: dropped });

    const applied: AppliedMigration[] = [];
    for (const migration of await this.getLocalMigrations()) {
      applied.push(await this.applyMigration(migration));
    }

    this.events$$.next({ type: 'reset_complete', dropped: dropped.length, applied: applied.length });
    return { dropped, applied };
  }

  /**
   * Gather the history, a structural drift check and the desired changes,
   * and decide what the development workflow does next.
   *
   * The drift check replays the applied migrations on a shadow database: an
   * in-memory database for SQLite, otherwise `shadowDatabaseUrl`. Without
   * one the check is skipped.
   */
  async devDiagnostic(desired: CanonicalSchema): Promise<DevAction> {
    const done = this.logger.time('devDiagnostic');
    const status = await this.status();
    const actual = await this.introspect(this.driver);

    const historyIntact = status.missing.length + status.modified.length + status.failed.length === 0;
    const drift = historyIntact ? await this.detectDrift(status, actual) : undefined;
    const changes = compare(desired, actual, this.provider, compareOptions(this.options, this.provider));

    const action = diagnose({ ...status, drift, changes });
    done({ action: action.action });
    return action;
  }

  /** Complete the event stream */
  destroy(): void {
    this.events$$.complete();
  }

  // ── Internals ───────────────────────────────────────────

  /** Changes from the schema the applied history produces to the live one */
  private async detectDrift(status: MigrationStatus, actual: CanonicalSchema): Promise<ChangeSet | undefined> {
    const shadow = await this.openShadow();
    if (!shadow) {
      this.logger.warn('No shadow database configured; skipping the drift check', {
        provider: this.provider.name,
      });
      return undefined;
    }

    try {
      await this.dropAll(shadow);
      const appliedNames = new Set(status.applied.map((entry) => entry.name));
      for (const migration of status.local.filter((m) => appliedNames.has(m.name))) {
        await executeStatements(shadow, this.provider, this.statementsOf(migration), {
          migration: migration.name,
          logger: this.logger,
        });
      }
      const expected = await this.introspect(shadow);
      return compare(actual, expected, this.provider, compareOptions(this.options, this.provider));
    } finally {
      await shadow.close();
    }
  }

  private async openShadow(): Promise<DatabaseDriver | undefined> {
    const url =
      this.options.shadowDatabaseUrl ?? (this.provider.name === 'sqlite' ? 'file::memory:' : undefined);
    if (url === undefined) return undefined;

    const shadow = await connect(url, { schema: this.options.schema, logger: this.options.logger });
    if (shadow.provider !== this.provider.name) {
      await shadow.close();
      throw new ValidationError(
        [
          {
            path: 'options.shadowDatabaseUrl',
            message: `shadow database is ${shadow.provider}, expected ${this.provider.name}`,
          },
        ],
        'TIDEMARK_V201',
      );
    }
    return shadow;
  }

  private async dropAll(db: DatabaseDriver): Promise<string[]> {
    const query = this.provider.introspection.tables(this.options.schema);
    const tables = (await db.query(query.sql, query.params))
      .map((row) => row['table_name'])
      .filter((name): name is string => typeof name === 'string' && !name.startsWith('sqlite_'));

    for (const sql of this.provider.resetStatements(this.options.schema, tables)) {
      await db.execute(sql);
    }
    return tables;
  }

  private statementsOf(migration: LocalMigration): string[] {
    return splitStatements(migration.sql, { backslashEscapes: this.provider.backslashEscapes });
  }

  private introspect(db: DatabaseDriver): Promise<CanonicalSchema> {
    return introspect(db, this.provider, {
      schema: this.options.schema,
      ledgerTable: this.options.ledgerTable,
      logger: this.options.logger,
    });
  }
}

/**
 * Classify local migrations against ledger rows.
 */
export function computeStatus(local: readonly LocalMigration[], entries: readonly LedgerEntry[]): MigrationStatus {
  const applied = entries.filter(isApplied);
  const appliedNames = new Set(applied.map((entry) => entry.name));
  const localByName = new Map(local.map((migration) => [migration.name, migration]));

  const modified = applied
    .filter((entry) => {
      const migration = localByName.get(entry.name);
      return migration !== undefined && migration.checksum !== entry.checksum;
    })
    .map((entry) => entry.name);

  const missing = unique(applied.filter((entry) => !localByName.has(entry.name)).map((entry) => entry.name));
  const failed = unique(entries.filter(isFailed).map((entry) => entry.name));

  const states = new Map<string, MigrationState>();
  for (const { name } of local) {
    states.set(name, appliedNames.has(name) ? 'applied' : failed.includes(name) ? 'failed' : 'local-only');
  }
  for (const name of missing) states.set(name, 'missing-locally');

  return {
    local: [...local],
    applied,
    pending: local.filter((migration) => !appliedNames.has(migration.name)),
    missing,
    modified: unique(modified),
    failed,
    states,
  };
}

function unique(names: readonly string[]): string[] {
  return [...new Set(names)];
}
