/**
 * @tidemark/migrate — Types for migration history, ledger and workflows.
 *
 * @module @tidemark/migrate
 */

import type { DataLossWarning, DriftError, EngineOptionsInput } from '@tidemark/core';
import type { DatabaseDriver } from '@tidemark/database';
import type { Schema } from '@tidemark/schema';
import type { ChangeSet, Provider } from '@tidemark/schema-model';

// ── Local History ─────────────────────────────────────────

/** A migration directory on disk */
export interface LocalMigration {
  /** Directory name, `<14-digit timestamp>_<normalized description>` */
  name: string;
  /** The 14-digit UTC timestamp prefix */
  timestamp: string;
  /** Migration directory */
  path: string;
  /** Full path of `migration.sql` */
  sqlPath: string;
  sql: string;
  checksum: string;
}

// ── Ledger ────────────────────────────────────────────────

/** A row of the ledger table */
export interface LedgerEntry {
  id: string;
  name: string;
  checksum: string;
  startedAt: Date;
  /** Unset while the migration has not finished */
  finishedAt?: Date;
  rolledBackAt?: Date;
  appliedStepsCount: number;
  logs?: string;
}

/** Where a migration stands relative to the ledger */
export type MigrationState = 'local-only' | 'applied' | 'missing-locally' | 'failed';

export interface MigrationStatus {
  local: LocalMigration[];
  applied: LedgerEntry[];
  pending: LocalMigration[];
  /** Applied names without a local directory */
  missing: string[];
  /** Applied names whose local SQL changed since */
  modified: string[];
  /** Names with an unfinished ledger row that was not rolled back */
  failed: string[];
  /** Every known migration name, local first, then the missing ones */
  states: Map<string, MigrationState>;
}

export interface AppliedMigration {
  name: string;
  statements: number;
  durationMs: number;
}

export interface ResetResult {
  /** Tables dropped before replaying */
  dropped: string[];
  /** Migrations replayed, in order */
  applied: AppliedMigration[];
}

// ── Manager ───────────────────────────────────────────────

export interface MigrationManagerConfig {
  driver: DatabaseDriver;
  provider: Provider;
  options?: EngineOptionsInput;
}

export type MigrationEvent =
  | { type: 'migration_start'; name: string; statements: number }
  | { type: 'statement_execute'; name: string; index: number; sql: string }
  | { type: 'migration_complete'; name: string; durationMs: number }
  | { type: 'migration_error'; name: string; error: string }
  | { type: 'migration_created'; name: string; path: string }
  | { type: 'migration_resolved'; name: string; state: 'applied' | 'rolled_back' }
  | { type: 'reset_complete'; dropped: number; applied: number };

// ── Development Diagnostic ────────────────────────────────

export interface DiagnoseInput {
  local: readonly LocalMigration[];
  applied: readonly LedgerEntry[];
  pending: readonly LocalMigration[];
  missing: readonly string[];
  modified: readonly string[];
  failed: readonly string[];
  /**
   * Changes from the schema the applied migrations produce to the live
   * schema; absent when the structural check was skipped
   */
  drift?: ChangeSet;
  /** Changes from the live schema to the declared one */
  changes: ChangeSet;
}

export type DevAction =
  | { action: 'reset'; reason: string; error: DriftError }
  | { action: 'apply'; pending: LocalMigration[] }
  | { action: 'create'; changeSet: ChangeSet; inSync: boolean };

// ── Workflows ─────────────────────────────────────────────

export interface PushResult {
  changeSet: ChangeSet;
  statements: string[];
  warnings: DataLossWarning[];
}

export interface MigrationPlan {
  changeSet: ChangeSet;
  /** DDL for a new migration; empty when nothing changed */
  sql: string;
  warnings: DataLossWarning[];
}

/** One side of {@link diffSources} */
export type DiffSource =
  | { kind: 'declaration'; text: string }
  | { kind: 'database'; driver: DatabaseDriver }
  | { kind: 'empty' };

export interface SourceDiff {
  changeSet: ChangeSet;
  sql: string;
  summary: string;
}

export interface PullResult {
  schema: Schema;
  /** Declaration text for `schema` */
  text: string;
  tables: number;
}
