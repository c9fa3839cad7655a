/**
 * @tidemark/migrate — Migration history, ledger and development workflows.
 *
 * @example
 * ```typescript
 * import { connect } from '@tidemark/database';
 * import { getProvider } from '@tidemark/dialects';
 * import { buildModel } from '@tidemark/diff';
 * import { loadSchema } from '@tidemark/schema';
 * import { MigrationManager, planMigration } from '@tidemark/migrate';
 *
 * const driver = await connect('file:./dev.db');
 * const provider = getProvider(driver.provider);
 * const manager = new MigrationManager({ driver, provider });
 *
 * const next = await manager.devDiagnostic(buildModel(loadSchema(text), provider));
 * if (next.action === 'apply') await manager.applyPending();
 * if (next.action === 'create' && !next.inSync) {
 *   const plan = await planMigration(driver, provider, text);
 *   await manager.createMigration('add posts', plan.sql);
 * }
 * ```
 *
 * @module @tidemark/migrate
 */

export {
  MIGRATION_NAME_PATTERN,
  checksum,
  migrationTimestamp,
  normalizeMigrationName,
  normalizeSql,
} from './checksum.js';
export { diagnose } from './diagnose.js';
export { executeStatements, type ExecuteOptions } from './executor.js';
export { Ledger, isApplied, isFailed } from './ledger.js';
export {
  LOCKFILE,
  MIGRATION_FILE,
  ensureLockfile,
  readLocalMigrations,
  readLockfile,
  writeMigration,
} from './migration-files.js';
export { MigrationManager, computeStatus } from './migration-manager.js';
export { diffSources, planMigration, pullSchema, pushSchema } from './workflows.js';
export type {
  AppliedMigration,
  DevAction,
  DiagnoseInput,
  DiffSource,
  LedgerEntry,
  LocalMigration,
  MigrationEvent,
  MigrationManagerConfig,
  MigrationPlan,
  MigrationState,
  MigrationStatus,
  PullResult,
  PushResult,
  ResetResult,
  SourceDiff,
} from './types.js';
