/**
 * @tidemark/migrate — Statement execution.
 *
 * @module @tidemark/migrate
 */

import { ApplyError, type TidemarkLogger, toError } from '@tidemark/core';
import type { DatabaseDriver } from '@tidemark/database';
import type { Provider } from '@tidemark/schema-model';

export interface ExecuteOptions {
  /** Migration the statements belong to; unset for direct pushes */
  migration?: string;
  logger: TidemarkLogger;
  onStatement?: (index: number, sql: string) => void;
  /** Runs after the last statement, inside the transaction when there is one */
  finalize?: (db: DatabaseDriver) => Promise<void>;
}

interface Step {
  index: number;
  sql: string;
}

const FOREIGN_KEY_TOGGLE = /^PRAGMA\s+foreign_keys\s*=\s*(ON|OFF)\s*;?$/i;

/**
 * Run DDL statements as one unit.
 *
 * With transactional DDL everything, `finalize` included, commits or rolls
 * back together. Foreign-key toggles are no-ops inside an SQLite
 * transaction, so they run around it instead. Without transactional DDL the
 * statements run one by one and a failure after the first statement leaves
 * the earlier ones applied, which `ApplyError.partial` reports.
 *
 * @throws ApplyError naming the failing statement and its index
 */
export async function executeStatements(
  driver: DatabaseDriver,
  provider: Provider,
  statements: readonly string[],
  options: ExecuteOptions,
): Promise<void> {
  const steps = statements.map((sql, index) => ({ index, sql }));

  if (!provider.transactionalDdl) {
    for (const step of steps) {
      await runStep(driver, step, step.index > 0, options);
    }
    await options.finalize?.(driver);
    return;
  }

  const before = steps.filter((step) => toggle(step) === 'OFF');
  const after = steps.filter((step) => toggle(step) === 'ON');
  const body = steps.filter((step) => toggle(step) === undefined);

  for (const step of before) await runStep(driver, step, false, options);

  try {
    await driver.transaction(async (tx) => {
      for (const step of body) await runStep(tx, step, false, options);
      await options.finalize?.(tx);
    });
  } catch (error) {
    await restore(driver, after, options).catch((restoreError: unknown) => {
      options.logger.error('Could not restore foreign key checks', toError(restoreError));
    });
    throw error;
  }

  await restore(driver, after, options);
}

async function restore(driver: DatabaseDriver, steps: readonly Step[], options: ExecuteOptions): Promise<void> {
  for (const step of steps) await runStep(driver, step, false, options);
}

async function runStep(db: DatabaseDriver, step: Step, partial: boolean, options: ExecuteOptions): Promise<void> {
  options.onStatement?.(step.index, step.sql);
  try {
    await db.execute(step.sql);
  } catch (error) {
    throw new ApplyError({
      migration: options.migration,
      statement: step.sql,
      statementIndex: step.index,
      partial,
      cause: toError(error),
    });
  }
}

function toggle(step: Step): 'ON' | 'OFF' | undefined {
  const value = FOREIGN_KEY_TOGGLE.exec(step.sql.trim())?.[1]?.toUpperCase();
  return value === 'ON' || value === 'OFF' ? value : undefined;
}
