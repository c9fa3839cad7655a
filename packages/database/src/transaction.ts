import { type TidemarkLogger, toError } from '@tidemark/core';

import type { DatabaseDriver } from './types.js';

/**
 * Shared BEGIN/COMMIT/ROLLBACK wrapper. A failed rollback is logged and the
 * original error is rethrown.
 */
export async function runInTransaction<T>(
  driver: DatabaseDriver,
  begin: string,
  fn: (driver: DatabaseDriver) => Promise<T>,
  logger: TidemarkLogger,
): Promise<T> {
  await driver.execute(begin);
  try {
    const result = await fn(driver);
    await driver.execute('COMMIT');
    return result;
  } catch (error) {
    try {
      await driver.execute('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Rollback failed', toError(rollbackError));
    }
    throw error;
  }
}

/** Milliseconds taken by `fn`, rounded to two decimals */
export async function measure(fn: () => Promise<unknown>): Promise<number> {
  const start = performance.now();
  await fn();
  return Math.round((performance.now() - start) * 100) / 100;
}
