/**
 * @tidemark/migrate — Schema workflows without a migration history.
 *
 * @module @tidemark/migrate
 */

import { type EngineOptions, type EngineOptionsInput, parseEngineOptions } from '@tidemark/core';
import { type DatabaseDriver, introspect } from '@tidemark/database';
import {
  type CompareOptions,
  type PullOptions,
  assertNoDataLoss,
  buildModel,
  compare,
  summarizeChangeSet,
  toDeclaration,
} from '@tidemark/diff';
import { loadSchema, printSchema } from '@tidemark/schema';
import type { CanonicalSchema, Provider } from '@tidemark/schema-model';
import { generate, generateStatements } from '@tidemark/sql-generator';

import { executeStatements } from './executor.js';
import type { DiffSource, MigrationPlan, PullResult, PushResult, SourceDiff } from './types.js';

/** Index column order from the options, when they set one for the provider */
export function compareOptions(options: EngineOptions, provider: Provider): CompareOptions {
  const order = options.indexColumnOrder[provider.name];
  return order ? { indexColumnOrder: order } : {};
}

/**
 * Bring the database in line with a declaration directly, without writing
 * a migration or touching the ledger.
 *
 * @throws DestructiveChangeError when the changes may lose data and `acceptDataLoss` is off
 * @throws ApplyError when a statement fails
 */
export async function pushSchema(
  driver: DatabaseDriver,
  provider: Provider,
  declaration: string,
  input: EngineOptionsInput = {},
): Promise<PushResult> {
  const options = parseEngineOptions(input);
  const logger = options.logger.child('push');
  const done = logger.time('push');

  const desired = buildModel(loadSchema(declaration), provider);
  const changeSet = compare(desired, await readDatabase(driver, provider, options), provider, compareOptions(options, provider));
  const warnings = assertNoDataLoss(changeSet, provider, options.acceptDataLoss);
  for (const warning of warnings) logger.warn(warning.message, { table: warning.table, kind: warning.kind });

  const statements = generateStatements(changeSet, provider);
  if (statements.length === 0) {
    logger.info('The database is already in sync with the schema');
  } else {
    await executeStatements(driver, provider, statements, { logger });
  }

  done({ statements: statements.length });
  return { changeSet, statements, warnings };
}

/**
 * Render the DDL a new migration needs to move the database to the
 * declaration. Nothing is written or executed.
 *
 * @throws DestructiveChangeError when the changes may lose data and `acceptDataLoss` is off
 */
export async function planMigration(
  driver: DatabaseDriver,
  provider: Provider,
  declaration: string,
  input: EngineOptionsInput = {},
): Promise<MigrationPlan> {
  const options = parseEngineOptions(input);
  const desired = buildModel(loadSchema(declaration), provider);
  const changeSet = compare(desired, await readDatabase(driver, provider, options), provider, compareOptions(options, provider));
  const warnings = assertNoDataLoss(changeSet, provider, options.acceptDataLoss);
  return { changeSet, sql: generate(changeSet, provider), warnings };
}

/**
 * Write the live schema as a declaration. Building the result with
 * `buildModel` yields the tables the database has.
 *
 * @throws IntrospectionError when the catalog cannot be read
 */
export async function pullSchema(
  driver: DatabaseDriver,
  provider: Provider,
  input: EngineOptionsInput = {},
  pull: PullOptions = {},
): Promise<PullResult> {
  const options = parseEngineOptions(input);
  const logger = options.logger.child('pull');

  const actual = await readDatabase(driver, provider, options);
  const schema = toDeclaration(actual, provider, pull);
  if (actual.tables.size === 0) logger.warn('The database has no tables to pull');
  logger.info('Pulled schema', { tables: actual.tables.size, enums: schema.enums.length });

  return { schema, text: printSchema(schema), tables: actual.tables.size };
}

/**
 * Changes and DDL that take `from` to `to`. Each side is a declaration, a
 * live database or nothing at all.
 */
export async function diffSources(
  from: DiffSource,
  to: DiffSource,
  provider: Provider,
  input: EngineOptionsInput = {},
): Promise<SourceDiff> {
  const options = parseEngineOptions(input);
  const actual = await readSource(from, provider, options);
  const desired = await readSource(to, provider, options);
  const changeSet = compare(desired, actual, provider, compareOptions(options, provider));
  return { changeSet, sql: generate(changeSet, provider), summary: summarizeChangeSet(changeSet) };
}

async function readSource(source: DiffSource, provider: Provider, options: EngineOptions): Promise<CanonicalSchema> {
  switch (source.kind) {
    case 'declaration':
      return buildModel(loadSchema(source.text), provider);
    case 'database':
      return readDatabase(source.driver, provider, options);
    case 'empty':
      return { tables: new Map() };
  }
}

function readDatabase(driver: DatabaseDriver, provider: Provider, options: EngineOptions): Promise<CanonicalSchema> {
  return introspect(driver, provider, {
    schema: options.schema,
    ledgerTable: options.ledgerTable,
    logger: options.logger,
  });
}
