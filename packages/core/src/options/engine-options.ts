/**
 * Engine options.
 *
 * Everything that tunes engine behaviour is passed in explicitly and validated
 * here; nothing is read from process-wide state.
 *
 * @module options
 */

import { z } from 'zod';

import { ValidationError } from '../errors/tidemark-error.js';
import { TidemarkLogger, createLogger } from '../observability/logger.js';

export const PROVIDER_NAMES = ['postgresql', 'mysql', 'sqlite'] as const;

/** Supported database providers */
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/** Whether index column order takes part in index equality */
export type IndexColumnOrder = 'significant' | 'insignificant';

export const DEFAULT_LEDGER_TABLE = '_tidemark_migrations';
export const DEFAULT_MIGRATIONS_DIR = './migrations';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const indexColumnOrderSchema = z.enum(['significant', 'insignificant']);

export const engineOptionsSchema = z
  .object({
    migrationsDir: z.string().min(1).default(DEFAULT_MIGRATIONS_DIR),
    acceptDataLoss: z.boolean().default(false),
    ledgerTable: z
      .string()
      .regex(IDENTIFIER, 'must be a plain SQL identifier')
      .default(DEFAULT_LEDGER_TABLE),
    schema: z.string().regex(IDENTIFIER, 'must be a plain SQL identifier').default('public'),
    shadowDatabaseUrl: z.string().min(1).optional(),
    indexColumnOrder: z
      .object({
        postgresql: indexColumnOrderSchema.optional(),
        mysql: indexColumnOrderSchema.optional(),
        sqlite: indexColumnOrderSchema.optional(),
      })
      .strict()
      .default({}),
    logger: z.instanceof(TidemarkLogger).optional(),
  })
  .strict();

/** Options as accepted from callers; every field is optional */
export type EngineOptionsInput = z.input<typeof engineOptionsSchema>;

/** Fully resolved options */
export interface EngineOptions extends Omit<z.output<typeof engineOptionsSchema>, 'logger'> {
  logger: TidemarkLogger;
}

/**
 * Validate and fill in engine options.
 *
 * @throws ValidationError (TIDEMARK_V201) listing every invalid option
 */
export function parseEngineOptions(input: EngineOptionsInput = {}): EngineOptions {
  const result = engineOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? `options.${issue.path.join('.')}` : 'options',
        message: issue.message,
      })),
      'TIDEMARK_V201',
    );
  }

  const { logger, ...rest } = result.data;
  return { ...rest, logger: logger ?? createLogger({ level: 'warn' }) };
}
