/**
 * @tidemark/core — errors, logging and options shared by the engine packages.
 *
 * @module @tidemark/core
 */

export * from './errors/index.js';

export * from './observability/index.js';

export {
  DEFAULT_LEDGER_TABLE,
  DEFAULT_MIGRATIONS_DIR,
  PROVIDER_NAMES,
  engineOptionsSchema,
  isProviderName,
  parseEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
  type IndexColumnOrder,
  type ProviderName,
} from './options/engine-options.js';
