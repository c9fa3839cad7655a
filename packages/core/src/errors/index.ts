/**
 * Tidemark error system
 *
 * Every engine failure carries a stable code (TIDEMARK_P100, TIDEMARK_A600, ...),
 * a category, a suggestion and the context needed to act on it.
 *
 * @example
 * ```typescript
 * import { TidemarkError, DestructiveChangeError } from '@tidemark/core';
 *
 * try {
 *   await pushSchema(driver, provider, declaration, options);
 * } catch (error) {
 *   if (error instanceof DestructiveChangeError) {
 *     for (const warning of error.warnings) report(warning.message);
 *   } else if (TidemarkError.isCategory(error, 'connectivity')) {
 *     report('database is down');
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  ERROR_CODE_PREFIX,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ApplyError,
  ConnectivityError,
  DestructiveChangeError,
  DriftError,
  IntrospectionError,
  MigrationFileError,
  SchemaSyntaxError,
  TidemarkError,
  ValidationError,
  ensureTidemarkError,
  toError,
  type ApplyErrorOptions,
  type DataLossWarning,
  type DriftReason,
  type IntrospectionErrorOptions,
  type SerializedTidemarkError,
  type SyntaxErrorDetail,
  type TidemarkErrorOptions,
  type ValidationIssue,
} from './tidemark-error.js';
