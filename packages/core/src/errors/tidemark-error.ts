/**
 * TidemarkError - structured error class shared by every engine package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a TidemarkError
 */
export interface TidemarkErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a TidemarkError
 */
export interface SerializedTidemarkError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedTidemarkError | { name: string; message: string; stack?: string };
}

/**
 * Base error for the migration engine.
 *
 * Every engine failure is a TidemarkError (or a subclass) with a stable code,
 * a category, a suggestion for the operator and the context needed to act on
 * it: the offending migration name, path or SQL fragment.
 *
 * @example
 * ```typescript
 * try {
 *   await manager.applyPending();
 * } catch (error) {
 *   if (TidemarkError.isCategory(error, 'apply')) {
 *     report(error.format());
 *   }
 * }
 * ```
 */
export class TidemarkError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: TidemarkErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'TidemarkError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TidemarkError);
    }
  }

  /**
   * Create a TidemarkError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): TidemarkError {
    return new TidemarkError({ code, context });
  }

  /**
   * Wrap an existing error with a TidemarkError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): TidemarkError {
    return new TidemarkError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isTidemarkError(error: unknown): error is TidemarkError {
    return error instanceof TidemarkError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return TidemarkError.isTidemarkError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return TidemarkError.isTidemarkError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedTidemarkError {
    const result: SerializedTidemarkError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (TidemarkError.isTidemarkError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

// ─── Parse / validation ──────────────────────────────────────────────────────

/** Location-aware syntax error reported by the declaration parser */
export interface SyntaxErrorDetail {
  message: string;
  line: number;
  column: number;
  /** The source line the error points at */
  context?: string;
}

/**
 * Raised when a caller insists on a parsed schema that has syntax errors.
 */
export class SchemaSyntaxError extends TidemarkError {
  readonly errors: SyntaxErrorDetail[];

  constructor(errors: SyntaxErrorDetail[]) {
    const summary = errors.map((e) => `${e.line}:${e.column} ${e.message}`).join('; ');
    super({
      code: 'TIDEMARK_P100',
      message: `Schema has ${errors.length} syntax error(s): ${summary}`,
      context: { errors },
    });
    this.name = 'SchemaSyntaxError';
    this.errors = errors;
  }
}

/** A single semantic issue */
export interface ValidationIssue {
  /** Dotted location, e.g. `User.email` or `datasource.provider` */
  path: string;
  message: string;
  line?: number;
}

/**
 * Semantic validation failure: unknown type references, malformed relations,
 * bad options. Never auto-corrected.
 */
export class ValidationError extends TidemarkError {
  readonly issues: ValidationIssue[];

  constructor(
    issues: ValidationIssue[],
    code: ErrorCode = 'TIDEMARK_V200',
    context?: Record<string, unknown>,
  ) {
    const message = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
    super({
      code,
      message: `Validation failed: ${message}`,
      context: { ...context, issues },
    });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

// ─── Database access ─────────────────────────────────────────────────────────

/**
 * The database could not be reached. Never retried.
 */
export class ConnectivityError extends TidemarkError {
  readonly provider: string;

  constructor(provider: string, cause?: Error, message?: string) {
    super({
      code: 'TIDEMARK_C300',
      message: message ?? `Cannot reach the ${provider} database${cause ? `: ${cause.message}` : ''}`,
      context: { provider },
      cause,
    });
    this.name = 'ConnectivityError';
    this.provider = provider;
  }
}

export interface IntrospectionErrorOptions {
  /** Tables whose catalog queries failed */
  failedTables: string[];
  /** True when some tables were read successfully before the failure */
  partial: boolean;
  cause?: Error;
}

/**
 * Catalog read failed. A partial read is discarded, never diffed against.
 */
export class IntrospectionError extends TidemarkError {
  readonly failedTables: string[];
  readonly partial: boolean;

  constructor(options: IntrospectionErrorOptions) {
    const tables = options.failedTables.length > 0 ? ` (${options.failedTables.join(', ')})` : '';
    super({
      code: options.partial ? 'TIDEMARK_I401' : 'TIDEMARK_I400',
      message: options.partial
        ? `Introspection read only part of the catalog; failed tables${tables}`
        : `Introspection failed${tables}${options.cause ? `: ${options.cause.message}` : ''}`,
      context: { failedTables: options.failedTables, partial: options.partial },
      cause: options.cause,
    });
    this.name = 'IntrospectionError';
    this.failedTables = options.failedTables;
    this.partial = options.partial;
  }
}

// ─── Destructive changes ─────────────────────────────────────────────────────

/** A change that may discard data */
export interface DataLossWarning {
  kind:
    | 'drop_table'
    | 'drop_column'
    | 'required_column_without_default'
    | 'make_required'
    | 'add_unique'
    | 'type_change'
    | 'recreate_column';
  table: string;
  column?: string;
  message: string;
}

/**
 * A change set contains drops or lossy alterations the caller did not accept.
 */
export class DestructiveChangeError extends TidemarkError {
  readonly warnings: DataLossWarning[];

  constructor(warnings: DataLossWarning[]) {
    super({
      code: 'TIDEMARK_D500',
      message: `Refusing to apply ${warnings.length} destructive change(s): ${warnings
        .map((w) => w.message)
        .join('; ')}`,
      context: { warnings },
    });
    this.name = 'DestructiveChangeError';
    this.warnings = warnings;
  }
}

// ─── Apply ───────────────────────────────────────────────────────────────────

export interface ApplyErrorOptions {
  /** Migration name, absent for direct pushes */
  migration?: string;
  statement: string;
  /** Zero-based index of the failing statement */
  statementIndex: number;
  /** True when earlier statements were committed and could not be rolled back */
  partial: boolean;
  cause?: Error;
}

/**
 * A DDL statement failed. The ledger is not updated for the migration.
 */
export class ApplyError extends TidemarkError {
  readonly migration?: string;
  readonly statement: string;
  readonly statementIndex: number;
  readonly partial: boolean;

  constructor(options: ApplyErrorOptions) {
    const target = options.migration ? `Migration \`${options.migration}\`` : 'Schema change';
    super({
      code: options.migration ? 'TIDEMARK_A600' : 'TIDEMARK_A601',
      message: `${target} failed at statement ${options.statementIndex + 1}: ${
        options.cause?.message ?? 'unknown error'
      }\n${options.statement}`,
      context: {
        migration: options.migration,
        statement: options.statement,
        statementIndex: options.statementIndex,
        partial: options.partial,
      },
      cause: options.cause,
    });
    this.name = 'ApplyError';
    this.migration = options.migration;
    this.statement = options.statement;
    this.statementIndex = options.statementIndex;
    this.partial = options.partial;
  }
}

// ─── Drift ───────────────────────────────────────────────────────────────────

export type DriftReason = 'missing' | 'modified' | 'failed' | 'schema';

/**
 * Ledger, local history and database structure disagree.
 */
export class DriftError extends TidemarkError {
  readonly reason: DriftReason;
  readonly migrations: string[];

  constructor(reason: DriftReason, migrations: string[], detail?: string) {
    super({
      code: 'TIDEMARK_R700',
      message: detail ?? describeDrift(reason, migrations),
      context: { reason, migrations },
    });
    this.name = 'DriftError';
    this.reason = reason;
    this.migrations = migrations;
  }
}

function describeDrift(reason: DriftReason, migrations: string[]): string {
  const list = migrations.join(', ');
  switch (reason) {
    case 'missing':
      return `Applied migrations are missing from the migrations directory: ${list}`;
    case 'modified':
      return `Applied migrations were modified after they were applied: ${list}`;
    case 'failed':
      return `Migrations failed to apply and were not rolled back: ${list}`;
    case 'schema':
      return 'The database schema is not in sync with the migration history';
  }
}

// ─── Files ───────────────────────────────────────────────────────────────────

export class MigrationFileError extends TidemarkError {
  readonly path: string;

  constructor(
    path: string,
    code: 'TIDEMARK_M800' | 'TIDEMARK_M801' | 'TIDEMARK_M802',
    cause?: Error,
    message?: string,
  ) {
    super({
      code,
      message: message ?? `${getErrorInfo(code).message}: ${path}${cause ? ` (${cause.message})` : ''}`,
      context: { path },
      cause,
    });
    this.name = 'MigrationFileError';
    this.path = path;
  }
}

/**
 * Normalize a caught value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Ensure an error is a TidemarkError, wrapping if necessary
 */
export function ensureTidemarkError(
  error: unknown,
  defaultCode: ErrorCode = 'TIDEMARK_X900',
): TidemarkError {
  if (TidemarkError.isTidemarkError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return TidemarkError.wrap(error, defaultCode);
  }

  return new TidemarkError({
    code: defaultCode,
    message: String(error),
  });
}
