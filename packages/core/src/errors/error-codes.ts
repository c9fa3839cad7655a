/**
 * Tidemark Error Codes
 *
 * Error codes are structured as TIDEMARK_[CATEGORY][NUMBER]:
 * - P: Declaration parse errors (P100-P199)
 * - V: Validation errors (V200-V299)
 * - C: Connectivity errors (C300-C399)
 * - I: Introspection errors (I400-I499)
 * - D: Destructive change errors (D500-D599)
 * - A: Apply errors (A600-A699)
 * - R: Drift errors (R700-R799)
 * - M: Migration file errors (M800-M899)
 * - X: Internal errors (X900-X999)
 */

export const ERROR_CODE_PREFIX = 'TIDEMARK_';

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Parse errors (P100-P199)
  TIDEMARK_P100: {
    code: 'TIDEMARK_P100',
    message: 'Schema declaration could not be parsed',
    suggestion: 'Fix the reported syntax errors; the parsed schema is not usable until they are gone.',
  },

  // Validation errors (V200-V299)
  TIDEMARK_V200: {
    code: 'TIDEMARK_V200',
    message: 'Schema validation failed',
    suggestion: 'Check the reported issues for unknown types, duplicate names and malformed relations.',
  },
  TIDEMARK_V201: {
    code: 'TIDEMARK_V201',
    message: 'Invalid engine options',
    suggestion: 'Check the option names and value types passed to the engine.',
  },
  TIDEMARK_V202: {
    code: 'TIDEMARK_V202',
    message: 'Unsupported provider',
    suggestion: 'Use one of: postgresql, mysql, sqlite.',
  },
  TIDEMARK_V203: {
    code: 'TIDEMARK_V203',
    message: 'Migration lockfile provider mismatch',
    suggestion:
      'The migration history was created for another provider. Start a new migrations directory for the new provider.',
  },

  // Connectivity errors (C300-C399)
  TIDEMARK_C300: {
    code: 'TIDEMARK_C300',
    message: 'Cannot reach the database',
    suggestion: 'Check that the database server is running and the connection URL is correct.',
  },
  TIDEMARK_C301: {
    code: 'TIDEMARK_C301',
    message: 'Invalid connection URL',
    suggestion: 'Use a provider-prefixed URL such as postgresql://, mysql:// or file:.',
  },

  // Introspection errors (I400-I499)
  TIDEMARK_I400: {
    code: 'TIDEMARK_I400',
    message: 'Database introspection failed',
    suggestion: 'Check that the connected user may read the catalog views.',
  },
  TIDEMARK_I401: {
    code: 'TIDEMARK_I401',
    message: 'Database introspection was incomplete',
    suggestion: 'Some tables could not be read. The result was discarded; fix access to the listed tables.',
  },

  // Destructive change errors (D500-D599)
  TIDEMARK_D500: {
    code: 'TIDEMARK_D500',
    message: 'Change set contains destructive changes',
    suggestion: 'Review the warnings and pass acceptDataLoss to proceed.',
  },

  // Apply errors (A600-A699)
  TIDEMARK_A600: {
    code: 'TIDEMARK_A600',
    message: 'Migration failed to apply',
    suggestion: 'Fix the failing statement. The ledger was not updated for this migration.',
  },
  TIDEMARK_A601: {
    code: 'TIDEMARK_A601',
    message: 'Statement failed',
    suggestion: 'Inspect the statement and the database error attached as cause.',
  },

  // Drift errors (R700-R799)
  TIDEMARK_R700: {
    code: 'TIDEMARK_R700',
    message: 'Migration history and database disagree',
    suggestion: 'Reset the development database to replay the local migration history.',
  },

  // Migration file errors (M800-M899)
  TIDEMARK_M800: {
    code: 'TIDEMARK_M800',
    message: 'Migrations directory could not be read',
    suggestion: 'Check that the migrations directory exists and is readable.',
  },
  TIDEMARK_M801: {
    code: 'TIDEMARK_M801',
    message: 'Migration not found',
    suggestion: 'Check the migration name against the migrations directory.',
  },
  TIDEMARK_M802: {
    code: 'TIDEMARK_M802',
    message: 'Migration could not be written',
    suggestion: 'Check write permissions on the migrations directory.',
  },

  // Internal errors (X900-X999)
  TIDEMARK_X900: {
    code: 'TIDEMARK_X900',
    message: 'An unexpected error occurred',
    suggestion: 'This is likely a bug. Please report it with the error details.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'parse'
  | 'validation'
  | 'connectivity'
  | 'introspection'
  | 'destructive'
  | 'apply'
  | 'drift'
  | 'migration'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(ERROR_CODE_PREFIX.length);
  switch (letter) {
    case 'P':
      return 'parse';
    case 'V':
      return 'validation';
    case 'C':
      return 'connectivity';
    case 'I':
      return 'introspection';
    case 'D':
      return 'destructive';
    case 'A':
      return 'apply';
    case 'R':
      return 'drift';
    case 'M':
      return 'migration';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
