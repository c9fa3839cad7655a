import type { ProviderName, TidemarkLogger } from '@tidemark/core';

/** A result row keyed by column alias */
export type Row = Record<string, unknown>;

/**
 * One open connection to a database.
 *
 * Statements are run one at a time; nothing here pools or retries.
 */
export interface DatabaseDriver {
  readonly provider: ProviderName;

  /** Run a statement and return its rows */
  query(sql: string, params?: readonly unknown[]): Promise<Row[]>;

  /** Run a statement and return the number of affected rows */
  execute(sql: string, params?: readonly unknown[]): Promise<number>;

  /**
   * Run `fn` between BEGIN and COMMIT, rolling back when it throws.
   * The callback receives this driver.
   */
  transaction<T>(fn: (driver: DatabaseDriver) => Promise<T>): Promise<T>;

  /** Round-trip latency of a trivial statement, in milliseconds */
  ping(): Promise<number>;

  close(): Promise<void>;
}

export interface ConnectOptions {
  /** PostgreSQL namespace; overrides a `schema` parameter in the URL */
  schema?: string;
  logger?: TidemarkLogger;
}

export interface DriverOptions extends ConnectOptions {
  /** Statement timed by `ping()` */
  pingStatement?: string;
}

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
