/**
 * Structured logging for the migration engine.
 *
 * Engine functions never print: a logger is silent unless the caller installs
 * a handler or turns on JSON console output. The level is fixed per logger
 * and inherited by its children; there is no process-wide switch.
 *
 * @module observability/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

export interface TidemarkLoggerConfig {
  /** Lowest level that is emitted (default: 'info') */
  readonly level?: LogLevel;
  /** Module name; children append `:<name>` (default: 'tidemark') */
  readonly module?: string;
  /** Receives every emitted entry */
  readonly handler?: (entry: LogEntry) => void;
  /** Without a handler, write JSON lines to the console */
  readonly json?: boolean;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type Sink = (entry: LogEntry) => void;

const silent: Sink = () => undefined;

function consoleSink(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') console.error(line);
  else if (entry.level === 'warn') console.warn(line);
  else console.log(line);
}

/**
 * Structured logger for engine modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ module: 'migrate', level: 'debug', handler: (e) => sink.push(e) });
 *
 * log.info('Applying migration', { name: '20240101000000_init' });
 *
 * const end = log.time('introspect');
 * end({ tables: 12 }); // debug entry "introspect completed" with durationMs
 * ```
 */
export class TidemarkLogger {
  readonly level: LogLevel;
  readonly module: string;
  private readonly threshold: number;
  private readonly sink: Sink;

  constructor(config: TidemarkLoggerConfig = {}, sink?: Sink) {
    this.level = config.level ?? 'info';
    this.module = config.module ?? 'tidemark';
    this.threshold = LOG_LEVELS.indexOf(this.level);
    this.sink = sink ?? config.handler ?? (config.json ? consoleSink : silent);
  }

  /** Logger for a sub-module, sharing this logger's level and output */
  child(subModule: string): TidemarkLogger {
    return new TidemarkLogger({ level: this.level, module: `${this.module}:${subModule}` }, this.sink);
  }

  enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, error ? { ...context, error: { message: error.message, stack: error.stack } } : context);
  }

  /** Start a timer; calling the result logs `<operation> completed` at debug level with `durationMs` */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.emit('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  private emit(level: LogLevel, message: string, context: Record<string, unknown> | undefined): void {
    if (!this.enabled(level)) return;
    this.sink({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    });
  }
}

export function createLogger(config?: TidemarkLoggerConfig): TidemarkLogger {
  return new TidemarkLogger(config);
}
