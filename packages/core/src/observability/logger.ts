/**
 * Structured logging for the seriate engine.
 *
 * Entries go to a caller-supplied handler; without one the logger drops
 * them. The engine writes `debug` entries for its decisions (join
 * strategy, re-sorting, bucket counts, decode sizes) and `warn` entries
 * for input it skipped.
 *
 * @module observability/logger
 */

/** Log level, lowest first */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Receives every entry at or above the logger's level */
export type LogHandler = (entry: LogEntry) => void;

/** Logger configuration */
export interface SeriesLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Module name prefix (default: 'seriate') */
  readonly module?: string;
  readonly handler?: LogHandler;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Structured logger for seriate modules.
 *
 * @example
 * ```typescript
 * const log = createLogger({ level: 'debug', handler: (entry) => entries.push(entry) });
 * log.child('join').debug('Join strategy selected', { strategy: 'hash' });
 * ```
 */
export class SeriesLogger {
  readonly level: LogLevel;
  readonly module: string;
  private readonly handler: LogHandler | undefined;

  constructor(config: SeriesLoggerConfig = {}) {
    this.level = config.level ?? 'info';
    this.module = config.module ?? 'seriate';
    this.handler = config.handler;
  }

  /** Logger writing under `<module>:<subModule>` with the same level and handler */
  child(subModule: string): SeriesLogger {
    return new SeriesLogger({
      level: this.level,
      module: `${this.module}:${subModule}`,
      handler: this.handler,
    });
  }

  /** Whether an entry at `level` reaches the handler */
  isEnabled(level: LogLevel): boolean {
    return this.handler !== undefined && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.handler || !this.isEnabled(level)) return;
    this.handler({
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    });
  }
}

export function createLogger(config?: SeriesLoggerConfig): SeriesLogger {
  return new SeriesLogger(config);
}
