/**
 * Structured logging for streamkv.
 *
 * A small structured logger with levels, JSON output, module prefixes and a
 * global debug mode toggle. Silent unless a handler or JSON output is set.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface KvLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console when `json` is set) */
  readonly handler?: (entry: LogEntry) => void;
  /** Enable JSON output format */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all streamkv loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger for streamkv modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@streamkv/core';
 *
 * const log = createLogger({ module: 'settings', level: 'debug', json: true });
 *
 * log.info('Store opened', { keys: 12 });
 *
 * const end = log.time('flush');
 * await store.flush();
 * end();
 * ```
 */
export class KvLogger {
  private readonly config: Required<Omit<KvLoggerConfig, 'handler' | 'json'>> &
    Pick<KvLoggerConfig, 'handler' | 'json'>;

  constructor(config: KvLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'streamkv',
      handler: config.handler,
      json: config.json,
    };
  }

  /** Module name this logger writes under */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): KvLogger {
    return new KvLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, {
      ...context,
      ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
    });
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[effectiveLevel]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

/** Factory function to create a KvLogger */
export function createLogger(config?: KvLoggerConfig): KvLogger {
  return new KvLogger(config);
}
