/**
 * Structured logging for Authflow packages.
 *
 * Provides a lightweight, zero-dependency structured logger with levels,
 * JSON output, module prefixes, and a global debug mode toggle.
 *
 * @module observability/logger
 */

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Serialized error attached to a log entry */
export interface LoggedError {
  readonly name?: string;
  readonly message: string;
  readonly code?: string;
  readonly stack?: string;
}

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
  readonly durationMs?: number;
  readonly error?: LoggedError;
}

/** Logger configuration */
export interface AuthflowLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console when `json` is set, otherwise silent) */
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

/** Enable/disable global debug mode for all Authflow loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

function stringify(value: unknown): string {
  try {
    return String(value);
  } catch {
    // null-prototype objects and throwing toString/Symbol.toPrimitive
    return Object.prototype.toString.call(value);
  }
}

/**
 * Turn any thrown or reported value into a loggable shape.
 *
 * Never throws, whatever the value.
 *
 * Auth clients report errors of arbitrary type, so non-Error values are
 * stringified and a string `code` property is kept when present.
 */
export function describeError(error: unknown): LoggedError {
  const code =
    typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      ...(code ? { code } : {}),
      ...(error.stack ? { stack: error.stack } : {}),
    };
  }

  return { message: stringify(error), ...(code ? { code } : {}) };
}

/**
 * Structured logger for Authflow modules.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@authflow/core';
 *
 * const log = createLogger({ module: 'rx', level: 'debug' });
 *
 * log.info('Listener registered', { kind: 'authState' });
 *
 * const end = log.time('signIn');
 * // ... wait for the callback ...
 * end(); // logs "signIn completed" with durationMs
 * ```
 */
export class AuthflowLogger {
  private readonly config: Required<Omit<AuthflowLoggerConfig, 'handler' | 'json'>> &
    Pick<AuthflowLoggerConfig, 'handler' | 'json'>;

  constructor(config: AuthflowLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'authflow',
      handler: config.handler,
      json: config.json,
    };
  }

  /** The module name this logger writes under */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): AuthflowLogger {
    return new AuthflowLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  /** Whether entries at the given level would be emitted */
  isLevelEnabled(level: LogLevel): boolean {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effectiveLevel];
  }

  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /** Log at error level */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error === undefined ? undefined : describeError(error));
  }

  /**
   * Start a timer. Returns a function that logs completion with duration.
   *
   * @example
   * ```typescript
   * const end = logger.time('fetchSignInMethods');
   * await lastValueFrom(rxAuth.fetchSignInMethods(email));
   * end({ methods: 2 }); // logs with durationMs
   * ```
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.emit({
        level: 'debug',
        message: `${operation} completed`,
        timestamp: Date.now(),
        module: this.config.module,
        durationMs,
        ...(context ? { context } : {}),
      });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: LoggedError
  ): void {
    this.emit({
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(context ? { context } : {}),
      ...(error ? { error } : {}),
    });
  }

  private emit(entry: LogEntry): void {
    if (!this.isLevelEnabled(entry.level)) return;

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    const consoleFn =
      entry.level === 'error' ? console.error : entry.level === 'warn' ? console.warn : console.log;

    if (this.config.json) {
      consoleFn(JSON.stringify(entry));
      return;
    }

    if (this.config.debug || globalDebug) {
      consoleFn(`[${entry.module}] ${entry.message}`, ...(entry.context ? [entry.context] : []));
    }
    // Silent by default in non-debug mode with no handler
  }
}

/** Factory function to create an AuthflowLogger */
export function createLogger(config?: AuthflowLoggerConfig): AuthflowLogger {
  return new AuthflowLogger(config);
}
