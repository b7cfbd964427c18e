/**
 * Structured Logging
 *
 * Log entries are plain objects handed to a {@link LogSink}. The client logs
 * every round trip at `debug`, so a sink at that level sees the full protocol
 * exchange (paths, ids, statuses) without any request or response bytes.
 *
 * @packageDocumentation
 */

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

/**
 * Get log level from the environment, `warn` when unset or unrecognized
 */
export function getLogLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = (env.REMOTE_KV_LOG_LEVEL ?? env.LOG_LEVEL)?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'warn';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Used when the primary sink throws */
  fallbackSink?: LogSink;
  /** Whether to include stack traces (default false) */
  includeStackTraces?: boolean;
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Logger Implementation
// =============================================================================

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

class Logger implements StructuredLogger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly fallbackSink?: LogSink;
  private readonly defaultContext: Record<string, unknown>;
  private readonly includeStackTraces: boolean;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.fallbackSink = config.fallbackSink;
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? false;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn,
    };

    const merged = { ...this.defaultContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = { name: error.name, message: error.message };
      const code = errorCode(error);
      if (code) {
        entry.error.code = code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    try {
      this.sink.write(entry);
    } catch (sinkError) {
      if (this.fallbackSink) {
        this.fallbackSink.write(entry);
      } else {
        console.error('log sink failed:', sinkError);
      }
    }
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      fallbackSink: this.fallbackSink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
    });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

/**
 * Writes one JSON line per entry to stderr, keeping stdout for program output
 */
export class ConsoleSink implements LogSink {
  private readonly prettyPrint: boolean;

  constructor(options: { prettyPrint?: boolean } = {}) {
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    console.error(this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }
}

/**
 * Discards every entry
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // Intentionally empty
  }
}

/**
 * Keeps entries in memory; used by tests to assert on what was logged
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
