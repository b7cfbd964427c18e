/**
 * Shared logging utilities for consistent CLI output.
 *
 * Command results go to stdout; diagnostics (debug, warnings, errors) go to
 * stderr so that output can be piped.
 */

import type { LogEntry, LogSink } from '@remote-kv/client';

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Writes one line of command output.
   * @default console.log
   */
  stdout?: (line: string) => void;

  /**
   * Writes one line of diagnostics.
   * @default console.error
   */
  stderr?: (line: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger instance for CLI output.
 */
export class Logger {
  private level: LogLevel;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stderr(`[DEBUG] ${message}`);
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(message);
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(`Warning: ${message}`);
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(`Error: ${message}`);
    }
  }

  /**
   * Adapts this logger into a sink for the client's structured log entries.
   * Context is appended as JSON; an attached error as `: <message>`.
   */
  sink(): LogSink {
    return {
      write: (entry: LogEntry) => {
        const context = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
        const error = entry.error ? `: ${entry.error.message}` : '';
        const line = `${entry.message}${error}${context}`;
        switch (entry.level) {
          case 'debug':
          case 'info':
            this.debug(line);
            break;
          case 'warn':
            this.warn(line);
            break;
          case 'error':
            this.error(line);
            break;
        }
      },
    };
  }
}

/**
 * Creates a new logger instance with custom options.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
