/**
 * Remote KV Client Error Types
 *
 * Every failure the client reports extends {@link KVError}. Errors fall into
 * three families that match how a call can fail:
 *
 * - transport: the HTTP exchange itself failed (status, network, timeout,
 *   cancellation)
 * - protocol: the reply did not match the expected shape
 * - domain: the server answered with an error text
 *
 * plus a few local errors raised before any request is sent.
 *
 * @packageDocumentation
 */

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Endpoint path of the failed call */
  path?: string;
  /** Transaction or snapshot id the call ran in */
  sessionId?: string;
  /** Cursor id for open and next calls */
  cursorId?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format for logs and diagnostics
 */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  timestamp: number;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string };
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories
 */
export enum ErrorCategory {
  /** HTTP status, network, timeout and cancellation failures */
  TRANSPORT = 'TRANSPORT',
  /** Replies that do not decode */
  PROTOCOL = 'PROTOCOL',
  /** Error text reported by the server */
  DOMAIN = 'DOMAIN',
  /** Input rejected before any request was sent */
  VALIDATION = 'VALIDATION',
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all client errors.
 *
 * @example
 * ```typescript
 * try {
 *   await tx.commit();
 * } catch (error) {
 *   if (error instanceof KVError) {
 *     console.log(error.code, error.context?.sessionId);
 *   }
 * }
 * ```
 */
export abstract class KVError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  /** Error context */
  context?: ErrorContext;

  constructor(message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.timestamp = Date.now();
    this.context = options?.context;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Whether repeating the same call may succeed. The client never retries on
   * its own; this is a hint for the caller's policy.
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Merge additional context into the error
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
    if (this.context) {
      result.context = this.context;
    }
    if (this.stack) {
      result.stack = this.stack;
    }
    if (this.cause instanceof Error) {
      result.cause = { name: this.cause.name, message: this.cause.message };
    }
    return result;
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

/**
 * Failure of the HTTP exchange, independent of what the server meant.
 */
export abstract class TransportError extends KVError {
  readonly category = ErrorCategory.TRANSPORT;
}

/**
 * The server answered with a non-success HTTP status. The body is not read.
 */
export class HttpStatusError extends TransportError {
  readonly code = 'HTTP_STATUS' as const;

  /** HTTP status code of the reply */
  readonly status: number;

  constructor(status: number, url: string, options?: { context?: ErrorContext }) {
    super(`received non-ok http status ${status} from ${url}`, options);
    this.name = 'HttpStatusError';
    this.status = status;
  }

  isRetryable(): boolean {
    return this.status >= 500 || this.status === 408 || this.status === 429;
  }
}

/**
 * The request could not be delivered or the reply could not be read.
 */
export class NetworkError extends TransportError {
  readonly code = 'NETWORK_ERROR' as const;

  constructor(message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'NetworkError';
  }

  isRetryable(): boolean {
    return true;
  }
}

/**
 * The call did not complete within its timeout.
 */
export class TimeoutError extends TransportError {
  readonly code = 'TIMEOUT' as const;

  /** The timeout that was exceeded, in milliseconds */
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: { cause?: unknown; context?: ErrorContext }) {
    super(`request timeout after ${timeoutMs}ms`, options);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }

  isRetryable(): boolean {
    return true;
  }
}

/**
 * The caller's abort signal fired before the call completed. The server is
 * not told; any session or cursor it holds stays open.
 */
export class CancelledError extends TransportError {
  readonly code = 'CANCELLED' as const;

  constructor(options?: { cause?: unknown; context?: ErrorContext }) {
    super('request cancelled', options);
    this.name = 'CancelledError';
  }
}

// =============================================================================
// Protocol Error
// =============================================================================

/**
 * The reply body is not JSON or does not match the expected shape. Usually a
 * version mismatch between client and server.
 */
export class ProtocolError extends KVError {
  readonly code = 'PROTOCOL_ERROR' as const;
  readonly category = ErrorCategory.PROTOCOL;

  /** The raw body that failed to decode (truncated) */
  readonly rawBody: string | undefined;

  constructor(message: string, rawBody?: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'ProtocolError';
    this.rawBody = rawBody !== undefined ? rawBody.substring(0, 1000) : undefined;
  }
}

// =============================================================================
// Domain Error
// =============================================================================

/**
 * What a server error text most likely means. The wire carries free text
 * only, so this is a best guess by inspection.
 */
export type DomainErrorKind =
  | 'not-found'
  | 'unknown-session'
  | 'unknown-cursor'
  | 'invalid-argument'
  | 'already-exists'
  | 'unknown';

const DOMAIN_ERROR_CODES = {
  'not-found': 'NOT_FOUND',
  'unknown-session': 'UNKNOWN_SESSION',
  'unknown-cursor': 'UNKNOWN_CURSOR',
  'invalid-argument': 'INVALID_ARGUMENT',
  'already-exists': 'ALREADY_EXISTS',
  unknown: 'SERVER_ERROR',
} as const satisfies Record<DomainErrorKind, string>;

export type DomainErrorCode = (typeof DOMAIN_ERROR_CODES)[DomainErrorKind];

/**
 * Ordered rules; the first match wins, so the more specific
 * "unknown cursor" and "unknown session" texts precede plain "not found".
 */
const DOMAIN_ERROR_RULES: ReadonlyArray<readonly [RegExp, DomainErrorKind]> = [
  [/\b(unknown|invalid|no such) (iterator|cursor)\b|\b(iterator|cursor)( id)? (not found|does not exist)\b/i, 'unknown-cursor'],
  [/\b(unknown|invalid|no such) (transaction|snapshot|session)\b|\b(transaction|snapshot|session)( id)? (not found|does not exist)\b/i, 'unknown-session'],
  [/\binvalid argument\b/i, 'invalid-argument'],
  [/\balready exists\b/i, 'already-exists'],
  [/\bnot found\b|\bdoes not exist\b|\bno such key\b/i, 'not-found'],
];

/**
 * Guess the kind of a server error text.
 *
 * @example
 * ```typescript
 * classifyDomainError('unknown iterator id: 3f2a'); // 'unknown-cursor'
 * classifyDomainError('file does not exist');       // 'not-found'
 * ```
 */
export function classifyDomainError(message: string): DomainErrorKind {
  for (const [pattern, kind] of DOMAIN_ERROR_RULES) {
    if (pattern.test(message)) {
      return kind;
    }
  }
  return 'unknown';
}

/**
 * The server reported an error text in an otherwise successful reply.
 */
export class DomainError extends KVError {
  readonly code: DomainErrorCode;
  readonly category = ErrorCategory.DOMAIN;

  /** Kind guessed from the text */
  readonly kind: DomainErrorKind;

  /** The server's text, unchanged */
  readonly serverMessage: string;

  constructor(serverMessage: string, options?: { context?: ErrorContext }) {
    super(serverMessage, options);
    this.name = 'DomainError';
    this.serverMessage = serverMessage;
    this.kind = classifyDomainError(serverMessage);
    this.code = DOMAIN_ERROR_CODES[this.kind];
  }
}

// =============================================================================
// Local Errors
// =============================================================================

/**
 * An argument was rejected before any request was sent.
 */
export class InvalidArgumentError extends KVError {
  readonly code = 'INVALID_ARGUMENT' as const;
  readonly category = ErrorCategory.VALIDATION;

  constructor(message: string, options?: { context?: ErrorContext }) {
    super(message, options);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A cursor was pulled while a previous pull was still pending.
 */
export class CursorBusyError extends KVError {
  readonly code = 'CURSOR_BUSY' as const;
  readonly category = ErrorCategory.VALIDATION;

  constructor(cursorId: string) {
    super(`cursor ${cursorId} already has a pending next call`, { context: { cursorId } });
    this.name = 'CursorBusyError';
  }
}

/**
 * The client was closed before the call.
 */
export class ClientClosedError extends KVError {
  readonly code = 'CLIENT_CLOSED' as const;
  readonly category = ErrorCategory.VALIDATION;

  constructor(options?: { context?: ErrorContext }) {
    super('client is closed', options);
    this.name = 'ClientClosedError';
  }
}

/**
 * The client configuration is invalid.
 */
export class ConfigError extends KVError {
  readonly code = 'CONFIG_ERROR' as const;
  readonly category = ErrorCategory.VALIDATION;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isKVError(error: unknown): error is KVError {
  return error instanceof KVError;
}

/**
 * True for a domain error meaning the key is absent.
 */
export function isNotFound(error: unknown): error is DomainError {
  return error instanceof DomainError && error.kind === 'not-found';
}

/**
 * True for a domain error naming a session the server does not know,
 * e.g. after commit, rollback or discard.
 */
export function isUnknownSession(error: unknown): error is DomainError {
  return error instanceof DomainError && error.kind === 'unknown-session';
}

/**
 * Coerces an unknown thrown value to an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
