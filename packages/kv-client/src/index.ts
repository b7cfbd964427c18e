/**
 * @remote-kv/client - Client SDK for a transactional key-value store over HTTP
 *
 * @example
 * ```typescript
 * import { createKVClient, isNotFound } from '@remote-kv/client';
 *
 * const db = createKVClient({ url: 'https://kv.example.com/db' });
 *
 * await db.transaction(async (tx) => {
 *   await tx.set('user:1', JSON.stringify({ name: 'Ada' }));
 * });
 *
 * const name = await db.snapshot((snap) => snap.getText('user:1'));
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Client
// =============================================================================

export { KVClient, createKVClient } from './client.js';
export { Session, Transaction, Snapshot, readValue } from './session.js';
export { Cursor, type CursorState, type CursorResult, type CursorRange, type SessionRef } from './cursor.js';
export { HttpInvoker } from './transport.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_TIMEOUT_MS,
  configFromEnv,
  resolveClientConfig,
  normalizeEndpoint,
  endpointToString,
  operationUrl,
  validateTimeout,
  type KVClientConfig,
  type ResolvedClientConfig,
  type DatabaseEndpoint,
} from './config.js';

// =============================================================================
// Errors
// =============================================================================

export {
  KVError,
  ErrorCategory,
  TransportError,
  HttpStatusError,
  NetworkError,
  TimeoutError,
  CancelledError,
  ProtocolError,
  DomainError,
  InvalidArgumentError,
  CursorBusyError,
  ClientClosedError,
  ConfigError,
  classifyDomainError,
  isKVError,
  isNotFound,
  isUnknownSession,
  toError,
  type ErrorContext,
  type SerializedError,
  type DomainErrorKind,
  type DomainErrorCode,
} from './errors.js';

// =============================================================================
// Logging
// =============================================================================

export {
  createLogger,
  getLogLevelFromEnv,
  compareLogLevels,
  isLogLevel,
  ConsoleSink,
  NoOpSink,
  MemorySink,
  type LogLevel,
  type LogEntry,
  type LogSink,
  type LoggerConfig,
  type StructuredLogger,
} from './logging.js';

// =============================================================================
// Types
// =============================================================================

export {
  Endpoint,
  type TransactionId,
  type SnapshotId,
  type CursorId,
  type SessionId,
  type SessionKind,
  type CursorDirection,
  type EndpointPath,
  type KeyInput,
  type ValueInput,
  type Entry,
  type CallOptions,
  type FetchLike,
} from './types.js';
