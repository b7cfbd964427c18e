/**
 * Session Handles
 *
 * {@link Transaction} and {@link Snapshot} are capability tokens: an id the
 * server knows plus the invoker to reach it. They cache nothing and never
 * track whether the server still holds the session; after commit, rollback or
 * discard the server answers further calls with an unknown-session error.
 *
 * A handle is not safe for concurrent use. Drive one handle from one caller
 * at a time, or open independent handles.
 *
 * @packageDocumentation
 */

import {
  Endpoint,
  encodeBase64,
  getPath,
  toBytes,
  type SessionField,
  type SessionId,
  type SessionKind,
  type SnapshotId,
  type TransactionId,
} from '@remote-kv/shared-types';
import { Cursor, type SessionRef } from './cursor.js';
import { InvalidArgumentError, isNotFound, type ErrorContext } from './errors.js';
import type { HttpInvoker } from './transport.js';
import type { CallOptions, KeyInput, ValueInput } from './types.js';

const textDecoder = new TextDecoder();

// =============================================================================
// Value Reading
// =============================================================================

function isAsyncIterable(value: object): value is AsyncIterable<Uint8Array | string> {
  return Symbol.asyncIterator in value;
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  if (chunks.length === 1) {
    return chunks[0];
  }
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Read a value to the end. The protocol sends values whole, so streams and
 * iterables are buffered before the request.
 */
export async function readValue(value: ValueInput): Promise<Uint8Array> {
  if (typeof value === 'string' || value instanceof Uint8Array) {
    return toBytes(value);
  }
  if (value instanceof ArrayBuffer) {
    return new Uint8Array(value);
  }
  const chunks: Uint8Array[] = [];
  if (isAsyncIterable(value)) {
    for await (const chunk of value) {
      chunks.push(toBytes(chunk));
    }
  } else {
    for (const chunk of value) {
      chunks.push(chunk);
    }
  }
  return chunks.length === 0 ? new Uint8Array(0) : concatChunks(chunks);
}

// =============================================================================
// Session Base
// =============================================================================

/**
 * Operations shared by transactions and snapshots: point reads and cursors.
 */
export abstract class Session<Id extends SessionId = SessionId> implements SessionRef {
  abstract readonly kind: SessionKind;

  constructor(
    protected readonly invoker: HttpInvoker,
    readonly id: Id
  ) {}

  /** The request field naming this session */
  abstract get field(): SessionField;

  /**
   * Read the value stored under `key`.
   *
   * @throws {DomainError} of kind `not-found` when the key is absent
   */
  async get(key: KeyInput, options?: CallOptions): Promise<Uint8Array> {
    const reply = await this.invoker.invoke(
      getPath(this.kind),
      { ...this.field, Key: encodeBase64(toBytes(key)) },
      options,
      this.context()
    );
    return reply.Value;
  }

  /**
   * {@link get}, decoded as UTF-8.
   */
  async getText(key: KeyInput, options?: CallOptions): Promise<string> {
    return textDecoder.decode(await this.get(key, options));
  }

  /**
   * Whether `key` is present. Only the not-found error maps to `false`.
   */
  async has(key: KeyInput, options?: CallOptions): Promise<boolean> {
    try {
      await this.get(key, options);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Cursor over `[begin, end)` in increasing key order. An empty bound leaves
   * that side open. Nothing is sent until the first pull.
   */
  ascend(begin: KeyInput, end: KeyInput, options?: CallOptions): Cursor {
    return new Cursor(this.invoker, this, 'ascend', { begin: toBytes(begin), end: toBytes(end) }, options);
  }

  /**
   * Cursor over `[begin, end)` in decreasing key order.
   */
  descend(begin: KeyInput, end: KeyInput, options?: CallOptions): Cursor {
    return new Cursor(this.invoker, this, 'descend', { begin: toBytes(begin), end: toBytes(end) }, options);
  }

  /**
   * Cursor over every entry of the session in the server's natural order.
   */
  scan(options?: CallOptions): Cursor {
    return new Cursor(this.invoker, this, 'scan', undefined, options);
  }

  protected context(): ErrorContext {
    return { sessionId: this.id };
  }
}

// =============================================================================
// Transaction
// =============================================================================

/**
 * A read-write session, ended by {@link commit} or {@link rollback}.
 */
export class Transaction extends Session<TransactionId> {
  readonly kind = 'transaction' as const;

  get field(): SessionField {
    return { Transaction: this.id };
  }

  /**
   * Store `value` under `key`, replacing any previous value.
   *
   * @throws {InvalidArgumentError} when `value` is null or undefined
   */
  async set(key: KeyInput, value: ValueInput | null | undefined, options?: CallOptions): Promise<void> {
    if (value === null || value === undefined) {
      throw new InvalidArgumentError('value is required', { context: { ...this.context(), path: Endpoint.TX_SET } });
    }
    const bytes = await readValue(value);
    await this.invoker.invoke(
      Endpoint.TX_SET,
      { Transaction: this.id, Key: encodeBase64(toBytes(key)), Value: encodeBase64(bytes) },
      options,
      this.context()
    );
  }

  /**
   * Remove `key`. Removing an absent key is not an error unless the server
   * reports one.
   */
  async delete(key: KeyInput, options?: CallOptions): Promise<void> {
    await this.invoker.invoke(
      Endpoint.TX_DELETE,
      { Transaction: this.id, Key: encodeBase64(toBytes(key)) },
      options,
      this.context()
    );
  }

  async commit(options?: CallOptions): Promise<void> {
    await this.invoker.invoke(Endpoint.TX_COMMIT, { Transaction: this.id }, options, this.context());
  }

  async rollback(options?: CallOptions): Promise<void> {
    await this.invoker.invoke(Endpoint.TX_ROLLBACK, { Transaction: this.id }, options, this.context());
  }
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * A read-only, point-in-time session, ended by {@link discard}.
 */
export class Snapshot extends Session<SnapshotId> {
  readonly kind = 'snapshot' as const;

  get field(): SessionField {
    return { Snapshot: this.id };
  }

  async discard(options?: CallOptions): Promise<void> {
    await this.invoker.invoke(Endpoint.SNAP_DISCARD, { Snapshot: this.id }, options, this.context());
  }
}
