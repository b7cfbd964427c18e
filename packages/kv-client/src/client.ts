/**
 * @remote-kv/client - HTTP client for a transactional key-value store
 */

import { Endpoint, createSnapshotId, createTransactionId } from '@remote-kv/shared-types';
import { endpointToString, resolveClientConfig, type KVClientConfig } from './config.js';
import { toError } from './errors.js';
import type { StructuredLogger } from './logging.js';
import { Snapshot, Transaction } from './session.js';
import { HttpInvoker } from './transport.js';
import type { CallOptions } from './types.js';

// =============================================================================
// Client
// =============================================================================

/**
 * Entry point: owns the database endpoint and the transport, and opens
 * sessions. The client holds no per-session state; every transaction and
 * snapshot lives on the server under an id the client proposes.
 *
 * @example
 * ```typescript
 * const db = createKVClient({ url: 'https://kv.example.com/db' });
 *
 * const tx = await db.newTransaction();
 * await tx.set('a', '1');
 * await tx.set('b', '2');
 * for await (const { key, value } of tx.ascend('', '')) {
 *   // a=1, b=2
 * }
 * await tx.commit();
 *
 * await db.close();
 * ```
 */
export class KVClient {
  private readonly invoker: HttpInvoker;
  private readonly logger: StructuredLogger;

  /**
   * Validates the configuration; does not contact the server.
   *
   * @throws {ConfigError} for an invalid url or timeout
   */
  constructor(config: KVClientConfig) {
    const resolved = resolveClientConfig(config);
    this.invoker = new HttpInvoker(resolved);
    this.logger = resolved.logger.child({ component: 'client' });
  }

  /**
   * The normalized database URL (scheme, host and base path).
   */
  get serverUrl(): string {
    return endpointToString(this.invoker.endpoint);
  }

  get isClosed(): boolean {
    return this.invoker.isClosed;
  }

  /**
   * Begin a read-write session under a fresh id.
   *
   * @throws {DomainError} when the server rejects the id
   */
  async newTransaction(options?: CallOptions): Promise<Transaction> {
    const id = createTransactionId(this.invoker.generateId());
    await this.invoker.invoke(Endpoint.NEW_TRANSACTION, { Name: id }, options, { sessionId: id });
    this.logger.debug('transaction started', { sessionId: id });
    return new Transaction(this.invoker, id);
  }

  /**
   * Begin a read-only, point-in-time session under a fresh id.
   *
   * @throws {DomainError} when the server rejects the id
   */
  async newSnapshot(options?: CallOptions): Promise<Snapshot> {
    const id = createSnapshotId(this.invoker.generateId());
    await this.invoker.invoke(Endpoint.NEW_SNAPSHOT, { Name: id }, options, { sessionId: id });
    this.logger.debug('snapshot started', { sessionId: id });
    return new Snapshot(this.invoker, id);
  }

  /**
   * Execute a function within a transaction: commit when it returns, roll
   * back when it throws. A failed rollback is logged and the function's error
   * is rethrown.
   */
  async transaction<T>(fn: (tx: Transaction) => Promise<T>, options?: CallOptions): Promise<T> {
    const tx = await this.newTransaction(options);
    let result: T;
    try {
      result = await fn(tx);
    } catch (error) {
      try {
        await tx.rollback(options);
      } catch (rollbackError) {
        this.logger.error('rollback failed', toError(rollbackError), { sessionId: tx.id });
      }
      throw error;
    }
    await tx.commit(options);
    return result;
  }

  /**
   * Execute a function against a snapshot and always discard it afterwards.
   * A failed discard is thrown when the function succeeded, and logged when
   * the function's own error is already on its way out.
   */
  async snapshot<T>(fn: (snap: Snapshot) => Promise<T>, options?: CallOptions): Promise<T> {
    const snap = await this.newSnapshot(options);
    let result: T;
    try {
      result = await fn(snap);
    } catch (error) {
      try {
        await snap.discard(options);
      } catch (discardError) {
        this.logger.error('discard failed', toError(discardError), { sessionId: snap.id });
      }
      throw error;
    }
    await snap.discard(options);
    return result;
  }

  /**
   * Release local resources. Sessions still open on the server stay open
   * until the server reclaims them; further calls through this client or its
   * handles fail with {@link ClientClosedError}.
   */
  async close(): Promise<void> {
    if (!this.invoker.isClosed) {
      this.invoker.close();
      this.logger.debug('client closed');
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createKVClient(config: KVClientConfig): KVClient {
  return new KVClient(config);
}
