/**
 * Cursor Protocol
 *
 * A cursor is iteration state held by the server under a client-chosen id.
 * The first pull registers it with an open call (ascend, descend or scan);
 * every pull after that is one `/it/next` round trip returning one entry. An
 * empty key in a next reply means the cursor is exhausted. There is no close
 * call: a cursor abandoned before exhaustion is left for the server to reclaim.
 *
 * ```
 * unopened ──open──▶ open ──next (empty key)──▶ exhausted
 *     │                │
 *     └────error───────┴──────error──────────▶ failed
 * ```
 *
 * @packageDocumentation
 */

import {
  Endpoint,
  createCursorId,
  cursorOpenPath,
  encodeBase64,
  type CursorDirection,
  type CursorId,
  type SessionField,
  type SessionId,
  type SessionKind,
} from '@remote-kv/shared-types';
import { CursorBusyError, InvalidArgumentError, toError, type ErrorContext } from './errors.js';
import type { HttpInvoker } from './transport.js';
import type { CallOptions, Entry } from './types.js';

export type CursorState = 'unopened' | 'open' | 'exhausted' | 'failed';

/**
 * One element of {@link Cursor.results}: an entry, or the error that ended
 * the cursor (always the last element).
 */
export type CursorResult = { ok: true; entry: Entry } | { ok: false; error: Error };

/**
 * What a cursor needs to know about the session it reads.
 */
export interface SessionRef {
  readonly kind: SessionKind;
  readonly id: SessionId;
  readonly field: SessionField;
}

/**
 * Key range of a bounded cursor: `begin` inclusive, `end` exclusive, an empty
 * bound leaving that side open.
 */
export interface CursorRange {
  begin: Uint8Array;
  end: Uint8Array;
}

/**
 * Forward-only, single-pass sequence of entries backed by a server-side
 * cursor. To read the range again, ask the session for a new cursor.
 *
 * Errors can be observed three ways:
 *
 * @example
 * ```typescript
 * // 1. iterate, then check the error slot
 * const cursor = tx.ascend('a', 'm');
 * for await (const { key, value } of cursor) {
 *   console.log(key, value);
 * }
 * cursor.throwIfFailed();
 *
 * // 2. pull one entry at a time; the failing step rejects
 * const c2 = snap.scan();
 * for (let e = await c2.next(); e; e = await c2.next()) { ... }
 *
 * // 3. iterate results that carry either an entry or the error
 * for await (const r of snap.descend('', '').results()) {
 *   if (!r.ok) throw r.error;
 * }
 * ```
 */
export class Cursor implements AsyncIterable<Entry> {
  /** Server-side iterator id, distinct from the session id */
  readonly id: CursorId;

  private _state: CursorState = 'unopened';
  private _error: Error | undefined;
  private pending = false;

  constructor(
    private readonly invoker: HttpInvoker,
    private readonly session: SessionRef,
    readonly direction: CursorDirection,
    private readonly range: CursorRange | undefined,
    private readonly options: CallOptions = {}
  ) {
    this.id = createCursorId(invoker.generateId());
  }

  get state(): CursorState {
    return this._state;
  }

  /**
   * The error that moved the cursor to `failed`, if any
   */
  get error(): Error | undefined {
    return this._error;
  }

  /**
   * Rethrow the recorded error of a failed cursor.
   */
  throwIfFailed(): void {
    if (this._error) {
      throw this._error;
    }
  }

  /**
   * Pull the next entry, opening the cursor on the first call.
   *
   * Resolves to `undefined` once exhausted (without further requests). A
   * failure rejects this call and every later one with the same error.
   *
   * @throws {CursorBusyError} when a previous pull has not settled
   */
  async next(options?: CallOptions): Promise<Entry | undefined> {
    if (this.pending) {
      throw new CursorBusyError(this.id);
    }
    if (this._error) {
      throw this._error;
    }
    if (this._state === 'exhausted') {
      return undefined;
    }

    const callOptions = { ...this.options, ...options };
    this.pending = true;
    try {
      if (this._state === 'unopened') {
        await this.open(callOptions);
        this._state = 'open';
      }
      const reply = await this.invoker.invoke(
        Endpoint.ITERATOR_NEXT,
        { Iterator: this.id },
        callOptions,
        this.errorContext()
      );
      if (reply.Key.length === 0) {
        this._state = 'exhausted';
        return undefined;
      }
      return { key: reply.Key, value: reply.Value };
    } catch (error) {
      this._state = 'failed';
      this._error = toError(error);
      throw this._error;
    } finally {
      this.pending = false;
    }
  }

  /**
   * Iterate the entries. A failure ends the loop quietly and is left in
   * {@link error}; leaving the loop early sends nothing to the server.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<Entry, void, undefined> {
    for (;;) {
      let entry: Entry | undefined;
      try {
        entry = await this.next();
      } catch (error) {
        if (this._state !== 'failed') {
          throw error;
        }
        return;
      }
      if (entry === undefined) {
        return;
      }
      yield entry;
    }
  }

  /**
   * Iterate entries wrapped as results; a failure arrives as the final element.
   */
  async *results(): AsyncGenerator<CursorResult, void, undefined> {
    for (;;) {
      let entry: Entry | undefined;
      try {
        entry = await this.next();
      } catch (error) {
        if (this._state !== 'failed') {
          throw error;
        }
        yield { ok: false, error: toError(error) };
        return;
      }
      if (entry === undefined) {
        return;
      }
      yield { ok: true, entry };
    }
  }

  /**
   * Collect the remaining entries, at most `limit` of them.
   *
   * @throws the cursor's error if it fails on the way
   */
  async toArray(options: { limit?: number } = {}): Promise<Entry[]> {
    const { limit } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new InvalidArgumentError(`limit must be a non-negative integer, got ${limit}`);
    }
    const entries: Entry[] = [];
    while (limit === undefined || entries.length < limit) {
      const entry = await this.next();
      if (entry === undefined) {
        break;
      }
      entries.push(entry);
    }
    return entries;
  }

  private async open(options: CallOptions): Promise<void> {
    const context = this.errorContext();
    const direction = this.direction;
    if (direction === 'scan') {
      await this.invoker.invoke(
        cursorOpenPath(this.session.kind, 'scan'),
        { ...this.session.field, Name: this.id },
        options,
        context
      );
      return;
    }
    const range = this.range ?? { begin: new Uint8Array(0), end: new Uint8Array(0) };
    await this.invoker.invoke(
      cursorOpenPath(this.session.kind, direction),
      {
        ...this.session.field,
        Name: this.id,
        Begin: encodeBase64(range.begin),
        End: encodeBase64(range.end),
      },
      options,
      context
    );
  }

  private errorContext(): ErrorContext {
    return { sessionId: this.session.id, cursorId: this.id };
  }
}
