/**
 * @remote-kv/client - Client-side types
 *
 * Re-exports the wire types from @remote-kv/shared-types that appear in the
 * public API and adds the shapes only the client uses.
 *
 * @packageDocumentation
 */

export {
  type TransactionId,
  type SnapshotId,
  type CursorId,
  type SessionId,
  type SessionKind,
  type CursorDirection,
  type EndpointPath,
  Endpoint,
} from '@remote-kv/shared-types';

/**
 * A key as given by the caller: text is encoded as UTF-8.
 * @public
 */
export type KeyInput = string | Uint8Array;

/**
 * A value to store. Iterables (such as Node readable streams) are read to
 * the end before the request is sent; the protocol has no streaming write.
 * @public
 */
export type ValueInput =
  | string
  | Uint8Array
  | ArrayBuffer
  | Iterable<Uint8Array>
  | AsyncIterable<Uint8Array | string>;

/**
 * One (key, value) pair produced by a cursor.
 * @public
 */
export interface Entry {
  key: Uint8Array;
  value: Uint8Array;
}

/**
 * Per-call options, the cancellation context of every operation.
 * @public
 */
export interface CallOptions {
  /** Aborts the round trip; the server is not notified */
  signal?: AbortSignal;
  /** Overrides the client's default timeout (ms); 0 disables it */
  timeout?: number;
}

/**
 * The subset of `fetch` the client uses. Tests pass an in-process server here.
 * @public
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
