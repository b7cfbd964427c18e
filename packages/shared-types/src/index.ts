/**
 * @remote-kv/shared-types - Wire protocol types for the remote key-value client
 *
 * Contains the branded identifier types, the request bodies of every endpoint,
 * the endpoint paths, and (re-exported from ./schemas.js) the response schemas
 * that decode server replies.
 *
 * Field names on the wire are the server's capitalized struct names; byte
 * fields travel as standard padded base64 strings.
 *
 * @packageDocumentation
 */

import { _isDevModeInternal, _isStrictModeInternal } from './config.js';

export { setDevMode, isDevMode, setStrictMode, isStrictMode } from './config.js';

// =============================================================================
// Branded Types
// =============================================================================

/**
 * Branded types for the client-generated identifiers.
 *
 * The server never assigns ids: the client proposes a name for every session
 * and cursor, so these types mark strings that went through validation.
 */
declare const TransactionIdBrand: unique symbol;
declare const SnapshotIdBrand: unique symbol;
declare const CursorIdBrand: unique symbol;

/**
 * Id of a read-write session.
 *
 * @example
 * ```typescript
 * const txId: TransactionId = createTransactionId(randomUUID());
 * ```
 * @public
 */
export type TransactionId = string & { readonly [TransactionIdBrand]: never };

/**
 * Id of a read-only session.
 * @public
 */
export type SnapshotId = string & { readonly [SnapshotIdBrand]: never };

/**
 * Id of a server-side iterator, distinct from the id of the session it reads.
 * @public
 */
export type CursorId = string & { readonly [CursorIdBrand]: never };

/**
 * Either kind of session id.
 * @public
 */
export type SessionId = TransactionId | SnapshotId;

/** Longest id the factories accept */
export const MAX_ID_LENGTH = 255;

const STRICT_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

function validateId(label: string, id: string): void {
  if (!_isDevModeInternal() && !_isStrictModeInternal()) {
    return;
  }
  if (typeof id !== 'string') {
    throw new Error(`${label} must be a string`);
  }
  if (id.trim().length === 0) {
    throw new Error(`${label} cannot be empty`);
  }
  if (id.length > MAX_ID_LENGTH) {
    throw new Error(`${label} cannot exceed ${MAX_ID_LENGTH} characters`);
  }
  if (_isStrictModeInternal() && !STRICT_ID_PATTERN.test(id)) {
    throw new Error(`${label} contains invalid characters: ${id}`);
  }
}

function isIdLike(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0 && value.length <= MAX_ID_LENGTH;
}

/**
 * Create a typed TransactionId from a string.
 * @throws Error if id is empty, whitespace-only or too long (in dev mode)
 * @public
 */
export function createTransactionId(id: string): TransactionId {
  validateId('TransactionId', id);
  return id as TransactionId;
}

/**
 * Create a typed SnapshotId from a string.
 * @throws Error if id is empty, whitespace-only or too long (in dev mode)
 * @public
 */
export function createSnapshotId(id: string): SnapshotId {
  validateId('SnapshotId', id);
  return id as SnapshotId;
}

/**
 * Create a typed CursorId from a string.
 * @throws Error if id is empty, whitespace-only or too long (in dev mode)
 * @public
 */
export function createCursorId(id: string): CursorId {
  validateId('CursorId', id);
  return id as CursorId;
}

/**
 * Check if a value could be used as a TransactionId.
 * @public
 */
export function isValidTransactionId(value: unknown): value is TransactionId {
  return isIdLike(value);
}

/**
 * Check if a value could be used as a SnapshotId.
 * @public
 */
export function isValidSnapshotId(value: unknown): value is SnapshotId {
  return isIdLike(value);
}

/**
 * Check if a value could be used as a CursorId.
 * @public
 */
export function isValidCursorId(value: unknown): value is CursorId {
  return isIdLike(value);
}

// =============================================================================
// Sessions and Cursors
// =============================================================================

/**
 * The two kinds of server-tracked session.
 * @public
 */
export type SessionKind = 'transaction' | 'snapshot';

/**
 * Ordering of a cursor: increasing keys, decreasing keys, or the server's
 * natural order over the whole session.
 * @public
 */
export type CursorDirection = 'ascend' | 'descend' | 'scan';

// =============================================================================
// Endpoints
// =============================================================================

/**
 * Every POST endpoint of the protocol, relative to the database base path.
 * @public
 */
export const Endpoint = {
  NEW_TRANSACTION: '/new-transaction',
  NEW_SNAPSHOT: '/new-snapshot',
  TX_GET: '/tx/get',
  TX_SET: '/tx/set',
  TX_DELETE: '/tx/delete',
  TX_ASCEND: '/tx/ascend',
  TX_DESCEND: '/tx/descend',
  TX_SCAN: '/tx/scan',
  TX_COMMIT: '/tx/commit',
  TX_ROLLBACK: '/tx/rollback',
  SNAP_GET: '/snap/get',
  SNAP_ASCEND: '/snap/ascend',
  SNAP_DESCEND: '/snap/descend',
  SNAP_SCAN: '/snap/scan',
  SNAP_DISCARD: '/snap/discard',
  ITERATOR_NEXT: '/it/next',
} as const;

export type EndpointPath = (typeof Endpoint)[keyof typeof Endpoint];

const GET_PATHS = {
  transaction: Endpoint.TX_GET,
  snapshot: Endpoint.SNAP_GET,
} as const satisfies Record<SessionKind, EndpointPath>;

const CURSOR_PATHS = {
  transaction: {
    ascend: Endpoint.TX_ASCEND,
    descend: Endpoint.TX_DESCEND,
    scan: Endpoint.TX_SCAN,
  },
  snapshot: {
    ascend: Endpoint.SNAP_ASCEND,
    descend: Endpoint.SNAP_DESCEND,
    scan: Endpoint.SNAP_SCAN,
  },
} as const satisfies Record<SessionKind, Record<CursorDirection, EndpointPath>>;

/**
 * Path of the point lookup for a session kind.
 * @public
 */
export function getPath(kind: SessionKind): (typeof GET_PATHS)[SessionKind] {
  return GET_PATHS[kind];
}

export type RangeOpenPath =
  | typeof Endpoint.TX_ASCEND
  | typeof Endpoint.TX_DESCEND
  | typeof Endpoint.SNAP_ASCEND
  | typeof Endpoint.SNAP_DESCEND;

export type ScanOpenPath = typeof Endpoint.TX_SCAN | typeof Endpoint.SNAP_SCAN;

/**
 * Path of the open-cursor call for a session kind and direction.
 * @public
 */
export function cursorOpenPath(kind: SessionKind, direction: 'ascend' | 'descend'): RangeOpenPath;
export function cursorOpenPath(kind: SessionKind, direction: 'scan'): ScanOpenPath;
export function cursorOpenPath(kind: SessionKind, direction: CursorDirection): RangeOpenPath | ScanOpenPath {
  return CURSOR_PATHS[kind][direction];
}

// =============================================================================
// Request Bodies
// =============================================================================

/** Standard padded base64 text of a byte string */
export type Base64 = string;

/**
 * Names the session a request runs in. Exactly one of the two is set.
 * @public
 */
export type SessionField =
  | { Transaction: TransactionId; Snapshot?: never }
  | { Snapshot: SnapshotId; Transaction?: never };

export interface NewTransactionRequest {
  Name: TransactionId;
}

export interface NewSnapshotRequest {
  Name: SnapshotId;
}

export type GetRequest = SessionField & {
  Key: Base64;
};

export interface SetRequest {
  Transaction: TransactionId;
  Key: Base64;
  Value: Base64;
}

export interface DeleteRequest {
  Transaction: TransactionId;
  Key: Base64;
}

/**
 * Opens a bounded cursor. `Begin` is inclusive and `End` exclusive; an empty
 * bound leaves that side of the range open.
 */
export type RangeRequest = SessionField & {
  Name: CursorId;
  Begin: Base64;
  End: Base64;
};

export type AscendRequest = RangeRequest;
export type DescendRequest = RangeRequest;

export type ScanRequest = SessionField & {
  Name: CursorId;
};

export interface NextRequest {
  Iterator: CursorId;
}

export interface CommitRequest {
  Transaction: TransactionId;
}

export interface RollbackRequest {
  Transaction: TransactionId;
}

export interface DiscardRequest {
  Snapshot: SnapshotId;
}

// =============================================================================
// Re-exports
// =============================================================================

export {
  ErrorResponseSchema,
  GetResponseSchema,
  NextResponseSchema,
  RESPONSE_SCHEMAS,
  parseResponse,
  type ErrorResponse,
  type GetResponse,
  type NextResponse,
  type EndpointMap,
  type EndpointRequest,
  type EndpointResponse,
  type ResponseParseResult,
} from './schemas.js';

export { encodeBase64, decodeBase64, toBytes, isBase64 } from './codec.js';
