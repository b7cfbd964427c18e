/**
 * Response Schemas
 *
 * Zod schemas decoding every endpoint's reply. A reply that does not match its
 * schema is a protocol mismatch between client and server, never a domain
 * failure, so decoding is the only place the shape of a body is trusted.
 *
 * @module schemas
 */

import { z } from 'zod';
import { decodeBase64, isBase64 } from './codec.js';
import type {
  EndpointPath,
  NewTransactionRequest,
  NewSnapshotRequest,
  GetRequest,
  SetRequest,
  DeleteRequest,
  AscendRequest,
  DescendRequest,
  ScanRequest,
  NextRequest,
  CommitRequest,
  RollbackRequest,
  DiscardRequest,
} from './index.js';

// =============================================================================
// Field Schemas
// =============================================================================

/**
 * Application error text; absent and `null` both mean success.
 */
const ErrorField = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

/**
 * A byte field: base64 text, with `null` or absence meaning empty.
 */
const BytesField = z
  .string()
  .refine(isBase64, { message: 'Expected standard base64' })
  .nullish()
  .transform((value) => (value ? decodeBase64(value) : new Uint8Array(0)));

// =============================================================================
// Response Schemas
// =============================================================================

/**
 * Reply of every endpoint that returns nothing but its error text.
 */
export const ErrorResponseSchema = z.object({
  Error: ErrorField,
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * Reply of /tx/get and /snap/get.
 */
export const GetResponseSchema = z.object({
  Error: ErrorField,
  Value: BytesField,
});

export type GetResponse = z.infer<typeof GetResponseSchema>;

/**
 * Reply of /it/next. An empty `Key` marks the end of the cursor.
 */
export const NextResponseSchema = z.object({
  Error: ErrorField,
  Key: BytesField,
  Value: BytesField,
});

export type NextResponse = z.infer<typeof NextResponseSchema>;

// =============================================================================
// Endpoint Map
// =============================================================================

/**
 * Request and decoded response types of every endpoint.
 * @public
 */
export interface EndpointMap {
  '/new-transaction': { request: NewTransactionRequest; response: ErrorResponse };
  '/new-snapshot': { request: NewSnapshotRequest; response: ErrorResponse };
  '/tx/get': { request: GetRequest; response: GetResponse };
  '/tx/set': { request: SetRequest; response: ErrorResponse };
  '/tx/delete': { request: DeleteRequest; response: ErrorResponse };
  '/tx/ascend': { request: AscendRequest; response: ErrorResponse };
  '/tx/descend': { request: DescendRequest; response: ErrorResponse };
  '/tx/scan': { request: ScanRequest; response: ErrorResponse };
  '/tx/commit': { request: CommitRequest; response: ErrorResponse };
  '/tx/rollback': { request: RollbackRequest; response: ErrorResponse };
  '/snap/get': { request: GetRequest; response: GetResponse };
  '/snap/ascend': { request: AscendRequest; response: ErrorResponse };
  '/snap/descend': { request: DescendRequest; response: ErrorResponse };
  '/snap/scan': { request: ScanRequest; response: ErrorResponse };
  '/snap/discard': { request: DiscardRequest; response: ErrorResponse };
  '/it/next': { request: NextRequest; response: NextResponse };
}

export type EndpointRequest<P extends EndpointPath> = EndpointMap[P]['request'];
export type EndpointResponse<P extends EndpointPath> = EndpointMap[P]['response'];

type ResponseSchemaMap = {
  [P in EndpointPath]: z.ZodType<EndpointResponse<P>, z.ZodTypeDef, unknown>;
};

/**
 * The schema decoding each endpoint's reply.
 * @public
 */
export const RESPONSE_SCHEMAS: ResponseSchemaMap = {
  '/new-transaction': ErrorResponseSchema,
  '/new-snapshot': ErrorResponseSchema,
  '/tx/get': GetResponseSchema,
  '/tx/set': ErrorResponseSchema,
  '/tx/delete': ErrorResponseSchema,
  '/tx/ascend': ErrorResponseSchema,
  '/tx/descend': ErrorResponseSchema,
  '/tx/scan': ErrorResponseSchema,
  '/tx/commit': ErrorResponseSchema,
  '/tx/rollback': ErrorResponseSchema,
  '/snap/get': GetResponseSchema,
  '/snap/ascend': ErrorResponseSchema,
  '/snap/descend': ErrorResponseSchema,
  '/snap/scan': ErrorResponseSchema,
  '/snap/discard': ErrorResponseSchema,
  '/it/next': NextResponseSchema,
};

// =============================================================================
// Parsing
// =============================================================================

export type ResponseParseResult<T> =
  | { success: true; data: T }
  | { success: false; issues: string };

/**
 * Decode a JSON-parsed reply for the given endpoint.
 *
 * @example
 * ```typescript
 * const result = parseResponse('/it/next', JSON.parse(text));
 * if (result.success && result.data.Key.length === 0) {
 *   // end of cursor
 * }
 * ```
 */
export function parseResponse<P extends EndpointPath>(
  path: P,
  body: unknown
): ResponseParseResult<EndpointResponse<P>> {
  const schema: z.ZodType<EndpointResponse<P>, z.ZodTypeDef, unknown> = RESPONSE_SCHEMAS[path];
  const result = schema.safeParse(body);
  if (result.success) {
    return { success: true, data: result.data };
  }
  const issues = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  return { success: false, issues };
}
