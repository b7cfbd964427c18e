/**
 * Byte-field encoding for the JSON wire format.
 *
 * Keys and values are arbitrary bytes; the server encodes them as standard
 * padded base64, and `null` stands for an empty byte string.
 *
 * @module codec
 */

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const textEncoder = new TextEncoder();

/**
 * Check that a string is well-formed standard padded base64.
 */
export function isBase64(text: string): boolean {
  return BASE64_PATTERN.test(text);
}

/**
 * Encode bytes as standard padded base64.
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode standard base64 into a fresh byte array. Callers validate with
 * {@link isBase64} first; Buffer silently skips characters outside the alphabet.
 */
export function decodeBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * Normalize a key given as text (UTF-8) or bytes.
 */
export function toBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === 'string' ? textEncoder.encode(input) : input;
}
