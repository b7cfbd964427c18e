/**
 * Runtime Configuration for @remote-kv/shared-types
 *
 * This module holds the runtime switches read by the factory functions in
 * index.ts. It is kept apart from the pure type definitions so that the
 * rest of the package stays free of module-level state.
 *
 * - _devMode: enables validation in the id factory functions
 * - _strictMode: additionally enforces the id character set
 *
 * @module config
 */

// =============================================================================
// Runtime Mode Configuration
// =============================================================================

let _devMode = true; // validation on unless explicitly disabled
let _strictMode = false;

/**
 * Set development mode for enabling runtime validation
 */
export function setDevMode(enabled: boolean): void {
  _devMode = enabled;
}

/**
 * Check if development mode is enabled
 */
export function isDevMode(): boolean {
  return _devMode;
}

/**
 * Set strict mode for additional format validation
 */
export function setStrictMode(enabled: boolean): void {
  _strictMode = enabled;
}

/**
 * Check if strict mode is enabled
 */
export function isStrictMode(): boolean {
  return _strictMode;
}

/**
 * Internal getter for dev mode (used by factory functions)
 * @internal
 */
export function _isDevModeInternal(): boolean {
  return _devMode;
}

/**
 * Internal getter for strict mode (used by factory functions)
 * @internal
 */
export function _isStrictModeInternal(): boolean {
  return _strictMode;
}
