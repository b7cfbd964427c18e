/**
 * Client Configuration
 *
 * Turns the caller's {@link KVClientConfig} into the fully-defaulted settings
 * the transport uses. Resolution happens once, in the client constructor, and
 * never touches the network.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { ConfigError } from './errors.js';
import { createLogger, type StructuredLogger } from './logging.js';
import type { FetchLike } from './types.js';

// =============================================================================
// Configuration Types
// =============================================================================

/** Default per-call timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface KVClientConfig {
  /** Database base URL, e.g. `https://kv.example.com/db` */
  url: string | URL;
  /** Bearer token sent as the `authorization` header */
  token?: string;
  /** Default per-call timeout in milliseconds; 0 disables it */
  timeout?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** HTTP client; defaults to the global `fetch` */
  fetch?: FetchLike;
  logger?: StructuredLogger;
  /** Source of session and cursor ids; defaults to random UUIDs */
  generateId?: () => string;
}

/**
 * The (scheme, host, base path) a client talks to. Credentials, query and
 * fragment of the configured URL are dropped.
 */
export interface DatabaseEndpoint {
  /** `http:` or `https:` */
  protocol: string;
  /** Host name with port, if any */
  host: string;
  /** Path prefix without trailing slash; empty for the root */
  basePath: string;
}

export interface ResolvedClientConfig {
  endpoint: DatabaseEndpoint;
  fetch: FetchLike;
  timeout: number;
  headers: Record<string, string>;
  logger: StructuredLogger;
  generateId: () => string;
}

// =============================================================================
// Endpoint Handling
// =============================================================================

/**
 * Validate a database URL and reduce it to scheme, host and base path.
 * @throws {ConfigError} for unparseable URLs and non-HTTP schemes
 */
export function normalizeEndpoint(url: string | URL): DatabaseEndpoint {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`invalid database url: ${String(url)}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`unsupported protocol ${parsed.protocol} (expected http: or https:)`);
  }
  return {
    protocol: parsed.protocol,
    host: parsed.host,
    basePath: parsed.pathname.replace(/\/+$/, ''),
  };
}

/**
 * Render an endpoint as a URL string.
 */
export function endpointToString(endpoint: DatabaseEndpoint): string {
  return `${endpoint.protocol}//${endpoint.host}${endpoint.basePath}`;
}

/**
 * URL of one operation: the base path joined with the operation's sub-path.
 */
export function operationUrl(endpoint: DatabaseEndpoint, path: string): string {
  const subPath = path.startsWith('/') ? path : `/${path}`;
  return `${endpoint.protocol}//${endpoint.host}${endpoint.basePath}${subPath}`;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Check a timeout value: a finite, non-negative number of milliseconds.
 * @throws {ConfigError}
 */
export function validateTimeout(timeout: number, label = 'timeout'): number {
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new ConfigError(`${label} must be a non-negative number of milliseconds, got ${timeout}`);
  }
  return timeout;
}

/**
 * Apply defaults and validate a client configuration.
 * @throws {ConfigError}
 */
export function resolveClientConfig(config: KVClientConfig): ResolvedClientConfig {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(config.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }
  if (config.token !== undefined) {
    if (config.token.trim().length === 0) {
      throw new ConfigError('token cannot be empty');
    }
    headers.authorization = `Bearer ${config.token}`;
  }

  return {
    endpoint: normalizeEndpoint(config.url),
    fetch: config.fetch ?? ((url, init) => fetch(url, init)),
    timeout: validateTimeout(config.timeout ?? DEFAULT_TIMEOUT_MS),
    headers,
    logger: config.logger ?? createLogger(),
    generateId: config.generateId ?? (() => randomUUID()),
  };
}

/**
 * Build a client configuration from environment variables:
 *
 * - `REMOTE_KV_URL` (required)
 * - `REMOTE_KV_TOKEN`
 * - `REMOTE_KV_TIMEOUT_MS`
 *
 * @throws {ConfigError} when the URL is missing or the timeout is not a number
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): KVClientConfig {
  const url = env.REMOTE_KV_URL;
  if (!url) {
    throw new ConfigError('REMOTE_KV_URL is not set');
  }
  const config: KVClientConfig = { url };
  if (env.REMOTE_KV_TOKEN) {
    config.token = env.REMOTE_KV_TOKEN;
  }
  if (env.REMOTE_KV_TIMEOUT_MS) {
    config.timeout = validateTimeout(Number(env.REMOTE_KV_TIMEOUT_MS), 'REMOTE_KV_TIMEOUT_MS');
  }
  return config;
}
