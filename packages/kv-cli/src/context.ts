/**
 * What every command needs: a way to open a client from the global options,
 * the output logger, and standard input.
 */

import {
  ConfigError,
  createKVClient,
  createLogger as createStructuredLogger,
  getLogLevelFromEnv,
  validateTimeout,
  type FetchLike,
  type KVClient,
  type KVClientConfig,
} from '@remote-kv/client';
import type { Logger } from './utils/logger.js';

/**
 * Options accepted before any command.
 */
export type GlobalOptions = {
  url?: string;
  token?: string;
  timeout?: number;
  verbose?: boolean;
};

export type Env = Record<string, string | undefined>;

export interface ActionContext {
  logger: Logger;
  stdin: AsyncIterable<Uint8Array | string>;
  openClient(): KVClient;
}

/**
 * Merge command-line options over environment variables. Flags win.
 *
 * @throws {ConfigError} when no URL is given either way
 */
export function clientConfigFromOptions(options: GlobalOptions, env: Env): KVClientConfig {
  const url = options.url ?? env.REMOTE_KV_URL;
  if (!url) {
    throw new ConfigError('no database url: pass --url or set REMOTE_KV_URL');
  }
  const config: KVClientConfig = { url };

  const token = options.token ?? env.REMOTE_KV_TOKEN;
  if (token) {
    config.token = token;
  }
  if (options.timeout !== undefined) {
    config.timeout = options.timeout;
  } else if (env.REMOTE_KV_TIMEOUT_MS) {
    config.timeout = validateTimeout(Number(env.REMOTE_KV_TIMEOUT_MS), 'REMOTE_KV_TIMEOUT_MS');
  }
  return config;
}

/**
 * Build the context handed to actions. The client's structured log goes
 * through the CLI logger: everything with --verbose, otherwise the level
 * from the environment.
 */
export function createActionContext(
  options: GlobalOptions,
  deps: { env: Env; logger: Logger; stdin: AsyncIterable<Uint8Array | string>; fetch?: FetchLike }
): ActionContext {
  const { env, logger, stdin, fetch } = deps;
  return {
    logger,
    stdin,
    openClient: () =>
      createKVClient({
        ...clientConfigFromOptions(options, env),
        fetch,
        logger: createStructuredLogger({
          level: options.verbose ? 'debug' : getLogLevelFromEnv(env),
          sink: logger.sink(),
        }),
      }),
  };
}

/**
 * Run `fn` with a fresh client, closing it afterwards.
 */
export async function withClient<T>(context: ActionContext, fn: (db: KVClient) => Promise<T>): Promise<T> {
  const db = context.openClient();
  try {
    return await fn(db);
  } finally {
    await db.close();
  }
}
