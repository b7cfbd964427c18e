/**
 * rkv - Command-line interface for a remote transactional key-value store.
 *
 * Provides commands for:
 * - `get` - Print the value of a key
 * - `set` - Store a value, from an argument or standard input
 * - `delete` - Remove a key
 * - `list` - Print the entries of a key range
 *
 * @module kv-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { toError, type FetchLike } from '@remote-kv/client';
import { handleDeleteAction, handleGetAction, handleListAction, handleSetAction } from './actions/index.js';
import type { ListActionOptions } from './actions/list.js';
import { createActionContext, type ActionContext, type Env, type GlobalOptions } from './context.js';
import { Logger } from './utils/logger.js';

/**
 * Injectable process surroundings; tests replace all of them.
 */
export interface CLIDependencies {
  fetch?: FetchLike;
  env?: Env;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  stdin?: AsyncIterable<Uint8Array | string>;
  setExitCode?: (code: number) => void;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

/**
 * Creates and configures the rkv program.
 *
 * Usage errors, `--help` and `--version` reject `parseAsync` with a
 * `CommanderError` instead of exiting; command failures are reported on
 * stderr and set the exit code.
 *
 * @example
 * ```typescript
 * await createCLI().parseAsync(['node', 'rkv', '--url', 'http://localhost:8080/db', 'get', 'greeting']);
 * ```
 */
export function createCLI(deps: CLIDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const logger = new Logger({ stdout, stderr });
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name('rkv')
    .version('0.1.0')
    .description('rkv - read and write a remote transactional key-value store')
    .option('--url <url>', 'database URL (default: $REMOTE_KV_URL)')
    .option('--token <token>', 'bearer token (default: $REMOTE_KV_TOKEN)')
    .option('--timeout <ms>', 'per-request timeout in milliseconds, 0 for none', parseNonNegativeInt)
    .option('--verbose', 'log every request to stderr', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    });

  const run = async (action: (context: ActionContext) => Promise<void>): Promise<void> => {
    const options = program.opts<GlobalOptions>();
    if (options.verbose) {
      logger.setLevel('debug');
    }
    const context = createActionContext(options, {
      env,
      logger,
      stdin: deps.stdin ?? process.stdin,
      fetch: deps.fetch,
    });
    try {
      await action(context);
    } catch (error) {
      logger.error(toError(error).message);
      setExitCode(1);
    }
  };

  program
    .command('get')
    .description('Print the value stored under a key')
    .argument('<key>', 'key to read')
    .action((key: string) => run((context) => handleGetAction(key, context)));

  program
    .command('set')
    .description('Store a value under a key')
    .argument('<key>', 'key to write')
    .argument('[value]', 'value to store; read from stdin when omitted')
    .action((key: string, value: string | undefined) => run((context) => handleSetAction(key, value, context)));

  program
    .command('delete')
    .description('Remove a key')
    .argument('<key>', 'key to remove')
    .action((key: string) => run((context) => handleDeleteAction(key, context)));

  program
    .command('list')
    .description('Print the entries of a key range, one per line')
    .option('-b, --begin <key>', 'first key of the range (inclusive)')
    .option('-e, --end <key>', 'end of the range (exclusive)')
    .option('-r, --reverse', 'descending key order', false)
    .option('-n, --limit <n>', 'print at most n entries', parseNonNegativeInt)
    .option('--json', 'print JSON lines instead of key<TAB>value', false)
    .action((options: ListActionOptions) => run((context) => handleListAction(options, context)));

  return program;
}

export { Logger, createLogger, type LogLevel, type LoggerOptions } from './utils/logger.js';
export { clientConfigFromOptions, withClient, type ActionContext, type GlobalOptions } from './context.js';
export * from './actions/index.js';
