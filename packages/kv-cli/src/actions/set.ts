/**
 * CLI action handler for the set command.
 */

import { withClient, type ActionContext } from '../context.js';

/**
 * Stores `value` under `key` in a committed transaction. Without a value
 * argument the value is read from standard input.
 */
export async function handleSetAction(key: string, value: string | undefined, context: ActionContext): Promise<void> {
  await withClient(context, (db) => db.transaction((tx) => tx.set(key, value ?? context.stdin)));
  context.logger.debug(`set ${key}`);
}
