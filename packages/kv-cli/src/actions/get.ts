/**
 * CLI action handler for the get command.
 */

import { withClient, type ActionContext } from '../context.js';

const decoder = new TextDecoder();

/**
 * Reads `key` from a fresh snapshot and prints its value as UTF-8 text.
 */
export async function handleGetAction(key: string, context: ActionContext): Promise<void> {
  const value = await withClient(context, (db) => db.snapshot((snap) => snap.get(key)));
  context.logger.info(decoder.decode(value));
}
