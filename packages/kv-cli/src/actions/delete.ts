/**
 * CLI action handler for the delete command.
 */

import { withClient, type ActionContext } from '../context.js';

export async function handleDeleteAction(key: string, context: ActionContext): Promise<void> {
  await withClient(context, (db) => db.transaction((tx) => tx.delete(key)));
  context.logger.debug(`deleted ${key}`);
}
