/**
 * CLI action handler for the list command.
 */

import type { Cursor, Entry, Snapshot } from '@remote-kv/client';
import { withClient, type ActionContext } from '../context.js';

/**
 * Options for the list action.
 */
export interface ListActionOptions {
  begin?: string;
  end?: string;
  reverse?: boolean;
  limit?: number;
  json?: boolean;
}

const decoder = new TextDecoder();

/**
 * Picks the cursor for the options: descend with --reverse, ascend when a
 * bound is given, otherwise a full scan.
 */
export function openListCursor(snap: Snapshot, options: ListActionOptions): Cursor {
  const begin = options.begin ?? '';
  const end = options.end ?? '';
  if (options.reverse) {
    return snap.descend(begin, end);
  }
  if (begin !== '' || end !== '') {
    return snap.ascend(begin, end);
  }
  return snap.scan();
}

export function formatEntry(entry: Entry, json = false): string {
  const key = decoder.decode(entry.key);
  const value = decoder.decode(entry.value);
  return json ? JSON.stringify({ key, value }) : `${key}\t${value}`;
}

/**
 * Prints the entries of a range from a fresh snapshot, one per line.
 */
export async function handleListAction(options: ListActionOptions, context: ActionContext): Promise<void> {
  const { limit } = options;
  const count = await withClient(context, (db) =>
    db.snapshot(async (snap) => {
      const cursor = openListCursor(snap, options);
      let printed = 0;
      while (limit === undefined || printed < limit) {
        const entry = await cursor.next();
        if (entry === undefined) {
          break;
        }
        context.logger.info(formatEntry(entry, options.json));
        printed += 1;
      }
      return printed;
    })
  );
  context.logger.debug(`listed ${count} entries`);
}
