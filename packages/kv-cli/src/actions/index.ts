/**
 * CLI action handlers.
 * Each action handles a specific CLI command; failures propagate to the
 * program, which reports them and sets the exit code.
 */

export { handleGetAction } from './get.js';
export { handleSetAction } from './set.js';
export { handleDeleteAction } from './delete.js';
export { handleListAction, openListCursor, formatEntry, type ListActionOptions } from './list.js';
