/**
 * Registration of after-commit callbacks
 *
 * @module callbacks/run-after-commit
 */

import { DEFAULT_CONNECTION } from '../constants.js';
import { NoTransactionOpen } from '../errors.js';
import type { ScopeEnvironment } from '../scope/environment.js';
import { isInTransaction } from '../state/status.js';
import type { AfterCommitCallback, RunAfterCommitOptions } from '../types.js';
import { callbackLog } from '../utils/debug.js';
import { runCallbacks } from './run-callbacks.js';

export type RunAfterCommit = (callback: AfterCommitCallback, options?: RunAfterCommitOptions) => Promise<void>;

/**
 * `runAfterCommit`: defer `callback` until the outermost open transaction commits
 *
 * The callback is bound to the outermost transaction, never to a savepoint, and is
 * dropped if that transaction rolls back.
 *
 * Inside a transaction opened directly on the connection it raises
 * `NoTransactionOpen`, whatever the settings. With no transaction open,
 * `afterCommitNeedsTransaction` decides: raise `NoTransactionOpen` (default), or run
 * the callback right away. In that legacy mode a test-case transaction with
 * `runAfterCommitCallbacksInTests` disabled keeps the callback instead, and it never
 * runs.
 *
 * @throws {NoTransactionOpen} If no transaction is open and one is required
 *
 * @example
 * ```typescript
 * await scopes.transaction(async () => {
 *   const order = await insertOrder(input);
 *   await scopes.runAfterCommit(() => queue.publish('order.created', order.id));
 * });
 * ```
 */
export const createRunAfterCommit = (env: ScopeEnvironment): RunAfterCommit => {
  return async (callback, options = {}) => {
    const state = env.connections.state(options.using ?? DEFAULT_CONNECTION);
    const robust = options.robust ?? false;

    const root = state.stack.outermostRoot();
    if (root !== undefined) {
      state.callbacks.register(callback, root.id, robust);
      callbackLog('Queued after-commit callback on %s for transaction %s', state.using, root.id);
      return;
    }

    // A transaction opened outside the scopes has no commit to hook into.
    const settings = env.settings();
    if (settings.afterCommitNeedsTransaction || isInTransaction(state)) {
      throw new NoTransactionOpen(state.using);
    }

    if (state.testcase !== undefined && !settings.runAfterCommitCallbacksInTests) {
      state.callbacks.register(callback, state.testcase.id, robust);
      callbackLog('Queued after-commit callback on %s for the test-case transaction', state.using);
      return;
    }

    callbackLog('No transaction on %s: running after-commit callback immediately', state.using);
    await runCallbacks([{ callback, scopeId: '', robust }], env.errorHandler, state.using);
  };
};
