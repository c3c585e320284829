/**
 * Test-Mode Callback Simulator
 *
 * @module callbacks/simulator
 *
 * @remarks
 * Under a test-case transaction the database never commits, so the driver never
 * fires after-commit work. These hooks run that work at the point a real commit
 * would have happened: when the outermost scope exits. Without a test-case
 * transaction the same exit hook drains the callbacks after the real commit.
 */

import type { ConnectionState } from '../state/connection-handler.js';
import type { ScopeFrame, TransactionSettings } from '../types.js';
import { UnhandledCallbacks } from '../errors.js';
import { callbackLog } from '../utils/debug.js';
import type { ErrorHandler } from '../utils/error-handler.js';
import { runCallbacks } from './run-callbacks.js';

/**
 * Check for callbacks left over by an earlier scope before an outermost scope opens
 *
 * Leftovers can only exist under a test-case transaction, which never commits.
 *
 * @throws {UnhandledCallbacks} If leftovers exist and
 * `catchUnhandledAfterCommitCallbacksInTests` is enabled
 */
export const prepareOutermostEntry = async (
  state: ConnectionState,
  settings: TransactionSettings,
  errorHandler: ErrorHandler,
): Promise<void> => {
  if (state.testcase === undefined || !settings.runAfterCommitCallbacksInTests || state.callbacks.isEmpty()) {
    return;
  }

  if (settings.catchUnhandledAfterCommitCallbacksInTests) {
    throw new UnhandledCallbacks(
      state.using,
      state.callbacks.entries().map((entry) => entry.callback),
    );
  }

  callbackLog('Draining %d leftover callback(s) on %s before opening a scope', state.callbacks.size, state.using);
  await runCallbacks(state.callbacks.takeAll(), errorHandler, state.using);
};

/**
 * Handle the callbacks of an outermost scope that has just committed
 */
export const completeOutermostScope = async (
  state: ConnectionState,
  frame: ScopeFrame,
  settings: TransactionSettings,
  errorHandler: ErrorHandler,
): Promise<void> => {
  if (state.testcase !== undefined && !settings.runAfterCommitCallbacksInTests) {
    const moved = state.callbacks.rebind(frame.id, state.testcase.id);
    callbackLog('Moved %d callback(s) on %s onto the test-case transaction', moved, state.using);
    return;
  }

  await runCallbacks(state.callbacks.take(frame.id), errorHandler, state.using);
};

/**
 * Drop the callbacks of an outermost scope that rolled back
 */
export const abandonOutermostScope = (state: ConnectionState, frame: ScopeFrame): void => {
  const discarded = state.callbacks.discard(frame.id);
  if (discarded > 0) {
    callbackLog('Discarded %d callback(s) on %s after rollback', discarded, state.using);
  }
};
