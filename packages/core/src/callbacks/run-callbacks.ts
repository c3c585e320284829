/**
 * Draining of after-commit callbacks
 *
 * @module callbacks/run-callbacks
 */

import type { CallbackEntry } from '../types.js';
import { callbackLog } from '../utils/debug.js';
import type { ErrorHandler } from '../utils/error-handler.js';
import { raiseFailures, reportFailure } from '../utils/error-handler.js';

/**
 * Invoke callbacks in order, each exactly once
 *
 * Every callback is attempted even when an earlier one fails. Failures of robust
 * callbacks go to `errorHandler`. Once all callbacks have run, a single failure is
 * re-thrown as-is and several are thrown together as an `AggregateError`.
 *
 * @example
 * ```typescript
 * await runCallbacks(state.callbacks.take(frame.id), errorHandler, 'default');
 * ```
 */
export const runCallbacks = async (
  entries: readonly CallbackEntry[],
  errorHandler: ErrorHandler,
  using: string,
): Promise<void> => {
  const failures: unknown[] = [];

  for (const [index, entry] of entries.entries()) {
    callbackLog('Running after-commit callback #%d of %d on %s', index + 1, entries.length, using);
    try {
      await entry.callback();
    } catch (error) {
      if (!entry.robust) {
        failures.push(error);
        continue;
      }
      const handlerFailure = reportFailure(errorHandler, error, { phase: 'after-commit-callback', using });
      if (handlerFailure !== undefined) {
        failures.push(handlerFailure);
      }
    }
  }

  raiseFailures(failures, `${failures.length} after-commit callbacks failed on '${using}'`);
};
