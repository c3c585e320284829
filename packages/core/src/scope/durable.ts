/**
 * Durable functions
 *
 * @module scope/durable
 */

import { TransactionAlreadyOpen, UnexpectedDanglingTransaction } from '../errors.js';
import { hasDanglingTransaction, isInTransaction } from '../state/status.js';
import type { DurableOptions } from '../types.js';
import { scopeLog } from '../utils/debug.js';
import { combineFailures, raiseFailures, reportFailure, withErrorHandling } from '../utils/error-handler.js';
import type { ScopeEnvironment } from './environment.js';
import type { ScopeOperation, ScopeOutcome } from './scoped-acquisition.js';
import { defineScope } from './scoped-acquisition.js';

/**
 * Aliases of the connections, among those known to the current context, that are in
 * a transaction
 */
export const findOpenConnections = (env: ScopeEnvironment): string[] =>
  env.connections.aliases.filter((alias) => {
    const state = env.connections.lookup(alias);
    return state !== undefined && isInTransaction(state);
  });

interface DanglingRollback {
  /** Aliases that were rolled back */
  readonly dangling: string[];
  /** Errors thrown by the error handler while reporting failed rollbacks */
  readonly handlerFailures: Error[];
}

/**
 * Roll back every transaction left open with no scope accounting for it
 */
const rollBackDanglingTransactions = async (env: ScopeEnvironment): Promise<DanglingRollback> => {
  const dangling: string[] = [];
  const handlerFailures: Error[] = [];
  for (const alias of env.connections.aliases) {
    const state = env.connections.lookup(alias);
    if (state === undefined || !hasDanglingTransaction(state)) {
      continue;
    }
    dangling.push(alias);
    scopeLog('Rolling back dangling transaction on %s', alias);
    const handlerFailure = await withErrorHandling(() => state.connection.rollback(), env.errorHandler, {
      phase: 'rollback',
      using: alias,
    });
    if (handlerFailure !== undefined) {
      handlerFailures.push(handlerFailure);
    }
  }
  return { dangling, handlerFailures };
};

const runCleanup = async (cleanup: ReadonlyArray<() => void | Promise<void>>): Promise<unknown[]> => {
  const failures: unknown[] = [];
  for (const action of cleanup) {
    try {
      await action();
    } catch (error) {
      failures.push(error);
    }
  }
  return failures;
};

/**
 * `durable`: run a function that must not be called inside a transaction
 *
 * The function itself runs outside any transaction; it is expected to open and
 * close its own. When it exits, declared cleanup actions run exactly once and any
 * transaction it left open is rolled back.
 *
 * @throws {TransactionAlreadyOpen} If any connection is in a transaction on entry
 * @throws {UnexpectedDanglingTransaction} If the function returned but left a
 * transaction open
 *
 * @example
 * ```typescript
 * const importBatch = scopes.durable.wrap(async (rows: Row[]) => {
 *   for (const row of rows) {
 *     await scopes.transaction(() => importRow(row));
 *   }
 * });
 * ```
 */
export const createDurable = (env: ScopeEnvironment): ScopeOperation<DurableOptions> =>
  defineScope<DurableOptions>(async (options) => {
    const open = findOpenConnections(env);
    if (open.length > 0) {
      throw new TransactionAlreadyOpen(open);
    }
    const cleanup = options?.cleanup ?? [];

    return {
      exit: async (outcome: ScopeOutcome): Promise<void> => {
        const cleanupFailures = await runCleanup(cleanup);
        const { dangling, handlerFailures } = await rollBackDanglingTransactions(env);

        if (!outcome.ok) {
          // The function's own error propagates; everything else is reported.
          const failures: Error[] = [...handlerFailures];
          for (const failure of cleanupFailures) {
            const handlerFailure = reportFailure(env.errorHandler, failure, { phase: 'durable-cleanup' });
            if (handlerFailure !== undefined) {
              failures.push(handlerFailure);
            }
          }
          if (dangling.length > 0) {
            const handlerFailure = reportFailure(env.errorHandler, new UnexpectedDanglingTransaction(dangling), {
              phase: 'dangling-transaction',
            });
            if (handlerFailure !== undefined) {
              failures.push(handlerFailure);
            }
          }
          raiseFailures(failures, `${failures.length} failures while exiting a durable function`);
          return;
        }

        if (dangling.length > 0) {
          const secondary = [...cleanupFailures, ...handlerFailures];
          const cause = combineFailures(secondary, `${secondary.length} failures while exiting a durable function`);
          throw new UnexpectedDanglingTransaction(dangling, cause === undefined ? undefined : { cause });
        }
        raiseFailures(cleanupFailures, `${cleanupFailures.length} durable cleanup actions failed`);
      },
    };
  });
