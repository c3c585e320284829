/**
 * Savepoint scope
 *
 * @module scope/savepoint
 */

import { DEFAULT_CONNECTION } from '../constants.js';
import { MissingRequiredTransaction } from '../errors.js';
import { isInTransaction } from '../state/status.js';
import type { ScopeOptions } from '../types.js';
import { scopeLog } from '../utils/debug.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { generateSavepointName } from '../utils/id-generator.js';
import type { ScopeEnvironment } from './environment.js';
import type { BlockScope, ScopeOutcome } from './scoped-acquisition.js';
import { defineBlockScope } from './scoped-acquisition.js';

/**
 * `savepoint`: mark a point inside the open transaction to roll back to on failure
 *
 * Offered as a block only. After-commit callbacks registered inside a savepoint stay
 * bound to the enclosing transaction, even when the savepoint rolls back.
 *
 * @throws {MissingRequiredTransaction} If the connection is not in a transaction
 *
 * @example
 * ```typescript
 * await scopes.transaction(async () => {
 *   await chargeCard(order);
 *   await scopes.savepoint(() => sendReceipt(order)).catch(logFailure);
 * });
 * ```
 */
export const createSavepoint = (env: ScopeEnvironment): BlockScope<ScopeOptions> =>
  defineBlockScope<ScopeOptions>(async (options) => {
    const state = env.connections.state(options?.using ?? DEFAULT_CONNECTION);
    if (!isInTransaction(state)) {
      throw new MissingRequiredTransaction(state.using);
    }

    const name = generateSavepointName();
    const frame = state.stack.push('savepoint', name);
    try {
      await state.connection.createSavepoint(name);
    } catch (error) {
      state.stack.pop();
      throw error;
    }
    scopeLog('Created savepoint %s on %s at depth %d', name, state.using, frame.depth);

    return {
      exit: async (outcome: ScopeOutcome): Promise<void> => {
        if (outcome.ok) {
          try {
            await state.connection.releaseSavepoint(name);
          } finally {
            state.stack.pop();
          }
          scopeLog('Released savepoint %s on %s', name, state.using);
          return;
        }

        const handlerFailure = await withErrorHandling(
          () => state.connection.rollbackToSavepoint(name),
          env.errorHandler,
          { phase: 'savepoint-rollback', using: state.using },
        );
        state.stack.pop();
        scopeLog('Rolled back to savepoint %s on %s', name, state.using);
        if (handlerFailure !== undefined) {
          throw handlerFailure;
        }
      },
    };
  });
