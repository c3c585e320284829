/**
 * Transaction scopes: `transaction`, `transactionRequired` and
 * `transactionIfNotAlready`
 *
 * @module scope/transaction
 */

import { abandonOutermostScope, completeOutermostScope, prepareOutermostEntry } from '../callbacks/simulator.js';
import { DEFAULT_CONNECTION } from '../constants.js';
import { MissingRequiredTransaction, TransactionAlreadyOpen } from '../errors.js';
import type { ConnectionState } from '../state/connection-handler.js';
import { isInTransaction } from '../state/status.js';
import type { ScopeFrame, ScopeOptions } from '../types.js';
import { scopeLog } from '../utils/debug.js';
import { unwind, withErrorHandling } from '../utils/error-handler.js';
import { generateSavepointName } from '../utils/id-generator.js';
import type { ScopeEnvironment } from './environment.js';
import type { ScopeLease, ScopeOperation, ScopeOutcome } from './scoped-acquisition.js';
import { defineScope, NOOP_LEASE } from './scoped-acquisition.js';

const assertNoOpenTransaction = (state: ConnectionState): void => {
  if (isInTransaction(state)) {
    throw new TransactionAlreadyOpen([state.using]);
  }
};

/**
 * Issue the statement that opens a root frame
 *
 * Under a test-case transaction the database is already in a transaction, so the
 * root is backed by a savepoint.
 */
const openRoot = async (state: ConnectionState): Promise<ScopeFrame> => {
  const savepointName = state.testcase === undefined ? undefined : generateSavepointName();
  const frame = state.stack.push('root', savepointName);

  try {
    if (savepointName === undefined) {
      await state.connection.begin();
    } else {
      await state.connection.createSavepoint(savepointName);
    }
  } catch (error) {
    state.stack.pop();
    throw error;
  }

  scopeLog('Opened transaction %s on %s', frame.id, state.using);
  return frame;
};

const commitRoot = async (state: ConnectionState, frame: ScopeFrame): Promise<void> => {
  if (frame.savepointName === undefined) {
    await state.connection.commit();
  } else {
    await state.connection.releaseSavepoint(frame.savepointName);
  }
};

const rollbackRoot = async (state: ConnectionState, frame: ScopeFrame): Promise<void> => {
  if (frame.savepointName === undefined) {
    await state.connection.rollback();
  } else {
    await state.connection.rollbackToSavepoint(frame.savepointName);
  }
};

/**
 * Open an outermost transaction on a connection that is not in one
 */
const enterRoot = async (env: ScopeEnvironment, state: ConnectionState): Promise<ScopeLease> => {
  assertNoOpenTransaction(state);
  await prepareOutermostEntry(state, env.settings(), env.errorHandler);
  // Draining leftovers may have yielded to other work on this connection.
  assertNoOpenTransaction(state);

  const frame = await openRoot(state);

  const rollBack = async (): Promise<void> => {
    const handlerFailure = await withErrorHandling(() => rollbackRoot(state, frame), env.errorHandler, {
      phase: 'rollback',
      using: state.using,
    });
    state.stack.pop();
    abandonOutermostScope(state, frame);
    scopeLog('Rolled back transaction %s on %s', frame.id, state.using);
    if (handlerFailure !== undefined) {
      throw handlerFailure;
    }
  };

  return {
    exit: async (outcome: ScopeOutcome): Promise<void> => {
      if (!outcome.ok) {
        await rollBack();
        return;
      }

      try {
        await commitRoot(state, frame);
      } catch (commitError) {
        return unwind(commitError, rollBack);
      }

      state.stack.pop();
      scopeLog('Committed transaction %s on %s', frame.id, state.using);
      await completeOutermostScope(state, frame, env.settings(), env.errorHandler);
    },
  };
};

/**
 * `transaction`: open a new transaction; fail if one is already open
 *
 * @throws {TransactionAlreadyOpen} If the connection is already in a transaction
 */
export const createTransaction = (env: ScopeEnvironment): ScopeOperation<ScopeOptions> =>
  defineScope<ScopeOptions>((options) => {
    const state = env.connections.state(options?.using ?? DEFAULT_CONNECTION);
    return enterRoot(env, state);
  });

/**
 * `transactionRequired`: assert a transaction is open; never issues SQL
 *
 * @throws {MissingRequiredTransaction} If the connection is not in a transaction
 */
export const createTransactionRequired = (env: ScopeEnvironment): ScopeOperation<ScopeOptions> =>
  defineScope<ScopeOptions>(async (options) => {
    const state = env.connections.state(options?.using ?? DEFAULT_CONNECTION);
    if (!isInTransaction(state)) {
      throw new MissingRequiredTransaction(state.using);
    }
    return NOOP_LEASE;
  });

/**
 * `transactionIfNotAlready`: join the open transaction, or open one
 *
 * @remarks
 * Joining issues no SQL at all, not even a savepoint: a failure inside a joined
 * scope leaves the outer transaction to roll back.
 */
export const createTransactionIfNotAlready = (env: ScopeEnvironment): ScopeOperation<ScopeOptions> =>
  defineScope<ScopeOptions>(async (options) => {
    const state = env.connections.state(options?.using ?? DEFAULT_CONNECTION);
    if (isInTransaction(state)) {
      scopeLog('Joining the open transaction on %s', state.using);
      return NOOP_LEASE;
    }
    return enterRoot(env, state);
  });
