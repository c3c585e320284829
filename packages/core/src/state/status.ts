/**
 * Transaction status of a connection, combining the scope stack with what the driver
 * reports
 *
 * @module state/status
 */

import type { ConnectionState } from './connection-handler.js';

/**
 * Whether the connection is in a transaction
 *
 * True when a root scope is open, or when the driver reports a transaction that
 * neither a scope nor a test-case transaction opened (a manually opened one). A
 * test-case transaction alone never counts.
 */
export const isInTransaction = (state: ConnectionState): boolean => {
  if (state.stack.outermostRoot() !== undefined) {
    return true;
  }
  return state.testcase === undefined && state.connection.isTransactionOpen();
};

/**
 * Whether the driver reports a transaction that no scope accounts for
 */
export const hasDanglingTransaction = (state: ConnectionState): boolean =>
  state.testcase === undefined && !state.stack.isOpen() && state.connection.isTransactionOpen();
