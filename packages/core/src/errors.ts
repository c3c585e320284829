/**
 * Errors raised by scope operations
 *
 * @module errors
 *
 * @remarks
 * All errors are raised at the point of violation and are not meant to be retried.
 * `UnhandledCallbacks` only occurs under a test-case transaction.
 */

import type { AfterCommitCallback } from './types.js';

const formatAliases = (aliases: readonly string[]): string => aliases.map((alias) => `'${alias}'`).join(', ');

/**
 * Base class of every error raised by this package
 */
export class TransactionScopeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransactionScopeError';
  }
}

/**
 * A transaction (or durable function) was opened while a transaction is already open
 *
 * @example
 * ```typescript
 * await scopes.transaction(async () => {
 *   await scopes.transaction(async () => {}); // throws TransactionAlreadyOpen
 * });
 * ```
 */
export class TransactionAlreadyOpen extends TransactionScopeError {
  constructor(public readonly openConnections: readonly string[]) {
    super(`A transaction is already open on ${formatAliases(openConnections)}. Transactions cannot be nested.`);
    this.name = 'TransactionAlreadyOpen';
  }

  /** First connection found with an open transaction */
  get using(): string {
    return this.openConnections[0] ?? '';
  }
}

/**
 * `transactionRequired` or `savepoint` was used outside a transaction
 */
export class MissingRequiredTransaction extends TransactionScopeError {
  constructor(public readonly using: string) {
    super(`A transaction is required on '${using}', but none is open.`);
    this.name = 'MissingRequiredTransaction';
  }
}

/**
 * `runAfterCommit` was called with no open transaction while
 * `afterCommitNeedsTransaction` is enabled
 */
export class NoTransactionOpen extends TransactionScopeError {
  constructor(public readonly using: string) {
    super(
      `Cannot register an after-commit callback on '${using}': no transaction is open. ` +
        'Open one with transaction() or disable afterCommitNeedsTransaction.',
    );
    this.name = 'NoTransactionOpen';
  }
}

/**
 * Callbacks from an earlier scope were still queued when a new outermost scope opened
 * in a test-case transaction
 */
export class UnhandledCallbacks extends TransactionScopeError {
  constructor(
    public readonly using: string,
    public readonly callbacks: readonly AfterCommitCallback[],
  ) {
    super(
      `${callbacks.length} after-commit callback(s) on '${using}' were never run. ` +
        'They were registered in a scope that did not commit before this one opened.',
    );
    this.name = 'UnhandledCallbacks';
  }
}

/**
 * A durable function left a transaction open; it has been rolled back
 */
export class UnexpectedDanglingTransaction extends TransactionScopeError {
  constructor(
    public readonly openConnections: readonly string[],
    options?: ErrorOptions,
  ) {
    super(
      `Durable function left a transaction open on ${formatAliases(openConnections)}. It has been rolled back.`,
      options,
    );
    this.name = 'UnexpectedDanglingTransaction';
  }
}

/**
 * An operation named a connection alias that is not configured
 */
export class UnknownConnection extends TransactionScopeError {
  constructor(
    public readonly using: string,
    public readonly configured: readonly string[],
  ) {
    super(`Unknown connection '${using}'. Configured connections: ${formatAliases(configured) || '(none)'}.`);
    this.name = 'UnknownConnection';
  }
}

/**
 * A setting could not be parsed
 */
export class InvalidSettingError extends TransactionScopeError {
  constructor(
    public readonly setting: string,
    public readonly value: string,
  ) {
    super(`[${setting}] Expected a boolean (true/false, 1/0, yes/no, on/off): received "${value}"`);
    this.name = 'InvalidSettingError';
  }
}
