/**
 * Transaction scopes factory
 *
 * @module scopes
 */

import type { RunAfterCommit } from './callbacks/run-after-commit.js';
import { createRunAfterCommit } from './callbacks/run-after-commit.js';
import { resolveSettings } from './config/settings.js';
import { DEFAULT_CONNECTION } from './constants.js';
import type { ConnectionSource } from './interfaces/index.js';
import { createDurable, findOpenConnections } from './scope/durable.js';
import type { ScopeEnvironment } from './scope/environment.js';
import { createSavepoint } from './scope/savepoint.js';
import type { BlockScope, ScopeOperation } from './scope/scoped-acquisition.js';
import { createTransaction, createTransactionIfNotAlready, createTransactionRequired } from './scope/transaction.js';
import type { ConnectionHandler } from './state/connection-handler.js';
import { createConnectionHandler } from './state/connection-handler.js';
import { isInTransaction } from './state/status.js';
import type { DurableOptions, ScopeOptions, SettingsSource, TransactionSettings } from './types.js';
import type { ErrorHandler } from './utils/error-handler.js';
import { createErrorHandler } from './utils/error-handler.js';

export interface TransactionScopesConfig {
  /** Connections by alias; a factory is invoked once per execution context */
  connections: Record<string, ConnectionSource>;
  /** Strictness settings, resolved at every call */
  settings?: SettingsSource;
  /**
   * Receives failures that must not replace the error already propagating, and
   * failures of robust callbacks
   * @default createErrorHandler('log')
   */
  errorHandler?: ErrorHandler;
}

export interface TransactionScopes {
  /** Open a new transaction; fails if one is already open */
  transaction: ScopeOperation<ScopeOptions>;
  /** Require an open transaction; issues no SQL */
  transactionRequired: ScopeOperation<ScopeOptions>;
  /** Join the open transaction, or open a new one */
  transactionIfNotAlready: ScopeOperation<ScopeOptions>;
  /** Savepoint inside the open transaction */
  savepoint: BlockScope<ScopeOptions>;
  /** Run code that must start and end outside any transaction */
  durable: ScopeOperation<DurableOptions>;
  /** Defer a callback until the outermost transaction commits */
  runAfterCommit: RunAfterCommit;
  /**
   * Whether the connection is in a transaction, ignoring a test-case transaction
   *
   * Does not invoke a connection factory the current context has not used.
   */
  inTransaction(options?: ScopeOptions): boolean;
  /** Aliases of connections in a transaction, sorted */
  connectionsWithOpenTransactions(): string[];
  /** Run `fn` in a fresh execution context with its own connection state */
  runInContext<T>(fn: () => T): T;
  /** Settings in effect right now */
  settings(): TransactionSettings;
  readonly connections: ConnectionHandler;
  readonly errorHandler: ErrorHandler;
}

/**
 * Create the scope operations for a set of connections
 *
 * @example
 * ```typescript
 * const scopes = createTransactionScopes({
 *   connections: { default: createPgConnection(client) },
 *   settings: () => settingsFromEnv(process.env),
 * });
 *
 * await scopes.transaction(async () => {
 *   await client.query('INSERT INTO orders (id) VALUES ($1)', [orderId]);
 *   await scopes.runAfterCommit(() => mailer.sendConfirmation(orderId));
 * });
 * ```
 */
export const createTransactionScopes = (config: TransactionScopesConfig): TransactionScopes => {
  const connections = createConnectionHandler(config.connections);
  const errorHandler = config.errorHandler ?? createErrorHandler('log');
  const settings = (): TransactionSettings => resolveSettings(config.settings);

  const env: ScopeEnvironment = { connections, settings, errorHandler };

  return {
    transaction: createTransaction(env),
    transactionRequired: createTransactionRequired(env),
    transactionIfNotAlready: createTransactionIfNotAlready(env),
    savepoint: createSavepoint(env),
    durable: createDurable(env),
    runAfterCommit: createRunAfterCommit(env),
    inTransaction: (options?: ScopeOptions): boolean => {
      const state = connections.lookup(options?.using ?? DEFAULT_CONNECTION);
      return state !== undefined && isInTransaction(state);
    },
    connectionsWithOpenTransactions: (): string[] => findOpenConnections(env).sort(),
    runInContext: connections.runInContext,
    settings,
    connections,
    errorHandler,
  };
};
