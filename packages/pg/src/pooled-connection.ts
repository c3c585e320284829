/**
 * Per-context connections checked out of a node-postgres pool
 *
 * @module pooled-connection
 */

import type { DatabaseConnection } from '@txscope/core';
import { TransactionScopeError } from '@txscope/core';
import type { PoolClient } from 'pg';
import { AsyncLocalStorage } from 'node:async_hooks';
import { pgLog } from './debug.js';
import type { PgQueryable } from './pg-connection.js';
import { createPgConnection } from './pg-connection.js';

/**
 * The part of a node-postgres `PoolClient` the adapter uses
 */
export interface PgPoolClient extends PgQueryable {
  release(err?: Error | boolean): void;
}

/**
 * The part of a node-postgres `Pool` the adapter uses
 */
export interface PgPool<C extends PgPoolClient = PoolClient> {
  connect(): Promise<C>;
}

export interface PooledConnection<C extends PgPoolClient = PoolClient> {
  /** Connection source to configure under an alias */
  readonly source: () => DatabaseConnection;

  /**
   * Check a client out of the pool and run `fn` in a fresh context bound to it
   *
   * The client is released when `fn` settles. A client left in a transaction is
   * released with an error so the pool discards it.
   */
  run<T>(runInContext: <R>(fn: () => R) => R, fn: (client: C) => Promise<T>): Promise<T>;
}

/**
 * Bind a connection alias to a pooled client per execution context
 *
 * @example
 * ```typescript
 * const pool = new pg.Pool();
 * const pooled = createPooledConnection(pool);
 * const scopes = createTransactionScopes({ connections: { default: pooled.source } });
 *
 * app.use((req, res, next) => {
 *   pooled.run(scopes.runInContext, () => handle(req, res)).catch(next);
 * });
 * ```
 */
export const createPooledConnection = <C extends PgPoolClient = PoolClient>(pool: PgPool<C>): PooledConnection<C> => {
  const storage = new AsyncLocalStorage<DatabaseConnection>();

  return {
    source: () => {
      const connection = storage.getStore();
      if (connection === undefined) {
        throw new TransactionScopeError('No pooled client is checked out in this context. Wrap the work in run().');
      }
      return connection;
    },

    run: async <T>(runInContext: <R>(fn: () => R) => R, fn: (client: C) => Promise<T>): Promise<T> => {
      const client = await pool.connect();
      const connection = createPgConnection(client);
      pgLog('Checked out a pooled client');

      try {
        return await storage.run(connection, () => runInContext(() => fn(client)));
      } finally {
        if (connection.isTransactionOpen()) {
          pgLog('Releasing a pooled client left in a transaction');
          client.release(new Error('Client released while in a transaction'));
        } else {
          client.release();
        }
      }
    },
  };
};
