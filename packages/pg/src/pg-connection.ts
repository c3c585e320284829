/**
 * PostgreSQL connection adapter
 *
 * @module pg-connection
 *
 * @remarks
 * node-postgres does not expose the transaction status of a client, so the adapter
 * tracks it from the statements it issues itself. A transaction opened with a raw
 * `client.query('BEGIN')` is invisible to it.
 */

import type { DatabaseConnection } from '@txscope/core';
import { pgLog } from './debug.js';

/**
 * The part of a node-postgres `Client` or `PoolClient` the adapter uses
 */
export interface PgQueryable {
  query(text: string): Promise<unknown>;
}

const quoteIdentifier = (name: string): string => `"${name.replaceAll('"', '""')}"`;

/**
 * Adapt a node-postgres client to a `DatabaseConnection`
 *
 * @example
 * ```typescript
 * const client = new pg.Client({ connectionString: process.env.DATABASE_URL });
 * await client.connect();
 *
 * const scopes = createTransactionScopes({
 *   connections: { default: createPgConnection(client) },
 * });
 * ```
 */
export const createPgConnection = (client: PgQueryable): DatabaseConnection => {
  let open = false;

  const execute = async (statement: string): Promise<void> => {
    pgLog('%s', statement);
    await client.query(statement);
  };

  return {
    begin: async () => {
      await execute('BEGIN');
      open = true;
    },
    commit: async () => {
      try {
        await execute('COMMIT');
      } finally {
        // PostgreSQL ends the transaction even when COMMIT fails
        open = false;
      }
    },
    rollback: async () => {
      try {
        await execute('ROLLBACK');
      } finally {
        open = false;
      }
    },
    createSavepoint: (name) => execute(`SAVEPOINT ${quoteIdentifier(name)}`),
    releaseSavepoint: (name) => execute(`RELEASE SAVEPOINT ${quoteIdentifier(name)}`),
    rollbackToSavepoint: (name) => execute(`ROLLBACK TO SAVEPOINT ${quoteIdentifier(name)}`),
    isTransactionOpen: () => open,
  };
};
