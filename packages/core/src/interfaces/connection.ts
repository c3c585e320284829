/**
 * Database Connection Interfaces
 *
 * Framework-agnostic contract for the host database layer. Scope operations decide
 * which statement to issue; the connection issues it.
 *
 * @packageDocumentation
 */

/**
 * A single named database connection
 *
 * Every method may complete synchronously or return a promise.
 *
 * @example
 * ```typescript
 * const connection: DatabaseConnection = {
 *   begin: () => client.query('BEGIN'),
 *   commit: () => client.query('COMMIT'),
 *   rollback: () => client.query('ROLLBACK'),
 *   createSavepoint: (name) => client.query(`SAVEPOINT ${name}`),
 *   releaseSavepoint: (name) => client.query(`RELEASE SAVEPOINT ${name}`),
 *   rollbackToSavepoint: (name) => client.query(`ROLLBACK TO SAVEPOINT ${name}`),
 *   isTransactionOpen: () => status.open,
 * };
 * ```
 */
export interface DatabaseConnection {
  begin(): void | Promise<void>;
  commit(): void | Promise<void>;
  rollback(): void | Promise<void>;
  createSavepoint(name: string): void | Promise<void>;
  releaseSavepoint(name: string): void | Promise<void>;
  rollbackToSavepoint(name: string): void | Promise<void>;
  /**
   * Whether the driver itself reports an open transaction.
   *
   * Must not open a network connection.
   */
  isTransactionOpen(): boolean;
}

/**
 * Host-supplied connection or a factory invoked once per execution context
 */
export type ConnectionSource = DatabaseConnection | (() => DatabaseConnection);
