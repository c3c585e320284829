import type { DatabaseConnection } from '../interfaces/index.js';

interface Savepoint {
  name: string;
  snapshot: Map<string, unknown>;
}

interface PlannedFailure {
  prefix: string;
  error: Error;
}

/**
 * In-process database connection for tests
 *
 * Records every statement it is asked to run and keeps a key/value store that
 * transactions and savepoints restore on rollback, following PostgreSQL semantics:
 * `ROLLBACK TO SAVEPOINT` keeps the savepoint, `RELEASE SAVEPOINT` also releases
 * every savepoint created after it.
 *
 * @example
 * ```typescript
 * const connection = new MemoryConnection();
 * const scopes = createTransactionScopes({ connections: { default: connection } });
 *
 * await scopes.transaction(() => connection.set('balance', 10));
 * connection.statements; // ['BEGIN', 'COMMIT']
 * ```
 */
export class MemoryConnection implements DatabaseConnection {
  readonly statements: string[] = [];

  #data = new Map<string, unknown>();
  #transactionSnapshot: Map<string, unknown> | undefined;
  #savepoints: Savepoint[] = [];
  #failures: PlannedFailure[] = [];

  get(key: string): unknown {
    return this.#data.get(key);
  }

  set(key: string, value: unknown): void {
    this.#data.set(key, value);
  }

  /** Current contents of the store */
  snapshot(): Record<string, unknown> {
    return Object.fromEntries(this.#data);
  }

  /**
   * Make the next statement starting with `prefix` fail with `error`
   *
   * @example
   * ```typescript
   * connection.failNext('COMMIT', new Error('serialization failure'));
   * ```
   */
  failNext(prefix: string, error: Error): void {
    this.#failures.push({ prefix, error });
  }

  clearStatements(): void {
    this.statements.length = 0;
  }

  begin(): void {
    this.#execute('BEGIN');
    if (this.#transactionSnapshot !== undefined) {
      throw new Error('There is already a transaction in progress');
    }
    this.#transactionSnapshot = new Map(this.#data);
  }

  commit(): void {
    this.#execute('COMMIT');
    if (this.#transactionSnapshot === undefined) {
      throw new Error('There is no transaction in progress');
    }
    this.#endTransaction();
  }

  rollback(): void {
    this.#execute('ROLLBACK');
    if (this.#transactionSnapshot !== undefined) {
      this.#data = new Map(this.#transactionSnapshot);
    }
    this.#endTransaction();
  }

  createSavepoint(name: string): void {
    this.#execute(`SAVEPOINT ${name}`);
    if (this.#transactionSnapshot === undefined) {
      throw new Error('SAVEPOINT can only be used in transaction blocks');
    }
    this.#savepoints.push({ name, snapshot: new Map(this.#data) });
  }

  releaseSavepoint(name: string): void {
    this.#execute(`RELEASE SAVEPOINT ${name}`);
    this.#savepoints = this.#savepoints.slice(0, this.#findSavepoint(name));
  }

  rollbackToSavepoint(name: string): void {
    this.#execute(`ROLLBACK TO SAVEPOINT ${name}`);
    const index = this.#findSavepoint(name);
    const savepoint = this.#savepoints[index];
    if (savepoint !== undefined) {
      this.#data = new Map(savepoint.snapshot);
    }
    this.#savepoints = this.#savepoints.slice(0, index + 1);
  }

  isTransactionOpen(): boolean {
    return this.#transactionSnapshot !== undefined;
  }

  #execute(statement: string): void {
    this.statements.push(statement);
    const index = this.#failures.findIndex((failure) => statement.startsWith(failure.prefix));
    const failure = this.#failures[index];
    if (failure !== undefined) {
      this.#failures.splice(index, 1);
      throw failure.error;
    }
  }

  #findSavepoint(name: string): number {
    const index = this.#savepoints.findLastIndex((savepoint) => savepoint.name === name);
    if (index === -1) {
      throw new Error(`Savepoint "${name}" does not exist`);
    }
    return index;
  }

  #endTransaction(): void {
    this.#transactionSnapshot = undefined;
    this.#savepoints = [];
  }
}
