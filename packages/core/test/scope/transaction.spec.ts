import { describe, expect, it, vi } from 'vitest';
import { TransactionAlreadyOpen } from '../../src/errors.js';
import { createErrorHandler } from '../../src/index.js';
import { createTransactionScopes } from '../../src/scopes.js';
import { MemoryConnection } from '../../src/testing/index.js';

const setup = () => {
  const connection = new MemoryConnection();
  const errorHandler = vi.fn();
  const scopes = createTransactionScopes({ connections: { default: connection }, errorHandler });
  return { connection, errorHandler, scopes };
};

describe('transaction', () => {
  it('should commit when the block returns', async () => {
    const { connection, scopes } = setup();

    const result = await scopes.transaction(async () => {
      connection.set('balance', 10);
      return 'done';
    });

    expect(result).toBe('done');
    expect(connection.statements).toEqual(['BEGIN', 'COMMIT']);
    expect(connection.get('balance')).toBe(10);
    expect(scopes.inTransaction()).toBe(false);
  });

  it('should report an open transaction inside the block', async () => {
    const { scopes } = setup();

    const inside = await scopes.transaction(() => scopes.inTransaction());

    expect(inside).toBe(true);
  });

  it('should roll back and rethrow when the block throws', async () => {
    const { connection, scopes } = setup();
    const failure = new Error('insufficient funds');

    await expect(
      scopes.transaction(async () => {
        connection.set('balance', 10);
        throw failure;
      }),
    ).rejects.toBe(failure);

    expect(connection.statements).toEqual(['BEGIN', 'ROLLBACK']);
    expect(connection.get('balance')).toBeUndefined();
    expect(scopes.inTransaction()).toBe(false);
  });

  it('should refuse to nest', async () => {
    const { connection, scopes } = setup();
    const inner = vi.fn();

    const error = await scopes
      .transaction(async () => {
        await scopes.transaction(inner);
      })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransactionAlreadyOpen);
    expect(error).toMatchObject({
      message: "A transaction is already open on 'default'. Transactions cannot be nested.",
      openConnections: ['default'],
      using: 'default',
    });
    expect(inner).not.toHaveBeenCalled();
    expect(connection.statements).toEqual(['BEGIN', 'ROLLBACK']);
  });

  it('should refuse to open over a transaction the driver reports', async () => {
    const { connection, scopes } = setup();
    connection.begin();

    await expect(scopes.transaction(async () => {})).rejects.toThrow(TransactionAlreadyOpen);
    expect(connection.statements).toEqual(['BEGIN']);
  });

  it('should allow successive transactions', async () => {
    const { connection, scopes } = setup();

    await scopes.transaction(async () => {});
    await scopes.transaction(async () => {});

    expect(connection.statements).toEqual(['BEGIN', 'COMMIT', 'BEGIN', 'COMMIT']);
  });

  it('should roll back and rethrow when the commit fails', async () => {
    const { connection, scopes } = setup();
    const callback = vi.fn();
    connection.failNext('COMMIT', new Error('serialization failure'));

    await expect(
      scopes.transaction(async () => {
        await scopes.runAfterCommit(callback);
      }),
    ).rejects.toThrow('serialization failure');

    expect(connection.statements).toEqual(['BEGIN', 'COMMIT', 'ROLLBACK']);
    expect(callback).not.toHaveBeenCalled();
    expect(scopes.inTransaction()).toBe(false);
  });

  it('should not run the block when BEGIN fails', async () => {
    const { connection, scopes } = setup();
    const block = vi.fn();
    connection.failNext('BEGIN', new Error('too many connections'));

    await expect(scopes.transaction(block)).rejects.toThrow('too many connections');

    expect(block).not.toHaveBeenCalled();
    expect(scopes.inTransaction()).toBe(false);
  });

  it('should report a failed rollback and propagate the original error', async () => {
    const { connection, errorHandler, scopes } = setup();
    const rollbackFailure = new Error('connection lost');
    connection.failNext('ROLLBACK', rollbackFailure);

    await expect(
      scopes.transaction(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(errorHandler).toHaveBeenCalledWith(rollbackFailure, { phase: 'rollback', using: 'default' });
  });

  describe('with an error handler that throws', () => {
    const strictSetup = () => {
      const connection = new MemoryConnection();
      const scopes = createTransactionScopes({
        connections: { default: connection },
        errorHandler: createErrorHandler('throw'),
      });
      return { connection, scopes };
    };

    it('should close the scope and keep the original error as the cause', async () => {
      const { connection, scopes } = strictSetup();
      const failure = new Error('boom');
      const callback = vi.fn();
      connection.failNext('ROLLBACK', new Error('connection lost'));

      const error = await scopes
        .transaction(async () => {
          await scopes.runAfterCommit(callback);
          throw failure;
        })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AggregateError);
      expect(error).toMatchObject({
        message: 'boom (unwinding also failed: connection lost)',
        cause: failure,
      });
      expect(error instanceof AggregateError && error.errors[0]).toBe(failure);
      expect(scopes.connections.state().stack.depth()).toBe(0);
      expect(scopes.connections.state().callbacks.isEmpty()).toBe(true);
    });

    it('should close the scope when the commit and the rollback both fail', async () => {
      const { connection, scopes } = strictSetup();
      connection.failNext('COMMIT', new Error('serialization failure'));
      connection.failNext('ROLLBACK', new Error('connection lost'));

      await expect(scopes.transaction(async () => {})).rejects.toThrow(
        'serialization failure (unwinding also failed: connection lost)',
      );

      expect(scopes.connections.state().stack.depth()).toBe(0);
    });
  });

  it('should only touch the connection named by using', async () => {
    const primary = new MemoryConnection();
    const reporting = new MemoryConnection();
    const scopes = createTransactionScopes({ connections: { default: primary, reporting } });

    const open = await scopes.transaction(() => scopes.connectionsWithOpenTransactions(), { using: 'reporting' });

    expect(open).toEqual(['reporting']);
    expect(reporting.statements).toEqual(['BEGIN', 'COMMIT']);
    expect(primary.statements).toEqual([]);
  });

  it('should allow one transaction per connection at the same time', async () => {
    const primary = new MemoryConnection();
    const reporting = new MemoryConnection();
    const scopes = createTransactionScopes({ connections: { default: primary, reporting } });

    const open = await scopes.transaction(() =>
      scopes.transaction(() => scopes.connectionsWithOpenTransactions(), { using: 'reporting' }),
    );

    expect(open).toEqual(['default', 'reporting']);
  });

  it('should reject a concurrent transaction in the same context', async () => {
    const { connection, scopes } = setup();

    const [first, second] = await Promise.allSettled([
      scopes.transaction(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
        return 'first';
      }),
      scopes.transaction(async () => 'second'),
    ]);

    expect(first).toEqual({ status: 'fulfilled', value: 'first' });
    expect(second.status).toBe('rejected');
    expect(second.status === 'rejected' && second.reason).toBeInstanceOf(TransactionAlreadyOpen);
    expect(connection.statements).toEqual(['BEGIN', 'COMMIT']);
  });

  it('should isolate transactions in separate contexts', async () => {
    const connections: MemoryConnection[] = [];
    const scopes = createTransactionScopes({
      connections: {
        default: () => {
          const connection = new MemoryConnection();
          connections.push(connection);
          return connection;
        },
      },
    });

    const results = await Promise.all(
      ['a', 'b'].map((name) =>
        scopes.runInContext(() =>
          scopes.transaction(async () => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            return name;
          }),
        ),
      ),
    );

    expect(results).toEqual(['a', 'b']);
    expect(connections).toHaveLength(2);
    expect(connections.map((connection) => connection.statements)).toEqual([
      ['BEGIN', 'COMMIT'],
      ['BEGIN', 'COMMIT'],
    ]);
  });

  describe('wrap', () => {
    it('should run the wrapped function in a transaction on every call', async () => {
      const { connection, scopes } = setup();
      const double = scopes.transaction.wrap(async (value: number) => value * 2);

      expect(await double(3)).toBe(6);
      expect(await double(5)).toBe(10);
      expect(connection.statements).toEqual(['BEGIN', 'COMMIT', 'BEGIN', 'COMMIT']);
    });

    it('should pass options through', async () => {
      const primary = new MemoryConnection();
      const reporting = new MemoryConnection();
      const scopes = createTransactionScopes({ connections: { default: primary, reporting } });
      const record = scopes.transaction.wrap((key: string) => reporting.set(key, true), { using: 'reporting' });

      await record('visited');

      expect(reporting.statements).toEqual(['BEGIN', 'COMMIT']);
      expect(reporting.get('visited')).toBe(true);
      expect(primary.statements).toEqual([]);
    });
  });
});
