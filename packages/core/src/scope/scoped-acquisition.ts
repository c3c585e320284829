/**
 * Scoped acquisition with guaranteed release
 *
 * @module scope/scoped-acquisition
 *
 * @remarks
 * Every scope operation is one `enter` function producing a lease. The lease is
 * exited exactly once, on every path out of the unit of work. The same operation is
 * offered as a block (`op(fn)`) and as a wrapper (`op.wrap(fn)`).
 */

import { unwind } from '../utils/error-handler.js';

/**
 * How a unit of work finished
 */
export type ScopeOutcome = { readonly ok: true } | { readonly ok: false; readonly error: unknown };

/**
 * Acquired scope, released through `exit`
 *
 * @remarks
 * `exit` with a failed outcome reports its own failures through the error handler.
 * If it still throws (a handler using the `'throw'` strategy), its error is raised
 * together with the error of the unit of work, which stays the `cause`.
 */
export interface ScopeLease {
  exit(outcome: ScopeOutcome): Promise<void>;
}

export type UnitOfWork<T> = () => T | Promise<T>;

/**
 * Block form of a scope operation
 *
 * @example
 * ```typescript
 * const user = await scopes.savepoint(async () => createUser(), { using: 'default' });
 * ```
 */
export type BlockScope<O> = <T>(fn: UnitOfWork<T>, options?: O) => Promise<T>;

/**
 * Scope operation usable as a block or as a wrapper
 *
 * @example
 * ```typescript
 * const createOrder = scopes.transaction.wrap(async (input: OrderInput) => {
 *   // ...
 * });
 *
 * await createOrder(input);
 * ```
 */
export type ScopeOperation<O> = BlockScope<O> & {
  wrap<A extends unknown[], R>(fn: (...args: A) => R | Promise<R>, options?: O): (...args: A) => Promise<R>;
};

export const NOOP_LEASE: ScopeLease = {
  exit: async () => {},
};

/**
 * Run `fn` inside a lease obtained from `enter`
 */
export const runInScope = async <T>(enter: () => Promise<ScopeLease>, fn: UnitOfWork<T>): Promise<T> => {
  const lease = await enter();

  let result: T;
  try {
    result = await fn();
  } catch (error) {
    return unwind(error, () => lease.exit({ ok: false, error }));
  }

  await lease.exit({ ok: true });
  return result;
};

/**
 * Build the block form of a scope operation
 */
export const defineBlockScope = <O>(enter: (options: O | undefined) => Promise<ScopeLease>): BlockScope<O> => {
  return <T>(fn: UnitOfWork<T>, options?: O): Promise<T> => runInScope(() => enter(options), fn);
};

/**
 * Build a scope operation with both call shapes
 */
export const defineScope = <O>(enter: (options: O | undefined) => Promise<ScopeLease>): ScopeOperation<O> => {
  const block = defineBlockScope(enter);

  const wrap = <A extends unknown[], R>(
    fn: (...args: A) => R | Promise<R>,
    options?: O,
  ): ((...args: A) => Promise<R>) => {
    return (...args: A): Promise<R> => block(() => fn(...args), options);
  };

  return Object.assign(block, { wrap });
};
