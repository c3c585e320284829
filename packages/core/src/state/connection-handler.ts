/**
 * Connection Handler
 *
 * @module state/connection-handler
 *
 * @remarks
 * Resolves connection aliases to their per-context transaction state. State lives in
 * an AsyncLocalStorage store, so every execution context (request, job, test) that
 * enters `runInContext` gets its own scope stacks and callback queues. Code running
 * outside any context shares the handler's default context.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { DEFAULT_CONNECTION } from '../constants.js';
import { UnknownConnection } from '../errors.js';
import type { ConnectionSource, DatabaseConnection } from '../interfaces/index.js';
import { scopeLog } from '../utils/debug.js';
import { AfterCommitCallbackRegistry } from './callback-registry.js';
import { TransactionScopeStack } from './scope-stack.js';

/**
 * Wrapping transaction opened by a test harness around a whole test
 */
export interface TestcaseTransaction {
  readonly id: string;
}

/**
 * Transaction state of one connection in one execution context
 */
export interface ConnectionState {
  readonly using: string;
  readonly connection: DatabaseConnection;
  readonly stack: TransactionScopeStack;
  readonly callbacks: AfterCommitCallbackRegistry;
  /** Set while a test harness wraps the connection in a never-committing transaction */
  testcase: TestcaseTransaction | undefined;
}

export interface ConnectionHandler {
  /** Configured aliases, in configuration order */
  readonly aliases: readonly string[];

  /**
   * State of `using` in the current context, resolving the connection on first use
   *
   * @throws {UnknownConnection} If the alias is not configured
   */
  state(using?: string): ConnectionState;

  /**
   * State of `using` in the current context, without invoking a connection factory
   *
   * @returns `undefined` when the alias comes from a factory the current context has
   * not used yet
   */
  lookup(using?: string): ConnectionState | undefined;

  /**
   * Run `fn` in a fresh context with its own connection state
   *
   * @example
   * ```typescript
   * app.use((req, res, next) => handler.runInContext(next));
   * ```
   */
  runInContext<T>(fn: () => T): T;
}

type ContextStore = Map<string, ConnectionState>;

const createState = (using: string, connection: DatabaseConnection): ConnectionState => ({
  using,
  connection,
  stack: new TransactionScopeStack(),
  callbacks: new AfterCommitCallbackRegistry(),
  testcase: undefined,
});

/**
 * Create a connection handler
 *
 * @example
 * ```typescript
 * const handler = createConnectionHandler({
 *   default: createPgConnection(client),
 *   reporting: () => createPgConnection(reportingClientForThisRequest()),
 * });
 *
 * handler.state('reporting').stack.depth(); // 0
 * ```
 */
export const createConnectionHandler = (connections: Record<string, ConnectionSource>): ConnectionHandler => {
  const storage = new AsyncLocalStorage<ContextStore>();
  const defaultStore: ContextStore = new Map();
  const aliases = Object.keys(connections);

  const currentStore = (): ContextStore => storage.getStore() ?? defaultStore;

  const sourceOf = (using: string): ConnectionSource => {
    const source = connections[using];
    if (source === undefined) {
      throw new UnknownConnection(using, aliases);
    }
    return source;
  };

  const state = (using: string = DEFAULT_CONNECTION): ConnectionState => {
    const store = currentStore();
    const existing = store.get(using);
    if (existing) {
      return existing;
    }

    const source = sourceOf(using);
    const connection = typeof source === 'function' ? source() : source;
    const created = createState(using, connection);
    store.set(using, created);
    scopeLog('Resolved connection %s for the current context', using);
    return created;
  };

  const lookup = (using: string = DEFAULT_CONNECTION): ConnectionState | undefined => {
    const existing = currentStore().get(using);
    if (existing) {
      return existing;
    }
    return typeof sourceOf(using) === 'function' ? undefined : state(using);
  };

  return {
    aliases,
    state,
    lookup,
    runInContext: <T>(fn: () => T): T => storage.run(new Map(), fn),
  };
};
