/**
 * Shared types for transaction scopes, after-commit callbacks and settings
 */

/**
 * Kind of a frame on a connection's scope stack
 */
export type ScopeKind = 'root' | 'savepoint';

/**
 * One open scope on a connection
 *
 * @example
 * ```typescript
 * const frame: ScopeFrame = { id: 'k3v0...', kind: 'root', depth: 1 };
 * ```
 */
export interface ScopeFrame {
  /** Unique identifier, used to bind after-commit callbacks */
  readonly id: string;
  readonly kind: ScopeKind;
  /** 1 for the bottom frame, strictly increasing towards the top */
  readonly depth: number;
  /** SQL savepoint backing this frame, when one was issued */
  readonly savepointName?: string;
}

/**
 * Action deferred until its transaction commits
 */
export type AfterCommitCallback = () => void | Promise<void>;

/**
 * Queued after-commit callback
 */
export interface CallbackEntry {
  readonly callback: AfterCommitCallback;
  /** Outermost root frame (or test-case transaction) the callback belongs to */
  scopeId: string;
  /** Failures of robust callbacks are reported and never propagated */
  readonly robust: boolean;
}

/**
 * Strictness toggles, read at every call
 */
export interface TransactionSettings {
  /**
   * Whether `runAfterCommit` requires an open transaction.
   * When `false`, callbacks registered outside a transaction run immediately.
   * @default true
   */
  afterCommitNeedsTransaction: boolean;

  /**
   * Whether after-commit callbacks run when the outermost scope exits inside a
   * test-case transaction
   * @default true
   */
  runAfterCommitCallbacksInTests: boolean;

  /**
   * Whether leftover callbacks found when an outermost scope opens in tests raise
   * `UnhandledCallbacks` (`true`) or are drained first (`false`)
   * @default true
   */
  catchUnhandledAfterCommitCallbacksInTests: boolean;
}

/**
 * Settings given as a partial object, or a getter evaluated at every call
 *
 * @example
 * ```typescript
 * const settings: SettingsSource = () => ({
 *   afterCommitNeedsTransaction: process.env.NODE_ENV !== 'legacy',
 * });
 * ```
 */
export type SettingsSource = Partial<TransactionSettings> | (() => Partial<TransactionSettings>);

/**
 * Options accepted by every scope operation
 */
export interface ScopeOptions {
  /** Connection alias; defaults to `'default'` */
  using?: string;
}

export interface RunAfterCommitOptions extends ScopeOptions {
  /**
   * Report failures of this callback instead of propagating them
   * @default false
   */
  robust?: boolean;
}

export interface DurableOptions {
  /**
   * Actions run exactly once when the durable function exits, whether it returned
   * or threw
   */
  cleanup?: Array<() => void | Promise<void>>;
}
