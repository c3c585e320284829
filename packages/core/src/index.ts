/** @txscope/core - Transaction scopes, savepoints and after-commit callbacks for any database driver */

// Callbacks
export type { RunAfterCommit } from './callbacks/run-after-commit.js';
export { runCallbacks } from './callbacks/run-callbacks.js';
// Config
export { parseBooleanSetting, resolveSettings, settingsFromEnv } from './config/index.js';
// Constants
export { DEFAULT_CONNECTION, DEFAULT_SETTINGS, SAVEPOINT_PREFIX, SETTING_ENV_KEYS } from './constants.js';
// Errors
export {
  InvalidSettingError,
  MissingRequiredTransaction,
  NoTransactionOpen,
  TransactionAlreadyOpen,
  TransactionScopeError,
  UnexpectedDanglingTransaction,
  UnhandledCallbacks,
  UnknownConnection,
} from './errors.js';
// Interfaces
export type { ConnectionSource, DatabaseConnection } from './interfaces/index.js';
// Scope Primitives
export type {
  BlockScope,
  ScopeLease,
  ScopeOperation,
  ScopeOutcome,
  UnitOfWork,
} from './scope/scoped-acquisition.js';
// Scopes
export type { TransactionScopes, TransactionScopesConfig } from './scopes.js';
export { createTransactionScopes } from './scopes.js';
// State
export { AfterCommitCallbackRegistry } from './state/callback-registry.js';
export type { ConnectionHandler, ConnectionState, TestcaseTransaction } from './state/connection-handler.js';
export { createConnectionHandler } from './state/connection-handler.js';
export { TransactionScopeStack } from './state/scope-stack.js';
export { hasDanglingTransaction, isInTransaction } from './state/status.js';
// Types
export type {
  AfterCommitCallback,
  CallbackEntry,
  DurableOptions,
  RunAfterCommitOptions,
  ScopeFrame,
  ScopeKind,
  ScopeOptions,
  SettingsSource,
  TransactionSettings,
} from './types.js';
// Utilities
export { callbackLog, scopeLog, testingLog } from './utils/debug.js';
export type { ErrorHandler, ErrorStrategy, ScopeErrorContext, ScopeErrorPhase } from './utils/error-handler.js';
export { createErrorHandler, normalizeError, reportFailure, withErrorHandling } from './utils/error-handler.js';
export type { IdGenerator } from './utils/id-generator.js';
export { generateSavepointName, generateScopeId } from './utils/id-generator.js';
