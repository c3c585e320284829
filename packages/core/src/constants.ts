/** Constants and default configuration values */

import type { TransactionSettings } from './types.js';

/** Alias used when an operation is not given `using` */
export const DEFAULT_CONNECTION = 'default';

/** Prefix of generated SQL savepoint names */
export const SAVEPOINT_PREFIX = 'txscope_';

/** Default strictness settings */
export const DEFAULT_SETTINGS = {
  afterCommitNeedsTransaction: true,
  runAfterCommitCallbacksInTests: true,
  catchUnhandledAfterCommitCallbacksInTests: true,
} as const satisfies TransactionSettings;

/** Environment variable read for each setting by `settingsFromEnv` */
export const SETTING_ENV_KEYS = {
  afterCommitNeedsTransaction: 'AFTER_COMMIT_NEEDS_TRANSACTION',
  runAfterCommitCallbacksInTests: 'RUN_AFTER_COMMIT_CALLBACKS_IN_TESTS',
  catchUnhandledAfterCommitCallbacksInTests: 'CATCH_UNHANDLED_AFTER_COMMIT_CALLBACKS_IN_TESTS',
} as const satisfies Record<keyof TransactionSettings, string>;
