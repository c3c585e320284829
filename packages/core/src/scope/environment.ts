/**
 * Dependencies shared by every scope operation
 *
 * @module scope/environment
 */

import type { ConnectionHandler } from '../state/connection-handler.js';
import type { TransactionSettings } from '../types.js';
import type { ErrorHandler } from '../utils/error-handler.js';

export interface ScopeEnvironment {
  readonly connections: ConnectionHandler;
  /** Resolve the settings in effect right now */
  readonly settings: () => TransactionSettings;
  readonly errorHandler: ErrorHandler;
}
