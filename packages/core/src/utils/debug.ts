/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all logs
 * DEBUG=txscope:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=txscope:callbacks npm test
 * DEBUG=txscope:scope npm start
 * ```
 *
 * @example Using debug loggers
 * ```typescript
 * import { scopeLog } from './debug.js';
 *
 * scopeLog('Opened root scope on %s', using);
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for scope entry and exit
 */
export const scopeLog: Debugger = debug('txscope:scope');

/**
 * Debug logger for after-commit callbacks
 */
export const callbackLog: Debugger = debug('txscope:callbacks');

/**
 * Debug logger for the test harness
 */
export const testingLog: Debugger = debug('txscope:testing');
