/**
 * Debug logger for the statements the adapter issues
 *
 * @example
 * ```bash
 * DEBUG=txscope:pg node app.js
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

export const pgLog: Debugger = debug('txscope:pg');
