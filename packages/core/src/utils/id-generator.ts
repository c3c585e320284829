/**
 * ID Generation Utilities
 *
 * Scope ids and savepoint names are CUID v2 values: lowercase, alphanumeric and
 * starting with a letter, so they are valid unquoted SQL identifiers.
 */

import { createId } from '@paralleldrive/cuid2';
import { SAVEPOINT_PREFIX } from '../constants.js';

/**
 * ID generator function type
 */
export type IdGenerator = () => string;

export const generateScopeId: IdGenerator = () => createId();

/**
 * @example
 * ```typescript
 * generateSavepointName(); // 'txscope_tz4a98xxat96iws9zmbrgj3a'
 * ```
 */
export const generateSavepointName: IdGenerator = () => `${SAVEPOINT_PREFIX}${createId()}`;
