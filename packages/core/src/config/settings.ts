/**
 * Settings Resolution
 *
 * Settings are resolved at every call, never cached, so a test can change them
 * between two operations.
 *
 * @module config/settings
 */

import { DEFAULT_SETTINGS, SETTING_ENV_KEYS } from '../constants.js';
import { InvalidSettingError } from '../errors.js';
import type { SettingsSource, TransactionSettings } from '../types.js';

const TRUE_VALUES: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES: ReadonlySet<string> = new Set(['false', '0', 'no', 'off']);

const SETTING_NAMES: ReadonlyArray<keyof TransactionSettings> = [
  'afterCommitNeedsTransaction',
  'runAfterCommitCallbacksInTests',
  'catchUnhandledAfterCommitCallbacksInTests',
];

/**
 * Merge a settings source over the defaults
 *
 * @example
 * ```typescript
 * resolveSettings({ afterCommitNeedsTransaction: false });
 * // => { afterCommitNeedsTransaction: false, runAfterCommitCallbacksInTests: true, ... }
 * ```
 */
export const resolveSettings = (source?: SettingsSource): TransactionSettings => {
  const overrides = typeof source === 'function' ? source() : source;
  return { ...DEFAULT_SETTINGS, ...overrides };
};

/**
 * Parse a boolean setting value
 *
 * @throws {InvalidSettingError} If the value is not a recognised boolean
 */
export const parseBooleanSetting = (setting: string, value: string): boolean => {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new InvalidSettingError(setting, value);
};

/**
 * Read settings from environment variables
 *
 * Unset variables are left out, so the defaults apply.
 *
 * @example
 * ```typescript
 * const scopes = createTransactionScopes({
 *   connections,
 *   settings: () => settingsFromEnv(process.env),
 * });
 * ```
 */
export const settingsFromEnv = (env: Record<string, string | undefined>): Partial<TransactionSettings> => {
  const settings: Partial<TransactionSettings> = {};
  for (const key of SETTING_NAMES) {
    const variable = SETTING_ENV_KEYS[key];
    const value = env[variable];
    if (value !== undefined && value !== '') {
      settings[key] = parseBooleanSetting(variable, value);
    }
  }
  return settings;
};
