/**
 * Configuration Module - Re-exports
 *
 * @module config
 */

export { parseBooleanSetting, resolveSettings, settingsFromEnv } from './settings.js';
