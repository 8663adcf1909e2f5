/**
 * Configuration module exports
 */

export {
  resolveSettings,
  describeSettings,
  parsePositiveInteger,
  parseBoolean,
  DEFAULT_SETTINGS,
  DEFAULT_TIMEOUT_MS,
  ENV_VARS,
  type Settings,
  type SettingName,
  type SettingSource,
  type SettingsInput,
  type ResolvedSettings,
} from './settings.js';
