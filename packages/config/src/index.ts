// Shared configuration for the tree packages: defaults, environment overrides
// and schema validation of tree settings.

export {
  resolveSettings,
  readEnvSettings,
  treeSettingsSchema,
  InvalidSettingsError,
  DEFAULT_SETTINGS,
  SETTING_ENV_KEYS,
  LOG_LEVELS,
  type TreeSettings,
  type TreeSettingKey,
  type LogLevel,
} from './settings.js'
