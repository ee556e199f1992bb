// Shared configuration: environment-backed index settings.

export {
  settings,
  loadSettings,
  settingsSchema,
  DEFAULT_SETTINGS,
  LOG_LEVELS,
  type Settings,
  type LogLevel,
  type EnvSource,
} from './settings.js'
