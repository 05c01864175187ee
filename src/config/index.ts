/**
 * Configuration module exports
 */

export {
  resolveSettings,
  parseOverrides,
  overrideKey,
  validateConfigFile,
  detectArchitecture,
  allArchitectures,
  ENV_ROOT,
  ENV_CONFIG,
  ENV_ARCH,
  ENV_DEFAULT_RELEASE,
  DEFAULT_CONFIG_FILE,
  type Settings,
  type SettingsKey,
  type SettingsSource,
  type CliSettings,
  type SettingsResolveOptions,
  type SettingsResolution,
} from './settings.js';
export {
  ConfigError,
  configError,
  conflictingOptions,
  unknownKey,
  invalidValue,
  type ConfigErrorCode,
  type ConfigIssue,
} from './errors.js';
