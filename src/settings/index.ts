/**
 * Engine settings: propguard.toml parsing, environment overrides and
 * validation.
 *
 * @packageDocumentation
 */

export type {
  CacheSettings,
  EngineSettings,
  LoggingSettings,
  PartialEngineSettings,
  ValidationSettings,
} from './types.js';
export {
  DEFAULT_CACHE_SETTINGS,
  DEFAULT_LOGGING_SETTINGS,
  DEFAULT_SETTINGS,
  DEFAULT_VALIDATION_SETTINGS,
} from './defaults.js';
export { SettingsParseError, getDefaultSettings, loadSettings, parseSettings } from './parser.js';
export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  mergeSettings,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { SettingsValidationError, assertSettingsValid, validateSettings } from './validator.js';
