/**
 * Type definitions for engine settings (propguard.toml).
 *
 * @packageDocumentation
 */

import type { ValidationContextType } from '../context/context.js';
import type { ConversionFailureMode } from '../validation/validator.js';

/**
 * How the startup check reacts to validation results.
 */
export interface ValidationSettings {
  /** Throw when the merged configuration is invalid. */
  fail_on_error: boolean;
  /** Log a warning when the configuration is invalid and not failing. */
  log_warnings: boolean;
  /** Phase passed to providers and rules. */
  context_type: ValidationContextType;
  /** What a required property with an unconvertible value reports. */
  conversion_failure: ConversionFailureMode;
}

/**
 * Result cache of the engine's validator.
 */
export interface CacheSettings {
  enabled: boolean;
  /** Maximum number of cached results. */
  max_size: number;
  /** Time-to-live of a cached result in milliseconds. */
  ttl_ms: number;
}

/**
 * Logging behaviour.
 */
export interface LoggingSettings {
  /** Emit debug entries. */
  debug: boolean;
}

/**
 * Complete engine settings.
 */
export interface EngineSettings {
  /** When false the startup check skips validation. */
  enabled: boolean;
  validation: ValidationSettings;
  cache: CacheSettings;
  logging: LoggingSettings;
}

/**
 * Partial settings, for overrides.
 */
export interface PartialEngineSettings {
  enabled?: boolean;
  validation?: Partial<ValidationSettings>;
  cache?: Partial<CacheSettings>;
  logging?: Partial<LoggingSettings>;
}
