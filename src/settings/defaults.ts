/**
 * Default engine settings.
 *
 * @packageDocumentation
 */

import { DEFAULT_CACHE_MAX_SIZE, DEFAULT_CACHE_TTL_MS } from '../cache/caching-validator.js';
import type { CacheSettings, EngineSettings, LoggingSettings, ValidationSettings } from './types.js';

/**
 * Default startup check behaviour: fail on invalid configuration.
 */
export const DEFAULT_VALIDATION_SETTINGS: ValidationSettings = {
  fail_on_error: true,
  log_warnings: true,
  context_type: 'startup',
  conversion_failure: 'conversion-only',
};

/**
 * Default cache settings (disabled).
 */
export const DEFAULT_CACHE_SETTINGS: CacheSettings = {
  enabled: false,
  max_size: DEFAULT_CACHE_MAX_SIZE,
  ttl_ms: DEFAULT_CACHE_TTL_MS,
};

export const DEFAULT_LOGGING_SETTINGS: LoggingSettings = {
  debug: false,
};

/**
 * Complete default settings.
 */
export const DEFAULT_SETTINGS: EngineSettings = {
  enabled: true,
  validation: DEFAULT_VALIDATION_SETTINGS,
  cache: DEFAULT_CACHE_SETTINGS,
  logging: DEFAULT_LOGGING_SETTINGS,
};
