/**
 * Result caching for validators.
 *
 * @packageDocumentation
 */

export {
  CachingPropertyValidator,
  DEFAULT_CACHE_MAX_SIZE,
  DEFAULT_CACHE_TTL_MS,
} from './caching-validator.js';
export type { CachingValidatorOptions } from './caching-validator.js';
