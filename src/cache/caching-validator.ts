/**
 * Memoizing decorator for property validators.
 *
 * @packageDocumentation
 */

import { toPropertyMap } from '../context/context.js';
import type { PropertyValues, ValidationContextType } from '../context/context.js';
import { fingerprintProperties } from '../utils/fingerprint.js';
import { resolveLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { PropertyGroup } from '../validation/group.js';
import type { ValidationResult } from '../validation/result.js';
import type { PropertyValidator } from '../validation/validator.js';

/** Default maximum number of cached results. */
export const DEFAULT_CACHE_MAX_SIZE = 100;

/** Default time-to-live of a cached result (5 minutes). */
export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

/**
 * Options for {@link CachingPropertyValidator}.
 */
export interface CachingValidatorOptions {
  /** @defaultValue 100 */
  readonly maxSize?: number;
  /** @defaultValue 300000 */
  readonly ttlMs?: number;
  /** Clock in epoch milliseconds (injectable for testing). */
  readonly now?: () => number;
  readonly logger?: Logger;
}

interface CacheEntry {
  readonly result: ValidationResult;
  readonly storedAt: number;
}

/**
 * Caches `validate` results keyed by a fingerprint of the input and the
 * context type.
 *
 * Entries older than the TTL count as absent. When the cache is full, expired
 * entries are purged; if it is still full the new result is not stored. Live
 * entries are never evicted. `validateProperty` and `validatePropertyGroup`
 * are not cached.
 */
export class CachingPropertyValidator implements PropertyValidator {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  /**
   * @param delegate - The validator to memoize.
   * @param options - Cache options.
   * @throws RangeError when `maxSize` is not a positive integer or `ttlMs` is
   * not positive.
   */
  constructor(
    private readonly delegate: PropertyValidator,
    options: CachingValidatorOptions = {}
  ) {
    this.maxSize = options.maxSize ?? DEFAULT_CACHE_MAX_SIZE;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    if (!Number.isInteger(this.maxSize) || this.maxSize < 1) {
      throw new RangeError(`Cache max size must be a positive integer, got ${this.maxSize}`);
    }
    if (!(this.ttlMs > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${this.ttlMs}`);
    }
    this.now = options.now ?? ((): number => Date.now());
    this.logger = resolveLogger('CachingPropertyValidator', options.logger);
  }

  validate(
    properties: PropertyValues,
    contextType: ValidationContextType = 'startup'
  ): ValidationResult {
    const snapshot = toPropertyMap(properties);
    const key = fingerprintProperties(snapshot, contextType);
    const now = this.now();

    const entry = this.cache.get(key);
    if (entry !== undefined) {
      if (!this.isExpired(entry, now)) {
        this.logger.debug('cache_hit', { fingerprint: key });
        return entry.result;
      }
      this.cache.delete(key);
    }

    this.logger.debug('cache_miss', { fingerprint: key });
    const result = this.delegate.validate(snapshot, contextType);
    this.store(key, { result, storedAt: now });
    return result;
  }

  validateProperty(
    propertyName: string,
    value: string | undefined,
    properties: PropertyValues
  ): ValidationResult {
    return this.delegate.validateProperty(propertyName, value, properties);
  }

  validatePropertyGroup(group: PropertyGroup, properties: PropertyValues): ValidationResult {
    return this.delegate.validatePropertyGroup(group, properties);
  }

  /** Number of stored entries, expired ones included until purged. */
  getCacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt > this.ttlMs;
  }

  private store(key: string, entry: CacheEntry): void {
    if (this.cache.size >= this.maxSize) {
      const now = this.now();
      for (const [storedKey, stored] of this.cache) {
        if (this.isExpired(stored, now)) {
          this.cache.delete(storedKey);
        }
      }
    }
    if (this.cache.size >= this.maxSize) {
      this.logger.debug('cache_full', { maxSize: this.maxSize });
      return;
    }
    this.cache.set(key, entry);
  }
}
