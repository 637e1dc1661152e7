/**
 * Conditional default providers.
 *
 * A provider computes a default value from a property context, or yields
 * nothing. Overrides added with `when` are tested newest first and fall back
 * to the provider they were added to.
 *
 * @packageDocumentation
 */

import type { Condition, PropertyContext } from '../context/context.js';
import { InvalidDefinitionError } from '../schema/errors.js';
import { fingerprintProperties } from '../utils/fingerprint.js';

/**
 * Function computing a default value from a context.
 */
export type DefaultComputer<T> = (context: PropertyContext) => T | undefined;

/**
 * Default value provider.
 *
 * @typeParam T - Value type of the property.
 */
export interface ConditionalDefault<T> {
  /**
   * Computes the default for a context.
   *
   * @param context - Context over the user-supplied values.
   * @returns The default, or undefined when there is none.
   */
  compute(context: PropertyContext): T | undefined;

  /**
   * Returns a provider yielding `value` when the condition holds and
   * delegating to this provider otherwise.
   */
  when(condition: Condition, value: T): ConditionalDefault<T>;

  /**
   * Returns a provider computing its value with `computer` when the condition
   * holds and delegating to this provider otherwise.
   */
  when(condition: Condition, computer: DefaultComputer<T>): ConditionalDefault<T>;
}

function isComputer<T>(override: T | DefaultComputer<T>): override is DefaultComputer<T> {
  return typeof override === 'function';
}

function fromComputer<T>(computer: DefaultComputer<T>): ConditionalDefault<T> {
  const provider: ConditionalDefault<T> = Object.freeze({
    compute: computer,
    when: (condition: Condition, override: T | DefaultComputer<T>): ConditionalDefault<T> => {
      const overrideComputer: DefaultComputer<T> = isComputer(override)
        ? override
        : () => override;
      return fromComputer<T>((context) =>
        condition(context) ? overrideComputer(context) : computer(context)
      );
    },
  });
  return provider;
}

/**
 * Provider that always yields the value.
 *
 * @throws InvalidDefinitionError when the value is null or undefined.
 */
export function staticValue<T>(value: T): ConditionalDefault<T> {
  if (value === undefined || value === null) {
    throw new InvalidDefinitionError('A static default value must not be null or undefined');
  }
  return fromComputer<T>(() => value);
}

/**
 * Provider computing the value from the context on every call.
 */
export function computed<T>(computer: DefaultComputer<T>): ConditionalDefault<T> {
  return fromComputer(computer);
}

/**
 * Provider that memoizes computed values per distinct property map.
 *
 * Only present results are stored, and nothing is stored once the memo holds
 * `maxCacheSize` entries.
 *
 * @throws InvalidDefinitionError when `maxCacheSize` is not a positive integer.
 */
export function computedCached<T>(
  computer: DefaultComputer<T>,
  maxCacheSize: number
): ConditionalDefault<T> {
  if (!Number.isInteger(maxCacheSize) || maxCacheSize < 1) {
    throw new InvalidDefinitionError(
      `computedCached requires a cache size of at least 1, got ${String(maxCacheSize)}`
    );
  }
  const memo = new Map<string, T>();
  return fromComputer<T>((context) => {
    const key = fingerprintProperties(context.getAllProperties());
    if (memo.has(key)) {
      return memo.get(key);
    }
    const value = computer(context);
    if (value !== undefined && value !== null && memo.size < maxCacheSize) {
      memo.set(key, value);
    }
    return value;
  });
}

/**
 * Provider that never yields a value.
 */
export function noDefault<T>(): ConditionalDefault<T> {
  return fromComputer<T>(() => undefined);
}
