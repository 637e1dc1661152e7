/**
 * Rules applicable to values of any type.
 *
 * @packageDocumentation
 */

import type { PropertyContext } from '../../context/context.js';
import { InvalidDefinitionError } from '../../schema/errors.js';
import { compareValues, renderValue } from '../multiproperty/numeric-relationship.js';
import type { Comparable } from '../multiproperty/numeric-relationship.js';
import { failure, success, validationError } from '../result.js';
import { createRule } from '../rule.js';
import type { ValidationRule } from '../rule.js';

function listing(values: readonly unknown[]): string {
  return `[${values.map(String).join(', ')}]`;
}

/** Fails when the value is null or undefined. */
export function required<T>(): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    value === undefined || value === null
      ? failure(validationError({ propertyName, message: 'Value is required', actualValue: 'null' }))
      : success()
  );
}

/** Alias of {@link required}. */
export function notNull<T>(): ValidationRule<T> {
  return required<T>();
}

export function oneOf<T>(...allowed: T[]): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    allowed.includes(value)
      ? success()
      : failure(
          validationError({
            propertyName,
            message: `Value must be one of: ${listing(allowed)}`,
            actualValue: String(value),
          })
        )
  );
}

export function noneOf<T>(...forbidden: T[]): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    forbidden.includes(value)
      ? failure(
          validationError({
            propertyName,
            message: `Value must not be one of: ${listing(forbidden)}`,
            actualValue: String(value),
          })
        )
      : success()
  );
}

export function equalTo<T>(expected: T): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    value === expected
      ? success()
      : failure(
          validationError({
            propertyName,
            message: `Value must equal: ${String(expected)}`,
            actualValue: String(value),
            expectedValue: String(expected),
          })
        )
  );
}

export function notEqualTo<T>(forbidden: T): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    value === forbidden
      ? failure(
          validationError({
            propertyName,
            message: `Value must not equal: ${String(forbidden)}`,
            actualValue: String(value),
          })
        )
      : success()
  );
}

/**
 * Rule from a predicate over the value.
 *
 * @param predicate - Returns true for valid values.
 * @param message - Error message on failure.
 * @param expectedValue - Optional description of valid values.
 */
export function custom<T>(
  predicate: (value: T) => boolean,
  message: string,
  expectedValue?: string
): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    predicate(value)
      ? success()
      : failure(
          validationError({
            propertyName,
            message,
            actualValue: String(value),
            ...(expectedValue !== undefined && { expectedValue }),
          })
        )
  );
}

/**
 * Rule from a predicate that can also read other properties.
 */
export function customWithContext<T>(
  predicate: (value: T, context: PropertyContext) => boolean,
  message: string
): ValidationRule<T> {
  return createRule<T>((propertyName, value, context) =>
    predicate(value, context)
      ? success()
      : failure(validationError({ propertyName, message, actualValue: String(value) }))
  );
}

function ordered<T extends Comparable>(
  test: (value: T) => boolean,
  message: string,
  expectedValue: string
): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    test(value)
      ? success()
      : failure(
          validationError({ propertyName, message, actualValue: renderValue(value), expectedValue })
        )
  );
}

/**
 * Inclusive range over any ordered value: numbers, bigints, strings
 * (code-unit order) or dates.
 *
 * @throws InvalidDefinitionError when `minimum` orders after `maximum`.
 */
export function comparableBetween<T extends Comparable>(minimum: T, maximum: T): ValidationRule<T> {
  const low = renderValue(minimum);
  const high = renderValue(maximum);
  if (compareValues(minimum, maximum) > 0) {
    throw new InvalidDefinitionError(`comparableBetween: min ${low} exceeds max ${high}`);
  }
  return ordered<T>(
    (value) => compareValues(value, minimum) >= 0 && compareValues(value, maximum) <= 0,
    `Value must be between ${low} and ${high}`,
    `[${low}, ${high}]`
  );
}

export function comparableGreaterThan<T extends Comparable>(threshold: T): ValidationRule<T> {
  const shown = renderValue(threshold);
  return ordered<T>(
    (value) => compareValues(value, threshold) > 0,
    `Value must be greater than ${shown}`,
    `> ${shown}`
  );
}

export function comparableLessThan<T extends Comparable>(threshold: T): ValidationRule<T> {
  const shown = renderValue(threshold);
  return ordered<T>(
    (value) => compareValues(value, threshold) < 0,
    `Value must be less than ${shown}`,
    `< ${shown}`
  );
}
