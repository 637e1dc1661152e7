/**
 * Rules over numeric values.
 *
 * Comparison rules accept both `number` and `bigint` values; divisibility
 * rules take integers.
 *
 * @packageDocumentation
 */

import { InvalidDefinitionError } from '../../schema/errors.js';
import { failure, success, validationError } from '../result.js';
import { createRule } from '../rule.js';
import type { ValidationRule } from '../rule.js';

/** Numeric value accepted by comparison rules. */
export type NumericValue = number | bigint;

function compare<T extends NumericValue>(
  test: (value: T) => boolean,
  message: string,
  expectedValue?: string
): ValidationRule<T> {
  return createRule<T>((propertyName, value) =>
    test(value)
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

export function positive(): ValidationRule<NumericValue> {
  return compare<NumericValue>((value) => value > 0, 'Value must be positive', '> 0');
}

export function negative(): ValidationRule<NumericValue> {
  return compare<NumericValue>((value) => value < 0, 'Value must be negative', '< 0');
}

export function nonNegative(): ValidationRule<NumericValue> {
  return compare<NumericValue>((value) => value >= 0, 'Value must be non-negative', '>= 0');
}

export function nonPositive(): ValidationRule<NumericValue> {
  return compare<NumericValue>((value) => value <= 0, 'Value must be non-positive', '<= 0');
}

export function zero(): ValidationRule<NumericValue> {
  // 0n == 0 holds, 0n === 0 does not
  return compare<NumericValue>((value) => value <= 0 && value >= 0, 'Value must be zero', '0');
}

export function min(minimum: number): ValidationRule<NumericValue> {
  return compare<NumericValue>(
    (value) => value >= minimum,
    `Value must be at least ${minimum}`,
    `>= ${minimum}`
  );
}

export function max(maximum: number): ValidationRule<NumericValue> {
  return compare<NumericValue>(
    (value) => value <= maximum,
    `Value must not exceed ${maximum}`,
    `<= ${maximum}`
  );
}

/**
 * Inclusive range.
 *
 * @throws InvalidDefinitionError when `minimum` exceeds `maximum`.
 */
export function between(minimum: number, maximum: number): ValidationRule<NumericValue> {
  if (minimum > maximum) {
    throw new InvalidDefinitionError(`between: min ${minimum} exceeds max ${maximum}`);
  }
  return compare<NumericValue>(
    (value) => value >= minimum && value <= maximum,
    `Value must be between ${minimum} and ${maximum}`,
    `[${minimum}, ${maximum}]`
  );
}

export function greaterThan(threshold: number): ValidationRule<NumericValue> {
  return compare<NumericValue>(
    (value) => value > threshold,
    `Value must be greater than ${threshold}`,
    `> ${threshold}`
  );
}

export function lessThan(threshold: number): ValidationRule<NumericValue> {
  return compare<NumericValue>(
    (value) => value < threshold,
    `Value must be less than ${threshold}`,
    `< ${threshold}`
  );
}

export function greaterThanOrEqualTo(threshold: number): ValidationRule<NumericValue> {
  return min(threshold);
}

export function lessThanOrEqualTo(threshold: number): ValidationRule<NumericValue> {
  return max(threshold);
}

/**
 * Inclusive range over 32-bit integers.
 *
 * @throws InvalidDefinitionError when a bound is not a 32-bit integer or
 * `minimum` exceeds `maximum`.
 */
export function integerBetween(minimum: number, maximum: number): ValidationRule<number> {
  for (const bound of [minimum, maximum]) {
    if (!Number.isInteger(bound) || bound < -2147483648 || bound > 2147483647) {
      throw new InvalidDefinitionError(`integerBetween: ${bound} is not a 32-bit integer`);
    }
  }
  return ranged<number>('integerBetween', minimum, maximum);
}

/**
 * Inclusive range over long values. Bigint bounds cover values beyond the
 * safe integer range.
 *
 * @throws InvalidDefinitionError when `minimum` exceeds `maximum`.
 */
export function longBetween(minimum: NumericValue, maximum: NumericValue): ValidationRule<NumericValue> {
  return ranged<NumericValue>('longBetween', minimum, maximum);
}

function ranged<T extends NumericValue>(
  rule: string,
  minimum: NumericValue,
  maximum: NumericValue
): ValidationRule<T> {
  if (minimum > maximum) {
    throw new InvalidDefinitionError(`${rule}: min ${minimum} exceeds max ${maximum}`);
  }
  return compare<T>(
    (value) => value >= minimum && value <= maximum,
    `Value must be between ${minimum} and ${maximum}`,
    `[${minimum}, ${maximum}]`
  );
}

/** TCP/UDP port, 1 to 65535. */
export function port(): ValidationRule<NumericValue> {
  return between(1, 65535);
}

export function even(): ValidationRule<number> {
  return compare<number>((value) => value % 2 === 0, 'Value must be even');
}

export function odd(): ValidationRule<number> {
  return compare<number>((value) => Math.abs(value % 2) === 1, 'Value must be odd');
}

/**
 * @throws InvalidDefinitionError when the divisor is zero.
 */
export function multipleOf(divisor: number): ValidationRule<number> {
  if (divisor === 0) {
    throw new InvalidDefinitionError('multipleOf: divisor must not be zero');
  }
  return compare<number>(
    (value) => value % divisor === 0,
    `Value must be a multiple of ${divisor}`
  );
}
