/**
 * Rules over string values.
 *
 * @packageDocumentation
 */

import { InvalidDefinitionError } from '../../schema/errors.js';
import { failure, success, validationError } from '../result.js';
import type { ValidationError } from '../result.js';
import { createRule } from '../rule.js';
import type { ValidationRule } from '../rule.js';

const EMAIL_PATTERN = /^[A-Za-z0-9+_.-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

function check(
  test: (value: string) => boolean,
  describe: (name: string, value: string) => ValidationError
): ValidationRule<string> {
  return createRule<string>((name, value) =>
    test(value) ? success() : failure(describe(name, value))
  );
}

export function notBlank(): ValidationRule<string> {
  return check(
    (value) => value.trim().length > 0,
    (propertyName, value) =>
      validationError({ propertyName, message: 'Value cannot be blank', actualValue: `"${value}"` })
  );
}

export function notEmpty(): ValidationRule<string> {
  return check(
    (value) => value.length > 0,
    (propertyName) =>
      validationError({ propertyName, message: 'Value cannot be empty', actualValue: '""' })
  );
}

export function minLength(min: number): ValidationRule<string> {
  return check(
    (value) => value.length >= min,
    (propertyName, value) =>
      validationError({
        propertyName,
        message: `Value length must be at least ${min}`,
        actualValue: String(value.length),
        expectedValue: `>= ${min}`,
      })
  );
}

export function maxLength(max: number): ValidationRule<string> {
  return check(
    (value) => value.length <= max,
    (propertyName, value) =>
      validationError({
        propertyName,
        message: `Value length must not exceed ${max}`,
        actualValue: String(value.length),
        expectedValue: `<= ${max}`,
      })
  );
}

/**
 * @throws InvalidDefinitionError when `min` exceeds `max`.
 */
export function lengthBetween(min: number, max: number): ValidationRule<string> {
  if (min > max) {
    throw new InvalidDefinitionError(`lengthBetween: min ${min} exceeds max ${max}`);
  }
  return check(
    (value) => value.length >= min && value.length <= max,
    (propertyName, value) =>
      validationError({
        propertyName,
        message: `Value length must be between ${min} and ${max}`,
        actualValue: String(value.length),
        expectedValue: `[${min}, ${max}]`,
      })
  );
}

/**
 * The whole value must match the pattern.
 *
 * @param pattern - Regular expression source or instance. Flags of an
 * instance are kept except `g` and `y`.
 */
export function matchesRegex(pattern: string | RegExp): ValidationRule<string> {
  const source = typeof pattern === 'string' ? pattern : pattern.source;
  const flags = typeof pattern === 'string' ? '' : pattern.flags.replace(/[gy]/g, '');
  const whole = new RegExp(`^(?:${source})$`, flags);
  return check(
    (value) => whole.test(value),
    (propertyName, value) =>
      validationError({
        propertyName,
        message: `Value does not match pattern: ${source}`,
        actualValue: value,
      })
  );
}

/** {@link matchesRegex} for a prebuilt expression. */
export function matchesPattern(pattern: RegExp): ValidationRule<string> {
  return matchesRegex(pattern);
}

export function email(): ValidationRule<string> {
  return check(
    (value) => EMAIL_PATTERN.test(value),
    (propertyName, value) =>
      validationError({
        propertyName,
        message: 'Value is not a valid email address',
        actualValue: value,
      })
  );
}

export function url(): ValidationRule<string> {
  return check(
    (value) => URL.canParse(value),
    (propertyName, value) =>
      validationError({ propertyName, message: 'Value is not a valid URL', actualValue: value })
  );
}

export function startsWith(prefix: string): ValidationRule<string> {
  return check(
    (value) => value.startsWith(prefix),
    (propertyName, value) =>
      validationError({ propertyName, message: `Value must start with: ${prefix}`, actualValue: value })
  );
}

export function endsWith(suffix: string): ValidationRule<string> {
  return check(
    (value) => value.endsWith(suffix),
    (propertyName, value) =>
      validationError({ propertyName, message: `Value must end with: ${suffix}`, actualValue: value })
  );
}

export function contains(substring: string): ValidationRule<string> {
  return check(
    (value) => value.includes(substring),
    (propertyName, value) =>
      validationError({ propertyName, message: `Value must contain: ${substring}`, actualValue: value })
  );
}

export function doesNotContain(substring: string): ValidationRule<string> {
  return check(
    (value) => !value.includes(substring),
    (propertyName, value) =>
      validationError({
        propertyName,
        message: `Value must not contain: ${substring}`,
        actualValue: value,
      })
  );
}

export function alphanumeric(): ValidationRule<string> {
  return matchesRegex('[a-zA-Z0-9]+');
}

export function alphabetic(): ValidationRule<string> {
  return matchesRegex('[a-zA-Z]+');
}

/** Digits only. */
export function numeric(): ValidationRule<string> {
  return matchesRegex('[0-9]+');
}

export function lowercase(): ValidationRule<string> {
  return check(
    (value) => value === value.toLowerCase(),
    (propertyName, value) =>
      validationError({ propertyName, message: 'Value must be lowercase', actualValue: value })
  );
}

export function uppercase(): ValidationRule<string> {
  return check(
    (value) => value === value.toUpperCase(),
    (propertyName, value) =>
      validationError({ propertyName, message: 'Value must be uppercase', actualValue: value })
  );
}
