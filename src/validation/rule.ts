/**
 * Single-property validation rules and their composition algebra.
 *
 * @packageDocumentation
 */

import type { Condition, PropertyContext } from '../context/context.js';
import { InvalidDefinitionError } from '../schema/errors.js';
import { failure, success, validationError } from './result.js';
import type { ValidationError, ValidationResult } from './result.js';

/**
 * Check function behind a {@link ValidationRule}.
 */
export type RuleCheck<T> = (
  propertyName: string,
  value: T,
  context: PropertyContext
) => ValidationResult;

/**
 * Validates one converted property value.
 *
 * Composition never mutates the receiver; each operation returns a new rule.
 *
 * @typeParam T - Converted value type.
 */
export interface ValidationRule<T> {
  /**
   * Validates a value.
   *
   * @param propertyName - Name reported in errors.
   * @param value - Converted value.
   * @param context - Context over all input values.
   */
  validate(propertyName: string, value: T, context: PropertyContext): ValidationResult;

  /** Runs `other` only when this rule passes. */
  and(other: ValidationRule<T>): ValidationRule<T>;

  /** Runs `other` only when this rule fails; a double failure yields `other`'s result. */
  or(other: ValidationRule<T>): ValidationRule<T>;

  /** Runs this rule only when the condition holds; passes otherwise. */
  onlyIf(condition: Condition): ValidationRule<T>;
}

/** A deferred evaluation step. */
export type Step = () => ValidationResult;

/**
 * Runs steps left to right, stopping at the first failure.
 */
export function firstFailure(steps: readonly Step[]): ValidationResult {
  for (const step of steps) {
    const result = step();
    if (!result.valid) {
      return result;
    }
  }
  return success();
}

/**
 * Runs steps left to right, stopping at the first success. When every step
 * fails, the errors of all steps are returned in order.
 */
export function firstSuccess(steps: readonly Step[]): ValidationResult {
  const errors: ValidationError[] = [];
  for (const step of steps) {
    const result = step();
    if (result.valid) {
      return result;
    }
    errors.push(...result.errors);
  }
  return failure(errors);
}

/**
 * Runs the first step and, only if it fails, the second, returning the
 * second step's result.
 */
export function orElse(first: Step, second: Step): ValidationResult {
  const result = first();
  return result.valid ? result : second();
}

/**
 * Creates a composable rule from a check function.
 *
 * @param check - The check.
 * @returns The rule.
 *
 * @example
 * ```typescript
 * const even = createRule<number>((name, value) =>
 *   value % 2 === 0 ? success() : failure(validationError({ propertyName: name, message: 'Must be even' }))
 * );
 * ```
 */
export function createRule<T>(check: RuleCheck<T>): ValidationRule<T> {
  const rule: ValidationRule<T> = Object.freeze({
    validate: check,
    and: (other: ValidationRule<T>) =>
      createRule<T>((name, value, context) =>
        firstFailure([
          () => check(name, value, context),
          () => other.validate(name, value, context),
        ])
      ),
    or: (other: ValidationRule<T>) =>
      createRule<T>((name, value, context) =>
        orElse(
          () => check(name, value, context),
          () => other.validate(name, value, context)
        )
      ),
    onlyIf: (condition: Condition) =>
      createRule<T>((name, value, context) =>
        condition(context) ? check(name, value, context) : success()
      ),
  });
  return rule;
}

function requireRules(count: number, combinator: string): void {
  if (count === 0) {
    throw new InvalidDefinitionError(`${combinator} requires at least one rule`);
  }
}

/**
 * Every rule must pass; stops at the first failure.
 *
 * @throws InvalidDefinitionError when no rule is given.
 */
export function allOf<T>(...rules: ValidationRule<T>[]): ValidationRule<T> {
  requireRules(rules.length, 'allOf');
  return createRule<T>((name, value, context) =>
    firstFailure(rules.map((rule) => () => rule.validate(name, value, context)))
  );
}

/**
 * At least one rule must pass; stops at the first success and otherwise
 * reports every rule's errors.
 *
 * @throws InvalidDefinitionError when no rule is given.
 */
export function anyOf<T>(...rules: ValidationRule<T>[]): ValidationRule<T> {
  requireRules(rules.length, 'anyOf');
  return createRule<T>((name, value, context) =>
    firstSuccess(rules.map((rule) => () => rule.validate(name, value, context)))
  );
}

export function alwaysValid<T>(): ValidationRule<T> {
  return createRule<T>(() => success());
}

export function alwaysFails<T>(message: string): ValidationRule<T> {
  return createRule<T>((name) => failure(validationError({ propertyName: name, message })));
}
