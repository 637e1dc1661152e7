/**
 * Rules that validate a relationship between several properties.
 *
 * @packageDocumentation
 */

import type { Condition, PropertyContext } from '../context/context.js';
import { InvalidDefinitionError } from '../schema/errors.js';
import { failure, success, validationError } from './result.js';
import type { ValidationResult } from './result.js';
import { firstFailure, firstSuccess, orElse } from './rule.js';

/**
 * Check function behind a {@link MultiPropertyRule}.
 */
export type MultiRuleCheck = (
  propertyNames: readonly string[],
  context: PropertyContext
) => ValidationResult;

/**
 * Validates a relationship between several properties read from the context.
 */
export interface MultiPropertyRule {
  /**
   * Validates the relationship.
   *
   * @param propertyNames - Names of the properties involved (usually a group's).
   * @param context - Context over all input values.
   */
  validate(propertyNames: readonly string[], context: PropertyContext): ValidationResult;

  and(other: MultiPropertyRule): MultiPropertyRule;

  or(other: MultiPropertyRule): MultiPropertyRule;

  onlyIf(condition: Condition): MultiPropertyRule;
}

/**
 * Creates a composable multi-property rule from a check function.
 *
 * @param check - The check.
 * @returns The rule.
 */
export function createMultiPropertyRule(check: MultiRuleCheck): MultiPropertyRule {
  return Object.freeze({
    validate: check,
    and: (other: MultiPropertyRule) =>
      createMultiPropertyRule((names, context) =>
        firstFailure([() => check(names, context), () => other.validate(names, context)])
      ),
    or: (other: MultiPropertyRule) =>
      createMultiPropertyRule((names, context) =>
        orElse(
          () => check(names, context),
          () => other.validate(names, context)
        )
      ),
    onlyIf: (condition: Condition) =>
      createMultiPropertyRule((names, context) =>
        condition(context) ? check(names, context) : success()
      ),
  });
}

/**
 * Every rule must pass; stops at the first failure.
 *
 * @throws InvalidDefinitionError when no rule is given.
 */
export function allOfMulti(...rules: MultiPropertyRule[]): MultiPropertyRule {
  if (rules.length === 0) {
    throw new InvalidDefinitionError('allOfMulti requires at least one rule');
  }
  return createMultiPropertyRule((names, context) =>
    firstFailure(rules.map((rule) => () => rule.validate(names, context)))
  );
}

/**
 * At least one rule must pass; otherwise every rule's errors are reported.
 *
 * @throws InvalidDefinitionError when no rule is given.
 */
export function anyOfMulti(...rules: MultiPropertyRule[]): MultiPropertyRule {
  if (rules.length === 0) {
    throw new InvalidDefinitionError('anyOfMulti requires at least one rule');
  }
  return createMultiPropertyRule((names, context) =>
    firstSuccess(rules.map((rule) => () => rule.validate(names, context)))
  );
}

export function alwaysValidMulti(): MultiPropertyRule {
  return createMultiPropertyRule(() => success());
}

export function alwaysFailsMulti(message: string): MultiPropertyRule {
  return createMultiPropertyRule((names) =>
    failure(validationError({ propertyName: names[0] ?? 'unknown', message }))
  );
}
