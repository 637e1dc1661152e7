/**
 * Ordering constraints between two properties of the same comparable type.
 *
 * Each rule passes when either value is absent or fails to convert.
 *
 * @packageDocumentation
 */

import type { PropertyType } from '../../converter/types.js';
import { createMultiPropertyRule } from '../multi-property-rule.js';
import type { MultiPropertyRule } from '../multi-property-rule.js';
import { failure, success, validationError } from '../result.js';

/** Values that can be ordered. */
export type Comparable = number | bigint | string | Date;

function ordinal(value: Comparable): number | bigint | string {
  return value instanceof Date ? value.getTime() : value;
}

/**
 * Orders two comparable values: negative, zero or positive.
 */
export function compareValues(a: Comparable, b: Comparable): number {
  const x = ordinal(a);
  const y = ordinal(b);
  if (typeof x === 'string' || typeof y === 'string') {
    const xs = String(x);
    const ys = String(y);
    return xs < ys ? -1 : xs > ys ? 1 : 0;
  }
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Renders a comparable value the way it appears in error messages.
 */
export function renderValue(value: Comparable): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

type Relation = 'lt' | 'le';

function relationship<T extends Comparable>(
  first: string,
  second: string,
  type: PropertyType<T>,
  relation: Relation
): MultiPropertyRule {
  return createMultiPropertyRule((_names, context) => {
    const a = context.getTypedProperty(first, type);
    const b = context.getTypedProperty(second, type);
    if (a === undefined || b === undefined) {
      return success();
    }
    const order = compareValues(a, b);
    const holds = relation === 'lt' ? order < 0 : order <= 0;
    if (holds) {
      return success();
    }
    return failure(
      validationError({
        propertyName: first,
        message:
          relation === 'lt'
            ? `${first} must be less than ${second}`
            : `${first} must be less than or equal to ${second}`,
        actualValue: renderValue(a),
        expectedValue:
          relation === 'lt' ? `Value less than ${renderValue(b)}` : `Value <= ${renderValue(b)}`,
      })
    );
  });
}

/** `first < second`, reported on `first`. */
export function lessThan<T extends Comparable>(
  first: string,
  second: string,
  type: PropertyType<T>
): MultiPropertyRule {
  return relationship(first, second, type, 'lt');
}

/** `first <= second`, reported on `first`. */
export function lessThanOrEqual<T extends Comparable>(
  first: string,
  second: string,
  type: PropertyType<T>
): MultiPropertyRule {
  return relationship(first, second, type, 'le');
}

/** `first > second`, checked as `second < first` and reported on `second`. */
export function greaterThan<T extends Comparable>(
  first: string,
  second: string,
  type: PropertyType<T>
): MultiPropertyRule {
  return lessThan(second, first, type);
}

/** `first >= second`, checked as `second <= first` and reported on `second`. */
export function greaterThanOrEqual<T extends Comparable>(
  first: string,
  second: string,
  type: PropertyType<T>
): MultiPropertyRule {
  return lessThanOrEqual(second, first, type);
}
