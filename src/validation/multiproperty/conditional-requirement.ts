/**
 * Requirements that depend on other properties being set.
 *
 * @packageDocumentation
 */

import { InvalidDefinitionError } from '../../schema/errors.js';
import { createMultiPropertyRule } from '../multi-property-rule.js';
import type { MultiPropertyRule } from '../multi-property-rule.js';
import { failure, success, validationError } from '../result.js';
import { isSet } from './exclusivity.js';

/**
 * When `ifProperty` is set, `thenProperty` must be set too.
 */
export function ifThen(ifProperty: string, thenProperty: string): MultiPropertyRule {
  return createMultiPropertyRule((_names, context) =>
    !isSet(context, ifProperty) || isSet(context, thenProperty)
      ? success()
      : failure(
          validationError({
            propertyName: thenProperty,
            message: `Property ${thenProperty} is required when ${ifProperty} is set`,
          })
        )
  );
}

/**
 * Either every property is set or none is. A partial set is reported on the
 * first missing property.
 *
 * @throws InvalidDefinitionError when fewer than two names are given.
 */
export function allOrNothing(...names: string[]): MultiPropertyRule {
  if (names.length < 2) {
    throw new InvalidDefinitionError('At least 2 properties are required');
  }
  return createMultiPropertyRule((_names, context) => {
    const present = names.filter((name) => isSet(context, name));
    const missing = names.filter((name) => !isSet(context, name));
    const [firstMissing] = missing;
    if (present.length === 0 || firstMissing === undefined) {
      return success();
    }
    return failure(
      validationError({
        propertyName: firstMissing,
        message:
          `All of [${names.join(', ')}] must be set together, or none at all. ` +
          `Present: [${present.join(', ')}], Missing: [${missing.join(', ')}]`,
      })
    );
  });
}
