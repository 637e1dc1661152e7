/**
 * Exclusivity constraints over a fixed list of properties.
 *
 * A property counts as set when it is present and not blank.
 *
 * @packageDocumentation
 */

import type { PropertyContext } from '../../context/context.js';
import { InvalidDefinitionError } from '../../schema/errors.js';
import { createMultiPropertyRule } from '../multi-property-rule.js';
import type { MultiPropertyRule } from '../multi-property-rule.js';
import { failure, success, validationError } from '../result.js';

/**
 * Whether the property is present and not blank.
 */
export function isSet(context: PropertyContext, name: string): boolean {
  return (context.getProperty(name) ?? '').trim().length > 0;
}

/**
 * @throws InvalidDefinitionError when fewer than two names are given.
 */
export function mutuallyExclusive(...names: string[]): MultiPropertyRule {
  if (names.length < 2) {
    throw new InvalidDefinitionError('At least 2 properties are required for mutual exclusivity');
  }
  return createMultiPropertyRule((_names, context) => {
    const present = names.filter((name) => isSet(context, name));
    const [firstPresent] = present;
    if (present.length <= 1 || firstPresent === undefined) {
      return success();
    }
    return failure(
      validationError({
        propertyName: firstPresent,
        message: `Only one of [${names.join(', ')}] can be set, but found: ${present.join(', ')}`,
      })
    );
  });
}

/**
 * @throws InvalidDefinitionError when no name is given.
 */
export function atLeastOneRequired(...names: string[]): MultiPropertyRule {
  const [first] = names;
  if (first === undefined) {
    throw new InvalidDefinitionError('At least 1 property is required');
  }
  return createMultiPropertyRule((_names, context) =>
    names.some((name) => isSet(context, name))
      ? success()
      : failure(
          validationError({
            propertyName: first,
            message: `At least one of [${names.join(', ')}] must be set`,
          })
        )
  );
}

/**
 * Exactly one of the properties must be set.
 *
 * @throws InvalidDefinitionError when fewer than two names are given.
 */
export function exactlyOneRequired(...names: string[]): MultiPropertyRule {
  if (names.length < 2) {
    throw new InvalidDefinitionError('At least 2 properties are required');
  }
  return atLeastOneRequired(...names).and(mutuallyExclusive(...names));
}
