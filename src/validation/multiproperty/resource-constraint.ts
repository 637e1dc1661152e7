/**
 * Request/limit and range constraints for resource settings.
 *
 * @packageDocumentation
 */

import { PropertyTypes } from '../../converter/registry.js';
import type { PropertyType } from '../../converter/types.js';
import type { MultiPropertyRule } from '../multi-property-rule.js';
import { lessThan, lessThanOrEqual } from './numeric-relationship.js';
import type { Comparable } from './numeric-relationship.js';

/** CPU request must not exceed the CPU limit (integers). */
export function cpuRequestLimit(requestProperty: string, limitProperty: string): MultiPropertyRule {
  return lessThanOrEqual(requestProperty, limitProperty, PropertyTypes.INTEGER);
}

/**
 * Memory request must not exceed the memory limit (long integers).
 *
 * Values above `Number.MAX_SAFE_INTEGER` (about 8 PiB as a byte count) do not
 * convert as LONG, so the rule skips them. Use `lessThanOrEqual` with
 * `PropertyTypes.BIGINT` for larger sizes.
 */
export function memoryRequestLimit(
  requestProperty: string,
  limitProperty: string
): MultiPropertyRule {
  return lessThanOrEqual(requestProperty, limitProperty, PropertyTypes.LONG);
}

/** The minimum must be strictly below the maximum. */
export function validRange<T extends Comparable>(
  minProperty: string,
  maxProperty: string,
  type: PropertyType<T>
): MultiPropertyRule {
  return lessThan(minProperty, maxProperty, type);
}
