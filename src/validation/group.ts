/**
 * Property groups: named sets of properties validated together by
 * multi-property rules.
 *
 * @packageDocumentation
 */

import type { PropertyContext } from '../context/context.js';
import { EmptyPropertyGroupError, InvalidDefinitionError } from '../schema/errors.js';
import type { MultiPropertyRule } from './multi-property-rule.js';
import { combineResults } from './result.js';
import type { ValidationResult } from './result.js';

/**
 * Immutable group of related properties.
 */
export interface PropertyGroup {
  readonly name: string;
  /** Ordered, non-empty list of member property names. */
  readonly propertyNames: readonly string[];
  readonly rules: readonly MultiPropertyRule[];
  readonly description?: string;
}

/**
 * Builder for {@link PropertyGroup}.
 *
 * @example
 * ```typescript
 * const pool = propertyGroup('pool')
 *   .addProperties('pool.min', 'pool.max')
 *   .addRule(NumericRelationshipRules.lessThanOrEqual('pool.min', 'pool.max', PropertyTypes.INTEGER))
 *   .build();
 * ```
 */
export class PropertyGroupBuilder {
  private readonly name: string;
  private readonly propertyNames: string[] = [];
  private readonly rules: MultiPropertyRule[] = [];
  private groupDescription: string | undefined;

  /**
   * @param name - Group name.
   * @throws InvalidDefinitionError when the name is blank.
   */
  constructor(name: string) {
    if (name.trim().length === 0) {
      throw new InvalidDefinitionError('Property group name must not be blank');
    }
    this.name = name;
  }

  addProperty(propertyName: string): this {
    this.propertyNames.push(propertyName);
    return this;
  }

  addProperties(...propertyNames: string[]): this {
    this.propertyNames.push(...propertyNames);
    return this;
  }

  addRule(rule: MultiPropertyRule): this {
    this.rules.push(rule);
    return this;
  }

  description(description: string): this {
    this.groupDescription = description;
    return this;
  }

  /**
   * Builds the group.
   *
   * @throws EmptyPropertyGroupError when no property was added.
   */
  build(): PropertyGroup {
    if (this.propertyNames.length === 0) {
      throw new EmptyPropertyGroupError(this.name);
    }
    return Object.freeze({
      name: this.name,
      propertyNames: Object.freeze([...this.propertyNames]),
      rules: Object.freeze([...this.rules]),
      ...(this.groupDescription !== undefined && { description: this.groupDescription }),
    });
  }
}

/**
 * Starts building a property group.
 *
 * @param name - Group name.
 */
export function propertyGroup(name: string): PropertyGroupBuilder {
  return new PropertyGroupBuilder(name);
}

/**
 * Evaluates every rule of the group against the context, aggregating
 * failures in rule order.
 *
 * @param group - The group.
 * @param context - Context over all input values.
 * @returns The combined result.
 */
export function validateGroup(group: PropertyGroup, context: PropertyContext): ValidationResult {
  return combineResults(...group.rules.map((rule) => rule.validate(group.propertyNames, context)));
}
