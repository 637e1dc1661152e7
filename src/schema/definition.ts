/**
 * Property definitions and their builder.
 *
 * @packageDocumentation
 */

import type { PropertyType } from '../converter/types.js';
import type { ConditionalDefault } from '../defaults/conditional-default.js';
import { staticValue } from '../defaults/conditional-default.js';
import type { ValidationRule } from '../validation/rule.js';
import { InvalidDefinitionError } from './errors.js';
import type { Deprecation, PropertyCategory } from './types.js';

/**
 * Immutable schema entry for one property.
 *
 * @typeParam T - Converted value type.
 */
export interface PropertyDefinition<T> {
  readonly name: string;
  readonly type: PropertyType<T>;
  readonly description?: string;
  readonly validationRule?: ValidationRule<T>;
  readonly defaultValue?: ConditionalDefault<T>;
  readonly required: boolean;
  readonly category: PropertyCategory;
  /** Properties that must be validated before this one. */
  readonly dependsOnForValidation: ReadonlySet<string>;
  /** Lower values are validated earlier among properties that are ready. */
  readonly validationOrder: number;
  /** Present when the property is deprecated. */
  readonly deprecation?: Deprecation;
}

/** A definition of any value type, as stored in a registry. */
export type AnyPropertyDefinition = PropertyDefinition<unknown>;

/**
 * Builder for {@link PropertyDefinition}.
 *
 * @example
 * ```typescript
 * const port = defineProperty(PropertyTypes.INTEGER)
 *   .name('server.port')
 *   .validationRule(NumericRules.port())
 *   .defaultValue(8080)
 *   .category('networking')
 *   .build();
 * ```
 */
export class PropertyDefinitionBuilder<T> {
  private propertyName: string | undefined;
  private propertyDescription: string | undefined;
  private rule: ValidationRule<T> | undefined;
  private provider: ConditionalDefault<T> | undefined;
  private isRequired = false;
  private propertyCategory: PropertyCategory = 'general';
  private readonly dependencies = new Set<string>();
  private order = 0;
  private deprecationInfo: Deprecation | undefined;

  constructor(private readonly type: PropertyType<T>) {}

  name(name: string): this {
    this.propertyName = name;
    return this;
  }

  description(description: string): this {
    this.propertyDescription = description;
    return this;
  }

  validationRule(rule: ValidationRule<T>): this {
    this.rule = rule;
    return this;
  }

  /** Sets a static default value. */
  defaultValue(value: T): this {
    this.provider = staticValue(value);
    return this;
  }

  /** Sets a default provider. */
  defaultProvider(provider: ConditionalDefault<T>): this {
    this.provider = provider;
    return this;
  }

  required(required = true): this {
    this.isRequired = required;
    return this;
  }

  category(category: PropertyCategory): this {
    this.propertyCategory = category;
    return this;
  }

  dependsOnForValidation(...names: string[]): this {
    for (const name of names) {
      this.dependencies.add(name);
    }
    return this;
  }

  validationOrder(order: number): this {
    this.order = order;
    return this;
  }

  /**
   * Marks the property deprecated.
   *
   * @param message - Explanation shown when the property is used.
   * @param replacement - Name of the replacing property.
   */
  deprecated(message?: string, replacement?: string): this {
    this.deprecationInfo = {
      ...(message !== undefined && { message }),
      ...(replacement !== undefined && { replacement }),
    };
    return this;
  }

  /**
   * Builds the definition.
   *
   * @throws InvalidDefinitionError when the name is missing or blank, or the
   * validation order is not an integer.
   */
  build(): PropertyDefinition<T> {
    const name = this.propertyName;
    if (name === undefined || name.trim().length === 0) {
      throw new InvalidDefinitionError('Property name must not be blank');
    }
    if (!Number.isInteger(this.order)) {
      throw new InvalidDefinitionError(
        `Validation order of '${name}' must be an integer, got ${String(this.order)}`
      );
    }
    return Object.freeze({
      name,
      type: this.type,
      required: this.isRequired,
      category: this.propertyCategory,
      dependsOnForValidation: new Set(this.dependencies),
      validationOrder: this.order,
      ...(this.propertyDescription !== undefined && { description: this.propertyDescription }),
      ...(this.rule !== undefined && { validationRule: this.rule }),
      ...(this.provider !== undefined && { defaultValue: this.provider }),
      ...(this.deprecationInfo !== undefined && {
        deprecation: Object.freeze({ ...this.deprecationInfo }),
      }),
    });
  }
}

/**
 * Starts building a property definition of the given type.
 *
 * @param type - Value type tag.
 */
export function defineProperty<T>(type: PropertyType<T>): PropertyDefinitionBuilder<T> {
  return new PropertyDefinitionBuilder(type);
}
