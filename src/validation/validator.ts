/**
 * Validates property values against a registry.
 *
 * @packageDocumentation
 */

import { createPropertyContext } from '../context/context.js';
import type {
  PropertyContext,
  PropertyValues,
  ValidationContextType,
} from '../context/context.js';
import { TypeConverterRegistry } from '../converter/registry.js';
import type { PropertyDefinition } from '../schema/definition.js';
import type { PropertyRegistry } from '../schema/registry.js';
import { resolveLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { validateGroup } from './group.js';
import type { PropertyGroup } from './group.js';
import { ERROR_CODES, failure, success, validationError } from './result.js';
import type { ValidationError, ValidationResult } from './result.js';

/**
 * What a required property whose value fails conversion reports.
 *
 * - `conversion-only`: a single conversion error
 * - `conversion-and-missing`: the conversion error followed by a
 *   missing-required error
 */
export type ConversionFailureMode = 'conversion-only' | 'conversion-and-missing';

export const CONVERSION_FAILURE_MODES: readonly ConversionFailureMode[] = [
  'conversion-only',
  'conversion-and-missing',
];

/**
 * Validates property maps.
 */
export interface PropertyValidator {
  /**
   * Validates every registered property and group.
   *
   * @param properties - Values to validate (defaults already applied).
   * @param contextType - Validation phase.
   */
  validate(properties: PropertyValues, contextType?: ValidationContextType): ValidationResult;

  /**
   * Validates a single registered property.
   *
   * @param propertyName - The property.
   * @param value - Its raw value, or undefined when absent.
   * @param properties - All values, visible to the property's rule.
   */
  validateProperty(
    propertyName: string,
    value: string | undefined,
    properties: PropertyValues
  ): ValidationResult;

  /**
   * Evaluates a group's rules against the values.
   *
   * @param group - The group; it need not be registered.
   * @param properties - Values to validate.
   */
  validatePropertyGroup(group: PropertyGroup, properties: PropertyValues): ValidationResult;
}

/**
 * Options for {@link DefaultPropertyValidator}.
 */
export interface PropertyValidatorOptions {
  /** Converters for property types. A registry with built-ins by default. */
  readonly converters?: TypeConverterRegistry;
  /** Metadata visible to rules and conditions. */
  readonly metadata?: PropertyValues;
  /** @defaultValue 'conversion-only' */
  readonly conversionFailure?: ConversionFailureMode;
  readonly logger?: Logger;
}

function isMissing(raw: string | undefined): raw is undefined | '' {
  return raw === undefined || raw.length === 0;
}

function requiredMissing(propertyName: string): ValidationError {
  return validationError({
    propertyName,
    message: 'Required property is missing',
    expectedValue: 'Non-null value',
    code: ERROR_CODES.REQUIRED_MISSING,
  });
}

function conversionFailed(propertyName: string, raw: string, typeName: string): ValidationError {
  return validationError({
    propertyName,
    message: 'Type conversion failed',
    actualValue: raw,
    expectedValue: `Value of type ${typeName}`,
    code: ERROR_CODES.TYPE_CONVERSION_FAILED,
  });
}

/**
 * Validator over a frozen registry.
 *
 * Property checks run in the registry's validation order and group checks run
 * afterwards. All failures are collected: a failing property never suppresses
 * the checks of properties that depend on it.
 */
export class DefaultPropertyValidator implements PropertyValidator {
  private readonly converters: TypeConverterRegistry;
  private readonly metadata: PropertyValues;
  private readonly conversionFailure: ConversionFailureMode;
  private readonly logger: Logger;

  constructor(
    private readonly registry: PropertyRegistry,
    options: PropertyValidatorOptions = {}
  ) {
    this.converters = options.converters ?? new TypeConverterRegistry();
    this.metadata = options.metadata ?? new Map<string, string>();
    this.conversionFailure = options.conversionFailure ?? 'conversion-only';
    this.logger = resolveLogger('PropertyValidator', options.logger);
  }

  validate(
    properties: PropertyValues,
    contextType: ValidationContextType = 'startup'
  ): ValidationResult {
    const context = this.createContext(properties, contextType);
    const errors: ValidationError[] = [];

    for (const name of this.registry.getValidationOrder()) {
      const definition = this.registry.getProperty(name);
      if (definition !== undefined) {
        const result = this.validateDefinition(definition, context.getProperty(name), context);
        errors.push(...result.errors);
      }
    }

    for (const group of this.registry.getAllPropertyGroups()) {
      errors.push(...validateGroup(group, context).errors);
    }

    this.logger.debug('validation_completed', {
      contextType,
      propertyCount: context.getAllProperties().size,
      errorCount: errors.length,
    });

    return errors.length === 0 ? success() : failure(errors);
  }

  validateProperty(
    propertyName: string,
    value: string | undefined,
    properties: PropertyValues
  ): ValidationResult {
    const definition = this.registry.getProperty(propertyName);
    if (definition === undefined) {
      return failure(
        validationError({
          propertyName,
          message: 'Unknown property',
          ...(value !== undefined && { actualValue: value }),
          expectedValue: 'Property is not defined in the registry',
          code: ERROR_CODES.UNKNOWN_PROPERTY,
        })
      );
    }
    return this.validateDefinition(definition, value, this.createContext(properties, 'startup'));
  }

  validatePropertyGroup(group: PropertyGroup, properties: PropertyValues): ValidationResult {
    return validateGroup(group, this.createContext(properties, 'startup'));
  }

  private createContext(
    properties: PropertyValues,
    contextType: ValidationContextType
  ): PropertyContext {
    return createPropertyContext({
      properties,
      converters: this.converters,
      contextType,
      metadata: this.metadata,
    });
  }

  private validateDefinition<T>(
    definition: PropertyDefinition<T>,
    raw: string | undefined,
    context: PropertyContext
  ): ValidationResult {
    if (isMissing(raw)) {
      return definition.required ? failure(requiredMissing(definition.name)) : success();
    }

    if (definition.deprecation !== undefined) {
      this.logger.warn('deprecated_property_used', {
        property: definition.name,
        ...(definition.deprecation.message !== undefined && {
          message: definition.deprecation.message,
        }),
        ...(definition.deprecation.replacement !== undefined && {
          replacement: definition.deprecation.replacement,
        }),
      });
    }

    const value = this.converters.convert(raw, definition.type);
    if (value === undefined) {
      const conversionError = conversionFailed(definition.name, raw, definition.type.name);
      return definition.required && this.conversionFailure === 'conversion-and-missing'
        ? failure([conversionError, requiredMissing(definition.name)])
        : failure(conversionError);
    }

    return definition.validationRule?.validate(definition.name, value, context) ?? success();
  }
}
