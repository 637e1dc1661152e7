/**
 * Semantic validation for engine settings.
 *
 * The parser checks field types; this module checks value ranges and reports
 * every problem through the engine's own {@link ValidationResult}.
 *
 * @packageDocumentation
 */

import { isValidationContextType } from '../context/context.js';
import { combineResults, failure, success, validationError } from '../validation/result.js';
import type { ValidationError, ValidationResult } from '../validation/result.js';
import { CONVERSION_FAILURE_MODES } from '../validation/validator.js';
import type { EngineSettings } from './types.js';

/**
 * Error thrown when settings fail validation.
 */
export class SettingsValidationError extends Error {
  /** All validation errors. */
  public readonly errors: readonly ValidationError[];

  constructor(errors: readonly ValidationError[]) {
    const details = errors.map((e) => `  - ${e.propertyName}: ${e.message}`).join('\n');
    super(`Settings validation failed with ${String(errors.length)} error(s):\n${details}`);
    this.name = 'SettingsValidationError';
    this.errors = errors;
  }
}

function check(valid: boolean, propertyName: string, message: string, actual: unknown): ValidationResult {
  return valid
    ? success()
    : failure(validationError({ propertyName, message, actualValue: String(actual) }));
}

/**
 * Validates settings values.
 *
 * @param settings - The settings to check.
 * @returns The aggregated result.
 */
export function validateSettings(settings: EngineSettings): ValidationResult {
  const { cache, validation } = settings;
  return combineResults(
    check(
      Number.isInteger(cache.max_size) && cache.max_size >= 1,
      'cache.max_size',
      'Must be a positive integer',
      cache.max_size
    ),
    check(
      Number.isFinite(cache.ttl_ms) && cache.ttl_ms > 0,
      'cache.ttl_ms',
      'Must be a positive number of milliseconds',
      cache.ttl_ms
    ),
    check(
      isValidationContextType(validation.context_type),
      'validation.context_type',
      'Unknown validation context type',
      validation.context_type
    ),
    check(
      CONVERSION_FAILURE_MODES.includes(validation.conversion_failure),
      'validation.conversion_failure',
      'Unknown conversion failure mode',
      validation.conversion_failure
    )
  );
}

/**
 * Validates settings and throws when they are invalid.
 *
 * @throws SettingsValidationError listing every problem.
 */
export function assertSettingsValid(settings: EngineSettings): void {
  const result = validateSettings(settings);
  if (!result.valid) {
    throw new SettingsValidationError(result.errors);
  }
}
