/**
 * JSON rendering of validation results.
 *
 * @packageDocumentation
 */

import type { ValidationError, ValidationResult } from '../result.js';
import type { ValidationFormatter } from './formatter.js';

interface JsonError {
  readonly propertyName: string;
  readonly errorMessage: string;
  readonly actualValue?: string;
  readonly expectedValue?: string;
  readonly errorCode?: string;
  readonly suggestion?: string;
}

function toJsonError(error: ValidationError): JsonError {
  return {
    propertyName: error.propertyName,
    errorMessage: error.message,
    ...(error.actualValue !== undefined && { actualValue: error.actualValue }),
    ...(error.expectedValue !== undefined && { expectedValue: error.expectedValue }),
    ...(error.code !== undefined && { errorCode: error.code }),
    ...(error.suggestion !== undefined && { suggestion: error.suggestion }),
  };
}

/**
 * Formats a result as pretty-printed JSON with `valid`, `errorCount` and
 * `errors`. Optional error fields are omitted when unset.
 */
export class JsonValidationFormatter implements ValidationFormatter {
  format(result: ValidationResult): string {
    return JSON.stringify(
      {
        valid: result.valid,
        errorCount: result.errors.length,
        errors: result.errors.map(toJsonError),
      },
      null,
      2
    );
  }
}
