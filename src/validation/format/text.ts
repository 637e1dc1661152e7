/**
 * Plain-text rendering of validation results.
 *
 * @packageDocumentation
 */

import type { ValidationError, ValidationResult } from '../result.js';
import type { ValidationFormatter } from './formatter.js';

const INDENT = '  ';

function errorLines(index: number, error: ValidationError): string[] {
  const lines = [`Error ${index}: ${error.propertyName}`, `${INDENT}Message: ${error.message}`];
  if (error.actualValue !== undefined) {
    lines.push(`${INDENT}Actual: ${error.actualValue}`);
  }
  if (error.expectedValue !== undefined) {
    lines.push(`${INDENT}Expected: ${error.expectedValue}`);
  }
  if (error.code !== undefined) {
    lines.push(`${INDENT}Code: ${error.code}`);
  }
  if (error.suggestion !== undefined) {
    lines.push(`${INDENT}Suggestion: ${error.suggestion}`);
  }
  return lines;
}

/**
 * Formats a result as numbered, indented error blocks.
 *
 * @example
 * ```
 * Validation failed with 1 error:
 *
 * Error 1: server.port
 *   Message: Value must be between 1 and 65535
 *   Actual: 70000
 *   Expected: [1, 65535]
 * ```
 */
export class TextValidationFormatter implements ValidationFormatter {
  format(result: ValidationResult): string {
    if (result.valid) {
      return 'Validation passed: 0 errors';
    }
    const count = result.errors.length;
    const blocks = result.errors.map((error, i) => errorLines(i + 1, error).join('\n'));
    const header = `Validation failed with ${count} ${count === 1 ? 'error' : 'errors'}:`;
    return `${header}\n\n${blocks.join('\n\n')}`;
  }
}
