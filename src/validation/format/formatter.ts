/**
 * Renders a validation result as text for humans or tools.
 */

import type { ValidationResult } from '../result.js';

export interface ValidationFormatter {
  format(result: ValidationResult): string;
}
