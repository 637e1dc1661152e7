/**
 * Validation results and errors.
 *
 * @packageDocumentation
 */

/**
 * Machine codes attached to errors produced by the validator itself.
 */
export const ERROR_CODES = {
  REQUIRED_MISSING: 'REQUIRED_MISSING',
  TYPE_CONVERSION_FAILED: 'TYPE_CONVERSION_FAILED',
  UNKNOWN_PROPERTY: 'UNKNOWN_PROPERTY',
} as const;

/** Code produced by the validator itself. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * A single validation failure.
 */
export interface ValidationError {
  /** Property the failure is reported on. */
  readonly propertyName: string;
  /** Human-readable description. */
  readonly message: string;
  /** The offending value, as written. */
  readonly actualValue?: string;
  /** Description of what was expected. */
  readonly expectedValue?: string;
  /** Machine-readable code. */
  readonly code?: string;
  /** Hint for fixing the value. */
  readonly suggestion?: string;
}

/**
 * Outcome of a validation: valid with no errors, or invalid with at least one.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: readonly ValidationError[];
}

const SUCCESS: ValidationResult = Object.freeze({ valid: true, errors: Object.freeze([]) });

/**
 * Creates a frozen validation error.
 *
 * @param fields - The error fields.
 * @returns The error.
 */
export function validationError(fields: ValidationError): ValidationError {
  return Object.freeze({ ...fields });
}

/**
 * The valid result.
 */
export function success(): ValidationResult {
  return SUCCESS;
}

/**
 * Creates an invalid result.
 *
 * @param errors - One error, or a non-empty list.
 * @returns The invalid result.
 * @throws RangeError if the list is empty.
 */
export function failure(errors: ValidationError | readonly ValidationError[]): ValidationResult {
  const list: readonly ValidationError[] = isErrorList(errors) ? errors : [errors];
  if (list.length === 0) {
    throw new RangeError('A failed validation result needs at least one error');
  }
  return Object.freeze({ valid: false, errors: Object.freeze([...list]) });
}

function isErrorList(
  errors: ValidationError | readonly ValidationError[]
): errors is readonly ValidationError[] {
  return Array.isArray(errors);
}

/**
 * Combines results: valid iff every result is valid, errors concatenated in
 * order.
 *
 * @param results - Results to combine.
 * @returns The combined result.
 */
export function combineResults(...results: readonly ValidationResult[]): ValidationResult {
  const errors = results.flatMap((result) => result.errors);
  return errors.length === 0 ? SUCCESS : failure(errors);
}

/**
 * Field-by-field equality of two errors.
 */
export function validationErrorsEqual(a: ValidationError, b: ValidationError): boolean {
  return (
    a.propertyName === b.propertyName &&
    a.message === b.message &&
    a.actualValue === b.actualValue &&
    a.expectedValue === b.expectedValue &&
    a.code === b.code &&
    a.suggestion === b.suggestion
  );
}
