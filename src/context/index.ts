/**
 * Property contexts and conditions.
 *
 * @packageDocumentation
 */

export {
  VALIDATION_CONTEXT_TYPES,
  isValidationContextType,
  toPropertyMap,
  toPropertyRecord,
  createPropertyContext,
} from './context.js';
export type {
  ValidationContextType,
  PropertyValues,
  PropertyContext,
  PropertyContextOptions,
  Condition,
} from './context.js';
export * as Conditions from './conditions.js';
