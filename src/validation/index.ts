/**
 * Validation results, rules, groups, the validator and formatters.
 *
 * @packageDocumentation
 */

export {
  ERROR_CODES,
  validationError,
  success,
  failure,
  combineResults,
  validationErrorsEqual,
} from './result.js';
export type { ErrorCode, ValidationError, ValidationResult } from './result.js';
export { createRule, allOf, anyOf, alwaysValid, alwaysFails } from './rule.js';
export type { RuleCheck, ValidationRule } from './rule.js';
export {
  createMultiPropertyRule,
  allOfMulti,
  anyOfMulti,
  alwaysValidMulti,
  alwaysFailsMulti,
} from './multi-property-rule.js';
export type { MultiRuleCheck, MultiPropertyRule } from './multi-property-rule.js';
export { PropertyGroupBuilder, propertyGroup, validateGroup } from './group.js';
export type { PropertyGroup } from './group.js';
export { DefaultPropertyValidator, CONVERSION_FAILURE_MODES } from './validator.js';
export type {
  PropertyValidator,
  PropertyValidatorOptions,
  ConversionFailureMode,
} from './validator.js';
export { TextValidationFormatter } from './format/text.js';
export { JsonValidationFormatter } from './format/json.js';
export type { ValidationFormatter } from './format/formatter.js';
export * as StringRules from './rules/string.js';
export * as NumericRules from './rules/numeric.js';
export * as GeneralRules from './rules/general.js';
export * as FileRules from './rules/file.js';
export * as NumericRelationshipRules from './multiproperty/numeric-relationship.js';
export * as ExclusivityRules from './multiproperty/exclusivity.js';
export * as ConditionalRequirementRules from './multiproperty/conditional-requirement.js';
export * as ResourceConstraintRules from './multiproperty/resource-constraint.js';
