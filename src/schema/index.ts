/**
 * Schema definition: property definitions, the registry and build-time errors.
 *
 * @packageDocumentation
 */

export { defineProperty, PropertyDefinitionBuilder } from './definition.js';
export type { PropertyDefinition, AnyPropertyDefinition } from './definition.js';
export { PropertyRegistryBuilder, registryBuilder } from './registry.js';
export type { PropertyRegistry, RegistryBuilderOptions } from './registry.js';
export { buildDependencyGraph, topologicalSort, findCycle } from './graph.js';
export type { DependencyGraph, TopologicalSortResult } from './graph.js';
export { PROPERTY_CATEGORIES, isPropertyCategory } from './types.js';
export type { PropertyCategory, Deprecation } from './types.js';
export {
  SchemaDefinitionError,
  DuplicateRegistrationError,
  UndefinedDependencyError,
  CircularDependencyError,
  EmptyPropertyGroupError,
  InvalidDefinitionError,
} from './errors.js';
export type { RegistrationKind } from './errors.js';
