/**
 * Reusable conditions over a property context.
 *
 * Conditions gate rules (`onlyIf`) and override default providers (`when`).
 *
 * @packageDocumentation
 */

import type { PropertyType } from '../converter/types.js';
import { parseBooleanWord } from '../converter/registry.js';
import type { Condition, ValidationContextType } from './context.js';

/**
 * True when the property equals the value exactly.
 */
export function propertyEquals(name: string, value: string): Condition {
  return (context) => context.getProperty(name) === value;
}

/**
 * True when the property is absent or differs from the value.
 */
export function propertyNotEquals(name: string, value: string): Condition {
  return (context) => context.getProperty(name) !== value;
}

/**
 * True when the property is present and not blank.
 */
export function propertyIsPresent(name: string): Condition {
  return (context) => (context.getProperty(name) ?? '').trim().length > 0;
}

/**
 * True when the property is absent or blank.
 */
export function propertyIsAbsent(name: string): Condition {
  return (context) => (context.getProperty(name) ?? '').trim().length === 0;
}

/**
 * True when the property reads as true (true/yes/1, trimmed, any case).
 */
export function propertyIsTrue(name: string): Condition {
  return (context) => {
    const raw = context.getProperty(name);
    return raw !== undefined && parseBooleanWord(raw) === true;
  };
}

/**
 * True when the property reads as false (false/no/0, trimmed, any case).
 */
export function propertyIsFalse(name: string): Condition {
  return (context) => {
    const raw = context.getProperty(name);
    return raw !== undefined && parseBooleanWord(raw) === false;
  };
}

/**
 * True when the raw value is present and satisfies the predicate.
 */
export function propertyMatches(name: string, predicate: (value: string) => boolean): Condition {
  return (context) => {
    const raw = context.getProperty(name);
    return raw !== undefined && predicate(raw);
  };
}

/**
 * True when the value converts to the type and the converted value satisfies
 * the predicate.
 */
export function typedPropertyMatches<T>(
  name: string,
  type: PropertyType<T>,
  predicate: (value: T) => boolean
): Condition {
  return (context) => {
    const value = context.getTypedProperty(name, type);
    return value !== undefined && predicate(value);
  };
}

/**
 * True when the property equals one of the values.
 */
export function propertyOneOf(name: string, ...values: string[]): Condition {
  const allowed = new Set(values);
  return (context) => {
    const raw = context.getProperty(name);
    return raw !== undefined && allowed.has(raw);
  };
}

/**
 * True when the metadata key equals the value.
 */
export function metadataEquals(key: string, value: string): Condition {
  return (context) => context.getMetadata(key) === value;
}

/**
 * True when the metadata key is set.
 */
export function metadataIsPresent(key: string): Condition {
  return (context) => context.getMetadata(key) !== undefined;
}

/**
 * True when the context was created for the given phase.
 */
export function contextTypeIs(contextType: ValidationContextType): Condition {
  return (context) => context.contextType === contextType;
}

/**
 * True when every named property is present and not blank.
 */
export function allPropertiesPresent(...names: string[]): Condition {
  const checks = names.map(propertyIsPresent);
  return (context) => checks.every((check) => check(context));
}

/**
 * True when at least one named property is present and not blank.
 */
export function anyPropertyPresent(...names: string[]): Condition {
  const checks = names.map(propertyIsPresent);
  return (context) => checks.some((check) => check(context));
}

export function not(condition: Condition): Condition {
  return (context) => !condition(context);
}

export function and(...conditions: Condition[]): Condition {
  return (context) => conditions.every((condition) => condition(context));
}

export function or(...conditions: Condition[]): Condition {
  return (context) => conditions.some((condition) => condition(context));
}

export function alwaysTrue(): Condition {
  return () => true;
}

export function alwaysFalse(): Condition {
  return () => false;
}
