/**
 * Type conversion for raw property strings.
 *
 * @packageDocumentation
 */

export { definePropertyType } from './types.js';
export type { PropertyType, TypeConverter } from './types.js';
export { PropertyTypes, TypeConverterRegistry, parseBooleanWord } from './registry.js';
export type { TypeConverterRegistryOptions } from './registry.js';
