/**
 * Read-only property context handed to rules, conditions and default
 * providers.
 *
 * @packageDocumentation
 */

import type { PropertyType } from '../converter/types.js';
import type { TypeConverterRegistry } from '../converter/registry.js';

/**
 * Every validation phase, in declaration order.
 */
export const VALIDATION_CONTEXT_TYPES = [
  'startup',
  'runtime_override',
  'persisted',
  'testing',
] as const;

/** Phase in which validation runs. */
export type ValidationContextType = (typeof VALIDATION_CONTEXT_TYPES)[number];

/**
 * Type guard for {@link ValidationContextType}.
 *
 * @param value - The value to check.
 */
export function isValidationContextType(value: unknown): value is ValidationContextType {
  return typeof value === 'string' && VALIDATION_CONTEXT_TYPES.some((type) => type === value);
}

/**
 * Flat string property values, either as a map or as a plain record.
 */
export type PropertyValues = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

function isPropertyMap(values: PropertyValues): values is ReadonlyMap<string, string> {
  return values instanceof Map;
}

/**
 * Copies property values into a new map. Records contribute their own
 * enumerable entries only.
 *
 * @param values - Property values.
 * @returns A fresh map owned by the caller.
 */
export function toPropertyMap(values: PropertyValues): Map<string, string> {
  if (isPropertyMap(values)) {
    return new Map(values);
  }
  return new Map(Object.entries(values));
}

/**
 * Converts a property map back into a plain record.
 *
 * @param values - Property map.
 * @returns A new record.
 */
export function toPropertyRecord(values: ReadonlyMap<string, string>): Record<string, string> {
  return Object.fromEntries(values);
}

/**
 * Read-only view over the properties being validated or defaulted.
 */
export interface PropertyContext {
  /** Phase in which the context was created. */
  readonly contextType: ValidationContextType;

  /**
   * Raw value of a property.
   *
   * @param name - Property name.
   */
  getProperty(name: string): string | undefined;

  /**
   * Value of a property converted to a type. Absent or unconvertible values
   * yield undefined.
   *
   * @param name - Property name.
   * @param type - Target type tag.
   */
  getTypedProperty<T>(name: string, type: PropertyType<T>): T | undefined;

  /** All properties in the context. */
  getAllProperties(): ReadonlyMap<string, string>;

  /**
   * Whether the property is present (an empty string counts as present).
   *
   * @param name - Property name.
   */
  hasProperty(name: string): boolean;

  /**
   * Metadata value for a key.
   *
   * @param key - Metadata key.
   */
  getMetadata(key: string): string | undefined;
}

/**
 * Options for {@link createPropertyContext}.
 */
export interface PropertyContextOptions {
  /** Property values visible through the context. */
  readonly properties: PropertyValues;
  /** Converter registry used for typed access. */
  readonly converters: TypeConverterRegistry;
  /** @defaultValue 'startup' */
  readonly contextType?: ValidationContextType;
  /** String key/value side channel. */
  readonly metadata?: PropertyValues;
}

class SnapshotPropertyContext implements PropertyContext {
  constructor(
    private readonly properties: ReadonlyMap<string, string>,
    private readonly metadata: ReadonlyMap<string, string>,
    private readonly converters: TypeConverterRegistry,
    public readonly contextType: ValidationContextType
  ) {}

  getProperty(name: string): string | undefined {
    return this.properties.get(name);
  }

  getTypedProperty<T>(name: string, type: PropertyType<T>): T | undefined {
    const raw = this.properties.get(name);
    return raw === undefined ? undefined : this.converters.convert(raw, type);
  }

  getAllProperties(): ReadonlyMap<string, string> {
    return this.properties;
  }

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  getMetadata(key: string): string | undefined {
    return this.metadata.get(key);
  }
}

/**
 * Creates a context over a snapshot of the given values. Later changes to the
 * caller's map are not visible through the context.
 *
 * @param options - Context options.
 * @returns The context.
 */
export function createPropertyContext(options: PropertyContextOptions): PropertyContext {
  return new SnapshotPropertyContext(
    toPropertyMap(options.properties),
    options.metadata === undefined ? new Map() : toPropertyMap(options.metadata),
    options.converters,
    options.contextType ?? 'startup'
  );
}

/**
 * Predicate over a property context.
 */
export type Condition = (context: PropertyContext) => boolean;
