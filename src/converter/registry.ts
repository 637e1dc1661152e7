/**
 * Type converter registry and built-in property types.
 *
 * A registry is an explicit value passed to validators, default appliers and
 * contexts. There is no process-wide instance.
 *
 * @packageDocumentation
 */

import { definePropertyType } from './types.js';
import type { PropertyType, TypeConverter } from './types.js';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

const TRUE_WORDS: ReadonlySet<string> = new Set(['true', 'yes', '1']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['false', 'no', '0']);

/**
 * Built-in property types.
 */
export const PropertyTypes = {
  /** Raw string, never fails to convert. */
  STRING: definePropertyType('string', (v): v is string => typeof v === 'string'),
  /** 32-bit signed integer. */
  INTEGER: definePropertyType(
    'integer',
    (v): v is number => typeof v === 'number' && Number.isInteger(v) && v >= INT32_MIN && v <= INT32_MAX
  ),
  /** Integer within the safe integer range. */
  LONG: definePropertyType('long', (v): v is number => Number.isSafeInteger(v)),
  /** Finite floating point number. */
  NUMBER: definePropertyType(
    'number',
    (v): v is number => typeof v === 'number' && Number.isFinite(v)
  ),
  /** Boolean written as true/yes/1 or false/no/0, case-insensitive. */
  BOOLEAN: definePropertyType('boolean', (v): v is boolean => typeof v === 'boolean'),
  /** Arbitrary precision integer. */
  BIGINT: definePropertyType('bigint', (v): v is bigint => typeof v === 'bigint'),
  /** Absolute URL. */
  URL: definePropertyType('url', (v): v is URL => v instanceof URL),
  /** ISO-8601 date or date-time. */
  DATE: definePropertyType(
    'date',
    (v): v is Date => v instanceof Date && !Number.isNaN(v.getTime())
  ),
} as const;

function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return value >= INT32_MIN && value <= INT32_MAX ? value : undefined;
}

function parseLong(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : undefined;
}

function parseNumber(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parses a boolean word (true/yes/1, false/no/0), trimmed and case-insensitive.
 *
 * @param raw - The raw string.
 * @returns The boolean, or undefined when the word is not recognized.
 */
export function parseBooleanWord(raw: string): boolean | undefined {
  const word = raw.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) {
    return true;
  }
  if (FALSE_WORDS.has(word)) {
    return false;
  }
  return undefined;
}

function parseBigInt(raw: string): bigint | undefined {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return undefined;
  }
  return BigInt(trimmed.startsWith('+') ? trimmed.slice(1) : trimmed);
}

function parseUrl(raw: string): URL | undefined {
  try {
    return new URL(raw.trim());
  } catch {
    return undefined;
  }
}

function parseDate(raw: string): Date | undefined {
  const trimmed = raw.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = new Date(trimmed);
  return Number.isNaN(value.getTime()) ? undefined : value;
}

/**
 * Options for a {@link TypeConverterRegistry}.
 */
export interface TypeConverterRegistryOptions {
  /**
   * Whether the built-in {@link PropertyTypes} converters are registered.
   * @defaultValue true
   */
  readonly builtIns?: boolean;
}

/**
 * Converts raw property strings into typed values.
 *
 * @example
 * ```typescript
 * const converters = new TypeConverterRegistry();
 * converters.convert('8080', PropertyTypes.INTEGER); // 8080
 * converters.convert('abc', PropertyTypes.INTEGER); // undefined
 * ```
 */
export class TypeConverterRegistry {
  private readonly converters = new Map<string, (raw: string) => unknown>();

  /**
   * Creates a registry.
   *
   * @param options - Registry options.
   */
  constructor(options: TypeConverterRegistryOptions = {}) {
    if (options.builtIns ?? true) {
      this.register(PropertyTypes.STRING, (raw) => raw);
      this.register(PropertyTypes.INTEGER, parseInteger);
      this.register(PropertyTypes.LONG, parseLong);
      this.register(PropertyTypes.NUMBER, parseNumber);
      this.register(PropertyTypes.BOOLEAN, parseBooleanWord);
      this.register(PropertyTypes.BIGINT, parseBigInt);
      this.register(PropertyTypes.URL, parseUrl);
      this.register(PropertyTypes.DATE, parseDate);
    }
  }

  /**
   * Registers (or replaces) the converter for a type tag.
   *
   * @param type - The type tag.
   * @param converter - Parser for raw strings.
   * @returns This registry, for chaining.
   */
  register<T>(type: PropertyType<T>, converter: TypeConverter<T>): this {
    this.converters.set(type.name, converter);
    return this;
  }

  /**
   * Whether a converter is registered for the tag.
   *
   * @param type - The type tag.
   */
  hasConverter(type: PropertyType<unknown>): boolean {
    return this.converters.has(type.name);
  }

  /**
   * Converts a raw string to the tag's type.
   *
   * Yields undefined when no converter is registered, when the converter
   * rejects the string, or when its result fails the tag's type guard.
   *
   * @param raw - The raw string.
   * @param type - The target type tag.
   * @returns The converted value, or undefined.
   */
  convert<T>(raw: string, type: PropertyType<T>): T | undefined {
    const converter = this.converters.get(type.name);
    if (converter === undefined) {
      return undefined;
    }
    const value = converter(raw);
    return value !== undefined && type.is(value) ? value : undefined;
  }
}
