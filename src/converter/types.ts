/**
 * Type tags and converter signatures.
 *
 * @packageDocumentation
 */

/**
 * Type tag of a property value.
 *
 * The tag's `name` keys the converter in a {@link TypeConverterRegistry}, and
 * `is` confirms that a converted value really has the tagged type.
 *
 * @typeParam T - Runtime type of values carrying this tag.
 */
export interface PropertyType<T> {
  /** Unique tag name (e.g., 'integer'). */
  readonly name: string;

  /**
   * Type guard for values of this tag.
   *
   * @param value - The value to check.
   */
  is(value: unknown): value is T;
}

/**
 * Parses a raw property string, returning `undefined` when the string is not
 * a valid representation.
 */
export type TypeConverter<T> = (raw: string) => T | undefined;

/**
 * Creates a type tag.
 *
 * @param name - Unique tag name.
 * @param guard - Type guard for values of the tag.
 * @returns The type tag.
 *
 * @example
 * ```typescript
 * const PERCENT = definePropertyType('percent', (v): v is number =>
 *   typeof v === 'number' && v >= 0 && v <= 100
 * );
 * ```
 */
export function definePropertyType<T>(
  name: string,
  guard: (value: unknown) => value is T
): PropertyType<T> {
  return Object.freeze({
    name,
    is: guard,
  });
}
