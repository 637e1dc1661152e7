/**
 * Schema vocabulary shared by definitions and the registry.
 *
 * @packageDocumentation
 */

/**
 * Categories a property can be filed under.
 */
export const PROPERTY_CATEGORIES = [
  'general',
  'networking',
  'security',
  'database',
  'performance',
  'logging',
  'feature_flags',
  'ui',
  'integration',
  'storage',
  'business_logic',
] as const;

/** Category of a property. */
export type PropertyCategory = (typeof PROPERTY_CATEGORIES)[number];

/**
 * Type guard for {@link PropertyCategory}.
 *
 * @param value - The value to check.
 */
export function isPropertyCategory(value: unknown): value is PropertyCategory {
  return typeof value === 'string' && PROPERTY_CATEGORIES.some((category) => category === value);
}

/**
 * Deprecation metadata of a property.
 */
export interface Deprecation {
  /** Explanation shown when the property is used. */
  readonly message?: string;
  /** Name of the property that replaces this one. */
  readonly replacement?: string;
}
