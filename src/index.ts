/**
 * propguard
 *
 * Dependency-aware validation and conditional defaults for flat,
 * string-typed configuration properties.
 *
 * @example
 * ```typescript
 * import { defineProperty, PropertyTypes, registryBuilder, createEngine, NumericRules } from 'propguard';
 *
 * const registry = registryBuilder()
 *   .register(
 *     defineProperty(PropertyTypes.INTEGER)
 *       .name('server.port')
 *       .defaultValue(8080)
 *       .validationRule(NumericRules.port())
 *       .build()
 *   )
 *   .build();
 *
 * const { properties } = createEngine(registry).check({});
 * properties.get('server.port'); // '8080'
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './converter/index.js';
export * from './context/index.js';
export * from './schema/index.js';
export * from './defaults/index.js';
export * from './validation/index.js';
export * from './cache/index.js';
export * from './settings/index.js';
export * from './engine/index.js';
export { Logger, resolveLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
