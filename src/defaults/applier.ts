/**
 * Applies default values to user-supplied properties.
 *
 * @packageDocumentation
 */

import { createPropertyContext, toPropertyMap } from '../context/context.js';
import type { PropertyValues, ValidationContextType } from '../context/context.js';
import { TypeConverterRegistry } from '../converter/registry.js';
import type { PropertyRegistry } from '../schema/registry.js';
import { resolveLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { DefaultApplicationInfo } from './info.js';

/**
 * Merged properties plus the record of applied defaults.
 */
export interface DefaultApplicationResult {
  /** User values plus applied defaults. */
  readonly properties: ReadonlyMap<string, string>;
  readonly info: DefaultApplicationInfo;
}

/**
 * Options for {@link DefaultValueApplier}.
 */
export interface DefaultValueApplierOptions {
  /** Converters for typed context access. A registry with built-ins by default. */
  readonly converters?: TypeConverterRegistry;
  /** Metadata visible to default providers. */
  readonly metadata?: PropertyValues;
  readonly logger?: Logger;
}

/**
 * Renders a default value as a property string. Dates use ISO-8601.
 */
export function stringifyDefault(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Fills in defaults for properties the user did not supply.
 *
 * Providers see only the user-supplied values: a default never observes
 * another default produced in the same pass.
 */
export class DefaultValueApplier {
  private readonly converters: TypeConverterRegistry;
  private readonly metadata: PropertyValues;
  private readonly logger: Logger;

  constructor(
    private readonly registry: PropertyRegistry,
    options: DefaultValueApplierOptions = {}
  ) {
    this.converters = options.converters ?? new TypeConverterRegistry();
    this.metadata = options.metadata ?? new Map<string, string>();
    this.logger = resolveLogger('DefaultValueApplier', options.logger);
  }

  /**
   * Applies defaults in registration order. The input is never modified.
   *
   * @param userValues - User-supplied values.
   * @param contextType - Phase passed to providers.
   * @returns The merged properties and the applied defaults.
   */
  applyDefaults(
    userValues: PropertyValues,
    contextType: ValidationContextType = 'startup'
  ): DefaultApplicationResult {
    const supplied = toPropertyMap(userValues);
    const context = createPropertyContext({
      properties: supplied,
      converters: this.converters,
      contextType,
      metadata: this.metadata,
    });
    const merged = new Map(supplied);
    const applied = new Map<string, string>();

    for (const definition of this.registry.getAllProperties()) {
      if (supplied.has(definition.name) || definition.defaultValue === undefined) {
        continue;
      }
      const value = definition.defaultValue.compute(context);
      if (value === undefined || value === null) {
        continue;
      }
      const rendered = stringifyDefault(value);
      merged.set(definition.name, rendered);
      applied.set(definition.name, rendered);
    }

    if (this.logger.isDebugEnabled) {
      this.logger.debug('defaults_applied', {
        contextType,
        appliedCount: applied.size,
        properties: [...applied.keys()],
      });
    }

    return { properties: merged, info: new DefaultApplicationInfo(applied) };
  }
}
