/**
 * Property registry and its builder.
 *
 * The builder collects definitions and groups, checks that every validation
 * dependency exists and that dependencies are acyclic, then freezes into a
 * {@link PropertyRegistry} that never changes afterwards.
 *
 * @packageDocumentation
 */

import { resolveLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { PropertyGroup } from '../validation/group.js';
import type { AnyPropertyDefinition, PropertyDefinition } from './definition.js';
import {
  CircularDependencyError,
  DuplicateRegistrationError,
  UndefinedDependencyError,
} from './errors.js';
import { buildDependencyGraph, findCycle, topologicalSort } from './graph.js';

/**
 * Immutable, queryable collection of property definitions and groups.
 */
export interface PropertyRegistry {
  getProperty(name: string): AnyPropertyDefinition | undefined;
  isDefined(name: string): boolean;
  /** Definitions in registration order. */
  getAllProperties(): readonly AnyPropertyDefinition[];
  /** Property names in registration order. */
  getAllPropertyNames(): readonly string[];
  getPropertyGroup(name: string): PropertyGroup | undefined;
  /** Groups in registration order. */
  getAllPropertyGroups(): readonly PropertyGroup[];
  /**
   * Property names in validation order: every property comes after the
   * properties it depends on.
   */
  getValidationOrder(): readonly string[];
}

class FrozenPropertyRegistry implements PropertyRegistry {
  private readonly properties: ReadonlyMap<string, AnyPropertyDefinition>;
  private readonly groups: ReadonlyMap<string, PropertyGroup>;
  private readonly propertyList: readonly AnyPropertyDefinition[];
  private readonly propertyNames: readonly string[];
  private readonly groupList: readonly PropertyGroup[];
  private readonly validationOrder: readonly string[];

  constructor(
    properties: ReadonlyMap<string, AnyPropertyDefinition>,
    groups: ReadonlyMap<string, PropertyGroup>,
    validationOrder: readonly string[]
  ) {
    this.properties = new Map(properties);
    this.groups = new Map(groups);
    this.propertyList = Object.freeze([...properties.values()]);
    this.propertyNames = Object.freeze([...properties.keys()]);
    this.groupList = Object.freeze([...groups.values()]);
    this.validationOrder = Object.freeze([...validationOrder]);
  }

  getProperty(name: string): AnyPropertyDefinition | undefined {
    return this.properties.get(name);
  }

  isDefined(name: string): boolean {
    return this.properties.has(name);
  }

  getAllProperties(): readonly AnyPropertyDefinition[] {
    return this.propertyList;
  }

  getAllPropertyNames(): readonly string[] {
    return this.propertyNames;
  }

  getPropertyGroup(name: string): PropertyGroup | undefined {
    return this.groups.get(name);
  }

  getAllPropertyGroups(): readonly PropertyGroup[] {
    return this.groupList;
  }

  getValidationOrder(): readonly string[] {
    return this.validationOrder;
  }
}

/**
 * Options for {@link PropertyRegistryBuilder}.
 */
export interface RegistryBuilderOptions {
  /** Logger used for build diagnostics. */
  readonly logger?: Logger;
}

/**
 * Collects definitions and groups and builds a {@link PropertyRegistry}.
 *
 * @example
 * ```typescript
 * const registry = new PropertyRegistryBuilder()
 *   .register(poolMin)
 *   .register(poolMax)
 *   .registerGroup(poolGroup)
 *   .build();
 * ```
 */
export class PropertyRegistryBuilder {
  private readonly properties = new Map<string, AnyPropertyDefinition>();
  private readonly groups = new Map<string, PropertyGroup>();
  private readonly logger: Logger;

  constructor(options: RegistryBuilderOptions = {}) {
    this.logger = resolveLogger('PropertyRegistry', options.logger);
  }

  /**
   * Registers a property definition.
   *
   * @throws DuplicateRegistrationError when the name is already registered.
   */
  register<T>(definition: PropertyDefinition<T>): this {
    if (this.properties.has(definition.name)) {
      throw new DuplicateRegistrationError('property', definition.name);
    }
    this.properties.set(definition.name, definition);
    return this;
  }

  /**
   * Registers a property group.
   *
   * @throws DuplicateRegistrationError when the group name is already registered.
   */
  registerGroup(group: PropertyGroup): this {
    if (this.groups.has(group.name)) {
      throw new DuplicateRegistrationError('group', group.name);
    }
    this.groups.set(group.name, group);
    return this;
  }

  /**
   * Builds the registry.
   *
   * @throws UndefinedDependencyError when a dependency is not registered.
   * @throws CircularDependencyError when dependencies form a cycle.
   */
  build(): PropertyRegistry {
    const definitions = [...this.properties.values()];

    for (const definition of definitions) {
      for (const dependency of definition.dependsOnForValidation) {
        if (!this.properties.has(dependency)) {
          throw new UndefinedDependencyError(definition.name, dependency);
        }
      }
    }

    const graph = buildDependencyGraph(definitions);
    const { order, unresolved } = topologicalSort(
      graph,
      (name) => this.properties.get(name)?.validationOrder ?? 0
    );

    if (unresolved.length > 0) {
      const cycle = findCycle(graph, unresolved);
      this.logger.debug('circular_dependency', { cycle });
      throw new CircularDependencyError(cycle);
    }

    this.logger.debug('registry_built', {
      propertyCount: definitions.length,
      groupCount: this.groups.size,
      validationOrder: order,
    });

    return new FrozenPropertyRegistry(this.properties, this.groups, order);
  }
}

/**
 * Starts building a registry.
 *
 * @param options - Builder options.
 */
export function registryBuilder(options: RegistryBuilderOptions = {}): PropertyRegistryBuilder {
  return new PropertyRegistryBuilder(options);
}
