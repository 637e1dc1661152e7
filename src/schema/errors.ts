/**
 * Build-time (schema-authoring) errors.
 *
 * These are thrown while a schema is being assembled and abort construction:
 * no partially built registry, group or definition is ever returned.
 *
 * @packageDocumentation
 */

/**
 * Base class for every schema-authoring failure.
 */
export class SchemaDefinitionError extends Error {
  /**
   * Creates a new SchemaDefinitionError.
   *
   * @param message - Descriptive error message.
   */
  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * Kind of entry that was registered twice.
 */
export type RegistrationKind = 'property' | 'group';

/**
 * Error thrown when a property or group name is registered twice.
 */
export class DuplicateRegistrationError extends SchemaDefinitionError {
  /** Whether a property or a group collided. */
  public readonly kind: RegistrationKind;
  /** The name that was already registered. */
  public readonly registeredName: string;

  /**
   * Creates a new DuplicateRegistrationError.
   *
   * @param kind - Whether a property or a group collided.
   * @param registeredName - The duplicated name.
   */
  constructor(kind: RegistrationKind, registeredName: string) {
    super(
      kind === 'property'
        ? `Property '${registeredName}' is already registered`
        : `Property group '${registeredName}' is already registered`
    );
    this.name = 'DuplicateRegistrationError';
    this.kind = kind;
    this.registeredName = registeredName;
  }
}

/**
 * Error thrown when a property declares a dependency that is not registered.
 */
export class UndefinedDependencyError extends SchemaDefinitionError {
  /** The property that declares the dependency. */
  public readonly propertyName: string;
  /** The dependency name that could not be found. */
  public readonly dependencyName: string;

  /**
   * Creates a new UndefinedDependencyError.
   *
   * @param propertyName - The property declaring the dependency.
   * @param dependencyName - The missing dependency.
   */
  constructor(propertyName: string, dependencyName: string) {
    super(`Property '${propertyName}' depends on undefined property '${dependencyName}'`);
    this.name = 'UndefinedDependencyError';
    this.propertyName = propertyName;
    this.dependencyName = dependencyName;
  }
}

/**
 * Error thrown when validation dependencies form a cycle.
 */
export class CircularDependencyError extends SchemaDefinitionError {
  /** The cycle path that was detected (e.g., ['a', 'b', 'a']). */
  public readonly cycle: string[];

  /**
   * Creates a new CircularDependencyError.
   *
   * @param cycle - The property names forming the cycle, first name repeated at the end.
   */
  constructor(cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`);
    this.name = 'CircularDependencyError';
    this.cycle = cycle;
  }
}

/**
 * Error thrown when a property group is built without any property.
 */
export class EmptyPropertyGroupError extends SchemaDefinitionError {
  /** The name of the empty group. */
  public readonly groupName: string;

  /**
   * Creates a new EmptyPropertyGroupError.
   *
   * @param groupName - The name of the empty group.
   */
  constructor(groupName: string) {
    super(`Property group '${groupName}' must contain at least one property`);
    this.name = 'EmptyPropertyGroupError';
    this.groupName = groupName;
  }
}

/**
 * Error thrown when a definition, group, rule or default is constructed with
 * invalid arguments (blank names, too few property names, non-positive sizes).
 */
export class InvalidDefinitionError extends SchemaDefinitionError {
  /**
   * Creates a new InvalidDefinitionError.
   *
   * @param message - Descriptive error message.
   */
  constructor(message: string) {
    super(message);
    this.name = 'InvalidDefinitionError';
  }
}
