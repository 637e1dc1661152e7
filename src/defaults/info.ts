/**
 * Record of which defaults were applied.
 *
 * @packageDocumentation
 */

/**
 * Names and values of the defaults applied in one pass.
 */
export class DefaultApplicationInfo {
  private readonly applied: ReadonlyMap<string, string>;

  /**
   * @param applied - Applied default per property name, in application order.
   */
  constructor(applied: ReadonlyMap<string, string>) {
    this.applied = new Map(applied);
  }

  /** Whether the property's value came from a default. */
  wasDefaultApplied(propertyName: string): boolean {
    return this.applied.has(propertyName);
  }

  /** The applied default, or undefined when none was applied. */
  getAppliedValue(propertyName: string): string | undefined {
    return this.applied.get(propertyName);
  }

  /** Names of properties whose value came from a default. */
  get propertiesWithDefaults(): readonly string[] {
    return [...this.applied.keys()];
  }

  /** Number of defaults applied. */
  get count(): number {
    return this.applied.size;
  }

  /** All applied defaults. */
  getAppliedDefaults(): ReadonlyMap<string, string> {
    return this.applied;
  }
}
