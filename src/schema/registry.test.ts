import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { PropertyTypes } from '../converter/registry.js';
import { propertyGroup } from '../validation/group.js';
import { alwaysValidMulti } from '../validation/multi-property-rule.js';
import { defineProperty } from './definition.js';
import type { PropertyDefinition } from './definition.js';
import {
  CircularDependencyError,
  DuplicateRegistrationError,
  SchemaDefinitionError,
  UndefinedDependencyError,
} from './errors.js';
import { registryBuilder } from './registry.js';

function prop(name: string, ...dependsOn: string[]): PropertyDefinition<string> {
  return defineProperty(PropertyTypes.STRING)
    .name(name)
    .dependsOnForValidation(...dependsOn)
    .build();
}

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the action to throw');
}

describe('PropertyRegistryBuilder', () => {
  it('should expose registered properties and groups', () => {
    const group = propertyGroup('server').addProperties('host', 'port').build();
    const registry = registryBuilder()
      .register(prop('host'))
      .register(prop('port'))
      .registerGroup(group)
      .build();

    expect(registry.isDefined('host')).toBe(true);
    expect(registry.isDefined('missing')).toBe(false);
    expect(registry.getProperty('port')?.name).toBe('port');
    expect(registry.getProperty('missing')).toBeUndefined();
    expect(registry.getAllPropertyNames()).toEqual(['host', 'port']);
    expect(registry.getAllProperties().map((d) => d.name)).toEqual(['host', 'port']);
    expect(registry.getPropertyGroup('server')).toBe(group);
    expect(registry.getAllPropertyGroups()).toEqual([group]);
  });

  describe('duplicates', () => {
    it('should reject a second property with the same name', () => {
      const builder = registryBuilder().register(prop('a'));
      const error = captureError(() => builder.register(prop('a')));

      expect(error).toBeInstanceOf(DuplicateRegistrationError);
      expect(error).toBeInstanceOf(SchemaDefinitionError);
      expect(error).toHaveProperty('message', "Property 'a' is already registered");
    });

    it('should reject a second group with the same name', () => {
      const group = propertyGroup('g').addProperty('a').addRule(alwaysValidMulti()).build();
      const builder = registryBuilder().registerGroup(group);

      expect(() => builder.registerGroup(group)).toThrow("Property group 'g' is already registered");
    });

    it('should reject any repeated name (property-based)', () => {
      fc.assert(
        fc.property(
          fc.uniqueArray(fc.string({ minLength: 1 }).filter((s) => s.trim().length > 0), {
            minLength: 1,
            maxLength: 10,
          }),
          fc.nat(),
          (names, pick) => {
            const builder = registryBuilder();
            for (const name of names) {
              builder.register(prop(name));
            }
            const repeated = names[pick % names.length] ?? '';
            expect(() => builder.register(prop(repeated))).toThrow(DuplicateRegistrationError);
          }
        )
      );
    });
  });

  describe('dependencies', () => {
    it('should reject an undefined dependency', () => {
      const error = captureError(() => registryBuilder().register(prop('a', 'ghost')).build());

      expect(error).toBeInstanceOf(UndefinedDependencyError);
      expect(error).toHaveProperty('propertyName', 'a');
      expect(error).toHaveProperty('dependencyName', 'ghost');
      expect(error).toHaveProperty('message', "Property 'a' depends on undefined property 'ghost'");
    });

    it('should accept a dependency registered later', () => {
      const registry = registryBuilder().register(prop('b', 'a')).register(prop('a')).build();
      expect(registry.getValidationOrder()).toEqual(['a', 'b']);
      expect(registry.getAllPropertyNames()).toEqual(['b', 'a']);
    });

    it('should reject a self-dependency', () => {
      const error = captureError(() => registryBuilder().register(prop('a', 'a')).build());

      expect(error).toBeInstanceOf(CircularDependencyError);
      expect(error).toHaveProperty('cycle', ['a', 'a']);
      expect(error).toHaveProperty('message', 'Circular dependency detected: a -> a');
    });

    it('should reject a longer cycle and name it', () => {
      const error = captureError(() =>
        registryBuilder()
          .register(prop('a', 'b'))
          .register(prop('b', 'c'))
          .register(prop('c', 'a'))
          .register(prop('d'))
          .build()
      );

      expect(error).toBeInstanceOf(CircularDependencyError);
      expect(error).toHaveProperty('message', 'Circular dependency detected: a -> b -> c -> a');
    });

    it('should order a diamond with dependencies first', () => {
      const registry = registryBuilder()
        .register(prop('top', 'left', 'right'))
        .register(prop('left', 'base'))
        .register(prop('right', 'base'))
        .register(prop('base'))
        .build();

      expect(registry.getValidationOrder()).toEqual(['base', 'left', 'right', 'top']);
    });

    it('should honour the validation order hint among ready properties', () => {
      const registry = registryBuilder()
        .register(defineProperty(PropertyTypes.STRING).name('late').validationOrder(10).build())
        .register(defineProperty(PropertyTypes.STRING).name('early').validationOrder(-5).build())
        .register(prop('plain'))
        .build();

      expect(registry.getValidationOrder()).toEqual(['early', 'plain', 'late']);
    });

    it('should build any acyclic chain (property-based)', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 30 }), fc.boolean(), (length, reversed) => {
          const names = Array.from({ length }, (_, i) => `p${String(i)}`);
          const definitions = names.map((name, i) =>
            i === 0 ? prop(name) : prop(name, names[i - 1] ?? '')
          );
          const builder = registryBuilder();
          for (const definition of reversed ? [...definitions].reverse() : definitions) {
            builder.register(definition);
          }
          expect(builder.build().getValidationOrder()).toEqual(names);
        })
      );
    });

    it('should reject any ring of properties (property-based)', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 20 }), (length) => {
          const names = Array.from({ length }, (_, i) => `r${String(i)}`);
          const builder = registryBuilder();
          names.forEach((name, i) => builder.register(prop(name, names[(i + 1) % length] ?? '')));
          const error = captureError(() => builder.build());
          expect(error).toBeInstanceOf(CircularDependencyError);
          expect(error).toHaveProperty('cycle', [...names, 'r0']);
        })
      );
    });
  });

  it('should not change after build', () => {
    const builder = registryBuilder().register(prop('a'));
    const registry = builder.build();
    builder.register(prop('b'));

    expect(registry.getAllPropertyNames()).toEqual(['a']);
    expect(Object.isFrozen(registry.getAllPropertyNames())).toBe(true);
  });
});
