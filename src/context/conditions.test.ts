import { describe, it, expect } from 'vitest';
import { PropertyTypes, TypeConverterRegistry } from '../converter/registry.js';
import { createPropertyContext } from './context.js';
import type { PropertyContext } from './context.js';
import * as Conditions from './conditions.js';

function contextOf(
  properties: Record<string, string>,
  metadata: Record<string, string> = {}
): PropertyContext {
  return createPropertyContext({
    properties,
    converters: new TypeConverterRegistry(),
    contextType: 'testing',
    metadata,
  });
}

describe('Conditions', () => {
  const context = contextOf(
    {
      'ssl.enabled': 'YES',
      'cache.enabled': 'off',
      'server.port': '8443',
      'db.host': 'db.internal',
      'db.user': '   ',
      mode: 'cluster',
    },
    { environment: 'production' }
  );

  it('should compare raw values', () => {
    expect(Conditions.propertyEquals('mode', 'cluster')(context)).toBe(true);
    expect(Conditions.propertyEquals('mode', 'Cluster')(context)).toBe(false);
    expect(Conditions.propertyNotEquals('mode', 'standalone')(context)).toBe(true);
    expect(Conditions.propertyNotEquals('missing', 'x')(context)).toBe(true);
  });

  it('should treat blank values as absent', () => {
    expect(Conditions.propertyIsPresent('db.host')(context)).toBe(true);
    expect(Conditions.propertyIsPresent('db.user')(context)).toBe(false);
    expect(Conditions.propertyIsAbsent('db.user')(context)).toBe(true);
    expect(Conditions.propertyIsAbsent('missing')(context)).toBe(true);
  });

  it('should read boolean words', () => {
    expect(Conditions.propertyIsTrue('ssl.enabled')(context)).toBe(true);
    expect(Conditions.propertyIsFalse('ssl.enabled')(context)).toBe(false);
    // 'off' is not a boolean word for properties
    expect(Conditions.propertyIsFalse('cache.enabled')(context)).toBe(false);
    expect(Conditions.propertyIsTrue('missing')(context)).toBe(false);
  });

  it('should match raw and typed predicates', () => {
    expect(Conditions.propertyMatches('db.host', (v) => v.endsWith('.internal'))(context)).toBe(
      true
    );
    expect(
      Conditions.typedPropertyMatches('server.port', PropertyTypes.INTEGER, (p) => p > 1024)(
        context
      )
    ).toBe(true);
    expect(
      Conditions.typedPropertyMatches('db.host', PropertyTypes.INTEGER, () => true)(context)
    ).toBe(false);
  });

  it('should check membership', () => {
    expect(Conditions.propertyOneOf('mode', 'cluster', 'replica')(context)).toBe(true);
    expect(Conditions.propertyOneOf('missing', 'cluster')(context)).toBe(false);
  });

  it('should read metadata and context type', () => {
    expect(Conditions.metadataEquals('environment', 'production')(context)).toBe(true);
    expect(Conditions.metadataIsPresent('region')(context)).toBe(false);
    expect(Conditions.contextTypeIs('testing')(context)).toBe(true);
    expect(Conditions.contextTypeIs('startup')(context)).toBe(false);
  });

  it('should check several properties at once', () => {
    expect(Conditions.allPropertiesPresent('db.host', 'mode')(context)).toBe(true);
    expect(Conditions.allPropertiesPresent('db.host', 'db.user')(context)).toBe(false);
    expect(Conditions.anyPropertyPresent('db.user', 'db.host')(context)).toBe(true);
    expect(Conditions.anyPropertyPresent('db.user', 'missing')(context)).toBe(false);
  });

  it('should combine conditions', () => {
    const yes = Conditions.alwaysTrue();
    const no = Conditions.alwaysFalse();

    expect(Conditions.not(no)(context)).toBe(true);
    expect(Conditions.and(yes, no)(context)).toBe(false);
    expect(Conditions.and()(context)).toBe(true);
    expect(Conditions.or(no, yes)(context)).toBe(true);
    expect(Conditions.or()(context)).toBe(false);
  });
});
