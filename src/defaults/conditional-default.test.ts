import { describe, it, expect, vi } from 'vitest';
import { TypeConverterRegistry } from '../converter/registry.js';
import { createPropertyContext } from '../context/context.js';
import type { PropertyContext } from '../context/context.js';
import { alwaysFalse, alwaysTrue, propertyEquals } from '../context/conditions.js';
import { InvalidDefinitionError } from '../schema/errors.js';
import { computed, computedCached, noDefault, staticValue } from './conditional-default.js';

function contextOf(properties: Record<string, string>): PropertyContext {
  return createPropertyContext({ properties, converters: new TypeConverterRegistry() });
}

describe('conditional defaults', () => {
  describe('staticValue', () => {
    it('should always yield the value', () => {
      expect(staticValue(8080).compute(contextOf({}))).toBe(8080);
    });

    it('should reject null and undefined', () => {
      expect(() => staticValue(null)).toThrow(InvalidDefinitionError);
      expect(() => staticValue(undefined)).toThrow(InvalidDefinitionError);
    });
  });

  describe('computed', () => {
    it('should compute from the context on every call', () => {
      const computer = vi.fn((context: PropertyContext) =>
        context.getProperty('env') === 'prod' ? 50 : 5
      );
      const provider = computed(computer);

      expect(provider.compute(contextOf({ env: 'prod' }))).toBe(50);
      expect(provider.compute(contextOf({ env: 'prod' }))).toBe(50);
      expect(provider.compute(contextOf({}))).toBe(5);
      expect(computer).toHaveBeenCalledTimes(3);
    });
  });

  describe('computedCached', () => {
    it('should compute once per distinct property map', () => {
      const computer = vi.fn(() => 'computed');
      const provider = computedCached(computer, 10);

      provider.compute(contextOf({ a: '1', b: '2' }));
      provider.compute(contextOf({ b: '2', a: '1' }));
      expect(computer).toHaveBeenCalledTimes(1);

      provider.compute(contextOf({ a: '2' }));
      expect(computer).toHaveBeenCalledTimes(2);
    });

    it('should not store absent results', () => {
      const computer = vi.fn((): string | undefined => undefined);
      const provider = computedCached(computer, 10);

      provider.compute(contextOf({}));
      provider.compute(contextOf({}));
      expect(computer).toHaveBeenCalledTimes(2);
    });

    it('should recompute after a null result', () => {
      let ready = false;
      const provider = computedCached<string | null>(() => (ready ? 'value' : null), 10);

      expect(provider.compute(contextOf({ a: '1' }))).toBeNull();
      ready = true;
      expect(provider.compute(contextOf({ a: '1' }))).toBe('value');
    });

    it('should stop storing once the memo is full', () => {
      const computer = vi.fn(() => 1);
      const provider = computedCached(computer, 1);

      provider.compute(contextOf({ k: 'a' }));
      provider.compute(contextOf({ k: 'b' }));
      provider.compute(contextOf({ k: 'b' }));
      provider.compute(contextOf({ k: 'a' }));

      // 'a' is memoized; 'b' never fits
      expect(computer).toHaveBeenCalledTimes(3);
    });

    it('should reject sizes below one', () => {
      expect(() => computedCached(() => 1, 0)).toThrow(InvalidDefinitionError);
      expect(() => computedCached(() => 1, 1.5)).toThrow(InvalidDefinitionError);
    });
  });

  describe('noDefault', () => {
    it('should never yield a value', () => {
      expect(noDefault<number>().compute(contextOf({}))).toBeUndefined();
    });
  });

  describe('when', () => {
    it('should override when the condition holds', () => {
      const provider = staticValue(10).when(propertyEquals('env', 'prod'), 50);

      expect(provider.compute(contextOf({ env: 'prod' }))).toBe(50);
      expect(provider.compute(contextOf({ env: 'dev' }))).toBe(10);
    });

    it('should let the last registered override win', () => {
      const provider = staticValue('base').when(alwaysTrue(), 'first').when(alwaysTrue(), 'second');
      expect(provider.compute(contextOf({}))).toBe('second');
    });

    it('should fall back through overrides whose conditions fail', () => {
      const provider = staticValue('base')
        .when(propertyEquals('tier', 'gold'), 'gold')
        .when(alwaysFalse(), 'never');
      expect(provider.compute(contextOf({ tier: 'gold' }))).toBe('gold');
      expect(provider.compute(contextOf({ tier: 'free' }))).toBe('base');
    });

    it('should accept a computer as override', () => {
      const provider = noDefault<number>().when(propertyEquals('env', 'prod'), (context) =>
        Number(context.getProperty('cores') ?? '1') * 2
      );
      expect(provider.compute(contextOf({ env: 'prod', cores: '4' }))).toBe(8);
      expect(provider.compute(contextOf({ cores: '4' }))).toBeUndefined();
    });

    it('should leave the receiver unchanged', () => {
      const base = staticValue(1);
      base.when(alwaysTrue(), 2);
      expect(base.compute(contextOf({}))).toBe(1);
    });
  });
});
