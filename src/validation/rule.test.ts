import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { TypeConverterRegistry } from '../converter/registry.js';
import { createPropertyContext } from '../context/context.js';
import { propertyEquals } from '../context/conditions.js';
import { InvalidDefinitionError } from '../schema/errors.js';
import { failure, success, validationError } from './result.js';
import { allOf, alwaysFails, alwaysValid, anyOf, createRule } from './rule.js';
import type { ValidationRule } from './rule.js';

const context = createPropertyContext({
  properties: { mode: 'strict' },
  converters: new TypeConverterRegistry(),
});

function failing(message: string): ValidationRule<number> {
  return alwaysFails<number>(message);
}

const throwing = createRule<number>(() => {
  throw new Error('must not run');
});

describe('rule algebra', () => {
  describe('and', () => {
    it('should pass when both rules pass', () => {
      expect(alwaysValid<number>().and(alwaysValid()).validate('x', 1, context)).toEqual(success());
    });

    it('should short-circuit on the first failure', () => {
      const result = failing('first').and(throwing).validate('x', 1, context);
      expect(result.errors.map((e) => e.message)).toEqual(['first']);
    });

    it('should report the second failure when the first passes', () => {
      const result = alwaysValid<number>().and(failing('second')).validate('x', 1, context);
      expect(result.errors).toEqual([validationError({ propertyName: 'x', message: 'second' })]);
    });
  });

  describe('or', () => {
    it('should skip the second rule when the first passes', () => {
      expect(alwaysValid<number>().or(throwing).validate('x', 1, context).valid).toBe(true);
    });

    it("should return the second rule's result when both fail", () => {
      const result = failing('first').or(failing('second')).validate('x', 1, context);
      expect(result.errors.map((e) => e.message)).toEqual(['second']);
    });

    it('should pass when only the second passes', () => {
      expect(failing('first').or(alwaysValid()).validate('x', 1, context).valid).toBe(true);
    });
  });

  describe('onlyIf', () => {
    it('should run when the condition holds', () => {
      const rule = failing('strict only').onlyIf(propertyEquals('mode', 'strict'));
      expect(rule.validate('x', 1, context).valid).toBe(false);
    });

    it('should pass without running when the condition does not hold', () => {
      const rule = throwing.onlyIf(propertyEquals('mode', 'lenient'));
      expect(rule.validate('x', 1, context)).toEqual(success());
    });
  });

  describe('allOf', () => {
    it('should stop at the first failure', () => {
      const result = allOf(alwaysValid<number>(), failing('a'), throwing).validate('x', 1, context);
      expect(result.errors.map((e) => e.message)).toEqual(['a']);
    });

    it('should require at least one rule', () => {
      expect(() => allOf<number>()).toThrow(InvalidDefinitionError);
    });
  });

  describe('anyOf', () => {
    it('should report every error when all rules fail', () => {
      const result = anyOf(failing('a'), failing('b'), failing('c')).validate('x', 1, context);
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.message)).toEqual(['a', 'b', 'c']);
    });

    it('should stop at the first success', () => {
      const result = anyOf(failing('a'), alwaysValid<number>(), throwing).validate('x', 1, context);
      expect(result).toEqual(success());
    });

    it('should require at least one rule', () => {
      expect(() => anyOf<number>()).toThrow(InvalidDefinitionError);
    });
  });

  it('should never mutate the receiver', () => {
    const check = vi.fn((name: string, value: number) =>
      value > 0 ? success() : failure(validationError({ propertyName: name, message: 'neg' }))
    );
    const base = createRule<number>(check);
    base.and(failing('extra'));
    base.or(alwaysValid());
    base.onlyIf(() => false);

    expect(base.validate('x', 1, context)).toEqual(success());
    expect(check).toHaveBeenCalledTimes(1);
    expect(Object.isFrozen(base)).toBe(true);
  });

  describe('property-based laws', () => {
    const arbRule = fc.oneof(
      fc.constant(alwaysValid<number>()),
      fc.string({ minLength: 1 }).map((m) => failing(m))
    );

    it('and is valid iff both operands are valid', () => {
      fc.assert(
        fc.property(arbRule, arbRule, (a, b) => {
          const combined = a.and(b).validate('x', 0, context).valid;
          return (
            combined === (a.validate('x', 0, context).valid && b.validate('x', 0, context).valid)
          );
        })
      );
    });

    it('or is valid iff either operand is valid', () => {
      fc.assert(
        fc.property(arbRule, arbRule, (a, b) => {
          const combined = a.or(b).validate('x', 0, context).valid;
          return (
            combined === (a.validate('x', 0, context).valid || b.validate('x', 0, context).valid)
          );
        })
      );
    });

    it('anyOf reports one error per failing rule when all fail', () => {
      fc.assert(
        fc.property(fc.array(fc.string({ minLength: 1 }), { minLength: 1, maxLength: 8 }), (ms) => {
          const result = anyOf(...ms.map(failing)).validate('x', 0, context);
          return result.errors.length === ms.length;
        })
      );
    });
  });
});
