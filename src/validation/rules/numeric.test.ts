import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TypeConverterRegistry } from '../../converter/registry.js';
import { createPropertyContext } from '../../context/context.js';
import { InvalidDefinitionError } from '../../schema/errors.js';
import * as NumericRules from './numeric.js';

const context = createPropertyContext({ properties: {}, converters: new TypeConverterRegistry() });

describe('numeric rules', () => {
  it('sign rules should classify values', () => {
    expect(NumericRules.positive().validate('n', 1, context).valid).toBe(true);
    expect(NumericRules.positive().validate('n', 0, context).errors).toEqual([
      { propertyName: 'n', message: 'Value must be positive', actualValue: '0', expectedValue: '> 0' },
    ]);
    expect(NumericRules.negative().validate('n', -1n, context).valid).toBe(true);
    expect(NumericRules.nonNegative().validate('n', 0, context).valid).toBe(true);
    expect(NumericRules.nonPositive().validate('n', 1, context).valid).toBe(false);
    expect(NumericRules.zero().validate('n', 0n, context).valid).toBe(true);
    expect(NumericRules.zero().validate('n', 0.5, context).valid).toBe(false);
  });

  it('min and max should be inclusive', () => {
    expect(NumericRules.min(5).validate('n', 5, context).valid).toBe(true);
    expect(NumericRules.min(5).validate('n', 4, context).errors[0]).toEqual({
      propertyName: 'n',
      message: 'Value must be at least 5',
      actualValue: '4',
      expectedValue: '>= 5',
    });
    expect(NumericRules.max(5).validate('n', 6, context).errors[0]?.message).toBe(
      'Value must not exceed 5'
    );
    expect(NumericRules.greaterThanOrEqualTo(5).validate('n', 5, context).valid).toBe(true);
    expect(NumericRules.lessThanOrEqualTo(5).validate('n', 5, context).valid).toBe(true);
  });

  it('strict comparisons should exclude the threshold', () => {
    expect(NumericRules.greaterThan(5).validate('n', 5, context).errors[0]?.expectedValue).toBe(
      '> 5'
    );
    expect(NumericRules.lessThan(5).validate('n', 5, context).errors[0]?.message).toBe(
      'Value must be less than 5'
    );
  });

  it('between should accept bigints and reject an inverted range', () => {
    expect(NumericRules.between(1, 10).validate('n', 10n, context).valid).toBe(true);
    expect(NumericRules.between(1, 10).validate('n', 11n, context).errors[0]?.actualValue).toBe(
      '11'
    );
    expect(() => NumericRules.between(10, 1)).toThrow(InvalidDefinitionError);
  });

  it('port should cover 1 to 65535', () => {
    const port = NumericRules.port();
    expect(port.validate('server.port', 1, context).valid).toBe(true);
    expect(port.validate('server.port', 65535, context).valid).toBe(true);
    expect(port.validate('server.port', 0, context).errors[0]?.message).toBe(
      'Value must be between 1 and 65535'
    );
  });

  it('integerBetween should bound 32-bit integers', () => {
    const workers = NumericRules.integerBetween(1, 64);
    expect(workers.validate('workers', 64, context).valid).toBe(true);
    expect(workers.validate('workers', 65, context).errors).toEqual([
      {
        propertyName: 'workers',
        message: 'Value must be between 1 and 64',
        actualValue: '65',
        expectedValue: '[1, 64]',
      },
    ]);
    expect(() => NumericRules.integerBetween(0, 2 ** 31)).toThrow(InvalidDefinitionError);
    expect(() => NumericRules.integerBetween(0.5, 2)).toThrow(InvalidDefinitionError);
    expect(() => NumericRules.integerBetween(9, 1)).toThrow(InvalidDefinitionError);
  });

  it('longBetween should accept bigint bounds and values', () => {
    const bytes = NumericRules.longBetween(0, 10n ** 18n);
    expect(bytes.validate('disk.bytes', 2n ** 60n, context).valid).toBe(false);
    expect(bytes.validate('disk.bytes', 4096, context).valid).toBe(true);
    expect(bytes.validate('disk.bytes', -1n, context).errors[0]?.expectedValue).toBe(
      '[0, 1000000000000000000]'
    );
    expect(() => NumericRules.longBetween(5n, 1)).toThrow(InvalidDefinitionError);
  });

  it('parity and multiples should follow the sign-independent remainder', () => {
    expect(NumericRules.even().validate('n', -4, context).valid).toBe(true);
    expect(NumericRules.odd().validate('n', -3, context).valid).toBe(true);
    expect(NumericRules.odd().validate('n', 2, context).errors[0]).toEqual({
      propertyName: 'n',
      message: 'Value must be odd',
      actualValue: '2',
    });
    expect(NumericRules.multipleOf(256).validate('n', 1024, context).valid).toBe(true);
    expect(NumericRules.multipleOf(256).validate('n', 1000, context).valid).toBe(false);
    expect(() => NumericRules.multipleOf(0)).toThrow(InvalidDefinitionError);
  });

  it('min(a).and(max(b)) should equal between(a, b) (property-based)', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: -100, max: 100 }),
        fc.integer({ min: 0, max: 100 }),
        fc.integer({ min: -300, max: 300 }),
        (low, span, value) => {
          const high = low + span;
          const composed = NumericRules.min(low).and(NumericRules.max(high));
          return (
            composed.validate('n', value, context).valid ===
            NumericRules.between(low, high).validate('n', value, context).valid
          );
        }
      )
    );
  });
});
