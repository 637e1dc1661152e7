import { describe, it, expect } from 'vitest';
import { TypeConverterRegistry } from '../../converter/registry.js';
import { createPropertyContext } from '../../context/context.js';
import { InvalidDefinitionError } from '../../schema/errors.js';
import * as GeneralRules from './general.js';

const context = createPropertyContext({
  properties: { 'log.level': 'debug' },
  converters: new TypeConverterRegistry(),
});

describe('general rules', () => {
  it('required should reject null and undefined', () => {
    expect(GeneralRules.required<string | undefined>().validate('x', undefined, context).errors).toEqual([
      { propertyName: 'x', message: 'Value is required', actualValue: 'null' },
    ]);
    expect(GeneralRules.required<string>().validate('x', '', context).valid).toBe(true);
  });

  it('notNull should behave like required', () => {
    expect(GeneralRules.notNull<number | null>().validate('x', null, context).errors).toEqual([
      { propertyName: 'x', message: 'Value is required', actualValue: 'null' },
    ]);
    expect(GeneralRules.notNull<number>().validate('x', 0, context).valid).toBe(true);
  });

  it('oneOf and noneOf should list the values', () => {
    const levels = GeneralRules.oneOf<string>('debug', 'info', 'warn');
    expect(levels.validate('log.level', 'info', context).valid).toBe(true);
    expect(levels.validate('log.level', 'trace', context).errors).toEqual([
      {
        propertyName: 'log.level',
        message: 'Value must be one of: [debug, info, warn]',
        actualValue: 'trace',
      },
    ]);
    expect(GeneralRules.noneOf<number>(0, -1).validate('n', 0, context).errors[0]?.message).toBe(
      'Value must not be one of: [0, -1]'
    );
  });

  it('equalTo and notEqualTo should compare strictly', () => {
    expect(GeneralRules.equalTo<boolean>(true).validate('flag', false, context).errors).toEqual([
      {
        propertyName: 'flag',
        message: 'Value must equal: true',
        actualValue: 'false',
        expectedValue: 'true',
      },
    ]);
    expect(GeneralRules.notEqualTo<string>('admin').validate('user', 'admin', context).errors[0]?.message).toBe(
      'Value must not equal: admin'
    );
  });

  it('custom should use the message and optional expectation', () => {
    const even = GeneralRules.custom<number>((n) => n % 2 === 0, 'Must be even', 'An even number');
    expect(even.validate('n', 3, context).errors).toEqual([
      { propertyName: 'n', message: 'Must be even', actualValue: '3', expectedValue: 'An even number' },
    ]);
    expect(GeneralRules.custom<number>(() => false, 'No').validate('n', 1, context).errors[0]).not.toHaveProperty(
      'expectedValue'
    );
  });

  it('customWithContext should read other properties', () => {
    const rule = GeneralRules.customWithContext<string>(
      (value, ctx) => ctx.getProperty('log.level') !== 'debug' || value === 'console',
      'Debug logging must go to the console'
    );
    expect(rule.validate('log.sink', 'console', context).valid).toBe(true);
    expect(rule.validate('log.sink', 'file', context).errors[0]?.message).toBe(
      'Debug logging must go to the console'
    );
  });

  it('comparableBetween should order strings and dates', () => {
    const versions = GeneralRules.comparableBetween<string>('1.0', '1.9');
    expect(versions.validate('api.version', '1.4', context).valid).toBe(true);
    expect(versions.validate('api.version', '2.0', context).errors).toEqual([
      {
        propertyName: 'api.version',
        message: 'Value must be between 1.0 and 1.9',
        actualValue: '2.0',
        expectedValue: '[1.0, 1.9]',
      },
    ]);

    const releaseWindow = GeneralRules.comparableBetween<Date>(
      new Date('2024-01-01T00:00:00.000Z'),
      new Date('2024-12-31T00:00:00.000Z')
    );
    expect(releaseWindow.validate('release', new Date('2025-02-01T00:00:00.000Z'), context).errors[0]).toEqual({
      propertyName: 'release',
      message: 'Value must be between 2024-01-01T00:00:00.000Z and 2024-12-31T00:00:00.000Z',
      actualValue: '2025-02-01T00:00:00.000Z',
      expectedValue: '[2024-01-01T00:00:00.000Z, 2024-12-31T00:00:00.000Z]',
    });
    expect(() => GeneralRules.comparableBetween<string>('b', 'a')).toThrow(InvalidDefinitionError);
  });

  it('comparableGreaterThan and comparableLessThan should exclude the threshold', () => {
    expect(GeneralRules.comparableGreaterThan<bigint>(10n).validate('n', 10n, context).errors).toEqual([
      { propertyName: 'n', message: 'Value must be greater than 10', actualValue: '10', expectedValue: '> 10' },
    ]);
    expect(GeneralRules.comparableGreaterThan<bigint>(10n).validate('n', 11n, context).valid).toBe(true);
    expect(GeneralRules.comparableLessThan<string>('m').validate('s', 'a', context).valid).toBe(true);
    expect(GeneralRules.comparableLessThan<string>('m').validate('s', 'm', context).errors[0]?.expectedValue).toBe(
      '< m'
    );
  });
});
