import { describe, expect, it } from 'vitest';
import { getDefaultSettings } from './parser.js';
import { SettingsValidationError, assertSettingsValid, validateSettings } from './validator.js';

describe('Settings Validator', () => {
  it('should accept the defaults', () => {
    expect(validateSettings(getDefaultSettings()).valid).toBe(true);
    expect(() => assertSettingsValid(getDefaultSettings())).not.toThrow();
  });

  it('should report every out-of-range cache value', () => {
    const settings = getDefaultSettings();
    settings.cache.max_size = 0;
    settings.cache.ttl_ms = Number.POSITIVE_INFINITY;

    expect(validateSettings(settings).errors).toEqual([
      { propertyName: 'cache.max_size', message: 'Must be a positive integer', actualValue: '0' },
      {
        propertyName: 'cache.ttl_ms',
        message: 'Must be a positive number of milliseconds',
        actualValue: 'Infinity',
      },
    ]);
  });

  it('should reject a fractional cache size', () => {
    const settings = getDefaultSettings();
    settings.cache.max_size = 2.5;
    expect(validateSettings(settings).errors[0]?.actualValue).toBe('2.5');
  });

  it('should throw with every problem listed', () => {
    const settings = getDefaultSettings();
    settings.cache.max_size = -1;
    settings.cache.ttl_ms = 0;

    expect(() => assertSettingsValid(settings)).toThrow(SettingsValidationError);
    expect(() => assertSettingsValid(settings)).toThrow(
      'Settings validation failed with 2 error(s):\n' +
        '  - cache.max_size: Must be a positive integer\n' +
        '  - cache.ttl_ms: Must be a positive number of milliseconds'
    );
  });
});
