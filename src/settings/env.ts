/**
 * Environment variable overrides for engine settings.
 *
 * PROPGUARD_* variables override values from propguard.toml, which in turn
 * override the defaults.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

import { isValidationContextType } from '../context/context.js';
import type { ValidationContextType } from '../context/context.js';
import { CONVERSION_FAILURE_MODES } from '../validation/validator.js';
import type { ConversionFailureMode } from '../validation/validator.js';
import type { EngineSettings, PartialEngineSettings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is blank or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts true/1/yes/on and false/0/no/off, case-insensitive.
 *
 * @throws EnvCoercionError for any other value.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }

  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

function coerceToContextType(value: string, envVar: string): ValidationContextType {
  const trimmed = value.trim().toLowerCase();
  if (!isValidationContextType(trimmed)) {
    throw new EnvCoercionError(envVar, value, 'context type');
  }
  return trimmed;
}

function coerceToConversionFailure(value: string, envVar: string): ConversionFailureMode {
  const trimmed = value.trim().toLowerCase();
  const mode = CONVERSION_FAILURE_MODES.find((candidate) => candidate === trimmed);
  if (mode === undefined) {
    throw new EnvCoercionError(envVar, value, 'conversion failure mode');
  }
  return mode;
}

interface EnvVarMapping {
  readonly description: string;
  readonly type: string;
  /** Coerces the raw value and writes it into the overrides. */
  readonly apply: (overrides: PartialEngineSettings, raw: string, envVar: string) => void;
}

/**
 * Supported environment variables, in application order.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  PROPGUARD_ENABLED: {
    description: 'Enable or disable the startup check',
    type: 'boolean',
    apply: (overrides, raw, envVar) => {
      overrides.enabled = coerceToBoolean(raw, envVar);
    },
  },
  PROPGUARD_VALIDATION_FAIL_ON_ERROR: {
    description: 'Throw when the configuration is invalid',
    type: 'boolean',
    apply: (overrides, raw, envVar) => {
      overrides.validation = { ...overrides.validation, fail_on_error: coerceToBoolean(raw, envVar) };
    },
  },
  PROPGUARD_VALIDATION_LOG_WARNINGS: {
    description: 'Log a warning when the configuration is invalid',
    type: 'boolean',
    apply: (overrides, raw, envVar) => {
      overrides.validation = { ...overrides.validation, log_warnings: coerceToBoolean(raw, envVar) };
    },
  },
  PROPGUARD_VALIDATION_CONTEXT_TYPE: {
    description: 'Validation phase (startup, runtime_override, persisted, testing)',
    type: 'string',
    apply: (overrides, raw, envVar) => {
      overrides.validation = { ...overrides.validation, context_type: coerceToContextType(raw, envVar) };
    },
  },
  PROPGUARD_VALIDATION_CONVERSION_FAILURE: {
    description: 'Errors reported for an unconvertible required property (conversion-only, conversion-and-missing)',
    type: 'string',
    apply: (overrides, raw, envVar) => {
      overrides.validation = {
        ...overrides.validation,
        conversion_failure: coerceToConversionFailure(raw, envVar),
      };
    },
  },
  PROPGUARD_CACHE_ENABLED: {
    description: 'Cache validation results',
    type: 'boolean',
    apply: (overrides, raw, envVar) => {
      overrides.cache = { ...overrides.cache, enabled: coerceToBoolean(raw, envVar) };
    },
  },
  PROPGUARD_CACHE_MAX_SIZE: {
    description: 'Maximum number of cached results',
    type: 'number',
    apply: (overrides, raw, envVar) => {
      overrides.cache = { ...overrides.cache, max_size: coerceToNumber(raw, envVar) };
    },
  },
  PROPGUARD_CACHE_TTL_MS: {
    description: 'Time-to-live of a cached result in milliseconds',
    type: 'number',
    apply: (overrides, raw, envVar) => {
      overrides.cache = { ...overrides.cache, ttl_ms: coerceToNumber(raw, envVar) };
    },
  },
  PROPGUARD_DEBUG: {
    description: 'Emit debug log entries',
    type: 'boolean',
    apply: (overrides, raw, envVar) => {
      overrides.logging = { ...overrides.logging, debug: coerceToBoolean(raw, envVar) };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial settings with values from environment variables. */
  overrides: PartialEngineSettings;
  /** Environment variables that were applied. */
  appliedVars: string[];
  /** Coercion errors, when collected. */
  errors: EnvCoercionError[];
}

/**
 * Reads PROPGUARD_* variables and returns settings overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Overrides, the applied variable names and any collected errors.
 * @throws EnvCoercionError when a value cannot be coerced and errors are not collected.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ PROPGUARD_CACHE_ENABLED: 'yes' });
 * overrides.cache?.enabled; // true
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialEngineSettings = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges partial settings into complete settings.
 *
 * @param base - The base settings.
 * @param partial - The overrides.
 * @returns New settings with the overrides merged in.
 */
export function mergeSettings(base: EngineSettings, partial: PartialEngineSettings): EngineSettings {
  return {
    enabled: partial.enabled ?? base.enabled,
    validation: {
      ...base.validation,
      ...partial.validation,
    },
    cache: {
      ...base.cache,
      ...partial.cache,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
  };
}

/**
 * Applies environment variable overrides to settings.
 *
 * @param settings - The base settings.
 * @param env - The environment to read from (defaults to process.env).
 * @returns Settings with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(
  settings: EngineSettings,
  env: EnvRecord = getDefaultEnv()
): EngineSettings {
  const { overrides } = readEnvOverrides(env);

  return mergeSettings(settings, overrides);
}

/**
 * Documentation for every supported environment variable.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, { description, type }] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description, type };
  }
  return docs;
}
