/**
 * TOML parser for propguard.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isValidationContextType } from '../context/context.js';
import type { ValidationContextType } from '../context/context.js';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { CONVERSION_FAILURE_MODES } from '../validation/validator.js';
import type { ConversionFailureMode } from '../validation/validator.js';
import {
  DEFAULT_CACHE_SETTINGS,
  DEFAULT_LOGGING_SETTINGS,
  DEFAULT_SETTINGS,
  DEFAULT_VALIDATION_SETTINGS,
} from './defaults.js';
import { applyEnvOverrides } from './env.js';
import type { EnvRecord } from './env.js';
import type { CacheSettings, EngineSettings, LoggingSettings, ValidationSettings } from './types.js';

/**
 * Error class for settings parsing errors.
 */
export class SettingsParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new SettingsParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SettingsParseError';
    this.cause = cause;
  }
}

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Reads an optional sub-table.
 *
 * @throws SettingsParseError if the value is present but not a table.
 */
function validateTable(value: unknown, fieldPath: string): Table | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected number, got ${describeType(value)}`
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

function validateContextType(value: unknown, fieldPath: string): ValidationContextType {
  if (!isValidationContextType(value)) {
    throw new SettingsParseError(
      `Invalid value for '${fieldPath}': expected one of startup, runtime_override, persisted, testing`
    );
  }
  return value;
}

function validateConversionFailure(value: unknown, fieldPath: string): ConversionFailureMode {
  const mode = CONVERSION_FAILURE_MODES.find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new SettingsParseError(
      `Invalid value for '${fieldPath}': expected one of ${CONVERSION_FAILURE_MODES.join(', ')}`
    );
  }
  return mode;
}

function parseValidation(raw: Table | undefined): ValidationSettings {
  const result: ValidationSettings = { ...DEFAULT_VALIDATION_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('fail_on_error' in raw) {
    result.fail_on_error = validateBoolean(raw.fail_on_error, 'validation.fail_on_error');
  }
  if ('log_warnings' in raw) {
    result.log_warnings = validateBoolean(raw.log_warnings, 'validation.log_warnings');
  }
  if ('context_type' in raw) {
    result.context_type = validateContextType(raw.context_type, 'validation.context_type');
  }
  if ('conversion_failure' in raw) {
    result.conversion_failure = validateConversionFailure(
      raw.conversion_failure,
      'validation.conversion_failure'
    );
  }

  return result;
}

function parseCache(raw: Table | undefined): CacheSettings {
  const result: CacheSettings = { ...DEFAULT_CACHE_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('enabled' in raw) {
    result.enabled = validateBoolean(raw.enabled, 'cache.enabled');
  }
  if ('max_size' in raw) {
    result.max_size = validateNumber(raw.max_size, 'cache.max_size');
  }
  if ('ttl_ms' in raw) {
    result.ttl_ms = validateNumber(raw.ttl_ms, 'cache.ttl_ms');
  }

  return result;
}

function parseLogging(raw: Table | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING_SETTINGS };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into engine settings, filling missing fields with
 * defaults.
 *
 * @param tomlContent - Raw TOML content.
 * @returns The settings.
 * @throws SettingsParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const settings = parseSettings(`
 * [validation]
 * fail_on_error = false
 *
 * [cache]
 * enabled = true
 * `);
 * settings.validation.fail_on_error; // false
 * settings.cache.max_size; // 100
 * ```
 */
export function parseSettings(tomlContent: string): EngineSettings {
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SettingsParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    enabled: 'enabled' in parsed ? validateBoolean(parsed.enabled, 'enabled') : DEFAULT_SETTINGS.enabled,
    validation: parseValidation(validateTable(parsed.validation, 'validation')),
    cache: parseCache(validateTable(parsed.cache, 'cache')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}

/**
 * Returns a copy of the default settings.
 */
export function getDefaultSettings(): EngineSettings {
  return {
    enabled: DEFAULT_SETTINGS.enabled,
    validation: { ...DEFAULT_SETTINGS.validation },
    cache: { ...DEFAULT_SETTINGS.cache },
    logging: { ...DEFAULT_SETTINGS.logging },
  };
}

/**
 * Reads a settings file and applies environment overrides.
 *
 * Precedence: env > settings file > defaults. A missing file is not an
 * error when `optional` is set; the defaults are used instead.
 *
 * @param filePath - Path to propguard.toml.
 * @param options - Environment to read overrides from, and whether the file may be absent.
 * @returns The settings.
 * @throws SettingsParseError for invalid content.
 * @throws EnvCoercionError for invalid environment values.
 */
export async function loadSettings(
  filePath: string,
  options: { env?: EnvRecord; optional?: boolean } = {}
): Promise<EngineSettings> {
  let content: string | undefined;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    if (!(options.optional === true && isNotFound(error))) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new SettingsParseError(`Cannot read settings file '${filePath}': ${cause.message}`, cause);
    }
  }
  const settings = content === undefined ? getDefaultSettings() : parseSettings(content);
  return options.env === undefined ? applyEnvOverrides(settings) : applyEnvOverrides(settings, options.env);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
