/**
 * Engine facade: applies defaults and validates a configuration according to
 * {@link EngineSettings}.
 *
 * @packageDocumentation
 */

import { CachingPropertyValidator } from '../cache/caching-validator.js';
import { toPropertyMap } from '../context/context.js';
import type { PropertyValues } from '../context/context.js';
import { TypeConverterRegistry } from '../converter/registry.js';
import { DefaultValueApplier } from '../defaults/applier.js';
import type { DefaultApplicationResult } from '../defaults/applier.js';
import { DefaultApplicationInfo } from '../defaults/info.js';
import type { PropertyRegistry } from '../schema/registry.js';
import { mergeSettings } from '../settings/env.js';
import { getDefaultSettings } from '../settings/parser.js';
import type { EngineSettings } from '../settings/types.js';
import { assertSettingsValid } from '../settings/validator.js';
import { Logger } from '../utils/logger.js';
import type { ValidationFormatter } from '../validation/format/formatter.js';
import { TextValidationFormatter } from '../validation/format/text.js';
import { success } from '../validation/result.js';
import type { ValidationResult } from '../validation/result.js';
import { DefaultPropertyValidator } from '../validation/validator.js';
import type { PropertyValidator } from '../validation/validator.js';

/**
 * Error thrown by {@link ConfigEngine.check} when the configuration is invalid
 * and `validation.fail_on_error` is set.
 */
export class ConfigurationInvalidError extends Error {
  /** The failed validation result. */
  public readonly result: ValidationResult;
  /** The formatted report. */
  public readonly report: string;

  constructor(result: ValidationResult, report: string) {
    super(`Configuration is invalid:\n${report}`);
    this.name = 'ConfigurationInvalidError';
    this.result = result;
    this.report = report;
  }
}

/**
 * Outcome of a startup check.
 */
export interface CheckResult {
  /** User values plus applied defaults. */
  readonly properties: ReadonlyMap<string, string>;
  /** Defaults applied by the check. */
  readonly defaults: DefaultApplicationInfo;
  readonly validation: ValidationResult;
}

/**
 * Options for {@link createEngine}.
 */
export interface EngineOptions {
  /** Settings; the defaults when omitted. */
  readonly settings?: EngineSettings;
  /** A registry with built-ins by default. */
  readonly converters?: TypeConverterRegistry;
  /** Metadata visible to default providers, rules and conditions. */
  readonly metadata?: PropertyValues;
  /** Base logger. One honouring `logging.debug` is created when omitted. */
  readonly logger?: Logger;
  /** Renders the report of a failed check. Text by default. */
  readonly formatter?: ValidationFormatter;
  /** Clock for the result cache, in epoch milliseconds. */
  readonly now?: () => number;
}

/**
 * Applier, validator and optional result cache wired from settings.
 */
export class ConfigEngine {
  readonly settings: EngineSettings;
  readonly applier: DefaultValueApplier;
  readonly validator: PropertyValidator;
  private readonly cache: CachingPropertyValidator | undefined;
  private readonly formatter: ValidationFormatter;
  private readonly logger: Logger;

  /**
   * @throws SettingsValidationError when the settings are out of range.
   */
  constructor(registry: PropertyRegistry, options: EngineOptions = {}) {
    this.settings =
      options.settings === undefined
        ? getDefaultSettings()
        : mergeSettings(getDefaultSettings(), options.settings);
    assertSettingsValid(this.settings);

    const base =
      options.logger ?? new Logger({ component: 'ConfigEngine', debugMode: this.settings.logging.debug });
    this.logger = base.forComponent('ConfigEngine');
    this.formatter = options.formatter ?? new TextValidationFormatter();

    const converters = options.converters ?? new TypeConverterRegistry();
    const metadata = options.metadata ?? new Map<string, string>();

    this.applier = new DefaultValueApplier(registry, { converters, metadata, logger: base });
    const validator = new DefaultPropertyValidator(registry, {
      converters,
      metadata,
      conversionFailure: this.settings.validation.conversion_failure,
      logger: base,
    });

    if (this.settings.cache.enabled) {
      this.cache = new CachingPropertyValidator(validator, {
        maxSize: this.settings.cache.max_size,
        ttlMs: this.settings.cache.ttl_ms,
        logger: base,
        ...(options.now !== undefined && { now: options.now }),
      });
      this.validator = this.cache;
    } else {
      this.cache = undefined;
      this.validator = validator;
    }
  }

  /** Applies defaults in the configured context type. */
  applyDefaults(values: PropertyValues): DefaultApplicationResult {
    return this.applier.applyDefaults(values, this.settings.validation.context_type);
  }

  /** Validates values as given, in the configured context type. */
  validate(values: PropertyValues): ValidationResult {
    return this.validator.validate(values, this.settings.validation.context_type);
  }

  /**
   * Applies defaults and validates the merged values.
   *
   * When the engine is disabled the values are returned unchanged with a
   * valid result.
   *
   * @throws ConfigurationInvalidError when invalid and `fail_on_error` is set.
   */
  check(values: PropertyValues): CheckResult {
    if (!this.settings.enabled) {
      this.logger.info('validation_disabled');
      return {
        properties: toPropertyMap(values),
        defaults: new DefaultApplicationInfo(new Map()),
        validation: success(),
      };
    }

    const { properties, info } = this.applyDefaults(values);
    const validation = this.validate(properties);

    if (!validation.valid) {
      const report = this.formatter.format(validation);
      if (this.settings.validation.fail_on_error) {
        this.logger.error('configuration_invalid', { errorCount: validation.errors.length });
        throw new ConfigurationInvalidError(validation, report);
      }
      if (this.settings.validation.log_warnings) {
        this.logger.warn('configuration_invalid', {
          errorCount: validation.errors.length,
          report,
        });
      }
    }

    return { properties, defaults: info, validation };
  }

  /** Empties the result cache, if enabled. */
  clearCache(): void {
    this.cache?.clearCache();
  }

  /** Number of cached results; 0 when the cache is disabled. */
  getCacheSize(): number {
    return this.cache?.getCacheSize() ?? 0;
  }
}

/**
 * Creates an engine over a frozen registry.
 *
 * @example
 * ```typescript
 * const engine = createEngine(registry, { settings: await loadSettings('propguard.toml') });
 * const { properties } = engine.check({ 'server.port': '8080' });
 * ```
 */
export function createEngine(registry: PropertyRegistry, options: EngineOptions = {}): ConfigEngine {
  return new ConfigEngine(registry, options);
}
