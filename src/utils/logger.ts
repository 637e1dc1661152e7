/**
 * Structured logging utility for the propguard engine.
 *
 * Every component (registry builder, default applier, validator, cache, engine)
 * logs through a {@link Logger} that writes one JSON line per entry to stderr.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information (cache hits, per-call summaries)
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Error conditions indicating failures or problems
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "PropertyValidator"
   */
  readonly component: string;

  /**
   * Brief description of the logged event.
   * @example "validation_completed"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { propertyCount: 12, errorCount: 0 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   * Appears in all log entries to identify the source.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /** Function to get current timestamp (injectable for testing). */
  readonly now?: () => Date;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'PropertyRegistry', debugMode: true });
 * logger.debug('registry_built', { propertyCount: 4, groupCount: 1 });
 * logger.warn('deprecated_property_used', { property: 'db.url' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Whether debug entries are emitted. Callers use this to skip building
   * expensive debug payloads.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
   *
   * @param event - Snake-case event name, e.g. `cache_hit`.
   * @param data - Structured context serialized under `data`.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  /**
   * Creates a logger for another component that shares this logger's
   * debug mode and clock.
   *
   * @param component - Component name for the derived logger.
   * @returns A new logger.
   */
  forComponent(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, now: this.now });
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data === undefined
        ? { timestamp: this.now().toISOString(), level, component: this.component, event }
        : { timestamp: this.now().toISOString(), level, component: this.component, event, data };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes a log entry, falling back to a marker entry when the attached
 * data cannot be represented as JSON (circular references, BigInt values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: message.length > 0 ? message : 'unknown serialization error',
      originalData: '[unserializable]',
    });
  }
}

/**
 * Creates a logger for a component, reusing the injected logger's settings
 * when one is provided.
 *
 * @param component - Component name.
 * @param injected - Logger supplied by the caller, if any.
 * @returns A logger for the component.
 */
export function resolveLogger(component: string, injected?: Logger): Logger {
  return injected?.forComponent(component) ?? new Logger({ component });
}
