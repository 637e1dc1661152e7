/**
 * Rules over file system paths.
 *
 * These rules touch the file system synchronously when they run. Values that
 * are not usable paths (empty, containing null bytes) fail like missing paths.
 *
 * @packageDocumentation
 */

import { constants } from 'node:fs';
import { basename } from 'node:path';
import { InvalidDefinitionError } from '../../schema/errors.js';
import {
  isValidPath,
  safeAccessSync,
  safeLstatSync,
  safeReaddirSync,
  safeStatSync,
} from '../../utils/safe-fs.js';
import { failure, success, validationError } from '../result.js';
import type { ValidationResult } from '../result.js';
import { createRule } from '../rule.js';
import type { ValidationRule } from '../rule.js';

function pathFailure(propertyName: string, message: string, value: string): ValidationResult {
  return failure(validationError({ propertyName, message, actualValue: value }));
}

export function exists(): ValidationRule<string> {
  return createRule<string>((name, value) =>
    isValidPath(value) && safeStatSync(value) !== undefined
      ? success()
      : pathFailure(name, 'Path does not exist', value)
  );
}

/** The path exists and is a regular file. */
export function fileExists(): ValidationRule<string> {
  return createRule<string>((name, value) => {
    const stats = isValidPath(value) ? safeStatSync(value) : undefined;
    if (stats === undefined) {
      return pathFailure(name, 'File does not exist', value);
    }
    return stats.isFile()
      ? success()
      : pathFailure(name, 'Path exists but is not a regular file', value);
  });
}

export function directoryExists(): ValidationRule<string> {
  return createRule<string>((name, value) => {
    const stats = isValidPath(value) ? safeStatSync(value) : undefined;
    if (stats === undefined) {
      return pathFailure(name, 'Directory does not exist', value);
    }
    return stats.isDirectory()
      ? success()
      : pathFailure(name, 'Path exists but is not a directory', value);
  });
}

export function readable(): ValidationRule<string> {
  return createRule<string>((name, value) =>
    isValidPath(value) && safeAccessSync(value, constants.R_OK)
      ? success()
      : pathFailure(name, 'File is not readable', value)
  );
}

export function writable(): ValidationRule<string> {
  return createRule<string>((name, value) =>
    isValidPath(value) && safeAccessSync(value, constants.W_OK)
      ? success()
      : pathFailure(name, 'File is not writable', value)
  );
}

export function executable(): ValidationRule<string> {
  return createRule<string>((name, value) =>
    isValidPath(value) && safeAccessSync(value, constants.X_OK)
      ? success()
      : pathFailure(name, 'File is not executable', value)
  );
}

/** The path itself is a symbolic link; the target need not exist. */
export function isSymbolicLink(): ValidationRule<string> {
  return createRule<string>((name, value) =>
    isValidPath(value) && safeLstatSync(value)?.isSymbolicLink() === true
      ? success()
      : pathFailure(name, 'Path is not a symbolic link', value)
  );
}

/** The last path segment starts with a dot. Existence is not checked. */
export function isHidden(): ValidationRule<string> {
  return createRule<string>((name, value) =>
    basename(value).startsWith('.')
      ? success()
      : pathFailure(name, 'Path is not hidden', value)
  );
}

export function isEmptyDirectory(): ValidationRule<string> {
  return createRule<string>((name, value) => {
    const stats = isValidPath(value) ? safeStatSync(value) : undefined;
    if (stats === undefined || !stats.isDirectory()) {
      return pathFailure(name, 'Path is not a directory', value);
    }
    const entries = safeReaddirSync(value);
    return entries.length === 0
      ? success()
      : pathFailure(name, 'Directory is not empty', `${value} (contains ${entries.length} items)`);
  });
}

/**
 * Inclusive bounds on the size in bytes of whatever the path names.
 *
 * @throws InvalidDefinitionError when `minBytes` exceeds `maxBytes`.
 */
export function fileSizeBetween(minBytes: number, maxBytes: number): ValidationRule<string> {
  if (minBytes > maxBytes) {
    throw new InvalidDefinitionError(`fileSizeBetween: min ${minBytes} exceeds max ${maxBytes}`);
  }
  return createRule<string>((propertyName, value) => {
    const stats = isValidPath(value) ? safeStatSync(value) : undefined;
    if (stats === undefined) {
      return pathFailure(propertyName, 'File does not exist', value);
    }
    return stats.size >= minBytes && stats.size <= maxBytes
      ? success()
      : failure(
          validationError({
            propertyName,
            message: `File size must be between ${minBytes} and ${maxBytes} bytes`,
            actualValue: `${stats.size} bytes`,
            expectedValue: `[${minBytes}, ${maxBytes}] bytes`,
          })
        );
  });
}

/**
 * The path ends with the extension. A leading dot is added when missing.
 *
 * @param extension - e.g. 'toml' or '.toml'.
 */
export function hasExtension(extension: string): ValidationRule<string> {
  const suffix = extension.startsWith('.') ? extension : `.${extension}`;
  return createRule<string>((name, value) =>
    value.endsWith(suffix)
      ? success()
      : pathFailure(name, `File must have extension: ${suffix}`, value)
  );
}
