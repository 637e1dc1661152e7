/**
 * File system access with path validation.
 *
 * Paths are checked (non-empty, no null bytes) and resolved to absolute paths
 * before any file system call. File rules and the settings loader go through
 * these helpers.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Whether a path passes {@link validatePath}.
 *
 * @param filePath - The path to check.
 */
export function isValidPath(filePath: string): boolean {
  return filePath.length > 0 && !filePath.includes('\0');
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  return fs.readFile(validatePath(filePath), 'utf-8');
}

/**
 * Stats a path without following a missing entry into an exception.
 *
 * @param filePath - The path to stat.
 * @returns The stats, or undefined when nothing exists at the path.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeStatSync(filePath: string): fsSync.Stats | undefined {
  return fsSync.statSync(validatePath(filePath), { throwIfNoEntry: false });
}

/**
 * Checks access permissions on a path.
 *
 * @param filePath - The path to check.
 * @param mode - `fs.constants.R_OK`, `W_OK` or `X_OK`.
 * @returns True when the current process has the access.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeAccessSync(filePath: string, mode: number): boolean {
  const validatedPath = validatePath(filePath);
  try {
    fsSync.accessSync(validatedPath, mode);
    return true;
  } catch {
    return false;
  }
}

/**
 * Stats a path without following a final symbolic link.
 *
 * @param filePath - The path to stat.
 * @returns The stats, or undefined when nothing exists at the path.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeLstatSync(filePath: string): fsSync.Stats | undefined {
  return fsSync.lstatSync(validatePath(filePath), { throwIfNoEntry: false });
}

/**
 * Lists the entries of a directory.
 *
 * @param dirPath - The directory to list.
 * @returns The entry names.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the directory cannot be read.
 */
export function safeReaddirSync(dirPath: string): string[] {
  return fsSync.readdirSync(validatePath(dirPath));
}
