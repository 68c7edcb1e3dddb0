import { resolve, sep } from 'node:path';
import { PreconditionError } from '../errors.js';

// ============================================================================
// Path Safety Utilities
// ============================================================================
// Unit codes, assessment names and week topics all end up as single path
// components. These checks keep them from escaping the course tree.

/**
 * Result of folder name validation.
 */
export interface SafeNameResult {
  valid: boolean;
  error?: string;
}

/**
 * Validate that a name is usable as exactly one path component.
 *
 * @param name - Candidate folder or file name
 */
export function validateFolderName(name: string): SafeNameResult {
  if (name.trim() === '') {
    return { valid: false, error: 'Name is empty' };
  }

  if (name.includes('\0')) {
    return { valid: false, error: 'Name contains null byte' };
  }

  if (name === '.' || name === '..') {
    return { valid: false, error: 'Name is a filesystem special entry' };
  }

  if (name.includes('/')) {
    return { valid: false, error: 'Name contains path separator: /' };
  }

  if (name.includes('\\')) {
    return { valid: false, error: 'Name contains path separator: \\' };
  }

  // The setup log is line based
  if (/[\r\n]/.test(name)) {
    return { valid: false, error: 'Name contains a line break' };
  }

  return { valid: true };
}

/**
 * @throws {PreconditionError} when the name is not a single safe path component
 */
export function assertFolderName(name: string, label: string): void {
  const result = validateFolderName(name);
  if (!result.valid) {
    throw new PreconditionError(`Invalid ${label} "${name}": ${result.error}`);
  }
}

/**
 * Verify that a path stays within the expected base directory.
 *
 * Uses a trailing separator check so "/foo/bar" does not match "/foo/barbaz".
 *
 * @throws {PreconditionError} if the path escapes the base directory
 */
export function assertInside(path: string, baseDir: string): void {
  const absPath = resolve(path);
  const absBase = resolve(baseDir);

  if (absPath === absBase) {
    return;
  }

  if (!absPath.startsWith(absBase + sep)) {
    throw new PreconditionError(
      `Path escapes the course directory: "${absPath}" is not within "${absBase}"`,
    );
  }
}
