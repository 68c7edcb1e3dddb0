// ============================================================================
// Error taxonomy
// ============================================================================
// Every failure the library raises on purpose extends CourseKitError so the
// CLI can tell the kinds apart by `code` without string matching.

export type CourseKitErrorCode =
  | 'ALREADY_COMPLETED'
  | 'DIRECTORY_EXISTS'
  | 'PRECONDITION'
  | 'CONFIG';

/**
 * Base class for all coursekit errors.
 */
export class CourseKitError extends Error {
  override name = 'CourseKitError';

  constructor(
    message: string,
    public readonly code: CourseKitErrorCode,
  ) {
    super(message);
  }
}

/**
 * A one-time setup operation was attempted again in a directory whose
 * setup log already records it. Callers must not retry.
 */
export class AlreadyCompletedError extends CourseKitError {
  override name = 'AlreadyCompletedError';

  constructor(
    public readonly operation: string,
    public readonly directory: string,
  ) {
    super(
      `The '${operation}' operation has already been executed in ${directory}. ` +
        'Running it again risks overwriting work.',
      'ALREADY_COMPLETED',
    );
  }
}

/**
 * The target directory exists on disk although the setup log does not
 * record the operation (partial earlier run, or created by hand).
 */
export class DirectoryExistsError extends CourseKitError {
  override name = 'DirectoryExistsError';

  constructor(public readonly path: string) {
    super(
      `Directory already exists: ${path}. ` +
        'Use the existing directory or delete it and run the operation again.',
      'DIRECTORY_EXISTS',
    );
  }
}

/**
 * Input rejected before any side effect took place.
 */
export class PreconditionError extends CourseKitError {
  override name = 'PreconditionError';

  constructor(message: string) {
    super(message, 'PRECONDITION');
  }
}

/**
 * Configuration file missing, unreadable or invalid.
 *
 * `field` holds the dotted path of the first failing field, when known.
 */
export class ConfigError extends CourseKitError {
  override name = 'ConfigError';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, 'CONFIG');
  }
}

/**
 * Narrow an unknown caught value to a Node.js errno exception.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
