/**
 * Error classes for the datasafe.
 *
 * Every failure the datasafe reports on purpose is a {@link DatasafeError}
 * carrying a machine-readable `code`. The transports (HTTP server, CLI) use
 * the class to pick a status code or exit message; anything that is not a
 * DatasafeError is treated as an internal failure.
 *
 * Hierarchy:
 * - DatasafeError
 *   - MissingLoiError, InvalidLoiError, LoiNotFoundError
 *   - MissingPathError, MissingContentError, PathNotFoundError, InvalidPathError
 *   - AlreadyExistsError, NotEmptyError
 *   - MissingInformationError, MissingFileError, InvalidManifestError
 *   - InvalidArchiveError, ConfigurationError
 *
 * @module errors
 */

/**
 * Base class for all errors raised deliberately by the datasafe.
 *
 * @example
 * throw new DatasafeError('Something went wrong', 'SOMETHING_WRONG', {
 *   path: 'exp/sa/42/cwepr/1'
 * });
 */
export class DatasafeError extends Error {
  /**
   * @param message - Human-readable error description
   * @param code - Machine-readable error code (UPPER_SNAKE_CASE)
   * @param details - Optional additional context
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** An operation requiring a LOI received none. */
export class MissingLoiError extends DatasafeError {
  constructor(message = 'No LOI provided.', details?: Record<string, unknown>) {
    super(message, 'MISSING_LOI', details);
  }
}

/**
 * A LOI failed the checker cascade, or is valid but not usable for the
 * requested operation (e.g. not a dataset LOI).
 *
 * @example
 * throw new InvalidLoiError('String is not a valid LOI.', { loi: '43.1001/ds' });
 */
export class InvalidLoiError extends DatasafeError {
  constructor(message = 'String is not a valid LOI.', details?: Record<string, unknown>) {
    super(message, 'INVALID_LOI', details);
  }
}

/** A well-formed LOI has no storage slot. */
export class LoiNotFoundError extends DatasafeError {
  constructor(message = 'LOI does not exist.', details?: Record<string, unknown>) {
    super(message, 'LOI_NOT_FOUND', details);
  }
}

export class MissingPathError extends DatasafeError {
  constructor(message = 'No path provided.', details?: Record<string, unknown>) {
    super(message, 'MISSING_PATH', details);
  }
}

export class MissingContentError extends DatasafeError {
  constructor(message = 'No content provided.', details?: Record<string, unknown>) {
    super(message, 'MISSING_CONTENT', details);
  }
}

export class PathNotFoundError extends DatasafeError {
  constructor(message = 'Path does not exist.', details?: Record<string, unknown>) {
    super(message, 'PATH_NOT_FOUND', details);
  }
}

/** A storage path resolves outside the storage root. */
export class InvalidPathError extends DatasafeError {
  constructor(message = 'Path leaves the storage root.', details?: Record<string, unknown>) {
    super(message, 'INVALID_PATH', details);
  }
}

export class AlreadyExistsError extends DatasafeError {
  constructor(message = 'Path already exists.', details?: Record<string, unknown>) {
    super(message, 'ALREADY_EXISTS', details);
  }
}

export class NotEmptyError extends DatasafeError {
  constructor(message = 'Directory not empty', details?: Record<string, unknown>) {
    super(message, 'NOT_EMPTY', details);
  }
}

/**
 * A manifest operation lacks required filenames or checksums.
 *
 * @example
 * throw new MissingInformationError('Data filenames missing');
 */
export class MissingInformationError extends DatasafeError {
  constructor(message = 'Information missing.', details?: Record<string, unknown>) {
    super(message, 'MISSING_INFORMATION', details);
  }
}

/** Files listed in a manifest are absent from disk. */
export class MissingFileError extends DatasafeError {
  constructor(message = 'File(s) not existent.', details?: Record<string, unknown>) {
    super(message, 'MISSING_FILE', details);
  }
}

export class InvalidManifestError extends DatasafeError {
  constructor(message = 'Manifest document is not valid.', details?: Record<string, unknown>) {
    super(message, 'INVALID_MANIFEST', details);
  }
}

export class InvalidArchiveError extends DatasafeError {
  constructor(message = 'Archive is not valid.', details?: Record<string, unknown>) {
    super(message, 'INVALID_ARCHIVE', details);
  }
}

/** Invalid configuration value, e.g. an unsupported checksum algorithm. */
export class ConfigurationError extends DatasafeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION', details);
  }
}

/**
 * Type guard to check if an error is a DatasafeError
 */
export function isDatasafeError(error: unknown): error is DatasafeError {
  return error instanceof DatasafeError;
}

/**
 * Node.js system error with an errno code (ENOENT, EEXIST, ...).
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return code === undefined || error.code === code;
}
