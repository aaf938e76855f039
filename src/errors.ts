/**
 * Base error class for tagsweep errors
 */
export class TagsweepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TagsweepError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when the root directory cannot be used. Aborts the run before any
 * file is touched.
 */
export class InvalidRootError extends TagsweepError {
  public readonly path: string;
  public readonly reason: 'missing' | 'not-directory';

  constructor(path: string, reason: 'missing' | 'not-directory') {
    super(
      reason === 'missing'
        ? `Path does not exist: ${path}`
        : `Path is not a directory: ${path}`,
    );
    this.name = 'InvalidRootError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Thrown inside a strategy when its collaborator (process or library) fails.
 * Never escapes the strategy boundary.
 */
export class CollaboratorFailureError extends TagsweepError {
  public readonly collaborator: string;
  public readonly exitCode: number | undefined;

  constructor(collaborator: string, detail: string, exitCode?: number) {
    super(
      exitCode !== undefined
        ? `${collaborator} exited with code ${exitCode}: ${detail}`
        : `${collaborator} failed: ${detail}`,
    );
    this.name = 'CollaboratorFailureError';
    this.collaborator = collaborator;
    this.exitCode = exitCode;
  }
}

/**
 * Thrown for filesystem failures around backups and temp-file swaps
 */
export class IOFailureError extends TagsweepError {
  public readonly operation: string;
  public readonly path: string;

  constructor(operation: string, path: string, cause: unknown) {
    super(`${operation} failed for ${path}: ${describeError(cause)}`);
    this.name = 'IOFailureError';
    this.operation = operation;
    this.path = path;
  }
}

/**
 * Thrown by the built-in rewriters when a container is malformed
 */
export class CorruptedFileError extends TagsweepError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'CorruptedFileError';
    this.offset = offset;
  }
}

/**
 * Thrown for invalid command-line arguments
 */
export class UsageError extends TagsweepError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
